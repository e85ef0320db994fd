export { InvalidCredentialsException } from './invalid-credentials.exception';
export {
  TokenRejectedException,
  NotAuthenticatedException,
  REFRESH_FAILURE_STATUS,
} from './token.exceptions';

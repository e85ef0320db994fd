export { LoginDto } from './login.dto';
export { RefreshTokenDto } from './refresh-token.dto';
export {
  TokenPairResponseDto,
  AccessTokenResponseDto,
} from './token-response.dto';

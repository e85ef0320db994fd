export { TypeOrmUserStore } from './typeorm-user.store';
export {
  BcryptCredentialVerifier,
  BCRYPT_SALT_ROUNDS,
} from './bcrypt-credential.verifier';

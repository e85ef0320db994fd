import { Inject, Injectable, Logger } from '@nestjs/common';
import { CREDENTIAL_VERIFIER } from './interfaces';
import type { CredentialVerifier } from './interfaces';
import { TokenIssuer } from './token';
import { RefreshFlow } from './refresh';
import {
  AccessTokenResponseDto,
  LoginDto,
  RefreshTokenDto,
  TokenPairResponseDto,
} from './dto';
import {
  InvalidCredentialsException,
  TokenRejectedException,
} from './exceptions';

/**
 * AuthService: HTTP-facing entry points for obtaining and refreshing tokens.
 *
 * Translates the token core's result values into response DTOs or
 * HttpExceptions. Passwords and tokens are never logged.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(CREDENTIAL_VERIFIER)
    private readonly credentials: CredentialVerifier,
    private readonly issuer: TokenIssuer,
    private readonly refreshFlow: RefreshFlow,
  ) {}

  /**
   * Exchange a username and password for an access/refresh token pair.
   *
   * @throws InvalidCredentialsException if the credentials do not match an active user
   */
  async obtainTokenPair(dto: LoginDto): Promise<TokenPairResponseDto> {
    const subjectId = await this.credentials.verify(dto.username, dto.password);

    if (!subjectId) {
      this.logger.warn('Token request rejected: invalid credentials');
      throw new InvalidCredentialsException();
    }

    this.logger.log(`Token pair issued for user ${subjectId}`);
    return new TokenPairResponseDto(this.issuer.issueTokenPair(subjectId));
  }

  /**
   * Exchange a refresh token for a new access token.
   *
   * @throws TokenRejectedException with 400, 401 or 404 depending on the reason
   */
  async refreshAccessToken(dto: RefreshTokenDto): Promise<AccessTokenResponseDto> {
    const result = await this.refreshFlow.refresh(dto.refresh);

    if (result.status === 'rejected') {
      throw TokenRejectedException.forRefresh(result.reason);
    }

    return new AccessTokenResponseDto(result.accessToken);
  }
}

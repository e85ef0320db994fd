import { Inject, Injectable, Logger } from '@nestjs/common';
import { TokenType, USER_STORE } from '../interfaces';
import type { UserStore } from '../interfaces';
import { TokenCodec, TokenFailure, TokenIssuer } from '../token';
import type { RefreshFailure } from '../token';

export type RefreshResult =
  | { readonly status: 'refreshed'; readonly accessToken: string }
  | { readonly status: 'rejected'; readonly reason: RefreshFailure };

/**
 * RefreshFlow: exchanges a valid refresh token for a new access token.
 *
 * The refresh token itself is neither re-issued nor invalidated.
 */
@Injectable()
export class RefreshFlow {
  private readonly logger = new Logger(RefreshFlow.name);

  constructor(
    private readonly codec: TokenCodec,
    private readonly issuer: TokenIssuer,
    @Inject(USER_STORE) private readonly users: UserStore,
  ) {}

  async refresh(refreshToken: string | undefined): Promise<RefreshResult> {
    if (!refreshToken) {
      return this.reject(TokenFailure.MissingRefreshToken);
    }

    const decoded = this.codec.decode(refreshToken);
    if (decoded.status === 'rejected') {
      return this.reject(decoded.reason);
    }

    const { subjectId, tokenType } = decoded.claims;
    if (tokenType !== TokenType.Refresh) {
      return this.reject(TokenFailure.WrongTokenType);
    }

    const principal = subjectId ? await this.users.findById(subjectId) : null;
    if (!principal) {
      return this.reject(TokenFailure.SubjectNotFound);
    }

    const accessToken = this.issuer.issueAccessToken(subjectId);
    this.logger.log(`Access token refreshed for user ${subjectId}`);

    return { status: 'refreshed', accessToken };
  }

  private reject(reason: RefreshFailure): RefreshResult {
    this.logger.debug(`Token refresh rejected: ${reason}`);
    return { status: 'rejected', reason };
  }
}

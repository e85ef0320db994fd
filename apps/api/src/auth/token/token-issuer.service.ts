import { Inject, Injectable } from '@nestjs/common';
import { TokenType } from '../interfaces';
import { CLOCK } from './clock';
import type { Clock } from './clock';
import { SIGNING_CONTEXT } from './signing-context';
import type { SigningContext } from './signing-context';
import { TokenCodec } from './token-codec.service';

export interface TokenPair {
  access: string;
  refresh: string;
}

/**
 * TokenIssuer: builds access and refresh claim sets and signs them.
 *
 * Tokens are not persisted; a refresh token stays valid until its own
 * expiry whether or not it has been used.
 */
@Injectable()
export class TokenIssuer {
  constructor(
    private readonly codec: TokenCodec,
    @Inject(SIGNING_CONTEXT) private readonly signing: SigningContext,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  issueAccessToken(subjectId: string): string {
    return this.issue(subjectId, TokenType.Access, this.clock.now());
  }

  issueRefreshToken(subjectId: string): string {
    return this.issue(subjectId, TokenType.Refresh, this.clock.now());
  }

  /** Issues both tokens against the same issuance instant */
  issueTokenPair(subjectId: string): TokenPair {
    const now = this.clock.now();
    return {
      access: this.issue(subjectId, TokenType.Access, now),
      refresh: this.issue(subjectId, TokenType.Refresh, now),
    };
  }

  private issue(subjectId: string, tokenType: TokenType, now: Date): string {
    const lifetimeSeconds =
      tokenType === TokenType.Access
        ? this.signing.accessTokenLifetimeSeconds
        : this.signing.refreshTokenLifetimeSeconds;

    return this.codec.encode({
      subjectId,
      tokenType,
      issuedAt: now,
      expiresAt: new Date(now.getTime() + lifetimeSeconds * 1000),
    });
  }
}

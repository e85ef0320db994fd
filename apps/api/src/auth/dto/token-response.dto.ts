import type { TokenPair } from '../token';

/** Response for POST /token */
export class TokenPairResponseDto {
  access: string;
  refresh: string;

  constructor(pair: TokenPair) {
    this.access = pair.access;
    this.refresh = pair.refresh;
  }
}

/** Response for POST /token/refresh */
export class AccessTokenResponseDto {
  access: string;

  constructor(access: string) {
    this.access = access;
  }
}

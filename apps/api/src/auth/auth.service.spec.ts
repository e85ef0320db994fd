import { HttpStatus } from '@nestjs/common';
import { AuthService } from './auth.service';
import { CREDENTIAL_VERIFIER, TokenType } from './interfaces';
import { TokenCodec, TokenIssuer } from './token';
import {
  InvalidCredentialsException,
  TokenRejectedException,
} from './exceptions';
import {
  FixedClock,
  InMemoryUserStore,
  createTokenTestingModule,
} from '../../test/fakes';

describe('AuthService', () => {
  let clock: FixedClock;
  let service: AuthService;
  let issuer: TokenIssuer;
  let codec: TokenCodec;
  let verify: jest.Mock<Promise<string | null>, [string, string]>;

  beforeEach(async () => {
    clock = new FixedClock();
    verify = jest.fn<Promise<string | null>, [string, string]>();
    const moduleRef = await createTokenTestingModule({
      clock,
      users: new InMemoryUserStore([{ id: '42', username: 'alice' }]),
      providers: [
        AuthService,
        { provide: CREDENTIAL_VERIFIER, useValue: { verify } },
      ],
    });
    service = moduleRef.get(AuthService);
    issuer = moduleRef.get(TokenIssuer);
    codec = moduleRef.get(TokenCodec);
  });

  describe('obtainTokenPair', () => {
    it('issues an access and a refresh token for valid credentials', async () => {
      verify.mockResolvedValue('42');

      const response = await service.obtainTokenPair({
        username: 'alice',
        password: 'test-password',
      });

      expect(verify).toHaveBeenCalledWith('alice', 'test-password');
      expect(codec.decode(response.access)).toMatchObject({
        status: 'decoded',
        claims: { subjectId: '42', tokenType: TokenType.Access },
      });
      expect(codec.decode(response.refresh)).toMatchObject({
        status: 'decoded',
        claims: { subjectId: '42', tokenType: TokenType.Refresh },
      });
    });

    it('throws InvalidCredentialsException for invalid credentials', async () => {
      verify.mockResolvedValue(null);

      await expect(
        service.obtainTokenPair({ username: 'alice', password: 'wrong' }),
      ).rejects.toBeInstanceOf(InvalidCredentialsException);
    });
  });

  describe('refreshAccessToken', () => {
    it('returns a new access token', async () => {
      const refresh = issuer.issueRefreshToken('42');
      clock.advance(60_000);

      const response = await service.refreshAccessToken({ refresh });

      expect(response.access).toBe(issuer.issueAccessToken('42'));
    });

    it.each<[string, string | undefined, HttpStatus, string]>([
      ['a missing token', undefined, HttpStatus.BAD_REQUEST, 'missing_refresh_token'],
      ['a malformed token', 'not-a-jwt', HttpStatus.UNAUTHORIZED, 'malformed_token'],
    ])('maps %s to its status', async (_label, refresh, status, reason) => {
      const error: unknown = await service
        .refreshAccessToken({ refresh })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TokenRejectedException);
      expect(error).toMatchObject({ reason });
      expect(error instanceof TokenRejectedException && error.getStatus()).toBe(
        status,
      );
    });

    it('answers 400 for an access token', async () => {
      const error: unknown = await service
        .refreshAccessToken({ refresh: issuer.issueAccessToken('42') })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TokenRejectedException);
      expect(error instanceof TokenRejectedException && error.getStatus()).toBe(
        HttpStatus.BAD_REQUEST,
      );
    });

    it('answers 401 for an expired refresh token', async () => {
      const refresh = issuer.issueRefreshToken('42');
      clock.advance(8 * 86_400_000);

      const error: unknown = await service
        .refreshAccessToken({ refresh })
        .catch((caught: unknown) => caught);

      expect(error).toMatchObject({ reason: 'token_expired' });
      expect(error instanceof TokenRejectedException && error.getStatus()).toBe(
        HttpStatus.UNAUTHORIZED,
      );
    });

    it('answers 404 for an unknown user', async () => {
      const refresh = issuer.issueRefreshToken('99');

      const error: unknown = await service
        .refreshAccessToken({ refresh })
        .catch((caught: unknown) => caught);

      expect(error).toMatchObject({ reason: 'subject_not_found' });
      expect(error instanceof TokenRejectedException && error.getStatus()).toBe(
        HttpStatus.NOT_FOUND,
      );
    });
  });
});

import { BadRequestException, ValidationPipe } from '@nestjs/common';
import type { ArgumentMetadata } from '@nestjs/common';
import { LoginDto } from './login.dto';
import { RefreshTokenDto } from './refresh-token.dto';

/** Same options as the global pipe in main.ts */
const pipe = new ValidationPipe({
  whitelist: true,
  forbidNonWhitelisted: true,
  transform: true,
});

function bodyOf(metatype: ArgumentMetadata['metatype']): ArgumentMetadata {
  return { type: 'body', metatype };
}

async function validationMessages(
  body: unknown,
  metatype: ArgumentMetadata['metatype'],
): Promise<unknown> {
  try {
    await pipe.transform(body, bodyOf(metatype));
  } catch (error) {
    if (error instanceof BadRequestException) {
      const response = error.getResponse();
      return typeof response === 'object' && 'message' in response
        ? response.message
        : response;
    }
    throw error;
  }
  throw new Error('expected the body to be rejected');
}

describe('request DTO validation', () => {
  describe('LoginDto', () => {
    it('accepts a username and password', async () => {
      const dto: unknown = await pipe.transform(
        { username: 'alice', password: 'pw-1' },
        bodyOf(LoginDto),
      );

      expect(dto).toBeInstanceOf(LoginDto);
      expect(dto).toEqual({ username: 'alice', password: 'pw-1' });
    });

    it('rejects a missing username', async () => {
      await expect(
        validationMessages({ password: 'pw-1' }, LoginDto),
      ).resolves.toEqual(
        expect.arrayContaining([
          'Username is required',
          'username must be a string',
        ]),
      );
    });

    it('rejects an empty password', async () => {
      await expect(
        validationMessages({ username: 'alice', password: '' }, LoginDto),
      ).resolves.toEqual(['Password is required']);
    });

    it('rejects a non-string username', async () => {
      await expect(
        validationMessages({ username: 42, password: 'pw-1' }, LoginDto),
      ).resolves.toEqual(['username must be a string']);
    });

    it('rejects unknown fields', async () => {
      await expect(
        validationMessages(
          { username: 'alice', password: 'pw-1', role: 'admin' },
          LoginDto,
        ),
      ).resolves.toEqual(['property role should not exist']);
    });
  });

  describe('RefreshTokenDto', () => {
    it('lets an empty body through so the flow reports the missing token', async () => {
      const dto: unknown = await pipe.transform({}, bodyOf(RefreshTokenDto));

      expect(dto).toBeInstanceOf(RefreshTokenDto);
      expect(dto).toEqual({});
    });

    it('passes the refresh token through', async () => {
      const dto: unknown = await pipe.transform(
        { refresh: 'a.b.c' },
        bodyOf(RefreshTokenDto),
      );

      expect(dto).toEqual({ refresh: 'a.b.c' });
    });

    it('rejects a non-string refresh token', async () => {
      await expect(
        validationMessages({ refresh: 7 }, RefreshTokenDto),
      ).resolves.toEqual(['refresh must be a string']);
    });
  });
});

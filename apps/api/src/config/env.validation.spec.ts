import { Environment, validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('applies defaults when only the secret is provided', () => {
    const env = validateEnvironment({ JWT_SECRET_KEY: 'test-secret' });

    expect(env.JWT_SECRET_KEY).toBe('test-secret');
    expect(env.JWT_ALGORITHM).toBe('HS256');
    expect(env.JWT_ACCESS_TOKEN_LIFETIME_MINUTES).toBe(5);
    expect(env.JWT_REFRESH_TOKEN_LIFETIME_DAYS).toBe(7);
    expect(env.NODE_ENV).toBe(Environment.Development);
    expect(env.API_PORT).toBe(4000);
    expect(env.POSTGRES_PORT).toBe(5432);
  });

  it('converts numeric strings from the environment', () => {
    const env = validateEnvironment({
      JWT_SECRET_KEY: 'test-secret',
      JWT_ACCESS_TOKEN_LIFETIME_MINUTES: '15',
      JWT_REFRESH_TOKEN_LIFETIME_DAYS: '30',
      API_PORT: '8080',
    });

    expect(env.JWT_ACCESS_TOKEN_LIFETIME_MINUTES).toBe(15);
    expect(env.JWT_REFRESH_TOKEN_LIFETIME_DAYS).toBe(30);
    expect(env.API_PORT).toBe(8080);
  });

  it('accepts the other HMAC algorithms', () => {
    const env = validateEnvironment({
      JWT_SECRET_KEY: 'test-secret',
      JWT_ALGORITHM: 'HS512',
    });

    expect(env.JWT_ALGORITHM).toBe('HS512');
  });

  it('rejects a missing secret', () => {
    expect(() => validateEnvironment({})).toThrow('JWT_SECRET_KEY is required');
  });

  it('rejects an unsupported algorithm', () => {
    expect(() =>
      validateEnvironment({ JWT_SECRET_KEY: 'test-secret', JWT_ALGORITHM: 'none' }),
    ).toThrow('Invalid configuration');
  });

  it('rejects a non-positive lifetime', () => {
    expect(() =>
      validateEnvironment({
        JWT_SECRET_KEY: 'test-secret',
        JWT_ACCESS_TOKEN_LIFETIME_MINUTES: '0',
      }),
    ).toThrow('JWT_ACCESS_TOKEN_LIFETIME_MINUTES must not be less than 1');
  });

  it('reports the offending variable without echoing values', () => {
    let message = '';
    try {
      validateEnvironment({ JWT_SECRET_KEY: 'test-secret', API_PORT: 'abc' });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message).toContain('API_PORT must be an integer number');
    expect(message).not.toContain('test-secret');
  });
});

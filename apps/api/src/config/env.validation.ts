import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

/** HMAC algorithms accepted for signing; asymmetric keys are out of scope */
export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

/**
 * Environment variables recognized by the API, with their defaults.
 *
 * Values arrive as strings; `enableImplicitConversion` turns the numeric
 * ones into numbers before validation.
 */
export class EnvironmentVariables {
  @IsEnum(Environment)
  NODE_ENV: Environment = Environment.Development;

  @IsInt()
  @Min(1)
  @Max(65535)
  API_PORT = 4000;

  @IsString()
  API_CORS_ORIGIN = 'http://localhost:3000';

  // ── Token signing ────────────────────────────────────────

  @IsString()
  @IsNotEmpty({ message: 'JWT_SECRET_KEY is required' })
  JWT_SECRET_KEY!: string;

  @IsIn([...SIGNING_ALGORITHMS])
  JWT_ALGORITHM: SigningAlgorithm = 'HS256';

  @IsInt()
  @Min(1)
  JWT_ACCESS_TOKEN_LIFETIME_MINUTES = 5;

  @IsInt()
  @Min(1)
  JWT_REFRESH_TOKEN_LIFETIME_DAYS = 7;

  // ── Database ─────────────────────────────────────────────

  @IsString()
  POSTGRES_HOST = 'localhost';

  @IsInt()
  @Min(1)
  @Max(65535)
  POSTGRES_PORT = 5432;

  @IsString()
  POSTGRES_USER = 'authgate';

  @IsString()
  POSTGRES_PASSWORD = 'authgate_secret';

  @IsString()
  POSTGRES_DB = 'authgate';
}

/**
 * `validate` hook for ConfigModule.forRoot: fails startup on bad config.
 *
 * Only property names and constraint messages are reported; values are not,
 * since some of them are secrets.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) =>
        Object.values(error.constraints ?? {}).join(', ') || error.property,
      )
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  return validated;
}

import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule } from '@authgate/database';
import type { EnvironmentVariables } from '../config/env.validation';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import {
  CLOCK,
  SIGNING_CONTEXT,
  TokenCodec,
  TokenIssuer,
  createSigningContext,
  systemClock,
} from './token';
import { AuthenticationGate } from './gate';
import { RefreshFlow } from './refresh';
import { JwtAuthGuard } from './guards';
import { CREDENTIAL_VERIFIER, USER_STORE } from './interfaces';
import { BcryptCredentialVerifier, TypeOrmUserStore } from './stores';

/**
 * AuthModule: token issuance, verification and refresh.
 *
 * Provides:
 * - SigningContext, built once from validated configuration
 * - TokenCodec / TokenIssuer / AuthenticationGate / RefreshFlow
 * - REST endpoints for obtaining and refreshing tokens
 *
 * Exports AuthenticationGate and JwtAuthGuard so other feature modules can
 * protect their routes with @UseGuards(JwtAuthGuard). The codec and issuer
 * are exported for the signing health check.
 */
@Module({
  imports: [
    DatabaseModule.forFeature(),

    // Signing options come from SIGNING_CONTEXT on every call
    JwtModule.register({}),
  ],
  controllers: [AuthController],
  providers: [
    {
      provide: SIGNING_CONTEXT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        createSigningContext({
          secretKey: configService.get('JWT_SECRET_KEY', { infer: true }),
          algorithm: configService.get('JWT_ALGORITHM', { infer: true }),
          accessTokenLifetimeMinutes: configService.get(
            'JWT_ACCESS_TOKEN_LIFETIME_MINUTES',
            { infer: true },
          ),
          refreshTokenLifetimeDays: configService.get(
            'JWT_REFRESH_TOKEN_LIFETIME_DAYS',
            { infer: true },
          ),
        }),
    },
    { provide: CLOCK, useValue: systemClock },
    { provide: USER_STORE, useClass: TypeOrmUserStore },
    { provide: CREDENTIAL_VERIFIER, useClass: BcryptCredentialVerifier },
    TokenCodec,
    TokenIssuer,
    AuthenticationGate,
    RefreshFlow,
    AuthService,
    JwtAuthGuard,
  ],
  exports: [AuthenticationGate, JwtAuthGuard, TokenCodec, TokenIssuer],
})
export class AuthModule {}

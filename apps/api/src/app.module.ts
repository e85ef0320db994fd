import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildDataSourceOptions } from '@authgate/database';
import { Environment, validateEnvironment } from './config/env.validation';
import type { EnvironmentVariables } from './config/env.validation';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { ProtectedModule } from './protected/protected.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnvironment,
    }),

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        buildDataSourceOptions({
          host: configService.get('POSTGRES_HOST', { infer: true }),
          port: configService.get('POSTGRES_PORT', { infer: true }),
          username: configService.get('POSTGRES_USER', { infer: true }),
          password: configService.get('POSTGRES_PASSWORD', { infer: true }),
          database: configService.get('POSTGRES_DB', { infer: true }),
          logging:
            configService.get('NODE_ENV', { infer: true }) ===
            Environment.Development,
        }),
    }),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    ProtectedModule,
  ],
})
export class AppModule {}

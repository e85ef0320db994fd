import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { AuthModule } from '../auth/auth.module';
import { HealthController } from './health.controller';
import { SigningHealthIndicator } from './signing.health';

@Module({
  imports: [TerminusModule, AuthModule],
  controllers: [HealthController],
  providers: [SigningHealthIndicator],
})
export class HealthModule {}

import { Module } from '@nestjs/common';
import { AuthModule } from '../auth';
import { ProtectedController } from './protected.controller';

@Module({
  imports: [AuthModule],
  controllers: [ProtectedController],
})
export class ProtectedModule {}

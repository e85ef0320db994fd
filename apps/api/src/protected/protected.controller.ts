import { Controller, Get, UseGuards } from '@nestjs/common';
import { CurrentUser, JwtAuthGuard } from '../auth';
import type { Principal } from '../auth';

export interface ProtectedResponse {
  message: string;
}

/**
 * Example protected endpoint: requires `Authorization: Bearer <access_token>`.
 */
@Controller('protected')
@UseGuards(JwtAuthGuard)
export class ProtectedController {
  @Get()
  getProtected(@CurrentUser() user: Principal): ProtectedResponse {
    return { message: `Hello, ${user.username}! This is protected data.` };
  }
}

import { Controller, Post, Body, HttpCode, HttpStatus } from '@nestjs/common';
import { AuthService } from './auth.service';
import {
  AccessTokenResponseDto,
  LoginDto,
  RefreshTokenDto,
  TokenPairResponseDto,
} from './dto';

/**
 * AuthController: REST endpoints for token issuance.
 *
 * Routes:
 * - POST /token          → Obtain an access/refresh token pair (public)
 * - POST /token/refresh  → Obtain a new access token (public)
 */
@Controller('token')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * @returns 200 OK with `{ access, refresh }`
   * @throws 400 Bad Request if username or password is missing
   * @throws 401 Unauthorized if credentials are invalid
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async obtain(@Body() dto: LoginDto): Promise<TokenPairResponseDto> {
    return this.authService.obtainTokenPair(dto);
  }

  /**
   * @returns 200 OK with `{ access }`
   * @throws 400 Bad Request if the token is missing or not a refresh token
   * @throws 401 Unauthorized if the token is malformed, tampered with or expired
   * @throws 404 Not Found if the token's user no longer exists
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() dto: RefreshTokenDto): Promise<AccessTokenResponseDto> {
    return this.authService.refreshAccessToken(dto);
  }
}

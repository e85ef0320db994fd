import { IsOptional, IsString } from 'class-validator';

/**
 * DTO for the refresh endpoint. `refresh` is optional at the validation
 * layer so that a missing token is reported as `missing_refresh_token`.
 */
export class RefreshTokenDto {
  @IsOptional()
  @IsString()
  refresh?: string;
}

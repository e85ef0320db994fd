import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for obtaining a token pair.
 *
 * Only presence is checked here; the credential check itself happens in
 * AuthService so the failure message stays the same for every cause.
 */
export class LoginDto {
  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}

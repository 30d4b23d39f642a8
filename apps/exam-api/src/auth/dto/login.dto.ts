import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * LoginDto - credentials for POST /auth/login.
 * Email is not format-checked here: it is normalized and looked up, and an
 * unknown address fails like a wrong password.
 */
export class LoginDto {
  @ApiProperty({ example: 'student@example.com' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(254)
  email!: string;

  @ApiProperty({ example: 'dev-password' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  password!: string;
}

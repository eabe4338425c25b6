import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEmail, IsJWT, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { User } from '../../user/domain/user.entity';

export class RegisterRequest {
  @ApiProperty({ example: 'viewer@example.com' })
  @IsEmail()
  @MaxLength(255)
  email!: string;

  @ApiProperty({ minLength: 5 })
  @IsString()
  @MinLength(5)
  @MaxLength(128)
  password!: string;
}

export class UpdateProfileRequest {
  @ApiPropertyOptional({ example: 'viewer@example.com' })
  @IsOptional()
  @IsEmail()
  @MaxLength(255)
  email?: string;

  @ApiPropertyOptional({ minLength: 5 })
  @IsOptional()
  @IsString()
  @MinLength(5)
  @MaxLength(128)
  password?: string;
}

export class TokenRequest {
  @ApiProperty({ example: 'viewer@example.com' })
  @IsEmail()
  email!: string;

  @ApiProperty()
  @IsString()
  password!: string;
}

export class RefreshTokenRequest {
  @ApiProperty()
  @IsJWT()
  refresh!: string;
}

export interface UserResponse {
  id: string;
  email: string;
  isStaff: boolean;
}

export interface TokenPairResponse {
  access: string;
  refresh: string;
}

export const toUserResponse = (user: User): UserResponse => ({
  id: user.id,
  email: user.email,
  isStaff: user.isStaff,
});

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsIn, IsOptional, IsString, Matches, MaxLength, MinLength } from 'class-validator';

const passwordPolicy = /^(?=.*[A-Za-z])(?=.*\d)[A-Za-z\d!@#$%^&*()_+\-={}\[\]:;"'`|<>,.?/]{8,}$/;

export const SELF_SERVICE_ROLES = ['customer', 'shop_owner'] as const;
export type SelfServiceRole = (typeof SELF_SERVICE_ROLES)[number];

export class RegisterDto {
  @ApiPropertyOptional({ description: 'Defaults to the normalized phone number' })
  @IsOptional()
  @IsString()
  @MinLength(3)
  @MaxLength(50)
  username?: string;

  @ApiProperty({ example: '+15551234567' })
  @IsString()
  phone!: string;

  @ApiPropertyOptional()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toLowerCase() : value))
  @IsOptional()
  @IsEmail()
  email?: string;

  @ApiProperty()
  @IsString()
  @Matches(passwordPolicy, { message: 'Password must be at least 8 chars and contain letters and numbers' })
  password!: string;

  @ApiPropertyOptional({ enum: SELF_SERVICE_ROLES, default: 'customer' })
  @IsOptional()
  @IsIn(SELF_SERVICE_ROLES)
  accountType?: SelfServiceRole;
}

export class LoginDto {
  @ApiProperty({ description: 'Username, phone number or email address' })
  @IsString()
  @MinLength(1)
  identifier!: string;

  @ApiProperty()
  @IsString()
  password!: string;
}

export class RefreshDto {
  @ApiPropertyOptional({ description: 'May also be sent in the x-refresh-token header' })
  @IsOptional()
  @IsString()
  refreshToken?: string;
}

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsEmail, IsIn, IsOptional, IsString, Matches, MaxLength, MinLength } from 'class-validator';
import { PaginationDto } from '../../common/dto/pagination.dto';
import {
  COMMUNICATION_CHANNELS,
  CommunicationChannel,
  MEMBERSHIP_TIERS,
  MembershipTier,
} from '../../database/schema';
import type { ServedCustomerSort } from '../../database/store';

const SERVED_CUSTOMER_SORTS: readonly ServedCustomerSort[] = ['recent', 'spent', 'name'];

export class UpdateCustomerProfileDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  preferredName?: string;

  @ApiPropertyOptional({ enum: COMMUNICATION_CHANNELS })
  @IsOptional()
  @IsIn(COMMUNICATION_CHANNELS)
  preferredCommunication?: CommunicationChannel;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(1000)
  specialInstructions?: string;
}

export class RegisterWalkInCustomerDto {
  @ApiProperty({ example: '+15551234567' })
  @IsString()
  phone!: string;

  @ApiPropertyOptional({ description: 'Defaults to the phone number' })
  @IsOptional()
  @IsString()
  @MinLength(3)
  @MaxLength(50)
  @Matches(/^[a-zA-Z0-9_.+-]+$/, { message: 'username may contain letters, digits and _ . + -' })
  username?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsEmail()
  email?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  preferredName?: string;

  @ApiPropertyOptional({ enum: COMMUNICATION_CHANNELS })
  @IsOptional()
  @IsIn(COMMUNICATION_CHANNELS)
  preferredCommunication?: CommunicationChannel;
}

export class CustomerLookupQueryDto {
  @ApiProperty({ example: '+15551234567' })
  @IsString()
  phone!: string;
}

export class ShopCustomersQueryDto extends PaginationDto {
  @ApiPropertyOptional({ description: 'Matches username, email, phone or preferred name' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() || undefined : value))
  @IsOptional()
  @IsString()
  @MaxLength(100)
  search?: string;

  @ApiPropertyOptional({ enum: MEMBERSHIP_TIERS })
  @IsOptional()
  @IsIn(MEMBERSHIP_TIERS)
  tier?: MembershipTier;

  @ApiPropertyOptional({ enum: SERVED_CUSTOMER_SORTS, default: 'recent' })
  @IsOptional()
  @IsIn(SERVED_CUSTOMER_SORTS)
  sort?: ServedCustomerSort;
}

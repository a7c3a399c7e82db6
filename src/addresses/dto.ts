import { ApiProperty, ApiPropertyOptional, PartialType } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsIn, IsOptional, IsString, MaxLength, MinLength } from 'class-validator';
import { ADDRESS_TYPES, AddressType } from '../database/schema';

const trimmed = ({ value }: { value: unknown }) =>
  value === undefined || value === null ? undefined : String(value).trim();

export class CreateAddressDto {
  @ApiPropertyOptional({ enum: ADDRESS_TYPES, default: 'home' })
  @IsOptional()
  @IsIn(ADDRESS_TYPES)
  type?: AddressType;

  @ApiProperty({ example: 'Home', description: 'Unique among your addresses' })
  @Transform(trimmed)
  @IsString()
  @MinLength(1)
  @MaxLength(50)
  label!: string;

  @ApiProperty({ example: '12 Elm St' })
  @Transform(trimmed)
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  streetAddress!: string;

  @ApiPropertyOptional({ example: 'Apt 4B' })
  @Transform(trimmed)
  @IsOptional()
  @IsString()
  @MaxLength(50)
  apartmentUnit?: string;

  @ApiProperty()
  @Transform(trimmed)
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  city!: string;

  @ApiProperty()
  @Transform(trimmed)
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  state!: string;

  @ApiProperty()
  @Transform(trimmed)
  @IsString()
  @MinLength(1)
  @MaxLength(20)
  postalCode!: string;

  @ApiPropertyOptional({ default: 'USA' })
  @Transform(trimmed)
  @IsOptional()
  @IsString()
  @MaxLength(100)
  country?: string;

  @ApiPropertyOptional({ description: 'Shown to the driver at pickup' })
  @Transform(trimmed)
  @IsOptional()
  @IsString()
  @MaxLength(500)
  pickupInstructions?: string;

  @ApiPropertyOptional()
  @Transform(({ value }) => {
    if (value === undefined || value === null || value === '') return undefined;
    if (typeof value === 'boolean') return value;
    const normalized = String(value).toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
    if (['false', '0', 'no', 'off'].includes(normalized)) return false;
    return value;
  })
  @IsOptional()
  @IsBoolean()
  isDefault?: boolean;
}

export class UpdateAddressDto extends PartialType(CreateAddressDto) {}

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsOptional, IsString, IsUUID, MaxLength, MinLength } from 'class-validator';

export class CreateCatalogEntryDto {
  @ApiProperty({ example: 'Dry Clean' })
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  name!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;
}

export class UpdateCatalogEntryDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(100)
  name?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(500)
  description?: string;

  @ApiPropertyOptional({ description: 'Set false to retire the entry' })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class CreateServicePriceDto {
  @ApiProperty()
  @IsUUID()
  serviceId!: string;

  @ApiProperty()
  @IsUUID()
  itemId!: string;

  @ApiProperty({ description: 'Price in cents', example: 1250 })
  @IsInt()
  priceCents!: number;
}

export class UpdateServicePriceDto {
  @ApiPropertyOptional({ description: 'Price in cents' })
  @IsOptional()
  @IsInt()
  priceCents?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

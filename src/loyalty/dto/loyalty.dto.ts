import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, IsUUID, Max, MaxLength, Min, MinLength } from 'class-validator';
import { PaginationDto } from '../../common/dto/pagination.dto';
import { LOYALTY_ENTRY_TYPES, LoyaltyEntryType } from '../../database/schema';

export class LoyaltyHistoryQueryDto {
  @ApiPropertyOptional({ description: 'Number of recent entries to return', minimum: 1, maximum: 50 })
  @Type(() => Number)
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(50)
  limit?: number;
}

export class LoyaltyTransactionsQueryDto extends PaginationDto {
  @ApiPropertyOptional({ enum: LOYALTY_ENTRY_TYPES })
  @IsOptional()
  @IsIn(LOYALTY_ENTRY_TYPES)
  type?: LoyaltyEntryType;
}

export class RedeemPointsDto {
  @ApiProperty({ example: 100 })
  @IsInt()
  points!: number;

  @ApiProperty({ example: 'Discount on order' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  description!: string;

  @ApiPropertyOptional({ description: 'Order the redemption applies to' })
  @IsOptional()
  @IsUUID()
  orderId?: string;
}

export class AdjustLoyaltyPointsDto {
  @ApiProperty({ description: 'Positive to grant points, negative to deduct' })
  @IsInt()
  points!: number;

  @ApiProperty({ description: 'Reason shown in the ledger' })
  @IsString()
  @MinLength(1)
  @MaxLength(200)
  reason!: string;
}

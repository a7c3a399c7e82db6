import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional } from 'class-validator';
import { PaginationDto } from '../common/dto/pagination.dto';
import { NOTIFICATION_STATUSES, NotificationStatus } from '../database/schema';

export class NotificationListQueryDto extends PaginationDto {
  @ApiPropertyOptional({ enum: NOTIFICATION_STATUSES })
  @IsOptional()
  @IsIn(NOTIFICATION_STATUSES)
  status?: NotificationStatus;
}

export class UpdateNotificationStatusDto {
  @ApiPropertyOptional({ enum: ['read', 'archived'] })
  @IsIn(['read', 'archived'])
  status!: 'read' | 'archived';
}

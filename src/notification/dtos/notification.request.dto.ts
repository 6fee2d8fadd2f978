import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { NotificationType } from '../../database/entities/notification-log.entity';
import { MAX_ENTITY_ID, MAX_LIST_LIMIT } from '../../common/dtos';

export const DEFAULT_NOTIFICATION_LIMIT = 20;

export class GetNotificationsRequestDto {
  @ApiPropertyOptional({ description: 'Channel', enum: NotificationType })
  @IsOptional()
  @IsEnum(NotificationType)
  type?: NotificationType;

  @ApiPropertyOptional({ description: 'Related approval request id' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_ENTITY_ID)
  approval_id?: number;

  @ApiPropertyOptional({ description: 'Related deployment id' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_ENTITY_ID)
  deployment_id?: number;

  @ApiPropertyOptional({
    minimum: 0,
    maximum: MAX_LIST_LIMIT,
    default: DEFAULT_NOTIFICATION_LIMIT,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(MAX_LIST_LIMIT)
  limit: number = DEFAULT_NOTIFICATION_LIMIT;
}

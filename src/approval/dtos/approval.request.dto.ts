import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { ApprovalStatus } from '../../database/entities/approval-request.entity';
import { MAX_LIST_LIMIT } from '../../common/dtos';

export const DEFAULT_APPROVAL_LIMIT = 10;

export class GetApprovalsRequestDto {
  @ApiPropertyOptional({
    description: 'Filter by approval status',
    enum: ApprovalStatus,
  })
  @IsOptional()
  @IsEnum(ApprovalStatus)
  status?: ApprovalStatus;

  @ApiPropertyOptional({
    description: 'Maximum number of approvals to return',
    minimum: 0,
    maximum: MAX_LIST_LIMIT,
    default: DEFAULT_APPROVAL_LIMIT,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(MAX_LIST_LIMIT)
  limit: number = DEFAULT_APPROVAL_LIMIT;
}

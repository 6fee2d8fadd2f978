import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { DeploymentEnvironment } from '../../database/entities/deployment.entity';
import { MAX_LIST_LIMIT } from '../../common/dtos';

export const DEFAULT_DEPLOYMENT_LIMIT = 20;

export class GetDeploymentsRequestDto {
  @ApiPropertyOptional({
    description: 'Filter by target environment',
    enum: DeploymentEnvironment,
  })
  @IsOptional()
  @IsEnum(DeploymentEnvironment)
  environment?: DeploymentEnvironment;

  @ApiPropertyOptional({
    description: 'Maximum number of deployments to return',
    minimum: 0,
    maximum: MAX_LIST_LIMIT,
    default: DEFAULT_DEPLOYMENT_LIMIT,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(MAX_LIST_LIMIT)
  limit: number = DEFAULT_DEPLOYMENT_LIMIT;
}

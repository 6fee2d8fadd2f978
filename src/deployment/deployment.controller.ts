import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { DeploymentService } from './deployment.service';
import { GetDeploymentsRequestDto } from './dtos';
import type {
  DeploymentDetailResponseDto,
  DeploymentListResponseDto,
} from './dtos';

@ApiTags('deployments')
@Controller('/deployments')
export class DeploymentController {
  constructor(private readonly deploymentService: DeploymentService) {}

  /**
   * @tag deployments
   * @summary 배포 이력 조회
   */
  @Get('/')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List deployments, newest first' })
  @ApiResponse({ status: HttpStatus.OK, description: '배포 이력' })
  @ApiResponse({
    status: HttpStatus.BAD_REQUEST,
    description: '알 수 없는 environment 또는 잘못된 limit',
  })
  async getDeployments(
    @Query() query: GetDeploymentsRequestDto,
  ): Promise<DeploymentListResponseDto> {
    return this.deploymentService.getDeployments(query);
  }

  /**
   * @tag deployments
   * @summary 배포 상세 조회 (이전 배포 포함)
   */
  @Get('/:id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Get a deployment and the one it replaced' })
  @ApiParam({ name: 'id', type: Number })
  @ApiResponse({ status: HttpStatus.OK, description: '배포 상세' })
  @ApiResponse({
    status: HttpStatus.NOT_FOUND,
    description: '배포를 찾을 수 없음',
  })
  async getDeployment(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<DeploymentDetailResponseDto> {
    return this.deploymentService.getDeploymentById(id);
  }
}

import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Deployment } from '../database/entities/deployment.entity';
import { toIsoString } from '../common/utils';
import { MAX_ENTITY_ID } from '../common/dtos';
import { DEFAULT_DEPLOYMENT_LIMIT } from './dtos';
import type {
  DeploymentDetailResponseDto,
  DeploymentListResponseDto,
  DeploymentSummaryResponseDto,
  GetDeploymentsRequestDto,
} from './dtos';

@Injectable()
export class DeploymentService {
  private readonly logger = new Logger(DeploymentService.name);

  constructor(
    @InjectRepository(Deployment)
    private readonly deploymentRepository: Repository<Deployment>,
  ) {}

  /**
   * 배포 이력. 시작 시각 내림차순, environment 지정 시 해당 환경만.
   */
  async getDeployments(
    query: Partial<GetDeploymentsRequestDto> = {},
  ): Promise<DeploymentListResponseDto> {
    const limit = query.limit ?? DEFAULT_DEPLOYMENT_LIMIT;
    if (limit <= 0) {
      return { count: 0, deployments: [] };
    }

    const deployments = await this.deploymentRepository.find({
      where: query.environment ? { environment: query.environment } : {},
      order: { startedAt: 'DESC' },
      take: limit,
    });

    this.logger.debug(
      `Listed ${deployments.length} deployments (environment=${query.environment ?? 'any'}, limit=${limit})`,
    );

    return {
      count: deployments.length,
      deployments: deployments.map((deployment) =>
        this.mapToSummary(deployment),
      ),
    };
  }

  async getDeploymentById(id: number): Promise<DeploymentDetailResponseDto> {
    // int4 범위 밖의 id 는 조회하지 않는다 (Postgres 22003)
    const deployment =
      id <= MAX_ENTITY_ID
        ? await this.deploymentRepository.findOne({ where: { id } })
        : null;
    if (!deployment) {
      throw new NotFoundException(`Deployment ${id} not found`);
    }

    // 이전 배포는 ID 로 한 번만 조회 (체인을 따라가지 않음)
    const previous =
      deployment.previousDeploymentId !== null
        ? await this.deploymentRepository.findOne({
            where: { id: deployment.previousDeploymentId },
          })
        : null;

    return {
      ...this.mapToSummary(deployment),
      git_commit: deployment.gitCommit,
      git_branch: deployment.gitBranch,
      image_tag: deployment.imageTag,
      deployment_notes: deployment.deploymentNotes,
      backend_url: deployment.backendUrl,
      frontend_url: deployment.frontendUrl,
      approval_id: deployment.approvalId,
      previous_deployment_id: deployment.previousDeploymentId,
      previous_deployment: previous ? this.mapToSummary(previous) : null,
    };
  }

  private mapToSummary(deployment: Deployment): DeploymentSummaryResponseDto {
    return {
      id: deployment.id,
      build_number: deployment.buildNumber,
      job_name: deployment.jobName,
      environment: deployment.environment,
      status: deployment.status,
      version_tag: deployment.versionTag,
      deployed_by: deployment.deployedBy,
      started_at: toIsoString(deployment.startedAt),
      completed_at: toIsoString(deployment.completedAt),
      is_rollback: deployment.isRollback,
    };
  }
}

import type {
  DeploymentEnvironment,
  DeploymentStatus,
} from '../../database/entities/deployment.entity';

export interface DeploymentSummaryResponseDto {
  id: number;
  build_number: string;
  job_name: string;
  environment: DeploymentEnvironment;
  status: DeploymentStatus;
  version_tag: string | null;
  deployed_by: string;
  started_at: string | null;
  completed_at: string | null;
  is_rollback: boolean;
}

export interface DeploymentListResponseDto {
  count: number;
  deployments: DeploymentSummaryResponseDto[];
}

export interface DeploymentDetailResponseDto
  extends DeploymentSummaryResponseDto {
  git_commit: string;
  git_branch: string;
  image_tag: string | null;
  deployment_notes: string | null;
  backend_url: string | null;
  frontend_url: string | null;
  approval_id: number | null;
  previous_deployment_id: number | null;
  /**
   * 롤백 이전 배포 (한 단계만). 링크가 없거나 대상이 없으면 null
   */
  previous_deployment: DeploymentSummaryResponseDto | null;
}

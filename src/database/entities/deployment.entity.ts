import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ApprovalRequest } from './approval-request.entity';

export enum DeploymentStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  SUCCESS = 'success',
  FAILED = 'failed',
  ROLLED_BACK = 'rolled_back',
}

export enum DeploymentEnvironment {
  STAGING = 'staging',
  PRODUCTION = 'production',
}

@Entity('deployments')
@Index('IDX_deployment_build', ['jobName', 'buildNumber'])
@Index('IDX_deployment_environment', ['environment'])
@Index('IDX_deployment_started_at', ['startedAt'])
export class Deployment {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  buildNumber!: string;

  @Column({ type: 'varchar', length: 100 })
  jobName!: string;

  @Column({ type: 'enum', enum: DeploymentEnvironment })
  environment!: DeploymentEnvironment;

  @Column({
    type: 'enum',
    enum: DeploymentStatus,
    default: DeploymentStatus.PENDING,
  })
  status!: DeploymentStatus;

  @Column({ type: 'varchar', length: 40 })
  gitCommit!: string;

  @Column({ type: 'varchar', length: 100 })
  gitBranch!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  versionTag!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  imageTag!: string | null; // docker image tag

  @Column({ type: 'varchar', length: 100 })
  deployedBy!: string;

  @Column({ type: 'text', nullable: true })
  deploymentNotes!: string | null;

  @Column({ type: 'boolean', default: false })
  isRollback!: boolean;

  /**
   * 롤백 이전 배포 ID.
   * 관계는 FK 생성용으로만 두고 조회는 ID 로 따로 한다.
   */
  @Column({ type: 'int', nullable: true })
  previousDeploymentId!: number | null;

  @ManyToOne(() => Deployment, { nullable: true })
  @JoinColumn({ name: 'previous_deployment_id' })
  previousDeployment!: Deployment | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  backendUrl!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  frontendUrl!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  startedAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @Column({ type: 'int', nullable: true })
  approvalId!: number | null;

  @ManyToOne(() => ApprovalRequest, (approval) => approval.deployments, {
    nullable: true,
  })
  @JoinColumn({ name: 'approval_id' })
  approval!: ApprovalRequest | null;
}

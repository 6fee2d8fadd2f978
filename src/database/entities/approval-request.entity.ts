import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { TestResult } from './test-result.entity';
import { TestSummary } from './test-summary.entity';
import { SecurityScan } from './security-scan.entity';
import { Deployment } from './deployment.entity';

export enum ApprovalStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected',
  CANCELLED = 'cancelled',
}

// 수동 테스트 체크리스트 항목
export interface ManualTestItem {
  name: string;
  passed: boolean;
  notes?: string | null;
}

/**
 * staging -> production 승격 게이트.
 * 레코드는 CI 파이프라인이 기록하며 이 서비스는 조회만 한다.
 */
@Entity('approval_requests')
@Index('IDX_approval_request_build', ['jobName', 'buildNumber'])
@Index('IDX_approval_request_status', ['status'])
@Index('IDX_approval_request_requested_at', ['requestedAt'])
export class ApprovalRequest {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  buildNumber!: string;

  @Column({ type: 'varchar', length: 100 })
  jobName!: string;

  @Column({
    type: 'enum',
    enum: ApprovalStatus,
    default: ApprovalStatus.PENDING,
  })
  status!: ApprovalStatus;

  @Column({ type: 'varchar', length: 100 })
  requestedBy!: string;

  @Column({ type: 'varchar', length: 40 })
  gitCommit!: string;

  @Column({ type: 'varchar', length: 100 })
  gitBranch!: string;

  @Column({ type: 'varchar', length: 50, nullable: true })
  versionTag!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  stagingBackendUrl!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  stagingFrontendUrl!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  stagingApiDocsUrl!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  approvedBy!: string | null;

  @Column({ type: 'text', nullable: true })
  approvalNotes!: string | null;

  @Column({ type: 'text', nullable: true })
  rejectionReason!: string | null;

  @Column({ type: 'jsonb', nullable: true })
  manualTests!: ManualTestItem[] | null;

  @CreateDateColumn({ type: 'timestamptz' })
  requestedAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  reviewedAt!: Date | null;

  // Relations
  @OneToMany(() => TestResult, (result) => result.approval)
  testResults!: TestResult[];

  @OneToMany(() => TestSummary, (summary) => summary.approval)
  testSummaries!: TestSummary[];

  @OneToMany(() => SecurityScan, (scan) => scan.approval)
  securityScans!: SecurityScan[];

  @OneToMany(() => Deployment, (deployment) => deployment.approval)
  deployments!: Deployment[];
}

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

export enum TestStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  PASSED = 'passed',
  FAILED = 'failed',
  SKIPPED = 'skipped',
  ERROR = 'error',
}

@Entity('test_results')
@Index('IDX_test_result_build', ['jobName', 'buildNumber'])
@Index('IDX_test_result_approval_id', ['approvalId'])
export class TestResult {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  buildNumber!: string;

  @Column({ type: 'varchar', length: 100 })
  jobName!: string;

  @Column({ type: 'varchar', length: 100 })
  testSuite!: string; // jest, pytest, e2e ...

  @Column({ type: 'varchar', length: 255 })
  testName!: string;

  @Column({ type: 'enum', enum: TestStatus, default: TestStatus.PENDING })
  status!: TestStatus;

  @Column({ type: 'int', nullable: true })
  duration!: number | null; // ms

  @Column({ type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ type: 'text', nullable: true })
  stackTrace!: string | null;

  @Column({ type: 'int', nullable: true })
  coveragePercent!: number | null;

  @Column({ type: 'timestamptz', default: () => 'now()' })
  startedAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @Column({ type: 'int', nullable: true })
  approvalId!: number | null;

  @ManyToOne(() => ApprovalRequest, (approval) => approval.testResults, {
    nullable: true,
  })
  @JoinColumn({ name: 'approval_id' })
  approval!: ApprovalRequest | null;
}

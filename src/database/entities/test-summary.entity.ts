import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { ApprovalRequest } from './approval-request.entity';

/**
 * 빌드 단위 테스트 집계.
 * total 과 passed/failed/skipped/error 합계의 일치 여부는 기록하는 쪽 책임이다.
 */
@Entity('test_summaries')
@Index('IDX_test_summary_build', ['jobName', 'buildNumber'])
@Index('IDX_test_summary_approval_id', ['approvalId'])
export class TestSummary {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  buildNumber!: string;

  @Column({ type: 'varchar', length: 100 })
  jobName!: string;

  @Column({ type: 'int', default: 0 })
  totalTests!: number;

  @Column({ type: 'int', default: 0 })
  passedTests!: number;

  @Column({ type: 'int', default: 0 })
  failedTests!: number;

  @Column({ type: 'int', default: 0 })
  skippedTests!: number;

  @Column({ type: 'int', default: 0 })
  errorTests!: number;

  @Column({ type: 'int', nullable: true })
  overallCoverage!: number | null;

  @Column({ type: 'int', nullable: true })
  totalDuration!: number | null; // ms

  @Column({ type: 'varchar', length: 500, nullable: true })
  htmlReportUrl!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  allureReportUrl!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', nullable: true })
  updatedAt!: Date | null;

  @Column({ type: 'int', nullable: true })
  approvalId!: number | null;

  @ManyToOne(() => ApprovalRequest, (approval) => approval.testSummaries, {
    nullable: true,
  })
  @JoinColumn({ name: 'approval_id' })
  approval!: ApprovalRequest | null;
}

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

export interface Vulnerability {
  id: string;
  severity: string;
  packageName?: string;
  installedVersion?: string;
  fixedVersion?: string | null;
  title?: string;
  [key: string]: unknown;
}

@Entity('security_scans')
@Index('IDX_security_scan_build', ['jobName', 'buildNumber'])
@Index('IDX_security_scan_approval_id', ['approvalId'])
export class SecurityScan {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  buildNumber!: string;

  @Column({ type: 'varchar', length: 100 })
  jobName!: string;

  @Column({ type: 'varchar', length: 50 })
  scanner!: string; // trivy 등

  @Column({ type: 'int', default: 0 })
  criticalCount!: number;

  @Column({ type: 'int', default: 0 })
  highCount!: number;

  @Column({ type: 'int', default: 0 })
  mediumCount!: number;

  @Column({ type: 'int', default: 0 })
  lowCount!: number;

  @Column({ type: 'jsonb', nullable: true })
  vulnerabilities!: Vulnerability[] | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  reportUrl!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  scannedAt!: Date;

  @Column({ type: 'int', nullable: true })
  approvalId!: number | null;

  @ManyToOne(() => ApprovalRequest, (approval) => approval.securityScans, {
    nullable: true,
  })
  @JoinColumn({ name: 'approval_id' })
  approval!: ApprovalRequest | null;
}

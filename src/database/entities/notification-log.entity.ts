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
import { Deployment } from './deployment.entity';

export enum NotificationType {
  EMAIL = 'email',
  SLACK = 'slack',
  TELEGRAM = 'telegram',
}

@Entity('notification_logs')
@Index('IDX_notification_log_sent_at', ['sentAt'])
export class NotificationLog {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'enum', enum: NotificationType })
  notificationType!: NotificationType;

  @Column({ type: 'varchar', length: 200 })
  recipient!: string;

  @Column({ type: 'varchar', length: 500, nullable: true })
  subject!: string | null;

  @Column({ type: 'text' })
  message!: string;

  @Column({ type: 'int', nullable: true })
  approvalId!: number | null;

  @ManyToOne(() => ApprovalRequest, { nullable: true })
  @JoinColumn({ name: 'approval_id' })
  approval!: ApprovalRequest | null;

  @Column({ type: 'int', nullable: true })
  deploymentId!: number | null;

  @ManyToOne(() => Deployment, { nullable: true })
  @JoinColumn({ name: 'deployment_id' })
  deployment!: Deployment | null;

  @Column({ type: 'boolean', default: false })
  sentSuccessfully!: boolean;

  @Column({ type: 'text', nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  sentAt!: Date;
}

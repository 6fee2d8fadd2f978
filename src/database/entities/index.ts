import { ApprovalRequest } from './approval-request.entity';
import { Deployment } from './deployment.entity';
import { NotificationLog } from './notification-log.entity';
import { SecurityScan } from './security-scan.entity';
import { TestResult } from './test-result.entity';
import { TestSummary } from './test-summary.entity';

export * from './approval-request.entity';
export * from './deployment.entity';
export * from './notification-log.entity';
export * from './security-scan.entity';
export * from './test-result.entity';
export * from './test-summary.entity';

export const ENTITIES = [
  ApprovalRequest,
  TestResult,
  TestSummary,
  SecurityScan,
  Deployment,
  NotificationLog,
];

import {
  ApprovalRequest,
  ApprovalStatus,
  Deployment,
  DeploymentEnvironment,
  DeploymentStatus,
  NotificationLog,
  NotificationType,
  SecurityScan,
  TestResult,
  TestStatus,
  TestSummary,
} from '../../database/entities';

export function buildApproval(
  overrides: Partial<ApprovalRequest> = {},
): ApprovalRequest {
  return Object.assign(new ApprovalRequest(), {
    id: 1,
    buildNumber: '42',
    jobName: 'web-app',
    status: ApprovalStatus.PENDING,
    requestedBy: 'ci-bot',
    gitCommit: 'a1b2c3d4',
    gitBranch: 'main',
    versionTag: 'v1.2.0',
    stagingBackendUrl: 'https://api.staging.example.com',
    stagingFrontendUrl: 'https://staging.example.com',
    stagingApiDocsUrl: null,
    approvedBy: null,
    approvalNotes: null,
    rejectionReason: null,
    manualTests: null,
    requestedAt: new Date('2026-01-10T09:00:00.000Z'),
    reviewedAt: null,
    ...overrides,
  });
}

export function buildTestSummary(
  overrides: Partial<TestSummary> = {},
): TestSummary {
  return Object.assign(new TestSummary(), {
    id: 1,
    buildNumber: '42',
    jobName: 'web-app',
    totalTests: 120,
    passedTests: 117,
    failedTests: 1,
    skippedTests: 2,
    errorTests: 0,
    overallCoverage: 84,
    totalDuration: 45000,
    htmlReportUrl: null,
    allureReportUrl: null,
    createdAt: new Date('2026-01-10T08:55:00.000Z'),
    updatedAt: null,
    approvalId: 1,
    ...overrides,
  });
}

export function buildSecurityScan(
  overrides: Partial<SecurityScan> = {},
): SecurityScan {
  return Object.assign(new SecurityScan(), {
    id: 1,
    buildNumber: '42',
    jobName: 'web-app',
    scanner: 'trivy',
    criticalCount: 0,
    highCount: 1,
    mediumCount: 3,
    lowCount: 7,
    vulnerabilities: [],
    reportUrl: null,
    scannedAt: new Date('2026-01-10T08:58:00.000Z'),
    approvalId: 1,
    ...overrides,
  });
}

export function buildTestResult(
  overrides: Partial<TestResult> = {},
): TestResult {
  return Object.assign(new TestResult(), {
    id: 1,
    buildNumber: '42',
    jobName: 'web-app',
    testSuite: 'jest',
    testName: 'renders the login form',
    status: TestStatus.PASSED,
    duration: 120,
    errorMessage: null,
    stackTrace: null,
    coveragePercent: null,
    startedAt: new Date('2026-01-10T08:50:00.000Z'),
    completedAt: new Date('2026-01-10T08:50:01.000Z'),
    createdAt: new Date('2026-01-10T08:50:01.000Z'),
    approvalId: 1,
    ...overrides,
  });
}

export function buildDeployment(
  overrides: Partial<Deployment> = {},
): Deployment {
  return Object.assign(new Deployment(), {
    id: 1,
    buildNumber: '42',
    jobName: 'web-app',
    environment: DeploymentEnvironment.STAGING,
    status: DeploymentStatus.SUCCESS,
    gitCommit: 'a1b2c3d4',
    gitBranch: 'main',
    versionTag: 'v1.2.0',
    imageTag: 'web-app:42',
    deployedBy: 'ci-bot',
    deploymentNotes: null,
    isRollback: false,
    previousDeploymentId: null,
    backendUrl: null,
    frontendUrl: null,
    startedAt: new Date('2026-01-10T10:00:00.000Z'),
    completedAt: new Date('2026-01-10T10:03:00.000Z'),
    approvalId: null,
    ...overrides,
  });
}

export function buildNotification(
  overrides: Partial<NotificationLog> = {},
): NotificationLog {
  return Object.assign(new NotificationLog(), {
    id: 1,
    notificationType: NotificationType.SLACK,
    recipient: '#deployments',
    subject: 'Approval requested',
    message: 'Build 42 is waiting for approval',
    approvalId: 1,
    deploymentId: null,
    sentSuccessfully: true,
    errorMessage: null,
    sentAt: new Date('2026-01-10T09:00:05.000Z'),
    ...overrides,
  });
}

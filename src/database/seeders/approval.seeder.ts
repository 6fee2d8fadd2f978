import { Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import {
  ApprovalRequest,
  ApprovalStatus,
} from '../entities/approval-request.entity';
import { SecurityScan } from '../entities/security-scan.entity';
import { TestResult, TestStatus } from '../entities/test-result.entity';
import { TestSummary } from '../entities/test-summary.entity';

const JOB_NAME = 'web-app';

/**
 * 로컬 개발용 승인 요청 + 테스트/스캔 결과.
 * 이미 승인 요청이 있으면 아무것도 하지 않는다.
 */
export class ApprovalSeeder {
  private readonly logger = new Logger(ApprovalSeeder.name);

  constructor(private readonly manager: EntityManager) {}

  async run(): Promise<void> {
    const approvalRepository = this.manager.getRepository(ApprovalRequest);
    const summaryRepository = this.manager.getRepository(TestSummary);
    const scanRepository = this.manager.getRepository(SecurityScan);
    const resultRepository = this.manager.getRepository(TestResult);

    const existing = await approvalRepository.count();
    if (existing > 0) {
      this.logger.log('Approval requests already seeded, skipping...');
      return;
    }

    const now = Date.now();
    const hoursAgo = (hours: number) => new Date(now - hours * 3_600_000);

    const [approved, pending] = await approvalRepository.save([
      approvalRepository.create({
        buildNumber: '101',
        jobName: JOB_NAME,
        status: ApprovalStatus.APPROVED,
        requestedBy: 'ci-bot',
        gitCommit: '9f8e7d6c5b4a',
        gitBranch: 'main',
        versionTag: 'v1.4.0',
        stagingBackendUrl: 'http://localhost:5001',
        stagingFrontendUrl: 'http://localhost:3000',
        stagingApiDocsUrl: 'http://localhost:5001/docs',
        approvedBy: 'release-manager',
        approvalNotes: 'Smoke tests verified on staging',
        manualTests: [
          { name: 'Login flow', passed: true, notes: null },
          { name: 'Checkout flow', passed: true, notes: 'Tested with card' },
        ],
        requestedAt: hoursAgo(26),
        reviewedAt: hoursAgo(25),
      }),
      approvalRepository.create({
        buildNumber: '102',
        jobName: JOB_NAME,
        status: ApprovalStatus.PENDING,
        requestedBy: 'ci-bot',
        gitCommit: '1a2b3c4d5e6f',
        gitBranch: 'main',
        versionTag: 'v1.5.0',
        stagingBackendUrl: 'http://localhost:5001',
        stagingFrontendUrl: 'http://localhost:3000',
        stagingApiDocsUrl: 'http://localhost:5001/docs',
        requestedAt: hoursAgo(2),
      }),
      approvalRepository.create({
        buildNumber: '100',
        jobName: JOB_NAME,
        status: ApprovalStatus.REJECTED,
        requestedBy: 'ci-bot',
        gitCommit: 'abcdef012345',
        gitBranch: 'feature/search',
        rejectionReason: 'Critical vulnerability in base image',
        requestedAt: hoursAgo(48),
        reviewedAt: hoursAgo(47),
      }),
    ]);

    await summaryRepository.save([
      summaryRepository.create({
        buildNumber: approved.buildNumber,
        jobName: JOB_NAME,
        totalTests: 214,
        passedTests: 212,
        failedTests: 0,
        skippedTests: 2,
        errorTests: 0,
        overallCoverage: 88,
        totalDuration: 93_000,
        approvalId: approved.id,
      }),
      summaryRepository.create({
        buildNumber: pending.buildNumber,
        jobName: JOB_NAME,
        totalTests: 220,
        passedTests: 217,
        failedTests: 3,
        skippedTests: 0,
        errorTests: 0,
        overallCoverage: 86,
        totalDuration: 97_500,
        approvalId: pending.id,
      }),
    ]);

    await scanRepository.save(
      scanRepository.create({
        buildNumber: approved.buildNumber,
        jobName: JOB_NAME,
        scanner: 'trivy',
        criticalCount: 0,
        highCount: 1,
        mediumCount: 4,
        lowCount: 9,
        vulnerabilities: [
          {
            id: 'CVE-2026-0001',
            severity: 'HIGH',
            packageName: 'openssl',
            fixedVersion: '3.0.15',
            title: 'Example advisory for local data',
          },
        ],
        scannedAt: hoursAgo(26),
        approvalId: approved.id,
      }),
    );

    await resultRepository.save([
      resultRepository.create({
        buildNumber: pending.buildNumber,
        jobName: JOB_NAME,
        testSuite: 'jest',
        testName: 'renders the login form',
        status: TestStatus.PASSED,
        duration: 140,
        startedAt: hoursAgo(2),
        completedAt: hoursAgo(2),
        approvalId: pending.id,
      }),
      resultRepository.create({
        buildNumber: pending.buildNumber,
        jobName: JOB_NAME,
        testSuite: 'e2e',
        testName: 'checkout completes',
        status: TestStatus.FAILED,
        duration: 5_200,
        errorMessage: 'Timed out waiting for the payment page',
        startedAt: hoursAgo(2),
        completedAt: hoursAgo(2),
        approvalId: pending.id,
      }),
    ]);

    this.logger.log('Seeded 3 approval requests with test and scan results');
  }
}

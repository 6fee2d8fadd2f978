import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ApprovalRequest } from '../database/entities/approval-request.entity';
import { SecurityScan } from '../database/entities/security-scan.entity';
import { TestResult } from '../database/entities/test-result.entity';
import { TestSummary } from '../database/entities/test-summary.entity';
import { toIsoString } from '../common/utils';
import { MAX_ENTITY_ID } from '../common/dtos';
import { DEFAULT_APPROVAL_LIMIT } from './dtos';
import type {
  ApprovalDetailResponseDto,
  ApprovalListResponseDto,
  ApprovalSummaryResponseDto,
  GetApprovalsRequestDto,
  SecurityScanResponseDto,
  TestResultListResponseDto,
  TestResultResponseDto,
  TestSummaryResponseDto,
} from './dtos';

@Injectable()
export class ApprovalService {
  private readonly logger = new Logger(ApprovalService.name);

  constructor(
    @InjectRepository(ApprovalRequest)
    private readonly approvalRepository: Repository<ApprovalRequest>,
    @InjectRepository(TestSummary)
    private readonly testSummaryRepository: Repository<TestSummary>,
    @InjectRepository(SecurityScan)
    private readonly securityScanRepository: Repository<SecurityScan>,
    @InjectRepository(TestResult)
    private readonly testResultRepository: Repository<TestResult>,
  ) {}

  /**
   * 승인 요청 목록. 요청 시각 내림차순, limit 건까지.
   */
  async getApprovals(
    query: Partial<GetApprovalsRequestDto> = {},
  ): Promise<ApprovalListResponseDto> {
    const limit = query.limit ?? DEFAULT_APPROVAL_LIMIT;

    // take: 0 은 TypeORM 에서 "제한 없음" 이므로 조회하지 않는다
    if (limit <= 0) {
      return { count: 0, approvals: [] };
    }

    const approvals = await this.approvalRepository.find({
      where: query.status ? { status: query.status } : {},
      order: { requestedAt: 'DESC' },
      take: limit,
    });

    this.logger.debug(
      `Listed ${approvals.length} approvals (status=${query.status ?? 'any'}, limit=${limit})`,
    );

    return {
      count: approvals.length,
      approvals: approvals.map((approval) => this.mapToSummary(approval)),
    };
  }

  /**
   * 승인 요청 상세.
   * 최신 테스트 집계와 보안 스캔은 없을 수 있으며 그 경우 null.
   */
  async getApprovalById(id: number): Promise<ApprovalDetailResponseDto> {
    const approval = await this.findApprovalOrThrow(id);

    const [testSummary, securityScan] = await Promise.all([
      this.testSummaryRepository.findOne({
        where: { approvalId: id },
        order: { createdAt: 'DESC', id: 'DESC' },
      }),
      this.securityScanRepository.findOne({
        where: { approvalId: id },
        order: { scannedAt: 'DESC', id: 'DESC' },
      }),
    ]);

    return {
      id: approval.id,
      build_number: approval.buildNumber,
      job_name: approval.jobName,
      status: approval.status,
      requested_by: approval.requestedBy,
      git_commit: approval.gitCommit,
      git_branch: approval.gitBranch,
      version_tag: approval.versionTag,
      staging_backend_url: approval.stagingBackendUrl,
      staging_frontend_url: approval.stagingFrontendUrl,
      staging_api_docs_url: approval.stagingApiDocsUrl,
      approved_by: approval.approvedBy,
      approval_notes: approval.approvalNotes,
      rejection_reason: approval.rejectionReason,
      manual_tests: approval.manualTests ?? [],
      requested_at: toIsoString(approval.requestedAt),
      reviewed_at: toIsoString(approval.reviewedAt),
      test_summary: testSummary ? this.mapTestSummary(testSummary) : null,
      security_scan: securityScan ? this.mapSecurityScan(securityScan) : null,
    };
  }

  async getApprovalTestResults(id: number): Promise<TestResultListResponseDto> {
    await this.findApprovalOrThrow(id);

    const results = await this.testResultRepository.find({
      where: { approvalId: id },
      order: { startedAt: 'DESC' },
    });

    return {
      count: results.length,
      test_results: results.map((result) => this.mapTestResult(result)),
    };
  }

  private async findApprovalOrThrow(id: number): Promise<ApprovalRequest> {
    // int4 범위 밖의 id 는 조회하지 않는다 (Postgres 22003)
    const approval =
      id <= MAX_ENTITY_ID
        ? await this.approvalRepository.findOne({ where: { id } })
        : null;
    if (!approval) {
      throw new NotFoundException(`Approval request ${id} not found`);
    }
    return approval;
  }

  private mapToSummary(approval: ApprovalRequest): ApprovalSummaryResponseDto {
    return {
      id: approval.id,
      build_number: approval.buildNumber,
      job_name: approval.jobName,
      status: approval.status,
      git_commit: approval.gitCommit,
      requested_at: toIsoString(approval.requestedAt),
      staging_frontend_url: approval.stagingFrontendUrl,
      staging_backend_url: approval.stagingBackendUrl,
    };
  }

  private mapTestSummary(summary: TestSummary): TestSummaryResponseDto {
    return {
      total_tests: summary.totalTests,
      passed_tests: summary.passedTests,
      failed_tests: summary.failedTests,
      skipped_tests: summary.skippedTests,
      error_tests: summary.errorTests,
      overall_coverage: summary.overallCoverage,
      total_duration: summary.totalDuration,
      html_report_url: summary.htmlReportUrl,
      allure_report_url: summary.allureReportUrl,
      created_at: toIsoString(summary.createdAt),
    };
  }

  private mapSecurityScan(scan: SecurityScan): SecurityScanResponseDto {
    return {
      scanner: scan.scanner,
      critical_count: scan.criticalCount,
      high_count: scan.highCount,
      medium_count: scan.mediumCount,
      low_count: scan.lowCount,
      vulnerabilities: scan.vulnerabilities ?? [],
      report_url: scan.reportUrl,
      scanned_at: toIsoString(scan.scannedAt),
    };
  }

  private mapTestResult(result: TestResult): TestResultResponseDto {
    return {
      id: result.id,
      test_suite: result.testSuite,
      test_name: result.testName,
      status: result.status,
      duration: result.duration,
      error_message: result.errorMessage,
      coverage_percent: result.coveragePercent,
      started_at: toIsoString(result.startedAt),
      completed_at: toIsoString(result.completedAt),
    };
  }
}

import type {
  ApprovalStatus,
  ManualTestItem,
} from '../../database/entities/approval-request.entity';
import type { Vulnerability } from '../../database/entities/security-scan.entity';
import type { TestStatus } from '../../database/entities/test-result.entity';

export interface ApprovalSummaryResponseDto {
  id: number;
  build_number: string;
  job_name: string;
  status: ApprovalStatus;
  git_commit: string;
  /** ISO-8601 */
  requested_at: string | null;
  staging_frontend_url: string | null;
  staging_backend_url: string | null;
}

export interface ApprovalListResponseDto {
  count: number;
  approvals: ApprovalSummaryResponseDto[];
}

/**
 * 승인 요청에 연결된 최신 테스트 집계
 */
export interface TestSummaryResponseDto {
  total_tests: number;
  passed_tests: number;
  failed_tests: number;
  skipped_tests: number;
  error_tests: number;
  overall_coverage: number | null;
  total_duration: number | null;
  html_report_url: string | null;
  allure_report_url: string | null;
  created_at: string | null;
}

/**
 * 승인 요청에 연결된 최신 보안 스캔
 */
export interface SecurityScanResponseDto {
  scanner: string;
  critical_count: number;
  high_count: number;
  medium_count: number;
  low_count: number;
  vulnerabilities: Vulnerability[];
  report_url: string | null;
  scanned_at: string | null;
}

export interface ApprovalDetailResponseDto {
  id: number;
  build_number: string;
  job_name: string;
  status: ApprovalStatus;
  requested_by: string;
  git_commit: string;
  git_branch: string;
  version_tag: string | null;
  staging_backend_url: string | null;
  staging_frontend_url: string | null;
  staging_api_docs_url: string | null;
  approved_by: string | null;
  approval_notes: string | null;
  rejection_reason: string | null;
  manual_tests: ManualTestItem[];
  requested_at: string | null;
  reviewed_at: string | null;
  /** 연결된 테스트 집계가 없으면 null */
  test_summary: TestSummaryResponseDto | null;
  /** 연결된 보안 스캔이 없으면 null */
  security_scan: SecurityScanResponseDto | null;
}

export interface TestResultResponseDto {
  id: number;
  test_suite: string;
  test_name: string;
  status: TestStatus;
  duration: number | null;
  error_message: string | null;
  coverage_percent: number | null;
  started_at: string | null;
  completed_at: string | null;
}

export interface TestResultListResponseDto {
  count: number;
  test_results: TestResultResponseDto[];
}

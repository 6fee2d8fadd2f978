import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateCicdSchema1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    // Enum types
    await queryRunner.query(`
      CREATE TYPE "approval_requests_status_enum"
      AS ENUM ('pending', 'approved', 'rejected', 'cancelled')
    `);
    await queryRunner.query(`
      CREATE TYPE "test_results_status_enum"
      AS ENUM ('pending', 'running', 'passed', 'failed', 'skipped', 'error')
    `);
    await queryRunner.query(`
      CREATE TYPE "deployments_environment_enum"
      AS ENUM ('staging', 'production')
    `);
    await queryRunner.query(`
      CREATE TYPE "deployments_status_enum"
      AS ENUM ('pending', 'in_progress', 'success', 'failed', 'rolled_back')
    `);
    await queryRunner.query(`
      CREATE TYPE "notification_logs_notification_type_enum"
      AS ENUM ('email', 'slack', 'telegram')
    `);

    await queryRunner.query(`
      CREATE TABLE "approval_requests" (
        "id" SERIAL PRIMARY KEY,
        "build_number" varchar(50) NOT NULL,
        "job_name" varchar(100) NOT NULL,
        "status" "approval_requests_status_enum" NOT NULL DEFAULT 'pending',
        "requested_by" varchar(100) NOT NULL,
        "git_commit" varchar(40) NOT NULL,
        "git_branch" varchar(100) NOT NULL,
        "version_tag" varchar(50),
        "staging_backend_url" varchar(500),
        "staging_frontend_url" varchar(500),
        "staging_api_docs_url" varchar(500),
        "approved_by" varchar(100),
        "approval_notes" text,
        "rejection_reason" text,
        "manual_tests" jsonb,
        "requested_at" timestamptz NOT NULL DEFAULT now(),
        "reviewed_at" timestamptz
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "test_results" (
        "id" SERIAL PRIMARY KEY,
        "build_number" varchar(50) NOT NULL,
        "job_name" varchar(100) NOT NULL,
        "test_suite" varchar(100) NOT NULL,
        "test_name" varchar(255) NOT NULL,
        "status" "test_results_status_enum" NOT NULL DEFAULT 'pending',
        "duration" integer,
        "error_message" text,
        "stack_trace" text,
        "coverage_percent" integer,
        "started_at" timestamptz NOT NULL DEFAULT now(),
        "completed_at" timestamptz,
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "approval_id" integer REFERENCES "approval_requests" ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "test_summaries" (
        "id" SERIAL PRIMARY KEY,
        "build_number" varchar(50) NOT NULL,
        "job_name" varchar(100) NOT NULL,
        "total_tests" integer NOT NULL DEFAULT 0 CHECK ("total_tests" >= 0),
        "passed_tests" integer NOT NULL DEFAULT 0 CHECK ("passed_tests" >= 0),
        "failed_tests" integer NOT NULL DEFAULT 0 CHECK ("failed_tests" >= 0),
        "skipped_tests" integer NOT NULL DEFAULT 0 CHECK ("skipped_tests" >= 0),
        "error_tests" integer NOT NULL DEFAULT 0 CHECK ("error_tests" >= 0),
        "overall_coverage" integer,
        "total_duration" integer,
        "html_report_url" varchar(500),
        "allure_report_url" varchar(500),
        "created_at" timestamptz NOT NULL DEFAULT now(),
        "updated_at" timestamptz DEFAULT now(),
        "approval_id" integer REFERENCES "approval_requests" ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "security_scans" (
        "id" SERIAL PRIMARY KEY,
        "build_number" varchar(50) NOT NULL,
        "job_name" varchar(100) NOT NULL,
        "scanner" varchar(50) NOT NULL,
        "critical_count" integer NOT NULL DEFAULT 0 CHECK ("critical_count" >= 0),
        "high_count" integer NOT NULL DEFAULT 0 CHECK ("high_count" >= 0),
        "medium_count" integer NOT NULL DEFAULT 0 CHECK ("medium_count" >= 0),
        "low_count" integer NOT NULL DEFAULT 0 CHECK ("low_count" >= 0),
        "vulnerabilities" jsonb,
        "report_url" varchar(500),
        "scanned_at" timestamptz NOT NULL DEFAULT now(),
        "approval_id" integer REFERENCES "approval_requests" ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "deployments" (
        "id" SERIAL PRIMARY KEY,
        "build_number" varchar(50) NOT NULL,
        "job_name" varchar(100) NOT NULL,
        "environment" "deployments_environment_enum" NOT NULL,
        "status" "deployments_status_enum" NOT NULL DEFAULT 'pending',
        "git_commit" varchar(40) NOT NULL,
        "git_branch" varchar(100) NOT NULL,
        "version_tag" varchar(50),
        "image_tag" varchar(100),
        "deployed_by" varchar(100) NOT NULL,
        "deployment_notes" text,
        "is_rollback" boolean NOT NULL DEFAULT false,
        "previous_deployment_id" integer REFERENCES "deployments" ("id"),
        "backend_url" varchar(500),
        "frontend_url" varchar(500),
        "started_at" timestamptz NOT NULL DEFAULT now(),
        "completed_at" timestamptz,
        "approval_id" integer REFERENCES "approval_requests" ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "notification_logs" (
        "id" SERIAL PRIMARY KEY,
        "notification_type" "notification_logs_notification_type_enum" NOT NULL,
        "recipient" varchar(200) NOT NULL,
        "subject" varchar(500),
        "message" text NOT NULL,
        "approval_id" integer REFERENCES "approval_requests" ("id"),
        "deployment_id" integer REFERENCES "deployments" ("id"),
        "sent_successfully" boolean NOT NULL DEFAULT false,
        "error_message" text,
        "sent_at" timestamptz NOT NULL DEFAULT now()
      )
    `);

    // Indexes
    await queryRunner.query(
      `CREATE INDEX "IDX_approval_request_build" ON "approval_requests" ("job_name", "build_number")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_approval_request_status" ON "approval_requests" ("status")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_approval_request_requested_at" ON "approval_requests" ("requested_at")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_test_result_build" ON "test_results" ("job_name", "build_number")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_test_result_approval_id" ON "test_results" ("approval_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_test_summary_build" ON "test_summaries" ("job_name", "build_number")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_test_summary_approval_id" ON "test_summaries" ("approval_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_security_scan_build" ON "security_scans" ("job_name", "build_number")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_security_scan_approval_id" ON "security_scans" ("approval_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_deployment_build" ON "deployments" ("job_name", "build_number")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_deployment_environment" ON "deployments" ("environment")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_deployment_started_at" ON "deployments" ("started_at")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_notification_log_sent_at" ON "notification_logs" ("sent_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "notification_logs"`);
    await queryRunner.query(`DROP TABLE "deployments"`);
    await queryRunner.query(`DROP TABLE "security_scans"`);
    await queryRunner.query(`DROP TABLE "test_summaries"`);
    await queryRunner.query(`DROP TABLE "test_results"`);
    await queryRunner.query(`DROP TABLE "approval_requests"`);
    await queryRunner.query(
      `DROP TYPE "notification_logs_notification_type_enum"`,
    );
    await queryRunner.query(`DROP TYPE "deployments_status_enum"`);
    await queryRunner.query(`DROP TYPE "deployments_environment_enum"`);
    await queryRunner.query(`DROP TYPE "test_results_status_enum"`);
    await queryRunner.query(`DROP TYPE "approval_requests_status_enum"`);
  }
}

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ApprovalController } from './approval.controller';
import { ApprovalService } from './approval.service';
import { ApprovalRequest } from '../database/entities/approval-request.entity';
import { SecurityScan } from '../database/entities/security-scan.entity';
import { TestResult } from '../database/entities/test-result.entity';
import { TestSummary } from '../database/entities/test-summary.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      ApprovalRequest,
      TestSummary,
      SecurityScan,
      TestResult,
    ]),
  ],
  controllers: [ApprovalController],
  providers: [ApprovalService],
  exports: [ApprovalService],
})
export class ApprovalModule {}

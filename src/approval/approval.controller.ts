import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ApprovalService } from './approval.service';
import { GetApprovalsRequestDto } from './dtos';
import type {
  ApprovalDetailResponseDto,
  ApprovalListResponseDto,
  TestResultListResponseDto,
} from './dtos';

@ApiTags('approvals')
@Controller('/approvals')
export class ApprovalController {
  constructor(private readonly approvalService: ApprovalService) {}

  /**
   * @tag approvals
   * @summary 승인 요청 목록 조회
   */
  @Get('/')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List approval requests, newest first' })
  @ApiResponse({ status: HttpStatus.OK, description: '승인 요청 목록' })
  @ApiResponse({
    status: HttpStatus.BAD_REQUEST,
    description: '알 수 없는 status 또는 잘못된 limit',
  })
  async getApprovals(
    @Query() query: GetApprovalsRequestDto,
  ): Promise<ApprovalListResponseDto> {
    return this.approvalService.getApprovals(query);
  }

  /**
   * @tag approvals
   * @summary 승인 요청 상세 조회
   */
  @Get('/:id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Get an approval request with its latest test summary and scan',
  })
  @ApiParam({ name: 'id', type: Number })
  @ApiResponse({ status: HttpStatus.OK, description: '승인 요청 상세' })
  @ApiResponse({
    status: HttpStatus.NOT_FOUND,
    description: '승인 요청을 찾을 수 없음',
  })
  async getApproval(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ApprovalDetailResponseDto> {
    return this.approvalService.getApprovalById(id);
  }

  /**
   * @tag approvals
   * @summary 승인 요청의 개별 테스트 결과 조회
   */
  @Get('/:id/test-results')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List test results attached to an approval' })
  @ApiParam({ name: 'id', type: Number })
  @ApiResponse({ status: HttpStatus.OK, description: '테스트 결과 목록' })
  @ApiResponse({
    status: HttpStatus.NOT_FOUND,
    description: '승인 요청을 찾을 수 없음',
  })
  async getApprovalTestResults(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<TestResultListResponseDto> {
    return this.approvalService.getApprovalTestResults(id);
  }
}

import { Controller, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { NotificationService } from './notification.service';
import { GetNotificationsRequestDto } from './dtos';
import type { NotificationListResponseDto } from './dtos';

@ApiTags('notifications')
@Controller('/notifications')
export class NotificationController {
  constructor(private readonly notificationService: NotificationService) {}

  /**
   * @tag notifications
   * @summary 알림 발송 기록 조회
   */
  @Get('/')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List sent notifications, newest first' })
  @ApiResponse({ status: HttpStatus.OK, description: '알림 발송 기록' })
  async getNotifications(
    @Query() query: GetNotificationsRequestDto,
  ): Promise<NotificationListResponseDto> {
    return this.notificationService.getNotifications(query);
  }
}

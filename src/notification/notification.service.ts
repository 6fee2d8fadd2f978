import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { NotificationLog } from '../database/entities/notification-log.entity';
import { toIsoString } from '../common/utils';
import { DEFAULT_NOTIFICATION_LIMIT } from './dtos';
import type {
  GetNotificationsRequestDto,
  NotificationListResponseDto,
  NotificationResponseDto,
} from './dtos';

/**
 * 알림 발송 기록 조회.
 * 발송 자체는 외부 파이프라인 몫이고 여기서는 기록만 읽는다.
 */
@Injectable()
export class NotificationService {
  constructor(
    @InjectRepository(NotificationLog)
    private readonly notificationRepository: Repository<NotificationLog>,
  ) {}

  async getNotifications(
    query: Partial<GetNotificationsRequestDto> = {},
  ): Promise<NotificationListResponseDto> {
    const limit = query.limit ?? DEFAULT_NOTIFICATION_LIMIT;
    if (limit <= 0) {
      return { count: 0, notifications: [] };
    }

    const where: FindOptionsWhere<NotificationLog> = {};
    if (query.type) {
      where.notificationType = query.type;
    }
    if (query.approval_id !== undefined) {
      where.approvalId = query.approval_id;
    }
    if (query.deployment_id !== undefined) {
      where.deploymentId = query.deployment_id;
    }

    const notifications = await this.notificationRepository.find({
      where,
      order: { sentAt: 'DESC' },
      take: limit,
    });

    return {
      count: notifications.length,
      notifications: notifications.map((log) => this.mapToResponse(log)),
    };
  }

  private mapToResponse(log: NotificationLog): NotificationResponseDto {
    return {
      id: log.id,
      notification_type: log.notificationType,
      recipient: log.recipient,
      subject: log.subject,
      message: log.message,
      approval_id: log.approvalId,
      deployment_id: log.deploymentId,
      sent_successfully: log.sentSuccessfully,
      error_message: log.errorMessage,
      sent_at: toIsoString(log.sentAt),
    };
  }
}

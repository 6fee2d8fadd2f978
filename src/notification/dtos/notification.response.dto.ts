import type { NotificationType } from '../../database/entities/notification-log.entity';

export interface NotificationResponseDto {
  id: number;
  notification_type: NotificationType;
  recipient: string;
  subject: string | null;
  message: string;
  approval_id: number | null;
  deployment_id: number | null;
  sent_successfully: boolean;
  error_message: string | null;
  sent_at: string | null;
}

export interface NotificationListResponseDto {
  count: number;
  notifications: NotificationResponseDto[];
}

import type { LogLevel } from '@nestjs/common';

/**
 * LOG_LEVEL 값을 Nest Logger 레벨 목록으로 변환한다.
 * 알 수 없는 값은 info 로 취급.
 */
export function resolveLogLevels(level: string): LogLevel[] {
  switch (level.toLowerCase()) {
    case 'debug':
      return ['error', 'warn', 'log', 'debug', 'verbose'];
    case 'warning':
    case 'warn':
      return ['error', 'warn'];
    case 'error':
      return ['error'];
    case 'info':
    default:
      return ['error', 'warn', 'log'];
  }
}

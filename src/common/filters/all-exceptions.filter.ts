import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import {
  CannotExecuteNotConnectedError,
  ConnectionIsNotSetError,
  QueryFailedError,
} from 'typeorm';
import type { CommonErrorResponseDto } from '../dtos';

// pg 드라이버/소켓 레벨에서 저장소에 닿지 못한 경우
const STORE_UNAVAILABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
]);

/**
 * 모든 예외를 { statusCode, message, error } JSON 으로 응답한다.
 * 저장소 연결 실패는 재시도 없이 503, 그 밖의 쿼리 오류는 500.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const body = this.toErrorResponse(exception);

    void reply.status(body.statusCode).send(body);
  }

  toErrorResponse(exception: unknown): CommonErrorResponseDto {
    if (exception instanceof HttpException) {
      return this.fromHttpException(exception);
    }

    if (isStoreUnavailable(exception)) {
      this.logger.error(
        `Database unavailable: ${describe(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
      return {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: 'Database unavailable',
        error: reasonPhrase(HttpStatus.SERVICE_UNAVAILABLE),
      };
    }

    this.logger.error(
      `Unhandled exception: ${describe(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: reasonPhrase(HttpStatus.INTERNAL_SERVER_ERROR),
    };
  }

  private fromHttpException(exception: HttpException): CommonErrorResponseDto {
    const statusCode = exception.getStatus();
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return { statusCode, message: response, error: reasonPhrase(statusCode) };
    }

    let message: string | string[] = exception.message;
    if ('message' in response) {
      if (typeof response.message === 'string') {
        message = response.message;
      } else if (Array.isArray(response.message)) {
        message = response.message.map(String);
      }
    }

    const error =
      'error' in response && typeof response.error === 'string'
        ? response.error
        : reasonPhrase(statusCode);

    return { statusCode, message, error };
  }
}

export function isStoreUnavailable(exception: unknown): boolean {
  if (
    exception instanceof ConnectionIsNotSetError ||
    exception instanceof CannotExecuteNotConnectedError
  ) {
    return true;
  }
  if (exception instanceof QueryFailedError) {
    return hasUnavailableCode(exception.driverError);
  }
  return hasUnavailableCode(exception);
}

function hasUnavailableCode(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    STORE_UNAVAILABLE_CODES.has(error.code)
  );
}

/** 404 -> "Not Found" */
export function reasonPhrase(statusCode: number): string {
  const name: unknown = HttpStatus[statusCode];
  if (typeof name !== 'string') {
    return 'Error';
  }
  return name
    .split('_')
    .map((word) => word.charAt(0) + word.slice(1).toLowerCase())
    .join(' ');
}

function describe(exception: unknown): string {
  return exception instanceof Error ? exception.message : String(exception);
}

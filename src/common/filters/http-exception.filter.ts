import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponse } from '../interfaces/error-response.interface';

const DEFAULT_ERROR_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  422: 'UNPROCESSABLE_ENTITY',
  500: 'INTERNAL_ERROR',
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * 모든 예외를 `{ statusCode, errorCode, message, timestamp, path, details? }` 형태로 응답합니다.
 * HttpException이 아닌 예외는 500으로 응답하고 스택을 로그로 남깁니다.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toErrorResponse(exception, request.url);
    response.status(body.statusCode).json(body);
  }

  toErrorResponse(exception: unknown, path: string): ErrorResponse {
    const timestamp = new Date().toISOString();

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const payload = exception.getResponse();
      const errorCode = this.getDefaultErrorCode(statusCode);

      if (!isRecord(payload)) {
        return { statusCode, errorCode, message: String(payload), timestamp, path };
      }

      const details = isRecord(payload.details) ? payload.details : undefined;
      return {
        statusCode,
        errorCode: typeof payload.errorCode === 'string' ? payload.errorCode : errorCode,
        message: this.extractMessage(payload.message) ?? exception.message,
        timestamp,
        path,
        ...(details && { details }),
      };
    }

    if (exception instanceof Error) {
      this.logger.error(`Unhandled exception: ${exception.message}`, exception.stack);
    } else {
      this.logger.error('Unhandled non-error exception', String(exception));
    }

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      errorCode: 'INTERNAL_ERROR',
      message: '서버 내부 오류가 발생했습니다.',
      timestamp,
      path,
    };
  }

  private extractMessage(message: unknown): string | undefined {
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String).join(', ');
    return undefined;
  }

  private getDefaultErrorCode(status: number): string {
    return DEFAULT_ERROR_CODES[status] ?? 'UNKNOWN_ERROR';
  }
}

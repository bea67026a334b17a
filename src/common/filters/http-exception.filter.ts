import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { QueryFailedError } from 'typeorm';

/**
 * PostgreSQL 唯一约束冲突错误码
 */
const PG_UNIQUE_VIOLATION = '23505';

interface ErrorBody {
  statusCode: number;
  message: string | string[];
  error?: string;
}

/**
 * 全局异常过滤器
 *
 * - HttpException：按原状态码返回 (401/403/404/409/400)
 * - 唯一索引冲突：并发写入绕过了服务层的查重，按 409 返回
 * - 其他异常：记录 error 日志，对外只返回 500，不暴露内部信息
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toErrorBody(exception, request);

    response.status(body.statusCode).json({
      statusCode: body.statusCode,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message: body.message,
      error: body.error,
    });
  }

  private toErrorBody(exception: unknown, request: Request): ErrorBody {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      // ValidationPipe 抛出的 response 是对象 { statusCode, message, error }
      if (typeof exceptionResponse === 'string') {
        return { statusCode: status, message: exceptionResponse };
      }
      const message: unknown = Reflect.get(exceptionResponse, 'message');
      const error: unknown = Reflect.get(exceptionResponse, 'error');
      return {
        statusCode: status,
        message: typeof message === 'string' || Array.isArray(message) ? message : exception.message,
        error: typeof error === 'string' ? error : undefined,
      };
    }

    if (exception instanceof QueryFailedError && this.isUniqueViolation(exception)) {
      return { statusCode: HttpStatus.CONFLICT, message: 'Resource already exists', error: 'Conflict' };
    }

    const stack = exception instanceof Error ? exception.stack : String(exception);
    this.logger.error(`Unhandled error on ${request.method} ${request.url}`, stack);
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
    };
  }

  private isUniqueViolation(exception: QueryFailedError): boolean {
    const driverError: unknown = exception.driverError;
    return typeof driverError === 'object'
      && driverError !== null
      && Reflect.get(driverError, 'code') === PG_UNIQUE_VIOLATION;
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { DatabaseError } from 'pg';

type PgHttpError = {
  statusCode: number;
  message: string;
};

@Catch(DatabaseError)
export class PgExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PgExceptionFilter.name);

  catch(exception: DatabaseError, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const { statusCode, message } = this.mapException(exception);

    this.logger.warn(
      `Database error ${exception.code ?? 'UNKNOWN'} on ${request.method} ${request.url}: ${exception.message}`,
    );

    response.status(statusCode).json({
      statusCode,
      message,
      error: HttpStatus[statusCode] ?? 'Error',
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }

  mapException(exception: DatabaseError): PgHttpError {
    switch (exception.code) {
      case '23505':
        return {
          statusCode: HttpStatus.CONFLICT,
          message: 'A record with the same unique value already exists.',
        };
      case '23503':
        return {
          statusCode: HttpStatus.CONFLICT,
          message: 'Operation failed due to related data constraints.',
        };
      case '40001':
        return {
          statusCode: HttpStatus.CONFLICT,
          message: 'Concurrent update detected; retry the request.',
        };
      case '22P02':
        return {
          statusCode: HttpStatus.BAD_REQUEST,
          message: 'Invalid value in database request.',
        };
      default:
        return {
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          message: 'An unexpected database error occurred.',
        };
    }
  }
}

import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponse } from './http-exception.types';
import {
  getErrorDetails,
  getErrorMessage,
  getErrorName,
  getErrorStatus,
} from '@common/utils/error.util';
import { readHeader } from '@common/decorators/current-user.decorator';
import { CORRELATION_ID_HEADER } from '@common/interceptors/logging.interceptor';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = getErrorStatus(exception);
    const message = getErrorMessage(exception);

    const errorResponse: ErrorResponse = {
      statusCode: status,
      message,
      error: getErrorName(exception, status),
      ...getErrorDetails(exception),
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      correlationId: readHeader(request, CORRELATION_ID_HEADER),
    };

    if (status >= 500) {
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${JSON.stringify(message)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(`${request.method} ${request.url} - ${status} - ${JSON.stringify(message)}`);
    }

    response.status(status).json(errorResponse);
  }
}

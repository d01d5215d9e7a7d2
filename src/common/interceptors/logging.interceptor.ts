import { Injectable, NestInterceptor, ExecutionContext, CallHandler, Logger } from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { readHeader, readUserId } from '@common/decorators/current-user.decorator';
import { getErrorMessageString, getErrorStatus } from '@common/utils/error.util';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const { method, url } = request;

    const correlationId = readHeader(request, CORRELATION_ID_HEADER) || randomUUID();
    request.headers[CORRELATION_ID_HEADER] = correlationId;
    response.setHeader('X-Correlation-Id', correlationId);

    const userId = readUserId(request) ?? 'anonymous';
    const started = Date.now();

    this.logger.log(`[REQUEST] ${method} ${url} - user: ${userId} - correlation: ${correlationId}`);

    const body: unknown = request.body;
    if (typeof body === 'object' && body !== null && Object.keys(body).length > 0) {
      this.logger.debug(`[REQUEST BODY] ${JSON.stringify(body)}`);
    }

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log(
            `[RESPONSE] ${method} ${url} - ${response.statusCode} - ${Date.now() - started}ms`,
          );
        },
        error: (error: unknown) => {
          this.logger.error(
            `[ERROR] ${method} ${url} - ${getErrorStatus(error)} - ${Date.now() - started}ms - ${getErrorMessageString(error)}`,
          );
        },
      }),
    );
  }
}

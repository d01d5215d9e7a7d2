import { HttpException, HttpStatus } from '@nestjs/common';

export interface ErrorDetails {
  code?: string;
  seats?: string[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function responseBody(error: unknown): Record<string, unknown> | null {
  if (!(error instanceof HttpException)) {
    return null;
  }
  const response = error.getResponse();
  return isRecord(response) ? response : null;
}

export function getErrorStatus(error: unknown): number {
  if (error instanceof HttpException) {
    return error.getStatus();
  }

  if (typeof error !== 'object' || error === null) {
    return HttpStatus.INTERNAL_SERVER_ERROR;
  }

  const candidate =
    'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;

  if (typeof candidate === 'number' && Number.isFinite(candidate)) {
    return candidate;
  }

  if (typeof candidate === 'string') {
    const parsed = Number(candidate);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return HttpStatus.INTERNAL_SERVER_ERROR;
}

export function getErrorMessage(error: unknown): string | string[] {
  if (error instanceof HttpException) {
    const body = responseBody(error);
    if (body) {
      if (Array.isArray(body.message)) {
        return body.message.map(String);
      }
      if (typeof body.message === 'string') {
        return body.message;
      }
    }
    return error.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return 'Internal server error';
}

export function getErrorMessageString(error: unknown): string {
  const message = getErrorMessage(error);
  return Array.isArray(message) ? message.join(', ') : message;
}

export function getHttpErrorName(status: number): string {
  const errorNames: Record<number, string> = {
    [HttpStatus.BAD_REQUEST]: 'Bad Request',
    [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
    [HttpStatus.FORBIDDEN]: 'Forbidden',
    [HttpStatus.NOT_FOUND]: 'Not Found',
    [HttpStatus.CONFLICT]: 'Conflict',
    [HttpStatus.GONE]: 'Gone',
    [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
    [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
    [HttpStatus.SERVICE_UNAVAILABLE]: 'Service Unavailable',
  };

  return errorNames[status] || 'Internal Server Error';
}

export function getErrorName(exception: unknown, status: number): string {
  const body = responseBody(exception);
  if (body && typeof body.error === 'string') {
    return body.error;
  }

  return getHttpErrorName(status);
}

/** Machine-readable code and offending seats carried by booking and lock failures. */
export function getErrorDetails(exception: unknown): ErrorDetails {
  const body = responseBody(exception);
  if (!body) {
    return {};
  }

  const details: ErrorDetails = {};
  if (typeof body.code === 'string') {
    details.code = body.code;
  }
  if (Array.isArray(body.seats)) {
    details.seats = body.seats.map(String);
  }
  return details;
}

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

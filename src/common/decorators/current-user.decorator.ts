import { ExecutionContext, UnauthorizedException, createParamDecorator } from '@nestjs/common';
import { Request } from 'express';
import { isUUID } from 'class-validator';

export const USER_ID_HEADER = 'x-user-id';

export function readHeader(request: Request, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** The caller's id when the header carries a UUID, otherwise null. */
export function readUserId(request: Request): string | null {
  const value = readHeader(request, USER_ID_HEADER)?.trim();
  return value && isUUID(value) ? value.toLowerCase() : null;
}

export function resolveCurrentUser(_data: unknown, ctx: ExecutionContext): string {
  const userId = readUserId(ctx.switchToHttp().getRequest<Request>());
  if (!userId) {
    throw new UnauthorizedException('X-User-Id header with a valid user UUID is required');
  }
  return userId;
}

/** Authenticated user id, supplied upstream in the `X-User-Id` header. */
export const CurrentUser = createParamDecorator(resolveCurrentUser);

import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';

export const USER_ID_HEADER = 'x-user-id';

/**
 * Acting user id from the X-User-Id header.
 * Identity is established upstream; this only reads it.
 */
export function resolveUserId(request: Pick<Request, 'headers'>): string {
  const raw = request.headers[USER_ID_HEADER];
  const userId = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (!userId) {
    throw new UnauthorizedException(`Missing ${USER_ID_HEADER} header`);
  }
  return userId;
}

export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): string =>
  resolveUserId(ctx.switchToHttp().getRequest<Request>()),
);

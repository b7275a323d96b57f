import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import type { Request } from 'express';

export const DEFAULT_OWNER_HEADER = 'x-owner-id';

export function ownerHeaderName(): string {
  return (process.env.OWNER_HEADER || DEFAULT_OWNER_HEADER).toLowerCase();
}

/**
 * Owner identity forwarded by the upstream authenticator, or null for guests
 */
export const OwnerIdentity = createParamDecorator((_data: unknown, ctx: ExecutionContext): string | null => {
  const request = ctx.switchToHttp().getRequest<Request>();
  const value = request.headers[ownerHeaderName()];
  const raw = Array.isArray(value) ? value[0] : value;
  return raw?.trim() || null;
});

export function requireOwner(ownerIdentity: string | null): string {
  if (!ownerIdentity) {
    throw new UnauthorizedException(`Missing ${ownerHeaderName()} header`);
  }
  return ownerIdentity;
}

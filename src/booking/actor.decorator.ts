import {
  BadRequestException,
  ExecutionContext,
  UnauthorizedException,
  createParamDecorator,
} from '@nestjs/common';
import type { Actor, ActorRole } from './domain/booking.types';

const ROLES: readonly ActorRole[] = ['user', 'facility_manager', 'admin', 'auditor'];

type RequestHeaders = Record<string, string | string[] | undefined>;

function isActorRole(value: string): value is ActorRole {
  return ROLES.some((role) => role === value);
}

function single(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Identity is asserted by an upstream gateway through `x-user-id` and
 * `x-user-role`; a missing role means a regular user.
 */
export function parseActor(headers: RequestHeaders): Actor {
  const id = single(headers['x-user-id']);
  if (id === undefined) {
    throw new UnauthorizedException('Missing x-user-id header');
  }

  const role = single(headers['x-user-role']) ?? 'user';
  if (!isActorRole(role)) {
    throw new BadRequestException(`Unknown role: ${role}`);
  }
  return { id, role };
}

export const CurrentActor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Actor =>
    parseActor(ctx.switchToHttp().getRequest<{ headers: RequestHeaders }>().headers),
);

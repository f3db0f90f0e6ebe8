import { Request } from 'express';
import { toActor } from '../services/auth.service';
import { Actor } from '../types/auth.types';
import { RequestMetadata } from '../types/engine.types';
import { ApiError } from '../utils/response';

export function requireActor(req: Request): Actor {
  if (!req.user) {
    throw new ApiError(401, 'Authentication required');
  }
  return toActor(req.user);
}

export const requestMetadata = (req: Request): RequestMetadata => ({
  ipAddress: req.ip ?? null,
  userAgent: req.get('user-agent') ?? null,
});

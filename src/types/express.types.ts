import { Request } from 'express';
import { AuthTokenPayload } from './auth.types';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** Set by the authenticate middleware */
      user?: AuthTokenPayload;
    }
  }
}

export type AuthRequest<ReqBody = unknown> = Request<Record<string, string>, unknown, ReqBody>;

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  code?: string;
  errors?: unknown[];
}

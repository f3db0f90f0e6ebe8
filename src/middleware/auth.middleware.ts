import { Request, Response, NextFunction } from 'express';
import { authService } from '../services/auth.service';
import { hasRole } from '../services/claim-authority.service';
import { Role } from '../types/auth.types';
import { ApiError, sendError } from '../utils/response';

export const authenticate = (req: Request, res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new ApiError(401, 'No token provided');
    }

    const token = authHeader.substring(7);
    req.user = authService.verifyToken(token);
    next();
  } catch (error) {
    if (error instanceof ApiError) {
      sendError(res, error.message, error.statusCode);
    } else {
      sendError(res, 'Authentication failed', 401);
    }
  }
};

/** Passes when the user holds one of `roles` or a role ranked above it. */
export const authorize = (...roles: Role[]) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const user = req.user;

    if (!user) {
      sendError(res, 'Authentication required', 401);
      return;
    }

    if (!roles.some((role) => hasRole({ userId: user.userId, roles: user.roles }, role))) {
      sendError(res, 'Insufficient permissions', 403);
      return;
    }

    next();
  };
};

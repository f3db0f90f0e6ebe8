import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { EngineError } from '../utils/errors';
import { sendError, ApiError } from '../utils/response';

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof ApiError) {
    logger.warn(
      {
        error: err.message,
        code: err instanceof EngineError ? err.code : undefined,
        statusCode: err.statusCode,
        path: req.path,
        method: req.method,
      },
      'Request rejected'
    );
    sendError(res, err.message, err.statusCode, undefined, err instanceof EngineError ? err.code : undefined);
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    },
    'Unhandled error'
  );
  sendError(res, 'Internal server error', 500);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  sendError(res, `Route ${req.originalUrl} not found`, 404);
};

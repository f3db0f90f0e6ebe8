import { Request, Response, NextFunction } from 'express';
import { ValidationChain } from 'express-validator';
import { sendError } from '../utils/response';

export const validate = (validations: ValidationChain[]) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    for (const validation of validations) {
      const result = await validation.run(req);
      if (!result.isEmpty()) {
        sendError(res, 'Validation failed', 400, result.array(), 'VALIDATION_ERROR');
        return;
      }
    }
    next();
  };
};

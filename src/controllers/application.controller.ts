import { Response, NextFunction } from 'express';
import { EligibilityService } from '../services/eligibility.service';
import { AuthRequest } from '../types/express.types';
import { sendSuccess } from '../utils/response';

export class ApplicationController {
  constructor(private readonly eligibility: EligibilityService) {}

  async checkEligibility(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.eligibility.check(req.params.id);
      sendSuccess(res, result, result.eligible ? 'Application is eligible' : 'Application is not eligible');
    } catch (error) {
      next(error);
    }
  }
}

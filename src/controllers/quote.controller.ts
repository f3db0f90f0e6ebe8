import { Response, NextFunction } from 'express';
import { QuoteLifecycleService } from '../services/quote-lifecycle.service';
import { QuoteRankingService } from '../services/quote-ranking.service';
import { AuthRequest } from '../types/express.types';
import { sendSuccess } from '../utils/response';
import { requireActor } from './request-context';

export interface GenerateQuotesBody {
  applicationId: string;
  coverageIds?: string[];
  addonIds?: string[];
}

export class QuoteController {
  constructor(
    private readonly ranking: QuoteRankingService,
    private readonly lifecycle: QuoteLifecycleService
  ) {}

  async generate(req: AuthRequest<GenerateQuotesBody>, res: Response, next: NextFunction): Promise<void> {
    try {
      const { applicationId, coverageIds, addonIds } = req.body;
      const result = await this.ranking.generateQuotes(applicationId, requireActor(req), { coverageIds, addonIds });
      sendSuccess(res, result, 'Quotes generated successfully', 201);
    } catch (error) {
      next(error);
    }
  }

  async getRecommendations(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const recommendations = await this.ranking.getRecommendations(req.params.applicationId, requireActor(req));
      sendSuccess(res, recommendations);
    } catch (error) {
      next(error);
    }
  }

  async getById(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      sendSuccess(res, await this.lifecycle.getQuote(req.params.id, requireActor(req)));
    } catch (error) {
      next(error);
    }
  }

  async accept(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const quote = await this.lifecycle.accept(req.params.id, requireActor(req));
      sendSuccess(res, quote, 'Quote accepted');
    } catch (error) {
      next(error);
    }
  }

  async reject(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const quote = await this.lifecycle.reject(req.params.id, requireActor(req));
      sendSuccess(res, quote, 'Quote rejected');
    } catch (error) {
      next(error);
    }
  }

  async send(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const quote = await this.lifecycle.markSent(req.params.id);
      sendSuccess(res, quote, 'Quote marked as sent');
    } catch (error) {
      next(error);
    }
  }
}

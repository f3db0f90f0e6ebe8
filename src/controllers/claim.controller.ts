import { Response, NextFunction } from 'express';
import { ClaimsWorkflowService } from '../services/claims-workflow.service';
import { BankDetails, ClaimStatus, SettlementMethod } from '../types/engine.types';
import { AuthRequest } from '../types/express.types';
import { sendSuccess } from '../utils/response';
import { requestMetadata, requireActor } from './request-context';

export interface TransitionBody {
  status: ClaimStatus;
  reason?: string;
  approvedAmount?: number;
  settledAmount?: number;
}

export interface AssignSurveyorBody {
  surveyorId: string;
  surveyorEmail?: string;
  assessmentDate?: string;
}

export interface RecordAssessmentBody {
  damageDescription: string;
  lossAmount: number;
  deductible?: number;
  findings?: Record<string, unknown>;
}

export interface CreateSettlementBody {
  method?: SettlementMethod;
  bankDetails?: BankDetails;
}

export class ClaimController {
  constructor(private readonly workflow: ClaimsWorkflowService) {}

  async getById(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      sendSuccess(res, await this.workflow.getClaim(req.params.id, requireActor(req)));
    } catch (error) {
      next(error);
    }
  }

  async getHistory(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      sendSuccess(res, await this.workflow.getHistory(req.params.id, requireActor(req)));
    } catch (error) {
      next(error);
    }
  }

  async transition(req: AuthRequest<TransitionBody>, res: Response, next: NextFunction): Promise<void> {
    try {
      const { status, reason, approvedAmount, settledAmount } = req.body;
      const result = await this.workflow.transition(req.params.id, status, requireActor(req), {
        reason,
        approvedAmount,
        settledAmount,
        metadata: requestMetadata(req),
      });
      sendSuccess(res, result, 'Claim status updated');
    } catch (error) {
      next(error);
    }
  }

  async assignSurveyor(req: AuthRequest<AssignSurveyorBody>, res: Response, next: NextFunction): Promise<void> {
    try {
      const { surveyorId, surveyorEmail, assessmentDate } = req.body;
      const result = await this.workflow.assignSurveyor(
        req.params.id,
        { userId: surveyorId, email: surveyorEmail },
        requireActor(req),
        assessmentDate ? new Date(assessmentDate) : undefined,
        requestMetadata(req)
      );
      sendSuccess(res, result, 'Surveyor assigned', 201);
    } catch (error) {
      next(error);
    }
  }

  async startInvestigation(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.workflow.startInvestigation(req.params.id, requireActor(req), requestMetadata(req));
      sendSuccess(res, result, 'Investigation started');
    } catch (error) {
      next(error);
    }
  }

  async recordAssessment(req: AuthRequest<RecordAssessmentBody>, res: Response, next: NextFunction): Promise<void> {
    try {
      const { damageDescription, lossAmount, deductible, findings } = req.body;
      const result = await this.workflow.recordAssessment(req.params.id, requireActor(req), {
        damageDescription,
        lossAmount,
        deductible,
        findings,
      });
      sendSuccess(res, result, 'Assessment recorded');
    } catch (error) {
      next(error);
    }
  }

  async createSettlement(req: AuthRequest<CreateSettlementBody>, res: Response, next: NextFunction): Promise<void> {
    try {
      const { method, bankDetails } = req.body;
      const settlement = await this.workflow.createSettlement(req.params.id, requireActor(req), method, bankDetails);
      sendSuccess(res, settlement, 'Settlement created', 201);
    } catch (error) {
      next(error);
    }
  }

  async getSlaStatus(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      sendSuccess(res, await this.workflow.getSlaStatus(req.params.id, requireActor(req)));
    } catch (error) {
      next(error);
    }
  }

  async getAuthority(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      sendSuccess(res, await this.workflow.describeAuthority(req.params.id, requireActor(req)));
    } catch (error) {
      next(error);
    }
  }
}

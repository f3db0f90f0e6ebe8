import { EngineConfig } from '../config/engine.config';
import { EngineStore, EngineTransaction } from '../models/store';
import { Actor } from '../types/auth.types';
import {
  AssessmentStatus,
  BankDetails,
  Claim,
  ClaimAssessment,
  ClaimPatch,
  ClaimSettlement,
  ClaimStatus,
  ClaimStatusHistory,
  RequestMetadata,
  SettlementMethod,
  SettlementStatus,
} from '../types/engine.types';
import { Clock, systemClock } from '../utils/clock';
import { calendarDaysBetween } from '../utils/dates';
import {
  InvalidStateError,
  InvalidTransitionError,
  NotFoundError,
  PreconditionError,
  UnauthorizedError,
  ValidationError,
} from '../utils/errors';
import { newId } from '../utils/identifiers';
import logger from '../utils/logger';
import { roundMoney } from '../utils/money';
import { ClaimAuthorityResolver, ResolvedAuthority } from './claim-authority.service';
import { assertCustomerAccess } from './customer-access';

export const VALID_TRANSITIONS: Readonly<Record<ClaimStatus, readonly ClaimStatus[]>> = {
  [ClaimStatus.SUBMITTED]: [ClaimStatus.UNDER_REVIEW],
  [ClaimStatus.UNDER_REVIEW]: [ClaimStatus.APPROVED, ClaimStatus.REJECTED, ClaimStatus.SURVEYOR_ASSIGNED],
  [ClaimStatus.SURVEYOR_ASSIGNED]: [ClaimStatus.UNDER_INVESTIGATION],
  [ClaimStatus.UNDER_INVESTIGATION]: [ClaimStatus.ASSESSED],
  [ClaimStatus.ASSESSED]: [ClaimStatus.APPROVED, ClaimStatus.REJECTED],
  [ClaimStatus.APPROVED]: [ClaimStatus.SETTLED],
  [ClaimStatus.SETTLED]: [ClaimStatus.CLOSED],
  [ClaimStatus.REJECTED]: [ClaimStatus.CLOSED],
  [ClaimStatus.CLOSED]: [],
};

const TERMINAL_STATUSES: ReadonlySet<ClaimStatus> = new Set([
  ClaimStatus.SETTLED,
  ClaimStatus.CLOSED,
  ClaimStatus.REJECTED,
]);

const MAX_USER_AGENT_LENGTH = 500;

export const canTransition = (from: ClaimStatus, to: ClaimStatus): boolean => VALID_TRANSITIONS[from].includes(to);

export interface TransitionOptions {
  reason?: string;
  /** Required when entering APPROVED */
  approvedAmount?: number;
  /** Defaults to the approved amount when entering SETTLED */
  settledAmount?: number;
  metadata?: RequestMetadata;
}

export interface TransitionResult {
  claim: Claim;
  history: ClaimStatusHistory;
}

export interface SurveyorAssignment {
  claim: Claim;
  assessment: ClaimAssessment;
}

/** The user sent to inspect the claim */
export type SurveyorRef = Pick<Actor, 'userId' | 'email'>;

export interface AssessmentInput {
  damageDescription: string;
  lossAmount: number;
  deductible?: number;
  findings?: Record<string, unknown>;
}

export interface AssessmentResult {
  assessment: ClaimAssessment;
  /** Set when the assessment moved the claim to ASSESSED */
  claim: Claim | null;
}

export type SlaStatus =
  | { status: 'COMPLETED'; processingDays: number; withinSla: boolean; slaDays: number }
  | { status: 'IN_PROGRESS'; daysElapsed: number; daysRemaining: number; withinSla: boolean; slaDays: number };

/**
 * Claim state machine. Every mutation reads the claim, validates, writes it
 * back against the version it read and appends history in one transaction.
 */
export class ClaimsWorkflowService {
  private readonly authority = new ClaimAuthorityResolver();

  constructor(
    private readonly store: EngineStore,
    private readonly config: EngineConfig,
    private readonly clock: Clock = systemClock
  ) {}

  /** With a viewer, a customer only sees their own claims. */
  async getClaim(claimId: string, viewer: Actor | null = null): Promise<Claim> {
    const claim = await this.store.getClaim(claimId);
    if (!claim) {
      throw new NotFoundError('Claim', claimId);
    }
    if (viewer) {
      await assertCustomerAccess(this.store, viewer, claim.customerId, 'Claim', claimId);
    }
    return claim;
  }

  async getHistory(claimId: string, viewer: Actor | null = null): Promise<ClaimStatusHistory[]> {
    await this.getClaim(claimId, viewer);
    return this.store.listClaimHistory(claimId);
  }

  async describeAuthority(claimId: string, actor: Actor): Promise<ResolvedAuthority & { canApprove: boolean }> {
    const claim = await this.getClaim(claimId, actor);
    const thresholds = await this.store.listApprovalThresholds(claim.insuranceTypeId);
    const resolved = this.authority.resolveThreshold(claim, thresholds);
    return { ...resolved, canApprove: this.authority.canApprove(actor, claim, thresholds) };
  }

  async transition(
    claimId: string,
    newStatus: ClaimStatus,
    actor: Actor,
    options: TransitionOptions = {}
  ): Promise<TransitionResult> {
    const result = await this.store.transaction(async (tx) => {
      const claim = await this.requireClaim(tx, claimId);
      return this.applyTransition(tx, claim, newStatus, actor, options);
    });

    logger.info(
      {
        claimId,
        claimNumber: result.claim.claimNumber,
        from: result.history.oldStatus,
        to: result.history.newStatus,
        actorId: actor.userId,
      },
      'Claim status updated'
    );
    return result;
  }

  async startInvestigation(claimId: string, actor: Actor, metadata?: RequestMetadata): Promise<TransitionResult> {
    return this.transition(claimId, ClaimStatus.UNDER_INVESTIGATION, actor, {
      reason: 'Investigation started',
      metadata,
    });
  }

  async assignSurveyor(
    claimId: string,
    surveyor: SurveyorRef,
    actor: Actor,
    assessmentDate?: Date,
    metadata?: RequestMetadata
  ): Promise<SurveyorAssignment> {
    const assigned = await this.store.transaction(async (tx) => {
      const claim = await this.requireClaim(tx, claimId);
      if (claim.status !== ClaimStatus.UNDER_REVIEW) {
        throw new InvalidStateError(`Surveyor can only be assigned to claims under review (status is ${claim.status})`);
      }

      const now = this.clock();
      const assessment = await tx.insertAssessment({
        id: newId(),
        claimId: claim.id,
        surveyorId: surveyor.userId,
        assessmentDate: assessmentDate ?? now,
        damageAssessment: '',
        lossAmountAssessed: null,
        deductibleApplicable: null,
        netClaimAmount: null,
        findings: {},
        status: AssessmentStatus.PENDING,
        completedAt: null,
      });

      const { claim: updated } = await this.applyTransition(tx, claim, ClaimStatus.SURVEYOR_ASSIGNED, actor, {
        reason: `Surveyor assigned: ${surveyor.email ?? surveyor.userId}`,
        metadata,
      });
      return { claim: updated, assessment };
    });

    logger.info(
      { claimId, assessmentId: assigned.assessment.id, surveyorId: surveyor.userId, actorId: actor.userId },
      'Surveyor assigned'
    );
    return assigned;
  }

  /** Only the surveyor the assessment was assigned to can record it. */
  async recordAssessment(assessmentId: string, surveyor: Actor, input: AssessmentInput): Promise<AssessmentResult> {
    const deductible = input.deductible ?? 0;
    if (!Number.isFinite(input.lossAmount) || input.lossAmount < 0) {
      throw new ValidationError('Loss amount must be zero or more');
    }
    if (!Number.isFinite(deductible) || deductible < 0) {
      throw new ValidationError('Deductible must be zero or more');
    }

    const result = await this.store.transaction(async (tx) => {
      const existing = await tx.getAssessment(assessmentId);
      if (!existing) {
        throw new NotFoundError('Assessment', assessmentId);
      }
      if (existing.status === AssessmentStatus.COMPLETED) {
        throw new InvalidStateError(`Assessment ${assessmentId} is already completed`);
      }
      if (existing.surveyorId !== surveyor.userId) {
        logger.warn(
          { assessmentId, assignedTo: existing.surveyorId, actorId: surveyor.userId },
          'Assessment refused - assigned to another surveyor'
        );
        throw new UnauthorizedError(`Assessment ${assessmentId} is assigned to another surveyor`);
      }

      const netClaimAmount = roundMoney(input.lossAmount - deductible);
      const assessment = await tx.updateAssessment(assessmentId, {
        damageAssessment: input.damageDescription,
        lossAmountAssessed: roundMoney(input.lossAmount),
        deductibleApplicable: roundMoney(deductible),
        netClaimAmount,
        findings: input.findings ?? {},
        status: AssessmentStatus.COMPLETED,
        completedAt: this.clock(),
      });

      const claim = await this.requireClaim(tx, existing.claimId);
      if (claim.status !== ClaimStatus.UNDER_INVESTIGATION) {
        return { assessment, claim: null };
      }

      const { claim: assessed } = await this.applyTransition(tx, claim, ClaimStatus.ASSESSED, surveyor, {
        reason: `Assessment completed. Net amount: ${netClaimAmount.toFixed(2)}`,
      });
      return { assessment, claim: assessed };
    });

    logger.info(
      { assessmentId, claimId: result.assessment.claimId, netClaimAmount: result.assessment.netClaimAmount },
      'Assessment recorded'
    );
    return result;
  }

  /** Records a pending payout. The claim moves to SETTLED separately, once the payout is processed. */
  async createSettlement(
    claimId: string,
    actor: Actor,
    method: SettlementMethod = SettlementMethod.BANK_TRANSFER,
    bankDetails: BankDetails = {}
  ): Promise<ClaimSettlement> {
    const settlement = await this.store.transaction(async (tx) => {
      const claim = await this.requireClaim(tx, claimId);
      if (claim.status !== ClaimStatus.APPROVED) {
        throw new InvalidStateError(`Settlement can only be created for approved claims (status is ${claim.status})`);
      }
      if (claim.amountApproved === null) {
        throw new PreconditionError(`Claim ${claim.claimNumber} has no approved amount`);
      }
      const open = (await tx.listSettlements(claim.id)).find(
        (existing) => existing.status === SettlementStatus.PENDING || existing.status === SettlementStatus.PROCESSED
      );
      if (open) {
        throw new InvalidStateError(`Claim ${claim.claimNumber} already has a ${open.status.toLowerCase()} settlement`);
      }

      return tx.insertSettlement({
        id: newId(),
        claimId: claim.id,
        settlementAmount: claim.amountApproved,
        method,
        bankAccountNumber: bankDetails.accountNumber ?? '',
        bankName: bankDetails.bankName ?? '',
        bankIfscCode: bankDetails.ifscCode ?? '',
        accountHolderName: bankDetails.holderName ?? '',
        approvedBy: actor.userId,
        status: SettlementStatus.PENDING,
        createdAt: this.clock(),
        processedAt: null,
      });
    });

    logger.info({ claimId, settlementId: settlement.id, amount: settlement.settlementAmount }, 'Settlement created');
    return settlement;
  }

  async getSlaStatus(claimId: string, viewer: Actor | null = null): Promise<SlaStatus> {
    const claim = await this.getClaim(claimId, viewer);
    const thresholds = await this.store.listApprovalThresholds(claim.insuranceTypeId);
    const slaDays = this.authority.resolveThreshold(claim, thresholds).maxProcessingDays ?? this.config.claimSlaDays;

    if (TERMINAL_STATUSES.has(claim.status)) {
      const finishedAt = claim.settledAt ?? claim.rejectedAt;
      const processingDays = finishedAt ? calendarDaysBetween(claim.submittedAt, finishedAt) : 0;
      return { status: 'COMPLETED', processingDays, withinSla: processingDays <= slaDays, slaDays };
    }

    const daysElapsed = calendarDaysBetween(claim.submittedAt, this.clock());
    const remaining = slaDays - daysElapsed;
    return {
      status: 'IN_PROGRESS',
      daysElapsed,
      daysRemaining: Math.max(0, remaining),
      withinSla: remaining >= 0,
      slaDays,
    };
  }

  private async requireClaim(tx: EngineTransaction, claimId: string): Promise<Claim> {
    const claim = await tx.getClaim(claimId);
    if (!claim) {
      throw new NotFoundError('Claim', claimId);
    }
    return claim;
  }

  private async applyTransition(
    tx: EngineTransaction,
    claim: Claim,
    newStatus: ClaimStatus,
    actor: Actor,
    options: TransitionOptions
  ): Promise<TransitionResult> {
    if (!canTransition(claim.status, newStatus)) {
      throw new InvalidTransitionError(claim.status, newStatus);
    }

    const now = this.clock();
    const reason = options.reason?.trim() ?? '';
    const patch: ClaimPatch = { status: newStatus };

    switch (newStatus) {
      case ClaimStatus.SURVEYOR_ASSIGNED:
        await this.requireAssessment(
          tx,
          claim,
          AssessmentStatus.PENDING,
          'A surveyor must be assigned with an assessment'
        );
        break;

      case ClaimStatus.ASSESSED:
        await this.requireAssessment(tx, claim, AssessmentStatus.COMPLETED, 'A completed assessment is required');
        break;

      case ClaimStatus.UNDER_REVIEW:
        patch.reviewStartedAt = now;
        patch.reviewedBy = actor.userId;
        break;

      case ClaimStatus.APPROVED: {
        const thresholds = await tx.listApprovalThresholds(claim.insuranceTypeId);
        if (!this.authority.canApprove(actor, claim, thresholds)) {
          const { requiredRole } = this.authority.resolveThreshold(claim, thresholds);
          logger.warn(
            { claimId: claim.id, actorId: actor.userId, requiredRole, amountRequested: claim.amountRequested },
            'Approval refused - insufficient authority'
          );
          throw new UnauthorizedError(`Approving claim ${claim.claimNumber} requires the ${requiredRole} role`);
        }
        const approved = options.approvedAmount;
        if (approved === undefined || !Number.isFinite(approved)) {
          throw new ValidationError('Approved amount is required');
        }
        if (approved <= 0) {
          throw new ValidationError('Approved amount must be greater than zero');
        }
        if (approved > claim.amountRequested) {
          throw new ValidationError('Approved amount cannot exceed requested amount');
        }
        patch.amountApproved = roundMoney(approved);
        patch.approvedAt = now;
        patch.reviewedBy = actor.userId;
        break;
      }

      case ClaimStatus.REJECTED:
        if (!reason) {
          throw new ValidationError('Rejection reason is required');
        }
        patch.rejectionReason = reason;
        patch.rejectedAt = now;
        patch.reviewedBy = actor.userId;
        break;

      case ClaimStatus.SETTLED: {
        if (claim.amountApproved === null) {
          throw new PreconditionError('Claim must be approved before settlement');
        }
        const settled = options.settledAmount ?? claim.amountApproved;
        if (!Number.isFinite(settled) || settled <= 0 || settled > claim.amountApproved) {
          throw new ValidationError('Settled amount must be greater than zero and not exceed the approved amount');
        }
        const amountSettled = roundMoney(settled);
        patch.amountSettled = amountSettled;
        patch.settledAt = now;
        patch.settledBy = actor.userId;
        await this.processPendingSettlements(tx, claim.id, amountSettled, now);
        break;
      }

      case ClaimStatus.CLOSED:
        patch.closedAt = now;
        break;

      default:
        break;
    }

    const updated = await tx.updateClaim(claim.id, claim.version, patch);
    const history = await tx.insertClaimHistory({
      id: newId(),
      claimId: claim.id,
      oldStatus: claim.status,
      newStatus,
      changedBy: actor.userId,
      reason,
      ipAddress: options.metadata?.ipAddress ?? null,
      userAgent: options.metadata?.userAgent?.slice(0, MAX_USER_AGENT_LENGTH) ?? null,
      changedAt: now,
    });

    return { claim: updated, history };
  }

  private async requireAssessment(
    tx: EngineTransaction,
    claim: Claim,
    status: AssessmentStatus,
    message: string
  ): Promise<void> {
    const assessments = await tx.listAssessments(claim.id);
    if (!assessments.some((assessment) => assessment.status === status)) {
      throw new PreconditionError(`${message} for claim ${claim.claimNumber}`);
    }
  }

  /** The payout is booked at the amount actually settled. */
  private async processPendingSettlements(
    tx: EngineTransaction,
    claimId: string,
    amountSettled: number,
    now: Date
  ): Promise<void> {
    const pending = (await tx.listSettlements(claimId)).filter(
      (settlement) => settlement.status === SettlementStatus.PENDING
    );
    for (const settlement of pending) {
      await tx.updateSettlement(settlement.id, {
        status: SettlementStatus.PROCESSED,
        settlementAmount: amountSettled,
        processedAt: now,
      });
    }
  }
}

import { describe, expect, it } from 'vitest';
import { actor, buildClaim, buildCustomer, fixedClock, storeWithClaim, testConfig } from '../test-utils';
import { Role } from '../types/auth.types';
import { AssessmentStatus, Claim, ClaimStatus, SettlementMethod, SettlementStatus } from '../types/engine.types';
import {
  InvalidStateError,
  InvalidTransitionError,
  NotFoundError,
  PreconditionError,
  UnauthorizedError,
  ValidationError,
} from '../utils/errors';
import { ClaimsWorkflowService, VALID_TRANSITIONS, canTransition } from './claims-workflow.service';

const NOW = '2026-01-05T12:00:00.000Z';
const officer = actor(Role.OFFICER);
const manager = actor(Role.MANAGER);
const admin = actor(Role.ADMIN);
const assignedSurveyor = actor(Role.SURVEYOR, 'surveyor-1');

async function setup(claim: Claim = buildClaim(), now = NOW) {
  const store = await storeWithClaim(claim);
  return { store, workflow: new ClaimsWorkflowService(store, testConfig(), fixedClock(now)) };
}

const illegalPairs = Object.values(ClaimStatus).flatMap((from) =>
  Object.values(ClaimStatus)
    .filter((to) => !VALID_TRANSITIONS[from].includes(to))
    .map((to): [ClaimStatus, ClaimStatus] => [from, to])
);

describe('canTransition', () => {
  it('allows only the listed moves', () => {
    expect(canTransition(ClaimStatus.SUBMITTED, ClaimStatus.UNDER_REVIEW)).toBe(true);
    expect(canTransition(ClaimStatus.ASSESSED, ClaimStatus.REJECTED)).toBe(true);
    expect(canTransition(ClaimStatus.SUBMITTED, ClaimStatus.APPROVED)).toBe(false);
    expect(canTransition(ClaimStatus.CLOSED, ClaimStatus.SUBMITTED)).toBe(false);
  });
});

describe('ClaimsWorkflowService.transition', () => {
  it('routes a 50,000 claim to a manager for approval', async () => {
    const { store, workflow } = await setup();

    await workflow.transition('claim-1', ClaimStatus.UNDER_REVIEW, officer, { reason: 'Documents received' });
    await expect(
      workflow.transition('claim-1', ClaimStatus.APPROVED, officer, { approvedAmount: 45000 })
    ).rejects.toThrow(new UnauthorizedError('Approving claim CLM-20260101-0000ABCD requires the MANAGER role'));
    expect(await store.listClaimHistory('claim-1')).toHaveLength(1);

    const { claim, history } = await workflow.transition('claim-1', ClaimStatus.APPROVED, manager, {
      approvedAmount: 45000,
      reason: 'Within policy limits',
    });

    expect(claim.status).toBe(ClaimStatus.APPROVED);
    expect(claim.amountApproved).toBe(45000);
    expect(claim.approvedAt).toEqual(new Date(NOW));
    expect(claim.reviewedBy).toBe('user-manager');
    expect(history).toMatchObject({
      claimId: 'claim-1',
      oldStatus: ClaimStatus.UNDER_REVIEW,
      newStatus: ClaimStatus.APPROVED,
      changedBy: 'user-manager',
      reason: 'Within policy limits',
      ipAddress: null,
      userAgent: null,
    });
    expect(await store.listClaimHistory('claim-1')).toHaveLength(2);
  });

  it('refuses to skip review and writes no history', async () => {
    const { store, workflow } = await setup();

    await expect(
      workflow.transition('claim-1', ClaimStatus.APPROVED, admin, { approvedAmount: 1000 })
    ).rejects.toThrow(new InvalidTransitionError(ClaimStatus.SUBMITTED, ClaimStatus.APPROVED));
    expect(await store.listClaimHistory('claim-1')).toEqual([]);
    expect((await store.getClaim('claim-1'))?.status).toBe(ClaimStatus.SUBMITTED);
  });

  it.each(illegalPairs)('refuses %s to %s', async (from, to) => {
    const { workflow } = await setup(buildClaim({ status: from, amountApproved: 45000 }));

    await expect(
      workflow.transition('claim-1', to, admin, { reason: 'Attempt', approvedAmount: 1000 })
    ).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it.each([
    ['above the requested amount', 60000],
    ['zero', 0],
    ['missing', undefined],
  ])('rejects an approved amount that is %s', async (_label, approvedAmount) => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));

    await expect(
      workflow.transition('claim-1', ClaimStatus.APPROVED, manager, { approvedAmount })
    ).rejects.toBeInstanceOf(ValidationError);

    const stored = await store.getClaim('claim-1');
    expect(stored?.status).toBe(ClaimStatus.UNDER_REVIEW);
    expect(stored?.amountApproved).toBeNull();
    expect(stored?.version).toBe(1);
  });

  it('approves the full requested amount', async () => {
    const { workflow } = await setup(buildClaim({ status: ClaimStatus.ASSESSED }));

    const { claim } = await workflow.transition('claim-1', ClaimStatus.APPROVED, manager, { approvedAmount: 50000 });

    expect(claim.amountApproved).toBe(50000);
  });

  it('requires a reason to reject', async () => {
    const { workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));

    await expect(
      workflow.transition('claim-1', ClaimStatus.REJECTED, officer, { reason: '   ' })
    ).rejects.toBeInstanceOf(ValidationError);

    const { claim, history } = await workflow.transition('claim-1', ClaimStatus.REJECTED, officer, {
      reason: '  Policy lapsed  ',
    });
    expect(claim.rejectionReason).toBe('Policy lapsed');
    expect(claim.rejectedAt).toEqual(new Date(NOW));
    expect(history.reason).toBe('Policy lapsed');
  });

  it('refuses to settle a claim without an approved amount', async () => {
    const { workflow } = await setup(buildClaim({ status: ClaimStatus.APPROVED }));

    await expect(workflow.transition('claim-1', ClaimStatus.SETTLED, officer)).rejects.toBeInstanceOf(
      PreconditionError
    );
  });

  it('settles for the approved amount unless a smaller one is given', async () => {
    const approved = buildClaim({ status: ClaimStatus.APPROVED, amountApproved: 45000 });

    const first = await setup(approved);
    await expect(
      first.workflow.transition('claim-1', ClaimStatus.SETTLED, officer, { settledAmount: 50000 })
    ).rejects.toBeInstanceOf(ValidationError);
    const { claim } = await first.workflow.transition('claim-1', ClaimStatus.SETTLED, officer);
    expect(claim.amountSettled).toBe(45000);
    expect(claim.settledAt).toEqual(new Date(NOW));
    expect(claim.settledBy).toBe('user-officer');

    const second = await setup(approved);
    const partial = await second.workflow.transition('claim-1', ClaimStatus.SETTLED, officer, {
      settledAmount: 40000,
    });
    expect(partial.claim.amountSettled).toBe(40000);
  });

  it('processes pending settlements when the claim settles', async () => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.APPROVED, amountApproved: 45000 }));
    const settlement = await workflow.createSettlement('claim-1', officer);

    await workflow.transition('claim-1', ClaimStatus.SETTLED, officer);

    const [stored] = await store.listSettlements('claim-1');
    expect(stored.id).toBe(settlement.id);
    expect(stored.status).toBe(SettlementStatus.PROCESSED);
    expect(stored.settlementAmount).toBe(45000);
    expect(stored.processedAt).toEqual(new Date(NOW));
  });

  it('books the pending settlement at a smaller settled amount', async () => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.APPROVED, amountApproved: 45000 }));
    await workflow.createSettlement('claim-1', officer);

    const { claim } = await workflow.transition('claim-1', ClaimStatus.SETTLED, officer, { settledAmount: 30000 });

    const settlements = await store.listSettlements('claim-1');
    expect(claim.amountSettled).toBe(30000);
    expect(settlements).toHaveLength(1);
    expect(settlements[0]).toMatchObject({ status: SettlementStatus.PROCESSED, settlementAmount: 30000 });
  });

  it('only enters SURVEYOR_ASSIGNED through surveyor assignment', async () => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));

    await expect(workflow.transition('claim-1', ClaimStatus.SURVEYOR_ASSIGNED, admin)).rejects.toThrow(
      new PreconditionError('A surveyor must be assigned with an assessment for claim CLM-20260101-0000ABCD')
    );
    expect((await store.getClaim('claim-1'))?.status).toBe(ClaimStatus.UNDER_REVIEW);
    expect(await store.listClaimHistory('claim-1')).toEqual([]);
  });

  it('only enters ASSESSED with a completed assessment', async () => {
    const bare = await setup(buildClaim({ status: ClaimStatus.UNDER_INVESTIGATION }));
    await expect(bare.workflow.transition('claim-1', ClaimStatus.ASSESSED, admin)).rejects.toThrow(
      new PreconditionError('A completed assessment is required for claim CLM-20260101-0000ABCD')
    );
    expect((await bare.store.getClaim('claim-1'))?.status).toBe(ClaimStatus.UNDER_INVESTIGATION);

    const pending = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));
    await pending.workflow.assignSurveyor('claim-1', assignedSurveyor, officer);
    await pending.workflow.startInvestigation('claim-1', assignedSurveyor);
    await expect(pending.workflow.transition('claim-1', ClaimStatus.ASSESSED, admin)).rejects.toBeInstanceOf(
      PreconditionError
    );
    expect((await pending.store.getClaim('claim-1'))?.status).toBe(ClaimStatus.UNDER_INVESTIGATION);
  });

  it('stamps closedAt when closing', async () => {
    const { workflow } = await setup(buildClaim({ status: ClaimStatus.REJECTED }));

    const { claim } = await workflow.transition('claim-1', ClaimStatus.CLOSED, officer);

    expect(claim.closedAt).toEqual(new Date(NOW));
  });

  it('walks the full lifecycle with one history row per step', async () => {
    const { store, workflow } = await setup();
    const steps: ClaimStatus[] = [
      ClaimStatus.UNDER_REVIEW,
      ClaimStatus.SURVEYOR_ASSIGNED,
      ClaimStatus.UNDER_INVESTIGATION,
      ClaimStatus.ASSESSED,
      ClaimStatus.APPROVED,
      ClaimStatus.SETTLED,
      ClaimStatus.CLOSED,
    ];

    await workflow.transition('claim-1', ClaimStatus.UNDER_REVIEW, admin);
    const { assessment } = await workflow.assignSurveyor('claim-1', assignedSurveyor, admin);
    await workflow.startInvestigation('claim-1', assignedSurveyor);
    await workflow.recordAssessment(assessment.id, assignedSurveyor, {
      damageDescription: 'Rear panel',
      lossAmount: 48000,
    });
    await workflow.transition('claim-1', ClaimStatus.APPROVED, admin, { approvedAmount: 48000 });
    await workflow.transition('claim-1', ClaimStatus.SETTLED, admin);
    await workflow.transition('claim-1', ClaimStatus.CLOSED, admin);

    const claim = await workflow.getClaim('claim-1');
    const history = await workflow.getHistory('claim-1');
    expect(claim.status).toBe(ClaimStatus.CLOSED);
    expect(claim.version).toBe(8);
    expect(claim.reviewStartedAt).toEqual(new Date(NOW));
    expect(claim.amountSettled).toBe(48000);
    expect(history.map((entry) => entry.newStatus)).toEqual(steps);
    expect(history.map((entry) => entry.oldStatus)).toEqual([ClaimStatus.SUBMITTED, ...steps.slice(0, -1)]);
    expect(await store.listClaimHistory('claim-1')).toHaveLength(7);
  });

  it('records request metadata and truncates long user agents', async () => {
    const { workflow } = await setup();

    const { history } = await workflow.transition('claim-1', ClaimStatus.UNDER_REVIEW, officer, {
      metadata: { ipAddress: '10.0.0.8', userAgent: 'a'.repeat(600) },
    });

    expect(history.ipAddress).toBe('10.0.0.8');
    expect(history.userAgent).toBe('a'.repeat(500));
  });

  it('fails for an unknown claim', async () => {
    const { workflow } = await setup();

    await expect(workflow.transition('claim-x', ClaimStatus.UNDER_REVIEW, officer)).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(workflow.getHistory('claim-x')).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('ClaimsWorkflowService customer access', () => {
  it("hides another customer's claim and lets the owner read it", async () => {
    const { store, workflow } = await setup();
    store.seedCatalog({ customers: [buildCustomer()] });
    const stranger = { userId: 'cust-2', email: 'someone.else@example.com', roles: [Role.CUSTOMER] };

    await expect(workflow.getClaim('claim-1', stranger)).rejects.toThrow(new NotFoundError('Claim', 'claim-1'));
    await expect(workflow.getHistory('claim-1', stranger)).rejects.toBeInstanceOf(NotFoundError);
    await expect(workflow.getSlaStatus('claim-1', stranger)).rejects.toBeInstanceOf(NotFoundError);
    await expect(workflow.describeAuthority('claim-1', stranger)).rejects.toBeInstanceOf(NotFoundError);

    expect((await workflow.getClaim('claim-1', actor(Role.CUSTOMER, 'cust-1'))).id).toBe('claim-1');
    expect((await workflow.getClaim('claim-1', assignedSurveyor)).id).toBe('claim-1');
  });
});

describe('ClaimsWorkflowService.describeAuthority', () => {
  it('reports the tier and whether the actor may approve', async () => {
    const { workflow } = await setup();

    const forOfficer = await workflow.describeAuthority('claim-1', officer);
    const forManager = await workflow.describeAuthority('claim-1', manager);

    expect(forOfficer.requiredRole).toBe(Role.MANAGER);
    expect(forOfficer.canApprove).toBe(false);
    expect(forManager.canApprove).toBe(true);
  });
});

describe('surveyor assessment', () => {
  const surveyor = { userId: 'surveyor-1', email: 'surveyor@example.com' };

  it('assigns a surveyor, investigates and moves the claim to ASSESSED', async () => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));

    const assigned = await workflow.assignSurveyor('claim-1', surveyor, officer);
    expect(assigned.claim.status).toBe(ClaimStatus.SURVEYOR_ASSIGNED);
    expect(assigned.assessment).toMatchObject({
      claimId: 'claim-1',
      surveyorId: 'surveyor-1',
      status: AssessmentStatus.PENDING,
      assessmentDate: new Date(NOW),
    });

    await workflow.startInvestigation('claim-1', assignedSurveyor);
    const result = await workflow.recordAssessment(assigned.assessment.id, assignedSurveyor, {
      damageDescription: 'Bumper and headlamp replaced',
      lossAmount: 12000,
      deductible: 1000,
    });

    expect(result.assessment.netClaimAmount).toBe(11000);
    expect(result.assessment.status).toBe(AssessmentStatus.COMPLETED);
    expect(result.claim?.status).toBe(ClaimStatus.ASSESSED);

    const history = await store.listClaimHistory('claim-1');
    expect(history.map((entry) => entry.reason)).toEqual([
      'Surveyor assigned: surveyor@example.com',
      'Investigation started',
      'Assessment completed. Net amount: 11000.00',
    ]);
    expect(history.map((entry) => entry.changedBy)).toEqual(['user-officer', 'surveyor-1', 'surveyor-1']);
  });

  it('accepts the assessment only from the assigned surveyor', async () => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));
    const { assessment } = await workflow.assignSurveyor('claim-1', surveyor, officer);
    await workflow.startInvestigation('claim-1', assignedSurveyor);

    await expect(
      workflow.recordAssessment(assessment.id, actor(Role.SURVEYOR, 'surveyor-2'), {
        damageDescription: 'x',
        lossAmount: 10,
      })
    ).rejects.toThrow(new UnauthorizedError(`Assessment ${assessment.id} is assigned to another surveyor`));

    expect((await store.getAssessment(assessment.id))?.status).toBe(AssessmentStatus.PENDING);
    expect((await store.getClaim('claim-1'))?.status).toBe(ClaimStatus.UNDER_INVESTIGATION);
  });

  it('names the surveyor by id when no email is known', async () => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));

    await workflow.assignSurveyor('claim-1', { userId: 'surveyor-2' }, officer);

    const [entry] = await store.listClaimHistory('claim-1');
    expect(entry.reason).toBe('Surveyor assigned: surveyor-2');
  });

  it('assigns surveyors only to claims under review', async () => {
    const { store, workflow } = await setup();

    await expect(workflow.assignSurveyor('claim-1', surveyor, officer)).rejects.toBeInstanceOf(InvalidStateError);
    expect(await store.listAssessments('claim-1')).toEqual([]);
  });

  it('leaves the claim alone when it is not under investigation', async () => {
    const { workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));
    const { assessment } = await workflow.assignSurveyor('claim-1', surveyor, officer);

    const result = await workflow.recordAssessment(assessment.id, assignedSurveyor, {
      damageDescription: 'Minor',
      lossAmount: 500,
    });

    expect(result.claim).toBeNull();
    expect(result.assessment.netClaimAmount).toBe(500);
    expect((await workflow.getClaim('claim-1')).status).toBe(ClaimStatus.SURVEYOR_ASSIGNED);
  });

  it('validates assessment input and completes an assessment once', async () => {
    const { workflow } = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));
    const { assessment } = await workflow.assignSurveyor('claim-1', surveyor, officer);

    await expect(
      workflow.recordAssessment(assessment.id, assignedSurveyor, { damageDescription: 'x', lossAmount: -1 })
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      workflow.recordAssessment(assessment.id, assignedSurveyor, {
        damageDescription: 'x',
        lossAmount: 10,
        deductible: -5,
      })
    ).rejects.toBeInstanceOf(ValidationError);

    await workflow.recordAssessment(assessment.id, assignedSurveyor, { damageDescription: 'x', lossAmount: 10 });
    await expect(
      workflow.recordAssessment(assessment.id, assignedSurveyor, { damageDescription: 'x', lossAmount: 10 })
    ).rejects.toBeInstanceOf(InvalidStateError);
    await expect(
      workflow.recordAssessment('assessment-missing', assignedSurveyor, { damageDescription: 'x', lossAmount: 10 })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('ClaimsWorkflowService.createSettlement', () => {
  it('records a pending payout for the approved amount', async () => {
    const { workflow } = await setup(buildClaim({ status: ClaimStatus.APPROVED, amountApproved: 45000 }));

    const settlement = await workflow.createSettlement('claim-1', officer, SettlementMethod.UPI, {
      holderName: 'Test Holder',
    });

    expect(settlement).toMatchObject({
      claimId: 'claim-1',
      settlementAmount: 45000,
      method: SettlementMethod.UPI,
      accountHolderName: 'Test Holder',
      bankAccountNumber: '',
      approvedBy: 'user-officer',
      status: SettlementStatus.PENDING,
      processedAt: null,
    });
  });

  it('requires an approved claim with an approved amount', async () => {
    const underReview = await setup(buildClaim({ status: ClaimStatus.UNDER_REVIEW }));
    await expect(underReview.workflow.createSettlement('claim-1', officer)).rejects.toBeInstanceOf(InvalidStateError);

    const noAmount = await setup(buildClaim({ status: ClaimStatus.APPROVED }));
    await expect(noAmount.workflow.createSettlement('claim-1', officer)).rejects.toBeInstanceOf(PreconditionError);
  });

  it('refuses a second settlement for the same claim', async () => {
    const { store, workflow } = await setup(buildClaim({ status: ClaimStatus.APPROVED, amountApproved: 45000 }));
    await workflow.createSettlement('claim-1', officer);

    await expect(workflow.createSettlement('claim-1', officer)).rejects.toThrow(
      new InvalidStateError('Claim CLM-20260101-0000ABCD already has a pending settlement')
    );
    expect(await store.listSettlements('claim-1')).toHaveLength(1);
  });
});

describe('ClaimsWorkflowService.getSlaStatus', () => {
  it('counts calendar days for an open claim against its tier', async () => {
    const { workflow } = await setup();

    expect(await workflow.getSlaStatus('claim-1')).toEqual({
      status: 'IN_PROGRESS',
      daysElapsed: 3,
      daysRemaining: 12,
      withinSla: true,
      slaDays: 15,
    });
  });

  it('reports an overdue claim', async () => {
    const { workflow } = await setup(buildClaim(), '2026-01-30T08:00:00.000Z');

    expect(await workflow.getSlaStatus('claim-1')).toEqual({
      status: 'IN_PROGRESS',
      daysElapsed: 28,
      daysRemaining: 0,
      withinSla: false,
      slaDays: 15,
    });
  });

  it('falls back to the configured SLA outside every tier', async () => {
    const { workflow } = await setup(buildClaim({ amountRequested: 500000 }));

    expect((await workflow.getSlaStatus('claim-1')).slaDays).toBe(15);
  });

  it('measures finished claims from submission to outcome', async () => {
    const rejected = await setup(
      buildClaim({ status: ClaimStatus.REJECTED, rejectedAt: new Date('2026-01-12T09:00:00.000Z') })
    );
    const settled = await setup(
      buildClaim({ status: ClaimStatus.SETTLED, settledAt: new Date('2026-02-01T09:00:00.000Z') })
    );
    const closed = await setup(buildClaim({ status: ClaimStatus.CLOSED }));

    expect(await rejected.workflow.getSlaStatus('claim-1')).toEqual({
      status: 'COMPLETED',
      processingDays: 10,
      withinSla: true,
      slaDays: 15,
    });
    expect(await settled.workflow.getSlaStatus('claim-1')).toEqual({
      status: 'COMPLETED',
      processingDays: 30,
      withinSla: false,
      slaDays: 15,
    });
    expect(await closed.workflow.getSlaStatus('claim-1')).toEqual({
      status: 'COMPLETED',
      processingDays: 0,
      withinSla: true,
      slaDays: 15,
    });
  });
});

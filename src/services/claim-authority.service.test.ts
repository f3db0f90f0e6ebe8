import { describe, expect, it } from 'vitest';
import { actor, buildClaim, buildThreshold, standardThresholds } from '../test-utils';
import { Role } from '../types/auth.types';
import { ApprovalLevel } from '../types/engine.types';
import { ClaimAuthorityResolver, hasRole, highestRank } from './claim-authority.service';

const resolver = new ClaimAuthorityResolver();

describe('ClaimAuthorityResolver.resolveThreshold', () => {
  it('places a 50,000 claim in the manager tier', () => {
    const resolved = resolver.resolveThreshold(buildClaim(), standardThresholds());

    expect(resolved.approvalLevel).toBe(ApprovalLevel.MANAGER_APPROVAL);
    expect(resolved.requiredRole).toBe(Role.MANAGER);
    expect(resolved.maxProcessingDays).toBe(15);
    expect(resolved.threshold?.id).toBe('thr-2');
  });

  it('treats both tier bounds as inclusive', () => {
    expect(resolver.resolveThreshold(buildClaim({ amountRequested: 10000 }), standardThresholds()).requiredRole).toBe(
      Role.OFFICER
    );
    expect(resolver.resolveThreshold(buildClaim({ amountRequested: 10001 }), standardThresholds()).requiredRole).toBe(
      Role.MANAGER
    );
  });

  it('requires the highest role when no tier covers the amount', () => {
    const resolved = resolver.resolveThreshold(buildClaim({ amountRequested: 250000 }), standardThresholds());

    expect(resolved).toEqual({ threshold: null, approvalLevel: null, requiredRole: Role.ADMIN, maxProcessingDays: null });
  });

  it('ignores inactive tiers and tiers of other insurance types', () => {
    const thresholds = [
      buildThreshold({ id: 'inactive', maxClaimAmount: 100000, isActive: false }),
      buildThreshold({ id: 'health', insuranceTypeId: 'type-health', maxClaimAmount: 100000 }),
    ];

    expect(resolver.resolveThreshold(buildClaim(), thresholds).threshold).toBeNull();
  });

  it('picks the tier with the lowest minimum when tiers overlap', () => {
    const thresholds = [
      buildThreshold({ id: 'wide', minClaimAmount: 20000, maxClaimAmount: 200000, requiredApproverRole: Role.DIRECTOR }),
      buildThreshold({ id: 'narrow', minClaimAmount: 10000, maxClaimAmount: 60000, requiredApproverRole: Role.MANAGER }),
    ];

    expect(resolver.resolveThreshold(buildClaim(), thresholds).threshold?.id).toBe('narrow');
  });
});

describe('ClaimAuthorityResolver.canApprove', () => {
  const claim = buildClaim();

  it('requires the tier role or a higher one', () => {
    expect(resolver.canApprove(actor(Role.OFFICER), claim, standardThresholds())).toBe(false);
    expect(resolver.canApprove(actor(Role.MANAGER), claim, standardThresholds())).toBe(true);
    expect(resolver.canApprove(actor(Role.DIRECTOR), claim, standardThresholds())).toBe(true);
    expect(resolver.canApprove(actor(Role.ADMIN), claim, standardThresholds())).toBe(true);
  });

  it('judges an actor by their strongest role', () => {
    const dual = { userId: 'u-1', roles: [Role.SURVEYOR, Role.MANAGER] };
    expect(resolver.canApprove(dual, claim, standardThresholds())).toBe(true);
  });
});

describe('role ranking', () => {
  it('ranks an actor without roles below every role', () => {
    expect(highestRank([])).toBe(-1);
    expect(hasRole({ userId: 'u-1', roles: [] }, Role.CUSTOMER)).toBe(false);
  });
});

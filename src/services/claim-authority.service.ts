import { Actor, HIGHEST_ROLE, ROLE_RANK, Role } from '../types/auth.types';
import { ApprovalLevel, Claim, ClaimApprovalThreshold } from '../types/engine.types';

export interface ResolvedAuthority {
  /** null when no active threshold covers the requested amount */
  threshold: ClaimApprovalThreshold | null;
  approvalLevel: ApprovalLevel | null;
  requiredRole: Role;
  maxProcessingDays: number | null;
}

export const highestRank = (roles: readonly Role[]): number =>
  roles.reduce((best, role) => Math.max(best, ROLE_RANK[role]), -1);

export const hasRole = (actor: Actor, role: Role): boolean => highestRank(actor.roles) >= ROLE_RANK[role];

/**
 * Maps a claim to its approval tier. A claim that falls outside every
 * configured tier can only be approved by the highest role.
 */
export class ClaimAuthorityResolver {
  resolveThreshold(claim: Claim, thresholds: ClaimApprovalThreshold[]): ResolvedAuthority {
    const amount = claim.amountRequested;
    const threshold = thresholds
      .filter(
        (candidate) =>
          candidate.isActive &&
          candidate.insuranceTypeId === claim.insuranceTypeId &&
          candidate.minClaimAmount <= amount &&
          candidate.maxClaimAmount >= amount
      )
      .sort((a, b) => a.minClaimAmount - b.minClaimAmount)[0];

    if (!threshold) {
      return { threshold: null, approvalLevel: null, requiredRole: HIGHEST_ROLE, maxProcessingDays: null };
    }
    return {
      threshold,
      approvalLevel: threshold.approvalLevel,
      requiredRole: threshold.requiredApproverRole,
      maxProcessingDays: threshold.maxProcessingDays,
    };
  }

  canApprove(actor: Actor, claim: Claim, thresholds: ClaimApprovalThreshold[]): boolean {
    return hasRole(actor, this.resolveThreshold(claim, thresholds).requiredRole);
  }
}

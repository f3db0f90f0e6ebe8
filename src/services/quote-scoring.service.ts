import { EngineConfig } from '../config/engine.config';
import {
  CoverageType,
  InsuranceCompany,
  PremiumBreakdown,
  QuoteScores,
  QuoteScoringWeight,
  ScoringFactor,
} from '../types/engine.types';
import { roundTo } from '../utils/money';

/*
 * score = 0.40 * affordability + 0.30 * claim ratio
 *       + 0.20 * coverage      + 0.10 * service rating
 *
 * Every component is on a 0-100 scale before weighting.
 */
export const DEFAULT_WEIGHTS: Readonly<Record<ScoringFactor, number>> = Object.freeze({
  [ScoringFactor.AFFORDABILITY]: 0.4,
  [ScoringFactor.CLAIM_RATIO]: 0.3,
  [ScoringFactor.COVERAGE]: 0.2,
  [ScoringFactor.SERVICE_RATING]: 0.1,
});

const MANDATORY_SHARE = 60;
const OPTIONAL_SHARE = 40;

export interface ScoreInputs {
  breakdown: PremiumBreakdown;
  insurer: InsuranceCompany;
  selectedCoverageIds: string[];
  /** Every coverage type of the application's insurance type */
  coverageTypes: CoverageType[];
  annualIncome: number | null;
  budgetMin: number | null;
  budgetMax: number | null;
  /** Consulted only when per-type weights are enabled */
  weights?: QuoteScoringWeight[];
}

export class QuoteScoringEngine {
  constructor(private readonly config: EngineConfig) {}

  score(inputs: ScoreInputs): QuoteScores {
    const affordability = this.affordabilityScore(
      inputs.breakdown.totalPremium,
      inputs.annualIncome,
      inputs.budgetMin,
      inputs.budgetMax
    );
    const claimRatio = this.claimRatioScore(inputs.insurer.claimSettlementRatio);
    const coverage = this.coverageScore(inputs.selectedCoverageIds, inputs.coverageTypes);
    const serviceRating = this.serviceRatingScore(inputs.insurer.serviceRating);

    const weights = this.resolveWeights(inputs.weights ?? []);
    const weighted =
      weights[ScoringFactor.AFFORDABILITY] * affordability +
      weights[ScoringFactor.CLAIM_RATIO] * claimRatio +
      weights[ScoringFactor.COVERAGE] * coverage +
      weights[ScoringFactor.SERVICE_RATING] * serviceRating;

    return {
      overall: roundTo(Math.min(100, Math.max(0, weighted)), 2),
      affordability: roundTo(affordability, 2),
      claimRatio: roundTo(claimRatio, 2),
      coverage: roundTo(coverage, 2),
      serviceRating: roundTo(serviceRating, 2),
    };
  }

  /**
   * Budget fit first; annual income banding when no budget range was given;
   * neutral 50 when neither is known.
   */
  affordabilityScore(
    premium: number,
    annualIncome: number | null,
    budgetMin: number | null,
    budgetMax: number | null
  ): number {
    if (budgetMin !== null && budgetMax !== null) {
      if (premium >= budgetMin && premium <= budgetMax) {
        const rangeSize = budgetMax - budgetMin;
        if (rangeSize > 0) {
          const position = (premium - budgetMin) / rangeSize;
          return 100 - position * 20;
        }
        return 90;
      }
      if (premium < budgetMin) {
        // Cheaper than expected: possibly under-covered
        return 70;
      }
      const overagePct = ((premium - budgetMax) / budgetMax) * 100;
      if (overagePct <= 10) return 60;
      if (overagePct <= 25) return 40;
      return 20;
    }

    if (annualIncome !== null && annualIncome > 0) {
      const premiumPct = (premium / annualIncome) * 100;
      if (premiumPct <= 3) return 100;
      if (premiumPct <= 5) return 90;
      if (premiumPct <= 8) return 75;
      if (premiumPct <= 12) return 55;
      if (premiumPct <= 15) return 35;
      return 15;
    }

    return 50;
  }

  claimRatioScore(ratio: number): number {
    if (ratio >= 0.95) return 100;
    if (ratio >= 0.92) return 90;
    if (ratio >= 0.9) return 85;
    if (ratio >= 0.85) return 70;
    if (ratio >= 0.8) return 55;
    if (ratio >= 0.75) return 40;
    return 25;
  }

  coverageScore(selectedCoverageIds: string[], coverageTypes: CoverageType[]): number {
    const selected = new Set(selectedCoverageIds);
    const mandatory = coverageTypes.filter((coverage) => coverage.isMandatory);
    const optional = coverageTypes.filter((coverage) => !coverage.isMandatory);

    const share = (items: CoverageType[], full: number): number => {
      if (items.length === 0) return full;
      const picked = items.filter((coverage) => selected.has(coverage.id)).length;
      return (picked / items.length) * full;
    };

    return share(mandatory, MANDATORY_SHARE) + share(optional, OPTIONAL_SHARE);
  }

  serviceRatingScore(rating: number): number {
    return (rating / 5) * 100;
  }

  generateRationale(scores: QuoteScores, insurerName: string): string {
    const reasons: string[] = [];

    if (scores.affordability >= 80) {
      reasons.push('fits well within your budget');
    } else if (scores.affordability >= 60) {
      reasons.push('reasonably priced');
    }

    if (scores.claimRatio >= 85) {
      reasons.push(`${insurerName} has an excellent claim settlement record`);
    } else if (scores.claimRatio >= 70) {
      reasons.push(`${insurerName} has a good claim settlement ratio`);
    }

    if (scores.coverage >= 80) {
      reasons.push('provides comprehensive coverage');
    } else if (scores.coverage >= 60) {
      reasons.push('covers all essential needs');
    }

    if (scores.serviceRating >= 80) {
      reasons.push('highly rated for customer service');
    }

    if (reasons.length === 0) {
      reasons.push('balanced option for your requirements');
    }

    return `This quote ${reasons.join(', ')}.`;
  }

  private resolveWeights(overrides: QuoteScoringWeight[]): Record<ScoringFactor, number> {
    const weights = { ...DEFAULT_WEIGHTS };
    if (!this.config.useTypeWeights) {
      return weights;
    }
    for (const factor of Object.values(ScoringFactor)) {
      const override = overrides.find((weight) => weight.isActive && weight.factorName === factor);
      if (override) {
        weights[factor] = override.weight;
      }
    }
    return weights;
  }
}

import { EngineConfig } from '../config/engine.config';
import {
  AppliedDiscount,
  Application,
  CoverageType,
  Customer,
  DiscountRule,
  PremiumBreakdown,
  PremiumSlab,
  RiderAddon,
  RiskCategory,
} from '../types/engine.types';
import { isWithinDateWindow } from '../utils/dates';
import { capAmount, percentOf, roundMoney } from '../utils/money';
import logger from '../utils/logger';
import { RuleContext, buildRuleContext, evaluateCondition, parseRuleCondition } from './rule-condition';

/** Used when no active slab covers the requested amount. */
export const FALLBACK_PREMIUM_RATE = 2;

export interface PremiumInputs {
  application: Application;
  customer: Customer;
  coverages: CoverageType[];
  addons: RiderAddon[];
  slabs: PremiumSlab[];
  discountRules: DiscountRule[];
  /** Date the discount windows and customer facts are evaluated on */
  asOf: Date;
}

export interface DiscountOutcome {
  applied: AppliedDiscount[];
  total: number;
}

export class PremiumCalculator {
  constructor(private readonly config: EngineConfig) {}

  computeBreakdown(inputs: PremiumInputs): PremiumBreakdown {
    const { application, customer } = inputs;
    const coverageAmount = application.requestedCoverageAmount;

    const slab = this.findSlab(inputs.slabs, application.insuranceTypeId, coverageAmount);
    const basePremium = slab
      ? roundMoney(slab.basePremium + (coverageAmount * slab.percentageMarkup) / 100)
      : percentOf(coverageAmount, FALLBACK_PREMIUM_RATE);

    const coveragePremium = roundMoney(
      inputs.coverages.reduce((sum, coverage) => sum + coverage.basePremiumPerUnit, 0)
    );
    const addonPremium = this.calculateAddonPremium(inputs.addons, basePremium);
    const subtotal = roundMoney(basePremium + coveragePremium + addonPremium);

    const riskPercentage = customer.riskProfile?.overallRiskPercentage ?? 0;
    const riskCategory = customer.riskProfile?.riskCategory ?? RiskCategory.MEDIUM;
    const riskAdjustment = percentOf(subtotal, riskPercentage);

    const context = buildRuleContext(customer, inputs.asOf);
    const discounts = this.evaluateDiscountRules(
      inputs.discountRules,
      application.insuranceTypeId,
      subtotal,
      context
    );

    const fleetDiscountPercentage = this.fleetDiscountPercentage(customer);
    const fleetDiscount = percentOf(subtotal, fleetDiscountPercentage);

    const netPremium = Math.max(0, roundMoney(subtotal + riskAdjustment - discounts.total - fleetDiscount));
    const gstRate = this.config.gstRate;
    const gstAmount = percentOf(netPremium, gstRate);
    const totalPremium = roundMoney(netPremium + gstAmount);

    logger.debug(
      {
        applicationId: application.id,
        slabId: slab?.id ?? null,
        subtotal,
        riskAdjustment,
        totalDiscount: discounts.total,
        fleetDiscount,
        totalPremium,
      },
      'Premium calculated'
    );

    return {
      coverageAmount,
      slabId: slab?.id ?? null,
      basePremium,
      coveragePremium,
      addonPremium,
      subtotal,
      riskPercentage,
      riskCategory,
      riskAdjustment,
      discounts: discounts.applied,
      totalDiscount: discounts.total,
      fleetDiscountPercentage,
      fleetDiscount,
      netPremium,
      gstRate,
      gstAmount,
      totalPremium,
    };
  }

  /** Active slab of the type whose inclusive range holds the amount; lowest range first if several do. */
  findSlab(slabs: PremiumSlab[], insuranceTypeId: string, coverageAmount: number): PremiumSlab | undefined {
    return slabs
      .filter(
        (slab) =>
          slab.isActive &&
          slab.insuranceTypeId === insuranceTypeId &&
          slab.minCoverageAmount <= coverageAmount &&
          slab.maxCoverageAmount >= coverageAmount
      )
      .sort((a, b) => a.minCoverageAmount - b.minCoverageAmount)[0];
  }

  calculateAddonPremium(addons: RiderAddon[], basePremium: number): number {
    const total = addons.reduce((sum, addon) => {
      return sum + capAmount(percentOf(basePremium, addon.premiumPercentage), addon.maxCoverageLimit);
    }, 0);
    return roundMoney(total);
  }

  /**
   * Combinable discounts add up. The best non-combinable discount replaces
   * that sum only when it is strictly larger; on a tie the combinable set is
   * kept.
   */
  evaluateDiscountRules(
    rules: DiscountRule[],
    insuranceTypeId: string,
    subtotal: number,
    context: RuleContext
  ): DiscountOutcome {
    const candidates = rules
      .filter(
        (rule) =>
          rule.isActive &&
          (rule.insuranceTypeId === null || rule.insuranceTypeId === insuranceTypeId) &&
          isWithinDateWindow(context.today, rule.effectiveFrom, rule.effectiveTo)
      )
      .sort((a, b) => b.priority - a.priority || a.code.localeCompare(b.code));

    const matched: AppliedDiscount[] = [];
    for (const rule of candidates) {
      if (!evaluateCondition(parseRuleCondition(rule.condition, rule.name), context)) {
        continue;
      }
      const amount = capAmount(percentOf(subtotal, rule.discountPercentage), rule.discountMaxAmount);
      matched.push({
        ruleCode: rule.code,
        ruleName: rule.name,
        percentage: rule.discountPercentage,
        amount,
        isCombinable: rule.isCombinable,
      });
    }

    const combinable = matched.filter((discount) => discount.isCombinable);
    const combinableTotal = roundMoney(combinable.reduce((sum, discount) => sum + discount.amount, 0));

    // First in priority order wins among equal amounts
    const bestExclusive = matched
      .filter((discount) => !discount.isCombinable)
      .reduce<AppliedDiscount | undefined>((best, discount) => (!best || discount.amount > best.amount ? discount : best), undefined);

    if (bestExclusive && bestExclusive.amount > combinableTotal) {
      return { applied: [bestExclusive], total: bestExclusive.amount };
    }
    return { applied: combinable, total: combinableTotal };
  }

  /** From the customer's first active fleet; a fleet without a risk score gives none. */
  fleetDiscountPercentage(customer: Customer): number {
    const fleet = customer.fleets.find((candidate) => candidate.isActive);
    return fleet?.discountPercentage ?? 0;
  }
}

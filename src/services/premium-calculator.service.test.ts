import { describe, expect, it } from 'vitest';
import {
  buildApplication,
  buildCoverage,
  buildCustomer,
  buildDiscountRule,
  buildSlab,
  riskProfile,
  testConfig,
  TYPE_ID,
} from '../test-utils';
import { DiscountRule, PremiumSlab, RiderAddon } from '../types/engine.types';
import { PremiumCalculator, PremiumInputs } from './premium-calculator.service';
import { buildRuleContext } from './rule-condition';

const TODAY = new Date('2026-03-01T00:00:00.000Z');
const calculator = new PremiumCalculator(testConfig());

const slabs: PremiumSlab[] = [
  buildSlab({ id: 'slab-1', minCoverageAmount: 0, maxCoverageAmount: 100000, basePremium: 1500, percentageMarkup: 1.5 }),
  buildSlab(),
];

const inputs = (overrides: Partial<PremiumInputs> = {}): PremiumInputs => ({
  application: buildApplication(),
  customer: buildCustomer(),
  coverages: [],
  addons: [],
  slabs,
  discountRules: [],
  asOf: TODAY,
  ...overrides,
});

const addon = (premiumPercentage: number, maxCoverageLimit: number | null): RiderAddon => ({
  id: `addon-${premiumPercentage}`,
  insuranceTypeId: TYPE_ID,
  name: `Add-on ${premiumPercentage}`,
  premiumPercentage,
  maxCoverageLimit,
});

describe('PremiumCalculator.computeBreakdown', () => {
  it('prices the base premium from the matching slab', () => {
    const breakdown = calculator.computeBreakdown(inputs());

    expect(breakdown.slabId).toBe('slab-2');
    expect(breakdown.basePremium).toBe(6100);
    expect(breakdown.subtotal).toBe(6100);
    expect(breakdown.netPremium).toBe(6100);
    expect(breakdown.gstAmount).toBe(1098);
    expect(breakdown.totalPremium).toBe(7198);
  });

  it('falls back to 2% of the coverage amount without a slab', () => {
    const breakdown = calculator.computeBreakdown(
      inputs({ application: buildApplication({ requestedCoverageAmount: 600000 }) })
    );

    expect(breakdown.slabId).toBeNull();
    expect(breakdown.basePremium).toBe(12000);
  });

  it('ignores inactive slabs', () => {
    const breakdown = calculator.computeBreakdown(inputs({ slabs: [buildSlab({ isActive: false })] }));
    expect(breakdown.slabId).toBeNull();
    expect(breakdown.basePremium).toBe(6000);
  });

  it('adds coverage premiums and applies risk and fleet adjustments', () => {
    const breakdown = calculator.computeBreakdown(
      inputs({
        coverages: [
          buildCoverage({ basePremiumPerUnit: 1200 }),
          buildCoverage({ id: 'cov-tp', basePremiumPerUnit: 800 }),
        ],
        customer: buildCustomer({
          riskProfile: riskProfile(10),
          fleets: [{ id: 'f1', name: 'North', isActive: true, totalVehicles: 3, discountPercentage: 5 }],
        }),
      })
    );

    expect(breakdown.coveragePremium).toBe(2000);
    expect(breakdown.subtotal).toBe(8100);
    expect(breakdown.riskAdjustment).toBe(810);
    expect(breakdown.fleetDiscountPercentage).toBe(5);
    expect(breakdown.fleetDiscount).toBe(405);
    expect(breakdown.netPremium).toBe(8505);
    expect(breakdown.gstAmount).toBe(1530.9);
    expect(breakdown.totalPremium).toBe(10035.9);
  });

  it('defaults the risk category to MEDIUM without a profile', () => {
    expect(calculator.computeBreakdown(inputs()).riskCategory).toBe('MEDIUM');
  });

  it('never lets the net premium go below zero', () => {
    const breakdown = calculator.computeBreakdown(
      inputs({
        discountRules: [
          buildDiscountRule({ code: 'FULL', discountPercentage: 100 }),
          buildDiscountRule({ id: 'disc-2', code: 'HALF', discountPercentage: 50 }),
        ],
      })
    );

    expect(breakdown.totalDiscount).toBe(9150);
    expect(breakdown.netPremium).toBe(0);
    expect(breakdown.gstAmount).toBe(0);
    expect(breakdown.totalPremium).toBe(0);
  });

  it('raises the premium with the coverage amount inside one slab', () => {
    const totals = [150000, 300000, 450000].map(
      (amount) =>
        calculator.computeBreakdown(inputs({ application: buildApplication({ requestedCoverageAmount: amount }) }))
          .totalPremium
    );

    expect(totals[0]).toBeLessThan(totals[1]);
    expect(totals[1]).toBeLessThan(totals[2]);
  });

  it('uses the configured GST rate', () => {
    const breakdown = new PremiumCalculator(testConfig({ gstRate: 12 })).computeBreakdown(inputs());
    expect(breakdown.gstRate).toBe(12);
    expect(breakdown.gstAmount).toBe(732);
  });
});

describe('PremiumCalculator.calculateAddonPremium', () => {
  it('charges a share of the base premium, capped per add-on', () => {
    expect(calculator.calculateAddonPremium([addon(15, 2000)], 6100)).toBe(915);
    expect(calculator.calculateAddonPremium([addon(50, 2000)], 6100)).toBe(2000);
    expect(calculator.calculateAddonPremium([addon(15, 2000), addon(50, 2000), addon(2, null)], 6100)).toBe(3037);
  });

  it('treats a zero limit as no cap', () => {
    expect(calculator.calculateAddonPremium([addon(15, 0)], 6100)).toBe(915);
  });
});

describe('PremiumCalculator.evaluateDiscountRules', () => {
  const ruleContext = buildRuleContext(buildCustomer(), TODAY);

  const fleetLarge = buildDiscountRule({
    id: 'd-fleet',
    code: 'FLEET_LARGE',
    name: 'Fleet Discount Large',
    discountPercentage: 15,
    priority: 30,
    isCombinable: false,
  });
  const earlyBird = buildDiscountRule({ id: 'd-early', code: 'EARLY_BIRD', name: 'Early Bird', priority: 10 });
  const noClaim = buildDiscountRule({
    id: 'd-noclaim',
    code: 'NO_CLAIM',
    name: 'No Claim',
    discountPercentage: 10,
    priority: 20,
  });

  it('keeps the combinable set when a non-combinable discount only ties it', () => {
    const outcome = calculator.evaluateDiscountRules([fleetLarge, earlyBird, noClaim], TYPE_ID, 6000, ruleContext);

    expect(outcome.total).toBe(900);
    expect(outcome.applied.map((discount) => discount.ruleCode)).toEqual(['NO_CLAIM', 'EARLY_BIRD']);
  });

  it('lets a strictly larger non-combinable discount replace the combinable sum', () => {
    const larger: DiscountRule = { ...fleetLarge, discountPercentage: 20 };
    const outcome = calculator.evaluateDiscountRules([larger, earlyBird, noClaim], TYPE_ID, 6000, ruleContext);

    expect(outcome.total).toBe(1200);
    expect(outcome.applied).toEqual([
      { ruleCode: 'FLEET_LARGE', ruleName: 'Fleet Discount Large', percentage: 20, amount: 1200, isCombinable: false },
    ]);
  });

  it('caps each discount individually', () => {
    const capped = { ...noClaim, discountMaxAmount: 500 };
    const outcome = calculator.evaluateDiscountRules([capped, earlyBird], TYPE_ID, 6000, ruleContext);

    expect(outcome.applied.map((discount) => discount.amount)).toEqual([500, 300]);
    expect(outcome.total).toBe(800);
  });

  it('leaves a discount with a zero maximum uncapped', () => {
    const uncapped = { ...noClaim, discountMaxAmount: 0 };
    const outcome = calculator.evaluateDiscountRules([uncapped, earlyBird], TYPE_ID, 6000, ruleContext);

    expect(outcome.applied.map((discount) => discount.amount)).toEqual([600, 300]);
    expect(outcome.total).toBe(900);
  });

  it('skips rules that are inactive, out of their window, or for another type', () => {
    const rules = [
      { ...earlyBird, isActive: false },
      { ...noClaim, effectiveTo: new Date('2026-02-28T00:00:00.000Z') },
      buildDiscountRule({ id: 'd-health', code: 'HEALTH', insuranceTypeId: 'type-health' }),
      buildDiscountRule({ id: 'd-any', code: 'ANY_TYPE', insuranceTypeId: null, discountPercentage: 1 }),
    ];
    const outcome = calculator.evaluateDiscountRules(rules, TYPE_ID, 6000, ruleContext);

    expect(outcome.applied.map((discount) => discount.ruleCode)).toEqual(['ANY_TYPE']);
    expect(outcome.total).toBe(60);
  });

  it('includes a rule on the last day of its window', () => {
    const rule = { ...earlyBird, effectiveFrom: new Date('2026-02-01T00:00:00.000Z'), effectiveTo: TODAY };
    expect(calculator.evaluateDiscountRules([rule], TYPE_ID, 6000, ruleContext).total).toBe(300);
  });

  it('skips rules whose condition the customer does not meet', () => {
    const rule = { ...fleetLarge, condition: { min_fleet_size: 2 } };
    const outcome = calculator.evaluateDiscountRules([rule, earlyBird], TYPE_ID, 6000, ruleContext);

    expect(outcome.applied.map((discount) => discount.ruleCode)).toEqual(['EARLY_BIRD']);
  });
});

describe('PremiumCalculator.fleetDiscountPercentage', () => {
  it('reads the first active fleet and treats an unscored fleet as no discount', () => {
    const scored = buildCustomer({
      fleets: [
        { id: 'f0', name: 'Closed', isActive: false, totalVehicles: 1, discountPercentage: 9 },
        { id: 'f1', name: 'North', isActive: true, totalVehicles: 3, discountPercentage: 4 },
      ],
    });
    const unscored = buildCustomer({
      fleets: [{ id: 'f1', name: 'North', isActive: true, totalVehicles: 3, discountPercentage: null }],
    });

    expect(calculator.fleetDiscountPercentage(scored)).toBe(4);
    expect(calculator.fleetDiscountPercentage(unscored)).toBe(0);
  });
});

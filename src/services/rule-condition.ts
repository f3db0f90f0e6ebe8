import { z } from 'zod';
import { Customer, CustomerClaimHistory } from '../types/engine.types';
import { ageOn } from '../utils/dates';
import { ValidationError } from '../utils/errors';
import logger from '../utils/logger';

/**
 * Conditions attached to discount and eligibility rules.
 *
 * Configuration management stores them as loose JSON
 * (`{"min_fleet_size": 5, "age_range": [25, 60]}`); they are parsed once into
 * this tree and evaluated by `evaluateCondition`.
 */
export type RuleCondition =
  | { kind: 'minFleetSize'; size: number }
  | { kind: 'maxClaimRatio'; ratio: number }
  | { kind: 'minYearsNoClaim'; years: number }
  | { kind: 'ageRange'; min: number; max: number }
  | { kind: 'minAge'; age: number }
  | { kind: 'maxAge'; age: number }
  | { kind: 'minIncome'; amount: number }
  | { kind: 'and'; conditions: RuleCondition[] };

/** Facts about one customer that conditions are evaluated against. */
export interface RuleContext {
  today: Date;
  customerAge: number | null;
  annualIncome: number | null;
  activeFleetCount: number;
  claimHistories: CustomerClaimHistory[];
}

const rawConditionSchema = z
  .object({
    min_fleet_size: z.number().int().nonnegative(),
    max_claim_ratio: z.number().nonnegative(),
    min_years_no_claim: z.number().int().nonnegative(),
    age_range: z
      .tuple([z.number().nonnegative(), z.number().nonnegative()])
      .refine(([min, max]) => min <= max, { message: 'age_range minimum exceeds maximum' }),
    min_age: z.number().nonnegative(),
    max_age: z.number().nonnegative(),
    min_income: z.number().nonnegative(),
  })
  .partial()
  .passthrough();

const KNOWN_KEYS = new Set(Object.keys(rawConditionSchema.shape));

export const ALWAYS: RuleCondition = { kind: 'and', conditions: [] };

export function parseRuleCondition(raw: unknown, ruleName: string): RuleCondition {
  if (raw === null || raw === undefined) {
    return ALWAYS;
  }

  const parsed = rawConditionSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'condition'}: ${issue.message}`);
    throw new ValidationError(`Rule "${ruleName}" has a malformed condition (${detail.join('; ')})`);
  }

  const fields = parsed.data;
  const unknownKeys = Object.keys(fields).filter((key) => !KNOWN_KEYS.has(key));
  if (unknownKeys.length > 0) {
    logger.debug({ ruleName, unknownKeys }, 'Ignoring unsupported rule condition keys');
  }

  const conditions: RuleCondition[] = [];
  if (fields.min_fleet_size !== undefined) {
    conditions.push({ kind: 'minFleetSize', size: fields.min_fleet_size });
  }
  if (fields.max_claim_ratio !== undefined) {
    conditions.push({ kind: 'maxClaimRatio', ratio: fields.max_claim_ratio });
  }
  if (fields.min_years_no_claim !== undefined) {
    conditions.push({ kind: 'minYearsNoClaim', years: fields.min_years_no_claim });
  }
  if (fields.age_range !== undefined) {
    const [min, max] = fields.age_range;
    conditions.push({ kind: 'ageRange', min, max });
  }
  if (fields.min_age !== undefined) {
    conditions.push({ kind: 'minAge', age: fields.min_age });
  }
  if (fields.max_age !== undefined) {
    conditions.push({ kind: 'maxAge', age: fields.max_age });
  }
  if (fields.min_income !== undefined) {
    conditions.push({ kind: 'minIncome', amount: fields.min_income });
  }

  return { kind: 'and', conditions };
}

function latestHistory(histories: CustomerClaimHistory[]): CustomerClaimHistory | undefined {
  return histories.reduce<CustomerClaimHistory | undefined>(
    (latest, history) => (!latest || history.claimYear > latest.claimYear ? history : latest),
    undefined
  );
}

/**
 * Facts the context does not know (no birth date, no income, no claim
 * history) never fail a condition.
 */
export function evaluateCondition(condition: RuleCondition, context: RuleContext): boolean {
  switch (condition.kind) {
    case 'and':
      return condition.conditions.every((child) => evaluateCondition(child, context));
    case 'minFleetSize':
      return context.activeFleetCount >= condition.size;
    case 'maxClaimRatio': {
      const latest = latestHistory(context.claimHistories);
      return !latest || latest.claimRejectionRate / 100 <= condition.ratio;
    }
    case 'minYearsNoClaim': {
      const sinceYear = context.today.getUTCFullYear() - condition.years;
      return !context.claimHistories.some((history) => history.claimYear >= sinceYear && history.claimCount > 0);
    }
    case 'ageRange':
      return (
        context.customerAge === null ||
        (context.customerAge >= condition.min && context.customerAge <= condition.max)
      );
    case 'minAge':
      return context.customerAge === null || context.customerAge >= condition.age;
    case 'maxAge':
      return context.customerAge === null || context.customerAge <= condition.age;
    case 'minIncome':
      return context.annualIncome === null || context.annualIncome >= condition.amount;
    default: {
      const unhandled: never = condition;
      throw new Error(`Unhandled rule condition ${JSON.stringify(unhandled)}`);
    }
  }
}

export function buildRuleContext(customer: Customer, today: Date): RuleContext {
  return {
    today,
    customerAge: ageOn(customer.dateOfBirth, today),
    annualIncome: customer.annualIncome,
    activeFleetCount: customer.fleets.filter((fleet) => fleet.isActive).length,
    claimHistories: customer.claimHistories,
  };
}

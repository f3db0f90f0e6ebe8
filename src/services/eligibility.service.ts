import { EngineStore } from '../models/store';
import { Application, Customer, EligibilityRule } from '../types/engine.types';
import { Clock, systemClock } from '../utils/clock';
import { NotFoundError } from '../utils/errors';
import logger from '../utils/logger';
import { buildRuleContext, evaluateCondition, parseRuleCondition } from './rule-condition';

export interface EligibilityFailure {
  rule: string;
  message: string;
}

export interface EligibilityResult {
  eligible: boolean;
  failures: EligibilityFailure[];
}

/** Every active rule of the application's type, highest priority first. */
export function evaluateEligibility(
  application: Application,
  customer: Customer,
  rules: EligibilityRule[],
  today: Date
): EligibilityResult {
  const context = buildRuleContext(customer, today);
  const failures = rules
    .filter((rule) => rule.isActive && rule.insuranceTypeId === application.insuranceTypeId)
    .sort((a, b) => b.priority - a.priority || a.name.localeCompare(b.name))
    .filter((rule) => !evaluateCondition(parseRuleCondition(rule.condition, rule.name), context))
    .map((rule) => ({ rule: rule.name, message: rule.errorMessage }));

  return { eligible: failures.length === 0, failures };
}

export class EligibilityService {
  constructor(
    private readonly store: EngineStore,
    private readonly clock: Clock = systemClock
  ) {}

  async check(applicationId: string): Promise<EligibilityResult> {
    const application = await this.store.getApplication(applicationId);
    if (!application) {
      throw new NotFoundError('Application', applicationId);
    }
    const customer = await this.store.getCustomer(application.customerId);
    if (!customer) {
      throw new NotFoundError('Customer', application.customerId);
    }

    const rules = await this.store.listEligibilityRules(application.insuranceTypeId);
    const result = evaluateEligibility(application, customer, rules, this.clock());
    logger.info({ applicationId, eligible: result.eligible, failures: result.failures.length }, 'Eligibility evaluated');
    return result;
  }
}

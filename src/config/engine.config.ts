import { BusinessConfigEntry } from '../types/engine.types';
import logger from '../utils/logger';

/**
 * Business parameters resolved once from the configuration store and handed to
 * each engine component at construction.
 */
export interface EngineConfig {
  /** Percentage applied to the net premium */
  gstRate: number;
  quoteValidityDays: number;
  claimSlaDays: number;
  recommendationCount: number;
  /** Read per-insurance-type scoring weights instead of the fixed defaults */
  useTypeWeights: boolean;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  gstRate: 18,
  quoteValidityDays: 30,
  claimSlaDays: 15,
  recommendationCount: 3,
  useTypeWeights: false,
});

const KEYS = {
  GST_RATE: 'GST_RATE',
  QUOTE_VALIDITY_DAYS: 'QUOTE_VALIDITY_DAYS',
  CLAIM_SLA_DAYS: 'CLAIM_SLA_DAYS',
  RECOMMENDATION_COUNT: 'RECOMMENDATION_COUNT',
  USE_TYPE_SCORING_WEIGHTS: 'USE_TYPE_SCORING_WEIGHTS',
} as const;

function readNumber(
  values: Map<string, string>,
  key: string,
  fallback: number,
  integer: boolean
): number {
  const raw = values.get(key);
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || (integer && !Number.isInteger(parsed))) {
    logger.warn({ key, value: raw, fallback }, 'Ignoring malformed business configuration value');
    return fallback;
  }
  return parsed;
}

export function loadEngineConfig(
  entries: BusinessConfigEntry[],
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const values = new Map(entries.filter((entry) => entry.isActive).map((entry) => [entry.key, entry.value]));
  const defaults = DEFAULT_ENGINE_CONFIG;

  return {
    gstRate: readNumber(values, KEYS.GST_RATE, defaults.gstRate, false),
    quoteValidityDays: readNumber(values, KEYS.QUOTE_VALIDITY_DAYS, defaults.quoteValidityDays, true),
    claimSlaDays: readNumber(values, KEYS.CLAIM_SLA_DAYS, defaults.claimSlaDays, true),
    recommendationCount: readNumber(values, KEYS.RECOMMENDATION_COUNT, defaults.recommendationCount, true),
    useTypeWeights: values.get(KEYS.USE_TYPE_SCORING_WEIGHTS)?.toLowerCase() === 'true',
    ...overrides,
  };
}

import { EngineConfig, loadEngineConfig } from './config/engine.config';
import { EngineStore } from './models/store';
import { ClaimsWorkflowService } from './services/claims-workflow.service';
import { EligibilityService } from './services/eligibility.service';
import { QuoteLifecycleService } from './services/quote-lifecycle.service';
import { QuoteRankingService } from './services/quote-ranking.service';
import { Clock, systemClock } from './utils/clock';

export interface Engine {
  store: EngineStore;
  config: EngineConfig;
  quotes: QuoteRankingService;
  quoteLifecycle: QuoteLifecycleService;
  claims: ClaimsWorkflowService;
  eligibility: EligibilityService;
}

export function createEngine(store: EngineStore, config: EngineConfig, clock: Clock = systemClock): Engine {
  return {
    store,
    config,
    quotes: new QuoteRankingService(store, config, clock),
    quoteLifecycle: new QuoteLifecycleService(store, clock),
    claims: new ClaimsWorkflowService(store, config, clock),
    eligibility: new EligibilityService(store, clock),
  };
}

/** Resolves business parameters from the store once, then wires the services. */
export async function bootstrapEngine(
  store: EngineStore,
  overrides: Partial<EngineConfig> = {},
  clock: Clock = systemClock
): Promise<Engine> {
  const entries = await store.listBusinessConfiguration();
  return createEngine(store, loadEngineConfig(entries, overrides), clock);
}

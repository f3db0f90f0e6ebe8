import {
  Application,
  BusinessConfigEntry,
  Claim,
  ClaimApprovalThreshold,
  ClaimAssessment,
  ClaimPatch,
  ClaimSettlement,
  ClaimStatusHistory,
  CoverageType,
  Customer,
  DiscountRule,
  EligibilityRule,
  InsuranceCompany,
  PremiumSlab,
  Quote,
  QuoteRecommendation,
  QuoteScoringWeight,
  RiderAddon,
} from '../types/engine.types';
import { ConflictError, NotFoundError } from '../utils/errors';
import { EngineStore, EngineTransaction } from './store';

export interface CatalogData {
  applications: Application[];
  customers: Customer[];
  insurers: InsuranceCompany[];
  coverageTypes: CoverageType[];
  riderAddons: RiderAddon[];
  premiumSlabs: PremiumSlab[];
  discountRules: DiscountRule[];
  eligibilityRules: EligibilityRule[];
  scoringWeights: QuoteScoringWeight[];
  approvalThresholds: ClaimApprovalThreshold[];
  businessConfiguration: BusinessConfigEntry[];
}

interface RecordTables {
  quotes: Map<string, Quote>;
  recommendations: Map<string, QuoteRecommendation>;
  claims: Map<string, Claim>;
  history: Map<string, ClaimStatusHistory>;
  assessments: Map<string, ClaimAssessment>;
  settlements: Map<string, ClaimSettlement>;
}

const emptyCatalog = (): CatalogData => ({
  applications: [],
  customers: [],
  insurers: [],
  coverageTypes: [],
  riderAddons: [],
  premiumSlabs: [],
  discountRules: [],
  eligibilityRules: [],
  scoringWeights: [],
  approvalThresholds: [],
  businessConfiguration: [],
});

const emptyTables = (): RecordTables => ({
  quotes: new Map(),
  recommendations: new Map(),
  claims: new Map(),
  history: new Map(),
  assessments: new Map(),
  settlements: new Map(),
});

const copy = <T>(value: T): T => structuredClone(value);

function requireRow<T>(table: Map<string, T>, entity: string, id: string): T {
  const row = table.get(id);
  if (!row) {
    throw new NotFoundError(entity, id);
  }
  return row;
}

/** Reads and writes against one set of tables; every value crossing it is copied. */
class MemoryView implements EngineTransaction {
  constructor(
    private readonly catalog: CatalogData,
    private readonly tables: RecordTables
  ) {}

  async getApplication(id: string) {
    return copy(this.catalog.applications.find((application) => application.id === id));
  }

  async getCustomer(id: string) {
    return copy(this.catalog.customers.find((customer) => customer.id === id));
  }

  async listActiveInsurers() {
    return copy(
      this.catalog.insurers.filter((insurer) => insurer.isActive).sort((a, b) => a.id.localeCompare(b.id))
    );
  }

  async getInsurer(id: string) {
    return copy(this.catalog.insurers.find((insurer) => insurer.id === id));
  }

  async listCoverageTypes(insuranceTypeId: string) {
    return copy(this.catalog.coverageTypes.filter((coverage) => coverage.insuranceTypeId === insuranceTypeId));
  }

  async listRiderAddons(insuranceTypeId: string) {
    return copy(this.catalog.riderAddons.filter((addon) => addon.insuranceTypeId === insuranceTypeId));
  }

  async listPremiumSlabs(insuranceTypeId: string) {
    return copy(this.catalog.premiumSlabs.filter((slab) => slab.insuranceTypeId === insuranceTypeId));
  }

  async listDiscountRules(insuranceTypeId: string) {
    return copy(
      this.catalog.discountRules.filter(
        (rule) => rule.insuranceTypeId === null || rule.insuranceTypeId === insuranceTypeId
      )
    );
  }

  async listEligibilityRules(insuranceTypeId: string) {
    return copy(this.catalog.eligibilityRules.filter((rule) => rule.insuranceTypeId === insuranceTypeId));
  }

  async listScoringWeights(insuranceTypeId: string) {
    return copy(this.catalog.scoringWeights.filter((weight) => weight.insuranceTypeId === insuranceTypeId));
  }

  async listApprovalThresholds(insuranceTypeId: string) {
    return copy(
      this.catalog.approvalThresholds.filter((threshold) => threshold.insuranceTypeId === insuranceTypeId)
    );
  }

  async listBusinessConfiguration() {
    return copy(this.catalog.businessConfiguration);
  }

  async getQuote(id: string) {
    return copy(this.tables.quotes.get(id));
  }

  async listQuotes(applicationId: string) {
    return copy([...this.tables.quotes.values()].filter((quote) => quote.applicationId === applicationId));
  }

  async listRecommendations(applicationId: string) {
    return copy(
      [...this.tables.recommendations.values()]
        .filter((recommendation) => recommendation.applicationId === applicationId)
        .sort((a, b) => a.rank - b.rank)
    );
  }

  async getClaim(id: string) {
    return copy(this.tables.claims.get(id));
  }

  async listClaimHistory(claimId: string) {
    return copy([...this.tables.history.values()].filter((entry) => entry.claimId === claimId));
  }

  async getAssessment(id: string) {
    return copy(this.tables.assessments.get(id));
  }

  async listAssessments(claimId: string) {
    return copy([...this.tables.assessments.values()].filter((assessment) => assessment.claimId === claimId));
  }

  async listSettlements(claimId: string) {
    return copy([...this.tables.settlements.values()].filter((settlement) => settlement.claimId === claimId));
  }

  async insertQuote(quote: Quote) {
    this.tables.quotes.set(quote.id, copy(quote));
    return copy(quote);
  }

  async updateQuote(id: string, patch: Partial<Omit<Quote, 'id'>>) {
    const updated = { ...requireRow(this.tables.quotes, 'Quote', id), ...copy(patch) };
    this.tables.quotes.set(id, updated);
    return copy(updated);
  }

  async deleteRecommendations(applicationId: string) {
    let deleted = 0;
    for (const [id, recommendation] of this.tables.recommendations) {
      if (recommendation.applicationId === applicationId) {
        this.tables.recommendations.delete(id);
        deleted += 1;
      }
    }
    return deleted;
  }

  async insertRecommendation(recommendation: QuoteRecommendation) {
    this.tables.recommendations.set(recommendation.id, copy(recommendation));
    return copy(recommendation);
  }

  async insertClaim(claim: Claim) {
    this.tables.claims.set(claim.id, copy(claim));
    return copy(claim);
  }

  async updateClaim(id: string, expectedVersion: number, patch: ClaimPatch) {
    const current = requireRow(this.tables.claims, 'Claim', id);
    if (current.version !== expectedVersion) {
      throw new ConflictError(`Claim ${id} was modified concurrently`);
    }
    const updated: Claim = { ...current, ...copy(patch), version: current.version + 1 };
    this.tables.claims.set(id, updated);
    return copy(updated);
  }

  async insertClaimHistory(entry: ClaimStatusHistory) {
    this.tables.history.set(entry.id, copy(entry));
    return copy(entry);
  }

  async insertAssessment(assessment: ClaimAssessment) {
    this.tables.assessments.set(assessment.id, copy(assessment));
    return copy(assessment);
  }

  async updateAssessment(id: string, patch: Partial<Omit<ClaimAssessment, 'id' | 'claimId'>>) {
    const updated = { ...requireRow(this.tables.assessments, 'Assessment', id), ...copy(patch) };
    this.tables.assessments.set(id, updated);
    return copy(updated);
  }

  async insertSettlement(settlement: ClaimSettlement) {
    this.tables.settlements.set(settlement.id, copy(settlement));
    return copy(settlement);
  }

  async updateSettlement(id: string, patch: Partial<Omit<ClaimSettlement, 'id' | 'claimId'>>) {
    const updated = { ...requireRow(this.tables.settlements, 'Settlement', id), ...copy(patch) };
    this.tables.settlements.set(id, updated);
    return copy(updated);
  }
}

/**
 * In-process store. Transactions run one at a time against a private copy of
 * the engine-owned tables, which replaces the committed copy only when the
 * work resolves.
 */
export class MemoryStore implements EngineStore {
  private catalog: CatalogData;
  private committed: RecordTables = emptyTables();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(catalog: Partial<CatalogData> = {}) {
    this.catalog = emptyCatalog();
    this.seedCatalog(catalog);
  }

  /** Adds configuration and inbound records, as configuration management would. */
  seedCatalog(data: Partial<CatalogData>): void {
    const current = this.catalog;
    const add = <T>(rows: T[], extra: T[] | undefined): T[] => (extra ? [...rows, ...copy(extra)] : rows);

    this.catalog = {
      applications: add(current.applications, data.applications),
      customers: add(current.customers, data.customers),
      insurers: add(current.insurers, data.insurers),
      coverageTypes: add(current.coverageTypes, data.coverageTypes),
      riderAddons: add(current.riderAddons, data.riderAddons),
      premiumSlabs: add(current.premiumSlabs, data.premiumSlabs),
      discountRules: add(current.discountRules, data.discountRules),
      eligibilityRules: add(current.eligibilityRules, data.eligibilityRules),
      scoringWeights: add(current.scoringWeights, data.scoringWeights),
      approvalThresholds: add(current.approvalThresholds, data.approvalThresholds),
      businessConfiguration: add(current.businessConfiguration, data.businessConfiguration),
    };
  }

  transaction<T>(work: (tx: EngineTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const draft = copy(this.committed);
      const result = await work(new MemoryView(this.catalog, draft));
      this.committed = draft;
      return result;
    });
    // The caller sees the failure through `run`; the queue only orders work.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private get view(): MemoryView {
    return new MemoryView(this.catalog, this.committed);
  }

  getApplication(id: string) {
    return this.view.getApplication(id);
  }

  getCustomer(id: string) {
    return this.view.getCustomer(id);
  }

  listActiveInsurers() {
    return this.view.listActiveInsurers();
  }

  getInsurer(id: string) {
    return this.view.getInsurer(id);
  }

  listCoverageTypes(insuranceTypeId: string) {
    return this.view.listCoverageTypes(insuranceTypeId);
  }

  listRiderAddons(insuranceTypeId: string) {
    return this.view.listRiderAddons(insuranceTypeId);
  }

  listPremiumSlabs(insuranceTypeId: string) {
    return this.view.listPremiumSlabs(insuranceTypeId);
  }

  listDiscountRules(insuranceTypeId: string) {
    return this.view.listDiscountRules(insuranceTypeId);
  }

  listEligibilityRules(insuranceTypeId: string) {
    return this.view.listEligibilityRules(insuranceTypeId);
  }

  listScoringWeights(insuranceTypeId: string) {
    return this.view.listScoringWeights(insuranceTypeId);
  }

  listApprovalThresholds(insuranceTypeId: string) {
    return this.view.listApprovalThresholds(insuranceTypeId);
  }

  listBusinessConfiguration() {
    return this.view.listBusinessConfiguration();
  }

  getQuote(id: string) {
    return this.view.getQuote(id);
  }

  listQuotes(applicationId: string) {
    return this.view.listQuotes(applicationId);
  }

  listRecommendations(applicationId: string) {
    return this.view.listRecommendations(applicationId);
  }

  getClaim(id: string) {
    return this.view.getClaim(id);
  }

  listClaimHistory(claimId: string) {
    return this.view.listClaimHistory(claimId);
  }

  getAssessment(id: string) {
    return this.view.getAssessment(id);
  }

  listAssessments(claimId: string) {
    return this.view.listAssessments(claimId);
  }

  listSettlements(claimId: string) {
    return this.view.listSettlements(claimId);
  }
}

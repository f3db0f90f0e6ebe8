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

/** Configuration and inbound records. The engine never writes these. */
export interface CatalogReader {
  getApplication(id: string): Promise<Application | undefined>;
  getCustomer(id: string): Promise<Customer | undefined>;
  listActiveInsurers(): Promise<InsuranceCompany[]>;
  getInsurer(id: string): Promise<InsuranceCompany | undefined>;
  listCoverageTypes(insuranceTypeId: string): Promise<CoverageType[]>;
  listRiderAddons(insuranceTypeId: string): Promise<RiderAddon[]>;
  listPremiumSlabs(insuranceTypeId: string): Promise<PremiumSlab[]>;
  /** Rules for the given type plus rules with no type. */
  listDiscountRules(insuranceTypeId: string): Promise<DiscountRule[]>;
  listEligibilityRules(insuranceTypeId: string): Promise<EligibilityRule[]>;
  listScoringWeights(insuranceTypeId: string): Promise<QuoteScoringWeight[]>;
  listApprovalThresholds(insuranceTypeId: string): Promise<ClaimApprovalThreshold[]>;
  listBusinessConfiguration(): Promise<BusinessConfigEntry[]>;
}

/** Records owned by the engine. */
export interface RecordReader {
  getQuote(id: string): Promise<Quote | undefined>;
  listQuotes(applicationId: string): Promise<Quote[]>;
  listRecommendations(applicationId: string): Promise<QuoteRecommendation[]>;
  getClaim(id: string): Promise<Claim | undefined>;
  listClaimHistory(claimId: string): Promise<ClaimStatusHistory[]>;
  getAssessment(id: string): Promise<ClaimAssessment | undefined>;
  listAssessments(claimId: string): Promise<ClaimAssessment[]>;
  listSettlements(claimId: string): Promise<ClaimSettlement[]>;
}

export interface RecordWriter {
  insertQuote(quote: Quote): Promise<Quote>;
  updateQuote(id: string, patch: Partial<Omit<Quote, 'id'>>): Promise<Quote>;
  deleteRecommendations(applicationId: string): Promise<number>;
  insertRecommendation(recommendation: QuoteRecommendation): Promise<QuoteRecommendation>;
  insertClaim(claim: Claim): Promise<Claim>;
  /**
   * Applies the patch only if the stored version still equals
   * `expectedVersion`, bumping it by one. Throws ConflictError otherwise.
   */
  updateClaim(id: string, expectedVersion: number, patch: ClaimPatch): Promise<Claim>;
  insertClaimHistory(entry: ClaimStatusHistory): Promise<ClaimStatusHistory>;
  insertAssessment(assessment: ClaimAssessment): Promise<ClaimAssessment>;
  updateAssessment(id: string, patch: Partial<Omit<ClaimAssessment, 'id' | 'claimId'>>): Promise<ClaimAssessment>;
  insertSettlement(settlement: ClaimSettlement): Promise<ClaimSettlement>;
  updateSettlement(id: string, patch: Partial<Omit<ClaimSettlement, 'id' | 'claimId'>>): Promise<ClaimSettlement>;
}

export interface EngineTransaction extends CatalogReader, RecordReader, RecordWriter {}

export interface EngineStore extends CatalogReader, RecordReader {
  /**
   * Runs `work` atomically: every write inside it becomes visible together
   * when it resolves, and none does if it throws.
   */
  transaction<T>(work: (tx: EngineTransaction) => Promise<T>): Promise<T>;
  close?(): Promise<void>;
}

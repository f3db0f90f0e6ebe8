import { Role } from './auth.types';

// ---------------------------------------------------------------------------
// Catalog & configuration (read-only to the engine)
// ---------------------------------------------------------------------------

export interface InsuranceCompany {
  id: string;
  code: string;
  name: string;
  /** Fraction of claims settled, 0..1 */
  claimSettlementRatio: number;
  /** 0..5 */
  serviceRating: number;
  isActive: boolean;
}

export interface CoverageType {
  id: string;
  insuranceTypeId: string;
  name: string;
  isMandatory: boolean;
  basePremiumPerUnit: number;
}

export interface RiderAddon {
  id: string;
  insuranceTypeId: string;
  name: string;
  premiumPercentage: number;
  maxCoverageLimit: number | null;
}

export interface PremiumSlab {
  id: string;
  insuranceTypeId: string;
  name: string;
  minCoverageAmount: number;
  maxCoverageAmount: number;
  basePremium: number;
  percentageMarkup: number;
  isActive: boolean;
}

export interface DiscountRule {
  id: string;
  code: string;
  name: string;
  /** null applies to every insurance type */
  insuranceTypeId: string | null;
  /** Raw JSON condition as stored by configuration management */
  condition: unknown;
  discountPercentage: number;
  discountMaxAmount: number | null;
  priority: number;
  isCombinable: boolean;
  isActive: boolean;
  effectiveFrom: Date | null;
  effectiveTo: Date | null;
}

export interface EligibilityRule {
  id: string;
  insuranceTypeId: string;
  name: string;
  condition: unknown;
  priority: number;
  errorMessage: string;
  isActive: boolean;
}

export enum ScoringFactor {
  AFFORDABILITY = 'affordability',
  CLAIM_RATIO = 'claim_ratio',
  COVERAGE = 'coverage',
  SERVICE_RATING = 'service_rating',
}

export interface QuoteScoringWeight {
  insuranceTypeId: string;
  factorName: string;
  weight: number;
  isActive: boolean;
}

export enum ApprovalLevel {
  AUTO_APPROVE = 'AUTO_APPROVE',
  OFFICER_APPROVAL = 'OFFICER_APPROVAL',
  MANAGER_APPROVAL = 'MANAGER_APPROVAL',
  DIRECTOR_APPROVAL = 'DIRECTOR_APPROVAL',
}

export interface ClaimApprovalThreshold {
  id: string;
  insuranceTypeId: string;
  approvalLevel: ApprovalLevel;
  minClaimAmount: number;
  maxClaimAmount: number;
  requiredApproverRole: Role;
  maxProcessingDays: number;
  isActive: boolean;
}

export interface BusinessConfigEntry {
  key: string;
  value: string;
  isActive: boolean;
}

// ---------------------------------------------------------------------------
// Applications & customers (inbound)
// ---------------------------------------------------------------------------

export enum ApplicationStatus {
  DRAFT = 'DRAFT',
  SUBMITTED = 'SUBMITTED',
  UNDER_REVIEW = 'UNDER_REVIEW',
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
}

export interface Application {
  id: string;
  applicationNumber: string;
  customerId: string;
  insuranceTypeId: string;
  status: ApplicationStatus;
  requestedCoverageAmount: number;
  policyTenureMonths: number;
  budgetMin: number | null;
  budgetMax: number | null;
}

export enum RiskCategory {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
}

export interface CustomerRiskProfile {
  overallRiskPercentage: number;
  riskCategory: RiskCategory;
}

export interface Fleet {
  id: string;
  name: string;
  isActive: boolean;
  totalVehicles: number;
  /** Discount from the fleet's risk score; null when the fleet was never scored */
  discountPercentage: number | null;
}

export interface CustomerClaimHistory {
  claimYear: number;
  claimCount: number;
  /** Percentage, 0..100 */
  claimRejectionRate: number;
}

export interface Customer {
  id: string;
  email: string;
  dateOfBirth: Date | null;
  annualIncome: number | null;
  riskProfile: CustomerRiskProfile | null;
  fleets: Fleet[];
  claimHistories: CustomerClaimHistory[];
}

// ---------------------------------------------------------------------------
// Quotes (outbound)
// ---------------------------------------------------------------------------

export interface AppliedDiscount {
  ruleCode: string;
  ruleName: string;
  percentage: number;
  amount: number;
  isCombinable: boolean;
}

export interface PremiumBreakdown {
  coverageAmount: number;
  slabId: string | null;
  basePremium: number;
  coveragePremium: number;
  addonPremium: number;
  subtotal: number;
  riskPercentage: number;
  riskCategory: RiskCategory;
  riskAdjustment: number;
  discounts: AppliedDiscount[];
  totalDiscount: number;
  fleetDiscountPercentage: number;
  fleetDiscount: number;
  netPremium: number;
  gstRate: number;
  gstAmount: number;
  totalPremium: number;
}

export interface QuoteScores {
  overall: number;
  affordability: number;
  claimRatio: number;
  coverage: number;
  serviceRating: number;
}

export enum QuoteStatus {
  GENERATED = 'GENERATED',
  SENT = 'SENT',
  ACCEPTED = 'ACCEPTED',
  REJECTED = 'REJECTED',
  EXPIRED = 'EXPIRED',
}

export interface Quote {
  id: string;
  quoteNumber: string;
  applicationId: string;
  customerId: string;
  insuranceTypeId: string;
  insurerId: string;
  status: QuoteStatus;
  breakdown: PremiumBreakdown;
  scores: QuoteScores;
  overallScore: number;
  sumInsured: number;
  policyTenureMonths: number;
  coverageIds: string[];
  addonIds: string[];
  validityDays: number;
  generatedAt: Date;
  expiryAt: Date;
  generatedBy: string | null;
  sentAt: Date | null;
  acceptedAt: Date | null;
  rejectedAt: Date | null;
}

export interface QuoteRecommendation {
  id: string;
  applicationId: string;
  customerId: string;
  insuranceTypeId: string;
  quoteId: string;
  rank: number;
  reason: string;
  suitabilityScore: number;
  affordabilityScore: number;
  claimRatioScore: number;
  coverageScore: number;
  serviceRatingScore: number;
  createdAt: Date;
}

// ---------------------------------------------------------------------------
// Claims (outbound)
// ---------------------------------------------------------------------------

export enum ClaimStatus {
  SUBMITTED = 'SUBMITTED',
  UNDER_REVIEW = 'UNDER_REVIEW',
  SURVEYOR_ASSIGNED = 'SURVEYOR_ASSIGNED',
  UNDER_INVESTIGATION = 'UNDER_INVESTIGATION',
  ASSESSED = 'ASSESSED',
  APPROVED = 'APPROVED',
  REJECTED = 'REJECTED',
  SETTLED = 'SETTLED',
  CLOSED = 'CLOSED',
}

export enum ClaimType {
  ACCIDENT = 'ACCIDENT',
  THEFT = 'THEFT',
  NATURAL_DISASTER = 'NATURAL_DISASTER',
  MEDICAL = 'MEDICAL',
  DEATH = 'DEATH',
  DAMAGE = 'DAMAGE',
  LIABILITY = 'LIABILITY',
  OTHER = 'OTHER',
}

export interface Claim {
  id: string;
  claimNumber: string;
  policyId: string;
  customerId: string;
  insuranceTypeId: string;
  claimType: ClaimType;
  description: string;
  incidentDate: Date;
  amountRequested: number;
  amountApproved: number | null;
  amountSettled: number | null;
  status: ClaimStatus;
  rejectionReason: string | null;
  submittedAt: Date;
  reviewStartedAt: Date | null;
  approvedAt: Date | null;
  rejectedAt: Date | null;
  settledAt: Date | null;
  closedAt: Date | null;
  submittedBy: string | null;
  reviewedBy: string | null;
  settledBy: string | null;
  /** Incremented on every write; guards concurrent transitions */
  version: number;
}

export type ClaimPatch = Partial<Omit<Claim, 'id' | 'claimNumber' | 'amountRequested' | 'version'>>;

export interface ClaimStatusHistory {
  id: string;
  claimId: string;
  oldStatus: ClaimStatus;
  newStatus: ClaimStatus;
  changedBy: string;
  reason: string;
  ipAddress: string | null;
  userAgent: string | null;
  changedAt: Date;
}

export enum AssessmentStatus {
  PENDING = 'PENDING',
  COMPLETED = 'COMPLETED',
}

export interface ClaimAssessment {
  id: string;
  claimId: string;
  surveyorId: string;
  assessmentDate: Date;
  damageAssessment: string;
  lossAmountAssessed: number | null;
  deductibleApplicable: number | null;
  netClaimAmount: number | null;
  findings: Record<string, unknown>;
  status: AssessmentStatus;
  completedAt: Date | null;
}

export enum SettlementMethod {
  BANK_TRANSFER = 'BANK_TRANSFER',
  CHEQUE = 'CHEQUE',
  UPI = 'UPI',
}

export enum SettlementStatus {
  PENDING = 'PENDING',
  PROCESSED = 'PROCESSED',
  FAILED = 'FAILED',
}

export interface BankDetails {
  accountNumber?: string;
  bankName?: string;
  ifscCode?: string;
  holderName?: string;
}

export interface ClaimSettlement {
  id: string;
  claimId: string;
  settlementAmount: number;
  method: SettlementMethod;
  bankAccountNumber: string;
  bankName: string;
  bankIfscCode: string;
  accountHolderName: string;
  approvedBy: string;
  status: SettlementStatus;
  createdAt: Date;
  processedAt: Date | null;
}

// ---------------------------------------------------------------------------
// Request context
// ---------------------------------------------------------------------------

export interface RequestMetadata {
  ipAddress?: string | null;
  userAgent?: string | null;
}

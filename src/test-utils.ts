import { DEFAULT_ENGINE_CONFIG, EngineConfig } from './config/engine.config';
import { MemoryStore } from './models/memory.store';
import { Actor, Role } from './types/auth.types';
import {
  Application,
  ApplicationStatus,
  ApprovalLevel,
  Claim,
  ClaimApprovalThreshold,
  ClaimStatus,
  ClaimType,
  CoverageType,
  Customer,
  DiscountRule,
  InsuranceCompany,
  PremiumBreakdown,
  PremiumSlab,
  Quote,
  QuoteStatus,
  RiskCategory,
} from './types/engine.types';
import { Clock } from './utils/clock';

export const TYPE_ID = 'type-motor';

export const fixedClock =
  (iso: string): Clock =>
  () =>
    new Date(iso);

export const testConfig = (overrides: Partial<EngineConfig> = {}): EngineConfig => ({
  ...DEFAULT_ENGINE_CONFIG,
  ...overrides,
});

export const actor = (role: Role, userId = `user-${role.toLowerCase()}`): Actor => ({
  userId,
  email: `${role.toLowerCase()}@example.com`,
  roles: [role],
});

export const buildInsurer = (overrides: Partial<InsuranceCompany> = {}): InsuranceCompany => ({
  id: 'ins-a',
  code: 'INS_A',
  name: 'Insurer A',
  claimSettlementRatio: 0.97,
  serviceRating: 4.8,
  isActive: true,
  ...overrides,
});

export const buildCoverage = (overrides: Partial<CoverageType> = {}): CoverageType => ({
  id: 'cov-own-damage',
  insuranceTypeId: TYPE_ID,
  name: 'Own Damage',
  isMandatory: true,
  basePremiumPerUnit: 0,
  ...overrides,
});

export const buildSlab = (overrides: Partial<PremiumSlab> = {}): PremiumSlab => ({
  id: 'slab-2',
  insuranceTypeId: TYPE_ID,
  name: '1 to 5 lakh',
  minCoverageAmount: 100001,
  maxCoverageAmount: 500000,
  basePremium: 2500,
  percentageMarkup: 1.2,
  isActive: true,
  ...overrides,
});

export const buildDiscountRule = (overrides: Partial<DiscountRule> = {}): DiscountRule => ({
  id: 'disc-1',
  code: 'DISC_1',
  name: 'Discount 1',
  insuranceTypeId: TYPE_ID,
  condition: null,
  discountPercentage: 5,
  discountMaxAmount: null,
  priority: 0,
  isCombinable: true,
  isActive: true,
  effectiveFrom: null,
  effectiveTo: null,
  ...overrides,
});

export const buildCustomer = (overrides: Partial<Customer> = {}): Customer => ({
  id: 'cust-1',
  email: 'customer@example.com',
  dateOfBirth: new Date('1985-06-15T00:00:00.000Z'),
  annualIncome: 600000,
  riskProfile: null,
  fleets: [],
  claimHistories: [],
  ...overrides,
});

export const buildApplication = (overrides: Partial<Application> = {}): Application => ({
  id: 'app-1',
  applicationNumber: 'APP-0001',
  customerId: 'cust-1',
  insuranceTypeId: TYPE_ID,
  status: ApplicationStatus.APPROVED,
  requestedCoverageAmount: 300000,
  policyTenureMonths: 12,
  budgetMin: null,
  budgetMax: null,
  ...overrides,
});

export const buildThreshold = (overrides: Partial<ClaimApprovalThreshold> = {}): ClaimApprovalThreshold => ({
  id: 'thr-1',
  insuranceTypeId: TYPE_ID,
  approvalLevel: ApprovalLevel.AUTO_APPROVE,
  minClaimAmount: 0,
  maxClaimAmount: 10000,
  requiredApproverRole: Role.OFFICER,
  maxProcessingDays: 7,
  isActive: true,
  ...overrides,
});

/** The two-tier setup: up to 10,000 by an officer, up to 100,000 by a manager. */
export const standardThresholds = (): ClaimApprovalThreshold[] => [
  buildThreshold(),
  buildThreshold({
    id: 'thr-2',
    approvalLevel: ApprovalLevel.MANAGER_APPROVAL,
    minClaimAmount: 10001,
    maxClaimAmount: 100000,
    requiredApproverRole: Role.MANAGER,
    maxProcessingDays: 15,
  }),
];

export const buildClaim = (overrides: Partial<Claim> = {}): Claim => ({
  id: 'claim-1',
  claimNumber: 'CLM-20260101-0000ABCD',
  policyId: 'pol-1',
  customerId: 'cust-1',
  insuranceTypeId: TYPE_ID,
  claimType: ClaimType.ACCIDENT,
  description: 'Front bumper damage',
  incidentDate: new Date('2026-01-01T00:00:00.000Z'),
  amountRequested: 50000,
  amountApproved: null,
  amountSettled: null,
  status: ClaimStatus.SUBMITTED,
  rejectionReason: null,
  submittedAt: new Date('2026-01-02T10:00:00.000Z'),
  reviewStartedAt: null,
  approvedAt: null,
  rejectedAt: null,
  settledAt: null,
  closedAt: null,
  submittedBy: 'cust-1',
  reviewedBy: null,
  settledBy: null,
  version: 1,
  ...overrides,
});

export const riskProfile = (overallRiskPercentage: number, riskCategory = RiskCategory.MEDIUM) => ({
  overallRiskPercentage,
  riskCategory,
});

export async function storeWithClaim(claim: Claim, thresholds = standardThresholds()): Promise<MemoryStore> {
  const store = new MemoryStore({ approvalThresholds: thresholds });
  await store.transaction((tx) => tx.insertClaim(claim));
  return store;
}

export const buildBreakdown = (overrides: Partial<PremiumBreakdown> = {}): PremiumBreakdown => ({
  coverageAmount: 300000,
  slabId: 'slab-2',
  basePremium: 6100,
  coveragePremium: 0,
  addonPremium: 0,
  subtotal: 6100,
  riskPercentage: 0,
  riskCategory: RiskCategory.MEDIUM,
  riskAdjustment: 0,
  discounts: [],
  totalDiscount: 0,
  fleetDiscountPercentage: 0,
  fleetDiscount: 0,
  netPremium: 6100,
  gstRate: 18,
  gstAmount: 1098,
  totalPremium: 7198,
  ...overrides,
});

export const buildQuote = (overrides: Partial<Quote> = {}): Quote => ({
  id: 'quote-1',
  quoteNumber: 'QT-20260101-0000ABCD',
  applicationId: 'app-1',
  customerId: 'cust-1',
  insuranceTypeId: TYPE_ID,
  insurerId: 'ins-a',
  status: QuoteStatus.GENERATED,
  breakdown: buildBreakdown(),
  scores: { overall: 95.6, affordability: 90, claimRatio: 100, coverage: 100, serviceRating: 96 },
  overallScore: 95.6,
  sumInsured: 300000,
  policyTenureMonths: 12,
  coverageIds: ['cov-own-damage'],
  addonIds: [],
  validityDays: 30,
  generatedAt: new Date('2026-01-01T00:00:00.000Z'),
  expiryAt: new Date('2026-01-31T00:00:00.000Z'),
  generatedBy: null,
  sentAt: null,
  acceptedAt: null,
  rejectedAt: null,
  ...overrides,
});

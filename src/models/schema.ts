import { boolean, date, index, integer, jsonb, numeric, pgTable, text, timestamp, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { Role } from '../types/auth.types';
import {
  ApplicationStatus,
  ApprovalLevel,
  AssessmentStatus,
  ClaimStatus,
  ClaimType,
  PremiumBreakdown,
  QuoteScores,
  QuoteStatus,
  RiskCategory,
  SettlementMethod,
  SettlementStatus,
} from '../types/engine.types';

const money = (name: string) => numeric(name, { precision: 14, scale: 2 });

// ============================================
// CATALOG & CONFIGURATION (read-only to the engine)
// ============================================

export const insuranceCompanies = pgTable('insurance_companies', {
  id: text('id').primaryKey(),
  code: text('code').notNull().unique(),
  name: text('name').notNull(),
  claimSettlementRatio: numeric('claim_settlement_ratio', { precision: 5, scale: 4 }).notNull(),
  serviceRating: numeric('service_rating', { precision: 3, scale: 2 }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
});

export const coverageTypes = pgTable('coverage_types', {
  id: text('id').primaryKey(),
  insuranceTypeId: text('insurance_type_id').notNull(),
  name: text('name').notNull(),
  isMandatory: boolean('is_mandatory').notNull().default(false),
  basePremiumPerUnit: money('base_premium_per_unit').notNull(),
});

export const riderAddons = pgTable('rider_addons', {
  id: text('id').primaryKey(),
  insuranceTypeId: text('insurance_type_id').notNull(),
  name: text('name').notNull(),
  premiumPercentage: numeric('premium_percentage', { precision: 6, scale: 2 }).notNull(),
  maxCoverageLimit: money('max_coverage_limit'),
});

export const premiumSlabs = pgTable('premium_slabs', {
  id: text('id').primaryKey(),
  insuranceTypeId: text('insurance_type_id').notNull(),
  name: text('name').notNull(),
  minCoverageAmount: money('min_coverage_amount').notNull(),
  maxCoverageAmount: money('max_coverage_amount').notNull(),
  basePremium: money('base_premium').notNull(),
  percentageMarkup: numeric('percentage_markup', { precision: 6, scale: 3 }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
});

export const discountRules = pgTable('discount_rules', {
  id: text('id').primaryKey(),
  code: text('code').notNull().unique(),
  name: text('name').notNull(),
  insuranceTypeId: text('insurance_type_id'),
  condition: jsonb('condition').$type<unknown>(),
  discountPercentage: numeric('discount_percentage', { precision: 6, scale: 2 }).notNull(),
  discountMaxAmount: money('discount_max_amount'),
  priority: integer('priority').notNull().default(0),
  isCombinable: boolean('is_combinable').notNull().default(true),
  isActive: boolean('is_active').notNull().default(true),
  effectiveFrom: date('effective_from', { mode: 'date' }),
  effectiveTo: date('effective_to', { mode: 'date' }),
});

export const eligibilityRules = pgTable('policy_eligibility_rules', {
  id: text('id').primaryKey(),
  insuranceTypeId: text('insurance_type_id').notNull(),
  name: text('name').notNull(),
  condition: jsonb('condition').$type<unknown>(),
  priority: integer('priority').notNull().default(0),
  errorMessage: text('error_message').notNull(),
  isActive: boolean('is_active').notNull().default(true),
});

export const quoteScoringWeights = pgTable(
  'quote_scoring_weights',
  {
    insuranceTypeId: text('insurance_type_id').notNull(),
    factorName: text('factor_name').notNull(),
    weight: numeric('weight', { precision: 4, scale: 3 }).notNull(),
    isActive: boolean('is_active').notNull().default(true),
  },
  (table) => ({
    typeFactorIdx: uniqueIndex('quote_scoring_weights_type_factor_idx').on(table.insuranceTypeId, table.factorName),
  })
);

export const claimApprovalThresholds = pgTable('claim_approval_thresholds', {
  id: text('id').primaryKey(),
  insuranceTypeId: text('insurance_type_id').notNull(),
  approvalLevel: text('approval_level').$type<ApprovalLevel>().notNull(),
  minClaimAmount: money('min_claim_amount').notNull(),
  maxClaimAmount: money('max_claim_amount').notNull(),
  requiredApproverRole: text('required_approver_role').$type<Role>().notNull(),
  maxProcessingDays: integer('max_processing_days').notNull(),
  isActive: boolean('is_active').notNull().default(true),
});

export const businessConfiguration = pgTable('business_configuration', {
  key: text('config_key').primaryKey(),
  value: text('config_value').notNull(),
  isActive: boolean('is_active').notNull().default(true),
});

// ============================================
// APPLICATIONS & CUSTOMERS (inbound)
// ============================================

export const customers = pgTable('customers', {
  id: text('id').primaryKey(),
  email: text('email').notNull(),
  dateOfBirth: date('date_of_birth', { mode: 'date' }),
  annualIncome: money('annual_income'),
  // Cached risk profile; both null until the customer is scored
  overallRiskPercentage: numeric('overall_risk_percentage', { precision: 6, scale: 2 }),
  riskCategory: text('risk_category').$type<RiskCategory>(),
});

export const fleets = pgTable('fleets', {
  id: text('id').primaryKey(),
  customerId: text('customer_id')
    .notNull()
    .references(() => customers.id),
  name: text('name').notNull(),
  isActive: boolean('is_active').notNull().default(true),
  totalVehicles: integer('total_vehicles').notNull().default(0),
  discountPercentage: numeric('discount_percentage', { precision: 6, scale: 2 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const customerClaimHistories = pgTable('customer_claim_histories', {
  id: uuid('id').primaryKey().defaultRandom(),
  customerId: text('customer_id')
    .notNull()
    .references(() => customers.id),
  claimYear: integer('claim_year').notNull(),
  claimCount: integer('claim_count').notNull().default(0),
  claimRejectionRate: numeric('claim_rejection_rate', { precision: 6, scale: 2 }).notNull().default('0'),
});

export const applications = pgTable('applications', {
  id: text('id').primaryKey(),
  applicationNumber: text('application_number').notNull().unique(),
  customerId: text('customer_id')
    .notNull()
    .references(() => customers.id),
  insuranceTypeId: text('insurance_type_id').notNull(),
  status: text('status').$type<ApplicationStatus>().notNull(),
  requestedCoverageAmount: money('requested_coverage_amount').notNull(),
  policyTenureMonths: integer('policy_tenure_months').notNull(),
  budgetMin: money('budget_min'),
  budgetMax: money('budget_max'),
});

// ============================================
// QUOTES (engine-owned)
// ============================================

export const quotes = pgTable(
  'quotes',
  {
    id: uuid('id').primaryKey(),
    quoteNumber: text('quote_number').notNull().unique(),
    applicationId: text('application_id')
      .notNull()
      .references(() => applications.id),
    customerId: text('customer_id').notNull(),
    insuranceTypeId: text('insurance_type_id').notNull(),
    insurerId: text('insurer_id')
      .notNull()
      .references(() => insuranceCompanies.id),
    status: text('status').$type<QuoteStatus>().notNull(),
    breakdown: jsonb('premium_breakdown').$type<PremiumBreakdown>().notNull(),
    scores: jsonb('scores').$type<QuoteScores>().notNull(),
    overallScore: numeric('overall_score', { precision: 5, scale: 2 }).notNull(),
    sumInsured: money('sum_insured').notNull(),
    policyTenureMonths: integer('policy_tenure_months').notNull(),
    coverageIds: jsonb('coverage_ids').$type<string[]>().notNull(),
    addonIds: jsonb('addon_ids').$type<string[]>().notNull(),
    validityDays: integer('validity_days').notNull(),
    generatedAt: timestamp('generated_at', { withTimezone: true }).notNull(),
    expiryAt: timestamp('expiry_at', { withTimezone: true }).notNull(),
    generatedBy: text('generated_by'),
    sentAt: timestamp('sent_at', { withTimezone: true }),
    acceptedAt: timestamp('accepted_at', { withTimezone: true }),
    rejectedAt: timestamp('rejected_at', { withTimezone: true }),
  },
  (table) => ({
    applicationIdx: index('quotes_application_idx').on(table.applicationId),
  })
);

export const quoteRecommendations = pgTable(
  'quote_recommendations',
  {
    id: uuid('id').primaryKey(),
    applicationId: text('application_id')
      .notNull()
      .references(() => applications.id),
    customerId: text('customer_id').notNull(),
    insuranceTypeId: text('insurance_type_id').notNull(),
    quoteId: uuid('quote_id')
      .notNull()
      .references(() => quotes.id),
    rank: integer('recommendation_rank').notNull(),
    reason: text('recommendation_reason').notNull(),
    suitabilityScore: numeric('suitability_score', { precision: 5, scale: 2 }).notNull(),
    affordabilityScore: numeric('affordability_score', { precision: 5, scale: 2 }).notNull(),
    claimRatioScore: numeric('claim_ratio_score', { precision: 5, scale: 2 }).notNull(),
    coverageScore: numeric('coverage_score', { precision: 5, scale: 2 }).notNull(),
    serviceRatingScore: numeric('service_rating_score', { precision: 5, scale: 2 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    applicationRankIdx: uniqueIndex('quote_recommendations_application_rank_idx').on(table.applicationId, table.rank),
  })
);

// ============================================
// CLAIMS (engine-owned)
// ============================================

export const claims = pgTable('claims', {
  id: text('id').primaryKey(),
  claimNumber: text('claim_number').notNull().unique(),
  policyId: text('policy_id').notNull(),
  customerId: text('customer_id').notNull(),
  insuranceTypeId: text('insurance_type_id').notNull(),
  claimType: text('claim_type').$type<ClaimType>().notNull(),
  description: text('description').notNull(),
  incidentDate: timestamp('incident_date', { withTimezone: true }).notNull(),
  amountRequested: money('amount_requested').notNull(),
  amountApproved: money('amount_approved'),
  amountSettled: money('amount_settled'),
  status: text('status').$type<ClaimStatus>().notNull(),
  rejectionReason: text('rejection_reason'),
  submittedAt: timestamp('submitted_at', { withTimezone: true }).notNull(),
  reviewStartedAt: timestamp('review_started_at', { withTimezone: true }),
  approvedAt: timestamp('approved_at', { withTimezone: true }),
  rejectedAt: timestamp('rejected_at', { withTimezone: true }),
  settledAt: timestamp('settled_at', { withTimezone: true }),
  closedAt: timestamp('closed_at', { withTimezone: true }),
  submittedBy: text('submitted_by'),
  reviewedBy: text('reviewed_by'),
  settledBy: text('settled_by'),
  version: integer('version').notNull().default(1),
});

export const claimStatusHistory = pgTable(
  'claim_status_history',
  {
    id: uuid('id').primaryKey(),
    claimId: text('claim_id')
      .notNull()
      .references(() => claims.id),
    oldStatus: text('old_status').$type<ClaimStatus>().notNull(),
    newStatus: text('new_status').$type<ClaimStatus>().notNull(),
    changedBy: text('changed_by').notNull(),
    reason: text('status_change_reason').notNull(),
    ipAddress: text('ip_address'),
    userAgent: text('user_agent'),
    changedAt: timestamp('changed_at', { withTimezone: true }).notNull(),
  },
  (table) => ({
    claimIdx: index('claim_status_history_claim_idx').on(table.claimId),
  })
);

export const claimAssessments = pgTable('claim_assessments', {
  id: uuid('id').primaryKey(),
  claimId: text('claim_id')
    .notNull()
    .references(() => claims.id),
  surveyorId: text('surveyor_id').notNull(),
  assessmentDate: timestamp('assessment_date', { withTimezone: true }).notNull(),
  damageAssessment: text('damage_assessment').notNull(),
  lossAmountAssessed: money('loss_amount_assessed'),
  deductibleApplicable: money('deductible_applicable'),
  netClaimAmount: money('net_claim_amount'),
  findings: jsonb('assessment_findings').$type<Record<string, unknown>>().notNull(),
  status: text('assessment_status').$type<AssessmentStatus>().notNull(),
  completedAt: timestamp('completed_at', { withTimezone: true }),
});

export const claimSettlements = pgTable('claim_settlements', {
  id: uuid('id').primaryKey(),
  claimId: text('claim_id')
    .notNull()
    .references(() => claims.id),
  settlementAmount: money('settlement_amount').notNull(),
  method: text('settlement_method').$type<SettlementMethod>().notNull(),
  bankAccountNumber: text('bank_account_number').notNull(),
  bankName: text('bank_name').notNull(),
  bankIfscCode: text('bank_ifsc_code').notNull(),
  accountHolderName: text('account_holder_name').notNull(),
  approvedBy: text('settlement_approved_by').notNull(),
  status: text('settlement_status').$type<SettlementStatus>().notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
  processedAt: timestamp('processed_at', { withTimezone: true }),
});

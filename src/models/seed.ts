import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { Role } from '../types/auth.types';
import {
  ApplicationStatus,
  ApprovalLevel,
  Claim,
  ClaimStatus,
  ClaimType,
  RiskCategory,
} from '../types/engine.types';
import logger from '../utils/logger';
import { CatalogData, MemoryStore } from './memory.store';

const DEMO_DATA_FILE = path.join(__dirname, '../../data/demo-catalog.json');

const nullableNumber = z.number().nullable();
const condition = z.union([z.record(z.unknown()), z.null()]).default(null);

const demoSchema = z.object({
  insurers: z.array(
    z.object({
      id: z.string(),
      code: z.string(),
      name: z.string(),
      claimSettlementRatio: z.number().min(0).max(1),
      serviceRating: z.number().min(0).max(5),
      isActive: z.boolean(),
    })
  ),
  coverageTypes: z.array(
    z.object({
      id: z.string(),
      insuranceTypeId: z.string(),
      name: z.string(),
      isMandatory: z.boolean(),
      basePremiumPerUnit: z.number(),
    })
  ),
  riderAddons: z.array(
    z.object({
      id: z.string(),
      insuranceTypeId: z.string(),
      name: z.string(),
      premiumPercentage: z.number(),
      maxCoverageLimit: nullableNumber,
    })
  ),
  premiumSlabs: z.array(
    z.object({
      id: z.string(),
      insuranceTypeId: z.string(),
      name: z.string(),
      minCoverageAmount: z.number(),
      maxCoverageAmount: z.number(),
      basePremium: z.number(),
      percentageMarkup: z.number(),
      isActive: z.boolean(),
    })
  ),
  discountRules: z.array(
    z.object({
      id: z.string(),
      code: z.string(),
      name: z.string(),
      insuranceTypeId: z.string().nullable(),
      condition,
      discountPercentage: z.number(),
      discountMaxAmount: nullableNumber,
      priority: z.number().int(),
      isCombinable: z.boolean(),
      isActive: z.boolean(),
      effectiveFrom: z.coerce.date().nullable(),
      effectiveTo: z.coerce.date().nullable(),
    })
  ),
  eligibilityRules: z.array(
    z.object({
      id: z.string(),
      insuranceTypeId: z.string(),
      name: z.string(),
      condition,
      priority: z.number().int(),
      errorMessage: z.string(),
      isActive: z.boolean(),
    })
  ),
  scoringWeights: z.array(
    z.object({
      insuranceTypeId: z.string(),
      factorName: z.string(),
      weight: z.number().min(0).max(1),
      isActive: z.boolean(),
    })
  ),
  approvalThresholds: z.array(
    z.object({
      id: z.string(),
      insuranceTypeId: z.string(),
      approvalLevel: z.nativeEnum(ApprovalLevel),
      minClaimAmount: z.number(),
      maxClaimAmount: z.number(),
      requiredApproverRole: z.nativeEnum(Role),
      maxProcessingDays: z.number().int(),
      isActive: z.boolean(),
    })
  ),
  businessConfiguration: z.array(z.object({ key: z.string(), value: z.string(), isActive: z.boolean() })),
  customers: z.array(
    z.object({
      id: z.string(),
      email: z.string(),
      dateOfBirth: z.coerce.date().nullable(),
      annualIncome: nullableNumber,
      riskProfile: z
        .object({ overallRiskPercentage: z.number(), riskCategory: z.nativeEnum(RiskCategory) })
        .nullable(),
      fleets: z.array(
        z.object({
          id: z.string(),
          name: z.string(),
          isActive: z.boolean(),
          totalVehicles: z.number().int(),
          discountPercentage: nullableNumber,
        })
      ),
      claimHistories: z.array(
        z.object({ claimYear: z.number().int(), claimCount: z.number().int(), claimRejectionRate: z.number() })
      ),
    })
  ),
  applications: z.array(
    z.object({
      id: z.string(),
      applicationNumber: z.string(),
      customerId: z.string(),
      insuranceTypeId: z.string(),
      status: z.nativeEnum(ApplicationStatus),
      requestedCoverageAmount: z.number(),
      policyTenureMonths: z.number().int(),
      budgetMin: nullableNumber,
      budgetMax: nullableNumber,
    })
  ),
  claims: z.array(
    z.object({
      id: z.string(),
      claimNumber: z.string(),
      policyId: z.string(),
      customerId: z.string(),
      insuranceTypeId: z.string(),
      claimType: z.nativeEnum(ClaimType),
      description: z.string(),
      incidentDate: z.coerce.date(),
      amountRequested: z.number().positive(),
      submittedAt: z.coerce.date(),
      submittedBy: z.string().nullable(),
    })
  ),
});

export type DemoData = z.infer<typeof demoSchema>;

export function loadDemoData(file: string = DEMO_DATA_FILE): DemoData {
  return demoSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}

/** A claim as it arrives from the intake collaborator, before any review. */
export function submittedClaim(input: DemoData['claims'][number]): Claim {
  return {
    ...input,
    amountApproved: null,
    amountSettled: null,
    status: ClaimStatus.SUBMITTED,
    rejectionReason: null,
    reviewStartedAt: null,
    approvedAt: null,
    rejectedAt: null,
    settledAt: null,
    closedAt: null,
    reviewedBy: null,
    settledBy: null,
    version: 1,
  };
}

export async function createDemoStore(file?: string): Promise<MemoryStore> {
  const { claims, ...catalog } = loadDemoData(file);
  const data: CatalogData = catalog;
  const store = new MemoryStore(data);

  await store.transaction(async (tx) => {
    for (const claim of claims) {
      await tx.insertClaim(submittedClaim(claim));
    }
  });

  logger.info(
    { insurers: data.insurers.length, applications: data.applications.length, claims: claims.length },
    'Loaded demo data into the in-process store'
  );
  return store;
}

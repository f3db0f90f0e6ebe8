import { and, asc, eq, isNull, or } from 'drizzle-orm';
import { NodePgQueryResultHKT, drizzle } from 'drizzle-orm/node-postgres';
import { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';
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
import logger from '../utils/logger';
import * as schema from './schema';
import { EngineStore, EngineTransaction } from './store';

type Database = PgDatabase<NodePgQueryResultHKT>;

type QuotePatch = Partial<Omit<Quote, 'id'>>;
type AssessmentPatch = Partial<Omit<ClaimAssessment, 'id' | 'claimId'>>;
type SettlementPatch = Partial<Omit<ClaimSettlement, 'id' | 'claimId'>>;

// node-postgres hands NUMERIC columns back as strings
const num = (value: string): number => Number(value);
const numOrNull = (value: string | null): number | null => (value === null ? null : Number(value));
const str = (value: number): string => value.toString();
const strOrNull = (value: number | null): string | null => (value === null ? null : value.toString());

type QuoteRow = typeof schema.quotes.$inferSelect;
type RecommendationRow = typeof schema.quoteRecommendations.$inferSelect;
type ClaimRow = typeof schema.claims.$inferSelect;
type AssessmentRow = typeof schema.claimAssessments.$inferSelect;
type SettlementRow = typeof schema.claimSettlements.$inferSelect;

const toQuote = (row: QuoteRow): Quote => ({
  ...row,
  overallScore: num(row.overallScore),
  sumInsured: num(row.sumInsured),
});

const toRecommendation = (row: RecommendationRow): QuoteRecommendation => ({
  ...row,
  suitabilityScore: num(row.suitabilityScore),
  affordabilityScore: num(row.affordabilityScore),
  claimRatioScore: num(row.claimRatioScore),
  coverageScore: num(row.coverageScore),
  serviceRatingScore: num(row.serviceRatingScore),
});

const toClaim = (row: ClaimRow): Claim => ({
  ...row,
  amountRequested: num(row.amountRequested),
  amountApproved: numOrNull(row.amountApproved),
  amountSettled: numOrNull(row.amountSettled),
});

const toAssessment = (row: AssessmentRow): ClaimAssessment => ({
  ...row,
  lossAmountAssessed: numOrNull(row.lossAmountAssessed),
  deductibleApplicable: numOrNull(row.deductibleApplicable),
  netClaimAmount: numOrNull(row.netClaimAmount),
});

const toSettlement = (row: SettlementRow): ClaimSettlement => ({
  ...row,
  settlementAmount: num(row.settlementAmount),
});

function quotePatchRow(patch: QuotePatch): Partial<typeof schema.quotes.$inferInsert> {
  const { overallScore, sumInsured, ...rest } = patch;
  return {
    ...rest,
    ...(overallScore !== undefined && { overallScore: str(overallScore) }),
    ...(sumInsured !== undefined && { sumInsured: str(sumInsured) }),
  };
}

function claimPatchRow(patch: ClaimPatch): Partial<typeof schema.claims.$inferInsert> {
  const { amountApproved, amountSettled, ...rest } = patch;
  return {
    ...rest,
    ...(amountApproved !== undefined && { amountApproved: strOrNull(amountApproved) }),
    ...(amountSettled !== undefined && { amountSettled: strOrNull(amountSettled) }),
  };
}

function assessmentPatchRow(patch: AssessmentPatch): Partial<typeof schema.claimAssessments.$inferInsert> {
  const { lossAmountAssessed, deductibleApplicable, netClaimAmount, ...rest } = patch;
  return {
    ...rest,
    ...(lossAmountAssessed !== undefined && { lossAmountAssessed: strOrNull(lossAmountAssessed) }),
    ...(deductibleApplicable !== undefined && { deductibleApplicable: strOrNull(deductibleApplicable) }),
    ...(netClaimAmount !== undefined && { netClaimAmount: strOrNull(netClaimAmount) }),
  };
}

function settlementPatchRow(patch: SettlementPatch): Partial<typeof schema.claimSettlements.$inferInsert> {
  const { settlementAmount, ...rest } = patch;
  return {
    ...rest,
    ...(settlementAmount !== undefined && { settlementAmount: str(settlementAmount) }),
  };
}

function single<T>(rows: T[], entity: string, id: string): T {
  const [row] = rows;
  if (!row) {
    throw new NotFoundError(entity, id);
  }
  return row;
}

/** Read side shared by the store and its transactions. */
class PgReader {
  constructor(protected readonly db: Database) {}

  async getApplication(id: string): Promise<Application | undefined> {
    const [row] = await this.db.select().from(schema.applications).where(eq(schema.applications.id, id));
    if (!row) return undefined;
    return {
      ...row,
      requestedCoverageAmount: num(row.requestedCoverageAmount),
      budgetMin: numOrNull(row.budgetMin),
      budgetMax: numOrNull(row.budgetMax),
    };
  }

  async getCustomer(id: string): Promise<Customer | undefined> {
    const [row] = await this.db.select().from(schema.customers).where(eq(schema.customers.id, id));
    if (!row) return undefined;

    const [fleetRows, historyRows] = await Promise.all([
      this.db
        .select()
        .from(schema.fleets)
        .where(eq(schema.fleets.customerId, id))
        .orderBy(asc(schema.fleets.createdAt)),
      this.db
        .select()
        .from(schema.customerClaimHistories)
        .where(eq(schema.customerClaimHistories.customerId, id)),
    ]);

    return {
      id: row.id,
      email: row.email,
      dateOfBirth: row.dateOfBirth,
      annualIncome: numOrNull(row.annualIncome),
      riskProfile:
        row.overallRiskPercentage !== null && row.riskCategory !== null
          ? { overallRiskPercentage: num(row.overallRiskPercentage), riskCategory: row.riskCategory }
          : null,
      fleets: fleetRows.map((fleet) => ({
        id: fleet.id,
        name: fleet.name,
        isActive: fleet.isActive,
        totalVehicles: fleet.totalVehicles,
        discountPercentage: numOrNull(fleet.discountPercentage),
      })),
      claimHistories: historyRows.map((history) => ({
        claimYear: history.claimYear,
        claimCount: history.claimCount,
        claimRejectionRate: num(history.claimRejectionRate),
      })),
    };
  }

  async listActiveInsurers(): Promise<InsuranceCompany[]> {
    const rows = await this.db
      .select()
      .from(schema.insuranceCompanies)
      .where(eq(schema.insuranceCompanies.isActive, true))
      .orderBy(asc(schema.insuranceCompanies.id));
    return rows.map((row) => this.toInsurer(row));
  }

  async getInsurer(id: string): Promise<InsuranceCompany | undefined> {
    const [row] = await this.db.select().from(schema.insuranceCompanies).where(eq(schema.insuranceCompanies.id, id));
    return row ? this.toInsurer(row) : undefined;
  }

  async listCoverageTypes(insuranceTypeId: string): Promise<CoverageType[]> {
    const rows = await this.db
      .select()
      .from(schema.coverageTypes)
      .where(eq(schema.coverageTypes.insuranceTypeId, insuranceTypeId));
    return rows.map((row) => ({ ...row, basePremiumPerUnit: num(row.basePremiumPerUnit) }));
  }

  async listRiderAddons(insuranceTypeId: string): Promise<RiderAddon[]> {
    const rows = await this.db
      .select()
      .from(schema.riderAddons)
      .where(eq(schema.riderAddons.insuranceTypeId, insuranceTypeId));
    return rows.map((row) => ({
      ...row,
      premiumPercentage: num(row.premiumPercentage),
      maxCoverageLimit: numOrNull(row.maxCoverageLimit),
    }));
  }

  async listPremiumSlabs(insuranceTypeId: string): Promise<PremiumSlab[]> {
    const rows = await this.db
      .select()
      .from(schema.premiumSlabs)
      .where(eq(schema.premiumSlabs.insuranceTypeId, insuranceTypeId));
    return rows.map((row) => ({
      ...row,
      minCoverageAmount: num(row.minCoverageAmount),
      maxCoverageAmount: num(row.maxCoverageAmount),
      basePremium: num(row.basePremium),
      percentageMarkup: num(row.percentageMarkup),
    }));
  }

  async listDiscountRules(insuranceTypeId: string): Promise<DiscountRule[]> {
    const rows = await this.db
      .select()
      .from(schema.discountRules)
      .where(
        or(eq(schema.discountRules.insuranceTypeId, insuranceTypeId), isNull(schema.discountRules.insuranceTypeId))
      );
    return rows.map((row) => ({
      ...row,
      condition: row.condition ?? null,
      discountPercentage: num(row.discountPercentage),
      discountMaxAmount: numOrNull(row.discountMaxAmount),
    }));
  }

  async listEligibilityRules(insuranceTypeId: string): Promise<EligibilityRule[]> {
    const rows = await this.db
      .select()
      .from(schema.eligibilityRules)
      .where(eq(schema.eligibilityRules.insuranceTypeId, insuranceTypeId));
    return rows.map((row) => ({ ...row, condition: row.condition ?? null }));
  }

  async listScoringWeights(insuranceTypeId: string): Promise<QuoteScoringWeight[]> {
    const rows = await this.db
      .select()
      .from(schema.quoteScoringWeights)
      .where(eq(schema.quoteScoringWeights.insuranceTypeId, insuranceTypeId));
    return rows.map((row) => ({ ...row, weight: num(row.weight) }));
  }

  async listApprovalThresholds(insuranceTypeId: string): Promise<ClaimApprovalThreshold[]> {
    const rows = await this.db
      .select()
      .from(schema.claimApprovalThresholds)
      .where(eq(schema.claimApprovalThresholds.insuranceTypeId, insuranceTypeId));
    return rows.map((row) => ({
      ...row,
      minClaimAmount: num(row.minClaimAmount),
      maxClaimAmount: num(row.maxClaimAmount),
    }));
  }

  async listBusinessConfiguration(): Promise<BusinessConfigEntry[]> {
    return this.db.select().from(schema.businessConfiguration);
  }

  async getQuote(id: string): Promise<Quote | undefined> {
    const [row] = await this.db.select().from(schema.quotes).where(eq(schema.quotes.id, id));
    return row ? toQuote(row) : undefined;
  }

  async listQuotes(applicationId: string): Promise<Quote[]> {
    const rows = await this.db.select().from(schema.quotes).where(eq(schema.quotes.applicationId, applicationId));
    return rows.map(toQuote);
  }

  async listRecommendations(applicationId: string): Promise<QuoteRecommendation[]> {
    const rows = await this.db
      .select()
      .from(schema.quoteRecommendations)
      .where(eq(schema.quoteRecommendations.applicationId, applicationId))
      .orderBy(asc(schema.quoteRecommendations.rank));
    return rows.map(toRecommendation);
  }

  async getClaim(id: string): Promise<Claim | undefined> {
    const [row] = await this.db.select().from(schema.claims).where(eq(schema.claims.id, id));
    return row ? toClaim(row) : undefined;
  }

  async listClaimHistory(claimId: string): Promise<ClaimStatusHistory[]> {
    return this.db
      .select()
      .from(schema.claimStatusHistory)
      .where(eq(schema.claimStatusHistory.claimId, claimId))
      .orderBy(asc(schema.claimStatusHistory.changedAt));
  }

  async getAssessment(id: string): Promise<ClaimAssessment | undefined> {
    const [row] = await this.db.select().from(schema.claimAssessments).where(eq(schema.claimAssessments.id, id));
    return row ? toAssessment(row) : undefined;
  }

  async listAssessments(claimId: string): Promise<ClaimAssessment[]> {
    const rows = await this.db
      .select()
      .from(schema.claimAssessments)
      .where(eq(schema.claimAssessments.claimId, claimId));
    return rows.map(toAssessment);
  }

  async listSettlements(claimId: string): Promise<ClaimSettlement[]> {
    const rows = await this.db
      .select()
      .from(schema.claimSettlements)
      .where(eq(schema.claimSettlements.claimId, claimId));
    return rows.map(toSettlement);
  }

  private toInsurer(row: typeof schema.insuranceCompanies.$inferSelect): InsuranceCompany {
    return {
      ...row,
      claimSettlementRatio: num(row.claimSettlementRatio),
      serviceRating: num(row.serviceRating),
    };
  }
}

class PgTransactionView extends PgReader implements EngineTransaction {
  async insertQuote(quote: Quote): Promise<Quote> {
    const rows = await this.db
      .insert(schema.quotes)
      .values({ ...quote, overallScore: str(quote.overallScore), sumInsured: str(quote.sumInsured) })
      .returning();
    return toQuote(single(rows, 'Quote', quote.id));
  }

  async updateQuote(id: string, patch: QuotePatch): Promise<Quote> {
    const rows = await this.db.update(schema.quotes).set(quotePatchRow(patch)).where(eq(schema.quotes.id, id)).returning();
    return toQuote(single(rows, 'Quote', id));
  }

  async deleteRecommendations(applicationId: string): Promise<number> {
    const rows = await this.db
      .delete(schema.quoteRecommendations)
      .where(eq(schema.quoteRecommendations.applicationId, applicationId))
      .returning({ id: schema.quoteRecommendations.id });
    return rows.length;
  }

  async insertRecommendation(recommendation: QuoteRecommendation): Promise<QuoteRecommendation> {
    const rows = await this.db
      .insert(schema.quoteRecommendations)
      .values({
        ...recommendation,
        suitabilityScore: str(recommendation.suitabilityScore),
        affordabilityScore: str(recommendation.affordabilityScore),
        claimRatioScore: str(recommendation.claimRatioScore),
        coverageScore: str(recommendation.coverageScore),
        serviceRatingScore: str(recommendation.serviceRatingScore),
      })
      .returning();
    return toRecommendation(single(rows, 'Recommendation', recommendation.id));
  }

  async insertClaim(claim: Claim): Promise<Claim> {
    const rows = await this.db
      .insert(schema.claims)
      .values({
        ...claim,
        amountRequested: str(claim.amountRequested),
        amountApproved: strOrNull(claim.amountApproved),
        amountSettled: strOrNull(claim.amountSettled),
      })
      .returning();
    return toClaim(single(rows, 'Claim', claim.id));
  }

  async updateClaim(id: string, expectedVersion: number, patch: ClaimPatch): Promise<Claim> {
    const rows = await this.db
      .update(schema.claims)
      .set({ ...claimPatchRow(patch), version: expectedVersion + 1 })
      .where(and(eq(schema.claims.id, id), eq(schema.claims.version, expectedVersion)))
      .returning();

    const [row] = rows;
    if (row) {
      return toClaim(row);
    }
    if (!(await this.getClaim(id))) {
      throw new NotFoundError('Claim', id);
    }
    throw new ConflictError(`Claim ${id} was modified concurrently`);
  }

  async insertClaimHistory(entry: ClaimStatusHistory): Promise<ClaimStatusHistory> {
    const rows = await this.db.insert(schema.claimStatusHistory).values(entry).returning();
    return single(rows, 'Claim history', entry.id);
  }

  async insertAssessment(assessment: ClaimAssessment): Promise<ClaimAssessment> {
    const rows = await this.db
      .insert(schema.claimAssessments)
      .values({
        ...assessment,
        lossAmountAssessed: strOrNull(assessment.lossAmountAssessed),
        deductibleApplicable: strOrNull(assessment.deductibleApplicable),
        netClaimAmount: strOrNull(assessment.netClaimAmount),
      })
      .returning();
    return toAssessment(single(rows, 'Assessment', assessment.id));
  }

  async updateAssessment(id: string, patch: AssessmentPatch): Promise<ClaimAssessment> {
    const rows = await this.db
      .update(schema.claimAssessments)
      .set(assessmentPatchRow(patch))
      .where(eq(schema.claimAssessments.id, id))
      .returning();
    return toAssessment(single(rows, 'Assessment', id));
  }

  async insertSettlement(settlement: ClaimSettlement): Promise<ClaimSettlement> {
    const rows = await this.db
      .insert(schema.claimSettlements)
      .values({ ...settlement, settlementAmount: str(settlement.settlementAmount) })
      .returning();
    return toSettlement(single(rows, 'Settlement', settlement.id));
  }

  async updateSettlement(id: string, patch: SettlementPatch): Promise<ClaimSettlement> {
    const rows = await this.db
      .update(schema.claimSettlements)
      .set(settlementPatchRow(patch))
      .where(eq(schema.claimSettlements.id, id))
      .returning();
    return toSettlement(single(rows, 'Settlement', id));
  }
}

/**
 * PostgreSQL-backed store. Each engine transaction is one database
 * transaction; claim updates are additionally guarded by the version column.
 */
export class PgStore extends PgReader implements EngineStore {
  constructor(
    db: Database,
    private readonly pool?: Pool
  ) {
    super(db);
  }

  static connect(connectionString: string): PgStore {
    const pool = new Pool({ connectionString });
    pool.on('error', (error) => {
      logger.error({ error: error.message }, 'Idle PostgreSQL client error');
    });
    return new PgStore(drizzle(pool), pool);
  }

  transaction<T>(work: (tx: EngineTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new PgTransactionView(tx)));
  }

  async close(): Promise<void> {
    await this.pool?.end();
  }
}

import { EngineConfig } from '../config/engine.config';
import { EngineStore, EngineTransaction } from '../models/store';
import { Actor } from '../types/auth.types';
import {
  ApplicationStatus,
  InsuranceCompany,
  PremiumBreakdown,
  Quote,
  QuoteRecommendation,
  QuoteScores,
  QuoteStatus,
} from '../types/engine.types';
import { Clock, systemClock } from '../utils/clock';
import { addDays } from '../utils/dates';
import { InvalidStateError, NotFoundError, PreconditionError } from '../utils/errors';
import { generateQuoteNumber, newId } from '../utils/identifiers';
import logger from '../utils/logger';
import { assertCustomerAccess } from './customer-access';
import { PremiumCalculator } from './premium-calculator.service';
import { QuoteScoringEngine } from './quote-scoring.service';

export interface QuoteSelection {
  /** Defaults to the insurance type's mandatory coverages when empty */
  coverageIds?: string[];
  addonIds?: string[];
}

export interface GeneratedQuotes {
  quotes: Quote[];
  recommendations: QuoteRecommendation[];
}

interface ScoredCandidate {
  insurer: InsuranceCompany;
  breakdown: PremiumBreakdown;
  scores: QuoteScores;
}

interface GeneratedQuote {
  quote: Quote;
  candidate: ScoredCandidate;
}

export class QuoteRankingService {
  private readonly calculator: PremiumCalculator;
  private readonly scorer: QuoteScoringEngine;

  constructor(
    private readonly store: EngineStore,
    private readonly config: EngineConfig,
    private readonly clock: Clock = systemClock
  ) {
    this.calculator = new PremiumCalculator(config);
    this.scorer = new QuoteScoringEngine(config);
  }

  /**
   * Prices and scores the application against every active insurer, stores a
   * quote per insurer and replaces the application's recommendation set, all
   * in one transaction. Notifying the customer is left to the caller.
   */
  async generateQuotes(
    applicationId: string,
    actor: Actor | null,
    selection: QuoteSelection = {}
  ): Promise<GeneratedQuotes> {
    const requestId = `quotes_${applicationId}_${Date.now()}`;
    logger.info({ requestId, applicationId, actorId: actor?.userId ?? null }, 'Generating quotes');

    const result = await this.store.transaction(async (tx) => {
      const application = await tx.getApplication(applicationId);
      if (!application) {
        throw new NotFoundError('Application', applicationId);
      }
      if (application.status !== ApplicationStatus.APPROVED) {
        throw new InvalidStateError(
          `Quotes can only be generated for approved applications (status is ${application.status})`
        );
      }

      const customer = await tx.getCustomer(application.customerId);
      if (!customer) {
        throw new NotFoundError('Customer', application.customerId);
      }

      const insurers = await tx.listActiveInsurers();
      if (insurers.length === 0) {
        throw new PreconditionError('No insurance companies available');
      }

      const typeId = application.insuranceTypeId;
      const [coverageTypes, riderAddons, slabs, discountRules, weights] = await Promise.all([
        tx.listCoverageTypes(typeId),
        tx.listRiderAddons(typeId),
        tx.listPremiumSlabs(typeId),
        tx.listDiscountRules(typeId),
        tx.listScoringWeights(typeId),
      ]);

      const requestedCoverageIds = selection.coverageIds ?? [];
      const coverages =
        requestedCoverageIds.length > 0
          ? coverageTypes.filter((coverage) => requestedCoverageIds.includes(coverage.id))
          : coverageTypes.filter((coverage) => coverage.isMandatory);
      const addonIds = selection.addonIds ?? [];
      const addons = riderAddons.filter((addon) => addonIds.includes(addon.id));
      const selectedCoverageIds = coverages.map((coverage) => coverage.id);

      const now = this.clock();
      const candidates: ScoredCandidate[] = insurers.map((insurer) => {
        const breakdown = this.calculator.computeBreakdown({
          application,
          customer,
          coverages,
          addons,
          slabs,
          discountRules,
          asOf: now,
        });
        const scores = this.scorer.score({
          breakdown,
          insurer,
          selectedCoverageIds,
          coverageTypes,
          annualIncome: customer.annualIncome,
          budgetMin: application.budgetMin,
          budgetMax: application.budgetMax,
          weights,
        });
        return { insurer, breakdown, scores };
      });

      const generated: GeneratedQuote[] = [];
      for (const candidate of candidates) {
        const quote = await tx.insertQuote({
          id: newId(),
          quoteNumber: generateQuoteNumber(now),
          applicationId: application.id,
          customerId: customer.id,
          insuranceTypeId: typeId,
          insurerId: candidate.insurer.id,
          status: QuoteStatus.GENERATED,
          breakdown: candidate.breakdown,
          scores: candidate.scores,
          overallScore: candidate.scores.overall,
          sumInsured: application.requestedCoverageAmount,
          policyTenureMonths: application.policyTenureMonths,
          coverageIds: selectedCoverageIds,
          addonIds: addons.map((addon) => addon.id),
          validityDays: this.config.quoteValidityDays,
          generatedAt: now,
          expiryAt: addDays(now, this.config.quoteValidityDays),
          generatedBy: actor?.userId ?? null,
          sentAt: null,
          acceptedAt: null,
          rejectedAt: null,
        });
        generated.push({ quote, candidate });
      }

      const recommendations = await this.replaceRecommendations(tx, application.id, generated, now);
      return { quotes: generated.map((entry) => entry.quote), recommendations };
    });

    logger.info(
      {
        requestId,
        applicationId,
        totalQuotes: result.quotes.length,
        topQuoteId: result.recommendations[0]?.quoteId ?? null,
      },
      'Quotes generated'
    );

    return result;
  }

  /** With a viewer, a customer only sees recommendations for their own applications. */
  async getRecommendations(applicationId: string, viewer: Actor | null = null): Promise<QuoteRecommendation[]> {
    if (viewer) {
      const application = await this.store.getApplication(applicationId);
      if (!application) {
        throw new NotFoundError('Application', applicationId);
      }
      await assertCustomerAccess(this.store, viewer, application.customerId, 'Application', applicationId);
    }
    return this.store.listRecommendations(applicationId);
  }

  private async replaceRecommendations(
    tx: EngineTransaction,
    applicationId: string,
    generated: GeneratedQuote[],
    now: Date
  ): Promise<QuoteRecommendation[]> {
    const ranked = [...generated]
      .sort(
        (a, b) =>
          b.quote.overallScore - a.quote.overallScore || a.quote.insurerId.localeCompare(b.quote.insurerId)
      )
      .slice(0, this.config.recommendationCount);

    await tx.deleteRecommendations(applicationId);

    const recommendations: QuoteRecommendation[] = [];
    for (const [index, { quote, candidate }] of ranked.entries()) {
      recommendations.push(
        await tx.insertRecommendation({
          id: newId(),
          applicationId: quote.applicationId,
          customerId: quote.customerId,
          insuranceTypeId: quote.insuranceTypeId,
          quoteId: quote.id,
          rank: index + 1,
          reason: this.scorer.generateRationale(candidate.scores, candidate.insurer.name),
          suitabilityScore: candidate.scores.overall,
          affordabilityScore: candidate.scores.affordability,
          claimRatioScore: candidate.scores.claimRatio,
          coverageScore: candidate.scores.coverage,
          serviceRatingScore: candidate.scores.serviceRating,
          createdAt: now,
        })
      );
    }
    return recommendations;
  }
}

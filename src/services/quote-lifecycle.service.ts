import { EngineStore } from '../models/store';
import { Actor } from '../types/auth.types';
import { Quote, QuoteStatus } from '../types/engine.types';
import { Clock, systemClock } from '../utils/clock';
import { ExpiredError, InvalidStateError, NotFoundError } from '../utils/errors';
import logger from '../utils/logger';
import { assertCustomerAccess } from './customer-access';

const OPEN_STATUSES: ReadonlySet<QuoteStatus> = new Set([QuoteStatus.GENERATED, QuoteStatus.SENT]);

export const isExpired = (quote: Quote, now: Date): boolean => now.getTime() >= quote.expiryAt.getTime();

/**
 * Expiry is never written back: a still-open quote past `expiryAt` simply
 * reads as EXPIRED.
 */
export function effectiveStatus(quote: Quote, now: Date): QuoteStatus {
  if (OPEN_STATUSES.has(quote.status) && isExpired(quote, now)) {
    return QuoteStatus.EXPIRED;
  }
  return quote.status;
}

export class QuoteLifecycleService {
  constructor(
    private readonly store: EngineStore,
    private readonly clock: Clock = systemClock
  ) {}

  /** With a viewer, a customer only sees their own quotes. */
  async getQuote(quoteId: string, viewer: Actor | null = null): Promise<Quote & { effectiveStatus: QuoteStatus }> {
    const quote = await this.store.getQuote(quoteId);
    if (!quote) {
      throw new NotFoundError('Quote', quoteId);
    }
    if (viewer) {
      await assertCustomerAccess(this.store, viewer, quote.customerId, 'Quote', quoteId);
    }
    return { ...quote, effectiveStatus: effectiveStatus(quote, this.clock()) };
  }

  /** Terminal for the quote. Expiry is checked before status. */
  async accept(quoteId: string, actor: Actor | null): Promise<Quote> {
    return this.store.transaction(async (tx) => {
      const quote = await tx.getQuote(quoteId);
      if (!quote) {
        throw new NotFoundError('Quote', quoteId);
      }
      if (actor) {
        await assertCustomerAccess(tx, actor, quote.customerId, 'Quote', quoteId);
      }

      const now = this.clock();
      if (isExpired(quote, now)) {
        logger.warn({ quoteId, expiryAt: quote.expiryAt, actorId: actor?.userId ?? null }, 'Quote acceptance rejected - expired');
        throw new ExpiredError(`Quote ${quote.quoteNumber} expired at ${quote.expiryAt.toISOString()}`);
      }
      if (quote.status !== QuoteStatus.GENERATED) {
        throw new InvalidStateError(`Only generated quotes can be accepted (status is ${quote.status})`);
      }

      const accepted = await tx.updateQuote(quoteId, { status: QuoteStatus.ACCEPTED, acceptedAt: now });
      logger.info({ quoteId, applicationId: quote.applicationId, actorId: actor?.userId ?? null }, 'Quote accepted');
      return accepted;
    });
  }

  /** Marks a generated quote as delivered to the customer. */
  async markSent(quoteId: string): Promise<Quote> {
    return this.store.transaction(async (tx) => {
      const quote = await tx.getQuote(quoteId);
      if (!quote) {
        throw new NotFoundError('Quote', quoteId);
      }

      const now = this.clock();
      if (isExpired(quote, now)) {
        throw new ExpiredError(`Quote ${quote.quoteNumber} expired at ${quote.expiryAt.toISOString()}`);
      }
      if (quote.status !== QuoteStatus.GENERATED) {
        throw new InvalidStateError(`Only generated quotes can be sent (status is ${quote.status})`);
      }

      return tx.updateQuote(quoteId, { status: QuoteStatus.SENT, sentAt: now });
    });
  }

  async reject(quoteId: string, actor: Actor | null): Promise<Quote> {
    return this.store.transaction(async (tx) => {
      const quote = await tx.getQuote(quoteId);
      if (!quote) {
        throw new NotFoundError('Quote', quoteId);
      }
      if (actor) {
        await assertCustomerAccess(tx, actor, quote.customerId, 'Quote', quoteId);
      }
      if (!OPEN_STATUSES.has(quote.status)) {
        throw new InvalidStateError(`Quote cannot be rejected (status is ${quote.status})`);
      }

      const rejected = await tx.updateQuote(quoteId, { status: QuoteStatus.REJECTED, rejectedAt: this.clock() });
      logger.info({ quoteId, actorId: actor?.userId ?? null }, 'Quote rejected');
      return rejected;
    });
  }
}

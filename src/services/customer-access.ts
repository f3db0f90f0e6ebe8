import { CatalogReader } from '../models/store';
import { Actor, Role } from '../types/auth.types';
import { NotFoundError } from '../utils/errors';
import logger from '../utils/logger';
import { hasRole } from './claim-authority.service';

/**
 * Surveyors and above see every record. A customer sees only records of the
 * customer profile registered under their email; anything else reads as
 * not found.
 */
export async function assertCustomerAccess(
  reader: Pick<CatalogReader, 'getCustomer'>,
  actor: Actor,
  customerId: string,
  entity: string,
  id: string
): Promise<void> {
  if (hasRole(actor, Role.SURVEYOR)) {
    return;
  }

  const customer = await reader.getCustomer(customerId);
  const email = actor.email?.toLowerCase();
  if (customer && email && customer.email.toLowerCase() === email) {
    return;
  }

  logger.warn({ actorId: actor.userId, entity, id }, 'Access refused - record belongs to another customer');
  throw new NotFoundError(entity, id);
}

import { ApiError } from './response';

export type EngineErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'INVALID_STATE'
  | 'CONFLICT'
  | 'EXPIRED'
  | 'PRECONDITION_FAILED';

/**
 * Business-rule violation raised by the decision engine.
 *
 * These are deterministic: the same call against the same data fails the same
 * way, so nothing in the engine retries them.
 */
export class EngineError extends ApiError {
  constructor(
    statusCode: number,
    public readonly code: EngineErrorCode,
    message: string
  ) {
    super(statusCode, message);
  }
}

/** Malformed or missing required input. */
export class ValidationError extends EngineError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
  }
}

/** The acting user lacks the role the resolved approval tier requires. */
export class UnauthorizedError extends EngineError {
  constructor(message: string) {
    super(403, 'UNAUTHORIZED', message);
  }
}

export class NotFoundError extends EngineError {
  constructor(entity: string, id: string) {
    super(404, 'NOT_FOUND', `${entity} ${id} not found`);
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(409, 'INVALID_TRANSITION', `Invalid status transition from ${from} to ${to}`);
  }
}

export class InvalidStateError extends EngineError {
  constructor(message: string) {
    super(409, 'INVALID_STATE', message);
  }
}

/** Another writer changed the record between our read and our write. */
export class ConflictError extends EngineError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
  }
}

export class ExpiredError extends EngineError {
  constructor(message: string) {
    super(410, 'EXPIRED', message);
  }
}

export class PreconditionError extends EngineError {
  constructor(message: string) {
    super(412, 'PRECONDITION_FAILED', message);
  }
}

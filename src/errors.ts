/**
 * Error taxonomy for the content engine.
 *
 * NotFound and Integrity errors describe the content graph and are never
 * worth retrying. StoreUnavailable wraps a failed store call; the engine
 * surfaces it as-is and leaves retries to the calling service.
 */

export type ContentErrorCode = 'NOT_FOUND' | 'INTEGRITY' | 'STORE_UNAVAILABLE';

export type EntityKind = 'article' | 'atom' | 'type' | 'collection' | 'menu' | 'url';

export abstract class ContentError extends Error {
  abstract readonly code: ContentErrorCode;
  abstract readonly retryable: boolean;
}

/**
 * An entity requested directly by identifier does not exist
 * (or belongs to another client).
 */
export class NotFoundError extends ContentError {
  readonly code = 'NOT_FOUND';
  readonly retryable = false;

  constructor(
    public readonly entity: EntityKind,
    public readonly ref: number | string
  ) {
    super(`${entity} not found: ${ref}`);
    this.name = 'NotFoundError';
  }
}

/**
 * A child entity referenced by its parent is missing from the store.
 */
export class IntegrityError extends ContentError {
  readonly code = 'INTEGRITY';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly parent: { entity: EntityKind; id: number },
    public readonly missing: { entity: EntityKind; id: number }
  ) {
    super(message);
    this.name = 'IntegrityError';
  }
}

export class StoreUnavailableError extends ContentError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    public readonly operation: string,
    public readonly reason: unknown
  ) {
    super(
      `Content store call ${operation} failed: ${
        reason instanceof Error ? reason.message : String(reason)
      }`
    );
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Content files or configuration that fail validation
 */
export class ContentValidationError extends Error {
  constructor(
    message: string,
    public hint?: string,
    public file?: string
  ) {
    super(message);
    this.name = 'ContentValidationError';
  }
}

/**
 * Run a store call, passing engine errors through and wrapping anything else
 * as StoreUnavailableError.
 */
export async function callStore<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof ContentError) {
      throw error;
    }
    throw new StoreUnavailableError(operation, error);
  }
}

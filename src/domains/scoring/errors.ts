export class CatalogValidationError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CatalogValidationError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised when the persistence layer itself fails. This is the only error that
 * aborts a recompute pass; retrying is left to whoever scheduled the pass.
 */
export class StoreError extends Error {
  operation: string;
  cause: unknown;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${reason}`);
    this.name = 'StoreError';
    this.operation = operation;
    this.cause = cause;
  }
}

export async function wrapStoreCall<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof StoreError) throw err;
    throw new StoreError(operation, err);
  }
}

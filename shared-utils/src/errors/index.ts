/**
 * Error classes shared by the repositories and the pass runner
 */

/**
 * The backing store could not be reached. A pass that sees this stops
 * processing further listings.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, readonly reason?: unknown) {
    super(message);
    this.name = "StoreUnavailableError";
  }
}

/**
 * An optimistic write found a newer version than the one it read
 */
export class ConcurrentUpdateError extends Error {
  constructor(
    readonly entity: string,
    readonly id: string,
    readonly expectedVersion: number
  ) {
    super(`${entity} ${id} was modified concurrently (expected v${expectedVersion})`);
    this.name = "ConcurrentUpdateError";
  }
}

/**
 * A unique key was taken by a concurrent writer
 */
export class DuplicateKeyError extends Error {
  constructor(readonly entity: string, readonly key: string) {
    super(`${entity} with key ${key} already exists`);
    this.name = "DuplicateKeyError";
  }
}

export function isConflictError(
  error: unknown
): error is ConcurrentUpdateError | DuplicateKeyError {
  return (
    error instanceof ConcurrentUpdateError || error instanceof DuplicateKeyError
  );
}

const CONNECTION_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE"]);

/**
 * Maps driver errors onto the shared taxonomy. Postgres SQLSTATE class 08
 * is a connection exception, 57P0x an operator intervention (shutdown).
 */
export function translateStoreError(
  error: unknown,
  entity: string,
  key: string
): unknown {
  if (typeof error !== "object" || error === null) return error;
  const code: unknown = Reflect.get(error, "code");
  if (typeof code !== "string") return error;

  if (code === "23505") return new DuplicateKeyError(entity, key);
  if (CONNECTION_CODES.has(code) || code.startsWith("08") || code.startsWith("57P0")) {
    const message = error instanceof Error ? error.message : code;
    return new StoreUnavailableError(`${entity} store unavailable: ${message}`, error);
  }
  return error;
}

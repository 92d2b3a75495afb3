/**
 * Raised by a processor for one item. Never thrown past the pool: the pool
 * wraps it into a failure outcome.
 */
export class ItemProcessingError extends Error {
  public readonly kind: string;

  constructor(public readonly itemId: string, cause: unknown) {
    super(toErrorMessage(cause), { cause });
    this.name = "ItemProcessingError";
    this.kind = cause instanceof Error ? cause.name : "Error";
  }
}

export class PoolClosedError extends Error {
  constructor(public readonly itemId: string) {
    super(`Cannot submit "${itemId}": pool has been shut down`);
    this.name = "PoolClosedError";
  }
}

export class DuplicateItemError extends Error {
  constructor(public readonly itemId: string) {
    super(`Item "${itemId}" was already submitted to this pool`);
    this.name = "DuplicateItemError";
  }
}

export class InvalidConfigurationError extends Error {
  constructor(public readonly field: string, public readonly value: unknown, detail?: string) {
    super(`Invalid ${field}: ${formatValue(value)}${detail ? ` (${detail})` : ""}`);
    this.name = "InvalidConfigurationError";
  }
}

/**
 * A broken internal invariant (double resolution, count mismatch).
 * Always fatal.
 */
export class AggregationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AggregationError";
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? `"${value}"` : String(value);
}

/**
 * Parse and validate a worker count. Accepts numbers and numeric strings
 * (CLI flags, env vars).
 */
export function assertConcurrency(value: unknown, field = "concurrency"): number {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 1) {
    throw new InvalidConfigurationError(field, value, "must be a positive integer");
  }
  return n;
}

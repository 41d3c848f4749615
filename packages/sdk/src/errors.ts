/**
 * Error types for prefixwatch operations
 *
 * Invariants:
 * - Configuration and lookup errors are raised before any write
 * - Storage errors name the failing operation and, inside a fan-out, the shard
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all prefixwatch errors
 */
export abstract class PrefixWatchError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown for caller mistakes: unknown vendor, malformed prefix, bad timestamp or options
 */
export class ConfigurationError extends PrefixWatchError {
  readonly code = "E_CONFIG";
}

/**
 * Thrown when a source name or shard id is not in the registry
 */
export class LookupError extends PrefixWatchError {
  readonly code = "E_LOOKUP";

  constructor(
    public readonly subject: string,
    options?: ErrorOptions
  ) {
    super(`Not registered: ${subject}`, options);
  }
}

/**
 * Thrown when the underlying SQLite engine fails
 */
export class StorageError extends PrefixWatchError {
  readonly code = "E_STORAGE";

  constructor(
    public readonly operation: string,
    public readonly shardId?: number,
    options?: ErrorOptions
  ) {
    const where = shardId === undefined ? "" : ` on shard ${shardId}`;
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Storage operation "${operation}" failed${where}${reason}`, options);
  }

  /**
   * Re-tag an error with the shard it occurred on
   */
  static forShard(err: unknown, operation: string, shardId: number): StorageError {
    if (err instanceof StorageError) {
      if (err.shardId === shardId) return err;
      return new StorageError(err.operation, shardId, { cause: err.cause ?? err });
    }
    return new StorageError(operation, shardId, { cause: err });
  }
}

/**
 * Thrown when a stored hash no longer matches the hash recomputed from its url
 */
export class IntegrityViolationError extends PrefixWatchError {
  readonly code = "E_INTEGRITY";

  constructor(
    public readonly shardId: number,
    public readonly urls: readonly string[],
    options?: ErrorOptions
  ) {
    const sample = urls.slice(0, 3).join(", ");
    const more = urls.length > 3 ? ` (+${urls.length - 3} more)` : "";
    super(`Stored hash mismatch on shard ${shardId}: ${sample}${more}`, options);
  }
}

/**
 * Error types for the MiniYaml language server core.
 *
 * Malformed MiniYaml never throws; it is reported through diagnostics.
 * These errors are reserved for callers that break a contract: reading
 * outside a text, editing a file that is not tracked, writing to a
 * snapshot, or defining queries that read themselves.
 */

/**
 * Base class for all MiniYaml errors
 */
export abstract class MiniYamlError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a byte index or span falls outside a text, or does not land
 * on a UTF-8 character boundary
 */
export class BoundsError extends MiniYamlError {
  readonly code = "BOUNDS";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a derived query transitively reads itself
 */
export class QueryCycleError extends MiniYamlError {
  readonly code = "QUERY_CYCLE";
  readonly cycle: string[];

  constructor(cycle: string[], options?: ErrorOptions) {
    super(`Query cycle detected: ${cycle.join(" -> ")}`, options);
    this.cycle = cycle;
  }
}

/**
 * Thrown when an input is written through a snapshot
 */
export class ReadOnlySnapshotError extends MiniYamlError {
  readonly code = "READ_ONLY";

  constructor(queryName: string, options?: ErrorOptions) {
    super(`Cannot set input \`${queryName}\` on a read-only snapshot`, options);
  }
}

/**
 * Thrown when an edit or removal names a file the database is not tracking
 */
export class UnknownFileError extends MiniYamlError {
  readonly code = "UNKNOWN_FILE";

  constructor(fileId: number, options?: ErrorOptions) {
    super(`No file is tracked with id ${fileId}`, options);
  }
}

/**
 * Thrown when a query runtime is used before a database was attached to it
 */
export class DetachedRuntimeError extends MiniYamlError {
  readonly code = "DETACHED_RUNTIME";

  constructor(options?: ErrorOptions) {
    super("Query runtime has no attached database", options);
  }
}

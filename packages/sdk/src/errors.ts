/**
 * Error types for NEO catalogue operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - File I/O failures are not wrapped: loaders log and rethrow the original error
 */

/**
 * Base class for all catalogue errors
 */
export abstract class NeoScopeError extends Error {
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
 * Thrown when a filter is requested for a field or comparator that has no accessor
 */
export class UnsupportedCriterionError extends NeoScopeError {
  readonly code = "E_UNSUPPORTED_CRITERION";

  constructor(
    public readonly criterion: string,
    options?: ErrorOptions
  ) {
    super(`Unsupported criterion: ${criterion}`, options);
  }
}

/**
 * Thrown when a criterion value cannot be coerced to the type its field compares
 */
export class InvalidCriterionError extends NeoScopeError {
  readonly code = "E_INVALID_CRITERION";

  constructor(
    public readonly criterion: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid value for criterion "${criterion}": ${reason}`, options);
  }
}

/**
 * Thrown by NEO-scoped filters under the "throw" policy when an approach has no linked NEO
 */
export class UnlinkedApproachError extends NeoScopeError {
  readonly code = "E_UNLINKED";

  constructor(
    public readonly designation: string | undefined,
    public readonly field: string,
    options?: ErrorOptions
  ) {
    super(
      `Cannot evaluate "${field}" for approach of "${designation ?? ""}": no linked NEO`,
      options
    );
  }
}

/**
 * Thrown when an approach that already belongs to a NEO is attached again
 */
export class AlreadyLinkedError extends NeoScopeError {
  readonly code = "E_ALREADY_LINKED";

  constructor(
    public readonly designation: string | undefined,
    public readonly owner: string | undefined,
    options?: ErrorOptions
  ) {
    super(`Approach of "${designation ?? ""}" is already linked to "${owner ?? ""}"`, options);
  }
}

/**
 * Thrown when a source feed is readable but structurally malformed
 */
export class SourceFormatError extends NeoScopeError {
  readonly code = "E_SOURCE_FORMAT";

  constructor(filePath: string, reason: string, options?: ErrorOptions) {
    super(`Malformed source ${filePath}: ${reason}`, options);
  }
}

/**
 * Thrown when writing query results fails
 */
export class OutputWriteError extends NeoScopeError {
  readonly code = "E_WRITE";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write results: ${filePath}`, options);
  }
}

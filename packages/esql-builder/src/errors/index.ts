/**
 * esql-builder Error Hierarchy
 *
 * All errors extend EsqlError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   esql.from("employees").stats("COUNT(*)", { avg: "AVG(salary)" });
 * } catch (error) {
 *   if (isEsqlError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing the query.
 * - `system`: Failure outside the builder (transport, executor). May require investigation or retry.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for EsqlError constructor.
 */
export type EsqlErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }
  if (typeof cause === "string") {
    return cause;
  }
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all esql-builder errors.
 */
export class EsqlError extends Error {
  /** Machine-readable error code (e.g., "VALIDATION_ERROR") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: EsqlErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "EsqlError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging. A rendered
   * query in the details is printed as an indented block after them.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const { query, ...rest } = this.details;
    const rendered = typeof query === "string" ? query : undefined;
    const details = rendered === undefined ? this.details : rest;
    if (Object.keys(details).length > 0) {
      lines.push(`  Details: ${JSON.stringify(details)}`);
    }

    if (rendered !== undefined) {
      lines.push(
        "  Query:",
        ...rendered.split("\n").map((line) => `    ${line}`),
      );
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Validation Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid argument (e.g., "probability", "branches.2") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

/**
 * Details for ValidationError.
 */
export type ValidationErrorDetails = Readonly<{
  /** ES|QL command whose arguments were rejected */
  command?: string;
  /** Individual validation issues */
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when a command argument is out of range or has the wrong shape.
 *
 * @example
 * ```typescript
 * try {
 *   esql.from("employees").sample(1.5);
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.details.issues);
 *   }
 * }
 * ```
 */
export class ValidationError extends EsqlError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const argumentList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following arguments: ${argumentList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown when a command receives both positional and named arguments.
 *
 * STATS, EVAL, ENRICH ... WITH and COMPLETION take either a list of
 * expressions or a map of named expressions.
 */
export class ConflictingArgumentsError extends EsqlError {
  constructor(command: string, options?: { cause?: unknown }) {
    super(
      `${command} accepts positional or named arguments but not both`,
      "CONFLICTING_ARGUMENTS",
      {
        details: { command },
        category: "user",
        suggestion: `Pass either a list of expressions or a single object of named expressions to ${command}.`,
        cause: options?.cause,
      },
    );
    this.name = "ConflictingArgumentsError";
  }
}

// ============================================================
// Structural Errors (category: "user")
// ============================================================

/**
 * Thrown when FORK is applied to a chain that already contains one.
 */
export class DuplicateForkError extends EsqlError {
  constructor(options?: { cause?: unknown }) {
    super("A query can only contain one FORK command", "DUPLICATE_FORK", {
      details: { command: "FORK" },
      category: "user",
      suggestion: `Merge the branches into a single fork() call.`,
      cause: options?.cause,
    });
    this.name = "DuplicateForkError";
  }
}

/**
 * Thrown at render time when a command is missing a mandatory clause.
 *
 * @example
 * ```typescript
 * esql.from("system_metrics").lookupJoin("host_inventory").render();
 * // MissingClauseError: LOOKUP JOIN is missing its ON clause
 * ```
 */
export class MissingClauseError extends EsqlError {
  constructor(
    command: string,
    clause: string,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(`${command} is missing its ${clause} clause`, "MISSING_CLAUSE", {
      details: { command, clause },
      category: "user",
      suggestion:
        options?.suggestion ??
        `Call the ${clause.toLowerCase()}() continuation before rendering.`,
      cause: options?.cause,
    });
    this.name = "MissingClauseError";
  }
}

/**
 * Thrown when a chain is assembled in a way ES|QL cannot express, such as
 * modifying a command that later commands already build on.
 */
export class QueryStructureError extends EsqlError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "INVALID_QUERY_STRUCTURE", {
      details,
      category: "user",
      suggestion: options?.suggestion,
      cause: options?.cause,
    });
    this.name = "QueryStructureError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Thrown when client options are invalid.
 */
export class ConfigurationError extends EsqlError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review the options passed to createEsqlClient().`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Execution Errors (category: "system")
// ============================================================

/**
 * Thrown when the executor fails to run a rendered query.
 *
 * The executor's own error is preserved as `cause`.
 */
export class ExecutionError extends EsqlError {
  constructor(
    message: string,
    details: Readonly<{ operationId: string; query: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "EXECUTION_ERROR", {
      details,
      category: "system",
      suggestion: `The query was rendered but the executor failed. Check the transport and the cluster's response in error.cause.`,
      cause: options?.cause,
    });
    this.name = "ExecutionError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for EsqlError.
 */
export function isEsqlError(error: unknown): error is EsqlError {
  return error instanceof EsqlError;
}

/**
 * Check if error is recoverable by fixing the query or its arguments.
 */
export function isUserRecoverable(error: unknown): boolean {
  return isEsqlError(error) && error.category === "user";
}

/**
 * Check if error indicates a transport or executor issue.
 */
export function isSystemError(error: unknown): boolean {
  return isEsqlError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isEsqlError(error) ? error.suggestion : undefined;
}

/**
 * Error taxonomy
 *
 * Everything except SchemeFileError is recoverable: the loader skips the
 * offending line and the checkout skips the offending scan.
 */

export type AppErrorCode =
  | "UNKNOWN_ITEM"
  | "MALFORMED_ENTRY"
  | "DEFINITION_ERROR"
  | "INVALID_EXPRESSION"
  | "SCHEME_FILE";

export abstract class AppError extends Error {
  abstract readonly code: AppErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A scanned id, or an id referenced by a rule, is not in the scheme
 */
export class UnknownItemError extends AppError {
  readonly code = "UNKNOWN_ITEM";

  constructor(readonly itemId: string) {
    super(`Unknown item: ${itemId}`);
  }
}

/**
 * A scheme line does not follow the `{KEY} -> VALUE` grammar
 */
export class MalformedSchemeEntryError extends AppError {
  readonly code = "MALFORMED_ENTRY";
}

/**
 * A structurally invalid definition (empty rule, duplicate id, bad coupon)
 */
export class DefinitionError extends AppError {
  readonly code = "DEFINITION_ERROR";
}

/**
 * An arithmetic expression failed to parse or evaluate
 */
export class ExpressionError extends AppError {
  readonly code = "INVALID_EXPRESSION";
}

/**
 * The scheme or scan file could not be read
 */
export class SchemeFileError extends AppError {
  readonly code = "SCHEME_FILE";
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

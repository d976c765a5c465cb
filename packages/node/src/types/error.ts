/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, transient: boolean, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes raised by the HTTP layer itself. Domain error codes pass through
 * unchanged.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  /** Retrying the same request later may succeed */
  readonly transient: boolean;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  transient = false,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message, transient };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Request errors
// =============================================================================

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown by request parsing helpers; rendered as 400 VALIDATION_ERROR.
 */
export class RequestValidationError extends Error {
  public readonly code = "VALIDATION_ERROR" as const;
  public readonly category = "input" as const;
  public readonly transient = false;

  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
    this.name = "RequestValidationError";
  }
}

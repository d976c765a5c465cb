/**
 * Error classification shared by every package.
 *
 * Each domain error class carries a `category` and a `transient` flag so a
 * caller can tell "try again later" from "will never succeed as given"
 * without knowing which package raised it.
 */

export type ErrorCategory =
  | "input"
  | "state"
  | "execution"
  | "bridge"
  | "consistency"
  | "storage"
  | "config";

export interface ClassifiedError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly transient: boolean;
  readonly message: string;
}

export function isClassifiedError(err: unknown): err is ClassifiedError {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    "category" in err &&
    typeof err.category === "string" &&
    "transient" in err &&
    typeof err.transient === "boolean"
  );
}

/**
 * True when retrying the same request may succeed.
 * Unclassified errors are treated as transient (network faults, timeouts).
 */
export function isTransientError(err: unknown): boolean {
  if (isClassifiedError(err)) return err.transient;
  return true;
}

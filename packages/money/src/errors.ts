/**
 * Money errors. Always input errors: a malformed amount never becomes valid.
 */

export type MoneyErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "CURRENCY_MISMATCH"
  | "DIVISION_BY_ZERO";

export class MoneyError extends Error {
  public readonly category = "input" as const;
  public readonly transient = false;

  constructor(
    public readonly code: MoneyErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MoneyError";
  }
}

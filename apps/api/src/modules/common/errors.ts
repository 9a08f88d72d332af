export type AutopilotErrorCode =
  | "CONFIG"
  | "NOT_FOUND"
  | "PRICE_UNAVAILABLE"
  | "ORDER_REJECTED"
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_SHARES";

export abstract class AutopilotError extends Error {
  abstract readonly code: AutopilotErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad caller input. Never retried. */
export class ConfigError extends AutopilotError {
  readonly code = "CONFIG";
}

export class NotFoundError extends AutopilotError {
  readonly code = "NOT_FOUND";
}

export class PriceUnavailableError extends AutopilotError {
  readonly code = "PRICE_UNAVAILABLE";

  constructor(
    readonly symbol: string,
    reason: string
  ) {
    super(`Price unavailable for ${symbol}: ${reason}`);
  }
}

export class OrderRejectedError extends AutopilotError {
  readonly code = "ORDER_REJECTED";

  constructor(
    readonly symbol: string,
    reason: string,
    /** True when the broker may still have accepted the order (timeouts). */
    readonly outcomeUnknown = false
  ) {
    super(`Order for ${symbol} rejected: ${reason}`);
  }
}

export class InsufficientFundsError extends AutopilotError {
  readonly code = "INSUFFICIENT_FUNDS";
}

export class InsufficientSharesError extends AutopilotError {
  readonly code = "INSUFFICIENT_SHARES";
}

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} exceeded ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import type { MonitoredPosition, TriggerKind } from "@autopilot/shared";

import { ConfigError } from "../common/errors";

export type TriggerThresholds = Pick<MonitoredPosition, "entryPrice" | "stopLossPct" | "takeProfitPct">;

export type TriggerDecision =
  | { kind: "NONE"; pctChange: number }
  | { kind: TriggerKind; pctChange: number };

/** Percent move from the entry price, e.g. 100 → 95 is -5. */
export function pctChange(entryPrice: number, currentPrice: number): number {
  // Multiply first so 95 against 100 is exactly -5.
  return ((currentPrice - entryPrice) * 100) / entryPrice;
}

/**
 * Stop-loss and take-profit boundaries are inclusive. A position whose thresholds
 * cross so that both fire at once is treated as a stop-loss.
 */
export function evaluateTrigger(position: TriggerThresholds, currentPrice: number): TriggerDecision {
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) {
    throw new ConfigError(`Current price must be positive, got ${currentPrice}`);
  }
  if (!Number.isFinite(position.entryPrice) || position.entryPrice <= 0) {
    throw new ConfigError(`Entry price must be positive, got ${position.entryPrice}`);
  }

  const pct = pctChange(position.entryPrice, currentPrice);

  if (position.stopLossPct !== undefined && pct <= position.stopLossPct) {
    return { kind: "STOP_LOSS", pctChange: pct };
  }
  if (position.takeProfitPct !== undefined && pct >= position.takeProfitPct) {
    return { kind: "TAKE_PROFIT", pctChange: pct };
  }
  return { kind: "NONE", pctChange: pct };
}

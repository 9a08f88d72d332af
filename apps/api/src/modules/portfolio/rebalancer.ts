import type { RebalancePlan, TradeIntent } from "@autopilot/shared";
import { compareSymbols, normalizeSymbol } from "@autopilot/shared";

import { ConfigError } from "../common/errors";

const ALLOCATION_EPSILON = 1e-9;
const FRACTIONAL_DECIMALS = 6;

export type RebalanceInput = {
  holdings: Record<string, number>;
  cash: number;
  prices: Record<string, number>;
  /** Symbol → fraction of investable value, e.g. { AAPL: 0.5 }. */
  targetAllocations: Record<string, number>;
  cashBuffer: number;
};

export type RebalanceOptions = {
  fractionalShares?: boolean;
  /** Legs worth less than this are dropped. */
  minTradeNotional?: number;
  now?: Date;
};

/** Normalizes symbols and rejects allocations that cannot be satisfied. */
export function validateTargets(targetAllocations: Record<string, number>, cashBuffer: number): Record<string, number> {
  if (!Number.isFinite(cashBuffer) || cashBuffer < 0 || cashBuffer >= 1) {
    throw new ConfigError(`Cash buffer must be in [0, 1), got ${cashBuffer}`);
  }

  const normalized: Record<string, number> = {};
  let sum = 0;
  for (const [rawSymbol, fraction] of Object.entries(targetAllocations)) {
    const symbol = normalizeSymbol(rawSymbol);
    if (!symbol) {
      throw new ConfigError("Allocation symbol is required");
    }
    if (!Number.isFinite(fraction) || fraction < 0) {
      throw new ConfigError(`Allocation for ${symbol} must be a non-negative number, got ${fraction}`);
    }
    if (symbol in normalized) {
      throw new ConfigError(`Duplicate allocation for ${symbol}`);
    }
    normalized[symbol] = fraction;
    sum += fraction;
  }

  if (Object.keys(normalized).length === 0) {
    throw new ConfigError("At least one target allocation is required");
  }
  if (sum + cashBuffer > 1 + ALLOCATION_EPSILON) {
    throw new ConfigError(
      `Allocations (${sum.toFixed(4)}) plus cash buffer (${cashBuffer.toFixed(4)}) exceed 1`
    );
  }
  return normalized;
}

function requirePrice(prices: Record<string, number>, symbol: string): number {
  const price = prices[symbol];
  if (price === undefined || !Number.isFinite(price) || price <= 0) {
    throw new ConfigError(`No usable price for ${symbol}`);
  }
  return price;
}

function truncateQuantity(raw: number, fractionalShares: boolean): number {
  // Nudge away from zero first so 4.9999999999 from float error still counts as 5.
  const nudged = raw + Math.sign(raw) * 1e-9;
  if (!fractionalShares) return Math.trunc(nudged);
  const scale = 10 ** FRACTIONAL_DECIMALS;
  return Math.trunc(nudged * scale) / scale;
}

/**
 * Orders that move the targeted symbols to their allocation of
 * `total × (1 − cashBuffer)`. Holdings without a target are left alone.
 * Sells come before buys; each symbol appears at most once.
 */
export function planRebalance(input: RebalanceInput, options: RebalanceOptions = {}): RebalancePlan {
  const targets = validateTargets(input.targetAllocations, input.cashBuffer);
  if (!Number.isFinite(input.cash) || input.cash < 0) {
    throw new ConfigError(`Cash must be a non-negative number, got ${input.cash}`);
  }

  const holdings: Record<string, number> = {};
  for (const [rawSymbol, quantity] of Object.entries(input.holdings)) {
    if (quantity > 0) holdings[normalizeSymbol(rawSymbol)] = quantity;
  }
  const prices: Record<string, number> = {};
  for (const [rawSymbol, price] of Object.entries(input.prices)) {
    prices[normalizeSymbol(rawSymbol)] = price;
  }

  let totalValue = input.cash;
  for (const [symbol, quantity] of Object.entries(holdings)) {
    totalValue += quantity * requirePrice(prices, symbol);
  }
  const investableValue = totalValue * (1 - input.cashBuffer);

  const fractional = options.fractionalShares ?? false;
  const minNotional = options.minTradeNotional ?? 0;
  const sells: TradeIntent[] = [];
  const buys: TradeIntent[] = [];

  for (const [symbol, fraction] of Object.entries(targets)) {
    const price = requirePrice(prices, symbol);
    const held = holdings[symbol] ?? 0;
    const targetValue = investableValue * fraction;
    const delta = truncateQuantity((targetValue - held * price) / price, fractional);
    if (delta === 0) continue;

    const quantity = delta < 0 ? Math.min(-delta, held) : delta;
    if (quantity <= 0 || quantity * price < minNotional) continue;

    (delta < 0 ? sells : buys).push({ symbol, side: delta < 0 ? "SELL" : "BUY", quantity });
  }

  const bySymbol = (a: TradeIntent, b: TradeIntent) => compareSymbols(a.symbol, b.symbol);
  const intents = Object.freeze([...sells.sort(bySymbol), ...buys.sort(bySymbol)].map((i) => Object.freeze(i)));

  return Object.freeze({
    createdAt: (options.now ?? new Date()).toISOString(),
    totalValue,
    investableValue,
    cashBuffer: input.cashBuffer,
    targetAllocations: Object.freeze({ ...targets }),
    intents
  });
}

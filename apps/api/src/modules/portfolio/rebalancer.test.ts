import { describe, expect, it } from "vitest";

import { ConfigError } from "../common/errors";
import { planRebalance, validateTargets } from "./rebalancer";

describe("planRebalance", () => {
  it("truncates a 4.5 share delta to a 4 share buy", () => {
    const plan = planRebalance({
      holdings: { AAPL: 0 },
      cash: 1_000,
      prices: { AAPL: 100 },
      targetAllocations: { AAPL: 0.5 },
      cashBuffer: 0.1
    });

    expect(plan.totalValue).toBe(1_000);
    expect(plan.investableValue).toBe(900);
    expect(plan.intents).toEqual([{ symbol: "AAPL", side: "BUY", quantity: 4 }]);
  });

  it("buys fractional shares when enabled", () => {
    const plan = planRebalance(
      { holdings: {}, cash: 1_000, prices: { AAPL: 100 }, targetAllocations: { AAPL: 0.5 }, cashBuffer: 0.1 },
      { fractionalShares: true }
    );

    expect(plan.intents).toEqual([{ symbol: "AAPL", side: "BUY", quantity: 4.5 }]);
  });

  it("puts sells before buys, each group by symbol", () => {
    // Total = 0 + 10*100 + 10*50 + 0 = 1500; no buffer.
    const plan = planRebalance({
      holdings: { MSFT: 10, AAPL: 10 },
      cash: 0,
      prices: { AAPL: 100, MSFT: 50, TSLA: 25, AMZN: 10 },
      targetAllocations: { TSLA: 0.2, AAPL: 0.2, MSFT: 0.1, AMZN: 0.2 },
      cashBuffer: 0
    });

    // AAPL: 300 target vs 1000 held → sell 7; MSFT: 150 vs 500 → sell 7;
    // AMZN: 300/10 → buy 30; TSLA: 300/25 → buy 12.
    expect(plan.intents).toEqual([
      { symbol: "AAPL", side: "SELL", quantity: 7 },
      { symbol: "MSFT", side: "SELL", quantity: 7 },
      { symbol: "AMZN", side: "BUY", quantity: 30 },
      { symbol: "TSLA", side: "BUY", quantity: 12 }
    ]);
  });

  it("omits zero deltas and legs under the minimum notional", () => {
    const plan = planRebalance(
      {
        holdings: { AAPL: 5 },
        cash: 1_000,
        prices: { AAPL: 100, F: 8 },
        targetAllocations: { AAPL: 0.25, F: 0.004 },
        cashBuffer: 0
      },
      { minTradeNotional: 10 }
    );

    // AAPL target 375 vs 500 → -1.25 → sell 1 ($100). F target 6 → 0.75 → 0 shares.
    expect(plan.intents).toEqual([{ symbol: "AAPL", side: "SELL", quantity: 1 }]);
  });

  it("leaves holdings without a target alone", () => {
    const plan = planRebalance({
      holdings: { GOOG: 3 },
      cash: 700,
      prices: { GOOG: 100, AAPL: 50 },
      targetAllocations: { AAPL: 0.5 },
      cashBuffer: 0
    });

    expect(plan.totalValue).toBe(1_000);
    expect(plan.intents).toEqual([{ symbol: "AAPL", side: "BUY", quantity: 10 }]);
  });

  it("normalizes symbols", () => {
    const plan = planRebalance({
      holdings: {},
      cash: 1_000,
      prices: { aapl: 100 },
      targetAllocations: { " aapl": 0.2 },
      cashBuffer: 0
    });

    expect(plan.intents).toEqual([{ symbol: "AAPL", side: "BUY", quantity: 2 }]);
    expect(plan.targetAllocations).toEqual({ AAPL: 0.2 });
  });

  it("returns a frozen plan", () => {
    const plan = planRebalance({ holdings: {}, cash: 100, prices: { AAPL: 10 }, targetAllocations: { AAPL: 1 }, cashBuffer: 0 });

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.intents)).toBe(true);
  });

  it("fails on a missing price for a target or a held symbol", () => {
    expect(() =>
      planRebalance({ holdings: {}, cash: 100, prices: {}, targetAllocations: { AAPL: 0.5 }, cashBuffer: 0 })
    ).toThrow(ConfigError);
    expect(() =>
      planRebalance({ holdings: { GOOG: 1 }, cash: 100, prices: { AAPL: 10 }, targetAllocations: { AAPL: 0.5 }, cashBuffer: 0 })
    ).toThrow(ConfigError);
  });
});

describe("validateTargets", () => {
  it("rejects negative allocations", () => {
    expect(() => validateTargets({ AAPL: -0.1 }, 0)).toThrow(ConfigError);
  });

  it("rejects allocations plus buffer above one", () => {
    expect(() => validateTargets({ AAPL: 0.6, MSFT: 0.4 }, 0.05)).toThrow(
      "Allocations (1.0000) plus cash buffer (0.0500) exceed 1"
    );
  });

  it("accepts allocations summing to exactly one minus the buffer", () => {
    expect(validateTargets({ AAPL: 0.7, MSFT: 0.2 }, 0.1)).toEqual({ AAPL: 0.7, MSFT: 0.2 });
  });

  it("rejects a buffer outside [0, 1)", () => {
    expect(() => validateTargets({ AAPL: 0.1 }, 1)).toThrow(ConfigError);
    expect(() => validateTargets({ AAPL: 0.1 }, -0.01)).toThrow(ConfigError);
  });
});

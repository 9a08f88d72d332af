import { describe, expect, it } from "vitest";

import { ConfigError } from "../common/errors";
import { evaluateTrigger, pctChange } from "./trigger-evaluator";

describe("evaluateTrigger", () => {
  const stopOnly = { entryPrice: 100, stopLossPct: -5 };

  it("fires a stop-loss below the threshold", () => {
    expect(evaluateTrigger(stopOnly, 94)).toEqual({ kind: "STOP_LOSS", pctChange: -6 });
  });

  it("treats the stop-loss boundary as inclusive", () => {
    expect(evaluateTrigger(stopOnly, 95)).toEqual({ kind: "STOP_LOSS", pctChange: -5 });
  });

  it("holds above the stop-loss", () => {
    expect(evaluateTrigger(stopOnly, 96)).toEqual({ kind: "NONE", pctChange: -4 });
  });

  it("treats the take-profit boundary as inclusive", () => {
    const position = { entryPrice: 200, takeProfitPct: 10 };

    expect(evaluateTrigger(position, 220)).toEqual({ kind: "TAKE_PROFIT", pctChange: 10 });
    expect(evaluateTrigger(position, 219).kind).toBe("NONE");
  });

  it("ignores a side that is not configured", () => {
    expect(evaluateTrigger({ entryPrice: 100, takeProfitPct: 10 }, 1).kind).toBe("NONE");
    expect(evaluateTrigger({ entryPrice: 100, stopLossPct: -10 }, 1_000).kind).toBe("NONE");
  });

  it("prefers the stop-loss when crossed thresholds both fire", () => {
    // Stop at +5 and take at +2: a +4 move satisfies both.
    expect(evaluateTrigger({ entryPrice: 100, stopLossPct: 5, takeProfitPct: 2 }, 104)).toEqual({ kind: "STOP_LOSS", pctChange: 4 });
  });

  it("returns the same decision for the same inputs", () => {
    const position = { entryPrice: 37.5, stopLossPct: -3, takeProfitPct: 8 };
    const first = evaluateTrigger(position, 36.2);

    for (let i = 0; i < 5; i += 1) {
      expect(evaluateTrigger(position, 36.2)).toEqual(first);
    }
    expect(position).toEqual({ entryPrice: 37.5, stopLossPct: -3, takeProfitPct: 8 });
  });

  it("rejects non-positive prices", () => {
    expect(() => evaluateTrigger(stopOnly, 0)).toThrow(ConfigError);
    expect(() => evaluateTrigger({ entryPrice: 0, stopLossPct: -5 }, 10)).toThrow(ConfigError);
  });
});

describe("pctChange", () => {
  it("is zero at the entry price", () => {
    expect(pctChange(123.45, 123.45)).toBe(0);
  });
});

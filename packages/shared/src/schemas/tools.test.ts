import { describe, expect, it } from "vitest";

import { RebalanceLegResultSchema, RebalanceRequestSchema } from "./rebalance";
import { TOOL_DESCRIPTIONS, ToolRequestSchema, failureEnvelope, successEnvelope } from "./tools";

describe("ToolRequestSchema", () => {
  it("defaults params for tools that take none", () => {
    expect(ToolRequestSchema.parse({ tool: "bot_stop" })).toEqual({ tool: "bot_stop", params: {} });
    expect(ToolRequestSchema.parse({ tool: "bot_status" })).toEqual({ tool: "bot_status", params: { refresh: false } });
  });

  it("types bot_add params", () => {
    const parsed = ToolRequestSchema.parse({ tool: "bot_add", params: { symbol: " aapl ", quantity: 10, stopLossPct: -5 } });

    expect(parsed).toEqual({ tool: "bot_add", params: { symbol: "aapl", quantity: 10, stopLossPct: -5 } });
  });

  it("rejects unknown tools and stray params", () => {
    expect(ToolRequestSchema.safeParse({ tool: "transfer_funds", params: {} }).success).toBe(false);
    expect(ToolRequestSchema.safeParse({ tool: "bot_check", params: { force: true } }).success).toBe(false);
  });

  it("describes every tool", () => {
    for (const option of ToolRequestSchema.options) {
      expect(TOOL_DESCRIPTIONS[option.shape.tool.value]).toBeTruthy();
    }
  });
});

describe("RebalanceRequestSchema", () => {
  it("rejects mismatched lengths", () => {
    const result = RebalanceRequestSchema.safeParse({ symbols: ["AAPL", "MSFT"], allocations: [0.5] });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("symbols and allocations length mismatch");
    }
  });

  it("rejects duplicate symbols regardless of case", () => {
    expect(RebalanceRequestSchema.safeParse({ symbols: ["AAPL", "aapl"], allocations: [0.2, 0.2] }).success).toBe(false);
  });

  it("defaults dryRun to false", () => {
    expect(RebalanceRequestSchema.parse({ symbols: ["AAPL"], allocations: [0.5] }).dryRun).toBe(false);
  });
});

describe("RebalanceLegResultSchema", () => {
  it("accepts only filled or failed legs", () => {
    const leg = { symbol: "AAPL", side: "SELL", quantity: 2 };

    expect(RebalanceLegResultSchema.safeParse({ ...leg, status: "FILLED" }).success).toBe(true);
    expect(RebalanceLegResultSchema.safeParse({ ...leg, status: "FAILED", error: "halted" }).success).toBe(true);
    expect(RebalanceLegResultSchema.safeParse({ ...leg, status: "SKIPPED" }).success).toBe(false);
  });
});

describe("envelopes", () => {
  it("carries data or error, never both", () => {
    const ok = successEnvelope({ a: 1 });
    const failed = failureEnvelope("boom");

    expect(ok).toMatchObject({ success: true, data: { a: 1 }, error: null });
    expect(failed).toMatchObject({ success: false, data: null, error: "boom" });
    expect(Number.isNaN(Date.parse(ok.timestamp))).toBe(false);
  });
});

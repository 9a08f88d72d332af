import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { TOOL_DESCRIPTIONS } from "@autopilot/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { BotEngineService } from "../bot/bot-engine.service";
import { PositionStoreService } from "../bot/position-store.service";
import { ConfigService } from "../config/config.service";
import { HealthService } from "../health/health.service";
import type { BrokerageService } from "../integrations/brokerage.service";
import { MarketDataService } from "../integrations/market-data.service";
import { OrderExecutorService } from "../integrations/order-executor.service";
import { PaperStoreService } from "../paper/paper-store.service";
import { PortfolioService } from "../portfolio/portfolio.service";
import { RebalanceService } from "../portfolio/rebalance.service";
import { ToolAdapterService } from "./tool-adapter.service";

describe("ToolAdapterService", () => {
  let dataDir: string;
  let botEngine: BotEngineService;
  let tools: ToolAdapterService;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "autopilot-tools-"));
    const config = new ConfigService(dataDir);
    config.update({ paper: { initialCash: 10_000, quotes: { AAPL: 100, MSFT: 50 } } });

    // Paper mode with configured quotes never reaches the brokerage.
    const brokerage = {} as unknown as BrokerageService;
    const paperStore = new PaperStoreService(config);
    const marketData = new MarketDataService(config, brokerage);
    const orders = new OrderExecutorService(config, brokerage, marketData, paperStore);
    const portfolio = new PortfolioService(config, paperStore, brokerage, marketData);
    botEngine = new BotEngineService(config, new PositionStoreService(config), marketData, orders);

    tools = new ToolAdapterService(
      botEngine,
      portfolio,
      new RebalanceService(config, portfolio, marketData, orders),
      orders,
      paperStore,
      config,
      new HealthService(config, botEngine)
    );
  });

  afterEach(async () => {
    await botEngine.stopAndDrain();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("lists every tool", () => {
    const names = tools.listTools().map((t) => t.name);

    expect(names).toEqual(Object.keys(TOOL_DESCRIPTIONS));
    expect(names).toContain("bot_add");
  });

  it("answers a request without a tool name with a failure envelope", async () => {
    await expect(tools.invoke({ params: {} })).resolves.toMatchObject({
      success: false,
      data: null,
      error: "Missing tool name"
    });
  });

  it("rejects an unknown tool", async () => {
    const envelope = await tools.invoke({ tool: "launch_rockets" });

    expect(envelope).toMatchObject({ success: false, error: 'Unknown tool "launch_rockets"' });
  });

  it("reports invalid params as a validation failure", async () => {
    const envelope = await tools.invoke({ tool: "buy_stock", params: { symbol: "AAPL", quantity: -1 } });

    expect(envelope.success).toBe(false);
    expect(envelope.error).toBe("Invalid request: params.quantity: Number must be greater than 0");
  });

  it("reports health", async () => {
    const envelope = await tools.invoke({ tool: "get_health" });

    expect(envelope).toMatchObject({ success: true, data: { ok: true, mode: "PAPER", bot: "STOPPED" } });
  });

  it("buys and shows the position in the portfolio", async () => {
    const buy = await tools.invoke({ tool: "buy_stock", params: { symbol: "aapl", quantity: 3 } });
    expect(buy).toMatchObject({ success: true, data: { symbol: "AAPL", side: "BUY", filledQuantity: 3, fillPrice: 100 } });

    const portfolio = await tools.invoke({ tool: "get_portfolio" });
    expect(portfolio).toMatchObject({
      success: true,
      data: {
        mode: "PAPER",
        cash: 9700,
        equity: 10_000,
        positions: [{ symbol: "AAPL", quantity: 3, averagePrice: 100, marketPrice: 100, marketValue: 300 }],
        errors: []
      }
    });
  });

  it("turns a domain error into a failure envelope", async () => {
    const envelope = await tools.invoke({ tool: "bot_remove", params: { symbol: "NFLX" } });

    expect(envelope).toMatchObject({ success: false, data: null, error: "NFLX is not being monitored" });
  });

  it("monitors a position and reports it in the bot status", async () => {
    const added = await tools.invoke({ tool: "bot_add", params: { symbol: "MSFT", quantity: 2, stopLossPct: -5 } });
    expect(added).toMatchObject({ success: true, data: { symbol: "MSFT", entryPrice: 50, pctChange: 0 } });

    const status = await tools.invoke({ tool: "bot_status" });
    expect(status).toMatchObject({
      success: true,
      data: { run: { phase: "STOPPED" }, positions: [{ symbol: "MSFT", quantity: 2, stopLossPct: -5 }] }
    });
  });

  it("plans a dry-run rebalance without trading", async () => {
    const envelope = await tools.invoke({
      tool: "rebalance_portfolio",
      params: { symbols: ["AAPL"], allocations: [0.5], cashBuffer: 0, dryRun: true }
    });

    expect(envelope).toMatchObject({
      success: true,
      data: {
        dryRun: true,
        plan: { totalValue: 10_000, investableValue: 10_000, intents: [{ symbol: "AAPL", side: "BUY", quantity: 50 }] },
        executions: []
      }
    });
    const account = await tools.invoke({ tool: "paper_account" });
    expect(account).toMatchObject({ data: { cash: 10_000, holdings: {} } });
  });

  it("starts and stops the bot", async () => {
    const started = await tools.invoke({ tool: "bot_start", params: { intervalMinutes: 15 } });
    const stopped = await tools.invoke({ tool: "bot_stop" });

    expect(started).toMatchObject({ success: true, data: { phase: "RUNNING", intervalMinutes: 15 } });
    expect(stopped).toMatchObject({ success: true, data: { phase: "STOPPED" } });
  });

  it("sets a simulated quote", async () => {
    const envelope = await tools.invoke({ tool: "paper_set_quote", params: { symbol: "tsla", price: 20 } });

    expect(envelope.data).toEqual({ AAPL: 100, MSFT: 50, TSLA: 20 });
  });
});

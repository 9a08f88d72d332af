import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ConfigError, PriceUnavailableError } from "../common/errors";
import { ConfigService } from "../config/config.service";
import type { BrokerageService } from "./brokerage.service";
import { MarketDataService, simulatedPrice } from "./market-data.service";

describe("simulatedPrice", () => {
  it("is stable, case-insensitive and within [100, 150)", () => {
    const price = simulatedPrice("AAPL");

    expect(simulatedPrice(" aapl ")).toBe(price);
    expect(price).toBeGreaterThanOrEqual(100);
    expect(price).toBeLessThan(150);
    expect(Math.round(price * 100) / 100).toBe(price);
  });
});

describe("MarketDataService", () => {
  let dataDir: string;
  let config: ConfigService;
  let getLastTradePrice: ReturnType<typeof vi.fn>;
  let service: MarketDataService;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "autopilot-quotes-"));
    config = new ConfigService(dataDir);
    getLastTradePrice = vi.fn();
    service = new MarketDataService(config, { getLastTradePrice } as unknown as BrokerageService);
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("prefers a configured paper quote over the simulated price", async () => {
    config.setPaperQuote("MSFT", 321.5);

    await expect(service.getPrice("msft")).resolves.toBe(321.5);
    await expect(service.getPrice("TSLA")).resolves.toBe(simulatedPrice("TSLA"));
    expect(getLastTradePrice).not.toHaveBeenCalled();
  });

  it("retries a failed live quote", async () => {
    config.update({ paper: { priceSource: "LIVE" }, bot: { priceRetries: 1 } });
    getLastTradePrice.mockRejectedValueOnce(new Error("socket hang up")).mockResolvedValueOnce(42.1);

    await expect(service.getPrice("AAPL")).resolves.toBe(42.1);
    expect(getLastTradePrice).toHaveBeenCalledTimes(2);
  });

  it("gives up with the last error once retries run out", async () => {
    config.update({ paper: { priceSource: "LIVE" }, bot: { priceRetries: 0 } });
    getLastTradePrice.mockRejectedValue(new Error("socket hang up"));

    const err: unknown = await service.getPrice("AAPL").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PriceUnavailableError);
    expect(err).toMatchObject({ message: "Price unavailable for AAPL: socket hang up" });
  });

  it("does not retry a configuration error", async () => {
    config.update({ mode: "LIVE", bot: { priceRetries: 3 } });
    getLastTradePrice.mockRejectedValue(new ConfigError("Brokerage access token is not configured"));

    await expect(service.getPrice("AAPL")).rejects.toBeInstanceOf(ConfigError);
    expect(getLastTradePrice).toHaveBeenCalledTimes(1);
  });
});

import crypto from "node:crypto";

import { Injectable, Logger } from "@nestjs/common";
import { normalizeSymbol } from "@autopilot/shared";

import { AutopilotError, PriceUnavailableError, errorMessage } from "../common/errors";
import { sleep, withTimeout } from "../common/with-timeout";
import { ConfigService } from "../config/config.service";
import { BrokerageService } from "./brokerage.service";

export interface PriceSource {
  getPrice(symbol: string): Promise<number>;
}

/**
 * Stable pseudo-price in [100, 150) derived from the symbol, so paper runs are
 * reproducible without a market feed.
 */
export function simulatedPrice(symbol: string): number {
  const digest = crypto.createHash("sha256").update(normalizeSymbol(symbol)).digest();
  const bucket = digest.readUInt32BE(0) % 500;
  return Math.round((100 + bucket / 10) * 100) / 100;
}

@Injectable()
export class MarketDataService implements PriceSource {
  private readonly logger = new Logger(MarketDataService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly brokerage: BrokerageService
  ) {}

  usesSimulatedPrices(): boolean {
    const config = this.configService.load();
    return config.mode === "PAPER" && config.paper.priceSource === "SIMULATED";
  }

  async getPrice(rawSymbol: string): Promise<number> {
    const symbol = normalizeSymbol(rawSymbol);
    const config = this.configService.load();

    if (this.usesSimulatedPrices()) {
      return config.paper.quotes[symbol] ?? simulatedPrice(symbol);
    }

    const { priceRetries, priceTimeoutMs } = config.bot;
    let lastError: unknown = null;
    for (let attempt = 0; attempt <= priceRetries; attempt += 1) {
      if (attempt > 0) {
        await sleep(Math.min(250 * 2 ** (attempt - 1), 2_000));
      }
      try {
        return await withTimeout(this.brokerage.getLastTradePrice(symbol), priceTimeoutMs, `quote ${symbol}`);
      } catch (err) {
        // Missing credentials will not fix themselves between attempts.
        if (err instanceof AutopilotError) throw err;
        lastError = err;
        this.logger.warn(`Quote attempt ${attempt + 1} for ${symbol} failed: ${errorMessage(err)}`);
      }
    }

    throw new PriceUnavailableError(symbol, errorMessage(lastError));
  }
}

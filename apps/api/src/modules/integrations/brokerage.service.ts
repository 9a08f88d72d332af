import { Injectable } from "@nestjs/common";
import type { TradeSide } from "@autopilot/shared";
import { compareSymbols, normalizeSymbol } from "@autopilot/shared";

import { ConfigError } from "../common/errors";
import { ConfigService } from "../config/config.service";
import { resolveBrokerageBaseUrl } from "./brokerage-base-url";
import { BrokerageClient, type OrderRow } from "./brokerage-client";

export type BrokerageHolding = {
  symbol: string;
  quantity: number;
  averagePrice?: number;
};

function toNumber(raw: string | null | undefined): number {
  const n = Number.parseFloat(raw ?? "");
  return Number.isFinite(n) ? n : Number.NaN;
}

@Injectable()
export class BrokerageService {
  private accountUrl: string | null = null;
  private readonly instrumentUrls = new Map<string, string>();
  private readonly symbolsByInstrument = new Map<string, string>();

  constructor(private readonly configService: ConfigService) {}

  private get client(): BrokerageClient {
    const config = this.configService.load();
    if (!config.brokerage.accessToken) {
      throw new ConfigError("Missing brokerage access token. Set AUTOPILOT_BROKER_TOKEN or brokerage.accessToken.");
    }

    return new BrokerageClient({
      baseUrl: resolveBrokerageBaseUrl(config),
      accessToken: config.brokerage.accessToken,
      tokenType: config.brokerage.tokenType,
      timeoutMs: config.brokerage.requestTimeoutMs
    });
  }

  async getLastTradePrice(symbol: string): Promise<number> {
    const data = await this.client.quotes([symbol]);
    const row = (data.results ?? []).find((r) => r && normalizeSymbol(r.symbol ?? "") === symbol);
    if (!row) {
      throw new Error(`No quote for ${symbol}`);
    }
    const price = toNumber(row.last_trade_price);
    if (!(price > 0)) {
      throw new Error(`Quote for ${symbol} has no last trade price`);
    }
    return price;
  }

  private async getAccountUrl(client: BrokerageClient): Promise<string> {
    if (this.accountUrl) return this.accountUrl;
    const data = await client.accounts();
    const account = (data.results ?? []).find((a) => a !== null);
    if (!account) {
      throw new Error("Brokerage returned no accounts");
    }
    this.accountUrl = account.url;
    return account.url;
  }

  async getCash(): Promise<number> {
    const data = await this.client.accounts();
    const account = (data.results ?? []).find((a) => a !== null);
    if (!account) {
      throw new Error("Brokerage returned no accounts");
    }
    const cash = toNumber(account.cash ?? account.buying_power);
    return Number.isFinite(cash) ? cash : 0;
  }

  private async getInstrumentUrl(client: BrokerageClient, symbol: string): Promise<string> {
    const cached = this.instrumentUrls.get(symbol);
    if (cached) return cached;
    const data = await client.instruments(symbol);
    const instrument = (data.results ?? []).find((i) => i && normalizeSymbol(i.symbol) === symbol);
    if (!instrument) {
      throw new Error(`Unknown symbol ${symbol}`);
    }
    this.instrumentUrls.set(symbol, instrument.url);
    return instrument.url;
  }

  private async getInstrumentSymbol(client: BrokerageClient, instrumentUrl: string): Promise<string> {
    const cached = this.symbolsByInstrument.get(instrumentUrl);
    if (cached) return cached;
    const instrument = await client.instrument(instrumentUrl);
    const symbol = normalizeSymbol(instrument.symbol);
    this.symbolsByInstrument.set(instrumentUrl, symbol);
    return symbol;
  }

  async getHoldings(): Promise<BrokerageHolding[]> {
    const client = this.client;
    const holdings: BrokerageHolding[] = [];

    let cursor: string | undefined;
    for (let page = 0; page < 20; page += 1) {
      const data = await client.positions(cursor);
      for (const row of data.results ?? []) {
        if (!row) continue;
        const quantity = toNumber(row.quantity);
        if (!(quantity > 0)) continue;
        const averagePrice = toNumber(row.average_buy_price);
        holdings.push({
          symbol: await this.getInstrumentSymbol(client, row.instrument),
          quantity,
          averagePrice: Number.isFinite(averagePrice) ? averagePrice : undefined
        });
      }
      if (!data.next) break;
      cursor = data.next;
    }

    return holdings.sort((a, b) => compareSymbols(a.symbol, b.symbol));
  }

  async submitMarketOrder(params: { symbol: string; side: TradeSide; quantity: number; refId: string }): Promise<OrderRow> {
    const client = this.client;
    const [account, instrument] = await Promise.all([
      this.getAccountUrl(client),
      this.getInstrumentUrl(client, params.symbol)
    ]);
    return await client.placeOrder({
      account,
      instrument,
      symbol: params.symbol,
      side: params.side === "BUY" ? "buy" : "sell",
      quantity: String(params.quantity),
      refId: params.refId
    });
  }

  async getOrder(orderId: string): Promise<OrderRow> {
    return await this.client.order(orderId);
  }
}

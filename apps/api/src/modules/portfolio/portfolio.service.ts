import { Injectable, Logger } from "@nestjs/common";
import type { LedgerEntry, TradingMode } from "@autopilot/shared";
import { compareSymbols } from "@autopilot/shared";

import { errorMessage } from "../common/errors";
import { ConfigService } from "../config/config.service";
import { BrokerageService } from "../integrations/brokerage.service";
import { MarketDataService } from "../integrations/market-data.service";
import { PaperStoreService } from "../paper/paper-store.service";

export type PortfolioPosition = {
  symbol: string;
  quantity: number;
  averagePrice?: number;
  marketPrice?: number;
  marketValue?: number;
};

export type PortfolioSnapshot = {
  fetchedAt: string;
  mode: TradingMode;
  cash: number;
  positions: PortfolioPosition[];
  equity: number;
  percentInvested: number;
  errors: string[];
};

export type AccountHoldings = {
  mode: TradingMode;
  cash: number;
  holdings: Record<string, number>;
  averagePrices: Record<string, number>;
};

@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly paperStore: PaperStoreService,
    private readonly brokerage: BrokerageService,
    private readonly marketData: MarketDataService
  ) {}

  /** Cash and share counts from the paper account or the brokerage, depending on mode. */
  async getHoldings(): Promise<AccountHoldings> {
    const mode = this.configService.load().mode;
    if (mode === "PAPER") {
      const account = this.paperStore.getAccount();
      return { mode, cash: account.cash, holdings: account.holdings, averagePrices: averageCosts(account.ledger) };
    }

    const [cash, rows] = await Promise.all([this.brokerage.getCash(), this.brokerage.getHoldings()]);
    const holdings: Record<string, number> = {};
    const averagePrices: Record<string, number> = {};
    for (const row of rows) {
      holdings[row.symbol] = (holdings[row.symbol] ?? 0) + row.quantity;
      if (row.averagePrice !== undefined) averagePrices[row.symbol] = row.averagePrice;
    }
    return { mode, cash, holdings, averagePrices };
  }

  async getSnapshot(): Promise<PortfolioSnapshot> {
    const fetchedAt = new Date().toISOString();
    const account = await this.getHoldings();
    const errors: string[] = [];

    const positions = await Promise.all(
      Object.entries(account.holdings)
        .sort(([a], [b]) => compareSymbols(a, b))
        .map(async ([symbol, quantity]): Promise<PortfolioPosition> => {
          const averagePrice = account.averagePrices[symbol];
          const base: PortfolioPosition = { symbol, quantity, ...(averagePrice !== undefined ? { averagePrice } : {}) };
          try {
            const marketPrice = await this.marketData.getPrice(symbol);
            return { ...base, marketPrice, marketValue: marketPrice * quantity };
          } catch (err) {
            errors.push(errorMessage(err));
            return base;
          }
        })
    );

    const invested = positions.reduce((sum, p) => sum + (p.marketValue ?? 0), 0);
    const equity = account.cash + invested;
    if (errors.length > 0) {
      this.logger.warn(`Portfolio snapshot missing ${errors.length} price(s)`);
    }

    return {
      fetchedAt,
      mode: account.mode,
      cash: account.cash,
      positions,
      equity,
      percentInvested: equity > 0 ? (invested / equity) * 100 : 0,
      errors
    };
  }
}

/** Average buy cost per symbol still held, replaying the paper ledger. */
export function averageCosts(ledger: ReadonlyArray<LedgerEntry>): Record<string, number> {
  const lots = new Map<string, { quantity: number; cost: number }>();
  for (const entry of ledger) {
    const lot = lots.get(entry.symbol) ?? { quantity: 0, cost: 0 };
    if (entry.side === "BUY") {
      lot.quantity += entry.quantity;
      lot.cost += entry.quantity * entry.fillPrice;
    } else if (lot.quantity > 0) {
      const avg = lot.cost / lot.quantity;
      lot.quantity = Math.max(0, lot.quantity - entry.quantity);
      lot.cost = avg * lot.quantity;
    }
    lots.set(entry.symbol, lot);
  }

  const out: Record<string, number> = {};
  for (const [symbol, lot] of lots) {
    if (lot.quantity > 1e-9) out[symbol] = lot.cost / lot.quantity;
  }
  return out;
}

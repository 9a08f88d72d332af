import { Injectable, Logger } from "@nestjs/common";
import type { RebalanceLegResult, RebalanceRequest, RebalanceResult } from "@autopilot/shared";

import { ConfigError, errorMessage } from "../common/errors";
import { ConfigService } from "../config/config.service";
import { MarketDataService } from "../integrations/market-data.service";
import { OrderExecutorService } from "../integrations/order-executor.service";
import { PortfolioService } from "./portfolio.service";
import { planRebalance, validateTargets } from "./rebalancer";

@Injectable()
export class RebalanceService {
  private readonly logger = new Logger(RebalanceService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly portfolio: PortfolioService,
    private readonly marketData: MarketDataService,
    private readonly orders: OrderExecutorService
  ) {}

  async rebalance(request: RebalanceRequest): Promise<RebalanceResult> {
    const settings = this.configService.load().rebalance;
    const cashBuffer = request.cashBuffer ?? settings.defaultCashBuffer;

    if (request.symbols.length !== request.allocations.length) {
      throw new ConfigError("symbols and allocations length mismatch");
    }
    const requested: Record<string, number> = {};
    request.symbols.forEach((symbol, i) => {
      if (symbol in requested) {
        throw new ConfigError(`Duplicate allocation for ${symbol}`);
      }
      requested[symbol] = request.allocations[i] ?? Number.NaN;
    });
    // Bad allocations fail before any price is fetched.
    const targetAllocations = validateTargets(requested, cashBuffer);

    const account = await this.portfolio.getHoldings();
    const priced = new Set([...Object.keys(targetAllocations), ...Object.keys(account.holdings)]);
    const prices: Record<string, number> = {};
    for (const symbol of [...priced].sort()) {
      prices[symbol] = await this.marketData.getPrice(symbol);
    }

    const plan = planRebalance(
      { holdings: account.holdings, cash: account.cash, prices, targetAllocations, cashBuffer },
      { fractionalShares: settings.fractionalShares, minTradeNotional: settings.minTradeNotional }
    );
    this.logger.log(
      `Rebalance plan (${request.dryRun ? "dry run" : account.mode}): ` +
        (plan.intents.length > 0 ? plan.intents.map((i) => `${i.side} ${i.quantity} ${i.symbol}`).join(", ") : "no trades")
    );

    if (request.dryRun) {
      return { dryRun: true, plan, executions: [] };
    }

    // Sequential so sells settle cash before the buys that spend it.
    const executions: RebalanceLegResult[] = [];
    for (const intent of plan.intents) {
      try {
        const fill = await this.orders.execute({ symbol: intent.symbol, side: intent.side, quantity: intent.quantity });
        executions.push({
          ...intent,
          status: "FILLED",
          orderId: fill.orderId,
          fillPrice: fill.fillPrice,
          filledQuantity: fill.filledQuantity
        });
      } catch (err) {
        const message = errorMessage(err);
        this.logger.warn(`Rebalance leg ${intent.side} ${intent.quantity} ${intent.symbol} failed: ${message}`);
        executions.push({ ...intent, status: "FAILED", error: message });
      }
    }

    return { dryRun: false, plan, executions };
  }
}

import crypto from "node:crypto";

import { Injectable, Logger } from "@nestjs/common";
import type { TradeSide, TradingMode } from "@autopilot/shared";
import { normalizeSymbol } from "@autopilot/shared";

import { AutopilotError, ConfigError, OrderRejectedError, TimeoutError, errorMessage } from "../common/errors";
import { sleep, withTimeout } from "../common/with-timeout";
import { ConfigService } from "../config/config.service";
import { PaperStoreService } from "../paper/paper-store.service";
import { BrokerageHttpError, type OrderRow } from "./brokerage-client";
import { BrokerageService } from "./brokerage.service";
import { MarketDataService } from "./market-data.service";

export type OrderRequest = {
  symbol: string;
  side: TradeSide;
  quantity: number;
  /** Reused on retries so a resubmitted order is recognised as the same one. */
  clientOrderId?: string;
};

export type OrderFill = {
  orderId: string;
  clientOrderId: string;
  mode: TradingMode;
  symbol: string;
  side: TradeSide;
  filledQuantity: number;
  fillPrice: number;
  executedAt: string;
};

export interface OrderExecutor {
  execute(request: OrderRequest): Promise<OrderFill>;
}

type PreparedOrder = Required<OrderRequest>;

const TERMINAL_REJECTIONS = new Set<OrderRow["state"]>(["rejected", "cancelled", "failed"]);

function parseQty(raw: string | null | undefined): number {
  const n = Number.parseFloat(raw ?? "");
  return Number.isFinite(n) ? n : 0;
}

@Injectable()
export class OrderExecutorService implements OrderExecutor {
  private readonly logger = new Logger(OrderExecutorService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly brokerage: BrokerageService,
    private readonly marketData: MarketDataService,
    private readonly paperStore: PaperStoreService
  ) {}

  async execute(request: OrderRequest): Promise<OrderFill> {
    const symbol = normalizeSymbol(request.symbol);
    if (!symbol) {
      throw new ConfigError("Order symbol is required");
    }
    if (!Number.isFinite(request.quantity) || request.quantity <= 0) {
      throw new ConfigError(`Order quantity must be positive, got ${request.quantity}`);
    }

    const config = this.configService.load();
    const order: PreparedOrder = {
      symbol,
      side: request.side,
      quantity: request.quantity,
      clientOrderId: request.clientOrderId ?? crypto.randomUUID()
    };
    const { orderTimeoutMs, orderPollIntervalMs } = config.bot;
    const label = `${order.side} ${order.quantity} ${symbol}`;

    this.logger.log(`Submitting ${config.mode} order ${label} (ref ${order.clientOrderId})`);
    try {
      const work = config.mode === "LIVE" ? this.executeLive(order, orderPollIntervalMs, orderTimeoutMs) : this.executePaper(order);
      const fill = await withTimeout(work, orderTimeoutMs, label);
      this.logger.log(`Filled ${label} at ${fill.fillPrice} (order ${fill.orderId})`);
      return fill;
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new OrderRejectedError(symbol, `${err.message}; outcome unknown, ref ${order.clientOrderId}`, true);
      }
      // Insufficient funds/shares, price and config failures keep their own type.
      if (err instanceof AutopilotError) throw err;
      const definite = err instanceof BrokerageHttpError && err.status >= 400 && err.status < 500;
      throw new OrderRejectedError(symbol, errorMessage(err), !definite);
    }
  }

  private async executePaper(order: PreparedOrder): Promise<OrderFill> {
    const price = await this.marketData.getPrice(order.symbol);
    const entry = await this.paperStore.apply(
      { symbol: order.symbol, side: order.side, quantity: order.quantity },
      price,
      order.clientOrderId
    );
    return {
      orderId: entry.id,
      clientOrderId: order.clientOrderId,
      mode: "PAPER",
      symbol: entry.symbol,
      side: entry.side,
      filledQuantity: entry.quantity,
      fillPrice: entry.fillPrice,
      executedAt: entry.ts
    };
  }

  private async executeLive(order: PreparedOrder, pollIntervalMs: number, timeoutMs: number): Promise<OrderFill> {
    const deadline = Date.now() + timeoutMs;
    let row = await this.brokerage.submitMarketOrder({
      symbol: order.symbol,
      side: order.side,
      quantity: order.quantity,
      refId: order.clientOrderId
    });

    // Stops on its own at the deadline so a timed-out order does not keep polling.
    while (row.state !== "filled") {
      if (TERMINAL_REJECTIONS.has(row.state)) {
        throw new OrderRejectedError(order.symbol, row.reject_reason ?? `order ${row.id} ${row.state}`);
      }
      if (Date.now() + pollIntervalMs > deadline) {
        throw new TimeoutError(`${order.side} ${order.quantity} ${order.symbol}`, timeoutMs);
      }
      await sleep(pollIntervalMs);
      row = await this.brokerage.getOrder(row.id);
    }

    const filledQuantity = parseQty(row.cumulative_quantity) || order.quantity;
    const fillPrice = parseQty(row.average_price);
    if (!(fillPrice > 0)) {
      throw new OrderRejectedError(order.symbol, `order ${row.id} filled without an average price`, true);
    }

    return {
      orderId: row.id,
      clientOrderId: order.clientOrderId,
      mode: "LIVE",
      symbol: order.symbol,
      side: order.side,
      filledQuantity,
      fillPrice,
      executedAt: new Date().toISOString()
    };
  }
}

import crypto from "node:crypto";

import { Injectable, Logger, type OnModuleDestroy } from "@nestjs/common";
import type {
  BotAddParams,
  BotRunState,
  BotStatus,
  CheckReport,
  CheckTrigger,
  MonitoredPosition,
  PositionCheckResult,
  PositionStatusView
} from "@autopilot/shared";
import { defaultBotRunState, normalizeSymbol } from "@autopilot/shared";

import { ConfigError, OrderRejectedError, errorMessage } from "../common/errors";
import { ConfigService } from "../config/config.service";
import { MarketDataService } from "../integrations/market-data.service";
import { OrderExecutorService } from "../integrations/order-executor.service";
import { type PositionPatch, PositionStoreService } from "./position-store.service";
import { evaluateTrigger, pctChange } from "./trigger-evaluator";

export type BotStatusOptions = {
  /** Fetch a fresh price per position instead of using the last observed one. */
  refresh?: boolean;
};

@Injectable()
export class BotEngineService implements OnModuleDestroy {
  private readonly logger = new Logger(BotEngineService.name);

  private run: BotRunState;
  private loopTimer: NodeJS.Timeout | null = null;
  private loopGeneration = 0;
  private checkLock: Promise<void> | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly positions: PositionStoreService,
    private readonly marketData: MarketDataService,
    private readonly orders: OrderExecutorService
  ) {
    this.run = defaultBotRunState(this.configService.load().bot.defaultIntervalMinutes);
  }

  async onModuleDestroy(): Promise<void> {
    await this.stopAndDrain();
  }

  getRunState(): BotRunState {
    return { ...this.run };
  }

  async add(params: BotAddParams): Promise<PositionStatusView> {
    const symbol = normalizeSymbol(params.symbol);
    if (!symbol) {
      throw new ConfigError("Symbol is required");
    }
    if (!Number.isFinite(params.quantity) || params.quantity <= 0) {
      throw new ConfigError(`Quantity must be positive, got ${params.quantity}`);
    }
    if (params.stopLossPct === undefined && params.takeProfitPct === undefined) {
      throw new ConfigError(`Nothing to monitor for ${symbol}: set stopLossPct, takeProfitPct or both`);
    }

    const entryPrice = await this.marketData.getPrice(symbol);
    const now = new Date().toISOString();
    const position: MonitoredPosition = {
      id: crypto.randomUUID(),
      symbol,
      quantity: params.quantity,
      ...(params.stopLossPct !== undefined ? { stopLossPct: params.stopLossPct } : {}),
      ...(params.takeProfitPct !== undefined ? { takeProfitPct: params.takeProfitPct } : {}),
      entryPrice,
      status: "ACTIVE",
      createdAt: now,
      lastPrice: entryPrice
    };

    const replaced = this.positions.upsert(position);
    this.logger.log(
      `${replaced ? "Re-armed" : "Monitoring"} ${symbol} x${position.quantity} from ${entryPrice} ` +
        `(stop ${position.stopLossPct ?? "-"}%, take ${position.takeProfitPct ?? "-"}%)`
    );
    return this.toView(position);
  }

  remove(rawSymbol: string): MonitoredPosition {
    const symbol = normalizeSymbol(rawSymbol);
    const removed = this.positions.remove(symbol);
    this.logger.log(`Stopped monitoring ${symbol}`);
    return removed;
  }

  start(intervalMinutes?: number): BotRunState {
    const interval = intervalMinutes ?? this.configService.load().bot.defaultIntervalMinutes;
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new ConfigError(`Interval must be a positive number of minutes, got ${interval}`);
    }
    if (this.run.phase === "RUNNING") {
      throw new ConfigError(`Bot is already running every ${this.run.intervalMinutes} minute(s)`);
    }

    this.run = {
      ...this.run,
      phase: "RUNNING",
      intervalMinutes: interval,
      startedAt: new Date().toISOString(),
      lastError: null
    };
    this.loopGeneration += 1;
    this.scheduleNext(this.loopGeneration);
    this.logger.log(`Bot started, checking every ${interval} minute(s)`);
    return this.getRunState();
  }

  /** No-op when already stopped. An in-flight check finishes on its own. */
  stop(): BotRunState {
    if (this.run.phase === "STOPPED") {
      return this.getRunState();
    }

    this.loopGeneration += 1;
    if (this.loopTimer) clearTimeout(this.loopTimer);
    this.loopTimer = null;
    this.run = { ...this.run, phase: "STOPPED" };
    this.logger.log("Bot stopped");
    return this.getRunState();
  }

  /** Stops the loop and waits for an in-flight check to finish. */
  async stopAndDrain(): Promise<BotRunState> {
    this.stop();
    while (this.checkLock) {
      await this.checkLock;
    }
    return this.getRunState();
  }

  /** Waits for any in-flight check rather than running alongside it. */
  async checkOnce(trigger: CheckTrigger = "MANUAL"): Promise<CheckReport> {
    return await this.exclusive(() => this.performCheck(trigger));
  }

  async status(options: BotStatusOptions = {}): Promise<BotStatus> {
    const active = this.positions.listActive();
    const positions = options.refresh
      ? await Promise.all(active.map((p) => this.toRefreshedView(p)))
      : active.map((p) => this.toView(p));

    return {
      run: this.getRunState(),
      positions,
      recentlyClosed: this.positions.recentlyClosed()
    };
  }

  private scheduleNext(generation: number): void {
    const delayMs = this.run.intervalMinutes * 60_000;
    this.loopTimer = setTimeout(() => {
      this.loopTimer = null;
      void this.runScheduledCheck(generation);
    }, delayMs);
  }

  private isCurrentLoop(generation: number): boolean {
    return this.run.phase === "RUNNING" && generation === this.loopGeneration;
  }

  private async exclusive<T>(work: () => Promise<T>): Promise<T> {
    while (this.checkLock) {
      await this.checkLock;
    }

    let release: () => void = () => undefined;
    this.checkLock = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.run = { ...this.run, checking: true };

    try {
      return await work();
    } finally {
      this.run = { ...this.run, checking: false };
      this.checkLock = null;
      release();
    }
  }

  private async runScheduledCheck(generation: number): Promise<void> {
    if (!this.isCurrentLoop(generation)) return;

    try {
      await this.exclusive(async () => {
        // stop() may have run while this check waited behind a manual one.
        if (this.isCurrentLoop(generation)) {
          await this.performCheck("SCHEDULED");
        }
      });
    } catch (err) {
      const message = errorMessage(err);
      this.run = { ...this.run, lastError: message };
      this.logger.error(`Scheduled check failed: ${message}`);
    } finally {
      if (this.isCurrentLoop(generation)) {
        this.scheduleNext(generation);
      }
    }
  }

  private async performCheck(trigger: CheckTrigger): Promise<CheckReport> {
    const startedAt = new Date().toISOString();
    const snapshot = this.positions.listActive();
    const results: PositionCheckResult[] = [];

    for (const position of snapshot) {
      results.push(await this.checkPosition(position));
    }

    const finishedAt = new Date().toISOString();
    const failures = results.filter((r) => r.outcome === "FAILED");
    const triggered = results.filter((r) => r.outcome === "TRIGGERED").length;
    this.run = {
      ...this.run,
      lastCheckAt: finishedAt,
      lastError: failures.length > 0 ? failures.map((r) => `${r.symbol}: ${r.error ?? "unknown error"}`).join("; ") : null
    };

    if (snapshot.length > 0) {
      this.logger.log(
        `${trigger} check: ${results.length} position(s), ${triggered} triggered, ${failures.length} failed`
      );
    }

    return {
      trigger,
      startedAt,
      finishedAt,
      checked: results.filter((r) => r.outcome !== "SUPPRESSED").length,
      triggered,
      failed: failures.length,
      results
    };
  }

  private async checkPosition(snapshotEntry: MonitoredPosition): Promise<PositionCheckResult> {
    const { id, symbol } = snapshotEntry;
    if (!this.positions.getActiveById(id)) {
      return { symbol, outcome: "SUPPRESSED" };
    }

    let price: number;
    try {
      price = await this.marketData.getPrice(symbol);
    } catch (err) {
      return this.recordFailure(snapshotEntry, errorMessage(err));
    }

    // Removed or replaced while the quote was in flight.
    const position = this.positions.getActiveById(id);
    if (!position) {
      return { symbol, outcome: "SUPPRESSED" };
    }

    const checkedAt = new Date().toISOString();
    const decision = evaluateTrigger(position, price);
    if (decision.kind === "NONE") {
      this.positions.update(id, { lastCheckAt: checkedAt, lastPrice: price, lastError: undefined });
      return { symbol, outcome: "HOLD", price, pctChange: decision.pctChange };
    }

    // The reference is on disk before the order leaves, so a retry after a lost response reuses it.
    const clientOrderId = position.pendingOrderRef ?? crypto.randomUUID();
    this.positions.update(id, { lastCheckAt: checkedAt, lastPrice: price, pendingOrderRef: clientOrderId });
    this.logger.warn(
      `${decision.kind} on ${symbol}: ${price} is ${decision.pctChange.toFixed(2)}% from ${position.entryPrice}; selling ${position.quantity}`
    );

    try {
      const fill = await this.orders.execute({ symbol, side: "SELL", quantity: position.quantity, clientOrderId });
      this.positions.markTriggered(id, {
        kind: decision.kind,
        triggeredAt: fill.executedAt,
        price,
        pctChange: decision.pctChange,
        orderId: fill.orderId,
        clientOrderId,
        filledQuantity: fill.filledQuantity,
        fillPrice: fill.fillPrice
      });
      return {
        symbol,
        outcome: "TRIGGERED",
        price,
        pctChange: decision.pctChange,
        trigger: decision.kind,
        orderId: fill.orderId,
        fillPrice: fill.fillPrice
      };
    } catch (err) {
      // Only an order the broker may still hold keeps its reference; a definite
      // rejection frees the next attempt to place a new order.
      const mayHaveReachedBroker = err instanceof OrderRejectedError && err.outcomeUnknown;
      const failed = this.recordFailure(position, errorMessage(err), mayHaveReachedBroker ? {} : { pendingOrderRef: undefined });
      return { ...failed, price, pctChange: decision.pctChange, trigger: decision.kind };
    }
  }

  private recordFailure(position: MonitoredPosition, message: string, patch: PositionPatch = {}): PositionCheckResult {
    this.positions.update(position.id, { ...patch, lastCheckAt: new Date().toISOString(), lastError: message });
    this.logger.warn(`Check failed for ${position.symbol}: ${message}`);
    return { symbol: position.symbol, outcome: "FAILED", error: message };
  }

  private toView(position: MonitoredPosition): PositionStatusView {
    return {
      symbol: position.symbol,
      quantity: position.quantity,
      entryPrice: position.entryPrice,
      ...(position.stopLossPct !== undefined ? { stopLossPct: position.stopLossPct } : {}),
      ...(position.takeProfitPct !== undefined ? { takeProfitPct: position.takeProfitPct } : {}),
      createdAt: position.createdAt,
      ...(position.lastCheckAt ? { lastCheckAt: position.lastCheckAt } : {}),
      ...(position.lastPrice !== undefined
        ? { currentPrice: position.lastPrice, pctChange: pctChange(position.entryPrice, position.lastPrice) }
        : {}),
      ...(position.lastError ? { lastError: position.lastError } : {})
    };
  }

  private async toRefreshedView(position: MonitoredPosition): Promise<PositionStatusView> {
    const view = this.toView(position);
    try {
      const price = await this.marketData.getPrice(position.symbol);
      return { ...view, currentPrice: price, pctChange: pctChange(position.entryPrice, price) };
    } catch (err) {
      return { ...view, error: errorMessage(err) };
    }
  }
}

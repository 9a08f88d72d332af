import fs from "node:fs";

import { Injectable, Logger } from "@nestjs/common";
import type { BotState, MonitoredPosition, TriggerRecord } from "@autopilot/shared";
import { BOT_HISTORY_LIMIT, BotStateSchema, compareSymbols, defaultBotState } from "@autopilot/shared";

import { NotFoundError, errorMessage } from "../common/errors";
import { atomicWriteFile } from "../common/fs";
import { ConfigService } from "../config/config.service";

export type PositionPatch = Partial<Pick<MonitoredPosition, "lastCheckAt" | "lastPrice" | "lastError" | "pendingOrderRef">>;

/**
 * Monitored positions on disk, so the HTTP server, the CLI and the stdio adapter
 * all see one set. Every mutation is read-modify-write of bot-state.json.
 */
@Injectable()
export class PositionStoreService {
  private readonly logger = new Logger(PositionStoreService.name);

  constructor(private readonly configService: ConfigService) {}

  get statePath(): string {
    return this.configService.resolvePath("bot-state.json");
  }

  getState(): BotState {
    const filePath = this.statePath;
    if (!fs.existsSync(filePath)) {
      return defaultBotState();
    }

    try {
      const raw = fs.readFileSync(filePath, "utf-8");
      return BotStateSchema.parse(JSON.parse(raw));
    } catch (err) {
      const backupPath = `${filePath}.corrupt-${Date.now()}`;
      fs.renameSync(filePath, backupPath);
      this.logger.warn(`Bot state at ${filePath} is unreadable (${errorMessage(err)}); moved to ${backupPath}`);
      return defaultBotState();
    }
  }

  /** Active positions in ascending symbol order. */
  listActive(): MonitoredPosition[] {
    return [...this.getState().positions].sort((a, b) => compareSymbols(a.symbol, b.symbol));
  }

  findActive(symbol: string): MonitoredPosition | undefined {
    return this.getState().positions.find((p) => p.symbol === symbol);
  }

  getActiveById(id: string): MonitoredPosition | undefined {
    return this.getState().positions.find((p) => p.id === id);
  }

  recentlyClosed(limit = 10): MonitoredPosition[] {
    return this.getState().history.slice(0, limit);
  }

  /** Replaces any active entry for the same symbol; the replaced one goes to history as REMOVED. */
  upsert(position: MonitoredPosition): MonitoredPosition | undefined {
    return this.mutate((state) => {
      const previous = state.positions.find((p) => p.symbol === position.symbol);
      const positions = [...state.positions.filter((p) => p.symbol !== position.symbol), position];
      const history = previous ? this.pushHistory(state, { ...previous, status: "REMOVED", closedAt: position.createdAt }) : state.history;
      return { state: { ...state, positions, history }, result: previous };
    });
  }

  remove(symbol: string): MonitoredPosition {
    return this.mutate((state) => {
      const existing = state.positions.find((p) => p.symbol === symbol);
      if (!existing) {
        throw new NotFoundError(`${symbol} is not being monitored`);
      }
      const removed: MonitoredPosition = { ...existing, status: "REMOVED", closedAt: new Date().toISOString() };
      return {
        state: {
          ...state,
          positions: state.positions.filter((p) => p.id !== existing.id),
          history: this.pushHistory(state, removed)
        },
        result: removed
      };
    });
  }

  /** Patches an active position. Returns undefined when it is no longer active. */
  update(id: string, patch: PositionPatch): MonitoredPosition | undefined {
    return this.mutate((state) => {
      const existing = state.positions.find((p) => p.id === id);
      if (!existing) {
        return { state: null, result: undefined };
      }
      const next: MonitoredPosition = { ...existing, ...patch };
      // An explicit undefined clears the field.
      if (patch.lastError === undefined && "lastError" in patch) {
        delete next.lastError;
      }
      if (patch.pendingOrderRef === undefined && "pendingOrderRef" in patch) {
        delete next.pendingOrderRef;
      }
      return {
        state: { ...state, positions: state.positions.map((p) => (p.id === id ? next : p)) },
        result: next
      };
    });
  }

  /**
   * Moves a position to history as TRIGGERED. A position removed while its sell
   * was in flight is already in history and gets the trigger attached there.
   */
  markTriggered(id: string, trigger: TriggerRecord): MonitoredPosition | undefined {
    return this.mutate((state) => {
      const active = state.positions.find((p) => p.id === id);
      const source = active ?? state.history.find((p) => p.id === id);
      if (!source) {
        return { state: null, result: undefined };
      }

      const { pendingOrderRef: _settled, lastError: _cleared, ...rest } = source;
      const triggered: MonitoredPosition = {
        ...rest,
        status: "TRIGGERED",
        lastPrice: trigger.price,
        lastCheckAt: trigger.triggeredAt,
        trigger,
        closedAt: trigger.triggeredAt
      };

      const history = active
        ? this.pushHistory(state, triggered)
        : state.history.map((p) => (p.id === id ? triggered : p));
      return {
        state: { ...state, positions: state.positions.filter((p) => p.id !== id), history },
        result: triggered
      };
    });
  }

  private pushHistory(state: BotState, entry: MonitoredPosition): MonitoredPosition[] {
    return [entry, ...state.history].slice(0, BOT_HISTORY_LIMIT);
  }

  private mutate<T>(fn: (state: BotState) => { state: BotState | null; result: T }): T {
    const { state, result } = fn(this.getState());
    if (state) {
      fs.mkdirSync(this.configService.dataDir, { recursive: true });
      const next: BotState = { ...state, updatedAt: new Date().toISOString() };
      atomicWriteFile(this.statePath, JSON.stringify(next, null, 2));
    }
    return result;
  }
}

import crypto from "node:crypto";
import fs from "node:fs";

import { Injectable, Logger } from "@nestjs/common";
import type { LedgerEntry, PaperAccount, TradeIntent } from "@autopilot/shared";
import {
  TradeIntentSchema,
  defaultPaperAccount,
  deserializePaperAccount,
  normalizeSymbol,
  serializePaperAccount
} from "@autopilot/shared";

import { ConfigError, InsufficientFundsError, InsufficientSharesError, errorMessage } from "../common/errors";
import { atomicWriteFile } from "../common/fs";
import { ConfigService } from "../config/config.service";

const QTY_EPSILON = 1e-9;
const CASH_EPSILON = 1e-6;

@Injectable()
export class PaperStoreService {
  private readonly logger = new Logger(PaperStoreService.name);
  private cached: PaperAccount | null = null;
  private cachedMtimeMs: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly configService: ConfigService) {}

  get accountPath(): string {
    return this.configService.resolvePath("paper-account.json");
  }

  getAccount(): PaperAccount {
    return structuredClone(this.load());
  }

  apply(intent: TradeIntent, fillPrice: number, clientOrderId?: string): Promise<LedgerEntry> {
    return this.serialize(() => this.applyNow(intent, fillPrice, clientOrderId));
  }

  reset(): Promise<PaperAccount> {
    return this.serialize(() => {
      const fresh = defaultPaperAccount(this.configService.load().paper.initialCash);
      this.save(fresh);
      this.logger.log(`Paper account reset to $${fresh.cash.toFixed(2)}`);
      return structuredClone(fresh);
    });
  }

  private serialize<T>(task: () => T): Promise<T> {
    const result = this.queue.then(task);
    // The queue only orders writers; the task's own error reaches the caller through `result`.
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private applyNow(rawIntent: TradeIntent, fillPrice: number, clientOrderId?: string): LedgerEntry {
    const parsed = TradeIntentSchema.safeParse(rawIntent);
    if (!parsed.success) {
      throw new ConfigError(`Invalid trade intent: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    if (!Number.isFinite(fillPrice) || fillPrice <= 0) {
      throw new ConfigError(`Invalid fill price ${fillPrice}`);
    }

    const intent: TradeIntent = { ...parsed.data, symbol: normalizeSymbol(parsed.data.symbol) };
    const account = this.load();

    if (clientOrderId) {
      const existing = account.ledger.find((e) => e.clientOrderId === clientOrderId);
      if (existing) {
        this.logger.warn(`Duplicate paper order ${clientOrderId} for ${existing.symbol}; returning the original fill`);
        return { ...existing };
      }
    }

    const notional = intent.quantity * fillPrice;
    const held = account.holdings[intent.symbol] ?? 0;
    let cash = account.cash;
    const holdings = { ...account.holdings };

    if (intent.side === "BUY") {
      if (notional > cash + CASH_EPSILON) {
        throw new InsufficientFundsError(
          `Insufficient cash in paper account: buying ${intent.quantity} ${intent.symbol} needs $${notional.toFixed(2)}, available $${cash.toFixed(2)}`
        );
      }
      cash = Math.max(0, cash - notional);
      holdings[intent.symbol] = held + intent.quantity;
    } else {
      if (intent.quantity > held + QTY_EPSILON) {
        throw new InsufficientSharesError(
          `Insufficient shares in paper account: selling ${intent.quantity} ${intent.symbol}, held ${held}`
        );
      }
      cash += notional;
      const remaining = held - intent.quantity;
      if (remaining > QTY_EPSILON) {
        holdings[intent.symbol] = remaining;
      } else {
        delete holdings[intent.symbol];
      }
    }

    const entry: LedgerEntry = {
      id: crypto.randomUUID(),
      ts: new Date().toISOString(),
      symbol: intent.symbol,
      side: intent.side,
      quantity: intent.quantity,
      fillPrice,
      ...(clientOrderId ? { clientOrderId } : {})
    };

    // Cash, holdings and ledger land in one write, or the write fails and nothing changes.
    this.save({ ...account, cash, holdings, ledger: [...account.ledger, entry] });
    return { ...entry };
  }

  private load(): PaperAccount {
    const filePath = this.accountPath;
    if (!fs.existsSync(filePath)) {
      if (!this.cached) {
        this.cached = defaultPaperAccount(this.configService.load().paper.initialCash);
        this.cachedMtimeMs = null;
      }
      return this.cached;
    }

    const stat = fs.statSync(filePath);
    if (this.cached && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cached;
    }

    try {
      this.cached = deserializePaperAccount(fs.readFileSync(filePath, "utf-8"));
      this.cachedMtimeMs = stat.mtimeMs;
    } catch (err) {
      const backupPath = `${filePath}.corrupt-${Date.now()}`;
      fs.renameSync(filePath, backupPath);
      this.logger.warn(`Paper account at ${filePath} is unreadable (${errorMessage(err)}); moved to ${backupPath} and starting fresh`);
      this.cached = defaultPaperAccount(this.configService.load().paper.initialCash);
      this.cachedMtimeMs = null;
    }
    return this.cached;
  }

  private save(account: PaperAccount): void {
    fs.mkdirSync(this.configService.dataDir, { recursive: true });
    atomicWriteFile(this.accountPath, serializePaperAccount(account));
    this.cached = account;
    this.cachedMtimeMs = fs.statSync(this.accountPath).mtimeMs;
  }
}

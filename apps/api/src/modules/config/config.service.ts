import fs from "node:fs";
import path from "node:path";

import { Inject, Injectable, Optional } from "@nestjs/common";
import type { AppConfig, AppConfigPatch } from "@autopilot/shared";
import { AppConfigPatchSchema, AppConfigSchema, TradingModeSchema, normalizeSymbol } from "@autopilot/shared";

import { ConfigError } from "../common/errors";
import { atomicWriteFile } from "../common/fs";

export const DATA_DIR = Symbol("DATA_DIR");

@Injectable()
export class ConfigService {
  private cachedConfig: AppConfig | null = null;
  private cachedMtimeMs: number | null = null;

  constructor(@Optional() @Inject(DATA_DIR) private readonly dataDirOverride?: string) {}

  get dataDir(): string {
    return this.dataDirOverride ?? process.env.DATA_DIR ?? path.resolve(process.cwd(), ".autopilot");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  resolvePath(fileName: string): string {
    return path.join(this.dataDir, fileName);
  }

  load(): AppConfig {
    return this.applyEnv(this.loadFromDisk());
  }

  private loadFromDisk(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      this.cachedConfig = null;
      this.cachedMtimeMs = null;
      return AppConfigSchema.parse({});
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedConfig;
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    let parsed: AppConfig;
    try {
      parsed = AppConfigSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new ConfigError(`Invalid ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.cachedConfig = parsed;
    this.cachedMtimeMs = stat.mtimeMs;
    return parsed;
  }

  private applyEnv(config: AppConfig): AppConfig {
    const env = process.env;
    const mode = env.AUTOPILOT_MODE?.trim().toUpperCase();
    const port = env.PORT ? Number.parseInt(env.PORT, 10) : Number.NaN;

    return AppConfigSchema.parse({
      ...config,
      mode: mode ? TradingModeSchema.parse(mode) : config.mode,
      brokerage: {
        ...config.brokerage,
        ...(env.AUTOPILOT_BROKER_URL?.trim() ? { baseUrl: env.AUTOPILOT_BROKER_URL.trim() } : {}),
        ...(env.AUTOPILOT_BROKER_TOKEN?.trim() ? { accessToken: env.AUTOPILOT_BROKER_TOKEN.trim() } : {})
      },
      server: {
        ...config.server,
        ...(env.HOST?.trim() ? { host: env.HOST.trim() } : {}),
        ...(Number.isFinite(port) ? { port } : {}),
        ...(env.AUTOPILOT_API_KEY?.trim() ? { apiKey: env.AUTOPILOT_API_KEY.trim() } : {})
      }
    });
  }

  save(config: AppConfig): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.configPath, JSON.stringify(config, null, 2));
    this.cachedConfig = config;
    this.cachedMtimeMs = fs.statSync(this.configPath).mtimeMs;
  }

  update(patch: AppConfigPatch): AppConfig {
    const valid = AppConfigPatchSchema.parse(patch);
    const current = this.loadFromDisk();

    const next = AppConfigSchema.parse({
      ...current,
      ...(valid.mode ? { mode: valid.mode } : {}),
      brokerage: { ...current.brokerage, ...valid.brokerage },
      bot: { ...current.bot, ...valid.bot },
      rebalance: { ...current.rebalance, ...valid.rebalance },
      paper: { ...current.paper, ...valid.paper },
      server: { ...current.server, ...valid.server }
    });

    this.save(next);
    return this.applyEnv(next);
  }

  setPaperQuote(symbol: string, price: number): AppConfig {
    if (!Number.isFinite(price) || price <= 0) {
      throw new ConfigError(`Quote for ${symbol} must be a positive number`);
    }
    const current = this.loadFromDisk();
    return this.update({ paper: { quotes: { ...current.paper.quotes, [normalizeSymbol(symbol)]: price } } });
  }
}

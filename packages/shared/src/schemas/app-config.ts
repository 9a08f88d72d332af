import { z } from "zod";

export const CONFIG_VERSION = 1 as const;

export const TradingModeSchema = z.enum(["PAPER", "LIVE"]);
export type TradingMode = z.infer<typeof TradingModeSchema>;

export const PaperPriceSourceSchema = z.enum(["SIMULATED", "LIVE"]);
export type PaperPriceSource = z.infer<typeof PaperPriceSourceSchema>;

export const DEFAULT_BROKERAGE_BASE_URL = "https://api.robinhood.com";

export const BrokerageSettingsSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_BROKERAGE_BASE_URL),
  accessToken: z.string().min(1).optional(),
  tokenType: z.string().min(1).default("Bearer"),
  requestTimeoutMs: z.number().int().min(1_000).max(120_000).default(30_000)
});
export type BrokerageSettings = z.infer<typeof BrokerageSettingsSchema>;

export const BotSettingsSchema = z.object({
  defaultIntervalMinutes: z.number().positive().max(1_440).default(5),
  priceTimeoutMs: z.number().int().min(100).max(120_000).default(10_000),
  priceRetries: z.number().int().min(0).max(5).default(2),
  orderTimeoutMs: z.number().int().min(100).max(300_000).default(30_000),
  orderPollIntervalMs: z.number().int().min(50).max(60_000).default(1_000)
});
export type BotSettings = z.infer<typeof BotSettingsSchema>;

export const RebalanceSettingsSchema = z.object({
  fractionalShares: z.boolean().default(false),
  minTradeNotional: z.number().min(0).max(1_000_000).default(10),
  defaultCashBuffer: z.number().min(0).max(0.99).default(0.02)
});
export type RebalanceSettings = z.infer<typeof RebalanceSettingsSchema>;

export const PaperSettingsSchema = z.object({
  initialCash: z.number().min(0).default(100_000),
  priceSource: PaperPriceSourceSchema.default("SIMULATED"),
  quotes: z.record(z.number().positive()).default({})
});
export type PaperSettings = z.infer<typeof PaperSettingsSchema>;

export const ServerSettingsSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(5000),
  apiKey: z.string().min(16).optional()
});
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;

export const AppConfigSchema = z.object({
  version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
  mode: TradingModeSchema.default("PAPER"),
  brokerage: BrokerageSettingsSchema.default({}),
  bot: BotSettingsSchema.default({}),
  rebalance: RebalanceSettingsSchema.default({}),
  paper: PaperSettingsSchema.default({}),
  server: ServerSettingsSchema.default({})
});
export type AppConfig = z.infer<typeof AppConfigSchema>;

export const AppConfigPatchSchema = z.object({
  mode: TradingModeSchema.optional(),
  brokerage: BrokerageSettingsSchema.partial().optional(),
  bot: BotSettingsSchema.partial().optional(),
  rebalance: RebalanceSettingsSchema.partial().optional(),
  paper: PaperSettingsSchema.partial().optional(),
  server: ServerSettingsSchema.partial().optional()
});
export type AppConfigPatch = z.infer<typeof AppConfigPatchSchema>;

export function defaultAppConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/** Code-unit order, the same on every host locale. */
export function compareSymbols(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    brokerage: {
      ...config.brokerage,
      accessToken: config.brokerage.accessToken ? "<redacted>" : undefined
    },
    server: {
      ...config.server,
      apiKey: config.server.apiKey ? "<redacted>" : undefined
    }
  };
}

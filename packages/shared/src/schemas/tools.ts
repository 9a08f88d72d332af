import { z } from "zod";

import { RebalanceRequestSchema } from "./rebalance";

const NoParamsSchema = z.object({}).strict().default({});

const SymbolSchema = z.string().trim().min(1).max(12);

export const OrderParamsSchema = z.object({
  symbol: SymbolSchema,
  quantity: z.number().positive()
});
export type OrderParams = z.infer<typeof OrderParamsSchema>;

export const BotAddParamsSchema = z.object({
  symbol: SymbolSchema,
  quantity: z.number().finite(),
  stopLossPct: z.number().finite().optional(),
  takeProfitPct: z.number().finite().optional()
});
export type BotAddParams = z.infer<typeof BotAddParamsSchema>;

export const BotRemoveParamsSchema = z.object({ symbol: SymbolSchema });
export type BotRemoveParams = z.infer<typeof BotRemoveParamsSchema>;

export const BotStatusParamsSchema = z
  .object({
    refresh: z.boolean().default(false)
  })
  .default({});
export type BotStatusParams = z.infer<typeof BotStatusParamsSchema>;

export const BotStartParamsSchema = z
  .object({
    intervalMinutes: z.number().finite().optional()
  })
  .default({});
export type BotStartParams = z.infer<typeof BotStartParamsSchema>;

export const PaperQuoteParamsSchema = z.object({
  symbol: SymbolSchema,
  price: z.number().positive()
});
export type PaperQuoteParams = z.infer<typeof PaperQuoteParamsSchema>;

export const ToolRequestSchema = z.discriminatedUnion("tool", [
  z.object({ tool: z.literal("get_health"), params: NoParamsSchema }),
  z.object({ tool: z.literal("list_tools"), params: NoParamsSchema }),
  z.object({ tool: z.literal("get_portfolio"), params: NoParamsSchema }),
  z.object({ tool: z.literal("buy_stock"), params: OrderParamsSchema }),
  z.object({ tool: z.literal("sell_stock"), params: OrderParamsSchema }),
  z.object({ tool: z.literal("rebalance_portfolio"), params: RebalanceRequestSchema }),
  z.object({ tool: z.literal("bot_status"), params: BotStatusParamsSchema }),
  z.object({ tool: z.literal("bot_add"), params: BotAddParamsSchema }),
  z.object({ tool: z.literal("bot_remove"), params: BotRemoveParamsSchema }),
  z.object({ tool: z.literal("bot_start"), params: BotStartParamsSchema }),
  z.object({ tool: z.literal("bot_stop"), params: NoParamsSchema }),
  z.object({ tool: z.literal("bot_check"), params: NoParamsSchema }),
  z.object({ tool: z.literal("paper_account"), params: NoParamsSchema }),
  z.object({ tool: z.literal("paper_reset"), params: NoParamsSchema }),
  z.object({ tool: z.literal("paper_set_quote"), params: PaperQuoteParamsSchema })
]);
export type ToolRequest = z.infer<typeof ToolRequestSchema>;
export type ToolName = ToolRequest["tool"];

export const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  get_health: "Check that the engine is up and report the trading mode.",
  list_tools: "List every available tool with a short description.",
  get_portfolio: "Current holdings with market prices, cash, equity and percent invested.",
  buy_stock: "Place a market buy. params: { symbol, quantity }",
  sell_stock: "Place a market sell. params: { symbol, quantity }",
  rebalance_portfolio:
    "Move the portfolio toward target fractions. params: { symbols, allocations, cashBuffer?, dryRun? }; allocations plus cashBuffer must not exceed 1.",
  bot_status:
    "Bot run state and every monitored position with unrealized percent change. params: { refresh? }; refresh fetches fresh prices.",
  bot_add:
    "Monitor a position. params: { symbol, quantity, stopLossPct?, takeProfitPct? }; at least one threshold, e.g. stopLossPct -5, takeProfitPct 10.",
  bot_remove: "Stop monitoring a position. params: { symbol }",
  bot_start: "Start periodic checks. params: { intervalMinutes? }",
  bot_stop: "Stop periodic checks. Safe to call when already stopped.",
  bot_check: "Check every monitored position once right now and sell any that hit a threshold.",
  paper_account: "Paper account cash, holdings and trade ledger.",
  paper_reset: "Reset the paper account to its initial cash.",
  paper_set_quote: "Set the simulated paper price for a symbol. params: { symbol, price }"
};

export type ToolEnvelope<T = unknown> = {
  success: boolean;
  data: T | null;
  error: string | null;
  timestamp: string;
};

export function successEnvelope<T>(data: T): ToolEnvelope<T> {
  return { success: true, data, error: null, timestamp: new Date().toISOString() };
}

export function failureEnvelope(error: string): ToolEnvelope<never> {
  return { success: false, data: null, error, timestamp: new Date().toISOString() };
}

import { z } from "zod";

export const BOT_STATE_VERSION = 1 as const;
export const BOT_HISTORY_LIMIT = 200;

export const BotPhaseSchema = z.enum(["STOPPED", "RUNNING"]);
export type BotPhase = z.infer<typeof BotPhaseSchema>;

export const PositionStatusSchema = z.enum(["ACTIVE", "TRIGGERED", "REMOVED"]);
export type PositionStatus = z.infer<typeof PositionStatusSchema>;

export const TriggerKindSchema = z.enum(["STOP_LOSS", "TAKE_PROFIT"]);
export type TriggerKind = z.infer<typeof TriggerKindSchema>;

export const TriggerRecordSchema = z.object({
  kind: TriggerKindSchema,
  triggeredAt: z.string().min(1),
  price: z.number().positive(),
  pctChange: z.number(),
  orderId: z.string().min(1),
  clientOrderId: z.string().min(1),
  filledQuantity: z.number().positive(),
  fillPrice: z.number().positive()
});
export type TriggerRecord = z.infer<typeof TriggerRecordSchema>;

export const MonitoredPositionSchema = z.object({
  id: z.string().min(1),
  symbol: z.string().min(1),
  quantity: z.number().positive(),
  stopLossPct: z.number().finite().optional(),
  takeProfitPct: z.number().finite().optional(),
  entryPrice: z.number().positive(),
  status: PositionStatusSchema,
  createdAt: z.string().min(1),
  lastCheckAt: z.string().min(1).optional(),
  lastPrice: z.number().positive().optional(),
  lastError: z.string().optional(),
  // Reused across retries of the same trigger so the broker can deduplicate.
  pendingOrderRef: z.string().min(1).optional(),
  trigger: TriggerRecordSchema.optional(),
  closedAt: z.string().min(1).optional()
});
export type MonitoredPosition = z.infer<typeof MonitoredPositionSchema>;

export const BotStateSchema = z.object({
  version: z.literal(BOT_STATE_VERSION),
  updatedAt: z.string().min(1),
  positions: z.array(MonitoredPositionSchema),
  history: z.array(MonitoredPositionSchema).default([])
});
export type BotState = z.infer<typeof BotStateSchema>;

export const BotRunStateSchema = z.object({
  phase: BotPhaseSchema,
  intervalMinutes: z.number().positive(),
  startedAt: z.string().min(1).optional(),
  lastCheckAt: z.string().min(1).optional(),
  lastError: z.string().nullable(),
  checking: z.boolean()
});
export type BotRunState = z.infer<typeof BotRunStateSchema>;

export type CheckTrigger = "MANUAL" | "SCHEDULED";

export type PositionCheckOutcome = "HOLD" | "TRIGGERED" | "FAILED" | "SUPPRESSED";

export type PositionCheckResult = {
  symbol: string;
  outcome: PositionCheckOutcome;
  price?: number;
  pctChange?: number;
  trigger?: TriggerKind;
  orderId?: string;
  fillPrice?: number;
  error?: string;
};

export type CheckReport = {
  trigger: CheckTrigger;
  startedAt: string;
  finishedAt: string;
  checked: number;
  triggered: number;
  failed: number;
  results: PositionCheckResult[];
};

export type PositionStatusView = {
  symbol: string;
  quantity: number;
  entryPrice: number;
  stopLossPct?: number;
  takeProfitPct?: number;
  createdAt: string;
  lastCheckAt?: string;
  currentPrice?: number;
  pctChange?: number;
  lastError?: string;
  error?: string;
};

export type BotStatus = {
  run: BotRunState;
  positions: PositionStatusView[];
  recentlyClosed: MonitoredPosition[];
};

export function defaultBotState(): BotState {
  return {
    version: BOT_STATE_VERSION,
    updatedAt: new Date().toISOString(),
    positions: [],
    history: []
  };
}

export function defaultBotRunState(intervalMinutes: number): BotRunState {
  return {
    phase: "STOPPED",
    intervalMinutes,
    lastError: null,
    checking: false
  };
}

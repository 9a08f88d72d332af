import { z } from "zod";

export const PAPER_ACCOUNT_VERSION = 1 as const;

export const TradeSideSchema = z.enum(["BUY", "SELL"]);
export type TradeSide = z.infer<typeof TradeSideSchema>;

export const TradeIntentSchema = z.object({
  symbol: z.string().min(1),
  side: TradeSideSchema,
  quantity: z.number().positive()
});
export type TradeIntent = z.infer<typeof TradeIntentSchema>;

export const LedgerEntrySchema = TradeIntentSchema.extend({
  id: z.string().min(1),
  ts: z.string().min(1),
  fillPrice: z.number().positive(),
  clientOrderId: z.string().min(1).optional()
});
export type LedgerEntry = z.infer<typeof LedgerEntrySchema>;

export const PaperAccountSchema = z.object({
  version: z.literal(PAPER_ACCOUNT_VERSION),
  createdAt: z.string().min(1),
  cash: z.number().nonnegative(),
  holdings: z.record(z.number().positive()),
  ledger: z.array(LedgerEntrySchema)
});
export type PaperAccount = z.infer<typeof PaperAccountSchema>;

export function defaultPaperAccount(initialCash: number): PaperAccount {
  return {
    version: PAPER_ACCOUNT_VERSION,
    createdAt: new Date().toISOString(),
    cash: initialCash,
    holdings: {},
    ledger: []
  };
}

export function serializePaperAccount(account: PaperAccount): string {
  return JSON.stringify(account, null, 2);
}

export function deserializePaperAccount(raw: string): PaperAccount {
  return PaperAccountSchema.parse(JSON.parse(raw));
}

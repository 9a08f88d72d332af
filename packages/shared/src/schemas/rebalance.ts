import { z } from "zod";

import { type TradeIntent, TradeIntentSchema, TradeSideSchema } from "./paper-account";

export const RebalancePlanSchema = z.object({
  createdAt: z.string().min(1),
  totalValue: z.number().nonnegative(),
  investableValue: z.number().nonnegative(),
  cashBuffer: z.number().min(0).max(1),
  targetAllocations: z.record(z.number().nonnegative()),
  intents: z.array(TradeIntentSchema)
});
type RebalancePlanShape = z.infer<typeof RebalancePlanSchema>;
export type RebalancePlan = Readonly<Omit<RebalancePlanShape, "targetAllocations" | "intents">> & {
  readonly targetAllocations: Readonly<Record<string, number>>;
  readonly intents: ReadonlyArray<Readonly<TradeIntent>>;
};

export const RebalanceRequestSchema = z
  .object({
    symbols: z.array(z.string().min(1)).min(1),
    allocations: z.array(z.number().finite()).min(1),
    cashBuffer: z.number().finite().optional(),
    dryRun: z.boolean().default(false)
  })
  .superRefine((value, ctx) => {
    if (value.symbols.length !== value.allocations.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "symbols and allocations length mismatch",
        path: ["allocations"]
      });
    }
    const seen = new Set<string>();
    for (const symbol of value.symbols) {
      const key = symbol.trim().toUpperCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate symbol ${key}`,
          path: ["symbols"]
        });
      }
      seen.add(key);
    }
  });
export type RebalanceRequest = z.infer<typeof RebalanceRequestSchema>;

export const RebalanceLegResultSchema = z.object({
  symbol: z.string().min(1),
  side: TradeSideSchema,
  quantity: z.number().positive(),
  status: z.enum(["FILLED", "FAILED"]),
  orderId: z.string().optional(),
  fillPrice: z.number().positive().optional(),
  filledQuantity: z.number().nonnegative().optional(),
  error: z.string().optional()
});
export type RebalanceLegResult = z.infer<typeof RebalanceLegResultSchema>;

export type RebalanceResult = {
  dryRun: boolean;
  plan: RebalancePlan;
  executions: RebalanceLegResult[];
};

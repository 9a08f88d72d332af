import { Injectable, Logger } from "@nestjs/common";
import type { ToolEnvelope, ToolName, ToolRequest } from "@autopilot/shared";
import { TOOL_DESCRIPTIONS, ToolRequestSchema, failureEnvelope, successEnvelope } from "@autopilot/shared";

import { BotEngineService } from "../bot/bot-engine.service";
import { describeError } from "../common/envelope";
import { ConfigService } from "../config/config.service";
import { HealthService } from "../health/health.service";
import { OrderExecutorService } from "../integrations/order-executor.service";
import { PaperStoreService } from "../paper/paper-store.service";
import { PortfolioService } from "../portfolio/portfolio.service";
import { RebalanceService } from "../portfolio/rebalance.service";

export type ToolInfo = {
  name: ToolName;
  description: string;
};

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_DESCRIPTIONS, name);
}

/**
 * Single entry point for agent tool calls. Every call resolves to an envelope;
 * failures never throw past this service.
 */
@Injectable()
export class ToolAdapterService {
  private readonly logger = new Logger(ToolAdapterService.name);

  constructor(
    private readonly botEngine: BotEngineService,
    private readonly portfolio: PortfolioService,
    private readonly rebalancer: RebalanceService,
    private readonly orders: OrderExecutorService,
    private readonly paperStore: PaperStoreService,
    private readonly configService: ConfigService,
    private readonly health: HealthService
  ) {}

  listTools(): ToolInfo[] {
    return Object.entries(TOOL_DESCRIPTIONS)
      .filter((entry): entry is [ToolName, string] => isToolName(entry[0]))
      .map(([name, description]) => ({ name, description }));
  }

  async invoke(raw: unknown): Promise<ToolEnvelope> {
    const name = typeof raw === "object" && raw !== null && "tool" in raw ? raw.tool : undefined;
    if (typeof name !== "string" || !isToolName(name)) {
      const message = typeof name === "string" ? `Unknown tool "${name}"` : "Missing tool name";
      this.logger.warn(message);
      return failureEnvelope(message);
    }

    try {
      const request = ToolRequestSchema.parse(raw);
      return successEnvelope(await this.dispatch(request));
    } catch (err) {
      const { status, message } = describeError(err);
      if (status >= 500) {
        this.logger.error(`Tool ${name} failed: ${message}`);
      } else {
        this.logger.warn(`Tool ${name} failed: ${message}`);
      }
      return failureEnvelope(message);
    }
  }

  private async dispatch(request: ToolRequest): Promise<unknown> {
    switch (request.tool) {
      case "get_health":
        return this.health.report();
      case "list_tools":
        return this.listTools();
      case "get_portfolio":
        return await this.portfolio.getSnapshot();
      case "buy_stock":
        return await this.orders.execute({ ...request.params, side: "BUY" });
      case "sell_stock":
        return await this.orders.execute({ ...request.params, side: "SELL" });
      case "rebalance_portfolio":
        return await this.rebalancer.rebalance(request.params);
      case "bot_status":
        return await this.botEngine.status({ refresh: request.params.refresh });
      case "bot_add":
        return await this.botEngine.add(request.params);
      case "bot_remove":
        return this.botEngine.remove(request.params.symbol);
      case "bot_start":
        return this.botEngine.start(request.params.intervalMinutes);
      case "bot_stop":
        return this.botEngine.stop();
      case "bot_check":
        return await this.botEngine.checkOnce("MANUAL");
      case "paper_account":
        return this.paperStore.getAccount();
      case "paper_reset":
        return await this.paperStore.reset();
      case "paper_set_quote":
        return this.configService.setPaperQuote(request.params.symbol, request.params.price).paper.quotes;
      default: {
        const unreachable: never = request;
        throw new Error(`Unhandled tool ${JSON.stringify(unreachable)}`);
      }
    }
  }
}

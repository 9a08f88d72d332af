import { Body, Controller, Get, HttpCode, Post } from "@nestjs/common";
import type { RebalanceResult, ToolEnvelope } from "@autopilot/shared";
import { OrderParamsSchema, RebalanceRequestSchema, successEnvelope } from "@autopilot/shared";

import { OrderExecutorService, type OrderFill } from "../integrations/order-executor.service";
import { PortfolioService, type PortfolioSnapshot } from "./portfolio.service";
import { RebalanceService } from "./rebalance.service";

@Controller()
export class PortfolioController {
  constructor(
    private readonly portfolioService: PortfolioService,
    private readonly rebalanceService: RebalanceService,
    private readonly orders: OrderExecutorService
  ) {}

  @Get("portfolio")
  async getPortfolio(): Promise<ToolEnvelope<PortfolioSnapshot>> {
    return successEnvelope(await this.portfolioService.getSnapshot());
  }

  @Post("portfolio/rebalance")
  @HttpCode(200)
  async rebalance(@Body() body: unknown): Promise<ToolEnvelope<RebalanceResult>> {
    return successEnvelope(await this.rebalanceService.rebalance(RebalanceRequestSchema.parse(body)));
  }

  @Post("orders/buy")
  @HttpCode(200)
  async buy(@Body() body: unknown): Promise<ToolEnvelope<OrderFill>> {
    const { symbol, quantity } = OrderParamsSchema.parse(body);
    return successEnvelope(await this.orders.execute({ symbol, side: "BUY", quantity }));
  }

  @Post("orders/sell")
  @HttpCode(200)
  async sell(@Body() body: unknown): Promise<ToolEnvelope<OrderFill>> {
    const { symbol, quantity } = OrderParamsSchema.parse(body);
    return successEnvelope(await this.orders.execute({ symbol, side: "SELL", quantity }));
  }
}

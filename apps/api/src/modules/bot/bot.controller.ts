import { Body, Controller, Get, HttpCode, Post, Query } from "@nestjs/common";
import type { BotRunState, BotStatus, CheckReport, MonitoredPosition, PositionStatusView, ToolEnvelope } from "@autopilot/shared";
import { BotAddParamsSchema, BotRemoveParamsSchema, BotStartParamsSchema, successEnvelope } from "@autopilot/shared";

import { BotEngineService } from "./bot-engine.service";

@Controller("bot")
export class BotController {
  constructor(private readonly botEngine: BotEngineService) {}

  @Get("status")
  async getStatus(@Query("refresh") refresh?: string): Promise<ToolEnvelope<BotStatus>> {
    return successEnvelope(await this.botEngine.status({ refresh: refresh === "true" || refresh === "1" }));
  }

  @Post("add")
  @HttpCode(200)
  async add(@Body() body: unknown): Promise<ToolEnvelope<PositionStatusView>> {
    return successEnvelope(await this.botEngine.add(BotAddParamsSchema.parse(body)));
  }

  @Post("remove")
  @HttpCode(200)
  remove(@Body() body: unknown): ToolEnvelope<MonitoredPosition> {
    return successEnvelope(this.botEngine.remove(BotRemoveParamsSchema.parse(body).symbol));
  }

  @Post("start")
  @HttpCode(200)
  start(@Body() body: unknown): ToolEnvelope<BotRunState> {
    const { intervalMinutes } = BotStartParamsSchema.parse(body ?? {});
    return successEnvelope(this.botEngine.start(intervalMinutes));
  }

  @Post("stop")
  @HttpCode(200)
  stop(): ToolEnvelope<BotRunState> {
    return successEnvelope(this.botEngine.stop());
  }

  @Post("check")
  @HttpCode(200)
  async check(): Promise<ToolEnvelope<CheckReport>> {
    return successEnvelope(await this.botEngine.checkOnce("MANUAL"));
  }
}

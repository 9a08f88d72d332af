import { Body, Controller, Get, HttpCode, Post } from "@nestjs/common";
import type { PaperAccount, ToolEnvelope } from "@autopilot/shared";
import { PaperQuoteParamsSchema, successEnvelope } from "@autopilot/shared";

import { ConfigService } from "../config/config.service";
import { PaperStoreService } from "./paper-store.service";

@Controller("paper")
export class PaperController {
  constructor(
    private readonly paperStore: PaperStoreService,
    private readonly configService: ConfigService
  ) {}

  @Get("account")
  getAccount(): ToolEnvelope<PaperAccount> {
    return successEnvelope(this.paperStore.getAccount());
  }

  @Post("reset")
  @HttpCode(200)
  async reset(): Promise<ToolEnvelope<PaperAccount>> {
    return successEnvelope(await this.paperStore.reset());
  }

  @Post("quotes")
  @HttpCode(200)
  setQuote(@Body() body: unknown): ToolEnvelope<Record<string, number>> {
    const { symbol, price } = PaperQuoteParamsSchema.parse(body);
    return successEnvelope(this.configService.setPaperQuote(symbol, price).paper.quotes);
  }
}

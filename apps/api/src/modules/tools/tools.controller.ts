import { Body, Controller, Get, HttpCode, Post } from "@nestjs/common";
import type { ToolEnvelope } from "@autopilot/shared";
import { successEnvelope } from "@autopilot/shared";

import { ToolAdapterService, type ToolInfo } from "./tool-adapter.service";

@Controller("tools")
export class ToolsController {
  constructor(private readonly tools: ToolAdapterService) {}

  @Get()
  list(): ToolEnvelope<ToolInfo[]> {
    return successEnvelope(this.tools.listTools());
  }

  /** Body is `{ tool, params }`; the reply is always 200 with the envelope carrying any error. */
  @Post("invoke")
  @HttpCode(200)
  async invoke(@Body() body: unknown): Promise<ToolEnvelope> {
    return await this.tools.invoke(body);
  }
}

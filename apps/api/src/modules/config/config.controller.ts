import { Body, Controller, Get, Put } from "@nestjs/common";
import type { AppConfig, ToolEnvelope } from "@autopilot/shared";
import { AppConfigPatchSchema, redactConfig, successEnvelope } from "@autopilot/shared";

import { ConfigService } from "./config.service";

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  getConfig(): ToolEnvelope<AppConfig> {
    return successEnvelope(redactConfig(this.configService.load()));
  }

  @Put()
  updateConfig(@Body() body: unknown): ToolEnvelope<AppConfig> {
    const patch = AppConfigPatchSchema.parse(body);
    return successEnvelope(redactConfig(this.configService.update(patch)));
  }
}

import { Controller, Get } from "@nestjs/common";
import type { ToolEnvelope } from "@autopilot/shared";
import { successEnvelope } from "@autopilot/shared";

import { HealthService, type HealthReport } from "./health.service";

@Controller("health")
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  getHealth(): ToolEnvelope<HealthReport> {
    return successEnvelope(this.healthService.report());
  }
}

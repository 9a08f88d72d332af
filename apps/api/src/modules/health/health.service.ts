import { Injectable } from "@nestjs/common";
import type { BotPhase, TradingMode } from "@autopilot/shared";

import { BotEngineService } from "../bot/bot-engine.service";
import { ConfigService } from "../config/config.service";

export type HealthReport = {
  ok: true;
  ts: string;
  mode: TradingMode;
  bot: BotPhase;
  uptimeSeconds: number;
};

@Injectable()
export class HealthService {
  private readonly startedAtMs = Date.now();

  constructor(
    private readonly configService: ConfigService,
    private readonly botEngine: BotEngineService
  ) {}

  report(): HealthReport {
    return {
      ok: true,
      ts: new Date().toISOString(),
      mode: this.configService.load().mode,
      bot: this.botEngine.getRunState().phase,
      uptimeSeconds: Math.round((Date.now() - this.startedAtMs) / 1000)
    };
  }
}

import { Module } from "@nestjs/common";

import { BotModule } from "../bot/bot.module";
import { ConfigModule } from "../config/config.module";
import { HealthController } from "./health.controller";
import { HealthService } from "./health.service";

@Module({
  imports: [ConfigModule, BotModule],
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService]
})
export class HealthModule {}

import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { BotController } from "./bot.controller";
import { BotEngineService } from "./bot-engine.service";
import { PositionStoreService } from "./position-store.service";

@Module({
  imports: [ConfigModule, IntegrationsModule],
  controllers: [BotController],
  providers: [PositionStoreService, BotEngineService],
  exports: [BotEngineService]
})
export class BotModule {}

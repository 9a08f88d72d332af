import { Module } from "@nestjs/common";

import { BotModule } from "../bot/bot.module";
import { ConfigModule } from "../config/config.module";
import { HealthModule } from "../health/health.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { PaperModule } from "../paper/paper.module";
import { PortfolioModule } from "../portfolio/portfolio.module";
import { ToolAdapterService } from "./tool-adapter.service";
import { ToolsController } from "./tools.controller";

@Module({
  imports: [ConfigModule, PaperModule, IntegrationsModule, BotModule, PortfolioModule, HealthModule],
  controllers: [ToolsController],
  providers: [ToolAdapterService],
  exports: [ToolAdapterService]
})
export class ToolsModule {}

import { Module } from "@nestjs/common";
import { APP_FILTER, APP_GUARD } from "@nestjs/core";

import { BotModule } from "./bot/bot.module";
import { EnvelopeExceptionFilter } from "./common/envelope-exception.filter";
import { ConfigModule } from "./config/config.module";
import { HealthModule } from "./health/health.module";
import { PaperModule } from "./paper/paper.module";
import { PortfolioModule } from "./portfolio/portfolio.module";
import { ApiKeyGuard } from "./security/api-key.guard";
import { ToolsModule } from "./tools/tools.module";

@Module({
  imports: [HealthModule, ConfigModule, PaperModule, PortfolioModule, BotModule, ToolsModule],
  providers: [
    { provide: APP_GUARD, useClass: ApiKeyGuard },
    { provide: APP_FILTER, useClass: EnvelopeExceptionFilter }
  ]
})
export class AppModule {}

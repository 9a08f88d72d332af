import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { IntegrationsModule } from "../integrations/integrations.module";
import { PaperModule } from "../paper/paper.module";
import { PortfolioController } from "./portfolio.controller";
import { PortfolioService } from "./portfolio.service";
import { RebalanceService } from "./rebalance.service";

@Module({
  imports: [ConfigModule, PaperModule, IntegrationsModule],
  controllers: [PortfolioController],
  providers: [PortfolioService, RebalanceService],
  exports: [PortfolioService, RebalanceService]
})
export class PortfolioModule {}

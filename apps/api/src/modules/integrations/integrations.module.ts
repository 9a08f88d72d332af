import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { PaperModule } from "../paper/paper.module";
import { BrokerageService } from "./brokerage.service";
import { MarketDataService } from "./market-data.service";
import { OrderExecutorService } from "./order-executor.service";

@Module({
  imports: [ConfigModule, PaperModule],
  providers: [BrokerageService, MarketDataService, OrderExecutorService],
  exports: [BrokerageService, MarketDataService, OrderExecutorService]
})
export class IntegrationsModule {}

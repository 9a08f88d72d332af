import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { PaperController } from "./paper.controller";
import { PaperStoreService } from "./paper-store.service";

@Module({
  imports: [ConfigModule],
  controllers: [PaperController],
  providers: [PaperStoreService],
  exports: [PaperStoreService]
})
export class PaperModule {}

import "reflect-metadata";
import "dotenv/config";

import { NestFactory } from "@nestjs/core";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { json } from "express";
import pinoHttp from "pino-http";

import { AppModule } from "./modules/app.module";
import { ConfigService } from "./modules/config/config.service";
import { createLogger, toNestLogger } from "./modules/logging/pino-logger";

async function bootstrap(): Promise<void> {
  const logger = createLogger({ name: "api" });

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: false
  });

  app.use(json({ limit: "1mb" }));
  app.use(pinoHttp({ logger }));
  app.useLogger(toNestLogger(logger));
  app.enableShutdownHooks();

  const { host, port } = app.get(ConfigService).load().server;
  await app.listen(port, host);

  logger.info({ msg: "API listening", host, port });
}

bootstrap().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});

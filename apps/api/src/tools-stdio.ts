#!/usr/bin/env node
import "reflect-metadata";
import "dotenv/config";

import readline from "node:readline";

import { NestFactory } from "@nestjs/core";
import { failureEnvelope } from "@autopilot/shared";

import { createLogger, toNestLogger } from "./modules/logging/pino-logger";
import { ToolAdapterService } from "./modules/tools/tool-adapter.service";
import { ToolsModule } from "./modules/tools/tools.module";

/**
 * Line-delimited JSON tool adapter: one `{ "id"?, "tool", "params" }` object per
 * stdin line, one envelope per stdout line (with the request id echoed back).
 * Logs go to stderr.
 */
async function main(): Promise<void> {
  const logger = createLogger({ name: "tools", consoleFd: 2 });
  const app = await NestFactory.createApplicationContext(ToolsModule, { logger: false });
  app.useLogger(toNestLogger(logger));
  app.enableShutdownHooks();

  const tools = app.get(ToolAdapterService);
  const rl = readline.createInterface({ input: process.stdin, terminal: false });

  const write = (payload: unknown): void => {
    process.stdout.write(`${JSON.stringify(payload)}\n`);
  };

  // Requests are answered in arrival order, one at a time.
  let queue: Promise<void> = Promise.resolve();
  rl.on("line", (line) => {
    const trimmed = line.trim();
    if (!trimmed) return;
    queue = queue.then(async () => {
      let request: unknown;
      try {
        request = JSON.parse(trimmed);
      } catch {
        write(failureEnvelope("Request is not valid JSON"));
        return;
      }
      const id = typeof request === "object" && request !== null && "id" in request ? request.id : undefined;
      const envelope = await tools.invoke(request);
      write(id === undefined ? envelope : { id, ...envelope });
    });
  });

  await new Promise<void>((resolve) => rl.once("close", () => resolve()));
  await queue;
  await app.close();
  logger.info({ msg: "stdin closed, tool adapter exiting" });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});

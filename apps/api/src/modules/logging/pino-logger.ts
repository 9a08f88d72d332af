import fs from "node:fs";
import path from "node:path";

import type { LoggerService } from "@nestjs/common";
import pino from "pino";

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export type LoggerOptions = {
  /** Log file name under the log directory, e.g. "api" → api.log. */
  name: string;
  /** fd 1 for the HTTP server; fd 2 for the CLI and stdio adapter so stdout stays clean. */
  consoleFd?: 1 | 2;
};

export function createLogger(options: LoggerOptions): pino.Logger {
  const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), ".autopilot");
  const logDir = process.env.LOG_DIR ?? path.join(dataDir, "logs");
  ensureDir(logDir);

  const destination = pino.destination({
    dest: path.join(logDir, `${options.name}.log`),
    sync: false
  });
  const consoleStream = options.consoleFd === 2 ? process.stderr : process.stdout;

  return pino(
    {
      level: process.env.LOG_LEVEL ?? "info",
      base: undefined
    },
    pino.multistream([{ stream: consoleStream }, { stream: destination }])
  );
}

function withContext(message: unknown, optionalParams: unknown[]): Record<string, unknown> {
  const context = optionalParams.length > 0 ? optionalParams[optionalParams.length - 1] : undefined;
  return typeof context === "string" ? { msg: message, context } : { msg: message };
}

export function toNestLogger(logger: pino.Logger): LoggerService {
  return {
    log: (message, ...optionalParams) => logger.info(withContext(message, optionalParams)),
    error: (message, ...optionalParams) => {
      const trace = optionalParams.length > 1 ? optionalParams[0] : undefined;
      logger.error({ ...withContext(message, optionalParams), trace: typeof trace === "string" ? trace : undefined });
    },
    warn: (message, ...optionalParams) => logger.warn(withContext(message, optionalParams)),
    debug: (message, ...optionalParams) => logger.debug(withContext(message, optionalParams)),
    verbose: (message, ...optionalParams) => logger.trace(withContext(message, optionalParams))
  };
}

#!/usr/bin/env node
import "reflect-metadata";
import "dotenv/config";

import type { INestApplicationContext } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { ToolEnvelope } from "@autopilot/shared";
import { failureEnvelope, successEnvelope } from "@autopilot/shared";
import { Command, InvalidArgumentError } from "commander";

import { renderBotStatus, renderCheckReport, renderFill, renderPaperAccount, renderPortfolio, renderPosition, renderQuotes, renderRebalance, renderRunState, renderTools } from "./cli/render";
import { BotEngineService } from "./modules/bot/bot-engine.service";
import { describeError } from "./modules/common/envelope";
import { ConfigService } from "./modules/config/config.service";
import { OrderExecutorService } from "./modules/integrations/order-executor.service";
import { createLogger, toNestLogger } from "./modules/logging/pino-logger";
import { PaperStoreService } from "./modules/paper/paper-store.service";
import { PortfolioService } from "./modules/portfolio/portfolio.service";
import { RebalanceService } from "./modules/portfolio/rebalance.service";
import { ToolAdapterService } from "./modules/tools/tool-adapter.service";
import { ToolsModule } from "./modules/tools/tools.module";

const program = new Command();

program
  .name("autopilot")
  .description("Stop-loss / take-profit monitor, rebalancer and paper account")
  .option("--json", "print the raw { success, data, error, timestamp } envelope", false);

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return n;
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

async function openContext(): Promise<INestApplicationContext> {
  const logger = createLogger({ name: "cli", consoleFd: 2 });
  const app = await NestFactory.createApplicationContext(ToolsModule, { logger: false });
  app.useLogger(toNestLogger(logger));
  return app;
}

function print<T>(envelope: ToolEnvelope<T>, render: (data: T) => string): void {
  if (program.opts<{ json: boolean }>().json) {
    process.stdout.write(`${JSON.stringify(envelope, null, 2)}\n`);
  } else if (envelope.success && envelope.data !== null) {
    process.stdout.write(`${render(envelope.data)}\n`);
  } else {
    process.stderr.write(`Error: ${envelope.error ?? "unknown error"}\n`);
  }
  if (!envelope.success) {
    process.exitCode = 1;
  }
}

/** Runs one operation inside a fresh application context and prints its envelope. */
async function run<T>(operation: (app: INestApplicationContext) => Promise<T> | T, render: (data: T) => string): Promise<void> {
  const app = await openContext();
  try {
    print(successEnvelope(await operation(app)), render);
  } catch (err) {
    print<T>(failureEnvelope(describeError(err).message), render);
  } finally {
    await app.close();
  }
}

program
  .command("portfolio")
  .description("show holdings, cash and equity")
  .action(() => run((app) => app.get(PortfolioService).getSnapshot(), renderPortfolio));

program
  .command("buy")
  .description("market buy")
  .argument("<symbol>")
  .argument("<quantity>", "shares", parseNumber)
  .action((symbol: string, quantity: number) =>
    run((app) => app.get(OrderExecutorService).execute({ symbol, side: "BUY", quantity }), renderFill)
  );

program
  .command("sell")
  .description("market sell")
  .argument("<symbol>")
  .argument("<quantity>", "shares", parseNumber)
  .action((symbol: string, quantity: number) =>
    run((app) => app.get(OrderExecutorService).execute({ symbol, side: "SELL", quantity }), renderFill)
  );

program
  .command("rebalance")
  .description("move the portfolio toward target weights")
  .requiredOption("--symbols <list>", "comma-separated symbols, e.g. AAPL,MSFT", parseList)
  .requiredOption("--allocations <list>", "comma-separated weights in percent, e.g. 60,30", parseList)
  .option("--cash-buffer <pct>", "percent of value to keep in cash", parseNumber)
  .option("--dry-run", "print the plan without placing orders", false)
  .action((opts: { symbols: string[]; allocations: string[]; cashBuffer?: number; dryRun: boolean }) =>
    run(
      (app) =>
        app.get(RebalanceService).rebalance({
          symbols: opts.symbols,
          allocations: opts.allocations.map((a) => parseNumber(a) / 100),
          ...(opts.cashBuffer !== undefined ? { cashBuffer: opts.cashBuffer / 100 } : {}),
          dryRun: opts.dryRun
        }),
      renderRebalance
    )
  );

const bot = program.command("bot").description("position monitor");

bot
  .command("add")
  .description("monitor a position; pass --stop-loss=-5 style values for negatives")
  .argument("<symbol>")
  .argument("<quantity>", "shares to sell when triggered", parseNumber)
  .option("--stop-loss <pct>", "sell when down this percent, e.g. -5", parseNumber)
  .option("--take-profit <pct>", "sell when up this percent, e.g. 10", parseNumber)
  .action((symbol: string, quantity: number, opts: { stopLoss?: number; takeProfit?: number }) =>
    run(
      (app) =>
        app.get(BotEngineService).add({
          symbol,
          quantity,
          ...(opts.stopLoss !== undefined ? { stopLossPct: opts.stopLoss } : {}),
          ...(opts.takeProfit !== undefined ? { takeProfitPct: opts.takeProfit } : {})
        }),
      renderPosition
    )
  );

bot
  .command("remove")
  .description("stop monitoring a position")
  .argument("<symbol>")
  .action((symbol: string) => run((app) => app.get(BotEngineService).remove(symbol), (p) => `Stopped monitoring ${p.symbol}`));

bot
  .command("status")
  .description("run state and monitored positions")
  .option("--refresh", "fetch fresh prices", false)
  .action((opts: { refresh: boolean }) =>
    run((app) => app.get(BotEngineService).status({ refresh: opts.refresh }), renderBotStatus)
  );

bot
  .command("check")
  .description("check every monitored position once now")
  .action(() => run((app) => app.get(BotEngineService).checkOnce("MANUAL"), renderCheckReport));

bot
  .command("start")
  .description("run the monitor in the foreground until interrupted")
  .option("--interval <minutes>", "minutes between checks", parseNumber)
  .action(async (opts: { interval?: number }) => {
    const app = await openContext();
    const engine = app.get(BotEngineService);
    try {
      print(successEnvelope(engine.start(opts.interval)), renderRunState);
    } catch (err) {
      print(failureEnvelope(describeError(err).message), renderRunState);
      await app.close();
      return;
    }

    await new Promise<void>((resolve) => {
      process.once("SIGINT", () => resolve());
      process.once("SIGTERM", () => resolve());
    });
    process.stderr.write("Stopping, waiting for any check in progress...\n");
    // close() runs the engine's drain hook.
    await app.close();
    print(successEnvelope(engine.getRunState()), renderRunState);
  });

bot
  .command("stop")
  .description("stop the monitor in this process (a foreground `bot start` stops on Ctrl-C)")
  .action(() => run((app) => app.get(BotEngineService).stop(), renderRunState));

const paper = program.command("paper").description("paper trading account");

paper
  .command("account")
  .description("cash, holdings and recent trades")
  .action(() => run((app) => app.get(PaperStoreService).getAccount(), renderPaperAccount));

paper
  .command("reset")
  .description("reset to the configured initial cash")
  .action(() => run((app) => app.get(PaperStoreService).reset(), renderPaperAccount));

paper
  .command("quote")
  .description("set the simulated price for a symbol")
  .argument("<symbol>")
  .argument("<price>", "price in dollars", parseNumber)
  .action((symbol: string, price: number) =>
    run(
      (app) => app.get(ConfigService).setPaperQuote(symbol, price).paper.quotes,
      renderQuotes
    )
  );

program
  .command("tools")
  .description("list the agent tools")
  .action(() => run((app) => app.get(ToolAdapterService).listTools(), renderTools));

program
  .command("tool")
  .description("invoke an agent tool, e.g. tool bot_add '{\"symbol\":\"AAPL\",\"quantity\":1,\"stopLossPct\":-5}'")
  .argument("<name>")
  .argument("[params]", "JSON params", "{}")
  .action(async (name: string, params: string) => {
    const app = await openContext();
    try {
      let parsed: unknown;
      try {
        parsed = JSON.parse(params);
      } catch (err) {
        print(failureEnvelope(`Invalid params JSON: ${describeError(err).message}`), String);
        return;
      }
      const envelope = await app.get(ToolAdapterService).invoke({ tool: name, params: parsed });
      print(envelope, (data) => JSON.stringify(data, null, 2));
    } finally {
      await app.close();
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`Error: ${describeError(err).message}\n`);
  process.exitCode = 1;
});

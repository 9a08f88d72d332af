import type { BotRunState, BotStatus, CheckReport, PaperAccount, PositionStatusView, RebalanceResult } from "@autopilot/shared";
import { compareSymbols } from "@autopilot/shared";

import type { OrderFill } from "../modules/integrations/order-executor.service";
import type { PortfolioSnapshot } from "../modules/portfolio/portfolio.service";
import type { ToolInfo } from "../modules/tools/tool-adapter.service";
import { fmtNum, fmtPct, fmtQty, fmtUsd, renderTable } from "./format";

export function renderPortfolio(snapshot: PortfolioSnapshot): string {
  const rows = [
    ["SYMBOL", "QTY", "AVG", "PRICE", "VALUE"],
    ...snapshot.positions.map((p) => [p.symbol, fmtQty(p.quantity), fmtUsd(p.averagePrice), fmtUsd(p.marketPrice), fmtUsd(p.marketValue)])
  ];
  const lines = [
    `Mode: ${snapshot.mode}`,
    `Cash: ${fmtUsd(snapshot.cash)}  Equity: ${fmtUsd(snapshot.equity)}  Invested: ${fmtNum(snapshot.percentInvested, 1)}%`,
    "",
    snapshot.positions.length > 0 ? renderTable(rows) : "No positions."
  ];
  for (const error of snapshot.errors) lines.push(`! ${error}`);
  return lines.join("\n");
}

export function renderFill(fill: OrderFill): string {
  return `${fill.side} ${fmtQty(fill.filledQuantity)} ${fill.symbol} @ ${fmtUsd(fill.fillPrice)} (${fill.mode} order ${fill.orderId})`;
}

export function renderRebalance(result: RebalanceResult): string {
  const { plan } = result;
  const header = `Total ${fmtUsd(plan.totalValue)}, investable ${fmtUsd(plan.investableValue)}, cash buffer ${fmtNum(plan.cashBuffer * 100, 1)}%`;
  if (plan.intents.length === 0) {
    return `${header}\nNo trades required.`;
  }

  if (result.dryRun) {
    const rows = [["SIDE", "SYMBOL", "QTY"], ...plan.intents.map((i) => [i.side, i.symbol, fmtQty(i.quantity)])];
    return `${header}\nDry run, nothing submitted:\n${renderTable(rows)}`;
  }

  const rows = [
    ["SIDE", "SYMBOL", "QTY", "STATUS", "FILL", "ERROR"],
    ...result.executions.map((e) => [e.side, e.symbol, fmtQty(e.quantity), e.status, fmtUsd(e.fillPrice), e.error ?? ""])
  ];
  return `${header}\n${renderTable(rows)}`;
}

export function renderRunState(run: BotRunState): string {
  const parts = [`Bot ${run.phase}`, `every ${run.intervalMinutes} min`];
  if (run.lastCheckAt) parts.push(`last check ${run.lastCheckAt}`);
  if (run.checking) parts.push("check in progress");
  const line = parts.join(", ");
  return run.lastError ? `${line}\nLast error: ${run.lastError}` : line;
}

export function renderPosition(view: PositionStatusView): string {
  return (
    `Monitoring ${view.symbol} x${fmtQty(view.quantity)} from ${fmtUsd(view.entryPrice)} ` +
    `(stop ${fmtPct(view.stopLossPct)}, take ${fmtPct(view.takeProfitPct)})`
  );
}

export function renderBotStatus(status: BotStatus): string {
  const lines = [renderRunState(status.run), ""];
  if (status.positions.length === 0) {
    lines.push("No monitored positions.");
  } else {
    lines.push(
      renderTable([
        ["SYMBOL", "QTY", "ENTRY", "PRICE", "CHANGE", "STOP", "TAKE", "ERROR"],
        ...status.positions.map((p) => [
          p.symbol,
          fmtQty(p.quantity),
          fmtUsd(p.entryPrice),
          fmtUsd(p.currentPrice),
          fmtPct(p.pctChange),
          fmtPct(p.stopLossPct),
          fmtPct(p.takeProfitPct),
          p.error ?? p.lastError ?? ""
        ])
      ])
    );
  }

  const triggered = status.recentlyClosed.filter((p) => p.trigger);
  if (triggered.length > 0) {
    lines.push("", "Recently triggered:");
    for (const p of triggered) {
      if (!p.trigger) continue;
      lines.push(
        `  ${p.symbol} ${p.trigger.kind} at ${fmtUsd(p.trigger.price)} (${fmtPct(p.trigger.pctChange)}), ` +
          `sold ${fmtQty(p.trigger.filledQuantity)} @ ${fmtUsd(p.trigger.fillPrice)}`
      );
    }
  }
  return lines.join("\n");
}

export function renderCheckReport(report: CheckReport): string {
  if (report.results.length === 0) {
    return "No monitored positions.";
  }
  const rows = [
    ["SYMBOL", "OUTCOME", "PRICE", "CHANGE", "DETAIL"],
    ...report.results.map((r) => [
      r.symbol,
      r.outcome,
      fmtUsd(r.price),
      fmtPct(r.pctChange),
      r.error ?? (r.trigger ? `${r.trigger} filled @ ${fmtUsd(r.fillPrice)}` : "")
    ])
  ];
  return `${renderTable(rows)}\n${report.checked} checked, ${report.triggered} triggered, ${report.failed} failed`;
}

export function renderPaperAccount(account: PaperAccount): string {
  const holdings = Object.entries(account.holdings).sort(([a], [b]) => compareSymbols(a, b));
  const lines = [`Cash: ${fmtUsd(account.cash)}`, ""];
  lines.push(
    holdings.length > 0 ? renderTable([["SYMBOL", "QTY"], ...holdings.map(([s, q]) => [s, fmtQty(q)])]) : "No holdings."
  );
  const recent = account.ledger.slice(-10);
  if (recent.length > 0) {
    lines.push("", `Last ${recent.length} of ${account.ledger.length} trade(s):`);
    lines.push(
      renderTable(recent.map((e) => [e.ts, e.side, e.symbol, fmtQty(e.quantity), fmtUsd(e.fillPrice)]))
    );
  }
  return lines.join("\n");
}

export function renderTools(tools: ToolInfo[]): string {
  return renderTable(tools.map((t) => [t.name, t.description]));
}

export function renderQuotes(quotes: Record<string, number>): string {
  const rows = Object.entries(quotes)
    .sort(([a], [b]) => compareSymbols(a, b))
    .map(([symbol, price]) => [symbol, fmtUsd(price)]);
  return rows.length > 0 ? renderTable([["SYMBOL", "SIMULATED PRICE"], ...rows]) : "No simulated quotes set.";
}

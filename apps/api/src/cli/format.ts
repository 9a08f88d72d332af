export function fmtNum(n: number | null | undefined, digits = 2): string {
  if (n === null || n === undefined) return "n/a";
  if (!Number.isFinite(n)) return "n/a";
  return n.toFixed(digits);
}

export function fmtUsd(n: number | null | undefined): string {
  if (n === null || n === undefined) return "n/a";
  if (!Number.isFinite(n)) return "n/a";
  return `$${n.toFixed(2)}`;
}

export function fmtPct(n: number | null | undefined): string {
  if (n === null || n === undefined || !Number.isFinite(n)) return "n/a";
  return `${n > 0 ? "+" : ""}${n.toFixed(2)}%`;
}

/** Share counts print without trailing zeros: 4, 0.5, 1.234567. */
export function fmtQty(n: number): string {
  return Number.isInteger(n) ? String(n) : String(Number(n.toFixed(6)));
}

function padRight(s: string, w: number): string {
  return s.length >= w ? s : s + " ".repeat(w - s.length);
}

export function renderTable(rows: string[][]): string {
  if (rows.length === 0) return "";
  const widths: number[] = [];
  for (const r of rows) {
    r.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((r) => r.map((c, i) => padRight(c, widths[i] ?? 0)).join("  ").trimEnd()).join("\n");
}

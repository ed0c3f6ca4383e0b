import { writeFileSync, mkdirSync, existsSync } from "fs";
import { join } from "path";
import type { Config } from "../config/load_config";
import type { CycleSummary, Settlement } from "../simulation/run_cycle";
import type { Wallet, WalletSnapshot } from "../state/wallet";

export interface ReportInput {
  marketsScanned: number;
  summary: CycleSummary;
  settlements: Settlement[];
  wallet: Wallet;
  markPrices: ReadonlyMap<string, number>;
}

export interface ReportResult {
  text: string;
  json: {
    marketsScanned: number;
    signals: number;
    executed: number;
    skipped: CycleSummary["skipped"];
    settlements: Settlement[];
    wallet: WalletSnapshot;
    equity: number;
    pnl: number;
    winRate: number;
  };
}

function formatSection(title: string, lines: string[]): string {
  return `\n## ${title}\n${lines.join("\n")}\n`;
}

export function generateReport(input: ReportInput, config: Pick<Config, "reporting">): ReportResult {
  const { summary, wallet } = input;
  const equity = wallet.equity(input.markPrices);
  const pnl = wallet.pnl(input.markPrices);
  const winRate = wallet.winRate();

  const lines: string[] = [];
  lines.push("# Binary Arb Lab — Report");
  lines.push(`Generated: ${new Date().toISOString()}`);
  lines.push("");
  lines.push("**Simulation only. No live orders.**");
  lines.push("");

  lines.push(formatSection("Scan summary", [
    `Markets scanned: ${input.marketsScanned}`,
    `Signals: ${summary.signals}`,
    `Executed: ${summary.executed}`,
  ]).trim());

  const skipLines = Object.entries(summary.skipped)
    .sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0))
    .map(([r, c]) => `  - ${r}: ${c}`);
  lines.push(formatSection("Skip reasons", skipLines.length ? skipLines : ["  (none)"]).trim());

  lines.push(formatSection("Wallet", [
    `Cash (USD): ${wallet.cash.toFixed(2)}`,
    `Equity (USD): ${equity.toFixed(2)}`,
    `PnL (USD): ${pnl.toFixed(2)}`,
    `Fees paid (USD): ${wallet.totalFeesPaid.toFixed(4)}`,
    `Trades: ${wallet.totalTrades} (win rate ${(winRate * 100).toFixed(1)}%)`,
  ]).trim());

  const positions = wallet.listPositions();
  const positionLines = positions.map(
    (p) => `  - ${p.tokenId} | ${p.side} | size=${p.size.toFixed(2)} | entry=${p.entryPrice.toFixed(4)}`
  );
  lines.push(formatSection(`Open positions (${positions.length})`, positionLines.length ? positionLines : ["  (none)"]).trim());

  if (input.settlements.length > 0) {
    lines.push(formatSection("Settled", input.settlements.map(
      (s) => `  - ${s.tokenId} | exit=${s.exitPrice.toFixed(4)} | pnl=${s.pnl.toFixed(4)}`
    )).trim());
  }

  const n = config.reporting.print_top_n;
  const topSignals = [...summary.decisions]
    .sort((a, b) => b.signal.spread - a.signal.spread)
    .slice(0, n);
  lines.push(formatSection(`Top ${n} signals by spread`, topSignals.length ? topSignals.map((d) => {
    const net = d.profit ? d.profit.net.toFixed(4) : "?";
    return `  - ${d.signal.marketId} | ${d.signal.recommendedSide} | spread=${d.signal.spread.toFixed(4)} | net=${net} | ${d.outcome}`;
  }) : ["  (none)"]).trim());

  const text = lines.join("\n");

  const json = {
    marketsScanned: input.marketsScanned,
    signals: summary.signals,
    executed: summary.executed,
    skipped: summary.skipped,
    settlements: input.settlements,
    wallet: wallet.snapshot(),
    equity,
    pnl,
    winRate,
  };

  return { text, json };
}

export function writeReportToFile(
  result: ReportResult,
  config: Pick<Config, "reporting">
): string {
  const dir = config.reporting.report_dir;
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  const txtPath = join(dir, `report_${ts}.txt`);
  const jsonPath = join(dir, `report_${ts}.json`);
  writeFileSync(txtPath, result.text, "utf-8");
  writeFileSync(jsonPath, JSON.stringify(result.json, null, 2), "utf-8");
  return txtPath;
}

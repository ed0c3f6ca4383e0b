import { describe, it } from "node:test";
import assert from "node:assert";
import { generateReport } from "../report/sim_report";
import type { CycleSummary } from "../simulation/run_cycle";
import { Wallet } from "../state/wallet";
import { mockSignal } from "./fixtures";

const reporting = { reporting: { report_dir: "reports", print_top_n: 1 } };

function emptySummary(): CycleSummary {
  return { signals: 0, executed: 0, skipped: {}, decisions: [] };
}

describe("generateReport", () => {
  it("summarizes an idle cycle", () => {
    const wallet = new Wallet(1000);
    const { text, json } = generateReport(
      { marketsScanned: 3, summary: emptySummary(), settlements: [], wallet, markPrices: new Map() },
      reporting
    );
    const lines = text.split("\n");
    assert.ok(lines.includes("Markets scanned: 3"));
    assert.ok(lines.includes("Signals: 0"));
    assert.ok(lines.includes("Cash (USD): 1000.00"));
    assert.ok(lines.includes("PnL (USD): 0.00"));
    assert.ok(lines.includes("Trades: 0 (win rate 0.0%)"));
    assert.ok(lines.includes("## Open positions (0)"));
    assert.strictEqual(json.equity, 1000);
    assert.strictEqual(json.winRate, 0);
  });

  it("lists positions, skip reasons and the top signal", () => {
    const wallet = new Wallet(1000);
    wallet.deduct(46);
    wallet.openPosition("y1", "BUY", 100, 0.46, 1);
    const summary: CycleSummary = {
      signals: 2,
      executed: 1,
      skipped: { no_book: 1 },
      decisions: [
        { signal: mockSignal({ marketId: "m-small", spread: 0.03 }), tokenId: "y2", outcome: "no_book" },
        { signal: mockSignal({ marketId: "m-big", spread: 0.08 }), tokenId: "y1", outcome: "executed" },
      ],
    };
    const { text, json } = generateReport(
      { marketsScanned: 2, summary, settlements: [], wallet, markPrices: new Map([["y1", 0.5]]) },
      reporting
    );
    const lines = text.split("\n");
    assert.ok(lines.includes("  - no_book: 1"));
    assert.ok(lines.includes("Equity (USD): 1004.00"));
    assert.ok(lines.includes("  - y1 | BUY | size=100.00 | entry=0.4600"));
    assert.ok(lines.includes("  - m-big | BUY | spread=0.0800 | net=? | executed"));
    assert.ok(!lines.some((l) => l.includes("m-small")));
    assert.strictEqual(json.wallet.positions.length, 1);
    assert.strictEqual(json.executed, 1);
  });
});

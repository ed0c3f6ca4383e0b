/**
 * Binary Arb Lab — simulation only.
 * Loads a market/book snapshot, scans for price-sum mispricings, simulates
 * the profitable ones against a virtual wallet and writes a report.
 */

import { loadConfig, getConfigPath } from "./config/load_config";
import { loadSnapshot } from "./markets/snapshot";
import { runScanCycle, markPrices, settlePositions, type CycleDecision } from "./simulation/run_cycle";
import { Wallet } from "./state/wallet";
import { initStore, appendJournal, saveWallet, loadWallet } from "./state/store";
import { generateReport, writeReportToFile } from "./audit";
import type { JournalEntry } from "./types";

function decisionEntry(d: CycleDecision, timestamp: string): Omit<JournalEntry, "id"> {
  if (d.outcome === "executed") {
    return {
      timestamp,
      action: "trade_opened",
      marketId: d.signal.marketId,
      metadata: { trade: d.trade, execution: d.execution, net: d.profit?.net },
    };
  }
  return {
    timestamp,
    action: "trade_skipped",
    marketId: d.signal.marketId,
    metadata: { reason: d.outcome, tokenId: d.tokenId, spread: d.signal.spread, net: d.profit?.net },
  };
}

function main(): void {
  const config = loadConfig();
  console.log("[config] Loaded", getConfigPath());

  const dataDir = initStore(config.journal.dir);
  const wallet = loadWallet(dataDir) ?? new Wallet(config.simulation.starting_balance_usd);
  const snapshot = loadSnapshot(config.snapshot.path);

  const startedAt = new Date().toISOString();
  appendJournal(dataDir, {
    timestamp: startedAt,
    action: "cycle_started",
    marketId: "",
    metadata: { markets: snapshot.markets.length, books: snapshot.books.length, cash: wallet.cash },
  });

  const summary = runScanCycle(snapshot, wallet, config);
  for (const d of summary.decisions) {
    appendJournal(dataDir, {
      timestamp: startedAt,
      action: "signal",
      marketId: d.signal.marketId,
      metadata: { spread: d.signal.spread, side: d.signal.recommendedSide },
    });
    appendJournal(dataDir, decisionEntry(d, startedAt));
  }
  console.log(`[cycle] signals=${summary.signals} executed=${summary.executed}`);

  const marks = markPrices(snapshot.books);
  const settlements = config.simulation.settle_at_mark ? settlePositions(wallet, marks) : [];
  for (const s of settlements) {
    appendJournal(dataDir, {
      timestamp: new Date().toISOString(),
      action: "trade_closed",
      marketId: "",
      metadata: { tokenId: s.tokenId, exitPrice: s.exitPrice, pnl: s.pnl },
    });
  }

  appendJournal(dataDir, {
    timestamp: new Date().toISOString(),
    action: "cycle_finished",
    marketId: "",
    metadata: { executed: summary.executed, skipped: summary.skipped, cash: wallet.cash },
  });
  saveWallet(dataDir, wallet);

  const result = generateReport(
    {
      marketsScanned: snapshot.markets.length,
      summary,
      settlements,
      wallet,
      markPrices: marks,
    },
    config
  );
  console.log(result.text);
  const path = writeReportToFile(result, config);
  console.log("[report] Written", path);
}

try {
  main();
} catch (e) {
  console.error("[fatal]", e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}

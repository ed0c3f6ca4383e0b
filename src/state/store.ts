/**
 * File-based persistence: JSONL for the simulation journal, JSON for the wallet.
 * No native addons.
 */

import { mkdirSync, existsSync, readFileSync, writeFileSync, appendFileSync } from "fs";
import { join } from "path";
import type { JournalEntry } from "../types";
import { Wallet, type WalletSnapshot } from "./wallet";

const JOURNAL_FILE = "journal.jsonl";
const WALLET_FILE = "wallet.json";

/** Ensure the data directory exists and log where the journal and wallet are written. */
export function initStore(dataDir: string): string {
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
  console.log("[store] Data directory:", dataDir);
  console.log("[store] Journal:", journalPath(dataDir));
  console.log("[store] Wallet:", walletPath(dataDir));
  return dataDir;
}

function journalPath(dataDir: string): string {
  return join(dataDir, JOURNAL_FILE);
}

function walletPath(dataDir: string): string {
  return join(dataDir, WALLET_FILE);
}

/** Append one journal entry (one JSON line). */
export function appendJournal(dataDir: string, entry: Omit<JournalEntry, "id">): void {
  const line = JSON.stringify({
    timestamp: entry.timestamp,
    action: entry.action,
    marketId: entry.marketId,
    metadata: entry.metadata ?? {},
  }) + "\n";
  appendFileSync(journalPath(dataDir), line, "utf-8");
}

/** Read last N journal entries, newest first. */
export function getJournal(dataDir: string, limit: number): JournalEntry[] {
  const path = journalPath(dataDir);
  if (limit <= 0 || !existsSync(path)) return [];
  const raw = readFileSync(path, "utf-8");
  const lines = raw.split("\n").filter((s) => s.trim());
  const fromEnd = lines.slice(-limit).reverse();
  return fromEnd.map((line, i) => {
    const o = JSON.parse(line) as Omit<JournalEntry, "id">;
    return {
      id: fromEnd.length - i,
      timestamp: o.timestamp,
      action: o.action,
      marketId: o.marketId,
      metadata: o.metadata ?? {},
    };
  });
}

export function saveWallet(dataDir: string, wallet: Wallet): void {
  writeFileSync(walletPath(dataDir), JSON.stringify(wallet.snapshot(), null, 2), "utf-8");
}

/** Restore the wallet from wallet.json, or null when none was saved. */
export function loadWallet(dataDir: string): Wallet | null {
  const path = walletPath(dataDir);
  if (!existsSync(path)) return null;
  const snap = JSON.parse(readFileSync(path, "utf-8")) as WalletSnapshot;
  return Wallet.fromSnapshot(snap);
}

/**
 * Shared types for the Binary Arb Lab (simulation only, no live orders).
 */

export type Side = "BUY" | "SELL";

/** Binary prediction market. Index 0 is YES, index 1 is NO. */
export interface Market {
  id: string;
  question: string;
  slug: string;
  outcomes: string[];
  outcomePrices: number[];
  /** Token IDs for trading, parallel to outcomes. */
  clobTokenIds: string[];
  bestBid: number | null;
  bestAsk: number | null;
  /** Basis points (usually 0). */
  makerBaseFee: number;
  /** Basis points (e.g. 200 = 2%). */
  takerBaseFee: number;
  liquidity: number;
  volume24hr: number;
  active: boolean;
  acceptingOrders: boolean;
}

export interface PriceLevel {
  price: number;
  size: number;
}

/** Book for a single token. Bids best-first (descending), asks best-first (ascending). */
export interface OrderBook {
  tokenId: string;
  bids: PriceLevel[];
  asks: PriceLevel[];
  timestamp: number;
}

export interface ArbitrageSignal {
  marketId: string;
  /** How far yes + no deviates from 1. */
  spread: number;
  /** Gross expected profit per unit, before costs. */
  edge: number;
  recommendedSide: Side;
  yesPrice: number;
  noPrice: number;
}

export interface ExecutionResult {
  filledSize: number;
  executionPrice: number;
  feePaid: number;
  slippage: number;
  totalCost: number;
  success: boolean;
}

export interface Position {
  tokenId: string;
  side: Side;
  size: number;
  entryPrice: number;
  entryTime: number;
}

/** One simulated fill. */
export interface Trade {
  id: string;
  tokenId: string;
  price: number;
  size: number;
  side: Side;
  timestamp: number;
}

export interface JournalEntry {
  id?: number;
  timestamp: string;
  action:
    | "cycle_started"
    | "signal"
    | "trade_skipped"
    | "trade_opened"
    | "trade_closed"
    | "cycle_finished";
  marketId: string;
  metadata: Record<string, unknown>;
}

import { randomUUID } from "crypto";
import type { Config } from "../config/load_config";
import {
  calculateSlippage,
  executeOrder,
  filledSize,
  feeScheduleFromMarket,
  takerRate,
  type FeeSchedule,
} from "../execution";
import { yesTokenId } from "../markets/market";
import { midpoint } from "../markets/order_book";
import { indexBooks, type MarketSnapshot } from "../markets/snapshot";
import { computeExpectedProfit, scan, shouldTrade, type ProfitBreakdown } from "../opportunity_detector";
import type { Wallet } from "../state/wallet";
import type { ArbitrageSignal, ExecutionResult, Market, OrderBook, Trade } from "../types";

export type SkipReason =
  | "no_token"
  | "no_book"
  | "illiquid"
  | "unprofitable"
  | "position_open"
  | "rejected";

export interface CycleDecision {
  signal: ArbitrageSignal;
  tokenId: string | null;
  outcome: "executed" | SkipReason;
  profit?: ProfitBreakdown;
  execution?: ExecutionResult;
  trade?: Trade;
}

export interface CycleSummary {
  signals: number;
  executed: number;
  skipped: Partial<Record<SkipReason, number>>;
  decisions: CycleDecision[];
}

export type CycleConfig = Pick<Config, "detector" | "simulation">;

function feeScheduleFor(market: Market, config: CycleConfig): FeeSchedule {
  if (config.simulation.use_market_fees) return feeScheduleFromMarket(market);
  return {
    makerFeeBps: config.simulation.fallback_maker_fee_bps,
    takerFeeBps: config.simulation.fallback_taker_fee_bps,
  };
}

/**
 * One scan -> decide -> execute pass over a snapshot. Each signal is traded
 * on the market's YES token book in the recommended direction, sized by the
 * fill model; a filled order opens a position at the VWAP. Mutates only `wallet`.
 */
export function runScanCycle(
  snapshot: MarketSnapshot,
  wallet: Wallet,
  config: CycleConfig,
  now: number = Date.now()
): CycleSummary {
  const marketsById = new Map<string, Market>(snapshot.markets.map((m) => [m.id, m]));
  const books = indexBooks(snapshot.books);
  const orderSize = config.simulation.order_size;

  const signals = scan(snapshot.markets, config.detector);
  const decisions: CycleDecision[] = [];

  for (const signal of signals) {
    const market = marketsById.get(signal.marketId);
    const tokenId = market ? yesTokenId(market) : null;
    if (!market || tokenId == null) {
      decisions.push({ signal, tokenId: null, outcome: "no_token" });
      continue;
    }
    const book = books.get(tokenId);
    if (!book) {
      decisions.push({ signal, tokenId, outcome: "no_book" });
      continue;
    }

    const side = signal.recommendedSide;
    const fees = feeScheduleFor(market, config);
    // thin books are judged at the size they can actually fill
    const size = filledSize(book, orderSize, side);
    const slippage = size > 0 ? calculateSlippage(book, size, side) : null;
    if (slippage == null) {
      decisions.push({ signal, tokenId, outcome: "illiquid" });
      continue;
    }

    const feeRate = takerRate(fees);
    const profit = computeExpectedProfit(signal, size, feeRate, slippage, config.detector);
    if (!shouldTrade(signal, size, feeRate, slippage, config.detector)) {
      decisions.push({ signal, tokenId, outcome: "unprofitable", profit });
      continue;
    }

    if (wallet.getPosition(tokenId)) {
      decisions.push({ signal, tokenId, outcome: "position_open", profit });
      continue;
    }

    const execution = executeOrder(book, orderSize, side, wallet, fees);
    if (!execution) {
      decisions.push({ signal, tokenId, outcome: "rejected", profit });
      continue;
    }

    wallet.openPosition(tokenId, side, execution.filledSize, execution.executionPrice, now);
    const trade: Trade = {
      id: randomUUID(),
      tokenId,
      price: execution.executionPrice,
      size: execution.filledSize,
      side,
      timestamp: now,
    };
    decisions.push({ signal, tokenId, outcome: "executed", profit, execution, trade });
  }

  const skipped: Partial<Record<SkipReason, number>> = {};
  let executed = 0;
  for (const d of decisions) {
    if (d.outcome === "executed") executed++;
    else skipped[d.outcome] = (skipped[d.outcome] ?? 0) + 1;
  }

  return { signals: signals.length, executed, skipped, decisions };
}

/** Midpoint per token, for marking positions. Books without a midpoint are left out. */
export function markPrices(books: OrderBook[]): Map<string, number> {
  const prices = new Map<string, number>();
  for (const book of books) {
    const mid = midpoint(book);
    if (mid != null) prices.set(book.tokenId, mid);
  }
  return prices;
}

export interface Settlement {
  tokenId: string;
  exitPrice: number;
  pnl: number;
}

/** Close every open position that has an exit price; each close counts as a trade (win when PnL > 0). */
export function settlePositions(wallet: Wallet, exitPrices: ReadonlyMap<string, number>): Settlement[] {
  const settled: Settlement[] = [];
  for (const pos of wallet.listPositions()) {
    const exitPrice = exitPrices.get(pos.tokenId);
    if (exitPrice == null) continue;
    const pnl = wallet.closePosition(pos.tokenId, exitPrice);
    if (pnl == null) continue;
    wallet.recordTrade(pnl > 0);
    settled.push({ tokenId: pos.tokenId, exitPrice, pnl });
  }
  return settled;
}

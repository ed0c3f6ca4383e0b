import type { OrderBook, PriceLevel, Side } from "../types";

/** Levels that provide liquidity for a side: asks fill a BUY, bids fill a SELL. */
function liquidityLevels(book: OrderBook, side: Side): PriceLevel[] {
  return side === "BUY" ? book.asks : book.bids;
}

function sumSizes(levels: PriceLevel[]): number {
  let total = 0;
  for (const level of levels) total += level.size;
  return total;
}

export function bestBid(book: OrderBook): number | null {
  return book.bids.length > 0 ? book.bids[0].price : null;
}

export function bestAsk(book: OrderBook): number | null {
  return book.asks.length > 0 ? book.asks[0].price : null;
}

/** Average of best bid and best ask. Null if either side is empty. */
export function midpoint(book: OrderBook): number | null {
  const bid = bestBid(book);
  const ask = bestAsk(book);
  if (bid == null || ask == null) return null;
  return (bid + ask) / 2;
}

export function totalBidLiquidity(book: OrderBook): number {
  return sumSizes(book.bids);
}

export function totalAskLiquidity(book: OrderBook): number {
  return sumSizes(book.asks);
}

export function availableLiquidity(book: OrderBook, side: Side): number {
  return side === "BUY" ? totalAskLiquidity(book) : totalBidLiquidity(book);
}

/**
 * VWAP for taking `size` from the book. Walks levels in the order given
 * (callers supply best-first books). Returns null when the book runs out
 * before the size is filled.
 */
export function executionPrice(book: OrderBook, size: number, side: Side): number | null {
  let remaining = size;
  let notional = 0;

  for (const level of liquidityLevels(book, side)) {
    if (remaining <= 0) break;
    const fill = Math.min(remaining, level.size);
    notional += fill * level.price;
    remaining -= fill;
  }

  // float noise from size * (available / size) counts as filled
  if (remaining > size * 1e-12) return null;
  return notional / size;
}

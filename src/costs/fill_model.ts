import { availableLiquidity } from "../markets/order_book";
import type { OrderBook, Side } from "../types";

/**
 * Fraction of `size` the resting liquidity can absorb (1 when the book is deep enough).
 * An empty book gives 0.
 */
export function estimateFillRatio(book: OrderBook, size: number, side: Side): number {
  const available = availableLiquidity(book, side);
  if (available >= size) return 1;
  return available / size;
}

export function filledSize(book: OrderBook, requestedSize: number, side: Side): number {
  return requestedSize * estimateFillRatio(book, requestedSize, side);
}

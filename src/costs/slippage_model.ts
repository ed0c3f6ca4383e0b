import { executionPrice, midpoint } from "../markets/order_book";
import type { OrderBook, Side } from "../types";

/**
 * Signed slippage vs midpoint: positive when the fill is worse than mid
 * ((exec - mid) / mid for BUY, (mid - exec) / mid for SELL).
 * Null when the book has no midpoint or cannot fill `size`.
 */
export function calculateSlippage(book: OrderBook, size: number, side: Side): number | null {
  const mid = midpoint(book);
  if (mid == null) return null;
  const exec = executionPrice(book, size, side);
  if (exec == null) return null;

  return side === "BUY" ? (exec - mid) / mid : (mid - exec) / mid;
}

/** Notional cost of taking `size` at the walked VWAP. */
export function executionCost(book: OrderBook, size: number, side: Side): number | null {
  const exec = executionPrice(book, size, side);
  if (exec == null) return null;
  return exec * size;
}

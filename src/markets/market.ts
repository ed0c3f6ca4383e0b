import type { Market } from "../types";

export function yesPrice(market: Market): number {
  return market.outcomePrices[0];
}

export function noPrice(market: Market): number {
  return market.outcomePrices[1];
}

/** Absolute deviation of yes + no from 1.0 (not a bid/ask spread). */
export function getSpread(market: Market): number {
  return Math.abs(yesPrice(market) + noPrice(market) - 1);
}

export function isBalanced(market: Market, tolerance: number = 1e-9): boolean {
  return getSpread(market) <= tolerance;
}

export function yesTokenId(market: Market): string | null {
  return market.clobTokenIds[0] ?? null;
}

export function isTradable(market: Market): boolean {
  return market.active && market.acceptingOrders;
}

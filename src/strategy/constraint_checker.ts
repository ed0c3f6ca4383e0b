import { getSpread, noPrice, yesPrice } from "../markets/market";
import type { ArbitrageSignal, Market } from "../types";

export interface ConstraintConfig {
  /** e.g. 0.02 for 2%. */
  min_spread_threshold: number;
}

/**
 * Binary constraint: yes + no should sum to 1. Emits a signal when the
 * deviation exceeds the threshold. Overpriced pairs are sold, underpriced bought.
 */
export function checkViolation(market: Market, config: ConstraintConfig): ArbitrageSignal | null {
  const spread = getSpread(market);
  if (spread <= config.min_spread_threshold) return null;

  const yes = yesPrice(market);
  const no = noPrice(market);

  return {
    marketId: market.id,
    spread,
    edge: spread,
    recommendedSide: yes + no > 1 ? "SELL" : "BUY",
    yesPrice: yes,
    noPrice: no,
  };
}

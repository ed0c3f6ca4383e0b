import { isTradable } from "../markets/market";
import type { ArbitrageSignal, Market } from "../types";
import { checkViolation, type ConstraintConfig } from "./constraint_checker";

export interface DetectorConfig extends ConstraintConfig {
  /** Minimum net expected profit (USD) to trade. */
  min_profit_threshold: number;
  /** Legs charged a fee at the yes price. A binary pair trade has two. */
  fee_legs: number;
}

export interface ProfitBreakdown {
  gross: number;
  fee_cost: number;
  slippage_cost: number;
  net: number;
  explanation: string[];
}

/** Signals for every tradable market, in input order. */
export function scan(markets: Market[], config: ConstraintConfig): ArbitrageSignal[] {
  const signals: ArbitrageSignal[] = [];
  for (const market of markets) {
    if (!isTradable(market)) continue;
    const signal = checkViolation(market, config);
    if (signal) signals.push(signal);
  }
  return signals;
}

/**
 * Net profit after costs.
 * - Gross: edge * size.
 * - Fees: size * yesPrice * feeRate per leg.
 * - Slippage: size * slippage.
 */
export function computeExpectedProfit(
  signal: ArbitrageSignal,
  size: number,
  feeRate: number,
  slippage: number,
  config: Pick<DetectorConfig, "fee_legs">
): ProfitBreakdown {
  const explanation: string[] = [];

  const gross = signal.edge * size;
  explanation.push(`Gross: edge ${signal.edge.toFixed(4)} x ${size} = ${gross.toFixed(4)}`);

  const feeCost = size * signal.yesPrice * feeRate * config.fee_legs;
  explanation.push(
    `Fees: ${config.fee_legs} leg(s) at rate ${feeRate} on yes ${signal.yesPrice} = ${feeCost.toFixed(4)}`
  );

  const slippageCost = size * slippage;
  explanation.push(`Slippage: ${slippage.toFixed(4)} x ${size} = ${slippageCost.toFixed(4)}`);

  const net = gross - feeCost - slippageCost;
  return { gross, fee_cost: feeCost, slippage_cost: slippageCost, net, explanation };
}

export function expectedProfit(
  signal: ArbitrageSignal,
  size: number,
  feeRate: number,
  slippage: number,
  config: Pick<DetectorConfig, "fee_legs">
): number {
  return computeExpectedProfit(signal, size, feeRate, slippage, config).net;
}

/** Strictly above the minimum; equality does not trade. */
export function shouldTrade(
  signal: ArbitrageSignal,
  size: number,
  feeRate: number,
  slippage: number,
  config: DetectorConfig
): boolean {
  return expectedProfit(signal, size, feeRate, slippage, config) > config.min_profit_threshold;
}

import type { Market } from "../types";

/** Basis-point fee schedule. Maker is usually 0, taker around 200. */
export interface FeeSchedule {
  makerFeeBps: number;
  takerFeeBps: number;
}

export function feeScheduleFromMarket(market: Market): FeeSchedule {
  return {
    makerFeeBps: market.makerBaseFee,
    takerFeeBps: market.takerBaseFee,
  };
}

export function calculateFee(schedule: FeeSchedule, notional: number, isMaker: boolean): number {
  const bps = isMaker ? schedule.makerFeeBps : schedule.takerFeeBps;
  return notional * (bps / 10000);
}

/** Taker fee as a decimal rate. */
export function takerRate(schedule: FeeSchedule): number {
  return schedule.takerFeeBps / 10000;
}

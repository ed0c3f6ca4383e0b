import type { ArbitrageSignal, Market, OrderBook } from "../types";

export function mockMarket(overrides: Partial<Market> = {}): Market {
  return {
    id: "m1",
    question: "Q?",
    slug: "q",
    outcomes: ["Yes", "No"],
    outcomePrices: [0.5, 0.5],
    clobTokenIds: ["y1", "n1"],
    bestBid: null,
    bestAsk: null,
    makerBaseFee: 0,
    takerBaseFee: 0,
    liquidity: 0,
    volume24hr: 0,
    active: true,
    acceptingOrders: true,
    ...overrides,
  };
}

/** bids [(0.49, 500)], asks [(0.51, 400), (0.52, 700)] */
export function mockBook(overrides: Partial<OrderBook> = {}): OrderBook {
  return {
    tokenId: "t1",
    bids: [{ price: 0.49, size: 500 }],
    asks: [
      { price: 0.51, size: 400 },
      { price: 0.52, size: 700 },
    ],
    timestamp: 0,
    ...overrides,
  };
}

export function mockSignal(overrides: Partial<ArbitrageSignal> = {}): ArbitrageSignal {
  return {
    marketId: "m1",
    spread: 0.05,
    edge: 0.05,
    recommendedSide: "BUY",
    yesPrice: 0.48,
    noPrice: 0.47,
    ...overrides,
  };
}

export function assertNear(actual: number | null | undefined, expected: number, eps: number = 1e-9): void {
  if (actual == null) throw new Error(`expected ${expected}, got ${String(actual)}`);
  if (Math.abs(actual - expected) >= eps) throw new Error(`${actual} != ${expected}`);
}

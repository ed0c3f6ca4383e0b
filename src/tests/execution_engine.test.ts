/**
 * Unit tests for the execution simulator: fill, VWAP, fee, affordability.
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import { executeOrder } from "../execution/execution_engine";
import { Wallet } from "../state/wallet";
import { assertNear, mockBook } from "./fixtures";

const fees = { makerFeeBps: 0, takerFeeBps: 200 };

describe("executeOrder", () => {
  it("BUY 600 walks two levels and debits notional + taker fee", () => {
    const wallet = new Wallet(1000);
    const result = executeOrder(mockBook(), 600, "BUY", wallet, fees);
    assert.ok(result);
    assert.strictEqual(result.success, true);
    assert.strictEqual(result.filledSize, 600);
    assertNear(result.executionPrice, 308 / 600);
    assertNear(result.slippage, (308 / 600 - 0.5) / 0.5);
    assertNear(result.feePaid, 6.16);
    assertNear(result.totalCost, 314.16);
    assertNear(wallet.cash, 685.84);
    assertNear(wallet.totalFeesPaid, 6.16);
  });

  it("executes the fill model's reduced size when the book is thin", () => {
    const wallet = new Wallet(1000);
    const result = executeOrder(mockBook(), 2200, "BUY", wallet, fees);
    assert.ok(result);
    assert.strictEqual(result.filledSize, 1100);
    assertNear(result.executionPrice, 568 / 1100);
    assertNear(result.totalCost, 568 * 1.02);
  });

  it("executes the fill model's size on a thin book with decimal level sizes", () => {
    const wallet = new Wallet(1000);
    const thin = mockBook({
      asks: [
        { price: 0.51, size: 0.1 },
        { price: 0.52, size: 0.2 },
      ],
    });
    const result = executeOrder(thin, 100, "BUY", wallet, { makerFeeBps: 0, takerFeeBps: 0 });
    assert.ok(result);
    assertNear(result.filledSize, 0.3);
    assertNear(result.executionPrice, 0.155 / 0.3);
    assertNear(wallet.cash, 1000 - 0.155);
  });

  it("reports slippage as a magnitude for SELL", () => {
    const wallet = new Wallet(1000);
    const result = executeOrder(mockBook(), 500, "SELL", wallet, { makerFeeBps: 0, takerFeeBps: 0 });
    assert.ok(result);
    assertNear(result.executionPrice, 0.49);
    assertNear(result.slippage, 0.02);
    assertNear(wallet.cash, 1000 - 245);
  });

  it("rejects without mutation when the wallet cannot afford it", () => {
    const wallet = new Wallet(100);
    assert.strictEqual(executeOrder(mockBook(), 600, "BUY", wallet, fees), null);
    assert.strictEqual(wallet.cash, 100);
    assert.strictEqual(wallet.totalFeesPaid, 0);
  });

  it("returns null on an empty side", () => {
    const wallet = new Wallet(1000);
    assert.strictEqual(executeOrder(mockBook({ asks: [] }), 10, "BUY", wallet, fees), null);
    assert.strictEqual(wallet.cash, 1000);
  });

  it("returns null when there is no midpoint", () => {
    const wallet = new Wallet(1000);
    assert.strictEqual(executeOrder(mockBook({ bids: [] }), 10, "BUY", wallet, fees), null);
    assert.strictEqual(wallet.cash, 1000);
  });
});

import { calculateFee, type FeeSchedule } from "../costs/fee_model";
import { filledSize } from "../costs/fill_model";
import { executionPrice, midpoint } from "../markets/order_book";
import type { Wallet } from "../state/wallet";
import type { ExecutionResult, OrderBook, Side } from "../types";

/**
 * Simulate one taker order against a book and debit the wallet.
 * Executes the fill model's size or nothing: returns null when the book is
 * empty or illiquid, has no midpoint, or the wallet cannot cover notional + fee
 * (the wallet is untouched in every null case).
 */
export function executeOrder(
  book: OrderBook,
  size: number,
  side: Side,
  wallet: Wallet,
  fees: FeeSchedule
): ExecutionResult | null {
  const filled = filledSize(book, size, side);
  if (filled <= 0) return null;

  const execPrice = executionPrice(book, filled, side);
  if (execPrice == null) return null;
  const mid = midpoint(book);
  if (mid == null) return null;
  const slippage = Math.abs((execPrice - mid) / mid);

  const notional = execPrice * filled;
  const fee = calculateFee(fees, notional, false);
  const totalCost = notional + fee;

  if (!wallet.deduct(totalCost)) return null;
  wallet.recordFee(fee);

  return {
    filledSize: filled,
    executionPrice: execPrice,
    feePaid: fee,
    slippage,
    totalCost,
    success: true,
  };
}

/**
 * Execution module — order simulation plus the cost models it composes.
 */
export { executeOrder } from "./execution_engine";
export { calculateFee, feeScheduleFromMarket, takerRate, type FeeSchedule } from "../costs/fee_model";
export { estimateFillRatio, filledSize } from "../costs/fill_model";
export { calculateSlippage, executionCost } from "../costs/slippage_model";

/**
 * Opportunity detector module — thin facade over the constraint checker and arbitrage detector.
 */
export { checkViolation, type ConstraintConfig } from "../strategy/constraint_checker";
export {
  scan,
  computeExpectedProfit,
  expectedProfit,
  shouldTrade,
  type DetectorConfig,
  type ProfitBreakdown,
} from "../strategy/arbitrage_detector";

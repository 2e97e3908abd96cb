/**
 * Safety Gate - Non-overridable pre-checks
 *
 * Runs before any strategy is considered. A block is terminal: the pipeline
 * skips the oracle, validation and proxy logic and emits do_not_bid.
 *
 * Check order (first match wins):
 * 1. Valuation invalid (estimated value ≤ 0)
 * 2. Minimum budget
 * 3. Overpayment (current bid above 130% of value)
 * 4. Portfolio concentration (value above 50% of budget)
 *
 * This module is pure (no I/O, no throw).
 */

import type { AuctionContext, FinalDecision, SafetyCheckResult } from "./types";

/** Below this budget the portfolio cannot absorb another position */
export const MIN_BUDGET = 100;

/** Current bid may not exceed this multiple of the estimated value */
export const MAX_OVERPAY_RATIO = 1.3;

/** A single domain may not exceed this fraction of the available budget */
export const MAX_CONCENTRATION_RATIO = 0.5;

/** Confidence attached to every safety block */
export const SAFETY_BLOCK_CONFIDENCE = 0.95;

const usd = (n: number): string => `$${n.toFixed(2)}`;

/**
 * Run the safety checks in priority order
 */
export function checkSafety(context: AuctionContext): SafetyCheckResult {
  const { estimatedValue, currentBid, budgetAvailable } = context;

  if (estimatedValue <= 0) {
    return {
      passed: false,
      rule: "VALUATION_INVALID",
      reason: `VALUATION INVALID: Estimated value ${usd(estimatedValue)} is not positive; the domain cannot be priced.`,
    };
  }

  if (budgetAvailable < MIN_BUDGET) {
    return {
      passed: false,
      rule: "MINIMUM_BUDGET",
      reason: `MINIMUM BUDGET: Available budget ${usd(budgetAvailable)} is below the ${usd(MIN_BUDGET)} minimum required to bid.`,
    };
  }

  const overpayLimit = estimatedValue * MAX_OVERPAY_RATIO;
  if (currentBid > overpayLimit) {
    const pct = ((currentBid / estimatedValue) * 100).toFixed(0);
    return {
      passed: false,
      rule: "OVERPAYMENT_PROTECTION",
      reason: `OVERPAYMENT PROTECTION: Current bid ${usd(currentBid)} is ${pct}% of estimated value ${usd(estimatedValue)}, above the ${usd(overpayLimit)} limit.`,
    };
  }

  const concentrationLimit = budgetAvailable * MAX_CONCENTRATION_RATIO;
  if (estimatedValue > concentrationLimit) {
    const pct = ((estimatedValue / budgetAvailable) * 100).toFixed(0);
    return {
      passed: false,
      rule: "PORTFOLIO_CONCENTRATION",
      reason: `PORTFOLIO CONCENTRATION: Estimated value ${usd(estimatedValue)} is ${pct}% of available budget ${usd(budgetAvailable)}, above the ${usd(concentrationLimit)} single-domain limit.`,
    };
  }

  return { passed: true };
}

/**
 * Terminal decision for a blocked auction
 */
export function buildSafetyBlockDecision(reason: string): FinalDecision {
  const decision: FinalDecision = {
    strategy: "do_not_bid",
    recommendedBidAmount: 0,
    confidence: SAFETY_BLOCK_CONFIDENCE,
    riskLevel: "high",
    reasoning: reason,
    shouldIncreaseProxy: false,
    nextBidAmount: null,
    maxBudgetForDomain: 0,
    proxyDecision: null,
    decisionSource: "safety_block",
  };
  return Object.freeze(decision);
}

/**
 * Rule Fallback Engine
 *
 * Deterministic strategy selection used whenever the oracle fails or its
 * proposal is rejected. Same context and intelligence, same decision.
 *
 * Decision tree by value tier:
 * - high (≥ $1000): closeout if uncontested near the end, counter bots with
 *   a snipe, proxy against light competition, snipe against heavy competition
 * - medium ($100-999): snipe on extension platforms near the end, probe
 *   crowded auctions, proxy otherwise
 * - low (< $100): closeout if uncontested, otherwise probe with a capped bid
 *
 * This module is pure (no I/O, no throw).
 */

import { calculateSafeMax, classifyValueTier, hasLateExtension } from "./value-tier";
import type {
  AuctionContext,
  BidStrategy,
  MarketIntelligence,
  RiskLevel,
  StrategyDecision,
  Usd,
  ValueTier,
} from "./types";

/** Safe max discount applied against a known aggressive opponent */
export const AGGRESSIVE_OPPONENT_DISCOUNT = 0.95;

/** Cap on probing bids for low-value domains */
export const LOW_VALUE_PROBE_CAP = 50;

const usd = (n: number): string => `$${n.toFixed(2)}`;

interface RuleOutcome {
  strategy: BidStrategy;
  bid: Usd;
  confidence: number;
  riskLevel: RiskLevel;
  reasoning: string;
}

/**
 * Safe maximum adjusted for the opponent read from market intelligence.
 * Only an exact bidder match discounts; the discount applies in every tier.
 */
export function calculateFallbackSafeMax(context: AuctionContext, intelligence: MarketIntelligence | null): Usd {
  const safeMax = calculateSafeMax(context.estimatedValue);
  const bidder = intelligence?.bidder;
  if (bidder?.found && bidder.isAggressive) {
    return safeMax * AGGRESSIVE_OPPONENT_DISCOUNT;
  }
  return safeMax;
}

function highValueRule(context: AuctionContext, safeMax: Usd): RuleOutcome {
  const { numBidders, hoursRemaining, bidderAnalysis } = context;

  if (numBidders === 0 && hoursRemaining < 1) {
    return {
      strategy: "wait_for_closeout",
      bid: safeMax,
      confidence: 0.85,
      riskLevel: "low",
      reasoning: `HIGH-VALUE CONSERVATIVE: No competing bidders with ${hoursRemaining}h left; wait for closeout and cap exposure at ${usd(safeMax)} to keep the margin on a ${usd(context.estimatedValue)} domain.`,
    };
  }

  if (bidderAnalysis.botDetected) {
    return {
      strategy: "last_minute_snipe",
      bid: safeMax,
      confidence: 0.8,
      riskLevel: "medium",
      reasoning: `HIGH-VALUE BOT COUNTER: Automated bidder detected; snipe late to deny the bot reaction time, bidding up to the safe maximum of ${usd(safeMax)}.`,
    };
  }

  if (numBidders <= 2) {
    return {
      strategy: "proxy_max",
      bid: safeMax,
      confidence: 0.75,
      riskLevel: "medium",
      reasoning: `HIGH-VALUE BALANCED: ${numBidders} competing bidder(s); place a proxy at the safe maximum of ${usd(safeMax)} and let the platform defend it.`,
    };
  }

  return {
    strategy: "last_minute_snipe",
    bid: safeMax,
    confidence: 0.7,
    riskLevel: "high",
    reasoning: `HIGH-VALUE COMPETITION: ${numBidders} competing bidders; avoid early escalation and snipe late with a ceiling of ${usd(safeMax)}.`,
  };
}

function mediumValueRule(context: AuctionContext, safeMax: Usd): RuleOutcome {
  const { numBidders, hoursRemaining, platform } = context;

  if (hasLateExtension(platform) && hoursRemaining < 1) {
    return {
      strategy: "last_minute_snipe",
      bid: safeMax,
      confidence: 0.8,
      riskLevel: "medium",
      reasoning: `MEDIUM-VALUE ${platform.toUpperCase()} TIMING: ${hoursRemaining}h left on a platform with late-bid extensions; snipe in the closing window up to ${usd(safeMax)}.`,
    };
  }

  if (numBidders > 5) {
    const probe = safeMax * 0.5;
    return {
      strategy: "incremental_test",
      bid: probe,
      confidence: 0.65,
      riskLevel: "medium",
      reasoning: `MEDIUM-VALUE COMPETITION: ${numBidders} competing bidders; probe with ${usd(probe)} (half the safe maximum) before committing further.`,
    };
  }

  return {
    strategy: "proxy_max",
    bid: safeMax,
    confidence: 0.75,
    riskLevel: "medium",
    reasoning: `MEDIUM-VALUE BALANCED: ${numBidders} competing bidder(s); proxy at the safe maximum of ${usd(safeMax)}.`,
  };
}

function lowValueRule(context: AuctionContext, safeMax: Usd): RuleOutcome {
  if (context.numBidders === 0) {
    return {
      strategy: "wait_for_closeout",
      bid: safeMax,
      confidence: 0.9,
      riskLevel: "low",
      reasoning: `LOW-VALUE CLOSEOUT: No competing bidders; wait for closeout and pay at most ${usd(safeMax)}.`,
    };
  }

  const probe = Math.min(safeMax, LOW_VALUE_PROBE_CAP);
  return {
    strategy: "incremental_test",
    bid: probe,
    confidence: 0.7,
    riskLevel: "low",
    reasoning: `LOW-VALUE TESTING: ${context.numBidders} competing bidder(s); test with a capped bid of ${usd(probe)}.`,
  };
}

const RULES_BY_TIER: Record<ValueTier, (context: AuctionContext, safeMax: Usd) => RuleOutcome> = {
  high: highValueRule,
  medium: mediumValueRule,
  low: lowValueRule,
};

/**
 * Select a strategy deterministically from the context
 */
export function selectFallbackStrategy(
  context: AuctionContext,
  intelligence: MarketIntelligence | null = null,
): StrategyDecision {
  const safeMax = calculateFallbackSafeMax(context, intelligence);
  const tier = classifyValueTier(context.estimatedValue);
  const outcome = RULES_BY_TIER[tier](context, safeMax);

  return {
    strategy: outcome.strategy,
    recommendedBidAmount: outcome.bid,
    confidence: outcome.confidence,
    riskLevel: outcome.riskLevel,
    reasoning: outcome.reasoning,
    shouldIncreaseProxy: null,
    nextBidAmount: null,
    maxBudgetForDomain: safeMax,
  };
}

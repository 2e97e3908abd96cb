/**
 * Strategy Validator - tiered acceptance of oracle proposals
 *
 * - Hard failures reject the proposal (route to rule fallback)
 * - Soft failures are recorded as warnings and the proposal is kept
 * - A soft failure escalates to hard only past its severity margin
 *
 * The first three hard checks (ceiling, budget, do-not-bid consistency)
 * short-circuit in that order before anything else is evaluated.
 *
 * This module is pure (no I/O, no throw).
 */

import type { AuctionContext, RiskLevel, StrategyDecision, ValidationIssue, ValidationResult } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────────────────

/** A configured ceiling can tighten the value cap, never loosen it */
export const MAX_BID_CEILING_RATIO = 1.0;

export interface ConfidenceBand {
  min: number;
  max: number;
}

export interface ValidatorConfig {
  /** Maximum bid as a fraction of estimated value, capped at MAX_BID_CEILING_RATIO */
  bidCeilingRatio: number;
  minReasoningLength: number;
  recommendedReasoningLength: number;
  /** aggressive_early is rejected below this estimated value */
  aggressiveEarlyMinValue: number;
  confidenceBands: Record<RiskLevel, ConfidenceBand>;
  /** Confidence deviation beyond which a band miss becomes a hard failure */
  confidenceEscalationMargin: number;
  waitForCloseoutMaxBidders: number;
  snipeMaxHoursRemaining: number;
  /** Reasoning must touch at least this many concept groups */
  minConceptGroups: number;
}

export const DEFAULT_VALIDATOR_CONFIG: ValidatorConfig = {
  bidCeilingRatio: 1.0,
  minReasoningLength: 50,
  recommendedReasoningLength: 100,
  aggressiveEarlyMinValue: 200,
  confidenceBands: {
    low: { min: 0.5, max: 1 },
    medium: { min: 0.35, max: 1 },
    high: { min: 0, max: 0.8 },
  },
  confidenceEscalationMargin: 0.3,
  waitForCloseoutMaxBidders: 3,
  snipeMaxHoursRemaining: 2,
  minConceptGroups: 2,
};

/**
 * Keyword groups a sound rationale should cover
 */
export const REASONING_CONCEPT_GROUPS: Record<string, readonly string[]> = {
  financial: ["profit", "margin", "value", "budget", "price", "roi", "cost"],
  risk: ["risk", "overpay", "safe", "exposure", "loss"],
  competition: ["competition", "competitor", "bidder", "opponent", "bot", "rival"],
  strategy: ["strategy", "snipe", "proxy", "timing", "closeout", "increment", "wait"],
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const usd = (n: number): string => `$${n.toFixed(2)}`;

export function countConceptGroups(reasoning: string): number {
  const text = reasoning.toLowerCase();
  return Object.values(REASONING_CONCEPT_GROUPS).filter(words => words.some(w => text.includes(w))).length;
}

/**
 * Distance of a confidence value outside its band (0 when inside)
 */
export function confidenceDeviation(confidence: number, band: ConfidenceBand): number {
  if (confidence < band.min) return band.min - confidence;
  if (confidence > band.max) return confidence - band.max;
  return 0;
}

function buildResult(errors: ValidationIssue[], warnings: ValidationIssue[]): ValidationResult {
  const parts = [
    ...errors.map(e => `ERROR ${e.code}: ${e.message}`),
    ...warnings.map(w => `WARNING ${w.code}: ${w.message}`),
  ];
  return {
    valid: errors.length === 0,
    errors,
    warnings,
    message: parts.length > 0 ? parts.join("; ") : "Strategy passed validation",
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export function validateStrategy(
  decision: StrategyDecision,
  context: AuctionContext,
  config: ValidatorConfig = DEFAULT_VALIDATOR_CONFIG,
): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const bid = decision.recommendedBidAmount;

  // ─────────────────────────────────────────────────────────────────────────
  // Short-circuit hard checks
  // ─────────────────────────────────────────────────────────────────────────

  const ceilingRatio = Math.min(config.bidCeilingRatio, MAX_BID_CEILING_RATIO);
  const ceiling = context.estimatedValue * ceilingRatio;
  if (bid > ceiling) {
    errors.push({
      code: "BID_EXCEEDS_CEILING",
      message: `Bid ${usd(bid)} exceeds ${(ceilingRatio * 100).toFixed(0)}% of estimated value (${usd(ceiling)})`,
    });
    return buildResult(errors, warnings);
  }

  if (bid > context.budgetAvailable) {
    errors.push({
      code: "BID_EXCEEDS_BUDGET",
      message: `Bid ${usd(bid)} exceeds available budget ${usd(context.budgetAvailable)}`,
    });
    return buildResult(errors, warnings);
  }

  if (decision.strategy === "do_not_bid" && bid !== 0) {
    errors.push({
      code: "DO_NOT_BID_WITH_AMOUNT",
      message: `do_not_bid must recommend $0, got ${usd(bid)}`,
    });
    return buildResult(errors, warnings);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Remaining hard checks
  // ─────────────────────────────────────────────────────────────────────────

  const reasoningLength = decision.reasoning.trim().length;
  if (reasoningLength < config.minReasoningLength) {
    errors.push({
      code: "REASONING_TOO_SHORT",
      message: `Reasoning has ${reasoningLength} characters, minimum is ${config.minReasoningLength}`,
    });
  }

  if (decision.strategy === "aggressive_early" && context.estimatedValue < config.aggressiveEarlyMinValue) {
    errors.push({
      code: "AGGRESSIVE_EARLY_LOW_VALUE",
      message: `aggressive_early is not justified for a ${usd(context.estimatedValue)} domain (minimum ${usd(config.aggressiveEarlyMinValue)})`,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Soft checks
  // ─────────────────────────────────────────────────────────────────────────

  const band = config.confidenceBands[decision.riskLevel];
  const deviation = confidenceDeviation(decision.confidence, band);
  if (deviation > 0) {
    const issue: ValidationIssue = {
      code: "CONFIDENCE_MISALIGNED",
      message: `Confidence ${decision.confidence.toFixed(2)} is outside [${band.min.toFixed(2)}, ${band.max.toFixed(2)}] for ${decision.riskLevel} risk (off by ${deviation.toFixed(2)})`,
    };
    if (deviation > config.confidenceEscalationMargin) {
      errors.push(issue);
    } else {
      warnings.push(issue);
    }
  }

  if (reasoningLength >= config.minReasoningLength && reasoningLength < config.recommendedReasoningLength) {
    warnings.push({
      code: "REASONING_BRIEF",
      message: `Reasoning has ${reasoningLength} characters, ${config.recommendedReasoningLength} recommended`,
    });
  }

  const groups = countConceptGroups(decision.reasoning);
  if (groups < config.minConceptGroups) {
    warnings.push({
      code: "REASONING_LACKS_CONCEPTS",
      message: `Reasoning covers ${groups} of ${Object.keys(REASONING_CONCEPT_GROUPS).length} concept groups (financial, risk, competition, strategy)`,
    });
  }

  if (decision.strategy === "wait_for_closeout" && context.numBidders > config.waitForCloseoutMaxBidders) {
    warnings.push({
      code: "CLOSEOUT_WITH_COMPETITION",
      message: `wait_for_closeout with ${context.numBidders} active bidders is unlikely to reach closeout`,
    });
  }

  if (decision.strategy === "last_minute_snipe" && context.hoursRemaining > config.snipeMaxHoursRemaining) {
    warnings.push({
      code: "SNIPE_TOO_EARLY",
      message: `last_minute_snipe with ${context.hoursRemaining}h remaining; revisit closer to the end`,
    });
  }

  return buildResult(errors, warnings);
}

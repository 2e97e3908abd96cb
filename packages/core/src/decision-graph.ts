/**
 * Decision Graph - pure stage transitions of the bid pipeline
 *
 * START → SAFETY_CHECK ─┬→ BLOCKED ─────────────────────────────→ FINALIZE → END
 *                       └→ ORACLE_PROPOSE → VALIDATE ─┬→ PROXY_LOGIC ─┤
 *                                                     └→ RULE_FALLBACK → PROXY_LOGIC
 *
 * Each stage takes the per-run state and returns the next one. The only
 * asynchronous step (asking the oracle) is driven by the caller, which hands
 * the outcome to {@link runValidationStage}.
 *
 * This module is pure (no I/O, no throw).
 */

import { runProxyLogic } from "./proxy-logic";
import { selectFallbackStrategy } from "./rule-fallback";
import { buildSafetyBlockDecision, checkSafety } from "./safety-gate";
import { DEFAULT_VALIDATOR_CONFIG, validateStrategy } from "./strategy-validator";
import type { ValidatorConfig } from "./strategy-validator";
import type {
  AuctionContext,
  FinalDecision,
  MarketIntelligence,
  OracleOutcome,
  PipelineState,
  StrategyDecision,
} from "./types";

export const MISSING_ANALYSIS_REASON = "System error: No valid strategy or proxy analysis available";

export function createPipelineState(context: AuctionContext, intelligence: MarketIntelligence | null): PipelineState {
  return {
    context,
    intelligence,
    stage: "START",
    safety: null,
    oracleOutcome: null,
    validation: null,
    fallbackDecision: null,
    strategyDecision: null,
    proxyDecision: null,
    decisionSource: null,
    finalDecision: null,
  };
}

/**
 * SAFETY_CHECK → BLOCKED | ORACLE_PROPOSE
 */
export function runSafetyStage(state: PipelineState): PipelineState {
  const safety = checkSafety(state.context);
  return {
    ...state,
    safety,
    stage: safety.passed ? "ORACLE_PROPOSE" : "BLOCKED",
    decisionSource: safety.passed ? null : "safety_block",
  };
}

/**
 * VALIDATE → PROXY_LOGIC | RULE_FALLBACK
 *
 * An oracle failure routes straight to the fallback without a validation result.
 */
export function runValidationStage(
  state: PipelineState,
  outcome: OracleOutcome,
  config: ValidatorConfig = DEFAULT_VALIDATOR_CONFIG,
): PipelineState {
  if (outcome.type === "FAILURE") {
    return { ...state, oracleOutcome: outcome, validation: null, stage: "RULE_FALLBACK" };
  }

  const validation = validateStrategy(outcome.decision, state.context, config);
  return {
    ...state,
    oracleOutcome: outcome,
    validation,
    stage: validation.valid ? "PROXY_LOGIC" : "RULE_FALLBACK",
    decisionSource: validation.valid ? "llm" : null,
  };
}

/**
 * RULE_FALLBACK → PROXY_LOGIC
 */
export function runFallbackStage(state: PipelineState): PipelineState {
  return {
    ...state,
    fallbackDecision: selectFallbackStrategy(state.context, state.intelligence),
    stage: "PROXY_LOGIC",
    decisionSource: "rules_fallback",
  };
}

function selectCandidate(state: PipelineState): StrategyDecision | null {
  if (state.decisionSource === "llm" && state.oracleOutcome?.type === "PROPOSAL") {
    return state.oracleOutcome.decision;
  }
  return state.fallbackDecision;
}

/**
 * PROXY_LOGIC → FINALIZE
 *
 * Leaves the proxy analysis empty when no candidate strategy exists, which
 * finalization reports as a system error.
 */
export function runProxyStage(state: PipelineState): PipelineState {
  const candidate = selectCandidate(state);
  if (!candidate) return { ...state, stage: "FINALIZE" };

  const { decision, proxy } = runProxyLogic(candidate, state.context);
  return { ...state, strategyDecision: decision, proxyDecision: proxy, stage: "FINALIZE" };
}

export function buildSystemErrorDecision(reason: string): FinalDecision {
  const decision: FinalDecision = {
    strategy: "do_not_bid",
    recommendedBidAmount: 0,
    confidence: 0,
    riskLevel: "high",
    reasoning: reason,
    shouldIncreaseProxy: false,
    nextBidAmount: null,
    maxBudgetForDomain: 0,
    proxyDecision: null,
    decisionSource: "system_error",
  };
  return Object.freeze(decision);
}

/**
 * FINALIZE → END. Builds the frozen final decision exactly once.
 */
export function finalizeDecision(state: PipelineState): PipelineState {
  if (state.finalDecision) return state;

  let finalDecision: FinalDecision;
  if (state.safety && !state.safety.passed) {
    finalDecision = buildSafetyBlockDecision(state.safety.reason);
  } else if (!state.strategyDecision || !state.proxyDecision || !state.decisionSource) {
    finalDecision = buildSystemErrorDecision(MISSING_ANALYSIS_REASON);
  } else {
    const { strategyDecision: s, proxyDecision: proxy } = state;
    const decision: FinalDecision = {
      strategy: s.strategy,
      recommendedBidAmount: s.recommendedBidAmount,
      confidence: s.confidence,
      riskLevel: s.riskLevel,
      reasoning: s.reasoning,
      shouldIncreaseProxy: s.shouldIncreaseProxy ?? false,
      nextBidAmount: s.nextBidAmount,
      maxBudgetForDomain: s.maxBudgetForDomain,
      proxyDecision: Object.freeze({ ...proxy }),
      decisionSource: state.decisionSource,
    };
    finalDecision = Object.freeze(decision);
  }

  return { ...state, finalDecision, decisionSource: finalDecision.decisionSource, stage: "END" };
}

/**
 * Decision Workflow
 *
 * Drives one pipeline run over the pure stage functions of @bid-advisor/core:
 * SAFETY_CHECK → (BLOCKED | ORACLE_PROPOSE → VALIDATE → [RULE_FALLBACK] → PROXY_LOGIC) → FINALIZE → END
 *
 * The oracle call is the only awaited step. Whatever happens, a FinalDecision
 * comes back; unexpected exceptions become a system_error do_not_bid.
 */

import {
  DEFAULT_VALIDATOR_CONFIG,
  MISSING_ANALYSIS_REASON,
  buildSystemErrorDecision,
  createPipelineState,
  finalizeDecision,
  runFallbackStage,
  runProxyStage,
  runSafetyStage,
  runValidationStage,
} from "@bid-advisor/core";
import type {
  AuctionContext,
  FinalDecision,
  MarketIntelligence,
  OracleOutcome,
  PipelineStage,
  PipelineState,
  ValidationResult,
  ValidatorConfig,
} from "@bid-advisor/core";
import { logger } from "@bid-advisor/utils";

import type { HistoricalContext, OracleRequest, StrategyOracle } from "../types";

const log = logger.child("pipeline");

export const NO_ORACLE_REASON = "No strategy oracle configured";

export interface DecisionWorkflowDeps {
  /** null runs the pipeline on rules alone */
  oracle: StrategyOracle | null;
  validatorConfig?: ValidatorConfig;
  /** Called with every stage entered, in order */
  onStage?: (stage: PipelineStage, state: PipelineState) => void;
}

export interface DecisionWorkflowInput {
  context: AuctionContext;
  intelligence: MarketIntelligence | null;
  history: HistoricalContext | null;
}

export interface DecisionWorkflowResult {
  decision: FinalDecision;
  stages: PipelineStage[];
  validation: ValidationResult | null;
  oracleFailure: string | null;
}

async function askOracle(oracle: StrategyOracle | null, request: OracleRequest): Promise<OracleOutcome> {
  if (!oracle) return { type: "FAILURE", reason: NO_ORACLE_REASON };

  return oracle.propose(request).match(
    (decision): OracleOutcome => ({ type: "PROPOSAL", decision }),
    (e): OracleOutcome => ({ type: "FAILURE", reason: `${e.type}: ${e.message}` }),
  );
}

export function systemErrorReason(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `System error: ${message}. Emergency safe decision: do not bid.`;
}

export async function executeDecisionWorkflow(
  deps: DecisionWorkflowDeps,
  input: DecisionWorkflowInput,
): Promise<DecisionWorkflowResult> {
  const { context } = input;
  const stages: PipelineStage[] = [];
  let state = createPipelineState(context, input.intelligence);

  const enter = (next: PipelineState): void => {
    state = next;
    stages.push(next.stage);
    log.debug("Stage entered", { domain: context.domain, stage: next.stage });
    deps.onStage?.(next.stage, next);
  };

  const oracleFailure = (): string | null =>
    state.oracleOutcome?.type === "FAILURE" ? state.oracleOutcome.reason : null;

  try {
    enter(state);
    enter({ ...state, stage: "SAFETY_CHECK" });
    enter(runSafetyStage(state));

    if (state.stage === "BLOCKED") {
      if (state.safety && !state.safety.passed) {
        log.info("Safety gate blocked auction", { domain: context.domain, rule: state.safety.rule });
      }
      enter({ ...state, stage: "FINALIZE" });
    } else {
      const outcome = await askOracle(deps.oracle, {
        context,
        intelligence: input.intelligence,
        history: input.history,
      });
      enter({ ...state, oracleOutcome: outcome, stage: "VALIDATE" });
      enter(runValidationStage(state, outcome, deps.validatorConfig ?? DEFAULT_VALIDATOR_CONFIG));

      if (state.stage === "RULE_FALLBACK") {
        log.info("Using rule-based fallback", {
          domain: context.domain,
          reason: state.validation?.message ?? oracleFailure() ?? "unknown",
        });
        enter(runFallbackStage(state));
      } else if (state.validation && state.validation.warnings.length > 0) {
        log.warn("Oracle proposal accepted with warnings", {
          domain: context.domain,
          warnings: state.validation.warnings.map(w => w.code),
        });
      }

      enter(runProxyStage(state));
    }

    enter(finalizeDecision(state));

    const decision = state.finalDecision ?? buildSystemErrorDecision(MISSING_ANALYSIS_REASON);
    if (decision.decisionSource === "system_error") {
      log.error("Pipeline finished without a strategy", { domain: context.domain });
    }
    log.info("Decision made", {
      domain: context.domain,
      strategy: decision.strategy,
      bid: decision.recommendedBidAmount,
      source: decision.decisionSource,
      proxyAction: decision.proxyDecision?.proxyAction ?? "none",
    });

    return { decision, stages, validation: state.validation, oracleFailure: oracleFailure() };
  } catch (e) {
    log.error("Pipeline failed", { domain: context.domain, stage: state.stage, error: e });
    stages.push("END");
    return {
      decision: buildSystemErrorDecision(systemErrorReason(e)),
      stages,
      validation: state.validation,
      oracleFailure: oracleFailure(),
    };
  }
}

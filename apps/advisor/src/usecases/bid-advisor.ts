/**
 * Bid Advisor Usecase
 *
 * - selectStrategy: enrich → history → decision workflow → stats → audit log
 * - Decision source counters (LLM success / fallback / safety block / system error)
 * - Outcome and per-round recording into the history store
 */

import { okAsync } from "neverthrow";
import type { ResultAsync } from "neverthrow";
import { v4 as uuidv4 } from "uuid";

import { classifyValueTier, enrichContext } from "@bid-advisor/core";
import type {
  AuctionContext,
  DecisionSource,
  FinalDecision,
  MarketIntelligence,
  ValidatorConfig,
} from "@bid-advisor/core";
import type { HistoryRepository, HistoryRepositoryError, MarketIntelligenceSource } from "@bid-advisor/repositories";
import { logger } from "@bid-advisor/utils";

import type { DecisionAuditSinkPort } from "../ports/decision-audit-sink";
import { createHistoricalLearning } from "../services/historical-learning";
import type { HistoricalContext, StrategyOracle } from "../types";
import { executeDecisionWorkflow } from "../workflows/decision-workflow";
import type { DecisionWorkflowDeps } from "../workflows/decision-workflow";

const log = logger.child("advisor");

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BidAdvisorDeps {
  oracle: StrategyOracle | null;
  /** null keeps no history */
  history: HistoryRepository | null;
  /** null skips market intelligence enrichment */
  marketIntelligence: MarketIntelligenceSource | null;
  auditSink?: DecisionAuditSinkPort | null;
  validatorConfig?: ValidatorConfig;
  onStage?: DecisionWorkflowDeps["onStage"];
  now?: () => Date;
}

export interface PerformanceStats {
  totalDecisions: number;
  llmSuccesses: number;
  fallbacks: number;
  safetyBlocks: number;
  systemErrors: number;
  llmSuccessRate: number;
  fallbackRate: number;
  safetyBlockRate: number;
  systemErrorRate: number;
}

export type AuctionResult = "won" | "lost";

export interface BidAdvisor {
  selectStrategy(context: AuctionContext): Promise<FinalDecision>;
  getPerformanceStats(): PerformanceStats;
  resetPerformanceStats(): void;
  /**
   * Store the final result of an auction. auctionId defaults to the thread id, then the domain.
   */
  recordOutcome(
    context: AuctionContext,
    decision: FinalDecision,
    result: AuctionResult,
    finalPrice: number,
    auctionId?: string,
  ): ResultAsync<void, HistoryRepositoryError>;
  /**
   * Store one round of a threaded auction. Without a thread id or history store this is a no-op.
   * roundNumber defaults to the number of stored rounds + 1.
   */
  recordRoundOutcome(
    context: AuctionContext,
    decision: FinalDecision,
    resultRound: string,
    roundNumber?: number,
  ): ResultAsync<void, HistoryRepositoryError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

type Counters = Record<DecisionSource, number>;

const emptyCounters = (): Counters => ({ llm: 0, rules_fallback: 0, safety_block: 0, system_error: 0 });

export function toPerformanceStats(counters: Counters): PerformanceStats {
  const total = counters.llm + counters.rules_fallback + counters.safety_block + counters.system_error;
  const rate = (n: number): number => (total > 0 ? n / total : 0);

  return {
    totalDecisions: total,
    llmSuccesses: counters.llm,
    fallbacks: counters.rules_fallback,
    safetyBlocks: counters.safety_block,
    systemErrors: counters.system_error,
    llmSuccessRate: rate(counters.llm),
    fallbackRate: rate(counters.rules_fallback),
    safetyBlockRate: rate(counters.safety_block),
    systemErrorRate: rate(counters.system_error),
  };
}

/** (value − price) / value for a win, null otherwise */
export function calculateProfitMargin(estimatedValue: number, finalPrice: number, won: boolean): number | null {
  if (!won || estimatedValue <= 0) return null;
  return (estimatedValue - finalPrice) / estimatedValue;
}

// ─────────────────────────────────────────────────────────────────────────────
// Usecase
// ─────────────────────────────────────────────────────────────────────────────

export function createBidAdvisor(deps: BidAdvisorDeps): BidAdvisor {
  const now = deps.now ?? (() => new Date());
  const learning = deps.history ? createHistoricalLearning(deps.history) : null;
  let counters = emptyCounters();

  const loadIntelligence = async (context: AuctionContext): Promise<MarketIntelligence | null> => {
    if (!deps.marketIntelligence) return null;
    return deps.marketIntelligence.load().match(
      tables => enrichContext(tables, context),
      e => {
        log.warn("Market intelligence unavailable", { type: e.type, file: e.file, message: e.message });
        return null;
      },
    );
  };

  const loadHistory = async (context: AuctionContext): Promise<HistoricalContext | null> => {
    if (!learning) return null;
    return learning.getHistoricalContext(context).match(
      h => h,
      e => {
        log.warn("History unavailable", { message: e.message });
        return null;
      },
    );
  };

  return {
    async selectStrategy(context: AuctionContext): Promise<FinalDecision> {
      const [intelligence, history] = await Promise.all([loadIntelligence(context), loadHistory(context)]);

      const result = await executeDecisionWorkflow(
        { oracle: deps.oracle, validatorConfig: deps.validatorConfig, onStage: deps.onStage },
        { context, intelligence, history },
      );
      counters[result.decision.decisionSource] += 1;

      if (deps.auditSink) {
        const written = await deps.auditSink.write({
          decisionId: uuidv4(),
          timestamp: now().toISOString(),
          context,
          decision: result.decision,
          stages: result.stages,
          validation: result.validation,
          oracleFailure: result.oracleFailure,
        });
        if (written.isErr()) {
          log.warn("Failed to write decision audit log", { type: written.error.type, message: written.error.message });
        } else {
          log.debug("Decision audit log written", { path: written.value.path });
        }
      }

      return result.decision;
    },

    getPerformanceStats: () => toPerformanceStats(counters),

    resetPerformanceStats: () => {
      counters = emptyCounters();
    },

    recordOutcome(context, decision, result, finalPrice, auctionId) {
      if (!deps.history) return okAsync(undefined);

      const won = result === "won";
      return deps.history.recordOutcome({
        auctionId: auctionId ?? context.threadId ?? context.domain,
        domain: context.domain,
        platform: context.platform,
        estimatedValue: context.estimatedValue,
        finalPrice,
        valueTier: classifyValueTier(context.estimatedValue),
        strategyUsed: decision.strategy,
        decisionSource: decision.decisionSource,
        confidence: decision.confidence,
        won,
        profitMargin: calculateProfitMargin(context.estimatedValue, finalPrice, won),
        numBidders: context.numBidders,
        hoursRemaining: context.hoursRemaining,
        threadId: context.threadId ?? null,
        rawData: { context, decision },
        ts: now(),
      });
    },

    recordRoundOutcome(context, decision, resultRound, roundNumber) {
      const { history } = deps;
      const { threadId } = context;
      if (!history || !threadId) return okAsync(undefined);

      const nextRound: ResultAsync<number, HistoryRepositoryError> =
        roundNumber !== undefined ? okAsync(roundNumber) : history.getRoundsForThread(threadId).map(r => r.length + 1);

      return nextRound.andThen(n =>
        history.recordRound({
          threadId,
          roundNumber: n,
          domain: context.domain,
          platform: context.platform,
          currentBid: context.currentBid,
          numBidders: context.numBidders,
          hoursRemaining: context.hoursRemaining,
          strategy: decision.strategy,
          recommendedBid: decision.recommendedBidAmount,
          confidence: decision.confidence,
          decisionSource: decision.decisionSource,
          resultRound,
          ts: now(),
        }),
      );
    },
  };
}

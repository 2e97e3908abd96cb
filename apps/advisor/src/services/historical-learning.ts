/**
 * Historical Learning
 *
 * Turns stored outcomes into context for the oracle:
 * - similar auctions (same platform, estimated value ±30%)
 * - win rate / final price ratio / winning strategies among them
 * - per-strategy performance for the platform and value tier
 * - earlier rounds of the same auction thread
 */

import { ResultAsync, okAsync } from "neverthrow";

import { BID_STRATEGIES, classifyValueTier } from "@bid-advisor/core";
import type { AuctionContext } from "@bid-advisor/core";
import type {
  AuctionOutcomeRecord,
  AuctionRoundRecord,
  HistoryRepository,
  HistoryRepositoryError,
  StrategyPerformanceSummary,
} from "@bid-advisor/repositories";

import type { HistoricalContext, HistoricalInsights } from "../types";

export const SIMILAR_VALUE_BAND = 0.3;
export const SIMILAR_AUCTIONS_LIMIT = 10;

export const BASE_SAFE_MAX_RATIO = 0.7;
export const DYNAMIC_THRESHOLD_MIN = 0.55;
export const DYNAMIC_THRESHOLD_MAX = 0.8;

export function calculateInsights(auctions: readonly AuctionOutcomeRecord[]): HistoricalInsights | null {
  if (auctions.length === 0) return null;

  const wins = auctions.filter(a => a.won);
  const ratios = auctions.filter(a => a.finalPrice > 0 && a.estimatedValue > 0).map(a => a.finalPrice / a.estimatedValue);

  const winningStrategies: Record<string, number> = {};
  for (const w of wins) {
    winningStrategies[w.strategyUsed] = (winningStrategies[w.strategyUsed] ?? 0) + 1;
  }

  return {
    totalSimilar: auctions.length,
    winRate: wins.length / auctions.length,
    avgFinalPriceRatio: ratios.length > 0 ? ratios.reduce((s, r) => s + r, 0) / ratios.length : null,
    winningStrategies,
  };
}

/**
 * Adjust the base safe-max ratio from history:
 * cheap markets lower it, hot markets and a poor win record raise it.
 */
export function adjustThreshold(insights: HistoricalInsights | null, base = BASE_SAFE_MAX_RATIO): number {
  let ratio = base;

  if (insights && insights.avgFinalPriceRatio !== null) {
    if (insights.avgFinalPriceRatio < 0.6) ratio -= 0.05;
    else if (insights.avgFinalPriceRatio > 0.75) ratio += 0.03;
  }

  const winRate = insights?.winRate ?? 0.5;
  if (winRate < 0.3) ratio += 0.05;
  else if (winRate > 0.8) ratio -= 0.03;

  return Math.max(DYNAMIC_THRESHOLD_MIN, Math.min(DYNAMIC_THRESHOLD_MAX, ratio));
}

export interface HistoricalLearning {
  getHistoricalContext(context: AuctionContext): ResultAsync<HistoricalContext, HistoryRepositoryError>;
  suggestDynamicThreshold(context: AuctionContext, base?: number): ResultAsync<number, HistoryRepositoryError>;
}

export function createHistoricalLearning(history: HistoryRepository): HistoricalLearning {
  const getHistoricalContext = (context: AuctionContext): ResultAsync<HistoricalContext, HistoryRepositoryError> => {
    const valueTier = classifyValueTier(context.estimatedValue);
    const band = context.estimatedValue * SIMILAR_VALUE_BAND;

    const strategies = BID_STRATEGIES.filter(s => s !== "do_not_bid");
    const performance = ResultAsync.combine(
      strategies.map(s => history.getStrategyPerformance(s, context.platform, valueTier)),
    ).map(rows => rows.filter((r): r is StrategyPerformanceSummary => r !== null));

    const rounds: ResultAsync<AuctionRoundRecord[], HistoryRepositoryError> = context.threadId
      ? history.getRoundsForThread(context.threadId)
      : okAsync([]);

    return ResultAsync.combine([
      history.getSimilarAuctions(
        context.platform,
        context.estimatedValue - band,
        context.estimatedValue + band,
        SIMILAR_AUCTIONS_LIMIT,
      ),
      performance,
      history.getBestStrategyForContext(context.platform, valueTier),
      rounds,
    ]).map(([similarAuctions, strategyPerformance, bestStrategy, previousRounds]) => ({
      valueTier,
      similarAuctions,
      insights: calculateInsights(similarAuctions),
      strategyPerformance,
      bestStrategy,
      previousRounds,
    }));
  };

  return {
    getHistoricalContext,
    suggestDynamicThreshold: (context, base = BASE_SAFE_MAX_RATIO) =>
      getHistoricalContext(context).map(h => adjustThreshold(h.insights, base)),
  };
}

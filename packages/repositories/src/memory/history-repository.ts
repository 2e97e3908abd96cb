/**
 * In-memory History Repository
 *
 * Used when no database is configured, and by tests. Same natural keys and
 * aggregation semantics as the Postgres implementation; performance is
 * computed from the stored outcomes on read.
 */

import { okAsync, type ResultAsync } from "neverthrow";

import {
  DEFAULT_MIN_STRATEGY_SAMPLES,
  DEFAULT_SIMILAR_AUCTIONS_LIMIT,
  type AuctionOutcomeRecord,
  type AuctionRoundRecord,
  type HistoryRepository,
  type HistoryRepositoryError,
  type StrategyPerformanceSummary,
} from "../interfaces/history-repository";
import { outcomeProfit, toPerformanceSummary, type PerformanceTotals } from "../performance";

function totalsOf(outcomes: readonly AuctionOutcomeRecord[]): PerformanceTotals {
  return {
    totalUses: outcomes.length,
    wins: outcomes.filter(o => o.won).length,
    totalProfit: outcomes.reduce((sum, o) => sum + outcomeProfit(o), 0),
  };
}

export function createInMemoryHistoryRepository(): HistoryRepository {
  const outcomes = new Map<string, AuctionOutcomeRecord>();
  const rounds = new Map<string, AuctionRoundRecord>();

  const roundKey = (threadId: string, roundNumber: number) => `${threadId}#${roundNumber}`;

  return {
    recordOutcome(outcome: AuctionOutcomeRecord): ResultAsync<void, HistoryRepositoryError> {
      outcomes.set(outcome.auctionId, { ...outcome });
      return okAsync(undefined);
    },

    recordRound(round: AuctionRoundRecord): ResultAsync<void, HistoryRepositoryError> {
      rounds.set(roundKey(round.threadId, round.roundNumber), { ...round });
      return okAsync(undefined);
    },

    getSimilarAuctions(
      platform: string,
      valueMin: number,
      valueMax: number,
      limit = DEFAULT_SIMILAR_AUCTIONS_LIMIT,
    ): ResultAsync<AuctionOutcomeRecord[], HistoryRepositoryError> {
      const matches = [...outcomes.values()]
        .filter(o => o.platform === platform && o.estimatedValue >= valueMin && o.estimatedValue <= valueMax)
        .sort((a, b) => b.ts.getTime() - a.ts.getTime())
        .slice(0, limit);
      return okAsync(matches);
    },

    getStrategyPerformance(
      strategy: string,
      platform?: string,
      valueTier?: string,
    ): ResultAsync<StrategyPerformanceSummary | null, HistoryRepositoryError> {
      const matches = [...outcomes.values()].filter(
        o =>
          o.strategyUsed === strategy &&
          (platform === undefined || o.platform === platform) &&
          (valueTier === undefined || o.valueTier === valueTier),
      );
      return okAsync(toPerformanceSummary(strategy, platform ?? null, valueTier ?? null, totalsOf(matches)));
    },

    getBestStrategyForContext(
      platform: string,
      valueTier: string,
      minSamples = DEFAULT_MIN_STRATEGY_SAMPLES,
    ): ResultAsync<StrategyPerformanceSummary | null, HistoryRepositoryError> {
      const byStrategy = new Map<string, AuctionOutcomeRecord[]>();
      for (const o of outcomes.values()) {
        if (o.platform !== platform || o.valueTier !== valueTier) continue;
        byStrategy.set(o.strategyUsed, [...(byStrategy.get(o.strategyUsed) ?? []), o]);
      }

      let best: StrategyPerformanceSummary | null = null;
      for (const [strategy, rows] of byStrategy) {
        const summary = toPerformanceSummary(strategy, platform, valueTier, totalsOf(rows));
        if (!summary || summary.totalUses < minSamples) continue;
        if (
          !best ||
          summary.winRate > best.winRate ||
          (summary.winRate === best.winRate && summary.totalUses > best.totalUses)
        ) {
          best = summary;
        }
      }
      return okAsync(best);
    },

    getRoundsForThread(threadId: string): ResultAsync<AuctionRoundRecord[], HistoryRepositoryError> {
      const matches = [...rounds.values()]
        .filter(r => r.threadId === threadId)
        .sort((a, b) => a.roundNumber - b.roundNumber);
      return okAsync(matches);
    },
  };
}

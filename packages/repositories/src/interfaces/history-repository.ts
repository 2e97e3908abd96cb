/**
 * History Repository Interface
 *
 * - Auction outcomes keyed by auction_id (upsert)
 * - Auction rounds keyed by (thread_id, round_number) (upsert)
 * - Strategy performance aggregated per (strategy, platform, value_tier)
 */

import type { ResultAsync } from "neverthrow";

export type HistoryRepositoryError = {
  type: "DB_ERROR";
  message: string;
};

/**
 * One finished auction. Categorical columns are stored as text.
 */
export interface AuctionOutcomeRecord {
  auctionId: string;
  domain: string;
  platform: string;
  estimatedValue: number;
  finalPrice: number;
  valueTier: string;
  strategyUsed: string;
  decisionSource: string;
  confidence: number;
  won: boolean;
  /** (value - finalPrice) / value when won, otherwise null */
  profitMargin: number | null;
  numBidders: number;
  hoursRemaining: number;
  threadId: string | null;
  rawData: unknown;
  ts: Date;
}

export interface AuctionRoundRecord {
  threadId: string;
  roundNumber: number;
  domain: string;
  platform: string;
  currentBid: number;
  numBidders: number;
  hoursRemaining: number;
  strategy: string;
  recommendedBid: number;
  confidence: number;
  decisionSource: string;
  resultRound: string;
  ts: Date;
}

export interface StrategyPerformanceSummary {
  strategy: string;
  /** null when aggregated across platforms */
  platform: string | null;
  /** null when aggregated across value tiers */
  valueTier: string | null;
  totalUses: number;
  wins: number;
  winRate: number;
  totalProfit: number;
  avgProfitPerWin: number;
}

export interface HistoryRepository {
  recordOutcome(outcome: AuctionOutcomeRecord): ResultAsync<void, HistoryRepositoryError>;

  recordRound(round: AuctionRoundRecord): ResultAsync<void, HistoryRepositoryError>;

  /**
   * Most recent outcomes on the platform with estimated value in [valueMin, valueMax]
   */
  getSimilarAuctions(
    platform: string,
    valueMin: number,
    valueMax: number,
    limit?: number,
  ): ResultAsync<AuctionOutcomeRecord[], HistoryRepositoryError>;

  /**
   * Aggregated performance of a strategy, optionally narrowed. null when never used.
   */
  getStrategyPerformance(
    strategy: string,
    platform?: string,
    valueTier?: string,
  ): ResultAsync<StrategyPerformanceSummary | null, HistoryRepositoryError>;

  /**
   * Highest win rate for the bucket among strategies with at least minSamples uses
   */
  getBestStrategyForContext(
    platform: string,
    valueTier: string,
    minSamples?: number,
  ): ResultAsync<StrategyPerformanceSummary | null, HistoryRepositoryError>;

  getRoundsForThread(threadId: string): ResultAsync<AuctionRoundRecord[], HistoryRepositoryError>;
}

export const DEFAULT_SIMILAR_AUCTIONS_LIMIT = 10;
export const DEFAULT_MIN_STRATEGY_SAMPLES = 5;

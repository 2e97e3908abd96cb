/**
 * Advisor Types
 */

import type { ResultAsync } from "neverthrow";

import type { AuctionContext, MarketIntelligence, Ratio, StrategyDecision, ValueTier } from "@bid-advisor/core";
import type { AuctionOutcomeRecord, AuctionRoundRecord, StrategyPerformanceSummary } from "@bid-advisor/repositories";

// ─────────────────────────────────────────────────────────────────────────────
// Historical Context (oracle input)
// ─────────────────────────────────────────────────────────────────────────────

export interface HistoricalInsights {
  totalSimilar: number;
  winRate: Ratio;
  /** Mean of finalPrice / estimatedValue; null when no usable prices */
  avgFinalPriceRatio: Ratio | null;
  /** Win counts by strategy among similar auctions */
  winningStrategies: Record<string, number>;
}

export interface HistoricalContext {
  valueTier: ValueTier;
  similarAuctions: AuctionOutcomeRecord[];
  /** null when there are no similar auctions */
  insights: HistoricalInsights | null;
  strategyPerformance: StrategyPerformanceSummary[];
  bestStrategy: StrategyPerformanceSummary | null;
  /** Earlier rounds of the same auction thread, oldest first */
  previousRounds: AuctionRoundRecord[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Strategy Oracle
// ─────────────────────────────────────────────────────────────────────────────

export interface OracleRequest {
  context: AuctionContext;
  intelligence: MarketIntelligence | null;
  history: HistoricalContext | null;
}

export type StrategyOracleError =
  | { type: "LLM_API_ERROR"; message: string }
  | { type: "INVALID_RESPONSE"; message: string }
  | { type: "TIMEOUT"; message: string };

/**
 * Proposes a strategy for one auction round. Failures are values, never thrown.
 */
export interface StrategyOracle {
  propose(request: OracleRequest): ResultAsync<StrategyDecision, StrategyOracleError>;
}

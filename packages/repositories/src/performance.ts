/**
 * Strategy performance helpers shared by repository implementations
 */

import type { AuctionOutcomeRecord, StrategyPerformanceSummary } from "./interfaces/history-repository";

export interface PerformanceBucket {
  strategy: string;
  platform: string;
  valueTier: string;
}

export interface PerformanceTotals {
  totalUses: number;
  wins: number;
  totalProfit: number;
}

/** Realized profit of one outcome: margin × final price when won */
export function outcomeProfit(outcome: Pick<AuctionOutcomeRecord, "won" | "profitMargin" | "finalPrice">): number {
  return outcome.won && outcome.profitMargin !== null ? outcome.profitMargin * outcome.finalPrice : 0;
}

export function bucketOf(outcome: Pick<AuctionOutcomeRecord, "strategyUsed" | "platform" | "valueTier">): PerformanceBucket {
  return { strategy: outcome.strategyUsed, platform: outcome.platform, valueTier: outcome.valueTier };
}

export function sameBucket(a: PerformanceBucket, b: PerformanceBucket): boolean {
  return a.strategy === b.strategy && a.platform === b.platform && a.valueTier === b.valueTier;
}

export function sumTotals(rows: readonly PerformanceTotals[]): PerformanceTotals {
  return rows.reduce(
    (acc, r) => ({
      totalUses: acc.totalUses + r.totalUses,
      wins: acc.wins + r.wins,
      totalProfit: acc.totalProfit + r.totalProfit,
    }),
    { totalUses: 0, wins: 0, totalProfit: 0 },
  );
}

export function toPerformanceSummary(
  strategy: string,
  platform: string | null,
  valueTier: string | null,
  totals: PerformanceTotals,
): StrategyPerformanceSummary | null {
  if (totals.totalUses === 0) return null;

  return {
    strategy,
    platform,
    valueTier,
    totalUses: totals.totalUses,
    wins: totals.wins,
    winRate: totals.wins / totals.totalUses,
    totalProfit: totals.totalProfit,
    avgProfitPerWin: totals.wins > 0 ? totals.totalProfit / totals.wins : 0,
  };
}

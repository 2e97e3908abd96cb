/**
 * Postgres History Repository
 *
 * - Upsert auction_outcome per auction_id, auction_round per (thread_id, round_number)
 * - Rebuild strategy_performance for every bucket an outcome touches, in the
 *   same transaction, so re-recording never double counts
 */

import { and, between, count, desc, eq, gte, sql } from "drizzle-orm";
import { ResultAsync } from "neverthrow";

import { auctionOutcome, auctionRound, strategyPerformance } from "@bid-advisor/db";
import type { AuctionOutcome, AuctionRound, Db } from "@bid-advisor/db";

import {
  DEFAULT_MIN_STRATEGY_SAMPLES,
  DEFAULT_SIMILAR_AUCTIONS_LIMIT,
  type AuctionOutcomeRecord,
  type AuctionRoundRecord,
  type HistoryRepository,
  type HistoryRepositoryError,
  type StrategyPerformanceSummary,
} from "../interfaces/history-repository";
import { bucketOf, sameBucket, sumTotals, toPerformanceSummary, type PerformanceBucket } from "../performance";

type Tx = Parameters<Parameters<Db["transaction"]>[0]>[0];

const toDbError = (e: unknown): HistoryRepositoryError => ({
  type: "DB_ERROR",
  message: e instanceof Error ? e.message : "Unknown error",
});

function toOutcomeRecord(row: AuctionOutcome): AuctionOutcomeRecord {
  return {
    auctionId: row.auctionId,
    domain: row.domain,
    platform: row.platform,
    estimatedValue: row.estimatedValue,
    finalPrice: row.finalPrice,
    valueTier: row.valueTier,
    strategyUsed: row.strategyUsed,
    decisionSource: row.decisionSource,
    confidence: row.confidence,
    won: row.won,
    profitMargin: row.profitMargin,
    numBidders: row.numBidders,
    hoursRemaining: row.hoursRemaining,
    threadId: row.threadId,
    rawData: row.rawData,
    ts: row.ts,
  };
}

function toRoundRecord(row: AuctionRound): AuctionRoundRecord {
  return {
    threadId: row.threadId,
    roundNumber: row.roundNumber,
    domain: row.domain,
    platform: row.platform,
    currentBid: row.currentBid,
    numBidders: row.numBidders,
    hoursRemaining: row.hoursRemaining,
    strategy: row.strategy,
    recommendedBid: row.recommendedBid,
    confidence: row.confidence,
    decisionSource: row.decisionSource,
    resultRound: row.resultRound,
    ts: row.ts,
  };
}

/**
 * Recompute one strategy_performance row from auction_outcome
 */
async function rebuildBucket(tx: Tx, bucket: PerformanceBucket): Promise<void> {
  const [totals] = await tx
    .select({
      totalUses: count(),
      wins: sql<number>`count(*) filter (where ${auctionOutcome.won})`.mapWith(Number),
      totalProfit:
        sql<number>`coalesce(sum(case when ${auctionOutcome.won} then coalesce(${auctionOutcome.profitMargin}, 0) * ${auctionOutcome.finalPrice} else 0 end), 0)`.mapWith(
          Number,
        ),
    })
    .from(auctionOutcome)
    .where(
      and(
        eq(auctionOutcome.strategyUsed, bucket.strategy),
        eq(auctionOutcome.platform, bucket.platform),
        eq(auctionOutcome.valueTier, bucket.valueTier),
      ),
    );

  const now = new Date();
  const values = {
    totalUses: totals?.totalUses ?? 0,
    wins: totals?.wins ?? 0,
    totalProfit: totals?.totalProfit ?? 0,
    updatedAt: now,
  };

  await tx
    .insert(strategyPerformance)
    .values({ ...bucket, ...values })
    .onConflictDoUpdate({
      target: [strategyPerformance.strategy, strategyPerformance.platform, strategyPerformance.valueTier],
      set: values,
    });
}

/**
 * Create a Postgres history repository
 */
export function createPostgresHistoryRepository(db: Db): HistoryRepository {
  return {
    recordOutcome(outcome: AuctionOutcomeRecord): ResultAsync<void, HistoryRepositoryError> {
      const { auctionId, ...rest } = outcome;

      return ResultAsync.fromPromise(
        db.transaction(async tx => {
          const [previous] = await tx
            .select({
              strategyUsed: auctionOutcome.strategyUsed,
              platform: auctionOutcome.platform,
              valueTier: auctionOutcome.valueTier,
            })
            .from(auctionOutcome)
            .where(eq(auctionOutcome.auctionId, auctionId))
            .limit(1);

          await tx
            .insert(auctionOutcome)
            .values(outcome)
            .onConflictDoUpdate({
              target: auctionOutcome.auctionId,
              set: rest,
            });

          const current = bucketOf(outcome);
          await rebuildBucket(tx, current);

          // The outcome moved to another bucket: the old one shrinks
          if (previous && !sameBucket(bucketOf(previous), current)) {
            await rebuildBucket(tx, bucketOf(previous));
          }
        }),
        toDbError,
      );
    },

    recordRound(round: AuctionRoundRecord): ResultAsync<void, HistoryRepositoryError> {
      const { threadId, roundNumber, ...rest } = round;

      return ResultAsync.fromPromise(
        db
          .insert(auctionRound)
          .values(round)
          .onConflictDoUpdate({
            target: [auctionRound.threadId, auctionRound.roundNumber],
            set: rest,
          }),
        toDbError,
      ).map(() => undefined);
    },

    getSimilarAuctions(
      platform: string,
      valueMin: number,
      valueMax: number,
      limit = DEFAULT_SIMILAR_AUCTIONS_LIMIT,
    ): ResultAsync<AuctionOutcomeRecord[], HistoryRepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(auctionOutcome)
          .where(and(eq(auctionOutcome.platform, platform), between(auctionOutcome.estimatedValue, valueMin, valueMax)))
          .orderBy(desc(auctionOutcome.ts))
          .limit(limit),
        toDbError,
      ).map(rows => rows.map(toOutcomeRecord));
    },

    getStrategyPerformance(
      strategy: string,
      platform?: string,
      valueTier?: string,
    ): ResultAsync<StrategyPerformanceSummary | null, HistoryRepositoryError> {
      const conditions = [eq(strategyPerformance.strategy, strategy)];
      if (platform) conditions.push(eq(strategyPerformance.platform, platform));
      if (valueTier) conditions.push(eq(strategyPerformance.valueTier, valueTier));

      return ResultAsync.fromPromise(
        db
          .select({
            totalUses: strategyPerformance.totalUses,
            wins: strategyPerformance.wins,
            totalProfit: strategyPerformance.totalProfit,
          })
          .from(strategyPerformance)
          .where(and(...conditions)),
        toDbError,
      ).map(rows => toPerformanceSummary(strategy, platform ?? null, valueTier ?? null, sumTotals(rows)));
    },

    getBestStrategyForContext(
      platform: string,
      valueTier: string,
      minSamples = DEFAULT_MIN_STRATEGY_SAMPLES,
    ): ResultAsync<StrategyPerformanceSummary | null, HistoryRepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select()
          .from(strategyPerformance)
          .where(
            and(
              eq(strategyPerformance.platform, platform),
              eq(strategyPerformance.valueTier, valueTier),
              gte(strategyPerformance.totalUses, minSamples),
            ),
          )
          .orderBy(
            desc(sql`${strategyPerformance.wins}::float / nullif(${strategyPerformance.totalUses}, 0)`),
            desc(strategyPerformance.totalUses),
          )
          .limit(1),
        toDbError,
      ).map(rows => {
        const [best] = rows;
        if (!best) return null;
        return toPerformanceSummary(best.strategy, best.platform, best.valueTier, best);
      });
    },

    getRoundsForThread(threadId: string): ResultAsync<AuctionRoundRecord[], HistoryRepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(auctionRound).where(eq(auctionRound.threadId, threadId)).orderBy(auctionRound.roundNumber),
        toDbError,
      ).map(rows => rows.map(toRoundRecord));
    },
  };
}

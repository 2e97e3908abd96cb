import { describe, expect, it } from "vitest";

import { createInMemoryHistoryRepository } from "@bid-advisor/repositories";
import type { AuctionOutcomeRecord } from "@bid-advisor/repositories";

import {
  adjustThreshold,
  calculateInsights,
  createHistoricalLearning,
} from "../src/services/historical-learning";
import { createContext } from "./helpers";

const createOutcome = (overrides: Partial<AuctionOutcomeRecord> = {}): AuctionOutcomeRecord => ({
  auctionId: "auction-1",
  domain: "example.com",
  platform: "namejet",
  estimatedValue: 1000,
  finalPrice: 600,
  valueTier: "high",
  strategyUsed: "proxy_max",
  decisionSource: "llm",
  confidence: 0.75,
  won: true,
  profitMargin: 0.4,
  numBidders: 2,
  hoursRemaining: 1,
  threadId: null,
  rawData: {},
  ts: new Date("2026-03-01T00:00:00.000Z"),
  ...overrides,
});

describe("calculateInsights", () => {
  it("returns null without similar auctions", () => {
    expect(calculateInsights([])).toBeNull();
  });

  it("summarizes win rate, price ratio and winning strategies", () => {
    const insights = calculateInsights([
      createOutcome({ auctionId: "a", finalPrice: 600 }),
      createOutcome({ auctionId: "b", finalPrice: 900, won: false, profitMargin: null }),
      createOutcome({ auctionId: "c", finalPrice: 500, strategyUsed: "last_minute_snipe" }),
    ]);

    expect(insights?.totalSimilar).toBe(3);
    expect(insights?.winRate).toBeCloseTo(2 / 3, 10);
    expect(insights?.avgFinalPriceRatio).toBeCloseTo(2 / 3, 10);
    expect(insights?.winningStrategies).toEqual({ proxy_max: 1, last_minute_snipe: 1 });
  });
});

describe("adjustThreshold", () => {
  it("keeps the base ratio without history", () => {
    expect(adjustThreshold(null)).toBe(0.7);
  });

  it("lowers the ratio in cheap markets", () => {
    const ratio = adjustThreshold({ totalSimilar: 4, winRate: 0.5, avgFinalPriceRatio: 0.5, winningStrategies: {} });
    expect(ratio).toBeCloseTo(0.65, 10);
  });

  it("clamps to the upper bound", () => {
    const ratio = adjustThreshold(
      { totalSimilar: 4, winRate: 0.2, avgFinalPriceRatio: 0.8, winningStrategies: {} },
      0.78,
    );
    expect(ratio).toBe(0.8);
  });

  it("clamps to the lower bound", () => {
    const ratio = adjustThreshold(
      { totalSimilar: 4, winRate: 0.9, avgFinalPriceRatio: 0.5, winningStrategies: {} },
      0.58,
    );
    expect(ratio).toBe(0.55);
  });
});

describe("createHistoricalLearning", () => {
  it("collects similar auctions, performance and earlier rounds", async () => {
    const repo = createInMemoryHistoryRepository();
    await repo.recordOutcome(createOutcome({ auctionId: "near-low", estimatedValue: 800, finalPrice: 480 }));
    await repo.recordOutcome(createOutcome({ auctionId: "near-high", estimatedValue: 1200, finalPrice: 720 }));
    await repo.recordOutcome(createOutcome({ auctionId: "far", estimatedValue: 2000 }));
    await repo.recordOutcome(createOutcome({ auctionId: "other-platform", platform: "godaddy" }));
    await repo.recordRound({
      threadId: "thread-1",
      roundNumber: 1,
      domain: "example.com",
      platform: "namejet",
      currentBid: 200,
      numBidders: 2,
      hoursRemaining: 6,
      strategy: "proxy_max",
      recommendedBid: 800,
      confidence: 0.75,
      decisionSource: "llm",
      resultRound: "outbid",
      ts: new Date("2026-03-01T00:00:00.000Z"),
    });

    const learning = createHistoricalLearning(repo);
    const history = (await learning.getHistoricalContext(createContext({ threadId: "thread-1" })))._unsafeUnwrap();

    expect(history.valueTier).toBe("high");
    expect(history.similarAuctions.map(a => a.auctionId).sort()).toEqual(["near-high", "near-low"]);
    expect(history.insights?.avgFinalPriceRatio).toBeCloseTo(0.6, 10);
    expect(history.strategyPerformance.map(p => [p.strategy, p.totalUses])).toEqual([["proxy_max", 3]]);
    expect(history.bestStrategy).toBeNull();
    expect(history.previousRounds.map(r => r.roundNumber)).toEqual([1]);
  });

  it("suggests a threshold from the similar auctions", async () => {
    const repo = createInMemoryHistoryRepository();
    for (let i = 0; i < 3; i++) {
      await repo.recordOutcome(createOutcome({ auctionId: `cheap-${i}`, finalPrice: 500 }));
    }

    const learning = createHistoricalLearning(repo);
    const ratio = (await learning.suggestDynamicThreshold(createContext()))._unsafeUnwrap();

    // price ratio 0.5 → −0.05; win rate 1.0 → −0.03
    expect(ratio).toBeCloseTo(0.62, 10);
  });
});

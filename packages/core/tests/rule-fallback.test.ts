/**
 * Rule Fallback Unit Tests
 */

import { describe, expect, test } from "vitest";

import { enrichContext } from "../src/market-intelligence";
import { calculateFallbackSafeMax, selectFallbackStrategy } from "../src/rule-fallback";
import type { AuctionContext, MarketIntelligenceTables } from "../src/types";

const createContext = (overrides: Partial<AuctionContext> = {}): AuctionContext => ({
  domain: "example.com",
  platform: "godaddy",
  estimatedValue: 1000,
  currentBid: 300,
  numBidders: 4,
  hoursRemaining: 0.5,
  yourCurrentProxy: 0,
  budgetAvailable: 5000,
  bidderAnalysis: { botDetected: false, corporateBuyer: false, aggressionScore: 5, reactionTimeAvgSeconds: 30 },
  ...overrides,
});

const sharkTables: MarketIntelligenceTables = {
  bidderProfiles: [
    {
      bidderId: "bidder-shark",
      totalAuctions: 40,
      totalBids: 200,
      avgBidIncrease: 80,
      maxBid: 5000,
      winRate: 0.7,
      lateBidRatio: 0.2,
      avgReactionTime: 20,
      proxyUsage: 0.9,
    },
  ],
  domainStats: [],
  auctionArchetypes: [],
};

describe("selectFallbackStrategy", () => {
  describe("high-value tier", () => {
    test("snipes late against heavy competition", () => {
      const decision = selectFallbackStrategy(createContext());

      expect(decision).toMatchObject({
        strategy: "last_minute_snipe",
        recommendedBidAmount: 1000,
        confidence: 0.7,
        riskLevel: "high",
        shouldIncreaseProxy: null,
        nextBidAmount: null,
        maxBudgetForDomain: 1000,
      });
      expect(decision.reasoning.startsWith("HIGH-VALUE COMPETITION:")).toBe(true);
    });

    test("waits for closeout when uncontested near the end", () => {
      const decision = selectFallbackStrategy(createContext({ numBidders: 0 }));

      expect(decision.strategy).toBe("wait_for_closeout");
      expect(decision.confidence).toBe(0.85);
      expect(decision.riskLevel).toBe("low");
    });

    test("counters a bot with a snipe", () => {
      const decision = selectFallbackStrategy(
        createContext({
          numBidders: 1,
          bidderAnalysis: { botDetected: true, corporateBuyer: false, aggressionScore: 7, reactionTimeAvgSeconds: 2 },
        }),
      );

      expect(decision.strategy).toBe("last_minute_snipe");
      expect(decision.confidence).toBe(0.8);
      expect(decision.riskLevel).toBe("medium");
    });

    test("proxies against light competition", () => {
      const decision = selectFallbackStrategy(createContext({ numBidders: 2 }));

      expect(decision.strategy).toBe("proxy_max");
      expect(decision.confidence).toBe(0.75);
    });

    test("discounts the safe max against a known aggressive bidder", () => {
      const context = createContext({ lastBidderId: "bidder-shark" });
      const decision = selectFallbackStrategy(context, enrichContext(sharkTables, context));

      expect(decision.recommendedBidAmount).toBe(950);
      expect(decision.maxBudgetForDomain).toBe(950);
    });
  });

  describe("medium-value tier", () => {
    test("snipes near the end on a platform with late extensions", () => {
      const decision = selectFallbackStrategy(createContext({ estimatedValue: 500 }));

      expect(decision.strategy).toBe("last_minute_snipe");
      expect(decision.recommendedBidAmount).toBe(500);
      expect(decision.reasoning.startsWith("MEDIUM-VALUE GODADDY TIMING:")).toBe(true);
    });

    test("proxies on namejet near the end with moderate competition", () => {
      const decision = selectFallbackStrategy(createContext({ estimatedValue: 500, platform: "namejet", numBidders: 3 }));

      expect(decision.strategy).toBe("proxy_max");
      expect(decision.recommendedBidAmount).toBe(500);
    });

    test("probes a crowded auction at half the safe max", () => {
      const decision = selectFallbackStrategy(
        createContext({ estimatedValue: 500, platform: "dynadot", numBidders: 6, hoursRemaining: 10 }),
      );

      expect(decision.strategy).toBe("incremental_test");
      expect(decision.recommendedBidAmount).toBe(250);
      expect(decision.confidence).toBe(0.65);
      expect(decision.maxBudgetForDomain).toBe(500);
    });
  });

  describe("low-value tier", () => {
    test("waits for closeout with no bidders", () => {
      const decision = selectFallbackStrategy(createContext({ estimatedValue: 80, numBidders: 0 }));

      expect(decision.strategy).toBe("wait_for_closeout");
      expect(decision.recommendedBidAmount).toBe(80);
      expect(decision.confidence).toBe(0.9);
    });

    test("caps test bids at $50", () => {
      expect(selectFallbackStrategy(createContext({ estimatedValue: 80 })).recommendedBidAmount).toBe(50);
      expect(selectFallbackStrategy(createContext({ estimatedValue: 30 })).recommendedBidAmount).toBe(30);
    });
  });

  test("is deterministic for identical inputs", () => {
    const context = createContext();

    expect(selectFallbackStrategy(context)).toEqual(selectFallbackStrategy(context));
  });
});

describe("calculateFallbackSafeMax", () => {
  test("applies the aggressive-bidder discount in every tier", () => {
    const context = createContext({ estimatedValue: 80, lastBidderId: "bidder-shark" });

    expect(calculateFallbackSafeMax(context, enrichContext(sharkTables, context))).toBeCloseTo(76);
  });

  test("ignores an aggressive behavioral cluster without an exact bidder match", () => {
    const context = createContext({
      bidderAnalysis: { botDetected: false, corporateBuyer: false, aggressionScore: 8, reactionTimeAvgSeconds: 20 },
    });
    const intelligence = enrichContext(sharkTables, context);

    expect(intelligence.behavioralPattern).toMatchObject({ found: true, isAggressiveCluster: true });
    expect(calculateFallbackSafeMax(context, intelligence)).toBe(1000);
  });
});

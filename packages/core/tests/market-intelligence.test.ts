/**
 * Market Intelligence Resolver Unit Tests
 */

import { describe, expect, test } from "vitest";

import {
  calculateExpectedValue,
  calculateResourceScore,
  enrichContext,
  estimateWinProbability,
  extractTld,
  resolveAuctionArchetype,
  resolveBehavioralPattern,
  resolveBidderIntelligence,
  resolveDomainIntelligence,
} from "../src/market-intelligence";
import type { AuctionContext, BidderProfileRow, MarketIntelligenceTables } from "../src/types";

const tables: MarketIntelligenceTables = {
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
    {
      bidderId: "bidder-casual",
      totalAuctions: 10,
      totalBids: 15,
      avgBidIncrease: 20,
      maxBid: 300,
      winRate: 0.1,
      lateBidRatio: 0.1,
      avgReactionTime: 300,
      proxyUsage: 0.2,
    },
    {
      bidderId: "bidder-sniper",
      totalAuctions: 25,
      totalBids: 50,
      avgBidIncrease: 40,
      maxBid: 900,
      winRate: 0.4,
      lateBidRatio: 0.9,
      avgReactionTime: 15,
      proxyUsage: 0.1,
    },
  ],
  domainStats: [
    { domain: "alpha.com", avgFinalPrice: 1200, volatility: 0.2, auctionCount: 4 },
    { domain: "beta.com", avgFinalPrice: 800, volatility: 0.4, auctionCount: 3 },
    { domain: "gamma.com", avgFinalPrice: 400, volatility: 0.1, auctionCount: 2 },
    { domain: "delta.io", avgFinalPrice: 950, volatility: 0.5, auctionCount: 5 },
  ],
  auctionArchetypes: [
    { auctionId: "auction-1", lateBidRatio: 0.9, avgBidJump: 60, durationSec: 3600 },
    { auctionId: "auction-2", lateBidRatio: 0.7, avgBidJump: 30, durationSec: 7200 },
  ],
};

const createContext = (overrides: Partial<AuctionContext> = {}): AuctionContext => ({
  domain: "example.com",
  platform: "godaddy",
  estimatedValue: 1000,
  currentBid: 300,
  numBidders: 2,
  hoursRemaining: 5,
  yourCurrentProxy: 0,
  budgetAvailable: 5000,
  bidderAnalysis: { botDetected: false, corporateBuyer: false, aggressionScore: 5, reactionTimeAvgSeconds: 30 },
  ...overrides,
});

describe("resolveBidderIntelligence", () => {
  test("returns profile and derived flags for a known bidder", () => {
    const result = resolveBidderIntelligence(tables.bidderProfiles, "bidder-shark");

    expect(result).toMatchObject({
      found: true,
      bidderId: "bidder-shark",
      bidsPerAuction: 5,
      winRate: 0.7,
      isAggressive: true,
      isSniper: false,
      isProxyHeavy: true,
    });
  });

  test("reports unknown and missing identifiers as not found", () => {
    expect(resolveBidderIntelligence(tables.bidderProfiles, "bidder-unknown")).toEqual({
      found: false,
      bidderId: "bidder-unknown",
    });
    expect(resolveBidderIntelligence(tables.bidderProfiles, undefined)).toEqual({ found: false, bidderId: null });
  });
});

describe("resolveBehavioralPattern", () => {
  test("matches on aggression and reaction time", () => {
    const result = resolveBehavioralPattern(tables.bidderProfiles, 2, 290);

    expect(result).toMatchObject({
      found: true,
      clusterType: "casual",
      clusterSize: 1,
      clusterWinRate: 0.1,
      foldProbability: 0.9,
      isPassiveCluster: true,
      isAggressiveCluster: false,
      aggressionOnly: false,
    });
    if (result.found) {
      expect(result.counterStrategy.startsWith("OPPONENT LIKELY TO FOLD")).toBe(true);
    }
  });

  test("falls back to aggression-only matching", () => {
    const result = resolveBehavioralPattern(tables.bidderProfiles, 4, 1000);

    expect(result.found).toBe(true);
    if (result.found) {
      expect(result.aggressionOnly).toBe(true);
      expect(result.clusterSize).toBe(2);
      expect(result.clusterType).toBe("regular");
      expect(result.clusterWinRate).toBeCloseTo(0.25);
      expect(result.foldProbability).toBeCloseTo(0.75);
      expect(result.counterStrategy.startsWith("STANDARD")).toBe(true);
    }
  });

  const singleProfile = (winRate: number, lateBidRatio: number): BidderProfileRow[] => [
    {
      bidderId: "bidder-solo",
      totalAuctions: 20,
      totalBids: 60,
      avgBidIncrease: 50,
      maxBid: 1500,
      winRate,
      lateBidRatio,
      avgReactionTime: 30,
      proxyUsage: 0.5,
    },
  ];

  test("classifies frequent winners as professional", () => {
    const result = resolveBehavioralPattern(singleProfile(0.7, 0.2), 5, 30);

    expect(result).toMatchObject({ found: true, clusterType: "professional", aggressionOnly: false });
    if (result.found) {
      expect(result.foldProbability).toBeCloseTo(0.3);
      expect(result.counterStrategy.startsWith("AVOID ESCALATION")).toBe(true);
    }
  });

  test("classifies late bidders as snipers", () => {
    const result = resolveBehavioralPattern(singleProfile(0.4, 0.9), 5, 30);

    expect(result).toMatchObject({ found: true, clusterType: "sniper" });
    if (result.found) {
      expect(result.counterStrategy.startsWith("COUNTER-SNIPE")).toBe(true);
    }
  });

  test("casual outranks sniper when both apply", () => {
    const result = resolveBehavioralPattern(singleProfile(0.1, 0.9), 5, 30);

    expect(result).toMatchObject({ found: true, clusterType: "casual" });
    if (result.found) {
      expect(result.counterStrategy.startsWith("OPPONENT LIKELY TO FOLD")).toBe(true);
    }
  });

  test("finds nothing in an empty table", () => {
    expect(resolveBehavioralPattern([], 5, 30)).toEqual({ found: false });
  });
});

describe("resolveDomainIntelligence", () => {
  test("prefers an exact domain match", () => {
    const result = resolveDomainIntelligence(tables.domainStats, "Alpha.com", 1000);

    expect(result).toMatchObject({
      found: true,
      matchType: "exact",
      confidence: 0.95,
      avgFinalPrice: 1200,
      isVolatile: false,
      sampleSize: 4,
    });
  });

  test("falls through to the TLD pattern", () => {
    const result = resolveDomainIntelligence(tables.domainStats, "newname.com", 5000);

    expect(result.matchType).toBe("tld_pattern");
    expect(result.tld).toBe(".com");
    expect(result.sampleSize).toBe(3);
    expect(result.confidence).toBeCloseTo(0.06);
    expect(result.avgFinalPrice).toBeCloseTo(800);
    expect(result.medianFinalPrice).toBe(800);
    expect(result.priceStd).toBeCloseTo(400);
    expect(result.percentiles?.p25).toBeCloseTo(600);
    expect(result.percentiles?.p75).toBeCloseTo(1000);
    expect(result.percentiles?.p90).toBeCloseTo(1120);
    expect(result.isPremiumTld).toBe(true);
    expect(result.isBudgetTld).toBe(false);
  });

  test("falls through to the value tier", () => {
    const result = resolveDomainIntelligence(tables.domainStats, "unknown.net", 1000);

    expect(result.matchType).toBe("value_tier_pattern");
    expect(result.sampleSize).toBe(3);
    expect(result.medianFinalPrice).toBe(950);
    expect(result.recommendedMaxBid).toBeCloseTo(807.5);
    expect(result.confidence).toBeCloseTo(0.03);
    expect(result.valueRange?.min).toBeCloseTo(700);
    expect(result.valueRange?.max).toBeCloseTo(1300);
  });

  test("falls through to the platform average with a warning", () => {
    const result = resolveDomainIntelligence(tables.domainStats, "nohit.net", 100_000);

    expect(result.matchType).toBe("platform_average");
    expect(result.confidence).toBe(0.3);
    expect(result.avgFinalPrice).toBeCloseTo(837.5);
    expect(result.warning).not.toBeNull();
  });

  test("reports none without data", () => {
    const result = resolveDomainIntelligence([], "example.com", 1000);

    expect(result.found).toBe(false);
    expect(result.matchType).toBe("none");
  });
});

describe("extractTld", () => {
  test("takes the last label", () => {
    expect(extractTld("shop.example.co")).toBe(".co");
    expect(extractTld("localhost")).toBeNull();
  });
});

describe("resolveAuctionArchetype", () => {
  test("aggregates archetype rows", () => {
    const result = resolveAuctionArchetype(tables);

    expect(result).toMatchObject({
      found: true,
      escalationSpeed: "slow",
      sniperDominated: true,
      proxyDriven: false,
      botRatio: 0,
    });
    if (result.found) {
      expect(result.avgBidJump).toBe(45);
      expect(result.durationSec).toBe(5400);
    }
  });

  test("reports not found without rows", () => {
    expect(resolveAuctionArchetype({ ...tables, auctionArchetypes: [] })).toEqual({ found: false });
  });
});

describe("estimateWinProbability", () => {
  const none = resolveDomainIntelligence([], "example.com", 1000);

  test("uses the bidder-count prior", () => {
    const result = estimateWinProbability(createContext(), { found: false, bidderId: null }, { found: false }, none);

    expect(result.probability).toBe(0.5);
    expect(result.confidenceLevel).toBe("medium");
  });

  test("discounts by a known opponent's win rate", () => {
    const bidder = resolveBidderIntelligence(tables.bidderProfiles, "bidder-shark");
    const result = estimateWinProbability(createContext(), bidder, { found: false }, none);

    expect(result.probability).toBeCloseTo(0.325);
    expect(result.confidenceLevel).toBe("low");
    expect(result.factors.opponentWinRate).toBe(0.7);
  });

  test("scales down when the budget is below the safe max", () => {
    const result = estimateWinProbability(
      createContext({ numBidders: 0, budgetAvailable: 500 }),
      { found: false, bidderId: null },
      { found: false },
      none,
    );

    expect(result.probability).toBeCloseTo(0.7125);
    expect(result.confidenceLevel).toBe("high");
    expect(result.factors.budgetRatio).toBe(0.5);
  });

  test("clamps at the upper bound", () => {
    const pattern = resolveBehavioralPattern(tables.bidderProfiles, 2, 290);
    const result = estimateWinProbability(createContext({ numBidders: 0 }), { found: false, bidderId: null }, pattern, none);

    expect(result.probability).toBe(0.95);
  });

  test("penalizes volatile domains", () => {
    const domain = resolveDomainIntelligence(tables.domainStats, "beta.com", 1000);
    const result = estimateWinProbability(createContext(), { found: false, bidderId: null }, { found: false }, domain);

    expect(result.probability).toBeCloseTo(0.45);
    expect(result.factors.volatilityPenalty).toBe(true);
  });
});

describe("calculateExpectedValue / calculateResourceScore", () => {
  test("uses 65% of value without domain history", () => {
    const none = resolveDomainIntelligence([], "example.com", 1000);
    const ev = calculateExpectedValue(createContext(), 0.5, none);

    expect(ev.expectedFinalPrice).toBe(650);
    expect(ev.profitIfWin).toBe(350);
    expect(ev.profitMargin).toBeCloseTo(0.35);
    expect(ev.expectedValue).toBe(175);
    expect(ev.riskAdjustedEv).toBeCloseTo(148.75);
    expect(ev.roi).toBeCloseTo(0.22885, 4);
    expect(ev.recommendation).toBe("WEAK_BID");
    expect(calculateResourceScore(ev).priority).toBe("LOW");
  });

  test("uses the domain average when known", () => {
    const domain = resolveDomainIntelligence(tables.domainStats, "alpha.com", 5000);
    const ev = calculateExpectedValue(createContext({ estimatedValue: 5000 }), 0.9, domain);

    expect(ev.expectedFinalPrice).toBe(1200);
    expect(ev.profitMargin).toBeCloseTo(0.76);
    expect(ev.riskAdjustedEv).toBeCloseTo(3078);
    expect(ev.recommendation).toBe("STRONG_BID");

    const score = calculateResourceScore(ev);
    expect(score.score).toBeCloseTo(2.4384, 3);
    expect(score.priority).toBe("HIGH");
  });
});

describe("enrichContext", () => {
  test("skips behavioral matching when the bidder is known", () => {
    const result = enrichContext(tables, createContext({ lastBidderId: "bidder-shark", domain: "alpha.com" }));

    expect(result.bidder.found).toBe(true);
    expect(result.behavioralPattern).toEqual({ found: false });
    expect(result.domain.matchType).toBe("exact");
    expect(result.archetype.found).toBe(true);
    expect(result.expectedValue.winProbability).toBe(result.winProbability.probability);
  });

  test("matches a behavioral cluster for an unknown bidder", () => {
    const result = enrichContext(
      tables,
      createContext({
        bidderAnalysis: { botDetected: false, corporateBuyer: false, aggressionScore: 2, reactionTimeAvgSeconds: 290 },
      }),
    );

    expect(result.bidder.found).toBe(false);
    expect(result.behavioralPattern.found).toBe(true);
  });
});

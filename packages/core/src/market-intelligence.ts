/**
 * Market Intelligence Resolver
 *
 * Enriches an auction context from historical tables:
 * - Bidder intelligence: exact bidder lookup, else behavioral cluster match
 * - Domain intelligence: exact → TLD pattern → value tier → platform average
 * - Auction archetype: aggregate bidding dynamics
 * - Win probability, expected value and resource score
 *
 * Every tier reports a confidence score so downstream consumers can weigh it.
 *
 * This module is pure (no I/O, no throw).
 */

import { calculateSafeMax } from "./value-tier";
import type {
  AuctionArchetype,
  AuctionContext,
  BehavioralPattern,
  BidderCluster,
  BidderIntelligence,
  BidderProfileRow,
  BidRecommendation,
  ConfidenceLevel,
  DomainIntelligence,
  DomainStatRow,
  ExpectedValue,
  MarketIntelligence,
  MarketIntelligenceTables,
  ResourcePriority,
  ResourceScore,
  Usd,
  WinProbability,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Thresholds
// ─────────────────────────────────────────────────────────────────────────────

const AGGRESSIVE_BID_INCREASE = 50;
const SNIPER_LATE_RATIO = 0.7;
const PROXY_HEAVY_USAGE = 0.8;

const AGGRESSION_TOLERANCE = 2.0;
const REACTION_TOLERANCE_SEC = 60;
/** Reaction time assumed for bidders never measured */
const UNKNOWN_REACTION_SEC = 999;

const VOLATILE_THRESHOLD = 0.3;
const DEFAULT_VOLATILITY = 0.3;

const PREMIUM_TLDS = [".com", ".net", ".org"];
const BUDGET_TLDS = [".xyz", ".online", ".site", ".club"];

const VALUE_TIER_BAND = 0.3;
const VALUE_TIER_MAX_BID_RATIO = 0.85;
/** Fallback final-price estimate when no domain history exists */
const DEFAULT_FINAL_PRICE_RATIO = 0.65;

const MIN_WIN_PROBABILITY = 0.05;
const MAX_WIN_PROBABILITY = 0.95;

// ─────────────────────────────────────────────────────────────────────────────
// Statistics helpers
// ─────────────────────────────────────────────────────────────────────────────

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Quantile with linear interpolation between closest ranks
 */
export function quantile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = (sorted.length - 1) * q;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (pos - lower);
}

function median(values: readonly number[]): number {
  return quantile(values, 0.5);
}

/** Sample standard deviation; 0 for fewer than two values */
function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ─────────────────────────────────────────────────────────────────────────────
// Bidder Intelligence
// ─────────────────────────────────────────────────────────────────────────────

export function resolveBidderIntelligence(
  profiles: readonly BidderProfileRow[],
  bidderId: string | undefined,
): BidderIntelligence {
  if (!bidderId) return { found: false, bidderId: null };

  const row = profiles.find(p => p.bidderId === bidderId);
  if (!row) return { found: false, bidderId };

  return {
    found: true,
    bidderId,
    totalAuctions: row.totalAuctions,
    bidsPerAuction: row.totalAuctions > 0 ? row.totalBids / row.totalAuctions : 0,
    avgBidIncrease: row.avgBidIncrease,
    maxBid: row.maxBid,
    winRate: row.winRate,
    lateBidRatio: row.lateBidRatio,
    avgReactionTime: row.avgReactionTime,
    proxyUsage: row.proxyUsage,
    isAggressive: row.avgBidIncrease > AGGRESSIVE_BID_INCREASE,
    isSniper: row.lateBidRatio > SNIPER_LATE_RATIO,
    isProxyHeavy: row.proxyUsage > PROXY_HEAVY_USAGE,
  };
}

/**
 * Match live behavior against bidders with similar historical behavior.
 *
 * Aggression is normalized from average bid increase onto the 0-10 scale
 * of the live score. Reaction-time tolerance is dropped if nothing matches.
 */
export function resolveBehavioralPattern(
  profiles: readonly BidderProfileRow[],
  aggressionScore: number,
  reactionTimeAvgSeconds: number,
): BehavioralPattern {
  const withinAggression = profiles.filter(
    p => Math.abs(clamp(p.avgBidIncrease / 10, 0, 10) - aggressionScore) <= AGGRESSION_TOLERANCE,
  );
  const withinBoth = withinAggression.filter(
    p => Math.abs((p.avgReactionTime ?? UNKNOWN_REACTION_SEC) - reactionTimeAvgSeconds) <= REACTION_TOLERANCE_SEC,
  );

  const aggressionOnly = withinBoth.length === 0;
  const cluster = aggressionOnly ? withinAggression : withinBoth;
  if (cluster.length === 0) return { found: false };

  const clusterWinRate = mean(cluster.map(p => p.winRate));
  const clusterLateBidRatio = mean(cluster.map(p => p.lateBidRatio));
  const clusterType = classifyCluster(clusterWinRate, clusterLateBidRatio);
  const foldProbability = 1 - clusterWinRate;

  return {
    found: true,
    clusterType,
    clusterSize: cluster.length,
    clusterWinRate,
    clusterLateBidRatio,
    foldProbability,
    counterStrategy: counterStrategyFor(clusterType, foldProbability),
    isAggressiveCluster: aggressionScore > 6,
    isPassiveCluster: aggressionScore < 3,
    aggressionOnly,
  };
}

function classifyCluster(winRate: number, lateBidRatio: number): BidderCluster {
  if (winRate > 0.6) return "professional";
  if (winRate < 0.15) return "casual";
  if (lateBidRatio > SNIPER_LATE_RATIO) return "sniper";
  return "regular";
}

function counterStrategyFor(cluster: BidderCluster, foldProbability: number): string {
  if (cluster === "professional") {
    return "AVOID ESCALATION: similar bidders usually win; hold at the safe maximum and do not chase";
  }
  if (cluster === "casual" || foldProbability > 0.85) {
    return "OPPONENT LIKELY TO FOLD: a firm bid should clear the field";
  }
  if (cluster === "sniper") {
    return "COUNTER-SNIPE: expect late bids; have the proxy in place before the closing window";
  }
  return "STANDARD: bid incrementally and reassess each round";
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Intelligence (tiered lookup)
// ─────────────────────────────────────────────────────────────────────────────

type DomainTier = (rows: readonly DomainStatRow[], domain: string, estimatedValue: Usd) => DomainIntelligence | null;

function emptyDomainIntelligence(): DomainIntelligence {
  return {
    found: false,
    matchType: "none",
    confidence: 0,
    avgFinalPrice: null,
    medianFinalPrice: null,
    volatility: null,
    isVolatile: false,
    sampleSize: 0,
    tld: null,
    priceStd: null,
    percentiles: null,
    isPremiumTld: false,
    isBudgetTld: false,
    valueRange: null,
    recommendedMaxBid: null,
    warning: null,
  };
}

export function extractTld(domain: string): string | null {
  const idx = domain.lastIndexOf(".");
  if (idx <= 0 || idx === domain.length - 1) return null;
  return domain.slice(idx).toLowerCase();
}

const exactDomainTier: DomainTier = (rows, domain) => {
  const needle = domain.toLowerCase();
  const row = rows.find(r => r.domain.toLowerCase() === needle);
  if (!row) return null;

  return {
    ...emptyDomainIntelligence(),
    found: true,
    matchType: "exact",
    confidence: 0.95,
    avgFinalPrice: row.avgFinalPrice,
    medianFinalPrice: row.avgFinalPrice,
    volatility: row.volatility,
    isVolatile: row.volatility > VOLATILE_THRESHOLD,
    sampleSize: row.auctionCount,
  };
};

const tldPatternTier: DomainTier = (rows, domain) => {
  const tld = extractTld(domain);
  if (!tld) return null;

  const matches = rows.filter(r => r.domain.toLowerCase().endsWith(tld));
  if (matches.length === 0) return null;

  const prices = matches.map(r => r.avgFinalPrice);
  const volatility = mean(matches.map(r => r.volatility));

  return {
    ...emptyDomainIntelligence(),
    found: true,
    matchType: "tld_pattern",
    confidence: Math.min(0.75, matches.length / 50),
    avgFinalPrice: mean(prices),
    medianFinalPrice: median(prices),
    volatility,
    isVolatile: volatility > VOLATILE_THRESHOLD,
    sampleSize: matches.length,
    tld,
    priceStd: sampleStd(prices),
    percentiles: {
      p25: quantile(prices, 0.25),
      p50: quantile(prices, 0.5),
      p75: quantile(prices, 0.75),
      p90: quantile(prices, 0.9),
    },
    isPremiumTld: PREMIUM_TLDS.includes(tld),
    isBudgetTld: BUDGET_TLDS.includes(tld),
  };
};

const valueTierPatternTier: DomainTier = (rows, _domain, estimatedValue) => {
  const min = estimatedValue * (1 - VALUE_TIER_BAND);
  const max = estimatedValue * (1 + VALUE_TIER_BAND);
  const matches = rows.filter(r => r.avgFinalPrice >= min && r.avgFinalPrice <= max);
  if (matches.length === 0) return null;

  const prices = matches.map(r => r.avgFinalPrice);
  const medianPrice = median(prices);
  const volatility = mean(matches.map(r => r.volatility));

  return {
    ...emptyDomainIntelligence(),
    found: true,
    matchType: "value_tier_pattern",
    confidence: Math.min(0.9, matches.length / 100),
    avgFinalPrice: mean(prices),
    medianFinalPrice: medianPrice,
    volatility,
    isVolatile: volatility > VOLATILE_THRESHOLD,
    sampleSize: matches.length,
    valueRange: { min, max },
    recommendedMaxBid: medianPrice * VALUE_TIER_MAX_BID_RATIO,
  };
};

const platformAverageTier: DomainTier = rows => {
  if (rows.length === 0) return null;

  const prices = rows.map(r => r.avgFinalPrice);
  const volatility = mean(rows.map(r => r.volatility));

  return {
    ...emptyDomainIntelligence(),
    found: true,
    matchType: "platform_average",
    confidence: 0.3,
    avgFinalPrice: mean(prices),
    medianFinalPrice: median(prices),
    volatility,
    isVolatile: volatility > VOLATILE_THRESHOLD,
    sampleSize: rows.length,
    warning: "Low confidence: no domain-specific, TLD or value-tier history; using platform-wide average",
  };
};

/** Tried in order; the first tier that produces a result wins */
const DOMAIN_TIERS: readonly DomainTier[] = [exactDomainTier, tldPatternTier, valueTierPatternTier, platformAverageTier];

export function resolveDomainIntelligence(
  rows: readonly DomainStatRow[],
  domain: string,
  estimatedValue: Usd,
): DomainIntelligence {
  for (const tier of DOMAIN_TIERS) {
    const result = tier(rows, domain, estimatedValue);
    if (result) return result;
  }
  return emptyDomainIntelligence();
}

// ─────────────────────────────────────────────────────────────────────────────
// Auction Archetype
// ─────────────────────────────────────────────────────────────────────────────

export function resolveAuctionArchetype(tables: MarketIntelligenceTables): AuctionArchetype {
  const rows = tables.auctionArchetypes;
  if (rows.length === 0) return { found: false };

  const lateBidRatio = mean(rows.map(r => r.lateBidRatio));
  const avgBidJump = mean(rows.map(r => r.avgBidJump));

  return {
    found: true,
    lateBidRatio,
    avgBidJump,
    durationSec: mean(rows.map(r => r.durationSec)),
    escalationSpeed: avgBidJump > 50 ? "fast" : "slow",
    sniperDominated: lateBidRatio > SNIPER_LATE_RATIO,
    proxyDriven: lateBidRatio < 0.3,
    // Bot activity is not recorded in the archetype table
    botRatio: 0,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Win Probability / Expected Value / Resource Score
// ─────────────────────────────────────────────────────────────────────────────

function baseProbabilityByBidders(numBidders: number): number {
  if (numBidders <= 0) return 0.95;
  if (numBidders === 1) return 0.7;
  if (numBidders === 2) return 0.5;
  return 0.3;
}

function toConfidenceLevel(probability: number): ConfidenceLevel {
  if (probability > 0.7) return "high";
  if (probability > 0.4) return "medium";
  return "low";
}

export function estimateWinProbability(
  context: AuctionContext,
  bidder: BidderIntelligence,
  pattern: BehavioralPattern,
  domain: DomainIntelligence,
): WinProbability {
  const baseByBidders = baseProbabilityByBidders(context.numBidders);
  let probability = baseByBidders;

  if (bidder.found) {
    probability *= 1 - bidder.winRate * 0.5;
  }

  if (pattern.found) {
    probability += (pattern.foldProbability - 0.5) * 0.2;
  }

  const safeMax = calculateSafeMax(context.estimatedValue);
  const budgetRatio = safeMax > 0 ? Math.min(1, context.budgetAvailable / safeMax) : 1;
  if (budgetRatio < 1) {
    probability *= 0.5 + 0.5 * budgetRatio;
  }

  const volatilityPenalty = domain.found && (domain.volatility ?? 0) > VOLATILE_THRESHOLD;
  if (volatilityPenalty) {
    probability *= 0.9;
  }

  probability = clamp(probability, MIN_WIN_PROBABILITY, MAX_WIN_PROBABILITY);

  return {
    probability,
    confidenceLevel: toConfidenceLevel(probability),
    factors: {
      baseByBidders,
      opponentWinRate: bidder.found ? bidder.winRate : null,
      foldProbability: pattern.found ? pattern.foldProbability : null,
      budgetRatio,
      volatilityPenalty,
    },
  };
}

function toRecommendation(roi: number): BidRecommendation {
  if (roi > 1.5) return "STRONG_BID";
  if (roi > 0.8) return "MODERATE_BID";
  return "WEAK_BID";
}

export function calculateExpectedValue(
  context: AuctionContext,
  winProbability: number,
  domain: DomainIntelligence,
): ExpectedValue {
  const value = context.estimatedValue;
  const expectedFinalPrice =
    domain.found && domain.avgFinalPrice !== null && domain.avgFinalPrice > 0 ?
      domain.avgFinalPrice
    : value * DEFAULT_FINAL_PRICE_RATIO;

  const profitIfWin = value - expectedFinalPrice;
  const profitMargin = value > 0 ? profitIfWin / value : 0;
  const expectedValue = winProbability * profitIfWin;
  const volatility = domain.volatility ?? DEFAULT_VOLATILITY;
  const riskAdjustedEv = expectedValue * (1 - volatility * 0.5);
  const roi = expectedFinalPrice > 0 ? riskAdjustedEv / expectedFinalPrice : 0;

  return {
    expectedFinalPrice,
    profitIfWin,
    profitMargin,
    winProbability,
    expectedValue,
    riskAdjustedEv,
    roi,
    recommendation: toRecommendation(roi),
  };
}

function toPriority(score: number): ResourcePriority {
  if (score > 1.0) return "HIGH";
  if (score > 0.5) return "MEDIUM";
  return "LOW";
}

export function calculateResourceScore(ev: ExpectedValue): ResourceScore {
  const score = ev.winProbability * ev.profitMargin * (1 + ev.roi);
  return { score, priority: toPriority(score) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Enrichment
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Build the full market intelligence bundle for an auction context
 */
export function enrichContext(tables: MarketIntelligenceTables, context: AuctionContext): MarketIntelligence {
  const bidder = resolveBidderIntelligence(tables.bidderProfiles, context.lastBidderId);
  const behavioralPattern: BehavioralPattern =
    bidder.found ?
      { found: false }
    : resolveBehavioralPattern(
        tables.bidderProfiles,
        context.bidderAnalysis.aggressionScore,
        context.bidderAnalysis.reactionTimeAvgSeconds,
      );
  const domain = resolveDomainIntelligence(tables.domainStats, context.domain, context.estimatedValue);
  const archetype = resolveAuctionArchetype(tables);
  const winProbability = estimateWinProbability(context, bidder, behavioralPattern, domain);
  const expectedValue = calculateExpectedValue(context, winProbability.probability, domain);

  return {
    bidder,
    behavioralPattern,
    domain,
    archetype,
    winProbability,
    expectedValue,
    resourceScore: calculateResourceScore(expectedValue),
  };
}

export const EMPTY_MARKET_INTELLIGENCE_TABLES: MarketIntelligenceTables = {
  bidderProfiles: [],
  domainStats: [],
  auctionArchetypes: [],
};

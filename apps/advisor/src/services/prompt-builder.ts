/**
 * Prompt construction for the strategy oracle (pure functions)
 *
 * - System prompt: role, strategy options, platform rules, decision framework
 * - User prompt: financials, competition, bidder analysis, value tier,
 *   market intelligence and historical context for one auction round
 */

import {
  BID_STRATEGIES,
  PLATFORM_RULES,
  PLATFORMS,
  calculateSafeMax,
  classifyValueTier,
  getBidIncrement,
} from "@bid-advisor/core";
import type { MarketIntelligence, ValueTier } from "@bid-advisor/core";

import type { HistoricalContext, OracleRequest } from "../types";

const usd = (n: number): string => `$${n.toFixed(2)}`;
const pct = (r: number): string => `${(r * 100).toFixed(1)}%`;

const TIER_NOTES: Record<ValueTier, string> = {
  high: "Conservative approach, avoid emotional escalation",
  medium: "Balanced strategy, test competition",
  low: "Small probes or wait for closeout",
};

// ─────────────────────────────────────────────────────────────────────────────
// System Prompt
// ─────────────────────────────────────────────────────────────────────────────

export function buildSystemPrompt(ceilingRatio: number): string {
  const platformLines = PLATFORMS.map(p => `- ${p}: ${PLATFORM_RULES[p].description}`).join("\n");

  return `You are an expert domain name auction strategist. You recommend one bidding action per auction round.

CORE PRINCIPLES:
- Profit first: a win above the estimated resale value is a loss
- Hard ceiling: never recommend a bid above ${pct(ceilingRatio)} of the estimated value or above the available budget
- Respect platform mechanics (late-bid extensions, increments)
- Adapt to the opponents: bots react instantly, humans hesitate

STRATEGY OPTIONS:
- proxy_max: set a proxy at the safe maximum and let the platform auto-bid
- last_minute_snipe: stay quiet and bid in the closing window
- incremental_test: small bids to probe the competition
- wait_for_closeout: let the auction expire and pick the domain up in closeout
- aggressive_early: rare, only for must-have domains worth at least $200
- do_not_bid: walk away when no profitable outcome exists (bid amount must be 0)

PLATFORM RULES:
${platformLines}

DECISION FRAMEWORK:
1. Value tier: high ($1000+) conservative, medium ($100-999) balanced, low (<$100) small probes
2. Competition: 0 bidders → closeout or early proxy; 1-2 → proxy with safe limits; 3+ → snipe or test
3. Bots: prefer sniping to shrink their reaction window
4. Time: >1h strategic positioning; <1h execute; <5min snipe (mind extensions)

OUTPUT:
Respond with ONLY a JSON object:
{
  "strategy": "${BID_STRATEGIES.join("|")}",
  "recommended_bid_amount": <number, your proxy maximum>,
  "confidence": <0.0-1.0>,
  "risk_level": "low|medium|high",
  "reasoning": "<at least 100 characters covering profit margin, risk, competition and strategy>"
}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// User Prompt
// ─────────────────────────────────────────────────────────────────────────────

function formatMarketIntelligence(intel: MarketIntelligence): string {
  const lines: string[] = [];
  const { bidder, behavioralPattern: pattern, domain, archetype, winProbability, expectedValue, resourceScore } = intel;

  if (bidder.found) {
    lines.push(
      `- Bidder profile: ${bidder.totalAuctions} auctions, win rate ${pct(bidder.winRate)}, aggressive=${bidder.isAggressive}, sniper=${bidder.isSniper}`,
    );
  } else if (pattern.found) {
    lines.push(
      `- Bidder behavior: cluster=${pattern.clusterType} (n=${pattern.clusterSize}), fold probability ${pct(pattern.foldProbability)}, cluster win rate ${pct(pattern.clusterWinRate)}`,
    );
    lines.push(`- Counter strategy: ${pattern.counterStrategy}`);
  }

  if (domain.found) {
    const avg = domain.avgFinalPrice === null ? "N/A" : usd(domain.avgFinalPrice);
    lines.push(
      `- Domain history (${domain.matchType}, confidence ${pct(domain.confidence)}): avg final price ${avg}, sample ${domain.sampleSize}, volatile=${domain.isVolatile}`,
    );
    if (domain.warning) lines.push(`- Warning: ${domain.warning}`);
  }

  if (archetype.found) {
    lines.push(
      `- Auction archetype: ${archetype.escalationSpeed} escalation, sniper dominated=${archetype.sniperDominated}, proxy driven=${archetype.proxyDriven}`,
    );
  }

  lines.push(`- Win probability: ${pct(winProbability.probability)} (${winProbability.confidenceLevel} confidence)`);
  lines.push(
    `- Expected value: ${usd(expectedValue.expectedValue)}, ROI ${expectedValue.roi.toFixed(2)}, ${expectedValue.recommendation}, priority ${resourceScore.priority}`,
  );

  return lines.join("\n");
}

function formatHistory(history: HistoricalContext): string {
  const lines: string[] = [];

  if (history.insights) {
    const { totalSimilar, winRate, avgFinalPriceRatio, winningStrategies } = history.insights;
    lines.push(`- Similar auctions: ${totalSimilar}, our win rate ${pct(winRate)}`);
    if (avgFinalPriceRatio !== null) {
      lines.push(`- Similar domains typically sold for ${pct(avgFinalPriceRatio)} of estimated value`);
    }
    const winners = Object.entries(winningStrategies)
      .map(([s, n]) => `${s} (${n})`)
      .join(", ");
    if (winners) lines.push(`- Winning strategies: ${winners}`);
  } else {
    lines.push("- No similar auctions on record");
  }

  for (const perf of history.strategyPerformance) {
    lines.push(
      `- ${perf.strategy}: ${perf.totalUses} uses, win rate ${pct(perf.winRate)}, avg profit per win ${usd(perf.avgProfitPerWin)}`,
    );
  }

  if (history.bestStrategy) {
    lines.push(`- Historically best: ${history.bestStrategy.strategy} (win rate ${pct(history.bestStrategy.winRate)})`);
  }

  if (history.previousRounds.length > 0) {
    lines.push("- Previous rounds of this auction:");
    for (const r of history.previousRounds) {
      lines.push(
        `  ${r.roundNumber}. bid ${usd(r.currentBid)}, ${r.numBidders} bidders → ${r.strategy} at ${usd(r.recommendedBid)} (${r.resultRound})`,
      );
    }
  }

  return lines.join("\n");
}

export function buildUserPrompt(request: OracleRequest, ceilingRatio: number): string {
  const { context, intelligence, history } = request;
  const { bidderAnalysis: b } = context;
  const tier = classifyValueTier(context.estimatedValue);
  const rules = PLATFORM_RULES[context.platform];

  const sections = [
    `## Auction Context

Domain: ${context.domain}
Platform: ${context.platform.toUpperCase()} (${rules.description})

## Financials
- Estimated value: ${usd(context.estimatedValue)}
- Current bid: ${usd(context.currentBid)}
- Your current proxy: ${usd(context.yourCurrentProxy)} (0 = none)
- Budget available: ${usd(context.budgetAvailable)}
- Safe max: ${usd(calculateSafeMax(context.estimatedValue))}
- Hard ceiling: ${usd(context.estimatedValue * ceilingRatio)}
- Next increment: ${usd(getBidIncrement(context.platform, context.currentBid))}

## Competition
- Active bidders: ${context.numBidders}
- Hours remaining: ${context.hoursRemaining.toFixed(1)}

## Bidder Analysis
- Bot detected: ${b.botDetected}
- Corporate buyer: ${b.corporateBuyer}
- Aggression score: ${b.aggressionScore}/10
- Avg reaction time: ${b.reactionTimeAvgSeconds.toFixed(1)}s

## Value Tier
${tier.toUpperCase()}: ${TIER_NOTES[tier]}`,
  ];

  if (intelligence) sections.push(`## Market Intelligence\n${formatMarketIntelligence(intelligence)}`);
  if (history) sections.push(`## Historical Context\n${formatHistory(history)}`);

  sections.push(`## Task
Recommend the optimal strategy for this round. Consider profit potential within the ceiling,
the competition and its behavior, ${context.platform} timing rules, and the risk of overpaying.`);

  return sections.join("\n\n");
}

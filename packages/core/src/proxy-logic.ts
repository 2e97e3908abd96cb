/**
 * Proxy Logic Engine
 *
 * Converts a chosen strategy into a proxy-bid adjustment. Scenarios, in order:
 * 1. Current bid at or above the safe maximum → accept_loss (no profit left)
 * 2. Strategy is do_not_bid → maintain_proxy with no budget (nothing is raised)
 * 3. No standing proxy → increase_proxy (initial setup)
 * 4. Room above the standing proxy of at least 3 increments → increase_proxy,
 *    otherwise maintain_proxy
 *
 * accept_loss overrides whatever strategy was chosen to do_not_bid.
 *
 * This module is pure (no I/O, no throw).
 */

import { calculateSafeMax, getBidIncrement } from "./value-tier";
import type { AuctionContext, BidStrategy, ProxyDecision, StrategyDecision, Usd } from "./types";

/** Headroom (in increments) needed before raising a standing proxy */
export const PROXY_RAISE_MIN_INCREMENTS = 3;

/** Confidence ceiling for an overridden strategy */
export const ACCEPT_LOSS_MAX_CONFIDENCE = 0.5;

const usd = (n: number): string => `$${n.toFixed(2)}`;

export function analyzeProxy(context: AuctionContext, strategy?: BidStrategy): ProxyDecision {
  const { currentBid, yourCurrentProxy, budgetAvailable, estimatedValue, platform } = context;
  const safeMax = calculateSafeMax(estimatedValue);
  const increment = getBidIncrement(platform, currentBid);

  const base = { currentProxy: yourCurrentProxy, currentBid, safeMax };

  if (currentBid >= safeMax) {
    return {
      ...base,
      shouldIncreaseProxy: false,
      newProxyMax: null,
      nextBidAmount: null,
      maxBudgetForDomain: 0,
      proxyAction: "accept_loss",
      explanation: `PROFIT IMPOSSIBLE: Current bid ${usd(currentBid)} has reached the safe maximum ${usd(safeMax)}; any win would be at a loss.`,
    };
  }

  if (strategy === "do_not_bid") {
    return {
      ...base,
      shouldIncreaseProxy: false,
      newProxyMax: null,
      nextBidAmount: null,
      maxBudgetForDomain: 0,
      proxyAction: "maintain_proxy",
      explanation: `NO BID: Strategy is do_not_bid; standing proxy ${usd(yourCurrentProxy)} left unchanged.`,
    };
  }

  const potentialMax: Usd = Math.min(safeMax, budgetAvailable, estimatedValue);

  if (yourCurrentProxy === 0) {
    return {
      ...base,
      shouldIncreaseProxy: true,
      newProxyMax: potentialMax,
      nextBidAmount: currentBid + increment,
      maxBudgetForDomain: potentialMax,
      proxyAction: "increase_proxy",
      explanation: `INITIAL PROXY SETUP: No proxy yet; set proxy to ${usd(potentialMax)} and bid ${usd(currentBid + increment)} (${usd(increment)} increment).`,
    };
  }

  const headroom = potentialMax - yourCurrentProxy;
  if (headroom >= PROXY_RAISE_MIN_INCREMENTS * increment) {
    return {
      ...base,
      shouldIncreaseProxy: true,
      newProxyMax: potentialMax,
      nextBidAmount: currentBid + increment,
      maxBudgetForDomain: potentialMax,
      proxyAction: "increase_proxy",
      explanation: `PROXY INCREASE OPTIMAL: Raise proxy from ${usd(yourCurrentProxy)} to ${usd(potentialMax)} (${usd(headroom)} headroom, ${usd(increment)} increment).`,
    };
  }

  return {
    ...base,
    shouldIncreaseProxy: false,
    newProxyMax: null,
    nextBidAmount: null,
    maxBudgetForDomain: yourCurrentProxy,
    proxyAction: "maintain_proxy",
    explanation: `PROXY ADEQUATE: Standing proxy ${usd(yourCurrentProxy)} is within ${PROXY_RAISE_MIN_INCREMENTS} increments of the ${usd(potentialMax)} ceiling; no change.`,
  };
}

/**
 * Merge a proxy decision into the strategy decision.
 * accept_loss always wins over the chosen strategy.
 */
export function applyProxyDecision(decision: StrategyDecision, proxy: ProxyDecision): StrategyDecision {
  const merged: StrategyDecision = {
    ...decision,
    shouldIncreaseProxy: proxy.shouldIncreaseProxy,
    nextBidAmount: proxy.nextBidAmount,
    maxBudgetForDomain: proxy.maxBudgetForDomain,
  };

  if (proxy.proxyAction !== "accept_loss") return merged;

  return {
    ...merged,
    strategy: "do_not_bid",
    recommendedBidAmount: 0,
    confidence: Math.min(decision.confidence, ACCEPT_LOSS_MAX_CONFIDENCE),
    riskLevel: "high",
    reasoning: `${decision.reasoning} PROXY ANALYSIS OVERRIDE: ${proxy.explanation}`,
  };
}

/**
 * Analyze and apply in one step
 */
export function runProxyLogic(
  decision: StrategyDecision,
  context: AuctionContext,
): { decision: StrategyDecision; proxy: ProxyDecision } {
  const proxy = analyzeProxy(context, decision.strategy);
  return { decision: applyProxyDecision(decision, proxy), proxy };
}

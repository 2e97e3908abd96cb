/**
 * Shared test data for advisor tests
 */

import { okAsync } from "neverthrow";
import { vi } from "vitest";

import type { AuctionContext, StrategyDecision } from "@bid-advisor/core";

import type { StrategyOracle } from "../src/types";

export const createContext = (overrides: Partial<AuctionContext> = {}): AuctionContext => ({
  domain: "example.com",
  platform: "namejet",
  estimatedValue: 1000,
  currentBid: 300,
  numBidders: 2,
  hoursRemaining: 4,
  yourCurrentProxy: 0,
  budgetAvailable: 5000,
  bidderAnalysis: {
    botDetected: false,
    corporateBuyer: false,
    aggressionScore: 5,
    reactionTimeAvgSeconds: 30,
  },
  ...overrides,
});

export const PROPOSAL_REASONING =
  "Proxy strategy at 80% of value keeps a healthy profit margin; two bidders is moderate competition and the overpay risk stays low.";

export const createProposal = (overrides: Partial<StrategyDecision> = {}): StrategyDecision => ({
  strategy: "proxy_max",
  recommendedBidAmount: 800,
  confidence: 0.75,
  riskLevel: "medium",
  reasoning: PROPOSAL_REASONING,
  shouldIncreaseProxy: null,
  nextBidAmount: null,
  maxBudgetForDomain: 800,
  ...overrides,
});

export function createFakeOracle(decision: StrategyDecision = createProposal()) {
  const propose = vi.fn<StrategyOracle["propose"]>(() => okAsync(decision));
  const oracle: StrategyOracle = { propose };
  return { oracle, propose };
}

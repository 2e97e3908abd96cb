/**
 * Advisor Data Contracts (Zod Schemas)
 *
 * - AuctionContextInput: auction snapshot accepted by the CLI
 * - OracleResponse: JSON object the LLM must answer with (snake_case keys)
 */

import { z } from "zod";

import { BID_STRATEGIES, PLATFORMS, RISK_LEVELS } from "@bid-advisor/core";
import type { StrategyDecision } from "@bid-advisor/core";

// ─────────────────────────────────────────────────────────────────────────────
// Auction Context (CLI input)
// ─────────────────────────────────────────────────────────────────────────────

export const BidderAnalysisSchema = z.object({
  botDetected: z.boolean(),
  corporateBuyer: z.boolean(),
  aggressionScore: z.number().min(0).max(10),
  reactionTimeAvgSeconds: z.number().nonnegative(),
});

export const AuctionContextInputSchema = z.object({
  domain: z.string().min(1),
  platform: z.enum(PLATFORMS),
  estimatedValue: z.number(),
  currentBid: z.number().nonnegative(),
  numBidders: z.number().int().nonnegative(),
  hoursRemaining: z.number().nonnegative(),
  yourCurrentProxy: z.number().nonnegative().default(0),
  budgetAvailable: z.number().nonnegative(),
  bidderAnalysis: BidderAnalysisSchema,
  threadId: z.string().min(1).optional(),
  lastBidderId: z.string().min(1).optional(),
});

export type AuctionContextInput = z.infer<typeof AuctionContextInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Oracle Response (LLM output)
// ─────────────────────────────────────────────────────────────────────────────

export const OracleResponseSchema = z.object({
  strategy: z.enum(BID_STRATEGIES),
  recommended_bid_amount: z.number().nonnegative(),
  confidence: z.number().min(0).max(1),
  risk_level: z.enum(RISK_LEVELS),
  reasoning: z.string(),
  should_increase_proxy: z.boolean().nullable().optional(),
  next_bid_amount: z.number().nonnegative().nullable().optional(),
  max_budget_for_domain: z.number().nonnegative().optional(),
});

export type OracleResponse = z.infer<typeof OracleResponseSchema>;

/**
 * Proxy fields the model leaves out are filled by proxy logic later;
 * the budget defaults to the recommended bid.
 */
export function toStrategyDecision(response: OracleResponse): StrategyDecision {
  return {
    strategy: response.strategy,
    recommendedBidAmount: response.recommended_bid_amount,
    confidence: response.confidence,
    riskLevel: response.risk_level,
    reasoning: response.reasoning,
    shouldIncreaseProxy: response.should_increase_proxy ?? null,
    nextBidAmount: response.next_bid_amount ?? null,
    maxBudgetForDomain: response.max_budget_for_domain ?? response.recommended_bid_amount,
  };
}

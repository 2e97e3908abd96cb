/**
 * Core Domain Types
 *
 * Pure type definitions for the bid decision pipeline.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Dollar amount */
export type Usd = number;

/** Ratio or probability in [0, 1] */
export type Ratio = number;

/** Auction venue */
export type Platform = "godaddy" | "namejet" | "dynadot";

export const PLATFORMS = ["godaddy", "namejet", "dynadot"] as const satisfies readonly Platform[];

/**
 * Bidding strategies the pipeline can recommend
 *
 * - proxy_max: place a proxy at the safe maximum and let the platform defend it
 * - last_minute_snipe: stay quiet, bid in the closing window
 * - incremental_test: small bids to probe the competition
 * - wait_for_closeout: let the auction expire, pick it up in closeout
 * - aggressive_early: commit strongly before others engage
 * - do_not_bid: stay out
 */
export type BidStrategy =
  | "proxy_max"
  | "last_minute_snipe"
  | "incremental_test"
  | "wait_for_closeout"
  | "aggressive_early"
  | "do_not_bid";

export const BID_STRATEGIES = [
  "proxy_max",
  "last_minute_snipe",
  "incremental_test",
  "wait_for_closeout",
  "aggressive_early",
  "do_not_bid",
] as const satisfies readonly BidStrategy[];

export type RiskLevel = "low" | "medium" | "high";

export const RISK_LEVELS = ["low", "medium", "high"] as const satisfies readonly RiskLevel[];

/** Value bucket of a domain (high ≥ 1000, medium ≥ 100, low below) */
export type ValueTier = "high" | "medium" | "low";

export type ProxyAction = "accept_loss" | "increase_proxy" | "maintain_proxy";

/** Where the final decision came from */
export type DecisionSource = "llm" | "rules_fallback" | "safety_block" | "system_error";

// ─────────────────────────────────────────────────────────────────────────────
// Auction Context
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Live behavioral read on the competition for this auction
 */
export interface BidderAnalysis {
  botDetected: boolean;
  corporateBuyer: boolean;
  /** 0 (passive) .. 10 (very aggressive) */
  aggressionScore: number;
  reactionTimeAvgSeconds: number;
}

/**
 * Snapshot of one auction round. Immutable for the duration of a decision.
 */
export interface AuctionContext {
  readonly domain: string;
  readonly platform: Platform;
  readonly estimatedValue: Usd;
  readonly currentBid: Usd;
  readonly numBidders: number;
  readonly hoursRemaining: number;
  /** 0 means no standing proxy */
  readonly yourCurrentProxy: Usd;
  readonly budgetAvailable: Usd;
  readonly bidderAnalysis: Readonly<BidderAnalysis>;
  /** Groups successive rounds of the same auction */
  readonly threadId?: string;
  /** Identifier of the last opposing bidder, when the platform exposes it */
  readonly lastBidderId?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Decisions
// ─────────────────────────────────────────────────────────────────────────────

export interface StrategyDecision {
  strategy: BidStrategy;
  recommendedBidAmount: Usd;
  confidence: Ratio;
  riskLevel: RiskLevel;
  reasoning: string;
  /** null until proxy logic has run */
  shouldIncreaseProxy: boolean | null;
  nextBidAmount: Usd | null;
  maxBudgetForDomain: Usd;
}

/**
 * Proxy adjustment derived from the context and the chosen strategy
 */
export interface ProxyDecision {
  currentProxy: Usd;
  currentBid: Usd;
  safeMax: Usd;
  shouldIncreaseProxy: boolean;
  newProxyMax: Usd | null;
  nextBidAmount: Usd | null;
  maxBudgetForDomain: Usd;
  proxyAction: ProxyAction;
  explanation: string;
}

/**
 * The single output of a pipeline run. Frozen once built.
 */
export type FinalDecision = Readonly<
  Omit<StrategyDecision, "shouldIncreaseProxy"> & {
    shouldIncreaseProxy: boolean;
    proxyDecision: Readonly<ProxyDecision> | null;
    decisionSource: DecisionSource;
  }
>;

// ─────────────────────────────────────────────────────────────────────────────
// Safety Gate
// ─────────────────────────────────────────────────────────────────────────────

export type SafetyRule = "VALUATION_INVALID" | "MINIMUM_BUDGET" | "OVERPAYMENT_PROTECTION" | "PORTFOLIO_CONCENTRATION";

export type SafetyCheckResult = { passed: true } | { passed: false; rule: SafetyRule; reason: string };

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type ValidationCode =
  | "BID_EXCEEDS_CEILING"
  | "BID_EXCEEDS_BUDGET"
  | "DO_NOT_BID_WITH_AMOUNT"
  | "REASONING_TOO_SHORT"
  | "AGGRESSIVE_EARLY_LOW_VALUE"
  | "CONFIDENCE_MISALIGNED"
  | "REASONING_BRIEF"
  | "REASONING_LACKS_CONCEPTS"
  | "CLOSEOUT_WITH_COMPETITION"
  | "SNIPE_TOO_EARLY";

export interface ValidationIssue {
  code: ValidationCode;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** Combined human-readable summary */
  message: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Market Intelligence Tables (read-only inputs)
// ─────────────────────────────────────────────────────────────────────────────

export interface BidderProfileRow {
  bidderId: string;
  totalAuctions: number;
  totalBids: number;
  avgBidIncrease: Usd;
  maxBid: Usd;
  winRate: Ratio;
  lateBidRatio: Ratio;
  /** seconds; null when never measured */
  avgReactionTime: number | null;
  proxyUsage: Ratio;
}

export interface DomainStatRow {
  domain: string;
  avgFinalPrice: Usd;
  volatility: Ratio;
  auctionCount: number;
}

export interface AuctionArchetypeRow {
  auctionId: string;
  lateBidRatio: Ratio;
  avgBidJump: Usd;
  durationSec: number;
}

export interface MarketIntelligenceTables {
  readonly bidderProfiles: readonly BidderProfileRow[];
  readonly domainStats: readonly DomainStatRow[];
  readonly auctionArchetypes: readonly AuctionArchetypeRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Market Intelligence (derived enrichment)
// ─────────────────────────────────────────────────────────────────────────────

export type BidderIntelligence =
  | { found: false; bidderId: string | null }
  | {
      found: true;
      bidderId: string;
      totalAuctions: number;
      bidsPerAuction: number;
      avgBidIncrease: Usd;
      maxBid: Usd;
      winRate: Ratio;
      lateBidRatio: Ratio;
      avgReactionTime: number | null;
      proxyUsage: Ratio;
      isAggressive: boolean;
      isSniper: boolean;
      isProxyHeavy: boolean;
    };

export type BidderCluster = "professional" | "casual" | "sniper" | "regular";

export type BehavioralPattern =
  | { found: false }
  | {
      found: true;
      clusterType: BidderCluster;
      clusterSize: number;
      clusterWinRate: Ratio;
      clusterLateBidRatio: Ratio;
      foldProbability: Ratio;
      counterStrategy: string;
      isAggressiveCluster: boolean;
      isPassiveCluster: boolean;
      /** true when reaction-time matching found nothing and aggression alone was used */
      aggressionOnly: boolean;
    };

export type DomainMatchType = "exact" | "tld_pattern" | "value_tier_pattern" | "platform_average" | "none";

export interface DomainIntelligence {
  found: boolean;
  matchType: DomainMatchType;
  confidence: Ratio;
  avgFinalPrice: Usd | null;
  medianFinalPrice: Usd | null;
  volatility: Ratio | null;
  isVolatile: boolean;
  sampleSize: number;
  /** Populated by the TLD tier */
  tld: string | null;
  priceStd: Usd | null;
  percentiles: { p25: Usd; p50: Usd; p75: Usd; p90: Usd } | null;
  isPremiumTld: boolean;
  isBudgetTld: boolean;
  /** Populated by the value-tier tier */
  valueRange: { min: Usd; max: Usd } | null;
  recommendedMaxBid: Usd | null;
  warning: string | null;
}

export type AuctionArchetype =
  | { found: false }
  | {
      found: true;
      lateBidRatio: Ratio;
      avgBidJump: Usd;
      durationSec: number;
      escalationSpeed: "fast" | "slow";
      sniperDominated: boolean;
      proxyDriven: boolean;
      botRatio: Ratio;
    };

export type ConfidenceLevel = "high" | "medium" | "low";

export interface WinProbability {
  probability: Ratio;
  confidenceLevel: ConfidenceLevel;
  factors: {
    baseByBidders: Ratio;
    opponentWinRate: Ratio | null;
    foldProbability: Ratio | null;
    budgetRatio: Ratio;
    volatilityPenalty: boolean;
  };
}

export type BidRecommendation = "STRONG_BID" | "MODERATE_BID" | "WEAK_BID";

export interface ExpectedValue {
  expectedFinalPrice: Usd;
  profitIfWin: Usd;
  profitMargin: Ratio;
  winProbability: Ratio;
  expectedValue: Usd;
  riskAdjustedEv: Usd;
  roi: number;
  recommendation: BidRecommendation;
}

export type ResourcePriority = "HIGH" | "MEDIUM" | "LOW";

export interface ResourceScore {
  score: number;
  priority: ResourcePriority;
}

export interface MarketIntelligence {
  bidder: BidderIntelligence;
  behavioralPattern: BehavioralPattern;
  domain: DomainIntelligence;
  archetype: AuctionArchetype;
  winProbability: WinProbability;
  expectedValue: ExpectedValue;
  resourceScore: ResourceScore;
}

// ─────────────────────────────────────────────────────────────────────────────
// Oracle Port
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Outcome of asking the strategy oracle for a proposal.
 * A failure is not terminal: the pipeline falls back to rules.
 */
export type OracleOutcome = { type: "PROPOSAL"; decision: StrategyDecision } | { type: "FAILURE"; reason: string };

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

export type PipelineStage =
  | "START"
  | "SAFETY_CHECK"
  | "BLOCKED"
  | "ORACLE_PROPOSE"
  | "VALIDATE"
  | "RULE_FALLBACK"
  | "PROXY_LOGIC"
  | "FINALIZE"
  | "END";

/**
 * Per-run working state. Each run owns its own instance.
 */
export interface PipelineState {
  readonly context: AuctionContext;
  readonly intelligence: MarketIntelligence | null;
  stage: PipelineStage;
  safety: SafetyCheckResult | null;
  oracleOutcome: OracleOutcome | null;
  validation: ValidationResult | null;
  fallbackDecision: StrategyDecision | null;
  /** Strategy after proxy logic has been applied */
  strategyDecision: StrategyDecision | null;
  proxyDecision: ProxyDecision | null;
  decisionSource: DecisionSource | null;
  finalDecision: FinalDecision | null;
}

/**
 * packages/core - Pure Bid Decision Logic
 *
 * This package contains all pure business logic for the bid advisor.
 * NO I/O dependencies (DB, HTTP, FS).
 * NO exceptions thrown.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  Usd,
  Ratio,
  Platform,
  BidStrategy,
  RiskLevel,
  ValueTier,
  ProxyAction,
  DecisionSource,
  // Context
  BidderAnalysis,
  AuctionContext,
  // Decisions
  StrategyDecision,
  ProxyDecision,
  FinalDecision,
  // Safety / validation
  SafetyRule,
  SafetyCheckResult,
  ValidationCode,
  ValidationIssue,
  ValidationResult,
  // Market intelligence
  BidderProfileRow,
  DomainStatRow,
  AuctionArchetypeRow,
  MarketIntelligenceTables,
  BidderIntelligence,
  BidderCluster,
  BehavioralPattern,
  DomainMatchType,
  DomainIntelligence,
  AuctionArchetype,
  ConfidenceLevel,
  WinProbability,
  BidRecommendation,
  ExpectedValue,
  ResourcePriority,
  ResourceScore,
  MarketIntelligence,
  // Pipeline
  OracleOutcome,
  PipelineStage,
  PipelineState,
} from "./types";
export { PLATFORMS, BID_STRATEGIES, RISK_LEVELS } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Value Tiers / Platform Rules
// ─────────────────────────────────────────────────────────────────────────────
export type { PlatformRules } from "./value-tier";
export {
  classifyValueTier,
  calculateSafeMax,
  getBidIncrement,
  hasLateExtension,
  PLATFORM_RULES,
  SAFE_MAX_RATIO,
  HIGH_VALUE_THRESHOLD,
  MEDIUM_VALUE_THRESHOLD,
} from "./value-tier";

// ─────────────────────────────────────────────────────────────────────────────
// Safety Gate
// ─────────────────────────────────────────────────────────────────────────────
export {
  checkSafety,
  buildSafetyBlockDecision,
  MIN_BUDGET,
  MAX_OVERPAY_RATIO,
  MAX_CONCENTRATION_RATIO,
  SAFETY_BLOCK_CONFIDENCE,
} from "./safety-gate";

// ─────────────────────────────────────────────────────────────────────────────
// Market Intelligence
// ─────────────────────────────────────────────────────────────────────────────
export {
  enrichContext,
  resolveBidderIntelligence,
  resolveBehavioralPattern,
  resolveDomainIntelligence,
  resolveAuctionArchetype,
  estimateWinProbability,
  calculateExpectedValue,
  calculateResourceScore,
  extractTld,
  quantile,
  EMPTY_MARKET_INTELLIGENCE_TABLES,
} from "./market-intelligence";

// ─────────────────────────────────────────────────────────────────────────────
// Validator
// ─────────────────────────────────────────────────────────────────────────────
export type { ValidatorConfig, ConfidenceBand } from "./strategy-validator";
export {
  validateStrategy,
  countConceptGroups,
  confidenceDeviation,
  DEFAULT_VALIDATOR_CONFIG,
  MAX_BID_CEILING_RATIO,
  REASONING_CONCEPT_GROUPS,
} from "./strategy-validator";

// ─────────────────────────────────────────────────────────────────────────────
// Rule Fallback
// ─────────────────────────────────────────────────────────────────────────────
export {
  selectFallbackStrategy,
  calculateFallbackSafeMax,
  AGGRESSIVE_OPPONENT_DISCOUNT,
  LOW_VALUE_PROBE_CAP,
} from "./rule-fallback";

// ─────────────────────────────────────────────────────────────────────────────
// Proxy Logic
// ─────────────────────────────────────────────────────────────────────────────
export {
  analyzeProxy,
  applyProxyDecision,
  runProxyLogic,
  PROXY_RAISE_MIN_INCREMENTS,
  ACCEPT_LOSS_MAX_CONFIDENCE,
} from "./proxy-logic";

// ─────────────────────────────────────────────────────────────────────────────
// Decision Graph
// ─────────────────────────────────────────────────────────────────────────────
export {
  createPipelineState,
  runSafetyStage,
  runValidationStage,
  runFallbackStage,
  runProxyStage,
  finalizeDecision,
  buildSystemErrorDecision,
  MISSING_ANALYSIS_REASON,
} from "./decision-graph";

/**
 * Value tiers and platform bidding rules
 *
 * This module is pure (no I/O, no throw).
 */

import type { Platform, Usd, ValueTier } from "./types";

/** Lower bound of the high-value tier */
export const HIGH_VALUE_THRESHOLD = 1000;

/** Lower bound of the medium-value tier */
export const MEDIUM_VALUE_THRESHOLD = 100;

/**
 * Safe maximum bid as a fraction of the estimated value.
 * Bidding beyond it leaves no profit on resale.
 */
export const SAFE_MAX_RATIO = 1.0;

export function classifyValueTier(estimatedValue: Usd): ValueTier {
  if (estimatedValue >= HIGH_VALUE_THRESHOLD) return "high";
  if (estimatedValue >= MEDIUM_VALUE_THRESHOLD) return "medium";
  return "low";
}

export function calculateSafeMax(estimatedValue: Usd): Usd {
  return estimatedValue * SAFE_MAX_RATIO;
}

// ─────────────────────────────────────────────────────────────────────────────
// Platform rules
// ─────────────────────────────────────────────────────────────────────────────

export interface PlatformRules {
  /** Minimum bid increment in dollars */
  minIncrement: Usd;
  /** Proportional increment (of the current bid), if the platform scales it */
  incrementRatio: number | null;
  /** Minutes added when a bid lands in the closing window, null if none */
  lateExtensionMinutes: number | null;
  description: string;
}

export const PLATFORM_RULES: Record<Platform, PlatformRules> = {
  godaddy: {
    minIncrement: 5,
    incrementRatio: null,
    lateExtensionMinutes: 5,
    description: "5-minute extension on late bids, $5 increments",
  },
  namejet: {
    minIncrement: 5,
    incrementRatio: null,
    lateExtensionMinutes: null,
    description: "no extensions, proxy bidding standard",
  },
  dynadot: {
    minIncrement: 5,
    incrementRatio: 0.05,
    lateExtensionMinutes: null,
    description: "variable increments (5% of the current bid, $5 minimum)",
  },
};

const DEFAULT_INCREMENT = 5;

/**
 * Minimum bid increment for the platform at the given price
 */
export function getBidIncrement(platform: string, currentBid: Usd): Usd {
  const rules = lookupPlatformRules(platform);
  if (!rules) return DEFAULT_INCREMENT;
  if (rules.incrementRatio === null) return rules.minIncrement;
  return Math.max(rules.minIncrement, currentBid * rules.incrementRatio);
}

export function hasLateExtension(platform: string): boolean {
  return (lookupPlatformRules(platform)?.lateExtensionMinutes ?? null) !== null;
}

function lookupPlatformRules(platform: string): PlatformRules | undefined {
  return platform === "godaddy" || platform === "namejet" || platform === "dynadot" ? PLATFORM_RULES[platform] : undefined;
}

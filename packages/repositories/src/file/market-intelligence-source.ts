/**
 * File Market Intelligence Source
 *
 * Reads the three market intelligence tables from JSON files in a directory:
 * - bidder-profiles.json
 * - domain-stats.json
 * - auction-archetypes.json
 *
 * Rows are validated with zod. The first successful load is cached.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { Result, ResultAsync, errAsync, okAsync } from "neverthrow";
import { z } from "zod";

import type { MarketIntelligenceTables } from "@bid-advisor/core";

import type {
  MarketIntelligenceSource,
  MarketIntelligenceSourceError,
} from "../interfaces/market-intelligence-source";

// ─────────────────────────────────────────────────────────────────────────────
// Row Schemas
// ─────────────────────────────────────────────────────────────────────────────

const ratio = z.number().min(0).max(1);

export const BidderProfileRowSchema = z.object({
  bidderId: z.string().min(1),
  totalAuctions: z.number().int().nonnegative(),
  totalBids: z.number().int().nonnegative(),
  avgBidIncrease: z.number().nonnegative(),
  maxBid: z.number().nonnegative(),
  winRate: ratio,
  lateBidRatio: ratio,
  avgReactionTime: z.number().nonnegative().nullable(),
  proxyUsage: ratio,
});

export const DomainStatRowSchema = z.object({
  domain: z.string().min(1),
  avgFinalPrice: z.number().nonnegative(),
  volatility: z.number().nonnegative(),
  auctionCount: z.number().int().nonnegative(),
});

export const AuctionArchetypeRowSchema = z.object({
  auctionId: z.string().min(1),
  lateBidRatio: ratio,
  avgBidJump: z.number().nonnegative(),
  durationSec: z.number().nonnegative(),
});

export const MARKET_INTELLIGENCE_FILES = {
  bidderProfiles: "bidder-profiles.json",
  domainStats: "domain-stats.json",
  auctionArchetypes: "auction-archetypes.json",
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  e => (e instanceof Error ? e.message : "Unknown error"),
);

function loadTable<T>(dir: string, file: string, schema: z.ZodType<T>): ResultAsync<T[], MarketIntelligenceSourceError> {
  const path = join(dir, file);

  return ResultAsync.fromPromise(
    readFile(path, "utf-8"),
    (e): MarketIntelligenceSourceError => ({
      type: "READ_FAILED",
      file: path,
      message: e instanceof Error ? e.message : "Unknown error",
    }),
  ).andThen(text => {
    const json = parseJson(text);
    if (json.isErr()) {
      return errAsync<T[], MarketIntelligenceSourceError>({
        type: "INVALID_DATA",
        file: path,
        message: `JSON Parse error: ${json.error}`,
      });
    }

    const parsed = z.array(schema).safeParse(json.value);
    if (!parsed.success) {
      return errAsync<T[], MarketIntelligenceSourceError>({
        type: "INVALID_DATA",
        file: path,
        message: parsed.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; "),
      });
    }
    return okAsync(parsed.data);
  });
}

export function createFileMarketIntelligenceSource(dataDir: string): MarketIntelligenceSource {
  let cached: MarketIntelligenceTables | null = null;

  return {
    load(): ResultAsync<MarketIntelligenceTables, MarketIntelligenceSourceError> {
      if (cached) return okAsync(cached);

      return ResultAsync.combine([
        loadTable(dataDir, MARKET_INTELLIGENCE_FILES.bidderProfiles, BidderProfileRowSchema),
        loadTable(dataDir, MARKET_INTELLIGENCE_FILES.domainStats, DomainStatRowSchema),
        loadTable(dataDir, MARKET_INTELLIGENCE_FILES.auctionArchetypes, AuctionArchetypeRowSchema),
      ]).map(([bidderProfiles, domainStats, auctionArchetypes]) => {
        const tables: MarketIntelligenceTables = { bidderProfiles, domainStats, auctionArchetypes };
        cached = tables;
        return tables;
      });
    },
  };
}

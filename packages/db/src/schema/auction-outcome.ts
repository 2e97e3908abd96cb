/**
 * auction_outcome - 終了したオークションの結果 (1行/オークション)
 *
 * - auction_id is the natural key; re-recording an outcome upserts
 * - strategy_performance aggregates are recomputed from these rows
 */

import {
  boolean,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from "drizzle-orm/pg-core";

export const auctionOutcome = pgTable(
  "auction_outcome",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    auctionId: text("auction_id").notNull().unique(),
    domain: text("domain").notNull(),
    platform: text("platform").notNull(), // godaddy/namejet/dynadot
    estimatedValue: doublePrecision("estimated_value").notNull(),
    finalPrice: doublePrecision("final_price").notNull(),
    valueTier: text("value_tier").notNull(), // high/medium/low
    strategyUsed: text("strategy_used").notNull(),
    decisionSource: text("decision_source").notNull(),
    confidence: doublePrecision("confidence").notNull(),
    won: boolean("won").notNull(),
    profitMargin: doublePrecision("profit_margin"), // null unless won
    numBidders: integer("num_bidders").notNull(),
    hoursRemaining: doublePrecision("hours_remaining").notNull(),
    threadId: text("thread_id"),
    rawData: jsonb("raw_data").notNull(), // context + decision snapshot
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [
    index("auction_outcome_platform_value_idx").on(table.platform, table.estimatedValue),
    index("auction_outcome_strategy_bucket_idx").on(table.strategyUsed, table.platform, table.valueTier),
  ],
);

export type AuctionOutcome = typeof auctionOutcome.$inferSelect;
export type NewAuctionOutcome = typeof auctionOutcome.$inferInsert;

/**
 * auction_round - オークション中の各ラウンドの判断と結果
 *
 * - (thread_id, round_number) is the natural key
 */

import { doublePrecision, integer, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

export const auctionRound = pgTable(
  "auction_round",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    threadId: text("thread_id").notNull(),
    roundNumber: integer("round_number").notNull(),
    domain: text("domain").notNull(),
    platform: text("platform").notNull(),
    currentBid: doublePrecision("current_bid").notNull(),
    numBidders: integer("num_bidders").notNull(),
    hoursRemaining: doublePrecision("hours_remaining").notNull(),
    strategy: text("strategy").notNull(),
    recommendedBid: doublePrecision("recommended_bid").notNull(),
    confidence: doublePrecision("confidence").notNull(),
    decisionSource: text("decision_source").notNull(),
    resultRound: text("result_round").notNull(), // outbid/leading/won/lost ...
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [uniqueIndex("auction_round_thread_round_uq").on(table.threadId, table.roundNumber)],
);

export type AuctionRound = typeof auctionRound.$inferSelect;
export type NewAuctionRound = typeof auctionRound.$inferInsert;

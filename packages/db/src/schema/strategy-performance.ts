/**
 * strategy_performance - 戦略別の成績集計 (1行/strategy×platform×value_tier)
 *
 * Derived table: rebuilt from auction_outcome for the affected bucket on
 * every recorded outcome.
 */

import { doublePrecision, integer, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

export const strategyPerformance = pgTable(
  "strategy_performance",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    strategy: text("strategy").notNull(),
    platform: text("platform").notNull(),
    valueTier: text("value_tier").notNull(),
    totalUses: integer("total_uses").notNull().default(0),
    wins: integer("wins").notNull().default(0),
    totalProfit: doublePrecision("total_profit").notNull().default(0),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [
    uniqueIndex("strategy_performance_bucket_uq").on(table.strategy, table.platform, table.valueTier),
  ],
);

export type StrategyPerformance = typeof strategyPerformance.$inferSelect;
export type NewStrategyPerformance = typeof strategyPerformance.$inferInsert;

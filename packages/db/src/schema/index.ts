/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Single source of truth for all database schemas
 * - timestamptz(UTC), time column named 'ts'
 */

// Auction history
export * from "./auction-outcome";
export * from "./auction-round";

// Learning aggregates
export * from "./strategy-performance";

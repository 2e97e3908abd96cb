// Export schema and utilities
export * from "./schema";

// Connection helper (Node-only)
export { getDb } from "./get-db";
export type { Db } from "./get-db";

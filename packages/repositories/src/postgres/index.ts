/**
 * Postgres Repository Implementations
 */

export { createPostgresHistoryRepository } from "./history-repository";

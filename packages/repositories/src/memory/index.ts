/**
 * In-memory Repository Implementations
 */

export { createInMemoryHistoryRepository } from "./history-repository";

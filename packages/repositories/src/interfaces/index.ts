/**
 * Repository Interfaces
 */

export * from "./history-repository";
export * from "./market-intelligence-source";

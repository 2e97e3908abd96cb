/**
 * Advisor CLI Entry Point
 *
 * Usage: tsx apps/advisor/src/main.ts <auction-context.json>
 * - Input: one AuctionContext as JSON
 * - Output: the FinalDecision as JSON on stdout
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { Result } from "neverthrow";

import { DEFAULT_VALIDATOR_CONFIG } from "@bid-advisor/core";
import { getDb } from "@bid-advisor/db";
import {
  createFileMarketIntelligenceSource,
  createInMemoryHistoryRepository,
  createPostgresHistoryRepository,
} from "@bid-advisor/repositories";
import { logger } from "@bid-advisor/utils";

import { env } from "./env";
import { createDecisionAuditSink } from "./ports/decision-audit-sink";
import { createLlmStrategyOracle } from "./services/strategy-oracle";
import { AuctionContextInputSchema } from "./types/schemas";
import { createBidAdvisor } from "./usecases/bid-advisor";

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  e => (e instanceof Error ? e.message : "unknown"),
);

async function main(): Promise<void> {
  const inputPath = process.argv[2];
  if (!inputPath) {
    logger.error("Usage: advise <auction-context.json>");
    process.exitCode = 1;
    return;
  }

  const raw = await readFile(resolve(inputPath), "utf-8");
  const json = parseJson(raw);
  if (json.isErr()) {
    logger.error("Auction context is not valid JSON", { path: inputPath, error: json.error });
    process.exitCode = 1;
    return;
  }

  const parsed = AuctionContextInputSchema.safeParse(json.value);
  if (!parsed.success) {
    logger.error("Invalid auction context", {
      path: inputPath,
      issues: parsed.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; "),
    });
    process.exitCode = 1;
    return;
  }

  const db = env.DATABASE_URL ? getDb(env.DATABASE_URL) : null;
  if (!db) logger.info("DATABASE_URL not set, history kept in memory");

  if (!env.OPENAI_API_KEY) logger.warn("OPENAI_API_KEY not set, decisions use the rule-based fallback");

  const advisor = createBidAdvisor({
    oracle: env.OPENAI_API_KEY
      ? createLlmStrategyOracle({
          model: env.MODEL,
          apiKey: env.OPENAI_API_KEY,
          baseURL: env.OPENAI_BASE_URL,
          ceilingRatio: env.BID_CEILING_RATIO,
          retry: {
            maxAttempts: env.ORACLE_MAX_ATTEMPTS,
            baseDelayMs: env.ORACLE_BASE_DELAY_MS,
            maxDelayMs: env.ORACLE_MAX_DELAY_MS,
          },
          attemptTimeoutMs: env.ORACLE_ATTEMPT_TIMEOUT_MS,
        })
      : null,
    history: db ? createPostgresHistoryRepository(db) : createInMemoryHistoryRepository(),
    marketIntelligence: createFileMarketIntelligenceSource(resolve(env.MARKET_DATA_DIR)),
    auditSink: env.AUDIT_LOG_DIR ? createDecisionAuditSink(resolve(env.AUDIT_LOG_DIR)) : null,
    validatorConfig: { ...DEFAULT_VALIDATOR_CONFIG, bidCeilingRatio: env.BID_CEILING_RATIO },
  });

  try {
    const decision = await advisor.selectStrategy(parsed.data);
    console.log(JSON.stringify(decision, null, 2));
  } finally {
    await db?.$client.end();
  }
}

main().catch(error => {
  logger.error("Fatal error", error);
  process.exit(1);
});

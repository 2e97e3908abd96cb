/**
 * Strategy Oracle - LLM Integration
 *
 * - OpenAI-compatible chat model via the AI SDK (OPENAI_BASE_URL may point at OpenRouter)
 * - Transport errors and per-attempt timeouts are retried with exponential backoff
 * - Malformed output fails immediately; the pipeline then falls back to rules
 */

import { createOpenAI } from "@ai-sdk/openai";
import { generateText } from "ai";
import { ResultAsync } from "neverthrow";

import { DEFAULT_VALIDATOR_CONFIG } from "@bid-advisor/core";
import type { StrategyDecision } from "@bid-advisor/core";
import { logger, retryWithBackoff } from "@bid-advisor/utils";
import type { RetryConfig } from "@bid-advisor/utils";

import type { OracleRequest, StrategyOracle, StrategyOracleError } from "../types";
import { parseOracleResponse } from "./llm-output-parser";
import { buildSystemPrompt, buildUserPrompt } from "./prompt-builder";

const log = logger.child("oracle");

export const DEFAULT_ATTEMPT_TIMEOUT_MS = 30_000;

export interface LlmStrategyOracleOptions {
  model: string;
  apiKey?: string;
  baseURL?: string;
  /** Bid ceiling shown to the model, as a fraction of estimated value */
  ceilingRatio?: number;
  retry?: Partial<RetryConfig>;
  attemptTimeoutMs?: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

function toCallError(e: unknown): StrategyOracleError {
  if (e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError")) {
    return { type: "TIMEOUT", message: e.message };
  }
  return { type: "LLM_API_ERROR", message: e instanceof Error ? e.message : "Unknown error" };
}

export function createLlmStrategyOracle(options: LlmStrategyOracleOptions): StrategyOracle {
  const provider = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  const ceilingRatio = options.ceilingRatio ?? DEFAULT_VALIDATOR_CONFIG.bidCeilingRatio;
  const attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;

  return {
    propose(request: OracleRequest): ResultAsync<StrategyDecision, StrategyOracleError> {
      const system = buildSystemPrompt(ceilingRatio);
      const prompt = buildUserPrompt(request, ceilingRatio);
      log.debug("Oracle prompt", { domain: request.context.domain, prompt });

      const callOnce = (): ResultAsync<StrategyDecision, StrategyOracleError> =>
        ResultAsync.fromPromise(
          generateText({
            model: provider.chat(options.model),
            system,
            prompt,
            temperature: 0.1,
            maxOutputTokens: 2000,
            // Retries are ours
            maxRetries: 0,
            abortSignal: AbortSignal.timeout(attemptTimeoutMs),
          }),
          toCallError,
        ).andThen(({ text }) => {
          log.debug("Oracle response", { domain: request.context.domain, text });
          return parseOracleResponse(text);
        });

      return retryWithBackoff(callOnce, {
        name: "strategy-oracle",
        config: options.retry,
        isRetryable: e => e.type !== "INVALID_RESPONSE",
        sleep: options.sleep,
      }).mapErr(
        (e): StrategyOracleError => ({
          ...e.lastError,
          message: `${e.message}: ${e.lastError.message}`,
        }),
      );
    },
  };
}

/**
 * LLM output parsing (pure functions).
 *
 * - Best-effort: strip Markdown fences around the answer
 * - Extract the first balanced JSON object from arbitrary text
 * - Validate it against OracleResponseSchema and map it to a StrategyDecision
 */

import { Result, err, ok } from "neverthrow";

import type { StrategyDecision } from "@bid-advisor/core";

import { OracleResponseSchema, toStrategyDecision } from "../types/schemas";

export type OutputParseError = { type: "INVALID_RESPONSE"; message: string };

export function extractFirstJsonObject(text: string): string | null {
  const withoutFences = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/i, "")
    .trim();

  const start = withoutFences.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < withoutFences.length; i++) {
    const ch = withoutFences[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === "\\") {
        escape = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return withoutFences.slice(start, i + 1);
    }
  }

  return null;
}

export function snippet(text: string, max = 160): string {
  const oneLine = text.replace(/\s+/g, " ").trim();
  return oneLine.length > max ? `${oneLine.slice(0, max - 3)}...` : oneLine;
}

const parseJson = Result.fromThrowable(
  (json: string): unknown => JSON.parse(json),
  e => (e instanceof Error ? e.message : "unknown"),
);

/**
 * Raw model text → StrategyDecision
 */
export function parseOracleResponse(text: string): Result<StrategyDecision, OutputParseError> {
  const jsonText = extractFirstJsonObject(text);
  if (!jsonText) {
    return err({
      type: "INVALID_RESPONSE",
      message: `JSON Parse error: could not find JSON object. got="${snippet(text)}"`,
    });
  }

  const parsedJson = parseJson(jsonText);
  if (parsedJson.isErr()) {
    return err({
      type: "INVALID_RESPONSE",
      message: `JSON Parse error: ${parsedJson.error}; got="${snippet(text)}"`,
    });
  }

  const parsed = OracleResponseSchema.safeParse(parsedJson.value);
  if (!parsed.success) {
    return err({
      type: "INVALID_RESPONSE",
      message: `Invalid response JSON: ${parsed.error.issues
        .map(i => `${i.path.join(".") || "<root>"}: ${i.message}`)
        .join("; ")}`,
    });
  }

  return ok(toStrategyDecision(parsed.data));
}

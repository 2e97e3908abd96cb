import { describe, expect, it } from "vitest";

import { extractFirstJsonObject, parseOracleResponse, snippet } from "../src/services/llm-output-parser";

const validResponse = {
  strategy: "proxy_max",
  recommended_bid_amount: 800,
  confidence: 0.75,
  risk_level: "medium",
  reasoning: "Proxy at the safe maximum.",
};

describe("extractFirstJsonObject", () => {
  it("extracts JSON from fenced output", () => {
    expect(extractFirstJsonObject('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("extracts the first JSON object from noisy output", () => {
    expect(extractFirstJsonObject('note:\n{"a": {"b": 2}} trailing {"c": 3}')).toBe('{"a": {"b": 2}}');
  });

  it("ignores braces inside strings", () => {
    expect(extractFirstJsonObject('{"reasoning": "use } carefully \\" {"}')).toBe(
      '{"reasoning": "use } carefully \\" {"}',
    );
  });

  it("returns null without an object", () => {
    expect(extractFirstJsonObject("no json here")).toBeNull();
    expect(extractFirstJsonObject('{"unterminated": 1')).toBeNull();
  });
});

describe("snippet", () => {
  it("collapses whitespace and truncates", () => {
    expect(snippet("a\n\n  b")).toBe("a b");
    expect(snippet("x".repeat(20), 10)).toBe("xxxxxxx...");
  });
});

describe("parseOracleResponse", () => {
  it("maps snake_case output to a strategy decision with defaults", () => {
    const result = parseOracleResponse(`Here you go:\n${JSON.stringify(validResponse)}`);

    expect(result._unsafeUnwrap()).toEqual({
      strategy: "proxy_max",
      recommendedBidAmount: 800,
      confidence: 0.75,
      riskLevel: "medium",
      reasoning: "Proxy at the safe maximum.",
      shouldIncreaseProxy: null,
      nextBidAmount: null,
      maxBudgetForDomain: 800,
    });
  });

  it("keeps proxy fields the model provides", () => {
    const result = parseOracleResponse(
      JSON.stringify({ ...validResponse, should_increase_proxy: true, next_bid_amount: 305, max_budget_for_domain: 900 }),
    );

    const decision = result._unsafeUnwrap();
    expect(decision.shouldIncreaseProxy).toBe(true);
    expect(decision.nextBidAmount).toBe(305);
    expect(decision.maxBudgetForDomain).toBe(900);
  });

  it("fails when no object is present", () => {
    const result = parseOracleResponse("I cannot help with that");

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_RESPONSE",
      message: 'JSON Parse error: could not find JSON object. got="I cannot help with that"',
    });
  });

  it("fails on malformed JSON", () => {
    const result = parseOracleResponse('{"strategy": proxy_max}');

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe("INVALID_RESPONSE");
    expect(error.message).toMatch(/^JSON Parse error: .+; got="\{"strategy": proxy_max\}"$/);
  });

  it("fails on schema violations with the offending path", () => {
    const { recommended_bid_amount: _omitted, ...rest } = validResponse;
    const result = parseOracleResponse(JSON.stringify({ ...rest, strategy: "bid_everything" }));

    const error = result._unsafeUnwrapErr();
    expect(error.message).toMatch(/^Invalid response JSON: strategy: .+; recommended_bid_amount: /);
  });
});

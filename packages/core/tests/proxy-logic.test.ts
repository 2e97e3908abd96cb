/**
 * Proxy Logic Unit Tests
 */

import { describe, expect, test } from "vitest";

import { analyzeProxy, applyProxyDecision, runProxyLogic } from "../src/proxy-logic";
import type { AuctionContext, StrategyDecision } from "../src/types";

const createContext = (overrides: Partial<AuctionContext> = {}): AuctionContext => ({
  domain: "example.com",
  platform: "godaddy",
  estimatedValue: 800,
  currentBid: 300,
  numBidders: 2,
  hoursRemaining: 5,
  yourCurrentProxy: 0,
  budgetAvailable: 5000,
  bidderAnalysis: { botDetected: false, corporateBuyer: false, aggressionScore: 5, reactionTimeAvgSeconds: 30 },
  ...overrides,
});

const createDecision = (overrides: Partial<StrategyDecision> = {}): StrategyDecision => ({
  strategy: "proxy_max",
  recommendedBidAmount: 700,
  confidence: 0.75,
  riskLevel: "medium",
  reasoning: "Proxy at the safe maximum.",
  shouldIncreaseProxy: null,
  nextBidAmount: null,
  maxBudgetForDomain: 700,
  ...overrides,
});

describe("analyzeProxy", () => {
  test("sets up an initial proxy when none exists", () => {
    const proxy = analyzeProxy(createContext());

    expect(proxy.proxyAction).toBe("increase_proxy");
    expect(proxy.shouldIncreaseProxy).toBe(true);
    expect(proxy.newProxyMax).toBe(800);
    expect(proxy.nextBidAmount).toBe(305);
    expect(proxy.maxBudgetForDomain).toBe(800);
    expect(proxy.safeMax).toBe(800);
    expect(proxy.explanation.startsWith("INITIAL PROXY SETUP:")).toBe(true);
  });

  test("caps the initial proxy at the available budget", () => {
    const proxy = analyzeProxy(createContext({ budgetAvailable: 400 }));

    expect(proxy.newProxyMax).toBe(400);
    expect(proxy.maxBudgetForDomain).toBe(400);
  });

  test("accepts the loss once the current bid reaches the value", () => {
    const proxy = analyzeProxy(createContext({ currentBid: 800 }));

    expect(proxy).toMatchObject({
      proxyAction: "accept_loss",
      shouldIncreaseProxy: false,
      newProxyMax: null,
      nextBidAmount: null,
      maxBudgetForDomain: 0,
    });
    expect(proxy.explanation.startsWith("PROFIT IMPOSSIBLE:")).toBe(true);
  });

  test("raises a standing proxy with enough headroom", () => {
    const proxy = analyzeProxy(createContext({ currentBid: 600, yourCurrentProxy: 700 }));

    expect(proxy.proxyAction).toBe("increase_proxy");
    expect(proxy.newProxyMax).toBe(800);
    expect(proxy.nextBidAmount).toBe(605);
  });

  test("raises when headroom is exactly three increments", () => {
    const proxy = analyzeProxy(createContext({ currentBid: 600, yourCurrentProxy: 785 }));

    expect(proxy.proxyAction).toBe("increase_proxy");
  });

  test("maintains a proxy that is already close to the ceiling", () => {
    const proxy = analyzeProxy(createContext({ currentBid: 600, yourCurrentProxy: 790 }));

    expect(proxy).toMatchObject({
      proxyAction: "maintain_proxy",
      shouldIncreaseProxy: false,
      newProxyMax: null,
      nextBidAmount: null,
      maxBudgetForDomain: 790,
    });
  });

  test("uses the dynadot proportional increment", () => {
    const proxy = analyzeProxy(createContext({ platform: "dynadot", currentBid: 200 }));

    expect(proxy.nextBidAmount).toBe(210);
  });
});

describe("analyzeProxy for do_not_bid", () => {
  test("keeps the standing proxy and frees the budget", () => {
    const proxy = analyzeProxy(createContext({ yourCurrentProxy: 400 }), "do_not_bid");

    expect(proxy).toEqual({
      currentProxy: 400,
      currentBid: 300,
      safeMax: 800,
      shouldIncreaseProxy: false,
      newProxyMax: null,
      nextBidAmount: null,
      maxBudgetForDomain: 0,
      proxyAction: "maintain_proxy",
      explanation: "NO BID: Strategy is do_not_bid; standing proxy $400.00 left unchanged.",
    });
  });

  test("does not set up an initial proxy", () => {
    const { decision, proxy } = runProxyLogic(
      createDecision({ strategy: "do_not_bid", recommendedBidAmount: 0, maxBudgetForDomain: 0 }),
      createContext(),
    );

    expect(proxy.proxyAction).toBe("maintain_proxy");
    expect(decision.shouldIncreaseProxy).toBe(false);
    expect(decision.nextBidAmount).toBeNull();
    expect(decision.maxBudgetForDomain).toBe(0);
  });

  test("still reports accept_loss once the value is reached", () => {
    expect(analyzeProxy(createContext({ currentBid: 800 }), "do_not_bid").proxyAction).toBe("accept_loss");
  });
});

describe("applyProxyDecision", () => {
  test("copies proxy sizing into the strategy", () => {
    const proxy = analyzeProxy(createContext());
    const merged = applyProxyDecision(createDecision(), proxy);

    expect(merged).toEqual({
      ...createDecision(),
      shouldIncreaseProxy: true,
      nextBidAmount: 305,
      maxBudgetForDomain: 800,
    });
  });

  test("overrides any strategy to do_not_bid on accept_loss", () => {
    const proxy = analyzeProxy(createContext({ currentBid: 900 }));
    const merged = applyProxyDecision(createDecision(), proxy);

    expect(merged.strategy).toBe("do_not_bid");
    expect(merged.recommendedBidAmount).toBe(0);
    expect(merged.confidence).toBe(0.5);
    expect(merged.riskLevel).toBe("high");
    expect(merged.reasoning).toBe(`Proxy at the safe maximum. PROXY ANALYSIS OVERRIDE: ${proxy.explanation}`);
  });

  test("keeps a lower confidence on accept_loss", () => {
    const proxy = analyzeProxy(createContext({ currentBid: 900 }));

    expect(applyProxyDecision(createDecision({ confidence: 0.3 }), proxy).confidence).toBe(0.3);
  });
});

describe("runProxyLogic", () => {
  test("returns both the merged decision and the proxy analysis", () => {
    const { decision, proxy } = runProxyLogic(createDecision(), createContext({ yourCurrentProxy: 790, currentBid: 600 }));

    expect(proxy.proxyAction).toBe("maintain_proxy");
    expect(decision.shouldIncreaseProxy).toBe(false);
    expect(decision.maxBudgetForDomain).toBe(790);
  });
});

/**
 * File Market Intelligence Source Unit Tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, describe, expect, it } from "vitest";

import { createFileMarketIntelligenceSource } from "../src/file/market-intelligence-source";

const FIXTURE_DIR = fileURLToPath(new URL("./fixtures/market-intelligence", import.meta.url));

describe("createFileMarketIntelligenceSource", () => {
  let tempDir: string | null = null;

  afterEach(async () => {
    if (tempDir) await rm(tempDir, { recursive: true, force: true });
    tempDir = null;
  });

  it("loads and validates all three tables", async () => {
    const result = await createFileMarketIntelligenceSource(FIXTURE_DIR).load();

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.bidderProfiles).toHaveLength(2);
      expect(result.value.bidderProfiles[1]?.avgReactionTime).toBeNull();
      expect(result.value.domainStats.map(d => d.domain)).toEqual(["sample.com", "sample.io"]);
      expect(result.value.auctionArchetypes[0]?.durationSec).toBe(86400);
    }
  });

  it("returns the cached tables on later loads", async () => {
    const source = createFileMarketIntelligenceSource(FIXTURE_DIR);
    const first = await source.load();
    const second = await source.load();

    expect(first._unsafeUnwrap()).toBe(second._unsafeUnwrap());
  });

  it("reports a missing file", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "market-intel-"));
    const result = await createFileMarketIntelligenceSource(tempDir).load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("READ_FAILED");
    }
  });

  it("reports rows that fail validation", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "market-intel-"));
    await writeFile(join(tempDir, "bidder-profiles.json"), "[]");
    await writeFile(join(tempDir, "domain-stats.json"), JSON.stringify([{ domain: "x.com", avgFinalPrice: -1 }]));
    await writeFile(join(tempDir, "auction-archetypes.json"), "[]");

    const result = await createFileMarketIntelligenceSource(tempDir).load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("INVALID_DATA");
      expect(result.error.file).toBe(join(tempDir, "domain-stats.json"));
    }
  });

  it("reports malformed JSON", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "market-intel-"));
    await writeFile(join(tempDir, "bidder-profiles.json"), "{not json");
    await writeFile(join(tempDir, "domain-stats.json"), "[]");
    await writeFile(join(tempDir, "auction-archetypes.json"), "[]");

    const result = await createFileMarketIntelligenceSource(tempDir).load();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("INVALID_DATA");
      expect(result.error.message.startsWith("JSON Parse error:")).toBe(true);
    }
  });
});

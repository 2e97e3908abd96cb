/**
 * Decision Audit Sink Port
 *
 * - Write one JSON record per final decision to <auditDir>/decisions/
 * - sha256 of the record (without the integrity field) is embedded and returned
 * - Filename: decision-<domain>-<utc-iso>-<decision-id>.json
 */

import { createHash } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ResultAsync } from "neverthrow";

import type { AuctionContext, FinalDecision, PipelineStage, ValidationResult } from "@bid-advisor/core";

export type AuditSinkError = { type: "MKDIR_FAILED"; message: string } | { type: "WRITE_FAILED"; message: string };

export interface DecisionAuditRecord {
  decisionId: string;
  timestamp: string;
  context: AuctionContext;
  decision: FinalDecision;
  /** Stages the pipeline went through, in order */
  stages: PipelineStage[];
  validation: ValidationResult | null;
  oracleFailure: string | null;
}

export interface DecisionAuditSinkPort {
  write(record: DecisionAuditRecord): ResultAsync<{ path: string; sha256: string }, AuditSinkError>;
}

export function generateAuditFilename(domain: string, timestamp: string, decisionId: string): string {
  const utcIso = timestamp.replace(/[:.]/g, "-");
  const safeDomain = domain.toLowerCase().replace(/[^a-z0-9-]/g, "-");
  return `decision-${safeDomain}-${utcIso}-${decisionId}.json`;
}

export function calculateSha256(content: string): string {
  return createHash("sha256").update(content, "utf-8").digest("hex");
}

const toMessage = (error: unknown): string => (error instanceof Error ? error.message : "Unknown error");

export function createDecisionAuditSink(auditDir: string): DecisionAuditSinkPort {
  const decisionsDir = join(auditDir, "decisions");

  return {
    write(record: DecisionAuditRecord): ResultAsync<{ path: string; sha256: string }, AuditSinkError> {
      const filePath = join(decisionsDir, generateAuditFilename(record.context.domain, record.timestamp, record.decisionId));

      const sha256 = calculateSha256(JSON.stringify(record, null, 2));
      const finalJson = JSON.stringify({ ...record, integrity: { sha256 } }, null, 2);

      return ResultAsync.fromPromise(
        mkdir(decisionsDir, { recursive: true }),
        (error): AuditSinkError => ({ type: "MKDIR_FAILED", message: toMessage(error) }),
      ).andThen(() =>
        ResultAsync.fromPromise(
          writeFile(filePath, finalJson, "utf-8"),
          (error): AuditSinkError => ({ type: "WRITE_FAILED", message: toMessage(error) }),
        ).map(() => ({ path: filePath, sha256 })),
      );
    },
  };
}

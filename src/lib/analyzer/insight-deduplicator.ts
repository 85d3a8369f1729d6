/**
 * Insight Deduplicator
 *
 * Merges the findings of a run against the injected insight store. Exact
 * signature matches are recurring; otherwise the similarity gate compares the
 * finding's subject against entries of the same kind, type and scope that an
 * earlier run created, before a new entry is created.
 *
 * @module analyzer/insight-deduplicator
 */

import { createHash } from "node:crypto";
import type { InsightStore } from "./insight-store";
import type { SimilarityGate, SimilarityPair } from "./similarity-gate";
import type { Contradiction, Gap, InsightOutcome, InsightRecord } from "./types";

// ============================================================================
// SIGNATURES
// ============================================================================

export function normalizeInsightText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * `<kind>:<type>:<first 16 hex chars of sha256(normalized description)>`
 */
export function computeSignature(record: Pick<InsightRecord, "kind" | "type" | "description">): string {
  const digest = createHash("sha256").update(normalizeInsightText(record.description)).digest("hex").slice(0, 16);
  return `${record.kind}:${normalizeInsightText(record.type).replace(/ /g, "-")}:${digest}`;
}

// ============================================================================
// FINDING -> RECORD
// ============================================================================

/**
 * Service key without its category prefix, so services sharing a category are
 * compared on their own names.
 */
export function serviceSubject(serviceKey: string, category: string): string {
  const prefix = `${category.toLowerCase()}_`;
  const body = serviceKey.startsWith(prefix) && serviceKey.length > prefix.length ? serviceKey.slice(prefix.length) : serviceKey;
  return body.replace(/_/g, " ");
}

export function contradictionRecord(contradiction: Contradiction): InsightRecord {
  return {
    kind: "contradiction",
    type: contradiction.type,
    scope: contradiction.unit ?? "",
    subject: serviceSubject(contradiction.service_key, contradiction.category),
    description: `${contradiction.service_key}|${contradiction.unit ?? ""}|${contradiction.details}`,
    finding: {
      service_key: contradiction.service_key,
      unit: contradiction.unit,
      details: contradiction.details,
      severity: contradiction.severity,
      left_page: contradiction.left.page,
      right_page: contradiction.right.page,
    },
  };
}

export function gapRecord(gap: Gap): InsightRecord {
  return {
    kind: "gap",
    type: gap.status,
    scope: gap.risk_level,
    subject: gap.condition,
    description: `${gap.condition}|${gap.status}`,
    finding: {
      condition: gap.condition,
      status: gap.status,
      risk_level: gap.risk_level,
      match_count: gap.match_count,
    },
  };
}

// ============================================================================
// DEDUPLICATOR
// ============================================================================

export class InsightDeduplicator {
  constructor(
    private readonly store: InsightStore,
    private readonly gate: SimilarityGate | null = null,
  ) {}

  private async findNearDuplicate(signature: string, record: InsightRecord, runId: string): Promise<string | null> {
    if (!this.gate) return null;

    // Entries first seen in this run are findings the resolver already kept apart
    const candidates = this.store
      .entries({ kind: record.kind, type: record.type })
      .filter(
        (e) =>
          e.canonical_signature !== signature &&
          e.first_seen_run_id !== runId &&
          e.representative_record.scope === record.scope,
      )
      .sort((a, b) => a.canonical_signature.localeCompare(b.canonical_signature));
    if (candidates.length === 0) return null;

    const pairs: SimilarityPair[] = candidates.map((e) => ({
      id: e.canonical_signature,
      textA: record.subject,
      textB: e.representative_record.subject,
    }));
    const scores = await this.gate.scorePairs(pairs);

    let best: { id: string; score: number } | null = null;
    for (const pair of pairs) {
      const score = scores.get(pair.id) ?? 0;
      if (score >= this.gate.threshold && (!best || score > best.score)) {
        best = { id: pair.id, score };
      }
    }
    return best?.id ?? null;
  }

  async processOne(record: InsightRecord, runId: string): Promise<InsightOutcome> {
    const signature = computeSignature(record);

    if (this.store.has(signature)) {
      const entry = this.store.append(signature, record, runId);
      return { signature, status: "recurring", occurrence_count: entry.occurrence_count };
    }

    const target = await this.findNearDuplicate(signature, record, runId);
    if (target) {
      const entry = this.store.append(target, record, runId);
      return { signature, status: "recurring", occurrence_count: entry.occurrence_count, merged_into: target };
    }

    const entry = this.store.append(signature, record, runId);
    return { signature, status: "new", occurrence_count: entry.occurrence_count };
  }

  /** Processes records in order; earlier records of the same run are visible to later ones. */
  async process(records: InsightRecord[], runId: string): Promise<InsightOutcome[]> {
    await this.store.load();
    const outcomes: InsightOutcome[] = [];
    for (const record of records) {
      outcomes.push(await this.processOne(record, runId));
    }

    const recurring = outcomes.filter((o) => o.status === "recurring").length;
    const merged = outcomes.filter((o) => o.merged_into).length;
    console.log(
      `[Deduplicator] ${outcomes.length} finding(s): ${outcomes.length - recurring} new, ${recurring} recurring (${merged} near-duplicate)`,
    );
    return outcomes;
  }
}

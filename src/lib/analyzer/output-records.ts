/**
 * Output record sets: flat contradiction and gap rows, each carrying the
 * insight status assigned by the deduplicator.
 *
 * @module analyzer/output-records
 */

import type { Contradiction, ConfidenceTier, Gap, GapStatus, InsightOutcome, InsightStatus, RiskLevel, Severity } from "./types";

export type ContradictionRow = {
  service_key: string;
  type: Contradiction["type"];
  unit: string | null;
  details: string;
  left_page: number;
  left_snippet: string;
  right_page: number;
  right_snippet: string;
  severity: Severity;
  confidence: number;
  confidence_tier: ConfidenceTier;
  origin: Contradiction["origin"];
  insight_status: InsightStatus | null;
  occurrence_count: number | null;
};

export type GapRow = {
  condition: string;
  status: GapStatus;
  /** Keywords joined with "; " */
  expected_keywords: string;
  evidence: string;
  risk_level: RiskLevel;
  confidence_tier: ConfidenceTier;
  match_count: number;
  insight_status: InsightStatus | null;
  occurrence_count: number | null;
};

export function toContradictionRow(contradiction: Contradiction, outcome?: InsightOutcome): ContradictionRow {
  return {
    service_key: contradiction.service_key,
    type: contradiction.type,
    unit: contradiction.unit,
    details: contradiction.details,
    left_page: contradiction.left.page,
    left_snippet: contradiction.left.snippet,
    right_page: contradiction.right.page,
    right_snippet: contradiction.right.snippet,
    severity: contradiction.severity,
    confidence: contradiction.confidence,
    confidence_tier: contradiction.confidence_tier,
    origin: contradiction.origin,
    insight_status: outcome?.status ?? null,
    occurrence_count: outcome?.occurrence_count ?? null,
  };
}

export function toGapRow(gap: Gap, outcome?: InsightOutcome): GapRow {
  return {
    condition: gap.condition,
    status: gap.status,
    expected_keywords: gap.expected_keywords.join("; "),
    evidence: gap.evidence,
    risk_level: gap.risk_level,
    confidence_tier: gap.confidence_tier,
    match_count: gap.match_count,
    insight_status: outcome?.status ?? null,
    occurrence_count: outcome?.occurrence_count ?? null,
  };
}

const SEVERITY_RANK: Record<Severity, number> = { HIGH: 0, MEDIUM: 1 };
const RISK_RANK: Record<RiskLevel, number> = { HIGH: 0, MEDIUM: 1, LOW: 2 };
const STATUS_RANK: Record<GapStatus, number> = { NO_COVERAGE_FOUND: 0, MINIMAL_COVERAGE: 1, ADEQUATE: 2 };

/** HIGH severity first, then by service key, type and left page. */
export function sortContradictionRows(rows: ContradictionRow[]): ContradictionRow[] {
  return [...rows].sort(
    (a, b) =>
      SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] ||
      a.service_key.localeCompare(b.service_key) ||
      a.type.localeCompare(b.type) ||
      (a.unit ?? "").localeCompare(b.unit ?? "") ||
      a.left_page - b.left_page,
  );
}

/** Missing coverage first, then by risk level and condition name. */
export function sortGapRows(rows: GapRow[]): GapRow[] {
  return [...rows].sort(
    (a, b) =>
      STATUS_RANK[a.status] - STATUS_RANK[b.status] ||
      RISK_RANK[a.risk_level] - RISK_RANK[b.risk_level] ||
      a.condition.localeCompare(b.condition),
  );
}

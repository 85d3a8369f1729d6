/**
 * Policy Analyzer - Type Definitions
 *
 * Rule, finding and insight types shared across the analyzer modules.
 *
 * @module analyzer/types
 */

import { z } from "zod";
import type { ConfidenceTier, RiskLevel } from "../config-schemas";

export type { ConfidenceTier, RiskLevel } from "../config-schemas";

// ============================================================================
// RAW INPUT
// ============================================================================

/**
 * One extracted rule line/row as handed over by the extraction subsystem.
 * `page_index` is the 1-based page the line was found on.
 */
export const RawRuleRecordSchema = z.object({
  raw_text: z.string(),
  page_index: z.number().int().min(1),
  service: z.string().optional(),
  category: z.string().optional(),
  candidate_amounts: z.array(z.string()).optional(),
  candidate_units: z.array(z.string()).optional(),
  candidate_facility_mentions: z.array(z.string()).optional(),
  candidate_limit_phrases: z.array(z.string()).optional(),
});

export type RawRuleRecord = z.infer<typeof RawRuleRecordSchema>;

// ============================================================================
// CANONICAL RULE
// ============================================================================

export const TARIFF_UNITS = [
  "per_session",
  "per_visit",
  "per_day",
  "per_month",
  "per_year",
  "per_procedure",
  "per_consultation",
  "per_scan",
  "per_delivery",
  "unspecified",
] as const;

export type TariffUnit = (typeof TARIFF_UNITS)[number];

export const LIMIT_TYPES = ["per_week", "per_month", "per_year", "max_total", "max_days"] as const;

export type LimitType = (typeof LIMIT_TYPES)[number];

export type CoverageStatus = "included" | "excluded";

export type CoverageCondition =
  | "pre_authorization_required"
  | "referral_required"
  | "copay_applicable"
  | "prior_approval";

export interface Rule {
  id: string;
  service: string;
  service_key: string;
  category: string;
  /** null means unspecified */
  tariff_value: number | null;
  tariff_unit: TariffUnit;
  coverage_status: CoverageStatus;
  coverage_conditions: CoverageCondition[];
  facility_levels: number[];
  limits: Partial<Record<LimitType, number>>;
  source_page: number;
  evidence_snippet: string;
  extraction_confidence: ConfidenceTier;
}

// ============================================================================
// FINDINGS
// ============================================================================

export type ContradictionType = "Tariff" | "Limit" | "Coverage" | "Facility-exclusion";

export type Severity = "HIGH" | "MEDIUM";

export type FindingOrigin = "deterministic" | "collaborator";

export interface EvidenceRef {
  page: number;
  snippet: string;
  rule_id: string;
}

export interface Contradiction {
  type: ContradictionType;
  service_key: string;
  category: string;
  /** Tariff unit for Tariff findings, limit type for Limit findings */
  unit: string | null;
  details: string;
  left: EvidenceRef;
  right: EvidenceRef;
  severity: Severity;
  /** 0..1 */
  confidence: number;
  confidence_tier: ConfidenceTier;
  /** Rules that share the conflicting group, both sides included */
  supporting_rule_ids: string[];
  origin: FindingOrigin;
}

/** A contradiction proposed by the collaborator, referencing rules by id */
export interface CandidateContradiction {
  type: ContradictionType;
  left_rule_id: string;
  right_rule_id: string;
  details: string;
  severity?: Severity;
}

export type GapStatus = "NO_COVERAGE_FOUND" | "MINIMAL_COVERAGE" | "ADEQUATE";

export type KeywordMatchKind = "substring" | "fuzzy";

export interface GapMatch {
  rule_id: string;
  page: number;
  snippet: string;
  keyword: string;
  match_kind: KeywordMatchKind;
}

export interface Gap {
  condition: string;
  expected_keywords: string[];
  status: GapStatus;
  risk_level: RiskLevel;
  match_count: number;
  matches: GapMatch[];
  evidence: string;
  confidence_tier: ConfidenceTier;
}

// ============================================================================
// INSIGHTS
// ============================================================================

export type InsightKind = "contradiction" | "gap";

export type InsightStatus = "new" | "recurring";

export interface InsightRecord {
  kind: InsightKind;
  type: string;
  /** Findings only merge with entries of the same kind, type and scope */
  scope: string;
  /** Text the similarity gate compares (service key or condition name) */
  subject: string;
  /** Text the signature is derived from */
  description: string;
  finding: Record<string, unknown>;
}

export interface InsightEntry {
  canonical_signature: string;
  occurrence_count: number;
  first_seen_run_id: string;
  representative_record: InsightRecord;
}

/** One completed run in the store's history */
export interface RunRecord {
  run_id: string;
  started_at: string;
  /** Sightings appended during the run */
  sightings: number;
  /** Signatures the run created */
  new_insights: number;
}

/** Everything a backend reads and writes in one step */
export interface InsightSnapshot {
  entries: InsightEntry[];
  total_runs: number;
  runs: RunRecord[];
}

export interface InsightSummary {
  total_runs: number;
  unique_insights: number;
  total_sightings: number;
  contradictions: number;
  gaps: number;
  high_severity_contradictions: number;
  high_risk_gaps: number;
  latest_run: RunRecord | null;
  /** Most recently discovered entry, by the run that first saw it */
  latest_discovery: InsightEntry | null;
}

export interface InsightOutcome {
  signature: string;
  status: InsightStatus;
  occurrence_count: number;
  /** Set when a near-duplicate was merged into an existing entry */
  merged_into?: string;
}

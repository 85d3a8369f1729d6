/**
 * Contradiction Detector
 *
 * Four independent sub-detectors over grouped rules:
 * - Tariff: (service_key, tariff_unit) groups whose extreme values differ by more
 *   than the variance threshold. Different units are never compared.
 * - Limit: (service_key, limit_type) groups with differing values.
 * - Coverage: a service_key with both included and excluded rules.
 * - Facility-exclusion: one finding per level that is both excluded and included.
 *
 * Each group yields at most one finding (per level for facility exclusions).
 *
 * @module analyzer/contradiction-detector
 */

import type { AnalysisConfig } from "../config-schemas";
import { EvidenceIntegrityError } from "../errors";
import { ConfidenceScorer } from "./confidence-scorer";
import { LIMIT_TYPES } from "./types";
import type {
  CandidateContradiction,
  Contradiction,
  ContradictionType,
  EvidenceRef,
  LimitType,
  Rule,
  Severity,
} from "./types";

// ============================================================================
// CONSTRUCTION
// ============================================================================

export type ContradictionDraft = Omit<Contradiction, "confidence" | "confidence_tier"> & {
  confidence?: number;
  confidence_tier?: Contradiction["confidence_tier"];
};

function assertEvidence(side: "left" | "right", evidence: EvidenceRef | undefined): EvidenceRef {
  if (!evidence) {
    throw new EvidenceIntegrityError(`Missing ${side} evidence`, side);
  }
  if (!Number.isInteger(evidence.page) || evidence.page < 1) {
    throw new EvidenceIntegrityError(`Invalid ${side} evidence page: ${evidence.page}`, side);
  }
  if (typeof evidence.snippet !== "string" || evidence.snippet.trim().length === 0) {
    throw new EvidenceIntegrityError(`Empty ${side} evidence snippet`, side);
  }
  return { ...evidence, snippet: evidence.snippet.trim() };
}

/**
 * Build a contradiction, rejecting it when either side lacks a page or snippet.
 */
export function createContradiction(draft: ContradictionDraft): Contradiction {
  const left = assertEvidence("left", draft.left);
  const right = assertEvidence("right", draft.right);
  const confidence = draft.confidence ?? 0;
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new RangeError(`Contradiction confidence must be within [0, 1], got ${confidence}`);
  }
  return {
    ...draft,
    left,
    right,
    confidence,
    confidence_tier: draft.confidence_tier ?? "LOW",
  };
}

// ============================================================================
// HELPERS
// ============================================================================

export interface IndexedRule {
  rule: Rule;
  index: number;
}

function toEvidence(rule: Rule): EvidenceRef {
  return { page: rule.source_page, snippet: rule.evidence_snippet, rule_id: rule.id };
}

function byPageThenIndex(a: IndexedRule, b: IndexedRule): number {
  return a.rule.source_page - b.rule.source_page || a.index - b.index;
}

function groupBy<K extends string>(items: IndexedRule[], keyOf: (r: Rule) => K | null): Map<K, IndexedRule[]> {
  const groups = new Map<K, IndexedRule[]>();
  for (const item of items) {
    const key = keyOf(item.rule);
    if (key === null) continue;
    const group = groups.get(key) ?? [];
    group.push(item);
    groups.set(key, group);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function relativeVariance(min: number, max: number): number {
  if (max === min) return 0;
  if (min <= 0) return Number.POSITIVE_INFINITY;
  return (max - min) / min;
}

function formatVariance(variance: number): string {
  return Number.isFinite(variance) ? `${(variance * 100).toFixed(1)}% variance` : "minimum is zero";
}

export function formatKes(value: number): string {
  return `KES ${value.toLocaleString("en-US", { maximumFractionDigits: 2 })}`;
}

/** First rule holding the minimum and first holding the maximum, in input order */
function extremes(group: IndexedRule[], valueOf: (r: Rule) => number): { min: IndexedRule; max: IndexedRule } {
  let min = group[0];
  let max = group[0];
  for (const item of group) {
    if (valueOf(item.rule) < valueOf(min.rule)) min = item;
    if (valueOf(item.rule) > valueOf(max.rule)) max = item;
  }
  return { min, max };
}

// ============================================================================
// DETECTOR
// ============================================================================

export interface DetectionResult {
  contradictions: Contradiction[];
  /** Findings dropped because of an evidence-integrity violation */
  rejected: number;
}

export interface DetectionOptions {
  /** Collaborator agreement per rule id */
  agreements?: Map<string, number>;
}

export class ContradictionDetector {
  private readonly clinicalRisk: Set<string>;
  private readonly scorer: ConfidenceScorer;

  constructor(
    private readonly config: Pick<AnalysisConfig, "contradictions" | "confidence">,
    scorer?: ConfidenceScorer,
  ) {
    this.clinicalRisk = new Set(config.contradictions.clinicalRiskCategories.map((c) => c.toUpperCase()));
    this.scorer = scorer ?? new ConfidenceScorer(config.confidence);
  }

  isClinicalRisk(category: string): boolean {
    return this.clinicalRisk.has(category.toUpperCase());
  }

  private varianceSeverity(variance: number, category: string): Severity {
    if (variance >= this.config.contradictions.highSeverityVariance) return "HIGH";
    return this.isClinicalRisk(category) ? "HIGH" : "MEDIUM";
  }

  /**
   * Score and construct. Evidence-integrity violations are logged and counted, never emitted.
   */
  finalize(
    draft: ContradictionDraft,
    leftRule: Rule,
    rightRule: Rule,
    options: DetectionOptions,
    sink: DetectionResult,
  ): void {
    const agreementScores = [leftRule.id, rightRule.id]
      .map((id) => options.agreements?.get(id))
      .filter((s): s is number => s !== undefined);

    const breakdown = this.scorer.score({
      patternTiers: [leftRule.extraction_confidence, rightRule.extraction_confidence],
      corroboratingSnippets: new Set(draft.supporting_rule_ids).size,
      agreement: agreementScores.length > 0 ? Math.min(...agreementScores) : undefined,
    });

    try {
      sink.contradictions.push(
        createContradiction({
          ...draft,
          confidence_tier: breakdown.tier,
          confidence: this.scorer.pairConfidence(
            leftRule.extraction_confidence,
            rightRule.extraction_confidence,
            breakdown.tier,
          ),
        }),
      );
    } catch (error) {
      if (!(error instanceof EvidenceIntegrityError)) throw error;
      sink.rejected++;
      console.warn(`[Contradictions] Rejected ${draft.type} finding for ${draft.service_key}: ${error.message}`);
    }
  }

  private ordered(a: IndexedRule, b: IndexedRule): [IndexedRule, IndexedRule] {
    return byPageThenIndex(a, b) <= 0 ? [a, b] : [b, a];
  }

  detectTariff(items: IndexedRule[], options: DetectionOptions, sink: DetectionResult): void {
    const groups = groupBy(items, (r) =>
      r.tariff_value !== null && r.tariff_unit !== "unspecified" ? `${r.service_key}\u0000${r.tariff_unit}` : null,
    );

    for (const group of groups.values()) {
      const tariffOf = (r: Rule) => r.tariff_value ?? 0;
      const distinct = new Set(group.map((g) => tariffOf(g.rule)));
      if (distinct.size < 2) continue;

      const { min, max } = extremes(group, tariffOf);
      const variance = relativeVariance(tariffOf(min.rule), tariffOf(max.rule));
      if (!(variance > this.config.contradictions.tariffVarianceThreshold)) continue;

      const [left, right] = this.ordered(min, max);
      const unit = left.rule.tariff_unit;
      this.finalize(
        {
          type: "Tariff",
          service_key: left.rule.service_key,
          category: left.rule.category,
          unit,
          details: `${unit} tariff varies from ${formatKes(tariffOf(min.rule))} to ${formatKes(tariffOf(max.rule))} (${formatVariance(variance)})`,
          left: toEvidence(left.rule),
          right: toEvidence(right.rule),
          severity: this.varianceSeverity(variance, left.rule.category),
          supporting_rule_ids: group.map((g) => g.rule.id),
          origin: "deterministic",
        },
        left.rule,
        right.rule,
        options,
        sink,
      );
    }
  }

  detectLimit(items: IndexedRule[], options: DetectionOptions, sink: DetectionResult): void {
    const expanded: Array<IndexedRule & { limitType: LimitType; value: number }> = [];
    for (const item of items) {
      for (const [limitType, value] of Object.entries(item.rule.limits)) {
        if (typeof value !== "number") continue;
        if (!isLimitType(limitType)) continue;
        expanded.push({ ...item, limitType, value });
      }
    }

    const groups = new Map<string, typeof expanded>();
    for (const entry of expanded) {
      const key = `${entry.rule.service_key}\u0000${entry.limitType}`;
      groups.set(key, [...(groups.get(key) ?? []), entry]);
    }

    for (const key of [...groups.keys()].sort()) {
      const group = groups.get(key) ?? [];
      if (new Set(group.map((g) => g.value)).size < 2) continue;

      let min = group[0];
      let max = group[0];
      for (const entry of group) {
        if (entry.value < min.value) min = entry;
        if (entry.value > max.value) max = entry;
      }

      const variance = relativeVariance(min.value, max.value);
      const [left, right] = byPageThenIndex(min, max) <= 0 ? [min, max] : [max, min];
      this.finalize(
        {
          type: "Limit",
          service_key: left.rule.service_key,
          category: left.rule.category,
          unit: left.limitType,
          details: `${left.limitType} limit differs: ${left.value} vs ${right.value} (${formatVariance(variance)})`,
          left: toEvidence(left.rule),
          right: toEvidence(right.rule),
          severity: this.varianceSeverity(variance, left.rule.category),
          supporting_rule_ids: group.map((g) => g.rule.id),
          origin: "deterministic",
        },
        left.rule,
        right.rule,
        options,
        sink,
      );
    }
  }

  detectCoverage(items: IndexedRule[], options: DetectionOptions, sink: DetectionResult): void {
    for (const group of groupBy(items, (r) => r.service_key).values()) {
      const included = group.filter((g) => g.rule.coverage_status === "included").sort(byPageThenIndex);
      const excluded = group.filter((g) => g.rule.coverage_status === "excluded").sort(byPageThenIndex);
      if (included.length === 0 || excluded.length === 0) continue;

      const left = included[0];
      const right = excluded[0];
      this.finalize(
        {
          type: "Coverage",
          service_key: left.rule.service_key,
          category: left.rule.category,
          unit: null,
          details: `Service is included on page ${left.rule.source_page} but excluded on page ${right.rule.source_page}`,
          left: toEvidence(left.rule),
          right: toEvidence(right.rule),
          severity: "HIGH",
          supporting_rule_ids: [...included, ...excluded].map((g) => g.rule.id),
          origin: "deterministic",
        },
        left.rule,
        right.rule,
        options,
        sink,
      );
    }
  }

  detectFacilityExclusion(items: IndexedRule[], options: DetectionOptions, sink: DetectionResult): void {
    for (const group of groupBy(items, (r) => r.service_key).values()) {
      const excluded = group.filter((g) => g.rule.coverage_status === "excluded").sort(byPageThenIndex);
      const included = group.filter((g) => g.rule.coverage_status === "included").sort(byPageThenIndex);
      if (excluded.length === 0 || included.length === 0) continue;

      const excludedLevels = new Set(excluded.flatMap((g) => g.rule.facility_levels));
      const overlapping = [...new Set(included.flatMap((g) => g.rule.facility_levels))]
        .filter((level) => excludedLevels.has(level))
        .sort((a, b) => a - b);

      for (const level of overlapping) {
        const excludedAt = excluded.filter((g) => g.rule.facility_levels.includes(level));
        const includedAt = included.filter((g) => g.rule.facility_levels.includes(level));
        const left = excludedAt[0];
        const right = includedAt[0];
        this.finalize(
          {
            type: "Facility-exclusion",
            service_key: left.rule.service_key,
            category: left.rule.category,
            unit: `level_${level}`,
            details: `Level ${level} is excluded on page ${left.rule.source_page} but included on page ${right.rule.source_page}`,
            left: toEvidence(left.rule),
            right: toEvidence(right.rule),
            severity: "HIGH",
            supporting_rule_ids: [...excludedAt, ...includedAt].map((g) => g.rule.id),
            origin: "deterministic",
          },
          left.rule,
          right.rule,
          options,
          sink,
        );
      }
    }
  }

  /**
   * Turn collaborator-suggested contradictions into findings. Candidates must name
   * two known rules sharing a service key whose fields support the claimed type,
   * and are dropped when a deterministic finding already covers the same type and
   * service key.
   */
  adoptCandidates(
    candidates: CandidateContradiction[],
    rules: Rule[],
    existing: Contradiction[],
    options: DetectionOptions = {},
  ): DetectionResult {
    const sink: DetectionResult = { contradictions: [], rejected: 0 };
    const indexed = new Map(rules.map((rule, index) => [rule.id, { rule, index }]));
    const covered = new Set(existing.map((c) => `${c.type}\u0000${c.service_key}`));

    for (const candidate of candidates) {
      const a = indexed.get(candidate.left_rule_id);
      const b = indexed.get(candidate.right_rule_id);
      if (!a || !b || a.rule.id === b.rule.id) {
        sink.rejected++;
        console.warn(
          `[Contradictions] Rejected collaborator ${candidate.type} candidate: unknown rule ids ` +
            `${candidate.left_rule_id}/${candidate.right_rule_id}`,
        );
        continue;
      }
      if (a.rule.service_key !== b.rule.service_key) {
        sink.rejected++;
        console.warn(
          `[Contradictions] Rejected collaborator ${candidate.type} candidate spanning ` +
            `${a.rule.service_key} and ${b.rule.service_key}`,
        );
        continue;
      }

      const mismatch = candidatePreconditionFailure(candidate.type, a.rule, b.rule);
      if (mismatch) {
        sink.rejected++;
        console.warn(
          `[Contradictions] Rejected collaborator ${candidate.type} candidate for ${a.rule.service_key}: ${mismatch}`,
        );
        continue;
      }

      const groupKey = `${candidate.type}\u0000${a.rule.service_key}`;
      if (covered.has(groupKey)) continue;
      covered.add(groupKey);

      const [left, right] = this.ordered(a, b);
      this.finalize(
        {
          type: candidate.type,
          service_key: left.rule.service_key,
          category: left.rule.category,
          unit: candidate.type === "Tariff" && left.rule.tariff_unit === right.rule.tariff_unit ? left.rule.tariff_unit : null,
          details: candidate.details.trim() || `${candidate.type} conflict suggested by collaborator`,
          left: toEvidence(left.rule),
          right: toEvidence(right.rule),
          severity: candidate.severity ?? "MEDIUM",
          supporting_rule_ids: [left.rule.id, right.rule.id],
          origin: "collaborator",
        },
        left.rule,
        right.rule,
        options,
        sink,
      );
    }

    return sink;
  }

  /**
   * Run all four sub-detectors over rules that already carry service keys.
   */
  detect(rules: Rule[], options: DetectionOptions = {}): DetectionResult {
    const items = rules.map((rule, index) => ({ rule, index }));
    const sink: DetectionResult = { contradictions: [], rejected: 0 };

    this.detectTariff(items, options, sink);
    this.detectLimit(items, options, sink);
    this.detectCoverage(items, options, sink);
    this.detectFacilityExclusion(items, options, sink);

    const counts = countByType(sink.contradictions);
    console.log(
      `[Contradictions] ${sink.contradictions.length} finding(s) ` +
        `(Tariff=${counts.Tariff}, Limit=${counts.Limit}, Coverage=${counts.Coverage}, ` +
        `Facility-exclusion=${counts["Facility-exclusion"]}); ${sink.rejected} rejected`,
    );
    return sink;
  }
}

/**
 * Why a collaborator candidate does not hold against the two rules' fields,
 * or null when the rules support the claimed contradiction type.
 */
export function candidatePreconditionFailure(type: ContradictionType, a: Rule, b: Rule): string | null {
  switch (type) {
    case "Tariff":
      if (a.tariff_value === null || b.tariff_value === null) return "tariff value missing";
      if (a.tariff_unit === "unspecified" || a.tariff_unit !== b.tariff_unit) {
        return `tariff units differ (${a.tariff_unit} vs ${b.tariff_unit})`;
      }
      return a.tariff_value === b.tariff_value ? "tariff values are equal" : null;
    case "Limit": {
      const differing = LIMIT_TYPES.filter((t) => {
        const left = a.limits[t];
        const right = b.limits[t];
        return left !== undefined && right !== undefined && left !== right;
      });
      return differing.length > 0 ? null : "no shared limit type with differing values";
    }
    case "Coverage":
      return hasOppositeStatuses(a, b) ? null : "rules do not pair an included with an excluded status";
    case "Facility-exclusion":
      if (!hasOppositeStatuses(a, b)) return "rules do not pair an included with an excluded status";
      return a.facility_levels.some((level) => b.facility_levels.includes(level))
        ? null
        : "no overlapping facility level";
  }
}

function hasOppositeStatuses(a: Rule, b: Rule): boolean {
  const statuses = new Set([a.coverage_status, b.coverage_status]);
  return statuses.has("included") && statuses.has("excluded");
}

const LIMIT_TYPE_SET: ReadonlySet<string> = new Set<string>(LIMIT_TYPES);

function isLimitType(value: string): value is LimitType {
  return LIMIT_TYPE_SET.has(value);
}

export function countByType(contradictions: Contradiction[]): Record<ContradictionType, number> {
  const counts: Record<ContradictionType, number> = { Tariff: 0, Limit: 0, Coverage: 0, "Facility-exclusion": 0 };
  for (const c of contradictions) counts[c.type]++;
  return counts;
}

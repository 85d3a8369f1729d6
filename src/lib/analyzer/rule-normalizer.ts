/**
 * Rule Normalizer
 *
 * Turns raw extracted policy lines into canonical Rule records: tariff/unit
 * binding, facility-level canonicalization, guarded coverage classification,
 * limit extraction and evidence snippets. Anything that cannot be extracted
 * confidently is left at its sentinel value.
 *
 * @module analyzer/rule-normalizer
 */

import type { AnalysisConfig } from "../config-schemas";
import {
  buildSynonymStrategies,
  classifyCoverage,
  classifyCoverageClauses,
  collapseWhitespace,
  collectAll,
  FACILITY_STRATEGIES,
  findAmounts,
  findCoverageConditions,
  findLimits,
  findUnits,
  normalizeUnitPhrase,
  parseAmount,
  sentenceIndexAt,
  splitSentences,
  type PatternConfidence,
  type PatternMatch,
  type PatternStrategy,
  type TextSpan,
} from "./extraction-patterns";
import {
  RawRuleRecordSchema,
  type ConfidenceTier,
  type LimitType,
  type RawRuleRecord,
  type Rule,
  type TariffUnit,
} from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface TariffBinding {
  value: number;
  unit: TariffUnit;
  /** Position of the amount in the text, -1 when it could not be located */
  position: number;
  confidence: PatternConfidence;
}

export interface TariffExtraction {
  value: number | null;
  unit: TariffUnit;
  path: PatternConfidence | "absent";
  ambiguous: boolean;
  bindings: TariffBinding[];
}

export interface LimitExtraction {
  limits: Partial<Record<LimitType, number>>;
  path: PatternConfidence | "absent";
  rejected: LimitType[];
}

export interface FacilityExtraction {
  levels: number[];
  path: PatternConfidence | "absent";
}

export interface NormalizationIssue {
  index: number;
  page: number | null;
  message: string;
}

export interface NormalizationResult {
  rules: Rule[];
  issues: NormalizationIssue[];
}

type NormalizerConfig = Pick<AnalysisConfig, "facilityLevels" | "categories" | "evidence">;

const PATH_TIER: Record<PatternConfidence | "absent", ConfidenceTier> = {
  explicit: "HIGH",
  inferred: "MEDIUM",
  absent: "LOW",
};

const LOWER_TIER: Record<ConfidenceTier, ConfidenceTier> = {
  HIGH: "MEDIUM",
  MEDIUM: "LOW",
  LOW: "LOW",
};

const TIER_RANK: Record<ConfidenceTier, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

function bestPath(paths: Array<PatternConfidence | "absent">): PatternConfidence | "absent" {
  if (paths.includes("explicit")) return "explicit";
  if (paths.includes("inferred")) return "inferred";
  return "absent";
}

/**
 * Trim text to an evidence snippet: whitespace collapsed, at most `maxChars`,
 * windowed around `focus` when the text is longer than that. A window that would
 * keep fewer than `minChars` of source text is anchored at the start instead.
 */
export function buildEvidenceSnippet(
  text: string,
  limits: { minChars: number; maxChars: number },
  focus = 0,
): string {
  const { minChars, maxChars } = limits;
  const collapsed = collapseWhitespace(text);
  if (collapsed.length <= maxChars) return collapsed;

  const ellipsis = "...";
  const headOnly = collapsed.slice(0, maxChars - ellipsis.length) + ellipsis;
  const budget = maxChars - 2 * ellipsis.length;
  if (budget < minChars) return headOnly;

  const start = Math.max(0, Math.min(focus, collapsed.length) - Math.floor(maxChars / 3));
  if (start === 0) return headOnly;
  if (start + budget >= collapsed.length) {
    return ellipsis + collapsed.slice(collapsed.length - (maxChars - ellipsis.length));
  }
  return ellipsis + collapsed.slice(start, start + budget) + ellipsis;
}

// ============================================================================
// RULE NORMALIZER
// ============================================================================

export class RuleNormalizer {
  private readonly facilityStrategies: PatternStrategy<number[]>[];
  private readonly categoryKeywords: Array<[string, string[]]>;

  constructor(private readonly config: NormalizerConfig) {
    this.facilityStrategies = [
      ...FACILITY_STRATEGIES,
      ...buildSynonymStrategies(config.facilityLevels.synonyms),
    ];
    this.categoryKeywords = Object.entries(config.categories.keywords).map(([category, keywords]) => [
      category,
      keywords.map((k) => k.toLowerCase()),
    ]);
  }

  /**
   * Bind each monetary amount to the nearest unit phrase in the same sentence.
   * Amounts with no unit in their sentence bind to "unspecified".
   */
  bindTariffs(text: string, candidateAmounts?: string[], candidateUnits?: string[]): TariffBinding[] {
    const sentences = splitSentences(text);
    const amounts = candidateAmounts && candidateAmounts.length > 0
      ? this.locateCandidateAmounts(text, candidateAmounts)
      : findAmounts(text);

    const units: Array<{ unit: Exclude<TariffUnit, "unspecified">; start: number; confidence: PatternConfidence }> =
      findUnits(text).map((u) => ({ unit: u.value, start: u.start, confidence: u.confidence }));

    // Candidate units that do not occur in the text can still bind, but only inferred
    const floatingUnits = new Set<Exclude<TariffUnit, "unspecified">>();
    for (const phrase of candidateUnits ?? []) {
      const unit = normalizeUnitPhrase(phrase);
      if (!unit) continue;
      const position = text.toLowerCase().indexOf(phrase.toLowerCase());
      if (position >= 0) {
        if (!units.some((u) => u.start === position)) units.push({ unit, start: position, confidence: "inferred" });
      } else {
        floatingUnits.add(unit);
      }
    }

    return amounts.map((amount): TariffBinding => {
      const sentence = amount.start >= 0 ? sentenceIndexAt(sentences, amount.start) : -1;
      const sameSentence = sentence >= 0
        ? units.filter((u) => sentenceIndexAt(sentences, u.start) === sentence)
        : [];

      if (sameSentence.length > 0) {
        const nearest = sameSentence.reduce((best, u) =>
          Math.abs(u.start - amount.start) < Math.abs(best.start - amount.start) ? u : best,
        );
        const confidence: PatternConfidence =
          amount.confidence === "explicit" && nearest.confidence === "explicit" ? "explicit" : "inferred";
        return { value: amount.value, unit: nearest.unit, position: amount.start, confidence };
      }

      if (floatingUnits.size === 1) {
        const [unit] = [...floatingUnits];
        return { value: amount.value, unit, position: amount.start, confidence: "inferred" };
      }

      return { value: amount.value, unit: "unspecified", position: amount.start, confidence: "inferred" };
    });
  }

  private locateCandidateAmounts(text: string, candidates: string[]): PatternMatch<number>[] {
    const located: PatternMatch<number>[] = [];
    let searchFrom = 0;
    for (const candidate of candidates) {
      const parsed = findAmounts(candidate)[0]?.value ?? parseAmount(candidate.trim());
      if (parsed === null) continue;
      const position = text.indexOf(candidate, searchFrom);
      if (position >= 0) searchFrom = position + candidate.length;
      located.push({
        value: parsed,
        confidence: findAmounts(candidate).length > 0 ? "explicit" : "inferred",
        strategy: "candidate",
        start: position,
        end: position >= 0 ? position + candidate.length : -1,
      });
    }
    return located;
  }

  /**
   * Resolve a single tariff for the line. Several distinct amount/unit bindings
   * make the line ambiguous and leave the tariff unspecified.
   */
  extractTariff(text: string, candidateAmounts?: string[], candidateUnits?: string[]): TariffExtraction {
    const bindings = this.bindTariffs(text, candidateAmounts, candidateUnits);
    if (bindings.length === 0) {
      return { value: null, unit: "unspecified", path: "absent", ambiguous: false, bindings };
    }

    const distinct = new Map<string, TariffBinding>();
    for (const b of bindings) {
      const key = `${b.value}|${b.unit}`;
      const existing = distinct.get(key);
      if (!existing || (existing.confidence === "inferred" && b.confidence === "explicit")) distinct.set(key, b);
    }

    if (distinct.size > 1) {
      return { value: null, unit: "unspecified", path: "absent", ambiguous: true, bindings };
    }

    const [only] = [...distinct.values()];
    const path: PatternConfidence = only.unit === "unspecified" ? "inferred" : only.confidence;
    return { value: only.value, unit: only.unit, path, ambiguous: false, bindings };
  }

  /**
   * Canonicalize facility mentions into a sorted integer set within the configured range.
   */
  extractFacilityLevels(text: string, mentions: string[] = []): FacilityExtraction {
    const { min, max } = this.config.facilityLevels;
    const levels = new Set<number>();
    const paths: PatternConfidence[] = [];

    for (const source of [text, ...mentions]) {
      for (const match of collectAll(this.facilityStrategies, source)) {
        const inRange = match.value.filter((n) => n >= min && n <= max);
        if (inRange.length === 0) continue;
        inRange.forEach((n) => levels.add(n));
        paths.push(match.confidence);
      }
    }

    return {
      levels: [...levels].sort((a, b) => a - b),
      path: bestPath(paths),
    };
  }

  /**
   * Extract quantity limits. A limit type that appears with two different values
   * in one line is rejected rather than guessed.
   */
  extractLimits(text: string, phrases: string[] = [], moneySpans: TextSpan[] = []): LimitExtraction {
    const seen = new Map<LimitType, { values: Set<number>; confidence: PatternConfidence }>();

    const sources: Array<{ text: string; reserved: TextSpan[] }> = [
      { text, reserved: moneySpans },
      ...phrases.map((p) => ({ text: p, reserved: findAmounts(p) })),
    ];

    for (const source of sources) {
      for (const match of findLimits(source.text, source.reserved)) {
        const entry = seen.get(match.value.type) ?? { values: new Set<number>(), confidence: match.confidence };
        entry.values.add(match.value.value);
        if (match.confidence === "explicit") entry.confidence = "explicit";
        seen.set(match.value.type, entry);
      }
    }

    const limits: Partial<Record<LimitType, number>> = {};
    const rejected: LimitType[] = [];
    const paths: PatternConfidence[] = [];
    for (const [type, entry] of seen) {
      if (entry.values.size > 1) {
        rejected.push(type);
        continue;
      }
      const [value] = [...entry.values];
      limits[type] = value;
      paths.push(entry.confidence);
    }

    return { limits, path: bestPath(paths), rejected };
  }

  categorize(text: string): string {
    const lower = text.toLowerCase();
    for (const [category, keywords] of this.categoryKeywords) {
      if (keywords.some((k) => lower.includes(k))) return category;
    }
    return this.config.categories.defaultCategory;
  }

  /**
   * Derive the service description from the leading text of the first sentence,
   * before any amount, limit or facility phrase.
   */
  deriveServiceDescription(text: string): string {
    // List markers ("1.", "-") would otherwise end the first sentence
    const collapsed = collapseWhitespace(text).replace(/^(?:[\-*•]\s*|\d+[.)]\s+)+/, "");
    const [firstSentence] = splitSentences(collapsed);
    const sentence = firstSentence ? collapsed.slice(firstSentence.start, firstSentence.end) : collapsed;

    const cutPoints = [
      ...findAmounts(sentence).map((m) => m.start),
      ...findLimits(sentence).map((m) => m.start),
      ...collectAll(FACILITY_STRATEGIES, sentence).map((m) => m.start),
      ...["covered", "excluded", "not ", "per ", " at "].map((w) => sentence.toLowerCase().indexOf(w)),
    ].filter((p) => p > 0);

    const cut = cutPoints.length > 0 ? Math.min(...cutPoints) : sentence.length;
    const lead = sentence
      .slice(0, cut)
      .replace(/[\s:;,\-–(]+$/, "")
      .replace(/(?:\s+(?:is|are|shall|will|be|only|and))+$/i, "")
      .trim();

    if (lead.length > 0) return lead;

    const fallback = sentence.replace(/[.;!?\s]+$/, "");
    return fallback.length > 80 ? fallback.slice(0, 80).replace(/\s+\S*$/, "") : fallback;
  }

  /**
   * Levels an excluded line applies to. On a line that also states coverage
   * positively ("covered at Level 4-6; excluded at Level 2"), only the levels
   * named in the excluded clauses count.
   */
  excludedLevels(text: string, lineLevels: number[]): number[] {
    const clauses = classifyCoverageClauses(text);
    if (clauses.included.length === 0 || clauses.excluded.length === 0) return lineLevels;
    return this.extractFacilityLevels(clauses.excluded.join("; ")).levels;
  }

  /**
   * Normalize one validated raw record.
   */
  normalize(record: RawRuleRecord, index: number): Rule {
    const text = record.raw_text;
    const amounts = findAmounts(text);

    const tariff = this.extractTariff(text, record.candidate_amounts, record.candidate_units);
    const facility = this.extractFacilityLevels(text, record.candidate_facility_mentions);
    const limits = this.extractLimits(text, record.candidate_limit_phrases, amounts);
    const coverage = classifyCoverage(text);
    const facilityLevels = coverage ? this.excludedLevels(text, facility.levels) : facility.levels;

    const service = collapseWhitespace(record.service ?? "") || this.deriveServiceDescription(text);
    const category = record.category?.trim() || this.categorize(`${service} ${text}`);

    let tier = PATH_TIER[bestPath([tariff.path, limits.path, facility.path])];
    if (tariff.ambiguous || limits.rejected.length > 0) {
      tier = LOWER_TIER[tier];
    }

    const focus = amounts.length > 0 ? collapseWhitespace(text.slice(0, amounts[0].start)).length : 0;

    return {
      id: `r${index + 1}`,
      service,
      service_key: "",
      category,
      tariff_value: tariff.value,
      tariff_unit: tariff.unit,
      coverage_status: coverage ? "excluded" : "included",
      coverage_conditions: findCoverageConditions(text),
      facility_levels: facilityLevels,
      limits: limits.limits,
      source_page: record.page_index,
      evidence_snippet: buildEvidenceSnippet(
        text,
        { minChars: this.config.evidence.minSnippetChars, maxChars: this.config.evidence.maxSnippetChars },
        focus,
      ),
      extraction_confidence: tier,
    };
  }

  /**
   * Validate and normalize a batch. Invalid records are reported and skipped, never coerced.
   */
  normalizeAll(records: unknown[]): NormalizationResult {
    const rules: Rule[] = [];
    const issues: NormalizationIssue[] = [];

    records.forEach((raw, index) => {
      const parsed = RawRuleRecordSchema.safeParse(raw);
      if (!parsed.success) {
        const message = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
        console.warn(`[Normalizer] Skipping record #${index}: ${message}`);
        issues.push({ index, page: null, message });
        return;
      }
      if (parsed.data.raw_text.trim().length === 0) {
        console.warn(`[Normalizer] Skipping record #${index}: empty raw_text`);
        issues.push({ index, page: parsed.data.page_index, message: "empty raw_text" });
        return;
      }
      rules.push(this.normalize(parsed.data, index));
    });

    const lowConfidence = rules.filter((r) => TIER_RANK[r.extraction_confidence] === 0).length;
    console.log(
      `[Normalizer] Normalized ${rules.length}/${records.length} record(s); ${lowConfidence} with LOW extraction confidence`,
    );
    return { rules, issues };
  }
}

/**
 * Extraction Patterns
 *
 * Ordered, tagged pattern strategies used by the rule normalizer. Each strategy
 * returns positioned matches tagged "explicit" or "inferred"; strategies are
 * evaluated in priority order, either first-success or collect-all with
 * earlier strategies owning overlapping spans.
 *
 * @module analyzer/extraction-patterns
 */

import type { CoverageCondition, CoverageStatus, LimitType, TariffUnit } from "./types";

// ============================================================================
// STRATEGY PROTOCOL
// ============================================================================

export type PatternConfidence = "explicit" | "inferred";

export interface PatternMatch<T> {
  value: T;
  confidence: PatternConfidence;
  strategy: string;
  start: number;
  end: number;
}

export interface PatternStrategy<T> {
  name: string;
  confidence: PatternConfidence;
  pattern: RegExp;
  /** Returns null to reject a regex hit */
  toValue: (match: RegExpExecArray) => T | null;
}

function runStrategy<T>(strategy: PatternStrategy<T>, text: string): PatternMatch<T>[] {
  const flags = strategy.pattern.flags.includes("g") ? strategy.pattern.flags : strategy.pattern.flags + "g";
  const re = new RegExp(strategy.pattern.source, flags);
  const results: PatternMatch<T>[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    if (m[0].length === 0) {
      re.lastIndex++;
      continue;
    }
    const value = strategy.toValue(m);
    if (value === null) continue;
    results.push({
      value,
      confidence: strategy.confidence,
      strategy: strategy.name,
      start: m.index,
      end: m.index + m[0].length,
    });
  }
  return results;
}

/**
 * Evaluate strategies in order; the first one that matches anything wins.
 */
export function firstSuccess<T>(strategies: PatternStrategy<T>[], text: string): PatternMatch<T>[] {
  for (const strategy of strategies) {
    const matches = runStrategy(strategy, text);
    if (matches.length > 0) return matches;
  }
  return [];
}

function overlaps(a: { start: number; end: number }, b: { start: number; end: number }): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Evaluate all strategies; a match overlapping a span already claimed by an
 * earlier strategy (or by `reserved`) is dropped. Results are sorted by position.
 */
export function collectAll<T>(
  strategies: PatternStrategy<T>[],
  text: string,
  reserved: Array<{ start: number; end: number }> = [],
): PatternMatch<T>[] {
  const claimed: PatternMatch<T>[] = [];
  for (const strategy of strategies) {
    for (const match of runStrategy(strategy, text)) {
      if (reserved.some((r) => overlaps(r, match))) continue;
      if (claimed.some((c) => overlaps(c, match))) continue;
      claimed.push(match);
    }
  }
  return claimed.sort((a, b) => a.start - b.start);
}

// ============================================================================
// TEXT HELPERS
// ============================================================================

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export interface TextSpan {
  start: number;
  end: number;
}

// Abbreviations whose trailing period does not end a sentence
const SENTENCE_BOUNDARY = /(?<!\b(?:ksh|kshs|kes|lvl|no|max|approx|e\.g|i\.e))[.;!?](?=\s|$)|\n/gi;

/**
 * Split text into sentence spans. Decimal points and abbreviations such as
 * "Ksh." are not treated as boundaries.
 */
export function splitSentences(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let start = 0;
  const re = new RegExp(SENTENCE_BOUNDARY.source, SENTENCE_BOUNDARY.flags);
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const end = m.index + m[0].length;
    if (text.slice(start, end).trim().length > 0) spans.push({ start, end });
    start = end;
  }
  if (text.slice(start).trim().length > 0) spans.push({ start, end: text.length });
  return spans;
}

export function sentenceIndexAt(spans: TextSpan[], position: number): number {
  return spans.findIndex((s) => position >= s.start && position < s.end);
}

// ============================================================================
// MONEY
// ============================================================================

const CURRENCY = "(?:KES|Kshs|Ksh|KSH|KSHS|Sh)";
const NUMBER = "(\\d{1,3}(?:,\\d{3})+(?:\\.\\d+)?|\\d+(?:\\.\\d+)?)";

export function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/,/g, "");
  if (!/^\d+(?:\.\d+)?$/.test(cleaned)) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

const toAmount = (m: RegExpExecArray) => parseAmount(m[1]);

export const MONEY_STRATEGIES: PatternStrategy<number>[] = [
  {
    name: "currency-prefix",
    confidence: "explicit",
    pattern: new RegExp(`\\b${CURRENCY}\\.?\\s*${NUMBER}`, "gi"),
    toValue: toAmount,
  },
  {
    name: "currency-suffix",
    confidence: "explicit",
    pattern: new RegExp(`${NUMBER}\\s*${CURRENCY}\\b`, "gi"),
    toValue: toAmount,
  },
  {
    name: "slash-dash",
    confidence: "inferred",
    pattern: new RegExp(`${NUMBER}\\s*/-`, "g"),
    toValue: toAmount,
  },
];

export function findAmounts(text: string): PatternMatch<number>[] {
  return collectAll(MONEY_STRATEGIES, text);
}

// ============================================================================
// TARIFF UNITS
// ============================================================================

type BillableUnit = Exclude<TariffUnit, "unspecified">;

const UNIT_WORDS: Record<string, BillableUnit> = {
  session: "per_session",
  visit: "per_visit",
  day: "per_day",
  month: "per_month",
  year: "per_year",
  annum: "per_year",
  procedure: "per_procedure",
  consultation: "per_consultation",
  scan: "per_scan",
  delivery: "per_delivery",
};

const toUnitWord = (m: RegExpExecArray): BillableUnit | null => UNIT_WORDS[m[1].toLowerCase()] ?? null;

const UNIT_WORD_ALTERNATION = "(session|visit|day|month|year|annum|procedure|consultation|scan|delivery)s?";

export const UNIT_STRATEGIES: PatternStrategy<BillableUnit>[] = [
  {
    name: "per-unit",
    confidence: "explicit",
    pattern: new RegExp(`\\b(?:per|each|every|a)\\s+${UNIT_WORD_ALTERNATION}\\b`, "gi"),
    toValue: toUnitWord,
  },
  {
    name: "slash-unit",
    confidence: "explicit",
    pattern: new RegExp(`/\\s*${UNIT_WORD_ALTERNATION}\\b`, "gi"),
    toValue: toUnitWord,
  },
  {
    name: "temporal-adverb",
    confidence: "inferred",
    pattern: /\b(daily|monthly|annually|annual|yearly)\b/gi,
    toValue: (m) => {
      const word = m[1].toLowerCase();
      if (word === "daily") return "per_day";
      if (word === "monthly") return "per_month";
      return "per_year";
    },
  },
  {
    name: "implicit-fee",
    confidence: "inferred",
    pattern: /\b(consultation|procedure|delivery|scan)\s+(?:fee|cost|charge|package)\b/gi,
    toValue: toUnitWord,
  },
];

/**
 * Normalize a free-text unit phrase ("per session", "/day", "Monthly") to a tariff unit.
 */
export function normalizeUnitPhrase(phrase: string): BillableUnit | null {
  const matches = firstSuccess(UNIT_STRATEGIES, phrase);
  if (matches.length > 0) return matches[0].value;
  const bare = UNIT_WORDS[phrase.trim().toLowerCase().replace(/^per[\s_]+/, "").replace(/s$/, "")];
  return bare ?? null;
}

export function findUnits(text: string): PatternMatch<BillableUnit>[] {
  return collectAll(UNIT_STRATEGIES, text);
}

// ============================================================================
// FACILITY LEVELS
// ============================================================================

const ROMAN: Record<string, number> = { I: 1, II: 2, III: 3, IV: 4, V: 5, VI: 6 };

function levelRange(a: number, b: number): number[] {
  const lo = Math.min(a, b);
  const hi = Math.max(a, b);
  const out: number[] = [];
  for (let n = lo; n <= hi; n++) out.push(n);
  return out;
}

const LEVEL_WORD = "(?:levels?|lvl|tiers?)\\.?";

export const FACILITY_STRATEGIES: PatternStrategy<number[]>[] = [
  {
    name: "level-range",
    confidence: "explicit",
    pattern: new RegExp(
      `\\b${LEVEL_WORD}\\s*([1-9])\\s*(?:-|\\u2013|\\u2014|to|through)\\s*(?:${LEVEL_WORD}\\s*)?([1-9])(?!\\d)`,
      "gi",
    ),
    toValue: (m) => levelRange(Number(m[1]), Number(m[2])),
  },
  {
    name: "level-list",
    confidence: "explicit",
    pattern: new RegExp(
      `\\b${LEVEL_WORD}\\s*([1-9](?:\\s*(?:,|and|&)\\s*[1-9])+)(?!\\d)(?!\\s*(?:sessions?|times?|visits?|days?|x\\b))`,
      "gi",
    ),
    toValue: (m) => (m[1].match(/[1-9]/g) ?? []).map(Number),
  },
  {
    name: "level-number",
    confidence: "explicit",
    pattern: new RegExp(`\\b${LEVEL_WORD}\\s*([1-9])(?!\\d)`, "gi"),
    toValue: (m) => [Number(m[1])],
  },
  {
    name: "level-short",
    confidence: "explicit",
    pattern: /\bL([1-9])\b/g,
    toValue: (m) => [Number(m[1])],
  },
  {
    name: "level-roman",
    confidence: "explicit",
    pattern: new RegExp(`\\b${LEVEL_WORD}\\s*(VI|IV|V|I{1,3})\\b`, "gi"),
    toValue: (m) => {
      const n = ROMAN[m[1].toUpperCase()];
      return n === undefined ? null : [n];
    },
  },
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Build inferred strategies for configured facility synonyms ("dispensary" -> 2).
 */
export function buildSynonymStrategies(synonyms: Record<string, number[]>): PatternStrategy<number[]>[] {
  return Object.entries(synonyms)
    .sort(([a], [b]) => b.length - a.length)
    .map(([phrase, levels]): PatternStrategy<number[]> => ({
      name: `synonym:${phrase}`,
      confidence: "inferred",
      pattern: new RegExp(`\\b${escapeRegExp(phrase).replace(/\s+/g, "\\s+")}s?\\b`, "gi"),
      toValue: () => [...levels],
    }));
}

// ============================================================================
// COVERAGE STATUS
// ============================================================================

const EXCLUSION_STRATEGIES: PatternStrategy<CoverageStatus>[] = [
  { name: "shall-not-be", confidence: "explicit", pattern: /\bshall\s+not\s+be\s+(?:covered|reimbursed|paid|payable)\b/gi, toValue: () => "excluded" },
  { name: "not-covered", confidence: "explicit", pattern: /\bnot\s+(?:be\s+)?covered\b/gi, toValue: () => "excluded" },
  { name: "not-payable", confidence: "explicit", pattern: /\bnot\s+(?:payable|billable|reimbursable)\b/gi, toValue: () => "excluded" },
  {
    name: "no-coverage",
    confidence: "explicit",
    // "no coverage limit" caps nothing
    pattern: /\bno\s+(?:coverage|cover)\b(?!\s+(?:limits?|caps?|ceilings?|restrictions?|maximum)\b)/gi,
    toValue: () => "excluded",
  },
  { name: "level-excluded", confidence: "explicit", pattern: /\blevels?\s*[1-9](?:\s*(?:-|to)\s*[1-9])?\s*(?:is\s+|are\s+)?excluded\b/gi, toValue: () => "excluded" },
  { name: "excluded", confidence: "explicit", pattern: /\bexcluded\b/gi, toValue: () => "excluded" },
  { name: "unavailable-at-level", confidence: "explicit", pattern: /\b(?:unavailable|not\s+available)\s+(?:at|in)\s+(?:level|lvl|tier)\b/gi, toValue: () => "excluded" },
];

// A negator right before the hit cancels it ("not excluded", "no longer excluded")
const NEGATED_PREFIX = /\b(?:not|never|no\s+longer|nothing)\s+(?:be\s+|is\s+|are\s+)?$/i;

/**
 * Classify coverage status. Only explicit negative phrasing marks a rule excluded;
 * phrases like "covered at level 4" or "not excluded" stay included.
 */
export function classifyCoverage(text: string): PatternMatch<CoverageStatus> | null {
  for (const strategy of EXCLUSION_STRATEGIES) {
    for (const match of runStrategy(strategy, text)) {
      const before = text.slice(Math.max(0, match.start - 20), match.start);
      if (NEGATED_PREFIX.test(before)) continue;
      return match;
    }
  }
  return null;
}

const CLAUSE_BOUNDARY = /,?\s+\b(?:but|whereas|while|except)\b/i;
const POSITIVE_COVERAGE = /(?<!\bnot\s+(?:be\s+)?)\b(?:covered|included|payable|reimbursable|reimbursed|available|provided)\b/i;

export interface CoverageClauses {
  included: string[];
  excluded: string[];
}

/**
 * Split a line into clauses and sort them by coverage. A clause is included only
 * when it states coverage positively; clauses that say neither are dropped.
 */
export function classifyCoverageClauses(text: string): CoverageClauses {
  const clauses = splitSentences(text).flatMap((span) => text.slice(span.start, span.end).split(CLAUSE_BOUNDARY));
  const result: CoverageClauses = { included: [], excluded: [] };
  for (const raw of clauses) {
    const clause = raw.trim();
    if (!clause) continue;
    if (classifyCoverage(clause)) result.excluded.push(clause);
    else if (POSITIVE_COVERAGE.test(clause)) result.included.push(clause);
  }
  return result;
}

// ============================================================================
// LIMITS
// ============================================================================

export interface LimitValue {
  type: LimitType;
  value: number;
}

const SMALL_INT = "(?<![\\d,.])(\\d{1,3})(?![\\d,])";
const COUNT_NOUN = "(?:sessions?|times?|visits?|treatments?|cycles?|procedures?|x)";
const PER = "(?:per|/|a|an|every|each)";

function limitStrategy(name: string, type: LimitType, pattern: RegExp): PatternStrategy<LimitValue> {
  return { name, confidence: "explicit", pattern, toValue: (m) => ({ type, value: Number(m[1]) }) };
}

const FREQUENCY_WORDS: Record<string, number> = { once: 1, twice: 2, thrice: 3 };

export const LIMIT_STRATEGIES: PatternStrategy<LimitValue>[] = [
  limitStrategy("count-per-week", "per_week", new RegExp(`${SMALL_INT}\\s*${COUNT_NOUN}?\\s*${PER}\\s*week\\b`, "gi")),
  limitStrategy("count-weekly", "per_week", new RegExp(`${SMALL_INT}\\s*${COUNT_NOUN}\\s*weekly\\b`, "gi")),
  limitStrategy("weekly-count", "per_week", new RegExp(`\\bweekly\\s*${SMALL_INT}\\s*${COUNT_NOUN}`, "gi")),
  limitStrategy("count-per-month", "per_month", new RegExp(`${SMALL_INT}\\s*${COUNT_NOUN}?\\s*${PER}\\s*month\\b`, "gi")),
  limitStrategy("count-per-year", "per_year", new RegExp(`${SMALL_INT}\\s*${COUNT_NOUN}?\\s*${PER}\\s*(?:year|annum)\\b`, "gi")),
  limitStrategy("max-days", "max_days", new RegExp(`\\b(?:up\\s*to|max(?:imum)?\\.?(?:\\s+of)?)\\s*${SMALL_INT}\\s*days\\b`, "gi")),
  limitStrategy(
    "max-total",
    "max_total",
    new RegExp(
      `\\b(?:up\\s*to|max(?:imum)?\\.?(?:\\s+of)?|not\\s+exceeding|limited\\s+to)\\s*${SMALL_INT}\\s*${COUNT_NOUN}(?!\\s*${PER}\\s*(?:week|month|year|annum))`,
      "gi",
    ),
  ),
  limitStrategy("count-in-total", "max_total", new RegExp(`${SMALL_INT}\\s*${COUNT_NOUN}\\s*in\\s+total\\b`, "gi")),
  {
    name: "frequency-word",
    confidence: "inferred",
    pattern: /\b(once|twice|thrice)\s+(?:a|per|every)\s+(week|month|year)\b/gi,
    toValue: (m) => {
      const value = FREQUENCY_WORDS[m[1].toLowerCase()];
      const unit = m[2].toLowerCase();
      if (value === undefined) return null;
      const type: LimitType = unit === "week" ? "per_week" : unit === "month" ? "per_month" : "per_year";
      return { type, value };
    },
  },
];

/**
 * Find limit phrases, ignoring numbers that are part of a money amount.
 */
export function findLimits(text: string, moneySpans: TextSpan[] = []): PatternMatch<LimitValue>[] {
  return collectAll(LIMIT_STRATEGIES, text, moneySpans);
}

// ============================================================================
// COVERAGE CONDITIONS
// ============================================================================

const CONDITION_PATTERNS: Array<[RegExp, CoverageCondition]> = [
  [/pre[- ]?authori[sz]ation|preauth/i, "pre_authorization_required"],
  [/subject\s+to\s+referral|referral\s+required|with\s+(?:a\s+)?referral|upon\s+referral/i, "referral_required"],
  [/co[- ]?pay(?:ment)?/i, "copay_applicable"],
  [/prior\s+approval/i, "prior_approval"],
];

export function findCoverageConditions(text: string): CoverageCondition[] {
  return CONDITION_PATTERNS.filter(([pattern]) => pattern.test(text)).map(([, condition]) => condition);
}

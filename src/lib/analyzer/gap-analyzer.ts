/**
 * Gap Analyzer
 *
 * Checks rules against the condition -> expected keyword mapping and classifies
 * each condition by how many rules match.
 *
 * @module analyzer/gap-analyzer
 */

import stringSimilarity from "string-similarity";
import type { AnalysisConfig, ConditionExpectation, ExpectationConfig } from "../config-schemas";
import { parseExpectationConfig } from "../config-loader";
import { ConfidenceScorer } from "./confidence-scorer";
import type { ConfidenceTier, Gap, GapMatch, GapStatus, KeywordMatchKind, Rule } from "./types";

export const NO_MATCHES_MARKER = "no matches found";

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter(Boolean);
}

export function classifyGapStatus(matchCount: number, adequacyThreshold: number): GapStatus {
  if (matchCount === 0) return "NO_COVERAGE_FOUND";
  if (matchCount < adequacyThreshold) return "MINIMAL_COVERAGE";
  return "ADEQUATE";
}

export class GapAnalyzer {
  private readonly expectations: ExpectationConfig;
  private readonly scorer: ConfidenceScorer;

  /**
   * Validates the mapping up front; a malformed mapping throws ConfigValidationError.
   */
  constructor(
    expectations: unknown,
    private readonly config: Pick<AnalysisConfig, "gaps" | "confidence">,
    scorer?: ConfidenceScorer,
  ) {
    this.expectations = parseExpectationConfig(expectations, "expectation mapping");
    this.scorer = scorer ?? new ConfidenceScorer(config.confidence);
  }

  get conditions(): string[] {
    return Object.keys(this.expectations.conditions);
  }

  /**
   * Case-insensitive substring match, else a bounded fuzzy match over word
   * windows of the keyword's length (only for keywords long enough to be distinctive).
   */
  matchKeyword(keyword: string, haystack: string): KeywordMatchKind | null {
    const needle = keyword.trim().toLowerCase();
    if (needle.length === 0) return null;
    if (haystack.toLowerCase().includes(needle)) return "substring";

    const { fuzzyMinKeywordLength, fuzzyThreshold } = this.config.gaps;
    if (needle.length < fuzzyMinKeywordLength) return null;

    const keywordTokens = tokenize(needle);
    const tokens = tokenize(haystack);
    const width = keywordTokens.length;
    if (width === 0 || tokens.length < width) return null;

    const target = keywordTokens.join(" ");
    for (let i = 0; i + width <= tokens.length; i++) {
      const window = tokens.slice(i, i + width).join(" ");
      if (stringSimilarity.compareTwoStrings(target, window) >= fuzzyThreshold) return "fuzzy";
    }
    return null;
  }

  private matchRule(rule: Rule, keywords: string[]): GapMatch | null {
    const haystack = `${rule.service} ${rule.evidence_snippet}`;
    let fuzzy: GapMatch | null = null;
    for (const keyword of keywords) {
      const kind = this.matchKeyword(keyword, haystack);
      const match: GapMatch = {
        rule_id: rule.id,
        page: rule.source_page,
        snippet: rule.evidence_snippet,
        keyword,
        match_kind: "substring",
      };
      if (kind === "substring") return match;
      if (kind === "fuzzy" && !fuzzy) fuzzy = { ...match, match_kind: "fuzzy" };
    }
    return fuzzy;
  }

  analyzeCondition(condition: string, expectation: ConditionExpectation, rules: Rule[]): Gap {
    const matches = rules
      .map((rule) => this.matchRule(rule, expectation.expected_keywords))
      .filter((m): m is GapMatch => m !== null);

    const status = classifyGapStatus(matches.length, this.config.gaps.adequacyThreshold);

    // An empty result rests on every expected keyword having been searched
    const patternTiers: ConfidenceTier[] =
      matches.length === 0 ? ["HIGH"] : matches.map((m) => (m.match_kind === "substring" ? "HIGH" : "MEDIUM"));
    const corroboration = matches.length === 0 ? expectation.expected_keywords.length : matches.length;
    const { tier } = this.scorer.score({ patternTiers, corroboratingSnippets: corroboration });

    const evidence =
      matches.length === 0
        ? NO_MATCHES_MARKER
        : matches
            .slice(0, this.config.gaps.maxEvidenceSnippets)
            .map((m) => `p.${m.page}: ${m.snippet}`)
            .join(" | ");

    return {
      condition,
      expected_keywords: [...expectation.expected_keywords],
      status,
      risk_level: expectation.risk_level,
      match_count: matches.length,
      matches,
      evidence,
      confidence_tier: tier,
    };
  }

  analyze(rules: Rule[]): Gap[] {
    const gaps = Object.entries(this.expectations.conditions).map(([condition, expectation]) =>
      this.analyzeCondition(condition, expectation, rules),
    );

    const missing = gaps.filter((g) => g.status === "NO_COVERAGE_FOUND").length;
    const minimal = gaps.filter((g) => g.status === "MINIMAL_COVERAGE").length;
    console.log(`[Gaps] ${gaps.length} condition(s): ${missing} without coverage, ${minimal} minimal`);
    return gaps;
  }
}

import { beforeEach, describe, expect, it } from "vitest";

import { GapAnalyzer, NO_MATCHES_MARKER, classifyGapStatus } from "@/lib/analyzer/gap-analyzer";
import type { Rule } from "@/lib/analyzer/types";
import { ConfigValidationError } from "@/lib/errors";
import { loadDefaultConfig, loadDefaultExpectations, makeRule, silenceConsole } from "@test/helpers/test-helpers";

const STROKE = {
  conditions: {
    "stroke rehabilitation": { expected_keywords: ["physiotherapy", "rehabilitation"], risk_level: "HIGH" },
  },
};

function physioRule(id: string, page: number): Rule {
  return makeRule({
    id,
    service: "Physiotherapy",
    service_key: "stroke_physiotherapy",
    category: "STROKE",
    source_page: page,
    evidence_snippet: `Physiotherapy session at Level 3, page ${page}.`,
  });
}

describe("GapAnalyzer", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("reports no coverage with an explicit marker when nothing matches", () => {
    const analyzer = new GapAnalyzer(STROKE, loadDefaultConfig());
    const [gap] = analyzer.analyze([makeRule({ id: "r1" })]);

    expect(gap.condition).toBe("stroke rehabilitation");
    expect(gap.status).toBe("NO_COVERAGE_FOUND");
    expect(gap.risk_level).toBe("HIGH");
    expect(gap.evidence).toBe("no matches found");
    expect(gap.evidence).toBe(NO_MATCHES_MARKER);
    expect(gap.match_count).toBe(0);
    expect(gap.confidence_tier).toBe("HIGH");
  });

  it("classifies by match count against the adequacy threshold", () => {
    const analyzer = new GapAnalyzer(STROKE, loadDefaultConfig());
    expect(analyzer.analyze([physioRule("a", 3)])[0].status).toBe("MINIMAL_COVERAGE");
    expect(analyzer.analyze([physioRule("a", 3), physioRule("b", 9)])[0].status).toBe("ADEQUATE");
  });

  it("never lowers the status when matching rules are added", () => {
    const analyzer = new GapAnalyzer(STROKE, loadDefaultConfig());
    const rank = { NO_COVERAGE_FOUND: 0, MINIMAL_COVERAGE: 1, ADEQUATE: 2 };
    const rules: Rule[] = [makeRule({ id: "unrelated" })];
    let previous = rank[analyzer.analyze(rules)[0].status];

    for (let page = 1; page <= 4; page++) {
      rules.push(physioRule(`m${page}`, page));
      const current = rank[analyzer.analyze(rules)[0].status];
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
    expect(previous).toBe(rank.ADEQUATE);
  });

  it("joins page-prefixed evidence up to the configured limit", () => {
    const analyzer = new GapAnalyzer(STROKE, loadDefaultConfig());
    const [gap] = analyzer.analyze([physioRule("a", 3), physioRule("b", 9), physioRule("c", 11), physioRule("d", 12)]);

    expect(gap.match_count).toBe(4);
    expect(gap.evidence).toBe(
      "p.3: Physiotherapy session at Level 3, page 3. | " +
        "p.9: Physiotherapy session at Level 3, page 9. | " +
        "p.11: Physiotherapy session at Level 3, page 11.",
    );
  });

  it("accepts close misspellings of long keywords as fuzzy matches", () => {
    const analyzer = new GapAnalyzer(STROKE, loadDefaultConfig());
    const rule = makeRule({
      id: "typo",
      service: "Physiotheraphy",
      evidence_snippet: "Physiotheraphy at Level 4.",
    });
    const [gap] = analyzer.analyze([rule]);

    expect(gap.matches).toEqual([
      { rule_id: "typo", page: 1, snippet: "Physiotheraphy at Level 4.", keyword: "physiotherapy", match_kind: "fuzzy" },
    ]);
    expect(gap.status).toBe("MINIMAL_COVERAGE");
    expect(gap.confidence_tier).toBe("MEDIUM");
  });

  describe("matchKeyword", () => {
    const analyzer = new GapAnalyzer(STROKE, loadDefaultConfig());

    it("matches substrings case-insensitively", () => {
      expect(analyzer.matchKeyword("Rehabilitation", "Stroke REHABILITATION unit")).toBe("substring");
    });

    it("does not fuzzy-match short keywords", () => {
      expect(analyzer.matchKeyword("ct", "c t scan")).toBeNull();
    });

    it("rejects dissimilar words", () => {
      expect(analyzer.matchKeyword("dialysis", "dialyses clinic")).toBeNull();
    });
  });

  describe("configuration validation", () => {
    it("fails fast on an empty keyword list", () => {
      expect(
        () =>
          new GapAnalyzer(
            { conditions: { asthma: { expected_keywords: [], risk_level: "LOW" } } },
            loadDefaultConfig(),
          ),
      ).toThrow(ConfigValidationError);
    });

    it("fails fast on a missing risk level", () => {
      expect(
        () => new GapAnalyzer({ conditions: { asthma: { expected_keywords: ["inhaler"] } } }, loadDefaultConfig()),
      ).toThrow(/conditions\.asthma\.risk_level/);
    });

    it("fails fast on an empty mapping", () => {
      expect(() => new GapAnalyzer({ conditions: {} }, loadDefaultConfig())).toThrow(ConfigValidationError);
    });

    it("accepts the shipped expectation mapping", () => {
      const analyzer = new GapAnalyzer(loadDefaultExpectations(), loadDefaultConfig());
      expect(analyzer.conditions).toHaveLength(12);
    });
  });
});

describe("classifyGapStatus", () => {
  it("maps counts to statuses", () => {
    expect(classifyGapStatus(0, 2)).toBe("NO_COVERAGE_FOUND");
    expect(classifyGapStatus(1, 2)).toBe("MINIMAL_COVERAGE");
    expect(classifyGapStatus(2, 2)).toBe("ADEQUATE");
  });
});

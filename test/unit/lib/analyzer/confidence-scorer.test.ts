import { describe, expect, it } from "vitest";

import { ConfidenceScorer, minTier } from "@/lib/analyzer/confidence-scorer";
import type { ConfidenceTier } from "@/lib/analyzer/types";
import { loadDefaultConfig } from "@test/helpers/test-helpers";

const RANK: Record<ConfidenceTier, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };
const TIERS: ConfidenceTier[] = ["LOW", "MEDIUM", "HIGH"];

describe("ConfidenceScorer", () => {
  const scorer = new ConfidenceScorer(loadDefaultConfig().confidence);

  it("maps corroboration counts to tiers", () => {
    expect(scorer.corroborationTier(0)).toBe("LOW");
    expect(scorer.corroborationTier(1)).toBe("MEDIUM");
    expect(scorer.corroborationTier(2)).toBe("HIGH");
  });

  it("maps agreement scores to tiers", () => {
    expect(scorer.agreementTier(0.8)).toBe("HIGH");
    expect(scorer.agreementTier(0.5)).toBe("MEDIUM");
    expect(scorer.agreementTier(0.49)).toBe("LOW");
  });

  it("never exceeds the weakest signal", () => {
    for (const a of TIERS) {
      for (const b of TIERS) {
        for (const count of [0, 1, 2, 5]) {
          for (const agreement of [undefined, 0.2, 0.6, 0.95]) {
            const result = scorer.score({ patternTiers: [a, b], corroboratingSnippets: count, agreement });
            expect(RANK[result.tier]).toBeLessThanOrEqual(RANK[result.pattern]);
            expect(RANK[result.tier]).toBeLessThanOrEqual(RANK[result.corroboration]);
            if (result.agreement) expect(RANK[result.tier]).toBeLessThanOrEqual(RANK[result.agreement]);
          }
        }
      }
    }
  });

  it("ignores a missing agreement score", () => {
    const without = scorer.score({ patternTiers: ["HIGH"], corroboratingSnippets: 2 });
    expect(without).toEqual({ tier: "HIGH", pattern: "HIGH", corroboration: "HIGH", agreement: null });
  });

  it("treats an empty pattern list as LOW", () => {
    expect(scorer.score({ patternTiers: [], corroboratingSnippets: 3 }).tier).toBe("LOW");
  });

  it("combines both sides into a numeric confidence", () => {
    expect(scorer.pairConfidence("HIGH", "HIGH", "HIGH")).toBe(0.9);
    expect(scorer.pairConfidence("HIGH", "LOW", "LOW")).toBe(0.5);
    expect(scorer.pairConfidence("HIGH", "MEDIUM", "HIGH")).toBe(0.825);
  });
});

describe("minTier", () => {
  it("returns the lowest tier", () => {
    expect(minTier(["HIGH", "LOW", "MEDIUM"])).toBe("LOW");
    expect(minTier(["HIGH"])).toBe("HIGH");
  });
});

import { describe, expect, it } from "vitest";

import {
  classifyCoverage,
  classifyCoverageClauses,
  findAmounts,
  findCoverageConditions,
  findLimits,
  normalizeUnitPhrase,
  splitSentences,
} from "@/lib/analyzer/extraction-patterns";

describe("extraction-patterns", () => {
  describe("splitSentences", () => {
    it("does not split on currency or 'max' abbreviations", () => {
      expect(splitSentences("Ksh. 500 per visit. Max. 3 visits")).toEqual([
        { start: 0, end: 19 },
        { start: 19, end: 33 },
      ]);
    });

    it("does not split on decimal points", () => {
      expect(splitSentences("Fee KES 1.5 per day")).toEqual([{ start: 0, end: 19 }]);
    });
  });

  describe("findAmounts", () => {
    it("tags currency amounts explicit and slash-dash amounts inferred", () => {
      const amounts = findAmounts("Ksh. 2,500 or 3,000/- per visit");
      expect(amounts.map((a) => [a.value, a.confidence])).toEqual([
        [2500, "explicit"],
        [3000, "inferred"],
      ]);
    });

    it("accepts a trailing currency code", () => {
      expect(findAmounts("9,600 KES per session").map((a) => a.value)).toEqual([9600]);
    });
  });

  describe("normalizeUnitPhrase", () => {
    it("maps phrases and canonical names to tariff units", () => {
      expect(normalizeUnitPhrase("per_session")).toBe("per_session");
      expect(normalizeUnitPhrase("Monthly")).toBe("per_month");
      expect(normalizeUnitPhrase("/day")).toBe("per_day");
      expect(normalizeUnitPhrase("sessions")).toBe("per_session");
    });

    it("returns null for non-billing units", () => {
      expect(normalizeUnitPhrase("week")).toBeNull();
    });
  });

  describe("classifyCoverage", () => {
    it("leaves positive phrasing included", () => {
      expect(classifyCoverage("Covered at Level 4 facilities")).toBeNull();
    });

    it("detects explicit exclusion phrasing", () => {
      expect(classifyCoverage("MRI shall not be covered at Level 2")?.strategy).toBe("shall-not-be");
      expect(classifyCoverage("Services are not covered at Level 2")?.strategy).toBe("not-covered");
      expect(classifyCoverage("Cosmetic surgery is excluded")?.strategy).toBe("excluded");
    });

    it("ignores negated exclusions", () => {
      expect(classifyCoverage("Haemodialysis is not excluded at Level 4")).toBeNull();
      expect(classifyCoverage("Physiotherapy is no longer excluded")).toBeNull();
    });
    it("does not read a missing coverage limit as an exclusion", () => {
      expect(classifyCoverage("Physiotherapy at Level 3-6, no coverage limit applies.")).toBeNull();
      expect(classifyCoverage("No cover cap for maternity")).toBeNull();
      expect(classifyCoverage("No coverage for cosmetic procedures")?.strategy).toBe("no-coverage");
    });
  });

  describe("classifyCoverageClauses", () => {
    it("separates included and excluded clauses of a mixed line", () => {
      expect(classifyCoverageClauses("MRI covered at Level 4-6; excluded at Level 2.")).toEqual({
        included: ["MRI covered at Level 4-6;"],
        excluded: ["excluded at Level 2."],
      });
    });

    it("splits on contrastive conjunctions", () => {
      expect(classifyCoverageClauses("CT scan is covered at Level 5, but not covered at Level 3")).toEqual({
        included: ["CT scan is covered at Level 5"],
        excluded: ["not covered at Level 3"],
      });
    });

    it("drops clauses that state no coverage either way", () => {
      expect(classifyCoverageClauses("Dental implants are not covered. Applies at Level 2-6.")).toEqual({
        included: [],
        excluded: ["Dental implants are not covered."],
      });
    });
  });

  describe("findLimits", () => {
    it("extracts weekly and total limits", () => {
      const limits = findLimits("Haemodialysis 3 sessions per week, maximum of 156 sessions");
      expect(limits.map((l) => l.value)).toEqual([
        { type: "per_week", value: 3 },
        { type: "max_total", value: 156 },
      ]);
    });

    it("reads frequency words as inferred limits", () => {
      const [limit] = findLimits("Physiotherapy twice a week");
      expect(limit.value).toEqual({ type: "per_week", value: 2 });
      expect(limit.confidence).toBe("inferred");
    });

    it("does not read digits of a money amount as a count", () => {
      const text = "KES 3 per week";
      expect(findLimits(text, findAmounts(text))).toEqual([]);
    });
  });

  it("detects coverage conditions", () => {
    expect(findCoverageConditions("Subject to pre-authorization and a co-payment")).toEqual([
      "pre_authorization_required",
      "copay_applicable",
    ]);
  });
});

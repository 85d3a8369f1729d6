import { describe, expect, it } from "vitest";

import { ServiceKeyResolver, normalizeServiceDescription, serviceKeyOptionsFromConfig } from "@/lib/analyzer/service-key";
import { loadDefaultConfig, makeRule } from "@test/helpers/test-helpers";

function resolver(similarityThreshold = 0.8, maxKeyLength = 64): ServiceKeyResolver {
  return new ServiceKeyResolver({ similarityThreshold, maxKeyLength, defaultCategory: "OTHER" });
}

describe("normalizeServiceDescription", () => {
  it("drops amounts, facility tiers and billing units", () => {
    expect(normalizeServiceDescription("Haemodialysis (Level 4-6) KES 9,600 per session")).toBe("haemodialysis");
  });

  it("lowercases and strips punctuation", () => {
    expect(normalizeServiceDescription("C-Section / Caesarean")).toBe("c section caesarean");
  });
});

describe("ServiceKeyResolver", () => {
  it("prefixes keys with the category", () => {
    expect(resolver().resolve("CT scan", "IMAGING")).toBe("imaging_ct_scan");
    expect(resolver().resolve("CT scan")).toBe("other_ct_scan");
  });

  it("merges spelling variants within a category", () => {
    const rules = [
      makeRule({ id: "a", service: "Hemodialysis", category: "DIALYSIS" }),
      makeRule({ id: "b", service: "Haemodialysis", category: "DIALYSIS" }),
    ];
    expect(resolver().resolveAll(rules).map((r) => r.service_key)).toEqual([
      "dialysis_haemodialysis",
      "dialysis_haemodialysis",
    ]);
  });

  it("keeps distinct services apart", () => {
    const rules = [
      makeRule({ id: "a", service: "MRI scan", category: "IMAGING" }),
      makeRule({ id: "b", service: "CT scan", category: "IMAGING" }),
    ];
    expect(resolver().resolveAll(rules).map((r) => r.service_key)).toEqual(["imaging_mri_scan", "imaging_ct_scan"]);
  });

  it("never merges across categories", () => {
    const rules = [
      makeRule({ id: "a", service: "Counselling", category: "MENTAL" }),
      makeRule({ id: "b", service: "Counselling", category: "MATERNITY" }),
    ];
    expect(resolver().resolveAll(rules).map((r) => r.service_key)).toEqual([
      "mental_counselling",
      "maternity_counselling",
    ]);
  });

  it("assigns the same keys regardless of input order", () => {
    const rules = [
      makeRule({ id: "a", service: "Hemodialysis", category: "DIALYSIS" }),
      makeRule({ id: "b", service: "Haemodialysis", category: "DIALYSIS" }),
      makeRule({ id: "c", service: "Chemotherapy", category: "ONCOLOGY" }),
      makeRule({ id: "d", service: "Chemotheraphy", category: "ONCOLOGY" }),
    ];
    const keysOf = (resolved: typeof rules) =>
      Object.fromEntries(resolved.map((r) => [r.id, r.service_key]));

    const forward = keysOf(resolver().resolveAll(rules));
    const reversed = keysOf(resolver().resolveAll([...rules].reverse()));
    expect(reversed).toEqual(forward);
    expect(forward).toEqual({
      a: "dialysis_haemodialysis",
      b: "dialysis_haemodialysis",
      c: "oncology_chemotheraphy",
      d: "oncology_chemotheraphy",
    });
  });

  it("respects a stricter similarity threshold", () => {
    const rules = [
      makeRule({ id: "a", service: "Hemodialysis", category: "DIALYSIS" }),
      makeRule({ id: "b", service: "Haemodialysis", category: "DIALYSIS" }),
    ];
    expect(resolver(0.9).resolveAll(rules).map((r) => r.service_key)).toEqual([
      "dialysis_hemodialysis",
      "dialysis_haemodialysis",
    ]);
  });

  it("truncates long keys without a trailing separator", () => {
    expect(resolver(0.8, 20).resolve("Comprehensive geriatric assessment")).toBe("other_comprehensive");
  });

  it("uses a placeholder body when nothing identifying remains", () => {
    expect(resolver().resolve("KES 500", "OTHER")).toBe("other_unspecified");
  });

  it("reads its options from the analysis config", () => {
    expect(serviceKeyOptionsFromConfig(loadDefaultConfig())).toEqual({
      similarityThreshold: 0.8,
      maxKeyLength: 64,
      defaultCategory: "OTHER",
    });
  });
});

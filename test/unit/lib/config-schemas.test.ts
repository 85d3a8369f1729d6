/**
 * Config Schemas Tests
 *
 * @module config-schemas.test
 */

import { describe, expect, it } from "vitest";
import {
  AnalysisConfigSchema,
  ExpectationConfigSchema,
  canonicalizeJson,
  computeContentHash,
  formatZodIssues,
} from "@/lib/config-schemas";
import { loadDefaultConfig } from "@test/helpers/test-helpers";

describe("AnalysisConfigSchema", () => {
  it("accepts the shipped defaults", () => {
    expect(AnalysisConfigSchema.safeParse(loadDefaultConfig()).success).toBe(true);
  });

  it("rejects an unknown schema version", () => {
    const result = AnalysisConfigSchema.safeParse({ ...loadDefaultConfig(), schemaVersion: "0.9.0" });
    expect(result.success).toBe(false);
  });

  it("rejects an inverted facility range", () => {
    const config = loadDefaultConfig();
    const result = AnalysisConfigSchema.safeParse({
      ...config,
      facilityLevels: { ...config.facilityLevels, min: 7, max: 6 },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toEqual([
        "facilityLevels.min: facilityLevels.min must not exceed facilityLevels.max",
      ]);
    }
  });

  it("accepts only the JSON insight backend", () => {
    const config = loadDefaultConfig();
    const result = AnalysisConfigSchema.safeParse({
      ...config,
      insights: { ...config.insights, backend: "sqlite" },
    });
    expect(result.success).toBe(false);
  });

  it("bounds collaborator concurrency", () => {
    const config = loadDefaultConfig();
    const result = AnalysisConfigSchema.safeParse({
      ...config,
      collaborator: { ...config.collaborator, maxConcurrency: 0 },
    });
    expect(result.success).toBe(false);
  });
});

describe("ExpectationConfigSchema", () => {
  it("requires at least one condition", () => {
    const result = ExpectationConfigSchema.safeParse({ conditions: {} });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodIssues(result.error)).toEqual(["conditions: at least one condition is required"]);
    }
  });

  it("trims keywords", () => {
    const result = ExpectationConfigSchema.parse({
      conditions: { Epilepsy: { expected_keywords: [" anticonvulsant "], risk_level: "MEDIUM" } },
    });
    expect(result.conditions.Epilepsy.expected_keywords).toEqual(["anticonvulsant"]);
  });
});

describe("canonicalization", () => {
  it("hashes independently of key order", () => {
    const a = computeContentHash(canonicalizeJson({ b: 1, a: { d: 2, c: [3, { f: 4, e: 5 }] } }));
    const b = computeContentHash(canonicalizeJson({ a: { c: [3, { e: 5, f: 4 }], d: 2 }, b: 1 }));
    expect(a).toBe(b);
  });

  it("sorts nested keys", () => {
    expect(canonicalizeJson({ b: 1, a: 2 })).toBe('{\n  "a": 2,\n  "b": 1\n}');
  });
});

/**
 * Configuration Schemas
 *
 * Zod schemas for validating and canonicalizing the analysis configuration and
 * the externally authored condition expectation mapping.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";
import crypto from "crypto";

// ============================================================================
// TYPES
// ============================================================================

export const SCHEMA_VERSIONS = {
  analysis: "1.0.0",
  expectations: "1.0.0",
} as const;

export const CONFIDENCE_TIERS = ["HIGH", "MEDIUM", "LOW"] as const;
export const RISK_LEVELS = ["HIGH", "MEDIUM", "LOW"] as const;

const TierSchema = z.enum(CONFIDENCE_TIERS);
const ratio = () => z.number().min(0).max(1);

// ============================================================================
// ANALYSIS CONFIG SCHEMA (1.0.0)
// ============================================================================

export const AnalysisConfigSchema = z
  .object({
    schemaVersion: z.literal(SCHEMA_VERSIONS.analysis),

    facilityLevels: z.object({
      min: z.number().int().min(0),
      max: z.number().int().min(1).max(20),
      // Phrase (matched case-insensitively) -> levels it implies
      synonyms: z.record(z.string().min(1), z.array(z.number().int()).min(1)),
    }),

    categories: z.object({
      defaultCategory: z.string().min(1),
      // Insertion order is the classification priority
      keywords: z.record(z.string().min(1), z.array(z.string().min(1)).min(1)),
    }),

    serviceKey: z.object({
      // Dice similarity at or above which two descriptions share a key.
      // Lower merges more spelling variants but risks collapsing distinct services.
      similarityThreshold: ratio(),
      maxKeyLength: z.number().int().min(16).max(256),
    }),

    evidence: z.object({
      minSnippetChars: z.number().int().min(0),
      maxSnippetChars: z.number().int().min(20),
    }),

    contradictions: z.object({
      tariffVarianceThreshold: z.number().min(0),
      highSeverityVariance: z.number().min(0),
      clinicalRiskCategories: z.array(z.string().min(1)),
    }),

    gaps: z.object({
      adequacyThreshold: z.number().int().min(1),
      fuzzyThreshold: ratio(),
      fuzzyMinKeywordLength: z.number().int().min(2),
      maxEvidenceSnippets: z.number().int().min(1).max(20),
    }),

    confidence: z.object({
      tierValues: z.object({ HIGH: ratio(), MEDIUM: ratio(), LOW: ratio() }),
      corroboration: z.object({
        high: z.number().int().min(1),
        medium: z.number().int().min(0),
      }),
      agreement: z.object({ high: ratio(), medium: ratio() }),
    }),

    insights: z.object({
      mode: z.enum(["ephemeral", "cumulative"]),
      backend: z.enum(["json"]),
      storePath: z.string().min(1),
      similarityGate: z.enum(["deterministic", "collaborator"]),
      nearDuplicateThreshold: ratio(),
    }),

    collaborator: z.object({
      mode: z.enum(["never", "auto", "always"]),
      provider: z.enum(["anthropic", "openai"]),
      model: z.string().min(1).nullable(),
      fallbackModel: z.string().min(1).nullable(),
      maxConcurrency: z.number().int().min(1).max(16),
      timeoutMs: z.number().int().min(100).max(300_000),
      temperature: z.number().min(0).max(2),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.facilityLevels.min > config.facilityLevels.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["facilityLevels", "min"],
        message: "facilityLevels.min must not exceed facilityLevels.max",
      });
    }
    if (config.evidence.minSnippetChars > config.evidence.maxSnippetChars) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["evidence", "minSnippetChars"],
        message: "evidence.minSnippetChars must not exceed evidence.maxSnippetChars",
      });
    }
    if (config.confidence.corroboration.medium > config.confidence.corroboration.high) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["confidence", "corroboration"],
        message: "corroboration.medium must not exceed corroboration.high",
      });
    }
    if (config.confidence.agreement.medium > config.confidence.agreement.high) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["confidence", "agreement"],
        message: "agreement.medium must not exceed agreement.high",
      });
    }
  });

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type ConfidenceTier = z.infer<typeof TierSchema>;

// ============================================================================
// EXPECTATION CONFIG SCHEMA (1.0.0)
// ============================================================================

export const ConditionExpectationSchema = z.object({
  expected_keywords: z
    .array(z.string().trim().min(1, "keywords must not be blank"))
    .min(1, "expected_keywords must list at least one keyword"),
  risk_level: z.enum(RISK_LEVELS),
});

export const ExpectationConfigSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSIONS.expectations).optional(),
  conditions: z
    .record(z.string().trim().min(1, "condition names must not be blank"), ConditionExpectationSchema)
    .refine((conditions) => Object.keys(conditions).length > 0, {
      message: "at least one condition is required",
    }),
});

export type ConditionExpectation = z.infer<typeof ConditionExpectationSchema>;
export type ExpectationConfig = z.infer<typeof ExpectationConfigSchema>;
export type RiskLevel = ConditionExpectation["risk_level"];

// ============================================================================
// CANONICALIZATION
// ============================================================================

/**
 * Format zod issues as `path: message` strings.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value).sort(([a], [b]) => a.localeCompare(b))) {
      sorted[key] = sortKeysDeep(child);
    }
    return sorted;
  }
  return value;
}

/**
 * Canonicalize JSON content for consistent hashing.
 */
export function canonicalizeJson(obj: object): string {
  return JSON.stringify(sortKeysDeep(obj), null, 2);
}

export function computeContentHash(canonicalizedContent: string): string {
  return crypto.createHash("sha256").update(canonicalizedContent).digest("hex");
}

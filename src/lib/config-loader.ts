/**
 * Configuration Loader
 *
 * Loads file-backed analysis and expectation configs and resolves environment
 * variable overrides. Every override is validated before it is accepted.
 *
 * @module config-loader
 * @version 1.0.0
 */

import { readFile } from "fs/promises";
import path from "path";
import {
  AnalysisConfigSchema,
  ExpectationConfigSchema,
  canonicalizeJson,
  computeContentHash,
  formatZodIssues,
  type AnalysisConfig,
  type ExpectationConfig,
} from "./config-schemas";
import { ConfigValidationError } from "./errors";

export type { AnalysisConfig, ExpectationConfig } from "./config-schemas";

// ============================================================================
// CONFIGURATION
// ============================================================================

const ANALYSIS_CONFIG_FILE = "analysis.default.json";
const EXPECTATIONS_CONFIG_FILE = "expectations.default.json";

// Override policy
type OverridePolicy = "on" | "off" | string; // string for "allowlist:VAR1,VAR2"

type Env = Record<string, string | undefined>;

function getOverridePolicy(env: Env): OverridePolicy {
  return env.BPA_CONFIG_ENV_OVERRIDES || "on";
}

export function resolveConfigDir(env: Env = process.env): string {
  return env.BPA_CONFIG_DIR
    ? path.resolve(env.BPA_CONFIG_DIR)
    : path.resolve(process.cwd(), "configs");
}

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue?: string | number | boolean;
}

export interface ResolvedAnalysisConfig {
  config: AnalysisConfig;
  contentHash: string;
  source: string;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
}

// ============================================================================
// ENV VAR MAPPINGS
// ============================================================================

type EnvMapping = { fieldPath: string; parser: (v: string) => unknown };

const parseList = (v: string) => v.split(",").map((s) => s.trim()).filter(Boolean);

const ANALYSIS_ENV_MAP: Record<string, EnvMapping> = {
  BPA_TARIFF_VARIANCE_THRESHOLD: { fieldPath: "contradictions.tariffVarianceThreshold", parser: (v) => parseFloat(v) },
  BPA_HIGH_SEVERITY_VARIANCE: { fieldPath: "contradictions.highSeverityVariance", parser: (v) => parseFloat(v) },
  BPA_CLINICAL_RISK_CATEGORIES: { fieldPath: "contradictions.clinicalRiskCategories", parser: parseList },
  BPA_SERVICE_KEY_SIMILARITY: { fieldPath: "serviceKey.similarityThreshold", parser: (v) => parseFloat(v) },
  BPA_ADEQUACY_THRESHOLD: { fieldPath: "gaps.adequacyThreshold", parser: (v) => parseInt(v, 10) },
  BPA_GAP_FUZZY_THRESHOLD: { fieldPath: "gaps.fuzzyThreshold", parser: (v) => parseFloat(v) },
  BPA_INSIGHT_MODE: { fieldPath: "insights.mode", parser: (v) => v },
  BPA_INSIGHT_BACKEND: { fieldPath: "insights.backend", parser: (v) => v },
  BPA_INSIGHT_STORE_PATH: { fieldPath: "insights.storePath", parser: (v) => v },
  BPA_SIMILARITY_GATE: { fieldPath: "insights.similarityGate", parser: (v) => v },
  BPA_COLLABORATOR_MODE: { fieldPath: "collaborator.mode", parser: (v) => v },
  BPA_LLM_PROVIDER: { fieldPath: "collaborator.provider", parser: (v) => v.toLowerCase() },
  BPA_LLM_MODEL: { fieldPath: "collaborator.model", parser: (v) => v },
  BPA_LLM_FALLBACK_MODEL: { fieldPath: "collaborator.fallbackModel", parser: (v) => v },
  BPA_COLLABORATOR_CONCURRENCY: { fieldPath: "collaborator.maxConcurrency", parser: (v) => parseInt(v, 10) },
  BPA_COLLABORATOR_TIMEOUT_MS: { fieldPath: "collaborator.timeoutMs", parser: (v) => parseInt(v, 10) },
};

// ============================================================================
// OVERRIDE RESOLUTION
// ============================================================================

function applyOverrides(
  base: AnalysisConfig,
  env: Env,
): { result: AnalysisConfig; overrides: OverrideRecord[]; skippedOverrides: string[] } {
  const policy = getOverridePolicy(env);
  const skippedOverrides: string[] = [];
  const overrides: OverrideRecord[] = [];

  if (policy === "off") {
    return { result: base, overrides, skippedOverrides };
  }

  let allowlist: Set<string> | null = null;
  if (policy.startsWith("allowlist:")) {
    allowlist = new Set(parseList(policy.slice("allowlist:".length)));
  }

  let result = base;

  // Apply each env var if set, validating after each override
  for (const [envVar, mapping] of Object.entries(ANALYSIS_ENV_MAP)) {
    if (allowlist && !allowlist.has(envVar)) continue;

    const envValue = env[envVar];
    if (envValue === undefined || envValue === "") continue;

    const parsed = mapping.parser(envValue);
    if (typeof parsed === "number" && Number.isNaN(parsed)) {
      console.warn(`[Config-Loader] Failed to parse ${envVar}=${envValue}`);
      skippedOverrides.push(`${envVar} (unparseable)`);
      continue;
    }

    const tentative: Record<string, unknown> = JSON.parse(JSON.stringify(result));
    setNestedValue(tentative, mapping.fieldPath, parsed);

    const validation = AnalysisConfigSchema.safeParse(tentative);
    if (!validation.success) {
      console.warn(
        `[Config-Loader] Skipping invalid override ${envVar}=${envValue}: ` +
          validation.error.issues.map((i) => i.message).join(", "),
      );
      skippedOverrides.push(`${envVar} (invalid: ${validation.error.issues[0]?.message})`);
      continue;
    }

    result = validation.data;
    overrides.push({
      envVar,
      fieldPath: mapping.fieldPath,
      appliedValue:
        typeof parsed === "string" || typeof parsed === "number" || typeof parsed === "boolean"
          ? parsed
          : undefined,
    });
  }

  return { result, overrides, skippedOverrides };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, fieldPath: string, value: unknown): void {
  const parts = fieldPath.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

// ============================================================================
// FILE LOADING
// ============================================================================

async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError("Config file could not be read", [reason], filePath);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError("Config file is not valid JSON", [reason], filePath);
  }
}

/**
 * Validate an in-memory analysis config. Throws ConfigValidationError listing every issue.
 */
export function parseAnalysisConfig(content: unknown, source = "(inline)"): AnalysisConfig {
  const validation = AnalysisConfigSchema.safeParse(content);
  if (!validation.success) {
    throw new ConfigValidationError("Invalid analysis config", formatZodIssues(validation.error), source);
  }
  return validation.data;
}

/**
 * Validate an expectation mapping. Malformed or missing condition entries fail here
 * rather than being skipped at analysis time.
 */
export function parseExpectationConfig(content: unknown, source = "(inline)"): ExpectationConfig {
  const validation = ExpectationConfigSchema.safeParse(content);
  if (!validation.success) {
    throw new ConfigValidationError("Invalid expectation config", formatZodIssues(validation.error), source);
  }
  return validation.data;
}

export interface LoadConfigOptions {
  configDir?: string;
  env?: Env;
}

/**
 * Load analysis config from `<configDir>/analysis.default.json` and apply env overrides.
 */
export async function loadAnalysisConfig(options: LoadConfigOptions = {}): Promise<ResolvedAnalysisConfig> {
  const env = options.env ?? process.env;
  const source = path.join(options.configDir ?? resolveConfigDir(env), ANALYSIS_CONFIG_FILE);

  const base = parseAnalysisConfig(await readJsonFile(source), source);
  const { result, overrides, skippedOverrides } = applyOverrides(base, env);

  if (overrides.length > 0) {
    console.log(
      `[Config-Loader] Applied ${overrides.length} override(s): ${overrides.map((o) => o.envVar).join(", ")}`,
    );
  }

  return {
    config: result,
    contentHash: computeContentHash(canonicalizeJson(result)),
    source,
    overrides,
    skippedOverrides,
  };
}

/**
 * Load the condition expectation mapping. Defaults to `<configDir>/expectations.default.json`.
 */
export async function loadExpectationConfig(
  filePath?: string,
  options: LoadConfigOptions = {},
): Promise<ExpectationConfig> {
  const env = options.env ?? process.env;
  const source = filePath
    ? path.resolve(filePath)
    : path.join(options.configDir ?? resolveConfigDir(env), EXPECTATIONS_CONFIG_FILE);
  return parseExpectationConfig(await readJsonFile(source), source);
}

/**
 * Reasoning Collaborator
 *
 * Narrow interface to the optional LLM collaborator plus the AI SDK backed
 * implementation. The collaborator is never required: callers wrap every call
 * in a timeout and fall back to the deterministic result on any failure.
 *
 * @module analyzer/collaborator
 */

import { generateText } from "ai";
import { z } from "zod";
import type { AnalysisConfig } from "../config-schemas";
import { CollaboratorResponseError, CollaboratorTimeoutError } from "../errors";
import { parseJsonResponse } from "./json";
import { getFallbackModelForTask, getModelForTask, type ModelInfo, type ModelTask } from "./llm";
import type { CandidateContradiction, Rule } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface SimilarityPair {
  id: string;
  textA: string;
  textB: string;
}

export interface ChunkReviewRequest {
  chunkId: string;
  page: number;
  rules: Rule[];
}

export interface RuleAgreement {
  rule_id: string;
  /** 0..1, how well the extracted fields match the rule text */
  score: number;
}

export interface ChunkReviewResult {
  agreements: RuleAgreement[];
  candidates: CandidateContradiction[];
}

export interface PolicyCollaborator {
  readonly name: string;
  reviewChunk(request: ChunkReviewRequest, signal: AbortSignal): Promise<ChunkReviewResult>;
  scoreSimilarity(pairs: SimilarityPair[], signal: AbortSignal): Promise<Map<string, number>>;
}

// ============================================================================
// TIMEOUT
// ============================================================================

/**
 * Run `fn` with its own abort signal; rejects with CollaboratorTimeoutError when
 * `timeoutMs` elapses first.
 */
export async function runWithTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so the race reports the timeout, not the callee's abort error
      reject(new CollaboratorTimeoutError(operation, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

const ChunkReviewResponseSchema = z.object({
  agreements: z
    .array(z.object({ rule_id: z.string().min(1), score: z.number().min(0).max(1) }))
    .default([]),
  candidates: z
    .array(
      z.object({
        type: z.enum(["Tariff", "Limit", "Coverage", "Facility-exclusion"]),
        left_rule_id: z.string().min(1),
        right_rule_id: z.string().min(1),
        details: z.string().default(""),
        severity: z.enum(["HIGH", "MEDIUM"]).optional(),
      }),
    )
    .default([]),
});

const SimilarityResponseSchema = z.object({
  scores: z.array(z.object({ id: z.string().min(1), score: z.number().min(0).max(1) })),
});

// ============================================================================
// PROMPTS
// ============================================================================

function describeRule(rule: Rule): Record<string, unknown> {
  return {
    rule_id: rule.id,
    service: rule.service,
    service_key: rule.service_key,
    tariff_value: rule.tariff_value,
    tariff_unit: rule.tariff_unit,
    coverage_status: rule.coverage_status,
    facility_levels: rule.facility_levels,
    limits: rule.limits,
    text: rule.evidence_snippet,
  };
}

function buildChunkReviewPrompt(request: ChunkReviewRequest): string {
  return [
    `You are reviewing structured rules extracted from page ${request.page} of a health benefits policy.`,
    "For each rule, score from 0 to 1 how faithfully the structured fields reflect the rule text.",
    "Also list contradictions between rules on this page that share a service_key",
    "(types: Tariff, Limit, Coverage, Facility-exclusion), referencing rules by rule_id.",
    "Only report contradictions grounded in the given text; report none when unsure.",
    'Respond with JSON only: {"agreements":[{"rule_id":"...","score":0.0}],"candidates":[{"type":"Tariff","left_rule_id":"...","right_rule_id":"...","details":"...","severity":"MEDIUM"}]}',
    "",
    "RULES:",
    JSON.stringify(request.rules.map(describeRule), null, 2),
  ].join("\n");
}

function buildSimilarityPrompt(pairs: SimilarityPair[]): string {
  return [
    "Score from 0 to 1 whether each pair of findings describes the same underlying policy issue.",
    "1 means the same issue in different words; 0 means unrelated issues.",
    'Respond with JSON only: {"scores":[{"id":"...","score":0.0}]}',
    "",
    "PAIRS:",
    JSON.stringify(pairs.map((p) => ({ id: p.id, a: p.textA, b: p.textB })), null, 2),
  ].join("\n");
}

// ============================================================================
// LLM COLLABORATOR
// ============================================================================

export interface LlmCollaboratorOptions {
  config: AnalysisConfig["collaborator"];
  /** Model override per task, mainly for tests */
  models?: Partial<Record<ModelTask, ModelInfo>>;
  /** Fallback override per task; null turns the fallback off */
  fallbackModels?: Partial<Record<ModelTask, ModelInfo | null>>;
}

export class LlmPolicyCollaborator implements PolicyCollaborator {
  readonly name = "llm";

  constructor(private readonly options: LlmCollaboratorOptions) {}

  private modelFor(task: ModelTask): ModelInfo {
    return this.options.models?.[task] ?? getModelForTask(task, this.options.config);
  }

  private fallbackFor(task: ModelTask): ModelInfo | null {
    const override = this.options.fallbackModels?.[task];
    return override !== undefined ? override : getFallbackModelForTask(task, this.options.config);
  }

  /**
   * One request against the primary model; on failure, one more against the
   * fallback model unless the caller has aborted.
   */
  private async complete<T>(task: ModelTask, prompt: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, signal: AbortSignal): Promise<T> {
    const primary = this.modelFor(task);
    try {
      return await this.attempt(primary, task, prompt, schema, signal);
    } catch (error) {
      const fallback = this.fallbackFor(task);
      if (signal.aborted || !fallback || fallback.modelName === primary.modelName) throw error;
      console.warn(
        `[Collaborator] ${task} failed with ${primary.modelName} (${error instanceof Error ? error.message : String(error)}); ` +
          `retrying with ${fallback.modelName}`,
      );
      return this.attempt(fallback, task, prompt, schema, signal);
    }
  }

  private async attempt<T>(
    modelInfo: ModelInfo,
    task: ModelTask,
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal: AbortSignal,
  ): Promise<T> {
    const result = await generateText({
      model: modelInfo.model,
      messages: [{ role: "user", content: prompt }],
      temperature: this.options.config.temperature,
      abortSignal: signal,
    });

    const parsed = parseJsonResponse(result.text);
    if (parsed === null) {
      throw new CollaboratorResponseError(`${modelInfo.modelName} returned no JSON object`, task, result.text);
    }
    const validation = schema.safeParse(parsed);
    if (!validation.success) {
      const issue = validation.error.issues[0];
      throw new CollaboratorResponseError(
        `${modelInfo.modelName} response failed validation: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue"}`,
        task,
        result.text,
      );
    }
    return validation.data;
  }

  async reviewChunk(request: ChunkReviewRequest, signal: AbortSignal): Promise<ChunkReviewResult> {
    const response = await this.complete("chunk_review", buildChunkReviewPrompt(request), ChunkReviewResponseSchema, signal);
    const known = new Set(request.rules.map((r) => r.id));
    return {
      agreements: response.agreements.filter((a) => known.has(a.rule_id)),
      candidates: response.candidates,
    };
  }

  async scoreSimilarity(pairs: SimilarityPair[], signal: AbortSignal): Promise<Map<string, number>> {
    if (pairs.length === 0) return new Map();
    const response = await this.complete("similarity", buildSimilarityPrompt(pairs), SimilarityResponseSchema, signal);
    const requested = new Set(pairs.map((p) => p.id));
    // Ids the model skipped stay unset
    return new Map(response.scores.filter((s) => requested.has(s.id)).map((s) => [s.id, s.score]));
  }
}

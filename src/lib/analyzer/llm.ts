/**
 * Policy Analyzer - LLM Provider Selection
 *
 * Resolves the collaborator models (primary and fallback) from the analysis config.
 *
 * @module analyzer/llm
 */

import { openai } from "@ai-sdk/openai";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";
import type { AnalysisConfig } from "../config-schemas";

// ============================================================================
// MODEL SELECTION
// ============================================================================

export type LlmProvider = AnalysisConfig["collaborator"]["provider"];

export interface ModelInfo {
  provider: LlmProvider;
  modelName: string;
  model: LanguageModel;
}

export type ModelTask = "chunk_review" | "similarity";

export function normalizeProvider(raw: string): LlmProvider {
  const p = (raw || "").toLowerCase().trim();
  if (p === "anthropic" || p === "claude") return "anthropic";
  return "openai";
}

function detectProviderFromModelName(modelName: string): LlmProvider | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gpt") || /^o\d/.test(name)) return "openai";
  return null;
}

function defaultModelNameForTask(provider: LlmProvider, task: ModelTask): string {
  // Chunk review reads policy text; similarity scoring is short and cheap.
  switch (provider) {
    case "anthropic":
      return task === "chunk_review" ? "claude-sonnet-4-20250514" : "claude-3-5-haiku-20241022";
    case "openai":
    default:
      return task === "chunk_review" ? "gpt-4o" : "gpt-4o-mini";
  }
}

function buildModelInfo(provider: LlmProvider, modelName: string): ModelInfo {
  if (provider === "anthropic") {
    return { provider, modelName, model: anthropic(modelName) };
  }
  return { provider: "openai", modelName, model: openai(modelName) };
}

/**
 * Get the collaborator model for a task.
 *
 * `collaborator.model` overrides the task default unless it names a model of a
 * different provider, in which case the override is ignored with a warning.
 */
export function getModelForTask(task: ModelTask, config: AnalysisConfig["collaborator"]): ModelInfo {
  const provider = normalizeProvider(config.provider);
  let modelName: string | null = null;

  if (config.model) {
    const inferredProvider = detectProviderFromModelName(config.model);
    if (inferredProvider && inferredProvider !== provider) {
      console.warn(
        `[LLM] Ignoring model override "${config.model}" for task "${task}" because provider is "${provider}"`,
      );
    } else {
      modelName = config.model;
    }
  }

  return buildModelInfo(provider, modelName ?? defaultModelNameForTask(provider, task));
}

/**
 * Second model to try when the primary one fails for a task.
 *
 * `collaborator.fallbackModel` wins when set; otherwise the provider's default
 * for the other task tier is used. Returns null when that would repeat the
 * primary model.
 */
export function getFallbackModelForTask(task: ModelTask, config: AnalysisConfig["collaborator"]): ModelInfo | null {
  const primary = getModelForTask(task, config);
  const provider = normalizeProvider(config.provider);

  const fallback = config.fallbackModel
    ? buildModelInfo(detectProviderFromModelName(config.fallbackModel) ?? provider, config.fallbackModel)
    : buildModelInfo(provider, defaultModelNameForTask(provider, task === "chunk_review" ? "similarity" : "chunk_review"));

  return fallback.modelName === primary.modelName ? null : fallback;
}

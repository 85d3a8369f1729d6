/**
 * Chunk Augmentation
 *
 * Optional collaborator pass over page-sized chunks of normalized rules.
 * Chunks run through p-limit at `collaborator.maxConcurrency`, each call under
 * its own timeout. A chunk whose call fails keeps the deterministic result:
 * no agreement scores and no extra candidates.
 *
 * @module analyzer/chunk-augmentation
 */

import pLimit from "p-limit";
import type { AnalysisConfig } from "../config-schemas";
import { classifyError, type ErrorCategory } from "../error-classification";
import { runWithTimeout, type ChunkReviewRequest, type PolicyCollaborator } from "./collaborator";
import type { CandidateContradiction, Rule } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface AugmentationStats {
  chunks: number;
  reviewed: number;
  skipped: number;
  failed: number;
  failuresByCategory: Partial<Record<ErrorCategory, number>>;
}

export interface AugmentationResult {
  /** rule id -> agreement score (0..1) */
  agreements: Map<string, number>;
  candidates: CandidateContradiction[];
  stats: AugmentationStats;
}

export function emptyAugmentation(chunks = 0): AugmentationResult {
  return {
    agreements: new Map(),
    candidates: [],
    stats: { chunks, reviewed: 0, skipped: chunks, failed: 0, failuresByCategory: {} },
  };
}

// ============================================================================
// CHUNKING
// ============================================================================

/** One chunk per source page, in page order. */
export function chunkRulesByPage(rules: Rule[]): ChunkReviewRequest[] {
  const byPage = new Map<number, Rule[]>();
  for (const rule of rules) {
    const group = byPage.get(rule.source_page);
    if (group) group.push(rule);
    else byPage.set(rule.source_page, [rule]);
  }
  return [...byPage.entries()]
    .sort(([a], [b]) => a - b)
    .map(([page, pageRules]) => ({ chunkId: `page-${page}`, page, rules: pageRules }));
}

/** Rules whose extraction left something the collaborator may help with */
export function needsReview(rule: Rule): boolean {
  return (
    rule.tariff_unit === "unspecified" || rule.facility_levels.length === 0 || rule.extraction_confidence === "LOW"
  );
}

export function shouldReviewChunk(
  chunk: ChunkReviewRequest,
  mode: AnalysisConfig["collaborator"]["mode"],
): boolean {
  if (mode === "never") return false;
  if (mode === "always") return true;
  return chunk.rules.some(needsReview);
}

// ============================================================================
// AUGMENTATION
// ============================================================================

export async function augmentWithCollaborator(
  rules: Rule[],
  collaborator: PolicyCollaborator | null,
  config: AnalysisConfig["collaborator"],
): Promise<AugmentationResult> {
  const chunks = chunkRulesByPage(rules);
  if (!collaborator || config.mode === "never") return emptyAugmentation(chunks.length);

  const selected = chunks.filter((chunk) => shouldReviewChunk(chunk, config.mode));
  const limit = pLimit(config.maxConcurrency);
  const result = emptyAugmentation(chunks.length);
  result.stats.skipped = chunks.length - selected.length;

  const reviews = await Promise.all(
    selected.map((chunk) =>
      limit(async () => {
        try {
          const review = await runWithTimeout(`chunk_review(${chunk.chunkId})`, config.timeoutMs, (signal) =>
            collaborator.reviewChunk(chunk, signal),
          );
          return { chunk, review };
        } catch (error) {
          const classified = classifyError(error);
          result.stats.failed++;
          result.stats.failuresByCategory[classified.category] =
            (result.stats.failuresByCategory[classified.category] ?? 0) + 1;
          console.warn(
            `[Collaborator] ${chunk.chunkId} failed (${classified.category}): ${classified.message}; using deterministic result`,
          );
          return { chunk, review: null };
        }
      }),
    ),
  );

  // Merge in chunk order so the outcome does not depend on completion order
  for (const { chunk, review } of reviews) {
    if (!review) continue;
    result.stats.reviewed++;
    const chunkIds = new Set(chunk.rules.map((r) => r.id));
    for (const agreement of review.agreements) {
      if (chunkIds.has(agreement.rule_id)) result.agreements.set(agreement.rule_id, agreement.score);
    }
    result.candidates.push(...review.candidates);
  }

  console.log(
    `[Collaborator] ${collaborator.name}: ${result.stats.reviewed}/${chunks.length} chunk(s) reviewed, ` +
      `${result.stats.failed} failed, ${result.stats.skipped} skipped`,
  );
  return result;
}

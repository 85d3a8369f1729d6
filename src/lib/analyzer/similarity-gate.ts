/**
 * Similarity Gate
 *
 * Decides whether a finding that failed the exact signature check is a
 * near-duplicate of a stored insight. The deterministic gate is a Dice
 * coefficient; the collaborator gate asks the LLM and falls back to the
 * deterministic score on failure or for ids the model skipped.
 *
 * @module analyzer/similarity-gate
 */

import stringSimilarity from "string-similarity";
import { classifyError } from "../error-classification";
import { runWithTimeout, type PolicyCollaborator, type SimilarityPair } from "./collaborator";

export type { SimilarityPair } from "./collaborator";

export interface SimilarityGate {
  readonly name: string;
  /** Scores at or above this merge into the existing entry */
  readonly threshold: number;
  scorePairs(pairs: SimilarityPair[]): Promise<Map<string, number>>;
}

export class DeterministicSimilarityGate implements SimilarityGate {
  readonly name = "deterministic";

  constructor(readonly threshold: number) {}

  async scorePairs(pairs: SimilarityPair[]): Promise<Map<string, number>> {
    return new Map(
      pairs.map((p) => [p.id, stringSimilarity.compareTwoStrings(p.textA.toLowerCase(), p.textB.toLowerCase())]),
    );
  }
}

export class CollaboratorSimilarityGate implements SimilarityGate {
  readonly name = "collaborator";
  private readonly fallback: SimilarityGate;

  constructor(
    private readonly collaborator: PolicyCollaborator,
    readonly threshold: number,
    private readonly timeoutMs: number,
    fallback?: SimilarityGate,
  ) {
    this.fallback = fallback ?? new DeterministicSimilarityGate(threshold);
  }

  async scorePairs(pairs: SimilarityPair[]): Promise<Map<string, number>> {
    if (pairs.length === 0) return new Map();

    const fallbackScores = await this.fallback.scorePairs(pairs);
    try {
      const scores = await runWithTimeout("similarity", this.timeoutMs, (signal) =>
        this.collaborator.scoreSimilarity(pairs, signal),
      );
      return new Map(pairs.map((p) => [p.id, scores.get(p.id) ?? fallbackScores.get(p.id) ?? 0]));
    } catch (error) {
      const classified = classifyError(error);
      console.warn(
        `[Deduplicator] Similarity collaborator failed (${classified.category}): ${classified.message}; using ${this.fallback.name} scores`,
      );
      return fallbackScores;
    }
  }
}

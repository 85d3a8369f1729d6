/**
 * Confidence Scorer
 *
 * Combines pattern specificity, corroborating snippet count and (optionally) a
 * collaborator agreement score into one tier. The result is the weakest tier
 * among the signals present.
 *
 * @module analyzer/confidence-scorer
 */

import type { AnalysisConfig } from "../config-schemas";
import type { ConfidenceTier } from "./types";

export interface ConfidenceSignals {
  /** Extraction tiers of the rules the finding rests on */
  patternTiers: ConfidenceTier[];
  corroboratingSnippets: number;
  /** 0..1, only when the collaborator reviewed the rules */
  agreement?: number;
}

export interface ConfidenceBreakdown {
  tier: ConfidenceTier;
  pattern: ConfidenceTier;
  corroboration: ConfidenceTier;
  agreement: ConfidenceTier | null;
}

const RANK: Record<ConfidenceTier, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

export function minTier(tiers: ConfidenceTier[]): ConfidenceTier {
  return tiers.reduce<ConfidenceTier>((lowest, t) => (RANK[t] < RANK[lowest] ? t : lowest), "HIGH");
}

export class ConfidenceScorer {
  constructor(private readonly config: AnalysisConfig["confidence"]) {}

  tierValue(tier: ConfidenceTier): number {
    return this.config.tierValues[tier];
  }

  corroborationTier(count: number): ConfidenceTier {
    const { high, medium } = this.config.corroboration;
    if (count >= high) return "HIGH";
    if (count >= medium && count > 0) return "MEDIUM";
    return "LOW";
  }

  agreementTier(score: number): ConfidenceTier {
    const { high, medium } = this.config.agreement;
    if (score >= high) return "HIGH";
    if (score >= medium) return "MEDIUM";
    return "LOW";
  }

  score(signals: ConfidenceSignals): ConfidenceBreakdown {
    const pattern = signals.patternTiers.length > 0 ? minTier(signals.patternTiers) : "LOW";
    const corroboration = this.corroborationTier(signals.corroboratingSnippets);
    const agreement =
      signals.agreement !== undefined && Number.isFinite(signals.agreement)
        ? this.agreementTier(signals.agreement)
        : null;

    const tier = minTier(agreement ? [pattern, corroboration, agreement] : [pattern, corroboration]);
    return { tier, pattern, corroboration, agreement };
  }

  /**
   * Numeric confidence for a two-sided finding: the mean of both sides' tier
   * values, capped by the value of the combined tier.
   */
  pairConfidence(left: ConfidenceTier, right: ConfidenceTier, combined: ConfidenceTier): number {
    const mean = (this.tierValue(left) + this.tierValue(right)) / 2;
    return Math.round(Math.min(mean, this.tierValue(combined)) * 1000) / 1000;
  }
}

/**
 * Policy Analyzer - Module Index
 *
 * Re-exports the public types, components and the pipeline entry point.
 *
 * @module analyzer
 */

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type {
  // Input
  RawRuleRecord,

  // Rules
  Rule,
  TariffUnit,
  LimitType,
  CoverageStatus,
  CoverageCondition,

  // Findings
  Contradiction,
  ContradictionType,
  CandidateContradiction,
  EvidenceRef,
  Severity,
  Gap,
  GapMatch,
  GapStatus,

  // Insights
  InsightEntry,
  InsightOutcome,
  InsightRecord,
  InsightStatus,

  ConfidenceTier,
  RiskLevel,
  InsightSnapshot,
  InsightSummary,
  RunRecord,
} from "./types";

export { RawRuleRecordSchema, TARIFF_UNITS, LIMIT_TYPES } from "./types";

// ============================================================================
// COMPONENTS
// ============================================================================

export { RuleNormalizer, buildEvidenceSnippet } from "./rule-normalizer";
export type { NormalizationIssue, NormalizationResult } from "./rule-normalizer";
export { ServiceKeyResolver, normalizeServiceDescription, serviceKeyOptionsFromConfig } from "./service-key";
export { ContradictionDetector, createContradiction } from "./contradiction-detector";
export { GapAnalyzer, NO_MATCHES_MARKER, classifyGapStatus } from "./gap-analyzer";
export { ConfidenceScorer, minTier } from "./confidence-scorer";

// ============================================================================
// INSIGHTS
// ============================================================================

export { InsightDeduplicator, computeSignature } from "./insight-deduplicator";
export { InsightStore, JsonFileInsightBackend, MemoryInsightBackend } from "./insight-store";
export type { InsightBackend, InsightStoreMode } from "./insight-store";
export { DeterministicSimilarityGate, CollaboratorSimilarityGate } from "./similarity-gate";
export type { SimilarityGate } from "./similarity-gate";

// ============================================================================
// COLLABORATOR
// ============================================================================

export { LlmPolicyCollaborator, runWithTimeout } from "./collaborator";
export type { PolicyCollaborator, ChunkReviewRequest, ChunkReviewResult, SimilarityPair } from "./collaborator";
export { augmentWithCollaborator } from "./chunk-augmentation";

// ============================================================================
// PIPELINE
// ============================================================================

export {
  runPolicyAnalysis,
  createInsightStore,
  createCollaborator,
  createSimilarityGate,
  createRunId,
} from "./pipeline";
export type { PolicyAnalysisOptions, PolicyAnalysisResult } from "./pipeline";
export type { ContradictionRow, GapRow } from "./output-records";

// ============================================================================
// DEBUG EXPORTS
// ============================================================================

export { debugLog, clearDebugLog } from "./debug";

/**
 * Policy Analysis Pipeline
 *
 * normalize -> key -> (collaborator review) -> detect contradictions + gaps ->
 * deduplicate against the insight store -> output rows.
 *
 * The store is flushed once, after every stage has succeeded. A run that throws
 * leaves the persisted state untouched.
 *
 * @module analyzer/pipeline
 */

import { randomUUID } from "node:crypto";
import path from "node:path";
import type { AnalysisConfig } from "../config-schemas";
import { augmentWithCollaborator, type AugmentationStats } from "./chunk-augmentation";
import { LlmPolicyCollaborator, type PolicyCollaborator } from "./collaborator";
import { ContradictionDetector } from "./contradiction-detector";
import { ConfidenceScorer } from "./confidence-scorer";
import { clearDebugLog, debugLog } from "./debug";
import { GapAnalyzer } from "./gap-analyzer";
import { contradictionRecord, gapRecord, InsightDeduplicator } from "./insight-deduplicator";
import { InsightStore, JsonFileInsightBackend } from "./insight-store";
import {
  sortContradictionRows,
  sortGapRows,
  toContradictionRow,
  toGapRow,
  type ContradictionRow,
  type GapRow,
} from "./output-records";
import { RuleNormalizer, type NormalizationIssue } from "./rule-normalizer";
import { ServiceKeyResolver, serviceKeyOptionsFromConfig } from "./service-key";
import { CollaboratorSimilarityGate, DeterministicSimilarityGate, type SimilarityGate } from "./similarity-gate";
import type { Contradiction, Gap, InsightOutcome, InsightSummary, Rule } from "./types";

// ============================================================================
// FACTORIES
// ============================================================================

/**
 * Store for the configured mode and backend. Relative store paths resolve
 * against `baseDir` (default: cwd).
 */
export function createInsightStore(config: AnalysisConfig["insights"], baseDir = process.cwd()): InsightStore {
  if (config.mode === "ephemeral") return InsightStore.ephemeral();
  const location = path.resolve(baseDir, config.storePath);
  return new InsightStore(new JsonFileInsightBackend(location), "cumulative");
}

/** null when the collaborator is disabled */
export function createCollaborator(config: AnalysisConfig["collaborator"]): PolicyCollaborator | null {
  return config.mode === "never" ? null : new LlmPolicyCollaborator({ config });
}

export function createSimilarityGate(config: AnalysisConfig, collaborator: PolicyCollaborator | null): SimilarityGate {
  const threshold = config.insights.nearDuplicateThreshold;
  if (config.insights.similarityGate === "collaborator" && collaborator) {
    return new CollaboratorSimilarityGate(collaborator, threshold, config.collaborator.timeoutMs);
  }
  return new DeterministicSimilarityGate(threshold);
}

// ============================================================================
// PIPELINE
// ============================================================================

export interface PolicyAnalysisOptions {
  config: AnalysisConfig;
  /** Condition -> expectation mapping; validated before any work starts */
  expectations: unknown;
  store: InsightStore;
  /** Omit or pass null to run fully deterministic */
  collaborator?: PolicyCollaborator | null;
  /** Defaults to the gate selected by `config.insights.similarityGate` */
  gate?: SimilarityGate;
  runId?: string;
}

export interface PolicyAnalysisResult {
  runId: string;
  rules: Rule[];
  contradictions: Contradiction[];
  gaps: Gap[];
  contradictionRows: ContradictionRow[];
  gapRows: GapRow[];
  issues: NormalizationIssue[];
  rejectedFindings: number;
  augmentation: AugmentationStats;
  /** Store totals including this run */
  insights: InsightSummary;
}

export function createRunId(now = new Date()): string {
  return `run-${now.toISOString()}-${randomUUID().slice(0, 8)}`;
}

export async function runPolicyAnalysis(
  records: unknown[],
  options: PolicyAnalysisOptions,
): Promise<PolicyAnalysisResult> {
  const { config, store } = options;
  const runId = options.runId ?? createRunId();
  const collaborator = options.collaborator ?? null;
  const scorer = new ConfidenceScorer(config.confidence);

  // Fail fast on a malformed mapping
  const gapAnalyzer = new GapAnalyzer(options.expectations, config, scorer);
  const detector = new ContradictionDetector(config, scorer);
  const gate = options.gate ?? createSimilarityGate(config, collaborator);

  clearDebugLog();
  console.log(`[Pipeline] Run ${runId}: ${records.length} record(s), collaborator=${collaborator ? config.collaborator.mode : "off"}`);

  try {
    const normalized = new RuleNormalizer(config).normalizeAll(records);
    const rules = new ServiceKeyResolver(serviceKeyOptionsFromConfig(config)).resolveAll(normalized.rules);
    debugLog("[Pipeline] Service keys", rules.map((r) => ({ id: r.id, service_key: r.service_key })));

    const augmentation = await augmentWithCollaborator(rules, collaborator, config.collaborator);

    const detection = detector.detect(rules, { agreements: augmentation.agreements });
    const adopted = detector.adoptCandidates(augmentation.candidates, rules, detection.contradictions, {
      agreements: augmentation.agreements,
    });
    const contradictions = [...detection.contradictions, ...adopted.contradictions];
    const gaps = gapAnalyzer.analyze(rules);

    store.startRun(runId);
    const deduplicator = new InsightDeduplicator(store, gate);
    const openGaps = gaps.filter((g) => g.status !== "ADEQUATE");
    const outcomes = await deduplicator.process(
      [...contradictions.map(contradictionRecord), ...openGaps.map(gapRecord)],
      runId,
    );
    const contradictionOutcomes = outcomes.slice(0, contradictions.length);
    const gapOutcomes = new Map<Gap, InsightOutcome>(
      openGaps.map((gap, i) => [gap, outcomes[contradictions.length + i]]),
    );

    const insights = store.summary();
    await store.flush();

    const result: PolicyAnalysisResult = {
      runId,
      rules,
      contradictions,
      gaps,
      contradictionRows: sortContradictionRows(
        contradictions.map((c, i) => toContradictionRow(c, contradictionOutcomes[i])),
      ),
      gapRows: sortGapRows(gaps.map((g) => toGapRow(g, gapOutcomes.get(g)))),
      issues: normalized.issues,
      rejectedFindings: detection.rejected + adopted.rejected,
      augmentation: augmentation.stats,
      insights,
    };

    console.log(
      `[Pipeline] Run ${runId} complete: ${rules.length} rule(s), ${contradictions.length} contradiction(s), ` +
        `${openGaps.length} open gap(s); store holds ${insights.unique_insights} insight(s) over ${insights.total_runs} run(s)`,
    );
    return result;
  } catch (error) {
    store.discard();
    console.error(`[Pipeline] Run ${runId} failed; insight store not flushed`, error);
    throw error;
  }
}

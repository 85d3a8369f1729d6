/**
 * Insight Store
 *
 * Key-value store of insights keyed by canonical signature. The store is
 * handed to the deduplicator by the caller; during a run it only takes
 * appends into a pending journal, and `flush()` persists the merged view in a
 * single backend write at run end. In ephemeral mode nothing is persisted.
 *
 * Alongside the insights the store keeps a run counter and a bounded history
 * of per-run counts, written in the same step; `summary()` reports on both.
 *
 * Backends:
 * - MemoryInsightBackend: process-local, used for ephemeral runs and tests
 * - JsonFileInsightBackend: one JSON document, written via temp file + rename
 *
 * @module analyzer/insight-store
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { AnalysisConfig } from "../config-schemas";
import { InsightStoreError } from "../errors";
import type { InsightEntry, InsightKind, InsightRecord, InsightSnapshot, InsightSummary, RunRecord } from "./types";

export type InsightStoreMode = AnalysisConfig["insights"]["mode"];

// ============================================================================
// PERSISTED SHAPE
// ============================================================================

export const InsightRecordSchema = z.object({
  kind: z.enum(["contradiction", "gap"]),
  type: z.string().min(1),
  scope: z.string(),
  subject: z.string(),
  description: z.string(),
  finding: z.record(z.string(), z.unknown()),
});

const PersistedEntrySchema = z.object({
  occurrence_count: z.number().int().min(1),
  first_seen_run_id: z.string().min(1),
  representative_record: InsightRecordSchema,
});

/** `{ [signature]: { occurrence_count, first_seen_run_id, representative_record } }` */
export const PersistedInsightsSchema = z.record(z.string(), PersistedEntrySchema);

export type PersistedInsights = z.infer<typeof PersistedInsightsSchema>;

const RunRecordSchema = z.object({
  run_id: z.string().min(1),
  started_at: z.string(),
  sightings: z.number().int().min(0),
  new_insights: z.number().int().min(0),
});

/** `{ total_runs, runs: [...], insights: { [signature]: ... } }` */
export const PersistedStoreSchema = z.object({
  total_runs: z.number().int().min(0),
  runs: z.array(RunRecordSchema),
  insights: PersistedInsightsSchema,
});

export type PersistedStore = z.infer<typeof PersistedStoreSchema>;

/** A bare signature map, written before run history was kept, reads as a store with no runs */
const LegacyStoreSchema = PersistedInsightsSchema.transform(
  (insights): PersistedStore => ({ total_runs: 0, runs: [], insights }),
);

/** Runs kept in the history; `total_runs` keeps counting past it */
export const MAX_RUN_HISTORY = 100;

export function emptySnapshot(): InsightSnapshot {
  return { entries: [], total_runs: 0, runs: [] };
}

export function toPersisted(snapshot: InsightSnapshot): PersistedStore {
  const insights: PersistedInsights = {};
  for (const entry of snapshot.entries) {
    insights[entry.canonical_signature] = {
      occurrence_count: entry.occurrence_count,
      first_seen_run_id: entry.first_seen_run_id,
      representative_record: entry.representative_record,
    };
  }
  return { total_runs: snapshot.total_runs, runs: snapshot.runs.slice(-MAX_RUN_HISTORY), insights };
}

export function fromPersisted(data: PersistedStore): InsightSnapshot {
  return {
    entries: Object.entries(data.insights).map(([signature, entry]) => ({
      canonical_signature: signature,
      occurrence_count: entry.occurrence_count,
      first_seen_run_id: entry.first_seen_run_id,
      representative_record: entry.representative_record,
    })),
    total_runs: data.total_runs,
    runs: data.runs,
  };
}

function hasRunHistory(raw: unknown): boolean {
  return typeof raw === "object" && raw !== null && "insights" in raw;
}

// ============================================================================
// BACKENDS
// ============================================================================

export interface InsightBackend {
  /** Human-readable location for logs and errors */
  readonly location: string;
  readAll(): Promise<InsightSnapshot>;
  /** Replace the stored contents with `snapshot` in one atomic step */
  writeAll(snapshot: InsightSnapshot): Promise<void>;
  close?(): Promise<void>;
}

export class MemoryInsightBackend implements InsightBackend {
  readonly location = "memory";
  private data: PersistedStore = { total_runs: 0, runs: [], insights: {} };
  writes = 0;

  async readAll(): Promise<InsightSnapshot> {
    return fromPersisted(structuredClone(this.data));
  }

  async writeAll(snapshot: InsightSnapshot): Promise<void> {
    this.data = structuredClone(toPersisted(snapshot));
    this.writes++;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class JsonFileInsightBackend implements InsightBackend {
  constructor(readonly location: string) {}

  async readAll(): Promise<InsightSnapshot> {
    let content: string;
    try {
      content = await readFile(this.location, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return emptySnapshot();
      throw new InsightStoreError(`Failed to read insight store`, this.location, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new InsightStoreError(`Insight store is not valid JSON`, this.location, error);
    }

    const parsed = hasRunHistory(raw) ? PersistedStoreSchema.safeParse(raw) : LegacyStoreSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InsightStoreError(
        `Insight store has an invalid shape${issue ? ` at ${issue.path.join(".")}: ${issue.message}` : ""}`,
        this.location,
        parsed.error,
      );
    }
    return fromPersisted(parsed.data);
  }

  async writeAll(snapshot: InsightSnapshot): Promise<void> {
    const tmpPath = `${this.location}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await mkdir(path.dirname(this.location), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(toPersisted(snapshot), null, 2), "utf-8");
      await rename(tmpPath, this.location);
    } catch (error) {
      try {
        await rm(tmpPath, { force: true });
      } catch (cleanupError) {
        console.warn(`[InsightStore] Could not remove ${tmpPath}`, cleanupError);
      }
      throw new InsightStoreError(`Failed to write insight store`, this.location, error);
    }
  }
}

// ============================================================================
// STORE
// ============================================================================

interface JournalEntry {
  signature: string;
  runId: string;
  record: InsightRecord;
  created: boolean;
}

function bySignature(a: InsightEntry, b: InsightEntry): number {
  return a.canonical_signature < b.canonical_signature ? -1 : a.canonical_signature > b.canonical_signature ? 1 : 0;
}

export class InsightStore {
  private snapshot = new Map<string, InsightEntry>();
  private view = new Map<string, InsightEntry>();
  private journal: JournalEntry[] = [];
  private totalRuns = 0;
  private runs: RunRecord[] = [];
  private currentRun: Pick<RunRecord, "run_id" | "started_at"> | null = null;
  private loaded = false;

  constructor(
    private readonly backend: InsightBackend,
    readonly mode: InsightStoreMode,
  ) {}

  static ephemeral(): InsightStore {
    return new InsightStore(new MemoryInsightBackend(), "ephemeral");
  }

  get location(): string {
    return this.backend.location;
  }

  get pendingCount(): number {
    return this.journal.length;
  }

  /** Reads persisted insights (cumulative mode only). Safe to call repeatedly. */
  async load(): Promise<void> {
    if (this.loaded) return;
    const stored = this.mode === "cumulative" ? await this.backend.readAll() : emptySnapshot();
    this.snapshot = new Map(stored.entries.map((e) => [e.canonical_signature, e]));
    this.view = new Map(this.snapshot);
    this.totalRuns = stored.total_runs;
    this.runs = [...stored.runs];
    this.loaded = true;
  }

  /**
   * Marks the start of a run. The next `flush()` records it in the run history,
   * even when the run appended nothing.
   */
  startRun(runId: string, now = new Date()): void {
    this.currentRun = { run_id: runId, started_at: now.toISOString() };
  }

  private pendingRun(): RunRecord | null {
    if (!this.currentRun) return null;
    const { run_id } = this.currentRun;
    const sightings = this.journal.filter((j) => j.runId === run_id);
    return {
      ...this.currentRun,
      sightings: sightings.length,
      new_insights: sightings.filter((j) => j.created).length,
    };
  }

  get(signature: string): InsightEntry | undefined {
    return this.view.get(signature);
  }

  has(signature: string): boolean {
    return this.view.has(signature);
  }

  entries(filter?: { kind?: InsightKind; type?: string }): InsightEntry[] {
    const all = [...this.view.values()];
    if (!filter) return all;
    return all.filter(
      (e) =>
        (filter.kind === undefined || e.representative_record.kind === filter.kind) &&
        (filter.type === undefined || e.representative_record.type === filter.type),
    );
  }

  /**
   * Appends one sighting. A new signature starts at count 1 with `record` as its
   * representative; an existing one has its count incremented.
   */
  append(signature: string, record: InsightRecord, runId: string): InsightEntry {
    if (!this.loaded) {
      throw new InsightStoreError("Insight store used before load()", this.backend.location);
    }
    const existing = this.view.get(signature);
    this.journal.push({ signature, runId, record, created: !existing });

    const next: InsightEntry = existing
      ? { ...existing, occurrence_count: existing.occurrence_count + 1 }
      : {
          canonical_signature: signature,
          occurrence_count: 1,
          first_seen_run_id: runId,
          representative_record: record,
        };
    this.view.set(signature, next);
    return next;
  }

  /**
   * Persists all appends from this run in one write (cumulative), or drops them
   * (ephemeral). Returns the number of journal entries flushed.
   */
  async flush(): Promise<number> {
    const count = this.journal.length;
    const run = this.pendingRun();
    if (this.mode === "ephemeral") {
      this.discard();
      return count;
    }
    if (count === 0 && !run) return 0;

    const runs = run ? [...this.runs, run].slice(-MAX_RUN_HISTORY) : this.runs;
    const totalRuns = this.totalRuns + (run ? 1 : 0);
    await this.backend.writeAll({ entries: [...this.view.values()], total_runs: totalRuns, runs });

    this.snapshot = new Map(this.view);
    this.runs = runs;
    this.totalRuns = totalRuns;
    this.journal = [];
    this.currentRun = null;
    console.log(
      `[InsightStore] Flushed ${count} sighting(s)${run ? ` for ${run.run_id}` : ""} to ${this.backend.location}`,
    );
    return count;
  }

  /** Drops pending appends and the current run without persisting them. */
  discard(): void {
    this.journal = [];
    this.view = new Map(this.snapshot);
    this.currentRun = null;
  }

  /**
   * Totals over the current view, counting a started but unflushed run as the
   * latest one.
   */
  summary(): InsightSummary {
    const run = this.pendingRun();
    const runs = run ? [...this.runs, run] : this.runs;
    const entries = [...this.view.values()].sort(bySignature);
    const contradictions = entries.filter((e) => e.representative_record.kind === "contradiction");
    const gaps = entries.filter((e) => e.representative_record.kind === "gap");

    const runIndex = new Map(runs.map((r, i) => [r.run_id, i]));
    let latestDiscovery: InsightEntry | null = null;
    let latestIndex = -1;
    for (const entry of entries) {
      const index = runIndex.get(entry.first_seen_run_id) ?? -1;
      if (index > latestIndex) {
        latestDiscovery = entry;
        latestIndex = index;
      }
    }

    return {
      total_runs: this.totalRuns + (run ? 1 : 0),
      unique_insights: entries.length,
      total_sightings: entries.reduce((sum, e) => sum + e.occurrence_count, 0),
      contradictions: contradictions.length,
      gaps: gaps.length,
      high_severity_contradictions: contradictions.filter((e) => e.representative_record.finding.severity === "HIGH")
        .length,
      high_risk_gaps: gaps.filter((e) => e.representative_record.finding.risk_level === "HIGH").length,
      latest_run: runs.length > 0 ? runs[runs.length - 1] : null,
      latest_discovery: latestDiscovery,
    };
  }

  async close(): Promise<void> {
    await this.backend.close?.();
  }
}

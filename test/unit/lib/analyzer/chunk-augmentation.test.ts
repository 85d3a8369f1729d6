import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  augmentWithCollaborator,
  chunkRulesByPage,
  needsReview,
  shouldReviewChunk,
} from "@/lib/analyzer/chunk-augmentation";
import type { ChunkReviewRequest, ChunkReviewResult, PolicyCollaborator } from "@/lib/analyzer/collaborator";
import type { Rule } from "@/lib/analyzer/types";
import { CollaboratorResponseError } from "@/lib/errors";
import { loadDefaultConfig, makeRule, silenceConsole } from "@test/helpers/test-helpers";

type Review = (request: ChunkReviewRequest, signal: AbortSignal) => Promise<ChunkReviewResult>;

function fakeCollaborator(reviewChunk: Review): PolicyCollaborator {
  return {
    name: "fake",
    reviewChunk,
    scoreSimilarity: async () => new Map(),
  };
}

function collaboratorConfig(patch: Partial<ReturnType<typeof loadDefaultConfig>["collaborator"]> = {}) {
  return { ...loadDefaultConfig().collaborator, mode: "always" as const, ...patch };
}

function rulesOnPages(pages: number[]): Rule[] {
  return pages.map((page) => makeRule({ id: `p${page}`, source_page: page }));
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("chunking", () => {
  it("groups rules by page in page order", () => {
    const rules = [
      makeRule({ id: "b", source_page: 9 }),
      makeRule({ id: "a", source_page: 2 }),
      makeRule({ id: "c", source_page: 9 }),
    ];
    expect(chunkRulesByPage(rules).map((c) => [c.chunkId, c.rules.map((r) => r.id)])).toEqual([
      ["page-2", ["a"]],
      ["page-9", ["b", "c"]],
    ]);
  });

  it("flags rules with unresolved fields", () => {
    expect(needsReview(makeRule({ tariff_unit: "per_session", tariff_value: 1500 }))).toBe(false);
    expect(needsReview(makeRule())).toBe(true);
    expect(needsReview(makeRule({ tariff_unit: "per_day", facility_levels: [] }))).toBe(true);
    expect(needsReview(makeRule({ tariff_unit: "per_day", extraction_confidence: "LOW" }))).toBe(true);
  });

  it("selects chunks by mode", () => {
    const clean = { chunkId: "page-1", page: 1, rules: [makeRule({ tariff_unit: "per_day", tariff_value: 800 })] };
    expect(shouldReviewChunk(clean, "auto")).toBe(false);
    expect(shouldReviewChunk(clean, "always")).toBe(true);
    expect(shouldReviewChunk(clean, "never")).toBe(false);
  });
});

describe("augmentWithCollaborator", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("returns the deterministic result without a collaborator", async () => {
    const result = await augmentWithCollaborator(rulesOnPages([1, 2]), null, collaboratorConfig());
    expect(result.agreements.size).toBe(0);
    expect(result.candidates).toEqual([]);
    expect(result.stats).toEqual({ chunks: 2, reviewed: 0, skipped: 2, failed: 0, failuresByCategory: {} });
  });

  it("never calls the collaborator in never mode", async () => {
    const review = vi.fn<Review>(async () => ({ agreements: [], candidates: [] }));
    await augmentWithCollaborator(rulesOnPages([1]), fakeCollaborator(review), collaboratorConfig({ mode: "never" }));
    expect(review).not.toHaveBeenCalled();
  });

  it("runs at most maxConcurrency reviews at once", async () => {
    let active = 0;
    let peak = 0;
    const review = vi.fn<Review>(async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(10);
      active--;
      return { agreements: [], candidates: [] };
    });

    const result = await augmentWithCollaborator(
      rulesOnPages([1, 2, 3, 4, 5, 6, 7]),
      fakeCollaborator(review),
      collaboratorConfig({ maxConcurrency: 3 }),
    );

    expect(review).toHaveBeenCalledTimes(7);
    expect(peak).toBe(3);
    expect(result.stats.reviewed).toBe(7);
  });

  it("keeps the deterministic result for failed or slow chunks", async () => {
    const review: Review = async (request, signal) => {
      if (request.page === 2) throw new CollaboratorResponseError("test-model returned no JSON object", "chunk_review");
      if (request.page === 3) {
        return new Promise<ChunkReviewResult>((_, reject) => signal.addEventListener("abort", () => reject(new Error("aborted"))));
      }
      return { agreements: [{ rule_id: `p${request.page}`, score: 0.7 }], candidates: [] };
    };

    const result = await augmentWithCollaborator(
      rulesOnPages([1, 2, 3]),
      fakeCollaborator(review),
      collaboratorConfig({ timeoutMs: 100 }),
    );

    expect([...result.agreements]).toEqual([["p1", 0.7]]);
    expect(result.stats).toEqual({
      chunks: 3,
      reviewed: 1,
      skipped: 0,
      failed: 2,
      failuresByCategory: { malformed_response: 1, timeout: 1 },
    });
  });

  it("merges in chunk order and ignores agreements for other pages", async () => {
    const review: Review = async (request) => {
      await sleep(request.page === 1 ? 15 : 0);
      return {
        agreements: [
          { rule_id: `p${request.page}`, score: request.page / 10 },
          { rule_id: "p9", score: 1 },
        ],
        candidates: [
          { type: "Limit", left_rule_id: `p${request.page}`, right_rule_id: `p${request.page}`, details: `page ${request.page}` },
        ],
      };
    };

    const result = await augmentWithCollaborator(rulesOnPages([1, 2]), fakeCollaborator(review), collaboratorConfig());

    expect([...result.agreements]).toEqual([
      ["p1", 0.1],
      ["p2", 0.2],
    ]);
    expect(result.candidates.map((c) => c.details)).toEqual(["page 1", "page 2"]);
  });
});

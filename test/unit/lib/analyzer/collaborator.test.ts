/**
 * LLM collaborator tests
 *
 * The AI SDK is mocked; responses are canned JSON strings.
 *
 * @module analyzer/collaborator.test
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

interface GenerateCall {
  model?: unknown;
  messages: Array<{ role: string; content: string }>;
  temperature?: number;
  abortSignal?: AbortSignal;
}

const { generateText } = vi.hoisted(() => ({
  generateText: vi.fn<(call: GenerateCall) => Promise<{ text: string }>>(),
}));

vi.mock("ai", () => ({ generateText }));

vi.mock("@/lib/analyzer/llm", () => ({
  getModelForTask: vi.fn(() => ({ provider: "openai", modelName: "test-model", model: "test-model" })),
  getFallbackModelForTask: vi.fn(() => null),
}));

import { LlmPolicyCollaborator, runWithTimeout } from "@/lib/analyzer/collaborator";
import { getFallbackModelForTask } from "@/lib/analyzer/llm";
import { CollaboratorResponseError, CollaboratorTimeoutError } from "@/lib/errors";
import { loadDefaultConfig, makeRule } from "@test/helpers/test-helpers";

function collaborator(): LlmPolicyCollaborator {
  return new LlmPolicyCollaborator({ config: loadDefaultConfig().collaborator });
}

function withFallback(): LlmPolicyCollaborator {
  return new LlmPolicyCollaborator({
    config: loadDefaultConfig().collaborator,
    fallbackModels: { chunk_review: { provider: "openai", modelName: "backup-model", model: "backup-model" } },
  });
}

function respond(body: unknown) {
  generateText.mockResolvedValueOnce({ text: typeof body === "string" ? body : JSON.stringify(body) });
}

const chunk = {
  chunkId: "page-4",
  page: 4,
  rules: [makeRule({ id: "r1", source_page: 4 }), makeRule({ id: "r2", source_page: 4 })],
};

describe("LlmPolicyCollaborator", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("reviewChunk", () => {
    it("returns agreements for known rules only", async () => {
      respond({
        agreements: [
          { rule_id: "r1", score: 0.9 },
          { rule_id: "ghost", score: 0.1 },
        ],
        candidates: [{ type: "Limit", left_rule_id: "r1", right_rule_id: "r2", details: "Weekly cap differs" }],
      });

      const result = await collaborator().reviewChunk(chunk, new AbortController().signal);

      expect(result).toEqual({
        agreements: [{ rule_id: "r1", score: 0.9 }],
        candidates: [{ type: "Limit", left_rule_id: "r1", right_rule_id: "r2", details: "Weekly cap differs" }],
      });
    });

    it("sends the page rules with the configured temperature and abort signal", async () => {
      respond({ agreements: [] });
      const controller = new AbortController();

      await collaborator().reviewChunk(chunk, controller.signal);

      expect(generateText).toHaveBeenCalledTimes(1);
      const [call] = generateText.mock.calls[0];
      expect(call.temperature).toBe(0.1);
      expect(call.abortSignal).toBe(controller.signal);
      expect(call.messages[0].content).toContain("page 4 of a health benefits policy");
      expect(call.messages[0].content).toContain('"rule_id": "r2"');
    });

    it("defaults missing lists to empty", async () => {
      respond("Sure. {}");
      expect(await collaborator().reviewChunk(chunk, new AbortController().signal)).toEqual({
        agreements: [],
        candidates: [],
      });
    });

    it("rejects a reply without JSON", async () => {
      respond("I could not find any rules.");
      const review = collaborator().reviewChunk(chunk, new AbortController().signal);
      await expect(review).rejects.toBeInstanceOf(CollaboratorResponseError);
      await expect(review).rejects.toThrow("test-model returned no JSON object");
    });

    it("rejects scores out of range", async () => {
      respond({ agreements: [{ rule_id: "r1", score: 1.5 }] });
      await expect(collaborator().reviewChunk(chunk, new AbortController().signal)).rejects.toThrow(
        "test-model response failed validation: agreements.0.score: Number must be less than or equal to 1",
      );
    });
  });

  describe("model fallback", () => {
    it("retries a failed request once with the fallback model", async () => {
      generateText.mockRejectedValueOnce(new Error("503 Service Unavailable"));
      respond({ agreements: [{ rule_id: "r1", score: 0.7 }] });

      const result = await withFallback().reviewChunk(chunk, new AbortController().signal);

      expect(result.agreements).toEqual([{ rule_id: "r1", score: 0.7 }]);
      expect(generateText).toHaveBeenCalledTimes(2);
      expect(generateText.mock.calls.map(([call]) => call.model)).toEqual(["test-model", "backup-model"]);
    });

    it("falls back after a reply without JSON", async () => {
      respond("Unable to comply.");
      respond({ agreements: [] });
      await expect(withFallback().reviewChunk(chunk, new AbortController().signal)).resolves.toEqual({
        agreements: [],
        candidates: [],
      });
    });

    it("reports the fallback model's error when both fail", async () => {
      respond("Unable to comply.");
      respond("Still unable.");
      await expect(withFallback().reviewChunk(chunk, new AbortController().signal)).rejects.toThrow(
        "backup-model returned no JSON object",
      );
    });

    it("does not fall back once the caller has aborted", async () => {
      const controller = new AbortController();
      generateText.mockImplementationOnce(async () => {
        controller.abort();
        throw new Error("This operation was aborted");
      });

      await expect(withFallback().reviewChunk(chunk, controller.signal)).rejects.toThrow("This operation was aborted");
      expect(generateText).toHaveBeenCalledTimes(1);
    });

    it("uses the fallback resolved from the config when none is injected", async () => {
      vi.mocked(getFallbackModelForTask).mockReturnValueOnce({
        provider: "openai",
        modelName: "config-fallback",
        model: "config-fallback",
      });
      generateText.mockRejectedValueOnce(new Error("429 Too Many Requests"));
      respond({ scores: [{ id: "a", score: 0.4 }] });

      const scores = await collaborator().scoreSimilarity(
        [{ id: "a", textA: "chemotherapy oral", textB: "chemotherapy iv" }],
        new AbortController().signal,
      );

      expect([...scores]).toEqual([["a", 0.4]]);
      expect(getFallbackModelForTask).toHaveBeenCalledWith("similarity", loadDefaultConfig().collaborator);
    });
  });

  describe("scoreSimilarity", () => {
    it("skips the call for no pairs", async () => {
      const scores = await collaborator().scoreSimilarity([], new AbortController().signal);
      expect(scores.size).toBe(0);
      expect(generateText).not.toHaveBeenCalled();
    });

    it("keeps requested ids and leaves skipped ones unset", async () => {
      respond({
        scores: [
          { id: "a", score: 0.95 },
          { id: "zz", score: 0.5 },
        ],
      });
      const scores = await collaborator().scoreSimilarity(
        [
          { id: "a", textA: "dialysis haemodialysis", textB: "dialysis hemodialysis" },
          { id: "b", textA: "imaging mri scan", textB: "imaging ct scan" },
        ],
        new AbortController().signal,
      );
      expect([...scores]).toEqual([["a", 0.95]]);
    });
  });
});

describe("runWithTimeout", () => {
  it("resolves with the operation's value", async () => {
    expect(await runWithTimeout("similarity", 1000, async () => 42)).toBe(42);
  });

  it("aborts and rejects once the timeout elapses", async () => {
    const seen: AbortSignal[] = [];
    const pending = runWithTimeout("similarity", 20, (signal) => {
      seen.push(signal);
      return new Promise<number>((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")));
      });
    });

    await expect(pending).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    await expect(pending).rejects.toThrow("Collaborator similarity timed out after 20ms");
    expect(seen.map((s) => s.aborted)).toEqual([true]);
  });
});

/**
 * JsonFileInsightBackend write failures with a filesystem that also refuses cleanup.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("node:fs/promises", () => ({
  mkdir: vi.fn(async () => undefined),
  readFile: vi.fn(),
  writeFile: vi.fn(async () => {
    throw new Error("ENOSPC: no space left on device");
  }),
  rename: vi.fn(),
  rm: vi.fn(async () => {
    throw new Error("EACCES: permission denied");
  }),
}));

import { rm } from "node:fs/promises";
import { JsonFileInsightBackend } from "@/lib/analyzer/insight-store";
import { InsightStoreError } from "@/lib/errors";
import { silenceConsole } from "@test/helpers/test-helpers";

describe("JsonFileInsightBackend.writeAll", () => {
  beforeEach(() => {
    silenceConsole();
  });

  it("reports the write error when temp-file cleanup also fails", async () => {
    const backend = new JsonFileInsightBackend("/srv/audit/insights.json");
    const failure = await backend.writeAll({ entries: [], total_runs: 0, runs: [] }).then(
      () => null,
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(InsightStoreError);
    expect(failure).toMatchObject({
      message: "Failed to write insight store",
      location: "/srv/audit/insights.json",
      cause: new Error("ENOSPC: no space left on device"),
    });
    expect(rm).toHaveBeenCalledTimes(1);
  });
});

import { describe, expect, it, vi } from "vitest";
import { BatchFailedError, NotAvailableError } from "./errors";
import { silentLogger } from "./lib/logger";
import { ProgressTracker } from "./lib/progress";
import { createWorkerPool } from "./lib/queue";
import type { Summarizer, TranscriptAnalysis, TranscriptSource, VideoCatalog } from "./types";
import { createPipeline, type PipelineDeps } from "./worker";

const analysis = (id: string): TranscriptAnalysis => ({
  formattedText: `Formatted ${id}.`,
  summary: `Summary of ${id}`,
  tags: ["tag"],
  keyPoints: ["point"],
});

function setup(overrides: Partial<PipelineDeps> = {}) {
  const tracker = new ProgressTracker();
  const catalog: VideoCatalog = {
    listPlaylist: vi.fn(),
    getVideo: vi.fn(async (id: string) => ({ id, title: `Title ${id}`, channelTitle: "Channel" })),
  };
  const transcripts: TranscriptSource = {
    fetch: vi.fn(async (id: string) => {
      if (id === "bad") throw new NotAvailableError(`No transcript available for video ${id}`);
      return `raw ${id}`;
    }),
  };
  const summarizer: Summarizer = {
    summarize: vi.fn(async (text: string) => analysis(text.replace("raw ", ""))),
  };
  const deps: PipelineDeps = {
    tracker,
    catalog,
    transcripts,
    summarizer,
    logger: silentLogger,
    pool: createWorkerPool(2),
    ...overrides,
  };
  return { deps, pipeline: createPipeline(deps), tracker };
}

describe("pipeline", () => {
  it("merges the videos that succeed and marks the rest failed", async () => {
    const { pipeline, tracker } = setup();

    const result = await pipeline.run({ videoIds: ["a", "bad", "c"], style: "default" });

    expect(result.processed).toEqual(["a", "c"]);
    expect(result.failed).toEqual([{ videoId: "bad", error: "No transcript available for video bad" }]);
    expect(tracker.snapshot(["a", "bad", "c"])).toEqual({
      a: { phase: "merged", progress: 100 },
      bad: { phase: "failed", progress: 0, error: "No transcript available for video bad" },
      c: { phase: "merged", progress: 100 },
    });

    const lines = result.document.split("\n");
    expect(lines[0]).toBe("Video Title: Title a");
    expect(lines).toContain("Error processing video bad: No transcript available for video bad");
    expect(result.document.indexOf("Title a")).toBeLessThan(result.document.indexOf("video bad"));
    expect(result.document.indexOf("video bad")).toBeLessThan(result.document.indexOf("Title c"));
  });

  it("passes the style to the summarizer", async () => {
    const { pipeline, deps } = setup();

    await pipeline.run({ videoIds: ["a"], style: "business" });

    expect(deps.summarizer.summarize).toHaveBeenCalledWith("raw a", "business");
  });

  it("fails the batch when no video survives", async () => {
    const { pipeline, tracker } = setup();

    const error = await pipeline.run({ videoIds: ["bad"], style: "default" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BatchFailedError);
    expect(error).toMatchObject({
      message: "Failed to process any transcripts",
      statusCode: 502,
      failures: [{ videoId: "bad", error: "No transcript available for video bad" }],
    });
    expect(tracker.get("bad")?.phase).toBe("failed");
  });

  it("keeps a summarized job's progress when summarizing fails for a sibling", async () => {
    const summarize = vi.fn(async (text: string) => {
      if (text === "raw b") throw new Error("model overloaded");
      return analysis(text);
    });
    const { pipeline, tracker } = setup({ summarizer: { summarize } });

    await pipeline.run({ videoIds: ["a", "b"], style: "default" });

    expect(tracker.snapshot(["a", "b"])).toEqual({
      a: { phase: "merged", progress: 100 },
      b: { phase: "failed", progress: 50, error: "model overloaded" },
    });
  });

  it("drops duplicate ids and rejects an empty request", async () => {
    const { pipeline, deps } = setup();

    const result = await pipeline.run({ videoIds: ["a", "a"], style: "default" });
    expect(result.processed).toEqual(["a"]);
    expect(deps.transcripts.fetch).toHaveBeenCalledTimes(1);

    await expect(pipeline.run({ videoIds: [], style: "default" })).rejects.toThrow("No video IDs provided");
  });

  it("bounds in-flight videos across concurrent batches", async () => {
    let active = 0;
    let peak = 0;
    const transcripts: TranscriptSource = {
      fetch: vi.fn(async (id: string) => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active -= 1;
        return `raw ${id}`;
      }),
    };
    const { pipeline } = setup({ transcripts, pool: createWorkerPool(1) });

    const results = await Promise.all([
      pipeline.run({ videoIds: ["a1", "a2"], style: "default" }),
      pipeline.run({ videoIds: ["b1", "b2"], style: "default" }),
      pipeline.run({ videoIds: ["c1", "c2"], style: "default" }),
    ]);

    expect(peak).toBe(1);
    expect(transcripts.fetch).toHaveBeenCalledTimes(6);
    expect(results.map((result) => result.processed)).toEqual([
      ["a1", "a2"],
      ["b1", "b2"],
      ["c1", "c2"],
    ]);
  });

  it("summarizes one video while a slower sibling is still scraping", async () => {
    let releaseSlow: (text: string) => void = () => undefined;
    const slowFetch = new Promise<string>((resolve) => {
      releaseSlow = resolve;
    });
    const transcripts: TranscriptSource = {
      fetch: vi.fn((id: string) => (id === "slow" ? slowFetch : Promise.resolve(`raw ${id}`))),
    };
    const siblingPhases: string[] = [];
    const { pipeline, tracker } = setup({
      transcripts,
      summarizer: {
        summarize: vi.fn(async (text: string) => {
          if (text === "raw fast") {
            siblingPhases.push(tracker.get("slow")?.phase ?? "missing");
            releaseSlow("raw slow");
          }
          return analysis(text);
        }),
      },
    });

    const result = await pipeline.run({ videoIds: ["slow", "fast"], style: "default" });

    expect(siblingPhases).toEqual(["pending"]);
    expect(result.processed).toEqual(["slow", "fast"]);
  });

  it("never reports a video's progress going backwards during a run", async () => {
    const ids = ["a", "bad", "c"];
    const seen: Record<string, number[]> = { a: [], bad: [], c: [] };
    const tracker = new ProgressTracker();
    const record = () => {
      const snapshot = tracker.snapshot(ids);
      for (const id of ids) {
        const job = snapshot[id];
        if (job) seen[id].push(job.progress);
      }
    };
    const { pipeline } = setup({
      tracker,
      transcripts: {
        fetch: vi.fn(async (id: string) => {
          record();
          if (id === "bad") throw new NotAvailableError(`No transcript available for video ${id}`);
          return `raw ${id}`;
        }),
      },
      summarizer: {
        summarize: vi.fn(async (text: string) => {
          record();
          return analysis(text);
        }),
      },
    });

    await pipeline.run({ videoIds: ids, style: "default" });
    record();

    for (const id of ids) {
      const values = seen[id];
      expect(values.length).toBeGreaterThan(1);
      expect(values).toEqual([...values].sort((x, y) => x - y));
    }
    expect(seen.a.at(-1)).toBe(100);
    expect(seen.bad.at(-1)).toBe(0);
  });
});

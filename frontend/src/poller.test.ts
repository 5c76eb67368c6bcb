import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ProgressData } from "../../shared/src/api";
import { ProgressPoller, summarize, toSnapshot } from "./poller";

const data = (entries: Record<string, [number, ProgressData["phases"][string]]>): ProgressData => ({
  progress: Object.fromEntries(Object.entries(entries).map(([id, [progress]]) => [id, progress])),
  phases: Object.fromEntries(Object.entries(entries).map(([id, [, phase]]) => [id, phase])),
});

describe("summarize", () => {
  it("derives the active phase and its share", () => {
    const tick = summarize(data({ a: [50, "scraped"], b: [0, "pending"] }), ["a", "b"]);
    expect(tick).toMatchObject({ phase: "scraping", percent: 50, settled: false });
  });

  it("settles once every video is merged or failed", () => {
    const tick = summarize(data({ a: [100, "merged"], b: [50, "failed"] }), ["a", "b"]);
    expect(tick).toMatchObject({ phase: "merging", percent: 50, settled: true });
  });

  it("reads phases from progress when the server sends none", () => {
    const snapshot = toSnapshot({ progress: { a: 75 }, phases: {} }, ["a", "b"]);
    expect(snapshot).toEqual({
      a: { progress: 75, phase: "summarized" },
      b: { progress: 0, phase: "pending" },
    });
  });
});

describe("ProgressPoller", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("polls until the batch settles", async () => {
    const fetchProgress = vi
      .fn<(ids: string[]) => Promise<ProgressData>>()
      .mockResolvedValueOnce(data({ a: [50, "scraped"] }))
      .mockResolvedValueOnce(data({ a: [100, "merged"] }));
    const onTick = vi.fn();
    const onSettled = vi.fn();
    const poller = new ProgressPoller({
      videoIds: ["a"],
      fetchProgress,
      onTick,
      onSettled,
      onError: vi.fn(),
      intervalMs: 1000,
    });

    poller.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(onTick).toHaveBeenLastCalledWith(expect.objectContaining({ phase: "processing", percent: 0 }));
    expect(onSettled).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(onSettled).toHaveBeenCalledTimes(1);
    expect(poller.running).toBe(false);

    await vi.advanceTimersByTimeAsync(5000);
    expect(fetchProgress).toHaveBeenCalledTimes(2);
    expect(fetchProgress).toHaveBeenCalledWith(["a"]);
  });

  it("stops on the first failed request", async () => {
    const error = new Error("offline");
    const fetchProgress = vi.fn<(ids: string[]) => Promise<ProgressData>>().mockRejectedValue(error);
    const onError = vi.fn();
    const poller = new ProgressPoller({
      videoIds: ["a"],
      fetchProgress,
      onTick: vi.fn(),
      onSettled: vi.fn(),
      onError,
      intervalMs: 1000,
    });

    poller.start();
    await vi.advanceTimersByTimeAsync(3000);

    expect(onError).toHaveBeenCalledWith(error);
    expect(fetchProgress).toHaveBeenCalledTimes(1);
    expect(poller.running).toBe(false);
  });

  it("skips a tick while the previous request is in flight", async () => {
    let release: (value: ProgressData) => void = () => undefined;
    const fetchProgress = vi.fn(
      () =>
        new Promise<ProgressData>((resolve) => {
          release = resolve;
        }),
    );
    const poller = new ProgressPoller({
      videoIds: ["a"],
      fetchProgress,
      onTick: vi.fn(),
      onSettled: vi.fn(),
      onError: vi.fn(),
      intervalMs: 1000,
    });

    poller.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(fetchProgress).toHaveBeenCalledTimes(1);

    release(data({ a: [0, "pending"] }));
    poller.stop();
  });
});

export type JobPhase = "pending" | "scraped" | "summarized" | "merged" | "failed";

export type BatchPhase = "scraping" | "processing" | "merging";

export const BATCH_PHASES: readonly BatchPhase[] = ["scraping", "processing", "merging"];

/** Progress reached on entering each phase. A failed job keeps the last value. */
export const PHASE_PROGRESS: Readonly<Record<Exclude<JobPhase, "failed">, number>> = {
  pending: 0,
  scraped: 50,
  summarized: 75,
  merged: 100,
};

const PHASE_RANK: Readonly<Record<JobPhase, number>> = {
  pending: 0,
  scraped: 1,
  summarized: 2,
  merged: 3,
  failed: 4,
};

export interface JobSnapshot {
  phase: JobPhase;
  progress: number;
  error?: string;
}

export type ProgressSnapshot = Record<string, JobSnapshot>;

export function isTerminal(phase: JobPhase): boolean {
  return phase === "merged" || phase === "failed";
}

/** Forward-only: any non-terminal phase may fail, otherwise rank must grow. */
export function canAdvance(from: JobPhase, to: JobPhase): boolean {
  if (isTerminal(from)) return false;
  if (to === "failed") return true;
  return PHASE_RANK[to] > PHASE_RANK[from];
}

export function hasReached(phase: JobPhase, target: Exclude<JobPhase, "failed">): boolean {
  return phase !== "failed" && PHASE_RANK[phase] >= PHASE_RANK[target];
}

/**
 * Coarse stage of a batch, derived from the jobs that have not failed:
 * scraping while one is still pending, processing while one is not yet
 * summarized, merging afterwards.
 */
export function derivePhase(snapshot: ProgressSnapshot): BatchPhase {
  const live = Object.values(snapshot).filter((job) => job.phase !== "failed");
  if (live.some((job) => !hasReached(job.phase, "scraped"))) return "scraping";
  if (live.some((job) => !hasReached(job.phase, "summarized"))) return "processing";
  return "merging";
}

const PHASE_TARGET: Readonly<Record<BatchPhase, Exclude<JobPhase, "failed" | "pending">>> = {
  scraping: "scraped",
  processing: "summarized",
  merging: "merged",
};

/** Share of the selected videos past the given stage, as a whole percentage. */
export function phaseProgress(
  snapshot: ProgressSnapshot,
  phase: BatchPhase,
  total: number,
): number {
  if (total <= 0) return 0;
  const done = Object.values(snapshot).filter((job) =>
    hasReached(job.phase, PHASE_TARGET[phase]),
  ).length;
  return Math.round((done / total) * 100);
}

export function isBatchSettled(snapshot: ProgressSnapshot, videoIds: readonly string[]): boolean {
  return videoIds.every((id) => {
    const job = snapshot[id];
    return job !== undefined && isTerminal(job.phase);
  });
}

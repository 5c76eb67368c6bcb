import { randomUUID } from "crypto";
import {
  PHASE_PROGRESS,
  canAdvance,
  type JobPhase,
  type ProgressSnapshot,
} from "../../../shared/src/progress";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";

export interface TranscriptJob {
  readonly videoId: string;
  readonly batchId: string;
  readonly phase: JobPhase;
  readonly progress: number;
  readonly error?: string;
  readonly updatedAt: number;
}

export interface AdvanceOptions {
  /** Ignore the move when the job now belongs to another batch run. */
  batchId?: string;
  error?: string;
}

/**
 * Per-video progress of batch runs. One instance is created at start-up and
 * handed to both the pipeline (writer) and the progress route (reader).
 *
 * Jobs are frozen and replaced whole, so phase and progress always change
 * together.
 */
export class ProgressTracker {
  private readonly jobs = new Map<string, TranscriptJob>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: { logger?: Logger; now?: () => number } = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  initialize(videoIds: readonly string[]): string {
    const batchId = randomUUID();
    const updatedAt = this.now();
    for (const videoId of videoIds) {
      const job: TranscriptJob = { videoId, batchId, phase: "pending", progress: 0, updatedAt };
      this.jobs.set(videoId, Object.freeze(job));
    }
    this.logger.debug({ batchId, videoIds }, "Batch initialized");
    return batchId;
  }

  advance(videoId: string, phase: JobPhase, options: AdvanceOptions = {}): TranscriptJob | undefined {
    const current = this.jobs.get(videoId);
    if (!current) {
      this.logger.warn({ videoId, phase }, "Ignoring progress for unknown video");
      return undefined;
    }
    if (options.batchId !== undefined && options.batchId !== current.batchId) {
      this.logger.debug({ videoId, phase, batchId: options.batchId }, "Ignoring stale batch update");
      return current;
    }
    if (!canAdvance(current.phase, phase)) {
      this.logger.debug({ videoId, from: current.phase, to: phase }, "Ignoring backward move");
      return current;
    }

    const next: TranscriptJob = Object.freeze({
      videoId,
      batchId: current.batchId,
      phase,
      progress: phase === "failed" ? current.progress : PHASE_PROGRESS[phase],
      ...(phase === "failed" ? { error: options.error ?? "Unknown error" } : {}),
      updatedAt: this.now(),
    });
    this.jobs.set(videoId, next);
    return next;
  }

  get(videoId: string): TranscriptJob | undefined {
    return this.jobs.get(videoId);
  }

  /** Ids this tracker never saw are left out. */
  snapshot(videoIds: readonly string[]): ProgressSnapshot {
    const result: ProgressSnapshot = {};
    for (const videoId of videoIds) {
      const job = this.jobs.get(videoId);
      if (!job) continue;
      result[videoId] =
        job.error === undefined
          ? { phase: job.phase, progress: job.progress }
          : { phase: job.phase, progress: job.progress, error: job.error };
    }
    return result;
  }
}

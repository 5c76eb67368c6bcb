import type { ProgressData } from "../../shared/src/api";
import {
  PHASE_PROGRESS,
  derivePhase,
  isBatchSettled,
  phaseProgress,
  type BatchPhase,
  type JobPhase,
  type ProgressSnapshot,
} from "../../shared/src/progress";

export const POLL_INTERVAL_MS = 5000;

export interface PollTick {
  snapshot: ProgressSnapshot;
  phase: BatchPhase;
  /** Progress of the active phase, 0..100. */
  percent: number;
  settled: boolean;
}

function phaseFromProgress(progress: number): JobPhase {
  if (progress >= PHASE_PROGRESS.merged) return "merged";
  if (progress >= PHASE_PROGRESS.summarized) return "summarized";
  if (progress >= PHASE_PROGRESS.scraped) return "scraped";
  return "pending";
}

export function toSnapshot(data: ProgressData, videoIds: readonly string[]): ProgressSnapshot {
  const snapshot: ProgressSnapshot = {};
  for (const videoId of videoIds) {
    const progress = data.progress[videoId] ?? 0;
    snapshot[videoId] = { progress, phase: data.phases?.[videoId] ?? phaseFromProgress(progress) };
  }
  return snapshot;
}

export function summarize(data: ProgressData, videoIds: readonly string[]): PollTick {
  const snapshot = toSnapshot(data, videoIds);
  const phase = derivePhase(snapshot);
  return {
    snapshot,
    phase,
    percent: phaseProgress(snapshot, phase, videoIds.length),
    settled: isBatchSettled(snapshot, videoIds),
  };
}

export interface ProgressPollerOptions {
  videoIds: readonly string[];
  fetchProgress: (videoIds: string[]) => Promise<ProgressData>;
  onTick: (tick: PollTick) => void;
  onSettled: (tick: PollTick) => void;
  onError: (error: unknown) => void;
  intervalMs?: number;
}

/**
 * Asks for the selected ids' progress every interval. Stops for good once
 * every id is merged or failed, or on the first failed tick.
 */
export class ProgressPoller {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight = false;

  constructor(private readonly options: ProgressPollerOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs ?? POLL_INTERVAL_MS);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async tick(): Promise<void> {
    if (this.inFlight) return;
    this.inFlight = true;
    const { videoIds } = this.options;
    try {
      const data = await this.options.fetchProgress([...videoIds]);
      if (!this.running) return;
      const tick = summarize(data, videoIds);
      this.options.onTick(tick);
      if (tick.settled) {
        this.stop();
        this.options.onSettled(tick);
      }
    } catch (error) {
      if (!this.running) return;
      this.stop();
      this.options.onError(error);
    } finally {
      this.inFlight = false;
    }
  }
}

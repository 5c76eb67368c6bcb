import { BatchFailedError, ValidationError, errorMessage, type VideoFailure } from "./errors";
import { buildMergedDocument, type DocumentEntry } from "./lib/document";
import type { Logger } from "./lib/logger";
import type { ProgressTracker } from "./lib/progress";
import type { WorkerPool } from "./lib/queue";
import type { BatchRequest, Summarizer, TranscriptSource, VideoCatalog } from "./types";

export interface PipelineDeps {
  tracker: ProgressTracker;
  catalog: VideoCatalog;
  transcripts: TranscriptSource;
  summarizer: Summarizer;
  logger: Logger;
  /** Shared by every run, so the bound holds across concurrent batches. */
  pool: WorkerPool;
}

export interface BatchResult {
  batchId: string;
  document: string;
  processed: string[];
  failed: VideoFailure[];
}

export interface Pipeline {
  run(request: BatchRequest): Promise<BatchResult>;
}

interface RunContext {
  deps: PipelineDeps;
  batchId: string;
  style: BatchRequest["style"];
  log: Logger;
}

// Scrape then summarize one video. Never throws: a failure marks the job and
// is reported back so sibling videos keep going.
const processVideo = async (videoId: string, ctx: RunContext): Promise<DocumentEntry> => {
  const { tracker, catalog, transcripts, summarizer } = ctx.deps;
  const { batchId, style, log } = ctx;

  try {
    log.info({ videoId }, "Fetching transcript");
    const [details, transcript] = await Promise.all([
      catalog.getVideo(videoId),
      transcripts.fetch(videoId),
    ]);
    tracker.advance(videoId, "scraped", { batchId });

    log.info({ videoId, style }, "Summarizing transcript");
    const analysis = await summarizer.summarize(transcript, style);
    tracker.advance(videoId, "summarized", { batchId });

    return { kind: "processed", video: { details, style, analysis } };
  } catch (error) {
    const message = errorMessage(error);
    log.error({ videoId, err: message }, "Video failed");
    tracker.advance(videoId, "failed", { batchId, error: message });
    return { kind: "failed", videoId, error: message };
  }
};

/**
 * One batch run: every video is scraped and summarized on a bounded pool
 * (a video may be summarized while a sibling is still scraping), then the
 * survivors are merged in request order.
 */
export const runBatch = async (request: BatchRequest, deps: PipelineDeps): Promise<BatchResult> => {
  const videoIds = [...new Set(request.videoIds)];
  if (videoIds.length === 0) {
    throw new ValidationError("No video IDs provided");
  }

  const batchId = deps.tracker.initialize(videoIds);
  const log = deps.logger.child({ batchId });
  log.info({ videoIds, style: request.style }, "Starting batch");

  const ctx: RunContext = { deps, batchId, style: request.style, log };
  const entries = await Promise.all(videoIds.map((videoId) => deps.pool(() => processVideo(videoId, ctx))));

  const failed: VideoFailure[] = [];
  const processed: string[] = [];
  entries.forEach((entry, index) => {
    if (entry.kind === "failed") failed.push({ videoId: entry.videoId, error: entry.error });
    else processed.push(videoIds[index]);
  });

  if (processed.length === 0) {
    log.error({ failed }, "Every video in the batch failed");
    throw new BatchFailedError(failed);
  }

  log.info({ processed: processed.length, failed: failed.length }, "Merging results");
  const document = buildMergedDocument(entries);
  for (const videoId of processed) {
    deps.tracker.advance(videoId, "merged", { batchId });
  }

  log.info({ processed: processed.length }, "Batch completed");
  return { batchId, document, processed, failed };
};

export const createPipeline = (deps: PipelineDeps): Pipeline => ({
  run: (request) => runBatch(request, deps),
});

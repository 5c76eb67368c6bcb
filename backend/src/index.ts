import { Command } from "commander";
import { loadConfig } from "./config";
import { YouTubeCatalog } from "./lib/catalog";
import { createLogger } from "./lib/logger";
import { ProgressTracker } from "./lib/progress";
import { createRateLimiter, createWorkerPool } from "./lib/queue";
import { createRetryPolicy } from "./lib/retry";
import { TranscriptSummarizer, createOpenAIClient, createOpenAICompletion } from "./lib/summarizer";
import { TranscriptFetcher } from "./lib/transcripts";
import { buildServer } from "./server";
import { createPipeline } from "./worker";

const program = new Command()
  .name("playlist-transcripts")
  .description("Serve the playlist transcript batcher")
  .option("-p, --port <number>", "port to listen on (overrides PORT)")
  .option("--debug", "log at debug level", false)
  .parse(process.argv);

const opts = program.opts<{ port?: string; debug: boolean }>();

const start = async () => {
  const config = loadConfig();
  const logger = createLogger(opts.debug ? "debug" : config.logLevel);
  const retry = createRetryPolicy({ attempts: config.retry.attempts, delay: config.retry.delay });

  const tracker = new ProgressTracker({ logger: logger.child({ component: "tracker" }) });
  const catalog = new YouTubeCatalog({
    apiKey: config.youtube.apiKey,
    pageDelayMs: config.youtube.pageDelayMs,
    logger: logger.child({ component: "catalog" }),
  });
  const transcripts = new TranscriptFetcher({
    retry,
    logger: logger.child({ component: "transcripts" }),
  });
  const summarizer = new TranscriptSummarizer({
    complete: createOpenAICompletion(createOpenAIClient(config.openai.apiKey)),
    model: config.openai.model,
    rateLimiter: createRateLimiter(config.openai.requestsPerMinute),
    retry,
    logger: logger.child({ component: "summarizer" }),
  });
  const pipeline = createPipeline({
    tracker,
    catalog,
    transcripts,
    summarizer,
    logger: logger.child({ component: "pipeline" }),
    pool: createWorkerPool(config.pipeline.concurrency),
  });

  const server = buildServer({ logger, catalog, tracker, pipeline, publicDir: config.publicDir });

  try {
    const port = Number(opts.port) || config.port;
    await server.listen({ port, host: config.host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});

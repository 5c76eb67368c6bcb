import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptNotAvailableLanguageError,
  YoutubeTranscriptTooManyRequestError,
  YoutubeTranscriptVideoUnavailableError,
  type TranscriptResponse,
} from "youtube-transcript";
import { AppError, NotAvailableError, RateLimitedError, UpstreamError, errorMessage } from "../errors";
import type { TranscriptSource } from "../types";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { createRetryPolicy, withRetry, type RetryHooks, type RetryPolicy } from "./retry";

export type CaptionFetcher = (videoId: string) => Promise<TranscriptResponse[]>;

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&apos;": "'",
};

// Captions arrive double-encoded ("&amp;#39;"), so decode until stable.
export function decodeEntities(text: string): string {
  let current = text;
  for (let i = 0; i < 3; i++) {
    const next = current.replace(/&(?:amp|lt|gt|quot|apos|#39);/g, (entity) => ENTITIES[entity]);
    if (next === current) break;
    current = next;
  }
  return current;
}

export function joinCaptions(parts: readonly TranscriptResponse[]): string {
  return decodeEntities(parts.map((part) => part.text).join(" "))
    .replace(/\s+/g, " ")
    .trim();
}

// instanceof does not hold for down-levelled Error subclasses, so the
// library's messages are matched as well.
const RATE_LIMIT_MESSAGE = /too many requests/i;
const UNAVAILABLE_MESSAGES = [/transcript is disabled/i, /no transcripts are available/i, /no longer available/i];

const messageMatches = (error: unknown, patterns: readonly RegExp[]): boolean =>
  error instanceof Error && patterns.some((pattern) => pattern.test(error.message));

/** Maps caption library failures onto the shared taxonomy. */
export function classifyTranscriptError(videoId: string, error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof YoutubeTranscriptTooManyRequestError || messageMatches(error, [RATE_LIMIT_MESSAGE])) {
    return new RateLimitedError("Transcript service rate limit exceeded", { cause: error });
  }
  if (
    error instanceof YoutubeTranscriptDisabledError ||
    error instanceof YoutubeTranscriptNotAvailableError ||
    error instanceof YoutubeTranscriptNotAvailableLanguageError ||
    error instanceof YoutubeTranscriptVideoUnavailableError ||
    messageMatches(error, UNAVAILABLE_MESSAGES)
  ) {
    return new NotAvailableError(`No transcript available for video ${videoId}`, { cause: error });
  }
  if (error instanceof YoutubeTranscriptError) {
    return new UpstreamError(`Transcript fetch failed for video ${videoId}: ${error.message}`, {
      cause: error,
    });
  }
  // Network and server side failures.
  return new UpstreamError(`Transcript fetch failed for video ${videoId}: ${errorMessage(error)}`, {
    isRetryable: true,
    cause: error,
  });
}

export interface TranscriptFetcherOptions {
  fetchCaptions?: CaptionFetcher;
  retry?: RetryPolicy;
  logger?: Logger;
  sleep?: RetryHooks["sleep"];
}

export class TranscriptFetcher implements TranscriptSource {
  private readonly fetchCaptions: CaptionFetcher;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep?: RetryHooks["sleep"];

  constructor(options: TranscriptFetcherOptions = {}) {
    this.fetchCaptions = options.fetchCaptions ?? ((videoId) => YoutubeTranscript.fetchTranscript(videoId));
    this.retry = options.retry ?? createRetryPolicy();
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  async fetch(videoId: string): Promise<string> {
    const text = await withRetry(
      async () => {
        try {
          return joinCaptions(await this.fetchCaptions(videoId));
        } catch (error) {
          throw classifyTranscriptError(videoId, error);
        }
      },
      this.retry,
      {
        sleep: this.sleep,
        onRetry: ({ attempt, delay, error }) =>
          this.logger.warn({ videoId, attempt, delay, err: errorMessage(error) }, "Retrying transcript fetch"),
      },
    );

    if (!text) {
      throw new NotAvailableError(`Transcript for video ${videoId} is empty`);
    }
    this.logger.debug({ videoId, length: text.length }, "Fetched transcript");
    return text;
  }
}

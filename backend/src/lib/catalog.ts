import { z } from "zod";
import { NotAvailableError, RateLimitedError, UpstreamError, errorMessage } from "../errors";
import type { VideoCatalog, VideoDetails, VideoRecord } from "../types";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { createRetryPolicy, defaultSleep, withRetry, type RetryPolicy } from "./retry";

const API_BASE = "https://www.googleapis.com/youtube/v3";

export const MAX_PLAYLIST_ITEMS = 200;
export const PLAYLIST_FETCH_TIMEOUT_MS = 30_000;
const PAGE_SIZE = 50;

interface ResourceMessages {
  notFound: string;
  invalid: string;
}

const PLAYLIST_MESSAGES: ResourceMessages = {
  notFound: "Playlist not found or not accessible",
  invalid: "Invalid playlist data received from YouTube",
};

const VIDEO_MESSAGES: ResourceMessages = {
  notFound: "Video not found or not accessible",
  invalid: "Invalid video data received from YouTube",
};

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

const PlaylistItemSchema = z.object({
  snippet: z.object({
    title: z.string().min(1),
    publishedAt: z.string().optional(),
    resourceId: z.object({ videoId: z.string().min(1) }),
    thumbnails: z
      .object({ default: z.object({ url: z.string() }).optional() })
      .optional(),
  }),
});

const PlaylistPageSchema = z.object({
  items: z.array(z.unknown()),
  nextPageToken: z.string().optional(),
});

const VideoListSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          title: z.string(),
          channelTitle: z.string().optional(),
          publishedAt: z.string().optional(),
        }),
      }),
    )
    .default([]),
});

const ApiErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

export interface YouTubeCatalogOptions {
  apiKey: string;
  fetch?: FetchLike;
  logger?: Logger;
  retry?: RetryPolicy;
  maxItems?: number;
  timeoutMs?: number;
  pageDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** YouTube Data API v3 client for playlist listings and video details. */
export class YouTubeCatalog implements VideoCatalog {
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly maxItems: number;
  private readonly timeoutMs: number;
  private readonly pageDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: YouTubeCatalogOptions) {
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
    this.retry = options.retry ?? createRetryPolicy({ attempts: 5 });
    this.maxItems = options.maxItems ?? MAX_PLAYLIST_ITEMS;
    this.timeoutMs = options.timeoutMs ?? PLAYLIST_FETCH_TIMEOUT_MS;
    this.pageDelayMs = options.pageDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async listPlaylist(playlistId: string): Promise<VideoRecord[]> {
    this.logger.info({ playlistId }, "Starting playlist fetch");
    const deadline = this.now() + this.timeoutMs;
    const videos: VideoRecord[] = [];
    let pageToken: string | undefined;

    do {
      if (pageToken) await this.sleep(this.pageDelayMs);
      this.logger.debug({ playlistId, pageToken }, "Fetching playlist page");

      const body = await this.request(
        "playlistItems",
        {
          part: "snippet,contentDetails",
          playlistId,
          maxResults: String(PAGE_SIZE),
          ...(pageToken ? { pageToken } : {}),
        },
        deadline,
        PLAYLIST_MESSAGES,
      );
      const page = PlaylistPageSchema.safeParse(body);
      if (!page.success) {
        throw new UpstreamError(PLAYLIST_MESSAGES.invalid);
      }

      const entries: VideoRecord[] = [];
      for (const raw of page.data.items) {
        const item = PlaylistItemSchema.safeParse(raw);
        if (!item.success) {
          this.logger.warn({ playlistId, issues: item.error.issues }, "Skipping malformed playlist item");
          continue;
        }
        const { snippet } = item.data;
        entries.push({
          id: snippet.resourceId.videoId,
          title: snippet.title,
          publishedAt: snippet.publishedAt,
          thumbnail: snippet.thumbnails?.default?.url,
        });
      }

      const details = await this.fetchDetails(
        entries.map((entry) => entry.id),
        deadline,
      );
      for (const entry of entries) {
        videos.push({ ...entry, publishedAt: details.get(entry.id)?.publishedAt ?? entry.publishedAt });
      }

      pageToken = page.data.nextPageToken;
      if (videos.length >= this.maxItems) {
        if (pageToken) this.logger.warn({ limit: this.maxItems }, "Reached maximum playlist items limit");
        break;
      }
    } while (pageToken);

    if (videos.length === 0) {
      throw new NotAvailableError("No valid videos found in playlist");
    }

    const result = videos.slice(0, this.maxItems);
    this.logger.info({ playlistId, count: result.length }, "Fetched playlist");
    return result;
  }

  async getVideo(videoId: string): Promise<VideoDetails> {
    const details = await this.fetchDetails([videoId], this.now() + this.timeoutMs);
    const video = details.get(videoId);
    if (!video) {
      throw new NotAvailableError(`Video ${videoId} not found or is not accessible`);
    }
    return video;
  }

  private async fetchDetails(
    videoIds: readonly string[],
    deadline: number,
  ): Promise<Map<string, VideoDetails>> {
    const details = new Map<string, VideoDetails>();
    if (videoIds.length === 0) return details;

    const body = await this.request(
      "videos",
      { part: "snippet", id: videoIds.join(",") },
      deadline,
      VIDEO_MESSAGES,
    );
    const parsed = VideoListSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(VIDEO_MESSAGES.invalid);
    }
    for (const item of parsed.data.items) {
      details.set(item.id, {
        id: item.id,
        title: item.snippet.title,
        channelTitle: item.snippet.channelTitle ?? "Unknown Channel",
        ...(item.snippet.publishedAt ? { publishedAt: item.snippet.publishedAt } : {}),
      });
    }
    return details;
  }

  private request(
    resource: string,
    params: Record<string, string>,
    deadline: number,
    messages: ResourceMessages,
  ): Promise<unknown> {
    return withRetry(
      async () => {
        const remaining = deadline - this.now();
        if (remaining <= 0) throw timeoutError();

        const url = new URL(`${API_BASE}/${resource}`);
        for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);
        url.searchParams.set("key", this.apiKey);

        let response: Response;
        try {
          response = await this.fetchImpl(url.toString(), { signal: AbortSignal.timeout(remaining) });
        } catch (error) {
          if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
            throw timeoutError();
          }
          throw new UpstreamError(`YouTube API request failed: ${errorMessage(error)}`, {
            isRetryable: true,
            cause: error,
          });
        }

        if (!response.ok) throw await toApiError(response, messages.notFound);
        try {
          const body: unknown = await response.json();
          return body;
        } catch (error) {
          throw new UpstreamError(messages.invalid, { cause: error });
        }
      },
      this.retry,
      {
        sleep: this.sleep,
        onRetry: ({ attempt, delay, error }) =>
          this.logger.warn({ resource, attempt, delay, err: errorMessage(error) }, "Retrying YouTube API request"),
      },
    );
  }
}

function timeoutError(): UpstreamError {
  return new UpstreamError("Playlist fetch operation timed out", { statusCode: 504 });
}

async function toApiError(response: Response, notFoundMessage: string): Promise<Error> {
  const raw: unknown = await response.json().catch(() => undefined);
  const parsed = ApiErrorSchema.safeParse(raw);
  const reasons = parsed.success ? (parsed.data.error.errors ?? []).map((e) => e.reason) : [];
  const detail = parsed.success ? parsed.data.error.message : undefined;
  const status = response.status;

  if (status === 429) {
    const retryAfter = Number(response.headers.get("retry-after"));
    return new RateLimitedError("YouTube API rate limit exceeded", {
      retryAfterMs: Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : undefined,
    });
  }
  if (status >= 500) {
    return new UpstreamError(`YouTube API error ${status}${detail ? `: ${detail}` : ""}`, {
      isRetryable: true,
    });
  }
  if (status === 403 && reasons.includes("quotaExceeded")) {
    return new UpstreamError("YouTube API quota exceeded", { statusCode: 503 });
  }
  if (status === 403 || status === 404) {
    return new UpstreamError(notFoundMessage, { statusCode: 404 });
  }
  return new UpstreamError(`YouTube API error ${status}${detail ? `: ${detail}` : ""}`, {
    statusCode: 502,
  });
}

import {
  FAILED_IDS_HEADER,
  type ApiBody,
  type BatchRequestBody,
  type PlaylistData,
  type PlaylistRequestBody,
  type PlaylistVideo,
  type ProcessingStyle,
  type ProgressData,
  type ProgressRequestBody,
} from "../../shared/src/api";

export const REQUEST_TIMEOUT_MS = 30_000;

export class ApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

export interface BatchOutcome {
  text: string;
  failedIds: string[];
}

export interface TranscriptApi {
  getPlaylist(url: string, signal?: AbortSignal): Promise<PlaylistVideo[]>;
  processBatch(videoIds: string[], style: ProcessingStyle, signal?: AbortSignal): Promise<BatchOutcome>;
  getProgress(videoIds: string[], signal?: AbortSignal): Promise<ProgressData>;
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

async function readError(response: Response): Promise<ApiError> {
  const body: unknown = await response.json().catch(() => undefined);
  if (isRecord(body) && typeof body.error === "string") {
    return new ApiError(body.error, response.status);
  }
  return new ApiError(`HTTP error! status: ${response.status}`, response.status);
}

function unwrap<T>(body: ApiBody<T>): T {
  if (body.status === "error") {
    throw new ApiError(body.error || "Unknown error occurred");
  }
  return body.data;
}

export function createApi(fetchFn: FetchFn = (input, init) => fetch(input, init), baseUrl = ""): TranscriptApi {
  const post = async <B>(endpoint: string, payload: B, signal?: AbortSignal): Promise<Response> => {
    const response = await fetchFn(`${baseUrl}${endpoint}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal,
    });
    if (!response.ok) throw await readError(response);
    return response;
  };

  return {
    async getPlaylist(url, signal) {
      const response = await post<PlaylistRequestBody>("/get_playlist", { url }, signal);
      const body: ApiBody<PlaylistData> = await response.json();
      return unwrap(body).videos;
    },

    async processBatch(videoIds, style, signal) {
      const response = await post<BatchRequestBody>(
        "/download_transcript_batch",
        { video_ids: videoIds, style },
        signal,
      );
      const failed = response.headers.get(FAILED_IDS_HEADER) ?? "";
      return {
        text: await response.text(),
        failedIds: failed.split(",").filter(Boolean),
      };
    },

    async getProgress(videoIds, signal) {
      const response = await post<ProgressRequestBody>("/download_progress", { video_ids: videoIds }, signal);
      const body: ApiBody<ProgressData> = await response.json();
      return unwrap(body);
    },
  };
}

/** Aborts `controller` after `timeoutMs` and reports that as a timeout. */
export async function withTimeout<T>(
  controller: AbortController,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  try {
    return await run(controller.signal);
  } catch (error) {
    if (timedOut) throw new ApiError("Request timed out");
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

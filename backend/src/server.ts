import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import fastifyStatic from "@fastify/static";
import { z } from "zod";
import {
  FAILED_IDS_HEADER,
  MERGED_FILENAME,
  PROCESSING_STYLES,
  type ErrorBody,
  type PlaylistData,
  type ProgressData,
  type SuccessBody,
} from "../../shared/src/api";
import { extractPlaylistId, validateYouTubeUrl } from "../../shared/src/youtubeUrl";
import { AppError, ValidationError } from "./errors";
import type { Logger } from "./lib/logger";
import type { ProgressTracker } from "./lib/progress";
import type { VideoCatalog } from "./types";
import type { Pipeline } from "./worker";

export interface ServerDeps {
  logger: Logger;
  catalog: VideoCatalog;
  tracker: ProgressTracker;
  pipeline: Pipeline;
  /** Static page and bundled client; not served when omitted. */
  publicDir?: string;
}

const PlaylistBodySchema = z.object({
  url: z
    .string({ required_error: "No URL provided", invalid_type_error: "URL must be a string" })
    .trim()
    .min(1, "No URL provided"),
});

const videoIdsSchema = z
  .array(z.string().trim().min(1, "Video IDs must be non-empty strings"), {
    required_error: "No video IDs provided",
    invalid_type_error: "video_ids must be an array",
  })
  .min(1, "No video IDs provided");

const BatchBodySchema = z.object({
  video_ids: videoIdsSchema,
  style: z
    .enum(PROCESSING_STYLES, { errorMap: () => ({ message: "Unknown processing style" }) })
    .default("default"),
});

const ProgressBodySchema = z.object({ video_ids: videoIdsSchema });

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new ValidationError("Invalid request format");
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid request format");
  }
  return parsed.data;
}

const success = <T>(data: T): SuccessBody<T> => ({ status: "success", data });

export function buildServer(deps: ServerDeps) {
  const { catalog, tracker, pipeline } = deps;

  const server = Fastify({
    logger: deps.logger,
    bodyLimit: 1048576,
  });

  server.register(cors, {
    origin: "*",
    methods: ["GET", "POST"],
  });

  if (deps.publicDir) {
    server.register(fastifyStatic, { root: deps.publicDir });
  }

  server.setErrorHandler((error: FastifyError | AppError, req: FastifyRequest, reply: FastifyReply) => {
    const statusCode = error.statusCode ?? 500;
    if (error instanceof AppError || (statusCode >= 400 && statusCode < 500)) {
      req.log.warn({ err: error.message, statusCode }, "Request failed");
      const body: ErrorBody = { status: "error", error: error.message };
      return reply.code(statusCode).send(body);
    }
    req.log.error(error);
    const body: ErrorBody = { status: "error", error: "An unexpected error occurred" };
    return reply.code(500).send(body);
  });

  server.get("/health", async () => {
    return { status: "OK", service: "Playlist Transcripts" };
  });

  // 1. Playlist listing
  server.post("/get_playlist", async (req) => {
    const { url } = parseBody(PlaylistBodySchema, req.body);
    if (!validateYouTubeUrl(url)) {
      throw new ValidationError("Invalid YouTube URL");
    }
    const playlistId = extractPlaylistId(url);
    if (!playlistId) {
      throw new ValidationError("Invalid playlist URL");
    }

    req.log.info({ playlistId }, "Fetching playlist");
    const videos = await catalog.listPlaylist(playlistId);
    return success<PlaylistData>({
      videos: videos.map((video) => ({
        video_id: video.id,
        title: video.title,
        publishedAt: video.publishedAt,
        thumbnail: video.thumbnail,
      })),
    });
  });

  // 2. Batch run; answers with the merged document once every video settled
  server.post("/download_transcript_batch", async (req, reply) => {
    const body = parseBody(BatchBodySchema, req.body);
    const result = await pipeline.run({ videoIds: body.video_ids, style: body.style });

    return reply
      .header("content-type", "text/plain; charset=utf-8")
      .header("content-disposition", `attachment; filename="${MERGED_FILENAME}"`)
      .header(FAILED_IDS_HEADER, result.failed.map((failure) => failure.videoId).join(","))
      .send(result.document);
  });

  // 3. Progress poll; ids no run has started report 0
  server.post("/download_progress", async (req) => {
    const { video_ids: videoIds } = parseBody(ProgressBodySchema, req.body);
    const snapshot = tracker.snapshot(videoIds);

    const data: ProgressData = { progress: {}, phases: {} };
    for (const videoId of videoIds) {
      const job = snapshot[videoId];
      data.progress[videoId] = job ? job.progress : 0;
      data.phases[videoId] = job ? job.phase : "pending";
    }
    return success(data);
  });

  return server;
}

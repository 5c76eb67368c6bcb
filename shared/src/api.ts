import type { JobPhase } from "./progress";

export const PROCESSING_STYLES = ["default", "academic", "technical", "business"] as const;

export type ProcessingStyle = (typeof PROCESSING_STYLES)[number];

export interface PlaylistVideo {
  video_id: string;
  title: string;
  publishedAt?: string;
  thumbnail?: string;
}

export interface SuccessBody<T> {
  status: "success";
  data: T;
}

export interface ErrorBody {
  status: "error";
  error: string;
}

export type ApiBody<T> = SuccessBody<T> | ErrorBody;

export interface PlaylistRequestBody {
  url: string;
}

export interface PlaylistData {
  videos: PlaylistVideo[];
}

export interface BatchRequestBody {
  video_ids: string[];
  style?: ProcessingStyle;
}

export interface ProgressRequestBody {
  video_ids: string[];
}

export interface ProgressData {
  progress: Record<string, number>;
  phases: Record<string, JobPhase>;
}

export const FAILED_IDS_HEADER = "x-failed-video-ids";

export const MERGED_FILENAME = "transcripts.txt";

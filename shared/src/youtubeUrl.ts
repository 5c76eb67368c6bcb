// Accepted YouTube URL shapes. Used by the server before any catalog call and
// by the browser before submitting.

const PREFIX = String.raw`^((?:https?:)?\/\/)?((?:www|m)\.)?`;

export const YOUTUBE_URL_PATTERNS: readonly RegExp[] = [
  new RegExp(PREFIX + String.raw`youtube\.com\/watch\?v=[\w-]{11}`),
  new RegExp(PREFIX + String.raw`youtube\.com\/shorts\/[\w-]{11}`),
  new RegExp(PREFIX + String.raw`youtube\.com\/live\/[\w-]{11}`),
  new RegExp(PREFIX + String.raw`(youtube\.com|youtube-nocookie\.com)\/embed\/[\w-]{11}`),
  /^((?:https?:)?\/\/)?youtu\.be\/[\w-]{11}/,
  new RegExp(PREFIX + String.raw`youtube\.com\/playlist\?list=[\w-]+`),
];

const PLAYLIST_ID_PATTERN = /youtube\.com\/playlist\?list=([\w-]+)/;

/** Anything after the first `&` is ignored. */
export function validateYouTubeUrl(url: string): boolean {
  const head = url.trim().split("&")[0];
  return YOUTUBE_URL_PATTERNS.some((pattern) => pattern.test(head));
}

export function extractPlaylistId(url: string): string | null {
  const match = PLAYLIST_ID_PATTERN.exec(url);
  return match ? match[1] : null;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

import type { ProcessingStyle } from "../../shared/src/api";

// Playlist entry, in catalog order.
export interface VideoRecord {
  id: string;
  title: string;
  publishedAt?: string;
  thumbnail?: string;
}

export interface VideoDetails {
  id: string;
  title: string;
  channelTitle: string;
  publishedAt?: string;
}

export interface BatchRequest {
  videoIds: string[];
  style: ProcessingStyle;
}

export interface TranscriptAnalysis {
  formattedText: string;
  summary: string;
  tags: string[];
  keyPoints: string[];
  researchImplications?: string[];
  codeSnippets?: string[];
  technicalConcepts?: string[];
  marketInsights?: string[];
  strategicImplications?: string[];
}

export interface ProcessedVideo {
  details: VideoDetails;
  style: ProcessingStyle;
  analysis: TranscriptAnalysis;
}

// Collaborator contracts, implemented in lib/ and faked in tests.
export interface VideoCatalog {
  listPlaylist(playlistId: string): Promise<VideoRecord[]>;
  getVideo(videoId: string): Promise<VideoDetails>;
}

export interface TranscriptSource {
  fetch(videoId: string): Promise<string>;
}

export interface Summarizer {
  summarize(transcript: string, style: ProcessingStyle): Promise<TranscriptAnalysis>;
}

import type { PlaylistVideo } from "../../shared/src/api";
import type { BatchPhase } from "../../shared/src/progress";
import { BATCH_PHASES } from "../../shared/src/progress";
import { validateYouTubeUrl } from "../../shared/src/youtubeUrl";
import { REQUEST_TIMEOUT_MS, isAbortError, withTimeout, type TranscriptApi } from "./api";
import { saveTextFile } from "./download";
import { createProcessLog, type ProcessLog } from "./logs";
import { POLL_INTERVAL_MS, ProgressPoller, type PollTick } from "./poller";
import { formatElapsed, renderPlaylist, type PlaylistView } from "./render";

export interface AppElements {
  form: HTMLFormElement;
  urlInput: HTMLInputElement;
  transcriptContainer: HTMLElement;
  playlistContainer: HTMLElement;
  errorMessage: HTMLElement;
  loadingSpinner: HTMLElement;
  processLogs: HTMLElement;
}

const ELEMENT_IDS: Record<keyof AppElements, string> = {
  form: "transcript-form",
  urlInput: "youtube-url",
  transcriptContainer: "transcript-container",
  playlistContainer: "playlist-container",
  errorMessage: "error-message",
  loadingSpinner: "loading-spinner",
  processLogs: "process-logs",
};

export function findElements(doc: Document): AppElements {
  const missing = Object.entries(ELEMENT_IDS)
    .filter(([, id]) => !doc.getElementById(id))
    .map(([name]) => name);
  if (missing.length > 0) {
    throw new Error(`Required DOM elements not found: ${missing.join(", ")}`);
  }

  const byId = <T extends HTMLElement>(id: string, type: { new (): T }): T => {
    const node = doc.getElementById(id);
    if (!(node instanceof type)) throw new Error(`Element #${id} has an unexpected type`);
    return node;
  };
  const view = doc.defaultView;
  if (!view) throw new Error("Document is not attached to a window");

  return {
    form: byId(ELEMENT_IDS.form, view.HTMLFormElement),
    urlInput: byId(ELEMENT_IDS.urlInput, view.HTMLInputElement),
    transcriptContainer: byId(ELEMENT_IDS.transcriptContainer, view.HTMLElement),
    playlistContainer: byId(ELEMENT_IDS.playlistContainer, view.HTMLElement),
    errorMessage: byId(ELEMENT_IDS.errorMessage, view.HTMLElement),
    loadingSpinner: byId(ELEMENT_IDS.loadingSpinner, view.HTMLElement),
    processLogs: byId(ELEMENT_IDS.processLogs, view.HTMLElement),
  };
}

const PHASE_OPERATIONS: Record<BatchPhase, string> = {
  scraping: "Fetching transcripts...",
  processing: "Processing with OpenAI...",
  merging: "Merging results...",
};

export interface AppOptions {
  pollIntervalMs?: number;
  requestTimeoutMs?: number;
  now?: () => number;
  save?: (text: string) => void;
}

const messageOf = (error: unknown, fallback: string): string =>
  error instanceof Error && error.message ? error.message : fallback;

/**
 * Browser controller: playlist form, video selection, batch start, progress
 * polling and the local download.
 */
export class TranscriptApp {
  private readonly log: ProcessLog;
  private readonly now: () => number;
  private readonly pollIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly save: (text: string) => void;

  private playlistRequest: AbortController | null = null;
  private batchRequest: AbortController | null = null;
  private poller: ProgressPoller | null = null;
  private view: PlaylistView | null = null;
  private processedContent: string | null = null;
  private pollSettled = false;
  private phaseStartedAt: Partial<Record<BatchPhase, number>> = {};

  constructor(
    private readonly elements: AppElements,
    private readonly api: TranscriptApi,
    options: AppOptions = {},
  ) {
    this.log = createProcessLog(elements.processLogs);
    this.now = options.now ?? Date.now;
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? REQUEST_TIMEOUT_MS;
    this.save = options.save ?? ((text) => saveTextFile(elements.form.ownerDocument, text));
  }

  mount(): void {
    this.elements.form.addEventListener("submit", (event) => {
      event.preventDefault();
      void this.submitPlaylist(this.elements.urlInput.value.trim());
    });
  }

  get playlistView(): PlaylistView | null {
    return this.view;
  }

  async submitPlaylist(url: string): Promise<void> {
    this.log("Form submitted");
    if (!validateYouTubeUrl(url)) {
      this.showError("Please enter a valid YouTube URL");
      return;
    }

    // A new submission abandons the one in flight.
    this.playlistRequest?.abort();
    const controller = new AbortController();
    this.playlistRequest = controller;
    this.showLoading();

    try {
      const videos = await withTimeout(controller, this.requestTimeoutMs, (signal) =>
        this.api.getPlaylist(url, signal),
      );
      if (this.playlistRequest !== controller) return;
      this.hideLoading();
      this.displayPlaylist(videos);
    } catch (error) {
      if (this.playlistRequest !== controller || isAbortError(error)) return;
      this.showError(messageOf(error, "An error occurred while processing your request"));
    } finally {
      if (this.playlistRequest === controller) this.playlistRequest = null;
    }
  }

  async processSelected(): Promise<void> {
    const view = this.view;
    if (!view) return;

    const videoIds = view.selectedIds();
    if (videoIds.length === 0) {
      this.showError("Please select at least one video", { keepPlaylist: true });
      return;
    }

    this.resetBatch();
    this.hideError();
    view.processButton.disabled = true;
    view.downloadButton.disabled = true;
    view.progressContainer.hidden = false;
    for (const phase of BATCH_PHASES) {
      view.phaseBars[phase].setProgress(0);
      view.phaseBars[phase].setElapsed("00:00");
    }
    this.phaseStartedAt = { scraping: this.now() };

    const style = view.selectedStyle();
    this.log(`Processing ${videoIds.length} video(s) with ${style} style`);

    const poller = new ProgressPoller({
      videoIds,
      intervalMs: this.pollIntervalMs,
      fetchProgress: (ids) => this.api.getProgress(ids),
      onTick: (tick) => this.renderTick(view, tick),
      onSettled: () => {
        this.pollSettled = true;
        this.enableDownloadWhenReady(view);
      },
      onError: (error) => this.failBatch(view, error),
    });
    this.poller = poller;
    poller.start();

    const controller = new AbortController();
    this.batchRequest = controller;
    try {
      const outcome = await this.api.processBatch(videoIds, style, controller.signal);
      if (this.batchRequest !== controller) return;
      this.processedContent = outcome.text;
      if (outcome.failedIds.length > 0) {
        this.log(`Failed videos: ${outcome.failedIds.join(", ")}`, "error");
      }
      this.log("Merged document received", "success");
      this.enableDownloadWhenReady(view);
    } catch (error) {
      if (this.batchRequest !== controller) return;
      this.failBatch(view, error);
    } finally {
      if (this.batchRequest === controller) this.batchRequest = null;
    }
  }

  download(): void {
    if (this.processedContent === null) return;
    this.save(this.processedContent);
    this.log("Transcripts downloaded", "success");
  }

  private displayPlaylist(videos: PlaylistVideo[]): void {
    if (videos.length === 0) {
      this.showError("No videos found in the playlist");
      return;
    }
    this.resetBatch();
    const view = renderPlaylist(this.elements.playlistContainer, videos, { log: this.log });
    view.processButton.addEventListener("click", () => {
      void this.processSelected();
    });
    view.downloadButton.addEventListener("click", () => this.download());
    this.view = view;
    this.elements.playlistContainer.style.display = "block";
    this.log(`Loaded ${view.videoCount} video(s)`, "success");
  }

  private renderTick(view: PlaylistView, tick: PollTick): void {
    const now = this.now();
    const active = BATCH_PHASES.indexOf(tick.phase);
    BATCH_PHASES.forEach((phase, index) => {
      if (index < active) view.phaseBars[phase].setProgress(100);
    });

    const startedAt = this.phaseStartedAt[tick.phase] ?? now;
    this.phaseStartedAt[tick.phase] = startedAt;
    const bar = view.phaseBars[tick.phase];
    bar.setProgress(tick.percent, PHASE_OPERATIONS[tick.phase]);
    bar.setElapsed(formatElapsed(now - startedAt));
    this.log(`${tick.phase} progress: ${tick.percent}%`);
  }

  private enableDownloadWhenReady(view: PlaylistView): void {
    if (!this.pollSettled || this.processedContent === null) return;
    view.downloadButton.disabled = false;
    view.processButton.disabled = false;
    this.log("Processing complete", "success");
  }

  private failBatch(view: PlaylistView, error: unknown): void {
    this.poller?.stop();
    this.poller = null;
    this.batchRequest?.abort();
    this.batchRequest = null;
    this.showError(messageOf(error, "Failed to process transcripts"), { keepPlaylist: true });
    view.processButton.disabled = false;
    view.downloadButton.disabled = this.processedContent === null;
  }

  private resetBatch(): void {
    this.poller?.stop();
    this.poller = null;
    this.batchRequest?.abort();
    this.batchRequest = null;
    this.processedContent = null;
    this.pollSettled = false;
  }

  private showLoading(): void {
    const { loadingSpinner, transcriptContainer, playlistContainer } = this.elements;
    loadingSpinner.style.display = "block";
    transcriptContainer.style.display = "none";
    playlistContainer.style.display = "none";
    this.hideError();
    this.log("Loading started...");
  }

  private hideLoading(): void {
    this.elements.loadingSpinner.style.display = "none";
  }

  private hideError(): void {
    this.elements.errorMessage.style.display = "none";
  }

  private showError(message: string, options: { keepPlaylist?: boolean } = {}): void {
    console.error("Showing error:", message);
    this.hideLoading();
    this.elements.errorMessage.textContent = message;
    this.elements.errorMessage.style.display = "block";
    if (!options.keepPlaylist) {
      this.elements.playlistContainer.style.display = "none";
    }
    this.log(`Error: ${message}`, "error");
  }
}

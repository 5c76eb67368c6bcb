import { PROCESSING_STYLES, type PlaylistVideo, type ProcessingStyle } from "../../shared/src/api";
import { BATCH_PHASES, type BatchPhase } from "../../shared/src/progress";
import { watchUrl } from "../../shared/src/youtubeUrl";
import type { ProcessLog } from "./logs";

const PHASE_LABELS: Record<BatchPhase, string> = {
  scraping: "Scraping Transcripts",
  processing: "Processing Transcripts",
  merging: "Merging Results",
};

const STYLE_LABELS: Record<ProcessingStyle, string> = {
  default: "Default Style",
  academic: "Academic Style",
  technical: "Technical Style",
  business: "Business Style",
};

const pad = (value: number) => value.toString().padStart(2, "0");

export function formatElapsed(ms: number): string {
  const elapsed = Math.max(0, Math.floor(ms / 1000));
  return `${pad(Math.floor(elapsed / 60))}:${pad(elapsed % 60)}`;
}

/** DD.MM.YYYY in UTC. */
export function formatPublishDate(value: string | undefined): string {
  if (!value) return "Date not available";
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return "Date not available";
  return `${pad(date.getUTCDate())}.${pad(date.getUTCMonth() + 1)}.${date.getUTCFullYear()}`;
}

export function isValidVideo(value: PlaylistVideo): boolean {
  return typeof value.video_id === "string" && value.video_id.length > 0 &&
    typeof value.title === "string" && value.title.trim().length > 0;
}

export interface PhaseBar {
  readonly element: HTMLElement;
  setProgress(percent: number, operation?: string): void;
  setElapsed(text: string): void;
}

function el<K extends keyof HTMLElementTagNameMap>(
  doc: Document,
  tag: K,
  className?: string,
  text?: string,
): HTMLElementTagNameMap[K] {
  const node = doc.createElement(tag);
  if (className) node.className = className;
  if (text !== undefined) node.textContent = text;
  return node;
}

function createPhaseBar(doc: Document, phase: BatchPhase): PhaseBar {
  const element = el(doc, "div", "phase-progress");
  element.dataset.phase = phase;

  const track = el(doc, "div", "progress");
  const bar = el(doc, "div", "progress-bar", "0%");
  bar.setAttribute("role", "progressbar");
  bar.setAttribute("aria-valuemin", "0");
  bar.setAttribute("aria-valuemax", "100");
  bar.setAttribute("aria-valuenow", "0");
  bar.style.width = "0%";
  track.appendChild(bar);

  const elapsed = el(doc, "div", "elapsed-time", "00:00");
  const operation = el(doc, "div", "current-operation");
  element.append(el(doc, "div", "phase-label", PHASE_LABELS[phase]), track, elapsed, operation);

  return {
    element,
    setProgress(percent, currentOperation) {
      const value = Math.round(Math.min(100, Math.max(0, percent)));
      bar.style.width = `${value}%`;
      bar.setAttribute("aria-valuenow", String(value));
      bar.textContent = `${value}%`;
      if (currentOperation) operation.textContent = currentOperation;
    },
    setElapsed(text) {
      elapsed.textContent = text;
    },
  };
}

export interface PlaylistView {
  selectAll: HTMLInputElement;
  styleSelect: HTMLSelectElement;
  processButton: HTMLButtonElement;
  downloadButton: HTMLButtonElement;
  progressContainer: HTMLElement;
  phaseBars: Record<BatchPhase, PhaseBar>;
  videoCount: number;
  selectedIds(): string[];
  selectedStyle(): ProcessingStyle;
}

export interface RenderOptions {
  log: ProcessLog;
  copyText?: (text: string) => Promise<void>;
}

function renderVideoItem(
  doc: Document,
  video: PlaylistVideo,
  position: number,
  options: RenderOptions,
): HTMLElement {
  const url = watchUrl(video.video_id);
  const item = el(doc, "div", "video-item");

  const checkbox = el(doc, "input", "video-select");
  checkbox.type = "checkbox";
  checkbox.value = video.video_id;

  const info = el(doc, "div", "video-info");
  const copyButton = el(doc, "button", "btn btn-sm btn-youtube copy-url", "Copy URL");
  copyButton.type = "button";
  copyButton.dataset.url = url;
  copyButton.addEventListener("click", () => {
    const copy = options.copyText ?? ((text: string) => navigator.clipboard.writeText(text));
    void copy(url).then(
      () => {
        options.log("Text copied to clipboard", "success");
        copyButton.textContent = "Copied!";
      },
      (error: unknown) => {
        options.log(`Failed to copy: ${error instanceof Error ? error.message : String(error)}`, "error");
        copyButton.textContent = "Failed to copy";
      },
    ).finally(() => {
      setTimeout(() => {
        copyButton.textContent = "Copy URL";
      }, 2000);
    });
  });

  info.append(
    el(doc, "div", "video-title", video.title),
    el(doc, "div", "video-date", formatPublishDate(video.publishedAt)),
    el(doc, "div", "video-url", url),
    copyButton,
  );
  item.append(checkbox, el(doc, "span", "video-number", `${position}.`), info);
  return item;
}

/**
 * Replaces the container's content with the controls, the phase bars and the
 * video list. Invalid records are skipped and logged.
 */
export function renderPlaylist(
  container: HTMLElement,
  videos: readonly PlaylistVideo[],
  options: RenderOptions,
): PlaylistView {
  const doc = container.ownerDocument;
  container.replaceChildren();

  const header = el(doc, "div", "mb-3");
  const selectAll = el(doc, "input", "video-select-all");
  selectAll.type = "checkbox";
  selectAll.id = "select-all";
  const selectAllLabel = el(doc, "label", "ms-2", "Select All");
  selectAllLabel.htmlFor = "select-all";

  const styleSelect = el(doc, "select", "form-select me-3");
  styleSelect.id = "processing-style";
  for (const style of PROCESSING_STYLES) {
    const option = el(doc, "option", undefined, STYLE_LABELS[style]);
    option.value = style;
    styleSelect.appendChild(option);
  }

  const processButton = el(doc, "button", "btn btn-youtube me-2", "Process Transcripts");
  processButton.id = "process-transcripts";
  processButton.type = "button";
  const downloadButton = el(doc, "button", "btn btn-youtube", "Download Transcripts");
  downloadButton.id = "download-transcripts";
  downloadButton.type = "button";
  downloadButton.disabled = true;

  const selectRow = el(doc, "div", "d-flex align-items-center mb-2");
  selectRow.append(selectAll, selectAllLabel);
  const actionRow = el(doc, "div", "d-flex align-items-center");
  actionRow.append(styleSelect, processButton, downloadButton);
  header.append(selectRow, actionRow);

  const progressContainer = el(doc, "div", "progress-phases mb-3");
  progressContainer.hidden = true;
  progressContainer.id = "download-progress";
  const phaseBars: Record<BatchPhase, PhaseBar> = {
    scraping: createPhaseBar(doc, "scraping"),
    processing: createPhaseBar(doc, "processing"),
    merging: createPhaseBar(doc, "merging"),
  };
  for (const phase of BATCH_PHASES) {
    progressContainer.appendChild(phaseBars[phase].element);
  }

  const videoList = el(doc, "div", "video-list");
  let videoCount = 0;
  videos.forEach((video, index) => {
    if (!isValidVideo(video)) {
      console.error(`Invalid video data at index ${index}:`, video);
      options.log(`Skipping invalid video data at index ${index}`, "error");
      return;
    }
    videoCount += 1;
    videoList.appendChild(renderVideoItem(doc, video, index + 1, options));
  });

  const checkboxes = () => Array.from(videoList.querySelectorAll<HTMLInputElement>("input.video-select"));
  selectAll.addEventListener("change", () => {
    for (const checkbox of checkboxes()) checkbox.checked = selectAll.checked;
  });

  container.append(header, progressContainer, videoList);

  return {
    selectAll,
    styleSelect,
    processButton,
    downloadButton,
    progressContainer,
    phaseBars,
    videoCount,
    selectedIds: () => checkboxes().filter((box) => box.checked).map((box) => box.value),
    selectedStyle: () => PROCESSING_STYLES.find((style) => style === styleSelect.value) ?? "default",
  };
}

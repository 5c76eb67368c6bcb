export const DOWNLOAD_FILENAME = "processed_transcripts.txt";

/** Saves text through a temporary object URL; no network involved. */
export function saveTextFile(doc: Document, text: string, filename = DOWNLOAD_FILENAME): void {
  const view = doc.defaultView;
  if (!view) throw new Error("Document is not attached to a window");

  const blob = new view.Blob([text], { type: "text/plain" });
  const url = view.URL.createObjectURL(blob);
  const anchor = doc.createElement("a");
  anchor.style.display = "none";
  anchor.href = url;
  anchor.download = filename;
  doc.body.appendChild(anchor);
  try {
    anchor.click();
  } finally {
    anchor.remove();
    // Some browsers start the download after click() returns.
    setTimeout(() => view.URL.revokeObjectURL(url), 0);
  }
}

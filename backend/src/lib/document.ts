import type { ProcessedVideo, TranscriptAnalysis } from "../types";

const SECTION_RULE = "-".repeat(80);
const VIDEO_RULE = "=".repeat(80);

/** ISO timestamp to YYYY-MM-DD; anything unparseable is passed through. */
export function formatDate(value: string | undefined): string {
  if (!value) return "Not available";
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  return date.toISOString().slice(0, 10);
}

const bullets = (items: readonly string[]): string => items.map((item) => `- ${item}`).join("\n");

const STYLE_SECTIONS: ReadonlyArray<{
  title: string;
  pick: (analysis: TranscriptAnalysis) => string[] | undefined;
  render: (items: readonly string[]) => string;
}> = [
  { title: "Research Implications", pick: (a) => a.researchImplications, render: bullets },
  {
    title: "Code Snippets",
    pick: (a) => a.codeSnippets,
    render: (items) => items.map((snippet) => "```\n" + snippet + "\n```").join("\n"),
  },
  { title: "Technical Concepts", pick: (a) => a.technicalConcepts, render: bullets },
  { title: "Market Insights", pick: (a) => a.marketInsights, render: bullets },
  { title: "Strategic Implications", pick: (a) => a.strategicImplications, render: bullets },
];

export function formatVideoSection({ details, style, analysis }: ProcessedVideo): string[] {
  const lines = [
    `Video Title: ${details.title}`,
    `Video ID: ${details.id}`,
    `Channel Name: ${details.channelTitle}`,
    `Published At: ${formatDate(details.publishedAt)}`,
    `Processing Style: ${style}`,
    SECTION_RULE,
    "Summary:",
    analysis.summary,
    "\nTags:",
    analysis.tags.join(", "),
    "\nKey Points:",
    bullets(analysis.keyPoints),
    "\nFormatted Text:",
    analysis.formattedText,
  ];

  for (const section of STYLE_SECTIONS) {
    const items = section.pick(analysis);
    if (items && items.length > 0) {
      lines.push(`\n${section.title}:`, section.render(items));
    }
  }

  lines.push(VIDEO_RULE, "");
  return lines;
}

export function formatFailureSection(videoId: string, error: string): string[] {
  return [`Error processing video ${videoId}: ${error}`, VIDEO_RULE, ""];
}

export type DocumentEntry =
  | { kind: "processed"; video: ProcessedVideo }
  | { kind: "failed"; videoId: string; error: string };

export function buildMergedDocument(entries: readonly DocumentEntry[]): string {
  return entries
    .flatMap((entry) =>
      entry.kind === "processed"
        ? formatVideoSection(entry.video)
        : formatFailureSection(entry.videoId, entry.error),
    )
    .join("\n");
}

import type { ProcessingStyle } from "../../../shared/src/api";

export interface PromptTemplate {
  systemPrompt: string;
  /** Style-specific list fields the model is asked to return. */
  extraFields: readonly string[];
}

const FORMATTING_STEP = [
  "STEP 1 - FORMATTING (REQUIRED):",
  "1. Fix grammar and punctuation while maintaining all original words",
  "2. Properly align paragraphs with consistent indentation",
  "3. Add appropriate line breaks between sections",
  "4. Ensure proper spacing between sentences",
  "5. Format dialogue and quotes properly",
  "6. Structure the text into clear sections",
  "",
  "IMPORTANT: DO NOT remove or change any words from the original text.",
  "Focus only on formatting and organization while preserving ALL original content.",
].join("\n");

interface StyleDefinition {
  role: string;
  analysis: readonly string[];
  summary: string;
  tags: string;
  keyPoints: string;
  extraFields: Readonly<Record<string, string>>;
}

const STYLES: Readonly<Record<ProcessingStyle, StyleDefinition>> = {
  default: {
    role: "text editor and analyst",
    analysis: ["Generate a concise summary", "Create relevant tags", "Extract key points"],
    summary: "concise summary of the content",
    tags: "'relevant', 'topic', 'tags'",
    keyPoints: "'main', 'points', 'extracted'",
    extraFields: {},
  },
  academic: {
    role: "academic editor and analyst",
    analysis: [
      "Generate an academic summary",
      "Create academic-focused tags",
      "Extract key scholarly points",
      "Identify research implications",
    ],
    summary: "academic summary of the content",
    tags: "'academic_tag1', 'academic_tag2', ...",
    keyPoints: "'scholarly_point1', 'scholarly_point2', ...",
    extraFields: { research_implications: "'implication1', 'implication2', ..." },
  },
  technical: {
    role: "technical editor and analyst",
    analysis: [
      "Generate a technical summary",
      "Create technical tags",
      "Extract key technical points",
      "Identify code snippets and concepts",
    ],
    summary: "technical summary of the content",
    tags: "'tech_tag1', 'tech_tag2', ...",
    keyPoints: "'technical_point1', 'technical_point2', ...",
    extraFields: {
      code_snippets: "'snippet1', 'snippet2', ...",
      technical_concepts: "'concept1', 'concept2', ...",
    },
  },
  business: {
    role: "business editor and analyst",
    analysis: [
      "Generate a business summary",
      "Create business-focused tags",
      "Extract key business points",
      "Identify market insights and implications",
    ],
    summary: "business summary of the content",
    tags: "'business_tag1', 'business_tag2', ...",
    keyPoints: "'business_point1', 'business_point2', ...",
    extraFields: {
      market_insights: "'insight1', 'insight2', ...",
      strategic_implications: "'strategy1', 'strategy2', ...",
    },
  },
};

function buildSystemPrompt(style: StyleDefinition): string {
  const fields = [
    "  'formatted_text': 'THE COMPLETE FORMATTED VERSION OF THE INPUT TEXT'",
    `  'summary': '${style.summary}'`,
    `  'tags': [${style.tags}]`,
    `  'key_points': [${style.keyPoints}]`,
    ...Object.entries(style.extraFields).map(([name, example]) => `  '${name}': [${example}]`),
  ];

  return [
    `You are a professional ${style.role}. Your PRIMARY task is text formatting and editing:`,
    "",
    FORMATTING_STEP,
    "",
    "STEP 2 - ANALYSIS:",
    "Only after completing the formatting, proceed with:",
    ...style.analysis.map((line) => `- ${line}`),
    "",
    "Return a JSON object with the following structure:",
    "{",
    fields.join(",\n"),
    "}",
    "",
    "IMPORTANT: The formatted_text MUST contain all words from the original text.",
  ].join("\n");
}

const TEMPLATES: Readonly<Record<ProcessingStyle, PromptTemplate>> = {
  default: { systemPrompt: buildSystemPrompt(STYLES.default), extraFields: [] },
  academic: {
    systemPrompt: buildSystemPrompt(STYLES.academic),
    extraFields: Object.keys(STYLES.academic.extraFields),
  },
  technical: {
    systemPrompt: buildSystemPrompt(STYLES.technical),
    extraFields: Object.keys(STYLES.technical.extraFields),
  },
  business: {
    systemPrompt: buildSystemPrompt(STYLES.business),
    extraFields: Object.keys(STYLES.business.extraFields),
  },
};

export function getTemplate(style: ProcessingStyle): PromptTemplate {
  return TEMPLATES[style];
}

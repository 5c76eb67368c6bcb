import OpenAI from "openai";
import { z } from "zod";
import type { ProcessingStyle } from "../../../shared/src/api";
import {
  AppError,
  RateLimitedError,
  UpstreamError,
  ValidationError,
  errorMessage,
} from "../errors";
import type { Summarizer, TranscriptAnalysis } from "../types";
import type { Logger } from "./logger";
import { silentLogger } from "./logger";
import { getTemplate } from "./prompts";
import { unlimited, type RateLimiter } from "./queue";
import { createRetryPolicy, withRetry, type RetryHooks, type RetryPolicy } from "./retry";

export interface CompletionRequest {
  model: string;
  system: string;
  user: string;
}

/** Returns the raw text of the model's reply. */
export type CompletionClient = (request: CompletionRequest) => Promise<string>;

export function classifyCompletionError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof OpenAI.RateLimitError) {
    return new RateLimitedError("Summarization rate limit exceeded", { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new UpstreamError(`Summarization service unreachable: ${error.message}`, {
      isRetryable: true,
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status ?? 500;
    return new UpstreamError(`Summarization failed (${status}): ${error.message}`, {
      isRetryable: status >= 500,
      cause: error,
    });
  }
  return new UpstreamError(`Summarization failed: ${errorMessage(error)}`, {
    isRetryable: true,
    cause: error,
  });
}

// Retries belong to the shared policy around the rate limiter, not the SDK.
export function createOpenAIClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

export function createOpenAICompletion(client: OpenAI): CompletionClient {
  return async ({ model, system, user }) => {
    try {
      const res = await client.chat.completions.create({
        model,
        messages: [
          { role: "system", content: system },
          { role: "user", content: user },
        ],
        response_format: { type: "json_object" },
      });
      return res.choices[0]?.message?.content ?? "";
    } catch (error) {
      throw classifyCompletionError(error);
    }
  };
}

// Models sometimes return "a, b" where a list was asked for.
const stringList = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((item) => item.trim())
          .filter(Boolean)
      : value,
  z.array(z.coerce.string()),
);

const AnalysisReplySchema = z.object({
  formatted_text: z.string().trim().min(1),
  summary: z.string().trim().min(1),
  tags: stringList.refine((list) => list.length > 0),
  key_points: stringList.refine((list) => list.length > 0),
  research_implications: stringList.optional(),
  code_snippets: stringList.optional(),
  technical_concepts: stringList.optional(),
  market_insights: stringList.optional(),
  strategic_implications: stringList.optional(),
});

function extractField(text: string, field: string, isList: boolean): string | string[] | undefined {
  const name = `["']?${field}["']?\\s*:\\s*`;
  if (isList) {
    const match = new RegExp(`${name}\\[([\\s\\S]*?)\\]`).exec(text);
    if (!match) return undefined;
    return Array.from(match[1].matchAll(/["']([^"']+)["']/g), (item) => item[1]);
  }
  const match = new RegExp(`${name}["']([^"']+)["']`).exec(text);
  return match ? match[1] : undefined;
}

/**
 * Reads a reply that should be JSON: as-is, then without code fences and with
 * single quotes swapped, then field by field.
 */
export function parseReply(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // fall through to the lenient forms
  }
  const cleaned = text
    .trim()
    .replace(/```json\s*|\s*```/g, "")
    .replace(/'/g, '"');
  try {
    return JSON.parse(cleaned);
  } catch {
    return {
      formatted_text: extractField(text, "formatted_text", false),
      summary: extractField(text, "summary", false),
      tags: extractField(text, "tags", true),
      key_points: extractField(text, "key_points", true),
    };
  }
}

export function toAnalysis(reply: string, transcript: string): TranscriptAnalysis {
  const parsed = AnalysisReplySchema.safeParse(parseReply(reply));
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new UpstreamError(`Response missing required fields: ${fields.join(", ")}`, {
      isRetryable: true,
    });
  }
  const data = parsed.data;
  if (data.formatted_text === transcript.trim()) {
    throw new UpstreamError("Formatted text unchanged from input", { isRetryable: true });
  }

  return {
    formattedText: data.formatted_text,
    summary: data.summary,
    tags: data.tags,
    keyPoints: data.key_points,
    researchImplications: data.research_implications,
    codeSnippets: data.code_snippets,
    technicalConcepts: data.technical_concepts,
    marketInsights: data.market_insights,
    strategicImplications: data.strategic_implications,
  };
}

const STYLE_FIELDS: Readonly<Record<string, keyof TranscriptAnalysis>> = {
  research_implications: "researchImplications",
  code_snippets: "codeSnippets",
  technical_concepts: "technicalConcepts",
  market_insights: "marketInsights",
  strategic_implications: "strategicImplications",
};

/** Style-specific fields the prompt asked for but the reply left out or empty. */
export function missingStyleFields(analysis: TranscriptAnalysis, fields: readonly string[]): string[] {
  return fields.filter((field) => {
    const key = STYLE_FIELDS[field];
    const value = key === undefined ? undefined : analysis[key];
    return !Array.isArray(value) || value.length === 0;
  });
}

export interface TranscriptSummarizerOptions {
  complete: CompletionClient;
  model: string;
  rateLimiter?: RateLimiter;
  retry?: RetryPolicy;
  logger?: Logger;
  sleep?: RetryHooks["sleep"];
}

export class TranscriptSummarizer implements Summarizer {
  private readonly complete: CompletionClient;
  private readonly model: string;
  private readonly rateLimiter: RateLimiter;
  private readonly retry: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep?: RetryHooks["sleep"];

  constructor(options: TranscriptSummarizerOptions) {
    this.complete = options.complete;
    this.model = options.model;
    this.rateLimiter = options.rateLimiter ?? unlimited;
    this.retry = options.retry ?? createRetryPolicy();
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  async summarize(transcript: string, style: ProcessingStyle): Promise<TranscriptAnalysis> {
    if (!transcript.trim()) {
      throw new ValidationError("Invalid transcript text provided");
    }
    const { systemPrompt, extraFields } = getTemplate(style);

    const analysis = await withRetry(
      () =>
        this.rateLimiter.schedule(async () => {
          const reply = await this.complete({ model: this.model, system: systemPrompt, user: transcript });
          return toAnalysis(reply, transcript);
        }),
      this.retry,
      {
        sleep: this.sleep,
        onRetry: ({ attempt, delay, error }) =>
          this.logger.warn({ style, attempt, delay, err: errorMessage(error) }, "Retrying summarization"),
      },
    );

    const missing = missingStyleFields(analysis, extraFields);
    if (missing.length > 0) {
      this.logger.warn({ style, missing }, "Reply lacks style-specific fields");
    }
    return analysis;
  }
}

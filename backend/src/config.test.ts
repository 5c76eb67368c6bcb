import path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

const base = { YOUTUBE_API_KEY: "test-youtube-key", OPENAI_API_KEY: "test-secret" };

describe("loadConfig", () => {
  it("fills in defaults", () => {
    expect(loadConfig(base)).toEqual({
      port: 5000,
      host: "0.0.0.0",
      logLevel: "info",
      publicDir: path.resolve("frontend/public"),
      youtube: { apiKey: "test-youtube-key", pageDelayMs: 1000 },
      openai: { apiKey: "test-secret", model: "gpt-4o-mini", requestsPerMinute: 6 },
      pipeline: { concurrency: 2 },
      retry: { attempts: 3, delay: 1000 },
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...base,
      PORT: "8080",
      LOG_LEVEL: "debug",
      OPENAI_MODEL: "test-model",
      MAX_CONCURRENT_DOWNLOADS: "4",
      SUMMARY_REQUESTS_PER_MINUTE: "30",
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.openai).toEqual({ apiKey: "test-secret", model: "test-model", requestsPerMinute: 30 });
    expect(config.pipeline.concurrency).toBe(4);
  });

  it("falls back to info for an unknown log level", () => {
    expect(loadConfig({ ...base, LOG_LEVEL: "loud" }).logLevel).toBe("info");
  });

  it("requires both API keys", () => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret" })).toThrow("Missing environment variable: YOUTUBE_API_KEY");
    expect(() => loadConfig({ YOUTUBE_API_KEY: "test-youtube-key" })).toThrow(
      "Missing environment variable: OPENAI_API_KEY",
    );
  });

  it("rejects numbers that are not positive integers", () => {
    expect(() => loadConfig({ ...base, PORT: "-1" })).toThrow('Environment variable PORT must be a positive integer, got "-1"');
    expect(() => loadConfig({ ...base, RETRY_ATTEMPTS: "two" })).toThrow("RETRY_ATTEMPTS");
  });
});

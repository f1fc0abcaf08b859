import { describe, expect, it } from "vitest";

import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("uses the defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.openaiApiKey).toBeNull();
    expect(config.maxInstances).toBe(10);
    expect(config.ai).toEqual({ model: "gpt-4o-mini", temperature: 0.7 });
    expect(config.image).toEqual({ model: "dall-e-3", size: "1024x1024", frameSize: 512, frameDurationMs: 500 });
    expect(config.web).toEqual({
      requestTimeoutMs: 10000,
      maxSearchResults: 5,
      maxScrapedContentLength: 1000,
      maxScrapedPages: 3,
    });
  });

  it("reads overrides and falls back on invalid values", () => {
    const config = loadConfig({
      OPENAI_API_KEY: " test-secret ",
      REQUEST_TIMEOUT: "3",
      MAX_SEARCH_RESULTS: "-2",
      IMAGE_SIZE: "999x999",
      AI_TEMPERATURE: "warm",
    });

    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.web.requestTimeoutMs).toBe(3000);
    expect(config.web.maxSearchResults).toBe(5);
    expect(config.image.size).toBe("1024x1024");
    expect(config.ai.temperature).toBe(0.7);
  });

  it("is frozen all the way down", () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.web)).toBe(true);
    expect(Object.isFrozen(config.cors.methods)).toBe(true);
  });
});

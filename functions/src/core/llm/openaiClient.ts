// functions/src/core/llm/openaiClient.ts
// Thin adapters over the OpenAI SDK. Handlers only see LlmClient/ImageClient.

import OpenAI from "openai";

import type { AppConfig } from "../../config";
import type { LoggerLike } from "../logging/logger";

export type CompletionRequest = {
  system: string;
  user: string;         // empty: the system turn is sent alone
  temperature?: number; // falls back to config.ai.temperature
  label?: string;       // shows up in logs only
};

export interface LlmClient {
  complete(request: CompletionRequest): Promise<string>;
}

export interface ImageClient {
  generateImageUrl(prompt: string): Promise<string>;
}

export type AiClients = {
  llm: LlmClient;
  images: ImageClient;
};

export function createOpenAiLlmClient(openai: OpenAI, config: AppConfig, logger: LoggerLike): LlmClient {
  return {
    async complete({ system, user, temperature, label }) {
      const t = temperature ?? config.ai.temperature;

      logger.info("openai_chat_call", {
        label: label ?? "unlabelled",
        model: config.ai.model,
        temperature: t,
      });

      const completion = await openai.chat.completions.create({
        model: config.ai.model,
        messages: user
          ? [
              { role: "system", content: system },
              { role: "user", content: user },
            ]
          : [{ role: "system", content: system }],
        temperature: t,
      });

      return (completion.choices[0]?.message?.content ?? "").trim();
    },
  };
}

export function createOpenAiImageClient(openai: OpenAI, config: AppConfig, logger: LoggerLike): ImageClient {
  return {
    async generateImageUrl(prompt) {
      logger.info("openai_image_call", { model: config.image.model, size: config.image.size });

      const response = await openai.images.generate({
        model: config.image.model,
        prompt,
        size: config.image.size,
        quality: "standard",
        n: 1,
      });

      const url = response.data?.[0]?.url;
      if (!url) throw new Error("Image generation returned no URL");
      return url;
    },
  };
}

/**
 * Clients are created on first use and reused by the warm instance.
 * Returns null while no API key is configured.
 */
export function createAiClientProvider(config: AppConfig, logger: LoggerLike): () => AiClients | null {
  let clients: AiClients | null = null;

  return () => {
    if (!config.openaiApiKey) return null;
    if (!clients) {
      const openai = new OpenAI({ apiKey: config.openaiApiKey });
      clients = {
        llm: createOpenAiLlmClient(openai, config, logger),
        images: createOpenAiImageClient(openai, config, logger),
      };
    }
    return clients;
  };
}

// functions/src/entry/gifHandler.ts

import { discardAnimation, generateAnimation } from "../core/media/animationPipeline";
import type { GifUploader } from "../core/media/storageUploader";
import type { FetchLike } from "../core/research/http";
import { createAiHandler, replyJson, type AiHandlerDeps } from "./aiHandler";
import type { HttpHandler } from "./http";
import { readPromptInput } from "./promptInput";

const FRAMES_GENERATED = 2;

export type GifHandlerDeps = AiHandlerDeps & {
  fetch: FetchLike;
  uploader: () => GifUploader;
  tmpDir?: string;
  now?: () => Date;
};

/** POST { prompt } -> { gif_url, frames_generated } */
export function createGifHandler(deps: GifHandlerDeps): HttpHandler {
  const { config, logger } = deps;

  return createAiHandler(deps, {
    name: "gif",
    validate: readPromptInput,
    run: async ({ prompt }, { images }) => {
      const file = await generateAnimation(
        {
          images,
          fetch: deps.fetch,
          logger,
          image: config.image,
          timeoutMs: config.web.requestTimeoutMs,
          tmpDir: deps.tmpDir,
          now: deps.now,
        },
        prompt
      );

      try {
        const gifUrl = await deps.uploader().upload(file);
        logger.info("gif_uploaded", { gifUrl });
        return replyJson({ gif_url: gifUrl, frames_generated: FRAMES_GENERATED });
      } finally {
        await discardAnimation(file).catch((e: unknown) => {
          logger.warn("gif_cleanup_failed", { file, error: String(e) });
        });
      }
    },
  });
}

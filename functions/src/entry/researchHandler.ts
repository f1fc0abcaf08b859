// functions/src/entry/researchHandler.ts

import { RESEARCH_COPY_EN } from "../copy/messages.en";
import type { FetchLike } from "../core/research/http";
import { gatherSources } from "../core/research/gatherSources";
import { buildResearchPrompt } from "../prompt";
import { createAiHandler, replyJson, type AiHandlerDeps } from "./aiHandler";
import type { HttpHandler } from "./http";
import { readPromptInput } from "./promptInput";

const TEMPERATURE = 0.7;

export type ResearchHandlerDeps = AiHandlerDeps & {
  fetch: FetchLike;
};

/**
 * POST { prompt } -> { summary, sources: [{ title, url }] }
 * Searches, scrapes the top pages and summarises them. When nothing
 * usable comes back the summary is a fixed apology and sources is absent.
 */
export function createResearchHandler(deps: ResearchHandlerDeps): HttpHandler {
  const { config, logger } = deps;
  const web = { fetch: deps.fetch, logger, timeoutMs: config.web.requestTimeoutMs };

  return createAiHandler(deps, {
    name: "research",
    validate: readPromptInput,
    run: async ({ prompt }, { llm }) => {
      const { results, sources } = await gatherSources(web, prompt, config.web);

      if (results.length === 0) {
        logger.info("research_no_results", { query: prompt });
        return replyJson({ summary: RESEARCH_COPY_EN.noResults });
      }

      if (sources.length === 0) {
        logger.info("research_nothing_scraped", { query: prompt, results: results.length });
        return replyJson({ summary: RESEARCH_COPY_EN.nothingScraped });
      }

      const summary = await llm.complete({
        ...buildResearchPrompt(prompt, sources),
        temperature: TEMPERATURE,
        label: "research",
      });

      logger.info("research_done", { query: prompt, sources: sources.length });
      return replyJson({
        summary,
        sources: sources.map(({ title, url }) => ({ title, url })),
      });
    },
  });
}

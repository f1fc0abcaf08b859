// functions/src/core/research/gatherSources.ts

import type { ResearchSource } from "../../prompt";
import { scrapePage } from "./scrape";
import { searchWeb, type SearchResult, type WebDeps } from "./webSearch";

export type ResearchLimits = {
  maxSearchResults: number;
  maxScrapedPages: number;
  maxScrapedContentLength: number;
};

export type GatheredSources = {
  results: SearchResult[];
  sources: ResearchSource[]; // only pages that yielded text
};

/** Search, then scrape the top results one after another. */
export async function gatherSources(
  deps: WebDeps,
  query: string,
  limits: ResearchLimits
): Promise<GatheredSources> {
  const results = await searchWeb(deps, query, limits.maxSearchResults);
  const sources: ResearchSource[] = [];

  for (const result of results.slice(0, limits.maxScrapedPages)) {
    const content = await scrapePage(deps, result.url, limits.maxScrapedContentLength);
    if (!content) continue;
    sources.push({ title: result.title, url: result.url, content });
  }

  return { results, sources };
}

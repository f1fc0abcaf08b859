// functions/src/core/research/webSearch.ts
// Search via DuckDuckGo's HTML page (no API key; markup may change).

import * as cheerio from "cheerio";

import type { LoggerLike } from "../logging/logger";
import { BROWSER_USER_AGENT, type FetchLike } from "./http";

export const SEARCH_URL = "https://html.duckduckgo.com/html/";

export type SearchResult = {
  title: string;
  url: string;
  snippet: string;
};

export type WebDeps = {
  fetch: FetchLike;
  logger: LoggerLike;
  timeoutMs: number;
};

function resolveResultUrl(href: string): string {
  let url = href;
  if (url.startsWith("//duckduckgo.com/l/?")) {
    url = new URL(`https:${url}`).searchParams.get("uddg") ?? "";
  }
  if (url && !url.startsWith("http")) url = `https:${url}`;
  return url;
}

/**
 * Reads at most `maxResults` result blocks; blocks without a title link
 * or URL are skipped (and still count against the limit).
 */
export function parseSearchResults(html: string, maxResults: number): SearchResult[] {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];

  $("div.result")
    .slice(0, maxResults)
    .each((_, el) => {
      const block = $(el);
      const link = block.find("a.result__a").first();
      if (link.length === 0) return;

      const title = link.text().trim();
      const url = resolveResultUrl(link.attr("href") ?? "");
      if (!title || !url) return;

      results.push({
        title,
        url,
        snippet: block.find(".result__snippet").first().text().trim(),
      });
    });

  return results;
}

/** Never throws: request or parse failures give an empty list. */
export async function searchWeb(deps: WebDeps, query: string, maxResults: number): Promise<SearchResult[]> {
  try {
    const res = await deps.fetch(SEARCH_URL, {
      method: "POST",
      headers: {
        "User-Agent": BROWSER_USER_AGENT,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({ q: query, kl: "us-en" }).toString(),
      signal: AbortSignal.timeout(deps.timeoutMs),
    });

    if (!res.ok) throw new Error(`search responded ${res.status}`);

    const results = parseSearchResults(await res.text(), maxResults);
    deps.logger.info("web_search_done", { query, count: results.length });
    return results;
  } catch (e) {
    deps.logger.error("web_search_failed", { query, error: String(e) });
    return [];
  }
}

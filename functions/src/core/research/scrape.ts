// functions/src/core/research/scrape.ts

import * as cheerio from "cheerio";

import { BROWSER_USER_AGENT } from "./http";
import type { WebDeps } from "./webSearch";

const STRIPPED_TAGS = "script, style, nav, footer, header";

/** Visible page text, one space between element boundaries. */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(STRIPPED_TAGS).remove();
  $("*").append(" ");
  return $.root().text().replace(/\s+/g, " ").trim();
}

/** Page text capped at `maxLength`; "" when the page cannot be fetched or read. */
export async function scrapePage(deps: WebDeps, url: string, maxLength: number): Promise<string> {
  try {
    const res = await deps.fetch(url, {
      headers: { "User-Agent": BROWSER_USER_AGENT },
      signal: AbortSignal.timeout(deps.timeoutMs),
    });

    if (!res.ok) throw new Error(`page responded ${res.status}`);

    return htmlToText(await res.text()).slice(0, maxLength);
  } catch (e) {
    deps.logger.warn("scrape_failed", { url, error: String(e) });
    return "";
  }
}

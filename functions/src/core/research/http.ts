// functions/src/core/research/http.ts

/** The global fetch satisfies this; tests pass their own. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

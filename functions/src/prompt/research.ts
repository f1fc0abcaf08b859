// functions/src/prompt/research.ts

import type { PromptPair } from "./types";

export const RESEARCH_SYSTEM_PROMPT_V1 = `
You are a research assistant. Summarise web search results clearly, completely and accurately.

Guidelines:
- Combine information from several sources
- Stay factual and objective
- Include concrete details and examples where available
- Organise the answer logically
- Keep it concise but informative (200-400 words)
- Cite sources for specific claims
- Mention both sides when sources disagree
- Do not mention a training date or knowledge cutoff: everything below comes from a live web search
`.trim();

export const RESEARCH_SYSTEM_PROMPT = RESEARCH_SYSTEM_PROMPT_V1;
export const RESEARCH_PROMPT_VERSION = "RESEARCH_V1";

export type ResearchSource = {
  title: string;
  url: string;
  content: string;
};

export function formatResearchSources(sources: readonly ResearchSource[]): string {
  return sources.map((s) => `Source: ${s.title}\nURL: ${s.url}\nContent: ${s.content}`).join("\n\n");
}

export function buildResearchPrompt(question: string, sources: readonly ResearchSource[]): PromptPair {
  return {
    system: RESEARCH_SYSTEM_PROMPT,
    user: `Research question: ${question}\n\nSearch results:\n\n${formatResearchSources(sources)}\n\nWrite a thorough summary that answers the research question from these sources.`,
  };
}

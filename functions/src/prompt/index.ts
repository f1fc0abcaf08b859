// functions/src/prompt/index.ts

export type { PromptPair } from "./types";
export { DEFAULT_HISTORY_WINDOW } from "./types";

export { LANGUAGE_NAMES, languageName } from "./languages";

export {
  TRANSLATION_PROMPT_VERSION,
  TRANSLATION_SYSTEM_PROMPT,
  buildTranslationPrompt,
} from "./translation";

export {
  CULTURAL_CONTEXT_PROMPT_VERSION,
  CULTURAL_CONTEXT_SYSTEM_PROMPT,
  buildCulturalContextPrompt,
} from "./culturalContext";

export {
  LANGUAGE_TUTOR_PROMPT_VERSION,
  buildLanguageTutorPrompt,
  buildTutorTranslationPrompt,
} from "./languageTutor";

export {
  TUTOR_CHAT_PROMPT_VERSION,
  buildTutorGreetingPrompt,
  buildTutorResponsePrompt,
} from "./tutorChat";

export type { ResearchSource } from "./research";
export { RESEARCH_PROMPT_VERSION, RESEARCH_SYSTEM_PROMPT, buildResearchPrompt } from "./research";

export {
  RESPONSE_SUGGESTIONS_PROMPT_VERSION,
  RESPONSE_SUGGESTIONS_SYSTEM_PROMPT,
  buildResponseSuggestionsPrompt,
} from "./responseSuggestions";

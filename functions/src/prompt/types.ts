// functions/src/prompt/types.ts

export type PromptPair = {
  system: string;
  user: string;
};

export const DEFAULT_HISTORY_WINDOW = 10;

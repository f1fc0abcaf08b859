// functions/src/entry/promptInput.ts

import { VALIDATION_COPY_EN } from "../copy/messages.en";
import type { Result } from "../core/result";
import type { JsonRecord } from "../core/utils/values";
import { requireText } from "../core/validation/requireFields";
import type { HttpError } from "./http";

/** `prompt` for the GIF and research endpoints: absent and blank read differently. */
export function readPromptInput(body: JsonRecord): Result<{ prompt: string }, HttpError> {
  return requireText(body, ["prompt"], (_field, absent) =>
    absent ? VALIDATION_COPY_EN.promptMissing : VALIDATION_COPY_EN.promptEmpty
  );
}

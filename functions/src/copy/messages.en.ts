// functions/src/copy/messages.en.ts

// 1) Research fallbacks (answered with 200)
export const RESEARCH_COPY_EN = {
  noResults:
    "I couldn't find any relevant information for your query. Please try rephrasing your question or search for something else.",
  nothingScraped:
    "I found some results but couldn't access their content. This might be due to website restrictions. Please try a different query.",
} as const;

// 2) Client errors (400)
export const VALIDATION_COPY_EN = {
  translate: "Both 'text' and 'target_language' are required",
  historyRequired: "conversation_history is required",
  historyNotEmpty: "conversation_history is required and cannot be empty",
  tutorFields: "tutor_id, tutor_personality, tutor_name, and conversation_id are required",
  promptMissing: "Missing 'prompt' in request body",
  promptEmpty: "Prompt cannot be empty",
  userIdMissing: "Missing userId",
} as const;

// 3) Server-side failures (500)
export const ERROR_COPY_EN = {
  missingApiKey: "OpenAI API key not configured",
  unparsableSuggestions: "Failed to parse AI response",
} as const;

// 4) Test notification (plain-text replies)
export const NOTIFICATION_COPY_EN = {
  defaultTitle: "Test",
  defaultBody: "Test notification",
  userNotFound: "User not found",
  noToken: "No FCM token for user",
} as const;

// functions/src/core/text/preview.ts

/** First `maxLength` characters, with "..." appended when something was cut. */
export function truncatePreview(content: string, maxLength: number): string {
  if (content.length <= maxLength) return content;
  return content.slice(0, maxLength) + "...";
}

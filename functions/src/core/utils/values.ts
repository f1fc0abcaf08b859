// functions/src/core/utils/values.ts
// Narrowing helpers for untyped JSON (request bodies, documents, model output).

export type JsonRecord = Record<string, unknown>;

export function isRecord(v: unknown): v is JsonRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string {
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return "";
}

/**
 * Scalar text from a JSON value. Lists are joined with a space
 * (clients sometimes send a single text field as an array of parts).
 */
export function asText(v: unknown): string {
  if (Array.isArray(v)) {
    return v
      .filter((item) => item !== null && item !== undefined && item !== "" && item !== false)
      .map((item) => asString(item))
      .join(" ")
      .trim();
  }
  return asString(v).trim();
}

export function asBoolean(v: unknown): boolean {
  return v === true;
}

export function asStringArray(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

export function hasAllKeys<K extends string>(
  fields: Partial<Record<K, string>>,
  keys: readonly K[]
): fields is Record<K, string> {
  return keys.every((k) => {
    const v = fields[k];
    return typeof v === "string" && v !== "";
  });
}

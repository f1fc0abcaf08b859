// functions/src/core/parsing/extractFields.ts
// Pulls named string fields out of free-form model output.

import { err, ok, type Result } from "../result";
import { hasAllKeys, isRecord, type JsonRecord } from "../utils/values";

export type ExtractionFailure = {
  reason: "invalid_json" | "missing_fields";
  missing: string[];
  // trimmed fence content (or the whole text) for callers that fall back
  // to using the answer unstructured
  fallbackText: string;
};

export type ExtractOptions<K extends string, O extends string> = {
  optional?: readonly O[];
  // label searched for by the line parser, per key; defaults to the key
  labels?: Partial<Record<K | O, string>>;
};

// JSON answers keep every key the model sent; line-parsed answers only
// carry the requested ones
export type ExtractedFields<K extends string, O extends string = never> = Record<K, string> &
  Partial<Record<O, string>> &
  JsonRecord;

const FENCE = "```";
const JSON_FENCE = "```json";

function sliceAfter(raw: string, start: number): string {
  const end = raw.indexOf(FENCE, start);
  return (end === -1 ? raw.slice(start) : raw.slice(start, end)).trim();
}

/**
 * Content of the first ```json fence, else of the first plain fence,
 * else the text unchanged. Later fences are ignored.
 */
export function stripCodeFence(raw: string): string {
  const jsonStart = raw.indexOf(JSON_FENCE);
  if (jsonStart !== -1) return sliceAfter(raw, jsonStart + JSON_FENCE.length);

  const plainStart = raw.indexOf(FENCE);
  if (plainStart !== -1) return sliceAfter(raw, plainStart + FENCE.length);

  return raw;
}

function collect<T extends string>(
  keys: readonly T[],
  read: (key: T) => string | undefined
): Partial<Record<T, string>> {
  const out: Partial<Record<T, string>> = {};
  for (const key of keys) {
    const v = read(key);
    if (v) out[key] = v;
  }
  return out;
}

function nonEmptyString(v: unknown): string | undefined {
  return typeof v === "string" && v.trim() !== "" ? v : undefined;
}

function stripQuotes(s: string): string {
  return s.replace(/^"+/, "").replace(/"+$/, "");
}

/**
 * Value of the first line mentioning `label` (case-insensitive) that has
 * something after its first colon. Everything after that colon is kept,
 * so the label must sit before it: "Re: positive: ok" gives "positive: ok".
 */
function findLabelledValue(lines: readonly string[], label: string): string | undefined {
  const needle = label.toLowerCase();
  for (const line of lines) {
    if (!line.toLowerCase().includes(needle)) continue;
    const colon = line.indexOf(":");
    const value = stripQuotes((colon === -1 ? line : line.slice(colon + 1)).trim());
    if (value) return value;
  }
  return undefined;
}

/**
 * Line-based fallback parser for output that is not valid JSON, e.g.
 *   Positive: "Sure, let's go!"
 *   Negative: "Maybe later"
 * Keys without a matching line are absent from the result.
 */
export function extractFieldsFromLines<K extends string>(
  text: string,
  keys: readonly K[],
  labels: Partial<Record<K, string>> = {}
): Partial<Record<K, string>> {
  const lines = text.trim().split("\n");
  return collect(keys, (key) => findLabelledValue(lines, labels[key] ?? key));
}

export function extractFields<K extends string, O extends string = never>(
  raw: string,
  required: readonly K[],
  options: ExtractOptions<K, O> = {}
): Result<ExtractedFields<K, O>, ExtractionFailure> {
  const optional: readonly O[] = options.optional ?? [];
  const candidate = stripCodeFence(raw);

  let parsed: unknown = undefined;
  let parseFailed = false;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    parseFailed = true;
  }

  if (isRecord(parsed)) {
    const doc = parsed;
    const fromJson = collect(required, (key) => nonEmptyString(doc[key]));
    if (hasAllKeys(fromJson, required)) {
      const optionalKeys: readonly string[] = optional;
      const rest: JsonRecord = {};
      for (const [key, value] of Object.entries(doc)) {
        if (!optionalKeys.includes(key)) rest[key] = value;
      }
      // an optional key that is not a non-empty string is dropped
      return ok({ ...rest, ...collect(optional, (key) => nonEmptyString(doc[key])), ...fromJson });
    }
  }

  const lines = raw.trim().split("\n");
  const labelFor = (key: K | O): string => options.labels?.[key] ?? key;

  const fromLines = collect(required, (key) => findLabelledValue(lines, labelFor(key)));
  if (hasAllKeys(fromLines, required)) {
    return ok({ ...collect(optional, (key) => findLabelledValue(lines, labelFor(key))), ...fromLines });
  }

  return err({
    reason: parseFailed ? "invalid_json" : "missing_fields",
    missing: required.filter((key) => !fromLines[key]),
    fallbackText: candidate.trim(),
  });
}

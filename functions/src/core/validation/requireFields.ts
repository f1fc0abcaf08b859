// functions/src/core/validation/requireFields.ts
// Required-field checks for JSON request bodies.

import { err, ok, type Result } from "../result";
import { asText, hasAllKeys, type JsonRecord } from "../utils/values";

export type ValidationError = {
  status: 400;
  field: string;  // first missing or empty field
  error: string;  // message sent to the client
};

/**
 * Fixed message for the endpoint, or a function of the failing field.
 * `absent` is true when the key is not in the body at all.
 */
export type FieldMessage = string | ((field: string, absent: boolean) => string);

function messageFor(message: FieldMessage | undefined, field: string, absent: boolean): string {
  if (typeof message === "string") return message;
  if (message) return message(field, absent);
  return `'${field}' is required and cannot be empty`;
}

/**
 * Reads every field as trimmed text (lists are space-joined) and fails on
 * the first one that is missing or empty.
 */
export function requireText<K extends string>(
  body: JsonRecord,
  fields: readonly K[],
  message?: FieldMessage
): Result<Record<K, string>, ValidationError> {
  const values: Partial<Record<K, string>> = {};

  for (const field of fields) {
    const value = asText(body[field]);
    if (!value) {
      return err({ status: 400, field, error: messageFor(message, field, !(field in body)) });
    }
    values[field] = value;
  }

  if (!hasAllKeys(values, fields)) {
    return err({ status: 400, field: fields[0] ?? "", error: messageFor(message, fields[0] ?? "", false) });
  }
  return ok(values);
}

/** A required JSON array that must hold at least one entry. */
export function requireList(
  body: JsonRecord,
  field: string,
  message?: FieldMessage
): Result<unknown[], ValidationError> {
  const value = body[field];
  if (!Array.isArray(value) || value.length === 0) {
    return err({ status: 400, field, error: messageFor(message, field, !(field in body)) });
  }
  return ok(value);
}

export function optionalText(body: JsonRecord, field: string, fallback = ""): string {
  return asText(body[field]) || fallback;
}

export function optionalList(body: JsonRecord, field: string): unknown[] {
  const value = body[field];
  return Array.isArray(value) ? value : [];
}

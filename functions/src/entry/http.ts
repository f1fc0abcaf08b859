// functions/src/entry/http.ts
// Request plumbing shared by every onRequest handler.

import type { AppConfig } from "../config";
import { err, ok, type Result } from "../core/result";
import { isRecord, type JsonRecord } from "../core/utils/values";

/** The parts of the Functions (express) request the handlers read. */
export interface HttpRequestLike {
  method: string;
  body?: unknown;
}

/** The parts of the Functions (express) response the handlers write. */
export interface HttpResponseLike {
  status(code: number): HttpResponseLike;
  set(field: string, value: string): unknown;
  json(body: unknown): unknown;
  send(body?: unknown): unknown;
  end(): unknown;
}

export type HttpHandler = (req: HttpRequestLike, res: HttpResponseLike) => Promise<void>;

export type CorsConfig = AppConfig["cors"];

export type HttpError = {
  status: number;
  error: string;
};

export function sendJson(res: HttpResponseLike, cors: CorsConfig, status: number, body: unknown): void {
  res.set("Access-Control-Allow-Origin", cors.origins);
  res.status(status).json(body);
}

export function sendError(res: HttpResponseLike, cors: CorsConfig, failure: HttpError): void {
  sendJson(res, cors, failure.status, { error: failure.error });
}

/** Answers an OPTIONS preflight; true when the request is done. */
export function handlePreflight(req: HttpRequestLike, res: HttpResponseLike, cors: CorsConfig): boolean {
  if (req.method !== "OPTIONS") return false;

  res.set("Access-Control-Allow-Origin", cors.origins);
  res.set("Access-Control-Allow-Methods", cors.methods.join(", "));
  res.set("Access-Control-Allow-Headers", cors.headers);
  res.set("Access-Control-Max-Age", cors.maxAgeSeconds);
  res.status(204).send("");
  return true;
}

/**
 * The body may already be an object (JSON content type) or a raw string,
 * depending on the client.
 */
export function parseBody(raw: unknown): Result<JsonRecord, HttpError> {
  let body: unknown = raw;

  if (typeof body === "string") {
    try {
      body = JSON.parse(body);
    } catch {
      return err({ status: 400, error: "Invalid JSON body" });
    }
  }

  if (!isRecord(body) || Object.keys(body).length === 0) {
    return err({ status: 400, error: "Missing request body" });
  }
  return ok(body);
}

/**
 * Preflight, method check and body parsing in one step. Resolves to the
 * parsed body, or null once a response has already been sent.
 */
export function beginJsonRequest(
  req: HttpRequestLike,
  res: HttpResponseLike,
  cors: CorsConfig
): JsonRecord | null {
  if (handlePreflight(req, res, cors)) return null;

  if (req.method !== "POST") {
    sendError(res, cors, { status: 405, error: "Only POST allowed" });
    return null;
  }

  const body = parseBody(req.body);
  if (!body.ok) {
    sendError(res, cors, body.error);
    return null;
  }
  return body.value;
}

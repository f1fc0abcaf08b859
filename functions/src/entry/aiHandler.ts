// functions/src/entry/aiHandler.ts
// Shared skeleton for the JSON endpoints that call the model.

import type { AppConfig } from "../config";
import { ERROR_COPY_EN } from "../copy/messages.en";
import type { AiClients } from "../core/llm/openaiClient";
import type { LoggerLike } from "../core/logging/logger";
import type { Result } from "../core/result";
import type { JsonRecord } from "../core/utils/values";
import { beginJsonRequest, sendError, sendJson, type HttpError, type HttpHandler } from "./http";

export type AiHandlerDeps = {
  config: AppConfig;
  logger: LoggerLike;
  ai: () => AiClients | null;
};

/** A JSON reply, or an error reply sent as { error }. */
export type Reply = { status: number; body: unknown } | { status: number; error: string };

export function replyJson(body: unknown, status = 200): Reply {
  return { status, body };
}

export function replyError(failure: HttpError): Reply {
  return { status: failure.status, error: failure.error };
}

export function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export type AiEndpoint<V> = {
  name: string; // log prefix, e.g. "translate"
  validate: (body: JsonRecord) => Result<V, HttpError>;
  run: (input: V, clients: AiClients) => Promise<Reply>;
};

/**
 * Preflight, POST check, body parsing, validation and the API key check,
 * then the endpoint itself under one catch that logs and answers 500.
 */
export function createAiHandler<V>(deps: AiHandlerDeps, endpoint: AiEndpoint<V>): HttpHandler {
  const { config, logger } = deps;
  const cors = config.cors;

  return async function aiHandler(req, res) {
    const body = beginJsonRequest(req, res, cors);
    if (!body) return;

    const input = endpoint.validate(body);
    if (!input.ok) {
      sendError(res, cors, input.error);
      return;
    }

    const clients = deps.ai();
    if (!clients) {
      logger.error(`${endpoint.name}_missing_api_key`);
      sendError(res, cors, { status: 500, error: ERROR_COPY_EN.missingApiKey });
      return;
    }

    try {
      const reply = await endpoint.run(input.value, clients);
      if ("error" in reply) {
        sendError(res, cors, reply);
        return;
      }
      sendJson(res, cors, reply.status, reply.body);
    } catch (e) {
      logger.error(`${endpoint.name}_failed`, { error: String(e) });
      sendError(res, cors, { status: 500, error: errorText(e) });
    }
  };
}

// functions/src/entry/healthHandler.ts

import type { HttpHandler } from "./http";

export function createHealthHandler(): HttpHandler {
  return async function healthHandler(_req, res) {
    res.status(200).send("OK");
  };
}

import { createHash, timingSafeEqual } from "node:crypto";
import { ValidationError, errorMessage } from "../errors.js";
import { PositionStore } from "../persistence/position_store.js";
import { DispatchResult, SignalDispatcher, parseSignal } from "../signal/signal_dispatcher.js";
import { SignalPayload } from "../types.js";
import { QueueFullError, TaskPool } from "../utils/async_pool.js";

export interface WebhookRequest {
  method: string;
  path: string;
  headers: Record<string, string | string[] | undefined>;
  // undefined when the body was not valid JSON
  body?: unknown;
  bodyError?: string;
}

export interface WebhookResponse {
  status: number;
  body: unknown;
  contentType?: string;
}

export interface WebhookHandlerDeps {
  dispatcher: SignalDispatcher;
  store: PositionStore;
  pool: TaskPool;
  status?: () => Record<string, unknown>;
  cfg: {
    path: string;
    secret?: string;
    async: boolean;
    lotSize: number;
    defaultQty: number;
  };
}

export function createWebhookHandler(deps: WebhookHandlerDeps) {
  const { dispatcher, store, pool, cfg } = deps;

  return async function handle(req: WebhookRequest): Promise<WebhookResponse> {
    if (req.method === "GET" && req.path === "/") {
      return { status: 200, body: "Synthetic rollover engine is running", contentType: "text/plain" };
    }
    if (req.method === "GET" && req.path === "/api/positions") {
      return { status: 200, body: { positions: await store.all() } };
    }
    if (req.method === "GET" && req.path === "/api/status") {
      return { status: 200, body: { pool: pool.stats(), ...(deps.status?.() ?? {}) } };
    }
    if (req.method !== "POST" || req.path !== cfg.path) {
      return { status: 404, body: { status: "error", reason: "not found" } };
    }

    if (req.bodyError !== undefined) {
      return { status: 400, body: { status: "error", reason: `invalid JSON: ${req.bodyError}` } };
    }
    if (cfg.secret && !hasSecret(req, cfg.secret)) {
      console.warn("WEBHOOK_UNAUTHORIZED");
      return { status: 401, body: { status: "error", reason: "unauthorized" } };
    }

    let payload: SignalPayload;
    try {
      payload = parseSignal(req.body, cfg);
    } catch (err) {
      if (err instanceof ValidationError) {
        console.warn("WEBHOOK_INVALID", err.message);
        return { status: 400, body: { status: "ignored", reason: err.message } };
      }
      throw err;
    }

    if (cfg.async && payload.signal !== "CHECK") {
      const label = `${payload.signal}:${payload.systemId}`;
      try {
        void pool
          .submit(label, () => dispatcher.dispatch(payload))
          .then(
            (result) => console.log("SIGNAL_DONE", label, outcomeOf(result)),
            (err: unknown) => console.error("SIGNAL_FAIL", label, errorMessage(err))
          );
      } catch (err) {
        if (err instanceof QueueFullError) {
          console.error("WEBHOOK_QUEUE_FULL", label);
          return { status: 503, body: { status: "error", reason: err.message } };
        }
        throw err;
      }
      return {
        status: 202,
        body: { status: "accepted", signal: payload.signal, system_id: payload.systemId, qty: payload.qty }
      };
    }

    const result = await dispatcher.dispatch(payload);
    return { status: 200, body: { status: outcomeOf(result), result: result.result } };
  };
}

export function outcomeOf(result: DispatchResult): string {
  switch (result.signal) {
    case "BUY":
      if (result.result.entered) {
        return result.result.partial ? "partial" : "entered";
      }
      return result.result.ignored ? "ignored" : "failed";
    case "SELL":
    case "EXIT":
      if (result.result.exited) {
        return "exited";
      }
      return result.result.ignored ? "ignored" : "failed";
    case "CHECK":
      return result.result.ran ? "rollover" : "before_cutoff";
  }
}

function hasSecret(req: WebhookRequest, secret: string): boolean {
  const header = req.headers["x-webhook-secret"];
  if (typeof header === "string" && secretMatches(header, secret)) {
    return true;
  }
  const body = req.body;
  return (
    typeof body === "object" &&
    body !== null &&
    "secret" in body &&
    typeof body.secret === "string" &&
    secretMatches(body.secret, secret)
  );
}

// Digests give equal-length buffers, so the comparison time does not depend on the input.
function secretMatches(given: string, secret: string): boolean {
  const digest = (value: string) => createHash("sha256").update(value).digest();
  return timingSafeEqual(digest(given), digest(secret));
}

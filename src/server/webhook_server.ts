import http from "node:http";
import dotenv from "dotenv";
import { errorMessage } from "../errors.js";
import { RolloverTicker } from "../ops/scheduler.js";
import { createRuntime } from "../runtime.js";
import { TaskPool } from "../utils/async_pool.js";
import { WebhookRequest, createWebhookHandler } from "./webhook_handler.js";

dotenv.config();

const MAX_BODY_BYTES = 64 * 1024;

const runtime = await createRuntime();
const { config } = runtime;
const pool = new TaskPool(config.webhook.workerConcurrency, config.webhook.queueLimit);
let rolloverRunning = false;

const ticker = new RolloverTicker(
  {
    runRollover: async (now) => {
      rolloverRunning = true;
      try {
        return await runtime.rollover.run(now);
      } finally {
        rolloverRunning = false;
      }
    },
    canRun: () => !rolloverRunning
  },
  {
    tickSeconds: config.scheduler.tickSeconds,
    cutoff: config.rollover.cutoff,
    utcOffsetMinutes: config.rollover.utcOffsetMinutes
  }
);
if (config.scheduler.enabled) {
  ticker.start();
}

const handle = createWebhookHandler({
  dispatcher: runtime.dispatcher,
  store: runtime.store,
  pool,
  status: () => ({
    mode: config.liveMode ? "live" : "paper",
    scheduler: ticker.getState()
  }),
  cfg: {
    path: config.webhook.path,
    secret: config.webhook.secret,
    async: config.webhook.async,
    lotSize: config.lotSize,
    defaultQty: config.defaultQty
  }
});

const server = http.createServer(async (req, res) => {
  try {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", `http://127.0.0.1:${config.webhook.port}`);
    const request: WebhookRequest = { method, path: url.pathname, headers: req.headers };
    if (method === "POST") {
      const raw = await readBody(req);
      try {
        request.body = raw ? JSON.parse(raw) : {};
      } catch (err) {
        request.bodyError = errorMessage(err);
      }
    }
    const response = await handle(request);
    if (response.contentType === "text/plain") {
      res.writeHead(response.status, { "Content-Type": "text/plain; charset=utf-8" });
      res.end(String(response.body));
      return;
    }
    json(res, response.status, response.body);
  } catch (err) {
    console.error("WEBHOOK_ERROR", errorMessage(err));
    json(res, 500, { status: "error", reason: errorMessage(err) });
  }
});

server.listen(config.webhook.port, () => {
  console.log(`WEBHOOK_LISTENING http://127.0.0.1:${config.webhook.port}${config.webhook.path}`);
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    console.log("WEBHOOK_SHUTDOWN", signal, pool.stats());
    ticker.stop();
    server.close();
  });
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let size = 0;
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function json(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json; charset=utf-8" });
  res.end(JSON.stringify(body));
}

import { ConfigError } from "../errors.js";

export type StoreBackend = "file" | "postgres" | "memory";

export interface EngineConfig {
  liveMode: boolean;
  dhan: {
    clientId?: string;
    accessToken?: string;
    baseUrl: string;
    exchangeSegment: string;
    productType: string;
  };
  lotSize: number;
  defaultQty: number;
  liquidity: {
    minQtyMultiplier: number;
    maxSpreadPoints: number;
    retryBackoffMs: number;
    quoteTimeoutMs: number;
    quoteCacheTtlMs: number;
  };
  margin: {
    enabled: boolean;
    timeoutMs: number;
  };
  orders: {
    timeoutMs: number;
    fillPollMs: number;
    fillMaxWaitMs: number;
    reconcileBeforeExit: boolean;
  };
  rollover: {
    cutoff: string; // HH:MM market time
    utcOffsetMinutes: number;
  };
  store: {
    backend: StoreBackend;
    path: string;
    databaseUrl?: string;
  };
  contractsPath: string;
  webhook: {
    port: number;
    path: string;
    secret?: string;
    async: boolean;
    workerConcurrency: number;
    queueLimit: number;
  };
  scheduler: {
    enabled: boolean;
    tickSeconds: number;
  };
  paperQuote: {
    price: number;
    spread: number;
    depth: number;
  };
}

type Env = Record<string, string | undefined>;

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const backend = (env.POSITION_STORE ?? "file").toLowerCase();
  if (backend !== "file" && backend !== "postgres" && backend !== "memory") {
    throw new ConfigError(`POSITION_STORE must be file, postgres or memory, got ${backend}`, "POSITION_STORE");
  }
  const cutoff = env.ROLLOVER_CUTOFF ?? "15:00";
  if (!/^\d{1,2}:\d{2}$/.test(cutoff)) {
    throw new ConfigError(`ROLLOVER_CUTOFF must be HH:MM, got ${cutoff}`, "ROLLOVER_CUTOFF");
  }

  const lotSize = num(env, "LOT_SIZE", 75);
  if (!Number.isInteger(lotSize) || lotSize <= 0) {
    throw new ConfigError("LOT_SIZE must be a positive integer", "LOT_SIZE");
  }

  // A cached quote must expire before the liquidity re-check reads it again.
  const retryBackoffMs = positive(env, "LIQ_RETRY_BACKOFF_MS", 5000);
  const quoteCacheTtlMs = num(env, "QUOTE_CACHE_TTL_MS", 2000);
  if (quoteCacheTtlMs < 0 || quoteCacheTtlMs >= retryBackoffMs) {
    throw new ConfigError(
      `QUOTE_CACHE_TTL_MS must be at least 0 and below LIQ_RETRY_BACKOFF_MS (${retryBackoffMs}), got ${quoteCacheTtlMs}`,
      "QUOTE_CACHE_TTL_MS"
    );
  }

  return {
    liveMode: env.LIVE_ORDER_MODE === "1",
    dhan: {
      clientId: env.DHAN_CLIENT_ID || undefined,
      accessToken: env.DHAN_ACCESS_TOKEN || undefined,
      baseUrl: env.DHAN_BASE_URL ?? "https://api.dhan.co",
      exchangeSegment: env.DHAN_EXCHANGE_SEGMENT ?? "NSE_FNO",
      productType: env.DHAN_PRODUCT_TYPE ?? "MARGIN"
    },
    lotSize,
    defaultQty: num(env, "DEFAULT_QTY", lotSize),
    liquidity: {
      minQtyMultiplier: num(env, "LIQ_MIN_QTY_MULTIPLIER", 1),
      maxSpreadPoints: num(env, "LIQ_MAX_SPREAD_POINTS", 5),
      retryBackoffMs,
      quoteTimeoutMs: positive(env, "QUOTE_TIMEOUT_MS", 3000),
      quoteCacheTtlMs
    },
    margin: {
      enabled: flag(env, "MARGIN_CHECK_ENABLED", true),
      timeoutMs: positive(env, "MARGIN_TIMEOUT_MS", 5000)
    },
    orders: {
      timeoutMs: positive(env, "ORDER_TIMEOUT_MS", 10000),
      fillPollMs: positive(env, "FILL_POLL_MS", 1000),
      fillMaxWaitMs: positive(env, "FILL_MAX_WAIT_MS", 20000),
      reconcileBeforeExit: flag(env, "RECONCILE_BEFORE_EXIT", true)
    },
    rollover: {
      cutoff,
      utcOffsetMinutes: num(env, "MARKET_UTC_OFFSET_MINUTES", 330)
    },
    store: {
      backend,
      path: env.POSITION_STORE_PATH ?? "data/positions.json",
      databaseUrl: env.DATABASE_URL || undefined
    },
    contractsPath: env.CONTRACTS_PATH ?? "data/contracts.json",
    webhook: {
      port: num(env, "WEBHOOK_PORT", 5000),
      path: env.WEBHOOK_PATH ?? "/tv-webhook",
      secret: env.WEBHOOK_SECRET || undefined,
      async: flag(env, "WEBHOOK_ASYNC", true),
      workerConcurrency: num(env, "WORKER_CONCURRENCY", 4),
      queueLimit: num(env, "WORKER_QUEUE_LIMIT", 100)
    },
    scheduler: {
      enabled: flag(env, "SCHEDULER_ENABLED", false),
      tickSeconds: positive(env, "SCHEDULER_TICK_SECONDS", 30)
    },
    paperQuote: {
      price: num(env, "PAPER_QUOTE_PRICE", 100),
      spread: num(env, "PAPER_QUOTE_SPREAD", 0.5),
      depth: num(env, "PAPER_QUOTE_DEPTH", 1800)
    }
  };
}

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got ${raw}`, key);
  }
  return value;
}

function positive(env: Env, key: string, fallback: number): number {
  const value = num(env, key, fallback);
  if (value <= 0) {
    throw new ConfigError(`${key} must be greater than 0, got ${value}`, key);
  }
  return value;
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return raw === "1" || raw.toLowerCase() === "true";
}

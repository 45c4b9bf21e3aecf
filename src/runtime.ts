import path from "node:path";
import { EngineConfig, loadEngineConfig } from "./config/engine_config.js";
import { ConfigError } from "./errors.js";
import { BrokerClient, MarginEstimator } from "./execution/broker.js";
import { DhanAdapter } from "./execution/dhan_adapter.js";
import { DhanHttp } from "./execution/dhan_http.js";
import { PollingFillObserver } from "./execution/fill_observer.js";
import { PaperBroker } from "./execution/paper_broker.js";
import { ContractResolver, JsonContractResolver } from "./market_data/contract_resolver.js";
import { DhanQuoteProvider } from "./market_data/dhan_quote_provider.js";
import { CachedQuoteProvider, PaperQuoteProvider, QuoteProvider } from "./market_data/quote_provider.js";
import { OrderExecutor } from "./oms/order_executor.js";
import { Alerter, buildAlerter } from "./ops/alerter.js";
import { FilePositionStore } from "./persistence/file_position_store.js";
import { PositionStore } from "./persistence/position_store.js";
import { PostgresPositionStore } from "./persistence/postgres_position_store.js";
import { LiquidityGate } from "./risk/liquidity_gate.js";
import { MarginGate } from "./risk/margin_gate.js";
import { SignalDispatcher } from "./signal/signal_dispatcher.js";
import { InMemoryPositionStore } from "./storage/store.js";
import { SyntheticPositionManager } from "./synthetic/position_manager.js";
import { RolloverScheduler } from "./synthetic/rollover_scheduler.js";

export interface Runtime {
  config: EngineConfig;
  store: PositionStore;
  broker: BrokerClient;
  dhan: DhanAdapter | null;
  fills: PollingFillObserver;
  executor: OrderExecutor;
  manager: SyntheticPositionManager;
  rollover: RolloverScheduler;
  resolver: ContractResolver;
  dispatcher: SignalDispatcher;
  alerter: Alerter;
}

export async function createRuntime(env: Record<string, string | undefined> = process.env): Promise<Runtime> {
  const config = loadEngineConfig(env);
  const alerter = buildAlerter(env);
  const store = buildStore(config);
  await store.init();

  const http = buildDhanHttp(config);
  if (config.liveMode && !http) {
    throw new ConfigError("Live mode requires DHAN_CLIENT_ID and DHAN_ACCESS_TOKEN", "LIVE_ORDER_MODE");
  }
  const dhan = http
    ? new DhanAdapter(http, {
        exchangeSegment: config.dhan.exchangeSegment,
        productType: config.dhan.productType
      })
    : null;
  const broker: BrokerClient = config.liveMode && dhan ? dhan : new PaperBroker();
  const estimator: MarginEstimator | null = config.liveMode ? dhan : null;

  const upstreamQuotes: QuoteProvider = http
    ? new DhanQuoteProvider(http, {
        exchangeSegment: config.dhan.exchangeSegment,
        timeoutMs: config.liquidity.quoteTimeoutMs
      })
    : new PaperQuoteProvider(config.paperQuote);
  const quotes = new CachedQuoteProvider(upstreamQuotes, config.liquidity.quoteCacheTtlMs);

  const fills = new PollingFillObserver(broker, {
    pollMs: config.orders.fillPollMs,
    maxWaitMs: config.orders.fillMaxWaitMs,
    requestTimeoutMs: config.orders.timeoutMs
  });
  const executor = new OrderExecutor(
    broker,
    new LiquidityGate(quotes, config.liquidity),
    new MarginGate(estimator, config.margin),
    fills,
    {
      liquidityRetryBackoffMs: config.liquidity.retryBackoffMs,
      orderTimeoutMs: config.orders.timeoutMs
    }
  );
  const manager = new SyntheticPositionManager({
    store,
    executor,
    broker,
    alerter,
    reconcileBeforeExit: config.orders.reconcileBeforeExit,
    brokerTimeoutMs: config.orders.timeoutMs
  });
  const resolver = new JsonContractResolver(path.resolve(process.cwd(), config.contractsPath));
  const rollover = new RolloverScheduler(store, manager, resolver, alerter, {
    cutoff: config.rollover.cutoff,
    utcOffsetMinutes: config.rollover.utcOffsetMinutes,
    concurrency: config.webhook.workerConcurrency
  });
  const dispatcher = new SignalDispatcher(manager, rollover, resolver, {
    utcOffsetMinutes: config.rollover.utcOffsetMinutes
  });

  console.log(
    "RUNTIME_READY",
    config.liveMode ? "live" : "paper",
    `store=${config.store.backend}`,
    `margin=${estimator && config.margin.enabled ? "on" : "off"}`
  );
  return { config, store, broker, dhan, fills, executor, manager, rollover, resolver, dispatcher, alerter };
}

function buildStore(config: EngineConfig): PositionStore {
  switch (config.store.backend) {
    case "postgres":
      if (!config.store.databaseUrl) {
        throw new ConfigError("POSITION_STORE=postgres requires DATABASE_URL", "DATABASE_URL");
      }
      return PostgresPositionStore.fromUrl(config.store.databaseUrl);
    case "memory":
      return new InMemoryPositionStore();
    case "file":
      return new FilePositionStore(path.resolve(process.cwd(), config.store.path));
  }
}

function buildDhanHttp(config: EngineConfig): DhanHttp | null {
  const { clientId, accessToken, baseUrl } = config.dhan;
  if (!clientId || !accessToken) {
    return null;
  }
  return new DhanHttp({ clientId, accessToken, baseUrl, timeoutMs: config.orders.timeoutMs });
}

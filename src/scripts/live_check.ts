import path from "node:path";
import { access } from "node:fs/promises";
import dotenv from "dotenv";
import { EngineConfig, loadEngineConfig } from "../config/engine_config.js";
import { errorMessage } from "../errors.js";
import { DhanAdapter } from "../execution/dhan_adapter.js";
import { DhanHttp } from "../execution/dhan_http.js";
import { JsonContractResolver } from "../market_data/contract_resolver.js";

dotenv.config();

type CheckStatus = "PASS" | "WARN" | "FAIL";

type CheckResult = {
  name: string;
  status: CheckStatus;
  details: string;
};

async function main() {
  let config: EngineConfig;
  try {
    config = loadEngineConfig();
  } catch (err) {
    console.error(`FAIL Config: ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  const results: CheckResult[] = [];
  results.push(checkEnvSafety(config));
  results.push(await checkStore(config));
  results.push(await checkContracts(config));
  results.push(await checkBrokerPreflight(config));

  for (const result of results) {
    console.log(`${result.status.padEnd(4)} ${result.name}: ${result.details}`);
  }

  if (results.some((r) => r.status === "FAIL")) {
    console.error("LIVE_CHECK_FAIL: Resolve FAIL items before live trading.");
    process.exitCode = 1;
    return;
  }
  console.log("LIVE_CHECK_OK: Safe to proceed.");
}

function checkEnvSafety(config: EngineConfig): CheckResult {
  if (!config.liveMode) {
    return {
      name: "Env Safety Flags",
      status: "WARN",
      details: "LIVE_ORDER_MODE is not enabled; orders go to the paper broker."
    };
  }
  const issues: string[] = [];
  if (!config.dhan.clientId) {
    issues.push("DHAN_CLIENT_ID is missing");
  }
  if (!config.dhan.accessToken) {
    issues.push("DHAN_ACCESS_TOKEN is missing");
  }
  if (config.store.backend === "memory") {
    issues.push("POSITION_STORE=memory loses positions on restart");
  }
  if (!config.margin.enabled) {
    issues.push("MARGIN_CHECK_ENABLED is off");
  }
  if (issues.length > 0) {
    return { name: "Env Safety Flags", status: "FAIL", details: issues.join("; ") };
  }
  return { name: "Env Safety Flags", status: "PASS", details: "Live mode flags look sane." };
}

async function checkStore(config: EngineConfig): Promise<CheckResult> {
  if (config.store.backend === "postgres") {
    return config.store.databaseUrl
      ? { name: "Position Store", status: "PASS", details: "postgres (run db:init once)" }
      : { name: "Position Store", status: "FAIL", details: "DATABASE_URL is not set" };
  }
  if (config.store.backend === "memory") {
    return { name: "Position Store", status: "WARN", details: "in-memory only" };
  }
  const dir = path.dirname(path.resolve(process.cwd(), config.store.path));
  try {
    await access(dir);
    return { name: "Position Store", status: "PASS", details: `file ${config.store.path}` };
  } catch {
    return { name: "Position Store", status: "WARN", details: `${dir} will be created on first write` };
  }
}

async function checkContracts(config: EngineConfig): Promise<CheckResult> {
  const resolver = new JsonContractResolver(path.resolve(process.cwd(), config.contractsPath));
  try {
    const expiries = await resolver.listExpiries("NIFTY");
    return {
      name: "Contract Table",
      status: expiries.length > 0 ? "PASS" : "WARN",
      details: `NIFTY expiries: ${expiries.join(", ") || "none"}`
    };
  } catch (err) {
    return { name: "Contract Table", status: "WARN", details: errorMessage(err) };
  }
}

async function checkBrokerPreflight(config: EngineConfig): Promise<CheckResult> {
  const { clientId, accessToken, baseUrl } = config.dhan;
  if (!clientId || !accessToken) {
    return {
      name: "Broker Preflight",
      status: config.liveMode ? "FAIL" : "WARN",
      details: "Dhan credentials not configured"
    };
  }
  const adapter = new DhanAdapter(new DhanHttp({ clientId, accessToken, baseUrl }), {
    exchangeSegment: config.dhan.exchangeSegment,
    productType: config.dhan.productType
  });
  const preflight = await adapter.preflightCheck();
  return {
    name: "Broker Preflight",
    status: preflight.ok ? "PASS" : "FAIL",
    details:
      preflight.availableBalance !== undefined
        ? `${preflight.message} (available ${preflight.availableBalance})`
        : preflight.message
  };
}

await main();

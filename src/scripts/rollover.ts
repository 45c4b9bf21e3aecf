import dotenv from "dotenv";
import { createRuntime } from "../runtime.js";

dotenv.config();

async function main() {
  const runtime = await createRuntime();
  const summary = await runtime.rollover.run(new Date());
  if (!summary.ran) {
    console.log(`ROLLOVER_SKIPPED: before cutoff ${runtime.config.rollover.cutoff} on ${summary.marketDate}`);
    return;
  }
  for (const item of summary.items) {
    const to = item.toContract ? ` -> ${item.toContract.expiry}@${item.toContract.strike}` : "";
    console.log(
      `${item.outcome.padEnd(12)} ${item.systemId} ${item.fromContract?.expiry ?? "-"}${to}${
        item.reason ? ` (${item.reason})` : ""
      }`
    );
  }
  if (summary.items.some((i) => i.manualIntervention)) {
    console.error("ROLLOVER_MANUAL_INTERVENTION: re-entry failed for at least one system");
    process.exitCode = 2;
    return;
  }
  if (summary.items.some((i) => i.outcome === "EXIT_FAILED")) {
    process.exitCode = 1;
    return;
  }
  console.log(`ROLLOVER_OK: ${summary.items.length} position(s) due on ${summary.marketDate}`);
}

await main();

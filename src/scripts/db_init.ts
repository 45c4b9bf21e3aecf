import dotenv from "dotenv";
import { errorMessage } from "../errors.js";
import { PostgresPositionStore } from "../persistence/postgres_position_store.js";

dotenv.config();

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error("DB_INIT_FAIL: DATABASE_URL is not set");
    process.exitCode = 1;
    return;
  }

  const store = PostgresPositionStore.fromUrl(databaseUrl);
  try {
    await store.init();
    const existing = await store.all();
    console.log(`DB_INIT_OK: synthetic_positions ready (${Object.keys(existing).length} open)`);
  } catch (err) {
    console.error("DB_INIT_FAIL: Unable to initialize position table");
    console.error(errorMessage(err));
    process.exitCode = 1;
  } finally {
    await store.close();
  }
}

await main();

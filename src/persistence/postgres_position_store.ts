import { Pool } from "pg";
import { StatePersistenceError, errorMessage } from "../errors.js";
import { SystemPosition } from "../types.js";
import { PositionStore, isSystemPosition } from "./position_store.js";

export interface SqlClient {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>>; rowCount: number | null }>;
}

const COLUMNS = `system_id, underlying, expiry, strike, call_instrument, put_instrument,
  qty, status, call_leg, put_leg, warning, entered_at`;

export class PostgresPositionStore implements PositionStore {
  constructor(private db: SqlClient, private onClose?: () => Promise<void>) {}

  static fromUrl(databaseUrl: string): PostgresPositionStore {
    const pool = new Pool({ connectionString: databaseUrl });
    return new PostgresPositionStore(
      { query: (text, values) => pool.query(text, values) },
      () => pool.end()
    );
  }

  async close(): Promise<void> {
    await this.onClose?.();
  }

  async init(): Promise<void> {
    await this.run(`
      CREATE TABLE IF NOT EXISTS synthetic_positions (
        system_id TEXT PRIMARY KEY,
        underlying TEXT NOT NULL,
        expiry TEXT NOT NULL,
        strike DOUBLE PRECISION NOT NULL,
        call_instrument TEXT NOT NULL,
        put_instrument TEXT NOT NULL,
        qty INTEGER NOT NULL,
        status TEXT NOT NULL,
        call_leg TEXT NOT NULL,
        put_leg TEXT,
        warning TEXT,
        entered_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);
  }

  async get(systemId: string): Promise<SystemPosition | null> {
    const { rows } = await this.run(
      `SELECT ${COLUMNS} FROM synthetic_positions WHERE system_id = $1`,
      [systemId]
    );
    const row = rows[0];
    return row ? toPosition(row) : null;
  }

  async put(systemId: string, position: SystemPosition): Promise<void> {
    await this.run(
      `
      INSERT INTO synthetic_positions (${COLUMNS}, updated_at)
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,NOW())
      ON CONFLICT (system_id)
      DO UPDATE SET
        underlying = EXCLUDED.underlying,
        expiry = EXCLUDED.expiry,
        strike = EXCLUDED.strike,
        call_instrument = EXCLUDED.call_instrument,
        put_instrument = EXCLUDED.put_instrument,
        qty = EXCLUDED.qty,
        status = EXCLUDED.status,
        call_leg = EXCLUDED.call_leg,
        put_leg = EXCLUDED.put_leg,
        warning = EXCLUDED.warning,
        entered_at = EXCLUDED.entered_at,
        updated_at = EXCLUDED.updated_at
      `,
      toParams(systemId, position)
    );
  }

  async insertIfAbsent(systemId: string, position: SystemPosition): Promise<boolean> {
    const result = await this.run(
      `
      INSERT INTO synthetic_positions (${COLUMNS}, updated_at)
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,NOW())
      ON CONFLICT (system_id) DO NOTHING
      `,
      toParams(systemId, position)
    );
    return (result.rowCount ?? 0) > 0;
  }

  async delete(systemId: string): Promise<void> {
    await this.run(`DELETE FROM synthetic_positions WHERE system_id = $1`, [systemId]);
  }

  async all(): Promise<Record<string, SystemPosition>> {
    const { rows } = await this.run(
      `SELECT ${COLUMNS} FROM synthetic_positions ORDER BY system_id`
    );
    const out: Record<string, SystemPosition> = {};
    for (const row of rows) {
      const position = toPosition(row);
      if (position) {
        out[position.systemId] = position;
      }
    }
    return out;
  }

  private async run(text: string, values?: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (err) {
      throw new StatePersistenceError(`Position store query failed: ${errorMessage(err)}`, {
        cause: err
      });
    }
  }
}

function toParams(systemId: string, p: SystemPosition): unknown[] {
  return [
    systemId,
    p.underlying,
    p.contract.expiry,
    p.contract.strike,
    p.contract.callInstrument,
    p.contract.putInstrument,
    p.qty,
    p.status,
    p.callLeg,
    p.putLeg,
    p.warning,
    p.enteredAt
  ];
}

function toPosition(row: Record<string, unknown>): SystemPosition | null {
  const enteredAt = row.entered_at instanceof Date ? row.entered_at.toISOString() : row.entered_at;
  const candidate = {
    systemId: row.system_id,
    underlying: row.underlying,
    contract: {
      expiry: row.expiry,
      strike: Number(row.strike),
      callInstrument: row.call_instrument,
      putInstrument: row.put_instrument
    },
    qty: Number(row.qty),
    status: row.status,
    callLeg: row.call_leg,
    putLeg: row.put_leg ?? null,
    warning: row.warning ?? null,
    enteredAt
  };
  if (!isSystemPosition(candidate)) {
    console.warn("POSITION_STORE_ROW_DROPPED", String(row.system_id));
    return null;
  }
  return candidate;
}

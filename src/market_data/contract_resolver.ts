import { readFile } from "node:fs/promises";
import { Contract } from "../types.js";
import { isContract } from "../persistence/position_store.js";

export interface ContractResolver {
  listExpiries(underlying: string): Promise<string[]>;
  resolveAtm(underlying: string, expiry: string): Promise<Contract>;
}

/**
 * Operator-maintained contract table: `{ "NIFTY": [{ expiry, strike, callInstrument, putInstrument }] }`.
 * Re-read on every call so edits apply without a restart.
 */
export class JsonContractResolver implements ContractResolver {
  constructor(private filePath: string) {}

  async listExpiries(underlying: string): Promise<string[]> {
    const rows = await this.load(underlying);
    return Array.from(new Set(rows.map((r) => r.expiry))).sort();
  }

  async resolveAtm(underlying: string, expiry: string): Promise<Contract> {
    const rows = await this.load(underlying);
    const match = rows.find((r) => r.expiry === expiry);
    if (!match) {
      throw new Error(`No contract for ${underlying} expiring ${expiry}`);
    }
    return { ...match };
  }

  private async load(underlying: string): Promise<Contract[]> {
    const raw = await readFile(this.filePath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null) {
      throw new Error(`Contract table ${this.filePath} is not an object`);
    }
    const key = underlying.toUpperCase();
    const entry = Object.entries(parsed).find(([k]) => k.toUpperCase() === key)?.[1];
    if (!Array.isArray(entry)) {
      throw new Error(`No contracts listed for ${underlying}`);
    }
    return entry.filter(isContract);
  }
}

export function nearestExpiryOnOrAfter(expiries: string[], date: string): string | null {
  return [...expiries].sort().find((e) => e >= date) ?? null;
}

export function nearestExpiryAfter(expiries: string[], date: string): string | null {
  return [...expiries].sort().find((e) => e > date) ?? null;
}

export async function resolveEntryContract(
  resolver: ContractResolver,
  underlying: string,
  marketDate: string
): Promise<Contract> {
  const expiry = nearestExpiryOnOrAfter(await resolver.listExpiries(underlying), marketDate);
  if (!expiry) {
    throw new Error(`No live expiry for ${underlying} on or after ${marketDate}`);
  }
  return resolver.resolveAtm(underlying, expiry);
}

export async function resolveNextContract(
  resolver: ContractResolver,
  underlying: string,
  expiringOn: string
): Promise<Contract> {
  const expiry = nearestExpiryAfter(await resolver.listExpiries(underlying), expiringOn);
  if (!expiry) {
    throw new Error(`No expiry for ${underlying} after ${expiringOn}`);
  }
  return resolver.resolveAtm(underlying, expiry);
}

import path from "node:path";
import { FileHandle, mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { StatePersistenceError, errorMessage } from "../errors.js";
import { SystemPosition } from "../types.js";
import { PositionStore, clonePosition, isSystemPosition } from "./position_store.js";

/**
 * JSON document keyed by system id. Each mutation writes the whole document to
 * a temp file beside the target and renames it over the previous one; the
 * in-memory mirror only changes after the rename succeeds.
 */
export class FilePositionStore implements PositionStore {
  private mirror = new Map<string, SystemPosition>();
  private writeChain: Promise<void> = Promise.resolve();
  private tmpCounter = 0;

  constructor(private filePath: string) {}

  async init(): Promise<void> {
    this.mirror = await loadDocument(this.filePath);
  }

  async get(systemId: string): Promise<SystemPosition | null> {
    const position = this.mirror.get(systemId);
    return position ? clonePosition(position) : null;
  }

  async put(systemId: string, position: SystemPosition): Promise<void> {
    await this.mutate((next) => {
      next.set(systemId, clonePosition(position));
      return true;
    });
  }

  async insertIfAbsent(systemId: string, position: SystemPosition): Promise<boolean> {
    return this.mutate((next) => {
      if (next.has(systemId)) {
        return false;
      }
      next.set(systemId, clonePosition(position));
      return true;
    });
  }

  async delete(systemId: string): Promise<void> {
    await this.mutate((next) => next.delete(systemId));
  }

  async all(): Promise<Record<string, SystemPosition>> {
    const out: Record<string, SystemPosition> = {};
    for (const [id, position] of this.mirror) {
      out[id] = clonePosition(position);
    }
    return out;
  }

  private mutate(apply: (next: Map<string, SystemPosition>) => boolean): Promise<boolean> {
    const run = this.writeChain.then(async () => {
      const next = new Map(this.mirror);
      const changed = apply(next);
      if (!changed) {
        return false;
      }
      await this.commit(next);
      this.mirror = next;
      return true;
    });
    this.writeChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async commit(next: Map<string, SystemPosition>): Promise<void> {
    const doc: Record<string, SystemPosition> = {};
    for (const [id, position] of next) {
      doc[id] = position;
    }
    this.tmpCounter += 1;
    const tmpPath = `${this.filePath}.tmp-${process.pid}-${this.tmpCounter}`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await open(tmpPath, "w");
      try {
        await handle.writeFile(JSON.stringify(doc, null, 2) + "\n", "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.filePath);
      await syncDirectory(path.dirname(this.filePath));
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        console.warn("POSITION_STORE_TMP_CLEANUP_FAIL", tmpPath, errorMessage(cleanupErr));
      });
      console.error("POSITION_STORE_WRITE_FAIL", this.filePath, errorMessage(err));
      throw new StatePersistenceError(
        `Failed to write position store ${this.filePath}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }
}

// Makes the rename durable. Some platforms cannot open a directory for sync.
async function syncDirectory(dir: string): Promise<void> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(dir, "r");
    await handle.sync();
  } catch (err) {
    console.warn("POSITION_STORE_DIR_SYNC_FAIL", dir, errorMessage(err));
  } finally {
    await handle?.close();
  }
}

async function loadDocument(filePath: string): Promise<Map<string, SystemPosition>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return new Map();
    }
    console.warn("POSITION_STORE_UNREADABLE", filePath, errorMessage(err));
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    console.warn("POSITION_STORE_CORRUPT", filePath, errorMessage(err));
    return new Map();
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    console.warn("POSITION_STORE_CORRUPT", filePath, "document is not an object");
    return new Map();
  }

  const out = new Map<string, SystemPosition>();
  for (const [id, value] of Object.entries(parsed)) {
    if (!isSystemPosition(value)) {
      console.warn("POSITION_STORE_ENTRY_DROPPED", id);
      continue;
    }
    out.set(id, value);
  }
  return out;
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

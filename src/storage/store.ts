import { PositionStore, clonePosition } from "../persistence/position_store.js";
import { SystemPosition } from "../types.js";

export class InMemoryPositionStore implements PositionStore {
  positions: Map<string, SystemPosition> = new Map();

  async init(): Promise<void> {}

  async get(systemId: string): Promise<SystemPosition | null> {
    const position = this.positions.get(systemId);
    return position ? clonePosition(position) : null;
  }

  async put(systemId: string, position: SystemPosition): Promise<void> {
    this.positions.set(systemId, clonePosition(position));
  }

  async insertIfAbsent(systemId: string, position: SystemPosition): Promise<boolean> {
    if (this.positions.has(systemId)) {
      return false;
    }
    this.positions.set(systemId, clonePosition(position));
    return true;
  }

  async delete(systemId: string): Promise<void> {
    this.positions.delete(systemId);
  }

  async all(): Promise<Record<string, SystemPosition>> {
    const out: Record<string, SystemPosition> = {};
    for (const [id, position] of this.positions) {
      out[id] = clonePosition(position);
    }
    return out;
  }
}

import { Contract, PositionStatus, SystemPosition } from "../types.js";
import { isRecord } from "../utils/guards.js";

/**
 * Durable map of system id to its synthetic position. Backends serialise their
 * own writes; callers serialise read-decide-write sequences per system id.
 */
export interface PositionStore {
  init(): Promise<void>;
  get(systemId: string): Promise<SystemPosition | null>;
  put(systemId: string, position: SystemPosition): Promise<void>;
  /** Returns false, leaving the stored entry untouched, when one already exists. */
  insertIfAbsent(systemId: string, position: SystemPosition): Promise<boolean>;
  delete(systemId: string): Promise<void>;
  all(): Promise<Record<string, SystemPosition>>;
}

const STATUSES: PositionStatus[] = ["OPEN", "PARTIAL_OPEN", "CLOSED"];

export function isContract(value: unknown): value is Contract {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value.expiry === "string" &&
    /^\d{4}-\d{2}-\d{2}$/.test(value.expiry) &&
    typeof value.strike === "number" &&
    typeof value.callInstrument === "string" &&
    typeof value.putInstrument === "string"
  );
}

export function isSystemPosition(value: unknown): value is SystemPosition {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value.systemId === "string" &&
    typeof value.underlying === "string" &&
    isContract(value.contract) &&
    typeof value.qty === "number" &&
    Number.isInteger(value.qty) &&
    value.qty > 0 &&
    typeof value.status === "string" &&
    STATUSES.some((s) => s === value.status) &&
    typeof value.callLeg === "string" &&
    (value.putLeg === null || typeof value.putLeg === "string") &&
    (value.warning === null || typeof value.warning === "string") &&
    typeof value.enteredAt === "string"
  );
}

export function clonePosition(position: SystemPosition): SystemPosition {
  return { ...position, contract: { ...position.contract } };
}

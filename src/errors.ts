export class ValidationError extends Error {
  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly key: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StatePersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StatePersistenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

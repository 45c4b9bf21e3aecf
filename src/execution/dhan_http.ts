export type FetchFn = typeof fetch;

export interface DhanHttpConfig {
  clientId: string;
  accessToken: string;
  baseUrl?: string; // default https://api.dhan.co
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

export class DhanHttpError extends Error {
  constructor(readonly method: string, readonly path: string, readonly status: number, readonly body: string) {
    super(`Dhan ${method} ${path} failed ${status}: ${body}`);
    this.name = "DhanHttpError";
  }
}

export class DhanHttp {
  private baseUrl: string;
  private fetchImpl: FetchFn;

  constructor(private cfg: DhanHttpConfig) {
    this.baseUrl = cfg.baseUrl ?? "https://api.dhan.co";
    this.fetchImpl = cfg.fetchImpl ?? fetch;
  }

  get clientId(): string {
    return this.cfg.clientId;
  }

  async request(method: "GET" | "POST", path: string, body?: unknown, timeoutMs?: number): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        "access-token": this.cfg.accessToken,
        "client-id": this.cfg.clientId
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs ?? this.cfg.timeoutMs ?? 10_000)
    });
    const text = await res.text();
    if (!res.ok) {
      throw new DhanHttpError(method, path, res.status, text);
    }
    if (!text) {
      return null;
    }
    try {
      return JSON.parse(text) as unknown;
    } catch {
      throw new DhanHttpError(method, path, res.status, `unparseable body: ${text.slice(0, 200)}`);
    }
  }
}

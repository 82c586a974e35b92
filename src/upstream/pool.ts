import { Agent, fetch as undiciFetch } from "undici";
import type { RequestInit, Response } from "undici";
import type { PoolConfig } from "../config";
import { NetworkError } from "../errors";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export const DEFAULT_POOL: PoolConfig = {
  maxConnections: 100,
  maxConnectionsPerHost: 30,
  keepAliveMs: 60_000,
  connectTimeoutMs: 30_000,
  requestTimeoutMs: 300_000,
};

export interface PoolLease {
  response: Response;
  /** Returns the slot to the pool. Safe to call more than once. */
  release(): void;
}

function isTimeoutError(err: unknown): boolean {
  for (let cur: unknown = err, depth = 0; cur && depth < 4; depth++) {
    if (!(cur instanceof Error)) break;
    if (cur.name === "TimeoutError" || cur.name === "AbortError") return true;
    const code = "code" in cur ? cur.code : undefined;
    if (typeof code === "string" && code.includes("TIMEOUT")) return true;
    cur = cur.cause;
  }
  return false;
}

function describeNetworkError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
  return `${err.message}${cause}`;
}

/**
 * Process-wide upstream connection pool. Per-host sockets, keep-alive and
 * timeouts live in the undici agent; the total cap is a counting gate that a
 * request holds until its response body is drained, cancelled or released.
 */
export class ConnectionPool {
  readonly config: PoolConfig;
  private readonly agent: Agent | null;
  private readonly fetchFn: FetchFn;
  private activeCount = 0;
  private readonly waiters: Array<() => void> = [];
  private closed = false;

  constructor(config: Partial<PoolConfig> = {}, fetchFn?: FetchFn) {
    this.config = { ...DEFAULT_POOL, ...config };
    if (fetchFn) {
      this.agent = null;
      this.fetchFn = fetchFn;
    } else {
      const agent = new Agent({
        connections: this.config.maxConnectionsPerHost,
        keepAliveTimeout: this.config.keepAliveMs,
        headersTimeout: this.config.requestTimeoutMs,
        bodyTimeout: this.config.requestTimeoutMs,
        connect: { timeout: this.config.connectTimeoutMs },
      });
      this.agent = agent;
      this.fetchFn = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
    }
  }

  get active(): number {
    return this.activeCount;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<void> {
    if (this.activeCount < this.config.maxConnections) {
      this.activeCount++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.activeCount++;
        resolve();
      });
    });
  }

  private releaseSlot(): void {
    this.activeCount--;
    const next = this.waiters.shift();
    if (next) next();
  }

  /** Sends one request. Connection failures reject with `NetworkError`. */
  async request(url: string, init: RequestInit): Promise<PoolLease> {
    if (this.closed) throw new NetworkError("Connection pool is closed");
    await this.acquire();

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      this.releaseSlot();
    };

    try {
      const response = await this.fetchFn(url, init);
      return { response, release };
    } catch (err: unknown) {
      release();
      throw new NetworkError(`Upstream connection failed: ${describeNetworkError(err)}`, isTimeoutError(err), { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.agent) await this.agent.close();
  }
}

/**
 * Re-exposes an upstream body so the pool slot is released when the body is
 * drained, fails, or is cancelled by the consumer.
 */
export function releaseOnSettle(body: ReadableStream<Uint8Array>, release: () => void): ReadableStream<Uint8Array> {
  const reader = body.getReader();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { done, value } = await reader.read();
        if (done) {
          release();
          controller.close();
          return;
        }
        controller.enqueue(value);
      } catch (err: unknown) {
        release();
        controller.error(err);
      }
    },
    async cancel(reason) {
      try {
        await reader.cancel(reason);
      } finally {
        release();
      }
    },
  });
}

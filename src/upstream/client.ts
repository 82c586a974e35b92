import { logDebug, logError, logWarn, previewString, redactHeadersForLog, safeJsonStringifyForLog, sleep } from "../common";
import type { RetryConfig, UpstreamConfig } from "../config";
import type { GatewayError } from "../errors";
import { NetworkError, UpstreamError, classifyStatus, isRetryableStatus } from "../errors";
import type { CredentialCache } from "./credential";
import { buildUpstreamHeaders } from "./headers";
import type { ConnectionPool, PoolLease } from "./pool";
import { releaseOnSettle } from "./pool";
import { DEFAULT_RETRY, computeBackoffDelay, totalAttempts } from "./retry";

export type UpstreamEndpoint = "chat" | "responses";

export interface UpstreamRequest {
  endpoint: UpstreamEndpoint;
  payload: Record<string, unknown>;
  /** Sets the vision header; true when any message carries an image part. */
  vision: boolean;
  reqId?: string;
}

export interface UpstreamClientOptions {
  pool: ConnectionPool;
  credentials: CredentialCache;
  upstream: UpstreamConfig;
  retry?: RetryConfig;
  sleep?: (ms: number) => Promise<void>;
  debug?: boolean;
}

async function readErrorText(lease: PoolLease): Promise<string> {
  try {
    return await lease.response.text();
  } catch (err: unknown) {
    return err instanceof Error ? `<unreadable body: ${err.message}>` : "<unreadable body>";
  } finally {
    lease.release();
  }
}

export class UpstreamClient {
  private readonly pool: ConnectionPool;
  private readonly credentials: CredentialCache;
  private readonly upstream: UpstreamConfig;
  private readonly retry: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly debug: boolean;

  constructor(opts: UpstreamClientOptions) {
    this.pool = opts.pool;
    this.credentials = opts.credentials;
    this.upstream = opts.upstream;
    this.retry = opts.retry ?? DEFAULT_RETRY;
    this.sleep = opts.sleep ?? sleep;
    this.debug = opts.debug ?? false;
  }

  urlFor(endpoint: UpstreamEndpoint): string {
    return endpoint === "responses" ? this.upstream.responsesUrl : this.upstream.chatUrl;
  }

  send(request: UpstreamRequest, streaming: true): Promise<ReadableStream<Uint8Array>>;
  send(request: UpstreamRequest, streaming: false): Promise<unknown>;
  async send(request: UpstreamRequest, streaming: boolean): Promise<unknown> {
    const lease = await this.connect(request, streaming);

    if (streaming) {
      const body = lease.response.body;
      if (!body) {
        lease.release();
        throw new UpstreamError("Upstream returned an empty stream", 502, "upstream_error");
      }
      return releaseOnSettle(body, lease.release);
    }

    let text: string;
    try {
      text = await lease.response.text();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`Failed to read upstream response: ${message}`, 502, "upstream_error");
    } finally {
      lease.release();
    }
    logDebug(this.debug, request.reqId, "upstream response body", previewString(text, 2400));
    try {
      return JSON.parse(text);
    } catch {
      throw new UpstreamError("Upstream returned invalid JSON", 502, "upstream_error", text);
    }
  }

  /**
   * Opens the upstream response, retrying connection failures and retryable
   * statuses with exponential backoff. Resolves with a 2xx response whose
   * body has not been read; nothing after this point is retried.
   */
  private async connect(request: UpstreamRequest, streaming: boolean): Promise<PoolLease> {
    const url = this.urlFor(request.endpoint);
    const body = JSON.stringify(request.payload);
    const attempts = totalAttempts(this.retry);
    const reqId = request.reqId;

    let attempt = 0;
    let refreshed = false;
    let lastError: GatewayError = new UpstreamError("Upstream request failed", 502, "upstream_error");

    for (;;) {
      const cred = await this.credentials.get();
      const headers = buildUpstreamHeaders(cred.token, this.upstream, { streaming, vision: request.vision });
      if (this.debug) {
        logDebug(this.debug, reqId, "upstream request", {
          url,
          attempt: attempt + 1,
          headers: redactHeadersForLog(headers),
          payload: previewString(safeJsonStringifyForLog(request.payload), 4000),
        });
      }

      let lease: PoolLease | null = null;
      try {
        lease = await this.pool.request(url, { method: "POST", headers, body });
      } catch (err: unknown) {
        if (!(err instanceof NetworkError)) throw err;
        lastError = err;
      }

      if (lease) {
        const status = lease.response.status;
        if (status >= 200 && status < 300) return lease;

        const text = await readErrorText(lease);
        const error = new UpstreamError(`Upstream returned ${status}: ${previewString(text, 500)}`, status, classifyStatus(status), text);

        if (status === 401 && !refreshed) {
          refreshed = true;
          this.credentials.invalidate(cred.token);
          logWarn(reqId, "upstream rejected credential, refreshing and retrying once");
          continue;
        }
        if (!isRetryableStatus(status)) throw error;
        lastError = error;
      }

      if (attempt + 1 >= attempts) break;
      const delay = computeBackoffDelay(attempt, this.retry);
      logWarn(reqId, `Upstream request failed (attempt ${attempt + 1}/${attempts}): ${lastError.message}. Retrying in ${(delay / 1000).toFixed(1)}s`);
      await this.sleep(delay);
      attempt++;
    }

    logError(reqId, `Upstream request failed after ${attempts} attempts: ${lastError.message}`);
    if (lastError instanceof NetworkError) {
      throw new UpstreamError(lastError.message, 502, "upstream_error");
    }
    throw lastError;
  }
}

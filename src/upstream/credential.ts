import { logDebug } from "../common";
import { CredentialError } from "../errors";

export const CREDENTIAL_TTL_MS = 2 * 60 * 60 * 1000;

export interface Credential {
  token: string;
  issuedAt: number;
  ttlMs: number;
}

export type CredentialProvider = () => Promise<Credential>;

export interface CredentialCacheOptions {
  now?: () => number;
  debug?: boolean;
}

/**
 * Holds the upstream bearer credential. A cached value is served while
 * `now - issuedAt < ttlMs`; concurrent callers that miss share one fetch.
 */
export class CredentialCache {
  private current: Credential | null = null;
  private inFlight: Promise<Credential> | null = null;
  private readonly now: () => number;
  private readonly debug: boolean;

  constructor(
    private readonly provider: CredentialProvider,
    options: CredentialCacheOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;
  }

  isFresh(cred: Credential | null): cred is Credential {
    return Boolean(cred && this.now() - cred.issuedAt < cred.ttlMs);
  }

  async get(): Promise<Credential> {
    if (this.isFresh(this.current)) return this.current;
    if (this.inFlight) return this.inFlight;

    const pending = this.fetchOnce();
    this.inFlight = pending;
    try {
      return await pending;
    } finally {
      if (this.inFlight === pending) this.inFlight = null;
    }
  }

  /**
   * Drops the cached credential so the next `get()` fetches a new one. With
   * `rejectedToken`, a cache already holding a different token is kept: a
   * concurrent caller has refreshed it since the rejected request was sent.
   */
  invalidate(rejectedToken?: string): void {
    if (rejectedToken !== undefined && this.current && this.current.token !== rejectedToken) return;
    this.current = null;
  }

  private async fetchOnce(): Promise<Credential> {
    logDebug(this.debug, undefined, "fetching upstream credential");
    let cred: Credential;
    try {
      cred = await this.provider();
    } catch (err: unknown) {
      if (err instanceof CredentialError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new CredentialError(`Failed to obtain upstream credential: ${message}`);
    }
    if (!cred.token) throw new CredentialError("Credential provider returned an empty token");
    this.current = cred;
    return cred;
  }
}

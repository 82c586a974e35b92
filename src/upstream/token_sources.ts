import { readFile } from "node:fs/promises";
import { isPlainObject, logDebug, maskSecret, normalizeAuthValue, previewString, readString } from "../common";
import type { CredentialSourceConfig } from "../config";
import { CredentialError, NetworkError } from "../errors";
import type { Credential, CredentialProvider } from "./credential";
import { CREDENTIAL_TTL_MS } from "./credential";
import type { ConnectionPool, PoolLease } from "./pool";

export type ReadTextFile = (path: string) => Promise<string>;

const readUtf8: ReadTextFile = (path) => readFile(path, "utf8");

/** Reads `{"github.com": {"oauth_token": "..."}}` written by the editor integration. */
export async function readHostsFileToken(path: string, read: ReadTextFile = readUtf8): Promise<string | null> {
  let raw: string;
  try {
    raw = await read(path);
  } catch {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isPlainObject(parsed)) return null;
  const host = parsed["github.com"];
  if (!isPlainObject(host)) return null;
  const token = normalizeAuthValue(readString(host, "oauth_token"));
  return token || null;
}

/** Environment first, then the hosts file. */
export async function resolveGithubToken(sources: CredentialSourceConfig, read: ReadTextFile = readUtf8): Promise<string | null> {
  const fromEnv = normalizeAuthValue(sources.githubToken);
  if (fromEnv) return fromEnv;
  if (!sources.hostsFile) return null;
  return readHostsFileToken(sources.hostsFile, read);
}

export interface CopilotTokenProviderOptions {
  tokenUrl: string;
  sources: CredentialSourceConfig;
  pool: ConnectionPool;
  now?: () => number;
  readTextFile?: ReadTextFile;
  debug?: boolean;
}

/** Exchanges the long-lived GitHub token for a short-lived upstream bearer token. */
export function createCopilotTokenProvider(opts: CopilotTokenProviderOptions): CredentialProvider {
  const now = opts.now ?? Date.now;
  const debug = opts.debug ?? false;

  return async (): Promise<Credential> => {
    const githubToken = await resolveGithubToken(opts.sources, opts.readTextFile);
    if (!githubToken) {
      throw new CredentialError("No GitHub token found: set GH_COPILOT_TOKEN or sign in with the editor integration first");
    }
    logDebug(debug, undefined, "exchanging github token", { tokenUrl: opts.tokenUrl, githubToken: maskSecret(githubToken) });

    let lease: PoolLease;
    try {
      lease = await opts.pool.request(opts.tokenUrl, {
        method: "GET",
        headers: {
          authorization: `Bearer ${githubToken}`,
          accept: "application/json",
          "user-agent": "Mozilla/5.0",
        },
      });
    } catch (err: unknown) {
      if (err instanceof NetworkError) throw new CredentialError(`Token exchange failed: ${err.message}`);
      throw err;
    }

    try {
      const text = await lease.response.text();
      if (lease.response.status !== 200) {
        throw new CredentialError(`Token exchange failed, status ${lease.response.status}: ${previewString(text, 400)}`);
      }
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch {
        throw new CredentialError("Token exchange returned invalid JSON");
      }
      const token = isPlainObject(data) ? readString(data, "token") : undefined;
      if (!token) throw new CredentialError("Token exchange response has no token");
      return { token, issuedAt: now(), ttlMs: CREDENTIAL_TTL_MS };
    } finally {
      lease.release();
    }
  };
}

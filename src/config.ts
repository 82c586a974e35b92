import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import type { Env } from "./common";
import { isPlainObject, logWarn, parseBoolEnv } from "./common";

export const DEFAULT_MODEL_MAPPING: Readonly<Record<string, string>> = {
  "gpt-o4-mini": "claude-opus-4.5",
  "gpt-4o-mini": "claude-opus-4.5",
  "claude-opus-4-5-20251101": "claude-opus-4.5",
  "claude-sonnet-4-5-20250929": "claude-sonnet-4.5",
  "claude-haiku-4-5-20251001": "claude-haiku-4.5",
};

export const DEFAULT_SUPPORTED_MODELS: readonly string[] = [
  "gpt-5.1-codex-max",
  "gpt-5.2-codex",
  "gpt-5.2",
  "claude-sonnet-4.5",
  "claude-opus-4.5",
  "claude-haiku-4.5",
  "gemini-3-pro-preview",
  "gemini-3-flash-preview",
];

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
}

export interface PoolConfig {
  maxConnections: number;
  maxConnectionsPerHost: number;
  keepAliveMs: number;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
}

export interface UpstreamConfig {
  chatUrl: string;
  responsesUrl: string;
  tokenUrl: string;
  editorVersion: string;
  pluginVersion: string;
}

export interface CredentialSourceConfig {
  githubToken: string;
  hostsFile: string;
}

export interface ImageConfig {
  maxBytes: number;
  timeoutMs: number;
}

export interface GatewayConfig {
  host: string;
  port: number;
  apiKey: string;
  debug: boolean;
  modelMapping: Record<string, string>;
  responsesModelPatterns: string[];
  supportedModels: string[];
  upstream: UpstreamConfig;
  credentials: CredentialSourceConfig;
  retry: RetryConfig;
  pool: PoolConfig;
  image: ImageConfig;
}

const intFromEnv = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);
const floatFromEnv = (fallback: number, min = 0) => z.coerce.number().min(min).default(fallback);

// Empty strings count as unset so `FOO=` in a .env file falls back to the default.
const emptyAsUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  API_KEY: z.string().default(""),
  GATEWAY_DEBUG: z.string().default(""),
  MODEL_MAPPING: z.string().default(""),
  RESPONSES_MODEL_PATTERNS: z.string().default("codex"),
  SUPPORTED_MODELS: z.string().default(""),
  COPILOT_API_BASE: z.string().url().default("https://api.githubcopilot.com"),
  COPILOT_TOKEN_URL: z.string().url().default("https://api.github.com/copilot_internal/v2/token"),
  EDITOR_VERSION: z.string().default("vscode/1.104.0"),
  EDITOR_PLUGIN_VERSION: z.string().default("copilot-chat/0.25.2025021001"),
  GH_COPILOT_TOKEN: z.string().default(""),
  COPILOT_HOSTS_FILE: z.string().default(""),
  MAX_RETRIES: intFromEnv(3),
  RETRY_BASE_DELAY: floatFromEnv(1.0),
  RETRY_MAX_DELAY: floatFromEnv(30.0),
  RETRY_EXPONENTIAL_BASE: floatFromEnv(2.0, 1),
  POOL_MAX_CONNECTIONS: intFromEnv(100, 1),
  POOL_MAX_PER_HOST: intFromEnv(30, 1),
  POOL_KEEPALIVE_MS: intFromEnv(60_000),
  CONNECT_TIMEOUT_MS: intFromEnv(30_000, 1),
  REQUEST_TIMEOUT_MS: intFromEnv(300_000, 1),
  IMAGE_MAX_BYTES: intFromEnv(10 * 1024 * 1024, 1),
  IMAGE_TIMEOUT_MS: intFromEnv(10_000, 1),
});

export function parseModelMapping(raw: string): Record<string, string> {
  const s = raw.trim();
  if (!s) return { ...DEFAULT_MODEL_MAPPING };
  try {
    const parsed: unknown = JSON.parse(s);
    if (!isPlainObject(parsed)) throw new Error("MODEL_MAPPING must be a JSON object");
    const out: Record<string, string> = {};
    for (const [from, to] of Object.entries(parsed)) {
      if (typeof to !== "string" || !to.trim()) throw new Error(`MODEL_MAPPING.${from} must be a non-empty string`);
      out[from] = to.trim();
    }
    return out;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logWarn(undefined, `Failed to parse MODEL_MAPPING (${message}), using default mapping`);
    return { ...DEFAULT_MODEL_MAPPING };
  }
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function defaultHostsFile(env: Env): string {
  const home = env.HOME || env.USERPROFILE || "";
  const base = env.XDG_CONFIG_HOME || (home ? `${home}/.config` : ".config");
  return `${base.replace(/\/+$/, "")}/github-copilot/hosts.json`;
}

export function parseGatewayConfig(env: Env): { ok: true; config: GatewayConfig } | { ok: false; error: string } {
  const cleaned: Record<string, unknown> = {};
  for (const key of Object.keys(EnvSchema.shape)) cleaned[key] = emptyAsUndefined(env[key]);

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    return { ok: false, error: `Invalid config: ${where ? `${where}: ` : ""}${issue ? issue.message : "unknown error"}` };
  }
  const e = parsed.data;
  const apiBase = e.COPILOT_API_BASE.replace(/\/+$/, "");
  const supported = splitList(e.SUPPORTED_MODELS);

  return {
    ok: true,
    config: {
      host: e.HOST,
      port: e.PORT,
      apiKey: e.API_KEY.trim(),
      debug: parseBoolEnv(e.GATEWAY_DEBUG),
      modelMapping: parseModelMapping(e.MODEL_MAPPING),
      responsesModelPatterns: splitList(e.RESPONSES_MODEL_PATTERNS.toLowerCase()),
      supportedModels: supported.length ? supported : [...DEFAULT_SUPPORTED_MODELS],
      upstream: {
        chatUrl: `${apiBase}/chat/completions`,
        responsesUrl: `${apiBase}/responses`,
        tokenUrl: e.COPILOT_TOKEN_URL,
        editorVersion: e.EDITOR_VERSION,
        pluginVersion: e.EDITOR_PLUGIN_VERSION,
      },
      credentials: {
        githubToken: e.GH_COPILOT_TOKEN.trim(),
        hostsFile: e.COPILOT_HOSTS_FILE || defaultHostsFile(env),
      },
      retry: {
        maxRetries: e.MAX_RETRIES,
        baseDelayMs: e.RETRY_BASE_DELAY * 1000,
        maxDelayMs: e.RETRY_MAX_DELAY * 1000,
        exponentialBase: e.RETRY_EXPONENTIAL_BASE,
      },
      pool: {
        maxConnections: e.POOL_MAX_CONNECTIONS,
        maxConnectionsPerHost: e.POOL_MAX_PER_HOST,
        keepAliveMs: e.POOL_KEEPALIVE_MS,
        connectTimeoutMs: e.CONNECT_TIMEOUT_MS,
        requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
      },
      image: {
        maxBytes: e.IMAGE_MAX_BYTES,
        timeoutMs: e.IMAGE_TIMEOUT_MS,
      },
    },
  };
}

/** Reads `.env` (if present) into `process.env` and parses the result. */
export function loadGatewayConfig(path?: string): ReturnType<typeof parseGatewayConfig> {
  loadDotenv(path ? { path } : undefined);
  return parseGatewayConfig(process.env);
}

export function isResponsesModel(model: string, patterns: readonly string[] = ["codex"]): boolean {
  const lower = model.toLowerCase();
  return patterns.some((p) => p && lower.includes(p));
}

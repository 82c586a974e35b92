import { randomUUID } from "node:crypto";

export type Env = Record<string, string | undefined>;

const LOG_PREFIX = "[gateway]";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

export function readString(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === "string" ? v : undefined;
}

export function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
  const v = obj[key];
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function readArray(obj: Record<string, unknown>, key: string): unknown[] {
  const v = obj[key];
  return Array.isArray(v) ? v : [];
}

export function readObject(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const v = obj[key];
  return isPlainObject(v) ? v : undefined;
}

export function jsonResponse(status: number, obj: unknown, extraHeaders: Record<string, unknown> | undefined = undefined): Response {
  const headers: Record<string, string> = {
    "content-type": "application/json; charset=utf-8",
    "cache-control": "no-store",
  };
  if (extraHeaders) {
    for (const [k, v] of Object.entries(extraHeaders)) {
      if (v == null) continue;
      headers[k] = String(v);
    }
  }
  return new Response(JSON.stringify(obj), { status, headers });
}

export function sseHeaders(extraHeaders: Record<string, unknown> | undefined = undefined): Record<string, string> {
  const headers: Record<string, string> = {
    "content-type": "text/event-stream; charset=utf-8",
    "cache-control": "no-cache",
    connection: "keep-alive",
    "x-accel-buffering": "no",
  };
  if (extraHeaders) {
    for (const [k, v] of Object.entries(extraHeaders)) {
      if (v == null) continue;
      headers[k] = String(v);
    }
  }
  return headers;
}

export function encodeSseData(dataStr: string): string {
  return `data: ${dataStr}\n\n`;
}

// Anthropic-style frames carry the event name on its own line.
export function encodeSseEvent(event: string, dataStr: string): string {
  return `event: ${event}\ndata: ${dataStr}\n\n`;
}

export function parseBoolEnv(value: unknown): boolean {
  const v = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (!v) return false;
  return v === "1" || v === "true" || v === "yes" || v === "y" || v === "on";
}

export function generateReqId(): string {
  return randomUUID();
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function maskSecret(value: unknown): string {
  const v = typeof value === "string" ? value : value == null ? "" : String(value);
  const s = v.trim();
  if (!s) return "";
  if (s.length <= 8) return `${"*".repeat(s.length)} (len=${s.length})`;
  return `${s.slice(0, 4)}…${s.slice(-4)} (len=${s.length})`;
}

export function previewString(value: unknown, maxLen = 1200): string {
  const v = typeof value === "string" ? value : value == null ? "" : String(value);
  if (v.length <= maxLen) return v;
  return `${v.slice(0, maxLen)}…(truncated,len=${v.length})`;
}

function isSensitiveKey(keyLower: string): boolean {
  return (
    keyLower === "authorization" ||
    keyLower.includes("api_key") ||
    keyLower.endsWith("api-key") ||
    keyLower.endsWith("key") ||
    keyLower.includes("token") ||
    keyLower.includes("password") ||
    keyLower.includes("secret")
  );
}

export function redactHeadersForLog(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    out[k] = isSensitiveKey(k.toLowerCase()) ? maskSecret(v) : previewString(v, 200);
  }
  return out;
}

export function safeJsonStringifyForLog(value: unknown, maxStringLen = 800): string {
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(value, (key: string, v: unknown) => {
      if (v && typeof v === "object") {
        if (seen.has(v)) return "[Circular]";
        seen.add(v);
        return v;
      }
      if (typeof v === "string") {
        if (key && isSensitiveKey(key.toLowerCase())) return maskSecret(v);
        // Inline images are noise in logs.
        if (v.startsWith("data:") && v.length > 64) return `${v.slice(0, 32)}…(len=${v.length})`;
        return previewString(v, maxStringLen);
      }
      return v;
    });
  } catch {
    return String(value);
  }
}

function prefixFor(reqId: string | undefined): string {
  return reqId ? `${LOG_PREFIX}[${reqId}]` : LOG_PREFIX;
}

export function logDebug(enabled: boolean, reqId: string | undefined, label: string, data?: unknown): void {
  if (!enabled) return;
  if (data === undefined) {
    console.log(`${prefixFor(reqId)} ${label}`);
  } else {
    console.log(`${prefixFor(reqId)} ${label}`, data);
  }
}

export function logInfo(reqId: string | undefined, label: string, data?: unknown): void {
  if (data === undefined) console.info(`${prefixFor(reqId)} ${label}`);
  else console.info(`${prefixFor(reqId)} ${label}`, data);
}

export function logWarn(reqId: string | undefined, label: string, data?: unknown): void {
  if (data === undefined) console.warn(`${prefixFor(reqId)} ${label}`);
  else console.warn(`${prefixFor(reqId)} ${label}`, data);
}

export function logError(reqId: string | undefined, label: string, data?: unknown): void {
  if (data === undefined) console.error(`${prefixFor(reqId)} ${label}`);
  else console.error(`${prefixFor(reqId)} ${label}`, data);
}

export function normalizeAuthValue(raw: unknown): string {
  if (typeof raw !== "string") return "";
  let value = raw.trim();
  if (!value) return "";

  // Strip accidental surrounding quotes (common when copy/pasting secrets).
  for (let i = 0; i < 2; i++) {
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1).trim();
      continue;
    }
    break;
  }

  if (value.toLowerCase().startsWith("bearer ")) value = value.slice(7).trim();
  return value;
}

export function bearerToken(headerValue: string | null | undefined): string | null {
  if (!headerValue) return null;
  const value = headerValue.trim();
  if (value.toLowerCase().startsWith("bearer ")) return value.slice(7).trim();
  return null;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

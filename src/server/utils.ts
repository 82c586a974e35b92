import { jsonResponse, maskSecret, previewString, sseHeaders } from "../common";
import type { Dialect } from "../canonical";
import { errorBodyFor, toGatewayError } from "../errors";

function mergeVary(existing: string, incoming: string): string {
  const out: string[] = [];
  const seen = new Set<string>();

  const add = (value: string) => {
    for (const part of value
      .split(",")
      .map((p) => p.trim())
      .filter(Boolean)) {
      const key = part.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(part);
    }
  };

  add(existing);
  add(incoming);
  return out.join(", ");
}

export function getCorsHeaders(request: Request): Record<string, string> {
  const origin = request.headers.get("origin") || "*";

  const reqHeaders = (request.headers.get("access-control-request-headers") || "").trim();
  const allowHeaders = reqHeaders || "authorization,content-type,x-api-key,anthropic-version,anthropic-beta";

  return {
    "access-control-allow-origin": origin,
    "access-control-allow-methods": "GET,POST,PUT,DELETE,OPTIONS",
    "access-control-allow-headers": allowHeaders,
    "access-control-max-age": "86400",
    vary: reqHeaders ? "Origin, Access-Control-Request-Headers" : "Origin",
  };
}

export function redactUrlSearchForLog(url: URL): string {
  const isSensitiveKey = (keyLower: string) =>
    keyLower.includes("key") || keyLower.includes("token") || keyLower.includes("password") || keyLower.includes("secret");

  const out = new URLSearchParams();
  let count = 0;
  for (const [k, v] of url.searchParams.entries()) {
    if (count++ >= 40) {
      out.append("__truncated__", "1");
      break;
    }
    out.append(k, isSensitiveKey(k.toLowerCase()) ? maskSecret(v) : previewString(v, 200));
  }

  const s = out.toString();
  return s ? `?${s}` : "";
}

export function withCors(resp: Response, corsHeaders: Record<string, string>): Response {
  const headers = new Headers(resp.headers);
  for (const [k, v] of Object.entries(corsHeaders)) {
    if (k.toLowerCase() === "vary") {
      const existing = headers.get("vary") || "";
      headers.set("vary", existing ? mergeVary(existing, v) : v);
      continue;
    }
    headers.set(k, v);
  }
  return new Response(resp.body, { status: resp.status, headers });
}

export async function readJsonBody(request: Request): Promise<{ ok: true; value: unknown } | { ok: false; value: null }> {
  try {
    return { ok: true, value: await request.json() };
  } catch {
    return { ok: false, value: null };
  }
}

/** Renders any thrown value as the dialect's JSON error envelope. */
export function errorResponse(dialect: Dialect, err: unknown): Response {
  const gatewayError = toGatewayError(err);
  return jsonResponse(gatewayError.status, errorBodyFor(dialect, gatewayError));
}

export function streamResponse(body: ReadableStream<Uint8Array>): Response {
  return new Response(body, { status: 200, headers: sseHeaders() });
}

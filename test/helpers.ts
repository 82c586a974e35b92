import { Response } from "undici";
import type { RequestInit } from "undici";
import type { Env } from "../src/common";
import type { GatewayConfig } from "../src/config";
import { parseGatewayConfig } from "../src/config";
import type { Credential } from "../src/upstream/credential";
import { CREDENTIAL_TTL_MS } from "../src/upstream/credential";
import type { FetchFn } from "../src/upstream/pool";

export function testConfig(env: Env = {}): GatewayConfig {
  const parsed = parseGatewayConfig({ HOME: "/nonexistent", GH_COPILOT_TOKEN: "test-github-token", ...env });
  if (!parsed.ok) throw new Error(parsed.error);
  return parsed.config;
}

export function staticCredential(token = "test-secret"): () => Promise<Credential> {
  return async () => ({ token, issuedAt: Date.now(), ttlMs: CREDENTIAL_TTL_MS });
}

export type RecordedCall = { url: string; init: RequestInit; body: unknown };

/** A fake fetch that records every call and answers from `respond`. */
export function recordingFetch(respond: (call: RecordedCall, index: number) => Response | Promise<Response>): { fetch: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetch: FetchFn = async (url, init) => {
    const raw = typeof init.body === "string" ? init.body : "";
    const call: RecordedCall = { url, init, body: raw ? JSON.parse(raw) : null };
    calls.push(call);
    return respond(call, calls.length - 1);
  };
  return { fetch, calls };
}

export function jsonReply(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

/** A byte stream that yields each string as its own chunk, then optionally fails. */
export function chunkedStream(chunks: string[], failWith?: Error): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let i = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (i < chunks.length) {
        controller.enqueue(encoder.encode(chunks[i++]));
        return;
      }
      if (failWith) controller.error(failWith);
      else controller.close();
    },
  });
}

export function sseReply(chunks: string[], failWith?: Error): Response {
  return new Response(chunkedStream(chunks, failWith), { status: 200, headers: { "content-type": "text/event-stream" } });
}

export async function readAllText(stream: ReadableStream<Uint8Array>): Promise<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder();
  let out = "";
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    out += decoder.decode(value, { stream: true });
  }
  return out + decoder.decode();
}

export type SseFrame = { event: string | null; data: string };

/** Splits rendered SSE text into frames; `event` is null for data-only frames. */
export function parseFrames(text: string): SseFrame[] {
  const frames: SseFrame[] = [];
  for (const block of text.split("\n\n")) {
    if (!block) continue;
    let event: string | null = null;
    let data = "";
    for (const line of block.split("\n")) {
      if (line.startsWith("event: ")) event = line.slice(7);
      else if (line.startsWith("data: ")) data = line.slice(6);
    }
    frames.push({ event, data });
  }
  return frames;
}

export function frameJson(frame: SseFrame): Record<string, unknown> {
  const parsed: unknown = JSON.parse(frame.data);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) throw new Error(`not an object: ${frame.data}`);
  return Object.fromEntries(Object.entries(parsed));
}

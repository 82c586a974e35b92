import { randomUUID } from "node:crypto";
import { isPlainObject, readNumber, readString } from "../common";
import type { CanonicalRequest, ChatMessage, MessageContent, ToolCall, ToolDefinition } from "../canonical";
import { ToolDefinitionSchema, validateMessages } from "../canonical";

export type ConvertResult = { ok: true; request: CanonicalRequest } | { ok: false; status: 400; error: string };

export function invalid(error: string): { ok: false; status: 400; error: string } {
  return { ok: false, status: 400, error };
}

export function generateId(prefix: string): string {
  return `${prefix}${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

export const EMPTY_PARAMETERS: Readonly<Record<string, unknown>> = { type: "object", properties: {} };

export function toolDefinition(name: unknown, description: unknown, parameters: unknown): ToolDefinition | null {
  const parsed = ToolDefinitionSchema.safeParse({
    name: typeof name === "string" ? name.trim() : "",
    description: typeof description === "string" ? description : "",
    parameters: isPlainObject(parameters) ? parameters : { ...EMPTY_PARAMETERS },
  });
  return parsed.success ? parsed.data : null;
}

/** Tool-call arguments as a JSON string; objects are serialized. */
export function argumentsString(raw: unknown): string {
  if (typeof raw === "string") return raw;
  if (raw == null) return "{}";
  return JSON.stringify(raw);
}

/** Parses a JSON arguments string into an object; anything else yields `{}`. */
export function parseToolArguments(args: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(args);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

/**
 * Builds an assistant message. Empty content next to tool calls becomes
 * `null`; missing content without tool calls becomes `""`.
 */
export function assistantMessage(content: MessageContent | null, toolCalls: ToolCall[], name?: string): ChatMessage {
  const isEmpty = content === null || content === "" || (Array.isArray(content) && content.length === 0);
  const msg: ChatMessage = toolCalls.length
    ? { role: "assistant", content: isEmpty ? null : content, toolCalls }
    : { role: "assistant", content: content ?? "" };
  if (name) msg.name = name;
  return msg;
}

/** Validates the converted messages and wraps the request. */
export function finishRequest(base: CanonicalRequest): ConvertResult {
  const validated = validateMessages(base.messages);
  if (!validated.ok) return invalid(validated.error);
  return { ok: true, request: { ...base, messages: validated.messages } };
}

export interface SamplingParams {
  temperature?: number;
  topP?: number;
}

export function readSampling(body: Record<string, unknown>): SamplingParams {
  const out: SamplingParams = {};
  const temperature = readNumber(body, "temperature");
  const topP = readNumber(body, "top_p");
  if (temperature !== undefined) out.temperature = temperature;
  if (topP !== undefined) out.topP = topP;
  return out;
}

export function writeSampling(req: CanonicalRequest, out: Record<string, unknown>): void {
  if (req.temperature !== undefined) out.temperature = req.temperature;
  if (req.topP !== undefined) out.top_p = req.topP;
}

export function readModel(body: Record<string, unknown>): string {
  const model = readString(body, "model");
  return model ? model.trim() : "";
}

/** `{ url }` or a bare string, as OpenAI-style image parts carry it. */
export function readImageUrl(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (isPlainObject(value)) return (readString(value, "url") || "").trim();
  return "";
}

import { isPlainObject, readArray, readNumber, readObject, readString } from "../../common";
import type { CanonicalStreamEvent, Usage } from "../../canonical";
import { TranscodeError } from "../../errors";
import { argumentsString } from "../shared";

export type UpstreamLine =
  | { kind: "skip" }
  | { kind: "done" }
  | { kind: "data"; value: Record<string, unknown> }
  | { kind: "invalid"; error: TranscodeError };

const SKIP: UpstreamLine = { kind: "skip" };

/** Interprets one upstream line: `data:` prefix optional, `[DONE]` ends the stream. */
export function parseUpstreamLine(line: string): UpstreamLine {
  let s = line.trim();
  if (!s || s.startsWith(":") || s.startsWith("event:") || s.startsWith("id:") || s.startsWith("retry:")) return SKIP;
  if (s.startsWith("data:")) s = s.slice(5).trim();
  if (!s) return SKIP;
  if (s === "[DONE]") return { kind: "done" };

  let value: unknown;
  try {
    value = JSON.parse(s);
  } catch {
    return { kind: "invalid", error: new TranscodeError(`Unparseable stream line: ${s.slice(0, 200)}`) };
  }
  if (!isPlainObject(value)) return { kind: "invalid", error: new TranscodeError(`Stream line is not a JSON object: ${s.slice(0, 200)}`) };
  return { kind: "data", value };
}

function readUsage(raw: Record<string, unknown> | undefined, inputKey: string, outputKey: string): CanonicalStreamEvent[] {
  if (!raw) return [];
  const usage: Usage = { inputTokens: readNumber(raw, inputKey) ?? 0, outputTokens: readNumber(raw, outputKey) ?? 0 };
  return [{ type: "usage", usage }];
}

function errorMessage(raw: unknown, fallback: string): string {
  if (typeof raw === "string" && raw) return raw;
  if (isPlainObject(raw)) return readString(raw, "message") || fallback;
  return fallback;
}

/**
 * Maps upstream stream objects to canonical events. Accepts chat-completion
 * chunks and responses-style events from the same decoder, including the
 * full `output` list some upstreams send instead of deltas.
 */
export class UpstreamEventDecoder {
  private readonly startedTools = new Set<number>();
  private sawToolCall = false;

  decode(obj: Record<string, unknown>): CanonicalStreamEvent[] {
    if (obj.error !== undefined && obj.error !== null && typeof obj.type !== "string") {
      return [{ type: "error", kind: "upstream_error", message: errorMessage(obj.error, "Upstream stream error") }];
    }
    if (Array.isArray(obj.choices)) return this.decodeChatChunk(obj);
    const type = readString(obj, "type");
    if (type) return this.decodeResponsesEvent(type, obj);
    if (Array.isArray(obj.output)) return this.decodeOutputList(readArray(obj, "output"));
    return [];
  }

  private startTool(index: number, id: string, name: string): CanonicalStreamEvent[] {
    if (this.startedTools.has(index)) return [];
    this.startedTools.add(index);
    this.sawToolCall = true;
    return [{ type: "tool_call_start", index, id: id || `call_${index}`, name }];
  }

  private decodeChatChunk(obj: Record<string, unknown>): CanonicalStreamEvent[] {
    // Usage may arrive on its own chunk with an empty `choices` list.
    const usage = readUsage(readObject(obj, "usage"), "prompt_tokens", "completion_tokens");
    const c0 = readArray(obj, "choices")[0];
    if (!isPlainObject(c0)) return usage;
    const out: CanonicalStreamEvent[] = [];
    const delta = readObject(c0, "delta") ?? readObject(c0, "message") ?? {};

    const reasoning = readString(delta, "reasoning_content");
    if (reasoning) out.push({ type: "reasoning_delta", text: reasoning });

    const content = readString(delta, "content");
    if (content) out.push({ type: "text_delta", text: content });

    for (const tc of readArray(delta, "tool_calls")) {
      if (!isPlainObject(tc)) continue;
      const index = readNumber(tc, "index") ?? 0;
      const fn = readObject(tc, "function") ?? {};
      out.push(...this.startTool(index, readString(tc, "id") ?? "", readString(fn, "name") ?? ""));
      const args = fn.arguments === undefined ? "" : argumentsString(fn.arguments);
      if (args) out.push({ type: "tool_call_arg_delta", index, text: args });
    }

    out.push(...usage);
    const finish = readString(c0, "finish_reason");
    if (finish) out.push({ type: "finish", reason: finish });
    return out;
  }

  private decodeResponsesEvent(type: string, obj: Record<string, unknown>): CanonicalStreamEvent[] {
    switch (type) {
      case "response.output_text.delta": {
        const delta = readString(obj, "delta");
        return delta ? [{ type: "text_delta", text: delta }] : [];
      }
      case "response.reasoning_summary_text.delta":
      case "response.reasoning_text.delta": {
        const delta = readString(obj, "delta");
        return delta ? [{ type: "reasoning_delta", text: delta }] : [];
      }
      case "content_block_delta": {
        const delta = readObject(obj, "delta");
        const text = delta && readString(delta, "type") === "text_delta" ? readString(delta, "text") : undefined;
        return text ? [{ type: "text_delta", text }] : [];
      }
      case "response.output_item.added": {
        const item = readObject(obj, "item");
        if (!item || readString(item, "type") !== "function_call") return [];
        const index = readNumber(obj, "output_index") ?? 0;
        const id = readString(item, "call_id") || readString(item, "id") || "";
        const out = this.startTool(index, id, readString(item, "name") ?? "");
        const args = readString(item, "arguments");
        if (args) out.push({ type: "tool_call_arg_delta", index, text: args });
        return out;
      }
      case "response.function_call_arguments.delta": {
        const delta = readString(obj, "delta");
        if (!delta) return [];
        return [{ type: "tool_call_arg_delta", index: readNumber(obj, "output_index") ?? 0, text: delta }];
      }
      case "response.completed":
      case "response.incomplete": {
        const response = readObject(obj, "response") ?? {};
        const incomplete = type === "response.incomplete" || readString(response, "status") === "incomplete";
        return [
          ...readUsage(readObject(response, "usage"), "input_tokens", "output_tokens"),
          { type: "finish", reason: this.sawToolCall ? "tool_calls" : incomplete ? "length" : "stop" },
        ];
      }
      case "response.failed": {
        const response = readObject(obj, "response") ?? {};
        return [{ type: "error", kind: "upstream_error", message: errorMessage(response.error, "Upstream response failed") }];
      }
      case "error":
        return [{ type: "error", kind: "upstream_error", message: errorMessage(obj.error ?? obj.message, "Upstream stream error") }];
      default:
        return [];
    }
  }

  private decodeOutputList(items: unknown[]): CanonicalStreamEvent[] {
    const out: CanonicalStreamEvent[] = [];
    items.forEach((item, index) => {
      if (!isPlainObject(item)) return;
      const type = readString(item, "type");
      if (type === "message") {
        for (const c of readArray(item, "content")) {
          if (!isPlainObject(c) || readString(c, "type") !== "output_text") continue;
          const text = readString(c, "text");
          if (text) out.push({ type: "text_delta", text });
        }
      } else if (type === "function_call") {
        const id = readString(item, "call_id") || readString(item, "id") || "";
        out.push(...this.startTool(index, id, readString(item, "name") ?? ""));
        const args = argumentsString(item.arguments);
        if (args) out.push({ type: "tool_call_arg_delta", index, text: args });
      }
    });
    return out;
  }
}

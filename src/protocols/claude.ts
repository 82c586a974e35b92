import { isPlainObject, readArray, readNumber, readObject, readString } from "../common";
import type { CanonicalCompletion, CanonicalRequest, ChatMessage, ContentPart, MessageContent, ToolCall, ToolChoice, ToolDefinition } from "../canonical";
import { contentToText } from "../canonical";
import type { ConvertResult } from "./shared";
import { assistantMessage, finishRequest, generateId, invalid, parseToolArguments, readModel, readSampling, toolDefinition, writeSampling } from "./shared";

export function claudeStopReason(finishReason: string | null, hasToolCalls: boolean): string {
  if (hasToolCalls || finishReason === "tool_calls") return "tool_use";
  if (finishReason === "length") return "max_tokens";
  return "end_turn";
}

// ---- request: claude -> canonical ----

function claudeSystemToText(system: unknown): string | null {
  if (typeof system === "string") return system ? system : null;
  if (!Array.isArray(system)) return null;
  let text = "";
  for (const b of system) {
    if (isPlainObject(b) && b.type === "text") text += readString(b, "text") ?? "";
  }
  return text ? text : null;
}

function claudeImageUrl(block: Record<string, unknown>): string {
  const src = readObject(block, "source");
  if (!src) return "";
  if (src.type === "base64") {
    const data = (readString(src, "data") ?? "").trim();
    if (!data) return "";
    const mediaType = (readString(src, "media_type") ?? "").trim() || "image/png";
    return `data:${mediaType};base64,${data}`;
  }
  if (src.type === "url") return (readString(src, "url") ?? "").trim();
  return "";
}

function claudeToolResultContent(raw: unknown): MessageContent {
  if (typeof raw === "string") return raw;
  if (!Array.isArray(raw)) return "";
  let text = "";
  for (const b of raw) {
    if (isPlainObject(b) && b.type === "text") text += readString(b, "text") ?? "";
  }
  return text;
}

function claudeUserToCanonical(content: unknown, out: ChatMessage[]): void {
  if (typeof content === "string") {
    out.push({ role: "user", content });
    return;
  }
  const parts: ContentPart[] = [];
  let sawToolResult = false;
  for (const b of Array.isArray(content) ? content : []) {
    if (!isPlainObject(b)) continue;
    if (b.type === "tool_result") {
      sawToolResult = true;
      out.push({ role: "tool", toolCallId: readString(b, "tool_use_id") ?? "", content: claudeToolResultContent(b.content) });
    } else if (b.type === "text") {
      parts.push({ type: "text", text: readString(b, "text") ?? "" });
    } else if (b.type === "image") {
      const url = claudeImageUrl(b);
      if (url) parts.push({ type: "image", url });
    }
  }
  // A turn that only carried tool results has no user message of its own.
  if (parts.length || !sawToolResult) out.push({ role: "user", content: parts });
}

function claudeAssistantToCanonical(content: unknown): ChatMessage {
  if (typeof content === "string") return assistantMessage(content, []);
  let text = "";
  const toolCalls: ToolCall[] = [];
  for (const b of Array.isArray(content) ? content : []) {
    if (!isPlainObject(b)) continue;
    if (b.type === "text") {
      text += readString(b, "text") ?? "";
    } else if (b.type === "tool_use") {
      const input = isPlainObject(b.input) ? b.input : {};
      toolCalls.push({ id: readString(b, "id") ?? "", name: readString(b, "name") ?? "", arguments: JSON.stringify(input) });
    }
  }
  return assistantMessage(text, toolCalls);
}

export function claudeToolsToCanonical(raw: unknown[]): ToolDefinition[] {
  const out: ToolDefinition[] = [];
  for (const t of raw) {
    if (!isPlainObject(t)) continue;
    const def = toolDefinition(t.name, t.description, t.input_schema);
    if (def) out.push(def);
  }
  return out;
}

export function claudeToolChoiceToCanonical(raw: unknown): ToolChoice | undefined {
  if (!isPlainObject(raw)) return undefined;
  switch (raw.type) {
    case "auto":
      return "auto";
    case "any":
      return "required";
    case "none":
      return "none";
    case "tool": {
      const name = readString(raw, "name");
      return name ? { name } : undefined;
    }
    default:
      return undefined;
  }
}

export function claudeRequestToCanonical(body: unknown): ConvertResult {
  if (!isPlainObject(body)) return invalid("Request body must be a JSON object");
  const model = readModel(body);
  if (!model) return invalid("Missing model");
  if (!Array.isArray(body.messages)) return invalid("messages must be an array");

  const messages: ChatMessage[] = [];
  for (const m of body.messages) {
    if (!isPlainObject(m)) return invalid("Each message must be an object");
    const role = readString(m, "role");
    if (role === "user") claudeUserToCanonical(m.content, messages);
    else if (role === "assistant") messages.push(claudeAssistantToCanonical(m.content));
    else return invalid(`Unsupported message role: ${String(role)}`);
  }

  const req: CanonicalRequest = {
    model,
    instructions: claudeSystemToText(body.system),
    messages,
    tools: claudeToolsToCanonical(readArray(body, "tools")),
    stream: body.stream === true,
    ...readSampling(body),
  };
  const toolChoice = claudeToolChoiceToCanonical(body.tool_choice);
  if (toolChoice !== undefined) req.toolChoice = toolChoice;
  const maxTokens = readNumber(body, "max_tokens");
  if (maxTokens !== undefined) req.maxTokens = maxTokens;
  return finishRequest(req);
}

// ---- request: canonical -> claude ----

const DATA_URI = /^data:([^;,]+);base64,(.*)$/s;

function canonicalPartToClaude(p: ContentPart): Record<string, unknown> {
  if (p.type === "text") return { type: "text", text: p.text };
  const m = DATA_URI.exec(p.url);
  if (m) return { type: "image", source: { type: "base64", media_type: m[1], data: m[2] } };
  return { type: "image", source: { type: "url", url: p.url } };
}

export function canonicalToolsToClaude(tools: ToolDefinition[]): unknown[] {
  return tools.map((t) => ({ name: t.name, ...(t.description ? { description: t.description } : null), input_schema: t.parameters }));
}

export function canonicalToolChoiceToClaude(choice: ToolChoice): unknown {
  if (choice === "auto") return { type: "auto" };
  if (choice === "required") return { type: "any" };
  if (choice === "none") return { type: "none" };
  return { type: "tool", name: choice.name };
}

export function canonicalToClaudeRequest(req: CanonicalRequest): Record<string, unknown> {
  const system: string[] = req.instructions !== null ? [req.instructions] : [];
  const messages: Record<string, unknown>[] = [];
  // Tool results are user-turn blocks; a user message right after them joins the same turn.
  let pendingResults: Record<string, unknown>[] = [];

  const flushResults = () => {
    if (!pendingResults.length) return;
    messages.push({ role: "user", content: pendingResults });
    pendingResults = [];
  };

  for (const msg of req.messages) {
    switch (msg.role) {
      case "system":
        system.push(contentToText(msg.content));
        break;
      case "tool":
        pendingResults.push({ type: "tool_result", tool_use_id: msg.toolCallId, content: contentToText(msg.content) });
        break;
      case "user":
        if (typeof msg.content === "string") {
          flushResults();
          messages.push({ role: "user", content: msg.content });
        } else {
          messages.push({ role: "user", content: [...pendingResults, ...msg.content.map(canonicalPartToClaude)] });
          pendingResults = [];
        }
        break;
      case "assistant": {
        flushResults();
        const calls = msg.toolCalls ?? [];
        if (!calls.length) {
          const content = msg.content ?? "";
          messages.push({ role: "assistant", content: typeof content === "string" ? content : contentToText(content) });
          break;
        }
        const text = contentToText(msg.content);
        const blocks: Record<string, unknown>[] = text ? [{ type: "text", text }] : [];
        for (const tc of calls) blocks.push({ type: "tool_use", id: tc.id, name: tc.name, input: parseToolArguments(tc.arguments) });
        messages.push({ role: "assistant", content: blocks });
        break;
      }
    }
  }
  flushResults();

  const out: Record<string, unknown> = { model: req.model, messages, stream: req.stream };
  if (system.length) out.system = system.join("\n\n");
  if (req.maxTokens !== undefined) out.max_tokens = req.maxTokens;
  writeSampling(req, out);
  if (req.tools.length) out.tools = canonicalToolsToClaude(req.tools);
  if (req.toolChoice !== undefined) out.tool_choice = canonicalToolChoiceToClaude(req.toolChoice);
  return out;
}

// ---- completion ----

export function canonicalToClaudeMessage(c: CanonicalCompletion, model: string): Record<string, unknown> {
  const content: Record<string, unknown>[] = [];
  if (c.reasoning) content.push({ type: "thinking", thinking: c.reasoning, signature: "" });
  if (c.text) content.push({ type: "text", text: c.text });
  for (const tc of c.toolCalls) content.push({ type: "tool_use", id: tc.id, name: tc.name, input: parseToolArguments(tc.arguments) });

  return {
    id: c.id.startsWith("msg_") ? c.id : generateId("msg_"),
    type: "message",
    role: "assistant",
    model,
    content,
    stop_reason: claudeStopReason(c.finishReason, c.toolCalls.length > 0),
    stop_sequence: null,
    usage: { input_tokens: c.usage?.inputTokens ?? 0, output_tokens: c.usage?.outputTokens ?? 0 },
  };
}

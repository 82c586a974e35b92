import { isPlainObject, nowSeconds, readArray, readNumber, readObject, readString } from "../common";
import type {
  CanonicalCompletion,
  CanonicalRequest,
  ChatMessage,
  ContentPart,
  MessageContent,
  ToolCall,
  ToolChoice,
  ToolDefinition,
} from "../canonical";
import { contentToText } from "../canonical";
import type { ConvertResult } from "./shared";
import { argumentsString, assistantMessage, finishRequest, generateId, invalid, readImageUrl, readModel, readSampling, toolDefinition, writeSampling } from "./shared";

// ---- request: chat -> canonical ----

function chatContentToCanonical(content: unknown): MessageContent {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  const parts: ContentPart[] = [];
  for (const item of content) {
    if (typeof item === "string") {
      parts.push({ type: "text", text: item });
      continue;
    }
    if (!isPlainObject(item)) continue;
    const t = readString(item, "type");
    if (t === "text" || t === "input_text") {
      parts.push({ type: "text", text: readString(item, "text") ?? "" });
    } else if (t === "image_url" || t === "input_image") {
      const url = readImageUrl(item.image_url);
      if (url) parts.push({ type: "image", url });
    }
  }
  return parts;
}

function chatToolCallsToCanonical(raw: unknown): ToolCall[] {
  const out: ToolCall[] = [];
  for (const tc of Array.isArray(raw) ? raw : []) {
    if (!isPlainObject(tc)) continue;
    const fn = readObject(tc, "function") ?? {};
    const name = (readString(fn, "name") ?? "").trim();
    if (!name) continue;
    out.push({ id: readString(tc, "id") ?? "", name, arguments: argumentsString(fn.arguments) });
  }
  return out;
}

export function chatToolsToCanonical(raw: unknown[]): ToolDefinition[] {
  const out: ToolDefinition[] = [];
  for (const t of raw) {
    if (!isPlainObject(t)) continue;
    const fn = readObject(t, "function");
    const def = fn ? toolDefinition(fn.name, fn.description, fn.parameters) : toolDefinition(t.name, t.description, t.parameters);
    if (def) out.push(def);
  }
  return out;
}

export function chatToolChoiceToCanonical(raw: unknown): ToolChoice | undefined {
  if (raw === "auto" || raw === "none" || raw === "required") return raw;
  if (!isPlainObject(raw)) return undefined;
  const fn = readObject(raw, "function");
  const name = fn ? readString(fn, "name") : readString(raw, "name");
  return name ? { name } : undefined;
}

export function chatRequestToCanonical(body: unknown): ConvertResult {
  if (!isPlainObject(body)) return invalid("Request body must be a JSON object");
  const model = readModel(body);
  if (!model) return invalid("Missing model");
  if (!Array.isArray(body.messages)) return invalid("messages must be an array");

  const instructions: string[] = [];
  const messages: ChatMessage[] = [];
  for (const m of body.messages) {
    if (!isPlainObject(m)) return invalid("Each message must be an object");
    const role = readString(m, "role");
    const name = readString(m, "name");
    const content = chatContentToCanonical(m.content);

    if (role === "system" || role === "developer") {
      const text = contentToText(content);
      if (text) instructions.push(text);
      continue;
    }
    if (role === "user") {
      messages.push(name ? { role: "user", content, name } : { role: "user", content });
      continue;
    }
    if (role === "assistant") {
      const toolCalls = chatToolCallsToCanonical(m.tool_calls);
      const raw = m.content == null ? null : content;
      messages.push(assistantMessage(raw, toolCalls, name));
      continue;
    }
    if (role === "tool") {
      const toolCallId = readString(m, "tool_call_id") ?? "";
      messages.push({ role: "tool", content, toolCallId });
      continue;
    }
    return invalid(`Unsupported message role: ${String(role)}`);
  }

  const req: CanonicalRequest = {
    model,
    instructions: instructions.length ? instructions.join("\n\n") : null,
    messages,
    tools: chatToolsToCanonical(readArray(body, "tools")),
    stream: body.stream === true,
    ...readSampling(body),
  };
  const toolChoice = chatToolChoiceToCanonical(body.tool_choice);
  if (toolChoice !== undefined) req.toolChoice = toolChoice;
  const maxTokens = readNumber(body, "max_completion_tokens") ?? readNumber(body, "max_tokens");
  if (maxTokens !== undefined) req.maxTokens = maxTokens;
  return finishRequest(req);
}

// ---- request: canonical -> chat ----

function canonicalContentToChat(content: MessageContent): unknown {
  if (typeof content === "string") return content;
  return content.map((p) => (p.type === "text" ? { type: "text", text: p.text } : { type: "image_url", image_url: { url: p.url } }));
}

export function canonicalToolChoiceToChat(choice: ToolChoice): unknown {
  if (typeof choice === "string") return choice;
  return { type: "function", function: { name: choice.name } };
}

export function canonicalToolsToChat(tools: ToolDefinition[]): unknown[] {
  return tools.map((t) => ({
    type: "function",
    function: { name: t.name, ...(t.description ? { description: t.description } : null), parameters: t.parameters },
  }));
}

function canonicalMessageToChat(msg: ChatMessage): Record<string, unknown> {
  switch (msg.role) {
    case "assistant": {
      const out: Record<string, unknown> = { role: "assistant", content: msg.content === null ? null : canonicalContentToChat(msg.content) };
      if (msg.toolCalls && msg.toolCalls.length) {
        out.tool_calls = msg.toolCalls.map((tc) => ({ id: tc.id, type: "function", function: { name: tc.name, arguments: tc.arguments } }));
      }
      if (msg.name) out.name = msg.name;
      return out;
    }
    case "tool":
      return { role: "tool", tool_call_id: msg.toolCallId, content: canonicalContentToChat(msg.content) };
    default: {
      const out: Record<string, unknown> = { role: msg.role, content: canonicalContentToChat(msg.content) };
      if (msg.name) out.name = msg.name;
      return out;
    }
  }
}

/** Renders a chat-completions request body; also the upstream `/chat/completions` payload. */
export function canonicalToChatRequest(req: CanonicalRequest): Record<string, unknown> {
  const messages: Record<string, unknown>[] = [];
  if (req.instructions !== null) messages.push({ role: "system", content: req.instructions });
  for (const m of req.messages) messages.push(canonicalMessageToChat(m));

  const out: Record<string, unknown> = { model: req.model, messages, stream: req.stream };
  writeSampling(req, out);
  if (req.maxTokens !== undefined) out.max_tokens = req.maxTokens;
  if (req.tools.length) out.tools = canonicalToolsToChat(req.tools);
  if (req.toolChoice !== undefined) out.tool_choice = canonicalToolChoiceToChat(req.toolChoice);
  return out;
}

// ---- completion ----

export function chatCompletionToCanonical(body: unknown, fallbackModel: string): CanonicalCompletion {
  const obj = isPlainObject(body) ? body : {};
  const choices = readArray(obj, "choices");
  const c0 = isPlainObject(choices[0]) ? choices[0] : {};
  const message = readObject(c0, "message") ?? {};

  const rawContent = message.content;
  const text = typeof rawContent === "string" ? rawContent : Array.isArray(rawContent) ? contentToText(chatContentToCanonical(rawContent)) : null;
  const toolCalls = chatToolCallsToCanonical(message.tool_calls);
  const reasoning = readString(message, "reasoning_content");

  const usage = readObject(obj, "usage");
  return {
    id: readString(obj, "id") || generateId("chatcmpl-"),
    model: readString(obj, "model") || fallbackModel,
    text,
    reasoning: reasoning ? reasoning : null,
    toolCalls,
    finishReason: readString(c0, "finish_reason") ?? (toolCalls.length ? "tool_calls" : "stop"),
    usage: usage
      ? { inputTokens: readNumber(usage, "prompt_tokens") ?? 0, outputTokens: readNumber(usage, "completion_tokens") ?? 0 }
      : null,
  };
}

export function canonicalToChatCompletion(c: CanonicalCompletion, model: string): Record<string, unknown> {
  const message: Record<string, unknown> = { role: "assistant", content: c.text };
  if (c.reasoning !== null) message.reasoning_content = c.reasoning;
  if (c.toolCalls.length) {
    message.tool_calls = c.toolCalls.map((tc) => ({ id: tc.id, type: "function", function: { name: tc.name, arguments: tc.arguments } }));
  }
  const out: Record<string, unknown> = {
    id: c.id.startsWith("chatcmpl") ? c.id : generateId("chatcmpl-"),
    object: "chat.completion",
    created: nowSeconds(),
    model,
    choices: [{ index: 0, message, finish_reason: c.finishReason ?? (c.toolCalls.length ? "tool_calls" : "stop") }],
  };
  if (c.usage) {
    out.usage = {
      prompt_tokens: c.usage.inputTokens,
      completion_tokens: c.usage.outputTokens,
      total_tokens: c.usage.inputTokens + c.usage.outputTokens,
    };
  }
  return out;
}

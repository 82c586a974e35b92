import { isPlainObject, nowSeconds, readArray, readNumber, readObject, readString } from "../common";
import type { CanonicalCompletion, CanonicalRequest, ChatMessage, ContentPart, MessageContent, ToolCall, ToolChoice, ToolDefinition } from "../canonical";
import { contentToText } from "../canonical";
import type { ConvertResult } from "./shared";
import { argumentsString, assistantMessage, finishRequest, generateId, invalid, readImageUrl, readModel, readSampling, toolDefinition, writeSampling } from "./shared";

// ---- request: responses -> canonical ----

function responsesContentToCanonical(content: unknown): MessageContent {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  const parts: ContentPart[] = [];
  for (const item of content) {
    if (!isPlainObject(item)) continue;
    const t = readString(item, "type");
    if (t === "input_text" || t === "output_text" || t === "text") {
      parts.push({ type: "text", text: readString(item, "text") ?? "" });
    } else if (t === "input_image" || t === "image_url") {
      const url = readImageUrl(item.image_url);
      if (url) parts.push({ type: "image", url });
    }
  }
  return parts;
}

export function responsesToolsToCanonical(raw: unknown[]): ToolDefinition[] {
  const out: ToolDefinition[] = [];
  for (const t of raw) {
    if (!isPlainObject(t)) continue;
    if (t.type !== undefined && t.type !== "function") continue;
    const fn = readObject(t, "function");
    const def = fn ? toolDefinition(fn.name, fn.description, fn.parameters) : toolDefinition(t.name, t.description, t.parameters);
    if (def) out.push(def);
  }
  return out;
}

export function responsesToolChoiceToCanonical(raw: unknown): ToolChoice | undefined {
  if (raw === "auto" || raw === "none" || raw === "required") return raw;
  if (!isPlainObject(raw)) return undefined;
  const fn = readObject(raw, "function");
  const name = readString(raw, "name") ?? (fn ? readString(fn, "name") : undefined);
  return name ? { name } : undefined;
}

export function responsesRequestToCanonical(body: unknown): ConvertResult {
  if (!isPlainObject(body)) return invalid("Request body must be a JSON object");
  const model = readModel(body);
  if (!model) return invalid("Missing model");

  const instructions: string[] = [];
  const topInstructions = readString(body, "instructions");
  if (topInstructions) instructions.push(topInstructions);

  const messages: ChatMessage[] = [];
  const input = body.input;
  if (typeof input === "string") {
    messages.push({ role: "user", content: input });
  } else if (Array.isArray(input)) {
    for (const item of input) {
      if (!isPlainObject(item)) return invalid("Each input item must be an object");
      const type = readString(item, "type") ?? "message";

      if (type === "function_call") {
        const name = (readString(item, "name") ?? "").trim();
        if (!name) continue;
        const call: ToolCall = {
          id: readString(item, "call_id") || readString(item, "id") || "",
          name,
          arguments: argumentsString(item.arguments),
        };
        // Consecutive calls attach to the assistant turn they follow.
        const last = messages[messages.length - 1];
        if (last && last.role === "assistant") {
          messages[messages.length - 1] = assistantMessage(last.content, [...(last.toolCalls ?? []), call], last.name);
        } else {
          messages.push(assistantMessage(null, [call]));
        }
        continue;
      }
      if (type === "function_call_output") {
        const output = item.output;
        messages.push({
          role: "tool",
          toolCallId: readString(item, "call_id") ?? "",
          content: typeof output === "string" ? output : JSON.stringify(output ?? ""),
        });
        continue;
      }
      if (type !== "message") continue;

      const role = readString(item, "role") ?? "user";
      const content = responsesContentToCanonical(item.content);
      if (role === "system" || role === "developer") {
        const text = contentToText(content);
        if (text) instructions.push(text);
      } else if (role === "assistant") {
        // Text that follows a turn's function_call items belongs to that turn.
        const last = messages[messages.length - 1];
        if (last && last.role === "assistant" && last.content === null) {
          messages[messages.length - 1] = assistantMessage(content, last.toolCalls ?? [], last.name);
        } else {
          messages.push(assistantMessage(content, []));
        }
      } else if (role === "user") {
        messages.push({ role: "user", content });
      } else {
        return invalid(`Unsupported input role: ${role}`);
      }
    }
  } else {
    return invalid("input must be a string or an array");
  }

  const req: CanonicalRequest = {
    model,
    instructions: instructions.length ? instructions.join("\n\n") : null,
    messages,
    tools: responsesToolsToCanonical(readArray(body, "tools")),
    stream: body.stream === true,
    ...readSampling(body),
  };
  const toolChoice = responsesToolChoiceToCanonical(body.tool_choice);
  if (toolChoice !== undefined) req.toolChoice = toolChoice;
  const maxTokens = readNumber(body, "max_output_tokens");
  if (maxTokens !== undefined) req.maxTokens = maxTokens;
  return finishRequest(req);
}

// ---- request: canonical -> responses ----

function canonicalContentToResponses(content: MessageContent, role: "user" | "assistant"): unknown {
  if (typeof content === "string") return content;
  const textType = role === "assistant" ? "output_text" : "input_text";
  return content.map((p) => (p.type === "text" ? { type: textType, text: p.text } : { type: "input_image", image_url: p.url }));
}

export function canonicalToolsToResponses(tools: ToolDefinition[]): unknown[] {
  return tools.map((t) => ({ type: "function", name: t.name, ...(t.description ? { description: t.description } : null), parameters: t.parameters }));
}

export function canonicalToolChoiceToResponses(choice: ToolChoice): unknown {
  if (typeof choice === "string") return choice;
  return { type: "function", name: choice.name };
}

export function canonicalMessagesToResponsesInput(messages: ChatMessage[]): Record<string, unknown>[] {
  const items: Record<string, unknown>[] = [];
  for (const msg of messages) {
    switch (msg.role) {
      case "user":
      case "system":
        items.push({ role: msg.role, content: canonicalContentToResponses(msg.content, "user") });
        break;
      case "assistant":
        for (const tc of msg.toolCalls ?? []) {
          items.push({ type: "function_call", call_id: tc.id, name: tc.name, arguments: tc.arguments });
        }
        if (msg.content !== null) {
          items.push({ type: "message", role: "assistant", content: canonicalContentToResponses(msg.content, "assistant") });
        }
        break;
      case "tool":
        items.push({ type: "function_call_output", call_id: msg.toolCallId, output: contentToText(msg.content) });
        break;
    }
  }
  return items;
}

/**
 * Renders a responses request body; also the upstream `/responses` payload.
 * A lone user message with plain-string content is sent as a bare string.
 */
export function canonicalToResponsesRequest(req: CanonicalRequest): Record<string, unknown> {
  const items = canonicalMessagesToResponsesInput(req.messages);
  const only = items.length === 1 ? items[0] : null;
  const input = only && only.role === "user" && typeof only.content === "string" ? only.content : items;

  const out: Record<string, unknown> = { model: req.model, stream: req.stream };
  if (req.instructions !== null) out.instructions = req.instructions;
  out.input = input;
  writeSampling(req, out);
  if (req.maxTokens !== undefined) out.max_output_tokens = req.maxTokens;
  if (req.tools.length) out.tools = canonicalToolsToResponses(req.tools);
  if (req.toolChoice !== undefined) out.tool_choice = canonicalToolChoiceToResponses(req.toolChoice);
  return out;
}

// ---- completion ----

export function responsesCompletionToCanonical(body: unknown, fallbackModel: string): CanonicalCompletion {
  const obj = isPlainObject(body) ? body : {};
  const texts: string[] = [];
  const reasoning: string[] = [];
  const toolCalls: ToolCall[] = [];

  for (const item of readArray(obj, "output")) {
    if (!isPlainObject(item)) continue;
    const type = readString(item, "type");
    if (type === "reasoning") {
      for (const part of readArray(item, "summary")) {
        if (isPlainObject(part) && readString(part, "type") === "summary_text") reasoning.push(readString(part, "text") ?? "");
      }
    } else if (type === "message") {
      for (const c of readArray(item, "content")) {
        if (isPlainObject(c) && readString(c, "type") === "output_text") texts.push(readString(c, "text") ?? "");
      }
    } else if (type === "function_call") {
      toolCalls.push({
        id: readString(item, "call_id") || readString(item, "id") || "",
        name: readString(item, "name") ?? "",
        arguments: argumentsString(item.arguments),
      });
    }
  }

  const outputText = readString(obj, "output_text");
  const text = outputText !== undefined ? outputText : texts.length ? texts.join("") : null;

  const incomplete = readObject(obj, "incomplete_details");
  const truncated = readString(obj, "status") === "incomplete" && incomplete !== undefined && readString(incomplete, "reason") === "max_output_tokens";

  const usage = readObject(obj, "usage");
  return {
    id: readString(obj, "id") || generateId("resp_"),
    model: readString(obj, "model") || fallbackModel,
    text,
    reasoning: reasoning.length ? reasoning.join("") : null,
    toolCalls,
    finishReason: toolCalls.length ? "tool_calls" : truncated ? "length" : "stop",
    usage: usage ? { inputTokens: readNumber(usage, "input_tokens") ?? 0, outputTokens: readNumber(usage, "output_tokens") ?? 0 } : null,
  };
}

export function canonicalToResponsesObject(c: CanonicalCompletion, model: string): Record<string, unknown> {
  const output: Record<string, unknown>[] = [];
  if (c.reasoning) {
    output.push({ type: "reasoning", id: generateId("rs_"), summary: [{ type: "summary_text", text: c.reasoning }] });
  }
  if (c.text !== null && c.text !== "") {
    output.push({
      type: "message",
      id: generateId("msg_"),
      status: "completed",
      role: "assistant",
      content: [{ type: "output_text", text: c.text, annotations: [] }],
    });
  }
  for (const tc of c.toolCalls) {
    output.push({ type: "function_call", id: generateId("fc_"), call_id: tc.id, name: tc.name, arguments: tc.arguments, status: "completed" });
  }

  const truncated = c.finishReason === "length";
  const out: Record<string, unknown> = {
    id: c.id.startsWith("resp_") ? c.id : generateId("resp_"),
    object: "response",
    created_at: nowSeconds(),
    status: truncated ? "incomplete" : "completed",
    model,
    output,
    output_text: c.text ?? "",
  };
  if (truncated) out.incomplete_details = { reason: "max_output_tokens" };
  if (c.usage) {
    out.usage = {
      input_tokens: c.usage.inputTokens,
      output_tokens: c.usage.outputTokens,
      total_tokens: c.usage.inputTokens + c.usage.outputTokens,
    };
  }
  return out;
}

import { encodeSseEvent, nowSeconds } from "../../common";
import type { Usage } from "../../canonical";
import { TranscodeError } from "../../errors";
import type { ErrorKind } from "../../errors";
import { generateId } from "../shared";
import type { ContentStreamEvent, StreamRenderer } from "./transcoder";

type MessageItem = { kind: "message"; id: string; outputIndex: number; text: string };
type FunctionCallItem = { kind: "function_call"; id: string; outputIndex: number; callId: string; name: string; args: string };
type ReasoningItem = { kind: "reasoning"; id: string; outputIndex: number; text: string };
type OutputItem = MessageItem | FunctionCallItem | ReasoningItem;

function messageItemJson(item: MessageItem, status: string): Record<string, unknown> {
  return {
    id: item.id,
    type: "message",
    role: "assistant",
    status,
    content: status === "completed" ? [{ type: "output_text", text: item.text, annotations: [] }] : [],
  };
}

function reasoningItemJson(item: ReasoningItem, status: string): Record<string, unknown> {
  return {
    id: item.id,
    type: "reasoning",
    summary: status === "completed" ? [{ type: "summary_text", text: item.text }] : [],
  };
}

function itemJson(item: OutputItem, status: string): Record<string, unknown> {
  switch (item.kind) {
    case "message":
      return messageItemJson(item, status);
    case "function_call":
      return functionCallItemJson(item, status);
    case "reasoning":
      return reasoningItemJson(item, status);
  }
}

function functionCallItemJson(item: FunctionCallItem, status: string): Record<string, unknown> {
  return { id: item.id, type: "function_call", status, call_id: item.callId, name: item.name, arguments: item.args };
}

/** Responses API event stream: one output item open at a time, closed before the next starts. */
export class ResponsesStreamRenderer implements StreamRenderer {
  private readonly responseId = generateId("resp_");
  private readonly createdAt = nowSeconds();
  private sequenceNumber = 0;
  private readonly items: OutputItem[] = [];
  private open: OutputItem | null = null;
  private readonly tools = new Map<number, FunctionCallItem>();

  constructor(private readonly model: string) {}

  private emit(type: string, payload: Record<string, unknown>): string {
    return encodeSseEvent(type, JSON.stringify({ type, sequence_number: this.sequenceNumber++, ...payload }));
  }

  private responseJson(status: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
    const output = this.items.map((it) => itemJson(it, "completed"));
    const outputText = this.items.map((it) => (it.kind === "message" ? it.text : "")).join("");
    return {
      id: this.responseId,
      object: "response",
      created_at: this.createdAt,
      model: this.model,
      status,
      output: status === "in_progress" ? [] : output,
      output_text: status === "in_progress" ? "" : outputText,
      ...extra,
    };
  }

  start(): string {
    return this.emit("response.created", { response: this.responseJson("in_progress") });
  }

  private closeOpen(): string {
    const item = this.open;
    if (!item) return "";
    this.open = null;
    if (item.kind === "reasoning") {
      return (
        this.emit("response.reasoning_summary_text.done", {
          output_index: item.outputIndex,
          item_id: item.id,
          summary_index: 0,
          text: item.text,
        }) +
        this.emit("response.reasoning_summary_part.done", {
          output_index: item.outputIndex,
          item_id: item.id,
          summary_index: 0,
          part: { type: "summary_text", text: item.text },
        }) +
        this.emit("response.output_item.done", { output_index: item.outputIndex, item: reasoningItemJson(item, "completed") })
      );
    }
    if (item.kind === "message") {
      return (
        this.emit("response.output_text.done", { output_index: item.outputIndex, item_id: item.id, content_index: 0, text: item.text }) +
        this.emit("response.content_part.done", {
          output_index: item.outputIndex,
          item_id: item.id,
          content_index: 0,
          part: { type: "output_text", text: item.text, annotations: [] },
        }) +
        this.emit("response.output_item.done", { output_index: item.outputIndex, item: messageItemJson(item, "completed") })
      );
    }
    return (
      this.emit("response.function_call_arguments.done", { output_index: item.outputIndex, item_id: item.id, arguments: item.args }) +
      this.emit("response.output_item.done", { output_index: item.outputIndex, item: functionCallItemJson(item, "completed") })
    );
  }

  private startTool(index: number, callId: string, name: string): string {
    let out = this.closeOpen();
    const item: FunctionCallItem = { kind: "function_call", id: generateId("fc_"), outputIndex: this.items.length, callId, name, args: "" };
    this.items.push(item);
    this.tools.set(index, item);
    this.open = item;
    out += this.emit("response.output_item.added", { output_index: item.outputIndex, item: functionCallItemJson(item, "in_progress") });
    return out;
  }

  event(ev: ContentStreamEvent): string {
    switch (ev.type) {
      case "text_delta": {
        let out = "";
        let item = this.open;
        if (!item || item.kind !== "message") {
          out += this.closeOpen();
          const msg: MessageItem = { kind: "message", id: generateId("msg_"), outputIndex: this.items.length, text: "" };
          this.items.push(msg);
          this.open = msg;
          item = msg;
          out += this.emit("response.output_item.added", { output_index: msg.outputIndex, item: messageItemJson(msg, "in_progress") });
          out += this.emit("response.content_part.added", {
            output_index: msg.outputIndex,
            item_id: msg.id,
            content_index: 0,
            part: { type: "output_text", text: "", annotations: [] },
          });
        }
        item.text += ev.text;
        out += this.emit("response.output_text.delta", { output_index: item.outputIndex, item_id: item.id, content_index: 0, delta: ev.text });
        return out;
      }
      case "reasoning_delta": {
        let out = "";
        let item = this.open;
        if (!item || item.kind !== "reasoning") {
          out += this.closeOpen();
          const rs: ReasoningItem = { kind: "reasoning", id: generateId("rs_"), outputIndex: this.items.length, text: "" };
          this.items.push(rs);
          this.open = rs;
          item = rs;
          out += this.emit("response.output_item.added", { output_index: rs.outputIndex, item: reasoningItemJson(rs, "in_progress") });
          out += this.emit("response.reasoning_summary_part.added", {
            output_index: rs.outputIndex,
            item_id: rs.id,
            summary_index: 0,
            part: { type: "summary_text", text: "" },
          });
        }
        item.text += ev.text;
        out += this.emit("response.reasoning_summary_text.delta", {
          output_index: item.outputIndex,
          item_id: item.id,
          summary_index: 0,
          delta: ev.text,
        });
        return out;
      }
      case "tool_call_start":
        if (this.tools.has(ev.index)) return "";
        return this.startTool(ev.index, ev.id, ev.name);
      case "tool_call_arg_delta": {
        let out = "";
        let item = this.tools.get(ev.index);
        if (!item) {
          out += this.startTool(ev.index, `call_${ev.index}`, "");
          item = this.tools.get(ev.index);
        }
        if (!item || this.open !== item) throw new TranscodeError(`Argument fragment for closed tool call ${ev.index}`);
        item.args += ev.text;
        out += this.emit("response.function_call_arguments.delta", { output_index: item.outputIndex, item_id: item.id, delta: ev.text });
        return out;
      }
    }
  }

  finish(reason: string | null, usage: Usage | null): string {
    let out = this.closeOpen();
    const extra: Record<string, unknown> = {};
    if (usage) {
      extra.usage = {
        input_tokens: usage.inputTokens,
        output_tokens: usage.outputTokens,
        total_tokens: usage.inputTokens + usage.outputTokens,
      };
    }
    if (reason === "length") {
      extra.incomplete_details = { reason: "max_output_tokens" };
      out += this.emit("response.incomplete", { response: this.responseJson("incomplete", extra) });
    } else {
      out += this.emit("response.completed", { response: this.responseJson("completed", extra) });
    }
    return out + "data: [DONE]\n\n";
  }

  error(kind: ErrorKind, message: string): string {
    const out = this.emit("response.failed", { response: this.responseJson("failed", { error: { code: kind, message } }) });
    return out + "data: [DONE]\n\n";
  }
}

import { encodeSseData, nowSeconds } from "../../common";
import { openaiErrorBody } from "../../errors";
import type { ErrorKind } from "../../errors";
import type { Usage } from "../../canonical";
import { generateId } from "../shared";
import type { ContentStreamEvent, StreamRenderer } from "./transcoder";

/** `chat.completion.chunk` frames; tool-call indices are renumbered from 0 in order of appearance. */
export class ChatStreamRenderer implements StreamRenderer {
  private readonly id = generateId("chatcmpl-");
  private readonly created = nowSeconds();
  private roleSent = false;
  private readonly toolIndexes = new Map<number, number>();

  constructor(private readonly model: string) {}

  private chunk(delta: Record<string, unknown>, finishReason: string | null = null, usage: Usage | null = null): string {
    if (!this.roleSent) {
      this.roleSent = true;
      delta = { role: "assistant", ...delta };
    }
    const body: Record<string, unknown> = {
      id: this.id,
      object: "chat.completion.chunk",
      created: this.created,
      model: this.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
    if (usage) {
      body.usage = {
        prompt_tokens: usage.inputTokens,
        completion_tokens: usage.outputTokens,
        total_tokens: usage.inputTokens + usage.outputTokens,
      };
    }
    return encodeSseData(JSON.stringify(body));
  }

  start(): string {
    return "";
  }

  private startTool(index: number, id: string, name: string): string {
    const seq = this.toolIndexes.size;
    this.toolIndexes.set(index, seq);
    return this.chunk({ tool_calls: [{ index: seq, id, type: "function", function: { name, arguments: "" } }] });
  }

  event(ev: ContentStreamEvent): string {
    switch (ev.type) {
      case "text_delta":
        return this.chunk({ content: ev.text });
      case "reasoning_delta":
        return this.chunk({ reasoning_content: ev.text });
      case "tool_call_start":
        if (this.toolIndexes.has(ev.index)) return "";
        return this.startTool(ev.index, ev.id, ev.name);
      case "tool_call_arg_delta": {
        let out = "";
        if (!this.toolIndexes.has(ev.index)) out += this.startTool(ev.index, `call_${ev.index}`, "");
        const seq = this.toolIndexes.get(ev.index) ?? 0;
        out += this.chunk({ tool_calls: [{ index: seq, function: { arguments: ev.text } }] });
        return out;
      }
    }
  }

  finish(reason: string | null, usage: Usage | null): string {
    const finishReason = reason ?? (this.toolIndexes.size ? "tool_calls" : "stop");
    return this.chunk({}, finishReason, usage) + encodeSseData("[DONE]");
  }

  error(kind: ErrorKind, message: string): string {
    return encodeSseData(JSON.stringify(openaiErrorBody(kind, message))) + encodeSseData("[DONE]");
  }
}

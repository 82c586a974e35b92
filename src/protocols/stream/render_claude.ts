import { encodeSseEvent } from "../../common";
import { TranscodeError, claudeErrorType } from "../../errors";
import type { ErrorKind } from "../../errors";
import type { Usage } from "../../canonical";
import { claudeStopReason } from "../claude";
import { generateId } from "../shared";
import type { ContentStreamEvent, StreamRenderer } from "./transcoder";

type OpenBlock =
  | { kind: "text"; index: number }
  | { kind: "thinking"; index: number }
  | { kind: "tool"; index: number; toolIndex: number };

function frame(event: string, payload: Record<string, unknown>): string {
  return encodeSseEvent(event, JSON.stringify({ type: event, ...payload }));
}

/**
 * Anthropic Messages stream. At most one content block is open at a time;
 * every started block gets exactly one `content_block_stop`.
 */
export class ClaudeStreamRenderer implements StreamRenderer {
  private readonly messageId = generateId("msg_");
  private nextBlockIndex = 0;
  private open: OpenBlock | null = null;
  private readonly toolBlocks = new Map<number, number>();
  private sawToolCall = false;

  constructor(private readonly model: string) {}

  start(): string {
    return frame("message_start", {
      message: {
        id: this.messageId,
        type: "message",
        role: "assistant",
        model: this.model,
        content: [],
        stop_reason: null,
        stop_sequence: null,
        usage: { input_tokens: 0, output_tokens: 0 },
      },
    });
  }

  private closeOpen(): string {
    if (!this.open) return "";
    const index = this.open.index;
    this.open = null;
    return frame("content_block_stop", { index });
  }

  private startTool(toolIndex: number, id: string, name: string): string {
    let out = this.closeOpen();
    const index = this.nextBlockIndex++;
    this.toolBlocks.set(toolIndex, index);
    this.open = { kind: "tool", index, toolIndex };
    this.sawToolCall = true;
    out += frame("content_block_start", { index, content_block: { type: "tool_use", id, name, input: {} } });
    return out;
  }

  event(ev: ContentStreamEvent): string {
    switch (ev.type) {
      case "text_delta": {
        let out = "";
        if (!this.open || this.open.kind !== "text") {
          out += this.closeOpen();
          const index = this.nextBlockIndex++;
          this.open = { kind: "text", index };
          out += frame("content_block_start", { index, content_block: { type: "text", text: "" } });
        }
        out += frame("content_block_delta", { index: this.open.index, delta: { type: "text_delta", text: ev.text } });
        return out;
      }
      case "reasoning_delta": {
        let out = "";
        if (!this.open || this.open.kind !== "thinking") {
          out += this.closeOpen();
          const index = this.nextBlockIndex++;
          this.open = { kind: "thinking", index };
          out += frame("content_block_start", { index, content_block: { type: "thinking", thinking: "" } });
        }
        out += frame("content_block_delta", {
          index: this.open.index,
          delta: { type: "thinking_delta", thinking: ev.text },
        });
        return out;
      }
      case "tool_call_start":
        if (this.toolBlocks.has(ev.index)) return "";
        return this.startTool(ev.index, ev.id, ev.name);
      case "tool_call_arg_delta": {
        let out = "";
        if (!this.toolBlocks.has(ev.index)) {
          out += this.startTool(ev.index, `toolu_${ev.index}`, "");
        } else if (!this.open || this.open.kind !== "tool" || this.open.toolIndex !== ev.index) {
          throw new TranscodeError(`Argument fragment for closed tool call ${ev.index}`);
        }
        const index = this.toolBlocks.get(ev.index) ?? 0;
        out += frame("content_block_delta", { index, delta: { type: "input_json_delta", partial_json: ev.text } });
        return out;
      }
    }
  }

  finish(reason: string | null, usage: Usage | null): string {
    let out = this.closeOpen();
    out += frame("message_delta", {
      delta: { stop_reason: claudeStopReason(reason, this.sawToolCall), stop_sequence: null },
      usage: { output_tokens: usage ? usage.outputTokens : 0 },
    });
    out += frame("message_stop", {});
    return out;
  }

  error(kind: ErrorKind, message: string): string {
    let out = this.closeOpen();
    out += frame("error", { error: { type: claudeErrorType(kind), message } });
    out += frame("message_stop", {});
    return out;
  }
}

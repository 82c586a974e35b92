import { logDebug, logWarn } from "../../common";
import type { CanonicalStreamEvent, Dialect, Usage } from "../../canonical";
import { TranscodeError } from "../../errors";
import type { ErrorKind } from "../../errors";
import { ChatStreamRenderer } from "./render_chat";
import { ClaudeStreamRenderer } from "./render_claude";
import { ResponsesStreamRenderer } from "./render_responses";
import { LineBuffer } from "./sse";
import { UpstreamEventDecoder, parseUpstreamLine } from "./upstream_events";

export type ContentStreamEvent = Extract<
  CanonicalStreamEvent,
  { type: "text_delta" | "reasoning_delta" | "tool_call_start" | "tool_call_arg_delta" }
>;

/** Encodes canonical stream events as one dialect's SSE frames. */
export interface StreamRenderer {
  start(): string;
  /** May throw TranscodeError for an element the dialect cannot express. */
  event(ev: ContentStreamEvent): string;
  finish(reason: string | null, usage: Usage | null): string;
  error(kind: ErrorKind, message: string): string;
}

export function createRenderer(dialect: Dialect, model: string): StreamRenderer {
  switch (dialect) {
    case "chat":
      return new ChatStreamRenderer(model);
    case "responses":
      return new ResponsesStreamRenderer(model);
    case "claude":
      return new ClaudeStreamRenderer(model);
  }
}

export type TranscoderState = "idle" | "streaming" | "closed";

export interface TranscodeOptions {
  debug?: boolean;
  reqId?: string;
}

/**
 * Lifecycle around a renderer: `open` once, any number of pushes, then
 * exactly one of `end`, `fail` or `cancel`. Everything after close is dropped.
 * A finish reason or usage seen mid-stream is held until `end`.
 */
export class StreamTranscoder {
  private current: TranscoderState = "idle";
  private finishReason: string | null = null;
  private usage: Usage | null = null;

  constructor(
    private readonly renderer: StreamRenderer,
    private readonly opts: TranscodeOptions = {},
  ) {}

  get state(): TranscoderState {
    return this.current;
  }

  open(): string {
    if (this.current !== "idle") return "";
    this.current = "streaming";
    return this.renderer.start();
  }

  /** Returns the rendered frames and whether an error closed the stream. */
  push(events: CanonicalStreamEvent[]): { out: string; terminal: boolean } {
    let out = this.open();
    for (const ev of events) {
      if (this.current === "closed") return { out, terminal: true };
      if (ev.type === "finish") {
        this.finishReason = ev.reason;
        continue;
      }
      if (ev.type === "usage") {
        this.usage = ev.usage;
        continue;
      }
      if (ev.type === "error") {
        out += this.fail(ev.kind, ev.message);
        return { out, terminal: true };
      }
      try {
        out += this.renderer.event(ev);
      } catch (err) {
        if (!(err instanceof TranscodeError)) throw err;
        logDebug(Boolean(this.opts.debug), this.opts.reqId, "Dropped stream element", err.message);
      }
    }
    return { out, terminal: false };
  }

  end(reason: string | null = this.finishReason): string {
    if (this.current === "closed") return "";
    const out = this.open();
    this.current = "closed";
    return out + this.renderer.finish(reason, this.usage);
  }

  fail(kind: ErrorKind, message: string): string {
    if (this.current === "closed") return "";
    const out = this.open();
    this.current = "closed";
    return out + this.renderer.error(kind, message);
  }

  cancel(): void {
    this.current = "closed";
  }
}

/**
 * Pipes an upstream SSE body through the decoder into a renderer. Pull-based:
 * upstream is read only as fast as the client consumes, and cancelling the
 * returned stream cancels upstream.
 */
export function transcodeUpstreamStream(
  upstream: ReadableStream<Uint8Array>,
  renderer: StreamRenderer,
  opts: TranscodeOptions = {},
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const lines = new LineBuffer();
  const decoder = new UpstreamEventDecoder();
  const transcoder = new StreamTranscoder(renderer, opts);
  const reader = upstream.getReader();
  const debug = Boolean(opts.debug);
  let cancelled = false;

  const handleLines = (batch: string[]): { out: string; terminal: boolean } => {
    let out = "";
    for (const line of batch) {
      const parsed = parseUpstreamLine(line);
      if (parsed.kind === "skip") continue;
      if (parsed.kind === "invalid") {
        logDebug(debug, opts.reqId, "Skipped upstream line", parsed.error.message);
        continue;
      }
      if (parsed.kind === "done") return { out: out + transcoder.end(), terminal: true };
      const res = transcoder.push(decoder.decode(parsed.value));
      out += res.out;
      if (res.terminal) return { out, terminal: true };
    }
    return { out, terminal: false };
  };

  const stopUpstream = async (): Promise<void> => {
    try {
      await reader.cancel();
    } catch (err) {
      logDebug(debug, opts.reqId, "Upstream cancel failed", err instanceof Error ? err.message : String(err));
    }
  };

  return new ReadableStream<Uint8Array>({
    start(controller) {
      const head = transcoder.open();
      if (head) controller.enqueue(encoder.encode(head));
    },
    async pull(controller) {
      // Loop until something is enqueued so a run of skipped lines does not stall the consumer.
      for (;;) {
        let chunk: Awaited<ReturnType<typeof reader.read>>;
        try {
          chunk = await reader.read();
        } catch (err) {
          if (cancelled) return;
          const message = err instanceof Error ? err.message : String(err);
          logWarn(opts.reqId, `Upstream stream interrupted: ${message}`);
          controller.enqueue(encoder.encode(transcoder.fail("upstream_error", `Upstream stream interrupted: ${message}`)));
          controller.close();
          return;
        }

        if (cancelled) return;
        if (chunk.done) {
          const res = handleLines(lines.finish());
          const out = res.out + transcoder.end();
          if (out) controller.enqueue(encoder.encode(out));
          controller.close();
          return;
        }

        const res = handleLines(lines.push(chunk.value));
        if (res.out) controller.enqueue(encoder.encode(res.out));
        if (res.terminal) {
          await stopUpstream();
          controller.close();
          return;
        }
        if (res.out) return;
      }
    },
    async cancel(reason) {
      cancelled = true;
      transcoder.cancel();
      logDebug(debug, opts.reqId, "Client cancelled stream");
      try {
        await reader.cancel(reason);
      } catch (err) {
        logWarn(opts.reqId, "Upstream cancel failed", err instanceof Error ? err.message : String(err));
      }
    },
  });
}

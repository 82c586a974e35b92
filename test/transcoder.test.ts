import { describe, expect, it } from "vitest";
import { ClaudeStreamRenderer } from "../src/protocols/stream/render_claude";
import { StreamTranscoder, createRenderer, transcodeUpstreamStream } from "../src/protocols/stream/transcoder";
import { chunkedStream, frameJson, parseFrames, readAllText } from "./helpers";

const textChunk = (text: string) => `data: ${JSON.stringify({ choices: [{ index: 0, delta: { content: text } }] })}\n\n`;
const reasoningChunk = (text: string) => `data: ${JSON.stringify({ choices: [{ index: 0, delta: { reasoning_content: text } }] })}\n\n`;
const toolStartChunk = (index: number, id: string, name: string) =>
  `data: ${JSON.stringify({ choices: [{ index: 0, delta: { tool_calls: [{ index, id, type: "function", function: { name, arguments: "" } }] } }] })}\n\n`;
const toolArgsChunk = (index: number, args: string) =>
  `data: ${JSON.stringify({ choices: [{ index: 0, delta: { tool_calls: [{ index, function: { arguments: args } }] } }] })}\n\n`;

describe("claude rendering", () => {
  it("emits the exact block lifecycle for text then a tool call", async () => {
    const upstream = chunkedStream([textChunk("Hi"), toolStartChunk(0, "t1", "f"), toolArgsChunk(0, "{}"), "data: [DONE]\n\n"]);
    const text = await readAllText(transcodeUpstreamStream(upstream, createRenderer("claude", "claude-sonnet-4.5")));
    const frames = parseFrames(text);

    expect(frames.map((f) => f.event)).toEqual([
      "message_start",
      "content_block_start",
      "content_block_delta",
      "content_block_stop",
      "content_block_start",
      "content_block_delta",
      "content_block_stop",
      "message_delta",
      "message_stop",
    ]);
    const payloads = frames.map(frameJson);
    expect(payloads[1]).toEqual({ type: "content_block_start", index: 0, content_block: { type: "text", text: "" } });
    expect(payloads[2]).toEqual({ type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hi" } });
    expect(payloads[3]).toEqual({ type: "content_block_stop", index: 0 });
    expect(payloads[4]).toEqual({ type: "content_block_start", index: 1, content_block: { type: "tool_use", id: "t1", name: "f", input: {} } });
    expect(payloads[5]).toEqual({ type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: "{}" } });
    expect(payloads[6]).toEqual({ type: "content_block_stop", index: 1 });
    expect(payloads[7]).toEqual({
      type: "message_delta",
      delta: { stop_reason: "tool_use", stop_sequence: null },
      usage: { output_tokens: 0 },
    });
  });

  it("ends a text-only stream with end_turn", async () => {
    const upstream = chunkedStream([textChunk("ok"), `data: ${JSON.stringify({ choices: [{ index: 0, delta: {}, finish_reason: "stop" }] })}\n\n`]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("claude", "m"))));
    const delta = frames.find((f) => f.event === "message_delta");
    expect(delta && frameJson(delta)).toMatchObject({ delta: { stop_reason: "end_turn" } });
  });

  it("renders reasoning as a thinking block ahead of the text block", async () => {
    const upstream = chunkedStream([reasoningChunk("hmm"), textChunk("ok"), "data: [DONE]\n\n"]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("claude", "m"))));

    expect(frames.map((f) => f.event)).toEqual([
      "message_start",
      "content_block_start",
      "content_block_delta",
      "content_block_stop",
      "content_block_start",
      "content_block_delta",
      "content_block_stop",
      "message_delta",
      "message_stop",
    ]);
    const payloads = frames.map(frameJson);
    expect(payloads[1]).toEqual({ type: "content_block_start", index: 0, content_block: { type: "thinking", thinking: "" } });
    expect(payloads[2]).toEqual({ type: "content_block_delta", index: 0, delta: { type: "thinking_delta", thinking: "hmm" } });
    expect(payloads[4]).toEqual({ type: "content_block_start", index: 1, content_block: { type: "text", text: "" } });
  });

  it("reports output tokens from a trailing usage chunk", async () => {
    const upstream = chunkedStream([
      textChunk("x"),
      `data: ${JSON.stringify({ choices: [{ index: 0, delta: {}, finish_reason: "stop" }] })}\n\n`,
      `data: ${JSON.stringify({ choices: [], usage: { prompt_tokens: 3, completion_tokens: 2 } })}\n\n`,
      "data: [DONE]\n\n",
    ]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("claude", "m"))));
    const delta = frames.find((f) => f.event === "message_delta");
    expect(delta && frameJson(delta)).toEqual({
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: { output_tokens: 2 },
    });
  });

  it("drops argument fragments for a tool call that was already closed", () => {
    const transcoder = new StreamTranscoder(new ClaudeStreamRenderer("m"));
    transcoder.open();
    transcoder.push([
      { type: "tool_call_start", index: 0, id: "a", name: "f" },
      { type: "tool_call_start", index: 1, id: "b", name: "g" },
    ]);
    const res = transcoder.push([{ type: "tool_call_arg_delta", index: 0, text: "{}" }]);
    expect(res).toEqual({ out: "", terminal: false });
  });
});

describe("chat rendering", () => {
  it("concatenates fragmented tool arguments into valid JSON", async () => {
    const upstream = chunkedStream([toolStartChunk(0, "call_1", "f"), toolArgsChunk(0, '{"a"'), toolArgsChunk(0, ":1}"), "data: [DONE]\n\n"]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("chat", "gpt-4o"))));

    expect(frames[frames.length - 1].data).toBe("[DONE]");
    const chunks = frames.slice(0, -1).map(frameJson);
    let args = "";
    for (const chunk of chunks) {
      const choices = chunk.choices;
      if (!Array.isArray(choices)) continue;
      const calls: unknown = choices[0].delta.tool_calls;
      if (!Array.isArray(calls)) continue;
      for (const call of calls) args += call.function.arguments;
    }
    expect(JSON.parse(args)).toEqual({ a: 1 });
    expect(chunks[chunks.length - 1].choices).toEqual([{ index: 0, delta: {}, finish_reason: "tool_calls" }]);
  });

  it("keeps finish_reason null until the terminal chunk", async () => {
    const upstream = chunkedStream([textChunk("Hel"), textChunk("lo"), "data: [DONE]\n\n"]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("chat", "gpt-4o"))));
    const chunks = frames.slice(0, -1).map(frameJson);

    expect(chunks.map((c) => c.choices)).toEqual([
      [{ index: 0, delta: { role: "assistant", content: "Hel" }, finish_reason: null }],
      [{ index: 0, delta: { content: "lo" }, finish_reason: null }],
      [{ index: 0, delta: {}, finish_reason: "stop" }],
    ]);
  });

  it("keeps content that arrives after a finish_reason chunk", async () => {
    const upstream = chunkedStream([
      `data: ${JSON.stringify({ choices: [{ index: 0, delta: { content: "a" }, finish_reason: "stop" }] })}\n\n`,
      textChunk("b"),
      "data: [DONE]\n\n",
    ]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("chat", "gpt-4o"))));

    expect(frames.map((f) => f.data).slice(-1)).toEqual(["[DONE]"]);
    expect(frames.slice(0, -1).map((f) => frameJson(f).choices)).toEqual([
      [{ index: 0, delta: { role: "assistant", content: "a" }, finish_reason: null }],
      [{ index: 0, delta: { content: "b" }, finish_reason: null }],
      [{ index: 0, delta: {}, finish_reason: "stop" }],
    ]);
  });

  it("passes reasoning_content through and adds usage to the final chunk", async () => {
    const upstream = chunkedStream([
      reasoningChunk("think"),
      textChunk("done"),
      `data: ${JSON.stringify({ choices: [{ index: 0, delta: {}, finish_reason: "stop" }], usage: { prompt_tokens: 4, completion_tokens: 6 } })}\n\n`,
      "data: [DONE]\n\n",
    ]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("chat", "gpt-4o"))));
    const chunks = frames.slice(0, -1).map(frameJson);

    expect(chunks.map((c) => c.choices)).toEqual([
      [{ index: 0, delta: { role: "assistant", reasoning_content: "think" }, finish_reason: null }],
      [{ index: 0, delta: { content: "done" }, finish_reason: null }],
      [{ index: 0, delta: {}, finish_reason: "stop" }],
    ]);
    expect(chunks[2].usage).toEqual({ prompt_tokens: 4, completion_tokens: 6, total_tokens: 10 });
    expect(chunks[0]).not.toHaveProperty("usage");
  });
});

describe("responses rendering", () => {
  it("opens and closes a message item around text", async () => {
    const upstream = chunkedStream([textChunk("Hi"), "data: [DONE]\n\n"]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("responses", "gpt-5.2-codex"))));

    expect(frames.map((f) => f.event)).toEqual([
      "response.created",
      "response.output_item.added",
      "response.content_part.added",
      "response.output_text.delta",
      "response.output_text.done",
      "response.content_part.done",
      "response.output_item.done",
      "response.completed",
      null,
    ]);
    const payloads = frames.slice(0, -1).map(frameJson);
    expect(payloads.map((p) => p.sequence_number)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(payloads[7].response).toMatchObject({ status: "completed", output_text: "Hi", model: "gpt-5.2-codex" });
    expect(frames[8].data).toBe("[DONE]");
  });

  it("streams reasoning as its own output item before the message", async () => {
    const upstream = chunkedStream([reasoningChunk("plan"), textChunk("Hi"), "data: [DONE]\n\n"]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("responses", "gpt-5.2-codex"))));

    expect(frames.map((f) => f.event)).toEqual([
      "response.created",
      "response.output_item.added",
      "response.reasoning_summary_part.added",
      "response.reasoning_summary_text.delta",
      "response.reasoning_summary_text.done",
      "response.reasoning_summary_part.done",
      "response.output_item.done",
      "response.output_item.added",
      "response.content_part.added",
      "response.output_text.delta",
      "response.output_text.done",
      "response.content_part.done",
      "response.output_item.done",
      "response.completed",
      null,
    ]);
    const payloads = frames.slice(0, -1).map(frameJson);
    expect(payloads[3]).toMatchObject({ output_index: 0, summary_index: 0, delta: "plan" });
    expect(payloads[9]).toMatchObject({ output_index: 1, delta: "Hi" });
    expect(payloads[13].response).toMatchObject({
      status: "completed",
      output: [
        { type: "reasoning", summary: [{ type: "summary_text", text: "plan" }] },
        { type: "message", content: [{ type: "output_text", text: "Hi", annotations: [] }] },
      ],
      output_text: "Hi",
    });
  });

  it("reports a length finish as incomplete", async () => {
    const upstream = chunkedStream([textChunk("cut"), `data: ${JSON.stringify({ choices: [{ index: 0, delta: {}, finish_reason: "length" }] })}\n\n`]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("responses", "m"))));
    const incomplete = frames.find((f) => f.event === "response.incomplete");
    expect(incomplete && frameJson(incomplete).response).toMatchObject({ status: "incomplete", incomplete_details: { reason: "max_output_tokens" } });
  });
});

describe("stream framing", () => {
  it("skips malformed lines and keeps going", async () => {
    const upstream = chunkedStream(["data: {oops\n\n", ": ping\n\n", textChunk("ok"), "data: [DONE]\n\n"]);
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("chat", "m"))));
    expect(frames.map((f) => f.data)).toHaveLength(3);
    expect(frameJson(frames[0]).choices).toEqual([{ index: 0, delta: { role: "assistant", content: "ok" }, finish_reason: null }]);
  });

  it("splits events across arbitrary chunk boundaries", async () => {
    const whole = textChunk("Hello") + "data: [DONE]\n\n";
    const pieces = whole.match(/.{1,7}/gs) ?? [];
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(chunkedStream(pieces), createRenderer("chat", "m"))));
    expect(frameJson(frames[0]).choices).toEqual([{ index: 0, delta: { role: "assistant", content: "Hello" }, finish_reason: null }]);
  });

  it("treats end of stream without [DONE] as a normal finish", async () => {
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(chunkedStream([textChunk("x")]), createRenderer("claude", "m"))));
    expect(frames.map((f) => f.event).slice(-2)).toEqual(["message_delta", "message_stop"]);
  });

  it("emits exactly one terminal error event when upstream breaks mid-stream", async () => {
    const upstream = chunkedStream([textChunk("partial")], new Error("socket hang up"));
    const frames = parseFrames(await readAllText(transcodeUpstreamStream(upstream, createRenderer("claude", "m"))));

    expect(frames.map((f) => f.event)).toEqual([
      "message_start",
      "content_block_start",
      "content_block_delta",
      "content_block_stop",
      "error",
      "message_stop",
    ]);
    expect(frameJson(frames[4])).toEqual({
      type: "error",
      error: { type: "api_error", message: "Upstream stream interrupted: socket hang up" },
    });
  });

  it("cancels upstream when the client goes away", async () => {
    let cancelled = false;
    const line = new TextEncoder().encode(textChunk("tick"));
    const upstream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(line);
      },
      cancel() {
        cancelled = true;
      },
    });

    const reader = transcodeUpstreamStream(upstream, createRenderer("chat", "m")).getReader();
    const first = await reader.read();
    expect(first.done).toBe(false);
    await reader.cancel();
    expect(cancelled).toBe(true);
  });

  it("settles the client cancel even when upstream cancel throws", async () => {
    const line = new TextEncoder().encode(textChunk("tick"));
    const upstream = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(line);
      },
      cancel() {
        throw new Error("already torn down");
      },
    });

    const reader = transcodeUpstreamStream(upstream, createRenderer("chat", "m")).getReader();
    await reader.read();
    await expect(reader.cancel()).resolves.toBeUndefined();
  });
});

import { describe, expect, it } from "vitest";
import type { CanonicalRequest, Dialect } from "../src/canonical";
import { fromCanonical, parseUpstreamCompletion, renderCompletion, toCanonical } from "../src/protocols";

function canonical(dialect: Dialect, body: unknown): CanonicalRequest {
  const res = toCanonical(dialect, body);
  if (!res.ok) throw new Error(res.error);
  return res.request;
}

const chatRequest = {
  model: "gpt-4o",
  stream: false,
  temperature: 0.2,
  max_tokens: 100,
  messages: [
    { role: "system", content: "Be brief." },
    {
      role: "user",
      content: [
        { type: "text", text: "What is in this picture?" },
        { type: "image_url", image_url: { url: "data:image/png;base64,AAAA" } },
      ],
    },
    { role: "assistant", content: null, tool_calls: [{ id: "call_1", type: "function", function: { name: "lookup", arguments: '{"q":"x"}' } }] },
    { role: "tool", tool_call_id: "call_1", content: "found" },
    { role: "assistant", content: "Done." },
  ],
  tools: [
    {
      type: "function",
      function: { name: "lookup", description: "Look something up", parameters: { type: "object", properties: { q: { type: "string" } } } },
    },
  ],
  tool_choice: "auto",
};

const responsesRequest = {
  model: "gpt-5.2-codex",
  instructions: "You are terse.",
  max_output_tokens: 50,
  input: [
    { role: "user", content: [{ type: "input_text", text: "list files" }] },
    { type: "function_call", call_id: "call_1", name: "ls", arguments: "{}" },
    { type: "function_call_output", call_id: "call_1", output: "a.txt" },
    { type: "message", role: "assistant", content: [{ type: "output_text", text: "One file." }] },
  ],
  tools: [{ type: "function", name: "ls", description: "", parameters: { type: "object", properties: {} } }],
  tool_choice: { type: "function", name: "ls" },
};

const claudeRequest = {
  model: "claude-sonnet-4.5",
  system: [{ type: "text", text: "Be helpful." }],
  max_tokens: 256,
  messages: [
    { role: "user", content: "hello" },
    {
      role: "assistant",
      content: [
        { type: "text", text: "Let me check." },
        { type: "tool_use", id: "toolu_1", name: "lookup", input: { q: "x" } },
      ],
    },
    {
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "toolu_1", content: "found" },
        { type: "text", text: "thanks" },
      ],
    },
  ],
  tools: [{ name: "lookup", description: "Look something up", input_schema: { type: "object" } }],
  tool_choice: { type: "any" },
};

describe("round-trip stability", () => {
  const cases: Array<[Dialect, unknown]> = [
    ["chat", chatRequest],
    ["responses", responsesRequest],
    ["claude", claudeRequest],
  ];

  for (const [dialect, body] of cases) {
    it(`${dialect}: toCanonical(fromCanonical(toCanonical(r))) equals toCanonical(r)`, () => {
      const first = canonical(dialect, body);
      const second = canonical(dialect, fromCanonical(dialect, first));
      expect(second).toEqual(first);
    });
  }
});

describe("chat dialect", () => {
  it("lifts system text into instructions and keeps tool calls", () => {
    const req = canonical("chat", chatRequest);
    expect(req.instructions).toBe("Be brief.");
    expect(req.messages[1]).toEqual({
      role: "assistant",
      content: null,
      toolCalls: [{ id: "call_1", name: "lookup", arguments: '{"q":"x"}' }],
    });
    expect(req.messages[2]).toEqual({ role: "tool", toolCallId: "call_1", content: "found" });
    expect(req.maxTokens).toBe(100);
  });

  it("rejects a tool message without tool_call_id", () => {
    const res = toCanonical("chat", { model: "m", messages: [{ role: "tool", content: "x" }] });
    expect(res.ok).toBe(false);
  });

  it("rejects an unknown role", () => {
    const res = toCanonical("chat", { model: "m", messages: [{ role: "wizard", content: "x" }] });
    expect(res).toEqual({ ok: false, status: 400, error: "Unsupported message role: wizard" });
  });

  it("nests tools under function when rendered", () => {
    const out = fromCanonical("chat", canonical("chat", chatRequest));
    expect(out.messages).toContainEqual({ role: "system", content: "Be brief." });
    expect(out.tools).toEqual([
      {
        type: "function",
        function: { name: "lookup", description: "Look something up", parameters: { type: "object", properties: { q: { type: "string" } } } },
      },
    ]);
  });
});

describe("responses dialect", () => {
  it("collapses a lone pure-text user message to a bare string", () => {
    const out = fromCanonical("responses", canonical("chat", { model: "gpt-5.2-codex", messages: [{ role: "user", content: "Hello" }] }));
    expect(out.input).toBe("Hello");
  });

  it("keeps the array form for a lone user message with parts", () => {
    const out = fromCanonical(
      "responses",
      canonical("chat", { model: "gpt-5.2-codex", messages: [{ role: "user", content: [{ type: "text", text: "Hello" }] }] }),
    );
    expect(out.input).toEqual([{ role: "user", content: [{ type: "input_text", text: "Hello" }] }]);
  });

  it("emits tool calls and results as standalone items", () => {
    const out = fromCanonical("responses", canonical("chat", chatRequest));
    expect(out.instructions).toBe("Be brief.");
    expect(out.input).toEqual([
      {
        role: "user",
        content: [
          { type: "input_text", text: "What is in this picture?" },
          { type: "input_image", image_url: "data:image/png;base64,AAAA" },
        ],
      },
      { type: "function_call", call_id: "call_1", name: "lookup", arguments: '{"q":"x"}' },
      { type: "function_call_output", call_id: "call_1", output: "found" },
      { type: "message", role: "assistant", content: "Done." },
    ]);
    expect(out.tools).toEqual([
      { type: "function", name: "lookup", description: "Look something up", parameters: { type: "object", properties: { q: { type: "string" } } } },
    ]);
  });

  it("places a turn's function calls before its text and reads them back as one turn", () => {
    const req = canonical("chat", {
      model: "gpt-5.2-codex",
      messages: [
        { role: "user", content: "go" },
        { role: "assistant", content: "Checking.", tool_calls: [{ id: "call_2", type: "function", function: { name: "run", arguments: "{}" } }] },
        { role: "tool", tool_call_id: "call_2", content: "ok" },
      ],
    });
    const out = fromCanonical("responses", req);
    expect(out.input).toEqual([
      { role: "user", content: "go" },
      { type: "function_call", call_id: "call_2", name: "run", arguments: "{}" },
      { type: "message", role: "assistant", content: "Checking." },
      { type: "function_call_output", call_id: "call_2", output: "ok" },
    ]);
    expect(canonical("responses", out).messages).toEqual(req.messages);
  });

  it("attaches a function_call to the assistant message before it", () => {
    const req = canonical("responses", {
      model: "m",
      input: [
        { role: "user", content: "go" },
        { type: "message", role: "assistant", content: [{ type: "output_text", text: "Working." }] },
        { type: "function_call", call_id: "c1", name: "run", arguments: "{}" },
      ],
    });
    expect(req.messages).toEqual([
      { role: "user", content: "go" },
      { role: "assistant", content: [{ type: "text", text: "Working." }], toolCalls: [{ id: "c1", name: "run", arguments: "{}" }] },
    ]);
  });
});

describe("claude dialect", () => {
  it("serializes tool_use input to a JSON arguments string", () => {
    const req = canonical("claude", claudeRequest);
    expect(req.instructions).toBe("Be helpful.");
    expect(req.messages[1]).toEqual({
      role: "assistant",
      content: "Let me check.",
      toolCalls: [{ id: "toolu_1", name: "lookup", arguments: '{"q":"x"}' }],
    });
    expect(req.toolChoice).toBe("required");
  });

  it("decodes unparseable arguments to an empty input object", () => {
    const req: CanonicalRequest = {
      model: "claude-sonnet-4.5",
      instructions: null,
      messages: [
        { role: "user", content: "hi" },
        { role: "assistant", content: null, toolCalls: [{ id: "t1", name: "f", arguments: '{"a":' }] },
      ],
      tools: [],
      stream: false,
    };
    const out = fromCanonical("claude", req);
    expect(out.messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: [{ type: "tool_use", id: "t1", name: "f", input: {} }] },
    ]);
  });

  it("turns base64 image blocks into data URIs", () => {
    const req = canonical("claude", {
      model: "m",
      messages: [{ role: "user", content: [{ type: "image", source: { type: "base64", media_type: "image/jpeg", data: "QUJD" } }] }],
    });
    expect(req.messages).toEqual([{ role: "user", content: [{ type: "image", url: "data:image/jpeg;base64,QUJD" }] }]);
  });
});

describe("non-streaming completions", () => {
  it("renders a chat tool-call completion as a claude message", () => {
    const completion = parseUpstreamCompletion(
      "chat",
      {
        id: "chatcmpl-1",
        choices: [
          {
            message: { role: "assistant", content: null, tool_calls: [{ id: "call_9", type: "function", function: { name: "lookup", arguments: '{"q":1}' } }] },
            finish_reason: "tool_calls",
          },
        ],
        usage: { prompt_tokens: 3, completion_tokens: 5 },
      },
      "gpt-4o",
    );
    const msg = renderCompletion("claude", completion, "claude-sonnet-4.5");
    expect(msg).toMatchObject({
      type: "message",
      role: "assistant",
      model: "claude-sonnet-4.5",
      content: [{ type: "tool_use", id: "call_9", name: "lookup", input: { q: 1 } }],
      stop_reason: "tool_use",
      usage: { input_tokens: 3, output_tokens: 5 },
    });
    expect(msg.id).toMatch(/^msg_/);
  });

  it("reads both responses text shapes", () => {
    const joined = parseUpstreamCompletion(
      "responses",
      { id: "resp_1", status: "completed", output: [{ type: "message", content: [{ type: "output_text", text: "Hel" }, { type: "output_text", text: "lo" }] }] },
      "m",
    );
    const flat = parseUpstreamCompletion("responses", { id: "resp_2", output_text: "Hi", output: [] }, "m");
    expect(joined.text).toBe("Hello");
    expect(flat.text).toBe("Hi");

    const chat = renderCompletion("chat", joined, "gpt-5.2-codex");
    expect(chat.choices).toEqual([{ index: 0, message: { role: "assistant", content: "Hello" }, finish_reason: "stop" }]);
  });

  it("carries reasoning_content into every dialect", () => {
    const completion = parseUpstreamCompletion(
      "chat",
      { choices: [{ message: { role: "assistant", content: "42", reasoning_content: "adding up" }, finish_reason: "stop" }] },
      "gpt-4o",
    );
    expect(completion.reasoning).toBe("adding up");

    expect(renderCompletion("chat", completion, "gpt-4o").choices).toEqual([
      { index: 0, message: { role: "assistant", content: "42", reasoning_content: "adding up" }, finish_reason: "stop" },
    ]);
    expect(renderCompletion("claude", completion, "claude-sonnet-4.5").content).toEqual([
      { type: "thinking", thinking: "adding up", signature: "" },
      { type: "text", text: "42" },
    ]);
    expect(renderCompletion("responses", completion, "gpt-5.2-codex")).toMatchObject({
      output: [
        { type: "reasoning", summary: [{ type: "summary_text", text: "adding up" }] },
        { type: "message", content: [{ type: "output_text", text: "42", annotations: [] }] },
      ],
      output_text: "42",
    });
  });

  it("reads reasoning summaries from a responses completion", () => {
    const completion = parseUpstreamCompletion(
      "responses",
      {
        id: "resp_3",
        status: "completed",
        output: [
          { type: "reasoning", summary: [{ type: "summary_text", text: "step one" }] },
          { type: "message", content: [{ type: "output_text", text: "done" }] },
        ],
      },
      "m",
    );
    expect(completion.reasoning).toBe("step one");
    expect(completion.text).toBe("done");
  });

  it("marks a truncated responses completion as incomplete", () => {
    const completion = parseUpstreamCompletion(
      "chat",
      { choices: [{ message: { content: "partial" }, finish_reason: "length" }] },
      "gpt-4o",
    );
    const out = renderCompletion("responses", completion, "gpt-4o");
    expect(out).toMatchObject({ status: "incomplete", incomplete_details: { reason: "max_output_tokens" }, output_text: "partial" });
  });
});

import { z } from "zod";
import type { ErrorKind } from "./errors";

export type Dialect = "chat" | "responses" | "claude";

export const TextPartSchema = z.object({ type: z.literal("text"), text: z.string() });
// `url` is either a data: URI or an http(s) URL.
export const ImagePartSchema = z.object({ type: z.literal("image"), url: z.string().min(1) });
export const ContentPartSchema = z.discriminatedUnion("type", [TextPartSchema, ImagePartSchema]);
export const ContentSchema = z.union([z.string(), z.array(ContentPartSchema)]);

export const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.string(),
});

const SystemMessageSchema = z.object({
  role: z.literal("system"),
  content: ContentSchema,
  name: z.string().optional(),
});

const UserMessageSchema = z.object({
  role: z.literal("user"),
  content: ContentSchema,
  name: z.string().optional(),
});

const AssistantMessageSchema = z.object({
  role: z.literal("assistant"),
  content: ContentSchema.nullable(),
  toolCalls: z.array(ToolCallSchema).optional(),
  name: z.string().optional(),
});

const ToolMessageSchema = z.object({
  role: z.literal("tool"),
  content: ContentSchema,
  toolCallId: z.string().min(1),
  name: z.string().optional(),
});

export const ChatMessageSchema = z
  .discriminatedUnion("role", [SystemMessageSchema, UserMessageSchema, AssistantMessageSchema, ToolMessageSchema])
  .superRefine((msg, ctx) => {
    if (msg.role === "assistant" && msg.content === null && !(msg.toolCalls && msg.toolCalls.length)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "assistant content may only be null when tool calls are present" });
    }
  });

export const ToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  parameters: z.record(z.unknown()),
});

export type TextPart = z.infer<typeof TextPartSchema>;
export type ImagePart = z.infer<typeof ImagePartSchema>;
export type ContentPart = z.infer<typeof ContentPartSchema>;
export type MessageContent = z.infer<typeof ContentSchema>;
export type ToolCall = z.infer<typeof ToolCallSchema>;
export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;

export type ToolChoice = "auto" | "none" | "required" | { name: string };

export interface CanonicalRequest {
  model: string;
  instructions: string | null;
  messages: ChatMessage[];
  tools: ToolDefinition[];
  toolChoice?: ToolChoice;
  stream: boolean;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
}

export interface Usage {
  inputTokens: number;
  outputTokens: number;
}

export interface CanonicalCompletion {
  id: string;
  model: string;
  text: string | null;
  /** Model reasoning passed through from `reasoning_content` or reasoning items. */
  reasoning: string | null;
  toolCalls: ToolCall[];
  /** Chat-style finish reason (`stop`, `length`, `tool_calls`, ...). */
  finishReason: string | null;
  usage: Usage | null;
}

export type CanonicalStreamEvent =
  | { type: "text_delta"; text: string }
  | { type: "reasoning_delta"; text: string }
  | { type: "tool_call_start"; index: number; id: string; name: string }
  | { type: "tool_call_arg_delta"; index: number; text: string }
  | { type: "usage"; usage: Usage }
  | { type: "finish"; reason: string | null }
  | { type: "error"; kind: ErrorKind; message: string };

export type MessagesResult = { ok: true; messages: ChatMessage[] } | { ok: false; error: string };

/** Validates a converter's output before it enters the gateway. */
export function validateMessages(messages: unknown[]): MessagesResult {
  const parsed = z.array(ChatMessageSchema).safeParse(messages);
  if (parsed.success) return { ok: true, messages: parsed.data };
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length ? `messages.${issue.path.join(".")}: ` : "";
  return { ok: false, error: `Invalid message: ${where}${issue ? issue.message : "unknown error"}` };
}

export function contentToText(content: MessageContent | null): string {
  if (content == null) return "";
  if (typeof content === "string") return content;
  return content
    .filter((p): p is TextPart => p.type === "text")
    .map((p) => p.text)
    .join("");
}

export function messageHasImage(msg: ChatMessage): boolean {
  return Array.isArray(msg.content) && msg.content.some((p) => p.type === "image");
}

export function hasImageContent(messages: ChatMessage[]): boolean {
  return messages.some(messageHasImage);
}

export function isRemoteImageUrl(url: string): boolean {
  const lower = url.trim().toLowerCase();
  return lower.startsWith("http://") || lower.startsWith("https://");
}

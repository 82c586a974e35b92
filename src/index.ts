/**
 * Cross-dialect gateway in front of a Copilot-style chat upstream.
 *
 * Inbound dialects:
 * - OpenAI Chat Completions: `POST /v1/chat/completions` (alias `/chat/completions`)
 * - OpenAI Responses:        `POST /v1/responses` (alias `/responses`)
 * - Anthropic Messages:      `POST /v1/messages` (alias `/claude/v1/messages`)
 *
 * Upstream endpoint: the chat endpoint, or the responses endpoint for models
 * matching `RESPONSES_MODEL_PATTERNS` (default `codex`).
 */

export type { CanonicalCompletion, CanonicalRequest, CanonicalStreamEvent, ChatMessage, Dialect, ToolCall, ToolDefinition } from "./canonical";
export { loadGatewayConfig, parseGatewayConfig } from "./config";
export type { GatewayConfig } from "./config";
export { CredentialError, GatewayError, InvalidRequestError, NetworkError, TranscodeError, UpstreamError } from "./errors";
export { Gateway, createGatewayContext } from "./gateway";
export type { GatewayContext, GatewayContextOverrides } from "./gateway";
export { fromCanonical, toCanonical } from "./protocols";
export { createRenderer, transcodeUpstreamStream } from "./protocols/stream/transcoder";
export { createHandler } from "./server/handler";
export { startServer } from "./server/node_server";
export type { GatewayServer } from "./server/node_server";

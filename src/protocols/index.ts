import type { CanonicalCompletion, CanonicalRequest, Dialect } from "../canonical";
import { canonicalToChatCompletion, canonicalToChatRequest, chatCompletionToCanonical, chatRequestToCanonical } from "./chat";
import { canonicalToClaudeMessage, canonicalToClaudeRequest, claudeRequestToCanonical } from "./claude";
import { canonicalToResponsesObject, canonicalToResponsesRequest, responsesCompletionToCanonical, responsesRequestToCanonical } from "./responses";
import type { ConvertResult } from "./shared";

export type { ConvertResult } from "./shared";

export function toCanonical(dialect: Dialect, body: unknown): ConvertResult {
  switch (dialect) {
    case "chat":
      return chatRequestToCanonical(body);
    case "responses":
      return responsesRequestToCanonical(body);
    case "claude":
      return claudeRequestToCanonical(body);
  }
}

export function fromCanonical(dialect: Dialect, req: CanonicalRequest): Record<string, unknown> {
  switch (dialect) {
    case "chat":
      return canonicalToChatRequest(req);
    case "responses":
      return canonicalToResponsesRequest(req);
    case "claude":
      return canonicalToClaudeRequest(req);
  }
}

/** Parses a non-streaming upstream body from the given upstream endpoint. */
export function parseUpstreamCompletion(endpoint: "chat" | "responses", body: unknown, fallbackModel: string): CanonicalCompletion {
  return endpoint === "responses" ? responsesCompletionToCanonical(body, fallbackModel) : chatCompletionToCanonical(body, fallbackModel);
}

export function renderCompletion(dialect: Dialect, completion: CanonicalCompletion, model: string): Record<string, unknown> {
  switch (dialect) {
    case "chat":
      return canonicalToChatCompletion(completion, model);
    case "responses":
      return canonicalToResponsesObject(completion, model);
    case "claude":
      return canonicalToClaudeMessage(completion, model);
  }
}

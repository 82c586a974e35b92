import type { UpstreamConfig } from "../config";

export interface UpstreamHeaderOptions {
  streaming: boolean;
  vision: boolean;
}

type IdentityConfig = Pick<UpstreamConfig, "editorVersion" | "pluginVersion">;

export function buildUpstreamHeaders(token: string, identity: IdentityConfig, opts: UpstreamHeaderOptions): Record<string, string> {
  const headers: Record<string, string> = {
    authorization: `Bearer ${token}`,
    "accept-language": "en-US,en;q=0.9",
    "editor-plugin-version": identity.pluginVersion,
    "openai-intent": "conversation-panel",
    "editor-version": identity.editorVersion,
    "content-type": "application/json",
    accept: opts.streaming ? "text/event-stream" : "application/json",
  };
  if (opts.vision) headers["copilot-vision-request"] = "true";
  return headers;
}

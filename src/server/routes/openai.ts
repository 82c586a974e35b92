import { dispatchDialectRequest } from "../dispatch";
import type { RouteArgs } from "../types";

export async function handleChatCompletionsRoute(args: RouteArgs): Promise<Response> {
  return dispatchDialectRequest(args, "chat", (body) => {
    if (Array.isArray(body.messages) && body.messages.length === 0) return "messages must not be empty";
    return null;
  });
}

export async function handleResponsesRoute(args: RouteArgs): Promise<Response> {
  return dispatchDialectRequest(args, "responses");
}

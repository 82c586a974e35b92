import { dispatchDialectRequest } from "../dispatch";
import type { RouteArgs } from "../types";

export async function handleClaudeMessagesRoute(args: RouteArgs): Promise<Response> {
  return dispatchDialectRequest(args, "claude");
}

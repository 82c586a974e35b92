import { bearerToken, generateReqId, jsonResponse, logDebug, logError, normalizeAuthValue, previewString } from "../common";
import { openaiErrorBody } from "../errors";
import { Gateway } from "../gateway";
import type { GatewayContext } from "../gateway";
import { handleClaudeMessagesRoute } from "./routes/claude";
import { handleAdminMappingRoute, handleHealthRoute, handleModelsListRoute } from "./routes/misc";
import { handleChatCompletionsRoute, handleResponsesRoute } from "./routes/openai";
import type { RouteArgs } from "./types";
import { getCorsHeaders, redactUrlSearchForLog, withCors } from "./utils";

export type FetchHandler = (request: Request) => Promise<Response>;

function extractInboundToken(request: Request, path: string, url: URL): string {
  const authHeader = request.headers.get("authorization");

  let token = bearerToken(authHeader);
  if (!token && authHeader) {
    const maybe = authHeader.trim();
    if (maybe && !maybe.includes(" ")) token = maybe;
  }
  if (!token) token = request.headers.get("x-api-key");
  // Admin links are meant to be opened in a browser, so the key may ride in the query.
  if (!token && path.startsWith("/admin/")) token = url.searchParams.get("api_key");

  return normalizeAuthValue(token);
}

export function createHandler(ctx: GatewayContext): FetchHandler {
  const gateway = new Gateway(ctx);
  const debug = ctx.config.debug;

  const handleNoCors = async (request: Request, reqId: string): Promise<Response> => {
    try {
      const url = new URL(request.url);
      const path = url.pathname.replace(/\/+$/, "") || "/";
      const startedAt = Date.now();

      if (debug) {
        logDebug(debug, reqId, "inbound request", {
          method: request.method,
          path,
          search: redactUrlSearchForLog(url),
          userAgent: request.headers.get("user-agent") || "",
          hasAuthorization: Boolean(request.headers.get("authorization")),
          hasXApiKey: Boolean(request.headers.get("x-api-key")),
          contentType: request.headers.get("content-type") || "",
          contentLength: request.headers.get("content-length") || "",
        });
      }

      if (request.method === "GET") {
        const health = handleHealthRoute(path);
        if (health) return health;
      }

      if (ctx.config.apiKey) {
        const token = extractInboundToken(request, path, url);
        if (!token) {
          return jsonResponse(401, openaiErrorBody("authentication", "Missing API key"), { "www-authenticate": "Bearer" });
        }
        if (token !== ctx.config.apiKey) {
          return jsonResponse(401, openaiErrorBody("authentication", "Invalid API key"), { "www-authenticate": "Bearer" });
        }
      }

      const args: RouteArgs = { request, url, path, debug, reqId, startedAt, ctx, gateway };

      if (request.method === "GET") {
        const models = handleModelsListRoute(args);
        if (models) return models;
        const admin = handleAdminMappingRoute(args);
        if (admin) return admin;
      }

      if (request.method === "POST") {
        if (path === "/v1/chat/completions" || path === "/chat/completions") return await handleChatCompletionsRoute(args);
        if (path === "/v1/responses" || path === "/responses") return await handleResponsesRoute(args);
        if (path === "/v1/messages" || path === "/claude/v1/messages") return await handleClaudeMessagesRoute(args);
      }

      return jsonResponse(404, openaiErrorBody("not_found", "Not found"));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err ?? "unknown error");
      const stack = err instanceof Error ? err.stack : "";
      logError(reqId, `critical error: ${message}`, { stack: previewString(stack, 2400) });
      return jsonResponse(500, openaiErrorBody("server_error", `Internal Server Error: ${message}`));
    }
  };

  return async (request: Request): Promise<Response> => {
    const reqId = generateReqId();
    const corsHeaders = getCorsHeaders(request);

    if (request.method === "OPTIONS") {
      return new Response(null, { status: 204, headers: corsHeaders });
    }

    const resp = await handleNoCors(request, reqId);
    return withCors(resp, corsHeaders);
  };
}

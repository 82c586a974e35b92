import { isPlainObject, jsonResponse, logDebug, logError, previewString, safeJsonStringifyForLog } from "../common";
import type { Dialect } from "../canonical";
import { GatewayError, InvalidRequestError } from "../errors";
import type { RouteArgs } from "./types";
import { errorResponse, readJsonBody, streamResponse } from "./utils";

export type BodyCheck = (body: Record<string, unknown>) => string | null;

/**
 * Shared tail of every dialect route: parse the body, run it through the
 * gateway, and render failures in the caller's error envelope.
 */
export async function dispatchDialectRequest(args: RouteArgs, dialect: Dialect, check?: BodyCheck): Promise<Response> {
  const { request, gateway, debug, reqId, startedAt } = args;

  const parsed = await readJsonBody(request);
  if (!parsed.ok || !isPlainObject(parsed.value)) {
    return errorResponse(dialect, new InvalidRequestError("Invalid JSON body"));
  }
  const body = parsed.value;
  const problem = check ? check(body) : null;
  if (problem) return errorResponse(dialect, new InvalidRequestError(problem));

  if (debug) {
    const reqLog = safeJsonStringifyForLog(body);
    logDebug(debug, reqId, `inbound ${dialect} body`, {
      model: typeof body.model === "string" ? body.model : "",
      stream: body.stream === true,
      hasTools: Array.isArray(body.tools) && body.tools.length > 0,
      requestLen: reqLog.length,
      requestPreview: previewString(reqLog, 2400),
    });
  }

  try {
    if (body.stream === true) {
      const stream = await gateway.runStream(dialect, body, reqId);
      return streamResponse(stream);
    }
    const result = await gateway.run(dialect, body, reqId);
    logDebug(debug, reqId, "request completed", { elapsedMs: Date.now() - startedAt });
    return jsonResponse(200, result);
  } catch (err: unknown) {
    if (!(err instanceof GatewayError)) throw err;
    if (err.status >= 500) logError(reqId, `${dialect} request failed: ${err.message}`);
    else logDebug(debug, reqId, `${dialect} request rejected`, { status: err.status, kind: err.kind, message: err.message });
    return errorResponse(dialect, err);
  }
}

import { jsonResponse, logInfo, nowSeconds } from "../../common";
import { openaiErrorBody } from "../../errors";
import { openaiModelsList } from "../../models_list";
import type { RouteArgs } from "../types";

export function handleHealthRoute(path: string): Response | null {
  if (path === "/health" || path === "/v1/health") {
    return jsonResponse(200, { ok: true, time: nowSeconds() });
  }
  return null;
}

export function handleModelsListRoute({ path, ctx }: Pick<RouteArgs, "path" | "ctx">): Response | null {
  if (path === "/v1/models" || path === "/models") return jsonResponse(200, openaiModelsList(ctx.config));
  return null;
}

/**
 * Runtime model-mapping edits. GET-only with query parameters so they can be
 * driven from a browser address bar.
 */
export function handleAdminMappingRoute({ path, url, ctx, reqId }: Pick<RouteArgs, "path" | "url" | "ctx" | "reqId">): Response | null {
  const mapping = ctx.modelMapping;

  switch (path) {
    case "/admin/mapping":
      return jsonResponse(200, mapping.toJSON());

    case "/admin/mapping/set": {
      const from = (url.searchParams.get("from") || "").trim();
      const to = (url.searchParams.get("to") || "").trim();
      if (!from || !to) return jsonResponse(400, openaiErrorBody("invalid_request", "Query parameters 'from' and 'to' are required"));
      mapping.set(from, to);
      logInfo(reqId, `Model mapping updated: ${from} -> ${to}`);
      return jsonResponse(200, { status: "ok", added: { [from]: to }, mapping: mapping.toJSON() });
    }

    case "/admin/mapping/del": {
      const from = (url.searchParams.get("from") || "").trim();
      if (!from) return jsonResponse(400, openaiErrorBody("invalid_request", "Query parameter 'from' is required"));
      if (!mapping.delete(from)) return jsonResponse(404, openaiErrorBody("not_found", `'${from}' not found`));
      logInfo(reqId, `Model mapping deleted: ${from}`);
      return jsonResponse(200, { status: "ok", deleted: from, mapping: mapping.toJSON() });
    }

    case "/admin/mapping/reset":
      mapping.reset();
      logInfo(reqId, "Model mapping reset to initial config");
      return jsonResponse(200, { status: "ok", mapping: mapping.toJSON() });

    default:
      return null;
  }
}

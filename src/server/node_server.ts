import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import { logError, logInfo, logWarn } from "../common";
import type { GatewayContext } from "../gateway";
import { createHandler } from "./handler";
import type { FetchHandler } from "./handler";

export interface GatewayServer {
  server: Server;
  url: string;
  close(): Promise<void>;
}

function readRequestBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let ended = false;
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      ended = true;
      resolve(Buffer.concat(chunks));
    });
    req.on("close", () => {
      if (!ended) reject(new Error("Client closed the connection before the request body completed"));
    });
    req.on("error", reject);
  });
}

export async function toFetchRequest(req: IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) for (const v of value) headers.append(key, v);
    else headers.set(key, value);
  }
  const method = (req.method || "GET").toUpperCase();
  const body = method === "GET" || method === "HEAD" ? undefined : await readRequestBody(req);
  return new Request(new URL(req.url || "/", origin), { method, headers, body });
}

function waitForDrain(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.on("drain", done);
    res.on("close", done);
  });
}

/**
 * Copies a fetch Response onto the Node response, honouring socket
 * backpressure. A client that is gone (before or during the body) cancels
 * the body stream, which propagates to the upstream.
 */
export async function writeFetchResponse(resp: Response, res: ServerResponse, disconnected?: AbortSignal): Promise<void> {
  const gone = () => res.destroyed || Boolean(disconnected?.aborted);

  if (gone()) {
    if (resp.body) {
      try {
        await resp.body.cancel("client disconnected");
      } catch (err) {
        logWarn(undefined, "body cancel failed", err instanceof Error ? err.message : String(err));
      }
    }
    return;
  }

  const headers: Record<string, string> = {};
  resp.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(resp.status, headers);

  if (!resp.body) {
    res.end();
    return;
  }

  const reader = resp.body.getReader();
  let cancelled = false;
  const cancelBody = async () => {
    if (cancelled) return;
    cancelled = true;
    try {
      await reader.cancel("client disconnected");
    } catch (err) {
      logWarn(undefined, "body cancel failed", err instanceof Error ? err.message : String(err));
    }
  };
  const onClose = () => {
    if (!res.writableFinished) void cancelBody();
  };
  res.on("close", onClose);

  try {
    while (!gone()) {
      const { done, value } = await reader.read();
      if (done || gone()) break;
      if (!res.write(value)) await waitForDrain(res);
    }
  } finally {
    res.off("close", onClose);
    if (gone()) await cancelBody();
    else res.end();
  }
}

export function createNodeListener(handler: FetchHandler, origin: string): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    // Registered before the handler runs so a client that leaves early is still seen.
    const disconnect = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) disconnect.abort();
    });

    const run = async () => {
      const request = await toFetchRequest(req, origin);
      const resp = await handler(request);
      await writeFetchResponse(resp, res, disconnect.signal);
    };
    run().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      if (disconnect.signal.aborted || res.destroyed) {
        logWarn(undefined, "request abandoned by client", message);
        return;
      }
      logError(undefined, "request pipeline failed", message);
      if (!res.headersSent) {
        res.writeHead(500, { "content-type": "application/json; charset=utf-8" });
        res.end(JSON.stringify({ error: { message: "Internal Server Error", type: "server_error", code: "server_error" } }));
      } else {
        res.destroy();
      }
    });
  };
}

export async function startServer(ctx: GatewayContext): Promise<GatewayServer> {
  const { host, port } = ctx.config;
  const url = `http://${host}:${port}`;
  const server = createServer(createNodeListener(createHandler(ctx), url));

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  logInfo(undefined, `Listening on ${url}`);

  return {
    server,
    url,
    async close() {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      });
      await ctx.close();
    },
  };
}

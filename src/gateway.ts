import { logDebug, logInfo } from "./common";
import type { CanonicalRequest, ChatMessage, ContentPart, Dialect } from "./canonical";
import { hasImageContent, isRemoteImageUrl } from "./canonical";
import type { GatewayConfig } from "./config";
import { isResponsesModel } from "./config";
import { InvalidRequestError } from "./errors";
import { ModelMapping } from "./model_mapping";
import { fromCanonical, parseUpstreamCompletion, renderCompletion, toCanonical } from "./protocols";
import { createRenderer, transcodeUpstreamStream } from "./protocols/stream/transcoder";
import { UpstreamClient } from "./upstream/client";
import type { UpstreamEndpoint } from "./upstream/client";
import type { CredentialProvider } from "./upstream/credential";
import { CredentialCache } from "./upstream/credential";
import type { ImageInliner } from "./upstream/image_inline";
import { createImageInliner } from "./upstream/image_inline";
import type { FetchFn } from "./upstream/pool";
import { ConnectionPool } from "./upstream/pool";
import type { ReadTextFile } from "./upstream/token_sources";
import { createCopilotTokenProvider } from "./upstream/token_sources";

export interface GatewayContextOverrides {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  credentialProvider?: CredentialProvider;
  imageInliner?: ImageInliner;
  readTextFile?: ReadTextFile;
}

/**
 * Process-scoped state: the pooled connections, the credential cache and the
 * runtime model mapping. Closing it releases the pool.
 */
export interface GatewayContext {
  config: GatewayConfig;
  pool: ConnectionPool;
  credentials: CredentialCache;
  client: UpstreamClient;
  modelMapping: ModelMapping;
  inlineImage: ImageInliner;
  close(): Promise<void>;
}

export function createGatewayContext(config: GatewayConfig, overrides: GatewayContextOverrides = {}): GatewayContext {
  const pool = new ConnectionPool(config.pool, overrides.fetch);
  const provider =
    overrides.credentialProvider ??
    createCopilotTokenProvider({
      tokenUrl: config.upstream.tokenUrl,
      sources: config.credentials,
      pool,
      now: overrides.now,
      readTextFile: overrides.readTextFile,
      debug: config.debug,
    });
  const credentials = new CredentialCache(provider, { now: overrides.now, debug: config.debug });
  const client = new UpstreamClient({
    pool,
    credentials,
    upstream: config.upstream,
    retry: config.retry,
    sleep: overrides.sleep,
    debug: config.debug,
  });

  return {
    config,
    pool,
    credentials,
    client,
    modelMapping: new ModelMapping(config.modelMapping),
    inlineImage: overrides.imageInliner ?? createImageInliner(pool, config.image, config.debug),
    close: () => pool.close(),
  };
}

async function inlinePart(part: ContentPart, inline: ImageInliner): Promise<ContentPart> {
  if (part.type !== "image" || !isRemoteImageUrl(part.url)) return part;
  return { type: "image", url: await inline(part.url) };
}

async function inlineMessageImages(messages: ChatMessage[], inline: ImageInliner): Promise<ChatMessage[]> {
  return Promise.all(
    messages.map(async (msg): Promise<ChatMessage> => {
      if (!Array.isArray(msg.content)) return msg;
      const content = await Promise.all(msg.content.map((p) => inlinePart(p, inline)));
      return { ...msg, content };
    }),
  );
}

interface PreparedCall {
  requestedModel: string;
  endpoint: UpstreamEndpoint;
  payload: Record<string, unknown>;
  vision: boolean;
}

export class Gateway {
  constructor(private readonly ctx: GatewayContext) {}

  /** Converts the caller's body into the upstream payload for the chosen endpoint. */
  async prepare(dialect: Dialect, body: unknown, stream: boolean, reqId?: string): Promise<PreparedCall> {
    const converted = toCanonical(dialect, body);
    if (!converted.ok) throw new InvalidRequestError(converted.error);

    const requestedModel = converted.request.model;
    const model = this.ctx.modelMapping.resolve(requestedModel);
    if (model !== requestedModel) logDebug(this.ctx.config.debug, reqId, "model mapped", { from: requestedModel, to: model });

    const messages = hasImageContent(converted.request.messages)
      ? await inlineMessageImages(converted.request.messages, this.ctx.inlineImage)
      : converted.request.messages;
    const canonical: CanonicalRequest = { ...converted.request, model, messages, stream };

    const endpoint: UpstreamEndpoint = isResponsesModel(model, this.ctx.config.responsesModelPatterns) ? "responses" : "chat";
    logInfo(reqId, `${dialect} -> ${endpoint} model=${model} stream=${stream}`);

    return {
      requestedModel,
      endpoint,
      payload: fromCanonical(endpoint, canonical),
      vision: hasImageContent(messages),
    };
  }

  async run(dialect: Dialect, body: unknown, reqId?: string): Promise<Record<string, unknown>> {
    const call = await this.prepare(dialect, body, false, reqId);
    const raw = await this.ctx.client.send({ endpoint: call.endpoint, payload: call.payload, vision: call.vision, reqId }, false);
    const completion = parseUpstreamCompletion(call.endpoint, raw, call.requestedModel);
    return renderCompletion(dialect, completion, call.requestedModel);
  }

  /**
   * Resolves once the upstream has answered 2xx; failures before that reject
   * and nothing has been written. Failures after that arrive in-band.
   */
  async runStream(dialect: Dialect, body: unknown, reqId?: string): Promise<ReadableStream<Uint8Array>> {
    const call = await this.prepare(dialect, body, true, reqId);
    const upstream = await this.ctx.client.send({ endpoint: call.endpoint, payload: call.payload, vision: call.vision, reqId }, true);
    return transcodeUpstreamStream(upstream, createRenderer(dialect, call.requestedModel), { debug: this.ctx.config.debug, reqId });
  }
}

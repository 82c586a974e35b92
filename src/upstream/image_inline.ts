import { logDebug, logWarn, previewString } from "../common";
import type { ImageConfig } from "../config";
import type { ConnectionPool, PoolLease } from "./pool";

export type ImageInliner = (url: string) => Promise<string>;

export const DEFAULT_IMAGE: ImageConfig = {
  maxBytes: 10 * 1024 * 1024,
  timeoutMs: 10_000,
};

async function readCapped(body: ReadableStream<Uint8Array>, maxBytes: number): Promise<Buffer | null> {
  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel("image too large");
      return null;
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks);
}

/**
 * Downloads remote images and returns them as `data:` URIs. Any failure
 * (status, size, timeout, network) yields the original URL unchanged.
 */
export function createImageInliner(pool: ConnectionPool, config: ImageConfig = DEFAULT_IMAGE, debug = false): ImageInliner {
  return async (url: string): Promise<string> => {
    if (!/^https?:\/\//i.test(url)) return url;
    const shortUrl = previewString(url, 100);

    let lease: PoolLease;
    try {
      lease = await pool.request(url, { method: "GET", signal: AbortSignal.timeout(config.timeoutMs) });
    } catch (err: unknown) {
      logWarn(undefined, `Image download failed: ${shortUrl}`, err instanceof Error ? err.message : String(err));
      return url;
    }

    try {
      const { response } = lease;
      if (response.status !== 200 || !response.body) {
        logDebug(debug, undefined, "image download returned non-200", { url: shortUrl, status: response.status });
        if (response.body) await response.body.cancel();
        return url;
      }
      const declared = Number(response.headers.get("content-length") || "");
      if (Number.isFinite(declared) && declared > config.maxBytes) {
        logWarn(undefined, `Image too large (content-length ${declared}), skipping: ${shortUrl}`);
        await response.body.cancel();
        return url;
      }
      const data = await readCapped(response.body, config.maxBytes);
      if (!data) {
        logWarn(undefined, `Image exceeded ${config.maxBytes} bytes during download, skipping: ${shortUrl}`);
        return url;
      }
      const rawType = (response.headers.get("content-type") || "").split(";")[0].trim().toLowerCase();
      const mimeType = rawType.startsWith("image/") ? rawType : "image/jpeg";
      return `data:${mimeType};base64,${data.toString("base64")}`;
    } catch (err: unknown) {
      logWarn(undefined, `Image download failed: ${shortUrl}`, err instanceof Error ? err.message : String(err));
      return url;
    } finally {
      lease.release();
    }
  };
}

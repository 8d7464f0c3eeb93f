/**
 * HTTP probe executors: account existence, header fetch and hidden paths.
 *
 * All three issue a single GET with the scan's User-Agent and honour the
 * probe signal, which carries both the per-probe deadline and scan cancel.
 */

import type {
  HeaderFetchSpec,
  HttpExistenceSpec,
  PathProbeSpec,
  ProbeContext,
  ProbeExecutor,
  RawOutcome,
} from "./types.js";
import { buildUrl, hostForUrl, resolvePath } from "../targets.js";
import { logger } from "../logger.js";
import { errorMessage } from "../errors.js";

/** Path bodies are only needed for robots.txt and the reported size. */
export const PATH_BODY_MAX_BYTES = 64 * 1024;

/** The body read stops this long before the probe deadline. */
const BODY_DEADLINE_MARGIN_MS = 100;

const STOPPED = Symbol("stopped");

interface GetOptions {
  redirect: "follow" | "manual";
  readBody: boolean;
  maxBytes?: number;
}

type BodyRead = { complete: true; buffer: Buffer } | { complete: false };

async function readBounded(
  body: NonNullable<Response["body"]>,
  maxBytes: number,
  waitMs: number,
): Promise<BodyRead> {
  const reader = body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;
  let timer: NodeJS.Timeout | undefined;
  const stop = new Promise<typeof STOPPED>((resolve) => {
    timer = setTimeout(() => resolve(STOPPED), Math.max(0, waitMs));
  });

  try {
    for (;;) {
      const next = await Promise.race([reader.read(), stop]);
      if (next === STOPPED) return { complete: false };
      if (next.done) return { complete: true, buffer: Buffer.concat(chunks, total) };
      const chunk = Buffer.from(next.value);
      total += chunk.byteLength;
      if (total > maxBytes) return { complete: false };
      chunks.push(chunk);
    }
  } finally {
    clearTimeout(timer);
    reader.cancel().catch((err: unknown) => {
      logger.debug(`[http] body cancel failed: ${errorMessage(err)}`);
    });
  }
}

function contentLength(headers: Record<string, string>): number | undefined {
  const raw = headers["content-length"];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) && value >= 0 ? value : undefined;
}

/**
 * Single GET. Once headers are in, the outcome always carries the status:
 * a body that is too large or still streaming near the deadline is dropped
 * and a `status` outcome is returned instead.
 */
export async function httpGet(url: URL, ctx: ProbeContext, options: GetOptions): Promise<RawOutcome> {
  const startedAt = Date.now();
  const response = await fetch(url, {
    method: "GET",
    redirect: options.redirect,
    headers: { "User-Agent": ctx.userAgent },
    signal: ctx.signal,
  });

  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  if (!options.readBody) {
    await response.body?.cancel();
    return { kind: "status", url: url.toString(), status: response.status, headers };
  }

  const waitMs = ctx.timeoutMs - (Date.now() - startedAt) - BODY_DEADLINE_MARGIN_MS;
  const read: BodyRead = response.body
    ? await readBounded(response.body, options.maxBytes ?? Number.POSITIVE_INFINITY, waitMs)
    : { complete: true, buffer: Buffer.alloc(0) };

  if (!read.complete) {
    logger.debug(`[http] ${url.toString()}: body not read in full, keeping status ${response.status}`);
    return {
      kind: "status",
      url: url.toString(),
      status: response.status,
      headers,
      bytes: contentLength(headers),
    };
  }

  return {
    kind: "body",
    url: url.toString(),
    status: response.status,
    headers,
    body: read.buffer.toString("utf-8"),
    bytes: read.buffer.byteLength,
  };
}

export const httpExistenceExecutor: ProbeExecutor<HttpExistenceSpec> = async (spec, ctx) => {
  const url = buildUrl(spec.urlTemplate, encodeURIComponent(ctx.target));
  return httpGet(url, ctx, { redirect: "follow", readBody: true });
};

export const headerFetchExecutor: ProbeExecutor<HeaderFetchSpec> = async (spec, ctx) => {
  const host = hostForUrl(ctx.target);
  const primary = buildUrl(spec.urlTemplate, host);
  if (!spec.fallbackUrlTemplate) {
    return httpGet(primary, ctx, { redirect: "manual", readBody: false });
  }

  const fallback = buildUrl(spec.fallbackUrlTemplate, host);
  try {
    return await httpGet(primary, ctx, { redirect: "manual", readBody: false });
  } catch (err) {
    if (ctx.signal.aborted) throw err;
    logger.debug(`[http] ${primary.toString()} failed (${errorMessage(err)}), trying ${fallback.toString()}`);
    return httpGet(fallback, ctx, { redirect: "manual", readBody: false });
  }
};

export const pathProbeExecutor: ProbeExecutor<PathProbeSpec> = async (spec, ctx) => {
  const url = resolvePath(ctx.target, spec.path);
  return httpGet(url, ctx, { redirect: "manual", readBody: true, maxBytes: PATH_BODY_MAX_BYTES });
};

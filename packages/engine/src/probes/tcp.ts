/**
 * TCP connect probe with optional banner capture.
 *
 * The verdict only depends on whether the connect completes; the banner is
 * an auxiliary payload read in whatever time is left before the deadline.
 */

import { connect } from "node:net";
import type { ProbeExecutor, RawOutcome, TcpConnectSpec } from "./types.js";
import { MalformedTargetError } from "./failure.js";

/** Upper bound on the banner read after connecting. */
export const BANNER_WAIT_MS = 2_000;
const BANNER_MAX_CHARS = 200;
/** Banner reading stops this long before the probe deadline. */
const DEADLINE_MARGIN_MS = 50;

export function cleanBanner(raw: string): string | undefined {
  const text = raw.trim().slice(0, BANNER_MAX_CHARS);
  return text || undefined;
}

export const tcpConnectExecutor: ProbeExecutor<TcpConnectSpec> = async (spec, ctx) => {
  if (!Number.isInteger(spec.port) || spec.port < 1 || spec.port > 65_535) {
    throw new MalformedTargetError(`Invalid port ${spec.port}`);
  }
  if (!ctx.target) throw new MalformedTargetError("Empty host");

  const startedAt = Date.now();

  return new Promise<RawOutcome>((resolve, reject) => {
    const socket = connect({ host: ctx.target, port: spec.port });
    let connected = false;
    let settled = false;
    let bannerTimer: NodeJS.Timeout | undefined;

    const settle = (done: () => void): void => {
      if (settled) return;
      settled = true;
      if (bannerTimer) clearTimeout(bannerTimer);
      ctx.signal.removeEventListener("abort", onAbort);
      socket.destroy();
      done();
    };

    const onAbort = (): void => settle(() => reject(ctx.signal.reason));

    if (ctx.signal.aborted) {
      onAbort();
      return;
    }
    ctx.signal.addEventListener("abort", onAbort, { once: true });

    socket.once("connect", () => {
      connected = true;
      if (!spec.banner) {
        settle(() => resolve({ kind: "connected" }));
        return;
      }

      const remaining = ctx.timeoutMs - (Date.now() - startedAt) - DEADLINE_MARGIN_MS;
      const wait = Math.min(BANNER_WAIT_MS, remaining);
      if (wait <= 0) {
        settle(() => resolve({ kind: "connected" }));
        return;
      }
      if (spec.bannerPayload) socket.write(spec.bannerPayload);
      bannerTimer = setTimeout(() => settle(() => resolve({ kind: "connected" })), wait);
    });

    socket.once("data", (chunk: Buffer) => {
      settle(() => resolve({ kind: "connected", banner: cleanBanner(chunk.toString("utf-8")) }));
    });

    socket.once("end", () => {
      if (connected) settle(() => resolve({ kind: "connected" }));
    });

    socket.once("error", (err) => {
      settle(() => (connected ? resolve({ kind: "connected" }) : reject(err)));
    });
  });
};

/**
 * Map thrown network faults onto terminal RawOutcome values.
 *
 * Node's net/dns layer and undici's fetch both attach an errno-style `code`,
 * fetch one level down in `cause`.
 */

import type { RawOutcome } from "./types.js";

/** Thrown by URL/host builders when a spec cannot be applied to the target. */
export class MalformedTargetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedTargetError";
  }
}

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_FAIL", "EAI_NONAME", "EAI_NODATA", "ENODATA"]);
const TIMEOUT_CODES = new Set(["ETIMEDOUT", "UND_ERR_CONNECT_TIMEOUT", "UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);
const MALFORMED_CODES = new Set(["ERR_INVALID_URL", "ERR_SOCKET_BAD_PORT", "ERR_INVALID_ARG_VALUE"]);

/** Walk the `cause` chain and return the innermost error-like value. */
function rootCause(err: unknown): unknown {
  let current = err;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== "object" || current === null || !("cause" in current)) break;
    if (current.cause === undefined || current.cause === null) break;
    current = current.cause;
  }
  return current;
}

export function errorCode(err: unknown): string | undefined {
  let current = err;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== "object" || current === null) return undefined;
    if ("code" in current && typeof current.code === "string") return current.code;
    if (!("cause" in current)) return undefined;
    current = current.cause;
  }
  return undefined;
}

function describe(err: unknown): string {
  const root = rootCause(err);
  if (root instanceof Error && root.message) return root.message;
  if (err instanceof Error) return err.message;
  return String(err);
}

export function describeFailure(err: unknown): RawOutcome {
  if (err instanceof MalformedTargetError) {
    return { kind: "error", cause: "malformed-target", message: err.message };
  }

  const code = errorCode(err);
  const message = describe(err);

  if (code === "ECONNREFUSED") return { kind: "refused", message };
  if (code !== undefined && DNS_CODES.has(code)) return { kind: "error", cause: "dns", message };
  if (code !== undefined && TIMEOUT_CODES.has(code)) return { kind: "timeout", message };
  if (code !== undefined && MALFORMED_CODES.has(code)) {
    return { kind: "error", cause: "malformed-target", message };
  }
  if (err instanceof Error && err.name === "TimeoutError") return { kind: "timeout", message };

  return { kind: "error", cause: "transport", message };
}

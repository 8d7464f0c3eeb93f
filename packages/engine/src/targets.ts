/**
 * Target validation and probe URL construction.
 *
 * Invalid targets are rejected with ScanInputError before any probe runs.
 * Per-probe URL problems raise MalformedTargetError, which the dispatcher
 * turns into an indeterminate outcome for that probe only.
 */

import { isIP } from "node:net";
import { ScanInputError } from "./errors.js";
import { MalformedTargetError } from "./probes/failure.js";

export interface ValidateResult {
  valid: boolean;
  error?: string;
  parsed?: URL;
}

const USERNAME_RE = /^[A-Za-z0-9._-]{1,64}$/;
const HOSTNAME_RE =
  /^(?=.{1,253}\.?$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*\.?$/i;

export function validateTargetUrl(url: string): ValidateResult {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, error: "Invalid URL" };
  }
  if (!["http:", "https:"].includes(parsed.protocol)) {
    return { valid: false, error: "Only HTTP/HTTPS targets are supported" };
  }
  if (!parsed.hostname) {
    return { valid: false, error: "URL has no host" };
  }
  return { valid: true, parsed };
}

export function normalizeUsername(raw: string): string {
  const username = raw.trim();
  if (!username) throw new ScanInputError("No username provided");
  if (!USERNAME_RE.test(username)) {
    throw new ScanInputError(
      `Invalid username '${username}': use 1-64 letters, digits, '.', '_' or '-'`,
    );
  }
  return username;
}

/** Accepts a hostname, an IP literal or a URL (reduced to its hostname). */
export function normalizeHost(raw: string): string {
  let host = raw.trim();
  if (!host) throw new ScanInputError("No hostname provided");

  if (host.includes("://")) {
    const result = validateTargetUrl(host);
    if (!result.valid || !result.parsed) {
      throw new ScanInputError(`Invalid target '${host}': ${result.error ?? "Invalid URL"}`);
    }
    host = result.parsed.hostname;
  }

  if (host.startsWith("[") && host.endsWith("]")) host = host.slice(1, -1);

  if (isIP(host) === 0 && !HOSTNAME_RE.test(host)) {
    throw new ScanInputError(`Invalid hostname '${host}'`);
  }
  return host.toLowerCase();
}

export interface BaseUrl {
  url: string;
  hostname: string;
  /** True when `http://` was added to scheme-less input. */
  prefixed: boolean;
}

export function normalizeBaseUrl(raw: string): BaseUrl {
  const input = raw.trim();
  if (!input) throw new ScanInputError("No target provided");

  const prefixed = !/^https?:\/\//i.test(input);
  if (prefixed && /^[a-z][a-z0-9+.-]*:\/\//i.test(input)) {
    throw new ScanInputError(`Invalid target '${input}': Only HTTP/HTTPS targets are supported`);
  }
  const candidate = prefixed ? `http://${input}` : input;
  const result = validateTargetUrl(candidate);
  if (!result.valid || !result.parsed) {
    throw new ScanInputError(`Invalid target '${input}': ${result.error ?? "Invalid URL"}`);
  }

  return {
    url: result.parsed.toString(),
    hostname: normalizeHost(result.parsed.hostname),
    prefixed,
  };
}

/** Hostname as it must appear inside a URL authority. */
export function hostForUrl(host: string): string {
  return isIP(host) === 6 ? `[${host}]` : host;
}

export function expandTemplate(template: string, value: string): string {
  return template.split("{}").join(value);
}

export function buildUrl(template: string, value: string): URL {
  const expanded = expandTemplate(template, value);
  try {
    return new URL(expanded);
  } catch {
    throw new MalformedTargetError(`Malformed URL '${expanded}'`);
  }
}

/** Resolve `path` against `base` the way a browser resolves a relative link. */
export function resolvePath(base: string, path: string): URL {
  try {
    return new URL(path, base);
  } catch {
    throw new MalformedTargetError(`Cannot resolve '${path}' against '${base}'`);
  }
}

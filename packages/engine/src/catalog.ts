/**
 * Static probe tables and the builders that turn them into ProbeSpecs.
 *
 * Tables are loaded once at startup and never mutated during a run.
 */

import { z } from "zod";
import platformTable from "./data/platforms.json" with { type: "json" };
import type {
  HeaderFetchSpec,
  HttpExistenceSpec,
  PathProbeSpec,
  TcpConnectSpec,
} from "./probes/types.js";
import { BANNER_WAIT_MS } from "./probes/tcp.js";

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36";

/* ------------------------------------------------------------------ */
/*  Platforms                                                          */
/* ------------------------------------------------------------------ */

export const platformSchema = z.object({
  url: z.string().min(1).refine((u) => u.includes("{}"), {
    message: "URL template must contain '{}'",
  }),
  markers: z.array(z.string()).default([]),
});

export type Platform = z.infer<typeof platformSchema> & { name: string };

const platformTableSchema = z.record(platformSchema);

export const PLATFORMS: readonly Platform[] = Object.entries(platformTableSchema.parse(platformTable)).map(
  ([name, entry]) => ({ name, ...entry }),
);

/* ------------------------------------------------------------------ */
/*  Ports                                                              */
/* ------------------------------------------------------------------ */

/** Ports checked on every `info` cycle. */
export const INFO_PORTS: readonly number[] = [80, 443, 22, 21, 25, 53, 110, 143, 993, 995];

/** Ports checked by `recon`. */
export const RECON_PORTS: readonly number[] = [
  21, 22, 23, 25, 53, 80, 110, 443, 993, 995, 1723, 3306, 3389, 5900, 8080, 8443,
];

const SERVICE_NAMES: Record<number, string> = {
  20: "FTP Data",
  21: "FTP",
  22: "SSH",
  23: "Telnet",
  25: "SMTP",
  53: "DNS",
  80: "HTTP",
  110: "POP3",
  143: "IMAP",
  443: "HTTPS",
  993: "IMAPS",
  995: "POP3S",
  1723: "PPTP",
  3306: "MySQL",
  3389: "RDP",
  5432: "PostgreSQL",
  5900: "VNC",
  8080: "HTTP-Alt",
  8443: "HTTPS-Alt",
};

export function serviceName(port: number): string {
  return SERVICE_NAMES[port] ?? "Unknown";
}

/** Payloads that make common services answer with a banner. */
function bannerPayload(port: number): string | undefined {
  if (port === 80 || port === 443) return "HEAD / HTTP/1.0\r\n\r\n";
  if (port === 22) return "SSH-2.0-Client\r\n";
  return undefined;
}

/* ------------------------------------------------------------------ */
/*  Hidden paths                                                       */
/* ------------------------------------------------------------------ */

export const HIDDEN_PATHS: readonly string[] = [
  "admin", "dashboard", "login", "wp-admin", "phpmyadmin",
  ".git", ".env", "backup", "api", "config", "uploads",
  "administrator", "mysql", "test", "hidden", "cgi-bin",
  "phpinfo.php", "robots.txt", ".htaccess", "backup.zip",
  "wp-login.php", "administrator/index.php", "server-status",
];

/** Status codes that mean a hidden path exists (or is guarded). */
export const PATH_PRESENT_STATUSES: ReadonlySet<number> = new Set([200, 301, 302, 403]);

/* ------------------------------------------------------------------ */
/*  Spec builders                                                      */
/* ------------------------------------------------------------------ */

export function platformProbes(platforms: readonly Platform[] = PLATFORMS): HttpExistenceSpec[] {
  return platforms.map((p) => ({
    kind: "http-existence",
    id: `platform:${p.name}`,
    label: p.name,
    urlTemplate: p.url,
    markers: p.markers,
  }));
}

export interface PortProbeOptions {
  /** Capture a service banner on open ports. */
  banner?: boolean;
  timeoutMs?: number;
}

export function portProbes(ports: readonly number[], options: PortProbeOptions = {}): TcpConnectSpec[] {
  return ports.map((port) => ({
    kind: "tcp-connect",
    id: `port:${port}`,
    label: `Port ${port} (${serviceName(port)})`,
    port,
    timeoutMs: options.timeoutMs,
    banner: options.banner,
    bannerPayload: options.banner ? bannerPayload(port) : undefined,
  }));
}

export function pathProbes(paths: readonly string[], timeoutMs?: number): PathProbeSpec[] {
  return paths.map((path) => ({
    kind: "path-probe",
    id: `path:${path}`,
    label: `/${path.replace(/^\/+/, "")}`,
    path,
    timeoutMs,
  }));
}

export interface HeaderProbeOptions {
  /** Defaults to plain HTTP on the target host. */
  urlTemplate?: string;
  /** Defaults to HTTPS on the target host; `null` disables the fallback. */
  fallbackUrlTemplate?: string | null;
  timeoutMs?: number;
}

export function headerProbe(options: HeaderProbeOptions = {}): HeaderFetchSpec {
  const fallback = options.fallbackUrlTemplate === undefined ? "https://{}/" : options.fallbackUrlTemplate;
  return {
    kind: "header-fetch",
    id: "headers",
    label: "Web server",
    urlTemplate: options.urlTemplate ?? "http://{}/",
    fallbackUrlTemplate: fallback ?? undefined,
    timeoutMs: options.timeoutMs,
  };
}

/* ------------------------------------------------------------------ */
/*  Per-tool defaults                                                  */
/* ------------------------------------------------------------------ */

export const TOOL_DEFAULTS = {
  user: { concurrency: 10, timeoutMs: 10_000 },
  info: { concurrency: 10, portTimeoutMs: 1_000 + BANNER_WAIT_MS, headerTimeoutMs: 5_000 },
  recon: { portConcurrency: 20, portTimeoutMs: 2_000, pathConcurrency: 10, pathTimeoutMs: 5_000, headerTimeoutMs: 10_000 },
} as const;

import { setTimeout as sleep } from "node:timers/promises";
import {
  INFO_PORTS,
  ScanSession,
  TOOL_DEFAULTS,
  headerProbe,
  logger,
  normalizeHost,
  portProbes,
  resolveHost,
  reverseLookup,
  type ExecutorRegistry,
  type GeoInfo,
  type Resolution,
  type ScanReport,
} from "@probekit/engine";
import {
  formatBanner,
  formatFinalSummary,
  formatGeolocation,
  formatHeader,
  formatJson,
  formatPortTable,
  formatStatus,
  formatWebServer,
  mark,
  painter,
  toJsonReport,
  type Paint,
} from "../formatter.js";
import { promptUser } from "../prompt.js";
import { cancelOnInterrupt } from "../interrupt.js";
import type { RunSettings } from "../settings.js";

export const DEFAULT_INTERVAL_S = 30;
export const MIN_INTERVAL_S = 5;
/** Monitored when the prompt is left empty. */
export const FALLBACK_HOST = "example.com";

export interface ServerSnapshot {
  hostname: string;
  ip: string;
  addresses: string[];
  reverseDns: string | null;
  geo: GeoInfo | null;
  ports: ScanReport;
  web: ScanReport;
  /** Any port open or any HTTP answer. */
  responsive: boolean;
  timestamp: string;
}

export type GatherResult = { ok: true; snapshot: ServerSnapshot } | { ok: false; hostname: string; error: string };

export interface GatherDeps {
  resolve?: (hostname: string) => Promise<Resolution>;
  reverse?: (ip: string) => Promise<string | null>;
  executors?: Partial<ExecutorRegistry>;
}

/** One information-gathering pass over `hostname`. */
export async function gatherServerInfo(
  session: ScanSession,
  hostname: string,
  settings: RunSettings,
  deps: GatherDeps = {},
): Promise<GatherResult> {
  const resolution = await (deps.resolve ?? resolveHost)(hostname);
  if (!resolution.resolved) return { ok: false, hostname, error: resolution.error };

  const ip = resolution.primaryIp;
  session.recordAddress(ip);

  const scanOptions = {
    concurrency: settings.concurrency ?? TOOL_DEFAULTS.info.concurrency,
    userAgent: settings.userAgent,
    executors: deps.executors,
  };

  const [reverseDns, geo, ports, web] = await Promise.all([
    (deps.reverse ?? reverseLookup)(ip),
    session.geolocate(ip),
    session.scan(ip, portProbes(INFO_PORTS, { banner: true }), {
      ...scanOptions,
      timeoutMs: settings.timeoutMs ?? TOOL_DEFAULTS.info.portTimeoutMs,
    }),
    session.scan(ip, [headerProbe()], {
      ...scanOptions,
      timeoutMs: settings.timeoutMs ?? TOOL_DEFAULTS.info.headerTimeoutMs,
    }),
  ]);

  return {
    ok: true,
    snapshot: {
      hostname,
      ip,
      addresses: resolution.addresses,
      reverseDns,
      geo,
      ports,
      web,
      responsive: ports.counts.present > 0 || web.counts.present > 0,
      timestamp: new Date().toISOString(),
    },
  };
}

export function formatSnapshot(snapshot: ServerSnapshot, c: Paint): string {
  const lines = [
    mark.success(`Primary IP: ${snapshot.ip}`, c),
  ];
  if (snapshot.addresses.length > 1) lines.push(mark.info(`All IPs: ${snapshot.addresses.join(", ")}`, c));
  lines.push(
    snapshot.responsive
      ? mark.success("Server responsive: Yes", c)
      : mark.error("Server responsive: No", c),
  );
  if (snapshot.reverseDns) lines.push(mark.info(`Reverse DNS: ${snapshot.reverseDns}`, c));
  lines.push(formatGeolocation(snapshot.geo, c));
  lines.push("", mark.info("Common ports:", c), formatPortTable(snapshot.ports, c));
  lines.push("", mark.info("Web services:", c), formatWebServer(snapshot.web.results[0], c));
  return lines.join("\n");
}

function snapshotJson(result: GatherResult): Record<string, unknown> {
  if (!result.ok) return { hostname: result.hostname, error: result.error };
  const { snapshot } = result;
  return {
    ...snapshot,
    ports: toJsonReport(snapshot.ports),
    web: toJsonReport(snapshot.web),
  };
}

/** Wait `ms`, returning early when `signal` aborts. */
export async function pause(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

export interface InfoOptions {
  hostname?: string;
  /** Seconds between cycles. */
  interval?: number;
  /** Stop after one cycle. */
  once?: boolean;
  settings: RunSettings;
  write?: (text: string) => void;
  session?: ScanSession;
  deps?: GatherDeps;
}

/** Monitor `hostname` until Ctrl+C (or after one cycle with `once`). */
export async function runInfo(options: InfoOptions): Promise<number> {
  const { settings } = options;
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const c = painter(settings.color);
  const table = settings.format === "table";

  let raw = options.hostname ?? (await promptUser("Hostname: "));
  if (!raw.trim()) {
    logger.warn(`No hostname provided. Using '${FALLBACK_HOST}' as default.`);
    raw = FALLBACK_HOST;
  }
  const hostname = normalizeHost(raw);

  let interval = options.interval ?? DEFAULT_INTERVAL_S;
  if (interval < MIN_INTERVAL_S) {
    logger.warn(`Interval too short. Using minimum of ${MIN_INTERVAL_S} seconds.`);
    interval = MIN_INTERVAL_S;
  }

  const session = options.session ?? new ScanSession();
  const restore = cancelOnInterrupt(session);

  if (table) {
    write(formatBanner("PROBEKIT INFO", "Server information gatherer", c));
    write(mark.note(`Monitoring ${hostname} every ${interval} seconds`, c));
  }

  try {
    while (session.running) {
      if (table) write(formatHeader(`Scan at: ${new Date().toISOString()}`, c));

      const result = await gatherServerInfo(session, hostname, settings, options.deps);
      if (!session.running) break;
      const cycle = session.recordCycle();

      if (!table) {
        write(formatJson(snapshotJson(result)));
      } else if (result.ok) {
        write(formatSnapshot(result.snapshot, c));
      } else {
        write(mark.error(`Error: ${result.error}`, c));
      }

      if (table && cycle % 3 === 0) {
        write(formatStatus({
          running: session.running,
          scanCount: session.scanCount,
          uniqueServers: session.uniqueAddresses.length,
        }, c));
      }

      if (options.once) break;
      if (table) write(mark.note(`Next scan in ${interval} seconds...`, c));
      await pause(interval * 1000, session.signal);
    }
  } finally {
    restore();
  }

  if (table) {
    write(formatHeader("Server Information Gatherer Stopped", c));
    write(formatFinalSummary({
      scanCount: session.scanCount,
      servers: session.uniqueAddresses.map((ip) => ({
        ip,
        country: session.cachedGeolocation(ip)?.country ?? "Unknown",
      })),
      geolocationQueries: session.geolocationQueries,
    }, c));
  }
  return 0;
}

import {
  ScanSession,
  TOOL_DEFAULTS,
  headerProbe,
  normalizeBaseUrl,
  parseRobots,
  pathProbes,
  portProbes,
  resolveHost,
  type ExecutorRegistry,
  type Resolution,
  type RobotsRule,
  type ScanReport,
} from "@probekit/engine";
import {
  INTERESTING_HEADERS,
  formatBanner,
  formatFoundPath,
  formatHeader,
  formatJson,
  formatOpenPort,
  formatRobotsRules,
  mark,
  painter,
  toJsonReport,
} from "../formatter.js";
import { promptUser } from "../prompt.js";
import { cancelOnInterrupt } from "../interrupt.js";
import type { RunSettings } from "../settings.js";

export interface ReconOptions {
  target?: string;
  settings: RunSettings;
  write?: (text: string) => void;
  session?: ScanSession;
  resolve?: (hostname: string) => Promise<Resolution>;
  executors?: Partial<ExecutorRegistry>;
}

export interface ReconResult {
  target: string;
  hostname: string;
  ip: string | null;
  server: ScanReport;
  ports?: ScanReport;
  robots?: ScanReport;
  robotsRules: RobotsRule[];
  paths?: ScanReport;
  interrupted: boolean;
  durationMs: number;
}

/** robots.txt rules from a finished single-probe report; empty when absent. */
export function robotsRulesFrom(report: ScanReport): RobotsRule[] {
  const outcome = report.results[0]?.outcome;
  if (!outcome || outcome.kind !== "body" || outcome.status !== 200) return [];
  return parseRobots(outcome.body);
}

/** Server headers, ports, robots.txt and hidden paths for one web target. */
export async function runRecon(options: ReconOptions): Promise<number> {
  const { settings } = options;
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const c = painter(settings.color);
  const table = settings.format === "table";
  const say = (text: string): void => {
    if (table) write(text);
  };

  const base = normalizeBaseUrl(options.target ?? (await promptUser("Target server (domain or IP): ")));

  say(formatBanner("PROBEKIT RECON", "Web & server reconnaissance", c));
  say(mark.warning("Only scan servers you own or have permission to test.", c));
  if (base.prefixed) say(mark.warning(`Added http:// prefix. Using: ${base.url}`, c));
  say(mark.info(`Starting reconnaissance on: ${base.url}`, c));

  const session = options.session ?? new ScanSession();
  const restore = cancelOnInterrupt(session);
  const startedAt = Date.now();
  const common = { userAgent: settings.userAgent, executors: options.executors };

  try {
    // Server & DNS
    say(formatHeader("SERVER & DNS INFORMATION", c));
    const resolution = await (options.resolve ?? resolveHost)(base.hostname);
    const ip = resolution.resolved ? resolution.primaryIp : null;
    if (resolution.resolved) say(mark.success(`IP Address: ${resolution.primaryIp}`, c));
    else say(mark.error(resolution.error, c));

    const server = await session.scan(base.url, [headerProbe({ urlTemplate: base.url, fallbackUrlTemplate: null })], {
      ...common,
      timeoutMs: settings.timeoutMs ?? TOOL_DEFAULTS.recon.headerTimeoutMs,
    });
    const first = server.results[0];
    if (first && (first.outcome.kind === "status" || first.outcome.kind === "body")) {
      say(mark.success(`HTTP Status: ${first.outcome.status}`, c));
      say(mark.success(`Server Software: ${first.outcome.headers["server"] ?? "Not Found"}`, c));
      for (const header of INTERESTING_HEADERS) {
        const value = first.outcome.headers[header];
        if (value !== undefined) say(mark.info(`${header}: ${value}`, c));
      }
    } else if (first) {
      say(mark.warning(`Initial connection failed: ${first.verdict.reason}`, c));
    }

    const result: ReconResult = {
      target: base.url,
      hostname: base.hostname,
      ip,
      server,
      robotsRules: [],
      interrupted: false,
      durationMs: 0,
    };

    // Ports
    if (session.running) {
      const ports = settings.config.ports;
      say(formatHeader("PORT SCAN RESULTS", c));
      say(mark.info(`Scanning ${ports.length} common ports on ${base.hostname}...`, c));
      result.ports = await session.scan(base.hostname, portProbes(ports), {
        ...common,
        concurrency: settings.concurrency ?? TOOL_DEFAULTS.recon.portConcurrency,
        timeoutMs: settings.timeoutMs ?? TOOL_DEFAULTS.recon.portTimeoutMs,
        onResult: (r) => {
          if (r.verdict.status === "present") say(formatOpenPort(r, c));
        },
      });
      const open = result.ports.counts.present;
      say(open > 0 ? mark.success(`Found ${open} open ports`, c) : mark.info("No common open ports found.", c));
    }

    // robots.txt
    if (session.running) {
      say(formatHeader("ROBOTS.TXT ANALYSIS", c));
      result.robots = await session.scan(base.url, pathProbes(["/robots.txt"]), {
        ...common,
        timeoutMs: settings.timeoutMs ?? TOOL_DEFAULTS.recon.pathTimeoutMs,
      });
      result.robotsRules = robotsRulesFrom(result.robots);
      const robotsFound = result.robots.results[0]?.outcome;
      if (robotsFound && robotsFound.kind === "body" && robotsFound.status === 200) {
        say(mark.success("robots.txt found!", c));
        if (result.robotsRules.length > 0) say(formatRobotsRules(result.robotsRules));
      } else {
        say(mark.info("No robots.txt found or not accessible", c));
      }
    }

    // Hidden paths
    if (session.running) {
      const paths = settings.config.paths;
      say(formatHeader("HIDDEN PATH DISCOVERY", c));
      say(mark.info(`Checking ${paths.length} common hidden paths...`, c));
      result.paths = await session.scan(base.url, pathProbes(paths), {
        ...common,
        concurrency: settings.concurrency ?? TOOL_DEFAULTS.recon.pathConcurrency,
        timeoutMs: settings.timeoutMs ?? TOOL_DEFAULTS.recon.pathTimeoutMs,
        onResult: (r) => {
          if (r.verdict.status === "present") say(formatFoundPath(r, c));
        },
      });
      const found = result.paths.counts.present;
      say(found > 0
        ? mark.success(`Found ${found} accessible hidden paths!`, c)
        : mark.info("No common hidden paths found.", c));
    }

    session.recordCycle();
    result.interrupted = !session.running;
    result.durationMs = Date.now() - startedAt;

    if (!table) {
      write(formatJson({
        ...result,
        server: toJsonReport(result.server),
        ports: result.ports && toJsonReport(result.ports),
        robots: result.robots && toJsonReport(result.robots),
        paths: result.paths && toJsonReport(result.paths),
      }));
    } else if (result.interrupted) {
      say(mark.error("Scan interrupted by user", c));
    } else {
      const seconds = (result.durationMs / 1000).toFixed(2);
      say(formatHeader("RECONNAISSANCE COMPLETE", c));
      say(mark.success(`All tasks finished in ${seconds} seconds!`, c));
      say(`\nSummary Report:\n  Target: ${base.url}\n  Hostname: ${base.hostname}\n  Scan duration: ${seconds} seconds`);
    }

    return result.interrupted ? 130 : 0;
  } finally {
    restore();
  }
}

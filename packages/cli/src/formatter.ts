import type { GeoInfo, ProbeResult, RobotsRule, ScanReport } from "@probekit/engine";

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const WHITE = "\x1b[37m";

export type Paint = (color: string, text: string) => string;

export function painter(enabled: boolean): Paint {
  return enabled ? (color, text) => `${color}${text}${RESET}` : (_color, text) => text;
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(2);
}

/* ------------------------------------------------------------------ */
/*  Shared pieces                                                      */
/* ------------------------------------------------------------------ */

export function formatBanner(title: string, subtitle: string, c: Paint): string {
  const width = 58;
  const center = (s: string) => {
    const pad = Math.max(0, width - s.length);
    return " ".repeat(Math.floor(pad / 2)) + s + " ".repeat(Math.ceil(pad / 2));
  };
  return [
    "",
    c(CYAN, `  ╔${"═".repeat(width)}╗`),
    c(CYAN, "  ║") + c(BOLD, center(title)) + c(CYAN, "║"),
    c(CYAN, "  ║") + c(DIM, center(subtitle)) + c(CYAN, "║"),
    c(CYAN, `  ╚${"═".repeat(width)}╝`),
    "",
  ].join("\n");
}

export function formatHeader(title: string, c: Paint): string {
  return `\n${c(CYAN, "=".repeat(60))}\n${c(BOLD, title)}\n${c(CYAN, "=".repeat(60))}`;
}

export const mark = {
  success: (msg: string, c: Paint) => c(GREEN, `[+] ${msg}`),
  warning: (msg: string, c: Paint) => c(YELLOW, `[!] ${msg}`),
  error: (msg: string, c: Paint) => c(RED, `[-] ${msg}`),
  info: (msg: string, c: Paint) => c(BLUE, `[*] ${msg}`),
  note: (msg: string, c: Paint) => c(YELLOW, `[*] ${msg}`),
};

/* ------------------------------------------------------------------ */
/*  user                                                               */
/* ------------------------------------------------------------------ */

export function formatAccountResult(result: ProbeResult, c: Paint): string {
  const { spec, outcome, verdict } = result;
  switch (verdict.status) {
    case "present": {
      const url = outcome.kind === "body" || outcome.kind === "status" ? outcome.url : "";
      return `${c(GREEN, "[ FOUND ]")} ${c(BOLD, spec.label)}\n     ${c(CYAN, "URL:")} ${c(WHITE, url)}`;
    }
    case "absent":
      return `${c(RED, "[ NOT FOUND ]")} ${c(BOLD, spec.label)}`;
    case "indeterminate":
      return `${c(YELLOW, "[ ERROR ]")} ${c(BOLD, spec.label)} ${c(DIM, verdict.reason)}`;
  }
}

export function formatUserSummary(username: string, report: ScanReport, c: Paint): string {
  const lines = [
    "",
    c(GREEN, `[+] Scan completed in ${seconds(report.durationMs)} seconds`),
    c(GREEN, `[+] Found ${report.counts.present} accounts for '${username}'`),
  ];
  if (report.counts.indeterminate > 0) {
    lines.push(c(YELLOW, `[!] ${report.counts.indeterminate} platforms could not be checked`));
  }
  if (!report.complete) {
    lines.push(c(YELLOW, `[!] Scan interrupted: ${report.received}/${report.expected} platforms checked`));
  }
  return lines.join("\n");
}

/* ------------------------------------------------------------------ */
/*  Ports / paths                                                      */
/* ------------------------------------------------------------------ */

export function formatOpenPort(result: ProbeResult, c: Paint): string {
  const banner = result.outcome.kind === "connected" && result.outcome.banner
    ? ` - ${result.outcome.banner.split("\n")[0].trim().slice(0, 50)}`
    : "";
  return c(GREEN, `[+] ${result.spec.label} is OPEN`) + banner;
}

export function formatFoundPath(result: ProbeResult, c: Paint): string {
  const { outcome } = result;
  if (outcome.kind !== "body" && outcome.kind !== "status") {
    return mark.success(`Found: ${result.spec.label}`, c);
  }
  const statusColor = outcome.status === 200 ? GREEN : YELLOW;
  const size = outcome.bytes === undefined ? "unknown" : `${outcome.bytes} bytes`;
  return `${c(GREEN, `[+] Found: ${outcome.url}`)} (Status: ${c(statusColor, String(outcome.status))}, Size: ${size})`;
}

/* ------------------------------------------------------------------ */
/*  info                                                               */
/* ------------------------------------------------------------------ */

function box(title: string, rows: string[], c: Paint): string {
  const width = 52;
  const top = `    ┌─ ${title} ${"─".repeat(Math.max(0, width - title.length - 3))}┐`;
  const body = rows.map((r) => `    │ ${r.padEnd(width - 2).slice(0, width - 2)} │`);
  const bottom = `    └${"─".repeat(width)}┘`;
  return [c(CYAN, top), ...body, c(CYAN, bottom)].join("\n");
}

export function formatGeolocation(geo: GeoInfo | null, c: Paint): string {
  if (!geo) return "    Geolocation data unavailable";
  return box("Geolocation Information", [
    `Country: ${geo.country}`,
    `Region: ${geo.region}`,
    `City: ${geo.city}`,
    `ISP: ${geo.isp}`,
    `Organization: ${geo.org}`,
    `AS: ${geo.as}`,
  ], c);
}

export function formatPortTable(report: ScanReport, c: Paint): string {
  const open = report.results.filter((r) => r.verdict.status === "present");
  if (open.length === 0) return "    No common ports open";
  const rows = open.map((r) => {
    const banner = r.outcome.kind === "connected" && r.outcome.banner
      ? ` - ${r.outcome.banner.split("\n")[0].trim().slice(0, 50)}`
      : "";
    return `${r.spec.label}${banner}`;
  });
  return box("Open Ports & Services", rows, c);
}

export function formatWebServer(result: ProbeResult | undefined, c: Paint): string {
  const outcome = result?.outcome;
  if (!outcome || (outcome.kind !== "body" && outcome.kind !== "status")) {
    return "    HTTP/HTTPS not accessible";
  }
  const protocol = outcome.url.startsWith("https:") ? "HTTPS" : "HTTP";
  return box("Web Server Information", [
    `Protocol: ${protocol}`,
    `Status: ${outcome.status}`,
    `Server: ${outcome.headers["server"] ?? "Unknown"}`,
  ], c);
}

export interface SessionStatus {
  running: boolean;
  scanCount: number;
  uniqueServers: number;
}

export function formatStatus(status: SessionStatus, c: Paint): string {
  return box("TOOL STATUS", [
    `Running: ${status.running ? "YES" : "NO"}`,
    `Servers Scanned: ${status.scanCount}`,
    `Unique Servers: ${status.uniqueServers}`,
    "Press Ctrl+C to stop",
  ], c);
}

export interface FinalSummary {
  scanCount: number;
  servers: Array<{ ip: string; country: string }>;
  geolocationQueries: number;
}

export function formatFinalSummary(summary: FinalSummary, c: Paint): string {
  const lines = [
    c(CYAN, `  ╔${"═".repeat(58)}╗`),
    c(CYAN, "  ║") + c(BOLD, "FINAL SUMMARY".padStart(35).padEnd(58)) + c(CYAN, "║"),
    c(CYAN, `  ╚${"═".repeat(58)}╝`),
    `  Total Scans Performed: ${summary.scanCount}`,
    `  Unique Servers Found:  ${summary.servers.length}`,
    `  Geolocation Queries:   ${summary.geolocationQueries}`,
  ];
  if (summary.servers.length > 0) {
    lines.push("  Monitored Servers:");
    summary.servers.forEach((s, i) => lines.push(`    ${i + 1}. ${s.ip} (${s.country})`));
  }
  return lines.join("\n");
}

/* ------------------------------------------------------------------ */
/*  recon                                                              */
/* ------------------------------------------------------------------ */

export const INTERESTING_HEADERS = [
  "x-powered-by",
  "x-frame-options",
  "content-type",
  "content-length",
  "cache-control",
  "x-content-type-options",
] as const;

export function formatRobotsRules(rules: RobotsRule[]): string {
  return rules.map((r) => `  ${r.directive}: ${r.path}`).join("\n");
}

/* ------------------------------------------------------------------ */
/*  JSON                                                               */
/* ------------------------------------------------------------------ */

export interface JsonProbe {
  id: string;
  label: string;
  status: string;
  reason: string;
  elapsedMs: number;
  url?: string;
  httpStatus?: number;
  bytes?: number;
  banner?: string;
}

/** Report without response bodies, for `--format json`. */
export function toJsonReport(report: ScanReport): Record<string, unknown> {
  const probes: JsonProbe[] = report.results.map(({ spec, outcome, verdict }) => {
    const entry: JsonProbe = {
      id: spec.id,
      label: spec.label,
      status: verdict.status,
      reason: verdict.reason,
      elapsedMs: outcome.elapsedMs,
    };
    if (outcome.kind === "body" || outcome.kind === "status") {
      entry.url = outcome.url;
      entry.httpStatus = outcome.status;
      if (outcome.bytes !== undefined) entry.bytes = outcome.bytes;
    }
    if (outcome.kind === "connected" && outcome.banner) entry.banner = outcome.banner;
    return entry;
  });

  return {
    target: report.target,
    complete: report.complete,
    expected: report.expected,
    received: report.received,
    counts: report.counts,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    durationMs: report.durationMs,
    probes,
  };
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

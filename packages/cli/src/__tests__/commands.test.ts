import { describe, it, expect, vi, afterEach } from "vitest";
import {
  DEFAULT_CONFIG,
  PLATFORMS,
  ScanInputError,
  ScanSession,
  type ExecutorRegistry,
  type GeoInfo,
  type ProbekitConfig,
  type Resolution,
} from "@probekit/engine";
import { runUser } from "../commands/user.js";
import { runInfo, pause, type GatherDeps } from "../commands/info.js";
import { runRecon } from "../commands/recon.js";
import type { RunSettings } from "../settings.js";

const geo: GeoInfo = {
  country: "Testland",
  region: "North",
  city: "Sampleton",
  isp: "Example ISP",
  org: "Example Org",
  as: "AS64500",
};

function settings(overrides: Partial<RunSettings> = {}, config: Partial<ProbekitConfig> = {}): RunSettings {
  return {
    userAgent: "probe-test/1.0",
    format: "table",
    color: false,
    config: { ...DEFAULT_CONFIG, ...config },
    ...overrides,
  };
}

function capture(): { write: (text: string) => void; lines: () => string[]; text: () => string } {
  const out: string[] = [];
  return {
    write: (text) => out.push(text),
    lines: () => out.join("\n").split("\n"),
    text: () => out.join("\n"),
  };
}

function row(text: string): string {
  return `    │ ${text.padEnd(50)} │`;
}

function session(): ScanSession {
  return new ScanSession({ geoLookup: async () => geo });
}

afterEach(() => {
  vi.restoreAllMocks();
});

/* ------------------------------------------------------------------ */
/*  user                                                               */
/* ------------------------------------------------------------------ */

describe("runUser", () => {
  const kept = new Set(["GitHub", "Reddit", "VK"]);
  const config = { disable_platforms: PLATFORMS.map((p) => p.name).filter((n) => !kept.has(n)) };

  const executors: Partial<ExecutorRegistry> = {
    "http-existence": async (spec, ctx) => {
      const url = spec.urlTemplate.replace("{}", ctx.target);
      if (spec.label === "Reddit") throw new Error("socket hang up");
      const found = spec.label === "GitHub";
      const body = found ? "<h1>alice</h1>" : "not here";
      return { kind: "body", url, status: found ? 200 : 404, headers: {}, body, bytes: body.length };
    },
  };

  it("prints one line per platform and a summary", async () => {
    const out = capture();
    const code = await runUser({
      username: " alice ",
      settings: settings({}, config),
      write: out.write,
      session: session(),
      executors,
    });

    expect(code).toBe(0);
    const lines = out.lines();
    expect(lines).toContain("[*] Searching for username: alice");
    expect(lines).toContain("[*] Scanning 3 platforms...");
    expect(out.text()).toContain("[ FOUND ] GitHub\n     URL: https://github.com/alice");
    expect(lines).toContain("[ NOT FOUND ] VK");
    expect(lines).toContain("[ ERROR ] Reddit Error: socket hang up");
    expect(lines).toContain("[+] Found 1 accounts for 'alice'");
    expect(lines).toContain("[!] 1 platforms could not be checked");
  });

  it("prints a single JSON document in json mode", async () => {
    const out = capture();
    await runUser({
      username: "alice",
      settings: settings({ format: "json" }, config),
      write: out.write,
      session: session(),
      executors,
    });

    const json: unknown = JSON.parse(out.text());
    expect(json).toMatchObject({
      target: "alice",
      complete: true,
      expected: 3,
      counts: { present: 1, absent: 1, indeterminate: 1 },
    });
  });

  it("rejects invalid usernames before probing", async () => {
    await expect(runUser({ username: "not valid!", settings: settings(), write: () => {}, executors }))
      .rejects.toBeInstanceOf(ScanInputError);
  });

  it("exits with 130 when cancelled", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const cancelled = session();
    cancelled.cancel();
    const code = await runUser({ username: "alice", settings: settings({}, config), write: () => {}, session: cancelled, executors });
    expect(code).toBe(130);
  });
});

/* ------------------------------------------------------------------ */
/*  info                                                               */
/* ------------------------------------------------------------------ */

const resolved: Resolution = {
  resolved: true,
  hostname: "example.test",
  primaryIp: "192.0.2.10",
  addresses: ["192.0.2.10", "2001:db8::10"],
};

const infoDeps: GatherDeps = {
  resolve: async () => resolved,
  reverse: async () => "host.example.test",
  executors: {
    "tcp-connect": async (spec) => {
      if (spec.port === 22) return { kind: "connected", banner: "SSH-2.0-OpenSSH_9.6" };
      if (spec.port === 80) return { kind: "connected" };
      throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
    },
    "header-fetch": async () => ({
      kind: "status",
      url: "http://192.0.2.10/",
      status: 200,
      headers: { server: "nginx" },
    }),
  },
};

describe("runInfo", () => {
  it("prints one snapshot and the final summary with --once", async () => {
    const out = capture();
    const code = await runInfo({
      hostname: "Example.TEST",
      once: true,
      settings: settings(),
      write: out.write,
      session: session(),
      deps: infoDeps,
    });

    expect(code).toBe(0);
    const lines = out.lines();
    expect(lines).toContain("[*] Monitoring example.test every 30 seconds");
    expect(lines).toContain("[+] Primary IP: 192.0.2.10");
    expect(lines).toContain("[*] All IPs: 192.0.2.10, 2001:db8::10");
    expect(lines).toContain("[+] Server responsive: Yes");
    expect(lines).toContain("[*] Reverse DNS: host.example.test");
    expect(lines).toContain(row("Country: Testland"));
    expect(lines).toContain(row("Port 22 (SSH) - SSH-2.0-OpenSSH_9.6"));
    expect(lines).toContain(row("Port 80 (HTTP)"));
    expect(lines).toContain(row("Protocol: HTTP"));
    expect(lines).toContain(row("Server: nginx"));
    expect(lines).toContain("  Total Scans Performed: 1");
    expect(lines).toContain("    1. 192.0.2.10 (Testland)");
  });

  it("clamps short intervals and falls back to the default host", async () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const out = capture();
    await runInfo({ hostname: "  ", interval: 1, once: true, settings: settings(), write: out.write, session: session(), deps: infoDeps });

    const warnings = stderrSpy.mock.calls.map((c) => String(c[0]));
    expect(warnings).toContain("[probekit] No hostname provided. Using 'example.com' as default.\n");
    expect(warnings).toContain("[probekit] Interval too short. Using minimum of 5 seconds.\n");
    expect(out.lines()).toContain("[*] Monitoring example.com every 5 seconds");
  });

  it("reports resolution failures and keeps going", async () => {
    const out = capture();
    const code = await runInfo({
      hostname: "nope.test",
      once: true,
      settings: settings(),
      write: out.write,
      session: session(),
      deps: {
        ...infoDeps,
        resolve: async () => ({ resolved: false, hostname: "nope.test", error: "DNS resolution failed: ENOTFOUND" }),
      },
    });

    expect(code).toBe(0);
    expect(out.lines()).toContain("[-] Error: DNS resolution failed: ENOTFOUND");
    expect(out.lines()).toContain("  Unique Servers Found:  0");
  });

  it("stops waiting for the next cycle when cancelled", async () => {
    const monitor = session();
    const out: string[] = [];
    const code = await runInfo({
      hostname: "example.test",
      interval: 60,
      settings: settings(),
      write: (text) => {
        out.push(text);
        if (text.startsWith("[*] Next scan in")) monitor.cancel();
      },
      session: monitor,
      deps: infoDeps,
    });

    expect(code).toBe(0);
    expect(monitor.scanCount).toBe(1);
    expect(out).toContain("[*] Next scan in 60 seconds...");
    expect(out.join("\n")).toContain("Server Information Gatherer Stopped");
  });

  it("emits one JSON document per cycle", async () => {
    const out = capture();
    await runInfo({ hostname: "example.test", once: true, settings: settings({ format: "json" }), write: out.write, session: session(), deps: infoDeps });

    const json: unknown = JSON.parse(out.text());
    expect(json).toMatchObject({
      hostname: "example.test",
      ip: "192.0.2.10",
      reverseDns: "host.example.test",
      responsive: true,
      geo: { country: "Testland" },
      ports: { counts: { present: 2, absent: 8, indeterminate: 0 } },
    });
  });
});

describe("pause", () => {
  it("returns early once the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);
    await pause(5_000, controller.signal);
    expect(Date.now() - started).toBeLessThan(2_000);
  });
});

/* ------------------------------------------------------------------ */
/*  recon                                                              */
/* ------------------------------------------------------------------ */

const reconExecutors: Partial<ExecutorRegistry> = {
  "header-fetch": async (spec) => ({
    kind: "status",
    url: spec.urlTemplate,
    status: 200,
    headers: { server: "Apache", "x-powered-by": "PHP/8.3", "content-type": "text/html" },
  }),
  "tcp-connect": async (spec) => {
    if (spec.port === 80 || spec.port === 443) return { kind: "connected" };
    throw Object.assign(new Error("connect ECONNREFUSED"), { code: "ECONNREFUSED" });
  },
  "path-probe": async (spec, ctx) => {
    const url = new URL(spec.path, ctx.target).toString();
    const pages: Record<string, [number, string]> = {
      "/robots.txt": [200, "User-agent: *\nDisallow: /private\n"],
      admin: [403, "no"],
    };
    const [status, body] = pages[spec.path] ?? [404, "not found"];
    return { kind: "body", url, status, headers: {}, body, bytes: body.length };
  },
};

const reconConfig = { ports: [22, 80, 443], paths: ["admin", ".git", "backup"] };
const resolveRecon = async (hostname: string): Promise<Resolution> => ({
  resolved: true,
  hostname,
  primaryIp: "192.0.2.20",
  addresses: ["192.0.2.20"],
});

describe("runRecon", () => {
  it("runs every section against the target", async () => {
    const out = capture();
    const code = await runRecon({
      target: "example.test",
      settings: settings({}, reconConfig),
      write: out.write,
      session: session(),
      resolve: resolveRecon,
      executors: reconExecutors,
    });

    expect(code).toBe(0);
    const lines = out.lines();
    expect(lines).toContain("[!] Only scan servers you own or have permission to test.");
    expect(lines).toContain("[!] Added http:// prefix. Using: http://example.test/");
    expect(lines).toContain("[+] IP Address: 192.0.2.20");
    expect(lines).toContain("[+] HTTP Status: 200");
    expect(lines).toContain("[+] Server Software: Apache");
    expect(lines).toContain("[*] x-powered-by: PHP/8.3");
    expect(lines).toContain("[*] content-type: text/html");
    expect(lines).toContain("[+] Port 80 (HTTP) is OPEN");
    expect(lines).toContain("[+] Port 443 (HTTPS) is OPEN");
    expect(lines).toContain("[+] Found 2 open ports");
    expect(lines).toContain("[+] robots.txt found!");
    expect(lines).toContain("  Disallow: /private");
    expect(lines).toContain("[+] Found: http://example.test/admin (Status: 403, Size: 2 bytes)");
    expect(lines).toContain("[+] Found 1 accessible hidden paths!");
    expect(lines).toContain("  Target: http://example.test/");
    expect(lines.some((l) => /^\[\+\] All tasks finished in \d+\.\d{2} seconds!$/.test(l))).toBe(true);
  });

  it("keeps an explicit scheme without a warning", async () => {
    const out = capture();
    await runRecon({
      target: "https://example.test",
      settings: settings({}, reconConfig),
      write: out.write,
      session: session(),
      resolve: resolveRecon,
      executors: reconExecutors,
    });
    expect(out.lines()).toContain("[*] Starting reconnaissance on: https://example.test/");
    expect(out.text()).not.toContain("Added http:// prefix");
  });

  it("emits the whole result as JSON", async () => {
    const out = capture();
    await runRecon({
      target: "http://example.test",
      settings: settings({ format: "json" }, reconConfig),
      write: out.write,
      session: session(),
      resolve: resolveRecon,
      executors: reconExecutors,
    });

    const json: unknown = JSON.parse(out.text());
    expect(json).toMatchObject({
      target: "http://example.test/",
      hostname: "example.test",
      ip: "192.0.2.20",
      robotsRules: [{ directive: "Disallow", path: "/private" }],
      ports: { counts: { present: 2, absent: 1, indeterminate: 0 } },
      paths: { counts: { present: 1, absent: 2, indeterminate: 0 } },
      interrupted: false,
    });
  });

  it("rejects non-HTTP targets", async () => {
    await expect(runRecon({ target: "ftp://example.test", settings: settings(), write: () => {} }))
      .rejects.toBeInstanceOf(ScanInputError);
  });

  it("exits with 130 when interrupted", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const cancelled = session();
    cancelled.cancel();
    const out = capture();
    const code = await runRecon({
      target: "example.test",
      settings: settings({}, reconConfig),
      write: out.write,
      session: cancelled,
      resolve: resolveRecon,
      executors: reconExecutors,
    });
    expect(code).toBe(130);
    expect(out.lines()).toContain("[-] Scan interrupted by user");
  });
});

import { describe, it, expect } from "vitest";
import {
  PLATFORMS,
  INFO_PORTS,
  RECON_PORTS,
  HIDDEN_PATHS,
  headerProbe,
  pathProbes,
  platformProbes,
  portProbes,
  TOOL_DEFAULTS,
  serviceName,
} from "../catalog.js";
import { BANNER_WAIT_MS } from "../probes/tcp.js";

describe("built-in tables", () => {
  it("loads every platform with a URL template", () => {
    expect(PLATFORMS).toHaveLength(15);
    for (const p of PLATFORMS) expect(p.url).toContain("{}");
    expect(PLATFORMS.find((p) => p.name === "GitHub")?.url).toBe("https://github.com/{}");
  });

  it("has no duplicate ports or paths", () => {
    expect(new Set(INFO_PORTS).size).toBe(INFO_PORTS.length);
    expect(new Set(RECON_PORTS).size).toBe(RECON_PORTS.length);
    expect(new Set(HIDDEN_PATHS).size).toBe(HIDDEN_PATHS.length);
    expect(HIDDEN_PATHS).toHaveLength(23);
  });

  it("gives info port scans a 1s connect plus the banner wait", () => {
    expect(BANNER_WAIT_MS).toBe(2_000);
    expect(TOOL_DEFAULTS.info.portTimeoutMs).toBe(3_000);
  });
});

describe("spec builders", () => {
  it("builds one existence probe per platform", () => {
    const specs = platformProbes();
    expect(specs).toHaveLength(15);
    expect(specs[0]).toEqual({
      kind: "http-existence",
      id: "platform:Facebook",
      label: "Facebook",
      urlTemplate: "https://www.facebook.com/{}",
      markers: ["content-login-button", "login_form"],
    });
  });

  it("labels ports with their service", () => {
    const [ssh, other] = portProbes([22, 12345], { banner: true, timeoutMs: 3_000 });
    expect(ssh).toMatchObject({
      id: "port:22",
      label: "Port 22 (SSH)",
      banner: true,
      bannerPayload: "SSH-2.0-Client\r\n",
      timeoutMs: 3_000,
    });
    expect(other.label).toBe("Port 12345 (Unknown)");
    expect(other.bannerPayload).toBeUndefined();
    expect(serviceName(3306)).toBe("MySQL");
  });

  it("omits banner payloads unless banners are requested", () => {
    expect(portProbes([80])[0].bannerPayload).toBeUndefined();
    expect(portProbes([80], { banner: true })[0].bannerPayload).toBe("HEAD / HTTP/1.0\r\n\r\n");
  });

  it("labels paths with a single leading slash", () => {
    expect(pathProbes(["admin", "/robots.txt"]).map((s) => [s.id, s.label])).toEqual([
      ["path:admin", "/admin"],
      ["path:/robots.txt", "/robots.txt"],
    ]);
  });

  it("defaults the header probe to http with an https fallback", () => {
    expect(headerProbe()).toMatchObject({ urlTemplate: "http://{}/", fallbackUrlTemplate: "https://{}/" });
    expect(headerProbe({ fallbackUrlTemplate: null }).fallbackUrlTemplate).toBeUndefined();
  });
});

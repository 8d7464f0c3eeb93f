import { describe, it, expect, afterEach } from "vitest";
import { createServer, type Server, type Socket } from "node:net";
import { tcpConnectExecutor, cleanBanner } from "../probes/tcp.js";
import { MalformedTargetError } from "../probes/failure.js";
import type { ProbeContext, TcpConnectSpec } from "../probes/types.js";

const servers: Server[] = [];

async function listen(onConnection: (socket: Socket) => void = () => {}): Promise<number> {
  const server = createServer((socket) => {
    // The probe may reset the connection; that is not a test failure.
    socket.on("error", () => socket.destroy());
    onConnection(socket);
  });
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("no address");
  return address.port;
}

async function closedPort(): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("no address");
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

function spec(port: number, extra: Partial<TcpConnectSpec> = {}): TcpConnectSpec {
  return { kind: "tcp-connect", id: `port:${port}`, label: `Port ${port}`, port, ...extra };
}

function ctx(timeoutMs = 2_000, signal: AbortSignal = AbortSignal.timeout(timeoutMs)): ProbeContext {
  return { target: "127.0.0.1", signal, timeoutMs, userAgent: "probe-test/1.0" };
}

afterEach(async () => {
  await Promise.all(servers.splice(0).map((s) => new Promise<void>((resolve) => s.close(() => resolve()))));
});

describe("tcpConnectExecutor", () => {
  it("reports an open port", async () => {
    const port = await listen((socket) => socket.end());
    expect(await tcpConnectExecutor(spec(port), ctx())).toEqual({ kind: "connected" });
  });

  it("captures a greeting banner", async () => {
    const port = await listen((socket) => socket.write("SSH-2.0-TestServer\r\n"));
    expect(await tcpConnectExecutor(spec(port, { banner: true }), ctx())).toEqual({
      kind: "connected",
      banner: "SSH-2.0-TestServer",
    });
  });

  it("sends the payload before reading the banner", async () => {
    const port = await listen((socket) => {
      socket.once("data", (chunk: Buffer) => {
        if (chunk.toString("utf-8").startsWith("HEAD /")) socket.end("HTTP/1.0 200 OK\r\nServer: test\r\n\r\n");
      });
    });
    const result = await tcpConnectExecutor(
      spec(port, { banner: true, bannerPayload: "HEAD / HTTP/1.0\r\n\r\n" }),
      ctx(),
    );
    expect(result).toEqual({ kind: "connected", banner: "HTTP/1.0 200 OK\r\nServer: test" });
  });

  it("stays open when a silent service sends no banner", async () => {
    const port = await listen();
    expect(await tcpConnectExecutor(spec(port, { banner: true }), ctx(300))).toEqual({ kind: "connected" });
  });

  it("rejects with ECONNREFUSED on a closed port", async () => {
    const port = await closedPort();
    await expect(tcpConnectExecutor(spec(port), ctx())).rejects.toMatchObject({ code: "ECONNREFUSED" });
  });

  it("rejects invalid ports before connecting", async () => {
    await expect(tcpConnectExecutor(spec(0), ctx())).rejects.toBeInstanceOf(MalformedTargetError);
    await expect(tcpConnectExecutor(spec(70_000), ctx())).rejects.toThrow("Invalid port 70000");
  });

  it("rejects immediately when the signal has fired", async () => {
    const port = await listen();
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    await expect(tcpConnectExecutor(spec(port), ctx(2_000, controller.signal))).rejects.toThrow("cancelled");
  });
});

describe("cleanBanner", () => {
  it("trims and caps the banner", () => {
    expect(cleanBanner("  hello \r\n")).toBe("hello");
    expect(cleanBanner("x".repeat(300))).toHaveLength(200);
    expect(cleanBanner(" \r\n")).toBeUndefined();
  });
});

import { describe, it, expect } from "vitest";
import { SingleFlightCache } from "../cache.js";
import { ResultChannel } from "../channel.js";

describe("SingleFlightCache", () => {
  it("shares one in-flight load between concurrent misses", async () => {
    const cache = new SingleFlightCache<string, number>();
    let loads = 0;
    let release: (value: number) => void = () => {};
    const loader = (): Promise<number> => {
      loads++;
      return new Promise((resolve) => {
        release = resolve;
      });
    };

    const pending = Promise.all([cache.getOrLoad("a", loader), cache.getOrLoad("a", loader), cache.getOrLoad("a", loader)]);
    expect(cache.size).toBe(0);
    release(42);

    expect(await pending).toEqual([42, 42, 42]);
    expect(loads).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.peek("a")).toBe(42);
  });

  it("serves later calls from the settled value", async () => {
    const cache = new SingleFlightCache<string, string>();
    let loads = 0;
    const loader = async (key: string): Promise<string> => {
      loads++;
      return key.toUpperCase();
    };

    expect(await cache.getOrLoad("x", loader)).toBe("X");
    expect(await cache.getOrLoad("x", loader)).toBe("X");
    expect(loads).toBe(1);
  });

  it("evicts failed loads so the next caller retries", async () => {
    const cache = new SingleFlightCache<string, number>();
    await expect(cache.getOrLoad("k", async () => {
      throw new Error("unavailable");
    })).rejects.toThrow("unavailable");
    expect(cache.peek("k")).toBeUndefined();

    expect(await cache.getOrLoad("k", async () => 7)).toBe(7);
  });

  it("turns a synchronous throw into a rejection", async () => {
    const cache = new SingleFlightCache<string, number>();
    const loader = (): Promise<number> => {
      throw new Error("sync");
    };
    await expect(cache.getOrLoad("k", loader)).rejects.toThrow("sync");
    expect(cache.size).toBe(0);
  });

  it("clears every entry", async () => {
    const cache = new SingleFlightCache<number, number>();
    await cache.getOrLoad(1, async (n) => n * 2);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.peek(1)).toBeUndefined();
  });
});

describe("ResultChannel", () => {
  it("delivers buffered items before reporting closure", async () => {
    const channel = new ResultChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();
    channel.push(3);

    expect(await channel.take()).toBe(1);
    expect(await channel.take()).toBe(2);
    expect(await channel.take()).toBeUndefined();
    expect(channel.isClosed).toBe(true);
  });

  it("wakes a waiting consumer", async () => {
    const channel = new ResultChannel<string>();
    const next = channel.take();
    channel.push("a");
    expect(await next).toBe("a");
  });

  it("rejects waiters when failed", async () => {
    const channel = new ResultChannel<string>();
    const next = channel.take();
    channel.fail(new Error("worker crashed"));
    await expect(next).rejects.toThrow("worker crashed");
    await expect(channel.take()).rejects.toThrow("worker crashed");
  });
});

/**
 * Lookup-or-populate cache shared by concurrent workers.
 *
 * Concurrent misses for the same key share one in-flight load, so at most
 * one outbound call per key is ever running. Failed loads are evicted and
 * retried by the next caller.
 */

type Entry<V> = { state: "pending"; promise: Promise<V> } | { state: "ready"; value: V };

export class SingleFlightCache<K, V> {
  private readonly entries = new Map<K, Entry<V>>();

  getOrLoad(key: K, loader: (key: K) => Promise<V>): Promise<V> {
    const entry = this.entries.get(key);
    if (entry?.state === "ready") return Promise.resolve(entry.value);
    if (entry?.state === "pending") return entry.promise;

    const promise = new Promise<V>((resolve) => resolve(loader(key))).then(
      (value) => {
        this.entries.set(key, { state: "ready", value });
        return value;
      },
      (err: unknown) => {
        this.entries.delete(key);
        throw err;
      },
    );
    this.entries.set(key, { state: "pending", promise });
    return promise;
  }

  /** Settled value for `key`, if any. Never triggers a load. */
  peek(key: K): V | undefined {
    const entry = this.entries.get(key);
    return entry?.state === "ready" ? entry.value : undefined;
  }

  /** Number of settled entries. */
  get size(): number {
    let n = 0;
    for (const entry of this.entries.values()) if (entry.state === "ready") n++;
    return n;
  }

  clear(): void {
    this.entries.clear();
  }
}

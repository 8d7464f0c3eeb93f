/**
 * Scan runner and session.
 *
 * runScan wires dispatcher → classifier → aggregator for one target.
 * ScanSession owns everything that outlives a single scan: the cancel
 * controller, run counters and the shared geolocation cache.
 */

import { dispatchProbes, type DispatchOptions } from "./dispatcher.js";
import { classifyOutcome } from "./classifier.js";
import { ScanReportBuilder, type ScanReport } from "./report.js";
import type { ProbeResult, ProbeSpec } from "./probes/types.js";
import { SingleFlightCache } from "./cache.js";
import { lookupGeolocation, type GeoInfo } from "./net/geo.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

export interface ScanOptions extends DispatchOptions {
  /** Called once per verdict, in arrival order. */
  onResult?: (result: ProbeResult) => void;
}

export async function runScan(
  target: string,
  specs: readonly ProbeSpec[],
  options: ScanOptions = {},
): Promise<ScanReport> {
  const { onResult, ...dispatch } = options;
  const builder = new ScanReportBuilder(target, specs.length);

  for await (const { spec, outcome } of dispatchProbes(target, specs, dispatch)) {
    const result: ProbeResult = { spec, outcome, verdict: classifyOutcome(spec, outcome) };
    builder.add(result);
    onResult?.(result);
  }

  const report = builder.finalize();
  if (!report.complete) {
    logger.warn(`[scan] ${target}: cancelled after ${report.received}/${report.expected} probes`);
  }
  return report;
}

export type GeoLookup = (ip: string, signal?: AbortSignal) => Promise<GeoInfo>;

export interface ScanSessionOptions {
  geoLookup?: GeoLookup;
}

export class ScanSession {
  private readonly controller = new AbortController();
  private readonly geoCache = new SingleFlightCache<string, GeoInfo>();
  private readonly geoLookup: GeoLookup;
  private readonly addresses = new Set<string>();
  private scans = 0;

  constructor(options: ScanSessionOptions = {}) {
    this.geoLookup = options.geoLookup ?? lookupGeolocation;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get running(): boolean {
    return !this.controller.signal.aborted;
  }

  get scanCount(): number {
    return this.scans;
  }

  /** Distinct addresses recorded with `recordAddress`, in first-seen order. */
  get uniqueAddresses(): readonly string[] {
    return [...this.addresses];
  }

  get geolocationQueries(): number {
    return this.geoCache.size;
  }

  cancel(reason = "Scan cancelled by user"): void {
    if (!this.controller.signal.aborted) this.controller.abort(new Error(reason));
  }

  recordAddress(ip: string): void {
    this.addresses.add(ip);
  }

  /** Count one completed gathering cycle (a monitor tick, a tool run). */
  recordCycle(): number {
    this.scans += 1;
    return this.scans;
  }

  /** runScan bound to this session's cancel signal. */
  scan(target: string, specs: readonly ProbeSpec[], options: Omit<ScanOptions, "signal"> = {}): Promise<ScanReport> {
    return runScan(target, specs, { ...options, signal: this.signal });
  }

  /** Cached geolocation; null when the lookup failed (not cached). */
  async geolocate(ip: string): Promise<GeoInfo | null> {
    try {
      return await this.geoCache.getOrLoad(ip, (key) => this.geoLookup(key, this.signal));
    } catch (err) {
      logger.debug(`[geo] lookup for ${ip} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  /** Cached geolocation without triggering a lookup. */
  cachedGeolocation(ip: string): GeoInfo | undefined {
    return this.geoCache.peek(ip);
  }
}

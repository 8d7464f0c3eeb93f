/**
 * Result aggregator: builds a ScanReport as verdicts arrive.
 *
 * Arrival order is arbitrary. Counters are updated on insert so summary
 * numbers never require a pass over the results. Only the scan loop inserts
 * (single consumer), so no locking is involved.
 */

import type { ProbeResult, VerdictStatus } from "./probes/types.js";

export type VerdictCounts = Record<VerdictStatus, number>;

export interface ScanReport {
  target: string;
  /** Results in arrival order. */
  results: readonly ProbeResult[];
  counts: Readonly<VerdictCounts>;
  /** Number of probes submitted. */
  expected: number;
  /** Number of verdicts received. */
  received: number;
  /** False when the scan was cancelled before every probe reported. */
  complete: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export type Clock = () => number;

export class ScanReportBuilder {
  private readonly results: ProbeResult[] = [];
  private readonly seen = new Set<string>();
  private readonly counts: VerdictCounts = { present: 0, absent: 0, indeterminate: 0 };
  private readonly startedAtMs: number;
  private finalized: ScanReport | undefined;

  constructor(
    readonly target: string,
    readonly expected: number,
    private readonly clock: Clock = Date.now,
  ) {
    this.startedAtMs = clock();
  }

  get received(): number {
    return this.results.length;
  }

  get isComplete(): boolean {
    return this.results.length === this.expected;
  }

  get isFinalized(): boolean {
    return this.finalized !== undefined;
  }

  /** Live counters; safe to read while the scan is running. */
  get tally(): Readonly<VerdictCounts> {
    return { ...this.counts };
  }

  add(result: ProbeResult): void {
    if (this.finalized) {
      throw new Error(`Report for ${this.target} is finalized; cannot add ${result.verdict.probeId}`);
    }
    if (this.seen.has(result.verdict.probeId)) {
      throw new Error(`Duplicate verdict for probe '${result.verdict.probeId}'`);
    }
    if (this.results.length >= this.expected) {
      throw new Error(`Report for ${this.target} already holds ${this.expected} verdicts`);
    }

    this.seen.add(result.verdict.probeId);
    this.results.push(result);
    this.counts[result.verdict.status] += 1;
  }

  /** Stamp the duration and freeze. Idempotent. */
  finalize(): ScanReport {
    if (this.finalized) return this.finalized;

    const finishedAtMs = this.clock();
    const report: ScanReport = {
      target: this.target,
      results: Object.freeze([...this.results]),
      counts: Object.freeze({ ...this.counts }),
      expected: this.expected,
      received: this.results.length,
      complete: this.isComplete,
      startedAt: new Date(this.startedAtMs).toISOString(),
      finishedAt: new Date(finishedAtMs).toISOString(),
      durationMs: finishedAtMs - this.startedAtMs,
    };
    this.finalized = Object.freeze(report);
    return this.finalized;
  }
}

/**
 * Probe dispatcher: bounded worker pool over a shared spec cursor.
 *
 * Runs every ProbeSpec against one target with at most `concurrency` probes
 * in flight and yields each `{ spec, outcome }` as it completes. Every probe
 * yields exactly one outcome unless the scan is cancelled; faults inside an
 * executor become outcomes and never escape a worker.
 */

import type {
  ExecutorRegistry,
  ProbeContext,
  ProbeOutcome,
  ProbeSpec,
  RawOutcome,
} from "./probes/types.js";
import { defaultExecutors } from "./probes/index.js";
import { describeFailure } from "./probes/failure.js";
import { ResultChannel } from "./channel.js";
import { DEFAULT_USER_AGENT } from "./catalog.js";
import { ScanInputError } from "./errors.js";
import { logger } from "./logger.js";

export interface DispatchOptions {
  /** Max probes in flight. Default: 10. */
  concurrency?: number;
  /** Per-probe deadline in ms, unless the ProbeSpec sets its own. Default: 5000. */
  timeoutMs?: number;
  userAgent?: string;
  /** Scan-wide cancellation. */
  signal?: AbortSignal;
  /** Replace executors per kind (tests, custom transports). */
  executors?: Partial<ExecutorRegistry>;
}

export interface DispatchedProbe {
  spec: ProbeSpec;
  outcome: ProbeOutcome;
}

export const DEFAULT_CONCURRENCY = 10;
export const DEFAULT_TIMEOUT_MS = 5_000;

/** Throws ScanInputError when the scan cannot start. */
export function assertDispatchable(
  target: string,
  specs: readonly ProbeSpec[],
  concurrency: number,
  timeoutMs: number,
): void {
  if (!target.trim()) throw new ScanInputError("Target must not be empty");
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ScanInputError(`Concurrency must be a positive integer, got ${concurrency}`);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ScanInputError(`Timeout must be a positive number of ms, got ${timeoutMs}`);
  }

  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.id)) throw new ScanInputError(`Duplicate probe id '${spec.id}'`);
    seen.add(spec.id);
  }
}

function runExecutor(executors: ExecutorRegistry, spec: ProbeSpec, ctx: ProbeContext): Promise<RawOutcome> {
  switch (spec.kind) {
    case "http-existence":
      return executors["http-existence"](spec, ctx);
    case "tcp-connect":
      return executors["tcp-connect"](spec, ctx);
    case "header-fetch":
      return executors["header-fetch"](spec, ctx);
    case "path-probe":
      return executors["path-probe"](spec, ctx);
    default: {
      const _exhaustive: never = spec;
      throw new Error(`Unknown probe kind: ${String(_exhaustive)}`);
    }
  }
}

const ABANDONED = Symbol("abandoned");

/** Settles when `signal` aborts; `dispose` detaches the listener. */
function abortion(signal: AbortSignal): { promise: Promise<typeof ABANDONED>; dispose: () => void } {
  let onAbort: () => void = () => {};
  const promise = new Promise<typeof ABANDONED>((resolve) => {
    onAbort = () => resolve(ABANDONED);
    if (signal.aborted) resolve(ABANDONED);
    else signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

/**
 * Run one probe under its deadline. Resolves to undefined only when the scan
 * was cancelled before the probe finished.
 */
async function executeProbe(
  spec: ProbeSpec,
  target: string,
  executors: ExecutorRegistry,
  scanSignal: AbortSignal,
  defaults: { timeoutMs: number; userAgent: string },
): Promise<ProbeOutcome | undefined> {
  const timeoutMs = spec.timeoutMs ?? defaults.timeoutMs;
  const deadline = AbortSignal.timeout(timeoutMs);
  const signal = AbortSignal.any([scanSignal, deadline]);
  const ctx: ProbeContext = { target, signal, timeoutMs, userAgent: defaults.userAgent };
  const startedAt = performance.now();
  const aborted = abortion(signal);

  let raw: RawOutcome | typeof ABANDONED;
  try {
    // The race bounds executors that ignore their signal.
    raw = await Promise.race([runExecutor(executors, spec, ctx), aborted.promise]);
  } catch (err) {
    raw = deadline.aborted && !scanSignal.aborted
      ? { kind: "timeout", message: `Timed out after ${timeoutMs}ms` }
      : describeFailure(err);
  } finally {
    aborted.dispose();
  }

  if (raw === ABANDONED) {
    if (scanSignal.aborted) return undefined;
    raw = { kind: "timeout", message: `Timed out after ${timeoutMs}ms` };
  }
  if (scanSignal.aborted) return undefined;

  const elapsedMs = Math.round(performance.now() - startedAt);
  logger.debug(`[dispatch] ${spec.id} → ${raw.kind} in ${elapsedMs}ms`);
  return { ...raw, elapsedMs };
}

/**
 * Dispatch `specs` against `target`. Completion order is arbitrary.
 *
 * Cancelling via `options.signal`, or leaving the loop early, stops workers
 * from claiming further specs and abandons probes still in flight; the
 * iterator then ends without waiting for them.
 */
export async function* dispatchProbes(
  target: string,
  specs: readonly ProbeSpec[],
  options: DispatchOptions = {},
): AsyncGenerator<DispatchedProbe, void, undefined> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  assertDispatchable(target, specs, concurrency, timeoutMs);

  const external = options.signal;
  if (specs.length === 0 || external?.aborted) return;

  const executors: ExecutorRegistry = { ...defaultExecutors, ...options.executors };
  const defaults = { timeoutMs, userAgent: options.userAgent ?? DEFAULT_USER_AGENT };

  const controller = new AbortController();
  const relay = (): void => controller.abort(external?.reason);
  external?.addEventListener("abort", relay, { once: true });

  const channel = new ResultChannel<DispatchedProbe>();
  controller.signal.addEventListener("abort", () => channel.close(), { once: true });

  let cursor = 0;
  const worker = async (): Promise<void> => {
    while (!controller.signal.aborted) {
      const index = cursor++;
      if (index >= specs.length) return;
      const spec = specs[index];
      const outcome = await executeProbe(spec, target, executors, controller.signal, defaults);
      if (outcome === undefined) return;
      channel.push({ spec, outcome });
    }
  };

  const poolSize = Math.min(concurrency, specs.length);
  logger.debug(`[dispatch] ${specs.length} probes against ${target} with ${poolSize} workers`);
  const pool = Array.from({ length: poolSize }, () => worker());
  void Promise.all(pool).then(
    () => channel.close(),
    (err: unknown) => channel.fail(err),
  );

  try {
    for (;;) {
      const item = await channel.take();
      if (item === undefined) return;
      yield item;
    }
  } finally {
    external?.removeEventListener("abort", relay);
    controller.abort();
  }
}

/**
 * Shared types for probe specs, raw outcomes and verdicts.
 */

// ---------------------------------------------------------------------------
// ProbeSpec
// ---------------------------------------------------------------------------

interface ProbeSpecBase {
  /** Unique within one scan. */
  readonly id: string;
  /** Human-readable label (platform name, "Port 22", path...). */
  readonly label: string;
  /** Overrides the scan's per-probe timeout. */
  readonly timeoutMs?: number;
}

/** Does an account page exist? `{}` in the template is replaced by the target. */
export interface HttpExistenceSpec extends ProbeSpecBase {
  readonly kind: "http-existence";
  readonly urlTemplate: string;
  /** Case-insensitive substrings whose presence in a 200 body means "absent". */
  readonly markers: readonly string[];
}

export interface TcpConnectSpec extends ProbeSpecBase {
  readonly kind: "tcp-connect";
  readonly port: number;
  /** Read a service banner after connecting. Does not affect the verdict. */
  readonly banner?: boolean;
  /** Bytes sent after connecting to coax a banner out of the service. */
  readonly bannerPayload?: string;
}

export interface HeaderFetchSpec extends ProbeSpecBase {
  readonly kind: "header-fetch";
  readonly urlTemplate: string;
  /** Tried when the first URL produced no response at all (e.g. http → https). */
  readonly fallbackUrlTemplate?: string;
}

export interface PathProbeSpec extends ProbeSpecBase {
  readonly kind: "path-probe";
  /** Resolved against the target base URL. */
  readonly path: string;
}

export type ProbeSpec = HttpExistenceSpec | TcpConnectSpec | HeaderFetchSpec | PathProbeSpec;
export type ProbeKind = ProbeSpec["kind"];

// ---------------------------------------------------------------------------
// ProbeOutcome
// ---------------------------------------------------------------------------

export type FailureCause = "dns" | "transport" | "malformed-target";

/** What an executor reports, before the dispatcher stamps timing. */
export type RawOutcome =
  | {
      kind: "body";
      url: string;
      status: number;
      headers: Record<string, string>;
      body: string;
      bytes: number;
    }
  | {
      kind: "status";
      url: string;
      status: number;
      headers: Record<string, string>;
      /** From content-length, when the body was not read in full. */
      bytes?: number;
    }
  | { kind: "connected"; banner?: string }
  | { kind: "refused"; message: string }
  | { kind: "timeout"; message: string }
  | { kind: "error"; cause: FailureCause; message: string };

export type ProbeOutcome = RawOutcome & { readonly elapsedMs: number };

export type OutcomeKind = RawOutcome["kind"];

// ---------------------------------------------------------------------------
// Verdict
// ---------------------------------------------------------------------------

export type VerdictStatus = "present" | "absent" | "indeterminate";

export interface Verdict {
  probeId: string;
  status: VerdictStatus;
  reason: string;
}

/** One finished probe as seen by the aggregator and the display layer. */
export interface ProbeResult {
  spec: ProbeSpec;
  outcome: ProbeOutcome;
  verdict: Verdict;
}

// ---------------------------------------------------------------------------
// Executors
// ---------------------------------------------------------------------------

export interface ProbeContext {
  /** Username, hostname or base URL, depending on the probe kind. */
  target: string;
  /** Fires on scan cancellation or when this probe's deadline passes. */
  signal: AbortSignal;
  timeoutMs: number;
  userAgent: string;
}

export type ProbeExecutor<S extends ProbeSpec> = (spec: S, ctx: ProbeContext) => Promise<RawOutcome>;

/** One executor per probe kind. Tests swap entries for in-process fakes. */
export interface ExecutorRegistry {
  "http-existence": ProbeExecutor<HttpExistenceSpec>;
  "tcp-connect": ProbeExecutor<TcpConnectSpec>;
  "header-fetch": ProbeExecutor<HeaderFetchSpec>;
  "path-probe": ProbeExecutor<PathProbeSpec>;
}

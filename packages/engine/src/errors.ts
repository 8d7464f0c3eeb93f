/**
 * Input errors that stop a scan before any probe is dispatched.
 *
 * Probe-level failures never surface as exceptions; they become
 * ProbeOutcome values (see probes/types.ts).
 */

export class ScanInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScanInputError";
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import type { ScanSession } from "@probekit/engine";

/**
 * Cancel `session` on Ctrl+C for the duration of a command.
 * Returns the function that restores default SIGINT handling.
 */
export function cancelOnInterrupt(session: ScanSession): () => void {
  const handler = (): void => session.cancel();
  process.once("SIGINT", handler);
  return () => {
    process.removeListener("SIGINT", handler);
  };
}

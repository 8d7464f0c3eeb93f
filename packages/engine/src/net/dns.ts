/**
 * Forward and reverse DNS helpers, bounded by a deadline.
 */

import { promises as dns } from "node:dns";
import { isIP } from "node:net";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";

export const DNS_TIMEOUT_MS = 5_000;

export type Resolution =
  | { resolved: true; hostname: string; primaryIp: string; addresses: string[] }
  | { resolved: false; hostname: string; error: string };

/** Reject with a timeout error if `promise` has not settled within `ms`. */
export function withDeadline<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

export type LookupAll = (hostname: string) => Promise<Array<{ address: string; family: number }>>;

const systemLookup: LookupAll = (hostname) => dns.lookup(hostname, { all: true });

/**
 * Resolve every address of `hostname`. The primary address is the first
 * IPv4 one, falling back to the first address of any family.
 */
export async function resolveHost(
  hostname: string,
  options: { timeoutMs?: number; lookup?: LookupAll } = {},
): Promise<Resolution> {
  if (isIP(hostname) !== 0) {
    return { resolved: true, hostname, primaryIp: hostname, addresses: [hostname] };
  }

  const lookup = options.lookup ?? systemLookup;
  try {
    const records = await withDeadline(lookup(hostname), options.timeoutMs ?? DNS_TIMEOUT_MS, "DNS lookup");
    const addresses = [...new Set(records.map((r) => r.address))];
    const primary = records.find((r) => r.family === 4) ?? records[0];
    if (!primary) return { resolved: false, hostname, error: "DNS resolution failed: no addresses" };
    return { resolved: true, hostname, primaryIp: primary.address, addresses };
  } catch (err) {
    return { resolved: false, hostname, error: `DNS resolution failed: ${errorMessage(err)}` };
  }
}

/** PTR name for `ip`, or null when there is none. */
export async function reverseLookup(ip: string, timeoutMs = DNS_TIMEOUT_MS): Promise<string | null> {
  try {
    const names = await withDeadline(dns.reverse(ip), timeoutMs, "Reverse DNS");
    return names[0] ?? null;
  } catch (err) {
    logger.debug(`[dns] no PTR for ${ip}: ${errorMessage(err)}`);
    return null;
  }
}

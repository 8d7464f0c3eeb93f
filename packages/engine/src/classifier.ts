/**
 * Probe classifier: maps a raw ProbeOutcome to a tri-state Verdict.
 *
 * Pure and deterministic: the same spec and outcome always give the same
 * verdict, and nothing here touches the network.
 */

import type {
  HttpExistenceSpec,
  ProbeOutcome,
  ProbeSpec,
  Verdict,
  VerdictStatus,
} from "./probes/types.js";
import { PATH_PRESENT_STATUSES } from "./catalog.js";

/** First marker found in `body` (case-insensitive), or undefined. */
export function findMarker(body: string, markers: readonly string[]): string | undefined {
  const haystack = body.toLowerCase();
  return markers.find((m) => haystack.includes(m.toLowerCase()));
}

function failureReason(outcome: ProbeOutcome): string {
  switch (outcome.kind) {
    case "timeout":
      return `Timeout: ${outcome.message}`;
    case "refused":
      return "Connection refused";
    case "error":
      if (outcome.cause === "dns") return `DNS resolution failed: ${outcome.message}`;
      if (outcome.cause === "malformed-target") return `Malformed target: ${outcome.message}`;
      return `Error: ${outcome.message}`;
    case "connected":
      return "Connected";
    case "body":
    case "status":
      return `Status: ${outcome.status}`;
  }
}

function classifyExistence(spec: HttpExistenceSpec, outcome: ProbeOutcome): [VerdictStatus, string] {
  switch (outcome.kind) {
    case "body": {
      if (outcome.status !== 200) return ["absent", `Status: ${outcome.status}`];
      const marker = findMarker(outcome.body, spec.markers);
      return marker === undefined ? ["present", "Success"] : ["absent", `Marker matched: ${marker}`];
    }
    case "status":
      // No body to inspect, so a 200 cannot be confirmed.
      return outcome.status === 200
        ? ["indeterminate", "Status: 200 (body not read)"]
        : ["absent", `Status: ${outcome.status}`];
    default:
      return ["indeterminate", failureReason(outcome)];
  }
}

function classifyTcp(outcome: ProbeOutcome): [VerdictStatus, string] {
  switch (outcome.kind) {
    case "connected":
      return ["present", "Open"];
    case "refused":
      return ["absent", "Closed (connection refused)"];
    case "timeout":
      return ["absent", "Filtered (timeout)"];
    case "error":
      return outcome.cause === "transport"
        ? ["absent", `Filtered (${outcome.message})`]
        : ["indeterminate", failureReason(outcome)];
    default:
      return ["indeterminate", `Unexpected outcome: ${outcome.kind}`];
  }
}

function classifyHeaders(outcome: ProbeOutcome): [VerdictStatus, string] {
  if (outcome.kind === "body" || outcome.kind === "status") {
    const server = outcome.headers["server"] ?? "Unknown";
    return ["present", `HTTP ${outcome.status} (Server: ${server})`];
  }
  return ["indeterminate", failureReason(outcome)];
}

function classifyPath(outcome: ProbeOutcome): [VerdictStatus, string] {
  if (outcome.kind === "body" || outcome.kind === "status") {
    return PATH_PRESENT_STATUSES.has(outcome.status)
      ? ["present", `Status: ${outcome.status}`]
      : ["absent", `Status: ${outcome.status}`];
  }
  return ["absent", failureReason(outcome)];
}

export function classifyOutcome(spec: ProbeSpec, outcome: ProbeOutcome): Verdict {
  let status: VerdictStatus;
  let reason: string;

  if (outcome.kind === "error" && outcome.cause === "malformed-target") {
    [status, reason] = ["indeterminate", failureReason(outcome)];
  } else {
    switch (spec.kind) {
      case "http-existence":
        [status, reason] = classifyExistence(spec, outcome);
        break;
      case "tcp-connect":
        [status, reason] = classifyTcp(outcome);
        break;
      case "header-fetch":
        [status, reason] = classifyHeaders(outcome);
        break;
      case "path-probe":
        [status, reason] = classifyPath(outcome);
        break;
      default: {
        const _exhaustive: never = spec;
        throw new Error(`Unknown probe kind: ${String(_exhaustive)}`);
      }
    }
  }

  return { probeId: spec.id, status, reason };
}

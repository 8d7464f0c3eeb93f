/**
 * IP geolocation via ip-api.com's free JSON endpoint.
 */

import { z } from "zod";
import { DEFAULT_USER_AGENT } from "../catalog.js";

export const GEO_TIMEOUT_MS = 5_000;
const GEO_ENDPOINT = "http://ip-api.com/json/";

const geoResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  country: z.string().optional(),
  regionName: z.string().optional(),
  city: z.string().optional(),
  isp: z.string().optional(),
  org: z.string().optional(),
  as: z.string().optional(),
});

export interface GeoInfo {
  country: string;
  region: string;
  city: string;
  isp: string;
  org: string;
  as: string;
}

export function parseGeoResponse(json: unknown): GeoInfo {
  const parsed = geoResponseSchema.parse(json);
  if (parsed.status !== "success") {
    throw new Error(`Geolocation unavailable: ${parsed.message ?? parsed.status}`);
  }
  return {
    country: parsed.country || "Unknown",
    region: parsed.regionName || "Unknown",
    city: parsed.city || "Unknown",
    isp: parsed.isp || "Unknown",
    org: parsed.org || "Unknown",
    as: parsed.as || "Unknown",
  };
}

/** Throws when the service is unreachable or has no data for `ip`. */
export async function lookupGeolocation(ip: string, signal?: AbortSignal): Promise<GeoInfo> {
  const timeout = AbortSignal.timeout(GEO_TIMEOUT_MS);
  const res = await fetch(`${GEO_ENDPOINT}${encodeURIComponent(ip)}`, {
    headers: { "User-Agent": DEFAULT_USER_AGENT },
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
  });
  if (!res.ok) {
    throw new Error(`Geolocation API error: ${res.status}`);
  }
  return parseGeoResponse(await res.json());
}

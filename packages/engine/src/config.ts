/**
 * Config loader: reads and validates `.probekit.yml` configuration files.
 * Uses Zod for schema validation.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import {
  DEFAULT_USER_AGENT,
  HIDDEN_PATHS,
  PLATFORMS,
  RECON_PORTS,
  platformSchema,
  type Platform,
} from "./catalog.js";
import { errorMessage } from "./errors.js";

export const CONFIG_FILE = ".probekit.yml";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface ProbekitConfig {
  /** Worker count for every tool; null keeps each tool's default. */
  concurrency: number | null;
  /** Per-probe timeout for every probe kind; null keeps the defaults. */
  timeout_ms: number | null;
  /** User-Agent sent with every HTTP probe. */
  user_agent: string;
  /** Ports checked by `recon`. */
  ports: number[];
  /** Hidden paths checked by `recon`. */
  paths: string[];
  /** Extra platforms for `user`: { Name: { url, markers } } */
  platforms: Record<string, { url: string; markers: string[] }>;
  /** Built-in platform names to skip: ["VK", "Medium"] */
  disable_platforms: string[];
}

export const DEFAULT_CONFIG: ProbekitConfig = {
  concurrency: null,
  timeout_ms: null,
  user_agent: DEFAULT_USER_AGENT,
  ports: [...RECON_PORTS],
  paths: [...HIDDEN_PATHS],
  platforms: {},
  disable_platforms: [],
};

const KNOWN_KEYS: readonly string[] = [
  "concurrency",
  "timeout_ms",
  "user_agent",
  "ports",
  "paths",
  "platforms",
  "disable_platforms",
];

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const probekitConfigSchema = z.object({
  concurrency: z.number().int().min(1).max(256).optional(),
  timeout_ms: z.number().int().positive().max(120_000).optional(),
  user_agent: z.string().min(1).optional(),
  ports: z.array(z.number().int().min(1).max(65_535)).optional(),
  paths: z.array(z.string().min(1)).optional(),
  platforms: z.record(platformSchema).optional(),
  disable_platforms: z.array(z.string()).optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function warn(message: string): void {
  process.stderr.write(`[probekit] Warning: ${message}\n`);
}

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function hint(input: string, valid: readonly string[]): string {
  const suggestion = didYouMean(input, valid);
  return suggestion ? ` — did you mean '${suggestion}'?` : "";
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.probekit.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): ProbekitConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    warn(`could not read ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return cloneDefaults();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    warn(`could not parse ${CONFIG_FILE} — ${errorMessage(err)}. Using defaults.`);
    return cloneDefaults();
  }

  if (!parsed || typeof parsed !== "object") return cloneDefaults();

  // Validate shape with Zod
  const result = probekitConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      warn(`config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return cloneDefaults();
  }

  const data = result.data;

  // Warn about unknown top-level keys
  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.includes(key)) {
      warn(`unknown config key '${key}'${hint(key, KNOWN_KEYS)}`);
    }
  }

  const config = cloneDefaults();

  if (data.concurrency !== undefined) config.concurrency = data.concurrency;
  if (data.timeout_ms !== undefined) config.timeout_ms = data.timeout_ms;
  if (data.user_agent !== undefined) config.user_agent = data.user_agent;
  if (data.ports !== undefined && data.ports.length > 0) config.ports = [...new Set(data.ports)];
  if (data.paths !== undefined && data.paths.length > 0) config.paths = [...new Set(data.paths)];
  if (data.platforms !== undefined) config.platforms = data.platforms;

  // disable_platforms: validate names against the built-in table
  if (data.disable_platforms !== undefined) {
    const names = PLATFORMS.map((p) => p.name);
    const valid: string[] = [];
    for (const name of data.disable_platforms) {
      const match = names.find((n) => n.toLowerCase() === name.toLowerCase());
      if (match) {
        valid.push(match);
      } else {
        warn(`unknown platform '${name}' in disable_platforms${hint(name, names)}`);
      }
    }
    config.disable_platforms = valid;
  }

  return config;
}

function cloneDefaults(): ProbekitConfig {
  return {
    ...DEFAULT_CONFIG,
    ports: [...DEFAULT_CONFIG.ports],
    paths: [...DEFAULT_CONFIG.paths],
    platforms: { ...DEFAULT_CONFIG.platforms },
    disable_platforms: [...DEFAULT_CONFIG.disable_platforms],
  };
}

/**
 * Built-in platforms minus disabled ones, plus the config's extras.
 * An extra with a built-in name replaces the built-in entry.
 */
export function platformsFromConfig(config: ProbekitConfig, builtIn: readonly Platform[] = PLATFORMS): Platform[] {
  const disabled = new Set(config.disable_platforms);
  const byName = new Map<string, Platform>();
  for (const p of builtIn) {
    if (!disabled.has(p.name)) byName.set(p.name, p);
  }
  for (const [name, entry] of Object.entries(config.platforms)) {
    byName.set(name, { name, url: entry.url, markers: entry.markers });
  }
  return [...byName.values()];
}

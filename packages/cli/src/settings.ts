import { DEFAULT_CONFIG, loadConfig, type ProbekitConfig } from "@probekit/engine";
import { ArgsError, intFlag } from "./args.js";

export type OutputFormat = "table" | "json";

const VALID_FORMATS: readonly OutputFormat[] = ["table", "json"];

export interface RunSettings {
  /** Flag or config override; undefined keeps each tool's default. */
  concurrency?: number;
  /** Flag or config override; undefined keeps each probe kind's default. */
  timeoutMs?: number;
  userAgent: string;
  format: OutputFormat;
  color: boolean;
  config: ProbekitConfig;
}

function isFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.some((f) => f === value);
}

/** Merge `.probekit.yml` (if any) with command-line flags; flags win. */
export function resolveSettings(
  args: Record<string, string>,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): RunSettings {
  const config = loadConfig(cwd) ?? DEFAULT_CONFIG;

  const format = args["format"] ?? "table";
  if (!isFormat(format)) {
    throw new ArgsError(`invalid format '${format}'. Must be one of: ${VALID_FORMATS.join(", ")}`);
  }

  return {
    concurrency: intFlag(args, "concurrency") ?? config.concurrency ?? undefined,
    timeoutMs: intFlag(args, "timeout") ?? config.timeout_ms ?? undefined,
    userAgent: config.user_agent,
    format,
    color: args["no-color"] !== "true" && !env["NO_COLOR"] && format === "table",
    config,
  };
}

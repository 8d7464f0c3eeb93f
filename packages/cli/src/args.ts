import { logger } from "@probekit/engine";

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

const BOOLEAN_FLAGS = new Set(["help", "version", "verbose", "quiet", "no-color", "once"]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "concurrency", "timeout", "format", "interval",
]);

export class ArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgsError";
  }
}

export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        logger.warn(`Warning: unknown flag --${key}`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        if (i + 1 >= argv.length || argv[i + 1].startsWith("--")) {
          throw new ArgsError(`--${key} requires a value`);
        }
        args[key] = argv[++i];
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else args[key] = argv[++i] || "";
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.PROBEKIT_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.PROBEKIT_LOG_LEVEL = "error";
  }

  return { command, args, positional };
}

/** Positive integer flag value, or undefined when the flag is absent. */
export function intFlag(args: Record<string, string>, key: string): number | undefined {
  const raw = args[key];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ArgsError(`--${key} must be a positive integer, got '${raw}'`);
  }
  return value;
}

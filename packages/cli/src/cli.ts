#!/usr/bin/env node

import { ScanInputError, errorMessage } from "@probekit/engine";
import { ArgsError, intFlag, parseArgs } from "./args.js";
import { resolveSettings } from "./settings.js";
import { runUser } from "./commands/user.js";
import { runInfo } from "./commands/info.js";
import { runRecon } from "./commands/recon.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mprobekit\x1b[0m — concurrent network probe toolkit
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  probekit user [username]          Look for a username across social platforms
  probekit info [hostname]          Monitor a server (DNS, geolocation, ports, web)
  probekit recon [target]           Web & server reconnaissance
  probekit version                  Print version

  A missing username, hostname or target is prompted for.

\x1b[1mOPTIONS\x1b[0m
  --concurrency <n>            Probes in flight at once (default: per tool)
  --timeout <ms>               Per-probe deadline in milliseconds (default: per tool)
  --format <fmt>               Output: table, json (default: table)
  --no-color                   Disable ANSI colors (also NO_COLOR)

\x1b[1mINFO OPTIONS\x1b[0m
  --interval <s>               Seconds between scans (default: 30, minimum: 5)
  --once                       Run a single scan and exit

\x1b[1mEXAMPLES\x1b[0m
  probekit user octocat                          Check every platform
  probekit user octocat --format json            JSON report
  probekit info example.com --interval 60        Monitor every minute
  probekit info example.com --once               One snapshot
  probekit recon example.com --concurrency 40    Faster port and path scan

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mCONFIGURATION\x1b[0m
  .probekit.yml                     Defaults, extra platforms, ports and paths

\x1b[1mENVIRONMENT\x1b[0m
  PROBEKIT_LOG_LEVEL                Log level: debug, info, warn, error, silent
  NO_COLOR                          Disable ANSI colors

`);
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`probekit v${VERSION}\n`);
    return 0;
  }

  const { command, args, positional } = parseArgs(rawArgs);

  switch (command) {
    case "version":
      process.stdout.write(`probekit v${VERSION}\n`);
      return 0;

    case "user":
      return runUser({ username: positional[0], settings: resolveSettings(args) });

    case "info":
      return runInfo({
        hostname: positional[0],
        interval: intFlag(args, "interval"),
        once: args["once"] === "true",
        settings: resolveSettings(args),
      });

    case "recon":
      return runRecon({ target: positional[0], settings: resolveSettings(args) });

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof ScanInputError || err instanceof ArgsError) {
      process.stderr.write(`[probekit] Error: ${err.message}\n`);
    } else {
      process.stderr.write(`[probekit] Fatal: ${errorMessage(err)}\n`);
    }
    process.exitCode = 1;
  },
);

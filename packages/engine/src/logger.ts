/**
 * Minimal structured logger for @probekit/engine.
 *
 * Respects PROBEKIT_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for reports and JSON output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

// Read per call: the CLI sets the env var from --verbose/--quiet after import.
function level(): number {
  return parseLevel(process.env.PROBEKIT_LOG_LEVEL);
}

export const logger = {
  debug(msg: string) { if (level() <= LEVELS.debug) process.stderr.write(`[probekit] ${msg}\n`); },
  info(msg: string)  { if (level() <= LEVELS.info)  process.stderr.write(`[probekit] ${msg}\n`); },
  warn(msg: string)  { if (level() <= LEVELS.warn)  process.stderr.write(`[probekit] ${msg}\n`); },
  error(msg: string) { if (level() <= LEVELS.error) process.stderr.write(`[probekit] ${msg}\n`); },
};

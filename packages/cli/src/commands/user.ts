import {
  ScanSession,
  TOOL_DEFAULTS,
  normalizeUsername,
  platformProbes,
  platformsFromConfig,
  type ExecutorRegistry,
} from "@probekit/engine";
import {
  formatAccountResult,
  formatBanner,
  formatJson,
  formatUserSummary,
  mark,
  painter,
  toJsonReport,
} from "../formatter.js";
import { promptUser } from "../prompt.js";
import { cancelOnInterrupt } from "../interrupt.js";
import type { RunSettings } from "../settings.js";

export interface UserOptions {
  username?: string;
  settings: RunSettings;
  write?: (text: string) => void;
  session?: ScanSession;
  executors?: Partial<ExecutorRegistry>;
}

/** Check every platform for `username`. Returns the process exit code. */
export async function runUser(options: UserOptions): Promise<number> {
  const { settings } = options;
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const c = painter(settings.color);
  const table = settings.format === "table";

  const username = normalizeUsername(options.username ?? (await promptUser("Username: ")));
  const specs = platformProbes(platformsFromConfig(settings.config));

  if (table) {
    write(formatBanner("PROBEKIT USER", "Account finder across social platforms", c));
    write(mark.note(`Searching for username: ${username}`, c));
    write(mark.note(`Scanning ${specs.length} platforms...`, c) + "\n");
  }

  const session = options.session ?? new ScanSession();
  const restore = cancelOnInterrupt(session);
  try {
    const report = await session.scan(username, specs, {
      concurrency: settings.concurrency ?? TOOL_DEFAULTS.user.concurrency,
      timeoutMs: settings.timeoutMs ?? TOOL_DEFAULTS.user.timeoutMs,
      userAgent: settings.userAgent,
      executors: options.executors,
      onResult: table ? (result) => write(formatAccountResult(result, c)) : undefined,
    });
    session.recordCycle();

    write(table ? formatUserSummary(username, report, c) : formatJson(toJsonReport(report)));
    return report.complete ? 0 : 130;
  } finally {
    restore();
  }
}

/**
 * robots.txt rule extraction for the recon report.
 */

export interface RobotsRule {
  directive: "Allow" | "Disallow";
  path: string;
}

/** Allow/Disallow lines in file order; comments and other directives are skipped. */
export function parseRobots(text: string): RobotsRule[] {
  const rules: RobotsRule[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const match = /^(allow|disallow)\s*:\s*(.*)$/i.exec(line);
    if (!match) continue;
    const directive = match[1].toLowerCase() === "allow" ? "Allow" : "Disallow";
    const path = match[2].replace(/\s+#.*$/, "").trim();
    rules.push({ directive, path });
  }
  return rules;
}

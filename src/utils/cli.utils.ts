import type { NumberingReport } from "../interfaces/numbering.interface";

export const USAGE =
  "Usage: check-numbering <folder> [--rss <url|file>] [--config <file>] [--debug]";

export interface CliArgs {
  folder?: string;
  rss?: string;
  config?: string;
  debug: boolean;
}

const VALUE_FLAGS = ["--rss", "--config"] as const;

/**
 * Accepts both "--rss value" and "--rss=value"
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { debug: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--debug") {
      args.debug = true;
      continue;
    }

    const flag = VALUE_FLAGS.find(
      (name) => arg === name || arg.startsWith(`${name}=`)
    );
    if (flag) {
      const value = arg === flag ? argv[++i] : arg.slice(flag.length + 1);
      if (flag === "--rss") args.rss = value;
      else args.config = value;
      continue;
    }

    if (!arg.startsWith("--") && args.folder === undefined) {
      args.folder = arg;
    }
  }

  return args;
}

/**
 * Summary lines printed at the end of a run
 */
export function formatReport(report: NumberingReport): string[] {
  const lines = [
    `📊 Summary:`,
    `   • Trailing numbers moved: ${report.trailingFixed.length}`,
    `   • Episode numbers padded: ${report.padded.length}`,
    `   • Numbered from RSS feed: ${report.assigned.length}`,
    `   • Numbered manually: ${report.manual.length}`,
  ];

  if (report.unresolved.length > 0) {
    lines.push(`   • Still without a number: ${report.unresolved.length}`);
    for (const file of report.unresolved) {
      lines.push(`      - ${file.name}`);
    }
  }

  return lines;
}

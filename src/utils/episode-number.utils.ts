import type {
  EpisodeMarker,
  NumberedFilename,
  ParsedEpisodeFilename,
} from "../interfaces/episode-file.interface";
import type { NumberingConfig } from "../interfaces/numbering.interface";
import { ConfigError } from "./errors.utils";

/**
 * Utilities for parsing and formatting episode numbers in filenames
 */

export interface NumberingPatterns {
  marker: RegExp;
  date: RegExp;
  numbered: RegExp;
  trailing: RegExp;
  manual: RegExp;
}

/**
 * Compiles a configured pattern, checking it declares the named groups the stages read
 */
export function compilePattern(
  key: string,
  source: string,
  requiredGroups: string[],
  flags = ""
): RegExp {
  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (error) {
    throw new ConfigError(
      `Invalid regular expression for ${key}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }

  const missing = requiredGroups.filter(
    (group) => !source.includes(`(?<${group}>`)
  );
  if (missing.length > 0) {
    throw new ConfigError(
      `Pattern for ${key} must define the named group(s): ${missing.join(", ")}`
    );
  }

  return regex;
}

export function compileNumberingPatterns(
  config: NumberingConfig
): NumberingPatterns {
  return {
    marker: compilePattern(
      "episode_marker_pattern",
      config.episodeMarkerPattern,
      ["label", "number"],
      "i"
    ),
    date: compilePattern("date_pattern", config.datePattern, []),
    numbered: compilePattern(
      "numbered_episode_pattern",
      config.numberedEpisodePattern,
      ["prefix", "date", "number", "title", "extension"]
    ),
    trailing: compilePattern(
      "trailing_number_pattern",
      config.trailingNumberPattern,
      ["prefix", "date", "title", "number", "extension"]
    ),
    manual: compilePattern(
      "manual_rename_pattern",
      config.manualRenamePattern,
      ["prefix", "date", "title", "extension"]
    ),
  };
}

/**
 * Number of decimal digits needed to write n
 * Examples: 7 -> 1, 23 -> 2, 150 -> 3
 */
export function digitCount(n: number): number {
  return String(Math.max(0, Math.trunc(n))).length;
}

/**
 * Examples: (7, 2) -> "07", (150, 2) -> "150"
 */
export function padEpisodeNumber(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

function findMarker(name: string, pattern: RegExp): EpisodeMarker | undefined {
  const match = pattern.exec(name);
  const groups = match?.groups;
  if (!match || !groups || groups.label === undefined || !groups.number) {
    return undefined;
  }

  return {
    text: match[0],
    index: match.index,
    label: groups.label,
    spacing: groups.spacing ?? "",
    number: parseInt(groups.number, 10),
  };
}

function findNumbered(
  name: string,
  pattern: RegExp
): NumberedFilename | undefined {
  const groups = pattern.exec(name)?.groups;
  if (!groups || !groups.number) return undefined;

  return {
    prefix: groups.prefix ?? "",
    date: groups.date ?? "",
    number: parseInt(groups.number, 10),
    title: groups.title ?? "",
    extension: groups.extension ?? "",
  };
}

/**
 * Splits the date-stripped name on its first " - "
 * "Show - 2021-01-01 Title.mp3" -> { prefix: "Show", suffix: "Title.mp3" }
 */
function splitAroundDate(
  name: string,
  date: string | undefined
): { prefix: string; suffix: string } {
  let remainder = name;
  if (date) {
    // Join what was either side of the date with a single space
    const dateIndex = name.indexOf(date);
    const before = name.slice(0, dateIndex).trimEnd();
    const after = name.slice(dateIndex + date.length).trimStart();
    remainder = before && after ? `${before} ${after}` : before + after;
  }

  const separatorIndex = remainder.indexOf(" - ");
  if (separatorIndex === -1) {
    return { prefix: "", suffix: remainder.trim() };
  }

  return {
    prefix: remainder.slice(0, separatorIndex).replace(/[\s-]+$/, "").trim(),
    suffix: remainder
      .slice(separatorIndex + 3)
      .replace(/^[\s-]+/, "")
      .trim(),
  };
}

/**
 * Parses everything the numbering stages read from a filename in one pass
 */
export function parseEpisodeFilename(
  name: string,
  patterns: NumberingPatterns
): ParsedEpisodeFilename {
  const extension = name.match(/\.\w+$/)?.[0] ?? "";
  const stem = name.slice(0, name.length - extension.length);
  const date = name.match(patterns.date)?.[0];

  return {
    name,
    stem,
    extension,
    date,
    marker: findMarker(name, patterns.marker),
    numbered: findNumbered(name, patterns.numbered),
    ...splitAroundDate(name, date),
  };
}

/**
 * A file counts as numbered when it carries a marker or already uses the numbered layout
 */
export function hasEpisodeNumber(parsed: ParsedEpisodeFilename): boolean {
  return parsed.marker !== undefined || parsed.numbered !== undefined;
}

/**
 * Fills {placeholder} slots; unknown placeholders are left as written.
 * An empty leading slot is dropped along with the separator after it, so
 * "{prefix} - {date}" with no prefix renders as just the date.
 */
export function renderTemplate(
  template: string,
  values: Record<string, string>
): string {
  let source = template;
  const leading = /^\{(\w+)\}[\s-]*/.exec(source);
  if (
    leading &&
    Object.prototype.hasOwnProperty.call(values, leading[1]) &&
    values[leading[1]] === ""
  ) {
    source = source.slice(leading[0].length);
  }

  return source
    .replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
      Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
    )
    .trim();
}

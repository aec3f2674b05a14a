import type { LogLevel } from "../interfaces/numbering.interface";

/**
 * Console logging helpers shared by the numbering stages
 */

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    typeof value === "string" &&
    Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
  );
}

/**
 * Diagnostic output, filtered by the configured level
 */
export function log(message: string, level: LogLevel = "info"): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

  switch (level) {
    case "debug":
      console.debug(`🔍 ${message}`);
      break;
    case "info":
      console.info(message);
      break;
    case "warn":
      console.warn(`⚠️  ${message}`);
      break;
    case "error":
      console.error(`❌ ${message}`);
      break;
  }
}

export type AnnouncementKind =
  | "critical"
  | "error"
  | "warning"
  | "info"
  | "celebrate";

const ANNOUNCE_PREFIX: Record<AnnouncementKind, string> = {
  critical: "❌ ",
  error: "❗️ ",
  warning: "⚠️  ",
  info: "ℹ️  ",
  celebrate: "🎉 ",
};

/**
 * User-facing progress line, always printed
 */
export function announce(text: string, kind?: AnnouncementKind): void {
  const prefix = kind ? ANNOUNCE_PREFIX[kind] : "   ";
  console.log(`${prefix}${text}`);
}

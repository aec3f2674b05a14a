import type { EpisodeFile, RenameResult } from "./episode-file.interface";

/**
 * Settings consumed by the numbering stages
 * Patterns are stored as source strings and compiled where they are used
 */
export interface NumberingConfig {
  episodeMarkerPattern: string; // Needs named groups "label" and "number", optional "spacing"
  datePattern: string;
  numberedEpisodePattern: string; // Named groups: prefix, date, number, title, extension
  trailingNumberPattern: string; // Named groups: prefix, date, title, number, extension
  manualRenamePattern: string; // Named groups: prefix, date, title, extension
  episodeRenameTemplate: string; // Placeholders: {prefix} {date} {episode} {suffix}
  audioExtensions: string[];
  metadataDirectory: string;
  rssTimeoutMs: number;
  logLevel: LogLevel;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Result of reading the RSS feed
 * "unavailable" is an expected outcome, never an exception
 */
export type EpisodeTitlesResult =
  | { status: "loaded"; titles: string[] } // Feed order (newest first)
  | { status: "unavailable"; reason: string };

export type EpisodeTitleProvider = () => Promise<EpisodeTitlesResult>;

/**
 * Asks the user a question; null means the answer was blank
 */
export type AskFunction = (text: string) => Promise<string | null>;

/**
 * Summary of one checkNumbering run
 */
export interface NumberingReport {
  trailingFixed: RenameResult[];
  padded: RenameResult[];
  assigned: RenameResult[];
  manual: RenameResult[];
  unresolved: EpisodeFile[];
}

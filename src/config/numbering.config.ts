import type { NumberingConfig } from "../interfaces/numbering.interface";

/**
 * Numbering defaults, usable with no config file at all
 */
export const DEFAULT_NUMBERING_CONFIG: NumberingConfig = {
  /**
   * "Ep. 3", "Ep.3", "Episode 12" (matched case-insensitively)
   */
  episodeMarkerPattern: "\\b(?<label>Ep\\.|Episode)(?<spacing>\\s*)(?<number>\\d+)",

  datePattern: "\\d{4}-\\d{2}-\\d{2}",

  /**
   * "Show - 2021-01-01 07. Title.mp3"
   */
  numberedEpisodePattern:
    "^(?<prefix>(?:.* - )?)(?<date>\\d{4}-\\d{2}-\\d{2}) (?<number>\\d+)\\. (?<title>.*)(?<extension>\\.\\w+)$",

  /**
   * "Show - 2021-01-01 Title - 7.mp3"
   */
  trailingNumberPattern:
    "^(?<prefix>.* - )(?<date>\\d{4}-\\d{2}-\\d{2}) (?<title>.*?) - (?<number>\\d+)(?<extension>\\.\\w+)$",

  /**
   * "Show - 2021-01-01 Title.mp3", used when the user types a number
   */
  manualRenamePattern:
    "^(?:(?<prefix>.*) - )?(?<date>\\d{4}-\\d{2}-\\d{2}) (?<title>.*?)(?<extension>\\.\\w+)$",

  episodeRenameTemplate: "{prefix} - {date} {episode}. {suffix}",

  audioExtensions: [".mp3", ".m4a", ".aac", ".ogg", ".opus", ".wav", ".flac"],

  metadataDirectory: "Metadata",

  rssTimeoutMs: 30 * 1000,

  logLevel: "warn",
};

/**
 * A file found while scanning a podcast folder
 */
export interface EpisodeFile {
  path: string; // Absolute path on disk
  name: string; // Base name including extension
}

/**
 * An "Ep. 3" / "Episode 12" style marker found in a filename
 */
export interface EpisodeMarker {
  text: string; // Matched text, e.g. "Ep. 3"
  index: number; // Position of the match in the filename
  label: string; // "Ep." or "Episode", casing as found
  spacing: string; // Whitespace between label and number
  number: number;
}

/**
 * Parts of a filename already in the canonical numbered layout
 * e.g. "Show - 2021-01-01 07. Title.mp3"
 */
export interface NumberedFilename {
  prefix: string;
  date: string;
  number: number;
  title: string;
  extension: string;
}

/**
 * Everything the numbering stages need to know about a filename,
 * parsed once per scan
 */
export interface ParsedEpisodeFilename {
  name: string;
  stem: string; // Name without extension
  extension: string; // Including the dot, "" if none
  date?: string; // First YYYY-MM-DD found
  marker?: EpisodeMarker;
  numbered?: NumberedFilename;
  prefix: string; // Date-stripped name before the first " - "
  suffix: string; // Date-stripped name after the first " - " (keeps the extension)
}

/**
 * A rename that was carried out on disk
 */
export interface RenameResult {
  from: string;
  to: string;
  episode?: string; // Episode number written into the new name
}

/**
 * Files sharing a date, in traversal order
 */
export type DateGroups = Map<string, EpisodeFile[]>;

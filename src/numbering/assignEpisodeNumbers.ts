import type {
  DateGroups,
  RenameResult,
} from "../interfaces/episode-file.interface";
import type { NumberingConfig } from "../interfaces/numbering.interface";
import {
  compileNumberingPatterns,
  digitCount,
  padEpisodeNumber,
  parseEpisodeFilename,
  renderTemplate,
} from "../utils/episode-number.utils";
import { renameEpisodeFile } from "../utils/file.utils";
import { log } from "../utils/log.utils";
import { normalizeForMatch } from "../utils/slug.utils";

/**
 * Finds the ordinal (1-based) of the first title contained in the filename stem.
 * Titles must be normalized and in chronological order; empty titles never match.
 */
export function findEpisodeOrdinal(
  stem: string,
  normalizedTitles: string[]
): number | null {
  const normalizedStem = normalizeForMatch(stem);
  const index = normalizedTitles.findIndex(
    (title) => title.length > 0 && normalizedStem.includes(title)
  );
  return index === -1 ? null : index + 1;
}

/**
 * Numbers the files reported by detectNumberingGaps using their position in the feed.
 *
 * `titles` must be chronological (oldest first). The number is padded to the width of
 * the total episode count. Files that match no title keep their name. A title may be
 * claimed by more than one file; nothing enforces one file per ordinal.
 */
export function assignEpisodeNumbers(
  gaps: DateGroups,
  titles: string[],
  config: NumberingConfig
): RenameResult[] {
  if (titles.length === 0) {
    log("No episode titles available, skipping feed-based numbering", "info");
    return [];
  }

  const patterns = compileNumberingPatterns(config);
  const normalizedTitles = titles.map(normalizeForMatch);
  const width = digitCount(titles.length);
  const results: RenameResult[] = [];

  for (const [date, files] of gaps) {
    for (const file of files) {
      const parsed = parseEpisodeFilename(file.name, patterns);
      const ordinal = findEpisodeOrdinal(parsed.stem, normalizedTitles);

      if (ordinal === null) {
        log(`No feed title found in '${file.name}'`, "debug");
        continue;
      }

      const episode = padEpisodeNumber(ordinal, width);
      const newName = renderTemplate(config.episodeRenameTemplate, {
        prefix: parsed.prefix,
        date,
        episode,
        suffix: parsed.suffix,
      });

      const result = renameEpisodeFile(file, newName, episode);
      if (result) results.push(result);
    }
  }

  return results;
}

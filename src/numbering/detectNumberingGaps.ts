import type {
  DateGroups,
  EpisodeFile,
  ParsedEpisodeFilename,
} from "../interfaces/episode-file.interface";
import type { NumberingConfig } from "../interfaces/numbering.interface";
import {
  compileNumberingPatterns,
  hasEpisodeNumber,
  parseEpisodeFilename,
} from "../utils/episode-number.utils";
import { listEpisodeFiles } from "../utils/file.utils";

/**
 * Groups dated files by their date and keeps, per date, the files without an episode number.
 * Dates where every file is numbered are left out. Group order follows directory order.
 */
export function detectNumberingGaps(
  folderPath: string,
  config: NumberingConfig
): DateGroups {
  const patterns = compileNumberingPatterns(config);
  const byDate = new Map<
    string,
    { file: EpisodeFile; parsed: ParsedEpisodeFilename }[]
  >();

  for (const file of listEpisodeFiles(folderPath, config.metadataDirectory)) {
    const parsed = parseEpisodeFilename(file.name, patterns);
    if (!parsed.date) continue;

    const group = byDate.get(parsed.date) ?? [];
    group.push({ file, parsed });
    byDate.set(parsed.date, group);
  }

  const gaps: DateGroups = new Map();
  for (const [date, entries] of byDate) {
    const missing = entries
      .filter(({ parsed }) => !hasEpisodeNumber(parsed))
      .map(({ file }) => file);

    if (missing.length > 0) {
      gaps.set(date, missing);
    }
  }

  return gaps;
}

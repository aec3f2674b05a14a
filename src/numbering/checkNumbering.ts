import type { RenameResult } from "../interfaces/episode-file.interface";
import type {
  AskFunction,
  EpisodeTitleProvider,
  NumberingConfig,
  NumberingReport,
} from "../interfaces/numbering.interface";
import { announce, log } from "../utils/log.utils";
import { titlesOrEmpty } from "../utils/rss.utils";
import { askForMissingNumbers } from "./askForMissingNumbers";
import { assignEpisodeNumbers } from "./assignEpisodeNumbers";
import { detectNumberingGaps } from "./detectNumberingGaps";
import { moveTrailingEpisodeNumbers } from "./moveTrailingEpisodeNumbers";
import { padEpisodeNumbers } from "./padEpisodeNumbers";

export interface CheckNumberingOptions {
  config: NumberingConfig;
  loadTitles: EpisodeTitleProvider;
  ask: AskFunction;
}

/**
 * Makes episode numbers present and consistent across a podcast folder.
 *
 * Each stage re-reads the folder, since the one before it renames files in place:
 * 1. move trailing " - N" numbers next to the date
 * 2. zero-pad "Ep. N" markers
 * 3. find dated files without a number
 * 4. number them from their position in the RSS feed
 * 5. ask the user about whatever is still unnumbered
 */
export async function checkNumbering(
  folderPath: string,
  { config, loadTitles, ask }: CheckNumberingOptions
): Promise<NumberingReport> {
  announce("Checking if episode numbers are present and consistent", "info");

  const trailingFixed = moveTrailingEpisodeNumbers(folderPath, config);
  const padded = padEpisodeNumbers(folderPath, config);
  const gaps = detectNumberingGaps(folderPath, config);

  let assigned: RenameResult[] = [];
  if (gaps.size > 0) {
    const missingCount = [...gaps.values()].reduce(
      (total, files) => total + files.length,
      0
    );
    log(
      `${missingCount} dated files across ${gaps.size} dates have no episode number`,
      "info"
    );

    // Feeds list newest first; ordinals count from the oldest
    const titles = [...titlesOrEmpty(await loadTitles())].reverse();
    assigned = assignEpisodeNumbers(gaps, titles, config);
  }

  const { manual, unresolved } = await askForMissingNumbers(
    folderPath,
    config,
    ask
  );

  return { trailingFixed, padded, assigned, manual, unresolved };
}

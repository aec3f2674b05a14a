import type { RenameResult } from "../interfaces/episode-file.interface";
import type { NumberingConfig } from "../interfaces/numbering.interface";
import { compileNumberingPatterns } from "../utils/episode-number.utils";
import { listEpisodeFiles, renameEpisodeFile } from "../utils/file.utils";

/**
 * Moves an episode number from the end of a filename to just after its date:
 * "Show - 2021-01-01 Title - 12.mp3" -> "Show - 2021-01-01 12. Title.mp3"
 */
export function moveTrailingEpisodeNumbers(
  folderPath: string,
  config: NumberingConfig
): RenameResult[] {
  const { trailing } = compileNumberingPatterns(config);
  const results: RenameResult[] = [];

  for (const file of listEpisodeFiles(folderPath, config.metadataDirectory)) {
    const groups = trailing.exec(file.name)?.groups;
    if (!groups || !groups.number) continue;

    const title = (groups.title ?? "").replace(/[\s-]+$/, "").trim();
    const newName = `${groups.prefix ?? ""}${groups.date ?? ""} ${groups.number}. ${title}${groups.extension ?? ""}`;

    const result = renameEpisodeFile(file, newName, groups.number);
    if (result) results.push(result);
  }

  return results;
}

import path from "path";
import type {
  EpisodeFile,
  RenameResult,
} from "../interfaces/episode-file.interface";
import type {
  AskFunction,
  NumberingConfig,
} from "../interfaces/numbering.interface";
import {
  compileNumberingPatterns,
  hasEpisodeNumber,
  parseEpisodeFilename,
  renderTemplate,
} from "../utils/episode-number.utils";
import { listEpisodeFiles, renameEpisodeFile } from "../utils/file.utils";
import { log } from "../utils/log.utils";

export interface ManualNumberingResult {
  manual: RenameResult[];
  unresolved: EpisodeFile[];
}

/**
 * Last pass: asks the user for the number of every dated audio file still unnumbered.
 * Only prompts when the podcast uses numbering at all (some file is numbered); otherwise
 * every unnumbered audio file is reported as unresolved. Undated files can't be placed
 * and are reported without a prompt. A blank or non-numeric answer skips the file.
 */
export async function askForMissingNumbers(
  folderPath: string,
  config: NumberingConfig,
  ask: AskFunction
): Promise<ManualNumberingResult> {
  const patterns = compileNumberingPatterns(config);
  const scanned = listEpisodeFiles(folderPath, config.metadataDirectory).map(
    (file) => ({ file, parsed: parseEpisodeFilename(file.name, patterns) })
  );

  const missing = scanned.filter(
    ({ file, parsed }) =>
      !hasEpisodeNumber(parsed) &&
      config.audioExtensions.includes(path.extname(file.name).toLowerCase())
  );

  if (!scanned.some(({ parsed }) => hasEpisodeNumber(parsed))) {
    log("No numbered episodes found, not asking for numbers", "debug");
    return { manual: [], unresolved: missing.map(({ file }) => file) };
  }

  const manual: RenameResult[] = [];
  const unresolved: EpisodeFile[] = [];

  for (const { file, parsed } of missing) {
    if (parsed.date === undefined) {
      log(`'${file.name}' has no date, number it by hand`, "warn");
      unresolved.push(file);
      continue;
    }

    const answer = await ask(`Episode number for '${file.name}' (blank skips)`);

    if (answer === null || answer.trim() === "") {
      unresolved.push(file);
      continue;
    }

    const episode = answer.trim();
    if (!/^\d+$/.test(episode)) {
      log(`'${episode}' is not an episode number, skipping '${file.name}'`, "warn");
      unresolved.push(file);
      continue;
    }

    const groups = patterns.manual.exec(file.name)?.groups;
    if (!groups) {
      log(`Can't work out the parts of '${file.name}', skipping`, "warn");
      unresolved.push(file);
      continue;
    }

    const newName = renderTemplate(config.episodeRenameTemplate, {
      prefix: (groups.prefix ?? "").trim(),
      date: groups.date ?? "",
      episode,
      suffix: `${(groups.title ?? "").trim()}${groups.extension ?? ""}`,
    });

    const result = renameEpisodeFile(file, newName, episode);
    if (result) manual.push(result);
  }

  return { manual, unresolved };
}

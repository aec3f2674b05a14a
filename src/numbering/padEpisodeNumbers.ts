import type { RenameResult } from "../interfaces/episode-file.interface";
import type { NumberingConfig } from "../interfaces/numbering.interface";
import {
  compileNumberingPatterns,
  digitCount,
  padEpisodeNumber,
  parseEpisodeFilename,
} from "../utils/episode-number.utils";
import { listEpisodeFiles, renameEpisodeFile } from "../utils/file.utils";
import { log } from "../utils/log.utils";

/**
 * Zero-pads every "Ep. N" marker to the width of the highest episode number,
 * so "Ep.1", "Ep.23", "Ep.7" become "Ep.01", "Ep.23", "Ep.07"
 *
 * Running it again on padded files renames nothing.
 */
export function padEpisodeNumbers(
  folderPath: string,
  config: NumberingConfig
): RenameResult[] {
  const patterns = compileNumberingPatterns(config);

  const marked = listEpisodeFiles(folderPath, config.metadataDirectory).flatMap(
    (file) => {
      const { marker } = parseEpisodeFilename(file.name, patterns);
      return marker ? [{ file, marker }] : [];
    }
  );

  if (marked.length === 0) {
    log("No episode markers found, nothing to pad", "debug");
    return [];
  }

  const maxNumber = Math.max(...marked.map(({ marker }) => marker.number));
  const width = digitCount(maxNumber);
  log(`Padding ${marked.length} episode markers to ${width} digits`, "debug");

  const results: RenameResult[] = [];
  for (const { file, marker } of marked) {
    const padded = padEpisodeNumber(marker.number, width);
    const newName =
      file.name.slice(0, marker.index) +
      `${marker.label}${marker.spacing}${padded}` +
      file.name.slice(marker.index + marker.text.length);

    const result = renameEpisodeFile(file, newName, padded);
    if (result) results.push(result);
  }

  return results;
}

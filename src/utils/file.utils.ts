import fs from "fs";
import path from "path";
import type {
  EpisodeFile,
  RenameResult,
} from "../interfaces/episode-file.interface";
import { RenameCollisionError } from "./errors.utils";
import { log } from "./log.utils";

/**
 * Utilities for listing and renaming episode files
 */

/**
 * Lists every file under folderPath, depth first, in directory order
 * Directories named like the metadata directory are skipped
 */
export function listEpisodeFiles(
  folderPath: string,
  metadataDirectory: string
): EpisodeFile[] {
  const files: EpisodeFile[] = [];

  for (const entry of fs.readdirSync(folderPath, { withFileTypes: true })) {
    const entryPath = path.join(folderPath, entry.name);

    if (entry.isDirectory()) {
      if (entry.name === metadataDirectory) continue;
      files.push(...listEpisodeFiles(entryPath, metadataDirectory));
    } else if (entry.isFile()) {
      files.push({ path: entryPath, name: entry.name });
    }
  }

  return files;
}

function isSameFile(a: string, b: string): boolean {
  const statA = fs.statSync(a);
  const statB = fs.statSync(b);
  return statA.ino === statB.ino && statA.dev === statB.dev;
}

/**
 * Renames a file within its directory
 * Returns null when the name is unchanged; throws RenameCollisionError instead of overwriting
 */
export function renameEpisodeFile(
  file: EpisodeFile,
  newName: string,
  episode?: string
): RenameResult | null {
  if (newName === file.name) return null;

  const newPath = path.join(path.dirname(file.path), newName);

  // A case-only rename on a case-insensitive disk finds the source itself
  if (fs.existsSync(newPath) && !isSameFile(file.path, newPath)) {
    throw new RenameCollisionError(file.name, newName);
  }

  log(`Renaming '${file.name}' to '${newName}'`, "debug");
  fs.renameSync(file.path, newPath);

  return episode === undefined
    ? { from: file.name, to: newName }
    : { from: file.name, to: newName, episode };
}

import fs from "fs";
import os from "os";
import path from "path";

/**
 * Creates a temporary podcast folder holding empty files with the given names
 * Names may include sub-directories ("Season 1/Show - ...mp3")
 */
export function createPodcastFolder(names: string[]): string {
  const folder = fs.mkdtempSync(path.join(os.tmpdir(), "numbering-"));
  for (const name of names) {
    const filePath = path.join(folder, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, name);
  }
  return folder;
}

/**
 * File names directly inside folder, sorted
 */
export function listNames(folder: string): string[] {
  return fs
    .readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

export function removeFolder(folder: string | undefined): void {
  if (folder === undefined) return;
  fs.rmSync(folder, { recursive: true, force: true });
}

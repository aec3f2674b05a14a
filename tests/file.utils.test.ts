import fs from "fs";
import path from "path";
import { afterEach, describe, it, expect } from "vitest";
import { RenameCollisionError } from "../src/utils/errors.utils";
import { listEpisodeFiles, renameEpisodeFile } from "../src/utils/file.utils";
import { createPodcastFolder, listNames, removeFolder } from "./helpers";

let folder: string;

afterEach(() => {
  removeFolder(folder);
});

describe("listEpisodeFiles", () => {
  it("walks sub-directories and skips the metadata directory", () => {
    folder = createPodcastFolder([
      "Show - 2021-01-01 A.mp3",
      "Season 2/Show - 2022-01-01 B.mp3",
      "Metadata/podcast.rss",
    ]);

    const files = listEpisodeFiles(folder, "Metadata");

    expect(files.map((file) => file.name).sort()).toEqual([
      "Show - 2021-01-01 A.mp3",
      "Show - 2022-01-01 B.mp3",
    ]);
    expect(files.find((file) => file.name.includes("B"))?.path).toBe(
      path.join(folder, "Season 2", "Show - 2022-01-01 B.mp3")
    );
  });
});

describe("renameEpisodeFile", () => {
  it("renames within the same directory", () => {
    folder = createPodcastFolder(["old.mp3"]);
    const [file] = listEpisodeFiles(folder, "Metadata");

    const result = renameEpisodeFile(file, "new.mp3", "04");

    expect(result).toEqual({ from: "old.mp3", to: "new.mp3", episode: "04" });
    expect(listNames(folder)).toEqual(["new.mp3"]);
  });

  it("returns null when the name does not change", () => {
    folder = createPodcastFolder(["same.mp3"]);
    const [file] = listEpisodeFiles(folder, "Metadata");

    expect(renameEpisodeFile(file, "same.mp3")).toBeNull();
  });

  it("refuses to overwrite another file", () => {
    folder = createPodcastFolder(["a.mp3", "b.mp3"]);
    const file = { path: path.join(folder, "a.mp3"), name: "a.mp3" };

    expect(() => renameEpisodeFile(file, "b.mp3")).toThrow(RenameCollisionError);
    expect(listNames(folder)).toEqual(["a.mp3", "b.mp3"]);
    expect(fs.readFileSync(path.join(folder, "b.mp3"), "utf-8")).toBe("b.mp3");
  });
});

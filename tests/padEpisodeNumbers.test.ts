import fs from "fs";
import path from "path";
import { afterEach, describe, it, expect } from "vitest";
import { DEFAULT_NUMBERING_CONFIG } from "../src/config/numbering.config";
import { padEpisodeNumbers } from "../src/numbering/padEpisodeNumbers";
import { RenameCollisionError } from "../src/utils/errors.utils";
import { createPodcastFolder, listNames, removeFolder } from "./helpers";

const config = DEFAULT_NUMBERING_CONFIG;
let folder: string;

afterEach(() => {
  removeFolder(folder);
});

describe("padEpisodeNumbers", () => {
  it("pads every marker to the width of the highest number", () => {
    folder = createPodcastFolder([
      "Show - Ep.1 Start.mp3",
      "Show - Ep.23 Middle.mp3",
      "Show - Ep.7 Later.mp3",
    ]);

    const results = padEpisodeNumbers(folder, config);

    expect(listNames(folder)).toEqual([
      "Show - Ep.01 Start.mp3",
      "Show - Ep.07 Later.mp3",
      "Show - Ep.23 Middle.mp3",
    ]);
    expect(results).toHaveLength(2);
    expect(results).toContainEqual({
      from: "Show - Ep.1 Start.mp3",
      to: "Show - Ep.01 Start.mp3",
      episode: "01",
    });
  });

  it("is idempotent", () => {
    folder = createPodcastFolder([
      "Show - Ep.1 Start.mp3",
      "Show - Ep.23 Middle.mp3",
    ]);

    padEpisodeNumbers(folder, config);
    const once = listNames(folder);
    const second = padEpisodeNumbers(folder, config);

    expect(second).toEqual([]);
    expect(listNames(folder)).toEqual(once);
  });

  it("re-pads over-padded numbers and keeps label casing and spacing", () => {
    folder = createPodcastFolder([
      "Show Episode 007 Old.mp3",
      "Show episode 12 New.mp3",
    ]);

    padEpisodeNumbers(folder, config);

    expect(listNames(folder)).toEqual([
      "Show Episode 07 Old.mp3",
      "Show episode 12 New.mp3",
    ]);
  });

  it("pads files in sub-directories", () => {
    folder = createPodcastFolder(["Season 1/Show Ep. 2.mp3", "Show Ep. 10.mp3"]);

    padEpisodeNumbers(folder, config);

    expect(fs.readdirSync(path.join(folder, "Season 1"))).toEqual([
      "Show Ep. 02.mp3",
    ]);
  });

  it("does nothing when no file has a marker", () => {
    folder = createPodcastFolder(["Show - 2021-01-01 Intro.mp3", "cover.jpg"]);

    expect(padEpisodeNumbers(folder, config)).toEqual([]);
    expect(listNames(folder)).toEqual(["Show - 2021-01-01 Intro.mp3", "cover.jpg"]);
  });

  it("stops instead of overwriting when two files pad to the same name", () => {
    folder = createPodcastFolder(["Show Ep.1.mp3", "Show Ep.01.mp3"]);

    expect(() => padEpisodeNumbers(folder, config)).toThrow(RenameCollisionError);
    expect(listNames(folder)).toEqual(["Show Ep.01.mp3", "Show Ep.1.mp3"]);
  });
});

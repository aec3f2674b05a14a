import path from "path";

/**
 * Default locations, relative to the working directory the CLI runs in
 */
export const PATHS = {
  /**
   * Optional user config file
   */
  userConfig: path.join(process.cwd(), "config.yaml"),

  /**
   * Cached copy of the RSS feed inside a podcast folder
   */
  feedFile: (folderPath: string, metadataDirectory: string): string =>
    path.join(folderPath, metadataDirectory, "podcast.rss"),
} as const;

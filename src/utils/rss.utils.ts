import fs from "fs";
import path from "path";
import axios from "axios";
import Parser from "rss-parser";
import type { EpisodeTitlesResult } from "../interfaces/numbering.interface";
import { PATHS } from "../config/paths.config";
import { log } from "./log.utils";

/**
 * Utilities for reading episode titles from a podcast RSS feed
 */

export interface FeedOptions {
  folderPath: string;
  metadataDirectory: string;
  timeoutMs: number;
}

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

/**
 * Returns the feed XML, preferring the copy kept in the podcast's metadata directory
 */
async function readFeedXml(
  source: string | undefined,
  feedFile: string,
  timeoutMs: number
): Promise<{ xml: string; saved: boolean }> {
  if (fs.existsSync(feedFile)) {
    log(`Using saved feed ${feedFile}`, "debug");
    return { xml: fs.readFileSync(feedFile, "utf-8"), saved: true };
  }

  if (!source) {
    throw new Error("No RSS feed given and no saved feed found");
  }

  if (isUrl(source)) {
    log(`Downloading RSS feed from ${source}`, "debug");
    const response = await axios.get<string>(source, {
      responseType: "text",
      timeout: timeoutMs,
    });
    return { xml: response.data, saved: false };
  }

  return { xml: fs.readFileSync(source, "utf-8"), saved: false };
}

function saveFeedXml(feedFile: string, xml: string): void {
  fs.mkdirSync(path.dirname(feedFile), { recursive: true });
  fs.writeFileSync(feedFile, xml);
  log(`RSS feed saved to ${feedFile}`, "debug");
}

/**
 * Episode titles in feed order (usually newest first)
 * Items without a title keep their slot as "" so positions stay meaningful
 */
export async function extractEpisodeTitles(xml: string): Promise<string[]> {
  const parser = new Parser();
  const feed = await parser.parseString(xml);
  return (feed.items ?? []).map((item) => item.title?.trim() ?? "");
}

/**
 * Loads episode titles for a podcast folder
 * A downloaded or local feed is saved in the metadata directory for the next run.
 * Failures are logged and reported as "unavailable", never thrown
 */
export async function loadEpisodeTitles(
  source: string | undefined,
  options: FeedOptions
): Promise<EpisodeTitlesResult> {
  try {
    const feedFile = PATHS.feedFile(
      options.folderPath,
      options.metadataDirectory
    );
    const { xml, saved } = await readFeedXml(
      source,
      feedFile,
      options.timeoutMs
    );
    const titles = await extractEpisodeTitles(xml);

    // Only keep a copy once it is known to parse
    if (!saved) saveFeedXml(feedFile, xml);
    log(`Found ${titles.length} episodes in the RSS feed`, "debug");
    return { status: "loaded", titles };
  } catch (error) {
    let reason: string;
    if (axios.isAxiosError(error) && error.response) {
      reason = `Status: ${error.response.status}`;
    } else {
      reason = error instanceof Error ? error.message : String(error);
    }
    log(`Could not read the RSS feed: ${reason}`, "warn");
    return { status: "unavailable", reason };
  }
}

export function titlesOrEmpty(result: EpisodeTitlesResult): string[] {
  return result.status === "loaded" ? result.titles : [];
}

#!/usr/bin/env node
import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { checkNumbering } from "./numbering/checkNumbering";
import { formatReport, parseCliArgs, USAGE } from "./utils/cli.utils";
import { loadConfig } from "./utils/config.utils";
import { announce, setLogLevel } from "./utils/log.utils";
import { ask } from "./utils/prompt.utils";
import { loadEpisodeTitles } from "./utils/rss.utils";

// Load environment variables from .env file
dotenv.config();

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (!args.folder) {
    console.error(USAGE);
    process.exit(1);
  }

  const folderPath = path.resolve(args.folder);
  if (!fs.existsSync(folderPath) || !fs.statSync(folderPath).isDirectory()) {
    console.error(`Error: ${folderPath} is not a folder.`);
    console.error(USAGE);
    process.exit(1);
  }

  const config = loadConfig(args.config);
  setLogLevel(args.debug ? "debug" : config.logLevel);

  const rssSource = args.rss ?? process.env.PODCAST_RSS_URL;

  const report = await checkNumbering(folderPath, {
    config,
    loadTitles: () =>
      loadEpisodeTitles(rssSource, {
        folderPath,
        metadataDirectory: config.metadataDirectory,
        timeoutMs: config.rssTimeoutMs,
      }),
    ask,
  });

  console.log("");
  for (const line of formatReport(report)) {
    console.log(line);
  }

  if (report.unresolved.length === 0) {
    announce("Episode numbering is consistent", "celebrate");
  }
}

main().catch((error) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});

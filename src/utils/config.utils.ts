import fs from "fs";
import yaml from "js-yaml";
import { z } from "zod";
import type {
  LogLevel,
  NumberingConfig,
} from "../interfaces/numbering.interface";
import { DEFAULT_NUMBERING_CONFIG } from "../config/numbering.config";
import { PATHS } from "../config/paths.config";
import { compileNumberingPatterns } from "./episode-number.utils";
import { ConfigError } from "./errors.utils";
import { isLogLevel, log } from "./log.utils";

/**
 * Loading of config.yaml on top of the built-in defaults
 */

const optionalString = (key: string) =>
  z.string({ invalid_type_error: `${key} must be a string` }).nullish();

/**
 * ".MP3" and "mp3" both become ".mp3"
 */
function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

const ConfigFileSchema = z.object(
  {
    episode_marker_pattern: optionalString("episode_marker_pattern"),
    date_pattern: optionalString("date_pattern"),
    numbered_episode_pattern: optionalString("numbered_episode_pattern"),
    trailing_number_pattern: optionalString("trailing_number_pattern"),
    manual_rename_pattern: optionalString("manual_rename_pattern"),
    episode_rename_template: optionalString("episode_rename_template"),
    metadata_directory: optionalString("metadata_directory"),
    rss_timeout_ms: z
      .number({ invalid_type_error: "rss_timeout_ms must be a positive number" })
      .finite({ message: "rss_timeout_ms must be a positive number" })
      .positive({ message: "rss_timeout_ms must be a positive number" })
      .nullish(),
    audio_extensions: z
      .array(
        z.string({
          invalid_type_error: "audio_extensions must be a list of strings",
        }),
        { invalid_type_error: "audio_extensions must be a list of strings" }
      )
      .transform((extensions) => extensions.map(normalizeExtension))
      .nullish(),
    log_level: z
      .string({ invalid_type_error: "log_level must be a string" })
      .transform((value, ctx): LogLevel => {
        const lower = value.toLowerCase();
        if (!isLogLevel(lower)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `log_level must be one of debug, info, warn, error (got "${value}")`,
          });
          return z.NEVER;
        }
        return lower;
      })
      .nullish(),
  },
  { invalid_type_error: "Config must be a mapping of settings" }
);

/**
 * Maps parsed YAML (snake_case keys) onto a NumberingConfig, validating as it goes
 */
export function parseConfig(
  raw: unknown,
  base: NumberingConfig = DEFAULT_NUMBERING_CONFIG
): NumberingConfig {
  const result = ConfigFileSchema.nullish().safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => issue.message).join("; ")
    );
  }

  const file = result.data ?? {};
  const config: NumberingConfig = {
    episodeMarkerPattern: file.episode_marker_pattern ?? base.episodeMarkerPattern,
    datePattern: file.date_pattern ?? base.datePattern,
    numberedEpisodePattern:
      file.numbered_episode_pattern ?? base.numberedEpisodePattern,
    trailingNumberPattern:
      file.trailing_number_pattern ?? base.trailingNumberPattern,
    manualRenamePattern: file.manual_rename_pattern ?? base.manualRenamePattern,
    episodeRenameTemplate:
      file.episode_rename_template ?? base.episodeRenameTemplate,
    audioExtensions: file.audio_extensions ?? [...base.audioExtensions],
    metadataDirectory: file.metadata_directory ?? base.metadataDirectory,
    rssTimeoutMs: file.rss_timeout_ms ?? base.rssTimeoutMs,
    logLevel: file.log_level ?? base.logLevel,
  };

  // Fail on bad patterns now rather than halfway through renaming
  compileNumberingPatterns(config);

  return config;
}

/**
 * Reads the config file (explicit path, or config.yaml in the working directory if present)
 * LOG_LEVEL in the environment overrides log_level
 */
export function loadConfig(
  configFile?: string,
  env: NodeJS.ProcessEnv = process.env
): NumberingConfig {
  const file = configFile ?? PATHS.userConfig;
  let config: NumberingConfig;

  if (fs.existsSync(file)) {
    let raw: unknown;
    try {
      raw = yaml.load(fs.readFileSync(file, "utf-8"));
    } catch (error) {
      throw new ConfigError(
        `Could not parse ${file}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
    config = parseConfig(raw);
    log(`Loaded config from ${file}`, "debug");
  } else if (configFile) {
    throw new ConfigError(`Config file not found: ${configFile}`);
  } else {
    log("'config.yaml' not found, using defaults", "debug");
    config = parseConfig(undefined);
  }

  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel !== undefined && isLogLevel(envLevel)) {
    config.logLevel = envLevel;
  }

  return config;
}

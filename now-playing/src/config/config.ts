import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { homedir } from "node:os";
import type { Config, PartialConfig } from "./types.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { ConfigError } from "../errors.js";
import { logger } from "../utils/logger.js";

/** Where config files are looked up; overridable for tests */
export interface ConfigLocations {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(
  section: Record<string, unknown>,
  key: string,
  source: string
): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${key} must be a string (in ${source})`);
  }
  return value;
}

function readNumber(
  section: Record<string, unknown>,
  key: string,
  source: string
): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number (in ${source})`);
  }
  return value;
}

function readNullableNumber(
  section: Record<string, unknown>,
  key: string,
  source: string
): number | null | undefined {
  if (section[key] === null) return null;
  return readNumber(section, key, source);
}

function readSection(
  root: Record<string, unknown>,
  key: string,
  source: string
): Record<string, unknown> {
  const value = root[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be an object (in ${source})`);
  }
  return value;
}

/**
 * Check the shape of a parsed config file and copy out the known fields
 */
export function toPartialConfig(value: unknown, source: string): PartialConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`${source} must contain a JSON object`);
  }

  const site = readSection(value, "site", source);
  const network = readSection(value, "network", source);
  const matching = readSection(value, "matching", source);

  let debug: boolean | undefined;
  if (typeof value.debug === "boolean") {
    debug = value.debug;
  } else if (value.debug !== undefined) {
    throw new ConfigError(`debug must be true or false (in ${source})`);
  }

  return {
    site: {
      baseUrl: readString(site, "baseUrl", source),
      directoryPath: readString(site, "directoryPath", source),
      channelPath: readString(site, "channelPath", source),
    },
    network: {
      timeoutMs: readNumber(network, "timeoutMs", source),
      maxConcurrency: readNumber(network, "maxConcurrency", source),
      batchDeadlineMs: readNullableNumber(network, "batchDeadlineMs", source),
      userAgent: readString(network, "userAgent", source),
    },
    matching: {
      delimiter: readString(matching, "delimiter", source),
    },
    debug,
  };
}

/**
 * Merge partial configs over a base, later configs taking precedence
 */
export function mergeConfigs(
  base: Config,
  ...configs: Array<PartialConfig | null>
): Config {
  let merged: Config = base;

  for (const config of configs) {
    if (!config) continue;
    const { site = {}, network = {}, matching = {} } = config;
    merged = {
      site: {
        baseUrl: site.baseUrl ?? merged.site.baseUrl,
        directoryPath: site.directoryPath ?? merged.site.directoryPath,
        channelPath: site.channelPath ?? merged.site.channelPath,
      },
      network: {
        timeoutMs: network.timeoutMs ?? merged.network.timeoutMs,
        maxConcurrency: network.maxConcurrency ?? merged.network.maxConcurrency,
        // null is a real value here ("no deadline")
        batchDeadlineMs:
          network.batchDeadlineMs !== undefined
            ? network.batchDeadlineMs
            : merged.network.batchDeadlineMs,
        userAgent: network.userAgent ?? merged.network.userAgent,
      },
      matching: {
        delimiter: matching.delimiter ?? merged.matching.delimiter,
      },
      debug: config.debug ?? merged.debug,
    };
  }

  return merged;
}

/**
 * Read overrides from NOW_PLAYING_* environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const readNumberVar = (name: string): number | undefined => {
    const raw = env[name];
    if (!raw) return undefined;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError(`${name} must be a number, got "${raw}"`);
    }
    return parsed;
  };

  return {
    site: { baseUrl: env.NOW_PLAYING_BASE_URL || undefined },
    network: {
      timeoutMs: readNumberVar("NOW_PLAYING_TIMEOUT_MS"),
      maxConcurrency: readNumberVar("NOW_PLAYING_MAX_CONCURRENCY"),
    },
  };
}

/**
 * Validates the merged configuration
 * @throws ConfigError if any value is out of range
 */
export function validateConfig(config: Config): void {
  let url: URL;
  try {
    url = new URL(config.site.baseUrl);
  } catch {
    throw new ConfigError(`baseUrl is not a valid URL: "${config.site.baseUrl}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`baseUrl must use http or https: "${config.site.baseUrl}"`);
  }

  if (!config.site.channelPath.includes("{id}")) {
    throw new ConfigError('channelPath must contain the "{id}" placeholder');
  }

  if (config.network.timeoutMs <= 0) {
    throw new ConfigError("timeoutMs must be greater than 0");
  }

  if (!Number.isInteger(config.network.maxConcurrency) || config.network.maxConcurrency < 1) {
    throw new ConfigError("maxConcurrency must be a positive integer");
  }

  if (config.network.batchDeadlineMs !== null && config.network.batchDeadlineMs <= 0) {
    throw new ConfigError("batchDeadlineMs must be greater than 0 or null");
  }

  if (config.matching.delimiter.trim().length === 0) {
    throw new ConfigError("delimiter must contain a non-whitespace character");
  }
}

/**
 * Load a config file. Returns null if the file does not exist.
 */
async function loadConfigFile(path: string): Promise<PartialConfig | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  logger.debug(`Loaded config from: ${path}`);
  return toPartialConfig(parsed, path);
}

/**
 * Load configuration with hierarchy:
 * 1. Explicit config file path (highest priority, must exist)
 * 2. NOW_PLAYING_* environment variables
 * 3. ~/.config/now-playing/config.json
 * 4. ./now-playing.json
 * 5. Default config (lowest priority)
 */
export async function loadConfig(
  configPath?: string,
  locations: ConfigLocations = {}
): Promise<Config> {
  const cwd = locations.cwd ?? process.cwd();
  const home = locations.homeDir ?? homedir();
  const env = locations.env ?? process.env;

  const localConfig = await loadConfigFile(resolve(cwd, "now-playing.json"));
  const userConfig = await loadConfigFile(join(home, ".config", "now-playing", "config.json"));

  let explicitConfig: PartialConfig | null = null;
  if (configPath) {
    const explicitPath = resolve(cwd, configPath);
    explicitConfig = await loadConfigFile(explicitPath);
    if (!explicitConfig) {
      throw new ConfigError(`Config file not found: ${explicitPath}`);
    }
  }

  const config = mergeConfigs(
    DEFAULT_CONFIG,
    localConfig,
    userConfig,
    configFromEnv(env),
    explicitConfig
  );
  validateConfig(config);

  return config;
}

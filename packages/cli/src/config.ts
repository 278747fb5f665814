import * as path from "node:path";
import {
  ConfigError,
  loadHostConfig,
  parseHostConfig,
  type HostConfig,
} from "@dockyard/host";
import { createLogger, type Logger } from "@dockyard/resolver";

/** File looked up in the working directory when no source is given. */
export const DEFAULT_CONFIG_FILE = "dockyard.json";

export type ConfigSource = {
  /** The whole configuration as a JSON string. */
  config?: string;
  /** Path to a configuration file. */
  path?: string;
};

export type LoadedConfig = {
  config: HostConfig;
  /** Directory that relative paths in the configuration are resolved against. */
  root: string;
};

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof ConfigError &&
    typeof error.cause === "object" &&
    error.cause !== null &&
    "code" in error.cause &&
    error.cause.code === "ENOENT"
  );
}

/**
 * Determines and loads the host configuration.
 *
 * The source is picked in this order:
 * 1. `--config <JSON_STRING>`: relative paths resolve against `cwd`.
 * 2. `--path <FILE_PATH>`: the file must exist; relative paths resolve
 *    against its directory.
 * 3. `dockyard.json` in `cwd`. A missing file means defaults.
 *
 * @throws A `ConfigError` if the chosen source is unreadable or invalid.
 */
export async function getConfig(
  source: ConfigSource,
  cwd: string = process.cwd(),
  logger: Logger = createLogger("Config")
): Promise<LoadedConfig> {
  if (source.config !== undefined) {
    logger.info("Using configuration from --config argument.");
    let raw: unknown;
    try {
      raw = JSON.parse(source.config);
    } catch (error) {
      throw new ConfigError("Invalid JSON in --config argument.", [], error);
    }
    return { config: parseHostConfig(raw), root: cwd };
  }

  if (source.path !== undefined) {
    const configPath = path.resolve(cwd, source.path);
    logger.info(`Using explicit config path: ${configPath}`);
    return {
      config: await loadHostConfig(configPath),
      root: path.dirname(configPath),
    };
  }

  const configPath = path.join(cwd, DEFAULT_CONFIG_FILE);
  try {
    return { config: await loadHostConfig(configPath), root: cwd };
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    logger.warn(`Config file not found at ${configPath}. Using default settings.`);
    return { config: parseHostConfig({}), root: cwd };
  }
}

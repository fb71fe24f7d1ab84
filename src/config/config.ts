/**
 * Loader configuration.
 *
 * Settings come from `topoload.config.yml` in the working directory (or an
 * explicit path), validated against `configSchema.json`, then overridden
 * by `TOPOLOAD_LOG_LEVEL` and `TOPOLOAD_STRICT`.
 */

import Ajv from "ajv";
import * as YAML from "yaml"; // https://github.com/eemeli/yaml

import { nodeFsAdapter } from "../io/NodeFsAdapter";
import type { FileSystemAdapter } from "../io/types";
import { nullLogger, type ParserLogger } from "../parsing/types";
import { KNOWN_NODE_TYPES } from "../types/topology";
import { isLogThreshold, type LogThreshold } from "../utilities/loggerUtils";
import type { LivenessMode } from "../validation/types";

import configSchema from "./configSchema.json";

export const CONFIG_FILE_NAME = "topoload.config.yml";
export const ENV_LOG_LEVEL = "TOPOLOAD_LOG_LEVEL";
export const ENV_STRICT = "TOPOLOAD_STRICT";

export interface TopologyConfig {
  logLevel: LogThreshold;
  strict: boolean;
  validation: {
    supportedNodeTypes: string[];
    linkedPortLiveness: LivenessMode;
  };
}

/**
 * Shape of the config file; every key is optional.
 */
export interface ConfigFile {
  logLevel?: LogThreshold;
  strict?: boolean;
  validation?: Partial<TopologyConfig["validation"]>;
}

export const DEFAULT_CONFIG: Readonly<TopologyConfig> = {
  logLevel: "warn",
  strict: false,
  validation: {
    supportedNodeTypes: [...KNOWN_NODE_TYPES],
    linkedPortLiveness: "auto"
  }
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const ajv = new Ajv({
  strict: false,
  allErrors: true
});
ajv.addKeyword({
  keyword: "markdownDescription",
  schemaType: "string",
  compile: () => () => true
});
const validateConfigFile = ajv.compile<ConfigFile>(configSchema);

/**
 * Parses and schema-checks config file content.
 *
 * @param source - File path, used in error messages
 * @throws ConfigError when the YAML is malformed or fails the schema
 */
export function parseConfig(content: string, source: string): ConfigFile {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const data = raw ?? {};
  if (!validateConfigFile(data)) {
    throw new ConfigError(`Invalid configuration in ${source}: ${ajv.errorsText(validateConfigFile.errors)}`);
  }
  return data;
}

function parseBooleanEnv(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off", ""].includes(normalized)) return false;
  throw new ConfigError(`${name} must be a boolean, got '${value}'`);
}

/**
 * Merges file settings over defaults, then applies environment overrides.
 */
export function resolveConfig(
  file: ConfigFile,
  env: Readonly<Record<string, string | undefined>> = {}
): TopologyConfig {
  const config: TopologyConfig = {
    logLevel: file.logLevel ?? DEFAULT_CONFIG.logLevel,
    strict: file.strict ?? DEFAULT_CONFIG.strict,
    validation: {
      supportedNodeTypes: file.validation?.supportedNodeTypes ?? [...DEFAULT_CONFIG.validation.supportedNodeTypes],
      linkedPortLiveness: file.validation?.linkedPortLiveness ?? DEFAULT_CONFIG.validation.linkedPortLiveness
    }
  };

  const level = env[ENV_LOG_LEVEL];
  if (level !== undefined && level !== "") {
    if (!isLogThreshold(level)) {
      throw new ConfigError(`${ENV_LOG_LEVEL} must be one of debug, info, warn, error, silent; got '${level}'`);
    }
    config.logLevel = level;
  }

  const strict = env[ENV_STRICT];
  if (strict !== undefined) {
    config.strict = parseBooleanEnv(ENV_STRICT, strict);
  }

  return config;
}

export interface LoadConfigOptions {
  /** Explicit config path; must exist when given */
  configPath?: string;
  /** Directory searched for `topoload.config.yml` */
  cwd?: string;
  env?: Readonly<Record<string, string | undefined>>;
  fs?: FileSystemAdapter;
  logger?: ParserLogger;
}

/**
 * Locates, reads and resolves the configuration.
 *
 * @throws ConfigError when an explicit path is missing or the file is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TopologyConfig> {
  const fs = options.fs ?? nodeFsAdapter;
  const log = options.logger ?? nullLogger;
  const env = options.env ?? {};

  let file: ConfigFile = {};
  const candidate = options.configPath ?? fs.join(options.cwd ?? ".", CONFIG_FILE_NAME);

  if (await fs.exists(candidate)) {
    log.debug(`Loading configuration from ${candidate}`);
    file = parseConfig(await fs.readFile(candidate), candidate);
  } else if (options.configPath !== undefined) {
    throw new ConfigError(`Configuration file not found: ${options.configPath}`);
  }

  return resolveConfig(file, env);
}

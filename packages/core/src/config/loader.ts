import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { Err, ErrorCode, Ok, type Result } from "@tripwire/shared";
import yaml from "js-yaml";

import { type Config, ConfigSchema } from "./schema.js";

// ============================================
// Errors
// ============================================

/**
 * Codes a configuration failure can carry
 */
export type ConfigErrorCode =
  | ErrorCode.CONFIG_NOT_FOUND
  | ErrorCode.CONFIG_READ_FAILED
  | ErrorCode.CONFIG_PARSE_ERROR
  | ErrorCode.CONFIG_INVALID;

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

/**
 * A validated configuration and where it came from.
 */
export interface LoadedConfig {
  config: Config;
  /** File the configuration was read from */
  path: string;
}

/**
 * Options for loadConfig function
 */
export interface LoadConfigOptions {
  /** Explicit configuration file; disables the lookup */
  file?: string;
  /** Directory searched for a project file (default: process.cwd()) */
  cwd?: string;
  /** Home directory (default: os.homedir()) */
  home?: string;
}

// ============================================
// Lookup
// ============================================

/** Bundled configuration, shipped next to this module */
export const DEFAULT_CONFIG_FILE = "default-config.yml";

/**
 * Path of the bundled default configuration.
 */
export function defaultConfigPath(): string {
  return fileURLToPath(new URL(`./${DEFAULT_CONFIG_FILE}`, import.meta.url));
}

/**
 * Text of the bundled default configuration, verbatim.
 */
export function defaultConfigText(): string {
  return fs.readFileSync(defaultConfigPath(), "utf-8");
}

/**
 * Candidate configuration files, most specific first.
 *
 * @example
 * ```typescript
 * configCandidates({ cwd: "/work", home: "/home/me" });
 * // ["/work/.tripwire.yml", "/home/me/.tripwire.yml",
 * //  "/home/me/.config/tripwire/tripwire.yml"]
 * ```
 */
export function configCandidates(options: Omit<LoadConfigOptions, "file"> = {}): string[] {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const home = options.home ?? os.homedir();
  return [
    path.join(cwd, ".tripwire.yml"),
    path.join(home, ".tripwire.yml"),
    path.join(home, ".config", "tripwire", "tripwire.yml"),
  ];
}

/**
 * First existing candidate configuration file, if any.
 */
export function findConfigFile(options: Omit<LoadConfigOptions, "file"> = {}): string | undefined {
  return configCandidates(options).find(
    (candidate) => fs.existsSync(candidate) && fs.statSync(candidate).isFile()
  );
}

// ============================================
// Parsing
// ============================================

/**
 * Parse and validate configuration text.
 *
 * An empty document is a configuration without commands.
 */
export function parseConfig(content: string, source?: string): Result<Config, ConfigError> {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: source });
  } catch (error) {
    return Err({
      code: ErrorCode.CONFIG_PARSE_ERROR,
      message: `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
      path: source,
      cause: error,
    });
  }

  const parseResult = ConfigSchema.safeParse(parsed ?? {});
  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: ErrorCode.CONFIG_INVALID,
      message: `Invalid configuration: ${issues}`,
      path: source,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}

/**
 * Read, parse and validate a configuration file.
 */
export function readConfigFile(filePath: string): Result<Config, ConfigError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return Err({
        code: ErrorCode.CONFIG_NOT_FOUND,
        message: `Config file not found: ${filePath}`,
        path: filePath,
      });
    }
    return Err({
      code: ErrorCode.CONFIG_READ_FAILED,
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  return parseConfig(content, filePath);
}

/**
 * Load the command configuration.
 *
 * With `file`, only that file is read. Otherwise the first existing file of
 * {@link configCandidates} is used, falling back to the bundled default.
 *
 * @example
 * ```typescript
 * const result = loadConfig();
 * if (result.ok) {
 *   console.log(`${result.value.config.commands.length} rules from ${result.value.path}`);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<LoadedConfig, ConfigError> {
  const file = options.file ?? findConfigFile(options) ?? defaultConfigPath();

  const result = readConfigFile(file);
  if (!result.ok) {
    return result;
  }
  return Ok({ config: result.value, path: file });
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

import { readFileSync, existsSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import { ConfigError, FileAccessError } from '../errors/ConversionError.js';
import { isLogLevel, type LogLevel } from '../logging/Logger.js';

/**
 * linger2ibex configuration schema.
 *
 * YAML location: `--config <path>`, or `linger2ibex.yaml` in the working
 * directory when present. Every key is optional.
 *
 * Example linger2ibex.yaml:
 *
 * ```yaml
 * stimulusType: DashedSentence
 * escapeStrings: true
 * template: ./my-scaffold.js.tmpl   # relative to this file
 * logLevel: info
 * ```
 */
export interface Linger2IbexConfig {
  /** Ibex controller for generated items. CLI argument wins. */
  stimulusType?: string;
  /** Escape quotes and backslashes in authored text. `--escape` wins. */
  escapeStrings?: boolean;
  /** Absolute path of an alternative scaffold template */
  template?: string;
  logLevel?: LogLevel;
}

export const CONFIG_FILE_NAME = 'linger2ibex.yaml';

const KNOWN_KEYS = new Set(['stimulusType', 'escapeStrings', 'template', 'logLevel']);

/**
 * Where the config comes from: the explicit path, else the default file in
 * `cwd` when it exists, else nowhere.
 */
export function resolveConfigPath(configPath: string | undefined, cwd: string): string | undefined {
  if (configPath) {
    return resolve(cwd, configPath);
  }
  const defaultPath = join(cwd, CONFIG_FILE_NAME);
  return existsSync(defaultPath) ? defaultPath : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML into a config. `template` is resolved against
 * `baseDir`.
 */
export function validateConfig(
  parsed: unknown,
  baseDir: string,
  filePath: string,
  logger: { warn: (msg: string) => void } = console
): Linger2IbexConfig {
  // empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('Config must be a mapping of keys to values', { filePath });
  }

  for (const key of Object.keys(parsed)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Unknown config key "${key}" in ${filePath}`);
    }
  }

  const config: Linger2IbexConfig = {};
  const { stimulusType, escapeStrings, template, logLevel } = parsed;

  if (stimulusType !== undefined) {
    if (typeof stimulusType !== 'string' || stimulusType.length === 0) {
      throw new ConfigError('stimulusType must be a non-empty string', { filePath });
    }
    config.stimulusType = stimulusType;
  }

  if (escapeStrings !== undefined) {
    if (typeof escapeStrings !== 'boolean') {
      throw new ConfigError(`escapeStrings must be true or false, got ${typeof escapeStrings}`, { filePath });
    }
    config.escapeStrings = escapeStrings;
  }

  if (template !== undefined) {
    if (typeof template !== 'string' || template.length === 0) {
      throw new ConfigError('template must be a path', { filePath });
    }
    config.template = resolve(baseDir, template);
  }

  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(
        `Invalid logLevel: ${String(logLevel)}`,
        { filePath },
        'Use one of: silent, errors, warnings, info, debug'
      );
    }
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Load the config file, or return an empty config when there is none.
 *
 * @throws FileAccessError when an explicitly named file does not exist
 * @throws ConfigError on YAML syntax errors or wrongly typed keys
 */
export function loadConfig(
  configPath: string | undefined,
  cwd: string,
  logger: { warn: (msg: string) => void } = console
): Linger2IbexConfig {
  const filePath = resolveConfigPath(configPath, cwd);
  if (!filePath) {
    return {};
  }
  if (!existsSync(filePath)) {
    throw new FileAccessError(`Config file not found: ${filePath}`, 'ERR_FILE_NOT_FOUND', { filePath });
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse config: ${message}`, { filePath });
  }

  return validateConfig(parsed, dirname(filePath), filePath, logger);
}

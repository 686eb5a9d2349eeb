/**
 * Configuration Loader for pyscan-tokens
 * Loads and validates .pyscan.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { CliError } from './error-classes.js';

// ============================================================
// TYPES
// ============================================================

/** Token stream rendering used by the CLI */
export type OutputFormat = 'human' | 'json' | 'compact';

export interface PyscanConfig {
  /** How tokens are printed */
  readonly format: OutputFormat;
  /** Stop at the first error item instead of reporting all of them */
  readonly failFast: boolean;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.pyscan.json';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

const KNOWN_KEYS: ReadonlySet<string> = new Set(['format', 'failFast']);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): PyscanConfig {
  return { format: 'human', failFast: false };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function invalid(reason: string): CliError {
  return new CliError('PYSCAN-C001', { reason });
}

/**
 * Validate configuration structure and values.
 * Throws CliError if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is {
  format?: OutputFormat;
  failFast?: boolean;
} {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw invalid('must be an object');
  }

  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(`unknown option ${key}`);
    }
    if (key === 'format' && !isOutputFormat(value)) {
      throw invalid(
        `format has invalid value "${String(value)}" (must be 'human', 'json', or 'compact')`
      );
    }
    if (key === 'failFast' && typeof value !== 'boolean') {
      throw invalid('failFast must be a boolean');
    }
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .pyscan.json in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over the defaults, or null if file not found
 * @throws CliError with "Invalid configuration: {reason}" for unreadable
 * files, malformed JSON and unknown or mistyped options
 */
export function loadConfig(cwd: string): PyscanConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw invalid(
      `invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  validateConfig(parsedData);

  const defaults = createDefaultConfig();
  return {
    format: parsedData.format ?? defaults.format,
    failFast: parsedData.failFast ?? defaults.failFast,
  };
}

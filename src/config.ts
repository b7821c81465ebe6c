/**
 * Configuration loader
 *
 * Reads an optional YAML config file with input, report and logging
 * settings. A missing file yields the defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { validateTriageConfig, formatZodError, LogEncoding, LogLevel } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'triage.yml';
export const DEFAULT_LOG_FILE = 'app.log';

/** Runtime config used by the CLI */
export interface Config {
  input: {
    path?: string;
    encoding: LogEncoding;
  };
  report: {
    format: 'text' | 'json';
    timing: boolean;
    stats: boolean;
  };
  logging: {
    level?: LogLevel;
    pretty?: boolean;
  };
}

/** Parse and validate YAML config text */
export function parseConfig(raw: string): Config {
  let doc: unknown;
  try {
    doc = parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[Config] Invalid YAML: ${message}`);
  }

  // An empty document parses to null
  let validated;
  try {
    validated = validateTriageConfig(doc ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }

  return {
    input: {
      path: validated.input.path,
      encoding: validated.input.encoding,
    },
    report: { ...validated.report },
    logging: { ...validated.logging },
  };
}

/**
 * Load config from YAML.
 * Relative `input.path` values resolve against the config file's directory.
 */
export function loadConfig(configPath?: string): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    if (configPath) {
      throw new Error(`[Config] Config file not found: ${configPath}`);
    }
    return parseConfig('');
  }

  const config = parseConfig(fs.readFileSync(resolvedPath, 'utf-8'));
  if (config.input.path && !path.isAbsolute(config.input.path)) {
    config.input.path = path.resolve(path.dirname(resolvedPath), config.input.path);
  }
  return config;
}

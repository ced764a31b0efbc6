/**
 * Configuration loader
 *
 * Reads a YAML config file with playback, input, output and control
 * settings. A missing file means "all defaults".
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { Logger } from 'pino';
import { getLogger } from './logger';
import { DeckConfigOutput, validateDeckConfig, formatZodError } from './config-schema';

/** Runtime config used by MacroDeck */
export type Config = DeckConfigOutput;

export const DEFAULT_CONFIG_FILE = 'macrodeck.yml';

/** Defaults for every section */
export function defaultConfig(): Config {
  return validateDeckConfig({});
}

export function resolveConfigPath(configPath?: string): string {
  return configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);
}

/**
 * Load and validate config from YAML.
 * Throws with a readable message when the file exists but is invalid.
 * Pass `null` as the logger when logging is not set up yet (the CLI
 * reads config before it knows the log level).
 */
export function loadConfig(configPath?: string, log: Logger | null = getLogger('Config')): Config {
  const resolvedPath = resolveConfigPath(configPath);

  if (!fs.existsSync(resolvedPath)) {
    log?.info(`No config file found at ${resolvedPath}, using defaults`);
    return defaultConfig();
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  const config = parseConfig(raw);
  log?.info(`Loaded ${resolvedPath}`);
  return config;
}

/** Parse and validate a YAML config document */
export function parseConfig(yamlText: string): Config {
  let parsed: unknown;
  try {
    parsed = parse(yamlText);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`[Config] Invalid YAML: ${reason}`);
  }

  try {
    return validateDeckConfig(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Apply dotted-path CLI overrides, e.g. { 'logging.verbose': true }.
 * Unknown sections throw; the result is re-validated.
 */
export function applyOverrides(config: Config, overrides: Record<string, string | number | boolean>): Config {
  const draft: Record<string, Record<string, unknown>> = {};
  for (const [section, values] of Object.entries(config)) {
    draft[section] = { ...values };
  }

  for (const [key, value] of Object.entries(overrides)) {
    const [section, field] = key.split('.');
    const target = draft[section];
    if (!target || !field) {
      throw new Error(`[Config] Unknown override: ${key}`);
    }
    target[field] = value;
  }

  try {
    return validateDeckConfig(draft);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Invalid override:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

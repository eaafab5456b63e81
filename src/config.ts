/**
 * Configuration loader
 *
 * Reads the engine settings from a YAML file. The file is optional:
 * without one every limit, timeout and keyword list takes its default.
 *
 * ```yaml
 * engine:
 *   parser:
 *     maxWaitSeconds: 600
 *   execution:
 *     ackTimeoutMs: 2000
 *     nestedIf: evaluate
 *   responses:
 *     successKeywords: [ok, done]
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { EngineConfig, formatZodError, validateEngineConfig } from './config-schema';
import { getLogger } from './logger';

const log = getLogger('Config');

export const DEFAULT_CONFIG_FILE = 'sequence-engine.yml';

/** Defaults for every setting */
export function defaultEngineConfig(): EngineConfig {
  return validateEngineConfig({});
}

/**
 * Parse engine settings out of a YAML document.
 * Settings live under an `engine:` key; a document without one is read whole.
 */
export function parseEngineConfigYaml(raw: string, source = 'config'): EngineConfig {
  const doc: unknown = parse(raw);
  const section = isRecord(doc) && 'engine' in doc ? doc.engine : doc;

  try {
    return validateEngineConfig(section);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new Error(`Invalid engine configuration in ${source}:\n${formatZodError(err)}`);
    }
    throw err;
  }
}

/**
 * Load engine settings from a YAML file.
 * A missing file yields the defaults.
 */
export function loadEngineConfig(configPath?: string): EngineConfig {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    log.info(`No config file found at ${resolvedPath}, using defaults`);
    return defaultEngineConfig();
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  const config = parseEngineConfigYaml(raw, resolvedPath);
  log.info(`Loaded engine config from ${resolvedPath}`);
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

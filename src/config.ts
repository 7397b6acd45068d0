/**
 * Server configuration module.
 *
 * Loads config from config/config.{DIALOGUE_CONFIG}.json
 * Provides typed access to configuration values.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { Paths } from './paths.js';
import { isRuleSeverity } from './validator.js';
import type { RuleSeverity, ValidationOptions } from './validator.js';

export interface ServerConfig {
  port?: number;
  /** Directory holding the *.script files to serve */
  scriptDir?: string;
  /** Disable request logging */
  quiet?: boolean;
  unknownCommands?: RuleSeverity;
  topLevelBlock?: RuleSeverity;
}

let cachedConfig: ServerConfig | null = null;

/**
 * Keep only the recognized settings with the right types; anything else is reported and dropped.
 */
export function normalizeConfig(raw: unknown): ServerConfig {
  const config: ServerConfig = {};
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    console.warn('Config file does not hold a JSON object, using defaults');
    return config;
  }

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'port':
        if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
          config.port = value;
          continue;
        }
        break;
      case 'scriptDir':
        if (typeof value === 'string' && value.length > 0) {
          config.scriptDir = value;
          continue;
        }
        break;
      case 'quiet':
        if (typeof value === 'boolean') {
          config.quiet = value;
          continue;
        }
        break;
      case 'unknownCommands':
      case 'topLevelBlock':
        if (isRuleSeverity(value)) {
          config[key] = value;
          continue;
        }
        break;
      default:
        console.warn(`Ignoring unknown config setting "${key}"`);
        continue;
    }
    console.warn(`Ignoring invalid value for config setting "${key}": ${JSON.stringify(value)}`);
  }

  return config;
}

/**
 * Load configuration from file. Safe to call multiple times.
 */
export async function loadConfig(): Promise<ServerConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configEnv = process.env.DIALOGUE_CONFIG ?? 'dev';
  const configFileName = `config.${configEnv}.json`;
  const configPath = path.join(Paths.config, configFileName);

  if (await fs.pathExists(configPath)) {
    cachedConfig = normalizeConfig(await fs.readJson(configPath));
    console.log(`Loaded config from ${configFileName}`);
  } else {
    console.warn(`Config file ${configFileName} not found, using defaults`);
    cachedConfig = {};
  }

  return cachedConfig;
}

/**
 * Get configuration synchronously (must call loadConfig first during bootstrap).
 */
export function getConfig(): ServerConfig {
  return cachedConfig ?? {};
}

/**
 * Get server port from config.
 */
export function getServerPort(): number {
  const config = getConfig();
  return Number(process.env.PORT ?? config.port ?? 3000);
}

export function getScriptDir(): string {
  const config = getConfig();
  return config.scriptDir ? path.resolve(Paths.dataRoot, config.scriptDir) : Paths.dialogues;
}

export function getValidationOptions(): ValidationOptions {
  const { unknownCommands, topLevelBlock } = getConfig();
  const options: ValidationOptions = {};
  if (unknownCommands) options.unknownCommands = unknownCommands;
  if (topLevelBlock) options.topLevelBlock = topLevelBlock;
  return options;
}

export function isQuiet(): boolean {
  return getConfig().quiet ?? false;
}

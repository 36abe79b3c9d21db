/**
 * ConfigLoader - environment-based config loading and merging
 */

import { parseLogLevel } from '../logging/LogTransport';
import { validateConfig, get } from './ConfigValidator';
import {
  ENV_MAPPINGS,
  PartialToolkitConfig,
  ToolkitConfig
} from './types';

export type RawConfig = Record<string, Record<string, unknown>>;

export interface EnvConfigResult {
  config: PartialToolkitConfig;
  /** Variables that were set and valid */
  applied: string[];
  /** One message per variable that was set but rejected */
  errors: string[];
}

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): string | number | boolean {
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10);
  if (/^-?\d+\.\d+$/.test(trimmed)) return parseFloat(trimmed);
  return trimmed;
}

/**
 * Set `section.key` on a two-level raw config object
 */
export function setNestedValue(raw: RawConfig, dotPath: string, value: unknown): void {
  const [section, key] = dotPath.split('.');
  const values = raw[section] ?? {};
  values[key] = value;
  raw[section] = values;
}

function numberAt(raw: unknown, section: string, key: string): number | undefined {
  const value = get(raw, section, key);
  return typeof value === 'number' ? value : undefined;
}

/**
 * Pick the typed fields out of an already validated raw object
 */
export function toPartialConfig(raw: unknown): PartialToolkitConfig {
  const level = get(raw, 'logging', 'level');
  const logDir = get(raw, 'logging', 'logDir');
  const timestamps = get(raw, 'logging', 'timestamps');

  return {
    logging: {
      level: typeof level === 'string' ? parseLogLevel(level) : undefined,
      logDir: typeof logDir === 'string' ? logDir : undefined,
      timestamps: typeof timestamps === 'boolean' ? timestamps : undefined
    },
    inspect: {
      listingLimit: numberAt(raw, 'inspect', 'listingLimit'),
      topFiles: numberAt(raw, 'inspect', 'topFiles')
    },
    process: {
      defaultTop: numberAt(raw, 'process', 'defaultTop')
    },
    backup: {
      compressionLevel: numberAt(raw, 'backup', 'compressionLevel')
    },
    monitor: {
      rows: numberAt(raw, 'monitor', 'rows')
    }
  };
}

/**
 * Build a partial config from environment variables using ENV_MAPPINGS.
 * Each variable is validated on its own; invalid ones are reported and skipped.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfigResult {
  const raw: RawConfig = {};
  const applied: string[] = [];
  const errors: string[] = [];

  Object.entries(ENV_MAPPINGS).forEach(([variable, configPath]) => {
    const envValue = env[variable];
    if (envValue === undefined || envValue === '') {
      return;
    }

    const value = configPath === 'logging.logDir' ? envValue : parseEnvValue(envValue);
    const single: RawConfig = {};
    setNestedValue(single, configPath, value);

    const validation = validateConfig(single);
    if (!validation.valid) {
      errors.push(`${variable}: ${validation.errors.join(', ')}`);
      return;
    }

    setNestedValue(raw, configPath, value);
    applied.push(variable);
  });

  return { config: toPartialConfig(raw), applied, errors };
}

/**
 * Overlay `override` on `base`; undefined fields keep the base value.
 */
export function mergeConfigs(base: ToolkitConfig, override: PartialToolkitConfig): ToolkitConfig {
  return {
    logging: {
      level: override.logging?.level ?? base.logging.level,
      logDir: override.logging?.logDir ?? base.logging.logDir,
      timestamps: override.logging?.timestamps ?? base.logging.timestamps
    },
    inspect: {
      listingLimit: override.inspect?.listingLimit ?? base.inspect.listingLimit,
      topFiles: override.inspect?.topFiles ?? base.inspect.topFiles
    },
    process: {
      defaultTop: override.process?.defaultTop ?? base.process.defaultTop
    },
    backup: {
      compressionLevel: override.backup?.compressionLevel ?? base.backup.compressionLevel
    },
    monitor: {
      rows: override.monitor?.rows ?? base.monitor.rows
    }
  };
}

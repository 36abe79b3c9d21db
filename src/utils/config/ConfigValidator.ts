/**
 * ConfigValidator - Validation logic for configuration objects
 */

import { parseLogLevel } from '../logging/LogTransport';
import { ValidationResult } from './types';

/** Helper to safely access a nested property from a config object. */
export function get(obj: unknown, ...keys: string[]): unknown {
  let cur: unknown = obj;
  for (const key of keys) {
    if (cur === null || typeof cur !== 'object') return undefined;
    cur = (cur as Record<string, unknown>)[key];
  }
  return cur;
}

function checkInteger(
  errors: string[],
  value: unknown,
  name: string,
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): void {
  if (value === undefined) return;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `at least ${min}` : `between ${min} and ${max}`;
    errors.push(`${name} must be an integer ${range}`);
  }
}

/**
 * Validate a (possibly partial) configuration object, returning errors and warnings.
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const level = get(config, 'logging', 'level');
  if (level !== undefined && (typeof level !== 'string' || parseLogLevel(level) === undefined)) {
    errors.push('logging.level must be one of: error, warn, info, debug');
  }

  const logDir = get(config, 'logging', 'logDir');
  if (logDir !== undefined && (typeof logDir !== 'string' || logDir.trim() === '')) {
    errors.push('logging.logDir must be a non-empty string');
  }

  const timestamps = get(config, 'logging', 'timestamps');
  if (timestamps !== undefined && typeof timestamps !== 'boolean') {
    errors.push('logging.timestamps must be true or false');
  }

  checkInteger(errors, get(config, 'inspect', 'listingLimit'), 'inspect.listingLimit', 0);
  checkInteger(errors, get(config, 'inspect', 'topFiles'), 'inspect.topFiles', 0);
  checkInteger(errors, get(config, 'process', 'defaultTop'), 'process.defaultTop', 1);
  checkInteger(errors, get(config, 'backup', 'compressionLevel'), 'backup.compressionLevel', 0, 9);
  checkInteger(errors, get(config, 'monitor', 'rows'), 'monitor.rows', 1);

  const listingLimit = get(config, 'inspect', 'listingLimit');
  if (typeof listingLimit === 'number' && listingLimit > 1000) {
    warnings.push('inspect.listingLimit above 1000 produces very long reports');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

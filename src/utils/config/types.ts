/**
 * Shared types for configuration utilities
 */

import { LogLevel } from '../logging/LogTransport';

/**
 * Configuration loading error
 */
export class ConfigError extends Error {
  constructor(message: string, public variable?: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Configuration source types
 */
export enum ConfigSource {
  ENVIRONMENT = 'environment',
  DEFAULT = 'default'
}

/**
 * Configuration validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ToolkitConfig {
  logging: {
    level: LogLevel;
    /** Write JSON log files here when set */
    logDir?: string;
    timestamps: boolean;
  };
  inspect: {
    /** Rows of the directory listing preview */
    listingLimit: number;
    /** Largest files shown when no pattern is given */
    topFiles: number;
  };
  process: {
    /** Tokens shown when --top is not given */
    defaultTop: number;
  };
  backup: {
    /** gzip level 0-9 */
    compressionLevel: number;
  };
  monitor: {
    /** Rows per snapshot section */
    rows: number;
  };
}

export type PartialToolkitConfig = {
  [Section in keyof ToolkitConfig]?: Partial<ToolkitConfig[Section]>;
};

/**
 * Configuration metadata
 */
export interface ConfigMetadata {
  source: ConfigSource;
  loadedAt: Date;
  /** Names (never values) of the variables that were applied */
  variables: string[];
}

/**
 * Environment variable → `section.key` it sets
 */
export const ENV_MAPPINGS = {
  TREEKIT_LOG_LEVEL: 'logging.level',
  TREEKIT_LOG_DIR: 'logging.logDir',
  TREEKIT_LOG_TIMESTAMPS: 'logging.timestamps',
  TREEKIT_LISTING_LIMIT: 'inspect.listingLimit',
  TREEKIT_TOP_FILES: 'inspect.topFiles',
  TREEKIT_DEFAULT_TOP: 'process.defaultTop',
  TREEKIT_COMPRESSION_LEVEL: 'backup.compressionLevel',
  TREEKIT_MONITOR_ROWS: 'monitor.rows'
} as const;

export type EnvVariable = keyof typeof ENV_MAPPINGS;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ToolkitConfig = {
  logging: {
    level: LogLevel.WARN,
    timestamps: false
  },
  inspect: {
    listingLimit: 20,
    topFiles: 5
  },
  process: {
    defaultTop: 10
  },
  backup: {
    compressionLevel: 6
  },
  monitor: {
    rows: 5
  }
};

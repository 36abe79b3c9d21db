/**
 * treekit library API
 *
 * Directory selection, content filtering, reporting, archiving, cleanup and
 * token counting, usable without the CLI.
 */

export * from './core';
export * from './system';
export {
  ToolkitLogger,
  createLogger,
  defaultLogger,
  logger,
  LogLevel,
  parseLogLevel
} from './utils/logger';
export type { LogContext, LoggerConfig, LogMeta } from './utils/logger';
export {
  ConfigManager,
  ConfigError,
  DEFAULT_CONFIG,
  loadEnvConfig,
  mergeConfigs,
  validateConfig
} from './utils/config';
export type { ToolkitConfig, PartialToolkitConfig } from './utils/config';
export { FileOperationError } from './utils/files/types';
export { VERSION } from './version';

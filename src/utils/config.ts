/**
 * Configuration facade - re-exports the config sub-modules
 */

export * from './config/types';
export * from './config/ConfigValidator';
export * from './config/ConfigLoader';
export * from './config/ConfigManager';

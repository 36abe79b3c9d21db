/**
 * ConfigManager - Runtime configuration management
 */

import {
  ConfigError,
  ConfigMetadata,
  ConfigSource,
  DEFAULT_CONFIG,
  PartialToolkitConfig,
  ToolkitConfig
} from './types';
import { validateConfig } from './ConfigValidator';
import { loadEnvConfig, mergeConfigs } from './ConfigLoader';

/**
 * Configuration manager class - handles defaults, environment overrides,
 * validation and runtime updates.
 */
export class ConfigManager {
  private config: ToolkitConfig;
  private metadata: ConfigMetadata;

  constructor(initialConfig: PartialToolkitConfig = {}) {
    this.config = mergeConfigs(DEFAULT_CONFIG, initialConfig);
    this.metadata = {
      source: ConfigSource.DEFAULT,
      loadedAt: new Date(),
      variables: []
    };
  }

  /**
   * Apply environment variables. Returns messages for variables that were
   * set but rejected; those keep their previous value.
   */
  loadFromEnvironment(env: NodeJS.ProcessEnv = process.env): string[] {
    const { config: envConfig, applied, errors } = loadEnvConfig(env);

    if (applied.length > 0) {
      this.config = mergeConfigs(this.config, envConfig);
      this.metadata = {
        source: ConfigSource.ENVIRONMENT,
        loadedAt: new Date(),
        variables: [...applied]
      };
    }

    return errors;
  }

  /**
   * Get the current configuration (a deep copy)
   */
  getConfig(): ToolkitConfig {
    return mergeConfigs(this.config, {});
  }

  getMetadata(): ConfigMetadata {
    return { ...this.metadata, variables: [...this.metadata.variables] };
  }

  /**
   * Update configuration at runtime
   */
  updateConfig(updates: PartialToolkitConfig): void {
    const validation = validateConfig(updates);
    if (!validation.valid) {
      throw new ConfigError(`Configuration update validation failed: ${validation.errors.join(', ')}`);
    }

    this.config = mergeConfigs(this.config, updates);
  }
}

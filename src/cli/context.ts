/**
 * State shared by the commands of one program instance
 */

import { ConfigManager, ToolkitConfig } from '../utils/config';

export interface CliContext {
  readonly configManager: ConfigManager;
  /** Aborted on SIGINT/SIGTERM */
  readonly signal?: AbortSignal;
  /** Set from `--quiet` before any action runs */
  quiet: boolean;
}

export function createCliContext(signal?: AbortSignal): CliContext {
  return { configManager: new ConfigManager(), signal, quiet: false };
}

export function currentConfig(context: CliContext): ToolkitConfig {
  return context.configManager.getConfig();
}

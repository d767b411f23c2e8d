export * from './config-types';
export { EnvLoader } from './env';
export type { EnvSource } from './env';
export { UnifiedConfigManager, applyOverrides, createDefaultConfig } from './unified-config';
export type { ConfigManagerOptions, ConfigOverrides } from './unified-config';

import { AppConfig } from './config-types';
import { ConfigManagerOptions, UnifiedConfigManager } from './unified-config';

/**
 * Load the configuration. Without options the shared instance is used.
 */
export function loadConfig(options?: ConfigManagerOptions): AppConfig {
  if (!options) {
    return UnifiedConfigManager.getInstance().getConfig();
  }
  return new UnifiedConfigManager(options).getConfig();
}

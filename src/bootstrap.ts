import { AppConfig } from './config/config-types';
import { ConfigManagerOptions, UnifiedConfigManager } from './config/unified-config';
import { SqlDatabase } from './db/adapters/database';
import { OpenDatabaseOptions, openDatabase } from './db/config/connection';
import { AppContext, ContextOverrides, createAppContext } from './server/context';
import { configureLogging, parseLogLevel } from './utils/logger';

export interface BootstrapOptions extends ConfigManagerOptions {
  database?: OpenDatabaseOptions;
  overrides?: ContextOverrides;
}

/**
 * Load configuration and apply its log level
 */
export function loadAppConfig(options: ConfigManagerOptions = {}): { manager: UnifiedConfigManager; config: AppConfig } {
  const manager = new UnifiedConfigManager(options);
  const config = manager.getConfig();
  configureLogging({ minLevel: parseLogLevel(config.general.logLevel) });
  return { manager, config };
}

/**
 * Configuration, a migrated database and the service graph
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<AppContext> {
  const { config } = loadAppConfig(options);
  const db: SqlDatabase = await openDatabase(config.database, options.database);
  return createAppContext(config, db, options.overrides);
}

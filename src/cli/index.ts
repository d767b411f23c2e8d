#!/usr/bin/env node

/**
 * Command line entry point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadAppConfig } from '../bootstrap';
import { AppConfig } from '../config/config-types';
import { SqlDatabase } from '../db/adapters/database';
import { openDatabase } from '../db/config/connection';
import { ALL_MIGRATIONS, MigrationManager } from '../db/migrations';
import { MigrationResult } from '../db/types/migration';
import { createAppContext } from '../server/context';
import { WebServer } from '../server/web-server';
import { errorMessage } from '../utils/error-handler';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('make-arjo-work')
    .description('Task and reading list tracker with a chat assistant')
    .version('1.0.0')
    .option('-c, --config-dir <dir>', 'directory containing config.yaml / config.json');

  const configDir = (): string | undefined => {
    const value: unknown = program.opts().configDir;
    return typeof value === 'string' ? value : undefined;
  };

  const withDatabase = async (migrate: boolean, action: (db: SqlDatabase, config: AppConfig) => Promise<void>) => {
    const { config } = loadAppConfig({ configDir: configDir() });
    const db = await openDatabase(config.database, { migrate });
    try {
      await action(db, config);
    } finally {
      await db.close();
    }
  };

  program
    .command('serve')
    .description('Start the HTTP server')
    .option('-p, --port <port>', 'port to listen on')
    .action(async (options: { port?: string }) => {
      const { config } = loadAppConfig({ configDir: configDir() });
      const db = await openDatabase(config.database);
      const server = new WebServer(createAppContext(config, db));

      await server.start(options.port ? parseInteger(options.port, 'port') : config.server.port);
      console.log(chalk.green(`✓ Serving on ${config.server.domain}`));

      const stop = () => {
        server
          .stop()
          .then(() => db.close())
          .then(
            () => process.exit(0),
            error => {
              console.error(chalk.red('✗ Shutdown failed:'), errorMessage(error));
              process.exit(1);
            }
          );
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
    });

  const db = program.command('db').description('Database schema and maintenance');

  db.command('migrate')
    .description('Apply pending migrations')
    .option('-t, --to <version>', 'target version')
    .action(async (options: { to?: string }) => {
      await withDatabase(false, async database => {
        const manager = new MigrationManager(database, ALL_MIGRATIONS, { verboseLogging: true });
        const result = await manager.migrate(options.to ? parseInteger(options.to, 'version') : undefined);
        printMigrationResult(result);
      });
    });

  db.command('rollback <version>')
    .description('Roll back every migration above <version>')
    .action(async (version: string) => {
      await withDatabase(false, async database => {
        const manager = new MigrationManager(database, ALL_MIGRATIONS, { verboseLogging: true });
        printMigrationResult(await manager.rollback(parseInteger(version, 'version')));
      });
    });

  db.command('status')
    .description('Show migration status')
    .option('-j, --json', 'print JSON')
    .action(async (options: { json?: boolean }) => {
      await withDatabase(false, async (database, config) => {
        const stats = await new MigrationManager(database, ALL_MIGRATIONS).getStats();

        if (options.json) {
          console.log(JSON.stringify({ dialect: config.database.dialect, ...stats }, null, 2));
          return;
        }

        console.log(chalk.blue(`Database: ${config.database.dialect}`));
        console.log(`  Current version: ${stats.currentVersion} / ${stats.latestVersion}`);
        console.log(`  Completed: ${stats.completedMigrations}  Failed: ${stats.failedMigrations}`);
        console.log(`  Last migration: ${stats.lastMigrationTime ?? 'never'}`);
        if (stats.pendingVersions.length > 0) {
          console.log(chalk.yellow(`  Pending: ${stats.pendingVersions.join(', ')}`));
        } else {
          console.log(chalk.green('  Up to date'));
        }
      });
    });

  db.command('prune-links')
    .description('Delete used and expired login links')
    .action(async () => {
      await withDatabase(true, async (database, config) => {
        const deleted = await createAppContext(config, database).auth.pruneLinks();
        console.log(chalk.green(`✓ Deleted ${deleted} login links`));
      });
    });

  program
    .command('chat')
    .description('Chat history maintenance')
    .command('clear-all')
    .description('Delete the chat history of every user')
    .action(async () => {
      await withDatabase(true, async (database, config) => {
        const deleted = await createAppContext(config, database).repositories.chatHistory.clearAll();
        console.log(chalk.green(`✓ Deleted ${deleted} chat messages`));
      });
    });

  program
    .command('config')
    .description('Configuration')
    .command('show')
    .description('Print the effective configuration with secrets masked')
    .option('--yaml', 'print YAML instead of JSON')
    .action((options: { yaml?: boolean }) => {
      const { manager } = loadAppConfig({ configDir: configDir() });
      console.log(options.yaml ? manager.exportToYAML() : manager.exportToJSON());
    });

  return program;
}

function parseInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

function printMigrationResult(result: MigrationResult): void {
  if (result.applied.length > 0) {
    console.log(chalk.green(`✓ Applied: ${result.applied.join(', ')}`));
  }
  if (result.rolledBack.length > 0) {
    console.log(chalk.green(`✓ Rolled back: ${result.rolledBack.join(', ')}`));
  }
  if (result.applied.length === 0 && result.rolledBack.length === 0 && result.errors.length === 0) {
    console.log(chalk.yellow('Nothing to do'));
  }
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error.message}`));
  }
  if (result.errors.length > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error(chalk.red('✗'), errorMessage(error));
      process.exit(1);
    });
}

#!/usr/bin/env node
/**
 * CLI entry point for tocnav.
 *
 * The configuration file is chosen before anything else is loaded, since
 * Config resolves it once at import time. The root logger is then built
 * from its logging section, before the command modules create their
 * child loggers.
 */
import { readFileSync } from 'fs';
import { initLogger, flushLogger, getRootLogger } from './utils/logger.js';

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const version = readVersion();

  const configIndex = args.indexOf('--config');
  const configPath = configIndex !== -1 ? args[configIndex + 1] : undefined;
  if (configPath) {
    process.env.TOCNAV_CONFIG = configPath;
  }

  const { Config } = await import('./config/index.js');
  const logging = Config.getLoggingConfig();
  const logger = initLogger({
    level: logging.level,
    file: logging.file,
    prettyPrint: logging.pretty,
    metadata: {
      version,
      nodeVersion: process.version,
    },
  });

  logger.debug({
    command: args[0],
    configSource: Config.CONFIG_SOURCE,
    workspaceDir: Config.getWorkspaceDir(),
  }, 'tocnav starting');

  const { runCli } = await import('./cli/index.js');
  return runCli(args, { version });
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  getRootLogger().fatal({ err: error }, 'Uncaught exception');
  void flushLogger().finally(() => process.exit(1));
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  getRootLogger().fatal({ err: reason }, 'Unhandled promise rejection');
  void flushLogger().finally(() => process.exit(1));
});

main()
  .then(async (code) => {
    process.exitCode = code;
    await flushLogger();
  })
  .catch(async (error: unknown) => {
    getRootLogger().fatal({ err: error }, 'Fatal error in main');
    await flushLogger();
    process.exitCode = 1;
  });

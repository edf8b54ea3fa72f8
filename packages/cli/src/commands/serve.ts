import { Command } from 'commander';
import chalk from 'chalk';
import { API_VERSION, loadSettings, logger } from '@specnest/core';
import type { Settings } from '@specnest/core';
import { startServer } from '@specnest/server';

export interface ServeOptions {
  port?: string;
  host?: string;
}

/**
 * Command-line flags win over the environment and config file.
 */
export function applyServeOptions(settings: Settings, options: ServeOptions): Settings {
  let port = settings.server.port;
  if (options.port !== undefined) {
    port = Number(options.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`Invalid port: ${options.port}`);
    }
  }
  return {
    ...settings,
    server: { ...settings.server, port, host: options.host ?? settings.server.host },
  };
}

export const serveCommand = new Command('serve')
  .description('Start the API server')
  .option('-p, --port <number>', 'Port number (default: PORT or 3000)')
  .option('--host <host>', 'Host to bind to (default: HOST or localhost)')
  .action(async (options: ServeOptions) => {
    try {
      const settings = applyServeOptions(await loadSettings(), options);
      logger.setLevel(settings.logLevel);

      console.log(chalk.blue('Starting Specnest API...'));
      console.log(`  ${chalk.cyan('URL:')} http://${settings.server.host}:${settings.server.port}/api/${API_VERSION}`);
      console.log(`  ${chalk.cyan('Storage:')} ${settings.database.url ? 'PostgreSQL' : 'in-memory'}`);
      console.log(`  ${chalk.cyan('Cache:')} ${settings.redis.url ? 'Redis' : 'in-memory'}`);
      console.log('');

      const running = await startServer({ settings });

      const shutdown = (signal: string) => {
        console.log(chalk.yellow(`\nReceived ${signal}, shutting down...`));
        running.close().then(
          () => process.exit(0),
          (error: unknown) => {
            console.error(chalk.red('Shutdown failed:'), error instanceof Error ? error.message : String(error));
            process.exit(1);
          }
        );
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
      console.error(chalk.red('Failed to start server:'));
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

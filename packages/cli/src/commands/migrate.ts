import { Command } from 'commander';
import chalk from 'chalk';
import { PgConnectionSource, loadSettings, migrate } from '@specnest/core';
import type { Settings, SqlPool } from '@specnest/core';

export type PoolFactory = (url: string, max: number) => SqlPool;

const pgPool: PoolFactory = (url, max) => PgConnectionSource.fromUrl(url, max);

/**
 * Apply the bundled schema to DATABASE_URL. The pool is always closed.
 */
export async function runMigrations(settings: Settings, connect: PoolFactory = pgPool): Promise<void> {
  const { url, poolSize } = settings.database;
  if (!url) {
    throw new Error('DATABASE_URL is not set, nothing to migrate');
  }
  const pool = connect(url, poolSize);
  try {
    await migrate(pool);
  } finally {
    await pool.end();
  }
}

export const migrateCommand = new Command('migrate')
  .description('Create or update the PostgreSQL schema')
  .action(async () => {
    try {
      await runMigrations(await loadSettings());
      console.log(chalk.green('✓ Schema is up to date'));
    } catch (error) {
      console.error(chalk.red('Migration failed:'));
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

import { Command } from 'commander';
import chalk from 'chalk';
import { getSettingsFilePath, loadSettings, redactSettings } from '@specnest/core';
import type { Settings } from '@specnest/core';

/**
 * Masked settings as printable lines: the file path, then the JSON.
 */
export function renderSettings(settings: Settings, filePath: string): string[] {
  return [`Settings file: ${filePath}`, '', ...JSON.stringify(redactSettings(settings), null, 2).split('\n')];
}

export const configCommand = new Command('config')
  .description('Show resolved settings with secrets masked')
  .action(async () => {
    try {
      const settings = await loadSettings();
      const [header, ...rest] = renderSettings(settings, getSettingsFilePath());
      console.log(chalk.bold(header));
      console.log(rest.join('\n'));
    } catch (error) {
      console.error(chalk.red('Could not load settings:'));
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

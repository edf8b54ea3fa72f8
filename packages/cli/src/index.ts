#!/usr/bin/env node

import { program } from 'commander';
import { APP_VERSION } from '@specnest/core';
import { serveCommand } from './commands/serve.js';
import { migrateCommand } from './commands/migrate.js';
import { configCommand } from './commands/config.js';

program
  .name('specnest')
  .description('Projects, ordered specifications and their items over a REST API')
  .version(APP_VERSION);

program.addCommand(serveCommand);
program.addCommand(migrateCommand);
program.addCommand(configCommand);

await program.parseAsync();

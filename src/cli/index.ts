#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import { createCheckCommand } from './commands/check.ts';
import { createResolveCommand } from './commands/resolve.ts';
import { createShowCommand } from './commands/show.ts';
import { getVersion } from './utils/get-version.ts';

const program = new Command();

program
  .name('docroot-layers')
  .description('Layered DocumentRoot resolution for httpd-style configurations')
  .version(getVersion());

// Register subcommands
program.addCommand(createCheckCommand());
program.addCommand(createShowCommand());
program.addCommand(createResolveCommand());

await program.parseAsync(process.argv);

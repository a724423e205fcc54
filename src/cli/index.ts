#!/usr/bin/env -S node --import tsx

import { Command } from 'commander';
import { createBranchesCommand } from './commands/branches.ts';
import { createConfigCommand } from './commands/config.ts';
import { getVersion } from './utils/get-version.ts';

const program = new Command();

program
  .name('devflow')
  .description('Developer workflow helper for git branches and GitHub pull requests')
  .version(getVersion());

// Register subcommands
program.addCommand(createBranchesCommand());
program.addCommand(createConfigCommand());

await program.parseAsync(process.argv);

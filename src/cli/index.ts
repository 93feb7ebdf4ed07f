#!/usr/bin/env node

import { Command } from 'commander';
import { createStartCommand } from './commands/start.js';
import { createConfigCommand } from './commands/config.js';
import { createVersionCommand } from './commands/version.js';
import { readPackageVersion } from '../utils/package-info.js';

const program = new Command();

program
  .name('sampling-proxy')
  .description('Local proxy that injects temperature, top_p and top_k into LLM API requests')
  .version(readPackageVersion() ?? '0.0.0')
  .addHelpText('after', `
Examples:
  $ sampling-proxy -t 0.7
  $ sampling-proxy -t 0.7 -p 0.95 -k 40
  $ sampling-proxy --config ~/.claude/sampling.json
  $ sampling-proxy --config config.json -t 0.5   # CLI overrides file`);

// `start` runs when no command is given
program.addCommand(createStartCommand(), { isDefault: true });
program.addCommand(createConfigCommand());
program.addCommand(createVersionCommand());

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

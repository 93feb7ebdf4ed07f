import { Command } from 'commander';
import chalk from 'chalk';
import { readPackageVersion } from '../../utils/package-info.js';

export function createVersionCommand(): Command {
  const command = new Command('version');

  command
    .description('Show version information')
    .action(() => {
      const version = readPackageVersion();
      if (version) {
        console.log(chalk.bold(`\nsampling-proxy v${version}\n`));
      } else {
        console.log(chalk.yellow('\nVersion information not available\n'));
      }
    });

  return command;
}

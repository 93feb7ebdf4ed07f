import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { SAMPLING_KEYS, isSet } from '../../sampling/types.js';
import { type SamplingCliOptions, addSamplingOptions, resolveSamplingOptions } from '../options.js';

export function createConfigCommand(): Command {
  const command = new Command('config');

  addSamplingOptions(command)
    .description('Show the sampling parameters the proxy would inject, without starting it')
    .action(async (options: SamplingCliOptions) => {
      try {
        const sampling = await resolveSamplingOptions(options);

        console.log(chalk.bold('\nSampling config\n'));
        for (const key of SAMPLING_KEYS) {
          const setting = sampling[key];
          const value = isSet(setting)
            ? chalk.green(String(setting.value))
            : chalk.dim('unset (client value passes through)');
          console.log(`  ${key.padEnd(12)} ${value}`);
        }
        console.log();
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });

  return command;
}

// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {type ChartPickLogger} from './core/logging/chart-pick-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type CherryPickCommand} from './commands/cherry-pick.js';
import {ChartPickError} from './core/errors/chart-pick-error.js';
import {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getChartPickVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: ChartPickLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : String(error)}`);
    throw new ChartPickError('Error initializing container', error);
  }

  const logger = container.resolve<ChartPickLogger>(InjectTokens.ChartPickLogger);

  if (context) {
    // save the logger so that chart-pick.ts can use it after main() returns
    context.logger = logger;
  }

  logger.debug('Initializing chart-pick CLI');
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getChartPickVersion()));
    throw new UserBreak('displayed version information, exiting');
  }

  const cherryPick = container.resolve<CherryPickCommand>(InjectTokens.CherryPickCommand);

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('chart-pick')
    .usage('Usage:\n  chart-pick <target-revision> <source-revision> <chart>[,<chart>...] [options]')
    .alias('h', 'help')
    .version(false)
    .command(cherryPick.getCommandDefinition())
    .strict()
    .exitProcess(false);

  rootCmd.fail((message, error) => {
    if (error) {
      throw error;
    }
    throw new IllegalArgumentError(`Invalid arguments: ${message}`, hideBin(argv).join(' '));
  });

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}

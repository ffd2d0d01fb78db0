#!/usr/bin/env node

import { program } from 'commander';
import chalk from 'chalk';
import boxen from 'boxen';
import { loadConfig } from '../src/config';
import { collectTasks } from '../src/catalog';
import { runTask } from '../src/executor';
import { resolveStartDirectory } from '../src/manifest/locator';
import { selectTask } from '../src/index';
import { InquirerSelector } from '../src/selector';
import { RunpickError, errorMessage } from '../src/errors';
import { createLogger } from '../src/utils/logger';
import * as jsonReporter from '../src/reporters/json';
import * as textReporter from '../src/reporters/text';

import pkg from '../package.json';

type CliOptions = {
  file?: string;
  path?: string;
  config?: string;
  list?: boolean;
  format: string;
  dryRun?: boolean;
  debug?: boolean;
};

const version = pkg.version;

program
  .name('runpick')
  .description('Pick a package.json script or package manager command and run it in its project.')
  .version(version)
  .option('-f, --file <path>', 'File being edited; its directory is the starting point')
  .option('-p, --path <path>', 'Directory to start from (defaults to current directory)')
  .option('-c, --config <path>', 'Configuration file to use instead of searching for one')
  .option('-l, --list', 'Print the available tasks instead of prompting')
  .option('--format <format>', 'Output format for --list (text, json)', 'text')
  .option('--dry-run', 'Print the selected command without running it')
  .option('--debug', 'Enable debug logging')
  .action(async () => {
    const options = program.opts<CliOptions>();
    const machineReadable = !!options.list && options.format === 'json';
    const logger = createLogger({ debug: options.debug, silent: machineReadable });

    try {
      if (options.format !== 'text' && options.format !== 'json') {
        throw new Error(`Unknown format '${options.format}'. Available: text, json`);
      }

      const startDirectory = resolveStartDirectory({ file: options.file, path: options.path });
      const config = loadConfig(startDirectory, { configPath: options.config, logger });
      const catalog = collectTasks(startDirectory, config, { logger });

      if (options.list) {
        const output =
          options.format === 'json'
            ? jsonReporter.report(catalog)
            : textReporter.report(catalog, { colors: chalk });
        console.log(output);
        return;
      }

      if (catalog.sources.length === 0) {
        logger.warn(`No package.json found in ${startDirectory} or its parent directories.`);
        console.log(chalk.dim('Hint: Run runpick inside a JavaScript or TypeScript project.'));
        return;
      }

      const request = await selectTask(catalog, new InquirerSelector());
      if (!request) {
        return;
      }

      console.log(
        boxen(`${chalk.bold(request.command)}\n${chalk.dim(request.cwd)}`, {
          padding: { top: 0, bottom: 0, left: 1, right: 1 },
          borderStyle: 'round',
          borderColor: 'cyan',
          title: options.dryRun ? 'dry run' : 'runpick',
          titleAlignment: 'right',
        }),
      );
      if (options.dryRun) {
        return;
      }

      const exitCode = await runTask(request);
      if (exitCode === 0) {
        console.log(chalk.green(`✔ ${request.command} finished`));
      } else {
        console.log(chalk.red(`✖ ${request.command} exited with code ${exitCode}`));
      }
      process.exitCode = exitCode;
    } catch (error: unknown) {
      logger.error(errorMessage(error));
      if (error instanceof RunpickError && error.code === 'ConfigError') {
        console.log(chalk.dim('Hint: Check the runpick section of your configuration file.'));
        process.exitCode = 2;
      } else {
        process.exitCode = 1;
      }
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exitCode = 1;
});

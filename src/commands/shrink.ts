import chalk from 'chalk';
import Table from 'cli-table3';
import {
  PlacementOptions,
  placementModeFromOptions,
  describePlacementMode,
} from '../types/placement-mode';
import { GlobalConfig } from '../types/global-config';
import { BatchReport } from '../types/shrink-result';
import { configLoader } from '../lib/config-loader';
import { ShrinkRunner } from '../lib/shrink-runner';
import { ProcessExecutor, spawnExecutor } from '../utils/process-utils';
import { Logger, createLogger } from '../utils/logger';
import { formatCount } from '../utils/format-utils';

export interface ShrinkCommandOptions extends PlacementOptions {
  dryRun?: boolean;
  verbose?: number;   // Number of -v flags
  debug?: boolean;
}

export interface ShrinkDependencies {
  executor?: ProcessExecutor;
  config?: GlobalConfig;
  logger?: Logger;
}

/**
 * Shrink every input file and return the process exit code:
 * 0 if all files succeeded, 1 if any failed.
 * Throws on configuration errors, before any file is processed.
 */
export async function shrinkCommand(
  inputs: string[],
  options: ShrinkCommandOptions,
  deps: ShrinkDependencies = {}
): Promise<number> {
  const logger = deps.logger ?? createLogger(options.verbose ?? 0);
  const mode = placementModeFromOptions(options);
  const config = deps.config ?? (await configLoader.load());
  const dryRun = options.dryRun ?? false;

  if (options.debug) {
    console.error(chalk.dim(`inputs: ${JSON.stringify(inputs)}`));
    console.error(chalk.dim(`options: ${JSON.stringify(options)}`));
    console.error(chalk.dim(`output mode: ${describePlacementMode(mode)}`));
    console.error(chalk.dim(`ghostscript: ${config.ghostscriptBinary}`));
    console.error(chalk.dim(`log level: ${logger.getLevel()}`));
    console.error();
  }
  if (!options.inplace && !options.rename && options.subdir === undefined) {
    logger.debug('No output mode specified, defaulting to --rename');
  }

  const runner = new ShrinkRunner({
    executor: deps.executor ?? spawnExecutor,
    logger,
    ghostscriptBinary: config.ghostscriptBinary,
    dryRun,
  });

  const report = await runner.shrinkAll(inputs, mode);
  printSummary(report, inputs.length);

  return report.failures.length > 0 ? 1 : 0;
}

function printSummary(report: BatchReport, total: number): void {
  if (report.succeeded > 0) {
    console.log(chalk.green(`✅ Shrunk ${formatCount(report.succeeded, 'file')}`));
  }

  if (report.failures.length === 0) {
    return;
  }

  console.error();
  console.error(chalk.red(`❌ ${report.failures.length} of ${formatCount(total, 'file')} failed:`));

  const table = new Table({
    head: ['INPUT', 'ERROR', 'DETAILS'],
  });

  for (const failure of report.failures) {
    table.push([failure.input, failure.error.kind, failure.error.message]);
  }

  console.error(table.toString());
}

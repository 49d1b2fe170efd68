import { PlacementMode } from '../types/placement-mode';
import { BatchReport, FileOutcome, summarizeOutcomes } from '../types/shrink-result';
import { ProcessExecutor, ProcessResult } from '../utils/process-utils';
import { Logger } from '../utils/logger';
import { copyFileMode, getFileSize, removeFileIfExists, replaceFileAtomic } from '../utils/file-utils';
import { formatBytes, formatSizeChange } from '../utils/format-utils';
import { PathResolver, ResolvedTarget, pathResolver } from './path-resolver';
import { buildShrinkCommand, formatCommandLine } from './ghostscript-command';

export interface ShrinkRunnerOptions {
  executor: ProcessExecutor;
  logger: Logger;
  ghostscriptBinary: string;
  dryRun: boolean;
  resolver?: PathResolver;
}

/**
 * Runs Ghostscript once per input file, sequentially.
 * A failing file is reported in its outcome and never stops the batch.
 */
export class ShrinkRunner {
  private executor: ProcessExecutor;
  private logger: Logger;
  private ghostscriptBinary: string;
  private dryRun: boolean;
  private resolver: PathResolver;

  constructor(options: ShrinkRunnerOptions) {
    this.executor = options.executor;
    this.logger = options.logger;
    this.ghostscriptBinary = options.ghostscriptBinary;
    this.dryRun = options.dryRun;
    this.resolver = options.resolver ?? pathResolver;
  }

  async shrinkAll(inputs: readonly string[], mode: PlacementMode): Promise<BatchReport> {
    const outcomes: FileOutcome[] = [];
    for (const input of inputs) {
      outcomes.push(await this.shrinkFile(input, mode));
    }
    return summarizeOutcomes(outcomes);
  }

  async shrinkFile(input: string, mode: PlacementMode): Promise<FileOutcome> {
    this.logger.debug(`Processing ${JSON.stringify(input)}`);

    // 1. Resolve output path, check input, create subdir
    const resolved = await this.resolver.prepare(input, mode, { dryRun: this.dryRun });
    if (!resolved.ok) {
      this.logger.warn(`Cannot process ${JSON.stringify(input)}: ${resolved.error.message}`);
      return { status: 'resolution-error', input, output: resolved.output, error: resolved.error };
    }
    const { target } = resolved;
    this.logger.trace(`Resolved ${JSON.stringify(input)} -> ${JSON.stringify(target.engineOutput)}`);

    // 2. Build command
    const command = buildShrinkCommand(target.input, target.engineOutput, this.ghostscriptBinary);
    const commandLine = formatCommandLine(command);

    // 3. Dry run: show and stop
    if (this.dryRun) {
      console.log(commandLine);
      return { status: 'dry-run', input, output: target.output, commandLine };
    }

    this.logger.info(`Compressing ${JSON.stringify(input)} -> ${JSON.stringify(target.output)}`);
    this.logger.debug(commandLine);

    // 4. Spawn and wait
    const bytesBefore = await getFileSize(input);
    let result: ProcessResult;
    try {
      result = await this.executor.run(command.program, command.args);
    } catch (error) {
      await this.discard(target);
      const message = `Failed to run ${command.program}: ${(error as Error).message}`;
      this.logger.error(message);
      return {
        status: 'failed',
        input,
        output: target.output,
        error: { kind: 'engine-spawn-failed', message },
      };
    }

    this.logEngineOutput(result);

    if (result.exitCode !== 0) {
      await this.discard(target);
      const message =
        result.exitCode === null
          ? `${command.program} was terminated by ${result.signal ?? 'a signal'}`
          : `${command.program} exited with code ${result.exitCode}`;
      this.logger.error(`${message} while processing ${JSON.stringify(input)}`);
      return {
        status: 'failed',
        input,
        output: target.output,
        error:
          result.exitCode === null
            ? { kind: 'engine-exit', message }
            : { kind: 'engine-exit', message, exitCode: result.exitCode },
      };
    }

    // 5. Move the finished file onto its destination
    try {
      if (target.keepMode) {
        await copyFileMode(target.output, target.engineOutput);
      }
      await replaceFileAtomic(target.engineOutput, target.output);
    } catch (error) {
      await this.discard(target);
      const message = `Cannot replace ${target.output}: ${(error as Error).message}`;
      this.logger.error(message);
      return {
        status: 'failed',
        input,
        output: target.output,
        error: { kind: 'replace-failed', message },
      };
    }

    const bytesAfter = await getFileSize(target.output);
    this.logger.info(
      `${JSON.stringify(target.output)}: ${formatBytes(bytesBefore)} -> ${formatBytes(bytesAfter)} ` +
        `(${formatSizeChange(bytesBefore, bytesAfter)})`
    );

    return { status: 'succeeded', input, output: target.output, bytesBefore, bytesAfter };
  }

  /**
   * Remove the engine's temp file. Neither the input nor an earlier output is touched.
   */
  private async discard(target: ResolvedTarget): Promise<void> {
    try {
      await removeFileIfExists(target.engineOutput);
    } catch (error) {
      this.logger.warn(`Cannot remove ${target.engineOutput}: ${(error as Error).message}`);
    }
  }

  private logEngineOutput(result: ProcessResult): void {
    const stdout = result.stdout.trimEnd();
    const stderr = result.stderr.trimEnd();
    if (stdout) {
      this.logger.info(`STDOUT:\n${stdout}`);
    }
    if (stderr) {
      this.logger.debug(`STDERR:\n${stderr}`);
    }
  }
}

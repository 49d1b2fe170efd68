import { Command, Option } from 'commander';
import chalk from 'chalk';
import { shrinkCommand, ShrinkCommandOptions } from './commands/shrink';

export const VERSION = '1.0.0';

export type ShrinkAction = (inputs: string[], options: ShrinkCommandOptions) => Promise<number>;

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function createProgram(action: ShrinkAction = shrinkCommand): Command {
  const program = new Command();

  program
    .name('pdfshrink')
    .description('Shrink PDF files using Ghostscript')
    .version(VERSION, '-V, --version', 'Print version information')
    .helpOption('-h, --help', 'Print help information')
    .argument('<input...>', 'Input PDF files to shrink')
    .option('-n, --dry-run', 'Do not actually run the commands, just show them')
    .addOption(
      new Option('-i, --inplace', 'Replace the original file').conflicts(['rename', 'subdir'])
    )
    .addOption(
      new Option(
        '-r, --rename',
        'Save the output to a renamed file: *.pdf -> *.shrunk.pdf (default)'
      ).conflicts(['inplace', 'subdir'])
    )
    .addOption(
      new Option('-d, --subdir <dir>', 'Save the output in a subdirectory').conflicts([
        'inplace',
        'rename',
      ])
    )
    .option('-v, --verbose', 'Increase the level of verbosity', increaseVerbosity, 0)
    .addOption(new Option('--debug', 'Debug the command line').hideHelp())
    .addHelpText('after', '\nThe options --inplace, --rename and --subdir are mutually exclusive.')
    .action(async (inputs: string[], options: ShrinkCommandOptions) => {
      try {
        process.exitCode = await action(inputs, options);
      } catch (error) {
        console.error(chalk.red('❌ Error:'), (error as Error).message);
        process.exit(1);
      }
    });

  return program;
}

import { Command } from 'commander';
import { logger } from '@forkferry/core/utils/logger.js';
import { LogLevel } from '@forkferry/core/types/index.js';
import { getVersion } from './utils/package.js';
import { withErrorHandling } from './utils/error-handling.js';
import type { ScanCommandOptions } from './commands/scan.js';
import type { ConvertCommandOptions } from './commands/convert.js';
import type { ConfigCommandOptions } from './commands/config.js';

/**
 * forkferry CLI - Main entry point
 *
 * Commands are lazily loaded via dynamic import() to minimize cold-start time.
 * Only the invoked command's module tree is loaded at runtime.
 */

const program = new Command();

program
  .name('forkferry')
  .description('Move files between host folders and legacy Apple formats without losing forks or file types')
  .version(getVersion())
  .option('--verbose', 'log debug output')
  .option('--plain', 'plain console output and readline prompts, even on a terminal')
  .configureHelp({ sortSubcommands: true });

// =============================================================================
// LAZY-LOADED COMMANDS
// =============================================================================

program
  .command('scan')
  .argument('<paths...>', 'host files or folders to classify')
  .description('Show how host files resolve: forks, their encodings, types and dates')
  .option('--recurse', 'descend into folders (default from config)')
  .option('--no-recurse', 'do not descend into folders')
  .option('--check-named', 'check <file>/..namedfork/rsrc for resource forks (macOS)')
  .option('--exclude <patterns...>', 'glob patterns to leave out, relative to the working directory')
  .action(withErrorHandling(async (paths: string[], options: ScanCommandOptions) => {
    const { setupScanCommand } = await import('./commands/scan.js');
    await setupScanCommand(paths, options);
  }));

program
  .command('convert')
  .argument('<paths...>', 'host files or folders to convert')
  .description('Re-encode host files into another preservation encoding')
  .requiredOption('-o, --out <dir>', 'folder to write converted files into')
  .option('-p, --preserve <mode>', 'encoding to write: none, adf, as, host or naps (default from config)')
  .option('--import <converter>', 'convert file contents on the way in (e.g. text)')
  .option('--import-opt <key=value...>', 'options for the import converter')
  .option('--overwrite', 'overwrite existing files without asking')
  .option('--skip-existing', 'keep existing files without asking')
  .option('--strip-paths', 'write every file into the output folder itself')
  .option('--naps-ext', 'append .txt and similar extensions to NAPS names')
  .option('--dos-text', 'convert DOS 3.x high-ASCII text')
  .option('--recurse', 'descend into folders (default from config)')
  .option('--no-recurse', 'do not descend into folders')
  .option('--exclude <patterns...>', 'glob patterns to leave out, relative to the working directory')
  .action(withErrorHandling(async (paths: string[], options: ConvertCommandOptions) => {
    const { setupConvertCommand } = await import('./commands/convert.js');
    await setupConvertCommand(paths, options);
  }));

program
  .command('inspect')
  .argument('<file>', 'AppleSingle or AppleDouble file')
  .description('Print the header, entries and attributes of an AppleSingle/AppleDouble file')
  .action(withErrorHandling(async (file: string) => {
    const { setupInspectCommand } = await import('./commands/inspect.js');
    await setupInspectCommand(file);
  }));

program
  .command('config')
  .argument('[key]', 'setting to show or change')
  .argument('[value]', 'new value')
  .description('Show or change default settings')
  .option('--reset', 'restore built-in defaults')
  .action(withErrorHandling(async (key: string | undefined, value: string | undefined, options: ConfigCommandOptions) => {
    const { setupConfigCommand } = await import('./commands/config.js');
    await setupConfigCommand(key, value, options);
  }));

// =============================================================================
// HOOKS AND ERROR HANDLING
// =============================================================================

program.hook('preAction', () => {
  if (program.opts().verbose === true) {
    process.env.FORKFERRY_VERBOSE = '1';
    logger.setLevel(LogLevel.DEBUG);
  }
  if (program.opts().plain === true) {
    process.env.FORKFERRY_PLAIN = '1';
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }
    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

export { program };

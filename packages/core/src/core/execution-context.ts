/**
 * Execution Context Module
 *
 * Creates and validates ExecutionContext for commands.
 */

import { resolve } from 'path';
import { stat, access, mkdir, constants as fsConstants } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * sourceCwd is always process.cwd(); targetDir is `--out` resolved against
 * it, or the working directory itself.
 *
 * @throws ValidationError if the target is missing, not a directory or not writable
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = process.cwd();
  const targetDir = options.out ? resolve(sourceCwd, options.out) : sourceCwd;

  if (options.createTarget) {
    await mkdir(targetDir, { recursive: true });
  }

  const context: ExecutionContext = {
    sourceCwd,
    targetDir,
    interactive: options.interactive
  };

  await validateTargetDir(context.targetDir);

  logger.debug('Created execution context', {
    sourceCwd: context.sourceCwd,
    targetDir: context.targetDir
  });

  return context;
}

async function validateTargetDir(targetDir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(targetDir)).isDirectory();
  } catch (error) {
    if (hasCode(error, 'ENOENT')) {
      throw new ValidationError(
        `Target directory does not exist: ${targetDir}\n\n` +
        `Hint: Create the directory or pass a different one with --out`
      );
    }
    throw new ValidationError(`Invalid target directory: ${targetDir}\nError: ${errorMessage(error)}`);
  }
  if (!isDirectory) {
    throw new ValidationError(`Target path is not a directory: ${targetDir}`);
  }

  try {
    await access(targetDir, fsConstants.W_OK);
  } catch {
    throw new ValidationError(
      `Target directory is not writable: ${targetDir}\n\n` +
      `Hint: Check directory permissions`
    );
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

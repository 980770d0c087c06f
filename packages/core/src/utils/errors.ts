import { ForkferryError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of the transfer engine
 */

export class FileNotFoundError extends ForkferryError {
  constructor(path: string) {
    super(`File not found: ${path}`, ErrorCodes.FILE_NOT_FOUND, { path });
    this.name = 'FileNotFoundError';
  }
}

export class FileSystemError extends ForkferryError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends ForkferryError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends ForkferryError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Raised only when a container is parsed on purpose (e.g. `inspect`).
 * Classification treats a bad container as "not this format" instead.
 */
export class FormatError extends ForkferryError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.FORMAT_ERROR, details);
    this.name = 'FormatError';
  }
}

/**
 * A fork could not be written. The partially written entry has already been
 * removed by the time this reaches the caller.
 */
export class TransferError extends ForkferryError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.TRANSFER_ERROR, details);
    this.name = 'TransferError';
  }
}

/** Self-overwrite, file/directory clashes, files in the middle of a path. */
export class StructureError extends ForkferryError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.STRUCTURE_ERROR, details);
    this.name = 'StructureError';
  }
}

export class ArchiveStateError extends ForkferryError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.ARCHIVE_STATE_ERROR, details);
    this.name = 'ArchiveStateError';
  }
}

/**
 * Thrown from inside a part source when the caller answers Cancel while an
 * archive transaction is being committed.
 */
export class TransferCancelledError extends Error {
  constructor(message: string = 'Transfer cancelled') {
    super(message);
    this.name = 'TransferCancelledError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Extract a printable message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof ForkferryError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

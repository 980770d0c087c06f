/**
 * Common types shared across the forkferry engine
 */

export * from './execution-context.js';

// Fork and preservation vocabulary

/** Selects one fork of a file. */
export type FilePart = 'data' | 'rsrc';

/**
 * How dual forks and typed metadata are encoded when the destination cannot
 * carry them natively.
 *
 * - `none`: data fork only, resource fork dropped
 * - `adf`: AppleDouble `._` sidecar holding the resource fork and attributes
 * - `as`: one AppleSingle `.as` file holding both forks
 * - `host`: the host's named-fork path (`file/..namedfork/rsrc`)
 * - `naps`: type information encoded in the filename (`name#062000`)
 */
export type PreserveMode = 'none' | 'adf' | 'as' | 'host' | 'naps';

export const PRESERVE_MODES: readonly PreserveMode[] = ['none', 'adf', 'as', 'host', 'naps'];

/**
 * How the bytes of a host-side fork are obtained. `naps` and
 * `host-named-fork` are read like `plain` files; the kind records where the
 * name or fork came from.
 */
export type SourceKind = 'plain' | 'import' | 'apple-single' | 'apple-double' | 'naps' | 'host-named-fork';

// Configuration

export interface ForkferryDirectories {
  config: string;
}

export interface ForkferryConfig {
  preserve: PreserveMode;
  parseADF: boolean;
  parseAS: boolean;
  parseNAPS: boolean;
  checkNamed: boolean;
  recurse: boolean;
  stripExt: boolean;
  stripPaths: boolean;
  macZip: boolean;
  convertDOSText: boolean;
  napsExtension: boolean;
  compress: boolean;
}

// Command results

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error handling

export class ForkferryError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'ForkferryError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FORMAT_ERROR = 'FORMAT_ERROR',
  TRANSFER_ERROR = 'TRANSFER_ERROR',
  STRUCTURE_ERROR = 'STRUCTURE_ERROR',
  ARCHIVE_STATE_ERROR = 'ARCHIVE_STATE_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

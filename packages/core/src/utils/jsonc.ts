/**
 * JSONC (JSON with Comments) file utilities
 * Handles reading and parsing JSONC files with comment support
 */

import { readFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';

const DATA_DIR = 'data';

/**
 * Find the core package's data directory by walking up from this file until
 * a `data/` directory holding the requested file appears. Works from both
 * `src/utils` and a compiled `dist/` tree.
 */
function findDataFile(relativePath: string): string {
  const __filename = fileURLToPath(import.meta.url);
  let dir = dirname(__filename);

  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, DATA_DIR, relativePath);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return join(dirname(__filename), '..', '..', DATA_DIR, relativePath);
}

/**
 * Parse JSONC text, throwing on syntax errors instead of returning a
 * best-effort result.
 */
export function parseJsonc(content: string, label: string): unknown {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new Error(`${label}: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  return parsed;
}

/**
 * Read and parse a JSONC file from the core package's data directory
 * @param relativePath - Path relative to `data/` (e.g., 'mac-roman.jsonc')
 */
export function readDataFileSync(relativePath: string): unknown {
  const fullPath = findDataFile(relativePath);

  try {
    const content = readFileSync(fullPath, 'utf-8');
    return parseJsonc(content, relativePath);
  } catch (error) {
    logger.error(`Failed to read JSONC file: ${relativePath}`, { error, fullPath });
    throw new Error(`Failed to read JSONC file ${relativePath}: ${error}`);
  }
}

/**
 * Read and parse a JSONC or JSON file from an absolute path.
 * Returns undefined if the file doesn't exist. A file that exists but is not
 * a JSON object is an error.
 */
export function readJsoncObject(fullPath: string): Record<string, unknown> | undefined {
  if (!existsSync(fullPath)) {
    return undefined;
  }

  const content = readFileSync(fullPath, 'utf-8');
  const parsed = parseJsonc(content, fullPath);
  if (!isPlainObject(parsed)) {
    throw new Error(`${fullPath}: expected a JSON object`);
  }
  return parsed;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

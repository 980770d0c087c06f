import { NAMING } from '../../constants/index.js';

/**
 * Filename and pathname conventions for moving names between legacy volumes
 * and the host.
 *
 * Host-bound paths are always joined with '/', which Node accepts on every
 * platform.
 */

export const HOST_SEP = '/';

/** Characters that cannot appear in a host filename on at least one major OS. */
const INVALID_CHARS = new Set<string>(['"', '<', '>', '|', ':', '*', '?', '\\', '/']);

const CTRL_PIC_START = 0x2400;
const CTRL_PIC_END = 0x241f;
const CTRL_PIC_DEL = 0x2421;

function isInvalidHostChar(ch: string): boolean {
  return ch.charCodeAt(0) < 0x20 || INVALID_CHARS.has(ch);
}

/**
 * Maps C0 control characters and DEL to the Unicode "Control Pictures" block.
 */
export function printifyControlChars(str: string): string {
  let result = '';
  for (const ch of str) {
    const code = ch.charCodeAt(0);
    if (code < 0x20) {
      result += String.fromCharCode(code + CTRL_PIC_START);
    } else if (code === 0x7f) {
      result += String.fromCharCode(CTRL_PIC_DEL);
    } else {
      result += ch;
    }
  }
  return result;
}

function makeUnprintable(code: number): number {
  if (code >= CTRL_PIC_START && code <= CTRL_PIC_END) {
    return code - CTRL_PIC_START;
  }
  if (code === CTRL_PIC_DEL) {
    return 0x7f;
  }
  return code;
}

/**
 * Replaces characters that are invalid in a host filename.
 */
export function adjustFileName(fileName: string, repl: string = NAMING.DEFAULT_REPL_CHAR): string {
  if (fileName.length === 0) {
    return NAMING.MIRANDA_FILENAME;
  }
  let result = '';
  for (const ch of fileName) {
    result += isInvalidHostChar(ch) ? repl : ch;
  }
  return result;
}

/**
 * Adjusts every component of a pathname, rejoining with the host separator.
 */
export function adjustPathName(pathName: string, dirSep: string, repl: string = NAMING.DEFAULT_REPL_CHAR): string {
  return splitOn(pathName, dirSep).map(name => adjustFileName(name, repl)).join(HOST_SEP);
}

/**
 * Escapes a filename for the host: invalid characters, control characters
 * and DEL become `%xx`, and `%` becomes `%%`. Control pictures are turned
 * back into the control codes they stand for first.
 */
export function escapeFileName(fileName: string): string {
  if (fileName.length === 0) {
    return NAMING.MIRANDA_FILENAME;
  }
  let result = '';
  for (const original of fileName) {
    let doEscape = isInvalidHostChar(original);
    const code = makeUnprintable(original.charCodeAt(0));
    if (code < 0x20 || code === 0x7f) {
      doEscape = true;
    }
    if (doEscape) {
      result += NAMING.ESCAPE_CHAR + code.toString(16).padStart(2, '0');
    } else if (original === NAMING.ESCAPE_CHAR) {
      result += NAMING.ESCAPE_CHAR + NAMING.ESCAPE_CHAR;
    } else {
      result += original;
    }
  }
  return result;
}

/**
 * Escapes every component of a pathname.
 */
export function escapePathName(pathName: string, dirSep: string): string {
  return splitOn(pathName, dirSep).map(escapeFileName).join(HOST_SEP);
}

/**
 * Adjusts the directory components and escapes the filename. This is the
 * extraction rule for NAPS mode: only the leaf carries escapes.
 */
export function adjustEscapePathName(pathName: string, dirSep: string, repl: string = NAMING.DEFAULT_REPL_CHAR): string {
  const names = splitOn(pathName, dirSep);
  return names
    .map((name, index) => (index === names.length - 1 ? escapeFileName(name) : adjustFileName(name, repl)))
    .join(HOST_SEP);
}

function hexDigit(ch: string | undefined): number {
  if (ch === undefined || ch.length !== 1) {
    return -1;
  }
  const value = parseInt(ch, 16);
  return Number.isNaN(value) ? -1 : value;
}

/**
 * Undoes {@link escapeFileName}. `%00` is dropped. A decoded character that
 * equals `newDirSep` would split the name, so it becomes a lone `%`; pass ''
 * when the name will not be joined into a path.
 */
export function unescapeFileName(fileName: string, newDirSep: string): string {
  let result = '';
  for (let i = 0; i < fileName.length; i++) {
    const ch = fileName[i];
    if (ch === NAMING.ESCAPE_CHAR) {
      if (fileName[i + 1] === NAMING.ESCAPE_CHAR) {
        result += NAMING.ESCAPE_CHAR;
        i += 1;
        continue;
      }
      const hi = hexDigit(fileName[i + 1]);
      const lo = hexDigit(fileName[i + 2]);
      if (hi >= 0 && lo >= 0) {
        const unch = String.fromCharCode((hi << 4) | lo);
        if (unch === '\0') {
          // omitted
        } else if (newDirSep !== '' && unch === newDirSep) {
          result += NAMING.ESCAPE_CHAR;
        } else {
          result += unch;
        }
        i += 2;
        continue;
      }
    }
    result += ch;
  }
  return result;
}

/**
 * Un-escapes each component of a host path and joins them with `newDirSep`.
 */
export function unescapePathName(pathName: string, pathDirSep: string, newDirSep: string): string {
  return splitOn(pathName, pathDirSep).map(name => unescapeFileName(name, newDirSep)).join(newDirSep);
}

/**
 * Returns the last component of a path, or '' if the path ends with the
 * separator.
 */
export function getFileName(pathName: string, dirSep: string): string {
  if (dirSep === '') {
    return pathName;
  }
  const lastIndex = pathName.lastIndexOf(dirSep);
  if (lastIndex < 0) {
    return pathName;
  }
  return lastIndex === pathName.length - 1 ? '' : pathName.substring(lastIndex + 1);
}

/**
 * Returns everything before the last separator, or '' for a bare name.
 */
export function getDirectoryName(pathName: string, dirSep: string): string {
  if (dirSep === '') {
    return '';
  }
  const lastIndex = pathName.lastIndexOf(dirSep);
  return lastIndex <= 0 ? '' : pathName.substring(0, lastIndex);
}

/** Key for case-insensitive duplicate checks on archive pathnames. */
export function foldCase(name: string): string {
  return name.toUpperCase();
}

/**
 * Ordinal, case-insensitive filename comparison for sorting.
 */
export function compareFileNames(a: string, b: string): number {
  const ua = a.toUpperCase();
  const ub = b.toUpperCase();
  if (ua < ub) return -1;
  if (ua > ub) return 1;
  return 0;
}

function splitOn(pathName: string, dirSep: string): string[] {
  return dirSep === '' ? [pathName] : pathName.split(dirSep);
}

import path from 'path';
import { FILE_TYPES, HFS_CREATORS, HFS_TYPES } from '../../constants/index.js';
import type { ImportedFileTypes, ImportedForks, Importer, ImportOptions } from './importer.js';

export const OPT_INCHAR = 'inchar';
export const OPT_OUTCHAR = 'outchar';

export type InCharMode = 'utf8' | 'latin';
export type OutCharMode = 'ascii' | 'highascii';

const TXT_EXT = '.txt';
const CR = 0x0d;
const LF = 0x0a;
const REPLACEMENT = '?';

/** Letters NFD decomposition leaves alone. */
const EXTRA_FOLDS: Readonly<Record<string, string>> = {
  '\u0131': 'i',
  '\u0192': 'f',
  '\u00d8': 'O',
  '\u00f8': 'o',
  '\u00df': 's',
  '\u2018': "'",
  '\u2019': "'",
  '\u201c': '"',
  '\u201d': '"',
  '\u2013': '-',
  '\u2014': '-',
  '\u00a0': ' '
};

/**
 * Reduces one character to ASCII by dropping diacritical marks. Anything
 * that does not reduce becomes `?`.
 */
export function reduceToASCII(ch: string): string {
  const code = ch.charCodeAt(0);
  if (ch.length === 1 && code <= 0x7f) {
    return ch;
  }
  const folded = EXTRA_FOLDS[ch];
  if (folded !== undefined) {
    return folded;
  }
  const base = ch.normalize('NFD').replace(/[\u0300-\u036f]/g, '');
  if (base.length === 1 && base.charCodeAt(0) <= 0x7f) {
    return base;
  }
  return REPLACEMENT;
}

function parseInChar(value: string | undefined): InCharMode {
  return value === 'latin' ? 'latin' : 'utf8';
}

function parseOutChar(value: string | undefined): OutCharMode {
  return value === 'highascii' ? 'highascii' : 'ascii';
}

/**
 * Imports a host text document: end-of-line markers become carriage returns
 * and the character set is reduced to ASCII.
 */
export class PlainTextImporter implements Importer {
  static readonly TAG = 'text';

  readonly tag = PlainTextImporter.TAG;
  readonly label = 'Plain Text';
  readonly hasDataFork = true;
  readonly hasRsrcFork = false;

  stripExtension(fullPath: string): string {
    const ext = path.extname(fullPath).toLowerCase();
    if (ext.length === 0 || fullPath.length === ext.length || ext !== TXT_EXT) {
      return fullPath;
    }
    return fullPath.substring(0, fullPath.length - ext.length);
  }

  getFileTypes(): ImportedFileTypes {
    return {
      fileType: FILE_TYPES.TXT,
      auxType: 0x0000,
      hfsFileType: HFS_TYPES.TEXT,
      hfsCreator: HFS_CREATORS.CPII
    };
  }

  convertFile(input: Uint8Array, options: ImportOptions): ImportedForks {
    const inMode = parseInChar(options[OPT_INCHAR]);
    const outMode = parseOutChar(options[OPT_OUTCHAR]);
    const asciiOr = outMode === 'highascii' ? 0x80 : 0x00;

    // TextDecoder drops a leading UTF-8 byte-order mark by default.
    const text = inMode === 'latin'
      ? Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('latin1')
      : new TextDecoder('utf-8').decode(input);

    const out: number[] = [];
    let lastWasCR = false;
    for (const ch of text) {
      const code = ch.codePointAt(0) ?? 0;
      if (code === CR) {
        out.push(CR | asciiOr);
      } else if (code === LF) {
        // second half of CRLF is dropped, a lone LF becomes CR
        if (!lastWasCR) {
          out.push(CR | asciiOr);
        }
      } else {
        out.push(reduceToASCII(ch).charCodeAt(0) | asciiOr);
      }
      lastWasCR = code === CR;
    }
    return { data: Uint8Array.from(out), rsrc: null };
  }
}

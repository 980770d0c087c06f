import { readDataFileSync, isPlainObject } from './jsonc.js';

/**
 * Mac OS Roman <-> Unicode conversion. The upper half of the table is read
 * from `data/mac-roman.jsonc` on first use.
 */

let highTable: string[] | null = null;
let reverseTable: Map<string, number> | null = null;

function loadTable(): string[] {
  if (highTable) {
    return highTable;
  }
  const data = readDataFileSync('mac-roman.jsonc');
  const high = isPlainObject(data) ? data.high : undefined;
  if (!Array.isArray(high) || high.length !== 128) {
    throw new Error('mac-roman.jsonc: "high" must list 128 code points');
  }
  highTable = high.map((entry: unknown) => {
    if (typeof entry !== 'string' || !/^[0-9A-Fa-f]{4}$/.test(entry)) {
      throw new Error(`mac-roman.jsonc: bad code point '${String(entry)}'`);
    }
    return String.fromCharCode(parseInt(entry, 16));
  });
  return highTable;
}

export function decodeMacRoman(bytes: Uint8Array): string {
  const table = loadTable();
  let str = '';
  for (const b of bytes) {
    str += b < 0x80 ? String.fromCharCode(b) : table[b - 0x80];
  }
  return str;
}

/**
 * Converts a string to Mac OS Roman. Characters with no mapping become '?'.
 */
export function encodeMacRoman(str: string): Uint8Array {
  const out: number[] = [];
  for (const ch of str) {
    out.push(macRomanByte(ch) ?? 0x3f);
  }
  return Uint8Array.from(out);
}

/** Looks up a single character; undefined when it has no Mac OS Roman form. */
export function macRomanByte(ch: string): number | undefined {
  if (ch.length === 1 && ch.charCodeAt(0) < 0x80) {
    return ch.charCodeAt(0);
  }
  if (!reverseTable) {
    reverseTable = new Map(loadTable().map((c, i) => [c, i + 0x80]));
  }
  return reverseTable.get(ch);
}

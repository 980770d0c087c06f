import { FILE_TYPES, HFS_TYPES, NAMING } from '../../constants/index.js';
import type { EntryAttributes } from '../attributes/file-attribs.js';
import type { FilePart } from '../../types/index.js';

/**
 * NAPS (NuLib2 Attribute Preservation String) filename tags.
 *
 * A tagged host name looks like `TEXTFILE#040000.txt` or `GSHK#b3db07r`:
 * the storage name, `#` and 6 hex digits (ProDOS type + aux type) or 16 hex
 * digits (HFS type + creator), an optional fork marker, and an optional
 * extension that only exists to make the file easier to open on the host.
 */

const NAPS6_PATTERN = /^(.+)(#[A-Fa-f0-9]{6}[DdRrIi]?)(\..*)?$/;
const NAPS16_PATTERN = /^(.+)(#[A-Fa-f0-9]{16}[DdRrIi]?)(\..*)?$/;

export type NapsMarker = 'd' | 'r' | 'i' | '';

export interface NapsMatch {
  /** Filename with the tag and host extension removed, still escaped */
  storageName: string;
  /** The tag itself, including the leading '#' */
  tag: string;
  /** Throwaway host extension, '' when absent */
  extension: string;
}

export interface NapsTag {
  /** First hex field: ProDOS type for 6-digit tags, HFS type for 16-digit ones */
  typeValue: number;
  /** Second hex field: aux type or HFS creator */
  auxValue: number;
  /** True for the 16-digit form */
  isLong: boolean;
  marker: NapsMarker;
}

/**
 * Splits a host filename into storage name, tag and extension.
 * Returns null when the name carries no NAPS tag.
 */
export function matchNapsName(fileName: string): NapsMatch | null {
  const match = NAPS6_PATTERN.exec(fileName) ?? NAPS16_PATTERN.exec(fileName);
  if (!match) {
    return null;
  }
  return {
    storageName: match[1],
    tag: match[2],
    extension: match[3] ?? ''
  };
}

/**
 * Decodes the hex fields and fork marker of a tag matched by
 * {@link matchNapsName}.
 */
export function parseNapsTag(tag: string): NapsTag {
  const isLong = tag.length > 8;
  const digits = isLong ? 8 : 2;
  const auxDigits = isLong ? 8 : 4;
  const typeValue = parseInt(tag.substring(1, 1 + digits), 16);
  const auxValue = parseInt(tag.substring(1 + digits, 1 + digits + auxDigits), 16);
  const markerChar = tag.length === 2 + digits + auxDigits ? tag.charAt(1 + digits + auxDigits).toLowerCase() : '';
  return {
    typeValue: typeValue >>> 0,
    auxValue: auxValue >>> 0,
    isLong,
    marker: toMarker(markerChar)
  };
}

function toMarker(ch: string): NapsMarker {
  switch (ch) {
    case 'd':
    case 'r':
    case 'i':
      return ch;
    default:
      return '';
  }
}

/**
 * Builds the tag for a file's attributes, e.g. `#062000` for BIN/$2000.
 *
 * The 16-digit HFS form is used only when the ProDOS type and aux type are
 * both zero and an HFS type or creator is set. Resource forks get a trailing
 * `r`; data forks get no marker.
 */
export function generateNapsTag(attrs: Readonly<EntryAttributes>, part: FilePart): string {
  let tag: string;
  if (attrs.fileType === 0 && attrs.auxType === 0 && (attrs.hfsFileType !== 0 || attrs.hfsCreator !== 0)) {
    tag = NAMING.NAPS_TAG_CHAR + hex(attrs.hfsFileType, 8) + hex(attrs.hfsCreator, 8);
  } else {
    tag = NAMING.NAPS_TAG_CHAR + hex(attrs.fileType, 2) + hex(attrs.auxType, 4);
  }
  return part === 'rsrc' ? tag + 'r' : tag;
}

/** '.txt' for text files, '' for everything else. */
export function napsConvenienceExtension(attrs: Readonly<EntryAttributes>): string {
  if (attrs.fileType === FILE_TYPES.TXT || attrs.hfsFileType === HFS_TYPES.TEXT) {
    return '.txt';
  }
  return '';
}

function hex(value: number, width: number): string {
  return (value >>> 0).toString(16).padStart(width, '0');
}

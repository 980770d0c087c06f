import {
  FILE_ACCESS_LOCKED,
  FILE_ACCESS_UNLOCKED,
  FILE_TYPES,
  HFS_CREATORS,
  HFS_TYPES
} from '../../constants/index.js';

/**
 * Type, date and access fields shared by every file entry, whatever format
 * it lives in. A `null` date means the format recorded no date.
 */
export interface EntryAttributes {
  /** ProDOS file type (8 bits) */
  fileType: number;
  /** ProDOS auxiliary type (16 bits) */
  auxType: number;
  /** HFS file type, four-character code */
  hfsFileType: number;
  /** HFS creator, four-character code */
  hfsCreator: number;
  /** ProDOS-style access flags */
  access: number;
  createWhen: Date | null;
  modWhen: Date | null;
}

/**
 * Read-only copy of a file's attributes, taken when a record or transfer item
 * is created so later changes to the live source cannot leak into a plan.
 */
export interface AttributeSnapshot extends Readonly<EntryAttributes> {
  readonly fullPathName: string;
  /** Separator used in `fullPathName`, or '' when the name is not a path */
  readonly fullPathSep: string;
  readonly fileNameOnly: string;
  readonly isDirectory: boolean;
  readonly dataLength: number;
  readonly rsrcLength: number;
}

/** Anything attributes can be copied out of. */
export type AttributeSource = Readonly<EntryAttributes>;

/** The plain attribute fields of `source`, with no type derivation. */
export function entryAttributes(source: AttributeSource): EntryAttributes {
  return {
    fileType: source.fileType,
    auxType: source.auxType,
    hfsFileType: source.hfsFileType,
    hfsCreator: source.hfsCreator,
    access: source.access,
    createWhen: source.createWhen,
    modWhen: source.modWhen
  };
}

export function isValidDate(when: Date | null | undefined): when is Date {
  return when instanceof Date && !Number.isNaN(when.getTime());
}

export function hasTypeInfo(attrs: Readonly<EntryAttributes>): boolean {
  return attrs.fileType !== 0 || attrs.auxType !== 0 || attrs.hfsFileType !== 0 || attrs.hfsCreator !== 0;
}

export function hasHFSTypes(attrs: Readonly<EntryAttributes>): boolean {
  return attrs.hfsFileType !== 0 || attrs.hfsCreator !== 0;
}

export function isLocked(access: number): boolean {
  return access === FILE_ACCESS_LOCKED;
}

export function accessFor(locked: boolean): number {
  return locked ? FILE_ACCESS_LOCKED : FILE_ACCESS_UNLOCKED;
}

/**
 * Mutable attribute set used while a record or destination entry is being
 * assembled. Call {@link FileAttribs.snapshot} to freeze a copy.
 */
export class FileAttribs implements EntryAttributes {
  fullPathName = '';
  fullPathSep = '';
  fileNameOnly = '';
  isDirectory = false;
  fileType = 0;
  auxType = 0;
  hfsFileType = 0;
  hfsCreator = 0;
  access = FILE_ACCESS_UNLOCKED;
  createWhen: Date | null = null;
  modWhen: Date | null = null;
  dataLength = 0;
  rsrcLength = 0;

  static fromSnapshot(src: AttributeSnapshot): FileAttribs {
    const attrs = new FileAttribs();
    attrs.fullPathName = src.fullPathName;
    attrs.fullPathSep = src.fullPathSep;
    attrs.fileNameOnly = src.fileNameOnly;
    attrs.isDirectory = src.isDirectory;
    attrs.fileType = src.fileType;
    attrs.auxType = src.auxType;
    attrs.hfsFileType = src.hfsFileType;
    attrs.hfsCreator = src.hfsCreator;
    attrs.access = src.access;
    attrs.createWhen = src.createWhen;
    attrs.modWhen = src.modWhen;
    attrs.dataLength = src.dataLength;
    attrs.rsrcLength = src.rsrcLength;
    return attrs;
  }

  get hasTypeInfo(): boolean {
    return hasTypeInfo(this);
  }

  /**
   * Copies types, access and valid dates out of `entry`. When the entry has
   * no ProDOS types but its HFS type/creator encode some, those are used.
   */
  copyAttrsFrom(entry: AttributeSource): void {
    this.hfsFileType = entry.hfsFileType;
    this.hfsCreator = entry.hfsCreator;
    const derived = entry.fileType === 0 && entry.auxType === 0 && hasHFSTypes(entry)
      ? proDOSFromHFS(entry.hfsFileType, entry.hfsCreator)
      : null;
    if (derived?.isProDOS) {
      this.fileType = derived.fileType;
      this.auxType = derived.auxType;
    } else {
      this.fileType = entry.fileType;
      this.auxType = entry.auxType;
    }
    this.access = entry.access;
    if (isValidDate(entry.createWhen)) {
      this.createWhen = entry.createWhen;
    }
    if (isValidDate(entry.modWhen)) {
      this.modWhen = entry.modWhen;
    }
  }

  /** Type/date/access fields only, in the shape capability setters take. */
  toEntryAttributes(): EntryAttributes {
    return {
      fileType: this.fileType,
      auxType: this.auxType,
      hfsFileType: this.hfsFileType,
      hfsCreator: this.hfsCreator,
      access: this.access,
      createWhen: this.createWhen,
      modWhen: this.modWhen
    };
  }

  snapshot(): AttributeSnapshot {
    return Object.freeze({
      fullPathName: this.fullPathName,
      fullPathSep: this.fullPathSep,
      fileNameOnly: this.fileNameOnly,
      isDirectory: this.isDirectory,
      fileType: this.fileType,
      auxType: this.auxType,
      hfsFileType: this.hfsFileType,
      hfsCreator: this.hfsCreator,
      access: this.access,
      createWhen: this.createWhen ? new Date(this.createWhen.getTime()) : null,
      modWhen: this.modWhen ? new Date(this.modWhen.getTime()) : null,
      dataLength: this.dataLength,
      rsrcLength: this.rsrcLength
    });
  }
}

// ProDOS/HFS type interaction follows the AppleShare and HFS FST conventions:
//
//  ProDOS type/aux     HFS creator/type
//   $00 / $0000         'pdos' 'BINA'
//   $04 / $0000         'pdos' 'TEXT'
//   $ff / any           'pdos' 'PSYS'
//   $b3 / not $DBxx     'pdos' 'PS16'
//   $d7 / $0000         'pdos' 'MIDI'
//   $d8 / $0000         'pdos' 'AIFF'
//   $d8 / $0001         'pdos' 'AIFC'
//   $e0 / $0005         'dCpy' 'dImg'
//   anything else       'pdos' 'p' $tt $aaaa

export interface ProDOSTypes {
  fileType: number;
  auxType: number;
  /** True when the HFS fields really held ProDOS types and should win. */
  isProDOS: boolean;
}

export interface HFSTypes {
  hfsFileType: number;
  hfsCreator: number;
}

/**
 * Extracts ProDOS type information from HFS type/creator values.
 */
export function proDOSFromHFS(hfsType: number, hfsCreator: number): ProDOSTypes {
  const isPdos = hfsCreator === HFS_CREATORS.PDOS;

  switch (hfsType) {
    case HFS_TYPES.BINA:
      return { fileType: FILE_TYPES.NON, auxType: 0, isProDOS: isPdos };
    case HFS_TYPES.TEXT:
      return { fileType: FILE_TYPES.TXT, auxType: 0, isProDOS: isPdos };
    case HFS_TYPES.MIDI:
      return { fileType: FILE_TYPES.MDI, auxType: 0, isProDOS: isPdos };
    case HFS_TYPES.AIFF:
      return { fileType: FILE_TYPES.SND, auxType: 0, isProDOS: isPdos };
    case HFS_TYPES.AIFC:
      return { fileType: FILE_TYPES.SND, auxType: 0x0001, isProDOS: isPdos };
  }

  if (hfsCreator === HFS_CREATORS.DCPY && hfsType === HFS_TYPES.DIMG) {
    return { fileType: FILE_TYPES.LBR, auxType: 0x0005, isProDOS: false };
  }

  if (isPdos) {
    let fileType = 0;
    let auxType = 0;
    if (((hfsType >>> 24) & 0xff) === 0x70) {
      // 'p' $uv $wxyz
      fileType = (hfsType >>> 16) & 0xff;
      auxType = hfsType & 0xffff;
    } else if ((hfsType & 0xffff) === 0x2020) {
      // "XY  ", X and Y hex digits
      const hi = hexDigitValue((hfsType >>> 24) & 0xff);
      const lo = hexDigitValue((hfsType >>> 16) & 0xff);
      if (hi >= 0 && lo >= 0) {
        fileType = (hi << 4) | lo;
      }
    } else if (hfsType === HFS_TYPES.PSYS) {
      fileType = FILE_TYPES.SYS;
    } else if (hfsType === HFS_TYPES.PS16) {
      fileType = FILE_TYPES.S16;
    }
    return { fileType, auxType, isProDOS: true };
  }

  return { fileType: 0, auxType: 0, isProDOS: false };
}

/**
 * Encodes a ProDOS file type in the HFS file type / creator fields.
 */
export function proDOSToHFS(fileType: number, auxType: number): HFSTypes {
  let hfsCreator: number = HFS_CREATORS.PDOS;
  let hfsFileType: number;

  if (fileType === FILE_TYPES.NON && auxType === 0) {
    hfsFileType = HFS_TYPES.BINA;
  } else if (fileType === FILE_TYPES.TXT && auxType === 0) {
    hfsFileType = HFS_TYPES.TEXT;
  } else if (fileType === FILE_TYPES.SYS) {
    hfsFileType = HFS_TYPES.PSYS;
  } else if (fileType === FILE_TYPES.S16 && (auxType & 0xff00) !== 0xdb00) {
    hfsFileType = HFS_TYPES.PS16;
  } else if (fileType === FILE_TYPES.MDI && auxType === 0) {
    hfsFileType = HFS_TYPES.MIDI;
  } else if (fileType === FILE_TYPES.SND && auxType === 0) {
    hfsFileType = HFS_TYPES.AIFF;
  } else if (fileType === FILE_TYPES.SND && auxType === 0x0001) {
    hfsFileType = HFS_TYPES.AIFC;
  } else if (fileType === FILE_TYPES.LBR && auxType === 0x0005) {
    hfsCreator = HFS_CREATORS.DCPY;
    hfsFileType = HFS_TYPES.DIMG;
  } else {
    hfsFileType = ((0x70 << 24) | ((fileType & 0xff) << 16) | (auxType & 0xffff)) >>> 0;
  }
  return { hfsFileType, hfsCreator };
}

function hexDigitValue(ch: number): number {
  if (ch >= 0x30 && ch <= 0x39) return ch - 0x30;
  if (ch >= 0x61 && ch <= 0x66) return ch - 0x61 + 10;
  if (ch >= 0x41 && ch <= 0x46) return ch - 0x41 + 10;
  return -1;
}

/**
 * Formats a four-character code for display, e.g. 0x54455854 -> 'TEXT'.
 */
export function fourCCToString(value: number): string {
  let str = '';
  for (let shift = 24; shift >= 0; shift -= 8) {
    const ch = (value >>> shift) & 0xff;
    str += ch >= 0x20 && ch < 0x7f ? String.fromCharCode(ch) : '.';
  }
  return str;
}

/**
 * Parses a four-character code; shorter strings are padded with spaces.
 */
export function stringToFourCC(str: string): number {
  if (str.length > 4) {
    throw new RangeError(`Four-character code too long: '${str}'`);
  }
  const padded = str.padEnd(4, ' ');
  let value = 0;
  for (let i = 0; i < 4; i++) {
    const ch = padded.charCodeAt(i);
    if (ch > 0xff) {
      throw new RangeError(`Four-character code must be 8-bit: '${str}'`);
    }
    value = ((value << 8) | ch) >>> 0;
  }
  return value;
}

import { FILE_ACCESS_UNLOCKED, TRANSFER_LIMITS } from '../../constants/index.js';
import type { FilePart } from '../../types/index.js';
import { FormatError } from '../../utils/errors.js';
import { decodeMacRoman, encodeMacRoman } from '../../utils/mac-roman.js';
import type { EntryAttributes } from '../attributes/file-attribs.js';
import {
  fromAS2KTime,
  fromHFSTime,
  fromProDOSTime,
  toAS2KTime,
  toHFSTime,
  toProDOSTime
} from '../attributes/time-stamp.js';
import { printifyControlChars } from '../naming/path-name.js';

/**
 * AppleSingle / AppleDouble container codec.
 *
 * An AppleSingle file holds both forks of one file plus its attributes; an
 * AppleDouble "header" file holds everything except the data fork, which
 * lives in a plain file next to it. Both share one layout: a 26-byte header
 * followed by 12-byte entry descriptors `{id, offset, length}`.
 *
 * Headers are big-endian, except for a rare "bad Mac" AppleSingle variant
 * that is entirely little-endian. Finder info is big-endian in both.
 */

export const AS_SIGNATURE = 0x00051600;
export const ADF_SIGNATURE = 0x00051607;
export const VERSION_1 = 0x00010000;
export const VERSION_2 = 0x00020000;
export const HEADER_LEN = 26;

const ENTRY_LENGTH = 12;
const MAX_ENTRIES = 16;
const HOME_FS_LEN = 16;

const FILE_DATES_LEN = 16;
const FINDER_INFO_LEN = 32;
const MAC_FILE_INFO_LEN = 4;
const PRODOS_FILE_INFO_LEN = 8;

export enum EntryID {
  DataFork = 1,
  RsrcFork = 2,
  RealName = 3,
  Comment = 4,
  IconBW = 5,
  IconColor = 6,
  FileInfo = 7,
  FileDates = 8,
  FinderInfo = 9,
  MacFileInfo = 10,
  ProDOSFileInfo = 11,
  MSDOSFileInfo = 12
}

export type ContainerKind = 'apple-single' | 'apple-double';

/** Version 1 "home file system"; decides the layout of entry 7 and the name encoding. */
export type HomeFileSystem = 'prodos' | 'hfs' | 'msdos' | 'unix' | 'unknown';

const HOME_FS_NAMES: Record<Exclude<HomeFileSystem, 'unknown'>, string> = {
  prodos: 'ProDOS          ',
  hfs: 'Macintosh       ',
  msdos: 'MS-DOS          ',
  unix: 'Unix            '
};

export interface ContainerEntry {
  id: number;
  offset: number;
  length: number;
}

export interface ForkExtent {
  offset: number;
  length: number;
}

export interface AppleSingleHeader {
  kind: ContainerKind;
  version: 1 | 2;
  homeFS: HomeFileSystem;
  isLittleEndian: boolean;
  /** Set when an entry was unreadable; the rest of the header is still usable */
  isDubious: boolean;
  entries: ContainerEntry[];
  /** Stored filename, '' if the container has none */
  fileName: string;
  attrs: EntryAttributes;
  dataFork: ForkExtent | null;
  rsrcFork: ForkExtent | null;
  /** Observations made while parsing, for `inspect` and debug logging */
  notes: string[];
}

/**
 * Identifies a container from its first eight bytes. AppleSingle is
 * accepted in either byte order, AppleDouble only big-endian.
 */
export function detectContainer(buf: Uint8Array): ContainerKind | null {
  if (buf.length < HEADER_LEN) {
    return null;
  }
  const view = viewOf(buf);
  const sigBE = view.getUint32(0, false);
  const sigLE = view.getUint32(0, true);
  if (sigBE === AS_SIGNATURE) {
    return isKnownVersion(view.getUint32(4, false)) ? 'apple-single' : null;
  }
  if (sigLE === AS_SIGNATURE) {
    return isKnownVersion(view.getUint32(4, true)) ? 'apple-single' : null;
  }
  if (sigBE === ADF_SIGNATURE) {
    return isKnownVersion(view.getUint32(4, false)) ? 'apple-double' : null;
  }
  return null;
}

export function isAppleSingle(buf: Uint8Array): boolean {
  return detectContainer(buf) === 'apple-single';
}

export function isAppleDouble(buf: Uint8Array): boolean {
  return detectContainer(buf) === 'apple-double';
}

function isKnownVersion(version: number): boolean {
  return version === VERSION_1 || version === VERSION_2;
}

function viewOf(buf: Uint8Array): DataView {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
}

/**
 * Parses a container header. Returns null when the bytes are not a usable
 * container, which callers treat as "not this format".
 */
export function parseContainer(buf: Uint8Array): AppleSingleHeader | null {
  const kind = detectContainer(buf);
  if (!kind) {
    return null;
  }
  const view = viewOf(buf);
  const isLittleEndian = view.getUint32(0, false) !== AS_SIGNATURE && view.getUint32(0, false) !== ADF_SIGNATURE;
  const le = isLittleEndian;
  const version = view.getUint32(4, le) === VERSION_1 ? 1 : 2;
  const notes: string[] = [];
  if (isLittleEndian) {
    notes.push('File is in little-endian order');
  }

  let homeFS: HomeFileSystem = 'unknown';
  if (version === 1) {
    const homeName = String.fromCharCode(...buf.subarray(8, 8 + HOME_FS_LEN));
    for (const [fs, name] of Object.entries(HOME_FS_NAMES)) {
      if (name === homeName && isHomeFS(fs)) {
        homeFS = fs;
      }
    }
  }

  const numEntries = view.getUint16(24, le);
  if (numEntries > MAX_ENTRIES) {
    return null;
  }
  if (HEADER_LEN + numEntries * ENTRY_LENGTH > buf.length) {
    return null;
  }

  const header: AppleSingleHeader = {
    kind,
    version,
    homeFS,
    isLittleEndian,
    isDubious: false,
    entries: [],
    fileName: '',
    attrs: {
      fileType: 0,
      auxType: 0,
      hfsFileType: 0,
      hfsCreator: 0,
      access: FILE_ACCESS_UNLOCKED,
      createWhen: null,
      modWhen: null
    },
    dataFork: null,
    rsrcFork: null,
    notes
  };

  let rawName: Uint8Array = new Uint8Array(0);
  for (let i = 0; i < numEntries; i++) {
    const pos = HEADER_LEN + i * ENTRY_LENGTH;
    const entry: ContainerEntry = {
      id: view.getUint32(pos, le),
      offset: view.getUint32(pos + 4, le),
      length: view.getUint32(pos + 8, le)
    };
    header.entries.push(entry);
    if (entry.offset > buf.length || entry.length > buf.length - entry.offset) {
      notes.push(`Bad entry (ID=${entry.id}): body runs off end of file`);
      header.isDubious = true;
      continue;
    }
    const body = buf.subarray(entry.offset, entry.offset + entry.length);
    const bodyView = viewOf(body);

    switch (entry.id) {
      case EntryID.DataFork:
        header.dataFork = { offset: entry.offset, length: entry.length };
        break;
      case EntryID.RsrcFork:
        header.rsrcFork = { offset: entry.offset, length: entry.length };
        break;
      case EntryID.RealName:
        if (entry.length > TRANSFER_LIMITS.MAX_CONTAINER_NAME) {
          notes.push(`Found an extremely long filename (${entry.length})`);
          header.isDubious = true;
          break;
        }
        rawName = body;
        break;
      case EntryID.FileInfo:
        readFileInfo(header, bodyView, le);
        break;
      case EntryID.FileDates:
        if (entry.length < FILE_DATES_LEN) {
          notes.push('Found short File Dates entry');
          break;
        }
        header.attrs.createWhen = fromAS2KTime(bodyView.getInt32(0, le));
        header.attrs.modWhen = fromAS2KTime(bodyView.getInt32(4, le));
        break;
      case EntryID.FinderInfo:
        if (entry.length < FINDER_INFO_LEN) {
          notes.push('Found short Finder Info entry');
          break;
        }
        header.attrs.hfsFileType = bodyView.getUint32(0, false);
        header.attrs.hfsCreator = bodyView.getUint32(4, false);
        break;
      case EntryID.MacFileInfo:
        if (entry.length < MAC_FILE_INFO_LEN) {
          notes.push('Found short Macintosh File Info entry');
        }
        break;
      case EntryID.ProDOSFileInfo:
        if (entry.length < PRODOS_FILE_INFO_LEN) {
          notes.push('Found short ProDOS File Info entry');
          break;
        }
        header.attrs.access = bodyView.getUint16(0, le) & 0xff;
        header.attrs.fileType = bodyView.getUint16(2, le) & 0xff;
        header.attrs.auxType = bodyView.getUint32(4, le) & 0xffff;
        break;
      default:
        notes.push(`Ignoring entry with ID ${entry.id}`);
        break;
    }
  }

  // v1 files from old Macs and Apple IIs use Mac OS Roman; everything else is UTF-8.
  if (homeFS === 'prodos' || homeFS === 'hfs') {
    header.fileName = printifyControlChars(decodeMacRoman(rawName));
  } else {
    header.fileName = Buffer.from(rawName).toString('utf8');
  }
  return header;
}

function isHomeFS(value: string): value is HomeFileSystem {
  return value === 'prodos' || value === 'hfs' || value === 'msdos' || value === 'unix';
}

/** Entry 7, version 1 only. Layout depends on the home file system. */
function readFileInfo(header: AppleSingleHeader, view: DataView, le: boolean): void {
  switch (header.homeFS) {
    case 'prodos':
      if (view.byteLength < 16) {
        header.notes.push(`Ignoring short entry #7 (len=${view.byteLength})`);
        return;
      }
      header.attrs.createWhen = fromProDOSTime(view.getUint16(0, le), view.getUint16(2, le));
      header.attrs.modWhen = fromProDOSTime(view.getUint16(4, le), view.getUint16(6, le));
      header.attrs.access = view.getUint16(8, le) & 0xff;
      header.attrs.fileType = view.getUint16(10, le) & 0xff;
      header.attrs.auxType = view.getUint32(12, le) & 0xffff;
      return;
    case 'hfs':
      if (view.byteLength < 16) {
        header.notes.push(`Ignoring short entry #7 (len=${view.byteLength})`);
        return;
      }
      header.attrs.createWhen = fromHFSTime(view.getUint32(0, le));
      header.attrs.modWhen = fromHFSTime(view.getUint32(4, le));
      return;
    case 'unix':
      if (view.byteLength < 12) {
        header.notes.push(`Ignoring short entry #7 (len=${view.byteLength})`);
        return;
      }
      header.attrs.modWhen = new Date(view.getInt32(8, le) * 1000);
      return;
    default:
      header.notes.push(`Ignoring entry #7 for home file system '${header.homeFS}'`);
  }
}

/**
 * Like {@link parseContainer}, but for callers that asked for a container
 * explicitly: anything unusable is a {@link FormatError}.
 */
export function readContainer(buf: Uint8Array, label: string): AppleSingleHeader {
  if (buf.length < HEADER_LEN) {
    throw new FormatError(`${label}: too short to be AppleSingle or AppleDouble (${buf.length} bytes)`);
  }
  const header = parseContainer(buf);
  if (!header) {
    throw new FormatError(`${label}: not an AppleSingle or AppleDouble file`);
  }
  return header;
}

/**
 * Returns the bytes of one fork, or null when the container does not hold it.
 */
export function containerFork(buf: Uint8Array, header: AppleSingleHeader, part: FilePart): Uint8Array | null {
  const extent = part === 'data' ? header.dataFork : header.rsrcFork;
  if (!extent) {
    return null;
  }
  return buf.subarray(extent.offset, extent.offset + extent.length);
}

export interface ContainerContents {
  kind: ContainerKind;
  fileName: string;
  attrs: Readonly<EntryAttributes>;
  data: Uint8Array | null;
  rsrc: Uint8Array | null;
  /** Defaults to 2 */
  version?: 1 | 2;
  /** Version 1 only; defaults to 'unix' */
  homeFS?: HomeFileSystem;
}

/**
 * Builds a container image. Version 2 output holds, in order: the name (if
 * any), file dates, Finder info (if HFS types are set), ProDOS info (if any
 * ProDOS value is set), the data fork (always, for AppleSingle) and the
 * resource fork (if present).
 */
export function buildContainer(contents: ContainerContents): Buffer {
  const version = contents.version ?? 2;
  const homeFS: HomeFileSystem = version === 1 ? contents.homeFS ?? 'unix' : 'unknown';
  const attrs = contents.attrs;

  if (contents.fileName.length > TRANSFER_LIMITS.MAX_CONTAINER_NAME) {
    throw new FormatError(`Filename is excessively long (${contents.fileName.length})`);
  }
  const rawName = homeFS === 'prodos' || homeFS === 'hfs'
    ? encodeMacRoman(contents.fileName)
    : Buffer.from(contents.fileName, 'utf8');

  const bodies: Array<{ id: EntryID; body: Uint8Array }> = [];
  if (rawName.length > 0) {
    bodies.push({ id: EntryID.RealName, body: rawName });
  }

  if (version === 1) {
    bodies.push({ id: EntryID.FileInfo, body: buildFileInfo(homeFS, attrs) });
  } else {
    const dates = Buffer.alloc(FILE_DATES_LEN);
    dates.writeInt32BE(toAS2KTime(attrs.createWhen), 0);
    dates.writeInt32BE(toAS2KTime(attrs.modWhen), 4);
    dates.writeInt32BE(toAS2KTime(null), 8);
    dates.writeInt32BE(toAS2KTime(null), 12);
    bodies.push({ id: EntryID.FileDates, body: dates });

    if (attrs.hfsFileType !== 0 || attrs.hfsCreator !== 0) {
      const finder = Buffer.alloc(FINDER_INFO_LEN);
      finder.writeUInt32BE(attrs.hfsFileType >>> 0, 0);
      finder.writeUInt32BE(attrs.hfsCreator >>> 0, 4);
      bodies.push({ id: EntryID.FinderInfo, body: finder });
    }
    if (attrs.fileType !== 0 || attrs.auxType !== 0 || attrs.access !== 0) {
      const pro = Buffer.alloc(PRODOS_FILE_INFO_LEN);
      pro.writeUInt16BE(attrs.access & 0xff, 0);
      pro.writeUInt16BE(attrs.fileType & 0xff, 2);
      pro.writeUInt32BE(attrs.auxType & 0xffff, 4);
      bodies.push({ id: EntryID.ProDOSFileInfo, body: pro });
    }
  }

  if (contents.kind === 'apple-single') {
    bodies.push({ id: EntryID.DataFork, body: contents.data ?? new Uint8Array(0) });
  }
  if (contents.rsrc) {
    bodies.push({ id: EntryID.RsrcFork, body: contents.rsrc });
  }

  const headerLen = HEADER_LEN + ENTRY_LENGTH * bodies.length;
  const totalLen = bodies.reduce((sum, b) => sum + b.body.length, headerLen);
  const out = Buffer.alloc(totalLen);

  out.writeUInt32BE(contents.kind === 'apple-double' ? ADF_SIGNATURE : AS_SIGNATURE, 0);
  if (version === 1) {
    out.writeUInt32BE(VERSION_1, 4);
    const fsName = homeFS === 'unknown' ? HOME_FS_NAMES.unix : HOME_FS_NAMES[homeFS];
    out.write(fsName, 8, HOME_FS_LEN, 'latin1');
  } else {
    out.writeUInt32BE(VERSION_2, 4);
  }
  out.writeUInt16BE(bodies.length, 24);

  let descPos = HEADER_LEN;
  let bodyPos = headerLen;
  for (const { id, body } of bodies) {
    out.writeUInt32BE(id, descPos);
    out.writeUInt32BE(bodyPos, descPos + 4);
    out.writeUInt32BE(body.length, descPos + 8);
    out.set(body, bodyPos);
    descPos += ENTRY_LENGTH;
    bodyPos += body.length;
  }
  return out;
}

function buildFileInfo(homeFS: HomeFileSystem, attrs: Readonly<EntryAttributes>): Buffer {
  switch (homeFS) {
    case 'prodos': {
      const buf = Buffer.alloc(16);
      const create = toProDOSTime(attrs.createWhen);
      const mod = toProDOSTime(attrs.modWhen);
      buf.writeUInt16BE(create.date, 0);
      buf.writeUInt16BE(create.time, 2);
      buf.writeUInt16BE(mod.date, 4);
      buf.writeUInt16BE(mod.time, 6);
      buf.writeUInt16BE(attrs.access & 0xff, 8);
      buf.writeUInt16BE(attrs.fileType & 0xff, 10);
      buf.writeUInt32BE(attrs.auxType & 0xffff, 12);
      return buf;
    }
    case 'hfs': {
      const buf = Buffer.alloc(16);
      buf.writeUInt32BE(toHFSTime(attrs.createWhen), 0);
      buf.writeUInt32BE(toHFSTime(attrs.modWhen), 4);
      return buf;
    }
    default: {
      // Unix layout: create, access, modify, as signed seconds since 1970.
      const buf = Buffer.alloc(12);
      const secs = attrs.modWhen ? Math.floor(attrs.modWhen.getTime() / 1000) : 0;
      const mod = secs >= -0x80000000 && secs <= 0x7fffffff ? secs : 0;
      buf.writeInt32BE(mod, 0);
      buf.writeInt32BE(mod, 4);
      buf.writeInt32BE(mod, 8);
      return buf;
    }
  }
}

import type { FilePart } from '../../types/index.js';
import type { EntryAttributes } from '../attributes/file-attribs.js';
import type { PartSource } from '../part-source/part-source.js';
import type { FileEntry, ForkReader } from './file-entry.js';

export interface ArchiveCharacteristics {
  /** Format name for messages, e.g. "ZIP" */
  readonly name: string;
  readonly hasResourceForks: boolean;
  /** Separator for stored pathnames, '' when the format stores bare names */
  readonly defaultDirSep: string;
  /** ZIP: attributes and resource forks can travel in `__MACOSX/` AppleDouble entries */
  readonly supportsMacZip: boolean;
  /** A resource fork can exist with zero length (ProDOS-style extended files) */
  readonly tracksExtendedness: boolean;
}

/**
 * What the engine needs from a file archive codec.
 *
 * Modifications happen inside a transaction. Parts added with
 * {@link Archive.addPart} are not read until {@link Archive.commitTransaction},
 * which opens, reads and closes each queued source in order.
 */
export interface Archive {
  readonly characteristics: ArchiveCharacteristics;
  readonly isReadOnly: boolean;
  readonly isDubious: boolean;

  entries(): FileEntry[];
  /** Exact-match lookup by full pathname. */
  findEntry(fullPathName: string): FileEntry | null;
  openPart(entry: FileEntry, part: FilePart): Promise<ForkReader>;

  /** Replaces characters the format cannot store in one pathname component. */
  adjustFileName(name: string): string;
  /** False when a full pathname exceeds the format's limits. */
  checkStorageName(fullPathName: string): boolean;

  startTransaction(): void;
  createRecord(fullPathName: string, dirSep: string): FileEntry;
  setAttributes(entry: FileEntry, attrs: Readonly<EntryAttributes>): void;
  addPart(entry: FileEntry, part: FilePart, source: PartSource, compress: boolean): void;
  deleteRecord(entry: FileEntry): void;
  /** Gives a record a new full pathname when the transaction commits. */
  renameRecord(entry: FileEntry, fullPathName: string): void;
  commitTransaction(): Promise<void>;
  /** Discards pending changes and closes any queued part sources. */
  cancelTransaction(): Promise<void>;
}

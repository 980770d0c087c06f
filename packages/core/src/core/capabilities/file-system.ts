import type { FilePart } from '../../types/index.js';
import type { EntryAttributes } from '../attributes/file-attribs.js';
import type { FileEntry, ForkReader, ForkWriter } from './file-entry.js';

/** `extended` creates a file that can hold a resource fork. */
export type CreateMode = 'file' | 'extended' | 'directory';

export interface FileSystemCharacteristics {
  readonly name: string;
  readonly hasResourceForks: boolean;
  readonly isHierarchical: boolean;
  readonly dirSep: string;
  readonly caseSensitive: boolean;
  /** DOS 3.x: text is stored with the high bit set */
  readonly isDOS: boolean;
  /** A resource fork can exist with zero length (ProDOS-style extended files) */
  readonly tracksExtendedness: boolean;
  /** Only HFS type/creator are stored; ProDOS types must be encoded into them */
  readonly hfsTypesOnly: boolean;
}

/**
 * What the engine needs from a disk-image filesystem codec.
 */
export interface FileSystem {
  readonly characteristics: FileSystemCharacteristics;
  readonly isReadOnly: boolean;
  readonly isDubious: boolean;

  getVolDirEntry(): FileEntry;
  getChildren(dir: FileEntry): FileEntry[];
  /** Looks up `name` in `dir`, honoring the filesystem's case rules. */
  findEntry(dir: FileEntry, name: string): FileEntry | null;

  /** Replaces characters the filesystem cannot store in a filename. */
  adjustFileName(name: string): string;

  createFile(dir: FileEntry, name: string, mode: CreateMode, fileType: number): Promise<FileEntry>;
  deleteFile(entry: FileEntry): Promise<void>;
  openFork(entry: FileEntry, part: FilePart): Promise<ForkReader>;
  openForkForWrite(entry: FileEntry, part: FilePart): Promise<ForkWriter>;
  /** Updates types, dates and access; `name` renames the entry when it differs. */
  setAttributes(entry: FileEntry, attrs: Readonly<EntryAttributes>, name?: string): Promise<void>;
  /**
   * Moves `entry` into `destDir` under `name`. Throws when the name is taken
   * or when a directory would end up inside itself.
   */
  moveFile(entry: FileEntry, destDir: FileEntry, name: string): Promise<void>;
}

import type { EntryAttributes } from '../attributes/file-attribs.js';

/**
 * One file or directory as an archive or filesystem codec exposes it.
 *
 * Entries are live: the codec may change them as the container is modified.
 * Planning code takes an {@link AttributeSnapshot} instead of holding on to
 * the fields.
 */
export interface FileEntry extends Readonly<EntryAttributes> {
  /** Name of this entry only; for archives this is usually the whole path */
  readonly fileName: string;
  readonly fullPathName: string;
  /** Separator used in `fullPathName`, or '' when the format has no paths */
  readonly directorySeparator: string;
  readonly isDirectory: boolean;
  /** The entry is unreadable and must not be modified */
  readonly isDamaged: boolean;
  /** The entry looks suspect; reads may work but writes are refused */
  readonly isDubious: boolean;
  readonly hasDataFork: boolean;
  readonly hasRsrcFork: boolean;
  readonly dataLength: number;
  readonly rsrcLength: number;
  /** Parent directory; null for the volume directory and for archive entries */
  readonly containingDir: FileEntry | null;
}

/**
 * Sequential reader over one fork.
 */
export interface ForkReader {
  /** False for transports that can only be read once, e.g. a compressed archive stream */
  readonly canSeek: boolean;
  /** Returns the number of bytes read; 0 at end of fork. */
  read(buf: Uint8Array, offset: number, count: number): Promise<number>;
  /** Throws when `canSeek` is false. */
  seekToStart(): Promise<void>;
  close(): Promise<void>;
}

export interface ForkWriter {
  write(buf: Uint8Array, offset: number, count: number): Promise<void>;
  close(): Promise<void>;
}

import type { FilePart, PreserveMode } from '../../types/index.js';
import type { AttributeSnapshot } from '../attributes/file-attribs.js';
import type { Archive } from '../capabilities/archive.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import type { FileSystem } from '../capabilities/file-system.js';
import type { ForkSource } from '../classify/logical-file-record.js';
import type { ImportSpec } from '../import/importer.js';

/**
 * Where an item's bytes come from. `entry` is null for a directory that
 * was synthesized from a path and has no entry of its own.
 */
export type ItemOrigin =
  | {
      kind: 'archive';
      archive: Archive;
      entry: FileEntry | null;
      /** MacZip header holding this entry's attributes and resource fork */
      adfEntry: FileEntry | null;
    }
  | { kind: 'filesystem'; fs: FileSystem; entry: FileEntry | null }
  | { kind: 'host'; source: ForkSource | null; importSpec: ImportSpec | null };

/**
 * One fork of one file, planned for transfer.
 *
 * A file with both forks yields two adjacent items with the same
 * `attrs.fullPathName`, data first. Executors pair them by adjacency alone.
 */
export interface TransferItem {
  readonly origin: ItemOrigin;
  readonly part: FilePart;
  /** `fullPathName` is relative to the source boundary */
  readonly attrs: AttributeSnapshot;
  /** Host-bound name after preservation naming and character adjustment */
  readonly extractPath: string;
  readonly preserve: PreserveMode;
}

/**
 * True when the item carries a fork's bytes unchanged. ADF resource items
 * and AS items carry generated container images instead.
 */
export function isRawForkItem(item: TransferItem): boolean {
  if (item.attrs.isDirectory) {
    return true;
  }
  if (item.preserve === 'as') {
    return false;
  }
  return !(item.preserve === 'adf' && item.part === 'rsrc');
}

export function describeItem(item: TransferItem): string {
  return `${item.attrs.fullPathName} (${item.part}, ${item.preserve})`;
}

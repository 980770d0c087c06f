import type { AttributeSnapshot, EntryAttributes } from '../attributes/file-attribs.js';
import { FileAttribs, hasHFSTypes, proDOSToHFS } from '../attributes/file-attribs.js';
import { ValidationError } from '../../utils/errors.js';
import { isRawForkItem, type TransferItem } from '../plan/transfer-item.js';

/**
 * One file (or directory) reassembled from adjacent plan items. A directory
 * group holds its item in `data`.
 */
export interface ItemGroup {
  readonly attrs: AttributeSnapshot;
  readonly isDirectory: boolean;
  readonly data: TransferItem | null;
  readonly rsrc: TransferItem | null;
}

/**
 * Pairs adjacent items that share a source path into data+resource groups.
 * Generated items cannot be written to a volume and are rejected unless
 * `allowGenerated` is set, as it is for host extraction.
 */
export function groupItems(items: readonly TransferItem[], allowGenerated: boolean = false): ItemGroup[] {
  const groups: ItemGroup[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (!allowGenerated && !isRawForkItem(item)) {
      throw new ValidationError(`Cannot write a ${item.preserve} item to a volume: ${item.attrs.fullPathName}`);
    }
    if (item.attrs.isDirectory) {
      groups.push({ attrs: item.attrs, isDirectory: true, data: item, rsrc: null });
      continue;
    }
    if (item.part === 'rsrc') {
      groups.push({ attrs: item.attrs, isDirectory: false, data: null, rsrc: item });
      continue;
    }
    const next = items[i + 1];
    if (next && next.part === 'rsrc' && !next.attrs.isDirectory
        && next.attrs.fullPathName === item.attrs.fullPathName
        && (allowGenerated || isRawForkItem(next))) {
      groups.push({ attrs: item.attrs, isDirectory: false, data: item, rsrc: next });
      i++;
    } else {
      groups.push({ attrs: item.attrs, isDirectory: false, data: item, rsrc: null });
    }
  }
  return groups;
}

/** Splits a group's source path into components. */
export function pathComponents(attrs: AttributeSnapshot): string[] {
  if (attrs.fullPathSep === '') {
    return [attrs.fullPathName];
  }
  return attrs.fullPathName.split(attrs.fullPathSep).filter(name => name.length > 0);
}

/**
 * Attributes to set on a new destination entry. ProDOS types are encoded as
 * HFS types when the destination only stores the latter, and derived from
 * HFS types when the source has none.
 */
export function destinationAttrs(attrs: AttributeSnapshot, hfsTypesOnly: boolean): EntryAttributes {
  const dest = new FileAttribs();
  dest.copyAttrsFrom(attrs);
  if (hfsTypesOnly && !hasHFSTypes(dest) && (dest.fileType !== 0 || dest.auxType !== 0)) {
    const hfs = proDOSToHFS(dest.fileType, dest.auxType);
    dest.hfsFileType = hfs.hfsFileType;
    dest.hfsCreator = hfs.hfsCreator;
  }
  return dest.toEntryAttributes();
}

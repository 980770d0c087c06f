import { TRANSFER_LIMITS } from '../../constants/index.js';
import type { FilePart } from '../../types/index.js';
import { ArchiveStateError, errorMessage, StructureError, TransferError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  CallbackReason,
  CallbackResult,
  CANCELLED,
  COMPLETED,
  createFacts,
  proceedCallback,
  type BatchOutcome,
  type DOSConvMode,
  type TransferCallback
} from '../callbacks/callback-facts.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import type { FileSystem } from '../capabilities/file-system.js';
import { usePartSource } from '../part-source/part-source.js';
import type { TransferItem } from '../plan/transfer-item.js';
import { applyDOSConv, selectDOSConv } from './dos-text.js';
import { destinationAttrs, groupItems, type ItemGroup, pathComponents } from './item-groups.js';
import { openItemSource } from './item-source.js';

export interface FileSystemExecOptions {
  stripPaths: boolean;
  /** Convert text between DOS high-ASCII and plain ASCII */
  convertDOSText: boolean;
}

const DEFAULT_OPTIONS: FileSystemExecOptions = {
  stripPaths: false,
  convertDOSText: false
};

type GroupResult = 'done' | 'cancel';

/**
 * Writes planned items into a filesystem, one file at a time.
 *
 * Every file is complete before the next one starts: a failed write removes
 * the partial entry, and Cancel is only honored between files.
 */
export class FileSystemExecutor {
  private readonly options: FileSystemExecOptions;
  private readonly buffer = new Uint8Array(TRANSFER_LIMITS.COPY_BUFFER_SIZE);

  constructor(
    private readonly fs: FileSystem,
    private readonly targetDir: FileEntry | null = null,
    private readonly callback: TransferCallback = proceedCallback,
    options: Partial<FileSystemExecOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  private get stripPaths(): boolean {
    return this.options.stripPaths || !this.fs.characteristics.isHierarchical;
  }

  async execute(items: readonly TransferItem[]): Promise<BatchOutcome> {
    if (this.fs.isReadOnly) {
      throw new ArchiveStateError(`Target filesystem is read-only${this.fs.isDubious ? ' (damage)' : ''}`);
    }
    const groups = groupItems(items);
    const fileCount = groups.filter(group => !group.isDirectory).length;
    const baseDir = this.targetDir ?? this.fs.getVolDirEntry();

    let fileIdx = 0;
    for (const group of groups) {
      const answer = await this.callback(createFacts(CallbackReason.QueryCancel, {
        origPathName: group.attrs.fullPathName,
        origDirSep: group.attrs.fullPathSep
      }));
      if (answer === CallbackResult.Cancel) {
        logger.debug(`Filesystem transfer cancelled before '${group.attrs.fullPathName}'`);
        return CANCELLED;
      }

      if (group.isDirectory) {
        if (!this.stripPaths) {
          await this.createDirectories(baseDir, pathComponents(group.attrs), group.attrs.fullPathName);
        }
        continue;
      }
      const result = await this.addFile(group, baseDir, fileIdx, fileCount);
      fileIdx++;
      if (result === 'cancel') {
        return CANCELLED;
      }
    }
    return COMPLETED;
  }

  private async addFile(group: ItemGroup, baseDir: FileEntry, idx: number, count: number): Promise<GroupResult> {
    const fs = this.fs;
    const chars = fs.characteristics;
    const attrs = group.attrs;
    const canRsrc = chars.hasResourceForks;

    if (!group.data && group.rsrc && !canRsrc) {
      await this.resourceForkIgnored(group);
      return 'done';
    }

    const components = pathComponents(attrs);
    const leaf = components[components.length - 1] ?? attrs.fileNameOnly;
    const dirEntry = this.stripPaths
      ? baseDir
      : await this.createDirectories(baseDir, components.slice(0, -1), attrs.fullPathName);
    const adjName = fs.adjustFileName(leaf);

    const existing = fs.findEntry(dirEntry, adjName);
    if (existing) {
      if (existing.isDirectory) {
        throw new StructureError(`Cannot replace directory '${existing.fullPathName}' with a file`);
      }
      if (this.isOwnSource(existing, group)) {
        throw new StructureError(`Cannot overwrite '${existing.fullPathName}' with itself`);
      }
      const answer = await this.callback(createFacts(CallbackReason.FileNameExists, {
        origPathName: attrs.fullPathName,
        origDirSep: attrs.fullPathSep,
        origModWhen: attrs.modWhen,
        newPathName: existing.fullPathName,
        newDirSep: existing.directorySeparator,
        newModWhen: existing.modWhen
      }));
      if (answer === CallbackResult.Skip) {
        return 'done';
      }
      if (answer !== CallbackResult.Overwrite) {
        return 'cancel';
      }
      if (existing.isDubious || existing.isDamaged) {
        throw new StructureError(`Cannot overwrite damaged file: ${existing.fullPathName}`);
      }
      await fs.deleteFile(existing);
    }

    const mode = group.rsrc && canRsrc ? 'extended' : 'file';
    const newEntry = await fs.createFile(dirEntry, adjName, mode, attrs.fileType);

    try {
      if (group.data) {
        const dosConv = selectDOSConv(attrs, this.options.convertDOSText, this.sourceIsDOS(group.data), chars.isDOS);
        await this.copyFork(group.data, newEntry, 'data', Math.floor((100 * idx) / count), dosConv);
      }
      if (group.rsrc) {
        if (canRsrc) {
          await this.copyFork(group.rsrc, newEntry, 'rsrc', Math.floor((100 * (idx + 0.5)) / count), 'none');
        } else {
          await this.resourceForkIgnored(group);
        }
      }
      try {
        await fs.setAttributes(newEntry, destinationAttrs(attrs, chars.hfsTypesOnly), adjName);
      } catch (error) {
        throw new TransferError(`Failed to set attributes of '${newEntry.fullPathName}': ${errorMessage(error)}`, { cause: error });
      }
    } catch (error) {
      await this.discardEntry(newEntry);
      throw error;
    }
    return 'done';
  }

  /**
   * Walks `names` below `baseDir`, creating directories that do not exist.
   * An existing file anywhere along the path is fatal.
   */
  private async createDirectories(baseDir: FileEntry, names: readonly string[], pathName: string): Promise<FileEntry> {
    let dir = baseDir;
    for (const name of names) {
      const adjName = this.fs.adjustFileName(name);
      const next = this.fs.findEntry(dir, adjName);
      if (next) {
        if (!next.isDirectory) {
          throw new StructureError(`Path component '${adjName}' (${name}) of '${pathName}' is not a directory`);
        }
        dir = next;
        continue;
      }
      try {
        dir = await this.fs.createFile(dir, adjName, 'directory', 0);
      } catch (error) {
        throw new TransferError(`Unable to create directory '${adjName}': ${errorMessage(error)}`, { cause: error });
      }
    }
    return dir;
  }

  /** Streams one fork through the shared buffer. */
  private async copyFork(item: TransferItem, newEntry: FileEntry, part: FilePart, percent: number, dosConv: DOSConvMode): Promise<void> {
    await this.callback(createFacts(CallbackReason.Progress, {
      origPathName: item.attrs.fullPathName,
      origDirSep: item.attrs.fullPathSep,
      newPathName: newEntry.fullPathName,
      newDirSep: newEntry.directorySeparator,
      progressPercent: percent,
      part,
      dosConv
    }));

    const buf = this.buffer;
    try {
      const writer = await this.fs.openForkForWrite(newEntry, part);
      try {
        await usePartSource(openItemSource(item), async source => {
          for (;;) {
            const actual = await source.read(buf, 0, buf.length);
            if (actual === 0) {
              break;
            }
            applyDOSConv(buf, actual, dosConv);
            await writer.write(buf, 0, actual);
          }
        });
      } finally {
        await writer.close();
      }
    } catch (error) {
      throw new TransferError(`Failed to write ${part} fork of '${newEntry.fullPathName}': ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Deletes a file created for a transfer that then failed. A failed delete
   * is logged so the transfer error is the one that propagates.
   */
  private async discardEntry(entry: FileEntry): Promise<void> {
    logger.debug(`Transfer to '${entry.fullPathName}' failed, removing partial file`);
    try {
      await this.fs.deleteFile(entry);
    } catch (error) {
      logger.debug(`Unable to remove partial file '${entry.fullPathName}'`, error);
    }
  }

  private isOwnSource(existing: FileEntry, group: ItemGroup): boolean {
    return [group.data, group.rsrc].some(item =>
      item?.origin.kind === 'filesystem' && item.origin.fs === this.fs && item.origin.entry === existing
    );
  }

  private sourceIsDOS(item: TransferItem): boolean {
    return item.origin.kind === 'filesystem' && item.origin.fs.characteristics.isDOS;
  }

  private async resourceForkIgnored(group: ItemGroup): Promise<void> {
    await this.callback(createFacts(CallbackReason.ResourceForkIgnored, {
      origPathName: group.attrs.fullPathName,
      origDirSep: group.attrs.fullPathSep,
      part: 'rsrc'
    }));
  }
}

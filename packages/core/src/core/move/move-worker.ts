import { errorMessage, StructureError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  CallbackReason,
  CallbackResult,
  CANCELLED,
  COMPLETED,
  createFacts,
  FAILED,
  proceedCallback,
  type EditOutcome,
  type TransferCallback
} from '../callbacks/callback-facts.js';
import type { Archive } from '../capabilities/archive.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import type { FileSystem } from '../capabilities/file-system.js';
import { generateMacZipName, isMacZipHeader } from '../naming/mac-zip.js';
import { foldCase } from '../naming/path-name.js';

export interface MoveOptions {
  /** Rename a file's `__MACOSX/` header along with it */
  macZip: boolean;
}

export interface ArchiveRename {
  entry: FileEntry;
  newPathName: string;
}

/** Shown as the destination when an entry is already in the target directory. */
export const NO_CHANGE = '(no change)';

/**
 * Moves entries between directories of a hierarchical filesystem, and
 * renames entries in an archive.
 */
export class MoveWorker {
  private readonly options: MoveOptions;

  constructor(
    private readonly callback: TransferCallback = proceedCallback,
    options: Partial<MoveOptions> = {}
  ) {
    this.options = { macZip: false, ...options };
  }

  /**
   * Moves each entry into `destDir`, keeping its name. Stops at the first
   * entry the filesystem refuses, including a directory moved into itself.
   */
  async moveInFileSystem(fs: FileSystem, entries: readonly FileEntry[], destDir: FileEntry): Promise<EditOutcome> {
    if (!fs.characteristics.isHierarchical) {
      throw new StructureError(`Files cannot be moved on a ${fs.characteristics.name} volume; it has no directories`);
    }
    const sep = fs.characteristics.dirSep;
    let doneCount = 0;
    for (const entry of entries) {
      if (await this.cancelRequested(entry)) {
        return CANCELLED;
      }
      const origPathName = entry.fullPathName;
      const stays = entry.containingDir === destDir;
      await this.callback(createFacts(CallbackReason.Progress, {
        origPathName,
        origDirSep: entry.directorySeparator,
        newPathName: stays ? NO_CHANGE : joinPath(destDir, entry.fileName, sep),
        newDirSep: sep,
        progressPercent: Math.floor((100 * doneCount) / entries.length)
      }));
      if (!stays) {
        try {
          await fs.moveFile(entry, destDir, entry.fileName);
        } catch (error) {
          await this.reportFailure(`Unable to move '${origPathName}': ${errorMessage(error)}`);
          return FAILED;
        }
      }
      doneCount++;
    }
    return COMPLETED;
  }

  /**
   * Renames archive entries in one transaction. A MacZip header follows its
   * file; headers listed on their own are left alone. Names are checked
   * case-insensitively against every other entry.
   */
  async renameInArchive(archive: Archive, renames: readonly ArchiveRename[]): Promise<EditOutcome> {
    const useMacZip = this.options.macZip && archive.characteristics.supportsMacZip;
    const names = new Map<string, FileEntry>();
    for (const entry of archive.entries()) {
      names.set(foldCase(entry.fullPathName), entry);
    }

    archive.startTransaction();
    try {
      let doneCount = 0;
      for (const { entry, newPathName } of renames) {
        if (await this.cancelRequested(entry)) {
          await archive.cancelTransaction();
          return CANCELLED;
        }
        await this.callback(createFacts(CallbackReason.Progress, {
          origPathName: entry.fullPathName,
          origDirSep: entry.directorySeparator,
          newPathName,
          newDirSep: archive.characteristics.defaultDirSep,
          progressPercent: Math.floor((100 * doneCount) / renames.length)
        }));
        doneCount++;
        if (useMacZip && isMacZipHeader(entry.fullPathName)) {
          continue;
        }
        this.renameRecord(archive, names, entry, newPathName);
        const header = useMacZip ? archive.findEntry(generateMacZipName(entry.fullPathName)) : null;
        if (header) {
          this.renameRecord(archive, names, header, generateMacZipName(newPathName));
        }
      }
      await archive.commitTransaction();
    } catch (error) {
      await archive.cancelTransaction();
      await this.reportFailure(`Unable to rename in archive: ${errorMessage(error)}`);
      return FAILED;
    }
    return COMPLETED;
  }

  private renameRecord(archive: Archive, names: Map<string, FileEntry>, entry: FileEntry, newPathName: string): void {
    if (!archive.checkStorageName(newPathName)) {
      throw new ValidationError(`Invalid name for ${archive.characteristics.name} archive: ${newPathName}`);
    }
    const key = foldCase(newPathName);
    const holder = names.get(key);
    if (holder && holder !== entry) {
      throw new StructureError(`'${newPathName}' already exists`);
    }
    names.delete(foldCase(entry.fullPathName));
    names.set(key, entry);
    archive.renameRecord(entry, newPathName);
  }

  private async cancelRequested(entry: FileEntry): Promise<boolean> {
    const answer = await this.callback(createFacts(CallbackReason.QueryCancel, {
      origPathName: entry.fullPathName,
      origDirSep: entry.directorySeparator
    }));
    return answer === CallbackResult.Cancel;
  }

  private async reportFailure(message: string): Promise<void> {
    logger.warn(message);
    await this.callback(createFacts(CallbackReason.Failure, { failMessage: message }));
  }
}

/** The volume directory's own name is left out of moved paths. */
function joinPath(destDir: FileEntry, fileName: string, sep: string): string {
  return destDir.containingDir ? destDir.fullPathName + sep + fileName : fileName;
}

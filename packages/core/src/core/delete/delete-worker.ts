import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  CallbackReason,
  createFacts,
  proceedCallback,
  type TransferCallback
} from '../callbacks/callback-facts.js';
import type { Archive } from '../capabilities/archive.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import type { FileSystem } from '../capabilities/file-system.js';
import { generateMacZipName, isMacZipHeader } from '../naming/mac-zip.js';

export interface DeleteOptions {
  /** Remove a file's `__MACOSX/` header along with it */
  macZip: boolean;
}

/**
 * Deletes selected entries from an archive or filesystem.
 */
export class DeleteWorker {
  private readonly options: DeleteOptions;

  constructor(
    private readonly callback: TransferCallback = proceedCallback,
    options: Partial<DeleteOptions> = {}
  ) {
    this.options = { macZip: false, ...options };
  }

  /**
   * Deletes entries in one transaction. MacZip headers listed on their own
   * are skipped; they go when their file does.
   */
  async deleteFromArchive(archive: Archive, entries: readonly FileEntry[]): Promise<boolean> {
    const useMacZip = this.options.macZip && archive.characteristics.supportsMacZip;
    const deleted = new Set<FileEntry>();
    archive.startTransaction();
    try {
      let doneCount = 0;
      for (const entry of entries) {
        await this.showProgress(entry, Math.floor((100 * doneCount) / entries.length));
        if (useMacZip && isMacZipHeader(entry.fullPathName)) {
          continue;
        }
        const adfEntry = useMacZip ? archive.findEntry(generateMacZipName(entry.fullPathName)) : null;
        if (!deleted.has(entry)) {
          archive.deleteRecord(entry);
          deleted.add(entry);
        }
        if (adfEntry && !deleted.has(adfEntry)) {
          archive.deleteRecord(adfEntry);
          deleted.add(adfEntry);
        }
        doneCount++;
      }
      await archive.commitTransaction();
    } catch (error) {
      await archive.cancelTransaction();
      await this.reportFailure(`Unable to delete from archive: ${errorMessage(error)}`);
      return false;
    }
    return true;
  }

  /**
   * Deletes entries last to first. A selection lists parents before their
   * children, so children are gone by the time their directory is removed.
   */
  async deleteFromDisk(fs: FileSystem, entries: readonly FileEntry[]): Promise<boolean> {
    let doneCount = 0;
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      try {
        await this.showProgress(entry, Math.floor((100 * doneCount) / entries.length));
        await fs.deleteFile(entry);
        doneCount++;
      } catch (error) {
        await this.reportFailure(`Unable to delete '${entry.fullPathName}': ${errorMessage(error)}`);
        return false;
      }
    }
    return true;
  }

  private async showProgress(entry: FileEntry, percent: number): Promise<void> {
    await this.callback(createFacts(CallbackReason.Progress, {
      origPathName: entry.fullPathName,
      origDirSep: entry.directorySeparator,
      progressPercent: percent
    }));
  }

  private async reportFailure(message: string): Promise<void> {
    logger.warn(message);
    await this.callback(createFacts(CallbackReason.Failure, { failMessage: message }));
  }
}

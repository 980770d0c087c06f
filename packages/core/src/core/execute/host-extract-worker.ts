import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { NAMING, TRANSFER_LIMITS, ACCESS_FLAGS } from '../../constants/index.js';
import { errorMessage, TransferError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isValidDate } from '../attributes/file-attribs.js';
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
import { HOST_SEP } from '../naming/path-name.js';
import { usePartSource } from '../part-source/part-source.js';
import { isRawForkItem, type TransferItem } from '../plan/transfer-item.js';
import { applyDOSConv, selectDOSConv } from './dos-text.js';
import { groupItems } from './item-groups.js';
import { openItemSource } from './item-source.js';

export interface HostExtractOptions {
  /** Clear write permission on files whose source is locked */
  setAccess: boolean;
  convertDOSText: boolean;
}

const DEFAULT_OPTIONS: HostExtractOptions = {
  setAccess: true,
  convertDOSText: false
};

type WriteResult = 'written' | 'skipped' | 'cancel';

/**
 * Writes planned items to a host directory, creating parent directories as
 * needed.
 */
export class HostExtractWorker {
  private readonly options: HostExtractOptions;
  private readonly buffer = new Uint8Array(TRANSFER_LIMITS.COPY_BUFFER_SIZE);

  constructor(
    private readonly outputDir: string,
    private readonly callback: TransferCallback = proceedCallback,
    options: Partial<HostExtractOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async extract(items: readonly TransferItem[]): Promise<BatchOutcome> {
    const groups = groupItems(items, true);
    const fileCount = groups.filter(group => !group.isDirectory).length;

    let done = 0;
    for (const group of groups) {
      const answer = await this.callback(createFacts(CallbackReason.QueryCancel, {
        origPathName: group.attrs.fullPathName,
        origDirSep: group.attrs.fullPathSep
      }));
      if (answer === CallbackResult.Cancel) {
        return CANCELLED;
      }

      if (group.isDirectory) {
        const item = group.data;
        if (item && !(await this.createDirectory(item))) {
          return CANCELLED;
        }
        continue;
      }

      const written: TransferItem[] = [];
      try {
        for (const item of [group.data, group.rsrc]) {
          if (!item) {
            continue;
          }
          const percent = item.part === 'data'
            ? Math.floor((100 * done) / fileCount)
            : Math.floor((100 * (done + 0.5)) / fileCount);
          const result = await this.writeItem(item, percent);
          if (result === 'cancel') {
            return CANCELLED;
          }
          if (result === 'written') {
            written.push(item);
          }
        }
      } catch (error) {
        await this.removeWritten(written);
        throw error;
      }
      for (const item of written) {
        await this.setHostAttributes(item);
      }
      done++;
    }
    return COMPLETED;
  }

  private hostPath(item: TransferItem): string {
    return path.join(this.outputDir, ...item.extractPath.split(HOST_SEP));
  }

  /** The file a written item lives in; a named fork lives in its data file. */
  private hostFilePath(item: TransferItem): string {
    const suffix = HOST_SEP + NAMING.NAMED_FORK_RSRC;
    return item.extractPath.endsWith(suffix)
      ? path.join(this.outputDir, ...item.extractPath.slice(0, -suffix.length).split(HOST_SEP))
      : this.hostPath(item);
  }

  /**
   * Deletes what one file's earlier items wrote after a later item failed.
   * Cleanup failures are logged; the caller rethrows the original error.
   */
  private async removeWritten(written: readonly TransferItem[]): Promise<void> {
    for (const hostFile of new Set(written.map(item => this.hostFilePath(item)))) {
      try {
        await fs.rm(hostFile, { force: true });
      } catch (error) {
        logger.debug(`Unable to remove partial file '${hostFile}'`, error);
      }
    }
  }

  /** Returns false when the caller asked to cancel. */
  private async createDirectory(item: TransferItem): Promise<boolean> {
    const dirPath = this.hostPath(item);
    const stats = await statOrNull(dirPath);
    if (stats && !stats.isDirectory()) {
      await this.callback(createFacts(CallbackReason.OverwriteFailure, {
        origPathName: item.attrs.fullPathName,
        origDirSep: item.attrs.fullPathSep,
        newPathName: dirPath,
        newDirSep: path.sep,
        failMessage: 'existing file with same name as directory'
      }));
      return false;
    }
    await fs.mkdir(dirPath, { recursive: true });
    return true;
  }

  private async writeItem(item: TransferItem, percent: number): Promise<WriteResult> {
    const outPath = this.hostPath(item);
    const isNamedFork = item.extractPath.endsWith(HOST_SEP + NAMING.NAMED_FORK_RSRC);
    const facts = {
      origPathName: item.attrs.fullPathName,
      origDirSep: item.attrs.fullPathSep,
      origModWhen: item.attrs.modWhen,
      newPathName: outPath,
      newDirSep: path.sep,
      part: item.part
    };

    if (!isNamedFork) {
      await fs.mkdir(path.dirname(outPath), { recursive: true });
      const stats = await statOrNull(outPath);
      if (stats?.isDirectory()) {
        const answer = await this.callback(createFacts(CallbackReason.OverwriteFailure, {
          ...facts,
          failMessage: 'existing directory with same name as file'
        }));
        return answer === CallbackResult.Skip ? 'skipped' : 'cancel';
      }
      if (stats) {
        const answer = await this.callback(createFacts(CallbackReason.FileNameExists, {
          ...facts,
          newModWhen: stats.mtime
        }));
        if (answer === CallbackResult.Skip) {
          return 'skipped';
        }
        if (answer !== CallbackResult.Overwrite) {
          return 'cancel';
        }
        await fs.chmod(outPath, stats.mode | 0o200);
      }
    }

    const dosConv: DOSConvMode = item.part === 'data' && isRawForkItem(item)
      ? selectDOSConv(item.attrs, this.options.convertDOSText, this.sourceIsDOS(item), false)
      : 'none';
    await this.callback(createFacts(CallbackReason.Progress, { ...facts, progressPercent: percent, dosConv }));

    const buf = this.buffer;
    try {
      const handle = await fs.open(outPath, 'w');
      try {
        await usePartSource(openItemSource(item), async source => {
          for (;;) {
            const actual = await source.read(buf, 0, buf.length);
            if (actual === 0) {
              break;
            }
            applyDOSConv(buf, actual, dosConv);
            await handle.write(buf, 0, actual);
          }
        });
      } finally {
        await handle.close();
      }
    } catch (error) {
      logger.debug(`Extraction of '${outPath}' failed, removing partial file`, error);
      if (!isNamedFork) {
        await fs.rm(outPath, { force: true }).catch((rmError: unknown) => {
          logger.debug(`Unable to remove partial file '${outPath}'`, rmError);
        });
      }
      throw new TransferError(`Failed to write '${outPath}': ${errorMessage(error)}`, { cause: error });
    }
    return 'written';
  }

  /**
   * Sets dates, then write permission. Failures are reported and ignored.
   */
  private async setHostAttributes(item: TransferItem): Promise<void> {
    if (item.extractPath.endsWith(HOST_SEP + NAMING.NAMED_FORK_RSRC)) {
      return;
    }
    const outPath = this.hostPath(item);
    const attrs = item.attrs;
    try {
      if (isValidDate(attrs.modWhen)) {
        await fs.utimes(outPath, attrs.modWhen, attrs.modWhen);
      }
      if (this.options.setAccess && item.preserve !== 'as' && (attrs.access & ACCESS_FLAGS.WRITE) === 0) {
        const stats = await fs.stat(outPath);
        await fs.chmod(outPath, stats.mode & ~0o222);
      }
    } catch (error) {
      await this.callback(createFacts(CallbackReason.AttrFailure, {
        origPathName: attrs.fullPathName,
        origDirSep: attrs.fullPathSep,
        newPathName: outPath,
        newDirSep: path.sep,
        failMessage: errorMessage(error)
      }));
    }
  }

  private sourceIsDOS(item: TransferItem): boolean {
    return item.origin.kind === 'filesystem' && item.origin.fs.characteristics.isDOS;
  }
}

async function statOrNull(hostPath: string): Promise<Stats | null> {
  try {
    return await fs.stat(hostPath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}


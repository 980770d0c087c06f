import type { FilePart } from '../../types/index.js';
import { ArchiveStateError, TransferCancelledError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { buildContainer } from '../apple-single/apple-single.js';
import { FileAttribs, hasTypeInfo } from '../attributes/file-attribs.js';
import {
  CallbackReason,
  CallbackResult,
  CANCELLED,
  COMPLETED,
  createFacts,
  proceedCallback,
  type BatchOutcome,
  type CallbackFacts,
  type TransferCallback
} from '../callbacks/callback-facts.js';
import type { Archive } from '../capabilities/archive.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import { generateMacZipName } from '../naming/mac-zip.js';
import { foldCase } from '../naming/path-name.js';
import { GeneratedPartSource } from '../part-source/buffered-source.js';
import { readPartSource } from '../part-source/part-source.js';
import { ProgressPartSource } from '../part-source/progress-source.js';
import type { TransferItem } from '../plan/transfer-item.js';
import { destinationAttrs, groupItems, type ItemGroup, pathComponents } from './item-groups.js';
import { openItemSource } from './item-source.js';

export interface ArchiveExecOptions {
  stripPaths: boolean;
  /** Store resource forks and types in `__MACOSX/` headers when the archive is ZIP */
  macZip: boolean;
  compress: boolean;
}

const DEFAULT_OPTIONS: ArchiveExecOptions = {
  stripPaths: false,
  macZip: true,
  compress: true
};

/** Internal: the caller answered Cancel to a conflict. */
class ConflictCancel extends Error {}

/**
 * Adds planned items to an archive in one transaction.
 *
 * Parts are queued while items are processed and read when the transaction
 * commits. A Cancel answer at any point discards the whole transaction.
 */
export class ArchiveExecutor {
  private readonly options: ArchiveExecOptions;

  constructor(
    private readonly archive: Archive,
    private readonly callback: TransferCallback = proceedCallback,
    options: Partial<ArchiveExecOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async execute(items: readonly TransferItem[]): Promise<BatchOutcome> {
    const archive = this.archive;
    if (archive.isReadOnly || archive.isDubious) {
      throw new ArchiveStateError(
        `Target archive is read-only${archive.isDubious ? ' (damage)' : ''}`
      );
    }
    const groups = groupItems(items).filter(group => !group.isDirectory);

    // Names are compared without regard to case.
    const dupCheck = new Map<string, FileEntry>();
    for (const entry of archive.entries()) {
      dupCheck.set(foldCase(entry.fullPathName), entry);
    }

    archive.startTransaction();
    try {
      for (let idx = 0; idx < groups.length; idx++) {
        await this.addGroup(groups[idx], idx, groups.length, dupCheck);
      }
      await archive.commitTransaction();
      return COMPLETED;
    } catch (error) {
      await archive.cancelTransaction();
      if (error instanceof ConflictCancel || error instanceof TransferCancelledError) {
        logger.debug('Archive transfer cancelled; transaction discarded');
        return CANCELLED;
      }
      throw error;
    }
  }

  private get useMacZip(): boolean {
    return this.options.macZip && this.archive.characteristics.supportsMacZip;
  }

  private async addGroup(group: ItemGroup, idx: number, count: number, dupCheck: Map<string, FileEntry>): Promise<void> {
    const archive = this.archive;
    const chars = archive.characteristics;
    const canRsrc = chars.hasResourceForks || this.useMacZip;
    const attrs = group.attrs;

    if (!group.data && group.rsrc && !canRsrc) {
      await this.resourceForkIgnored(group);
      return;
    }

    const adjPath = this.adjustArchivePath(group);
    if (adjPath === null) {
      const answer = await this.callback(createFacts(CallbackReason.PathTooLong, {
        origPathName: attrs.fullPathName,
        origDirSep: attrs.fullPathSep
      }));
      if (answer === CallbackResult.Skip) {
        return;
      }
      throw new ConflictCancel();
    }

    const dupEntry = dupCheck.get(foldCase(adjPath));
    if (dupEntry) {
      const answer = await this.callback(createFacts(CallbackReason.FileNameExists, {
        origPathName: attrs.fullPathName,
        origDirSep: attrs.fullPathSep,
        origModWhen: attrs.modWhen,
        newPathName: dupEntry.fullPathName,
        newDirSep: dupEntry.directorySeparator,
        newModWhen: dupEntry.modWhen
      }));
      if (answer === CallbackResult.Skip) {
        return;
      }
      if (answer !== CallbackResult.Overwrite) {
        throw new ConflictCancel();
      }
      this.deleteExisting(dupEntry, dupCheck);
    }

    const newEntry = archive.createRecord(adjPath, chars.defaultDirSep);
    archive.setAttributes(newEntry, destinationAttrs(attrs, false));
    dupCheck.set(foldCase(adjPath), newEntry);

    const compress = this.options.compress;
    const baseFacts = {
      origPathName: attrs.fullPathName,
      origDirSep: attrs.fullPathSep,
      newPathName: adjPath,
      newDirSep: chars.defaultDirSep
    };
    if (group.data) {
      const facts = this.progressFacts(baseFacts, Math.floor((100 * idx) / count), 'data');
      archive.addPart(newEntry, 'data', new ProgressPartSource(openItemSource(group.data), this.callback, facts), compress);
    }

    // Resource forks count as a half step.
    const rsrcPerc = Math.floor((100 * (idx + 0.5)) / count);
    if (this.useMacZip) {
      if (!group.data) {
        archive.addPart(newEntry, 'data', new GeneratedPartSource(`${adjPath} (empty)`, async () => new Uint8Array(0)), compress);
      }
      if (group.rsrc || hasTypeInfo(attrs)) {
        this.addMacZipRecord(group, adjPath, this.progressFacts(baseFacts, rsrcPerc, 'rsrc'), dupCheck);
      }
    } else if (group.rsrc) {
      if (!canRsrc) {
        await this.resourceForkIgnored(group);
      } else {
        const facts = this.progressFacts(baseFacts, rsrcPerc, 'rsrc');
        archive.addPart(newEntry, 'rsrc', new ProgressPartSource(openItemSource(group.rsrc), this.callback, facts), compress);
      }
    }
  }

  /**
   * Adjusts each path component for the archive and checks the result.
   * Returns null when the archive cannot store a name that long.
   */
  private adjustArchivePath(group: ItemGroup): string | null {
    const archive = this.archive;
    const sep = archive.characteristics.defaultDirSep;
    const components = pathComponents(group.attrs);
    const names = this.options.stripPaths || sep === '' ? components.slice(-1) : components;
    const result = names.map(name => archive.adjustFileName(name)).join(sep);
    return archive.checkStorageName(result) ? result : null;
  }

  private deleteExisting(entry: FileEntry, dupCheck: Map<string, FileEntry>): void {
    this.archive.deleteRecord(entry);
    dupCheck.delete(foldCase(entry.fullPathName));
    if (this.useMacZip) {
      const headerName = foldCase(generateMacZipName(entry.fullPathName));
      const header = dupCheck.get(headerName);
      if (header) {
        this.archive.deleteRecord(header);
        dupCheck.delete(headerName);
      }
    }
  }

  /**
   * Adds the `__MACOSX/` AppleDouble header holding the file's types and
   * resource fork. The header is built when the transaction commits.
   */
  private addMacZipRecord(
    group: ItemGroup,
    adjPath: string,
    facts: Omit<CallbackFacts, 'reason'>,
    dupCheck: Map<string, FileEntry>
  ): void {
    const archive = this.archive;
    const headerName = generateMacZipName(adjPath);
    const stale = dupCheck.get(foldCase(headerName));
    if (stale) {
      archive.deleteRecord(stale);
    }
    const headerEntry = archive.createRecord(headerName, archive.characteristics.defaultDirSep);
    const headerAttrs = new FileAttribs();
    headerAttrs.modWhen = group.attrs.modWhen;
    archive.setAttributes(headerEntry, headerAttrs.toEntryAttributes());
    dupCheck.set(foldCase(headerName), headerEntry);

    const rsrcItem = group.rsrc;
    const attrs = destinationAttrs(group.attrs, false);
    const source = new GeneratedPartSource(`${headerName} [apple-double]`, async () => {
      const rsrc = rsrcItem ? await readPartSource(openItemSource(rsrcItem)) : null;
      return buildContainer({
        kind: 'apple-double',
        fileName: group.attrs.fileNameOnly,
        attrs,
        data: null,
        rsrc
      });
    });
    archive.addPart(headerEntry, 'data', new ProgressPartSource(source, this.callback, facts), this.options.compress);
  }

  private progressFacts(
    base: Pick<CallbackFacts, 'origPathName' | 'origDirSep' | 'newPathName' | 'newDirSep'>,
    percent: number,
    part: FilePart
  ): Omit<CallbackFacts, 'reason'> {
    const { reason: _reason, ...facts } = createFacts(CallbackReason.Progress, { ...base, progressPercent: percent, part });
    return facts;
  }

  private async resourceForkIgnored(group: ItemGroup): Promise<void> {
    await this.callback(createFacts(CallbackReason.ResourceForkIgnored, {
      origPathName: group.attrs.fullPathName,
      origDirSep: group.attrs.fullPathSep,
      part: 'rsrc'
    }));
  }
}

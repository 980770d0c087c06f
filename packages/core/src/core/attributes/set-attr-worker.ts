import { errorMessage, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { buildContainer, containerFork, readContainer } from '../apple-single/apple-single.js';
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
import { archiveEndpoint } from '../capabilities/endpoint.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import type { FileSystem } from '../capabilities/file-system.js';
import { generateMacZipName, isMacZipHeader } from '../naming/mac-zip.js';
import { GeneratedPartSource } from '../part-source/buffered-source.js';
import { readPartSource } from '../part-source/part-source.js';
import { EntryPartSource } from '../part-source/stream-source.js';
import { entryAttributes, isValidDate, type EntryAttributes } from './file-attribs.js';

/** Fields to change; anything left out keeps its current value. A `null` date clears it. */
export type AttrEdits = Partial<EntryAttributes>;

export interface SetAttrOptions {
  /** Edit the attributes held in a ZIP entry's `__MACOSX/` header instead of the entry */
  macZip: boolean;
  compress: boolean;
}

type NumericField = 'fileType' | 'auxType' | 'hfsFileType' | 'hfsCreator' | 'access';

const FIELD_LIMITS: ReadonlyArray<[NumericField, number]> = [
  ['fileType', 0xff],
  ['auxType', 0xffff],
  ['hfsFileType', 0xffffffff],
  ['hfsCreator', 0xffffffff],
  ['access', 0xff]
];

/**
 * Throws ValidationError for a type or access value outside its field, or
 * an unusable date.
 */
export function validateAttrEdits(edits: AttrEdits): void {
  for (const [field, max] of FIELD_LIMITS) {
    const value = edits[field];
    if (value === undefined) {
      continue;
    }
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new ValidationError(`${field} must be an integer from 0 to ${max}, got ${String(value)}`);
    }
  }
  for (const when of [edits.createWhen, edits.modWhen]) {
    if (when && !isValidDate(when)) {
      throw new ValidationError('Invalid date');
    }
  }
}

export function applyAttrEdits(current: Readonly<EntryAttributes>, edits: AttrEdits): EntryAttributes {
  return {
    fileType: edits.fileType ?? current.fileType,
    auxType: edits.auxType ?? current.auxType,
    hfsFileType: edits.hfsFileType ?? current.hfsFileType,
    hfsCreator: edits.hfsCreator ?? current.hfsCreator,
    access: edits.access ?? current.access,
    createWhen: edits.createWhen !== undefined ? edits.createWhen : current.createWhen,
    modWhen: edits.modWhen !== undefined ? edits.modWhen : current.modWhen
  };
}

/**
 * Changes types, dates and access on existing entries.
 */
export class SetAttrWorker {
  private readonly options: SetAttrOptions;

  constructor(
    private readonly callback: TransferCallback = proceedCallback,
    options: Partial<SetAttrOptions> = {}
  ) {
    this.options = { macZip: false, compress: true, ...options };
  }

  async setInFileSystem(fs: FileSystem, entries: readonly FileEntry[], edits: AttrEdits): Promise<EditOutcome> {
    validateAttrEdits(edits);
    let doneCount = 0;
    for (const entry of entries) {
      if (await this.cancelRequested(entry)) {
        return CANCELLED;
      }
      await this.showProgress(entry, Math.floor((100 * doneCount) / entries.length));
      try {
        await fs.setAttributes(entry, applyAttrEdits(entry, edits));
      } catch (error) {
        await this.reportFailure(`Unable to set attributes on '${entry.fullPathName}': ${errorMessage(error)}`);
        return FAILED;
      }
      doneCount++;
    }
    return COMPLETED;
  }

  /**
   * Edits archive entries in one transaction. With MacZip, a file that has a
   * header gets a rebuilt header instead; headers are read before the
   * transaction opens, since an archive cannot be read while it is modified.
   */
  async setInArchive(archive: Archive, entries: readonly FileEntry[], edits: AttrEdits): Promise<EditOutcome> {
    validateAttrEdits(edits);
    const useMacZip = this.options.macZip && archive.characteristics.supportsMacZip;

    const rebuilt = new Map<FileEntry, Uint8Array>();
    if (useMacZip) {
      for (const entry of entries) {
        if (isMacZipHeader(entry.fullPathName)) {
          continue;
        }
        const header = archive.findEntry(generateMacZipName(entry.fullPathName));
        if (!header) {
          continue;
        }
        try {
          rebuilt.set(header, await rebuildHeader(archive, header, edits));
        } catch (error) {
          await this.reportFailure(
            `Unable to set attributes on '${entry.fullPathName}' - '${header.fullPathName}': ${errorMessage(error)}`
          );
          return FAILED;
        }
      }
    }

    archive.startTransaction();
    try {
      let doneCount = 0;
      for (const entry of entries) {
        if (await this.cancelRequested(entry)) {
          await archive.cancelTransaction();
          return CANCELLED;
        }
        await this.showProgress(entry, Math.floor((100 * doneCount) / entries.length));
        doneCount++;
        if (useMacZip && isMacZipHeader(entry.fullPathName)) {
          continue;
        }
        const header = useMacZip ? archive.findEntry(generateMacZipName(entry.fullPathName)) : null;
        const bytes = header ? rebuilt.get(header) : undefined;
        if (header && bytes) {
          this.replaceHeader(archive, header, bytes);
        } else {
          archive.setAttributes(entry, applyAttrEdits(entry, edits));
        }
      }
      await archive.commitTransaction();
    } catch (error) {
      await archive.cancelTransaction();
      await this.reportFailure(`Unable to set attributes in archive: ${errorMessage(error)}`);
      return FAILED;
    }
    return COMPLETED;
  }

  private replaceHeader(archive: Archive, header: FileEntry, bytes: Uint8Array): void {
    archive.deleteRecord(header);
    const fresh = archive.createRecord(header.fullPathName, header.directorySeparator);
    archive.setAttributes(fresh, entryAttributes(header));
    const source = new GeneratedPartSource(`${header.fullPathName} [apple-double]`, async () => bytes);
    archive.addPart(fresh, 'data', source, this.options.compress);
  }

  private async showProgress(entry: FileEntry, percent: number): Promise<void> {
    await this.callback(createFacts(CallbackReason.Progress, {
      origPathName: entry.fullPathName,
      origDirSep: entry.directorySeparator,
      progressPercent: percent
    }));
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

async function rebuildHeader(archive: Archive, header: FileEntry, edits: AttrEdits): Promise<Uint8Array> {
  const bytes = await readPartSource(new EntryPartSource(archiveEndpoint(archive), header, 'data'));
  const parsed = readContainer(bytes, header.fullPathName);
  return buildContainer({
    kind: 'apple-double',
    fileName: parsed.fileName,
    attrs: applyAttrEdits(parsed.attrs, edits),
    data: null,
    rsrc: containerFork(bytes, parsed, 'rsrc')
  });
}

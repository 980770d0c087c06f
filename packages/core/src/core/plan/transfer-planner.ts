import { NAMING } from '../../constants/index.js';
import type { PreserveMode } from '../../types/index.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseContainer } from '../apple-single/apple-single.js';
import { type AttributeSnapshot, FileAttribs, hasTypeInfo } from '../attributes/file-attribs.js';
import {
  CallbackReason,
  createFacts,
  proceedCallback,
  type TransferCallback
} from '../callbacks/callback-facts.js';
import type { Archive } from '../capabilities/archive.js';
import { archiveEndpoint } from '../capabilities/endpoint.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import type { FileSystem } from '../capabilities/file-system.js';
import { type LogicalFileRecord, recordStoragePath } from '../classify/logical-file-record.js';
import type { ImportSpec } from '../import/importer.js';
import { generateMacZipName, isMacZipHeader } from '../naming/mac-zip.js';
import { generateNapsTag, napsConvenienceExtension } from '../naming/naps.js';
import {
  adjustEscapePathName,
  adjustPathName,
  getDirectoryName,
  getFileName,
  HOST_SEP
} from '../naming/path-name.js';
import { EntryPartSource } from '../part-source/stream-source.js';
import { readPartSource } from '../part-source/part-source.js';
import { DirectorySynthesizer, relativeEntryPath } from './directory-synthesizer.js';
import type { ItemOrigin, TransferItem } from './transfer-item.js';

export interface PlanOptions {
  preserve: PreserveMode;
  /** Keep only the leaf name; no directories are emitted */
  stripPaths: boolean;
  /** Pair ZIP entries with their `__MACOSX/` AppleDouble headers */
  macZip: boolean;
  /** Append `.txt` to NAPS names of text files */
  napsExtension: boolean;
}

export const DEFAULT_PLAN_OPTIONS: PlanOptions = {
  preserve: 'naps',
  stripPaths: false,
  macZip: true,
  napsExtension: false
};

/**
 * Turns archive entries, filesystem entries or classified host records into
 * an ordered list of per-fork transfer items.
 *
 * A planner holds the directory memo for one destination, so a second plan
 * made with the same instance will not repeat directories already emitted.
 */
export class TransferPlanner {
  private readonly options: PlanOptions;
  private readonly synth = new DirectorySynthesizer();

  constructor(options: Partial<PlanOptions> = {}, private readonly callback: TransferCallback = proceedCallback) {
    this.options = { ...DEFAULT_PLAN_OPTIONS, ...options };
  }

  /**
   * Plans archive entries for extraction. Directory entries are ignored;
   * directories are synthesized from file paths instead.
   */
  async planArchive(archive: Archive, entries: readonly FileEntry[] = archive.entries()): Promise<TransferItem[]> {
    const items: TransferItem[] = [];
    const useMacZip = this.options.macZip && archive.characteristics.supportsMacZip;
    const tracksExt = archive.characteristics.tracksExtendedness;

    for (const entry of entries) {
      if (entry.isDirectory) {
        continue;
      }
      if (useMacZip && isMacZipHeader(entry.fullPathName)) {
        continue;
      }
      const sep = entry.directorySeparator;
      const attrs = attrsFromEntry(entry, entry.fullPathName);
      let adfEntry = useMacZip ? archive.findEntry(generateMacZipName(entry.fullPathName)) : null;
      let hasRsrc = entry.hasRsrcFork && (tracksExt || entry.rsrcLength > 0);

      if (adfEntry) {
        try {
          const bytes = await readPartSource(new EntryPartSource(archiveEndpoint(archive), adfEntry, 'data'));
          const header = parseContainer(bytes);
          if (!header) {
            throw new Error('not an AppleDouble header');
          }
          attrs.copyAttrsFrom(header.attrs);
          attrs.rsrcLength = header.rsrcFork?.length ?? 0;
          hasRsrc = attrs.rsrcLength > 0;
        } catch (error) {
          const message = `Unable to get ADF attrs for '${entry.fullPathName}': ${errorMessage(error)}`;
          logger.warn(message);
          await this.callback(createFacts(CallbackReason.Failure, {
            origPathName: entry.fullPathName,
            origDirSep: sep,
            failMessage: message
          }));
          adfEntry = null;
        }
      }

      const extractPath = this.leafOrPath(
        this.options.preserve === 'naps'
          ? adjustEscapePathName(entry.fullPathName, sep)
          : adjustPathName(entry.fullPathName, sep)
      );
      if (!this.options.stripPaths) {
        for (const dirPath of this.synth.ancestorsOfPath(entry.fullPathName, sep)) {
          items.push(this.directoryItem(
            { kind: 'archive', archive, entry: null, adfEntry: null },
            syntheticDirAttrs(dirPath, sep),
            adjustPathName(dirPath, sep)
          ));
        }
      }
      await this.emitFile(
        items,
        { kind: 'archive', archive, entry, adfEntry },
        attrs.snapshot(),
        extractPath,
        entry.hasDataFork,
        hasRsrc
      );
    }
    return items;
  }

  /**
   * Plans a filesystem selection, descending into directories. Paths are
   * made relative to `boundary`; pass the volume directory for full paths.
   */
  async planFileSystem(fs: FileSystem, selection: readonly FileEntry[], boundary: FileEntry | null): Promise<TransferItem[]> {
    const items: TransferItem[] = [];
    const seen = new Set<FileEntry>();
    const sep = fs.characteristics.dirSep;
    const tracksExt = fs.characteristics.tracksExtendedness;

    const visit = async (entry: FileEntry): Promise<void> => {
      if (seen.has(entry)) {
        return;
      }
      seen.add(entry);

      if (entry.isDirectory && (entry === boundary || entry.containingDir === null)) {
        for (const child of fs.getChildren(entry)) {
          await visit(child);
        }
        return;
      }
      if (entry.isDamaged) {
        await this.callback(createFacts(CallbackReason.Failure, {
          origPathName: entry.fullPathName,
          origDirSep: entry.directorySeparator,
          failMessage: `Skipping damaged entry '${entry.fullPathName}'`
        }));
        return;
      }

      const relPath = relativeEntryPath(entry, boundary, sep);
      if (!this.options.stripPaths) {
        for (const dir of this.synth.ancestorsOfEntry(entry, boundary, sep)) {
          items.push(this.directoryItem(
            { kind: 'filesystem', fs, entry: dir.entry },
            attrsFromEntry(dir.entry, dir.path, sep).snapshot(),
            adjustPathName(dir.path, sep)
          ));
        }
      }

      if (entry.isDirectory) {
        if (!this.options.stripPaths && this.synth.claim(relPath)) {
          items.push(this.directoryItem(
            { kind: 'filesystem', fs, entry },
            attrsFromEntry(entry, relPath, sep).snapshot(),
            adjustPathName(relPath, sep)
          ));
        }
        for (const child of fs.getChildren(entry)) {
          await visit(child);
        }
        return;
      }

      const extractPath = this.leafOrPath(
        this.options.preserve === 'naps' ? adjustEscapePathName(relPath, sep) : adjustPathName(relPath, sep)
      );
      await this.emitFile(
        items,
        { kind: 'filesystem', fs, entry },
        attrsFromEntry(entry, relPath, sep).snapshot(),
        extractPath,
        entry.hasDataFork,
        entry.hasRsrcFork && (tracksExt || entry.rsrcLength > 0)
      );
    };

    for (const entry of selection) {
      await visit(entry);
    }
    return items;
  }

  /**
   * Plans classified host records for an archive or filesystem destination.
   * Forks are carried natively: one data item and one resource item at most.
   */
  planRecords(records: readonly LogicalFileRecord[], importSpec: ImportSpec | null = null): TransferItem[] {
    const items: TransferItem[] = [];
    for (const record of records) {
      const sep = record.storageDirSep;
      const storagePath = recordStoragePath(record);
      const fullPath = this.options.stripPaths ? record.storageName : storagePath;

      if (!this.options.stripPaths) {
        for (const dirPath of this.synth.ancestorsOfPath(storagePath, sep)) {
          items.push(this.directoryItem(
            { kind: 'host', source: null, importSpec: null },
            syntheticDirAttrs(dirPath, sep),
            adjustPathName(dirPath, sep),
            'host'
          ));
        }
      }

      const attrs = attrsFromRecord(record, fullPath, sep);
      if (record.isDirectory) {
        if (!this.options.stripPaths && this.synth.claim(storagePath)) {
          items.push(this.directoryItem(
            { kind: 'host', source: null, importSpec: null },
            attrs,
            adjustPathName(storagePath, sep),
            'host'
          ));
        }
        continue;
      }

      const extractPath = adjustPathName(fullPath, sep);
      if (record.dataFork) {
        items.push({
          origin: {
            kind: 'host',
            source: record.dataFork,
            importSpec: record.dataFork.kind === 'import' ? importSpec : null
          },
          part: 'data',
          attrs,
          extractPath,
          preserve: 'host'
        });
      }
      if (record.rsrcFork) {
        items.push({
          origin: { kind: 'host', source: record.rsrcFork, importSpec: null },
          part: 'rsrc',
          attrs,
          extractPath,
          preserve: 'host'
        });
      }
    }
    return items;
  }

  private leafOrPath(extractPath: string): string {
    return this.options.stripPaths ? getFileName(extractPath, HOST_SEP) : extractPath;
  }

  private directoryItem(
    origin: ItemOrigin,
    attrs: AttributeSnapshot,
    extractPath: string,
    preserve: PreserveMode = this.options.preserve
  ): TransferItem {
    return { origin, part: 'data', attrs, extractPath, preserve };
  }

  /**
   * Appends the items for one file in the active preservation mode. The data
   * item always comes first. A resource fork that `none` drops is reported
   * as ResourceForkIgnored, even when nothing else is left to emit.
   */
  private async emitFile(
    items: TransferItem[],
    origin: ItemOrigin,
    attrs: AttributeSnapshot,
    extractPath: string,
    hasData: boolean,
    hasRsrc: boolean
  ): Promise<void> {
    const preserve = this.options.preserve;
    const push = (part: 'data' | 'rsrc', pathName: string): void => {
      items.push({ origin, part, attrs, extractPath: pathName, preserve });
    };

    switch (preserve) {
      case 'none':
        if (hasData || !hasRsrc) {
          push('data', extractPath);
        }
        if (hasRsrc) {
          await this.callback(createFacts(CallbackReason.ResourceForkIgnored, {
            origPathName: attrs.fullPathName,
            origDirSep: attrs.fullPathSep,
            newPathName: extractPath,
            newDirSep: HOST_SEP,
            part: 'rsrc'
          }));
        }
        break;
      case 'adf': {
        push('data', extractPath);
        if (hasRsrc || hasTypeInfo(attrs)) {
          const dir = getDirectoryName(extractPath, HOST_SEP);
          const leaf = NAMING.ADF_PREFIX + getFileName(extractPath, HOST_SEP);
          push('rsrc', dir.length > 0 ? dir + HOST_SEP + leaf : leaf);
        }
        break;
      }
      case 'as':
        push('data', extractPath + NAMING.AS_EXT);
        break;
      case 'host':
        push('data', extractPath);
        if (hasRsrc) {
          push('rsrc', extractPath + HOST_SEP + NAMING.NAMED_FORK_RSRC);
        }
        break;
      case 'naps': {
        const ext = this.options.napsExtension ? napsConvenienceExtension(attrs) : '';
        if (hasData || !hasRsrc) {
          push('data', extractPath + generateNapsTag(attrs, 'data') + ext);
        }
        if (hasRsrc) {
          push('rsrc', extractPath + generateNapsTag(attrs, 'rsrc') + ext);
        }
        break;
      }
    }
  }
}

function attrsFromEntry(entry: FileEntry, fullPathName: string, dirSep: string = entry.directorySeparator): FileAttribs {
  const attrs = new FileAttribs();
  attrs.copyAttrsFrom(entry);
  attrs.fullPathName = fullPathName;
  attrs.fullPathSep = dirSep;
  attrs.fileNameOnly = dirSep.length > 0 ? getFileName(fullPathName, dirSep) : fullPathName;
  attrs.isDirectory = entry.isDirectory;
  attrs.dataLength = entry.dataLength;
  attrs.rsrcLength = entry.rsrcLength;
  return attrs;
}

function attrsFromRecord(record: LogicalFileRecord, fullPathName: string, dirSep: string): AttributeSnapshot {
  const attrs = new FileAttribs();
  attrs.fullPathName = fullPathName;
  attrs.fullPathSep = dirSep;
  attrs.fileNameOnly = record.storageName;
  attrs.isDirectory = record.isDirectory;
  attrs.fileType = record.fileType;
  attrs.auxType = record.auxType;
  attrs.hfsFileType = record.hfsFileType;
  attrs.hfsCreator = record.hfsCreator;
  attrs.access = record.access;
  attrs.createWhen = record.createWhen;
  attrs.modWhen = record.modWhen;
  return attrs.snapshot();
}

function syntheticDirAttrs(dirPath: string, dirSep: string): AttributeSnapshot {
  const attrs = new FileAttribs();
  attrs.fullPathName = dirPath;
  attrs.fullPathSep = dirSep;
  attrs.fileNameOnly = getFileName(dirPath, dirSep);
  attrs.isDirectory = true;
  return attrs.snapshot();
}

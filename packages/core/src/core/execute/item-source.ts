import type { FilePart } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { buildContainer } from '../apple-single/apple-single.js';
import { archiveEndpoint, type Endpoint, fileSystemEndpoint } from '../capabilities/endpoint.js';
import type { FileEntry } from '../capabilities/file-entry.js';
import type { ForkSource } from '../classify/logical-file-record.js';
import type { ImportSpec } from '../import/importer.js';
import { ContainerPartSource, GeneratedPartSource, ImportPartSource } from '../part-source/buffered-source.js';
import { HostFilePartSource } from '../part-source/host-file-source.js';
import { type PartSource, readPartSource } from '../part-source/part-source.js';
import { EntryPartSource } from '../part-source/stream-source.js';
import { isRawForkItem, type TransferItem } from '../plan/transfer-item.js';

const EMPTY = new Uint8Array(0);

/**
 * Returns an unopened part source for a planned item. Generated items (AS
 * images and ADF headers) are assembled from the entry's forks when opened.
 */
export function openItemSource(item: TransferItem): PartSource {
  if (!isRawForkItem(item)) {
    return generatedSource(item);
  }
  return rawForkSource(item, item.part);
}

/** A source for one fork exactly as stored, whatever the item's mode. */
export function rawForkSource(item: TransferItem, part: FilePart): PartSource {
  const origin = item.origin;
  switch (origin.kind) {
    case 'archive': {
      const entry = requireEntry(origin.entry, item);
      if (part === 'rsrc' && origin.adfEntry) {
        return new ContainerPartSource(
          new EntryPartSource(archiveEndpoint(origin.archive), origin.adfEntry, 'data'),
          'rsrc'
        );
      }
      return entryForkSource(archiveEndpoint(origin.archive), entry, part);
    }
    case 'filesystem':
      return entryForkSource(fileSystemEndpoint(origin.fs), requireEntry(origin.entry, item), part);
    case 'host':
      if (!origin.source) {
        return new GeneratedPartSource(`${item.attrs.fullPathName} (${part})`, async () => EMPTY);
      }
      return hostForkSource(origin.source, origin.importSpec, part);
  }
}

function entryForkSource(endpoint: Endpoint, entry: FileEntry, part: FilePart): PartSource {
  const present = part === 'data' ? entry.hasDataFork : entry.hasRsrcFork;
  if (!present) {
    return new GeneratedPartSource(`${entry.fullPathName} (${part})`, async () => EMPTY);
  }
  return new EntryPartSource(endpoint, entry, part);
}

function hostForkSource(source: ForkSource, importSpec: ImportSpec | null, part: FilePart): PartSource {
  const file = new HostFilePartSource(source.hostPath);
  switch (source.kind) {
    case 'apple-single':
    case 'apple-double':
      return new ContainerPartSource(file, part);
    case 'import':
      return importSpec ? new ImportPartSource(file, importSpec, part) : file;
    case 'plain':
    case 'naps':
    case 'host-named-fork':
      return file;
  }
}

function generatedSource(item: TransferItem): PartSource {
  if (item.origin.kind === 'host') {
    throw new ValidationError(`Host items are carried natively and cannot be re-encoded: ${item.attrs.fullPathName}`);
  }
  const kind = item.preserve === 'as' ? 'apple-single' : 'apple-double';
  return new GeneratedPartSource(`${item.extractPath} [${kind}]`, async () => {
    const data = kind === 'apple-single' ? await readPartSource(rawForkSource(item, 'data')) : null;
    const rsrc = await readPartSource(rawForkSource(item, 'rsrc'));
    return buildContainer({
      kind,
      fileName: item.attrs.fileNameOnly,
      attrs: item.attrs,
      data,
      rsrc: rsrc.length > 0 ? rsrc : null
    });
  });
}

function requireEntry(entry: FileEntry | null, item: TransferItem): FileEntry {
  if (!entry) {
    throw new ValidationError(`Item has no source entry: ${item.attrs.fullPathName}`);
  }
  return entry;
}

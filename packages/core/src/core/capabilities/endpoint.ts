import type { FilePart } from '../../types/index.js';
import type { Archive } from './archive.js';
import type { FileEntry, ForkReader } from './file-entry.js';
import type { FileSystem } from './file-system.js';

/**
 * A transfer source or destination: either an archive or a filesystem, each
 * carrying only its own capability set.
 */
export type Endpoint =
  | { kind: 'archive'; archive: Archive }
  | { kind: 'filesystem'; fs: FileSystem };

export function archiveEndpoint(archive: Archive): Endpoint {
  return { kind: 'archive', archive };
}

export function fileSystemEndpoint(fs: FileSystem): Endpoint {
  return { kind: 'filesystem', fs };
}

export function openEntryFork(endpoint: Endpoint, entry: FileEntry, part: FilePart): Promise<ForkReader> {
  switch (endpoint.kind) {
    case 'archive':
      return endpoint.archive.openPart(entry, part);
    case 'filesystem':
      return endpoint.fs.openFork(entry, part);
  }
}

/** Whether a resource fork on `entry` should be carried even when empty. */
export function tracksExtendedness(endpoint: Endpoint): boolean {
  return endpoint.kind === 'archive'
    ? endpoint.archive.characteristics.tracksExtendedness
    : endpoint.fs.characteristics.tracksExtendedness;
}

export function endpointName(endpoint: Endpoint): string {
  return endpoint.kind === 'archive'
    ? endpoint.archive.characteristics.name
    : endpoint.fs.characteristics.name;
}

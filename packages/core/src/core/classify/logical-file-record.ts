import type { SourceKind } from '../../types/index.js';

/**
 * Where the bytes of one fork come from on the host.
 */
export interface ForkSource {
  readonly kind: SourceKind;
  readonly hostPath: string;
}

/**
 * One file or directory found on the host, with its forks and attributes
 * resolved from whatever preservation encodings were present.
 *
 * `key` is the host path with preservation decorations removed (`._`
 * prefix, NAPS tag), so that a data file and its resource-fork companion
 * land in the same record.
 */
export interface LogicalFileRecord {
  readonly key: string;
  readonly isDirectory: boolean;
  readonly dataFork: ForkSource | null;
  readonly rsrcFork: ForkSource | null;

  readonly fileType: number;
  readonly auxType: number;
  readonly hfsFileType: number;
  readonly hfsCreator: number;
  readonly access: number;
  readonly createWhen: Date | null;
  readonly modWhen: Date | null;

  /** Directory relative to the base path, using `storageDirSep` */
  readonly storageDir: string;
  readonly storageDirSep: string;
  readonly storageName: string;
  /** Attributes came from an AppleDouble header and outrank host metadata */
  readonly hasADFAttribs: boolean;
}

export function hasRecordTypeInfo(record: LogicalFileRecord): boolean {
  return record.fileType !== 0 || record.auxType !== 0 || record.hfsFileType !== 0 || record.hfsCreator !== 0;
}

/** Storage directory and name joined with the storage separator. */
export function recordStoragePath(record: LogicalFileRecord): string {
  return record.storageDir.length > 0
    ? record.storageDir + record.storageDirSep + record.storageName
    : record.storageName;
}

/** Host path the record sorts and reports under. */
export function recordSortPath(record: LogicalFileRecord): string {
  return record.dataFork?.hostPath ?? record.rsrcFork?.hostPath ?? record.key;
}

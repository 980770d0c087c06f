import { promises as fs } from 'fs';
import path from 'path';
import { isJunk } from 'junk';
import { minimatch } from 'minimatch';
import { FILE_ACCESS_LOCKED, FILE_ACCESS_UNLOCKED, NAMING } from '../../constants/index.js';
import type { FilePart, SourceKind } from '../../types/index.js';
import { FileNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isValidDate, type EntryAttributes } from '../attributes/file-attribs.js';
import { parseContainer, type AppleSingleHeader } from '../apple-single/apple-single.js';
import type { ImportSpec } from '../import/importer.js';
import { matchNapsName, parseNapsTag } from '../naming/naps.js';
import { compareFileNames, printifyControlChars, unescapeFileName } from '../naming/path-name.js';
import {
  hasRecordTypeInfo,
  recordSortPath,
  type ForkSource,
  type LogicalFileRecord
} from './logical-file-record.js';

export interface ClassifierOptions {
  /** Unpack AppleDouble `._` files */
  parseADF: boolean;
  /** Unpack AppleSingle `.as` files */
  parseAS: boolean;
  /** Parse and remove NAPS filename tags */
  parseNAPS: boolean;
  /** Probe `<file>/..namedfork/rsrc` for resource forks (macOS) */
  checkNamed: boolean;
  /** Descend into directories */
  recurse: boolean;
  /** Let the importer strip redundant filename extensions */
  stripExt: boolean;
  /** Skip `.DS_Store`, `Thumbs.db` and similar while walking directories */
  skipJunk: boolean;
  /** Glob patterns, matched against paths relative to the base path */
  exclude: string[];
  /** When set, every file is import input and no other rule applies */
  importSpec: ImportSpec | null;
}

export const DEFAULT_CLASSIFIER_OPTIONS: Readonly<ClassifierOptions> = {
  parseADF: true,
  parseAS: true,
  parseNAPS: true,
  checkNamed: false,
  recurse: true,
  stripExt: true,
  skipJunk: true,
  exclude: [],
  importSpec: null
};

interface HostStat {
  createWhen: Date | null;
  modWhen: Date | null;
  locked: boolean;
}

interface StoragePath {
  dir: string;
  name: string;
}

/** What one host file or directory says about the record it belongs to. */
type Observation =
  | { kind: 'directory'; key: string; hostPath: string; stat: HostStat; storage: StoragePath }
  | {
      kind: 'import';
      key: string;
      hostPath: string;
      types: Pick<EntryAttributes, 'fileType' | 'auxType' | 'hfsFileType' | 'hfsCreator'>;
      stat: HostStat;
      storage: StoragePath;
    }
  | { kind: 'adf'; key: string; hostPath: string; header: AppleSingleHeader; storage: StoragePath }
  | { kind: 'as'; key: string; hostPath: string; header: AppleSingleHeader; storage: StoragePath }
  | {
      kind: 'naps';
      key: string;
      hostPath: string;
      part: FilePart;
      types: Pick<EntryAttributes, 'fileType' | 'auxType' | 'hfsFileType' | 'hfsCreator'>;
      stat: HostStat;
      storage: StoragePath;
    }
  | { kind: 'plain'; key: string; hostPath: string; stat: HostStat; storage: StoragePath }
  | { kind: 'named-fork'; key: string; hostPath: string };

/**
 * Decides which preservation encoding each host file uses and turns the
 * files into logical records.
 *
 * Classification runs in two phases. The walk turns every host file into an
 * observation and mutates nothing. Resolution then groups observations by
 * key, in case-insensitive key order, and folds each group into one record.
 * ADF header attributes outrank AppleSingle attributes, which outrank NAPS
 * tag types, which outrank host metadata.
 */
export class PreservationClassifier {
  private readonly basePath: string;
  private readonly options: ClassifierOptions;
  private observations: Observation[] = [];

  constructor(basePath: string, options: Partial<ClassifierOptions> = {}) {
    this.basePath = path.resolve(basePath);
    this.options = { ...DEFAULT_CLASSIFIER_OPTIONS, ...options };
  }

  /**
   * Classifies `pathNames` (absolute, or relative to the base path).
   * Throws {@link FileNotFoundError} if an explicitly listed path is missing.
   */
  async classify(pathNames: readonly string[]): Promise<LogicalFileRecord[]> {
    this.observations = [];
    const fullPaths = pathNames.map(p => path.resolve(this.basePath, p));

    for (const fullPath of fullPaths) {
      await this.processPath(fullPath, true);
    }

    // ._ files beside explicitly listed files are not visited unless their
    // directory was walked.
    if (this.options.parseADF && !this.options.importSpec) {
      await this.scanForADF(fullPaths);
    }
    if (this.options.checkNamed && !this.options.importSpec) {
      await this.scanForNamedForks();
    }

    return this.resolve();
  }

  // Phase one

  private async processPath(fullPath: string, explicit: boolean): Promise<void> {
    const stats = await fs.stat(fullPath).catch(() => null);
    if (!stats) {
      throw new FileNotFoundError(fullPath);
    }
    if (!explicit && this.isExcluded(fullPath)) {
      logger.debug(`Excluded: ${fullPath}`);
      return;
    }

    if (stats.isDirectory()) {
      if (!this.options.recurse) {
        logger.warn(`Skipping directory (recursion disabled): ${fullPath}`);
        return;
      }
      this.observations.push({
        kind: 'directory',
        key: fullPath,
        hostPath: fullPath,
        stat: toHostStat(stats),
        storage: this.storagePath(fullPath, '', false)
      });
      await this.processDirectory(fullPath);
      return;
    }
    if (!stats.isFile()) {
      logger.warn(`Skipping non-file: ${fullPath}`);
      return;
    }

    const fileName = path.basename(fullPath);
    const importSpec = this.options.importSpec;
    if (importSpec) {
      const clipPath = this.options.stripExt ? importSpec.importer.stripExtension(fullPath) : fullPath;
      this.observations.push({
        kind: 'import',
        key: fullPath,
        hostPath: fullPath,
        types: importSpec.importer.getFileTypes(),
        stat: toHostStat(stats),
        storage: this.storagePath(clipPath, '', false)
      });
      return;
    }

    if (this.options.parseADF && fileName.startsWith(NAMING.ADF_PREFIX)) {
      if (await this.checkAppleDouble(fullPath, fileName)) {
        return;
      }
    }
    if (this.options.parseAS && fileName.toLowerCase().endsWith(NAMING.AS_EXT)) {
      if (await this.checkAppleSingle(fullPath, fileName)) {
        return;
      }
    }
    if (this.options.parseNAPS) {
      const naps = matchNapsName(fileName);
      if (naps) {
        this.handleNAPS(fullPath, naps.storageName, naps.tag, toHostStat(stats));
        return;
      }
    }

    this.observations.push({
      kind: 'plain',
      key: fullPath,
      hostPath: fullPath,
      stat: toHostStat(stats),
      storage: this.storagePath(fullPath, '', false)
    });
  }

  private async processDirectory(dirPath: string): Promise<void> {
    const names = await fs.readdir(dirPath);
    names.sort(compareFileNames);
    for (const name of names) {
      if (this.options.skipJunk && !name.startsWith(NAMING.ADF_PREFIX) && isJunk(name)) {
        logger.debug(`Skipping junk file: ${path.join(dirPath, name)}`);
        continue;
      }
      await this.processPath(path.join(dirPath, name), false);
    }
  }

  private isExcluded(fullPath: string): boolean {
    if (this.options.exclude.length === 0) {
      return false;
    }
    const relative = path.relative(this.basePath, fullPath).split(path.sep).join('/');
    return this.options.exclude.some(pattern => minimatch(relative, pattern, { dot: true, matchBase: true }));
  }

  private async checkAppleDouble(fullPath: string, fileName: string): Promise<boolean> {
    const header = parseContainer(await fs.readFile(fullPath));
    if (!header || header.kind !== 'apple-double') {
      return false;
    }
    const clipPath = path.join(path.dirname(fullPath), fileName.substring(NAMING.ADF_PREFIX.length));
    this.observations.push({
      kind: 'adf',
      key: clipPath,
      hostPath: fullPath,
      header,
      storage: this.storagePath(clipPath, '', false)
    });
    return true;
  }

  private async checkAppleSingle(fullPath: string, fileName: string): Promise<boolean> {
    const header = parseContainer(await fs.readFile(fullPath));
    if (!header || header.kind !== 'apple-single') {
      return false;
    }
    if (!header.dataFork && !header.rsrcFork) {
      logger.info(`Found content-free AppleSingle file: ${fullPath}`);
      return true;
    }
    const storedName = header.fileName.length > 0
      ? header.fileName
      : fileName.substring(0, fileName.length - NAMING.AS_EXT.length);
    this.observations.push({
      kind: 'as',
      key: fullPath,
      hostPath: fullPath,
      header,
      storage: this.storagePath(fullPath, storedName, false)
    });
    return true;
  }

  private handleNAPS(fullPath: string, storageName: string, tag: string, stat: HostStat): void {
    const parsed = parseNapsTag(tag);
    if (parsed.marker === 'i') {
      logger.warn(`Skipping NAPS disk image: ${fullPath}`);
      return;
    }
    const clipPath = path.join(path.dirname(fullPath), storageName);
    const isProDOS = parsed.typeValue <= 0xff && parsed.auxValue <= 0xffff;
    this.observations.push({
      kind: 'naps',
      key: clipPath,
      hostPath: fullPath,
      part: parsed.marker === 'r' ? 'rsrc' : 'data',
      types: isProDOS
        ? { fileType: parsed.typeValue, auxType: parsed.auxValue, hfsFileType: 0, hfsCreator: 0 }
        : { fileType: 0, auxType: 0, hfsFileType: parsed.typeValue, hfsCreator: parsed.auxValue },
      stat,
      storage: this.storagePath(clipPath, '', true)
    });
  }

  private async scanForADF(fullPaths: readonly string[]): Promise<void> {
    const provisional = new Map(this.resolveQuietly().map(rec => [rec.key, rec]));
    for (const fullPath of fullPaths) {
      const record = provisional.get(fullPath);
      if (!record || record.isDirectory || record.rsrcFork || hasRecordTypeInfo(record)) {
        continue;
      }
      const fileName = path.basename(fullPath);
      if (fileName.startsWith(NAMING.ADF_PREFIX)) {
        continue;
      }
      const checkPath = path.join(path.dirname(fullPath), NAMING.ADF_PREFIX + fileName);
      if (await isHostFile(checkPath)) {
        await this.processPath(checkPath, true);
      }
    }
  }

  private async scanForNamedForks(): Promise<void> {
    for (const record of this.resolveQuietly()) {
      if (record.isDirectory || record.rsrcFork || !record.dataFork) {
        continue;
      }
      const rsrcPath = record.dataFork.hostPath + '/' + NAMING.NAMED_FORK_RSRC;
      if (await isHostFile(rsrcPath)) {
        this.observations.push({ kind: 'named-fork', key: record.key, hostPath: rsrcPath });
      }
    }
  }

  private storagePath(clipPath: string, storedName: string, doUnescape: boolean): StoragePath {
    const dirName = path.dirname(clipPath);
    let dir: string;
    if (dirName === this.basePath) {
      dir = '';
    } else if (dirName.startsWith(this.basePath + path.sep)) {
      dir = dirName.substring(this.basePath.length + 1);
    } else {
      dir = dirName.substring(path.parse(dirName).root.length);
    }
    let name = storedName;
    if (name.length === 0) {
      name = path.basename(clipPath);
      if (doUnescape) {
        name = printifyControlChars(unescapeFileName(name, ''));
      }
    }
    return { dir, name };
  }

  // Phase two

  private resolve(): LogicalFileRecord[] {
    return this.resolveGroups(true);
  }

  private resolveQuietly(): LogicalFileRecord[] {
    return this.resolveGroups(false);
  }

  private resolveGroups(report: boolean): LogicalFileRecord[] {
    const groups = new Map<string, Observation[]>();
    for (const obs of this.observations) {
      const group = groups.get(obs.key);
      if (group) {
        group.push(obs);
      } else {
        groups.set(obs.key, [obs]);
      }
    }
    const keys = [...groups.keys()].sort(compareFileNames);
    const records: LogicalFileRecord[] = [];
    for (const key of keys) {
      const record = resolveGroup(key, groups.get(key) ?? [], report);
      if (record) {
        records.push(record);
      }
    }
    return records.sort((a, b) => compareFileNames(recordSortPath(a), recordSortPath(b)));
  }
}

/**
 * Folds the observations for one key into a record. Returns null when
 * nothing usable was observed.
 */
function resolveGroup(key: string, group: readonly Observation[], report: boolean): LogicalFileRecord | null {
  const warn = (message: string): void => {
    if (report) {
      logger.warn(message);
    }
  };

  const forks: { data: ForkSource | null; rsrc: ForkSource | null } = { data: null, rsrc: null };
  const attach = (part: FilePart, kind: SourceKind, hostPath: string): void => {
    if (forks[part]) {
      warn(`${part === 'data' ? 'Data' : 'Resource'} fork added twice: ${hostPath}`);
    }
    forks[part] = { kind, hostPath };
  };

  let directory: Extract<Observation, { kind: 'directory' }> | null = null;
  let adf: Extract<Observation, { kind: 'adf' }> | null = null;
  let appleSingle: Extract<Observation, { kind: 'as' }> | null = null;
  let naps: Extract<Observation, { kind: 'naps' }> | null = null;
  let host: Extract<Observation, { kind: 'plain' | 'import' }> | null = null;

  for (const obs of group) {
    switch (obs.kind) {
      case 'directory':
        directory = obs;
        break;
      case 'import':
        attach('data', 'import', obs.hostPath);
        host = obs;
        break;
      case 'adf':
        if (obs.header.rsrcFork) {
          attach('rsrc', 'apple-double', obs.hostPath);
        }
        adf = obs;
        break;
      case 'as':
        if (appleSingle) {
          warn(`AppleSingle added twice: ${obs.hostPath}`);
          break;
        }
        if (obs.header.dataFork) {
          attach('data', 'apple-single', obs.hostPath);
        }
        if (obs.header.rsrcFork) {
          attach('rsrc', 'apple-single', obs.hostPath);
        }
        appleSingle = obs;
        break;
      case 'naps':
        attach(obs.part, 'naps', obs.hostPath);
        naps = obs;
        break;
      case 'plain':
        attach('data', 'plain', obs.hostPath);
        host = obs;
        break;
      case 'named-fork':
        if (!forks.rsrc) {
          forks.rsrc = { kind: 'host-named-fork', hostPath: obs.hostPath };
        }
        break;
    }
  }

  if (directory) {
    return {
      key,
      isDirectory: true,
      dataFork: null,
      rsrcFork: null,
      fileType: 0,
      auxType: 0,
      hfsFileType: 0,
      hfsCreator: 0,
      access: FILE_ACCESS_UNLOCKED,
      createWhen: directory.stat.createWhen,
      modWhen: directory.stat.modWhen,
      storageDir: directory.storage.dir,
      storageDirSep: path.sep,
      storageName: directory.storage.name,
      hasADFAttribs: false
    };
  }
  // A lone ADF header still describes a (forkless) file.
  if (!forks.data && !forks.rsrc && !adf) {
    return null;
  }

  let attrs: EntryAttributes;
  if (adf) {
    attrs = headerAttrs(adf.header);
  } else if (appleSingle) {
    attrs = headerAttrs(appleSingle.header);
  } else if (naps) {
    attrs = { ...naps.types, ...statAttrs(naps.stat) };
  } else if (host?.kind === 'import') {
    attrs = { ...host.types, ...statAttrs(host.stat) };
  } else if (host) {
    attrs = {
      fileType: 0,
      auxType: 0,
      hfsFileType: 0,
      hfsCreator: 0,
      ...statAttrs(host.stat)
    };
  } else {
    attrs = { fileType: 0, auxType: 0, hfsFileType: 0, hfsCreator: 0, access: FILE_ACCESS_UNLOCKED, createWhen: null, modWhen: null };
  }

  const storageObs = appleSingle ?? naps ?? host ?? adf;
  const storage = storageObs ? storageObs.storage : { dir: '', name: path.basename(key) };

  return {
    key,
    isDirectory: false,
    dataFork: forks.data,
    rsrcFork: forks.rsrc,
    ...attrs,
    storageDir: storage.dir,
    storageDirSep: path.sep,
    storageName: storage.name,
    hasADFAttribs: adf !== null
  };
}

function headerAttrs(header: AppleSingleHeader): EntryAttributes {
  return {
    fileType: header.attrs.fileType,
    auxType: header.attrs.auxType,
    hfsFileType: header.attrs.hfsFileType,
    hfsCreator: header.attrs.hfsCreator,
    access: header.attrs.access,
    createWhen: isValidDate(header.attrs.createWhen) ? header.attrs.createWhen : null,
    modWhen: isValidDate(header.attrs.modWhen) ? header.attrs.modWhen : null
  };
}

function statAttrs(stat: HostStat): Pick<EntryAttributes, 'access' | 'createWhen' | 'modWhen'> {
  return {
    access: stat.locked ? FILE_ACCESS_LOCKED : FILE_ACCESS_UNLOCKED,
    createWhen: stat.createWhen,
    modWhen: stat.modWhen
  };
}

function toHostStat(stats: { birthtimeMs: number; birthtime: Date; mtime: Date; mode: number }): HostStat {
  return {
    createWhen: stats.birthtimeMs > 0 ? stats.birthtime : null,
    modWhen: stats.mtime,
    locked: (stats.mode & 0o200) === 0
  };
}

async function isHostFile(hostPath: string): Promise<boolean> {
  const stats = await fs.stat(hostPath).catch(() => null);
  return stats !== null && stats.isFile();
}

/**
 * Classifies host paths with one call.
 */
export function classifyHostPaths(
  basePath: string,
  pathNames: readonly string[],
  options: Partial<ClassifierOptions> = {}
): Promise<LogicalFileRecord[]> {
  return new PreservationClassifier(basePath, options).classify(pathNames);
}

import { FILE_ACCESS_UNLOCKED, NAMING } from '../../constants/index.js';
import type { FilePart } from '../../types/index.js';
import { ArchiveStateError, FileSystemError } from '../../utils/errors.js';
import type { EntryAttributes } from '../attributes/file-attribs.js';
import type { FileEntry, ForkReader, ForkWriter } from '../capabilities/file-entry.js';
import type { CreateMode, FileSystem, FileSystemCharacteristics } from '../capabilities/file-system.js';

export interface MemoryVolumeOptions extends Partial<FileSystemCharacteristics> {
  readOnly?: boolean;
}

const DEFAULT_CHARACTERISTICS: FileSystemCharacteristics = {
  name: 'Memory',
  hasResourceForks: true,
  isHierarchical: true,
  dirSep: '/',
  caseSensitive: false,
  isDOS: false,
  tracksExtendedness: true,
  hfsTypesOnly: false
};

/**
 * A file or directory held in a {@link MemoryVolume}.
 */
export class MemoryEntry implements FileEntry {
  fileType = 0;
  auxType = 0;
  hfsFileType = 0;
  hfsCreator = 0;
  access: number = FILE_ACCESS_UNLOCKED;
  createWhen: Date | null = null;
  modWhen: Date | null = null;
  isDamaged = false;
  isDubious = false;

  data: Uint8Array = new Uint8Array(0);
  rsrc: Uint8Array | null = null;
  readonly children: MemoryEntry[] = [];

  constructor(
    private readonly volume: MemoryVolume,
    public fileName: string,
    public readonly isDirectory: boolean,
    public containingDir: MemoryEntry | null
  ) {}

  get fullPathName(): string {
    const names: string[] = [];
    for (let entry: MemoryEntry | null = this; entry?.containingDir; entry = entry.containingDir) {
      names.unshift(entry.fileName);
    }
    return names.join(this.volume.characteristics.dirSep);
  }

  get directorySeparator(): string {
    return this.volume.characteristics.dirSep;
  }

  get hasDataFork(): boolean {
    return !this.isDirectory;
  }

  get hasRsrcFork(): boolean {
    return this.rsrc !== null;
  }

  get dataLength(): number {
    return this.data.length;
  }

  get rsrcLength(): number {
    return this.rsrc?.length ?? 0;
  }
}

class MemoryForkReader implements ForkReader {
  readonly canSeek = true;
  private position = 0;

  constructor(private readonly content: Uint8Array) {}

  async read(buf: Uint8Array, offset: number, count: number): Promise<number> {
    const actual = Math.min(count, this.content.length - this.position);
    if (actual <= 0) {
      return 0;
    }
    buf.set(this.content.subarray(this.position, this.position + actual), offset);
    this.position += actual;
    return actual;
  }

  async seekToStart(): Promise<void> {
    this.position = 0;
  }

  async close(): Promise<void> {
    // nothing held
  }
}

class MemoryForkWriter implements ForkWriter {
  private readonly chunks: Uint8Array[] = [];
  private closed = false;

  constructor(private readonly commit: (content: Uint8Array) => void) {}

  async write(buf: Uint8Array, offset: number, count: number): Promise<void> {
    if (this.closed) {
      throw new FileSystemError('Write to closed fork');
    }
    this.chunks.push(buf.slice(offset, offset + count));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.commit(Buffer.concat(this.chunks));
  }
}

/**
 * A hierarchical filesystem kept in memory, with configurable
 * characteristics. Used to stage host files before planning and as a
 * destination in tests.
 */
export class MemoryVolume implements FileSystem {
  readonly characteristics: FileSystemCharacteristics;
  readonly isReadOnly: boolean;
  readonly isDubious = false;
  private readonly root: MemoryEntry;

  constructor(options: MemoryVolumeOptions = {}) {
    const { readOnly, ...chars } = options;
    this.characteristics = { ...DEFAULT_CHARACTERISTICS, ...chars };
    this.isReadOnly = readOnly ?? false;
    this.root = new MemoryEntry(this, this.characteristics.name, true, null);
  }

  getVolDirEntry(): MemoryEntry {
    return this.root;
  }

  getChildren(dir: FileEntry): MemoryEntry[] {
    return [...this.own(dir).children];
  }

  findEntry(dir: FileEntry, name: string): MemoryEntry | null {
    const folded = this.fold(name);
    return this.own(dir).children.find(child => this.fold(child.fileName) === folded) ?? null;
  }

  adjustFileName(name: string): string {
    if (name.length === 0) {
      return NAMING.MIRANDA_FILENAME;
    }
    const sep = this.characteristics.dirSep;
    return sep.length > 0 ? name.split(sep).join(NAMING.DEFAULT_REPL_CHAR) : name;
  }

  async createFile(dir: FileEntry, name: string, mode: CreateMode, fileType: number): Promise<MemoryEntry> {
    this.checkWritable();
    const parent = this.own(dir);
    if (!parent.isDirectory) {
      throw new FileSystemError(`Not a directory: ${parent.fullPathName}`);
    }
    if (!this.characteristics.isHierarchical && mode === 'directory') {
      throw new FileSystemError('Volume does not support directories');
    }
    if (this.findEntry(parent, name)) {
      throw new FileSystemError(`File already exists: ${name}`);
    }
    const entry = new MemoryEntry(this, name, mode === 'directory', parent);
    entry.fileType = fileType;
    if (mode === 'extended') {
      if (!this.characteristics.hasResourceForks) {
        throw new FileSystemError('Volume does not support resource forks');
      }
      entry.rsrc = new Uint8Array(0);
    }
    parent.children.push(entry);
    return entry;
  }

  async deleteFile(entry: FileEntry): Promise<void> {
    this.checkWritable();
    const target = this.own(entry);
    const parent = target.containingDir;
    if (!parent) {
      throw new FileSystemError('Cannot delete the volume directory');
    }
    if (target.isDirectory && target.children.length > 0) {
      throw new FileSystemError(`Directory not empty: ${target.fullPathName}`);
    }
    const index = parent.children.indexOf(target);
    if (index < 0) {
      throw new FileSystemError(`Entry already deleted: ${target.fileName}`);
    }
    parent.children.splice(index, 1);
    target.containingDir = null;
  }

  async openFork(entry: FileEntry, part: FilePart): Promise<ForkReader> {
    const target = this.own(entry);
    return new MemoryForkReader(this.forkContent(target, part));
  }

  async openForkForWrite(entry: FileEntry, part: FilePart): Promise<ForkWriter> {
    this.checkWritable();
    const target = this.own(entry);
    this.forkContent(target, part);
    return new MemoryForkWriter(content => {
      if (part === 'data') {
        target.data = content;
      } else {
        target.rsrc = content;
      }
    });
  }

  async setAttributes(entry: FileEntry, attrs: Readonly<EntryAttributes>, name?: string): Promise<void> {
    this.checkWritable();
    const target = this.own(entry);
    if (name !== undefined && name !== target.fileName) {
      const parent = target.containingDir;
      const clash = parent ? this.findEntry(parent, name) : null;
      if (clash && clash !== target) {
        throw new FileSystemError(`File already exists: ${name}`);
      }
      target.fileName = name;
    }
    target.fileType = attrs.fileType;
    target.auxType = attrs.auxType;
    target.hfsFileType = attrs.hfsFileType;
    target.hfsCreator = attrs.hfsCreator;
    target.access = attrs.access;
    target.createWhen = attrs.createWhen;
    target.modWhen = attrs.modWhen;
  }

  async moveFile(entry: FileEntry, destDir: FileEntry, name: string): Promise<void> {
    this.checkWritable();
    const target = this.own(entry);
    const dest = this.own(destDir);
    const parent = target.containingDir;
    if (!parent) {
      throw new FileSystemError('Cannot move the volume directory');
    }
    if (!dest.isDirectory) {
      throw new FileSystemError(`Not a directory: ${dest.fullPathName}`);
    }
    for (let dir: MemoryEntry | null = dest; dir; dir = dir.containingDir) {
      if (dir === target) {
        throw new FileSystemError(`Cannot move '${target.fullPathName}' into itself`);
      }
    }
    const clash = this.findEntry(dest, name);
    if (clash && clash !== target) {
      throw new FileSystemError(`File already exists: ${name}`);
    }
    parent.children.splice(parent.children.indexOf(target), 1);
    dest.children.push(target);
    target.containingDir = dest;
    target.fileName = name;
  }

  /** Looks up a path relative to the volume directory. */
  findPath(pathName: string): MemoryEntry | null {
    const sep = this.characteristics.dirSep;
    const names = sep.length > 0 ? pathName.split(sep).filter(name => name.length > 0) : [pathName];
    let entry: MemoryEntry | null = this.root;
    for (const name of names) {
      if (!entry) {
        return null;
      }
      entry = this.findEntry(entry, name);
    }
    return entry;
  }

  /** Full pathnames of every entry, parents before children. */
  listPaths(): string[] {
    const paths: string[] = [];
    const walk = (dir: MemoryEntry): void => {
      for (const child of dir.children) {
        paths.push(child.fullPathName);
        if (child.isDirectory) {
          walk(child);
        }
      }
    };
    walk(this.root);
    return paths;
  }

  /** Copy of one fork's content. */
  readFork(entry: FileEntry, part: FilePart): Uint8Array {
    return this.forkContent(this.own(entry), part).slice();
  }

  private forkContent(entry: MemoryEntry, part: FilePart): Uint8Array {
    if (entry.isDirectory) {
      throw new FileSystemError(`Cannot open a fork of directory '${entry.fullPathName}'`);
    }
    if (part === 'data') {
      return entry.data;
    }
    if (!entry.rsrc) {
      throw new FileSystemError(`'${entry.fullPathName}' has no resource fork`);
    }
    return entry.rsrc;
  }

  private own(entry: FileEntry): MemoryEntry {
    if (!(entry instanceof MemoryEntry) || !this.isOwnEntry(entry)) {
      throw new FileSystemError(`Entry does not belong to this volume: ${entry.fullPathName}`);
    }
    return entry;
  }

  private isOwnEntry(entry: MemoryEntry): boolean {
    let top: MemoryEntry = entry;
    while (top.containingDir) {
      top = top.containingDir;
    }
    return top === this.root;
  }

  private fold(name: string): string {
    return this.characteristics.caseSensitive ? name : name.toUpperCase();
  }

  private checkWritable(): void {
    if (this.isReadOnly) {
      throw new ArchiveStateError(`Volume '${this.characteristics.name}' is read-only`);
    }
  }
}

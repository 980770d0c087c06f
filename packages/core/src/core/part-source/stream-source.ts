import type { Endpoint } from '../capabilities/endpoint.js';
import { openEntryFork } from '../capabilities/endpoint.js';
import type { FileEntry, ForkReader } from '../capabilities/file-entry.js';
import type { FilePart } from '../../types/index.js';
import { BasePartSource } from './part-source.js';

/**
 * Wraps a fork reader that is already open. When `ownsReader` is false the
 * caller closes the reader; this source only reads from it.
 */
export class StreamPartSource extends BasePartSource {
  constructor(
    private readonly reader: ForkReader,
    private readonly ownsReader: boolean,
    label: string = 'stream'
  ) {
    super(label);
  }

  protected async doOpen(): Promise<void> {
    // already open
  }

  protected doRead(buf: Uint8Array, offset: number, count: number): Promise<number> {
    return this.reader.read(buf, offset, count);
  }

  protected doRewind(): Promise<void> {
    return this.reader.seekToStart();
  }

  protected async doClose(): Promise<void> {
    if (this.ownsReader) {
      await this.reader.close();
    }
  }
}

/**
 * Reads one fork of an archive or filesystem entry. Readers that cannot
 * seek are closed and reopened on rewind.
 */
export class EntryPartSource extends BasePartSource {
  private reader: ForkReader | null = null;

  constructor(
    private readonly endpoint: Endpoint,
    private readonly entry: FileEntry,
    private readonly part: FilePart
  ) {
    super(`${entry.fullPathName} (${part})`);
  }

  protected async doOpen(): Promise<void> {
    this.reader = await openEntryFork(this.endpoint, this.entry, this.part);
  }

  protected doRead(buf: Uint8Array, offset: number, count: number): Promise<number> {
    return this.reader ? this.reader.read(buf, offset, count) : Promise.resolve(0);
  }

  protected async doRewind(): Promise<void> {
    if (this.reader?.canSeek) {
      await this.reader.seekToStart();
      return;
    }
    await this.reader?.close();
    this.reader = null;
    this.reader = await openEntryFork(this.endpoint, this.entry, this.part);
  }

  protected async doClose(): Promise<void> {
    const reader = this.reader;
    this.reader = null;
    await reader?.close();
  }
}

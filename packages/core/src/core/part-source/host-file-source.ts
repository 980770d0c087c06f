import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { BasePartSource } from './part-source.js';

/**
 * Reads a host file directly.
 */
export class HostFilePartSource extends BasePartSource {
  private handle: FileHandle | null = null;
  private position = 0;

  constructor(public readonly hostPath: string) {
    super(hostPath);
  }

  protected async doOpen(): Promise<void> {
    this.handle = await fs.open(this.hostPath, 'r');
    this.position = 0;
  }

  protected async doRead(buf: Uint8Array, offset: number, count: number): Promise<number> {
    if (!this.handle) {
      return 0;
    }
    const { bytesRead } = await this.handle.read(buf, offset, count, this.position);
    this.position += bytesRead;
    return bytesRead;
  }

  protected async doRewind(): Promise<void> {
    this.position = 0;
  }

  protected async doClose(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}

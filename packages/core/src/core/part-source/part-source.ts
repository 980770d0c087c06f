import { logger } from '../../utils/logger.js';

/**
 * A reopenable byte stream for one fork, read by an executor or by an
 * archive when a transaction is committed.
 *
 * - `open` may be called once per open/close cycle; opening twice throws.
 * - `read` returns 0 at the end of the fork.
 * - `rewind` goes back to the start, reopening the origin if it cannot seek.
 * - `close` is idempotent.
 */
export interface PartSource {
  readonly label: string;
  readonly isOpen: boolean;
  open(): Promise<void>;
  read(buf: Uint8Array, offset: number, count: number): Promise<number>;
  rewind(): Promise<void>;
  close(): Promise<void>;
}

let openSources = 0;

/** Number of part sources currently open. Tests assert this returns to 0. */
export function openSourceCount(): number {
  return openSources;
}

// Leak check, only armed for verbose runs.
const leakRegistry: FinalizationRegistry<string> | null = process.env.FORKFERRY_VERBOSE
  ? new FinalizationRegistry<string>(label => {
      logger.error(`Part source was garbage-collected while open: ${label}`);
    })
  : null;

/**
 * Open/close bookkeeping shared by every part source. Subclasses implement
 * the `do*` hooks, which are only called in a valid state.
 */
export abstract class BasePartSource implements PartSource {
  private opened = false;
  private readonly leakToken = {};

  constructor(public readonly label: string) {}

  get isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    if (this.opened) {
      throw new Error(`Part source already open: ${this.label}`);
    }
    await this.doOpen();
    this.opened = true;
    openSources++;
    leakRegistry?.register(this, this.label, this.leakToken);
  }

  async read(buf: Uint8Array, offset: number, count: number): Promise<number> {
    this.assertOpen();
    return this.doRead(buf, offset, count);
  }

  async rewind(): Promise<void> {
    this.assertOpen();
    return this.doRewind();
  }

  async close(): Promise<void> {
    if (!this.opened) {
      return;
    }
    this.opened = false;
    openSources--;
    leakRegistry?.unregister(this.leakToken);
    await this.doClose();
  }

  private assertOpen(): void {
    if (!this.opened) {
      throw new Error(`Part source not open: ${this.label}`);
    }
  }

  protected abstract doOpen(): Promise<void>;
  protected abstract doRead(buf: Uint8Array, offset: number, count: number): Promise<number>;
  protected abstract doRewind(): Promise<void>;
  protected abstract doClose(): Promise<void>;
}

/**
 * Opens `source`, runs `fn`, and closes the source on every exit path.
 */
export async function usePartSource<T>(source: PartSource, fn: (source: PartSource) => Promise<T>): Promise<T> {
  await source.open();
  try {
    return await fn(source);
  } finally {
    await source.close();
  }
}

/**
 * Reads an open source from its current position to the end.
 */
export async function drainPartSource(source: PartSource, chunkSize: number = 65536): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const chunk = new Uint8Array(chunkSize);
    const actual = await source.read(chunk, 0, chunkSize);
    if (actual === 0) {
      break;
    }
    chunks.push(chunk.subarray(0, actual));
    total += actual;
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

/** Opens, drains and closes a source. */
export function readPartSource(source: PartSource): Promise<Uint8Array> {
  return usePartSource(source, drainPartSource);
}

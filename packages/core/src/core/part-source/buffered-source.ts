import type { FilePart } from '../../types/index.js';
import { FormatError } from '../../utils/errors.js';
import { containerFork, parseContainer } from '../apple-single/apple-single.js';
import type { ImportSpec } from '../import/importer.js';
import { BasePartSource, type PartSource, readPartSource } from './part-source.js';

/**
 * A source whose content is produced in full when it is opened and served
 * from memory afterwards.
 */
export abstract class BufferedPartSource extends BasePartSource {
  private content: Uint8Array = new Uint8Array(0);
  private position = 0;

  protected abstract load(): Promise<Uint8Array>;

  /** Length of the loaded content; 0 before the first open. */
  get length(): number {
    return this.content.length;
  }

  protected async doOpen(): Promise<void> {
    this.content = await this.load();
    this.position = 0;
  }

  protected async doRead(buf: Uint8Array, offset: number, count: number): Promise<number> {
    const actual = Math.min(count, this.content.length - this.position);
    if (actual <= 0) {
      return 0;
    }
    buf.set(this.content.subarray(this.position, this.position + actual), offset);
    this.position += actual;
    return actual;
  }

  protected async doRewind(): Promise<void> {
    this.position = 0;
  }

  protected async doClose(): Promise<void> {
    this.content = new Uint8Array(0);
    this.position = 0;
  }
}

/**
 * Opens one fork inside an AppleSingle or AppleDouble file. The container is
 * copied to memory first, since it may arrive over a transport that cannot
 * seek.
 */
export class ContainerPartSource extends BufferedPartSource {
  constructor(
    private readonly container: PartSource,
    private readonly part: FilePart
  ) {
    super(`${container.label} [${part}]`);
  }

  protected async load(): Promise<Uint8Array> {
    const bytes = await readPartSource(this.container);
    const header = parseContainer(bytes);
    if (!header) {
      throw new FormatError(`Not an AppleSingle/AppleDouble file: ${this.container.label}`);
    }
    return containerFork(bytes, header, this.part) ?? new Uint8Array(0);
  }
}

/**
 * Runs an import converter over a host file when opened. Reads only ever see
 * converted bytes.
 */
export class ImportPartSource extends BufferedPartSource {
  constructor(
    private readonly input: PartSource,
    private readonly spec: ImportSpec,
    private readonly part: FilePart
  ) {
    super(`${input.label} [${spec.importer.tag}:${part}]`);
  }

  protected async load(): Promise<Uint8Array> {
    const raw = await readPartSource(this.input);
    const forks = this.spec.importer.convertFile(raw, this.spec.options);
    return (this.part === 'data' ? forks.data : forks.rsrc) ?? new Uint8Array(0);
  }
}

/**
 * Content built on demand, e.g. an AppleSingle image assembled from the
 * forks of an archive entry.
 */
export class GeneratedPartSource extends BufferedPartSource {
  constructor(
    label: string,
    private readonly generate: () => Promise<Uint8Array>
  ) {
    super(label);
  }

  protected load(): Promise<Uint8Array> {
    return this.generate();
  }
}

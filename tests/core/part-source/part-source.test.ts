import { describe, it, before, after, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import {
  ContainerPartSource,
  EntryPartSource,
  GeneratedPartSource,
  HostFilePartSource,
  ImportPartSource,
  ProgressPartSource,
  StreamPartSource,
  drainPartSource,
  openSourceCount,
  readPartSource,
  usePartSource,
} from '../../../packages/core/src/core/part-source/index.js';
import { archiveEndpoint } from '../../../packages/core/src/core/capabilities/endpoint.js';
import type { ForkReader } from '../../../packages/core/src/core/capabilities/file-entry.js';
import { CallbackReason, CallbackResult } from '../../../packages/core/src/core/callbacks/callback-facts.js';
import { resolveImporter } from '../../../packages/core/src/core/import/index.js';
import { FormatError, TransferCancelledError } from '../../../packages/core/src/utils/errors.js';
import { MemoryArchive } from '../../support/memory-archive.js';
import {
  answerFor,
  containerBytes,
  makeTempDir,
  recordingCallback,
  removeTempDir,
  writeHostFile,
} from '../../test-helpers.js';

function text(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('latin1');
}

function generated(content: Uint8Array | string, label: string = 'gen'): GeneratedPartSource {
  const bytes = typeof content === 'string' ? Buffer.from(content, 'latin1') : content;
  return new GeneratedPartSource(label, async () => bytes);
}

describe('part sources', () => {
  let dir = '';

  before(() => {
    dir = makeTempDir();
  });

  after(() => {
    removeTempDir(dir);
  });

  afterEach(() => {
    assert.equal(openSourceCount(), 0);
  });

  it('enforces the open/close protocol', async () => {
    const source = generated('abc', 'proto');
    await assert.rejects(source.read(new Uint8Array(4), 0, 4), { message: 'Part source not open: proto' });
    await source.open();
    assert.equal(openSourceCount(), 1);
    await assert.rejects(source.open(), { message: 'Part source already open: proto' });
    await source.close();
    await source.close();
    assert.equal(source.isOpen, false);
  });

  it('rewinds buffered content', async () => {
    const source = generated('hello');
    const result = await usePartSource(source, async open => {
      const buf = new Uint8Array(2);
      await open.read(buf, 0, 2);
      await open.rewind();
      return drainPartSource(open, 3);
    });
    assert.equal(text(result), 'hello');
  });

  it('closes the source when the reader throws', async () => {
    const source = generated('x');
    await assert.rejects(usePartSource(source, async () => {
      throw new Error('reader failed');
    }), { message: 'reader failed' });
    assert.equal(source.isOpen, false);
  });

  it('reads and rewinds host files', async () => {
    const hostPath = writeHostFile(dir, 'plain.bin', 'host bytes');
    const source = new HostFilePartSource(hostPath);
    assert.equal(text(await readPartSource(source)), 'host bytes');
    const again = await usePartSource(source, async open => {
      await open.read(new Uint8Array(5), 0, 5);
      await open.rewind();
      return drainPartSource(open);
    });
    assert.equal(text(again), 'host bytes');
  });

  it('extracts one fork from a container', async () => {
    const image = containerBytes({ kind: 'apple-single', fileName: 'F', data: Buffer.from('DATA'), rsrc: Buffer.from('RSRC') });
    assert.equal(text(await readPartSource(new ContainerPartSource(generated(image), 'rsrc'))), 'RSRC');
    assert.equal(text(await readPartSource(new ContainerPartSource(generated(image), 'data'))), 'DATA');
  });

  it('yields an empty fork when the container has none', async () => {
    const image = containerBytes({ kind: 'apple-double', fileName: '', data: null, rsrc: null });
    assert.equal((await readPartSource(new ContainerPartSource(generated(image), 'rsrc'))).length, 0);
  });

  it('rejects content that is not a container', async () => {
    const source = new ContainerPartSource(generated('not a container at all, really', 'junk'), 'data');
    await assert.rejects(readPartSource(source), FormatError);
  });

  it('serves converted bytes for imports', async () => {
    const source = new ImportPartSource(generated('one\ntwo\n'), resolveImporter('text'), 'data');
    assert.equal(text(await readPartSource(source)), 'one\rtwo\r');
  });

  it('leaves a borrowed reader open', async () => {
    let closed = false;
    let position = 0;
    const content = Buffer.from('stream');
    const reader: ForkReader = {
      canSeek: true,
      async read(buf, offset, count) {
        const actual = Math.min(count, content.length - position);
        buf.set(content.subarray(position, position + actual), offset);
        position += actual;
        return actual;
      },
      async seekToStart() {
        position = 0;
      },
      async close() {
        closed = true;
      },
    };
    assert.equal(text(await readPartSource(new StreamPartSource(reader, false))), 'stream');
    assert.equal(closed, false);
    await reader.seekToStart();
    assert.equal(text(await readPartSource(new StreamPartSource(reader, true))), 'stream');
    assert.equal(closed, true);
  });

  it('reopens entry forks that cannot seek', async () => {
    const archive = MemoryArchive.withFiles([{ path: 'dir/file', data: 'entry data' }], { canSeek: false });
    const entry = archive.findEntry('dir/file');
    assert.ok(entry);
    const source = new EntryPartSource(archiveEndpoint(archive), entry, 'data');
    const result = await usePartSource(source, async open => {
      await open.read(new Uint8Array(6), 0, 6);
      await open.rewind();
      return drainPartSource(open);
    });
    assert.equal(text(result), 'entry data');
  });

  it('asks about cancellation and reports progress when opened', async () => {
    const recorder = recordingCallback();
    const source = new ProgressPartSource(generated('p'), recorder.callback, {
      origPathName: 'a',
      origDirSep: '/',
      origModWhen: null,
      newPathName: 'b',
      newDirSep: '/',
      newModWhen: null,
      progressPercent: 50,
      part: 'data',
      failMessage: '',
      dosConv: 'none',
    });
    assert.equal(text(await readPartSource(source)), 'p');
    assert.deepEqual(recorder.reasons(), [CallbackReason.QueryCancel, CallbackReason.Progress]);
    assert.equal(recorder.calls[1].progressPercent, 50);
  });

  it('aborts an open answered with Cancel', async () => {
    const inner = generated('never read');
    const recorder = recordingCallback(answerFor(CallbackReason.QueryCancel, CallbackResult.Cancel));
    const source = new ProgressPartSource(inner, recorder.callback, {
      origPathName: 'a',
      origDirSep: '/',
      origModWhen: null,
      newPathName: 'a',
      newDirSep: '/',
      newModWhen: null,
      progressPercent: 0,
      part: 'data',
      failMessage: '',
      dosConv: 'none',
    });
    await assert.rejects(readPartSource(source), TransferCancelledError);
    assert.equal(inner.isOpen, false);
    assert.deepEqual(recorder.reasons(), [CallbackReason.QueryCancel]);
  });
});

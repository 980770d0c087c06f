import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ArchiveExecutor } from '../../../packages/core/src/core/execute/archive-executor.js';
import { TransferPlanner } from '../../../packages/core/src/core/plan/transfer-planner.js';
import type { TransferItem } from '../../../packages/core/src/core/plan/transfer-item.js';
import { MemoryVolume } from '../../../packages/core/src/core/memory/memory-volume.js';
import { CallbackReason, CallbackResult } from '../../../packages/core/src/core/callbacks/callback-facts.js';
import { containerFork, parseContainer } from '../../../packages/core/src/core/apple-single/apple-single.js';
import { openSourceCount } from '../../../packages/core/src/core/part-source/part-source.js';
import { ArchiveStateError, ValidationError } from '../../../packages/core/src/utils/errors.js';
import { MemoryArchive, type ArchiveEntry } from '../../support/memory-archive.js';
import { addVolumeFile, answerFor, containerBytes, recordingCallback, type VolumeFileSpec } from '../../test-helpers.js';

async function itemsFor(files: Record<string, VolumeFileSpec>, preserve: 'host' | 'adf' = 'host'): Promise<TransferItem[]> {
  const volume = new MemoryVolume();
  for (const [pathName, spec] of Object.entries(files)) {
    await addVolumeFile(volume, pathName, spec);
  }
  const root = volume.getVolDirEntry();
  return new TransferPlanner({ preserve }).planFileSystem(volume, [root], root);
}

function text(bytes: Uint8Array | null): string {
  return bytes ? Buffer.from(bytes).toString('latin1') : '<none>';
}

function entry(archive: MemoryArchive, name: string): ArchiveEntry {
  const found = archive.findEntry(name);
  assert.ok(found, `missing entry ${name}`);
  return found;
}

describe('ArchiveExecutor', () => {
  afterEach(() => {
    assert.equal(openSourceCount(), 0);
  });

  it('stores resource forks and types in a MacZip header', async () => {
    const items = await itemsFor({
      'dir/HELLO': { data: 'hi', rsrc: 'RS', attrs: { fileType: 0x06, auxType: 0x2000 } },
    });
    const archive = new MemoryArchive();
    const recorder = recordingCallback();

    const outcome = await new ArchiveExecutor(archive, recorder.callback).execute(items);

    assert.deepEqual(outcome, { status: 'completed' });
    assert.deepEqual(archive.entryNames(), ['dir/HELLO', '__MACOSX/dir/._HELLO']);
    const file = entry(archive, 'dir/HELLO');
    assert.equal(text(file.data), 'hi');
    assert.equal(file.fileType, 0x06);

    const headerBytes = entry(archive, '__MACOSX/dir/._HELLO').data;
    assert.ok(headerBytes);
    const header = parseContainer(headerBytes);
    assert.ok(header);
    assert.equal(header.kind, 'apple-double');
    assert.equal(header.fileName, 'HELLO');
    assert.equal(header.attrs.fileType, 0x06);
    assert.equal(header.attrs.auxType, 0x2000);
    assert.equal(text(containerFork(headerBytes, header, 'rsrc')), 'RS');

    assert.deepEqual(recorder.reasons(), [
      CallbackReason.QueryCancel,
      CallbackReason.Progress,
      CallbackReason.QueryCancel,
      CallbackReason.Progress,
    ]);
    assert.deepEqual(
      recorder.calls.filter(call => call.reason === CallbackReason.Progress).map(call => [call.part, call.progressPercent]),
      [['data', 0], ['rsrc', 50]]
    );
  });

  it('writes no header for a plain file', async () => {
    const archive = new MemoryArchive();
    await new ArchiveExecutor(archive).execute(await itemsFor({ plain: { data: 'p' } }));
    assert.deepEqual(archive.entryNames(), ['plain']);
  });

  it('asks once about a case-insensitive collision and replaces the entry on Overwrite', async () => {
    const archive = MemoryArchive.withFiles([{ path: 'readme', data: 'old' }]);
    const recorder = recordingCallback(answerFor(CallbackReason.FileNameExists, CallbackResult.Overwrite));

    const outcome = await new ArchiveExecutor(archive, recorder.callback).execute(await itemsFor({ README: { data: 'new' } }));

    assert.deepEqual(outcome, { status: 'completed' });
    assert.equal(recorder.reasons().filter(reason => reason === CallbackReason.FileNameExists).length, 1);
    const conflict = recorder.calls.find(call => call.reason === CallbackReason.FileNameExists);
    assert.equal(conflict?.origPathName, 'README');
    assert.equal(conflict?.newPathName, 'readme');
    assert.deepEqual(archive.entryNames(), ['README']);
    assert.equal(text(entry(archive, 'README').data), 'new');
  });

  it('keeps the existing entry on Skip', async () => {
    const archive = MemoryArchive.withFiles([{ path: 'readme', data: 'old' }]);
    const outcome = await new ArchiveExecutor(archive).execute(await itemsFor({ README: { data: 'new' } }));
    assert.deepEqual(outcome, { status: 'completed' });
    assert.deepEqual(archive.entryNames(), ['readme']);
    assert.equal(text(entry(archive, 'readme').data), 'old');
  });

  it('discards the whole transaction when a conflict is cancelled', async () => {
    const archive = MemoryArchive.withFiles([{ path: 'b', data: 'old' }]);
    const recorder = recordingCallback(answerFor(CallbackReason.FileNameExists, CallbackResult.Cancel));
    const outcome = await new ArchiveExecutor(archive, recorder.callback).execute(await itemsFor({ a: { data: '1' }, b: { data: '2' } }));
    assert.deepEqual(outcome, { status: 'cancelled' });
    assert.deepEqual(archive.entryNames(), ['b']);
    assert.equal(archive.inTransaction, false);
    assert.equal(archive.commitCount, 0);
  });

  it('discards the whole transaction when cancelled during the commit', async () => {
    let queries = 0;
    const recorder = recordingCallback(facts => {
      if (facts.reason === CallbackReason.QueryCancel) {
        queries++;
        return queries === 2 ? CallbackResult.Cancel : CallbackResult.Proceed;
      }
      return CallbackResult.Proceed;
    });
    const archive = new MemoryArchive();
    const items = await itemsFor({ one: { data: '1' }, two: { data: '2' }, three: { data: '3' } });

    const outcome = await new ArchiveExecutor(archive, recorder.callback).execute(items);

    assert.deepEqual(outcome, { status: 'cancelled' });
    assert.deepEqual(archive.entryNames(), []);
    assert.equal(queries, 2);
  });

  it('replaces a stale MacZip header along with its file', async () => {
    const oldHeader = containerBytes({ kind: 'apple-double', fileName: 'f', data: null, rsrc: Buffer.from('OLD') });
    const archive = MemoryArchive.withFiles([
      { path: 'f', data: 'old' },
      { path: '__MACOSX/._f', data: oldHeader },
    ]);
    const recorder = recordingCallback(answerFor(CallbackReason.FileNameExists, CallbackResult.Overwrite));

    await new ArchiveExecutor(archive, recorder.callback).execute(await itemsFor({ f: { data: 'new', rsrc: 'NEW' } }));

    assert.deepEqual(archive.entryNames(), ['f', '__MACOSX/._f']);
    const headerBytes = entry(archive, '__MACOSX/._f').data;
    assert.ok(headerBytes);
    const header = parseContainer(headerBytes);
    assert.ok(header);
    assert.equal(text(containerFork(headerBytes, header, 'rsrc')), 'NEW');
  });

  it('reports a dropped resource fork when the archive cannot hold one', async () => {
    const archive = new MemoryArchive();
    const recorder = recordingCallback();
    await new ArchiveExecutor(archive, recorder.callback, { macZip: false }).execute(
      await itemsFor({ f: { data: 'd', rsrc: 'r' } })
    );
    assert.deepEqual(archive.entryNames(), ['f']);
    const ignored = recorder.calls.filter(call => call.reason === CallbackReason.ResourceForkIgnored);
    assert.equal(ignored.length, 1);
    assert.equal(ignored[0].origPathName, 'f');
  });

  it('stores resource forks natively when the format has them', async () => {
    const archive = new MemoryArchive({ name: 'NuFX', hasResourceForks: true, supportsMacZip: false, tracksExtendedness: true });
    await new ArchiveExecutor(archive).execute(await itemsFor({ 'dir/f': { data: 'd', rsrc: 'r' } }));
    assert.deepEqual(archive.entryNames(), ['dir/f']);
    assert.equal(text(entry(archive, 'dir/f').rsrc), 'r');
  });

  it('skips names that are too long when asked to', async () => {
    const archive = new MemoryArchive({ maxPathLength: 5 });
    const recorder = recordingCallback(answerFor(CallbackReason.PathTooLong, CallbackResult.Skip));
    const outcome = await new ArchiveExecutor(archive, recorder.callback).execute(
      await itemsFor({ short: { data: 's' }, muchtoolong: { data: 'l' } })
    );
    assert.deepEqual(outcome, { status: 'completed' });
    assert.deepEqual(archive.entryNames(), ['short']);
  });

  it('cancels on a long name by default', async () => {
    const archive = new MemoryArchive({ maxPathLength: 5 });
    const outcome = await new ArchiveExecutor(archive).execute(await itemsFor({ muchtoolong: { data: 'l' } }));
    assert.deepEqual(outcome, { status: 'cancelled' });
  });

  it('keeps only leaf names when stripping paths', async () => {
    const archive = new MemoryArchive();
    await new ArchiveExecutor(archive, undefined, { stripPaths: true }).execute(await itemsFor({ 'a/b/leaf': { data: 'x' } }));
    assert.deepEqual(archive.entryNames(), ['leaf']);
  });

  it('refuses read-only archives', async () => {
    const archive = new MemoryArchive({ readOnly: true });
    await assert.rejects(new ArchiveExecutor(archive).execute([]), ArchiveStateError);
  });

  it('rejects generated items', async () => {
    const items = await itemsFor({ HELLO: { data: 'hi', rsrc: 'r' } }, 'adf');
    await assert.rejects(
      new ArchiveExecutor(new MemoryArchive()).execute(items),
      (error: unknown) => error instanceof ValidationError
        && error.message === 'Validation error: Cannot write a adf item to a volume: HELLO'
    );
  });
});

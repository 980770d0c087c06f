import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { FileSystemExecutor } from '../../../packages/core/src/core/execute/filesystem-executor.js';
import { TransferPlanner } from '../../../packages/core/src/core/plan/transfer-planner.js';
import type { TransferItem } from '../../../packages/core/src/core/plan/transfer-item.js';
import { MemoryVolume } from '../../../packages/core/src/core/memory/memory-volume.js';
import type { FileEntry, ForkWriter } from '../../../packages/core/src/core/capabilities/file-entry.js';
import type { EntryAttributes } from '../../../packages/core/src/core/attributes/file-attribs.js';
import type { FilePart } from '../../../packages/core/src/types/index.js';
import { CallbackReason, CallbackResult } from '../../../packages/core/src/core/callbacks/callback-facts.js';
import { openSourceCount } from '../../../packages/core/src/core/part-source/part-source.js';
import { ArchiveStateError, FileSystemError, StructureError, TransferError } from '../../../packages/core/src/utils/errors.js';
import { addVolumeFile, answerFor, recordingCallback, type VolumeFileSpec } from '../../test-helpers.js';

async function sourceVolume(files: Record<string, VolumeFileSpec>): Promise<MemoryVolume> {
  const volume = new MemoryVolume();
  for (const [pathName, spec] of Object.entries(files)) {
    await addVolumeFile(volume, pathName, spec);
  }
  return volume;
}

async function planAll(volume: MemoryVolume): Promise<TransferItem[]> {
  const root = volume.getVolDirEntry();
  return new TransferPlanner({ preserve: 'host' }).planFileSystem(volume, [root], root);
}

function fork(volume: MemoryVolume, pathName: string, part: FilePart = 'data'): number[] {
  const entry = volume.findPath(pathName);
  assert.ok(entry, `missing ${pathName}`);
  return [...volume.readFork(entry, part)];
}

function text(volume: MemoryVolume, pathName: string, part: FilePart = 'data'): string {
  return Buffer.from(fork(volume, pathName, part)).toString('latin1');
}

class FullVolume extends MemoryVolume {
  override async openForkForWrite(_entry: FileEntry, _part: FilePart): Promise<ForkWriter> {
    throw new FileSystemError('disk full');
  }
}

class NoAttrsVolume extends MemoryVolume {
  override async setAttributes(_entry: FileEntry, _attrs: Readonly<EntryAttributes>, _name?: string): Promise<void> {
    throw new FileSystemError('attributes rejected');
  }
}

/** Full, and unable to delete either. */
class StuckVolume extends FullVolume {
  override async deleteFile(_entry: FileEntry): Promise<void> {
    throw new FileSystemError('entry locked');
  }
}

describe('FileSystemExecutor', () => {
  afterEach(() => {
    assert.equal(openSourceCount(), 0);
  });

  it('copies a tree with both forks', async () => {
    const source = await sourceVolume({
      'a/b/c': { data: 'C', rsrc: 'R', attrs: { fileType: 0x06, auxType: 0x0800 } },
      'a/b/d': { data: 'D' },
    });
    const dest = new MemoryVolume();
    const recorder = recordingCallback();

    const outcome = await new FileSystemExecutor(dest, null, recorder.callback).execute(await planAll(source));

    assert.deepEqual(outcome, { status: 'completed' });
    assert.deepEqual(dest.listPaths(), ['a', 'a/b', 'a/b/c', 'a/b/d']);
    assert.equal(text(dest, 'a/b/c'), 'C');
    assert.equal(text(dest, 'a/b/c', 'rsrc'), 'R');
    assert.equal(text(dest, 'a/b/d'), 'D');
    const copied = dest.findPath('a/b/c');
    assert.equal(copied?.fileType, 0x06);
    assert.equal(copied?.auxType, 0x0800);
    assert.equal(dest.findPath('a/b/d')?.hasRsrcFork, false);

    assert.deepEqual(
      recorder.calls.filter(call => call.reason === CallbackReason.Progress).map(call => [call.newPathName, call.part, call.progressPercent]),
      [['a/b/c', 'data', 0], ['a/b/c', 'rsrc', 25], ['a/b/d', 'data', 50]]
    );
  });

  it('writes below the target directory', async () => {
    const dest = new MemoryVolume();
    const sub = await addVolumeFile(dest, 'sub/');
    await new FileSystemExecutor(dest, sub).execute(await planAll(await sourceVolume({ f: { data: 'x' } })));
    assert.deepEqual(dest.listPaths(), ['sub', 'sub/f']);
  });

  it('stops between files when cancelled', async () => {
    const source = await sourceVolume({ one: { data: '1' }, two: { data: '2' }, three: { data: '3' } });
    const dest = new MemoryVolume();
    const recorder = recordingCallback((facts, calls) => {
      const queries = calls.filter(call => call.reason === CallbackReason.QueryCancel).length;
      return facts.reason === CallbackReason.QueryCancel && queries === 2 ? CallbackResult.Cancel : CallbackResult.Proceed;
    });

    const outcome = await new FileSystemExecutor(dest, null, recorder.callback).execute(await planAll(source));

    assert.deepEqual(outcome, { status: 'cancelled' });
    assert.deepEqual(dest.listPaths(), ['one']);
  });

  describe('existing files', () => {
    async function collide(answer: CallbackResult): Promise<{ dest: MemoryVolume; outcome: unknown; asked: number }> {
      const dest = new MemoryVolume();
      await addVolumeFile(dest, 'file', { data: 'old' });
      const recorder = recordingCallback(answerFor(CallbackReason.FileNameExists, answer));
      const outcome = await new FileSystemExecutor(dest, null, recorder.callback).execute(
        await planAll(await sourceVolume({ FILE: { data: 'new' } }))
      );
      const asked = recorder.reasons().filter(reason => reason === CallbackReason.FileNameExists).length;
      return { dest, outcome, asked };
    }

    it('replaces the file on Overwrite', async () => {
      const { dest, outcome, asked } = await collide(CallbackResult.Overwrite);
      assert.deepEqual(outcome, { status: 'completed' });
      assert.equal(asked, 1);
      assert.deepEqual(dest.listPaths(), ['FILE']);
      assert.equal(text(dest, 'FILE'), 'new');
    });

    it('keeps the file on Skip', async () => {
      const { dest, outcome } = await collide(CallbackResult.Skip);
      assert.deepEqual(outcome, { status: 'completed' });
      assert.deepEqual(dest.listPaths(), ['file']);
      assert.equal(text(dest, 'file'), 'old');
    });

    it('stops on Cancel', async () => {
      const { dest, outcome } = await collide(CallbackResult.Cancel);
      assert.deepEqual(outcome, { status: 'cancelled' });
      assert.equal(text(dest, 'file'), 'old');
    });
  });

  describe('structural conflicts', () => {
    it('will not replace a directory with a file', async () => {
      const dest = new MemoryVolume();
      await addVolumeFile(dest, 'x/');
      await assert.rejects(
        new FileSystemExecutor(dest).execute(await planAll(await sourceVolume({ x: { data: 'f' } }))),
        (error: unknown) => error instanceof StructureError && error.message === "Cannot replace directory 'x' with a file"
      );
    });

    it('will not overwrite a file with itself', async () => {
      const volume = await sourceVolume({ f: { data: 'same' } });
      const recorder = recordingCallback(answerFor(CallbackReason.FileNameExists, CallbackResult.Overwrite));
      await assert.rejects(
        new FileSystemExecutor(volume, null, recorder.callback).execute(await planAll(volume)),
        (error: unknown) => error instanceof StructureError && error.message === "Cannot overwrite 'f' with itself"
      );
      assert.equal(text(volume, 'f'), 'same');
    });

    it('will not descend through a file', async () => {
      const dest = new MemoryVolume();
      await addVolumeFile(dest, 'a', { data: 'plain' });
      await assert.rejects(
        new FileSystemExecutor(dest).execute(await planAll(await sourceVolume({ 'a/b': { data: 'x' } }))),
        (error: unknown) => error instanceof StructureError
          && error.message === "Path component 'a' (a) of 'a' is not a directory"
      );
    });
  });

  it('converts text for a DOS volume', async () => {
    const source = await sourceVolume({
      NOTE: { data: new Uint8Array([0x41, 0x42, 0x0d]), attrs: { fileType: 0x04 } },
      CODE: { data: new Uint8Array([0x41, 0x00]), attrs: { fileType: 0x06 } },
    });
    const dest = new MemoryVolume({ isDOS: true });
    const recorder = recordingCallback();

    await new FileSystemExecutor(dest, null, recorder.callback, { convertDOSText: true }).execute(await planAll(source));

    assert.deepEqual(fork(dest, 'NOTE'), [0xc1, 0xc2, 0x8d]);
    assert.deepEqual(fork(dest, 'CODE'), [0x41, 0x00]);
    assert.deepEqual(
      recorder.calls.filter(call => call.reason === CallbackReason.Progress).map(call => call.dosConv),
      ['to-dos', 'none']
    );
  });

  it('strips the high bit when copying text off a DOS volume', async () => {
    const source = new MemoryVolume({ isDOS: true });
    await addVolumeFile(source, 'NOTE', { data: new Uint8Array([0xc1, 0x8d]), attrs: { fileType: 0x04 } });
    const dest = new MemoryVolume();
    await new FileSystemExecutor(dest, null, undefined, { convertDOSText: true }).execute(await planAll(source));
    assert.deepEqual(fork(dest, 'NOTE'), [0x41, 0x0d]);
  });

  it('reports a resource fork the target cannot hold', async () => {
    const dest = new MemoryVolume({ hasResourceForks: false });
    const recorder = recordingCallback();
    await new FileSystemExecutor(dest, null, recorder.callback).execute(
      await planAll(await sourceVolume({ f: { data: 'd', rsrc: 'r' } }))
    );
    assert.equal(text(dest, 'f'), 'd');
    assert.equal(dest.findPath('f')?.hasRsrcFork, false);
    const ignored = recorder.calls.filter(call => call.reason === CallbackReason.ResourceForkIgnored);
    assert.deepEqual(ignored.map(call => call.origPathName), ['f']);
  });

  it('encodes ProDOS types for an HFS-only target', async () => {
    const dest = new MemoryVolume({ hfsTypesOnly: true });
    await new FileSystemExecutor(dest).execute(
      await planAll(await sourceVolume({ BIN: { data: 'b', attrs: { fileType: 0x06, auxType: 0x2000 } } }))
    );
    const entry = dest.findPath('BIN');
    assert.equal(entry?.hfsFileType, 0x70062000);
    assert.equal(entry?.hfsCreator, 0x70646f73);
  });

  it('removes a partially written file', async () => {
    const dest = new FullVolume();
    await assert.rejects(
      new FileSystemExecutor(dest).execute(await planAll(await sourceVolume({ f: { data: 'x' } }))),
      (error: unknown) => error instanceof TransferError
        && error.message === "Failed to write data fork of 'f': File system error: disk full"
    );
    assert.deepEqual(dest.listPaths(), []);
  });

  it('deletes the new entry when its attributes cannot be set', async () => {
    const dest = new NoAttrsVolume();
    await assert.rejects(
      new FileSystemExecutor(dest).execute(await planAll(await sourceVolume({ f: { data: 'x' } }))),
      (error: unknown) => error instanceof TransferError
        && error.message === "Failed to set attributes of 'f': File system error: attributes rejected"
    );
    assert.deepEqual(dest.listPaths(), []);
  });

  it('reports the write failure when the partial entry cannot be deleted', async () => {
    const dest = new StuckVolume();
    await assert.rejects(
      new FileSystemExecutor(dest).execute(await planAll(await sourceVolume({ f: { data: 'x' } }))),
      (error: unknown) => error instanceof TransferError
        && error.message === "Failed to write data fork of 'f': File system error: disk full"
    );
    assert.deepEqual(dest.listPaths(), ['f']);
  });

  it('refuses a read-only target', async () => {
    await assert.rejects(
      new FileSystemExecutor(new MemoryVolume({ readOnly: true })).execute([]),
      (error: unknown) => error instanceof ArchiveStateError && error.message === 'Target filesystem is read-only'
    );
  });

  it('flattens paths on a volume without directories', async () => {
    const dest = new MemoryVolume({ isHierarchical: false });
    await new FileSystemExecutor(dest).execute(
      await planAll(await sourceVolume({ 'a/b/c': { data: 'c' }, 'a/d': { data: 'd' } }))
    );
    assert.deepEqual(dest.listPaths(), ['c', 'd']);
  });
});

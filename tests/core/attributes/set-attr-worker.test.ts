import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  applyAttrEdits,
  SetAttrWorker,
  validateAttrEdits
} from '../../../packages/core/src/core/attributes/set-attr-worker.js';
import { containerFork, readContainer } from '../../../packages/core/src/core/apple-single/apple-single.js';
import { MemoryVolume } from '../../../packages/core/src/core/memory/memory-volume.js';
import type { FileEntry } from '../../../packages/core/src/core/capabilities/file-entry.js';
import {
  CallbackReason,
  CallbackResult,
  CANCELLED,
  COMPLETED,
  FAILED
} from '../../../packages/core/src/core/callbacks/callback-facts.js';
import { ValidationError } from '../../../packages/core/src/utils/errors.js';
import { ArchiveEntry, MemoryArchive } from '../../support/memory-archive.js';
import { addVolumeFile, answerFor, attrsOf, containerBytes, recordingCallback } from '../../test-helpers.js';

function entryNamed(archive: MemoryArchive, name: string): ArchiveEntry {
  const entry = archive.findEntry(name);
  assert.ok(entry, `missing ${name}`);
  return entry;
}

describe('validateAttrEdits', () => {
  it('accepts values inside each field', () => {
    assert.doesNotThrow(() => validateAttrEdits({ fileType: 0xff, auxType: 0xffff, hfsCreator: 0xffffffff, access: 0 }));
  });

  it('rejects a file type wider than a byte', () => {
    assert.throws(
      () => validateAttrEdits({ fileType: 0x100 }),
      { message: 'Validation error: fileType must be an integer from 0 to 255, got 256' }
    );
  });

  it('rejects a fractional aux type', () => {
    assert.throws(() => validateAttrEdits({ auxType: 1.5 }), ValidationError);
  });

  it('rejects an unusable date', () => {
    assert.throws(() => validateAttrEdits({ modWhen: new Date(Number.NaN) }), { message: 'Validation error: Invalid date' });
  });
});

describe('applyAttrEdits', () => {
  it('keeps fields that are not edited and clears a null date', () => {
    const when = new Date(2001, 2, 3, 4, 5);
    const current = attrsOf({ fileType: 0x04, auxType: 0x2000, createWhen: when, modWhen: when });

    assert.deepEqual(
      applyAttrEdits(current, { fileType: 0x06, modWhen: null }),
      attrsOf({ fileType: 0x06, auxType: 0x2000, createWhen: when, modWhen: null })
    );
  });
});

describe('SetAttrWorker', () => {
  describe('setInFileSystem', () => {
    it('changes the edited fields of each entry', async () => {
      const volume = new MemoryVolume();
      const a = await addVolumeFile(volume, 'a', { data: 'a', attrs: { fileType: 0x04, hfsCreator: 0x70646f73 } });
      const b = await addVolumeFile(volume, 'b', { data: 'b' });
      const recorder = recordingCallback();

      const outcome = await new SetAttrWorker(recorder.callback)
        .setInFileSystem(volume, [a, b], { fileType: 0x06, auxType: 0x2000 });

      assert.deepEqual(outcome, COMPLETED);
      assert.equal(a.fileType, 0x06);
      assert.equal(a.auxType, 0x2000);
      assert.equal(a.hfsCreator, 0x70646f73);
      assert.equal(b.fileType, 0x06);
      assert.deepEqual(
        recorder.calls
          .filter(call => call.reason === CallbackReason.Progress)
          .map(call => [call.origPathName, call.progressPercent]),
        [
          ['a', 0],
          ['b', 50],
        ]
      );
    });

    it('stops at an entry the filesystem refuses', async () => {
      const volume = new MemoryVolume();
      const other = new MemoryVolume();
      const a = await addVolumeFile(volume, 'a', { data: 'a' });
      const stranger = await addVolumeFile(other, 'x', { data: 'x' });
      const recorder = recordingCallback();

      const outcome = await new SetAttrWorker(recorder.callback).setInFileSystem(volume, [a, stranger], { access: 0x01 });

      assert.deepEqual(outcome, FAILED);
      assert.equal(a.access, 0x01);
      const failure = recorder.calls.find(call => call.reason === CallbackReason.Failure);
      assert.equal(
        failure?.failMessage,
        "Unable to set attributes on 'x': File system error: Entry does not belong to this volume: x"
      );
    });

    it('checks the edits before touching anything', async () => {
      const volume = new MemoryVolume();
      const a = await addVolumeFile(volume, 'a', { data: 'a', attrs: { fileType: 0x04 } });

      await assert.rejects(new SetAttrWorker().setInFileSystem(volume, [a], { access: 0x100 }), ValidationError);
      assert.equal(a.access, 0xc3);
    });

    it('stops when asked to cancel', async () => {
      const volume = new MemoryVolume();
      const a = await addVolumeFile(volume, 'a', { data: 'a' });
      const recorder = recordingCallback(answerFor(CallbackReason.QueryCancel, CallbackResult.Cancel));

      const outcome = await new SetAttrWorker(recorder.callback).setInFileSystem(volume, [a], { fileType: 0x06 });

      assert.deepEqual(outcome, CANCELLED);
      assert.equal(a.fileType, 0);
    });
  });

  describe('setInArchive', () => {
    const header = containerBytes({
      kind: 'apple-double',
      fileName: '',
      attrs: { fileType: 0x04, auxType: 0x2000 },
      data: null,
      rsrc: Buffer.from('RS', 'latin1'),
    });

    function sampleArchive(): MemoryArchive {
      return MemoryArchive.withFiles([
        { path: 'f', data: 'f', attrs: { fileType: 0x04 } },
        { path: '__MACOSX/._f', data: header },
        { path: 'g', data: 'g' },
      ]);
    }

    it('edits entries in one transaction', async () => {
      const archive = sampleArchive();

      const outcome = await new SetAttrWorker().setInArchive(archive, [entryNamed(archive, 'f')], { fileType: 0x06 });

      assert.deepEqual(outcome, COMPLETED);
      assert.equal(entryNamed(archive, 'f').fileType, 0x06);
      assert.equal(archive.commitCount, 1);
    });

    it('rewrites the MacZip header instead of the file', async () => {
      const archive = sampleArchive();
      const worker = new SetAttrWorker(undefined, { macZip: true });

      const outcome = await worker.setInArchive(
        archive,
        [entryNamed(archive, 'f'), entryNamed(archive, '__MACOSX/._f')],
        { auxType: 0x0801 }
      );

      assert.deepEqual(outcome, COMPLETED);
      assert.deepEqual(archive.entryNames(), ['f', 'g', '__MACOSX/._f']);
      assert.equal(entryNamed(archive, 'f').auxType, 0);
      const rebuilt = entryNamed(archive, '__MACOSX/._f').data;
      assert.ok(rebuilt);
      const parsed = readContainer(rebuilt, 'header');
      assert.equal(parsed.kind, 'apple-double');
      assert.equal(parsed.attrs.fileType, 0x04);
      assert.equal(parsed.attrs.auxType, 0x0801);
      const rsrc = containerFork(rebuilt, parsed, 'rsrc');
      assert.ok(rsrc);
      assert.equal(Buffer.from(rsrc).toString('latin1'), 'RS');
    });

    it('rolls back every edit when one fails', async () => {
      const archive = sampleArchive();
      const recorder = recordingCallback();
      const stranger: FileEntry = new ArchiveEntry('stranger', '/');

      const outcome = await new SetAttrWorker(recorder.callback)
        .setInArchive(archive, [entryNamed(archive, 'f'), stranger], { fileType: 0x06 });

      assert.deepEqual(outcome, FAILED);
      assert.equal(archive.inTransaction, false);
      assert.equal(entryNamed(archive, 'f').fileType, 0x04);
      const failure = recorder.calls.find(call => call.reason === CallbackReason.Failure);
      assert.equal(
        failure?.failMessage,
        'Unable to set attributes in archive: File system error: Entry does not belong to this archive: stranger'
      );
    });
  });
});

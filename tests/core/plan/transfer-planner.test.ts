import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TransferPlanner } from '../../../packages/core/src/core/plan/transfer-planner.js';
import { isRawForkItem, type TransferItem } from '../../../packages/core/src/core/plan/transfer-item.js';
import { MemoryVolume } from '../../../packages/core/src/core/memory/memory-volume.js';
import { CallbackReason } from '../../../packages/core/src/core/callbacks/callback-facts.js';
import type { LogicalFileRecord } from '../../../packages/core/src/core/classify/logical-file-record.js';
import { MemoryArchive } from '../../support/memory-archive.js';
import { addVolumeFile, containerBytes, recordingCallback } from '../../test-helpers.js';

function summary(items: readonly TransferItem[]): string[] {
  return items.map(item => `${item.part}:${item.extractPath}${item.attrs.isDirectory ? ' (dir)' : ''}`);
}

describe('TransferPlanner.planArchive', () => {
  it('synthesizes each directory once from file paths', async () => {
    const archive = MemoryArchive.withFiles([
      { path: 'a/b/c', data: 'c' },
      { path: 'a/b/d', data: 'd' },
      { path: 'top', data: 't' },
    ]);
    const items = await new TransferPlanner({ preserve: 'none' }).planArchive(archive);
    assert.deepEqual(summary(items), [
      'data:a (dir)',
      'data:a/b (dir)',
      'data:a/b/c',
      'data:a/b/d',
      'data:top',
    ]);
    assert.equal(items[0].origin.kind, 'archive');
  });

  it('reads types and the resource fork length from MacZip headers', async () => {
    const header = containerBytes({
      kind: 'apple-double',
      fileName: 'file',
      attrs: { fileType: 0x06, auxType: 0x2000 },
      data: null,
      rsrc: Buffer.from('RS'),
    });
    const archive = MemoryArchive.withFiles([
      { path: 'dir/file', data: 'D' },
      { path: '__MACOSX/dir/._file', data: header },
    ]);
    const items = await new TransferPlanner({ preserve: 'adf' }).planArchive(archive);
    assert.deepEqual(summary(items), ['data:dir (dir)', 'data:dir/file', 'rsrc:dir/._file']);
    const rsrc = items[2];
    assert.equal(rsrc.attrs.fileType, 0x06);
    assert.equal(rsrc.attrs.rsrcLength, 2);
    assert.equal(isRawForkItem(rsrc), false);
    assert.ok(rsrc.origin.kind === 'archive' && rsrc.origin.adfEntry?.fullPathName === '__MACOSX/dir/._file');
  });

  it('reports unreadable MacZip headers and carries on without them', async () => {
    const archive = MemoryArchive.withFiles([
      { path: 'f', data: 'F' },
      { path: '__MACOSX/._f', data: 'garbage' },
    ]);
    const recorder = recordingCallback();
    const items = await new TransferPlanner({ preserve: 'none' }, recorder.callback).planArchive(archive);
    assert.deepEqual(summary(items), ['data:f']);
    assert.deepEqual(recorder.reasons(), [CallbackReason.Failure]);
    assert.equal(recorder.calls[0].failMessage, "Unable to get ADF attrs for 'f': not an AppleDouble header");
    assert.ok(items[0].origin.kind === 'archive' && items[0].origin.adfEntry === null);
  });

  it('lists MacZip headers as ordinary files when MacZip is off', async () => {
    const archive = MemoryArchive.withFiles([
      { path: 'f', data: 'F' },
      { path: '__MACOSX/._f', data: 'x' },
    ]);
    const items = await new TransferPlanner({ preserve: 'none', macZip: false }).planArchive(archive);
    assert.deepEqual(summary(items), ['data:f', 'data:__MACOSX (dir)', 'data:__MACOSX/._f']);
  });
});

describe('TransferPlanner.planFileSystem', () => {
  async function volumeWithFiles(): Promise<MemoryVolume> {
    const volume = new MemoryVolume();
    await addVolumeFile(volume, 'HELLO', { data: 'hi', rsrc: 'r', attrs: { fileType: 0x06, auxType: 0x2000 } });
    await addVolumeFile(volume, 'README', { data: 'text', attrs: { fileType: 0x04 } });
    await addVolumeFile(volume, 'PLAIN', { data: 'p' });
    await addVolumeFile(volume, 'sub/What?', { data: 'q' });
    return volume;
  }

  async function plan(preserve: 'none' | 'adf' | 'as' | 'host' | 'naps', extra: { napsExtension?: boolean; stripPaths?: boolean } = {}): Promise<string[]> {
    const volume = await volumeWithFiles();
    const root = volume.getVolDirEntry();
    return summary(await new TransferPlanner({ preserve, ...extra }).planFileSystem(volume, [root], root));
  }

  it('tags NAPS names with types and a resource marker', async () => {
    assert.deepEqual(await plan('naps', { napsExtension: true }), [
      'data:HELLO#062000',
      'rsrc:HELLO#062000r',
      'data:README#040000.txt',
      'data:PLAIN#000000',
      'data:sub (dir)',
      'data:sub/What%3f#000000',
    ]);
  });

  it('adds an AppleDouble item only for files with a resource fork or types', async () => {
    assert.deepEqual(await plan('adf'), [
      'data:HELLO',
      'rsrc:._HELLO',
      'data:README',
      'rsrc:._README',
      'data:PLAIN',
      'data:sub (dir)',
      'data:sub/What_',
    ]);
  });

  it('emits one AppleSingle item per file', async () => {
    assert.deepEqual(await plan('as'), [
      'data:HELLO.as',
      'data:README.as',
      'data:PLAIN.as',
      'data:sub (dir)',
      'data:sub/What_.as',
    ]);
  });

  it('uses the named-fork path in host mode', async () => {
    assert.deepEqual((await plan('host')).slice(0, 2), ['data:HELLO', 'rsrc:HELLO/..namedfork/rsrc']);
  });

  it('drops resource forks in none mode and keeps only leaf names when stripping paths', async () => {
    assert.deepEqual(await plan('none', { stripPaths: true }), ['data:HELLO', 'data:README', 'data:PLAIN', 'data:What_']);
  });

  it('reports each resource fork that none mode drops', async () => {
    const volume = new MemoryVolume();
    await addVolumeFile(volume, 'BOTH', { data: 'd', rsrc: 'r' });
    await addVolumeFile(volume, 'DATA', { data: 'd' });
    const recorder = recordingCallback();
    const root = volume.getVolDirEntry();
    const items = await new TransferPlanner({ preserve: 'none' }, recorder.callback).planFileSystem(volume, [root], root);

    assert.deepEqual(summary(items), ['data:BOTH', 'data:DATA']);
    assert.deepEqual(recorder.reasons(), [CallbackReason.ResourceForkIgnored]);
    assert.equal(recorder.calls[0].origPathName, 'BOTH');
    assert.equal(recorder.calls[0].part, 'rsrc');
  });

  it('reports a file that is only a resource fork even though none mode emits nothing for it', async () => {
    const header = containerBytes({ kind: 'apple-double', fileName: 'R', data: null, rsrc: Buffer.from('RS') });
    const archive = MemoryArchive.withFiles([
      { path: 'R' },
      { path: '__MACOSX/._R', data: header },
    ]);
    const [entry] = archive.entries();
    entry.data = null;
    const recorder = recordingCallback();

    const items = await new TransferPlanner({ preserve: 'none' }, recorder.callback).planArchive(archive);
    assert.deepEqual(items, []);
    assert.deepEqual(recorder.reasons(), [CallbackReason.ResourceForkIgnored]);
    assert.equal(recorder.calls[0].origPathName, 'R');

    const kept = recordingCallback();
    const napsItems = await new TransferPlanner({ preserve: 'naps' }, kept.callback).planArchive(archive);
    assert.deepEqual(summary(napsItems), ['rsrc:R#000000r']);
    assert.deepEqual(kept.reasons(), []);
  });

  it('plans a selection relative to a boundary directory', async () => {
    const volume = new MemoryVolume();
    await addVolumeFile(volume, 'top/mid/leaf', { data: 'x' });
    const top = volume.findPath('top');
    assert.ok(top);
    const items = await new TransferPlanner({ preserve: 'none' }).planFileSystem(volume, [top], top);
    assert.deepEqual(summary(items), ['data:mid (dir)', 'data:mid/leaf']);
  });

  it('does not repeat directories across plans made by one planner', async () => {
    const volume = new MemoryVolume();
    const first = await addVolumeFile(volume, 'd/one', { data: '1' });
    const second = await addVolumeFile(volume, 'd/two', { data: '2' });
    const root = volume.getVolDirEntry();
    const planner = new TransferPlanner({ preserve: 'none' });
    assert.deepEqual(summary(await planner.planFileSystem(volume, [first], root)), ['data:d (dir)', 'data:d/one']);
    assert.deepEqual(summary(await planner.planFileSystem(volume, [second], root)), ['data:d/two']);
  });

  it('skips damaged entries with a Failure callback', async () => {
    const volume = new MemoryVolume();
    const bad = await addVolumeFile(volume, 'bad', { data: 'x' });
    bad.isDamaged = true;
    const recorder = recordingCallback();
    const root = volume.getVolDirEntry();
    const items = await new TransferPlanner({ preserve: 'none' }, recorder.callback).planFileSystem(volume, [root], root);
    assert.deepEqual(items, []);
    assert.equal(recorder.calls[0].failMessage, "Skipping damaged entry 'bad'");
  });
});

describe('TransferPlanner.planRecords', () => {
  function record(storageDir: string, storageName: string, overrides: Partial<LogicalFileRecord> = {}): LogicalFileRecord {
    return {
      key: `/host/${storageDir}/${storageName}`,
      isDirectory: false,
      dataFork: { kind: 'plain', hostPath: `/host/${storageDir}/${storageName}` },
      rsrcFork: null,
      fileType: 0,
      auxType: 0,
      hfsFileType: 0,
      hfsCreator: 0,
      access: 0xc3,
      createWhen: null,
      modWhen: null,
      storageDir,
      storageDirSep: '/',
      storageName,
      hasADFAttribs: false,
      ...overrides,
    };
  }

  it('carries both forks natively and synthesizes missing directories', () => {
    const records = [
      record('', 'a', { isDirectory: true, dataFork: null }),
      record('a/b', 'f', {
        rsrcFork: { kind: 'apple-double', hostPath: '/host/a/b/._f' },
        fileType: 0x06,
      }),
    ];
    const items = new TransferPlanner().planRecords(records);
    assert.deepEqual(summary(items), ['data:a (dir)', 'data:a/b (dir)', 'data:a/b/f', 'rsrc:a/b/f']);
    assert.ok(items.every(item => item.preserve === 'host'));
    assert.equal(items[2].attrs.fullPathName, 'a/b/f');
    assert.equal(items[3].attrs.fileType, 0x06);
    assert.ok(items[3].origin.kind === 'host' && items[3].origin.source?.kind === 'apple-double');
  });

  it('uses the storage name alone when stripping paths', () => {
    const items = new TransferPlanner({ stripPaths: true }).planRecords([record('x/y', 'leaf')]);
    assert.deepEqual(summary(items), ['data:leaf']);
    assert.equal(items[0].attrs.fullPathName, 'leaf');
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DirectorySynthesizer, relativeEntryPath } from '../../../packages/core/src/core/plan/directory-synthesizer.js';
import { MemoryVolume } from '../../../packages/core/src/core/memory/memory-volume.js';
import { addVolumeFile } from '../../test-helpers.js';

describe('DirectorySynthesizer', () => {
  it('emits each ancestor of a path once, root first', () => {
    const synth = new DirectorySynthesizer();
    assert.deepEqual(synth.ancestorsOfPath('a/b/c.txt', '/'), ['a', 'a/b']);
    assert.deepEqual(synth.ancestorsOfPath('a/b/d.txt', '/'), []);
    assert.deepEqual(synth.ancestorsOfPath('a/e/f', '/'), ['a/e']);
    assert.equal(synth.has('a/b'), true);
    assert.equal(synth.has('a/b/c.txt'), false);
  });

  it('remembers paths case-sensitively', () => {
    const synth = new DirectorySynthesizer();
    assert.deepEqual(synth.ancestorsOfPath('Dir/x', '/'), ['Dir']);
    assert.deepEqual(synth.ancestorsOfPath('DIR/y', '/'), ['DIR']);
  });

  it('has no ancestors for flat names', () => {
    assert.deepEqual(new DirectorySynthesizer().ancestorsOfPath('a/b', ''), []);
  });

  it('claims a path only once', () => {
    const synth = new DirectorySynthesizer();
    assert.equal(synth.claim('x'), true);
    assert.equal(synth.claim('x'), false);
  });

  it('walks entry ancestors below a boundary', async () => {
    const volume = new MemoryVolume();
    const file = await addVolumeFile(volume, 'a/b/c', { data: 'c' });
    const a = volume.findPath('a');
    assert.ok(a);

    const full = new DirectorySynthesizer().ancestorsOfEntry(file, null, '/');
    assert.deepEqual(full.map(dir => dir.path), ['a', 'a/b']);
    assert.equal(full[0].entry, a);

    const below = new DirectorySynthesizer().ancestorsOfEntry(file, a, '/');
    assert.deepEqual(below.map(dir => dir.path), ['b']);
  });

  it('builds paths relative to a boundary', async () => {
    const volume = new MemoryVolume({ dirSep: ':' });
    const file = await addVolumeFile(volume, 'a:b:c', { data: 'c' });
    const a = volume.findPath('a');
    assert.equal(relativeEntryPath(file, null, ':'), 'a:b:c');
    assert.equal(relativeEntryPath(file, a, '/'), 'b/c');
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  generateMacZipName,
  isMacZipHeader,
  macZipPrimaryName,
} from '../../../packages/core/src/core/naming/mac-zip.js';

describe('MacZip header names', () => {
  it('places the header under __MACOSX beside the primary path', () => {
    assert.equal(generateMacZipName('dir/sub/name'), '__MACOSX/dir/sub/._name');
    assert.equal(generateMacZipName('top'), '__MACOSX/._top');
  });

  it('recognizes header entries', () => {
    assert.equal(isMacZipHeader('__MACOSX/dir/._name'), true);
    assert.equal(isMacZipHeader('__MACOSX/dir/name'), false);
    assert.equal(isMacZipHeader('__MACOSX/._'), false);
    assert.equal(isMacZipHeader('dir/._name'), false);
  });

  it('maps a header back to its primary entry', () => {
    assert.equal(macZipPrimaryName('__MACOSX/dir/._name'), 'dir/name');
    assert.equal(macZipPrimaryName('__MACOSX/._top'), 'top');
    assert.equal(macZipPrimaryName('plain'), null);
  });
});

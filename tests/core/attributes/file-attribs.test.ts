import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  FileAttribs,
  accessFor,
  fourCCToString,
  isLocked,
  proDOSFromHFS,
  proDOSToHFS,
  stringToFourCC,
} from '../../../packages/core/src/core/attributes/file-attribs.js';
import {
  fromAS2KTime,
  fromHFSTime,
  fromProDOSTime,
  toAS2KTime,
  toHFSTime,
  toProDOSTime,
} from '../../../packages/core/src/core/attributes/time-stamp.js';
import { HFS_CREATORS, HFS_TYPES } from '../../../packages/core/src/constants/index.js';

describe('ProDOS and HFS type mapping', () => {
  it('encodes generic ProDOS types in a p-type', () => {
    assert.deepEqual(proDOSToHFS(0x06, 0x2000), { hfsFileType: 0x70062000, hfsCreator: HFS_CREATORS.PDOS });
    assert.deepEqual(proDOSFromHFS(0x70062000, HFS_CREATORS.PDOS), { fileType: 0x06, auxType: 0x2000, isProDOS: true });
  });

  it('uses the well-known HFS types', () => {
    assert.equal(proDOSToHFS(0x04, 0).hfsFileType, HFS_TYPES.TEXT);
    assert.equal(proDOSToHFS(0xff, 0x1234).hfsFileType, HFS_TYPES.PSYS);
    assert.deepEqual(proDOSToHFS(0xe0, 0x0005), { hfsFileType: HFS_TYPES.DIMG, hfsCreator: HFS_CREATORS.DCPY });
  });

  it('only lets pdos-created files override ProDOS types', () => {
    assert.deepEqual(proDOSFromHFS(HFS_TYPES.TEXT, 0x74747874), { fileType: 0x04, auxType: 0, isProDOS: false });
    assert.deepEqual(proDOSFromHFS(0x30342020, HFS_CREATORS.PDOS), { fileType: 0x04, auxType: 0, isProDOS: true });
  });

  it('formats and parses four-character codes', () => {
    assert.equal(fourCCToString(0x54455854), 'TEXT');
    assert.equal(fourCCToString(0x41000042), 'A..B');
    assert.equal(stringToFourCC('ab'), 0x61622020);
    assert.throws(() => stringToFourCC('abcde'), RangeError);
  });
});

describe('FileAttribs', () => {
  it('derives ProDOS types from pdos HFS types when copying', () => {
    const attrs = new FileAttribs();
    attrs.copyAttrsFrom({
      fileType: 0,
      auxType: 0,
      hfsFileType: 0x70062000,
      hfsCreator: HFS_CREATORS.PDOS,
      access: 0x01,
      createWhen: new Date(Number.NaN),
      modWhen: new Date('2020-05-06T07:08:09Z'),
    });
    assert.equal(attrs.fileType, 0x06);
    assert.equal(attrs.auxType, 0x2000);
    assert.equal(attrs.access, 0x01);
    assert.equal(attrs.createWhen, null);
    assert.equal(attrs.modWhen?.toISOString(), '2020-05-06T07:08:09.000Z');
  });

  it('takes frozen snapshots with their own dates', () => {
    const attrs = new FileAttribs();
    attrs.fullPathName = 'A:B';
    attrs.modWhen = new Date('2021-01-01T00:00:00Z');
    const snap = attrs.snapshot();
    attrs.modWhen.setUTCFullYear(1999);
    assert.ok(Object.isFrozen(snap));
    assert.equal(snap.fullPathName, 'A:B');
    assert.equal(snap.modWhen?.toISOString(), '2021-01-01T00:00:00.000Z');
  });

  it('maps the lock flag to access values', () => {
    assert.equal(accessFor(true), 0x01);
    assert.equal(accessFor(false), 0xc3);
    assert.equal(isLocked(0x01), true);
    assert.equal(isLocked(0xc3), false);
  });
});

describe('timestamps', () => {
  it('converts AppleSingle dates', () => {
    assert.equal(fromAS2KTime(0)?.toISOString(), '2000-01-01T00:00:00.000Z');
    assert.equal(fromAS2KTime(-0x80000000), null);
    assert.equal(toAS2KTime(null), -0x80000000);
    assert.equal(toAS2KTime(new Date('2000-01-01T00:01:00Z')), 60);
  });

  it('converts ProDOS dates in local time', () => {
    assert.deepEqual(toProDOSTime(new Date(1999, 11, 31, 23, 59)), { date: 51103, time: 5947 });
    assert.deepEqual(toProDOSTime(new Date(2030, 0, 2, 3, 4)), { date: 15394, time: 772 });
    assert.equal(fromProDOSTime(51103, 5947)?.getTime(), new Date(1999, 11, 31, 23, 59).getTime());
    assert.equal(fromProDOSTime(15394, 772)?.getFullYear(), 2030);
  });

  it('rejects missing and impossible ProDOS dates', () => {
    assert.equal(fromProDOSTime(0, 0), null);
    // February 30th, 2001
    assert.equal(fromProDOSTime(51806, 0), null);
  });

  it('round-trips HFS dates', () => {
    assert.equal(fromHFSTime(0), null);
    assert.equal(toHFSTime(fromHFSTime(3000000000)), 3000000000);
    assert.equal(toHFSTime(null), 0);
  });
});

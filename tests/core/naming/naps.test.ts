import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  generateNapsTag,
  matchNapsName,
  napsConvenienceExtension,
  parseNapsTag,
} from '../../../packages/core/src/core/naming/naps.js';
import type { EntryAttributes } from '../../../packages/core/src/core/attributes/file-attribs.js';

function attrs(overrides: Partial<EntryAttributes>): EntryAttributes {
  return {
    fileType: 0,
    auxType: 0,
    hfsFileType: 0,
    hfsCreator: 0,
    access: 0xc3,
    createWhen: null,
    modWhen: null,
    ...overrides,
  };
}

describe('matchNapsName', () => {
  it('splits a ProDOS tag and its host extension', () => {
    assert.deepEqual(matchNapsName('TEXTFILE#040000.txt'), {
      storageName: 'TEXTFILE',
      tag: '#040000',
      extension: '.txt',
    });
  });

  it('keeps the fork marker in the tag', () => {
    assert.deepEqual(matchNapsName('GSHK#b3db07r'), {
      storageName: 'GSHK',
      tag: '#b3db07r',
      extension: '',
    });
  });

  it('matches the 16-digit HFS form', () => {
    const match = matchNapsName('Doc#5445585474747874');
    assert.equal(match?.storageName, 'Doc');
    assert.equal(match?.tag, '#5445585474747874');
  });

  it('returns null for untagged names', () => {
    assert.equal(matchNapsName('plain.txt'), null);
    assert.equal(matchNapsName('odd#12345'), null);
  });
});

describe('parseNapsTag', () => {
  it('decodes a 6-digit tag with a resource marker', () => {
    assert.deepEqual(parseNapsTag('#b3db07r'), {
      typeValue: 0xb3,
      auxValue: 0xdb07,
      isLong: false,
      marker: 'r',
    });
  });

  it('decodes a 16-digit tag without a marker', () => {
    assert.deepEqual(parseNapsTag('#5445585474747874'), {
      typeValue: 0x54455854,
      auxValue: 0x74747874,
      isLong: true,
      marker: '',
    });
  });

  it('treats marker case as insignificant', () => {
    assert.equal(parseNapsTag('#062000D').marker, 'd');
  });
});

describe('generateNapsTag', () => {
  it('uses the ProDOS form when a ProDOS type is set', () => {
    const bin = attrs({ fileType: 0x06, auxType: 0x2000 });
    assert.equal(generateNapsTag(bin, 'data'), '#062000');
    assert.equal(generateNapsTag(bin, 'rsrc'), '#062000r');
  });

  it('uses the HFS form when only HFS types are set', () => {
    const doc = attrs({ hfsFileType: 0x54455854, hfsCreator: 0x74747874 });
    assert.equal(generateNapsTag(doc, 'data'), '#5445585474747874');
  });

  it('round-trips through parseNapsTag', () => {
    const tag = generateNapsTag(attrs({ fileType: 0xc1, auxType: 0x0002 }), 'rsrc');
    assert.deepEqual(parseNapsTag(tag), { typeValue: 0xc1, auxValue: 0x0002, isLong: false, marker: 'r' });
  });
});

describe('napsConvenienceExtension', () => {
  it('adds .txt only for text files', () => {
    assert.equal(napsConvenienceExtension(attrs({ fileType: 0x04 })), '.txt');
    assert.equal(napsConvenienceExtension(attrs({ hfsFileType: 0x54455854 })), '.txt');
    assert.equal(napsConvenienceExtension(attrs({ fileType: 0x06 })), '');
  });
});

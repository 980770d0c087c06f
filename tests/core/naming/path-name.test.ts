import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  adjustEscapePathName,
  adjustFileName,
  adjustPathName,
  compareFileNames,
  escapeFileName,
  getDirectoryName,
  getFileName,
  printifyControlChars,
  unescapeFileName,
  unescapePathName,
} from '../../../packages/core/src/core/naming/path-name.js';

describe('adjustFileName', () => {
  it('replaces characters the host cannot store', () => {
    assert.equal(adjustFileName('a:b*c'), 'a_b_c');
    assert.equal(adjustFileName('x<y>', '-'), 'x-y-');
    assert.equal(adjustFileName('tab\there'), 'tab_here');
  });

  it('substitutes a placeholder for an empty name', () => {
    assert.equal(adjustFileName(''), 'A');
  });

  it('adjusts each component of a path and joins with the host separator', () => {
    assert.equal(adjustPathName('dir:x/f?', ':'), 'dir/x_f_');
  });
});

describe('escapeFileName', () => {
  it('escapes invalid characters and doubles the escape character', () => {
    assert.equal(escapeFileName('a/b%'), 'a%2fb%%');
    assert.equal(escapeFileName('What?'), 'What%3f');
  });

  it('escapes control characters, DEL and control pictures as the codes they stand for', () => {
    assert.equal(escapeFileName('TAB\ty'), 'TAB%09y');
    assert.equal(escapeFileName('a\u007f'), 'a%7f');
    assert.equal(escapeFileName('x␁y'), 'x%01y');
  });

  it('substitutes a placeholder for an empty name', () => {
    assert.equal(escapeFileName(''), 'A');
  });

  it('escapes only the leaf of a NAPS extraction path', () => {
    assert.equal(adjustEscapePathName('a:b/c:d?e', ':'), 'a/b_c/d%3fe');
  });
});

describe('unescapeFileName', () => {
  it('reverses escapeFileName', () => {
    assert.equal(unescapeFileName('a%2fb%%', ''), 'a/b%');
    assert.equal(unescapeFileName(escapeFileName('Odd:Name%?'), ''), 'Odd:Name%?');
  });

  it('turns a decoded separator into a lone escape character', () => {
    assert.equal(unescapeFileName('a%2fb', '/'), 'a%b');
  });

  it('drops escaped NULs and keeps malformed escapes', () => {
    assert.equal(unescapeFileName('%00x', ''), 'x');
    assert.equal(unescapeFileName('%zz', ''), '%zz');
    assert.equal(unescapeFileName('end%4', ''), 'end%4');
  });

  it('unescapes each component and joins with the new separator', () => {
    assert.equal(unescapePathName('d%3a/f%2f', '/', ':'), 'd%:f/');
  });
});

describe('path helpers', () => {
  it('getFileName returns the last component', () => {
    assert.equal(getFileName('a/b', '/'), 'b');
    assert.equal(getFileName('a/b/', '/'), '');
    assert.equal(getFileName('name', '/'), 'name');
    assert.equal(getFileName('x:y', ''), 'x:y');
  });

  it('getDirectoryName returns everything before the last separator', () => {
    assert.equal(getDirectoryName('a/b/c', '/'), 'a/b');
    assert.equal(getDirectoryName('/c', '/'), '');
    assert.equal(getDirectoryName('c', '/'), '');
  });

  it('compareFileNames ignores case', () => {
    assert.equal(compareFileNames('abc', 'ABD'), -1);
    assert.equal(compareFileNames('Foo', 'fOO'), 0);
    assert.equal(compareFileNames('b', 'A'), 1);
  });

  it('printifyControlChars maps control codes to control pictures', () => {
    assert.equal(printifyControlChars('a\u0001\u007f'), 'a␁␡');
  });
});

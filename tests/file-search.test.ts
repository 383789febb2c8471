/**
 * Tests for src/search/file-search.ts
 * Line matching with context windows, whole-file matching with offsets.
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { matchLines, matchAll } from '../src/search/index.js';

const TEXT = 'alpha\nbeta\ngamma\ndelta\n';

describe('matchLines', () => {
  it('should report the line number, trimmed line and context window', () => {
    assert.deepStrictEqual(matchLines('f.txt', TEXT, /beta/, 1), [
      { file: 'f.txt', line_number: 2, content: 'beta', context: 'alpha\nbeta\ngamma' },
    ]);
  });

  it('should give exactly the matching line as context when context_lines is 0', () => {
    const [match] = matchLines('f.txt', TEXT, /gamma/, 0);
    assert.strictEqual(match?.context, 'gamma');
  });

  it('should clamp the window to the file bounds', () => {
    assert.strictEqual(matchLines('f.txt', TEXT, /alpha/, 2)[0]?.context, 'alpha\nbeta\ngamma');
    assert.strictEqual(matchLines('f.txt', TEXT, /delta/, 5)[0]?.context, 'alpha\nbeta\ngamma\ndelta');
  });

  it('should return every matching line in file order', () => {
    const matches = matchLines('f.txt', TEXT, /a$/, 0);
    assert.deepStrictEqual(matches.map(m => m.line_number), [1, 2, 3, 4]);
  });

  it('should test lines without their terminator', () => {
    assert.strictEqual(matchLines('f.txt', TEXT, /^beta$/, 0).length, 1);
  });

  it('should trim the matching line and the context', () => {
    const [match] = matchLines('f.txt', '  first  \n    target line  \n', /target/, 1);
    assert.strictEqual(match?.content, 'target line');
    assert.strictEqual(match?.context, 'first  \n    target line');
  });

  it('should return nothing for empty text', () => {
    assert.deepStrictEqual(matchLines('f.txt', '', /.*/, 2), []);
  });
});

describe('matchAll', () => {
  it('should report offsets, matched text and groups for every match', () => {
    assert.deepStrictEqual(matchAll('f.txt', 'a1 b22 c333', /([a-z])(\d+)/g), [
      { file: 'f.txt', start: 0, end: 2, match: 'a1', groups: ['a', '1'] },
      { file: 'f.txt', start: 3, end: 6, match: 'b22', groups: ['b', '22'] },
      { file: 'f.txt', start: 7, end: 11, match: 'c333', groups: ['c', '333'] },
    ]);
  });

  it('should report a group that did not participate as null', () => {
    assert.deepStrictEqual(matchAll('f.txt', 'x xy', /x(y)?/g).map(m => m.groups), [[null], ['y']]);
  });

  it('should match across lines', () => {
    const [match] = matchAll('f.txt', 'a\nb\nc', /b\nc/g);
    assert.strictEqual(match?.start, 2);
    assert.strictEqual(match?.end, 5);
  });

  it('should count offsets in UTF-16 code units', () => {
    const [match] = matchAll('f.txt', '\u00e9\u{1F600}x', /x/g);
    assert.strictEqual(match?.start, 3);
  });

  it('should leave a shared regex reusable', () => {
    const regex = /o/g;
    const first = matchAll('a.txt', 'foo', regex);
    const second = matchAll('b.txt', 'foo', regex);
    assert.strictEqual(first.length, 2);
    assert.strictEqual(second.length, 2);
    assert.strictEqual(regex.lastIndex, 0);
  });
});

/**
 * Tests for src/filesystem/read.ts
 * Strict UTF-8 reads, newline translation, size limit and skip classification.
 */
import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { join } from 'node:path';
import {
  FileReadError,
  readTextFile,
  splitLines,
  normalizeNewlines,
  toSkipReason,
} from '../../src/filesystem/index.js';
import { createFixtureTree, removeFixtureTree, errnoError } from '../helpers/fixture-tree.js';

let root: string;

before(() => {
  root = createFixtureTree('read', {
    'plain.txt': 'first\nsecond\n',
    'crlf.txt': 'one\r\ntwo\rthree\n',
    'latin1.txt': Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]),
    'eight.txt': 'abcdefgh',
    'bom.txt': Buffer.from([0xef, 0xbb, 0xbf, 0x68, 0x69, 0x0a]),
    'dir/': '',
  });
});

after(() => removeFixtureTree(root));

describe('readTextFile', () => {
  it('should return the decoded text', async () => {
    assert.strictEqual(await readTextFile(join(root, 'plain.txt')), 'first\nsecond\n');
  });

  it('should translate \\r\\n and lone \\r to \\n', async () => {
    assert.strictEqual(await readTextFile(join(root, 'crlf.txt')), 'one\ntwo\nthree\n');
  });

  it('should keep a leading byte order mark as U+FEFF', async () => {
    assert.strictEqual(await readTextFile(join(root, 'bom.txt')), '\ufeffhi\n');
  });

  it('should reject bytes that are not valid UTF-8 with DECODE_ERROR', async () => {
    await assert.rejects(readTextFile(join(root, 'latin1.txt')), (error: unknown) => {
      assert.ok(error instanceof FileReadError);
      assert.strictEqual(error.code, 'DECODE_ERROR');
      return true;
    });
  });

  it('should reject files over the size limit without reading them', async () => {
    await assert.rejects(readTextFile(join(root, 'eight.txt'), { maxFileSize: 5 }), (error: unknown) => {
      assert.ok(error instanceof FileReadError);
      assert.strictEqual(error.code, 'FILE_TOO_LARGE');
      assert.strictEqual(error.message, 'File is 8 B, limit is 5 B');
      return true;
    });
  });

  it('should accept a file exactly at the size limit', async () => {
    assert.strictEqual(await readTextFile(join(root, 'eight.txt'), { maxFileSize: 8 }), 'abcdefgh');
  });

  it('should reject a directory with NOT_A_FILE', async () => {
    const dir = join(root, 'dir');
    await assert.rejects(readTextFile(dir), (error: unknown) => {
      assert.ok(error instanceof FileReadError);
      assert.strictEqual(error.code, 'NOT_A_FILE');
      assert.strictEqual(error.message, `${dir} is not a regular file`);
      return true;
    });
  });

  it('should let a missing file fail with its errno error', async () => {
    await assert.rejects(readTextFile(join(root, 'gone.txt')), { code: 'ENOENT' });
  });
});

describe('toSkipReason', () => {
  it('should keep the code of a FileReadError', () => {
    const reason = toSkipReason(new FileReadError('FILE_TOO_LARGE', 'too big'));
    assert.deepStrictEqual(reason, { code: 'FILE_TOO_LARGE', message: 'too big' });
  });

  it('should map errno failures to skip codes', () => {
    assert.strictEqual(toSkipReason(errnoError('ENOENT', 'open', '/x'))?.code, 'FILE_NOT_FOUND');
    assert.strictEqual(toSkipReason(errnoError('EACCES', 'open', '/x'))?.code, 'PERMISSION_DENIED');
    assert.strictEqual(toSkipReason(errnoError('EPERM', 'open', '/x'))?.code, 'PERMISSION_DENIED');
    assert.strictEqual(toSkipReason(errnoError('EISDIR', 'read', '/x'))?.code, 'NOT_A_FILE');
    assert.strictEqual(toSkipReason(errnoError('EIO', 'read', '/x'))?.code, 'READ_ERROR');
  });

  it('should return null for anything that is not a file failure', () => {
    assert.strictEqual(toSkipReason(new TypeError('bug')), null);
    assert.strictEqual(toSkipReason('oops'), null);

    const argumentError = Object.assign(new Error('bad argument'), { code: 'ERR_INVALID_ARG_TYPE' });
    assert.strictEqual(toSkipReason(argumentError), null);
  });
});

describe('splitLines', () => {
  it('should keep each line terminator', () => {
    assert.deepStrictEqual(splitLines('a\nb\n'), ['a\n', 'b\n']);
  });

  it('should keep a final unterminated line', () => {
    assert.deepStrictEqual(splitLines('a\nb'), ['a\n', 'b']);
  });

  it('should keep blank lines', () => {
    assert.deepStrictEqual(splitLines('\n\n'), ['\n', '\n']);
  });

  it('should return no lines for empty text', () => {
    assert.deepStrictEqual(splitLines(''), []);
  });
});

describe('normalizeNewlines', () => {
  it('should leave \\n-only text unchanged', () => {
    assert.strictEqual(normalizeNewlines('a\nb'), 'a\nb');
  });

  it('should not double a \\r\\n pair', () => {
    assert.strictEqual(normalizeNewlines('a\r\n\r\nb'), 'a\n\nb');
  });
});

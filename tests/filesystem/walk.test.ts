/**
 * Tests for src/filesystem/walk.ts
 * Traversal order, recursion, symlinks, root failures and unreadable subtrees.
 */
import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { realpathSync, symlinkSync, writeFileSync } from 'node:fs';
import { join, relative } from 'node:path';
import { walkFiles, nodeFileSystem, type SearchFileSystem } from '../../src/filesystem/index.js';
import { SearchError } from '../../src/search/errors.js';
import { createFixtureTree, removeFixtureTree, errnoError } from '../helpers/fixture-tree.js';

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of source) out.push(item);
  return out;
}

let root: string;

before(() => {
  root = createFixtureTree('walk', {
    'a.txt': 'alpha\n',
    'b.py': 'print(1)\n',
    'sub/c.py': 'print(2)\n',
    'sub/deeper/d.txt': 'delta\n',
    'empty/': '',
  });
});

after(() => removeFixtureTree(root));

describe('walkFiles', () => {
  it('should yield every regular file when recursive', async () => {
    const files = await collect(walkFiles(root));
    assert.deepStrictEqual(files.map(f => relative(root, f)).sort(), [
      'a.txt',
      'b.py',
      join('sub', 'c.py'),
      join('sub', 'deeper', 'd.txt'),
    ]);
  });

  it('should yield a directory\'s files before anything below it', async () => {
    const files = await collect(walkFiles(root));
    const at = (rel: string): number => files.indexOf(join(root, rel));
    assert.ok(at('a.txt') < at(join('sub', 'c.py')));
    assert.ok(at('b.py') < at(join('sub', 'c.py')));
    assert.ok(at(join('sub', 'c.py')) < at(join('sub', 'deeper', 'd.txt')));
  });

  it('should yield only direct children when not recursive', async () => {
    const files = await collect(walkFiles(root, { recursive: false }));
    assert.deepStrictEqual(files.sort(), [join(root, 'a.txt'), join(root, 'b.py')]);
  });

  it('should join paths onto a relative root', async () => {
    const relRoot = relative(process.cwd(), root);
    const files = await collect(walkFiles(relRoot, { recursive: false }));
    assert.deepStrictEqual(files.sort(), [join(relRoot, 'a.txt'), join(relRoot, 'b.py')]);
  });

  it('should walk afresh on every call', async () => {
    const first = await collect(walkFiles(root));
    const second = await collect(walkFiles(root));
    assert.deepStrictEqual(second.sort(), first.sort());
  });

  describe('symlinks', () => {
    let linkRoot: string;

    before(() => {
      linkRoot = createFixtureTree('walk-links', {
        'real.txt': 'real\n',
        'target/inner.txt': 'inner\n',
      });
      symlinkSync(join(linkRoot, 'real.txt'), join(linkRoot, 'file-link.txt'));
      symlinkSync(join(linkRoot, 'target'), join(linkRoot, 'dir-link'));
      symlinkSync(join(linkRoot, 'missing.txt'), join(linkRoot, 'dangling.txt'));
    });

    after(() => removeFixtureTree(linkRoot));

    it('should yield links to files, skip dangling links and not descend linked directories', async () => {
      const files = await collect(walkFiles(linkRoot));
      assert.deepStrictEqual(files.map(f => relative(linkRoot, f)).sort(), [
        'file-link.txt',
        'real.txt',
        join('target', 'inner.txt'),
      ]);
    });

    describe('with allowed directories', () => {
      let confined: string;
      let outside: string;

      before(() => {
        outside = createFixtureTree('walk-outside', { 'secret.txt': 'TOKEN=placeholder\n' });
        confined = createFixtureTree('walk-confined', { 'own.txt': 'own\n' });
        symlinkSync(join(outside, 'secret.txt'), join(confined, 'escape.txt'));
        symlinkSync(join(confined, 'own.txt'), join(confined, 'own-link.txt'));
      });

      after(() => {
        removeFixtureTree(confined);
        removeFixtureTree(outside);
      });

      it('should drop links that resolve outside the allowed directories', async () => {
        const files = await collect(walkFiles(confined, { allowedDirectories: [realpathSync(confined)] }));
        assert.deepStrictEqual(files.map(f => relative(confined, f)).sort(), ['own-link.txt', 'own.txt']);
      });

      it('should keep every link when all paths are allowed', async () => {
        const files = await collect(walkFiles(confined, { allowedDirectories: null }));
        assert.deepStrictEqual(files.map(f => relative(confined, f)).sort(), [
          'escape.txt',
          'own-link.txt',
          'own.txt',
        ]);
      });
    });
  });

  describe('root failures', () => {
    it('should throw PATH_NOT_FOUND for a missing root', async () => {
      const missing = join(root, 'does-not-exist');
      await assert.rejects(collect(walkFiles(missing)), (error: unknown) => {
        assert.ok(error instanceof SearchError);
        assert.strictEqual(error.code, 'PATH_NOT_FOUND');
        assert.strictEqual(error.message, `PATH_NOT_FOUND: Path does not exist: ${missing}`);
        return true;
      });
    });

    it('should throw NOT_A_DIRECTORY when the root is a file', async () => {
      const file = join(root, 'a.txt');
      await assert.rejects(collect(walkFiles(file)), (error: unknown) => {
        assert.ok(error instanceof SearchError);
        assert.strictEqual(error.code, 'NOT_A_DIRECTORY');
        return true;
      });
    });

    it('should throw PERMISSION_DENIED when the root cannot be listed', async () => {
      const fs: SearchFileSystem = {
        ...nodeFileSystem,
        readdir: (p) => Promise.reject(errnoError('EACCES', 'scandir', p)),
      };
      await assert.rejects(collect(walkFiles(root, { fs })), (error: unknown) => {
        assert.ok(error instanceof SearchError);
        assert.strictEqual(error.code, 'PERMISSION_DENIED');
        assert.strictEqual(error.message, `PERMISSION_DENIED: Permission denied: ${root}`);
        return true;
      });
    });

    it('should throw nothing until the sequence is first stepped', async () => {
      const walk = walkFiles(join(root, 'does-not-exist'));
      await assert.rejects(walk.next(), { name: 'SearchError' });
    });
  });

  it('should skip a subtree whose directory cannot be listed', async () => {
    const fs: SearchFileSystem = {
      ...nodeFileSystem,
      readdir: (p) => p === join(root, 'sub')
        ? Promise.reject(errnoError('EACCES', 'scandir', p))
        : nodeFileSystem.readdir(p),
    };
    const files = await collect(walkFiles(root, { fs }));
    assert.deepStrictEqual(files.map(f => relative(root, f)).sort(), ['a.txt', 'b.py']);
  });

  it('should stop with the abort reason once the signal fires', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(collect(walkFiles(root, { signal: controller.signal })), { name: 'AbortError' });
  });

  it('should see files added between calls', async () => {
    writeFileSync(join(root, 'sub', 'late.txt'), 'late\n');
    const files = await collect(walkFiles(root));
    assert.ok(files.includes(join(root, 'sub', 'late.txt')));
  });
});

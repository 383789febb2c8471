/**
 * Filesystem Security Tests
 *
 * Allowed-directory policy for search roots, path normalization and the
 * size formatting used in skip messages.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, realpathSync, rmSync, symlinkSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir, tmpdir } from 'node:os';

import {
  normalizePath,
  updateSecurityConfig,
  getSecurityConfig,
  formatBytes,
  isWithinDirectories,
  resolveRealPath,
  resolveAllowedDirectories,
  nodeFileSystem,
} from '../../src/filesystem/index.js';

const TEST_ROOT = join(tmpdir(), `content-search-security-test-${Date.now()}`);
const ALLOWED_DIR = join(TEST_ROOT, 'allowed');
const SIBLING_DIR = join(TEST_ROOT, 'allowed-other');
const NESTED_DIR = join(ALLOWED_DIR, 'nested', 'deep');
const ALIAS_LINK = join(TEST_ROOT, 'alias');
const realpath = (p: string) => nodeFileSystem.realpath(p);

describe('Filesystem Security', () => {
  before(() => {
    mkdirSync(NESTED_DIR, { recursive: true });
    mkdirSync(SIBLING_DIR, { recursive: true });
    symlinkSync(NESTED_DIR, ALIAS_LINK);
    updateSecurityConfig({ allowedDirectories: [ALLOWED_DIR] });
  });

  after(() => {
    rmSync(TEST_ROOT, { recursive: true, force: true });
    updateSecurityConfig({ allowedDirectories: [] });
  });

  describe('normalizePath', () => {
    it('should resolve relative paths and drop .. segments', () => {
      assert.strictEqual(normalizePath('./test/../file.txt'), resolve('file.txt'));
    });

    it('should expand a leading tilde', () => {
      assert.strictEqual(normalizePath('~/notes'), join(homedir(), 'notes'));
      assert.strictEqual(normalizePath('~'), homedir());
    });
  });

  describe('isWithinDirectories', () => {
    it('should allow the directory itself', () => {
      assert.strictEqual(isWithinDirectories(ALLOWED_DIR, [ALLOWED_DIR]), true);
    });

    it('should allow nested directories', () => {
      assert.strictEqual(isWithinDirectories(NESTED_DIR, [SIBLING_DIR, ALLOWED_DIR]), true);
    });

    it('should block a sibling that shares the name prefix', () => {
      assert.strictEqual(isWithinDirectories(SIBLING_DIR, [ALLOWED_DIR]), false);
    });

    it('should block traversal out of the directory', () => {
      assert.strictEqual(isWithinDirectories(join(ALLOWED_DIR, '..', 'allowed-other'), [ALLOWED_DIR]), false);
    });

    it('should allow nothing against an empty list', () => {
      assert.strictEqual(isWithinDirectories(ALLOWED_DIR, []), false);
    });
  });

  describe('resolveRealPath', () => {
    it('should resolve a symlink to its target', async () => {
      assert.strictEqual(await resolveRealPath(ALIAS_LINK, realpath), realpathSync(NESTED_DIR));
    });

    it('should keep the normalized name of a missing path', async () => {
      const missing = join(TEST_ROOT, 'missing', '..', 'gone');
      assert.strictEqual(await resolveRealPath(missing, realpath), join(TEST_ROOT, 'gone'));
    });

    it('should rethrow a failure that is not an errno error', async () => {
      await assert.rejects(
        resolveRealPath(ALIAS_LINK, () => Promise.reject(new TypeError('resolver bug'))),
        { name: 'TypeError', message: 'resolver bug' }
      );
    });
  });

  describe('resolveAllowedDirectories', () => {
    it('should resolve each allowed directory', async () => {
      assert.deepStrictEqual(await resolveAllowedDirectories(realpath), [realpathSync(ALLOWED_DIR)]);
    });

    it('should return null when every path is allowed', async () => {
      updateSecurityConfig({ allowedDirectories: [] });
      try {
        assert.strictEqual(await resolveAllowedDirectories(realpath), null);
      } finally {
        updateSecurityConfig({ allowedDirectories: [ALLOWED_DIR] });
      }
    });
  });

  describe('getSecurityConfig', () => {
    it('should return a copy that does not alias the live config', () => {
      const config = getSecurityConfig();
      config.allowedDirectories.push('/elsewhere');
      assert.deepStrictEqual(getSecurityConfig().allowedDirectories, [ALLOWED_DIR]);
    });
  });

  describe('formatBytes', () => {
    it('should format sizes with binary units', () => {
      assert.strictEqual(formatBytes(0), '0 B');
      assert.strictEqual(formatBytes(512), '512 B');
      assert.strictEqual(formatBytes(1536), '1.5 KB');
      assert.strictEqual(formatBytes(10 * 1024 * 1024), '10 MB');
    });
  });
});

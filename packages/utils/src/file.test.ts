import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  atomicWriteFile,
  isInsideDirectory,
  readLastLines,
  safeReadFile,
  uniqueDestination,
} from './index.js';

describe('file utilities', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seedsync-utils-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('atomicWriteFile', () => {
    it('replaces the content and leaves no temp file behind', async () => {
      const target = join(dir, 'nested', 'state.json');

      await atomicWriteFile(target, '{"v":1}');
      await atomicWriteFile(target, '{"v":2}');

      expect(await readFile(target, 'utf8')).toBe('{"v":2}');
      expect(await readdir(join(dir, 'nested'))).toEqual(['state.json']);
    });

    it('applies the requested file mode', async () => {
      const target = join(dir, 'secret.json');

      await atomicWriteFile(target, 'x', { mode: 0o600 });

      const { mode } = await stat(target);
      expect(mode & 0o777).toBe(0o600);
    });
  });

  describe('safeReadFile', () => {
    it('returns null for a missing file', async () => {
      expect(await safeReadFile(join(dir, 'missing.txt'))).toBeNull();
    });
  });

  describe('uniqueDestination', () => {
    it('keeps the name when it is free', async () => {
      expect(await uniqueDestination(dir, 'Show.S01E01.torrent')).toBe(join(dir, 'Show.S01E01.torrent'));
    });

    it('adds a numeric suffix on collision', async () => {
      await writeFile(join(dir, 'Show.S01E01.torrent'), 'a');
      await writeFile(join(dir, 'Show.S01E01-1.torrent'), 'b');

      expect(await uniqueDestination(dir, 'Show.S01E01.torrent')).toBe(join(dir, 'Show.S01E01-2.torrent'));
    });
  });

  describe('readLastLines', () => {
    it('returns the trailing non-empty lines', async () => {
      const file = join(dir, 'activity.log');
      await writeFile(file, 'one\ntwo\n\nthree\nfour\n');

      expect(await readLastLines(file, 2)).toEqual(['three', 'four']);
      expect(await readLastLines(file, 10)).toEqual(['one', 'two', 'three', 'four']);
    });

    it('returns an empty list for a missing file', async () => {
      expect(await readLastLines(join(dir, 'nope.log'), 5)).toEqual([]);
    });
  });

  describe('isInsideDirectory', () => {
    it('accepts children and rejects escapes', () => {
      expect(isInsideDirectory('/data/torrents', '/data/torrents/a.torrent')).toBe(true);
      expect(isInsideDirectory('/data/torrents', '/data/torrents/../secret')).toBe(false);
      expect(isInsideDirectory('/data/torrents', '/data/torrents')).toBe(false);
    });
  });
});

/**
 * Tests for EntryStore: load, add, remove, contains, items and disk sync.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { EntryStore, openEntryStore } from '../entry-store.js';
import { EntryStoreError } from '../../core/errors.js';
import { StoreErrorCode } from '../../types/error-codes.js';

async function sortedItems(store: EntryStore): Promise<string[]> {
  return (await store.items()).sort();
}

describe('EntryStore', () => {
  let tempDir: string;
  let filePath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'entry-store-test-'));
    filePath = join(tempDir, 'allow.txt');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('open', () => {
    it('creates an empty file when none exists', async () => {
      const store = await EntryStore.open(filePath);
      expect(await store.items()).toEqual([]);
      expect(await readFile(filePath, 'utf8')).toBe('');
      expect(store.path).toBe(filePath);
    });

    it('loads entries, ignoring blank lines and folding case', async () => {
      await writeFile(filePath, 'Foo\nBar\n\nBAZ');
      const store = await openEntryStore(filePath);
      expect(await sortedItems(store)).toEqual(['bar', 'baz', 'foo']);
      expect(await store.size()).toBe(3);
    });

    it('reads CRLF files', async () => {
      await writeFile(filePath, 'one\r\nTwo\r\n');
      const store = await EntryStore.open(filePath);
      expect(await sortedItems(store)).toEqual(['one', 'two']);
    });

    it('fails with IO_FAILURE when the parent directory is missing', async () => {
      const err = await EntryStore.open(join(tempDir, 'nope', 'list.txt')).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(EntryStoreError);
      expect(err).toMatchObject({ code: StoreErrorCode.IO_FAILURE, memoryDiverged: false });
    });

    it('fails with IO_FAILURE when the path is a directory', async () => {
      await expect(EntryStore.open(tempDir)).rejects.toMatchObject({
        code: StoreErrorCode.IO_FAILURE,
      });
    });

    it('applies logging.level to the store logger', async () => {
      const quiet = await EntryStore.open(filePath, { logging: { level: 'error' } });
      const verbose = await EntryStore.open(filePath, { logging: { level: 'debug' } });
      expect(quiet.logLevel).toBe('error');
      expect(verbose.logLevel).toBe('debug');
    });

    it('rejects invalid options with CONFIG_ERROR', async () => {
      await expect(EntryStore.open(filePath, { fileMode: 0o1000 })).rejects.toMatchObject({
        code: StoreErrorCode.CONFIG_ERROR,
      });
    });
  });

  describe('add', () => {
    it('makes the entry visible regardless of case or padding', async () => {
      const store = await EntryStore.open(filePath);
      await store.add('Hello');
      expect(await store.contains('Hello')).toBe(true);
      expect(await store.contains('hello')).toBe(true);
      expect(await store.contains('  HELLO\t')).toBe(true);
    });

    it('appends the trimmed text with original case', async () => {
      const store = await EntryStore.open(filePath);
      await store.add('  Example.com ');
      expect(await readFile(filePath, 'utf8')).toBe('Example.com');
      await store.add('Other.ORG');
      expect(await readFile(filePath, 'utf8')).toBe('Example.com\nOther.ORG');
    });

    it('writes a separator after existing content', async () => {
      await writeFile(filePath, 'foo\n');
      const store = await EntryStore.open(filePath);
      await store.add('Bar');
      expect(await readFile(filePath, 'utf8')).toBe('foo\n\nBar');

      const reopened = await EntryStore.open(filePath);
      expect(await sortedItems(reopened)).toEqual(['bar', 'foo']);
    });

    it('rejects duplicates case-insensitively without touching the file', async () => {
      const store = await EntryStore.open(filePath);
      await store.add('X');
      await expect(store.add('X')).rejects.toMatchObject({ code: StoreErrorCode.ALREADY_EXISTS });
      await expect(store.add(' x ')).rejects.toMatchObject({ code: StoreErrorCode.ALREADY_EXISTS });
      expect(await readFile(filePath, 'utf8')).toBe('X');
      expect(await store.items()).toEqual(['x']);
    });

    it('rejects empty entries', async () => {
      const store = await EntryStore.open(filePath);
      await expect(store.add('')).rejects.toMatchObject({ code: StoreErrorCode.EMPTY_ENTRY });
      await expect(store.add('   ')).rejects.toMatchObject({ code: StoreErrorCode.EMPTY_ENTRY });
      expect(await store.size()).toBe(0);
    });

    it('rejects entries with inner line breaks', async () => {
      const store = await EntryStore.open(filePath);
      await expect(store.add('a\nb')).rejects.toMatchObject({ code: StoreErrorCode.INVALID_ENTRY });
      await expect(store.add('a\r\nb')).rejects.toMatchObject({ code: StoreErrorCode.INVALID_ENTRY });
      expect(await store.size()).toBe(0);
      expect(await readFile(filePath, 'utf8')).toBe('');
    });

    it('survives a reopen', async () => {
      const store = await EntryStore.open(filePath);
      await store.add('X');
      const reopened = await EntryStore.open(filePath);
      expect(await reopened.contains('x')).toBe(true);
    });

    it('keeps the in-memory entry when the append fails', async () => {
      const store = await EntryStore.open(filePath);
      await rm(filePath);
      await mkdir(filePath);

      const err = await store.add('Blocked').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(EntryStoreError);
      expect(err).toMatchObject({ code: StoreErrorCode.IO_FAILURE, memoryDiverged: true });
      expect(await store.contains('blocked')).toBe(true);
    });

    it('serializes concurrent adds without losing updates', async () => {
      const store = await EntryStore.open(filePath);
      const names = Array.from({ length: 25 }, (_, i) => `Entry-${i}`);

      await Promise.all(names.map((name) => store.add(name)));

      const expected = names.map((name) => name.toLowerCase()).sort();
      expect(await sortedItems(store)).toEqual(expected);

      const onDisk = (await readFile(filePath, 'utf8')).split('\n').sort();
      expect(onDisk).toEqual([...names].sort());
    });
  });

  describe('remove', () => {
    it('rewrites the file from the remaining entries', async () => {
      await writeFile(filePath, 'Foo\nBar\nBAZ');
      const store = await EntryStore.open(filePath);
      await store.remove('bar');

      expect(await readFile(filePath, 'utf8')).toBe('foo\nbaz');
      const reopened = await EntryStore.open(filePath);
      expect(await sortedItems(reopened)).toEqual(['baz', 'foo']);
    });

    it('matches case-insensitively', async () => {
      await writeFile(filePath, 'Keep\nDrop');
      const store = await EntryStore.open(filePath);
      await store.remove('  DROP ');
      expect(await store.contains('drop')).toBe(false);
      expect(await readFile(filePath, 'utf8')).toBe('keep');
    });

    it('leaves an empty file after removing the last entry', async () => {
      const store = await EntryStore.open(filePath);
      await store.add('only');
      await store.remove('only');
      expect(await readFile(filePath, 'utf8')).toBe('');
      expect(await store.size()).toBe(0);
    });

    it('fails with NOT_FOUND and leaves the set unchanged', async () => {
      await writeFile(filePath, 'a\nb');
      const store = await EntryStore.open(filePath);
      await expect(store.remove('c')).rejects.toMatchObject({ code: StoreErrorCode.NOT_FOUND });
      expect(await sortedItems(store)).toEqual(['a', 'b']);
      expect(await readFile(filePath, 'utf8')).toBe('a\nb');
    });

    it('rejects empty entries', async () => {
      const store = await EntryStore.open(filePath);
      await expect(store.remove('')).rejects.toMatchObject({ code: StoreErrorCode.EMPTY_ENTRY });
      await expect(store.remove(' \t ')).rejects.toMatchObject({ code: StoreErrorCode.EMPTY_ENTRY });
    });

    it('uses the atomic rewrite path when configured', async () => {
      await writeFile(filePath, 'one\ntwo\nthree');
      const store = await EntryStore.open(filePath, { atomicRewrite: true });
      await store.remove('two');
      expect(await readFile(filePath, 'utf8')).toBe('one\nthree');
    });

    it('keeps the in-memory removal when the rewrite fails', async () => {
      await writeFile(filePath, 'a\nb');
      const store = await EntryStore.open(filePath);
      await rm(filePath);
      await mkdir(filePath);

      await expect(store.remove('a')).rejects.toMatchObject({
        code: StoreErrorCode.IO_FAILURE,
        memoryDiverged: true,
      });
      expect(await store.contains('a')).toBe(false);
      expect(await store.items()).toEqual(['b']);
    });
  });

  describe('contains', () => {
    it('is false for blank input', async () => {
      await writeFile(filePath, 'something');
      const store = await EntryStore.open(filePath);
      expect(await store.contains('')).toBe(false);
      expect(await store.contains('   ')).toBe(false);
    });

    it('is false for unknown entries', async () => {
      const store = await EntryStore.open(filePath);
      expect(await store.contains('missing')).toBe(false);
    });
  });

  describe('items', () => {
    it('returns a snapshot unaffected by later mutations', async () => {
      await writeFile(filePath, 'a');
      const store = await EntryStore.open(filePath);
      const snapshot = await store.items();
      await store.add('b');
      await store.remove('a');
      expect(snapshot).toEqual(['a']);
      expect(await store.items()).toEqual(['b']);
    });
  });

  describe('reload', () => {
    it('resyncs memory with the file after a failed append', async () => {
      const store = await EntryStore.open(filePath);
      await rm(filePath);
      await mkdir(filePath);
      await expect(store.add('lost')).rejects.toMatchObject({ code: StoreErrorCode.IO_FAILURE });

      await rm(filePath, { recursive: true });
      await store.reload();

      expect(await store.contains('lost')).toBe(false);
      expect(await readFile(filePath, 'utf8')).toBe('');
    });

    it('picks up entries written by someone else', async () => {
      const store = await EntryStore.open(filePath);
      await writeFile(filePath, 'External\nLines');
      await store.reload();
      expect(await sortedItems(store)).toEqual(['external', 'lines']);
    });
  });
});

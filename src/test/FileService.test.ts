/**
 * Run with: node --import tsx --test src/test/FileService.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';
import { FileService, isProcessAlive } from '../main/services/FileService';
import { createServices, createTempDir, listDir, removeDir } from './testHelpers';

describe('FileService', () => {
  let files: FileService;
  let libraryPath: string;
  let stagingPath: string;

  beforeEach(async () => {
    files = createServices().files;
    libraryPath = await createTempDir('files-lib');
    stagingPath = await createTempDir('files-staging');
  });

  afterEach(async () => {
    await removeDir(libraryPath);
    await removeDir(stagingPath);
  });

  describe('tempPathFor', () => {
    it('should build a hidden sibling that matches the temp pattern', () => {
      const target = path.join(libraryPath, 'Song.mp3');
      const temp = files.tempPathFor(target);

      assert.strictEqual(path.dirname(temp), libraryPath);
      assert.ok(path.basename(temp).startsWith('.Song.mp3.'));
      assert.ok(files.isTempFileName(path.basename(temp)));
    });

    it('should not treat ordinary names as temp files', () => {
      assert.strictEqual(files.isTempFileName('Song.mp3'), false);
      assert.strictEqual(files.isTempFileName('.Song.mp3.tmp'), false);
      assert.strictEqual(files.isTempFileName('Song.mp3.1700000000000-12-abcd.tmp'), false);
    });
  });

  describe('writeFileAtomic', () => {
    it('should replace the target and leave nothing else', async () => {
      const target = path.join(libraryPath, 'data.bin');
      await fs.writeFile(target, 'old');

      await files.writeFileAtomic(target, Buffer.from('new'));

      assert.strictEqual(await fs.readFile(target, 'utf8'), 'new');
      assert.deepStrictEqual(await listDir(libraryPath), ['data.bin']);
    });
  });

  describe('installUnique', () => {
    it('should use the plain name when it is free', async () => {
      const source = path.join(stagingPath, 'a.mp3');
      await fs.writeFile(source, 'a');

      const installed = await files.installUnique(source, libraryPath, 'Song', '.mp3', ['.mp3.hidden']);

      assert.strictEqual(installed, path.join(libraryPath, 'Song.mp3'));
      assert.deepStrictEqual(await listDir(stagingPath), []);
    });

    it('should number around visible and hidden names without overwriting', async () => {
      await fs.writeFile(path.join(libraryPath, 'Song.mp3'), 'first');
      await fs.writeFile(path.join(libraryPath, 'Song (2).mp3.hidden'), 'second');
      const source = path.join(stagingPath, 'b.mp3');
      await fs.writeFile(source, 'third');

      const installed = await files.installUnique(source, libraryPath, 'Song', '.mp3', ['.mp3.hidden']);

      assert.strictEqual(installed, path.join(libraryPath, 'Song (3).mp3'));
      assert.strictEqual(await fs.readFile(path.join(libraryPath, 'Song.mp3'), 'utf8'), 'first');
      assert.strictEqual(await fs.readFile(path.join(libraryPath, 'Song (2).mp3.hidden'), 'utf8'), 'second');
      assert.strictEqual(await fs.readFile(installed, 'utf8'), 'third');
      assert.deepStrictEqual(await listDir(libraryPath), ['Song (2).mp3.hidden', 'Song (3).mp3', 'Song.mp3']);
    });
  });

  describe('renameNoReplace', () => {
    it('should refuse to overwrite an existing target', async () => {
      const source = path.join(libraryPath, 'a.mp3');
      const target = path.join(libraryPath, 'b.mp3');
      await fs.writeFile(source, 'a');
      await fs.writeFile(target, 'b');

      assert.strictEqual(await files.renameNoReplace(source, target), false);
      assert.strictEqual(await fs.readFile(source, 'utf8'), 'a');
      assert.strictEqual(await fs.readFile(target, 'utf8'), 'b');
    });
  });

  describe('cleanupOrphans', () => {
    const deadPid = 99_999_999;

    it('should delete temp files and staging directories of exited processes but keep songs', async () => {
      await fs.writeFile(path.join(libraryPath, 'Keep.mp3'), 'song');
      await fs.writeFile(path.join(libraryPath, `.Keep.mp3.1700000000000-${deadPid}-deadbeef.tmp`), 'partial');
      await fs.writeFile(path.join(libraryPath, '.notes'), 'user file');
      await fs.mkdir(path.join(stagingPath, `${deadPid}-0badf00d`));
      await fs.writeFile(path.join(stagingPath, `${deadPid}-0badf00d`, 'job.source'), 'raw');
      await fs.writeFile(path.join(stagingPath, `${deadPid}-0badf00d`, 'job.mp3'), 'encoded');

      const cleaned = await files.cleanupOrphans(libraryPath, stagingPath);

      assert.strictEqual(cleaned, 2);
      assert.deepStrictEqual(await listDir(libraryPath), ['.notes', 'Keep.mp3']);
      assert.deepStrictEqual(await listDir(stagingPath), []);
    });

    it('should leave the work of a running process alone', async () => {
      const liveTemp = `.Keep.mp3.1700000000000-${process.pid}-deadbeef.tmp`;
      const liveSession = files.sessionDirectoryName();
      await fs.writeFile(path.join(libraryPath, liveTemp), 'partial');
      await fs.mkdir(path.join(stagingPath, liveSession));
      await fs.writeFile(path.join(stagingPath, liveSession, 'job.source'), 'raw');
      await fs.writeFile(path.join(stagingPath, 'notes.txt'), 'not ours');

      const cleaned = await files.cleanupOrphans(libraryPath, stagingPath);

      assert.strictEqual(cleaned, 0);
      assert.deepStrictEqual(await listDir(libraryPath), [liveTemp]);
      assert.deepStrictEqual(await listDir(stagingPath), [liveSession, 'notes.txt'].sort());
      assert.deepStrictEqual(await listDir(path.join(stagingPath, liveSession)), ['job.source']);
    });

    it('should tolerate a missing staging directory', async () => {
      const cleaned = await files.cleanupOrphans(libraryPath, path.join(stagingPath, 'absent'));
      assert.strictEqual(cleaned, 0);
    });
  });

  describe('isProcessAlive', () => {
    it('should recognise this process and reject pids that cannot exist', () => {
      assert.strictEqual(isProcessAlive(process.pid), true);
      assert.strictEqual(isProcessAlive(99_999_999), false);
      assert.strictEqual(isProcessAlive(0), false);
      assert.strictEqual(isProcessAlive(-1), false);
    });
  });

  describe('sanitizeFileName', () => {
    it('should drop path separators and reserved characters', () => {
      assert.strictEqual(files.sanitizeFileName('AC/DC: "Live" <2024>?'), 'ACDC Live 2024');
      assert.strictEqual(files.sanitizeFileName('Tab\tand   spaces'), 'Tab and spaces');
    });

    it('should trim dots and whitespace and fall back for empty names', () => {
      assert.strictEqual(files.sanitizeFileName('  ..hidden.  '), 'hidden');
      assert.strictEqual(files.sanitizeFileName('...'), 'Untitled');
    });

    it('should cap the length', () => {
      assert.strictEqual(files.sanitizeFileName('x'.repeat(300)).length, 120);
    });

    it('should count the cap in characters rather than UTF-16 units', () => {
      const name = files.sanitizeFileName(`${'a'.repeat(119)}🎵b`);
      assert.strictEqual(name, `${'a'.repeat(119)}🎵`);
    });
  });
});

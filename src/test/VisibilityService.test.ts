/**
 * Run with: node --import tsx --test src/test/VisibilityService.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';
import {
  VisibilityService,
  displayNameFor,
  isAudioCandidate,
  isHiddenPath,
  isVisiblePath
} from '../main/services/VisibilityService';
import { NameCollisionError, SongNotFoundError } from '../shared/errors';
import { createServices, createTempDir, listDir, removeDir, writeSong } from './testHelpers';

describe('VisibilityService', () => {
  let visibility: VisibilityService;
  let libraryPath: string;
  let songPath: string;

  beforeEach(async () => {
    const { files, logger } = createServices();
    visibility = new VisibilityService(files, logger);
    libraryPath = await createTempDir('visibility');
    songPath = path.join(libraryPath, 'Song.mp3');
    await writeSong(songPath);
  });

  afterEach(async () => {
    await removeDir(libraryPath);
  });

  describe('path helpers', () => {
    it('should classify extensions case-insensitively', () => {
      assert.strictEqual(isVisiblePath('/music/a.MP3'), true);
      assert.strictEqual(isHiddenPath('/music/a.Mp3.HIDDEN'), true);
      assert.strictEqual(isVisiblePath('/music/a.mp3.hidden'), false);
      assert.strictEqual(isAudioCandidate('/music/.a.mp3'), false);
      assert.strictEqual(isAudioCandidate('/music/a.ogg'), false);
    });

    it('should strip audio and hidden extensions for display', () => {
      assert.strictEqual(displayNameFor('/music/Track One.mp3.hidden'), 'Track One');
      assert.strictEqual(displayNameFor('/music/Track Two.MP3'), 'Track Two');
    });
  });

  it('should hide by appending the hidden suffix without touching contents', async () => {
    const before = await fs.readFile(songPath);

    const hiddenPath = await visibility.hide(songPath);

    assert.strictEqual(hiddenPath, `${songPath}.hidden`);
    assert.deepStrictEqual(await fs.readFile(hiddenPath), before);
    assert.deepStrictEqual(await listDir(libraryPath), ['Song.mp3.hidden']);
  });

  it('should be idempotent and show should invert hide', async () => {
    const hiddenPath = await visibility.hide(songPath);
    assert.strictEqual(await visibility.hide(hiddenPath), hiddenPath);

    const shownPath = await visibility.show(hiddenPath);
    assert.strictEqual(shownPath, songPath);
    assert.strictEqual(await visibility.show(shownPath), songPath);
    assert.deepStrictEqual(await listDir(libraryPath), ['Song.mp3']);
  });

  it('should toggle between the two states', async () => {
    const hiddenPath = await visibility.toggle(songPath);
    assert.strictEqual(hiddenPath, `${songPath}.hidden`);
    assert.strictEqual(await visibility.toggle(hiddenPath), songPath);
  });

  it('should fail with NameCollisionError and leave both files alone', async () => {
    await fs.writeFile(`${songPath}.hidden`, 'other');
    const before = await fs.readFile(songPath);

    await assert.rejects(visibility.hide(songPath), NameCollisionError);

    assert.deepStrictEqual(await fs.readFile(songPath), before);
    assert.strictEqual(await fs.readFile(`${songPath}.hidden`, 'utf8'), 'other');
  });

  it('should fail with SongNotFoundError for a missing song', async () => {
    await assert.rejects(visibility.hide(path.join(libraryPath, 'Missing.mp3')), SongNotFoundError);
  });
});

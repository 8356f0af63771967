/**
 * Run with: node --import tsx --test src/test/TrimJob.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';
import { TrimJob, type TrimJobContext } from '../main/jobs/TrimJob';
import { FileService } from '../main/services/FileService';
import { TagService } from '../main/services/TagService';
import { IoError } from '../shared/errors';
import type { TagSet } from '../shared/models';
import {
  FakeTranscodeTool,
  createServices,
  createTempDir,
  fakeProbe,
  listDir,
  readAudioPayload,
  removeDir,
  testLogger,
  writeSong
} from './testHelpers';

class FailingTagService extends TagService {
  public async writeTags(filePath: string): Promise<void> {
    throw new IoError('Disk full', { path: filePath });
  }
}

const ORIGINAL_TAGS: TagSet = {
  title: 'Song Title',
  artist: 'Song Artist',
  provenance: { source_url: 'https://video.example/1', downloaded_at: '2026-01-01T00:00:00.000Z' }
};

describe('TrimJob', () => {
  let libraryPath: string;
  let songPath: string;
  let original: Buffer;
  let files: FileService;
  let tags: TagService;
  let transcodeTool: FakeTranscodeTool;
  let context: TrimJobContext;

  const createJob = (startMs: number, endMs: number, overrides: Partial<TrimJobContext> = {}): TrimJob =>
    new TrimJob(songPath, startMs, endMs, { ...context, ...overrides }, { logger: testLogger() });

  beforeEach(async () => {
    libraryPath = await createTempDir('trim');
    songPath = path.join(libraryPath, 'Song.mp3');
    await writeSong(songPath, { durationMs: 180_000, label: 'song', tags: ORIGINAL_TAGS });
    original = await fs.readFile(songPath);
    const services = createServices();
    files = services.files;
    tags = services.tags;
    transcodeTool = new FakeTranscodeTool();
    context = { files, tags, transcodeTool, probeDuration: fakeProbe, reencode: false };
  });

  afterEach(async () => {
    await removeDir(libraryPath);
  });

  it('should cut the song in place and keep every tag', async () => {
    const job = createJob(10_000, 170_000);
    const states: string[] = [];
    job.on('state', (summary) => states.push(summary.state));

    await job.run();

    assert.deepStrictEqual(await job.result, { state: 'complete', value: songPath });
    assert.deepStrictEqual(states, ['transcoding', 'tagging', 'replacing', 'complete']);
    assert.deepStrictEqual(readAudioPayload(await fs.readFile(songPath)), { durationMs: 160_000, label: 'song' });
    assert.deepStrictEqual((await tags.readTags(songPath)).tags, ORIGINAL_TAGS);
    assert.deepStrictEqual(await listDir(libraryPath), ['Song.mp3']);

    const request = transcodeTool.requests[0];
    assert.ok(request);
    assert.strictEqual(request.startMs, 10_000);
    assert.strictEqual(request.endMs, 170_000);
    assert.strictEqual(request.copyCodec, true);
    assert.strictEqual(path.dirname(request.outputPath), libraryPath);
    assert.ok(files.isTempFileName(path.basename(request.outputPath)));
  });

  it('should re-encode when configured to', async () => {
    const job = createJob(0, 1000, { reencode: true });
    await job.run();

    assert.strictEqual(transcodeTool.requests[0]?.copyCodec, false);
  });

  it('should reject a range past the end of the song without touching it', async () => {
    const job = createJob(10_000, 200_000);
    await job.run();
    const outcome = await job.result;

    assert.ok(outcome.state === 'failed');
    assert.strictEqual(outcome.error.code, 'INVALID_RANGE');
    assert.strictEqual(transcodeTool.requests.length, 0);
    assert.deepStrictEqual(await fs.readFile(songPath), original);
  });

  it('should reject an empty or negative range', async () => {
    for (const [startMs, endMs] of [[5000, 5000], [6000, 5000], [-1, 5000]] as const) {
      const job = createJob(startMs, endMs);
      await job.run();
      const outcome = await job.result;
      assert.ok(outcome.state === 'failed');
      assert.strictEqual(outcome.error.code, 'INVALID_RANGE');
    }
  });

  it('should only check the lower bounds when the duration is unknown', async () => {
    const job = createJob(0, 500_000, { probeDuration: async () => null });
    await job.run();

    assert.deepStrictEqual(await job.result, { state: 'complete', value: songPath });
  });

  it('should leave the original byte-for-byte intact when the transcode fails mid-way', async () => {
    transcodeTool.writePartialOutput = true;
    transcodeTool.failWithExitCode(1);
    const job = createJob(10_000, 170_000);

    await job.run();
    const outcome = await job.result;

    assert.ok(outcome.state === 'failed');
    assert.strictEqual(outcome.error.code, 'TRANSCODE_ERROR');
    assert.strictEqual(outcome.error.stage, 'transcoding');
    assert.deepStrictEqual(await fs.readFile(songPath), original);
    assert.deepStrictEqual(await listDir(libraryPath), ['Song.mp3']);
  });

  it('should leave the original intact when tagging the cut fails', async () => {
    const job = createJob(10_000, 170_000, { tags: new FailingTagService(files, testLogger()) });

    await job.run();
    const outcome = await job.result;

    assert.ok(outcome.state === 'failed');
    assert.strictEqual(outcome.error.code, 'IO_ERROR');
    assert.strictEqual(outcome.error.stage, 'tagging');
    assert.deepStrictEqual(await fs.readFile(songPath), original);
    assert.deepStrictEqual(await listDir(libraryPath), ['Song.mp3']);
  });

  it('should cancel during the transcode and clean up', async () => {
    transcodeTool.writePartialOutput = true;
    transcodeTool.gate = new Promise<void>(() => undefined);
    const job = createJob(10_000, 170_000);

    const running = job.run();
    await transcodeTool.started.promise;
    job.cancel();
    await running;

    assert.deepStrictEqual(await job.result, { state: 'cancelled' });
    assert.deepStrictEqual(await fs.readFile(songPath), original);
    assert.deepStrictEqual(await listDir(libraryPath), ['Song.mp3']);
  });

  it('should fail with SONG_NOT_FOUND for a missing song', async () => {
    await fs.unlink(songPath);
    const job = createJob(0, 1000);
    await job.run();
    const outcome = await job.result;

    assert.ok(outcome.state === 'failed');
    assert.strictEqual(outcome.error.code, 'SONG_NOT_FOUND');
  });
});

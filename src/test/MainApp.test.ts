/**
 * Run with: node --import tsx --test src/test/MainApp.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import path from 'node:path';
import { MainApp } from '../main/MainApp';
import { Logger, type LogEntry } from '../main/utils/Logger';
import {
  FakeFetchTool,
  FakeTranscodeTool,
  createTempDir,
  fakeProbe,
  removeDir,
  testLogger,
  writeSong
} from './testHelpers';

describe('MainApp', () => {
  let root: string;
  let app: MainApp;

  beforeEach(async () => {
    root = await createTempDir('app');
    app = new MainApp({
      configDir: path.join(root, 'config'),
      homeDir: root,
      overrides: { libraryPath: path.join(root, 'library'), stagingPath: path.join(root, 'staging'), maxConcurrentJobs: 2 },
      logger: testLogger(),
      fetchTool: new FakeFetchTool(),
      transcodeTool: new FakeTranscodeTool(),
      probeDuration: fakeProbe
    });
  });

  afterEach(async () => {
    await app.dispose();
    await removeDir(root);
  });

  it('should apply session overrides on top of the stored settings', async () => {
    await writeSong(path.join(root, 'library', 'First.mp3'));

    const summary = await app.initialize();

    assert.deepStrictEqual(summary, { added: 1, removed: 0, total: 1, corrupt: 0 });
    assert.strictEqual(app.activeSettings.libraryPath, path.join(root, 'library'));
    assert.strictEqual(app.activeSettings.maxConcurrentJobs, 2);
    assert.strictEqual(app.settings.getSettings().libraryPath, path.join(root, 'Music', 'CrossPlay'));
    assert.deepStrictEqual(app.engine.listSongs().map((song) => song.title), ['First']);
  });

  it('should resolve bare names inside the library', async () => {
    await app.initialize();
    const existing = path.join(root, 'library', 'Song.mp3');
    await writeSong(existing);

    assert.strictEqual(await app.resolveSongPath(existing), existing);
    assert.strictEqual(await app.resolveSongPath('Other.mp3'), path.join(root, 'library', 'Other.mp3'));
  });

  it('should scan once per run and dispose afterwards', async () => {
    await writeSong(path.join(root, 'library', 'Once.mp3'));
    const logger = Logger.create({ level: 'info', logToConsole: false });
    const entries: LogEntry[] = [];
    logger.subscribe((entry) => entries.push(entry));
    const session = new MainApp({
      configDir: path.join(root, 'config'),
      homeDir: root,
      overrides: { libraryPath: path.join(root, 'library'), stagingPath: path.join(root, 'staging'), logLevel: 'info' },
      logger,
      fetchTool: new FakeFetchTool(),
      transcodeTool: new FakeTranscodeTool(),
      probeDuration: fakeProbe
    });

    let seen: unknown = null;
    await session.run(async (startup) => {
      seen = startup;
      assert.deepStrictEqual(session.engine.listSongs().map((song) => song.title), ['Once']);
    });

    assert.deepStrictEqual(seen, { added: 1, removed: 0, total: 1, corrupt: 0 });
    assert.strictEqual(entries.filter((entry) => entry.message.startsWith('Rescan complete')).length, 1);
    assert.throws(() => session.engine, /not been initialised/);
  });

  it('should refuse engine access before initialize', () => {
    assert.throws(() => app.engine, /not been initialised/);
  });
});

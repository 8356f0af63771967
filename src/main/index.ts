import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { LibraryError } from '../shared/errors';
import type { AppSettings, LibraryScanSummary, LogLevelName, Song, SortBy, TagEdit } from '../shared/models';
import { sortSongs } from '../shared/sorting';
import { formatTimecode, parseTimecode } from '../shared/timecode';
import type { JobHandle, JobOutcome } from './jobs/Job';
import { MainApp } from './MainApp';
import { parseSettingAssignment } from './services/SettingsService';

interface GlobalOptions {
  configDir?: string;
  library?: string;
  jobs?: number;
  logLevel?: LogLevelName;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseTime(value: string): number {
  const parsed = parseTimecode(value);
  if (parsed === null) {
    throw new InvalidArgumentError('Expected seconds or [hh:]mm:ss[.mmm].');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevelName {
  const levels: LogLevelName[] = ['debug', 'info', 'warn', 'error'];
  const match = levels.find((level) => level === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${levels.join(', ')}.`);
  }
  return match;
}

function parseSortBy(value: string): SortBy {
  const keys: SortBy[] = ['title', 'artist', 'album', 'downloaded'];
  const match = keys.find((key) => key === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${keys.join(', ')}.`);
  }
  return match;
}

function formatSong(song: Song): string {
  const flags = [song.visible ? '' : 'hidden', song.tagStatus === 'corrupt' ? 'corrupt tags' : '']
    .filter((flag) => flag.length > 0)
    .join(', ');
  const artist = song.artist ? ` - ${song.artist}` : '';
  const trim = song.trimBounds
    ? ` [trim ${formatTimecode(song.trimBounds.startMs)}-${formatTimecode(song.trimBounds.endMs)}]`
    : '';
  return `${song.title}${artist}${flags ? ` (${flags})` : ''}${trim}\n    ${song.path}`;
}

function describeOutcome(job: JobHandle, outcome: JobOutcome<unknown>): string {
  if (outcome.state === 'failed') {
    return `${job.kind} ${job.target}: failed (${outcome.error.code}${outcome.error.stage ? ` during ${outcome.error.stage}` : ''}) ${outcome.error.message}`;
  }
  return `${job.kind} ${job.target}: ${outcome.state}`;
}

const program = new Command();
program
  .name('crossplay')
  .description('Manage a music library of downloaded tracks kept as tagged MP3 files')
  .version('0.1.0')
  .option('--config-dir <path>', 'Directory holding settings.json')
  .option('-L, --library <path>', 'Library directory for this run')
  .option('-j, --jobs <number>', 'Maximum concurrent jobs', parsePositiveInt)
  .option('-l, --log-level <level>', 'Log level (debug, info, warn, error)', parseLogLevel);

/**
 * Boots the engine, runs `task` with the startup scan and always disposes, so no job or child process
 * outlives the command.
 */
async function withApp(task: (app: MainApp, startup: LibraryScanSummary) => Promise<void>): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  const overrides: Partial<AppSettings> = {};
  if (globals.library) {
    overrides.libraryPath = path.resolve(globals.library);
  }
  if (globals.jobs) {
    overrides.maxConcurrentJobs = globals.jobs;
  }
  if (globals.logLevel) {
    overrides.logLevel = globals.logLevel;
  }

  const app = new MainApp({ configDir: globals.configDir, overrides });
  const stopSignals = (): void => {
    app.logger.warn('Interrupted; cancelling jobs');
    app.dispose().catch((error: unknown) => app.logger.error('Failed to shut down cleanly', error));
  };
  process.once('SIGINT', stopSignals);
  process.once('SIGTERM', stopSignals);

  try {
    await app.run((startup) => task(app, startup));
  } finally {
    process.off('SIGINT', stopSignals);
    process.off('SIGTERM', stopSignals);
  }
}

/** Waits for every job and sets a failing exit code if any did not complete. */
async function awaitJobs(jobs: Array<JobHandle & { result: Promise<JobOutcome<unknown>> }>): Promise<void> {
  const outcomes = await Promise.all(jobs.map((job) => job.result));
  outcomes.forEach((outcome, index) => {
    const job = jobs[index];
    if (job) {
      console.log(describeOutcome(job, outcome));
    }
  });
  if (outcomes.some((outcome) => outcome.state !== 'complete')) {
    process.exitCode = 1;
  }
}

program
  .command('scan')
  .description('Clean up leftovers and rescan the library')
  .action(async () => {
    await withApp(async (_app, startup) => {
      console.log(`${startup.total} song(s); ${startup.corrupt} with unreadable tags`);
    });
  });

program
  .command('list')
  .description('List songs in the library')
  .option('-s, --sort <key>', 'Sort by title, artist, album or downloaded', parseSortBy)
  .option('-r, --reverse', 'Reverse the sort order')
  .option('--hidden', 'Only list hidden songs')
  .action(async (options: { sort?: SortBy; reverse?: boolean; hidden?: boolean }) => {
    await withApp(async (app) => {
      const settings = app.activeSettings;
      const songs = sortSongs(
        options.hidden ? app.engine.listAllSongs().filter((song) => !song.visible) : app.engine.listSongs(),
        options.sort ?? settings.sortBy,
        options.reverse ? 'reverse' : settings.sortDirection
      );
      songs.forEach((song) => console.log(formatSong(song)));
      console.log(`${songs.length} song(s)`);
    });
  });

program
  .command('download')
  .description('Download one or more URLs into the library')
  .argument('<urls...>', 'Source URLs')
  .action(async (urls: string[]) => {
    await withApp(async (app) => {
      const jobs = urls.map((url) => {
        const job = app.engine.submitDownload(url);
        job.on('progress', (percentage) => app.logger.debug(`${url}: ${percentage.toFixed(1)}%`));
        job.on('state', (summary) => app.logger.info(`${url}: ${summary.state}`));
        return job;
      });
      await awaitJobs(jobs);
    });
  });

program
  .command('trim')
  .description('Cut a song down to the given range, in place')
  .argument('<song>', 'Song path or file name in the library')
  .argument('<start>', 'Start time (seconds or [hh:]mm:ss[.mmm])', parseTime)
  .argument('<end>', 'End time (seconds or [hh:]mm:ss[.mmm])', parseTime)
  .action(async (song: string, startMs: number, endMs: number) => {
    await withApp(async (app) => {
      const songPath = await app.resolveSongPath(song);
      await awaitJobs([app.engine.submitTrim(songPath, startMs, endMs)]);
    });
  });

for (const kind of ['hide', 'show', 'delete'] as const) {
  program
    .command(kind)
    .description(`${kind[0]?.toUpperCase() ?? ''}${kind.slice(1)} songs`)
    .argument('<songs...>', 'Song paths or file names in the library')
    .action(async (songs: string[]) => {
      await withApp(async (app) => {
        const paths = await Promise.all(songs.map((song) => app.resolveSongPath(song)));
        await awaitJobs(
          paths.map((songPath) => {
            if (kind === 'hide') {
              return app.engine.hide(songPath);
            }
            return kind === 'show' ? app.engine.show(songPath) : app.engine.delete(songPath);
          })
        );
      });
    });
}

program
  .command('tag')
  .description('Edit the tags of a song')
  .argument('<song>', 'Song path or file name in the library')
  .option('--title <title>')
  .option('--artist <artist>')
  .option('--album <album>')
  .option('--year <year>')
  .option('--genre <genre>')
  .option('--clear <fields...>', 'Fields to clear (title, artist, album, year, genre)')
  .action(
    async (
      song: string,
      options: { title?: string; artist?: string; album?: string; year?: string; genre?: string; clear?: string[] }
    ) => {
      const edit: TagEdit = {};
      for (const field of ['title', 'artist', 'album', 'year', 'genre'] as const) {
        const value = options[field];
        if (value !== undefined) {
          edit[field] = value;
        }
        if (options.clear?.includes(field)) {
          edit[field] = null;
        }
      }
      await withApp(async (app) => {
        await awaitJobs([app.engine.updateTags(await app.resolveSongPath(song), edit)]);
      });
    }
  );

const config = program.command('config').description('Show or change settings');

config
  .command('show', { isDefault: true })
  .description('Print the stored settings')
  .action(async () => {
    const globals = program.opts<GlobalOptions>();
    const app = new MainApp({ configDir: globals.configDir });
    const settings = await app.settings.load();
    console.log(`# ${app.settings.settingsPath}`);
    console.log(JSON.stringify(settings, null, 2));
  });

config
  .command('set')
  .description('Change one setting')
  .argument('<key>', 'Setting name')
  .argument('<value>', 'New value')
  .action(async (key: string, value: string) => {
    const globals = program.opts<GlobalOptions>();
    const app = new MainApp({ configDir: globals.configDir });
    await app.settings.load();
    const updated = await app.settings.update(parseSettingAssignment(key, value));
    console.log(JSON.stringify(updated, null, 2));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof LibraryError) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error('crossplay failed', error);
  }
  process.exitCode = 1;
});

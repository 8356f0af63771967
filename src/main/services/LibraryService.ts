import fs from 'node:fs/promises';
import path from 'node:path';
import { IoError, InvalidRangeError, SongNotFoundError } from '../../shared/errors';
import type {
  AppSettings,
  CatalogChange,
  JobSummary,
  LibraryScanSummary,
  Song,
  TagEdit,
  TrimBounds
} from '../../shared/models';
import { PathLocks } from '../concurrency/PathLocks';
import { WorkerPool } from '../concurrency/WorkerPool';
import { DownloadJob } from '../jobs/DownloadJob';
import type { JobHandle } from '../jobs/Job';
import { OperationJob } from '../jobs/OperationJob';
import { TrimJob } from '../jobs/TrimJob';
import { Logger } from '../utils/Logger';
import type { DurationProbe, FetchTool, TranscodeTool } from './ExternalTools';
import { FileService } from './FileService';
import { ScanService } from './ScanService';
import { TagService, applyTagEdit } from './TagService';
import { VisibilityService, isHiddenPath } from './VisibilityService';

/** Finished jobs kept for listJobs(). */
const MAX_FINISHED_JOBS = 100;

export type EngineSettings = Pick<AppSettings, 'libraryPath' | 'stagingPath' | 'maxConcurrentJobs' | 'reencodeTrim'>;

export interface LibraryServiceDependencies {
  settings: EngineSettings;
  logger: Logger;
  fetchTool: FetchTool;
  transcodeTool: TranscodeTool;
  probeDuration: DurationProbe;
  files?: FileService;
  tags?: TagService;
}

export type CatalogListener = (change: CatalogChange) => void;

/**
 * Owns the in-memory catalog of the library directory and runs every mutation through the worker pool.
 *
 * The catalog is a snapshot from the last scan, patched after each successful job while the job still
 * holds its song's lock. Songs with a held lock are left out of listings.
 * Downloads stage their files in a directory of this process's own under the shared staging root.
 */
export class LibraryService {
  private readonly logger: Logger;
  private readonly settings: EngineSettings;
  private readonly files: FileService;
  private readonly tags: TagService;
  private readonly scanner: ScanService;
  private readonly visibility: VisibilityService;
  private readonly locks = new PathLocks();
  private readonly pool: WorkerPool<JobHandle>;
  private readonly songs = new Map<string, Song>();
  private readonly trimProposals = new Map<string, TrimBounds>();
  private readonly jobs = new Map<string, JobHandle>();
  private readonly listeners = new Set<CatalogListener>();
  private disposed = false;
  public readonly stagingDirectory: string;

  public constructor(private readonly deps: LibraryServiceDependencies) {
    this.logger = deps.logger.child('LibraryService');
    this.settings = { ...deps.settings };
    this.files = deps.files ?? new FileService(deps.logger);
    this.stagingDirectory = path.join(this.settings.stagingPath, this.files.sessionDirectoryName());
    this.tags = deps.tags ?? new TagService(this.files, deps.logger);
    this.scanner = new ScanService(this.tags, deps.logger);
    this.visibility = new VisibilityService(this.files, deps.logger);
    this.pool = new WorkerPool<JobHandle>(this.settings.maxConcurrentJobs, deps.logger);
  }

  /**
   * Prepares the library and staging directories, deletes what exited processes left behind and takes the
   * first snapshot.
   */
  public async initialize(): Promise<LibraryScanSummary> {
    await this.files.ensureDirectory(this.settings.libraryPath);
    await this.files.ensureDirectory(this.stagingDirectory);
    await this.files.cleanupOrphans(this.settings.libraryPath, this.settings.stagingPath);
    return this.rescan();
  }

  /** Visible songs that no job is changing right now. */
  public listSongs(): Song[] {
    return this.collectSongs(false);
  }

  /** Like {@link listSongs}, including hidden songs. */
  public listAllSongs(): Song[] {
    return this.collectSongs(true);
  }

  public getSong(songPath: string): Song | null {
    const song = this.songs.get(songPath);
    return song ? this.withTrimBounds(song) : null;
  }

  /**
   * Replaces the snapshot with a fresh scan. Waits for running mutations to finish and holds new ones back
   * until the scan is done.
   */
  public async rescan(): Promise<LibraryScanSummary> {
    return this.locks.exclusive(async () => {
      const scanned = await this.scanner.scan(this.settings.libraryPath);
      const previous = new Set(this.songs.keys());
      const next = new Set(scanned.map((song) => song.path));

      const summary: LibraryScanSummary = {
        added: scanned.filter((song) => !previous.has(song.path)).length,
        removed: Array.from(previous).filter((songPath) => !next.has(songPath)).length,
        total: scanned.length,
        corrupt: scanned.filter((song) => song.tagStatus === 'corrupt').length
      };

      this.songs.clear();
      for (const song of scanned) {
        this.songs.set(song.path, song);
      }
      for (const songPath of Array.from(this.trimProposals.keys())) {
        if (!next.has(songPath)) {
          this.trimProposals.delete(songPath);
        }
      }

      this.logger.info(`Rescan complete: +${summary.added} -${summary.removed}, ${summary.total} total`);
      this.publish({ type: 'rescanned', total: summary.total });
      return summary;
    });
  }

  public submitDownload(url: string): DownloadJob {
    this.assertActive();
    const job = new DownloadJob(url, {
      libraryPath: this.settings.libraryPath,
      stagingPath: this.stagingDirectory,
      files: this.files,
      tags: this.tags,
      fetchTool: this.deps.fetchTool,
      transcodeTool: this.deps.transcodeTool,
      logger: this.deps.logger,
      locks: this.locks,
      onInstalled: async (installedPath) => {
        const song = await this.scanner.scanFile(installedPath);
        if (song) {
          this.songs.set(song.path, song);
          this.publish({ type: 'added', song: this.withTrimBounds(song) });
        }
      }
    });
    return this.enqueue(job);
  }

  public submitTrim(songPath: string, startMs: number, endMs: number): TrimJob {
    this.assertActive();
    const job = new TrimJob(
      songPath,
      startMs,
      endMs,
      {
        files: this.files,
        tags: this.tags,
        transcodeTool: this.deps.transcodeTool,
        probeDuration: this.deps.probeDuration,
        reencode: this.settings.reencodeTrim
      },
      {
        logger: this.deps.logger,
        locks: this.locks,
        lockPath: songPath,
        commit: async () => {
          this.trimProposals.delete(songPath);
          await this.refresh(songPath);
        }
      }
    );
    return this.enqueue(job);
  }

  public hide(songPath: string): OperationJob<string> {
    return this.submitRename('hide', songPath, (target) => this.visibility.hide(target));
  }

  public show(songPath: string): OperationJob<string> {
    return this.submitRename('show', songPath, (target) => this.visibility.show(target));
  }

  public toggleVisibility(songPath: string): OperationJob<string> {
    return isHiddenPath(songPath) ? this.show(songPath) : this.hide(songPath);
  }

  public delete(songPath: string): OperationJob<void> {
    this.assertActive();
    const job = new OperationJob<void>(
      'delete',
      songPath,
      async () => {
        try {
          await fs.unlink(songPath);
        } catch (error) {
          if (!(await this.files.pathExists(songPath))) {
            throw new SongNotFoundError(songPath);
          }
          throw new IoError(`Failed to delete ${songPath}`, { path: songPath, cause: error });
        }
        this.logger.info(`Deleted ${songPath}`);
      },
      {
        logger: this.deps.logger,
        locks: this.locks,
        lockPath: songPath,
        commit: async () => {
          this.forget(songPath);
        }
      }
    );
    return this.enqueue(job);
  }

  /**
   * Applies a tag edit. Provenance entries are merged and `metadata_edited` is set.
   */
  public updateTags(songPath: string, edit: TagEdit): OperationJob<void> {
    this.assertActive();
    const job = new OperationJob<void>(
      'tag',
      songPath,
      async () => {
        if (!(await this.files.pathExists(songPath))) {
          throw new SongNotFoundError(songPath);
        }
        // A corrupt block reads as empty and is replaced on write.
        const current = await this.tags.readTagsOrEmpty(songPath);
        await this.tags.writeTags(songPath, applyTagEdit(current.tags, edit));
      },
      {
        logger: this.deps.logger,
        locks: this.locks,
        lockPath: songPath,
        commit: async () => {
          await this.refresh(songPath);
        }
      }
    );
    return this.enqueue(job);
  }

  /**
   * Records the range the user is considering for a trim. Nothing touches the file until submitTrim.
   */
  public proposeTrim(songPath: string, startMs: number, endMs: number): Song {
    const song = this.songs.get(songPath);
    if (!song) {
      throw new SongNotFoundError(songPath);
    }
    if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || startMs < 0 || startMs >= endMs) {
      throw new InvalidRangeError(`Invalid trim range ${startMs}-${endMs}ms`, { path: songPath });
    }
    this.trimProposals.set(songPath, { startMs, endMs });
    const updated = this.withTrimBounds(song);
    this.publish({ type: 'updated', song: updated });
    return updated;
  }

  public clearTrimProposal(songPath: string): void {
    if (!this.trimProposals.delete(songPath)) {
      return;
    }
    const song = this.songs.get(songPath);
    if (song) {
      this.publish({ type: 'updated', song: this.withTrimBounds(song) });
    }
  }

  public cancelJob(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      return false;
    }
    job.cancel();
    return true;
  }

  public listJobs(): JobSummary[] {
    return Array.from(this.jobs.values(), (job) => job.toSummary());
  }

  public subscribe(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Cancels every unfinished job, waits for the pool to drain and removes this process's staging directory.
   */
  public async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    for (const job of this.jobs.values()) {
      job.cancel();
    }
    await this.pool.onIdle();
    await this.files.removeDirectory(this.stagingDirectory);
    this.listeners.clear();
    this.logger.info('Library engine disposed');
  }

  private submitRename(
    kind: 'hide' | 'show',
    songPath: string,
    rename: (target: string) => Promise<string>
  ): OperationJob<string> {
    this.assertActive();
    const job = new OperationJob<string>(kind, songPath, () => rename(songPath), {
      logger: this.deps.logger,
      locks: this.locks,
      lockPath: songPath,
      commit: async (newPath) => {
        if (newPath === songPath) {
          await this.refresh(songPath);
          return;
        }
        this.songs.delete(songPath);
        this.trimProposals.delete(songPath);
        const song = await this.scanner.scanFile(newPath);
        if (song) {
          this.songs.set(song.path, song);
          this.publish({ type: 'replaced', previousPath: songPath, song: this.withTrimBounds(song) });
        } else {
          this.publish({ type: 'removed', path: songPath });
        }
      }
    });
    return this.enqueue(job);
  }

  private enqueue<J extends JobHandle>(job: J): J {
    this.jobs.set(job.id, job);
    job.on('state', (summary) => {
      if (summary.state === 'cancelled') {
        this.pool.remove(job.id);
      }
      if (job.isTerminal) {
        this.pruneFinishedJobs();
      }
    });
    this.pool.submit(job);
    this.logger.debug(`Submitted ${job.kind} job ${job.id} for ${job.target}`);
    return job;
  }

  private pruneFinishedJobs(): void {
    const finished = Array.from(this.jobs.values()).filter((job) => job.isTerminal);
    for (const job of finished.slice(0, Math.max(0, finished.length - MAX_FINISHED_JOBS))) {
      this.jobs.delete(job.id);
    }
  }

  /** Re-reads one path into the catalog and publishes the change. */
  private async refresh(songPath: string): Promise<void> {
    const song = await this.scanner.scanFile(songPath);
    if (!song) {
      this.forget(songPath);
      return;
    }
    const existed = this.songs.has(songPath);
    this.songs.set(songPath, song);
    const published = this.withTrimBounds(song);
    this.publish(existed ? { type: 'updated', song: published } : { type: 'added', song: published });
  }

  private forget(songPath: string): void {
    this.trimProposals.delete(songPath);
    if (this.songs.delete(songPath)) {
      this.publish({ type: 'removed', path: songPath });
    }
  }

  private collectSongs(includeHidden: boolean): Song[] {
    const listed: Song[] = [];
    for (const song of this.songs.values()) {
      if ((includeHidden || song.visible) && !this.locks.isHeld(song.path)) {
        listed.push(this.withTrimBounds(song));
      }
    }
    return listed;
  }

  /** Copy of a catalog entry, so callers cannot change the catalog through it. */
  private withTrimBounds(song: Song): Song {
    const bounds = this.trimProposals.get(song.path);
    const copy: Song = { ...song, provenance: { ...song.provenance } };
    if (bounds) {
      copy.trimBounds = { ...bounds };
    }
    return copy;
  }

  private publish(change: CatalogChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error(`Catalog listener failed on ${change.type}`, error);
      }
    }
  }

  private assertActive(): void {
    if (this.disposed) {
      throw new Error('LibraryService has been disposed');
    }
  }
}

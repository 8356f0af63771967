import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';
import { IoError, hasErrorCode } from '../../shared/errors';
import type { Song } from '../../shared/models';
import { Logger } from '../utils/Logger';
import { TagService, emptyTagSet, type TagReadResult } from './TagService';
import { displayNameFor, isAudioCandidate, isVisiblePath } from './VisibilityService';

const CANDIDATE_PATTERNS = ['*.mp3', '*.mp3.hidden'];

/**
 * Derives Song records from a library directory and the tags embedded in its files.
 */
export class ScanService {
  private readonly logger: Logger;

  public constructor(
    private readonly tagService: TagService,
    logger: Logger
  ) {
    this.logger = logger.child('ScanService');
  }

  /**
   * Lists every visible and hidden song directly inside the directory, in directory order.
   * Files with unreadable tags are included with empty metadata.
   */
  public async scan(directory: string): Promise<Song[]> {
    await this.assertDirectory(directory);

    const absolutePaths = await fg(CANDIDATE_PATTERNS, {
      cwd: directory,
      absolute: true,
      onlyFiles: true,
      deep: 1,
      dot: false,
      caseSensitiveMatch: false,
      suppressErrors: true
    });

    const songs: Song[] = [];
    for (const absolutePath of absolutePaths) {
      const song = await this.scanFile(path.normalize(absolutePath));
      if (song) {
        songs.push(song);
      }
    }

    const corrupt = songs.filter((song) => song.tagStatus === 'corrupt').length;
    this.logger.info(`Scanned ${directory}: ${songs.length} song(s), ${corrupt} with unreadable tags`);
    return songs;
  }

  /**
   * Builds the Song for a single path. Returns null when the file is gone or is not a library candidate.
   */
  public async scanFile(filePath: string): Promise<Song | null> {
    if (!isAudioCandidate(filePath)) {
      return null;
    }

    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw new IoError(`Failed to stat ${filePath}`, { path: filePath, cause: error });
    }
    if (!stats.isFile()) {
      return null;
    }

    let read: TagReadResult;
    try {
      read = await this.tagService.readTagsOrEmpty(filePath);
    } catch (error) {
      if (!(await this.exists(filePath))) {
        return null;
      }
      this.logger.warn(`Could not read ${filePath}; listing it without metadata`, error);
      read = { tags: emptyTagSet(), status: 'corrupt' };
    }
    const { tags, status } = read;
    return {
      path: filePath,
      fileName: path.basename(filePath),
      title: tags.title ?? displayNameFor(filePath),
      artist: tags.artist ?? null,
      album: tags.album ?? null,
      year: tags.year ?? null,
      genre: tags.genre ?? null,
      provenance: tags.provenance,
      visible: isVisiblePath(filePath),
      tagStatus: status,
      modifiedAt: stats.mtimeMs,
      size: stats.size
    };
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async assertDirectory(directory: string): Promise<void> {
    try {
      const stats = await fs.stat(directory);
      if (!stats.isDirectory()) {
        throw new IoError(`Library path is not a directory: ${directory}`, { path: directory });
      }
    } catch (error) {
      if (error instanceof IoError) {
        throw error;
      }
      throw new IoError(`Library directory is not readable: ${directory}`, { path: directory, cause: error });
    }
  }
}

import path from 'node:path';
import { NameCollisionError, SongNotFoundError, toLibraryError } from '../../shared/errors';
import { Logger } from '../utils/Logger';
import { FileService } from './FileService';

/** Canonical audio extension. Compared case-insensitively. */
export const AUDIO_EXTENSION = '.mp3';
/** Marker appended to hide a song from the catalog and from media players. */
export const HIDDEN_SUFFIX = '.hidden';
export const HIDDEN_EXTENSION = `${AUDIO_EXTENSION}${HIDDEN_SUFFIX}`;

export function isVisiblePath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(AUDIO_EXTENSION);
}

export function isHiddenPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(HIDDEN_EXTENSION);
}

/** True for file names the scanner manages: `.mp3` or `.mp3.hidden`, case-insensitive, not dot-files. */
export function isAudioCandidate(filePath: string): boolean {
  const fileName = path.basename(filePath);
  return !fileName.startsWith('.') && (isVisiblePath(fileName) || isHiddenPath(fileName));
}

/** File name without its audio and hidden extensions. */
export function displayNameFor(filePath: string): string {
  const fileName = path.basename(filePath);
  if (isHiddenPath(fileName)) {
    return fileName.slice(0, -HIDDEN_EXTENSION.length);
  }
  if (isVisiblePath(fileName)) {
    return fileName.slice(0, -AUDIO_EXTENSION.length);
  }
  return fileName;
}

/**
 * Hides and shows songs by renaming `x.mp3` to `x.mp3.hidden` and back. File contents are never touched.
 */
export class VisibilityService {
  private readonly logger: Logger;

  public constructor(
    private readonly files: FileService,
    logger: Logger
  ) {
    this.logger = logger.child('VisibilityService');
  }

  /**
   * Returns the hidden path. Hiding an already hidden song returns its path unchanged.
   */
  public async hide(filePath: string): Promise<string> {
    if (isHiddenPath(filePath)) {
      return filePath;
    }
    return this.renameExclusive(filePath, `${filePath}${HIDDEN_SUFFIX}`);
  }

  /**
   * Returns the visible path. Showing a visible song returns its path unchanged.
   */
  public async show(filePath: string): Promise<string> {
    if (!isHiddenPath(filePath)) {
      return filePath;
    }
    return this.renameExclusive(filePath, filePath.slice(0, -HIDDEN_SUFFIX.length));
  }

  public async toggle(filePath: string): Promise<string> {
    return isHiddenPath(filePath) ? this.show(filePath) : this.hide(filePath);
  }

  /**
   * Renames only when the target is free; on collision neither file is touched.
   */
  private async renameExclusive(sourcePath: string, targetPath: string): Promise<string> {
    if (!(await this.files.pathExists(sourcePath))) {
      throw new SongNotFoundError(sourcePath);
    }
    let renamed: boolean;
    try {
      renamed = await this.files.renameNoReplace(sourcePath, targetPath);
    } catch (error) {
      throw toLibraryError(error, { path: sourcePath });
    }
    if (!renamed) {
      throw new NameCollisionError(targetPath, { path: sourcePath });
    }
    this.logger.info(`Renamed ${path.basename(sourcePath)} -> ${path.basename(targetPath)}`);
    return targetPath;
  }
}

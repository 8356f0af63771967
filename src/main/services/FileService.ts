import fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { randomBytes } from 'node:crypto';
import path from 'node:path';
import fg from 'fast-glob';
import { sanitize } from 'sanitize-filename-ts';
import { IoError, hasErrorCode, toLibraryError } from '../../shared/errors';
import { Logger } from '../utils/Logger';

/** Hidden temp names written next to their target: `.<name>.<epochMs>-<pid>-<hex>.tmp`. */
const TEMP_FILE_PATTERN = /^\..+\.\d+-(\d+)-[a-f0-9]+\.tmp$/;
/** Per-process staging directories: `<pid>-<hex>`. */
const SESSION_DIRECTORY_PATTERN = /^(\d+)-[a-f0-9]+$/;
const MAX_NAME_LENGTH = 120;
const MAX_NAME_ATTEMPTS = 1000;

/**
 * True while a process with this pid exists. A process owned by another user still counts as alive.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  if (pid === process.pid) {
    return true;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return !hasErrorCode(error, 'ESRCH');
  }
}

/**
 * Filesystem primitives shared by the jobs: temp naming, atomic replacement, orphan recovery
 * and collision-free installation.
 */
export class FileService {
  private readonly logger: Logger;

  public constructor(logger: Logger) {
    this.logger = logger.child('FileService');
  }

  /**
   * Builds a hidden temp path in the same directory as the target, so a rename onto the target stays atomic.
   */
  public tempPathFor(targetPath: string): string {
    const directory = path.dirname(targetPath);
    const base = path.basename(targetPath);
    return path.join(directory, `.${base}.${Date.now()}-${process.pid}-${randomBytes(4).toString('hex')}.tmp`);
  }

  public isTempFileName(fileName: string): boolean {
    return TEMP_FILE_PATTERN.test(fileName);
  }

  /** Name for this process's own staging directory under the shared staging root. */
  public sessionDirectoryName(): string {
    return `${process.pid}-${randomBytes(4).toString('hex')}`;
  }

  public async pathExists(targetPath: string): Promise<boolean> {
    try {
      await fs.access(targetPath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Writes bytes to a temp sibling, flushes them and renames over the target.
   */
  public async writeFileAtomic(targetPath: string, data: Uint8Array): Promise<void> {
    const tempPath = this.tempPathFor(targetPath);
    try {
      const handle = await fs.open(tempPath, 'wx');
      try {
        await handle.writeFile(data);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, targetPath);
    } catch (error) {
      await this.removeQuietly(tempPath);
      throw new IoError(`Failed to write ${targetPath}`, { path: targetPath, cause: error });
    }
  }

  /**
   * Moves a file, falling back to copy + delete across devices.
   */
  public async moveFile(sourcePath: string, destPath: string): Promise<void> {
    try {
      await fs.rename(sourcePath, destPath);
    } catch (error) {
      if (!hasErrorCode(error, 'EXDEV')) {
        throw toLibraryError(error, { path: sourcePath });
      }
      try {
        await fs.copyFile(sourcePath, destPath, fsConstants.COPYFILE_EXCL);
        await fs.unlink(sourcePath);
      } catch (copyError) {
        await this.removeQuietly(destPath);
        throw toLibraryError(copyError, { path: sourcePath });
      }
    }
  }

  /**
   * Moves a finished file into a directory under `<baseName><extension>`, adding " (2)", " (3)", ...
   * until a name is free. `reservedExtensions` lists sibling extensions that also count as taken.
   * An existing file is never overwritten.
   */
  public async installUnique(
    sourcePath: string,
    directory: string,
    baseName: string,
    extension: string,
    reservedExtensions: string[] = []
  ): Promise<string> {
    const stagingPath = this.tempPathFor(path.join(directory, `${baseName}${extension}`));
    await this.moveFile(sourcePath, stagingPath);

    try {
      for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt += 1) {
        const candidateBase = attempt === 1 ? baseName : `${baseName} (${attempt})`;
        const candidatePath = path.join(directory, `${candidateBase}${extension}`);
        const reserved = await Promise.all(
          reservedExtensions.map((suffix) => this.pathExists(path.join(directory, `${candidateBase}${suffix}`)))
        );
        if (reserved.some(Boolean)) {
          continue;
        }
        if (await this.renameNoReplace(stagingPath, candidatePath)) {
          this.logger.debug(`Installed ${candidatePath}`);
          return candidatePath;
        }
      }
    } catch (error) {
      await this.removeQuietly(stagingPath);
      throw toLibraryError(error, { path: directory });
    }

    await this.removeQuietly(stagingPath);
    throw new IoError(`Failed to allocate a file name for ${baseName}`, { path: directory });
  }

  /**
   * Deletes temp files in the library directory and staging directories whose owning process has exited.
   * Work of a process that is still running is left alone. Orphans are never adopted into the library.
   */
  public async cleanupOrphans(libraryRoot: string, stagingRoot: string): Promise<number> {
    let cleaned = 0;

    const candidates = await fg(['.*.tmp'], {
      cwd: libraryRoot,
      absolute: true,
      onlyFiles: true,
      dot: true,
      deep: 1,
      suppressErrors: true
    });
    for (const tempFile of candidates) {
      const match = TEMP_FILE_PATTERN.exec(path.basename(tempFile));
      if (!match) {
        this.logger.warn(`Found temp file with unknown pattern: ${tempFile}`);
        continue;
      }
      if (isProcessAlive(Number(match[1]))) {
        this.logger.debug(`Keeping temp file of a running process: ${tempFile}`);
        continue;
      }
      if (await this.removeQuietly(tempFile)) {
        cleaned += 1;
      }
    }

    const sessions = await fg(['*'], {
      cwd: stagingRoot,
      absolute: true,
      onlyDirectories: true,
      dot: true,
      deep: 1,
      suppressErrors: true
    });
    for (const sessionDirectory of sessions) {
      const match = SESSION_DIRECTORY_PATTERN.exec(path.basename(sessionDirectory));
      if (!match) {
        this.logger.warn(`Found staging directory with unknown pattern: ${sessionDirectory}`);
        continue;
      }
      if (isProcessAlive(Number(match[1]))) {
        continue;
      }
      if (await this.removeDirectory(sessionDirectory)) {
        cleaned += 1;
      }
    }

    if (cleaned > 0) {
      this.logger.info(`Removed ${cleaned} orphaned temp file(s) and staging directories`);
    }
    return cleaned;
  }

  /**
   * Deletes a directory tree. Returns false when deletion failed.
   */
  public async removeDirectory(directory: string): Promise<boolean> {
    try {
      await fs.rm(directory, { recursive: true, force: true });
      return true;
    } catch (error) {
      this.logger.warn(`Failed to remove ${directory}`, error);
      return false;
    }
  }

  /**
   * Deletes a file if it exists. Returns false when there was nothing to delete or deletion failed.
   */
  public async removeQuietly(targetPath: string): Promise<boolean> {
    try {
      await fs.unlink(targetPath);
      return true;
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.warn(`Failed to remove ${targetPath}`, error);
      }
      return false;
    }
  }

  public async ensureDirectory(directory: string): Promise<void> {
    try {
      await fs.mkdir(directory, { recursive: true });
    } catch (error) {
      throw new IoError(`Failed to create directory ${directory}`, { path: directory, cause: error });
    }
  }

  /**
   * Turns a song title into a safe file name stem of at most 120 characters. Leading dots are dropped so the
   * result never names a dot-file.
   */
  public sanitizeFileName(name: string): string {
    const cleaned = sanitize(name.replace(/\s+/g, ' ').trim())
      .replace(/^[.\s]+/, '')
      .trim();
    const limited = Array.from(cleaned).slice(0, MAX_NAME_LENGTH).join('').replace(/[.\s]+$/, '');
    return limited.length > 0 ? limited : 'Untitled';
  }

  /**
   * Renames without ever replacing an existing target; returns false when the target is taken.
   * Uses link + unlink, which fails on an existing name; filesystems without hard links get a checked rename.
   */
  public async renameNoReplace(sourcePath: string, targetPath: string): Promise<boolean> {
    try {
      await fs.link(sourcePath, targetPath);
      await fs.unlink(sourcePath);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      if (!hasErrorCode(error, 'EPERM') && !hasErrorCode(error, 'ENOTSUP') && !hasErrorCode(error, 'ENOSYS')) {
        throw error;
      }
    }
    if (await this.pathExists(targetPath)) {
      return false;
    }
    await fs.rename(sourcePath, targetPath);
    return true;
  }
}

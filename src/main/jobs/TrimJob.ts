import fs from 'node:fs/promises';
import { InvalidRangeError, IoError, SongNotFoundError } from '../../shared/errors';
import type { DurationProbe, TranscodeTool } from '../services/ExternalTools';
import { FileService } from '../services/FileService';
import { TagService } from '../services/TagService';
import { Job, type JobOptions } from './Job';

export interface TrimJobContext {
  files: FileService;
  tags: TagService;
  transcodeTool: TranscodeTool;
  probeDuration: DurationProbe;
  /** Re-encode instead of stream copying. */
  reencode: boolean;
}

/**
 * Cuts a song down to [startMs, endMs] in place.
 *
 * The cut is written to a hidden temp file beside the song, tagged with the song's current tags and
 * renamed over the original. The original is untouched until that rename.
 */
export class TrimJob extends Job<string> {
  public constructor(
    public readonly songPath: string,
    public readonly startMs: number,
    public readonly endMs: number,
    private readonly context: TrimJobContext,
    options: JobOptions<string>
  ) {
    super('trim', songPath, ['transcoding', 'tagging', 'replacing'], options);
  }

  protected async perform(signal: AbortSignal): Promise<string> {
    const { files, tags } = this.context;
    if (!(await files.pathExists(this.songPath))) {
      throw new SongNotFoundError(this.songPath);
    }
    await this.validateRange();

    const tempPath = files.tempPathFor(this.songPath);
    try {
      this.transition('transcoding');
      await this.context.transcodeTool.transcode({
        inputPath: this.songPath,
        outputPath: tempPath,
        startMs: this.startMs,
        endMs: this.endMs,
        copyCodec: !this.context.reencode,
        signal
      });
      this.throwIfCancelled(signal);

      this.transition('tagging');
      const current = await tags.readTagsOrEmpty(this.songPath);
      await tags.writeTags(tempPath, current.tags);
      this.throwIfCancelled(signal);

      this.transition('replacing');
      try {
        await fs.rename(tempPath, this.songPath);
      } catch (error) {
        throw new IoError(`Failed to replace ${this.songPath}`, { path: this.songPath, cause: error });
      }
      this.logger.info(`Trimmed to ${this.startMs}-${this.endMs}ms`);
      return this.songPath;
    } catch (error) {
      await files.removeQuietly(tempPath);
      throw error;
    }
  }

  private async validateRange(): Promise<void> {
    const { startMs, endMs } = this;
    if (!Number.isFinite(startMs) || !Number.isFinite(endMs) || startMs < 0 || startMs >= endMs) {
      throw new InvalidRangeError(`Invalid trim range ${startMs}-${endMs}ms`, { path: this.songPath });
    }
    const durationMs = await this.context.probeDuration(this.songPath);
    if (durationMs === null) {
      this.logger.warn(`Duration of ${this.songPath} is unknown; not checking the end of the range`);
      return;
    }
    if (endMs > durationMs) {
      throw new InvalidRangeError(`Trim end ${endMs}ms is past the song's end (${durationMs}ms)`, {
        path: this.songPath
      });
    }
  }
}

import path from 'node:path';
import { PROVENANCE_KEYS, type Provenance, type TagSet } from '../../shared/models';
import type { PathLocks } from '../concurrency/PathLocks';
import type { FetchTool, FetchedMetadata, TranscodeTool } from '../services/ExternalTools';
import { FileService } from '../services/FileService';
import { TagService } from '../services/TagService';
import { AUDIO_EXTENSION, HIDDEN_EXTENSION } from '../services/VisibilityService';
import { Logger } from '../utils/Logger';
import { Job } from './Job';

export const UNKNOWN_TITLE = 'Unknown Title';

export interface DownloadJobContext {
  libraryPath: string;
  stagingPath: string;
  files: FileService;
  tags: TagService;
  fetchTool: FetchTool;
  transcodeTool: TranscodeTool;
  logger: Logger;
  /** Guards installation against library-wide operations such as a rescan. */
  locks?: PathLocks;
  /** Called with the installed path before the job completes. */
  onInstalled?: (installedPath: string) => Promise<void>;
  now?: () => Date;
}

/**
 * Fetches a URL, transcodes it to MP3, tags it and installs it into the library under a free name.
 * Everything before installation happens in the staging directory.
 */
export class DownloadJob extends Job<string> {
  public constructor(
    public readonly url: string,
    private readonly context: DownloadJobContext
  ) {
    super('download', url, ['fetching', 'transcoding', 'tagging'], { logger: context.logger });
  }

  protected async perform(signal: AbortSignal): Promise<string> {
    const { files } = this.context;
    await files.ensureDirectory(this.context.stagingPath);
    await files.ensureDirectory(this.context.libraryPath);

    const rawPath = path.join(this.context.stagingPath, `${this.id}.source`);
    const encodedPath = path.join(this.context.stagingPath, `${this.id}${AUDIO_EXTENSION}`);

    try {
      this.transition('fetching');
      const metadata = await this.context.fetchTool.fetch({
        url: this.url,
        outputPath: rawPath,
        signal,
        onProgress: (percentage) => this.reportProgress(percentage)
      });
      this.throwIfCancelled(signal);

      this.transition('transcoding');
      await this.context.transcodeTool.transcode({
        inputPath: rawPath,
        outputPath: encodedPath,
        copyCodec: false,
        signal
      });
      this.throwIfCancelled(signal);

      this.transition('tagging');
      const tags = this.buildTags(metadata);
      await this.context.tags.writeTags(encodedPath, tags);
      this.throwIfCancelled(signal);

      return await this.install(encodedPath, tags.title ?? UNKNOWN_TITLE);
    } finally {
      await files.removeQuietly(rawPath);
      await files.removeQuietly(encodedPath);
    }
  }

  private async install(encodedPath: string, title: string): Promise<string> {
    const release = this.context.locks ? await this.context.locks.acquire(`download:${this.id}`) : null;
    try {
      const installedPath = await this.context.files.installUnique(
        encodedPath,
        this.context.libraryPath,
        this.context.files.sanitizeFileName(title),
        AUDIO_EXTENSION,
        [HIDDEN_EXTENSION]
      );
      this.logger.info(`Installed ${path.basename(installedPath)}`);
      if (this.context.onInstalled) {
        await this.context.onInstalled(installedPath);
      }
      return installedPath;
    } finally {
      release?.();
    }
  }

  private buildTags(metadata: FetchedMetadata): TagSet {
    const downloadedAt = (this.context.now ?? (() => new Date()))();
    const provenance: Provenance = {
      [PROVENANCE_KEYS.sourceUrl]: this.url,
      [PROVENANCE_KEYS.downloadedAt]: downloadedAt.toISOString()
    };
    if (metadata.sourceId) {
      provenance[PROVENANCE_KEYS.sourceId] = metadata.sourceId;
    }

    const tags: TagSet = {
      title: metadata.title ?? titleFromUrl(this.url) ?? metadata.sourceId ?? UNKNOWN_TITLE,
      provenance
    };
    if (metadata.artist) {
      tags.artist = metadata.artist;
    }
    return tags;
  }
}

/**
 * Best-effort title from a source URL: the `v` query parameter, else the last path segment.
 */
export function titleFromUrl(url: string): string | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  const videoId = parsed.searchParams.get('v');
  if (videoId && videoId.trim().length > 0) {
    return videoId.trim();
  }
  const segment = parsed.pathname.split('/').filter((part) => part.length > 0).pop();
  if (!segment) {
    return undefined;
  }
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

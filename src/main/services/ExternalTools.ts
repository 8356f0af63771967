import { spawn } from 'node:child_process';
import { parseFile } from 'music-metadata';
import { FetchError, JobCancelledError, TranscodeError } from '../../shared/errors';
import { Logger } from '../utils/Logger';

const KILL_GRACE_MS = 2000;
const MAX_CAPTURED_OUTPUT = 64 * 1024;

export interface ToolInvocation {
  command: string;
  args: string[];
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Called for each complete stdout line while the tool runs. */
  onStdoutLine?: (line: string) => void;
}

export interface ToolResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the process could not be started at all. */
  spawnError: Error | null;
}

/**
 * Runs an external command to completion. Aborting the signal or exceeding the timeout sends SIGTERM,
 * then SIGKILL after a grace period. Never rejects; the outcome is described by the result.
 */
export function runTool(invocation: ToolInvocation): Promise<ToolResult> {
  return new Promise<ToolResult>((resolve) => {
    if (invocation.signal?.aborted) {
      resolve({ exitCode: null, stdout: '', stderr: '', timedOut: false, aborted: true, spawnError: null });
      return;
    }

    const child = spawn(invocation.command, invocation.args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let pendingLine = '';
    let timedOut = false;
    let aborted = false;
    let spawnError: Error | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    const terminate = (): void => {
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    };

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };
    invocation.signal?.addEventListener('abort', onAbort, { once: true });

    const timeout = invocation.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          terminate();
        }, invocation.timeoutMs)
      : null;

    child.stdout.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      stdout = (stdout + text).slice(-MAX_CAPTURED_OUTPUT);
      if (!invocation.onStdoutLine) {
        return;
      }
      const lines = (pendingLine + text).split(/\r?\n|\r/);
      pendingLine = lines.pop() ?? '';
      for (const line of lines) {
        invocation.onStdoutLine(line);
      }
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-MAX_CAPTURED_OUTPUT);
    });

    const finish = (code: number | null): void => {
      if (timeout) {
        clearTimeout(timeout);
      }
      if (killTimer) {
        clearTimeout(killTimer);
      }
      invocation.signal?.removeEventListener('abort', onAbort);
      if (pendingLine.length > 0 && invocation.onStdoutLine) {
        invocation.onStdoutLine(pendingLine);
        pendingLine = '';
      }
      resolve({ exitCode: code, stdout, stderr, timedOut, aborted, spawnError });
    };

    child.on('error', (error) => {
      spawnError = error;
      // A process that never started emits no reliable 'close'.
      if (child.pid === undefined) {
        finish(null);
      }
    });

    child.on('close', (code) => finish(code));
  });
}

/** Describes why a tool run failed, or null when it succeeded. */
function describeFailure(name: string, result: ToolResult, timeoutMs: number | undefined): string | null {
  if (result.spawnError) {
    return `${name} could not be started: ${result.spawnError.message}`;
  }
  if (result.timedOut) {
    return `${name} timed out after ${timeoutMs ?? 0}ms`;
  }
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim().split(/\r?\n/).slice(-3).join(' | ');
    return `${name} exited with code ${result.exitCode ?? 'null'}${detail ? `: ${detail}` : ''}`;
  }
  return null;
}

/** Metadata the fetch tool reports about the source. */
export interface FetchedMetadata {
  title?: string;
  artist?: string;
  sourceId?: string;
  durationSeconds?: number;
}

export interface FetchRequest {
  url: string;
  /** Where the raw audio must be written. */
  outputPath: string;
  signal: AbortSignal;
  onProgress?: (percentage: number) => void;
}

/**
 * Turns a source URL into a raw audio file. Throws FetchError on failure.
 */
export interface FetchTool {
  fetch(request: FetchRequest): Promise<FetchedMetadata>;
}

export interface TranscodeRequest {
  inputPath: string;
  /** Receives an MP3 stream, regardless of the path's extension. */
  outputPath: string;
  startMs?: number;
  endMs?: number;
  /** Copy the audio stream instead of re-encoding it. */
  copyCodec: boolean;
  signal: AbortSignal;
}

/**
 * Produces an MP3 from an audio file, optionally cut to a range. Throws TranscodeError on failure.
 */
export interface TranscodeTool {
  transcode(request: TranscodeRequest): Promise<void>;
}

/** Returns the playable duration in milliseconds, or null when it cannot be determined. */
export type DurationProbe = (filePath: string) => Promise<number | null>;

const PROGRESS_PATTERN = /\[download\]\s+(\d+(?:\.\d+)?)%/;

/**
 * Fetches audio with yt-dlp. Retrying is left to the user.
 */
export class YtDlpFetchTool implements FetchTool {
  private readonly logger: Logger;

  public constructor(
    private readonly executable: string,
    private readonly timeoutMs: number,
    logger: Logger
  ) {
    this.logger = logger.child('yt-dlp');
  }

  public async fetch(request: FetchRequest): Promise<FetchedMetadata> {
    const args = [
      '--no-playlist',
      '--no-part',
      '--no-mtime',
      '--newline',
      '--format',
      'bestaudio/best',
      '--dump-json',
      '--no-simulate',
      '--output',
      request.outputPath,
      request.url
    ];
    this.logger.info(`Fetching ${request.url}`);

    let metadata: FetchedMetadata = {};
    const result = await runTool({
      command: this.executable,
      args,
      signal: request.signal,
      timeoutMs: this.timeoutMs,
      onStdoutLine: (line) => {
        const progress = PROGRESS_PATTERN.exec(line);
        if (progress) {
          request.onProgress?.(Number.parseFloat(progress[1] ?? '0'));
          return;
        }
        if (line.startsWith('{')) {
          metadata = parseInfoJson(line, this.logger);
        }
      }
    });

    if (result.aborted) {
      throw new JobCancelledError({ stage: 'fetching' });
    }
    const failure = describeFailure('yt-dlp', result, this.timeoutMs);
    if (failure) {
      throw new FetchError(failure, { stage: 'fetching' });
    }
    return metadata;
  }
}

function parseInfoJson(line: string, logger: Logger): FetchedMetadata {
  try {
    const info: unknown = JSON.parse(line);
    if (typeof info !== 'object' || info === null) {
      return {};
    }
    const read = (key: string): string | undefined => {
      const value: unknown = Reflect.get(info, key);
      return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
    };
    const duration: unknown = Reflect.get(info, 'duration');
    return {
      title: read('track') ?? read('title'),
      artist: read('artist') ?? read('uploader') ?? read('channel'),
      sourceId: read('id'),
      durationSeconds: typeof duration === 'number' && Number.isFinite(duration) ? duration : undefined
    };
  } catch (error) {
    logger.warn('Ignoring unparseable info JSON from yt-dlp', error);
    return {};
  }
}

/**
 * Transcodes and trims with ffmpeg.
 */
export class FfmpegTranscodeTool implements TranscodeTool {
  private readonly logger: Logger;

  public constructor(
    private readonly executable: string,
    private readonly timeoutMs: number,
    logger: Logger
  ) {
    this.logger = logger.child('ffmpeg');
  }

  public async transcode(request: TranscodeRequest): Promise<void> {
    const args = ['-hide_banner', '-nostdin', '-loglevel', 'error', '-y'];
    if (request.startMs !== undefined) {
      args.push('-ss', formatSeconds(request.startMs));
    }
    if (request.endMs !== undefined) {
      args.push('-to', formatSeconds(request.endMs));
    }
    args.push('-i', request.inputPath, '-vn', '-map_metadata', '0');
    if (request.copyCodec) {
      args.push('-c:a', 'copy');
    } else {
      args.push('-c:a', 'libmp3lame', '-q:a', '2');
    }
    args.push('-f', 'mp3', request.outputPath);
    this.logger.debug(`ffmpeg ${args.join(' ')}`);

    const result = await runTool({
      command: this.executable,
      args,
      signal: request.signal,
      timeoutMs: this.timeoutMs
    });

    if (result.aborted) {
      throw new JobCancelledError({ stage: 'transcoding' });
    }
    const failure = describeFailure('ffmpeg', result, this.timeoutMs);
    if (failure) {
      throw new TranscodeError(failure, { stage: 'transcoding' });
    }
  }
}

/** Seconds with millisecond precision, as ffmpeg expects for -ss / -to. */
export function formatSeconds(milliseconds: number): string {
  return (milliseconds / 1000).toFixed(3);
}

/**
 * Duration probe backed by music-metadata.
 */
export function createMusicMetadataProbe(logger: Logger): DurationProbe {
  const scoped = logger.child('DurationProbe');
  return async (filePath: string): Promise<number | null> => {
    try {
      const metadata = await parseFile(filePath, { duration: true });
      const seconds = metadata.format.duration;
      return typeof seconds === 'number' && Number.isFinite(seconds) ? Math.round(seconds * 1000) : null;
    } catch (error) {
      scoped.warn(`Failed to probe duration of ${filePath}`, error);
      return null;
    }
  };
}

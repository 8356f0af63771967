export type LibraryErrorCode =
  | 'IO_ERROR'
  | 'CORRUPT_TAG'
  | 'FETCH_ERROR'
  | 'TRANSCODE_ERROR'
  | 'NAME_COLLISION'
  | 'INVALID_RANGE'
  | 'CONCURRENT_MUTATION'
  | 'JOB_CANCELLED'
  | 'SONG_NOT_FOUND';

export interface LibraryErrorDetails {
  path?: string;
  stage?: string;
  cause?: unknown;
}

/**
 * Base class for every error the library engine surfaces to callers.
 */
export class LibraryError extends Error {
  public readonly path?: string;
  public stage?: string;

  public constructor(
    public readonly code: LibraryErrorCode,
    message: string,
    details: LibraryErrorDetails = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = new.target.name;
    this.path = details.path;
    this.stage = details.stage;
  }

  /**
   * Records the stage the error was raised in, keeping the innermost one.
   */
  public withStage(stage: string): this {
    this.stage ??= stage;
    return this;
  }

  public toJSON(): { code: string; message: string; path?: string; stage?: string } {
    return { code: this.code, message: this.message, path: this.path, stage: this.stage };
  }
}

/** Permission, disk or other filesystem failure. */
export class IoError extends LibraryError {
  public constructor(message: string, details: LibraryErrorDetails = {}) {
    super('IO_ERROR', message, details);
  }
}

/** Malformed tag container. Callers treat this as "no metadata". */
export class CorruptTagError extends LibraryError {
  public constructor(message: string, details: LibraryErrorDetails = {}) {
    super('CORRUPT_TAG', message, details);
  }
}

/** The fetch tool exited non-zero, could not be started or timed out. */
export class FetchError extends LibraryError {
  public constructor(message: string, details: LibraryErrorDetails = {}) {
    super('FETCH_ERROR', message, details);
  }
}

/** The transcode tool exited non-zero, could not be started or timed out. */
export class TranscodeError extends LibraryError {
  public constructor(message: string, details: LibraryErrorDetails = {}) {
    super('TRANSCODE_ERROR', message, details);
  }
}

export class NameCollisionError extends LibraryError {
  public constructor(public readonly targetPath: string, details: LibraryErrorDetails = {}) {
    super('NAME_COLLISION', `A file already exists at ${targetPath}`, details);
  }
}

export class InvalidRangeError extends LibraryError {
  public constructor(message: string, details: LibraryErrorDetails = {}) {
    super('INVALID_RANGE', message, details);
  }
}

/** Another operation holds the lock for this song. */
export class ConcurrentMutationError extends LibraryError {
  public constructor(path: string) {
    super('CONCURRENT_MUTATION', `Song is busy: ${path}`, { path });
  }
}

export class JobCancelledError extends LibraryError {
  public constructor(details: LibraryErrorDetails = {}) {
    super('JOB_CANCELLED', 'Job was cancelled', details);
  }
}

export class SongNotFoundError extends LibraryError {
  public constructor(path: string) {
    super('SONG_NOT_FOUND', `No song at ${path}`, { path });
  }
}

/**
 * Normalises anything thrown into a LibraryError, wrapping Node errno errors as IoError.
 */
export function toLibraryError(error: unknown, details: LibraryErrorDetails = {}): LibraryError {
  if (error instanceof LibraryError) {
    return details.stage !== undefined ? error.withStage(details.stage) : error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new IoError(message, { ...details, cause: error });
}

/**
 * Type guard for Node system errors carrying an errno code.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}

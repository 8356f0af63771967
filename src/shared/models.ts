/**
 * Flat key/value store serialized into the provenance comment of each song.
 */
export type Provenance = Record<string, string>;

/** Provenance keys CrossPlay writes itself. Other keys are carried through untouched. */
export const PROVENANCE_KEYS = {
  sourceUrl: 'source_url',
  sourceId: 'source_id',
  downloadedAt: 'downloaded_at',
  metadataEdited: 'metadata_edited'
} as const;

/**
 * Embedded tag fields CrossPlay understands.
 */
export interface TagSet {
  title?: string;
  artist?: string;
  album?: string;
  year?: string;
  genre?: string;
  provenance: Provenance;
}

/**
 * Tag edit produced by the metadata dialog. `null` clears a text field; provenance entries are merged.
 */
export interface TagEdit {
  title?: string | null;
  artist?: string | null;
  album?: string | null;
  year?: string | null;
  genre?: string | null;
  provenance?: Provenance;
}

/** How the tag block of a file was read during a scan. */
export type TagStatus = 'ok' | 'missing' | 'corrupt';

/** Open trim proposal, in milliseconds from the start of the song. */
export interface TrimBounds {
  startMs: number;
  endMs: number;
}

/**
 * Catalog entry derived from one file in the library directory.
 */
export interface Song {
  /** Absolute path on disk; the identity of the song. */
  path: string;
  /** Filename with extension. */
  fileName: string;
  /** Embedded title, or the file name without its audio extension. */
  title: string;
  artist: string | null;
  album: string | null;
  year: string | null;
  genre: string | null;
  provenance: Provenance;
  /** True when the file carries the canonical audio extension. */
  visible: boolean;
  tagStatus: TagStatus;
  /** Last modified timestamp (epoch milliseconds). */
  modifiedAt: number;
  /** File size in bytes. */
  size: number;
  /** Present only while the user has an open trim proposal. */
  trimBounds?: TrimBounds;
}

export type SortBy = 'title' | 'artist' | 'album' | 'downloaded';
export type SortDirection = 'normal' | 'reverse';
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Persisted application settings.
 */
export interface AppSettings {
  /** Library directory scanned for songs. */
  libraryPath: string;
  /** Directory for download staging files; kept outside the library. */
  stagingPath: string;
  fetchToolPath: string;
  transcodeToolPath: string;
  maxConcurrentJobs: number;
  /** Upper bound for a single external tool run. */
  toolTimeoutMs: number;
  /** Re-encode trimmed audio instead of stream copying it. */
  reencodeTrim: boolean;
  logLevel: LogLevelName;
  sortBy: SortBy;
  sortDirection: SortDirection;
}

export type JobKind = 'download' | 'trim' | 'hide' | 'show' | 'delete' | 'tag';

export type JobState =
  | 'pending'
  | 'running'
  | 'fetching'
  | 'transcoding'
  | 'tagging'
  | 'replacing'
  | 'complete'
  | 'failed'
  | 'cancelled';

/** Serializable view of a job for listings. */
export interface JobSummary {
  id: string;
  kind: JobKind;
  /** Song path or source URL the job works on. */
  target: string;
  state: JobState;
  /** Percentage in [0, 100] when the running stage reports one. */
  progress: number | null;
  error: { code: string; message: string; path?: string; stage?: string } | null;
}

/** Published whenever the catalog changes. */
export type CatalogChange =
  | { type: 'added'; song: Song }
  | { type: 'removed'; path: string }
  | { type: 'replaced'; previousPath: string; song: Song }
  | { type: 'updated'; song: Song }
  | { type: 'rescanned'; total: number };

/**
 * Summary report for a library scan run.
 */
export interface LibraryScanSummary {
  /** Number of songs not present in the previous snapshot. */
  added: number;
  /** Number of snapshot entries whose files disappeared. */
  removed: number;
  /** Total songs after the scan. */
  total: number;
  /** Songs whose tag block could not be parsed. */
  corrupt: number;
}

import { PROVENANCE_KEYS, type Song, type SortBy, type SortDirection } from './models';

function textKey(value: string | null): string {
  return (value ?? '').toLowerCase();
}

/** Epoch ms from the downloaded_at provenance entry; 0 when absent or unparseable. */
export function downloadedAtOf(song: Song): number {
  const raw = song.provenance[PROVENANCE_KEYS.downloadedAt];
  if (!raw) {
    return 0;
  }
  const parsed = Date.parse(raw);
  return Number.isNaN(parsed) ? 0 : parsed;
}

const COMPARATORS: Record<SortBy, (a: Song, b: Song) => number> = {
  title: (a, b) => compareText(textKey(a.title), textKey(b.title)),
  artist: (a, b) => compareText(textKey(a.artist), textKey(b.artist)),
  album: (a, b) => compareText(textKey(a.album), textKey(b.album)),
  // Newest first.
  downloaded: (a, b) => downloadedAtOf(b) - downloadedAtOf(a)
};

function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Returns a sorted copy. Ties keep catalog order; `reverse` flips the whole result.
 */
export function sortSongs(songs: readonly Song[], sortBy: SortBy, direction: SortDirection = 'normal'): Song[] {
  const sorted = [...songs].sort(COMPARATORS[sortBy]);
  return direction === 'reverse' ? sorted.reverse() : sorted;
}

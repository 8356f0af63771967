/**
 * Parses `ss`, `ss.mmm`, `mm:ss(.mmm)` or `hh:mm:ss(.mmm)` into milliseconds. Returns null for anything else.
 */
export function parseTimecode(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+(?::\d{1,2}){0,2}(?:\.\d{1,3})?$/.test(trimmed)) {
    return null;
  }
  const [clock = '', fraction = ''] = trimmed.split('.');
  const parts = clock.split(':').map((part) => Number.parseInt(part, 10));
  const [first = 0, ...rest] = parts;
  if (rest.some((part) => part >= 60)) {
    return null;
  }
  const seconds = rest.reduce((total, part) => total * 60 + part, first);
  const millis = fraction.length > 0 ? Number.parseInt(fraction.padEnd(3, '0'), 10) : 0;
  return seconds * 1000 + millis;
}

/** `m:ss.mmm`, with hours when needed. */
export function formatTimecode(milliseconds: number): string {
  const total = Math.max(0, Math.round(milliseconds));
  const millis = total % 1000;
  const totalSeconds = Math.floor(total / 1000);
  const seconds = totalSeconds % 60;
  const minutes = Math.floor(totalSeconds / 60) % 60;
  const hours = Math.floor(totalSeconds / 3600);
  const tail = `${String(seconds).padStart(2, '0')}.${String(millis).padStart(3, '0')}`;
  return hours > 0 ? `${hours}:${String(minutes).padStart(2, '0')}:${tail}` : `${minutes}:${tail}`;
}

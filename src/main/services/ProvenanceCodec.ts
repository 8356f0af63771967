import type { Provenance } from '../../shared/models';

const ENTRY_SEPARATOR = ';';
const KEY_VALUE_SEPARATOR = '=';

/*
 * Escaping rule: '%' -> %25, ';' -> %3B, '=' -> %3D in both keys and values.
 * Nothing else is touched, so URL percent-escapes survive ("%20" is stored as "%2520").
 */
const ESCAPES: Record<string, string> = {
  '%': '%25',
  ';': '%3B',
  '=': '%3D'
};

const UNESCAPES: Record<string, string> = {
  '25': '%',
  '3B': ';',
  '3D': '='
};

function escapeComponent(value: string): string {
  return value.replace(/[%;=]/g, (char) => ESCAPES[char] ?? char);
}

function unescapeComponent(value: string): string {
  return value.replace(/%(25|3B|3D)/gi, (match, hex: string) => UNESCAPES[hex.toUpperCase()] ?? match);
}

/**
 * Serialises a provenance map into comment text. Keys are sorted so equal maps give equal text.
 */
export function encodeProvenance(provenance: Provenance): string {
  return Object.keys(provenance)
    .sort()
    .map((key) => `${escapeComponent(key)}${KEY_VALUE_SEPARATOR}${escapeComponent(provenance[key] ?? '')}`)
    .join(ENTRY_SEPARATOR);
}

/**
 * Parses comment text produced by {@link encodeProvenance}.
 * Returns null when the text is not in provenance format (a comment written by another tool).
 */
export function decodeProvenance(text: string): Provenance | null {
  if (text.length === 0) {
    return {};
  }
  const entries = new Map<string, string>();
  for (const segment of text.split(ENTRY_SEPARATOR)) {
    const separatorIndex = segment.indexOf(KEY_VALUE_SEPARATOR);
    if (separatorIndex === -1) {
      return null;
    }
    entries.set(
      unescapeComponent(segment.slice(0, separatorIndex)),
      unescapeComponent(segment.slice(separatorIndex + 1))
    );
  }
  return Object.fromEntries(entries);
}

/**
 * Merges provenance updates over an existing map. Existing keys absent from the update are kept.
 */
export function mergeProvenance(existing: Provenance, updates: Provenance | undefined): Provenance {
  return { ...existing, ...(updates ?? {}) };
}

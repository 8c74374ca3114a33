import type { CatalogueEntry, FieldCatalogue } from './field-catalogue.js';

const STOPWORDS = new Set(['of', 'the', 'and', 'or', 'at', 'in', 'for', 'to', 'from']);

const ABBREVIATIONS: ReadonlyMap<string, string> = new Map([
  ['yrs', 'years'],
  ['yr', 'year'],
  ['pct', 'percent'],
  ['num', 'number'],
  ['nbr', 'number'],
  ['amt', 'amount'],
]);

export type MatchKind = 'name' | 'canonical' | 'alias' | 'unmatched';

export interface ResolvedColumn {
  /** Position in the header row */
  index: number;
  header: string;
  field: string;
  matchedBy: MatchKind;
  entry?: CatalogueEntry | undefined;
}

/**
 * Lowercase snake case: every run of characters other than letters and digits
 * becomes a single underscore.
 */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^0-9a-z]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Spelling-insensitive key: stop words dropped, common abbreviations expanded,
 * separators removed. "Yrs in Home" and "years_in_home" share a key.
 */
export function canonicalKey(header: string): string {
  return normalizeHeader(header)
    .split('_')
    .filter((token) => token.length > 0 && !STOPWORDS.has(token))
    .map((token) => ABBREVIATIONS.get(token) ?? token)
    .join('');
}

/**
 * Map each header to a catalogue field. A field is claimed by the first header
 * that matches it; later headers for the same field keep their own names.
 */
export function resolveColumns(headers: readonly string[], catalogue: FieldCatalogue): ResolvedColumn[] {
  const byCanonical = new Map<string, CatalogueEntry>();
  const byAlias = new Map<string, CatalogueEntry>();
  for (const entry of catalogue.entries) {
    const key = canonicalKey(entry.name);
    if (!byCanonical.has(key)) byCanonical.set(key, entry);
    for (const alias of entry.aliases) {
      byAlias.set(normalizeHeader(alias), entry);
    }
  }

  const claimed = new Set<string>();
  const usedNames = new Set<string>();

  return headers.map((header, index): ResolvedColumn => {
    const normalized = normalizeHeader(header);
    const candidates: [MatchKind, CatalogueEntry | undefined][] = [
      ['name', catalogue.get(normalized)],
      ['canonical', byCanonical.get(canonicalKey(header))],
      ['alias', byAlias.get(normalized)],
    ];

    for (const [matchedBy, entry] of candidates) {
      if (entry && !claimed.has(entry.name)) {
        claimed.add(entry.name);
        usedNames.add(entry.name);
        return { entry, field: entry.name, header, index, matchedBy };
      }
    }

    return { field: uniqueName(normalized || `column_${index + 1}`, usedNames), header, index, matchedBy: 'unmatched' };
  });
}

function uniqueName(base: string, used: Set<string>): string {
  let name = base;
  for (let suffix = 2; used.has(name); suffix++) {
    name = `${base}_${suffix}`;
  }
  used.add(name);
  return name;
}

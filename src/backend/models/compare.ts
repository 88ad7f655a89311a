/**
 * String normalisation used for identity comparisons between provider records.
 */

const SORT_PREFIXES = ['the ', 'de ', 'les ', 'dj ', '.', '-', "'", '`'];

/** Lowercase, strip diacritics. */
function fold(input: string): string {
  return input
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim();
}

/**
 * Derives the sort name of an item from its display name.
 * Leading articles and punctuation are dropped so "The Beatles" and "Beatles" sort together.
 */
export function createSortName(name: string): string {
  let sortName = fold(name ?? '');
  for (const prefix of SORT_PREFIXES) {
    if (sortName.startsWith(prefix)) {
      sortName = sortName.slice(prefix.length).trim();
    }
  }
  return sortName.replace(/\s+/g, ' ');
}

/**
 * Alphanumeric-only projection, insensitive to case, accents, spacing and punctuation.
 */
export function createSafeString(input: string): string {
  return fold(input ?? '').replace(/[^a-z0-9]/g, '');
}

/**
 * Compares two names. Strict mode compares sort names; loose mode compares safe strings.
 */
export function compareStrings(a: string | undefined, b: string | undefined, strict = true): boolean {
  if (a === undefined || b === undefined) return false;
  if (!strict) return createSafeString(a) === createSafeString(b);
  return createSortName(a) === createSortName(b);
}

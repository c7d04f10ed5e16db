import type { NewsRecordFields } from './record.js';

type SignatureInput = Pick<NewsRecordFields, 'url' | 'title'>;

const TRACKING_PREFIXES = ['utm_', 'mc_', 'mkt_', 'pk_'];
const TRACKING_KEYS = new Set([
  'utm',
  'fbclid',
  'gclid',
  'dclid',
  'msclkid',
  'yclid',
  'igshid',
  'spm',
  'ref',
  'ref_src',
]);

function isTrackingParam(key: string): boolean {
  const lower = key.toLowerCase();
  return TRACKING_KEYS.has(lower) || TRACKING_PREFIXES.some((p) => lower.startsWith(p));
}

/**
 * Normalize a URL for dedup comparison:
 * - Lowercase scheme + host
 * - Remove tracking params (utm, utm_*, fbclid, gclid, ...)
 * - Sort remaining query params
 * - Strip trailing slashes and the fragment
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    // Not an absolute URL; compare as written
    return raw.trim();
  }

  const keysToRemove = [...new Set(url.searchParams.keys())].filter(isTrackingParam);
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }
  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }

  const search = url.searchParams.toString();
  return `${url.protocol.toLowerCase()}//${url.host.toLowerCase()}${pathname}${search ? '?' + search : ''}`;
}

const PUNCTUATION = /[\p{P}\p{S}]/gu;

/**
 * Normalize a display title: NFKC, drop punctuation and symbols, collapse
 * whitespace, lower-case.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize('NFKC')
    .replace(PUNCTUATION, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export interface SignatureStrategy {
  name: string;
  /** Returns a key, or null to defer to the next strategy. */
  derive(record: SignatureInput): string | null;
}

export const urlStrategy: SignatureStrategy = {
  name: 'url',
  derive: (record) => {
    const url = record.url?.trim();
    return url ? `u:${normalizeUrl(url)}` : null;
  },
};

export const titleStrategy: SignatureStrategy = {
  name: 'title',
  derive: (record) => `t:${normalizeTitle(record.title)}`,
};

export const DEFAULT_SIGNATURE_STRATEGIES: readonly SignatureStrategy[] = [urlStrategy, titleStrategy];

/**
 * Canonical dedup key: the first strategy that yields a key wins.
 * The title strategy always yields, so every record gets a signature.
 */
export function signatureOf(
  record: SignatureInput,
  strategies: readonly SignatureStrategy[] = DEFAULT_SIGNATURE_STRATEGIES,
): string {
  for (const strategy of strategies) {
    const key = strategy.derive(record);
    if (key !== null) return key;
  }
  return titleStrategy.derive(record) ?? 't:';
}

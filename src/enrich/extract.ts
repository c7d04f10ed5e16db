import { JSDOM } from 'jsdom';
import { toIsoTimestamp } from '../shared/time.js';

/** `<meta>` names/properties that carry a publish time, in preference order. */
export const PUBLISH_META_KEYS = [
  'article:published_time',
  'og:published_time',
  'article:published',
  'datepublished',
  'publishdate',
  'pubdate',
  'parsely-pub-date',
  'dc.date',
  'weibo: article:create_at',
] as const;

/** JSON / JSON-LD keys that carry a publish time, in preference order. */
export const JSON_DATE_KEYS = [
  'datePublished',
  'dateCreated',
  'publishTime',
  'publishedAt',
  'published_at',
  'pubDate',
  'uploadDate',
  'dateModified',
] as const;

// Loose key/value pairs left in inline scripts by client-rendered pages.
const INLINE_DATE_PATTERNS = [
  /"datePublished"\s*:\s*"([^"]+)"/gi,
  /"dateCreated"\s*:\s*"([^"]+)"/gi,
  /"publish(?:Time|_time|At|_at)"\s*:\s*"([^"]+)"/gi,
  /"pubDate"\s*:\s*"([^"]+)"/gi,
  /"(?:created_at|createdAt)"\s*:\s*"([^"]+)"/gi,
  /"ctime"\s*:\s*"?(\d{10,13})"?/gi,
];

const MAX_JSON_DEPTH = 32;

/**
 * Collect publish-time candidates from a parsed JSON value, preferred keys of
 * each object before its children.
 */
export function collectJsonDates(value: unknown, collector: unknown[], depth = 0): void {
  if (depth > MAX_JSON_DEPTH || value === null || typeof value !== 'object') return;

  if (Array.isArray(value)) {
    for (const item of value) collectJsonDates(item, collector, depth + 1);
    return;
  }

  const obj: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  for (const key of JSON_DATE_KEYS) {
    const candidate = obj[key];
    if (candidate !== undefined && candidate !== null && candidate !== '') {
      collector.push(candidate);
    }
  }
  for (const child of Object.values(obj)) {
    collectJsonDates(child, collector, depth + 1);
  }
}

function firstTimestamp(candidates: Iterable<unknown>): string | null {
  for (const candidate of candidates) {
    const parsed = toIsoTimestamp(candidate);
    if (parsed) return parsed;
  }
  return null;
}

function metaCandidates(document: Document): string[] {
  const byKey = new Map<string, string>();
  for (const meta of document.querySelectorAll('meta')) {
    const key = (
      meta.getAttribute('property') ??
      meta.getAttribute('name') ??
      meta.getAttribute('itemprop') ??
      ''
    ).toLowerCase();
    const content = meta.getAttribute('content')?.trim();
    if (key && content && !byKey.has(key)) byKey.set(key, content);
  }

  const candidates: string[] = [];
  for (const key of PUBLISH_META_KEYS) {
    const content = byKey.get(key);
    if (content) candidates.push(content);
  }
  return candidates;
}

function jsonLdCandidates(document: Document): unknown[] {
  const candidates: unknown[] = [];
  for (const script of document.querySelectorAll('script[type="application/ld+json"]')) {
    let payload = (script.textContent ?? '').trim();
    if (payload.startsWith('<!--') && payload.endsWith('-->')) {
      payload = payload.slice(4, -3).trim();
    }
    if (!payload) continue;

    let data: unknown;
    try {
      data = JSON.parse(payload);
    } catch {
      continue; // malformed block; later blocks may still parse
    }
    collectJsonDates(data, candidates);
  }
  return candidates;
}

function timeElementCandidates(document: Document): string[] {
  return [...document.querySelectorAll('time[datetime]')]
    .map((el) => el.getAttribute('datetime')?.trim() ?? '')
    .filter((v) => v.length > 0);
}

function inlineScriptCandidates(html: string): string[] {
  const candidates: string[] = [];
  for (const pattern of INLINE_DATE_PATTERNS) {
    for (const match of html.matchAll(pattern)) {
      if (match[1]) candidates.push(match[1]);
    }
  }
  return candidates;
}

/**
 * Extract a publish time from an article page. Sources are tried in order:
 * `<meta>` publish fields, JSON-LD, `<time datetime>`, then loose JSON keys in
 * inline scripts. The first candidate that parses wins.
 */
export function extractPublishTimeFromHtml(html: string): string | null {
  if (!html.trim()) return null;

  const { document } = new JSDOM(html).window;

  return (
    firstTimestamp(metaCandidates(document)) ??
    firstTimestamp(jsonLdCandidates(document)) ??
    firstTimestamp(timeElementCandidates(document)) ??
    firstTimestamp(inlineScriptCandidates(html))
  );
}

/**
 * Extract a publish time from a JSON API response.
 */
export function extractPublishTimeFromJson(payload: unknown): string | null {
  const candidates: unknown[] = [];
  collectJsonDates(payload, candidates);
  return firstTimestamp(candidates);
}

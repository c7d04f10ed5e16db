import { z } from 'zod';
import { signatureOf } from './signature.js';
import { toIsoTimestamp } from '../shared/time.js';
import { InputError } from '../shared/errors.js';

/**
 * One sighting of a story on a source's ranked list.
 */
export interface RankObservation {
  source: string;
  rank: number;
  /** ISO-8601 UTC instant. */
  observed_at: string;
}

export interface NewsRecordFields {
  title: string;
  url?: string;
  mobileUrl?: string;
  /** Every source that reported the item, in first-seen order. */
  source_names: string[];
  rank_timeline: RankObservation[];
  /** Lowest rank ever observed; lower is more prominent. */
  best_rank: number;
  /** Raw observations folded into this record. */
  observed_count: number;
  is_new: boolean;
  published_at?: string;
}

/**
 * A news item as tracked through dedup and enrichment. `signature` is always
 * derived from the url/title, so records are only built through createNewsRecord.
 */
export interface NewsRecord extends NewsRecordFields {
  readonly signature: string;
}

export function createNewsRecord(fields: NewsRecordFields): NewsRecord {
  const record: NewsRecordFields = {
    title: fields.title,
    source_names: [...fields.source_names],
    rank_timeline: fields.rank_timeline.map((o) => ({ ...o })),
    best_rank: fields.best_rank,
    observed_count: fields.observed_count,
    is_new: fields.is_new,
  };
  if (fields.url !== undefined) record.url = fields.url;
  if (fields.mobileUrl !== undefined) record.mobileUrl = fields.mobileUrl;
  if (fields.published_at !== undefined) record.published_at = fields.published_at;

  return { ...record, signature: signatureOf(record) };
}

/**
 * Rebuild a record with some fields replaced; the signature is recomputed.
 */
export function withFields(record: NewsRecord, patch: Partial<NewsRecordFields>): NewsRecord {
  const { signature: _signature, ...fields } = record;
  return createNewsRecord({ ...fields, ...patch });
}

// ================================================================
// Raw observations from crawlers
// ================================================================

/** Payload keys crawlers use for a publish time, in preference order. */
export const PAYLOAD_PUBLISH_TIME_KEYS = [
  'published_at',
  'publishedAt',
  'published_time',
  'publish_time',
  'pubDate',
  'pub_date',
  'date',
  'datetime',
  'created_at',
  'createdAt',
] as const;

const TimeLike = z.union([z.string(), z.number()]);

export const RawObservationSchema = z
  .object({
    source: z.string().min(1),
    title: z.string().optional(),
    url: z.string().optional(),
    mobileUrl: z.string().optional(),
    mobile_url: z.string().optional(),
    rank: z.number().int().positive(),
    observed_at: TimeLike.optional(),
    is_new: z.boolean().optional(),
    extra: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type RawObservation = z.infer<typeof RawObservationSchema>;

function presentString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Publish time carried by the crawler payload itself, top-level keys first,
 * then the `extra` bag.
 */
export function payloadPublishTime(observation: Record<string, unknown>): string | undefined {
  const bags: Array<Record<string, unknown>> = [observation];
  const extra = observation['extra'];
  if (extra !== null && typeof extra === 'object' && !Array.isArray(extra)) {
    bags.push(Object.fromEntries(Object.entries(extra)));
  }

  for (const bag of bags) {
    for (const key of PAYLOAD_PUBLISH_TIME_KEYS) {
      if (!(key in bag)) continue;
      const parsed = toIsoTimestamp(bag[key]);
      if (parsed) return parsed;
    }
  }
  return undefined;
}

export function observationToRecord(observation: RawObservation, now: Date = new Date()): NewsRecord {
  const observedAt =
    observation.observed_at !== undefined ? toIsoTimestamp(observation.observed_at) : null;

  return createNewsRecord({
    title: observation.title?.trim() ?? '',
    url: presentString(observation.url),
    mobileUrl: presentString(observation.mobileUrl ?? observation.mobile_url),
    source_names: [observation.source],
    rank_timeline: [
      {
        source: observation.source,
        rank: observation.rank,
        observed_at: observedAt ?? now.toISOString(),
      },
    ],
    best_rank: observation.rank,
    observed_count: 1,
    is_new: observation.is_new ?? false,
    published_at: payloadPublishTime(observation),
  });
}

/**
 * Validate a crawler batch (a JSON array of observations) and build records.
 */
export function recordsFromObservations(input: unknown, now: Date = new Date()): NewsRecord[] {
  const parsed = z.array(RawObservationSchema).safeParse(input);
  if (!parsed.success) {
    throw new InputError('Invalid observation batch', {
      issues: parsed.error.issues.slice(0, 10).map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data.map((o) => observationToRecord(o, now));
}

import type { EnrichConfig } from '../shared/config.js';
import { withFields, type NewsRecord } from '../news/record.js';
import { signatureOf } from '../news/signature.js';
import { isExpired, type CacheEntry, type PublishTimeCache } from './cacheStore.js';
import { HttpPublishTimeFetcher, type PublishTimeFetcher } from './fetcher.js';
import { withConcurrency } from '../shared/pool.js';
import { CacheError, FetchError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type EnrichSettings = Pick<
  EnrichConfig,
  'enabled' | 'max_fetch_per_run' | 'request_timeout' | 'max_workers' | 'miss_ttl_hours'
> &
  Partial<Pick<EnrichConfig, 'phase_timeout' | 'user_agent' | 'max_body_bytes'>>;

export interface EnrichDeps {
  cache: PublishTimeCache;
  /** Defaults to an HTTP fetcher built from the settings. */
  fetcher?: PublishTimeFetcher;
  now?: () => Date;
  /** Caller-side deadline for the whole phase. */
  signal?: AbortSignal;
}

export interface EnrichStats {
  total: number;
  already_published: number;
  cache_hit: number;
  cache_recent_miss: number;
  no_url: number;
  /** Distinct signatures that needed a network fetch. */
  pending: number;
  fetched_success: number;
  fetched_fail: number;
  skipped_by_budget: number;
  /** Fetches cut off, or never started, because the phase deadline passed. */
  abandoned: number;
}

export interface EnrichResult {
  records: NewsRecord[];
  stats: EnrichStats;
}

interface PendingFetch {
  signature: string;
  url: string;
  /** Positions in the input of every record sharing this signature. */
  indexes: number[];
}

/**
 * Run-wide cap on network fetches. take() runs synchronously between awaits,
 * so concurrent workers can never overdraw it.
 */
export class FetchBudget {
  constructor(private remaining: number) {}

  take(): boolean {
    if (this.remaining <= 0) return false;
    this.remaining--;
    return true;
  }
}

function emptyStats(total: number): EnrichStats {
  return {
    total,
    already_published: 0,
    cache_hit: 0,
    cache_recent_miss: 0,
    no_url: 0,
    pending: 0,
    fetched_success: 0,
    fetched_fail: 0,
    skipped_by_budget: 0,
    abandoned: 0,
  };
}

function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new FetchError('Enrichment phase aborted', 'aborted'));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new FetchError('Enrichment phase aborted', 'aborted'));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Fill in missing `published_at` values through the cache and, within the
 * fetch budget, from the article pages. Output order matches input order.
 *
 * Single fetch failures become cached misses. A CacheError (the store cannot
 * be written) cancels outstanding fetches and is rethrown.
 */
export async function enrichPublishTimes(
  records: readonly NewsRecord[],
  settings: EnrichSettings,
  deps: EnrichDeps,
): Promise<EnrichResult> {
  const stats = emptyStats(records.length);
  const output = [...records];
  if (!settings.enabled) {
    return { records: output, stats };
  }

  const now = deps.now ?? (() => new Date());
  const { cache } = deps;
  const fetcher =
    deps.fetcher ??
    new HttpPublishTimeFetcher({
      timeoutMs: settings.request_timeout * 1000,
      userAgent: settings.user_agent,
      maxBodyChars: settings.max_body_bytes,
    });

  // 1. Pass-through, cache lookups and grouping of what still needs a fetch
  const pending = new Map<string, PendingFetch>();
  const lookupTime = now();

  records.forEach((record, index) => {
    if (record.published_at) {
      stats.already_published++;
      return;
    }

    const signature = signatureOf(record);
    const cached = cache.get(signature);
    if (cached && !isExpired(cached, lookupTime, settings.miss_ttl_hours)) {
      if (!cached.is_miss && cached.published_at) {
        output[index] = withFields(record, { published_at: cached.published_at });
        stats.cache_hit++;
      } else {
        stats.cache_recent_miss++;
      }
      return;
    }

    const url = record.url ?? record.mobileUrl;
    if (!url) {
      stats.no_url++;
      return;
    }

    const group = pending.get(signature);
    if (group) {
      group.indexes.push(index);
    } else {
      pending.set(signature, { signature, url, indexes: [index] });
    }
  });

  stats.pending = pending.size;

  // 2. Budgeted fetches on a fixed pool, bounded by the phase deadline
  const phase = new AbortController();
  const onCallerAbort = (): void => phase.abort();
  if (deps.signal?.aborted) phase.abort();
  deps.signal?.addEventListener('abort', onCallerAbort, { once: true });
  const phaseTimer =
    settings.phase_timeout && settings.phase_timeout > 0
      ? setTimeout(() => phase.abort(), settings.phase_timeout * 1000)
      : undefined;

  const budget = new FetchBudget(settings.max_fetch_per_run);
  const failure: { error: CacheError | null } = { error: null };

  // All cache writes go through here, one at a time: put() is synchronous.
  const recordOutcome = (job: PendingFetch, publishedAt: string | null): void => {
    const entry: CacheEntry = {
      published_at: publishedAt,
      fetched_at: now().toISOString(),
      is_miss: publishedAt === null,
    };
    cache.put(job.signature, entry);

    if (publishedAt === null) {
      stats.fetched_fail++;
      return;
    }
    stats.fetched_success++;
    for (const index of job.indexes) {
      const record = output[index];
      if (record) output[index] = withFields(record, { published_at: publishedAt });
    }
  };

  try {
    await withConcurrency([...pending.values()], settings.max_workers, async (job) => {
      // Budget first: a job past the budget is skipped whether or not the deadline has passed.
      if (!budget.take()) {
        if (stats.skipped_by_budget === 0) {
          logger.debug({ max_fetch_per_run: settings.max_fetch_per_run }, 'Fetch budget exhausted');
        }
        stats.skipped_by_budget++;
        return;
      }
      if (phase.signal.aborted) {
        if (!failure.error) stats.abandoned++;
        return;
      }

      let publishedAt: string | null = null;
      try {
        publishedAt = await abortable(fetcher.fetchPublishTime(job.url, phase.signal), phase.signal);
      } catch (err) {
        if (phase.signal.aborted) {
          if (!failure.error) stats.abandoned++;
          logger.debug({ url: job.url }, 'Publish time fetch abandoned at deadline');
          return;
        }
        logger.debug({ url: job.url, error: errorMessage(err) }, 'Publish time fetch failed');
      }

      try {
        recordOutcome(job, publishedAt);
      } catch (err) {
        if (!(err instanceof CacheError)) throw err;
        failure.error = err;
        phase.abort();
      }
    });
  } finally {
    if (phaseTimer) clearTimeout(phaseTimer);
    deps.signal?.removeEventListener('abort', onCallerAbort);
  }

  if (failure.error) throw failure.error;

  logger.info({ ...stats }, 'Publish time enrichment complete');
  return { records: output, stats };
}

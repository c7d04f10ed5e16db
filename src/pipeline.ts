import type { Config } from './shared/config.js';
import type { NewsRecord } from './news/record.js';
import { dedupeAndMerge } from './news/merge.js';
import { enrichPublishTimes, type EnrichStats } from './enrich/enrich.js';
import {
  openCacheStore,
  type EnrichmentCacheStore,
  type PublishTimeCache,
} from './enrich/cacheStore.js';
import type { PublishTimeFetcher } from './enrich/fetcher.js';
import { CacheError } from './shared/errors.js';
import { logger } from './shared/logger.js';

export interface DigestOptions {
  /** Use this cache instead of opening `config.cache.path`. */
  cache?: PublishTimeCache;
  fetcher?: PublishTimeFetcher;
  now?: () => Date;
  signal?: AbortSignal;
}

export interface DigestResult {
  records: NewsRecord[];
  merge_count: number;
  /** null when enrichment was disabled or skipped. */
  enrich: EnrichStats | null;
}

/**
 * Dedup the crawled records, then fill in missing publish times.
 * A cache that cannot be opened or written skips enrichment and keeps the
 * deduped records.
 */
export async function runDigest(
  records: readonly NewsRecord[],
  config: Config,
  options: DigestOptions = {},
): Promise<DigestResult> {
  const { merged, merge_count } = dedupeAndMerge(records);
  logger.info(
    { input: records.length, output: merged.length, merge_count },
    `merged ${merge_count} duplicate news items across sources`,
  );

  if (!config.enrich.enabled) {
    return { records: merged, merge_count, enrich: null };
  }

  let opened: EnrichmentCacheStore | null = null;
  try {
    const cache = options.cache ?? (opened = openCacheStore(config.cache.path));
    const result = await enrichPublishTimes(merged, config.enrich, {
      cache,
      fetcher: options.fetcher,
      now: options.now,
      signal: options.signal,
    });
    return { records: result.records, merge_count, enrich: result.stats };
  } catch (err) {
    if (!(err instanceof CacheError)) throw err;
    logger.warn({ error: err.message, ...err.details }, 'Skipping publish time enrichment');
    return { records: merged, merge_count, enrich: null };
  } finally {
    opened?.close();
  }
}

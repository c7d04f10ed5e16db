import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { runDigest } from '../pipeline.js';
import { migrateCacheSchema } from '../db/migrate.js';
import { EnrichmentCacheStore, openCacheStore, type PublishTimeCache } from '../enrich/cacheStore.js';
import type { PublishTimeFetcher } from '../enrich/fetcher.js';
import { recordsFromObservations } from '../news/record.js';
import { generateDefaultConfig, type Config } from '../shared/config.js';
import { CacheError } from '../shared/errors.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

class MapFetcher implements PublishTimeFetcher {
  readonly calls: string[] = [];

  constructor(private readonly answers: Record<string, string>) {}

  async fetchPublishTime(url: string): Promise<string | null> {
    this.calls.push(url);
    return this.answers[url] ?? null;
  }
}

function configWith(overrides: Partial<Config['enrich']> = {}, cachePath = ':memory:'): Config {
  const base = generateDefaultConfig();
  return { enrich: { ...base.enrich, ...overrides }, cache: { path: cachePath } };
}

const batch = recordsFromObservations(
  [
    { source: 'S1', title: 'Rocket lands', url: 'https://news.example.com/rocket?utm_source=s1', rank: 3 },
    { source: 'S2', title: 'Rocket lands safely', url: 'https://news.example.com/rocket/', rank: 1 },
    { source: 'S2', title: 'Markets open', url: 'https://news.example.com/markets', rank: 2 },
    {
      source: 'S3',
      title: 'Weather update',
      url: 'https://news.example.com/weather',
      rank: 4,
      extra: { pubDate: 'Tue, 30 Apr 2024 06:00:00 GMT' },
    },
  ],
  NOW,
);

let db: Database.Database;
let cache: EnrichmentCacheStore;

beforeEach(() => {
  db = new Database(':memory:');
  migrateCacheSchema(db);
  cache = new EnrichmentCacheStore(db);
});

afterEach(() => {
  db.close();
});

describe('runDigest', () => {
  it('merges cross-source duplicates and fills in publish times', async () => {
    const fetcher = new MapFetcher({
      'https://news.example.com/rocket/': '2024-05-01T09:00:00.000Z',
    });

    const result = await runDigest(batch, configWith(), { cache, fetcher, now: () => NOW });

    expect(result.merge_count).toBe(1);
    expect(result.records.map((r) => r.title)).toEqual(['Rocket lands safely', 'Markets open', 'Weather update']);

    const [rocket, markets, weather] = result.records;
    expect(rocket?.source_names).toEqual(['S1', 'S2']);
    expect(rocket?.best_rank).toBe(1);
    expect(rocket?.observed_count).toBe(2);
    expect(rocket?.published_at).toBe('2024-05-01T09:00:00.000Z');
    expect(markets?.published_at).toBeUndefined();
    expect(weather?.published_at).toBe('2024-04-30T06:00:00.000Z');

    expect(fetcher.calls).toEqual([
      'https://news.example.com/rocket/',
      'https://news.example.com/markets',
    ]);
    expect(result.enrich).toMatchObject({
      total: 3,
      already_published: 1,
      pending: 2,
      fetched_success: 1,
      fetched_fail: 1,
    });
  });

  it('serves the second run from the cache', async () => {
    const fetcher = new MapFetcher({
      'https://news.example.com/rocket/': '2024-05-01T09:00:00.000Z',
    });
    await runDigest(batch, configWith(), { cache, fetcher, now: () => NOW });

    const second = new MapFetcher({});
    const result = await runDigest(batch, configWith(), { cache, fetcher: second, now: () => NOW });

    expect(second.calls).toEqual([]);
    expect(result.enrich?.cache_hit).toBe(1);
    expect(result.enrich?.cache_recent_miss).toBe(1);
    expect(result.records[0]?.published_at).toBe('2024-05-01T09:00:00.000Z');
  });

  it('only dedups when enrichment is disabled', async () => {
    const fetcher = new MapFetcher({});

    const result = await runDigest(batch, configWith({ enabled: false }), { cache, fetcher });

    expect(result.records).toHaveLength(3);
    expect(result.enrich).toBeNull();
    expect(fetcher.calls).toEqual([]);
  });

  it('keeps the deduped records when the cache cannot be written', async () => {
    const broken: PublishTimeCache = {
      get: () => undefined,
      put: () => {
        throw new CacheError('database is locked');
      },
    };
    const fetcher = new MapFetcher({
      'https://news.example.com/rocket/': '2024-05-01T09:00:00.000Z',
    });

    const result = await runDigest(batch, configWith(), { cache: broken, fetcher, now: () => NOW });

    expect(result.enrich).toBeNull();
    expect(result.records.map((r) => r.title)).toEqual(['Rocket lands safely', 'Markets open', 'Weather update']);
    expect(result.records[0]?.published_at).toBeUndefined();
  });

  it('keeps the deduped records when the cache cannot be opened', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'newsfold-pipeline-'));
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, 'x');
    const fetcher = new MapFetcher({});

    const result = await runDigest(batch, configWith({}, path.join(blocker, 'cache.db')), { fetcher });

    expect(result.enrich).toBeNull();
    expect(result.records).toHaveLength(3);
    expect(fetcher.calls).toEqual([]);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('opens and closes the configured cache file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'newsfold-pipeline-'));
    const cachePath = path.join(dir, 'cache.db');
    const fetcher = new MapFetcher({
      'https://news.example.com/rocket/': '2024-05-01T09:00:00.000Z',
    });

    await runDigest(batch, configWith({}, cachePath), { fetcher, now: () => NOW });

    const reopened = openCacheStore(cachePath);
    expect(reopened.get('u:https://news.example.com/rocket')?.published_at).toBe('2024-05-01T09:00:00.000Z');
    reopened.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

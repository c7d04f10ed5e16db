import { describe, it, expect } from 'vitest';
import {
  createNewsRecord,
  withFields,
  observationToRecord,
  payloadPublishTime,
  recordsFromObservations,
  RawObservationSchema,
} from '../record.js';
import { InputError } from '../../shared/errors.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');

describe('createNewsRecord', () => {
  it('derives the signature from the url', () => {
    const record = createNewsRecord({
      title: 'Story',
      url: 'https://example.com/a/',
      source_names: ['S1'],
      rank_timeline: [],
      best_rank: 1,
      observed_count: 1,
      is_new: false,
    });
    expect(record.signature).toBe('u:https://example.com/a');
  });

  it('omits absent optional fields', () => {
    const record = createNewsRecord({
      title: 'Story',
      url: undefined,
      source_names: ['S1'],
      rank_timeline: [],
      best_rank: 1,
      observed_count: 1,
      is_new: false,
    });
    expect('url' in record).toBe(false);
    expect('published_at' in record).toBe(false);
  });
});

describe('withFields', () => {
  it('recomputes the signature', () => {
    const record = createNewsRecord({
      title: 'Story',
      source_names: ['S1'],
      rank_timeline: [],
      best_rank: 1,
      observed_count: 1,
      is_new: false,
    });
    expect(record.signature).toBe('t:story');
    expect(withFields(record, { url: 'https://example.com/s' }).signature).toBe(
      'u:https://example.com/s',
    );
  });
});

describe('payloadPublishTime', () => {
  it('reads the first parseable top-level key', () => {
    expect(payloadPublishTime({ pubDate: 'garbage', date: '2024-03-02 10:30' })).toBe(
      '2024-03-02T10:30:00.000Z',
    );
  });

  it('falls back to the extra bag', () => {
    expect(payloadPublishTime({ extra: { publishedAt: 1714550400 } })).toBe(
      '2024-05-01T08:00:00.000Z',
    );
  });

  it('returns undefined when nothing parses', () => {
    expect(payloadPublishTime({ title: 'x', extra: { date: '05-01 08:00' } })).toBeUndefined();
  });
});

describe('observationToRecord', () => {
  it('builds a single-observation record', () => {
    const observation = RawObservationSchema.parse({
      source: 'weibo',
      title: '  Story  ',
      url: 'https://example.com/s',
      mobile_url: 'https://m.example.com/s',
      rank: 3,
      observed_at: '2024-05-01T10:00:00Z',
      is_new: true,
    });

    expect(observationToRecord(observation, NOW)).toEqual({
      title: 'Story',
      url: 'https://example.com/s',
      mobileUrl: 'https://m.example.com/s',
      source_names: ['weibo'],
      rank_timeline: [{ source: 'weibo', rank: 3, observed_at: '2024-05-01T10:00:00.000Z' }],
      best_rank: 3,
      observed_count: 1,
      is_new: true,
      signature: 'u:https://example.com/s',
    });
  });

  it('uses the intake clock when observed_at is missing', () => {
    const record = observationToRecord(RawObservationSchema.parse({ source: 'hn', title: 'T', rank: 1 }), NOW);
    expect(record.rank_timeline[0]?.observed_at).toBe('2024-05-01T12:00:00.000Z');
    expect(record.is_new).toBe(false);
  });

  it('treats an empty url as absent', () => {
    const record = observationToRecord(
      RawObservationSchema.parse({ source: 'hn', title: 'T', url: '', rank: 1 }),
      NOW,
    );
    expect(record.url).toBeUndefined();
    expect(record.signature).toBe('t:t');
  });

  it('accepts a record without a title', () => {
    const record = observationToRecord(RawObservationSchema.parse({ source: 'hn', rank: 2 }), NOW);
    expect(record.title).toBe('');
    expect(record.signature).toBe('t:');
  });
});

describe('recordsFromObservations', () => {
  it('converts a batch in order', () => {
    const records = recordsFromObservations(
      [
        { source: 'a', title: 'One', rank: 1 },
        { source: 'b', title: 'Two', rank: 2, published_at: '2024-04-30T09:00:00+08:00' },
      ],
      NOW,
    );
    expect(records.map((r) => r.title)).toEqual(['One', 'Two']);
    expect(records[1]?.published_at).toBe('2024-04-30T01:00:00.000Z');
  });

  it('rejects a batch with a missing rank', () => {
    expect(() => recordsFromObservations([{ source: 'a', title: 'One' }], NOW)).toThrow(InputError);
  });

  it('rejects input that is not an array', () => {
    expect(() => recordsFromObservations({ source: 'a' }, NOW)).toThrow('Invalid observation batch');
  });
});

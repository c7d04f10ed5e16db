import { createNewsRecord, type NewsRecord, type RankObservation } from './record.js';
import { signatureOf } from './signature.js';

export interface MergeResult {
  merged: NewsRecord[];
  /** Records folded away: input length minus output length. */
  merge_count: number;
}

function titleLength(title: string): number {
  return [...title].length;
}

/**
 * Replacement priority: lower best_rank, then more observations, then the
 * longer title. A full tie keeps the current (earlier) winner.
 */
export function challengerWins(current: NewsRecord, challenger: NewsRecord): boolean {
  if (challenger.best_rank !== current.best_rank) {
    return challenger.best_rank < current.best_rank;
  }
  if (challenger.observed_count !== current.observed_count) {
    return challenger.observed_count > current.observed_count;
  }
  return titleLength(challenger.title) > titleLength(current.title);
}

function sortKey(o: RankObservation): number {
  const ms = Date.parse(o.observed_at);
  return Number.isNaN(ms) ? Number.POSITIVE_INFINITY : ms;
}

/**
 * Both rank timelines in chronological order, one entry per observation so the
 * length keeps matching `observed_count`. Ties and unparseable times keep
 * their input order.
 */
export function mergeTimelines(a: RankObservation[], b: RankObservation[]): RankObservation[] {
  return [...a, ...b]
    .map((o, index) => ({ o, index, at: sortKey(o) }))
    .sort((x, y) => (x.at === y.at ? x.index - y.index : x.at < y.at ? -1 : 1))
    .map(({ o }) => o);
}

function appendUnique(first: string[], second: string[]): string[] {
  const names = [...first];
  for (const name of second) {
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

/**
 * Fold two records describing the same story. The winner (see challengerWins)
 * keeps its title; url, mobileUrl and published_at are only filled from the
 * loser when the winner has none. Source names stay in first-seen order.
 */
export function mergePair(earlier: NewsRecord, later: NewsRecord): NewsRecord {
  const laterWins = challengerWins(earlier, later);
  const winner = laterWins ? later : earlier;
  const loser = laterWins ? earlier : later;

  return createNewsRecord({
    title: winner.title,
    url: winner.url ?? loser.url,
    mobileUrl: winner.mobileUrl ?? loser.mobileUrl,
    published_at: winner.published_at ?? loser.published_at,
    source_names: appendUnique(earlier.source_names, later.source_names),
    rank_timeline: mergeTimelines(winner.rank_timeline, loser.rank_timeline),
    best_rank: Math.min(winner.best_rank, loser.best_rank),
    observed_count: winner.observed_count + loser.observed_count,
    is_new: winner.is_new || loser.is_new,
  });
}

/**
 * Group records by signature and fold each group into one record.
 * Output keeps the order in which each signature first appeared.
 */
export function dedupeAndMerge(records: readonly NewsRecord[]): MergeResult {
  const groups = new Map<string, NewsRecord>();

  for (const record of records) {
    const signature = signatureOf(record);
    const current = groups.get(signature);
    groups.set(signature, current ? mergePair(current, record) : record);
  }

  const merged = [...groups.values()];
  return { merged, merge_count: records.length - merged.length };
}

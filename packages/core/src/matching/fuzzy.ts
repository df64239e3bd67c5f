/**
 * packages/core/src/matching/fuzzy.ts — Fuzzy matching and ranking.
 *
 * Why: Scores candidate search keys against a query so the picker can filter
 * and order large lists deterministically. Scoring is integer-only and ties
 * always keep input order, so the same inputs always render the same list.
 *
 * Scoring (case-insensitive, per key, best key wins):
 *   - substring: 1000 + 100 - startIndex - min(key.length, 50)
 *   - subsequence: +2 per matched query char, +1 when the match extends an
 *     unbroken run; no score unless the whole query is consumed
 */

/** Derive the searchable text keys of an item. */
export type KeyExtractor<T> = (item: T) => readonly string[];

/** A matched item with its integer score (higher ranks earlier). */
export type FuzzyMatchResult<T> = Readonly<{
  item: T;
  score: number;
}>;

/**
 * A match that remembers the item's position in the candidate list, so
 * incremental merges keep ties in input order.
 */
export type RankedCandidate<T> = Readonly<{
  item: T;
  score: number;
  ordinal: number;
}>;

/** Half-open [start, end) character range. */
export type HighlightRange = readonly [number, number];

const SUBSTRING_BASE = 1000;
const SUBSTRING_POSITION_BONUS = 100;
const SUBSTRING_LENGTH_CAP = 50;
const SUBSEQUENCE_CHAR_SCORE = 2;
const SUBSEQUENCE_RUN_BONUS = 1;

/**
 * Score a single key against an already-lowercased query.
 *
 * @returns Integer score, or null when the key does not match
 */
export function scoreKey(key: string, lowerQuery: string): number | null {
  if (key.length === 0) return null;
  const text = key.toLowerCase();

  const idx = text.indexOf(lowerQuery);
  if (idx >= 0) {
    return (
      SUBSTRING_BASE + SUBSTRING_POSITION_BONUS - idx - Math.min(text.length, SUBSTRING_LENGTH_CAP)
    );
  }

  let qi = 0;
  let score = 0;
  let run = 0;
  for (let ti = 0; ti < text.length && qi < lowerQuery.length; ti++) {
    if (text[ti] === lowerQuery[qi]) {
      qi++;
      run++;
      score += SUBSEQUENCE_CHAR_SCORE;
      if (run > 1) score += SUBSEQUENCE_RUN_BONUS;
    } else {
      run = 0;
    }
  }

  return qi === lowerQuery.length ? score : null;
}

/**
 * Best score of an item across its keys, or null when no key matches.
 */
export function scoreItem<T>(item: T, keyOf: KeyExtractor<T>, lowerQuery: string): number | null {
  let best: number | null = null;
  for (const key of keyOf(item)) {
    const score = scoreKey(key, lowerQuery);
    if (score !== null && (best === null || score > best)) best = score;
  }
  return best;
}

/**
 * Lazily match items against a query, yielding in input order.
 *
 * An empty (or whitespace-only) query passes every item through with score 0.
 * Items that match on no key are skipped.
 */
export function* matchFuzzy<T>(
  items: Iterable<T>,
  keyOf: KeyExtractor<T>,
  query: string,
): Generator<FuzzyMatchResult<T>, void, undefined> {
  const q = query.trim().toLowerCase();
  if (q.length === 0) {
    for (const item of items) yield Object.freeze({ item, score: 0 });
    return;
  }

  for (const item of items) {
    const score = scoreItem(item, keyOf, q);
    if (score !== null) yield Object.freeze({ item, score });
  }
}

/**
 * Match and order items: descending score, ties in input order.
 */
export function rankFuzzy<T>(
  items: Iterable<T>,
  keyOf: KeyExtractor<T>,
  query: string,
): readonly FuzzyMatchResult<T>[] {
  return sortRanked(Array.from(matchFuzzy(items, keyOf, query)));
}

/**
 * Stable sort by descending score.
 * Array.prototype.sort is stable, so equal scores keep input order.
 */
export function sortRanked<R extends Readonly<{ score: number }>>(
  results: readonly R[],
): readonly R[] {
  const out = results.slice();
  out.sort((a, b) => b.score - a.score);
  return Object.freeze(out);
}

/**
 * Rank a slice of the candidate list, tagging each match with its ordinal.
 *
 * @param firstOrdinal - Position of `items[0]` in the full candidate list
 */
export function rankCandidates<T>(
  items: readonly T[],
  keyOf: KeyExtractor<T>,
  query: string,
  firstOrdinal = 0,
): readonly RankedCandidate<T>[] {
  const out: RankedCandidate<T>[] = [];
  const q = query.trim().toLowerCase();

  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (item === undefined) continue;
    const score = q.length === 0 ? 0 : scoreItem(item, keyOf, q);
    if (score === null) continue;
    out.push(Object.freeze({ item, score, ordinal: firstOrdinal + i }));
  }

  return sortRanked(out);
}

function rankedBefore<T>(a: RankedCandidate<T>, b: RankedCandidate<T>): boolean {
  if (a.score !== b.score) return a.score > b.score;
  return a.ordinal < b.ordinal;
}

/**
 * Merge two ranked lists into one, preserving the relative order of
 * `existing` and placing each incoming match by score, then ordinal.
 */
export function mergeRanked<T>(
  existing: readonly RankedCandidate<T>[],
  incoming: readonly RankedCandidate<T>[],
): readonly RankedCandidate<T>[] {
  if (incoming.length === 0) return existing;
  if (existing.length === 0) return incoming;

  const out: RankedCandidate<T>[] = [];
  let i = 0;
  let j = 0;
  while (i < existing.length && j < incoming.length) {
    const a = existing[i];
    const b = incoming[j];
    if (a === undefined || b === undefined) break;
    if (rankedBefore(b, a)) {
      out.push(b);
      j++;
    } else {
      out.push(a);
      i++;
    }
  }
  for (; i < existing.length; i++) {
    const a = existing[i];
    if (a !== undefined) out.push(a);
  }
  for (; j < incoming.length; j++) {
    const b = incoming[j];
    if (b !== undefined) out.push(b);
  }
  return Object.freeze(out);
}

/**
 * Compute the character ranges of `text` a query matches, for highlighting.
 *
 * Substring matches highlight the first occurrence; subsequence matches
 * highlight each matched character, coalescing adjacent ones into runs.
 *
 * @returns Sorted, non-overlapping ranges; empty when the query does not match
 */
export function computeMatchHighlights(text: string, query: string): readonly HighlightRange[] {
  const q = query.trim().toLowerCase();
  if (q.length === 0 || text.length === 0) return Object.freeze([]);

  const lower = text.toLowerCase();
  const idx = lower.indexOf(q);
  if (idx >= 0) return Object.freeze([Object.freeze([idx, idx + q.length] as const)]);

  const ranges: [number, number][] = [];
  let qi = 0;
  for (let ti = 0; ti < lower.length && qi < q.length; ti++) {
    if (lower[ti] !== q[qi]) continue;
    qi++;
    const last = ranges[ranges.length - 1];
    if (last !== undefined && last[1] === ti) {
      last[1] = ti + 1;
    } else {
      ranges.push([ti, ti + 1]);
    }
  }

  if (qi < q.length) return Object.freeze([]);
  return Object.freeze(ranges.map((r) => Object.freeze([r[0], r[1]] as const)));
}

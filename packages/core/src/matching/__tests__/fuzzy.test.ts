import { assert, describe, test } from "@listnav/testkit";
import {
  type RankedCandidate,
  computeMatchHighlights,
  matchFuzzy,
  mergeRanked,
  rankCandidates,
  rankFuzzy,
  scoreKey,
} from "../fuzzy.js";

const self = (s: string): readonly string[] => [s];

function items<T>(results: readonly { item: T }[]): T[] {
  return results.map((r) => r.item);
}

describe("scoreKey", () => {
  test("substring score rewards early, short keys", () => {
    assert.equal(scoreKey("mystorage", "stor"), 1089);
    assert.equal(scoreKey("MyStorage", "storage"), 1089);
    assert.equal(scoreKey("abc", "abc"), 1097);
  });

  test("subsequence scores 2 per char plus 1 per run extension", () => {
    assert.equal(scoreKey("s-t-o-r", "stor"), 8);
    assert.equal(scoreKey("stxor", "stor"), 10);
  });

  test("partial subsequence does not score", () => {
    assert.equal(scoreKey("strgacct", "stor"), null);
    assert.equal(scoreKey("", "a"), null);
  });
});

describe("rankFuzzy", () => {
  test("empty query passes every item through with score 0 in order", () => {
    const ranked = rankFuzzy(["c", "a", "b"], self, "");
    assert.deepEqual(
      ranked.map((r) => [r.item, r.score]),
      [
        ["c", 0],
        ["a", 0],
        ["b", 0],
      ],
    );
  });

  test("whitespace-only query counts as empty", () => {
    assert.equal(rankFuzzy(["x", "y"], self, "   ").length, 2);
  });

  test("substring beats scattered characters", () => {
    const ranked = rankFuzzy(["strgacct", "mystorage", "s-t-r-g-a-c-c-t"], self, "stor");
    assert.deepEqual(items(ranked), ["mystorage"]);
  });

  test("matching is case-insensitive", () => {
    assert.deepEqual(items(rankFuzzy(["MyStorage", "other"], self, "storage")), ["MyStorage"]);
  });

  test("substring outranks subsequence regardless of input order", () => {
    assert.deepEqual(items(rankFuzzy(["a-b-c", "xabc"], self, "abc")), ["xabc", "a-b-c"]);
  });

  test("equal scores keep input order", () => {
    assert.deepEqual(items(rankFuzzy(["ab-y", "ab-x"], self, "ab")), ["ab-y", "ab-x"]);
  });

  test("best key of an item wins", () => {
    type Row = { name: string; alias: string };
    const rows: Row[] = [
      { name: "zzz", alias: "abc" },
      { name: "a_b_c", alias: "qqq" },
    ];
    const ranked = rankFuzzy(rows, (r) => [r.name, r.alias], "abc");
    assert.deepEqual(
      ranked.map((r) => [r.item.name, r.score]),
      [
        ["zzz", 1097],
        ["a_b_c", 6],
      ],
    );
  });

  test("query is trimmed before matching", () => {
    assert.deepEqual(items(rankFuzzy(["abc", "xyz"], self, "  ab ")), ["abc"]);
  });
});

describe("matchFuzzy", () => {
  test("is lazy and yields in input order", () => {
    const seen: string[] = [];
    const keyOf = (s: string): readonly string[] => {
      seen.push(s);
      return [s];
    };
    const iter = matchFuzzy(["b1", "a", "b2"], keyOf, "b");
    assert.deepEqual(seen, []);
    const first = iter.next();
    assert.equal(first.done, false);
    assert.deepEqual(seen, ["b1"]);
    assert.deepEqual(
      Array.from(iter).map((r) => r.item),
      ["b2"],
    );
  });
});

describe("rankCandidates / mergeRanked", () => {
  test("ordinals start at the given offset", () => {
    assert.deepEqual(rankCandidates(["x", "ab"], self, "ab", 10), [
      { item: "ab", score: 1098, ordinal: 11 },
    ]);
  });

  test("merge places incoming by score and keeps existing first on ties", () => {
    const existing: RankedCandidate<string>[] = [
      { item: "a", score: 10, ordinal: 0 },
      { item: "b", score: 5, ordinal: 1 },
    ];
    const incoming: RankedCandidate<string>[] = [
      { item: "c", score: 7, ordinal: 2 },
      { item: "d", score: 5, ordinal: 3 },
    ];
    assert.deepEqual(items(mergeRanked(existing, incoming)), ["a", "c", "b", "d"]);
  });

  test("merging nothing returns the existing list", () => {
    const existing: RankedCandidate<string>[] = [{ item: "a", score: 1, ordinal: 0 }];
    assert.equal(mergeRanked(existing, []), existing);
  });
});

describe("computeMatchHighlights", () => {
  test("highlights the first substring occurrence", () => {
    assert.deepEqual(computeMatchHighlights("MyStorage", "stor"), [[2, 6]]);
    assert.deepEqual(computeMatchHighlights("abab", "ab"), [[0, 2]]);
  });

  test("coalesces adjacent subsequence characters into runs", () => {
    assert.deepEqual(computeMatchHighlights("stxor", "stor"), [
      [0, 2],
      [3, 5],
    ]);
    assert.deepEqual(computeMatchHighlights("s-t-o-r", "stor"), [
      [0, 1],
      [2, 3],
      [4, 5],
      [6, 7],
    ]);
  });

  test("no match or empty query highlights nothing", () => {
    assert.deepEqual(computeMatchHighlights("abc", "xyz"), []);
    assert.deepEqual(computeMatchHighlights("abc", ""), []);
  });
});

import type { Posting } from "../invertedIndex.js";
import type { Candidate } from "../ranker.js";

/**
 * Boolean AND over docId-sorted posting lists.
 *
 * Each list keeps a cursor; the largest head docId is the target and every
 * other cursor advances to it. When all heads agree the document is emitted.
 * Returned postings line up with `lists`.
 */
export function intersectPostings(lists: ReadonlyArray<readonly Posting[]>): Candidate[] {
  if (lists.length === 0) return [];
  for (const l of lists) if (l.length === 0) return [];

  const cursors = lists.map(() => 0);
  const out: Candidate[] = [];

  outer: while (true) {
    let target = -1;
    for (let i = 0; i < lists.length; i++) {
      const head = lists[i]?.[cursors[i] ?? 0];
      if (!head) break outer;
      if (head.docId > target) target = head.docId;
    }

    let aligned = true;
    const heads: Posting[] = [];
    for (let i = 0; i < lists.length; i++) {
      const list = lists[i] ?? [];
      let c = cursors[i] ?? 0;
      while (c < list.length && (list[c]?.docId ?? Infinity) < target) c++;
      cursors[i] = c;
      const head = list[c];
      if (!head) break outer;
      if (head.docId !== target) aligned = false;
      heads.push(head);
    }

    if (aligned) {
      out.push({ docId: target, postings: heads });
      for (let i = 0; i < cursors.length; i++) cursors[i] = (cursors[i] ?? 0) + 1;
    }
  }

  return out;
}

/**
 * True when there is a p with p in lists[0], p+1 in lists[1], ... .
 *
 * Chained two-pointer merge: `ends` holds positions where the phrase prefix
 * so far ends, and each step keeps the next list's positions that directly
 * follow one of them.
 */
export function hasAdjacentRun(positionLists: ReadonlyArray<readonly number[]>): boolean {
  const first = positionLists[0];
  if (!first || first.length === 0) return false;

  let ends: readonly number[] = first;
  for (let k = 1; k < positionLists.length; k++) {
    const next = positionLists[k] ?? [];
    const kept: number[] = [];
    let i = 0;
    let j = 0;
    while (i < ends.length && j < next.length) {
      const want = (ends[i] ?? 0) + 1;
      const have = next[j] ?? 0;
      if (have === want) {
        kept.push(have);
        i++;
        j++;
      } else if (have < want) {
        j++;
      } else {
        i++;
      }
    }
    if (kept.length === 0) return false;
    ends = kept;
  }
  return true;
}

import type { SearchHit, Term } from "../types.js";
import type { Candidate, RankContext, Ranker } from "../ranker.js";

/**
 * ln(N / (1 + df)) + 1
 *
 * Stays above zero even when a term is in every document.
 */
export function idf(docCount: number, df: number): number {
  if (docCount <= 0) return 0;
  return Math.log(docCount / (1 + df)) + 1;
}

export function compareHits(a: SearchHit, b: SearchHit): number {
  return b.score - a.score || a.docId - b.docId;
}

/**
 * Raw-count TF-IDF: score(d) = sum over query terms of tf(t, d) * idf(t),
 * where tf is the length of the posting's position list.
 */
export class TfIdfRanker implements Ranker {
  rank(terms: readonly Term[], candidates: readonly Candidate[], ctx: RankContext): SearchHit[] {
    const docCount = ctx.index.documentCount();
    if (!docCount || terms.length === 0) return [];

    const weights = terms.map((t) => idf(docCount, ctx.index.documentFrequency(t)));

    const hits: SearchHit[] = candidates.map((c) => {
      let score = 0;
      for (let i = 0; i < weights.length; i++) {
        const tf = c.postings[i]?.positions.length ?? 0;
        score += tf * (weights[i] ?? 0);
      }
      return { docId: c.docId, score };
    });

    hits.sort(compareHits);
    return hits;
  }
}

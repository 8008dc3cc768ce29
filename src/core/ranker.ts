import type { DocId, SearchHit, Term } from "./types.js";
import type { InvertedIndex, Posting } from "./invertedIndex.js";

/** A document that matched every query term, with its postings in term order. */
export interface Candidate {
  docId: DocId;
  postings: Posting[];
}

export interface RankContext {
  index: InvertedIndex;
}

/**
 * Scores candidate documents for a query.
 *
 * `terms` are distinct and line up with each candidate's `postings`.
 */
export interface Ranker {
  rank(terms: readonly Term[], candidates: readonly Candidate[], ctx: RankContext): SearchHit[];
}

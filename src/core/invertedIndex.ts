import type { DocId, Term } from "./types.js";

export interface Posting {
  docId: DocId;
  /** strictly ascending offsets into the document's normalized token stream */
  positions: readonly number[];
}

export interface PostingsList {
  term: Term;
  df: number;
  /** ascending by docId */
  postings: readonly Posting[];
}

export interface IndexStats {
  docCount: number;
  termCount: number;
}

/**
 * Read side of the inverted index (term -> postings).
 *
 * Contract notes:
 * - `getPostings` returns postings sorted by docId for merge/intersect
 * - unseen terms return `undefined`; callers treat that as an empty list
 */
export interface InvertedIndex {
  getPostings(term: Term): PostingsList | undefined;
  hasTerm(term: Term): boolean;
  documentFrequency(term: Term): number;
  /** total occurrences across the corpus */
  collectionFrequency(term: Term): number;
  documentCount(): number;
  /** vocabulary, lexicographic */
  terms(): Term[];

  getStats(): IndexStats;
}

/** Single-writer build side. After `seal()` the index only answers lookups. */
export interface InvertedIndexWriter extends InvertedIndex {
  /** Documents must arrive in strictly increasing id order. */
  addDocument(docId: DocId, terms: readonly Term[]): void;
  seal(): void;
  readonly sealed: boolean;
}

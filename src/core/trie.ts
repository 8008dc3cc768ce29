import type { Term } from "./types.js";

export interface TrieSuggestion {
  term: Term;
  /** corpus frequency of the term */
  weight: number;
}

/** Arena form: node 0 is the root, edges point at node handles. */
export interface TrieSnapshot {
  edges: Array<Array<[string, number]>>;
  terminal: boolean[];
  weights: number[];
}

/**
 * Prefix trie over the index vocabulary, used for autocomplete.
 */
export interface Trie {
  insert(term: Term, weight?: number): void;
  has(term: Term): boolean;
  /** every complete term, lexicographic */
  terms(): Term[];
  size(): number;

  /** Up to `limit` terms under `prefix`, by weight desc then term asc. */
  suggest(prefix: string, limit?: number): TrieSuggestion[];

  snapshot(): TrieSnapshot;
}

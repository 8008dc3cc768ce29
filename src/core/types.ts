/** Shared core types used by module contracts. */

/** Stable integer id, assigned in ingestion order. */
export type DocId = number;
export type Term = string;

/** A term produced by the normalizer. */
export interface Token {
  term: Term;
  /** 0-based index in the normalized token stream (stopwords do not take a slot). */
  position: number;
  /** Character offsets into the source text. */
  startOffset: number;
  endOffset: number;
}

/** Display metadata. Never used for ranking. */
export interface DocumentMetadata {
  title: string;
  path?: string;
  snippet?: string;
}

/** Fixed-shape record accepted by the index builder. */
export interface DocumentInput {
  id: DocId;
  text: string;
  metadata: DocumentMetadata;
}

export interface SearchHit {
  docId: DocId;
  score: number;
}

export interface RankedResult extends SearchHit {
  metadata: DocumentMetadata;
}

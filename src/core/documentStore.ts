import type { DocId, DocumentMetadata } from "./types.js";

export interface StoredDocument {
  id: DocId;
  text: string;
  /** number of normalized tokens */
  tokenLength: number;
  metadata: DocumentMetadata;
}

/** id -> display data; consulted only when results are assembled. */
export interface DocumentStore {
  get(id: DocId): StoredDocument | undefined;
  size(): number;
  /** ascending by id */
  all(): StoredDocument[];
}

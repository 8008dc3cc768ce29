import type { DocumentStore } from "./documentStore.js";
import type { InvertedIndex } from "./invertedIndex.js";
import type { Normalizer } from "./normalizer.js";
import type { Trie } from "./trie.js";

export const BUNDLE_FORMAT_VERSION = 1;

export interface BundleMeta {
  formatVersion: number;
  documentCount: number;
  termCount: number;
  /** ISO timestamp */
  builtAt: string;
  /** fingerprint of the normalizer config the bundle was built with */
  normalizer: string;
}

/**
 * Index, trie and document store from one build pass. Treated as immutable;
 * a corpus change means building a new bundle and swapping it in.
 */
export interface SearchBundle {
  readonly meta: BundleMeta;
  readonly normalizer: Normalizer;
  readonly index: InvertedIndex;
  readonly trie: Trie;
  readonly store: DocumentStore;
}

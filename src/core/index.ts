export type { DocId, DocumentInput, DocumentMetadata, RankedResult, SearchHit, Term, Token } from "./types.js";
export type { Normalizer, NormalizerConfig, StemmerName } from "./normalizer.js";
export type { IndexStats, InvertedIndex, InvertedIndexWriter, Posting, PostingsList } from "./invertedIndex.js";
export type { Trie, TrieSnapshot, TrieSuggestion } from "./trie.js";
export type { Candidate, RankContext, Ranker } from "./ranker.js";
export type { Heap, TopKSelector } from "./heap.js";
export type { DocumentStore, StoredDocument } from "./documentStore.js";
export type { BundleMeta, SearchBundle } from "./bundle.js";
export { BUNDLE_FORMAT_VERSION } from "./bundle.js";
export { NORMALIZER_CONFIG_VERSION } from "./normalizer.js";
export { BundleSlot } from "./bundleSlot.js";
export * from "./errors.js";
export * from "./impl/index.js";

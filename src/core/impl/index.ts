export { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
export { MemoryTrie } from "./memoryTrie.js";
export { MemoryDocumentStore } from "./memoryDocumentStore.js";
export { ArrayHeap, MinHeapTopKSelector } from "./minHeapTopK.js";
export { TfIdfRanker, compareHits, idf } from "./tfidfRanker.js";
export { TextNormalizer, createNormalizerConfig, fingerprintConfig, parseNormalizerConfig } from "./textNormalizer.js";
export { hasAdjacentRun, intersectPostings } from "./postingsMerge.js";
export { QueryEngine, DEFAULT_LIMIT, DEFAULT_SUGGEST_LIMIT, splitPhrase } from "./queryEngine.js";
export type { EngineDeps, ParsedQuery, QueryKind, SearchOptions } from "./queryEngine.js";
export { buildBundle, makeSnippet, parseDocumentInput, SNIPPET_LENGTH } from "./indexBuilder.js";
export type { BuildOptions } from "./indexBuilder.js";
export { decodeBundle, encodeBundle } from "./bundleCodec.js";
export type { BundleSnapshot, SerializedPosting } from "./bundleCodec.js";

import type { DocId, DocumentMetadata, Term } from "../types.js";
import { BUNDLE_FORMAT_VERSION, type BundleMeta, type SearchBundle } from "../bundle.js";
import type { StoredDocument } from "../documentStore.js";
import type { Normalizer, NormalizerConfig } from "../normalizer.js";
import type { TrieSnapshot } from "../trie.js";
import { BundleLoadError, SearchError } from "../errors.js";
import { asNonNegativeInt, asString, isRecord } from "../validation.js";
import { MemoryDocumentStore } from "./memoryDocumentStore.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { MemoryTrie } from "./memoryTrie.js";
import { TextNormalizer, parseNormalizerConfig } from "./textNormalizer.js";

/** [docId, positions] */
export type SerializedPosting = [DocId, number[]];

export interface BundleSnapshot {
  version: number;
  meta: BundleMeta;
  normalizer: NormalizerConfig;
  documents: StoredDocument[];
  postings: Array<{ term: Term; postings: SerializedPosting[] }>;
  trie: TrieSnapshot;
}

/** JSON-compatible form of a bundle. */
export function encodeBundle(bundle: SearchBundle): BundleSnapshot {
  const postings: BundleSnapshot["postings"] = [];
  for (const term of bundle.index.terms()) {
    const pl = bundle.index.getPostings(term);
    if (!pl) continue;
    postings.push({ term, postings: pl.postings.map((p) => [p.docId, Array.from(p.positions)]) });
  }

  return {
    version: BUNDLE_FORMAT_VERSION,
    meta: { ...bundle.meta },
    normalizer: { ...bundle.normalizer.config, stopWords: Array.from(bundle.normalizer.config.stopWords) },
    documents: bundle.store.all().map((d) => ({ ...d, metadata: { ...d.metadata } })),
    postings,
    trie: bundle.trie.snapshot(),
  };
}

/**
 * Rebuilds a bundle from a snapshot and checks it against every index
 * invariant. Any mismatch throws BundleLoadError; there is no partial result.
 *
 * The index is replayed from the postings: each document's term stream is
 * reassembled position by position, which also proves the positions exactly
 * cover 0..tokenLength-1.
 */
export function decodeBundle(value: unknown, expected?: Normalizer): SearchBundle {
  try {
    return decode(value, expected);
  } catch (e) {
    if (e instanceof BundleLoadError) throw e;
    if (e instanceof SearchError) throw new BundleLoadError(`invalid bundle: ${e.message}`, { cause: e });
    throw e;
  }
}

function decode(value: unknown, expected?: Normalizer): SearchBundle {
  if (!isRecord(value)) fail("bundle must be an object");
  if (value.version !== BUNDLE_FORMAT_VERSION) fail(`unsupported bundle version: ${String(value.version)}`);

  const normalizer = new TextNormalizer(parseNormalizerConfig(value.normalizer));
  if (expected && expected.fingerprint !== normalizer.fingerprint) {
    fail("bundle was built with a different normalizer config");
  }

  const meta = parseMeta(value.meta);
  if (meta.normalizer !== normalizer.fingerprint) fail("meta.normalizer does not match the stored config");

  const rawDocs = value.documents;
  if (!Array.isArray(rawDocs)) fail("documents must be an array");
  const docs = rawDocs.map((d: unknown, i: number) => parseStoredDocument(d, i));
  for (let i = 1; i < docs.length; i++) {
    const prev = docs[i - 1];
    const cur = docs[i];
    if (prev && cur && cur.id <= prev.id) fail(`documents must be in strictly ascending id order at ${i}`);
  }
  if (meta.documentCount !== docs.length) fail("meta.documentCount does not match documents");

  const streams = new Map<DocId, Array<Term | undefined>>(docs.map((d) => [d.id, new Array<Term | undefined>(d.tokenLength)] as const));

  const rawPostings = value.postings;
  if (!Array.isArray(rawPostings)) fail("postings must be an array");
  const vocabulary: Term[] = [];
  let prevTerm: Term | undefined;
  for (const [i, entry] of rawPostings.entries()) {
    if (!isRecord(entry)) fail(`postings[${i}] must be an object`);
    const term = asString(entry.term);
    if (!term) fail(`postings[${i}].term must be a non-empty string`);
    if (prevTerm !== undefined && term <= prevTerm) fail(`postings[${i}] terms must be unique and sorted`);
    prevTerm = term;
    const list = entry.postings;
    if (!Array.isArray(list) || list.length === 0) fail(`postings[${i}] must list at least one document`);

    let prevDoc = -1;
    for (const raw of list) {
      if (!Array.isArray(raw) || raw.length !== 2) fail(`postings for "${term}" must be [docId, positions] pairs`);
      const docId = asNonNegativeInt(raw[0]);
      const positions: unknown = raw[1];
      if (docId === undefined || docId <= prevDoc) fail(`postings for "${term}" must have ascending doc ids`);
      prevDoc = docId;

      const stream = streams.get(docId);
      if (!stream) fail(`postings for "${term}" reference unknown document ${docId}`);
      if (!Array.isArray(positions) || positions.length === 0) fail(`positions for "${term}" in ${docId} must be non-empty`);

      let prevPos = -1;
      for (const p of positions) {
        const pos = asNonNegativeInt(p);
        if (pos === undefined || pos <= prevPos) fail(`positions for "${term}" in ${docId} must be strictly ascending`);
        if (pos >= stream.length) fail(`position ${pos} for "${term}" is past the end of document ${docId}`);
        if (stream[pos] !== undefined) fail(`position ${pos} in document ${docId} is claimed twice`);
        stream[pos] = term;
        prevPos = pos;
      }
    }
    vocabulary.push(term);
  }
  if (meta.termCount !== vocabulary.length) fail("meta.termCount does not match postings");

  const index = new MemoryInvertedIndex();
  const store = new MemoryDocumentStore();
  for (const doc of docs) {
    const stream = streams.get(doc.id) ?? [];
    const terms: Term[] = [];
    for (let pos = 0; pos < stream.length; pos++) {
      const t = stream[pos];
      if (t === undefined) fail(`position ${pos} of document ${doc.id} has no term`);
      terms.push(t);
    }
    index.addDocument(doc.id, terms);
    store.put(doc);
  }
  index.seal();

  const trie = MemoryTrie.fromSnapshot(parseTrieSnapshot(value.trie));
  const trieTerms = trie.terms();
  if (trieTerms.length !== vocabulary.length || trieTerms.some((t, i) => t !== vocabulary[i])) {
    fail("trie vocabulary does not match the index");
  }
  for (const s of trie.suggest("", trieTerms.length)) {
    if (s.weight !== index.collectionFrequency(s.term)) fail(`trie weight for "${s.term}" does not match the index`);
  }

  return { meta, normalizer, index, trie, store };
}

function parseMeta(v: unknown): BundleMeta {
  if (!isRecord(v)) fail("meta must be an object");
  const formatVersion = asNonNegativeInt(v.formatVersion);
  const documentCount = asNonNegativeInt(v.documentCount);
  const termCount = asNonNegativeInt(v.termCount);
  const builtAt = asString(v.builtAt);
  const normalizer = asString(v.normalizer);
  if (formatVersion !== BUNDLE_FORMAT_VERSION) fail("meta.formatVersion mismatch");
  if (documentCount === undefined || termCount === undefined) fail("meta counts must be non-negative integers");
  if (builtAt === undefined || Number.isNaN(Date.parse(builtAt))) fail("meta.builtAt must be an ISO timestamp");
  if (normalizer === undefined) fail("meta.normalizer must be a string");
  return { formatVersion, documentCount, termCount, builtAt, normalizer };
}

function parseStoredDocument(v: unknown, i: number): StoredDocument {
  if (!isRecord(v)) fail(`documents[${i}] must be an object`);
  const id = asNonNegativeInt(v.id);
  const text = asString(v.text);
  const tokenLength = asNonNegativeInt(v.tokenLength);
  if (id === undefined) fail(`documents[${i}].id must be a non-negative integer`);
  if (text === undefined) fail(`documents[${i}].text must be a string`);
  if (tokenLength === undefined) fail(`documents[${i}].tokenLength must be a non-negative integer`);
  // every token takes at least one character
  if (tokenLength > text.length) fail(`documents[${i}].tokenLength exceeds the text length`);

  const m = v.metadata;
  if (!isRecord(m)) fail(`documents[${i}].metadata must be an object`);
  const title = asString(m.title);
  if (title === undefined) fail(`documents[${i}].metadata.title must be a string`);
  const metadata: DocumentMetadata = { title };
  for (const key of ["path", "snippet"] as const) {
    if (m[key] === undefined) continue;
    const s = asString(m[key]);
    if (s === undefined) fail(`documents[${i}].metadata.${key} must be a string`);
    metadata[key] = s;
  }
  return { id, text, tokenLength, metadata };
}

/** Checks that the arena is a tree rooted at node 0 with in-range handles. */
function parseTrieSnapshot(v: unknown): TrieSnapshot {
  if (!isRecord(v)) fail("trie must be an object");
  const { edges, terminal, weights } = v;
  if (!Array.isArray(edges) || !Array.isArray(terminal) || !Array.isArray(weights)) fail("trie arrays missing");
  const n = edges.length;
  if (n === 0 || terminal.length !== n || weights.length !== n) fail("trie arrays must be non-empty and equal length");

  const out: TrieSnapshot = { edges: [], terminal: [], weights: [] };
  const parents = new Array<number>(n).fill(0);
  for (let node = 0; node < n; node++) {
    const list: unknown = edges[node];
    if (!Array.isArray(list)) fail(`trie node ${node} edges must be an array`);
    const pairs: Array<[string, number]> = [];
    const labels = new Set<string>();
    for (const e of list) {
      if (!Array.isArray(e) || e.length !== 2) fail(`trie node ${node} has a malformed edge`);
      const ch = asString(e[0]);
      const child = asNonNegativeInt(e[1]);
      if (ch === undefined || Array.from(ch).length !== 1) fail(`trie node ${node} edge label must be one character`);
      if (child === undefined || child === 0 || child >= n) fail(`trie node ${node} edge points outside the arena`);
      if (labels.has(ch)) fail(`trie node ${node} has two edges labelled "${ch}"`);
      labels.add(ch);
      parents[child] = (parents[child] ?? 0) + 1;
      pairs.push([ch, child]);
    }
    const isTerm: unknown = terminal[node];
    const weight = asNonNegativeInt(weights[node]);
    if (typeof isTerm !== "boolean") fail(`trie node ${node} terminal flag must be boolean`);
    if (weight === undefined) fail(`trie node ${node} weight must be a non-negative integer`);
    out.edges.push(pairs);
    out.terminal.push(isTerm);
    out.weights.push(weight);
  }
  for (let node = 1; node < n; node++) {
    if (parents[node] !== 1) fail(`trie node ${node} must have exactly one parent`);
  }

  // one parent each still allows a detached cycle; every node must hang off the root
  let reached = 0;
  const queue = [0];
  for (let node = queue.shift(); node !== undefined; node = queue.shift()) {
    reached++;
    for (const [, child] of out.edges[node] ?? []) queue.push(child);
  }
  if (reached !== n) fail("trie has nodes unreachable from the root");
  return out;
}

function fail(message: string): never {
  throw new BundleLoadError(message);
}

import type { DocumentInput, DocumentMetadata, Term } from "../types.js";
import { BUNDLE_FORMAT_VERSION, type SearchBundle } from "../bundle.js";
import type { Normalizer } from "../normalizer.js";
import { BuildAbortedError, DuplicateDocumentError, InvalidDocumentError } from "../errors.js";
import { asNonNegativeInt, asString, isRecord } from "../validation.js";
import { MemoryDocumentStore } from "./memoryDocumentStore.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { MemoryTrie } from "./memoryTrie.js";

export const SNIPPET_LENGTH = 160;

export interface BuildOptions {
  /** checked between documents; an abort discards the whole build */
  signal?: AbortSignal;
  /** defaults to the current time */
  builtAt?: Date;
}

export function makeSnippet(text: string, max: number = SNIPPET_LENGTH): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length <= max ? flat : `${flat.slice(0, max).trimEnd()}…`;
}

/**
 * Checks one ingestion record and returns it in fixed shape.
 * Throws InvalidDocumentError naming the record and field.
 */
export function parseDocumentInput(value: unknown, index: number): DocumentInput {
  if (!isRecord(value)) throw new InvalidDocumentError(index, "$", "must be an object");

  const id = asNonNegativeInt(value.id);
  if (id === undefined) throw new InvalidDocumentError(index, "$.id", "must be a non-negative integer");

  const text = asString(value.text);
  if (text === undefined) throw new InvalidDocumentError(index, "$.text", "must be a string");

  const meta = value.metadata;
  if (!isRecord(meta)) throw new InvalidDocumentError(index, "$.metadata", "must be an object");

  const title = asString(meta.title);
  if (title === undefined) throw new InvalidDocumentError(index, "$.metadata.title", "must be a string");

  const metadata: DocumentMetadata = { title };
  for (const key of ["path", "snippet"] as const) {
    if (meta[key] === undefined) continue;
    const v = asString(meta[key]);
    if (v === undefined) throw new InvalidDocumentError(index, `$.metadata.${key}`, "must be a string");
    metadata[key] = v;
  }

  return { id, text, metadata };
}

/**
 * One pass over the corpus: normalize each document in ascending id order and
 * grow the index, the document store and the trie together. The returned
 * bundle is sealed; nothing is visible to callers if any step throws.
 */
export function buildBundle(documents: readonly unknown[], normalizer: Normalizer, options: BuildOptions = {}): SearchBundle {
  const { signal } = options;
  checkAbort(signal);

  const inputs = documents.map((d, i) => parseDocumentInput(d, i));

  const seen = new Set<number>();
  for (const d of inputs) {
    if (seen.has(d.id)) throw new DuplicateDocumentError(d.id);
    seen.add(d.id);
  }
  inputs.sort((a, b) => a.id - b.id);

  const index = new MemoryInvertedIndex();
  const store = new MemoryDocumentStore();

  for (const doc of inputs) {
    checkAbort(signal);

    const terms: Term[] = normalizer.normalize(doc.text);
    index.addDocument(doc.id, terms);
    store.put({
      id: doc.id,
      text: doc.text,
      tokenLength: terms.length,
      metadata: { ...doc.metadata, snippet: doc.metadata.snippet ?? makeSnippet(doc.text) },
    });
  }

  checkAbort(signal);

  // same vocabulary as the index, weighted by corpus frequency
  const trie = new MemoryTrie();
  for (const term of index.terms()) trie.insert(term, index.collectionFrequency(term));

  index.seal();

  const stats = index.getStats();
  return {
    meta: {
      formatVersion: BUNDLE_FORMAT_VERSION,
      documentCount: stats.docCount,
      termCount: stats.termCount,
      builtAt: (options.builtAt ?? new Date()).toISOString(),
      normalizer: normalizer.fingerprint,
    },
    normalizer,
    index,
    trie,
    store,
  };
}

function checkAbort(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new BuildAbortedError({ cause: signal.reason });
}

import type { RankedResult, SearchHit, Term } from "../types.js";
import type { SearchBundle } from "../bundle.js";
import type { Posting } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";
import type { TopKSelector } from "../heap.js";
import type { TrieSuggestion } from "../trie.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { TfIdfRanker, compareHits } from "./tfidfRanker.js";
import { hasAdjacentRun, intersectPostings } from "./postingsMerge.js";

export const DEFAULT_LIMIT = 10;
export const DEFAULT_SUGGEST_LIMIT = 10;

export type QueryKind = "free" | "phrase";

export interface ParsedQuery {
  kind: QueryKind;
  /** normalized terms in query order (duplicates kept) */
  terms: Term[];
}

export interface SearchOptions {
  limit?: number;
}

export interface EngineDeps {
  bundle: SearchBundle;
  ranker?: Ranker;
  topK?: TopKSelector<SearchHit>;
}

const QUOTE = '"';

/**
 * A query is a phrase only when it is exactly one quoted span. Anything else,
 * unbalanced quotes included, is free text.
 */
export function splitPhrase(raw: string): { kind: QueryKind; body: string } {
  const q = raw.trim();
  if (q.length >= 2 && q.startsWith(QUOTE) && q.endsWith(QUOTE)) {
    const inner = q.slice(1, -1);
    if (!inner.includes(QUOTE)) return { kind: "phrase", body: inner };
  }
  return { kind: "free", body: q };
}

/**
 * Read-only query side over one bundle.
 *
 * Retrieval is strict AND across distinct terms; phrase queries also need
 * the terms at consecutive positions. Survivors are scored with TF-IDF.
 */
export class QueryEngine {
  readonly bundle: SearchBundle;
  private readonly ranker: Ranker;
  private readonly topK: TopKSelector<SearchHit>;

  constructor(deps: EngineDeps) {
    this.bundle = deps.bundle;
    this.ranker = deps.ranker ?? new TfIdfRanker();
    this.topK = deps.topK ?? new MinHeapTopKSelector<SearchHit>();
  }

  parseQuery(raw: string): ParsedQuery {
    const { kind, body } = splitPhrase(raw);
    return { kind, terms: this.bundle.normalizer.normalize(body) };
  }

  search(rawQuery: string, options?: SearchOptions): RankedResult[] {
    return this.searchParsed(this.parseQuery(rawQuery), options);
  }

  /** Same as `search` for a query the caller has already parsed. */
  searchParsed(parsed: ParsedQuery, options?: SearchOptions): RankedResult[] {
    const limit = options?.limit ?? DEFAULT_LIMIT;
    if (limit <= 0) return [];

    const hits = this.retrieve(parsed);
    const top = this.topK.topK(hits, limit, compareHits);

    const out: RankedResult[] = [];
    for (const h of top) {
      const doc = this.bundle.store.get(h.docId);
      if (!doc) continue;
      out.push({ docId: h.docId, score: h.score, metadata: doc.metadata });
    }
    return out;
  }

  /** Candidates that pass retrieval, scored and sorted, without a limit. */
  retrieve(parsed: ParsedQuery): SearchHit[] {
    if (parsed.terms.length === 0) return [];

    const distinct = Array.from(new Set(parsed.terms));
    const lists: Array<readonly Posting[]> = [];
    for (const t of distinct) {
      const pl = this.bundle.index.getPostings(t);
      if (!pl || pl.df === 0) return [];
      lists.push(pl.postings);
    }

    let candidates = intersectPostings(lists);

    if (parsed.kind === "phrase" && parsed.terms.length > 1) {
      const slot = new Map(distinct.map((t, i) => [t, i] as const));
      const order = parsed.terms.map((t) => slot.get(t) ?? 0);
      candidates = candidates.filter((c) => hasAdjacentRun(order.map((i) => c.postings[i]?.positions ?? [])));
    }

    return this.ranker.rank(distinct, candidates, { index: this.bundle.index });
  }

  /**
   * Completes the word being typed: the last word run of `input`,
   * lowercased. The trie is walked with that prefix as typed and with its
   * normalized form, so a whole word like "dogs" still reaches the stem "dog".
   */
  suggest(input: string, limit: number = DEFAULT_SUGGEST_LIMIT): string[] {
    const words = input.toLowerCase().match(/[\p{L}\p{N}_]+/gu);
    const prefix = words?.[words.length - 1];
    if (!prefix || limit <= 0) return [];

    const prefixes = [prefix];
    const stem = this.bundle.normalizer.normalize(prefix)[0];
    if (stem && stem !== prefix) prefixes.push(stem);

    const byTerm = new Map<Term, TrieSuggestion>();
    for (const p of prefixes) {
      for (const s of this.bundle.trie.suggest(p, limit)) byTerm.set(s.term, s);
    }
    return Array.from(byTerm.values())
      .sort((a, b) => b.weight - a.weight || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .slice(0, limit)
      .map((s) => s.term);
  }
}

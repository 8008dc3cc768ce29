import type { BundleMeta, SearchBundle } from "../core/bundle.js";
import type { DocumentMetadata } from "../core/types.js";
import type { StoredDocument } from "../core/documentStore.js";
import { BundleSlot } from "../core/bundleSlot.js";
import { QueryEngine, type QueryKind } from "../core/impl/queryEngine.js";

export interface SearchQuery {
  query: string;
  limit: number;
}

export interface SearchHitView {
  id: number;
  score: number;
  metadata: DocumentMetadata;
}

export interface SearchResponse {
  mode: QueryKind;
  results: SearchHitView[];
}

export interface ServiceStatus {
  loaded: boolean;
  meta?: BundleMeta;
}

/** What the HTTP layer needs from the core. */
export interface SearchService {
  search(q: SearchQuery): SearchResponse;
  suggest(prefix: string, limit: number): string[];
  getDocument(id: number): StoredDocument | undefined;
  status(): ServiceStatus;
  /** Loads a fresh bundle and swaps it in; the old one serves until then. */
  reload(): Promise<BundleMeta>;
}

export interface SearchServiceOptions {
  load: () => Promise<SearchBundle>;
  initial?: SearchBundle;
}

export function createSearchService(opts: SearchServiceOptions): SearchService {
  const slot = new BundleSlot<QueryEngine>(opts.initial ? new QueryEngine({ bundle: opts.initial }) : undefined);
  // reloads run one at a time so the last one requested is the last one swapped in
  let reloading: Promise<unknown> = Promise.resolve();

  return {
    search(q) {
      // one reference for the whole request, even if a reload lands meanwhile
      const engine = slot.current();
      const parsed = engine.parseQuery(q.query);
      return {
        mode: parsed.kind,
        results: engine.searchParsed(parsed, { limit: q.limit }).map((r) => ({
          id: r.docId,
          score: r.score,
          metadata: r.metadata,
        })),
      };
    },
    suggest(prefix, limit) {
      return slot.current().suggest(prefix, limit);
    },
    getDocument(id) {
      return slot.current().bundle.store.get(id);
    },
    status() {
      if (!slot.isLoaded()) return { loaded: false };
      return { loaded: true, meta: slot.current().bundle.meta };
    },
    reload() {
      const run = reloading.then(async () => {
        const bundle = await opts.load();
        slot.swap(new QueryEngine({ bundle }));
        return bundle.meta;
      });
      // the caller sees the failure; the queue only needs to move on
      reloading = run.catch(() => undefined);
      return run;
    },
  };
}

import type { DocId } from "../types.js";
import type { DocumentStore, StoredDocument } from "../documentStore.js";

export class MemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<DocId, StoredDocument>();

  /** Build-time only; the builder validates ids before calling. */
  put(doc: StoredDocument): void {
    this.docs.set(doc.id, doc);
  }

  get(id: DocId): StoredDocument | undefined {
    return this.docs.get(id);
  }

  size(): number {
    return this.docs.size;
  }

  all(): StoredDocument[] {
    return Array.from(this.docs.values()).sort((a, b) => a.id - b.id);
  }
}

import type { DocId, Term } from "../types.js";
import type { IndexStats, InvertedIndexWriter, Posting, PostingsList } from "../invertedIndex.js";
import { IndexSealedError, OutOfOrderDocumentError } from "../errors.js";

type TermEntry = { postings: Posting[]; occurrences: number };

/**
 * Simple in-memory positional inverted index.
 *
 * Data structure:
 * - term -> postings array, appended in docId order
 *
 * Documents are accepted in strictly increasing id order and positions are
 * pushed in stream order, so both lists are sorted as built.
 */
export class MemoryInvertedIndex implements InvertedIndexWriter {
  private readonly termToPostings = new Map<Term, TermEntry>();
  private docCount = 0;
  private lastDocId = -1;
  private isSealed = false;

  get sealed(): boolean {
    return this.isSealed;
  }

  addDocument(docId: DocId, terms: readonly Term[]): void {
    if (this.isSealed) throw new IndexSealedError();
    if (docId <= this.lastDocId) throw new OutOfOrderDocumentError(docId, this.lastDocId);
    this.lastDocId = docId;
    this.docCount++;

    const local = new Map<Term, number[]>();
    for (let position = 0; position < terms.length; position++) {
      const term = terms[position];
      if (term === undefined) continue;
      let arr = local.get(term);
      if (!arr) {
        arr = [];
        local.set(term, arr);
      }
      arr.push(position);
    }

    for (const [term, positions] of local) {
      let entry = this.termToPostings.get(term);
      if (!entry) {
        entry = { postings: [], occurrences: 0 };
        this.termToPostings.set(term, entry);
      }
      entry.postings.push({ docId, positions });
      entry.occurrences += positions.length;
    }
  }

  seal(): void {
    this.isSealed = true;
  }

  getPostings(term: Term): PostingsList | undefined {
    const entry = this.termToPostings.get(term);
    if (!entry) return undefined;
    return { term, df: entry.postings.length, postings: entry.postings };
  }

  hasTerm(term: Term): boolean {
    return this.termToPostings.has(term);
  }

  documentFrequency(term: Term): number {
    return this.termToPostings.get(term)?.postings.length ?? 0;
  }

  collectionFrequency(term: Term): number {
    return this.termToPostings.get(term)?.occurrences ?? 0;
  }

  documentCount(): number {
    return this.docCount;
  }

  terms(): Term[] {
    return Array.from(this.termToPostings.keys()).sort();
  }

  getStats(): IndexStats {
    return { docCount: this.docCount, termCount: this.termToPostings.size };
  }
}

import type { Term } from "../types.js";
import type { Trie, TrieSnapshot, TrieSuggestion } from "../trie.js";

const ROOT = 0;

/**
 * Trie kept as an arena: node state lives in parallel arrays and edges hold
 * integer handles, so there are no parent/child object references and the
 * whole thing snapshots to plain arrays.
 */
export class MemoryTrie implements Trie {
  private readonly edges: Array<Map<string, number>> = [new Map()];
  private readonly terminal: boolean[] = [false];
  private readonly weights: number[] = [0];
  private termCount = 0;

  static fromSnapshot(snapshot: TrieSnapshot): MemoryTrie {
    const trie = new MemoryTrie();
    trie.edges.length = 0;
    trie.terminal.length = 0;
    trie.weights.length = 0;
    for (let i = 0; i < snapshot.edges.length; i++) {
      trie.edges.push(new Map(snapshot.edges[i]));
      const isTerm = snapshot.terminal[i] ?? false;
      trie.terminal.push(isTerm);
      trie.weights.push(snapshot.weights[i] ?? 0);
      if (isTerm) trie.termCount++;
    }
    if (trie.edges.length === 0) {
      trie.edges.push(new Map());
      trie.terminal.push(false);
      trie.weights.push(0);
    }
    return trie;
  }

  insert(term: Term, weight: number = 0): void {
    let cur = ROOT;
    for (const ch of term) {
      const children = this.childrenOf(cur);
      let next = children.get(ch);
      if (next === undefined) {
        next = this.allocate();
        children.set(ch, next);
      }
      cur = next;
    }

    if (!this.terminal[cur]) {
      this.terminal[cur] = true;
      this.termCount++;
    }
    this.weights[cur] = (this.weights[cur] ?? 0) + weight;
  }

  has(term: Term): boolean {
    const node = this.walk(term);
    return node !== undefined && this.terminal[node] === true;
  }

  size(): number {
    return this.termCount;
  }

  terms(): Term[] {
    return this.collect(ROOT, "")
      .map((s) => s.term)
      .sort();
  }

  suggest(prefix: string, limit: number = 10): TrieSuggestion[] {
    if (limit <= 0) return [];
    const node = this.walk(prefix);
    if (node === undefined) return [];

    const out = this.collect(node, prefix);
    out.sort((a, b) => b.weight - a.weight || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0));
    return out.slice(0, limit);
  }

  snapshot(): TrieSnapshot {
    return {
      edges: this.edges.map((m) => Array.from(m.entries())),
      terminal: Array.from(this.terminal),
      weights: Array.from(this.weights),
    };
  }

  private allocate(): number {
    this.edges.push(new Map());
    this.terminal.push(false);
    this.weights.push(0);
    return this.edges.length - 1;
  }

  private childrenOf(node: number): Map<string, number> {
    let m = this.edges[node];
    if (!m) {
      m = new Map();
      this.edges[node] = m;
    }
    return m;
  }

  private walk(prefix: string): number | undefined {
    let cur = ROOT;
    for (const ch of prefix) {
      const next = this.edges[cur]?.get(ch);
      if (next === undefined) return undefined;
      cur = next;
    }
    return cur;
  }

  // iterative DFS; cost is the size of the subtree, not the vocabulary
  private collect(start: number, prefix: string): TrieSuggestion[] {
    const out: TrieSuggestion[] = [];
    const stack: Array<{ node: number; word: string }> = [{ node: start, word: prefix }];

    for (let top = stack.pop(); top; top = stack.pop()) {
      const { node, word } = top;
      if (this.terminal[node]) out.push({ term: word, weight: this.weights[node] ?? 0 });
      const children = this.edges[node];
      if (!children) continue;
      for (const [ch, child] of children) stack.push({ node: child, word: word + ch });
    }
    return out;
  }
}

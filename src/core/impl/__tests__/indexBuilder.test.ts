import { describe, expect, it } from "vitest";
import { BuildAbortedError, DuplicateDocumentError, InvalidDocumentError } from "../../errors.js";
import { encodeBundle } from "../bundleCodec.js";
import { buildBundle, makeSnippet, parseDocumentInput } from "../indexBuilder.js";
import { BUILT_AT, FOX_CORPUS, doc, foxBundle, plainNormalizer } from "./fixtures.js";

const MIXED = [
  doc(3, "Search engines index text; search engines rank text."),
  doc(1, "An index maps each term to the documents holding it."),
  doc(2, "Text, text and more text!"),
];

describe("buildBundle", () => {
  it("indexes documents in ascending id order whatever the input order", () => {
    const bundle = buildBundle(MIXED, plainNormalizer(), { builtAt: BUILT_AT });
    expect(bundle.store.all().map((d) => d.id)).toEqual([1, 2, 3]);
    expect(bundle.index.getPostings("text")?.postings.map((p) => p.docId)).toEqual([2, 3]);
  });

  it("records each occurrence at its normalized position", () => {
    const n = plainNormalizer();
    const bundle = buildBundle(MIXED, n, { builtAt: BUILT_AT });

    for (const d of MIXED) {
      const terms = n.normalize(d.text);
      expect(bundle.store.get(d.id)?.tokenLength).toBe(terms.length);

      for (const term of new Set(terms)) {
        const posting = bundle.index.getPostings(term)?.postings.find((p) => p.docId === d.id);
        const expected = terms.flatMap((t, i) => (t === term ? [i] : []));
        expect(posting?.positions).toEqual(expected);
      }
    }
  });

  it("keeps the trie vocabulary equal to the index vocabulary", () => {
    const bundle = buildBundle(MIXED, plainNormalizer(), { builtAt: BUILT_AT });
    expect(bundle.trie.terms()).toEqual(bundle.index.terms());
    expect(bundle.trie.size()).toBe(bundle.meta.termCount);
  });

  it("weights trie terms by corpus frequency", () => {
    const bundle = foxBundle();
    expect(bundle.trie.suggest("qu")).toEqual([{ term: "quick", weight: 2 }]);
    expect(bundle.trie.suggest("j")).toEqual([{ term: "jumps", weight: 1 }]);
  });

  it("fills in build metadata", () => {
    const n = plainNormalizer();
    const bundle = buildBundle(FOX_CORPUS, n, { builtAt: BUILT_AT });
    expect(bundle.meta).toEqual({
      formatVersion: 1,
      documentCount: 3,
      termCount: 6,
      builtAt: "2024-01-01T00:00:00.000Z",
      normalizer: n.fingerprint,
    });
    expect(bundle.index.documentCount()).toBe(3);
  });

  it("produces identical output when rebuilt from the same corpus", () => {
    const a = buildBundle(MIXED, plainNormalizer(), { builtAt: BUILT_AT });
    const b = buildBundle([...MIXED].reverse(), plainNormalizer(), { builtAt: BUILT_AT });
    expect(encodeBundle(b)).toEqual(encodeBundle(a));
    expect(b.trie.suggest("t")).toEqual(a.trie.suggest("t"));
  });

  it("builds an empty bundle from an empty corpus", () => {
    const bundle = buildBundle([], plainNormalizer(), { builtAt: BUILT_AT });
    expect(bundle.meta.documentCount).toBe(0);
    expect(bundle.index.terms()).toEqual([]);
    expect(bundle.trie.suggest("a")).toEqual([]);
  });

  it("keeps caller-supplied snippets", () => {
    const bundle = buildBundle(
      [{ id: 1, text: "body", metadata: { title: "t", path: "a/b.txt", snippet: "custom" } }],
      plainNormalizer(),
      { builtAt: BUILT_AT },
    );
    expect(bundle.store.get(1)?.metadata).toEqual({ title: "t", path: "a/b.txt", snippet: "custom" });
  });

  it("rejects duplicate ids before indexing", () => {
    expect(() => buildBundle([doc(1, "a"), doc(2, "b"), doc(1, "c")], plainNormalizer())).toThrow(DuplicateDocumentError);
  });

  it("rejects malformed records", () => {
    expect(() => buildBundle([{ id: -1, text: "x", metadata: { title: "t" } }], plainNormalizer())).toThrow(
      InvalidDocumentError,
    );
    expect(() => buildBundle([doc(1, "ok"), { id: 2, text: "x", metadata: {} }], plainNormalizer())).toThrow(
      "document[1] $.metadata.title: must be a string",
    );
  });

  it("stops on an aborted signal", () => {
    const controller = new AbortController();
    controller.abort();
    expect(() => buildBundle(FOX_CORPUS, plainNormalizer(), { signal: controller.signal })).toThrow(BuildAbortedError);
  });
});

describe("parseDocumentInput", () => {
  it("accepts the fixed shape", () => {
    expect(parseDocumentInput({ id: 0, text: "", metadata: { title: "t", path: "p" } }, 0)).toEqual({
      id: 0,
      text: "",
      metadata: { title: "t", path: "p" },
    });
  });

  it("names the offending field", () => {
    expect(() => parseDocumentInput("nope", 4)).toThrow("document[4] $: must be an object");
    expect(() => parseDocumentInput({ id: 1.5, text: "", metadata: { title: "" } }, 0)).toThrow("$.id");
    expect(() => parseDocumentInput({ id: 1, text: 3, metadata: { title: "" } }, 0)).toThrow("$.text");
    expect(() => parseDocumentInput({ id: 1, text: "", metadata: { title: "", path: 1 } }, 0)).toThrow("$.metadata.path");
  });
});

describe("makeSnippet", () => {
  it("collapses whitespace", () => {
    expect(makeSnippet("  hello\n\n world  ")).toBe("hello world");
  });

  it("cuts long text with an ellipsis", () => {
    expect(makeSnippet("a b c", 3)).toBe("a b…");
  });
});

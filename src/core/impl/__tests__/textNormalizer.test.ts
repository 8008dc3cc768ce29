import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors.js";
import { TextNormalizer, createNormalizerConfig, parseNormalizerConfig } from "../textNormalizer.js";
import { plainNormalizer } from "./fixtures.js";

describe("TextNormalizer", () => {
  it("lowercases, drops stopwords and stems with porter", () => {
    const n = new TextNormalizer(createNormalizerConfig({ stemmer: "porter", stopWords: ["the", "over"] }));
    expect(n.normalize("The Running fox jumps over the lazy dogs.")).toEqual(["run", "fox", "jump", "lazi", "dog"]);
  });

  it("numbers positions over the normalized stream and keeps source offsets", () => {
    const tokens = Array.from(plainNormalizer().tokens("the quick, the brown"));
    expect(tokens).toEqual([
      { term: "quick", position: 0, startOffset: 4, endOffset: 9 },
      { term: "brown", position: 1, startOffset: 15, endOffset: 20 },
    ]);
  });

  it("removes stopwords regardless of case", () => {
    expect(plainNormalizer().normalize("THE The the end")).toEqual(["end"]);
  });

  it("returns an empty stream for empty or punctuation-only input", () => {
    const n = plainNormalizer();
    expect(n.normalize("")).toEqual([]);
    expect(n.normalize("  ... !!! --- ")).toEqual([]);
    expect(n.normalize("the the")).toEqual([]);
  });

  it("treats punctuation as a separator and keeps non-ascii letters", () => {
    const n = plainNormalizer([]);
    expect(n.normalize("Café déjà-vu, snake_case 42")).toEqual(["café", "déjà", "vu", "snake_case", "42"]);
  });
});

describe("createNormalizerConfig", () => {
  it("canonicalizes stopwords so equal settings share a fingerprint", () => {
    const a = createNormalizerConfig({ stemmer: "porter", stopWords: ["The", "a", "the", " "] });
    const b = createNormalizerConfig({ stemmer: "porter", stopWords: ["a", "THE"] });
    expect(a.stopWords).toEqual(["a", "the"]);
    expect(new TextNormalizer(a).fingerprint).toBe(new TextNormalizer(b).fingerprint);
  });

  it("gives a different fingerprint for a different stemmer", () => {
    const a = new TextNormalizer(createNormalizerConfig({ stemmer: "porter", stopWords: [] }));
    const b = new TextNormalizer(createNormalizerConfig({ stemmer: "none", stopWords: [] }));
    expect(a.fingerprint).not.toBe(b.fingerprint);
  });

  it("defaults to the porter stemmer", () => {
    expect(createNormalizerConfig({ stopWords: [] }).stemmer).toBe("porter");
  });

  it("rejects an unknown stemmer", () => {
    expect(() => createNormalizerConfig({ stemmer: "snowball", stopWords: [] })).toThrow(ConfigurationError);
  });

  it("rejects stopwords that are not strings", () => {
    expect(() => createNormalizerConfig({ stemmer: "none", stopWords: ["a", 1] })).toThrow(ConfigurationError);
    expect(() => createNormalizerConfig({ stemmer: "none" })).toThrow(ConfigurationError);
  });

  it("parses a stored config and rejects a foreign version", () => {
    const config = createNormalizerConfig({ stemmer: "none", stopWords: ["the"] });
    expect(parseNormalizerConfig(JSON.parse(JSON.stringify(config)))).toEqual(config);
    expect(() => parseNormalizerConfig({ ...config, version: 99 })).toThrow(ConfigurationError);
  });
});

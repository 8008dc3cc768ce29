import type { SearchBundle } from "../../bundle.js";
import type { DocumentInput } from "../../types.js";
import { buildBundle } from "../indexBuilder.js";
import { TextNormalizer, createNormalizerConfig } from "../textNormalizer.js";

export const BUILT_AT = new Date("2024-01-01T00:00:00.000Z");

/** "the" as the only stopword, no stemming: terms are just lowercased words. */
export function plainNormalizer(stopWords: string[] = ["the"]): TextNormalizer {
  return new TextNormalizer(createNormalizerConfig({ stemmer: "none", stopWords }));
}

export function doc(id: number, text: string): DocumentInput {
  return { id, text, metadata: { title: `doc${id}` } };
}

export const FOX_CORPUS: DocumentInput[] = [
  doc(1, "the quick brown fox"),
  doc(2, "the lazy dog"),
  doc(3, "quick fox jumps"),
];

export function foxBundle(): SearchBundle {
  return buildBundle(FOX_CORPUS, plainNormalizer(), { builtAt: BUILT_AT });
}

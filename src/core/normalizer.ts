import type { Term, Token } from "./types.js";

export const NORMALIZER_CONFIG_VERSION = 1;

export type StemmerName = "porter" | "none";

/**
 * Everything that decides term identity. Index build and query parsing must
 * share an equal config or positions and terms stop lining up.
 */
export interface NormalizerConfig {
  version: number;
  stemmer: StemmerName;
  /** lowercased, deduplicated, sorted */
  stopWords: readonly string[];
}

/**
 * Turns text into the term stream used for both indexing and querying.
 *
 * Contract notes:
 * - pure and deterministic for a given config
 * - output order is input order; the output index is the term's position
 * - input without word characters yields an empty stream
 */
export interface Normalizer {
  readonly config: NormalizerConfig;
  /** sha256 of the canonical config, comparable across processes */
  readonly fingerprint: string;

  normalize(text: string): Term[];
  tokens(text: string): Iterable<Token>;
}

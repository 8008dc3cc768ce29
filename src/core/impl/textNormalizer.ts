import { createHash } from "node:crypto";
import natural from "natural";

import type { Term, Token } from "../types.js";
import {
  NORMALIZER_CONFIG_VERSION,
  type Normalizer,
  type NormalizerConfig,
  type StemmerName,
} from "../normalizer.js";
import { ConfigurationError } from "../errors.js";
import { asString, isRecord, isStringArray } from "../validation.js";

const STEMMERS: Record<StemmerName, (token: string) => string> = {
  porter: (token) => natural.PorterStemmer.stem(token),
  none: (token) => token,
};

// letters, digits and underscore; everything else separates tokens
const WORD = /[\p{L}\p{N}_]+/gu;

function isStemmerName(v: string): v is StemmerName {
  return Object.prototype.hasOwnProperty.call(STEMMERS, v);
}

/**
 * Validates raw settings into a canonical config. Stopwords are lowercased,
 * deduplicated and sorted so equal settings give equal fingerprints.
 */
export function createNormalizerConfig(input: { stemmer?: unknown; stopWords?: unknown }): NormalizerConfig {
  const stemmer = input.stemmer === undefined ? "porter" : asString(input.stemmer);
  if (stemmer === undefined || !isStemmerName(stemmer)) {
    throw new ConfigurationError(`unknown stemmer: ${String(input.stemmer)} (expected one of: ${Object.keys(STEMMERS).join(", ")})`);
  }
  if (!isStringArray(input.stopWords)) {
    throw new ConfigurationError("stopWords must be an array of strings");
  }

  const stopWords = Array.from(new Set(input.stopWords.map((w) => w.trim().toLowerCase()).filter((w) => w.length > 0))).sort();
  return { version: NORMALIZER_CONFIG_VERSION, stemmer, stopWords };
}

/** Parses a config read back from storage; throws ConfigurationError on a bad shape. */
export function parseNormalizerConfig(value: unknown): NormalizerConfig {
  if (!isRecord(value)) throw new ConfigurationError("normalizer config must be an object");
  if (value.version !== NORMALIZER_CONFIG_VERSION) {
    throw new ConfigurationError(`unsupported normalizer config version: ${String(value.version)}`);
  }
  return createNormalizerConfig({ stemmer: value.stemmer, stopWords: value.stopWords });
}

export function fingerprintConfig(config: NormalizerConfig): string {
  const canonical = JSON.stringify({ version: config.version, stemmer: config.stemmer, stopWords: config.stopWords });
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * Lowercase -> split on non-word characters -> drop stopwords -> stem.
 *
 * Positions count only emitted terms, so a phrase that spans a stopword
 * ("state of the art") still reads as adjacent terms.
 */
export class TextNormalizer implements Normalizer {
  readonly config: NormalizerConfig;
  readonly fingerprint: string;

  private readonly stopWords: ReadonlySet<string>;
  private readonly stem: (token: string) => string;

  constructor(config: NormalizerConfig) {
    this.config = config;
    this.fingerprint = fingerprintConfig(config);
    this.stopWords = new Set(config.stopWords);
    this.stem = STEMMERS[config.stemmer];
  }

  normalize(text: string): Term[] {
    const out: Term[] = [];
    for (const tok of this.tokens(text)) out.push(tok.term);
    return out;
  }

  *tokens(text: string): Iterable<Token> {
    if (typeof text !== "string" || text.length === 0) return;

    let position = 0;
    for (const m of text.matchAll(WORD)) {
      const raw = m[0] ?? "";
      const word = raw.toLowerCase();
      if (this.stopWords.has(word)) continue;

      const term = this.stem(word);
      if (term.length === 0) continue;

      const start = m.index ?? 0;
      yield { term, position, startOffset: start, endOffset: start + raw.length };
      position++;
    }
  }
}

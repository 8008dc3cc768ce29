import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import type { Normalizer, StemmerName } from "./core/normalizer.js";
import { ConfigurationError } from "./core/errors.js";
import { TextNormalizer, createNormalizerConfig } from "./core/impl/textNormalizer.js";

export const DEFAULT_STOPWORDS_PATH = fileURLToPath(new URL("../data/stopwords-en.json", import.meta.url));

export interface AppConfig {
  port: number;
  /** bundle file written by build-index and read by the server */
  indexPath: string;
  /** directory of .txt documents */
  dataDir: string;
  stemmer: StemmerName;
  stopWordsPath: string;
}

/** Reads settings from the environment. Bad values throw before anything starts. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = env.PORT === undefined || env.PORT === "" ? 3000 : Number(env.PORT);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }

  const stemmer = env.STEMMER || "porter";
  if (stemmer !== "porter" && stemmer !== "none") {
    throw new ConfigurationError(`STEMMER must be one of: porter, none, got "${stemmer}"`);
  }

  return {
    port,
    indexPath: env.INDEX_PATH || "output/search-index.json",
    dataDir: env.DATA_DIR || "data/corpus",
    stemmer,
    stopWordsPath: env.STOPWORDS_PATH || DEFAULT_STOPWORDS_PATH,
  };
}

/** Loads the stopword list and returns the normalizer both build and query use. */
export async function loadNormalizer(config: Pick<AppConfig, "stemmer" | "stopWordsPath">): Promise<Normalizer> {
  let raw: string;
  try {
    raw = await readFile(config.stopWordsPath, "utf8");
  } catch (e) {
    throw new ConfigurationError(`cannot read stopword list at ${config.stopWordsPath}`, { cause: e });
  }

  let stopWords: unknown;
  try {
    stopWords = JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`stopword list at ${config.stopWordsPath} is not valid JSON`, { cause: e });
  }

  return new TextNormalizer(createNormalizerConfig({ stemmer: config.stemmer, stopWords }));
}

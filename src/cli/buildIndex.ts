#!/usr/bin/env node
/**
 * Builds the index bundle from a directory of .txt files.
 *
 * Usage:
 *   build-index                                  # DATA_DIR -> INDEX_PATH
 *   build-index --data ./docs --out ./idx.json
 *   build-index --stemmer none
 */

import { loadConfig, loadNormalizer } from "../config.js";
import { buildBundle } from "../core/impl/indexBuilder.js";
import { readTextCorpus } from "../corpus/textCorpus.js";
import { saveBundle } from "../persistence/bundleFile.js";

function getArg(args: readonly string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

async function main(args: readonly string[]): Promise<void> {
  const config = loadConfig({
    ...process.env,
    DATA_DIR: getArg(args, "data") ?? process.env.DATA_DIR,
    INDEX_PATH: getArg(args, "out") ?? process.env.INDEX_PATH,
    STEMMER: getArg(args, "stemmer") ?? process.env.STEMMER,
  });
  const normalizer = await loadNormalizer(config);

  console.log(`indexing ${config.dataDir}`);
  const docs = await readTextCorpus(config.dataDir);

  const started = Date.now();
  const bundle = buildBundle(docs, normalizer);
  await saveBundle(config.indexPath, bundle);

  console.log(
    `indexed ${bundle.meta.documentCount} documents, ${bundle.meta.termCount} terms ` +
      `in ${Date.now() - started}ms -> ${config.indexPath}`,
  );
}

main(process.argv.slice(2)).catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";

import type { DocumentInput } from "../core/types.js";
import { CorpusError } from "../core/errors.js";

/**
 * Every `.txt` file directly under `dir`, sorted by file name, with ids
 * assigned from 1 in that order.
 */
export async function readTextCorpus(dir: string): Promise<DocumentInput[]> {
  let names: string[];
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    names = entries
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".txt"))
      .map((e) => e.name)
      .sort();
  } catch (e) {
    throw new CorpusError(`data directory not readable: ${dir}`, { cause: e });
  }

  const docs: DocumentInput[] = [];
  for (const [i, name] of names.entries()) {
    const path = join(dir, name);
    const text = await readFile(path, "utf8");
    docs.push({ id: i + 1, text, metadata: { title: name, path } });
  }
  return docs;
}

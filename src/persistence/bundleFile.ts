import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { SearchBundle } from "../core/bundle.js";
import type { Normalizer } from "../core/normalizer.js";
import { BundleLoadError } from "../core/errors.js";
import { decodeBundle, encodeBundle } from "../core/impl/bundleCodec.js";

/**
 * Writes the bundle as JSON. The file is written beside the target and
 * renamed over it, so a reader never opens a half-written bundle.
 */
export async function saveBundle(path: string, bundle: SearchBundle): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(encodeBundle(bundle)), "utf8");
  await rename(tmp, path);
}

/**
 * Reads and validates a bundle. With `expected`, the stored normalizer config
 * must match it exactly.
 */
export async function loadBundle(path: string, expected?: Normalizer): Promise<SearchBundle> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e) {
    throw new BundleLoadError(`cannot read index bundle at ${path}`, { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new BundleLoadError(`index bundle at ${path} is not valid JSON`, { cause: e });
  }

  return decodeBundle(parsed, expected);
}

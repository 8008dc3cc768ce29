import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { BundleLoadError } from "../../core/errors.js";
import { encodeBundle } from "../../core/impl/bundleCodec.js";
import { foxBundle, plainNormalizer } from "../../core/impl/__tests__/fixtures.js";
import { loadBundle, saveBundle } from "../bundleFile.js";

describe("bundle file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "search-bundle-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves and reloads an equivalent bundle", async () => {
    const path = join(dir, "nested", "index.json");
    const bundle = foxBundle();
    await saveBundle(path, bundle);

    const loaded = await loadBundle(path, plainNormalizer());
    expect(encodeBundle(loaded)).toEqual(encodeBundle(bundle));
    expect(await readdir(join(dir, "nested"))).toEqual(["index.json"]);
  });

  it("reports a missing file as a load failure", async () => {
    await expect(loadBundle(join(dir, "none.json"))).rejects.toThrow(BundleLoadError);
  });

  it("reports broken JSON as a load failure", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, '{"version": 1,');
    await expect(loadBundle(path)).rejects.toThrow("is not valid JSON");
  });

  it("refuses a bundle whose normalizer differs from the server's", async () => {
    const path = join(dir, "index.json");
    await saveBundle(path, foxBundle());
    await expect(loadBundle(path, plainNormalizer([]))).rejects.toThrow(BundleLoadError);
  });
});

import { describe, expect, it, vi } from "vitest";

import { BundleLoadError, BundleUnavailableError } from "../../core/errors.js";
import { buildBundle } from "../../core/impl/indexBuilder.js";
import { BUILT_AT, doc, foxBundle, plainNormalizer } from "../../core/impl/__tests__/fixtures.js";
import { createSearchService } from "../engine.js";

describe("createSearchService", () => {
  it("serves search, suggestions and documents from the loaded bundle", () => {
    const service = createSearchService({ initial: foxBundle(), load: () => Promise.resolve(foxBundle()) });

    expect(service.search({ query: '"quick fox"', limit: 10 })).toEqual({
      mode: "phrase",
      results: [{ id: 3, score: 2, metadata: { title: "doc3", snippet: "quick fox jumps" } }],
    });
    expect(service.search({ query: "quick fox", limit: 1 }).results.map((r) => r.id)).toEqual([1]);
    expect(service.suggest("qu", 5)).toEqual(["quick"]);
    expect(service.getDocument(2)?.text).toBe("the lazy dog");
    expect(service.getDocument(99)).toBeUndefined();
    expect(service.status()).toEqual({ loaded: true, meta: foxBundle().meta });
  });

  it("reports an unloaded index", () => {
    const service = createSearchService({ load: () => Promise.reject(new BundleLoadError("missing")) });
    expect(service.status()).toEqual({ loaded: false });
    expect(() => service.search({ query: "quick", limit: 10 })).toThrow(BundleUnavailableError);
  });

  it("swaps to a reloaded bundle", async () => {
    const next = buildBundle([doc(7, "zebra crossing")], plainNormalizer(), { builtAt: BUILT_AT });
    const service = createSearchService({ initial: foxBundle(), load: () => Promise.resolve(next) });

    expect(await service.reload()).toEqual(next.meta);
    expect(service.search({ query: "zebra", limit: 10 }).results.map((r) => r.id)).toEqual([7]);
    expect(service.search({ query: "quick", limit: 10 }).results).toEqual([]);
  });

  it("keeps serving the previous bundle when a reload fails", async () => {
    const service = createSearchService({
      initial: foxBundle(),
      load: () => Promise.reject(new BundleLoadError("corrupt")),
    });

    await expect(service.reload()).rejects.toThrow("corrupt");
    expect(service.search({ query: "lazy", limit: 10 }).results.map((r) => r.id)).toEqual([2]);
  });

  it("applies overlapping reloads in the order they were requested", async () => {
    const older = buildBundle([doc(1, "older corpus")], plainNormalizer(), { builtAt: BUILT_AT });
    const newer = buildBundle([doc(2, "newer corpus")], plainNormalizer(), { builtAt: BUILT_AT });

    let releaseOlder: (b: typeof older) => void = () => undefined;
    const loads = [
      () => new Promise<typeof older>((resolve) => (releaseOlder = resolve)),
      () => Promise.resolve(newer),
    ];
    let calls = 0;
    const service = createSearchService({
      initial: foxBundle(),
      load: () => {
        const next = loads[calls++];
        return next ? next() : Promise.reject(new BundleLoadError("unexpected load"));
      },
    });

    const first = service.reload();
    const second = service.reload();
    await vi.waitFor(() => expect(calls).toBe(1));
    releaseOlder(older);
    await Promise.all([first, second]);

    expect(calls).toBe(2);
    expect(service.search({ query: "corpus", limit: 10 }).results.map((r) => r.id)).toEqual([2]);
  });

  it("runs the next reload after a failed one", async () => {
    const next = buildBundle([doc(7, "zebra")], plainNormalizer(), { builtAt: BUILT_AT });
    let calls = 0;
    const service = createSearchService({
      initial: foxBundle(),
      load: () => (calls++ === 0 ? Promise.reject(new BundleLoadError("corrupt")) : Promise.resolve(next)),
    });

    const failed = service.reload();
    const ok = service.reload();
    await expect(failed).rejects.toThrow("corrupt");
    expect(await ok).toEqual(next.meta);
    expect(service.search({ query: "zebra", limit: 10 }).results.map((r) => r.id)).toEqual([7]);
  });
});

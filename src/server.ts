import { loadConfig, loadNormalizer } from "./config.js";
import { createSearchService } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { loadBundle } from "./persistence/bundleFile.js";

const config = loadConfig();
const normalizer = await loadNormalizer(config);

const service = createSearchService({ load: () => loadBundle(config.indexPath, normalizer) });

try {
  const meta = await service.reload();
  console.log(`loaded ${config.indexPath}: ${meta.documentCount} documents, ${meta.termCount} terms`);
} catch (e) {
  console.error(`cannot load index from ${config.indexPath}: ${e instanceof Error ? e.message : String(e)}`);
  console.error("run build-index first");
  process.exit(1);
}

const { server, port } = await startServer({ port: config.port, service });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port}`);

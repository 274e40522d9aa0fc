/**
 * HTTP server entry point
 */

import * as http from "http";
import { fileURLToPath } from "url";
import { createApp } from "./app.js";
import { loadEngineConfig, type EngineConfig } from "./config.js";
import { createEngine } from "./engine.js";
import { closeDatabase, initDatabase } from "./services/db.js";
import { RunHistoryStore } from "./services/run-history.js";

export async function startServer(config: EngineConfig = loadEngineConfig()): Promise<http.Server> {
  const engine = await createEngine({
    catalogPath: config.catalogPath,
    stepTimeoutMs: config.stepTimeoutMs,
    maxDelegationDepth: config.maxDelegationDepth,
    verbose: config.verbose,
  });
  const db = initDatabase({ path: config.dbPath });
  const app = createApp({
    orchestrator: engine.orchestrator,
    catalog: engine.catalog,
    validator: engine.validator,
    history: new RunHistoryStore(db),
  });

  const server = http.createServer(app);
  server.on("close", () => closeDatabase(db));

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  console.log(`[server] Listening on http://localhost:${config.port}`);
  console.log(`[server] Catalog: ${config.catalogPath} (${engine.catalog.size} capabilities)`);
  return server;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer()
    .then((server) => {
      const shutdown = () => {
        console.log("[server] Shutting down");
        server.close(() => process.exit(0));
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    })
    .catch((error) => {
      console.error("[server] Failed to start:", error);
      process.exit(1);
    });
}

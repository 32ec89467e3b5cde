/**
 * Express server entry - picks the backend, seeds defaults on first boot, listens.
 */

import { createApp } from "./app.js";
import {
  getDataDir,
  getDefaultsPath,
  getDemoResultPath,
  getOpenRouterBaseUrl,
  getOpenRouterTimeoutMs,
  getPort,
  getPublicDir,
} from "../src/config.js";
import { createStoreProvider } from "../src/lib/persistence/provider.js";
import { initializeStore } from "../src/lib/persistence/defaults.js";

const PORT = getPort();

async function start() {
  const provider = createStoreProvider();
  const app = createApp({
    provider,
    defaultsPath: getDefaultsPath(),
    demoResultPath: getDemoResultPath(),
    publicDir: getPublicDir(),
    dataDir: getDataDir(),
    openRouter: { baseURL: getOpenRouterBaseUrl(), timeoutMs: getOpenRouterTimeoutMs() },
  });

  try {
    await initializeStore(provider, getDefaultsPath());
  } catch (e) {
    console.warn("[Server] Failed to seed defaults:", e instanceof Error ? e.message : e);
  }

  const server = app.listen(PORT, "0.0.0.0", () => {
    console.log(`[Server] ${provider.driver} store, running at http://0.0.0.0:${PORT}`);
  });

  const shutdown = () => {
    server.close(() => {
      provider
        .close()
        .then(() => process.exit(0))
        .catch((e) => {
          console.error("[Server] Failed to close store:", e);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

start().catch((e) => {
  console.error("[Server] Failed to start:", e);
  process.exit(1);
});

/**
 * Seed defaults into the configured store when it has no scales.
 * --reset clears every resource kind first.
 * Usage: PERSISTENCE_DRIVER=db DATABASE_URL=... tsx scripts/db/seed.ts [--reset]
 */

import { getDefaultsPath } from "../../src/config.js";
import { createStoreProvider, withStore } from "../../src/lib/persistence/provider.js";
import { initializeStore, loadDefaults, resetToDefaults } from "../../src/lib/persistence/defaults.js";

async function main() {
  const reset = process.argv.includes("--reset");
  const provider = createStoreProvider();
  try {
    if (reset) {
      const defaults = await loadDefaults(getDefaultsPath());
      await withStore(provider, (store) => resetToDefaults(store, defaults));
      console.log(`[seed] Reset ${provider.driver} store to defaults`);
    } else if (!(await initializeStore(provider, getDefaultsPath()))) {
      console.log(`[seed] ${provider.driver} store already has scales, nothing to do`);
    }
  } finally {
    await provider.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

/**
 * Copy the document store (prompts.json, history.json) into the database, replacing its contents.
 * Run after migrate. Use when switching to PERSISTENCE_DRIVER=db.
 * Usage: DATABASE_URL=... DATA_DIR=.data tsx scripts/db/import-file-store.ts
 */

import { getDataDir } from "../../src/config.js";
import {
  createDbStoreProvider,
  createFileStoreProvider,
  withStore,
} from "../../src/lib/persistence/provider.js";
import { closePool, getPool } from "../../src/lib/db/index.js";
import { copyResources } from "../../src/lib/persistence/transfer.js";

async function main() {
  const dataDir = getDataDir();
  const source = createFileStoreProvider(dataDir);
  const target = createDbStoreProvider(getPool(), closePool);
  try {
    const copied = await withStore(source, (from) => withStore(target, (to) => copyResources(from, to)));
    console.log(
      `Imported ${copied.settings} settings, ${copied.scales} scales, ${copied.models} models, ${copied.history} history entries from ${dataDir}`
    );
  } finally {
    await target.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

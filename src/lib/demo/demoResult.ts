/**
 * Canned analysis result for the demo screen. Read from disk on every call.
 */

import { getDemoResultPath } from "../../config.js";
import { isPlainObject, loadJsonDocument } from "../persistence/jsonDocument.js";

export async function loadDemoResult(path: string = getDemoResultPath()): Promise<Record<string, unknown> | null> {
  const result = await loadJsonDocument(path, (raw) => (isPlainObject(raw) ? raw : null), () => ({}));
  return result.source === "stored" ? result.value : null;
}

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createStore, migrate, type Store } from "../../src/db/client.js";

export interface TestStore {
  store: Store;
  cleanup: () => void;
}

/** A migrated database file in a fresh temp directory. */
export function createTestStore(): TestStore {
  const dir = mkdtempSync(join(tmpdir(), "club-bot-test-"));
  const store = createStore(join(dir, "test.db"));
  migrate(store);
  return {
    store,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/** Returns `start` on the first call and one step later on each call after. */
export function steppingClock(
  start = "2025-01-01T00:00:00.000Z",
  stepMs = 60_000
): () => string {
  let t = Date.parse(start) - stepMs;
  return () => {
    t += stepMs;
    return new Date(t).toISOString();
  };
}

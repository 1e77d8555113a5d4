// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Account store factory: selects and manages a shared AccountStore singleton.
 * Selection via DATABASE_URL: postgres:// or postgresql:// → PostgresAccountStore,
 * anything else → SQLiteAccountStore at DB_PATH (default data/sso.db).
 */

import type { AccountStore } from "./account-store.js";
import { PostgresAccountStore } from "./postgres-account-store.js";
import { SQLiteAccountStore } from "./sqlite-account-store.js";

let instance: AccountStore | null = null;
let initPromise: Promise<AccountStore> | null = null;

function isPostgresUrl(url: string): boolean {
  return url.startsWith("postgres://") || url.startsWith("postgresql://");
}

export function createAccountStore(env: NodeJS.ProcessEnv = process.env): AccountStore {
  const databaseUrl = env.DATABASE_URL;

  if (databaseUrl && isPostgresUrl(databaseUrl)) {
    return new PostgresAccountStore({ connectionString: databaseUrl });
  }

  return new SQLiteAccountStore({ dbPath: env.DB_PATH ?? "data/sso.db" });
}

/**
 * Returns the shared, initialized AccountStore.
 * Concurrent first callers share one initialization.
 */
export function getAccountStore(): Promise<AccountStore> {
  if (instance) {
    return Promise.resolve(instance);
  }

  if (initPromise) {
    return initPromise;
  }

  initPromise = (async () => {
    const store = createAccountStore();
    try {
      await store.initialize();
    } catch (error) {
      initPromise = null;
      throw error;
    }
    instance = store;
    initPromise = null;
    return store;
  })();

  return initPromise;
}

/** Close the shared store and forget it (graceful shutdown, test cleanup). */
export async function closeAccountStore(): Promise<void> {
  if (instance) {
    await instance.close();
    instance = null;
  }
  initPromise = null;
}

/** Forget the shared store without closing it. Used in tests. */
export function resetAccountStore(): void {
  instance = null;
  initPromise = null;
}
